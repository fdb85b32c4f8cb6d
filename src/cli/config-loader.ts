import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import type { DashboardConfig } from '../interfaces'
import { ConfigValidator, type ValidationIssue } from './config-validator'

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly issues: ValidationIssue[] = []
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Expands environment variables in a string
 * Supports ${VAR_NAME} and $VAR_NAME syntax
 */
export function expandEnvironmentVariables(str: string): string {
  return str
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] || ''
    })
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
      return process.env[varName] || ''
    })
}

/**
 * Recursively expands environment variables in an object.
 * A string that becomes a plain number after expansion is returned as a number,
 * so "${DASHBOARD_PORT}" can fill a numeric field.
 */
function expandObjectEnvironmentVariables(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const expanded = expandEnvironmentVariables(obj)
    if (expanded !== obj && /^-?\d+(\.\d+)?$/.test(expanded)) {
      return Number(expanded)
    }
    return expanded
  }

  if (Array.isArray(obj)) {
    return obj.map(expandObjectEnvironmentVariables)
  }

  if (obj && typeof obj === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      expanded[key] = expandObjectEnvironmentVariables(value)
    }
    return expanded
  }

  return obj
}

/**
 * Loads and parses a dashboard configuration file
 * @param configPath Path to the configuration file (absolute or relative)
 * @returns Validated configuration with defaults applied
 * @throws ConfigLoadError if file cannot be read or parsed
 * @throws ConfigValidationError if configuration is invalid
 */
export async function loadDashboardConfig(configPath: string): Promise<DashboardConfig> {
  // Resolve path (convert relative to absolute)
  const resolvedPath = isAbsolute(configPath)
    ? configPath
    : resolve(process.cwd(), configPath)

  if (!existsSync(resolvedPath)) {
    throw new ConfigLoadError(
      `Configuration file not found: ${resolvedPath}`,
      resolvedPath
    )
  }

  let rawContent: string
  try {
    rawContent = await readFile(resolvedPath, 'utf-8')
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  let parsedConfig: unknown
  try {
    parsedConfig = JSON.parse(rawContent)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to parse JSON configuration: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  const expandedConfig = expandObjectEnvironmentVariables(parsedConfig)

  const validation = ConfigValidator.validateWithDetails(expandedConfig)
  if (!validation.isValid) {
    const summary = validation.errors
      .map((issue) => `${issue.field || '(root)'}: ${issue.message}`)
      .join('; ')
    throw new ConfigValidationError(
      `Invalid configuration: ${summary}`,
      resolvedPath,
      validation.errors
    )
  }

  return validation.config
}

/**
 * ConfigLoader class for compatibility
 */
export class ConfigLoader {
  /**
   * Load dashboard configuration from file
   */
  public static async load(configPath: string): Promise<DashboardConfig> {
    return loadDashboardConfig(configPath)
  }

  /**
   * Configuration used when no file is given
   */
  public static createDefault(): DashboardConfig {
    return ConfigValidator.defaults()
  }
}
