import { z } from 'zod'
import { DAY_WINDOWS } from '../interfaces'
import type { DashboardConfig } from '../interfaces'

/**
 * Schema for the dashboard configuration file.
 * Every section is optional; omitted values take the defaults below.
 */
const schema = z
  .object({
    exchange: z
      .object({
        enableRateLimit: z.boolean().default(true),
        timeoutMs: z.number().int().min(1_000).max(120_000).default(10_000)
      })
      .strict()
      .default({ enableRateLimit: true, timeoutMs: 10_000 }),
    cache: z
      .object({
        ttlSeconds: z.number().int().min(1).max(86_400).default(300)
      })
      .strict()
      .default({ ttlSeconds: 300 }),
    defaultDays: z.literal(DAY_WINDOWS).default(30),
    server: z
      .object({
        host: z.string().min(1).default('localhost'),
        port: z.number().int().min(1).max(65_535).default(3000),
        cors: z.boolean().default(true)
      })
      .strict()
      .default({ host: 'localhost', port: 3000, cors: true }),
    refreshSeconds: z.number().int().min(5).max(3_600).default(60)
  })
  .strict()

/**
 * A single validation problem
 */
export interface ValidationIssue {
  /** Dot path of the offending field, empty for the root */
  field: string
  message: string
}

export type ValidationResult =
  | { isValid: true; config: DashboardConfig; errors: [] }
  | { isValid: false; errors: ValidationIssue[] }

/**
 * Config validator backed by the zod schema
 */
export class ConfigValidator {
  /**
   * Validate a raw configuration object and fill in defaults
   * @throws Error listing every issue if validation fails
   */
  public static validate(config: unknown): DashboardConfig {
    const result = this.validateWithDetails(config)
    if (!result.isValid) {
      const lines = result.errors.map((issue) => `${issue.field || '(root)'}: ${issue.message}`)
      throw new Error(`Invalid configuration: ${lines.join('; ')}`)
    }
    return result.config
  }

  /**
   * Validate without throwing
   */
  public static validateWithDetails(config: unknown): ValidationResult {
    const result = schema.safeParse(config ?? {})
    if (result.success) {
      return { isValid: true, config: result.data, errors: [] }
    }

    return {
      isValid: false,
      errors: result.error.issues.map((issue) => ({
        field: issue.path.map(String).join('.'),
        message: issue.message
      }))
    }
  }

  /**
   * The configuration used when no file is given
   */
  public static defaults(): DashboardConfig {
    return this.validate({})
  }
}
