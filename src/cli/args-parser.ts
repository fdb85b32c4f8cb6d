import { Command, InvalidArgumentError } from 'commander'
import { DAY_WINDOWS, isDayWindow, type DayWindow } from '../interfaces'

export const MODES = ['render', 'interactive', 'server'] as const

export type Mode = (typeof MODES)[number]

/**
 * Parsed command-line arguments
 */
export interface CliArgs {
  /** Path to the configuration file; defaults apply when absent */
  config?: string

  /** Execution mode: render (print once or watch), interactive (REPL), or server (HTTP API) */
  mode: Mode

  /** Day window to show first */
  days?: DayWindow

  /** Re-render periodically in render mode; true uses the configured period */
  watch?: number | true

  /** Port for server mode */
  port?: number

  /** Verbosity level for logging */
  verbose: number

  /** Disable colored output */
  noColor: boolean
}

/**
 * Default CLI arguments
 */
export const DEFAULT_ARGS = {
  mode: 'render',
  verbose: 0,
  noColor: false
} as const satisfies Partial<CliArgs>

function parseMode(value: string): Mode {
  const mode = MODES.find((candidate) => candidate === value)
  if (!mode) {
    throw new InvalidArgumentError(`Must be one of: ${MODES.join(', ')}.`)
  }
  return mode
}

function parseDays(value: string): DayWindow {
  const days = Number(value)
  if (!isDayWindow(days)) {
    throw new InvalidArgumentError(`Must be one of: ${DAY_WINDOWS.join(', ')}.`)
  }
  return days
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.')
  }
  return parsed
}

function parsePort(value: string): number {
  const port = parsePositiveInt(value)
  if (port > 65_535) {
    throw new InvalidArgumentError('Must be a port between 1 and 65535.')
  }
  return port
}

/**
 * Builds the commander program; exposed so tests can override exit behaviour
 */
export function createProgram(): Command {
  const program = new Command()

  program
    .name('crypto-dash')
    .description('Price chart and market overview for BTC, ETH and SOL against USDT')
    .version('1.0.0')
    .usage('[options]')

  program
    .option('-c, --config <file>', 'path to dashboard configuration file')
    .option(
      '-m, --mode <mode>',
      'execution mode: render (print once), interactive (REPL), or server (HTTP API)',
      parseMode,
      DEFAULT_ARGS.mode
    )
    .option('-d, --days <days>', `time period in days (${DAY_WINDOWS.join(', ')})`, parseDays)
    .option('-w, --watch [seconds]', 're-render every N seconds (render mode)', parsePositiveInt)
    .option('-p, --port <port>', 'port for server mode', parsePort)
    .option(
      '-v, --verbose',
      'increase verbosity (can be used multiple times: -v, -vv)',
      (_: string, previous: number) => previous + 1,
      DEFAULT_ARGS.verbose
    )
    .option('--no-color', 'disable colored output')

  program.addHelpText('after', `

Examples:
  $ crypto-dash                          # Print the dashboard once for the last 30 days
  $ crypto-dash -d 7                     # Last 7 days
  $ crypto-dash -w                       # Re-render every refreshSeconds (default 60)
  $ crypto-dash -w 30                    # Re-render every 30 seconds
  $ crypto-dash -m interactive           # REPL with refresh and days commands
  $ crypto-dash -m server -p 8080        # JSON API for a browser page
  $ crypto-dash -c dashboard.json -vv    # Custom config with debug logging
`)

  return program
}

/**
 * Parse command-line arguments using commander
 */
export function parseArgs(argv: string[], program: Command = createProgram()): CliArgs {
  program.parse(argv)
  const options = program.opts<{
    config?: string
    mode: Mode
    days?: DayWindow
    watch?: number | true
    port?: number
    verbose: number
    color: boolean
  }>()

  return {
    config: options.config,
    mode: options.mode,
    days: options.days,
    watch: options.watch,
    port: options.port,
    verbose: options.verbose,
    noColor: options.color === false // Commander converts --no-color to color: false
  }
}

/**
 * ArgsParser class for compatibility
 */
export class ArgsParser {
  /**
   * Parse command-line arguments
   */
  public static parse(argv: string[]): CliArgs {
    return parseArgs(argv)
  }
}
