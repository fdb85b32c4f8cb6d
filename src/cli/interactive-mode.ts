import { stdin, stdout } from 'node:process'
import { createInterface, type Interface } from 'node:readline'
import type { Readable, Writable } from 'node:stream'
import type { DashboardContext } from '../dashboard'
import { DAY_WINDOWS, isDayWindow, type DayWindow } from '../interfaces'
import type { DashboardRenderer } from './dashboard-renderer'

export interface InteractiveOptions {
  input?: Readable
  output?: Writable
  days?: DayWindow
}

/**
 * Interactive CLI mode: a REPL over one dashboard context
 */
export class InteractiveMode {
  private readonly rl: Interface
  private readonly output: Writable
  private days: DayWindow
  private isRunning = false
  private closed = false

  constructor(
    private readonly context: DashboardContext,
    private readonly renderer: DashboardRenderer,
    options: InteractiveOptions = {}
  ) {
    this.output = options.output ?? stdout
    this.days = options.days ?? context.config.defaultDays
    this.rl = createInterface({
      input: options.input ?? stdin,
      output: this.output,
      prompt: 'dash> ',
      terminal: false
    })
    this.rl.on('close', () => {
      this.closed = true
    })
  }

  get currentDays(): DayWindow {
    return this.days
  }

  /**
   * Start interactive mode
   * @returns Resolves when the session ends
   */
  public start(): Promise<void> {
    this.print('Crypto Dashboard interactive mode')
    this.print('Type "help" for available commands')
    this.print('')

    const ended = new Promise<void>((resolve) => {
      this.rl.on('close', () => {
        this.print('Goodbye!')
        resolve()
      })
    })

    this.rl.on('line', (line) => {
      void this.onLine(line)
    })
    this.rl.prompt()
    return ended
  }

  private async onLine(line: string): Promise<void> {
    try {
      await this.handleCommand(line)
    } catch (error) {
      this.print(`Error: ${error instanceof Error ? error.message : String(error)}`)
    }

    if (!this.isRunning && !this.closed) {
      this.rl.prompt()
    }
  }

  /**
   * Handle one interactive command
   */
  public async handleCommand(line: string): Promise<void> {
    const [cmd = '', ...rest] = line.trim().toLowerCase().split(/\s+/)

    switch (cmd) {
      case 'help':
      case 'h':
        this.showHelp()
        break

      case 'show':
      case 's':
        await this.show()
        break

      case 'refresh':
      case 'r':
        if (this.isRunning) {
          this.print('Already loading')
          break
        }
        this.print(`Cleared ${this.context.invalidateAll()} cached series`)
        await this.show()
        break

      case 'days':
      case 'd':
        await this.setDays(rest[0])
        break

      case 'status':
        this.showStatus()
        break

      case 'exit':
      case 'quit':
      case 'q':
        this.rl.close()
        break

      case '':
        // Empty command, just show prompt again
        break

      default:
        this.print(`Unknown command: ${cmd}`)
        this.print('Type "help" for available commands')
    }
  }

  private showHelp(): void {
    this.print(`
Available commands:
  help, h          Show this help message
  show, s          Render the dashboard
  refresh, r       Clear cached data and render
  days, d <n>      Change the time period (${DAY_WINDOWS.join(', ')})
  status           Show cache statistics
  exit, quit, q    Exit interactive mode
    `.trim())
  }

  private async show(): Promise<void> {
    if (this.isRunning) {
      this.print('Already loading')
      return
    }

    this.isRunning = true
    try {
      this.print('Loading market data...')
      const snapshot = await this.context.loadSnapshot(this.days)
      this.print(this.renderer.render(snapshot))
    } finally {
      this.isRunning = false
    }
  }

  private async setDays(arg: string | undefined): Promise<void> {
    const days = Number(arg)
    if (!isDayWindow(days)) {
      this.print(`Time period must be one of: ${DAY_WINDOWS.join(', ')}`)
      return
    }
    this.days = days
    await this.show()
  }

  private showStatus(): void {
    const stats = this.context.cache.stats()
    this.print(`Time period: ${this.days} days`)
    this.print(`Cached series: ${stats.size}`)
    this.print(`Hits: ${stats.hits}  Misses: ${stats.misses}  Fetches: ${stats.fetches}  Failures: ${stats.failures}`)
  }

  private print(text: string): void {
    this.output.write(`${text}\n`)
  }
}
