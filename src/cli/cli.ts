#!/usr/bin/env node

import ora from 'ora'
import { DashboardContext } from '../dashboard'
import type { DashboardConfig, DayWindow } from '../interfaces'
import logger, { setLogLevel } from '../utils/logger'
import { ArgsParser, type CliArgs } from './args-parser'
import { ConfigLoader } from './config-loader'
import { DashboardRenderer } from './dashboard-renderer'
import { InteractiveMode } from './interactive-mode'
import { ServerMode } from './server-mode'

/**
 * Applies command line flags on top of the loaded configuration
 */
export function applyArgs(config: DashboardConfig, args: CliArgs): DashboardConfig {
  return {
    ...config,
    defaultDays: args.days ?? config.defaultDays,
    refreshSeconds: typeof args.watch === 'number' ? args.watch : config.refreshSeconds,
    server: {
      ...config.server,
      port: args.port ?? config.server.port
    }
  }
}

/**
 * Main CLI entry point
 */
async function main(): Promise<void> {
  const args = ArgsParser.parse(process.argv)

  // Set up verbosity
  if (args.verbose > 0) {
    setLogLevel(args.verbose >= 2 ? 'debug' : 'info')
  }

  const loaded = args.config
    ? await ConfigLoader.load(args.config)
    : ConfigLoader.createDefault()
  const config = applyArgs(loaded, args)

  const context = DashboardContext.create(config)
  const renderer = new DashboardRenderer({ color: !args.noColor })

  try {
    switch (args.mode) {
      case 'render':
        await runRender(context, renderer, config.defaultDays, args.watch ? config.refreshSeconds : undefined)
        break

      case 'interactive':
        await new InteractiveMode(context, renderer, { days: config.defaultDays }).start()
        break

      case 'server':
        await runServerMode(context)
        break
    }
  } finally {
    await context.close()
  }
}

/**
 * Render once, or every `watchSeconds` until interrupted
 */
async function runRender(
  context: DashboardContext,
  renderer: DashboardRenderer,
  days: DayWindow,
  watchSeconds?: number
): Promise<void> {
  const renderOnce = async (): Promise<void> => {
    const spinner = ora({ text: 'Loading market data...', stream: process.stderr }).start()
    try {
      const snapshot = await context.loadSnapshot(days)
      spinner.stop()
      console.log(renderer.render(snapshot))
    } catch (error) {
      spinner.fail('Failed to load market data')
      throw error
    }
  }

  await renderOnce()
  if (!watchSeconds) {
    return
  }

  await new Promise<void>((resolve, reject) => {
    const timer = setInterval(() => {
      console.log('')
      renderOnce().catch((error: unknown) => {
        clearInterval(timer)
        reject(error)
      })
    }, watchSeconds * 1000)

    process.once('SIGINT', () => {
      clearInterval(timer)
      resolve()
    })
  })
}

/**
 * Run the HTTP server until interrupted
 */
async function runServerMode(context: DashboardContext): Promise<void> {
  const server = new ServerMode(context)
  await server.start()

  await new Promise<void>((resolve) => {
    const stop = (): void => {
      console.log('\nShutting down server...')
      server.stop().then(resolve, (error: unknown) => {
        logger.error('Failed to stop server', { error })
        resolve()
      })
    }
    process.once('SIGINT', stop)
    process.once('SIGTERM', stop)
  })
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.error('Fatal error', { error })
    console.error('Fatal error:', error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
