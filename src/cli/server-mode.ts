import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http'
import { URL } from 'node:url'
import type { DashboardContext } from '../dashboard'
import { DashboardError } from '../dashboard'
import { DAY_WINDOWS, isDayWindow, type ServerConfig } from '../interfaces'
import logger from '../utils/logger'

/**
 * Result of routing one request
 */
export interface ApiResponse {
  status: number
  body: unknown
}

/**
 * Server mode: serves dashboard snapshots as JSON for a browser page
 */
export class ServerMode {
  private server?: Server
  private readonly startedAt = Date.now()

  constructor(
    private readonly context: DashboardContext,
    private readonly serverConfig: ServerConfig = context.config.server
  ) {}

  /**
   * Start the HTTP server
   */
  public async start(): Promise<void> {
    const server = createServer((req, res) => {
      void this.handleRequest(req, res)
    })
    this.server = server

    return new Promise((resolve, reject) => {
      server.once('error', reject)
      server.listen(this.serverConfig.port, this.serverConfig.host, () => {
        logger.info('Dashboard server listening', {
          host: this.serverConfig.host,
          port: this.serverConfig.port
        })
        console.log(`Dashboard server listening on http://${this.serverConfig.host}:${this.serverConfig.port}`)
        console.log('Available endpoints:')
        console.log('  GET  /health            - Health check')
        console.log('  GET  /symbols           - Configured trading pairs')
        console.log('  GET  /dashboard?days=N  - Chart series and metrics')
        console.log('  POST /refresh           - Clear cached market data')
        resolve()
      })
    })
  }

  /**
   * Stop the server
   */
  public async stop(): Promise<void> {
    const server = this.server
    if (!server) return

    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()))
    })
    this.server = undefined
    logger.info('Dashboard server stopped')
  }

  /**
   * Routes a request to its handler
   */
  public async dispatch(method: string, rawUrl: string): Promise<ApiResponse> {
    const url = new URL(rawUrl, 'http://localhost')
    const path = url.pathname

    try {
      if (method === 'GET' && path === '/health') {
        return this.handleHealth()
      }
      if (method === 'GET' && path === '/symbols') {
        return { status: 200, body: { symbols: this.context.symbols } }
      }
      if (method === 'GET' && path === '/dashboard') {
        return await this.handleDashboard(url.searchParams.get('days'))
      }
      if (method === 'POST' && path === '/refresh') {
        return { status: 200, body: { cleared: this.context.invalidateAll() } }
      }
      return { status: 404, body: { error: 'Not found' } }
    } catch (error) {
      if (error instanceof DashboardError) {
        return { status: 400, body: { error: error.message } }
      }
      logger.error('Request failed', { method, path, error })
      return { status: 500, body: { error: 'Internal server error' } }
    }
  }

  /**
   * Handle HTTP requests
   */
  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // Set CORS headers if enabled
    if (this.serverConfig.cors) {
      res.setHeader('Access-Control-Allow-Origin', '*')
      res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS')
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type')

      if (req.method === 'OPTIONS') {
        res.writeHead(204)
        res.end()
        return
      }
    }

    const response = await this.dispatch(req.method || 'GET', req.url || '/')
    this.sendJson(res, response.status, response.body)
  }

  private handleHealth(): ApiResponse {
    const stats = this.context.cache.stats()
    return {
      status: 200,
      body: {
        status: 'ok',
        uptime: (Date.now() - this.startedAt) / 1000,
        cache: stats
      }
    }
  }

  private async handleDashboard(daysParam: string | null): Promise<ApiResponse> {
    const days = daysParam === null ? this.context.config.defaultDays : Number(daysParam)
    if (!isDayWindow(days)) {
      return {
        status: 400,
        body: { error: `days must be one of: ${DAY_WINDOWS.join(', ')}` }
      }
    }

    return { status: 200, body: await this.context.loadSnapshot(days) }
  }

  private sendJson(res: ServerResponse, status: number, data: unknown): void {
    res.writeHead(status, { 'Content-Type': 'application/json' })
    res.end(JSON.stringify(data))
  }
}
