/**
 * In-process stand-in for the engine.
 *
 * An http.Server on a temporary Unix socket (or 127.0.0.1 on an ephemeral
 * port) that records every request and answers from a route table keyed by
 * method and path below the API version prefix.
 */
import { mkdtemp, rm } from 'node:fs/promises'
import { createServer, type IncomingHttpHeaders, type Server, type ServerResponse } from 'node:http'
import type { AddressInfo, Socket } from 'node:net'
import { tmpdir } from 'node:os'
import { join } from 'node:path'

export interface RecordedRequest {
  readonly method: string
  /** Path below the version prefix */
  readonly path: string
  readonly query: URLSearchParams
  readonly headers: IncomingHttpHeaders
  readonly body: Buffer
}

export type RouteHandler = (request: RecordedRequest, response: ServerResponse) => void | Promise<void>

export class FakeDaemon {
  readonly requests: RecordedRequest[] = []
  /** Highest number of requests the daemon was answering at once */
  peakInFlight = 0
  inFlight = 0
  /** What a client should be given; set once listening */
  uri = ''

  private readonly routes = new Map<string, RouteHandler>()
  private readonly sockets = new Set<Socket>()
  private readonly server: Server

  private constructor(
    private readonly apiVersion: string,
    private readonly dir: string | undefined
  ) {
    this.server = createServer((req, res) => {
      this.inFlight++
      this.peakInFlight = Math.max(this.peakInFlight, this.inFlight)
      res.once('close', () => {
        this.inFlight--
      })

      const chunks: Buffer[] = []
      req.on('data', (chunk: Buffer) => chunks.push(chunk))
      req.on('end', () => {
        const url = new URL(req.url ?? '/', 'http://engine')
        const prefix = `/${this.apiVersion}`
        const path = url.pathname.startsWith(prefix) ? url.pathname.slice(prefix.length) : url.pathname
        const recorded: RecordedRequest = {
          method: req.method ?? 'GET',
          path,
          query: url.searchParams,
          headers: req.headers,
          body: Buffer.concat(chunks)
        }
        this.requests.push(recorded)

        const handler = this.routes.get(`${recorded.method} ${path}`) ?? notFound
        Promise.resolve(handler(recorded, res)).catch((error: unknown) => {
          res.statusCode = 500
          res.end(String(error))
        })
      })
    })
    this.server.on('connection', (socket: Socket) => {
      this.sockets.add(socket)
      socket.once('close', () => this.sockets.delete(socket))
    })
  }

  /**
   * Start listening. The returned `uri` is what a client should be given.
   */
  static async start(transport: 'unix' | 'tcp' = 'unix', apiVersion = 'v1.12'): Promise<FakeDaemon> {
    const dir = transport === 'unix' ? await mkdtemp(join(tmpdir(), 'dockwire-')) : undefined
    const daemon = new FakeDaemon(apiVersion, dir)

    if (dir !== undefined) {
      const socketPath = join(dir, 'engine.sock')
      await new Promise<void>((resolve) => daemon.server.listen(socketPath, resolve))
      daemon.uri = `unix://${socketPath}`
      return daemon
    }

    await new Promise<void>((resolve) => daemon.server.listen(0, '127.0.0.1', resolve))
    const address = daemon.server.address()
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address')
    }
    const { port }: AddressInfo = address
    daemon.uri = `http://127.0.0.1:${port}`
    return daemon
  }

  /**
   * Register a handler for `METHOD /path` (path without version prefix).
   */
  on(method: string, path: string, handler: RouteHandler): this {
    this.routes.set(`${method} ${path}`, handler)
    return this
  }

  /**
   * Shorthand for a JSON answer.
   */
  json(method: string, path: string, body: unknown, status = 200): this {
    return this.on(method, path, (_req, res) => {
      res.writeHead(status, { 'content-type': 'application/json' })
      res.end(JSON.stringify(body))
    })
  }

  /**
   * Shorthand for an empty answer with a status.
   */
  status(method: string, path: string, status: number, body = ''): this {
    return this.on(method, path, (_req, res) => {
      res.writeHead(status, { 'content-type': 'text/plain' })
      res.end(body)
    })
  }

  /**
   * Register a handler that never answers.
   */
  hang(method: string, path: string): this {
    return this.on(method, path, () => undefined)
  }

  async close(): Promise<void> {
    for (const socket of this.sockets) {
      socket.destroy()
    }
    await new Promise<void>((resolve) => this.server.close(() => resolve()))
    if (this.dir !== undefined) {
      await rm(this.dir, { recursive: true, force: true })
    }
  }
}

const notFound: RouteHandler = (request, response) => {
  response.writeHead(404, { 'content-type': 'text/plain' })
  response.end(`no such route: ${request.method} ${request.path}\n`)
}

/**
 * Poll until `condition` holds.
 */
export async function waitFor(condition: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs
  while (!condition()) {
    if (Date.now() > deadline) {
      throw new Error('condition not met in time')
    }
    await new Promise((resolve) => setTimeout(resolve, 5))
  }
}
