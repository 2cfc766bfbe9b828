/**
 * HTTP Server implementation
 */

import { EmitterFor, type Emitter } from "@trellis/core/events.js"
import { DeferredPromise } from "@trellis/core/index.js"
import {
  registerShutdown,
  removeShutdown,
  type LifecycleEvents,
} from "@trellis/core/lifecycle.js"
import {
  DefaultLogger,
  type LogLevel,
  type Logger,
} from "@trellis/core/logging.js"
import { Timer } from "@trellis/core/time.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { once } from "events"
import {
  createServer,
  type IncomingMessage,
  type Server,
  type ServerResponse,
} from "http"
import type { AddressInfo } from "net"
import type { Readable } from "stream"
import { ClientDisconnectedError } from "./errors.js"
import {
  HttpStatusCode,
  isHttpMethod,
  type ConnectionHandler,
  type HttpScope,
  type RawHeaders,
  type Receive,
  type Send,
} from "./index.js"
import { LifespanDriver } from "./lifespan.js"
import { HttpServerMetrics } from "./metrics.js"
import { EMPTY_BODY, safeDecode } from "./utils.js"

/**
 * The default {@link Logger} for {@link HttpServer} operations
 */
const HTTP_SERVER_LOGGER: Logger = new DefaultLogger({
  name: "http.server",
})

/**
 * Update the server log levels
 *
 * @param level The {@link LogLevel} for the {@link HttpServer} {@link Logger}
 */
export function setHttpServerLogLevel(level: LogLevel): void {
  HTTP_SERVER_LOGGER.setLevel(level)
}

/**
 * Set of supported events on an {@link HttpServer}
 */
export interface HttpServerEvents extends LifecycleEvents {
  /**
   * Fired when the {@link HttpServer} is started
   *
   * @param port The port that was opened
   */
  listening: (port: number) => void

  /**
   * Fired when there is an error with the underlying {@link HttpServer}
   *
   * @param error The error that was encountered
   */
  error: (error: unknown) => void
}

/**
 * The interface representing an HTTP Server
 */
export interface HttpServer extends Emitter<HttpServerEvents> {
  /**
   * The identifier for the server
   */
  readonly id: string

  /**
   * Starts the server accepting connections on the given port
   *
   * @param port The port to listen on (0 picks a free port)
   * @returns The port that was opened
   */
  listen(port: number): Promise<number>

  /**
   * Closes the server, rejecting any further calls
   */
  close(): Promise<void>

  /**
   * Change the readiness flag
   *
   * @param enabled A flag to indicate if the readiness is enabled
   */
  setReady(enabled: boolean): void
}

/**
 * Configuration for a {@link NodeHttpServer}
 */
export interface HttpServerConfig {
  /** The server identifier used in logs */
  name: string
  /** The {@link ConnectionHandler} (usually an application) to serve */
  app: ConnectionHandler
  /** The interface to bind (default is all interfaces) */
  host?: string
  /** Report ready on /ready as soon as the server listens (default is true) */
  enabledOnStart?: boolean
}

/**
 * Subset of an incoming request used to build a {@link HttpScope}
 */
export interface ScopeSource {
  method?: string
  url?: string
  httpVersion: string
  rawHeaders: string[]
  socket?: {
    remoteAddress?: string
    remotePort?: number
    encrypted?: boolean
  }
}

/**
 * Translate an incoming request into a {@link HttpScope}
 *
 * @param source The {@link ScopeSource} to translate
 * @returns The {@link HttpScope} or undefined if the method is not supported
 */
export function buildScope(source: ScopeSource): Optional<HttpScope> {
  const method = source.method?.toUpperCase()
  if (!isHttpMethod(method)) {
    return
  }

  const url = new URL(source.url ?? "/", "http://localhost")
  const headers: RawHeaders = []
  for (let n = 0; n + 1 < source.rawHeaders.length; n += 2) {
    headers.push([source.rawHeaders[n].toLowerCase(), source.rawHeaders[n + 1]])
  }

  const { remoteAddress, remotePort } = source.socket ?? {}

  return {
    type: "http",
    method,
    scheme: source.socket?.encrypted ? "https" : "http",
    httpVersion: source.httpVersion,
    path: safeDecode(url.pathname),
    rootPath: "",
    rawPath: url.pathname,
    queryString: url.search.slice(1),
    headers,
    pathParams: {},
    state: {},
    client:
      remoteAddress !== undefined && remotePort !== undefined
        ? { host: remoteAddress, port: remotePort }
        : undefined,
  }
}

/**
 * Create the {@link Receive} for a request body
 *
 * @param body The {@link Readable} request body
 * @returns A {@link Receive} yielding the body chunks, then a disconnect
 */
export function createReceive(body: Readable): Receive {
  const iterator: AsyncIterator<unknown> = body[Symbol.asyncIterator]()
  let finished = false

  return async () => {
    if (finished) {
      return { type: "http.disconnect" }
    }

    try {
      const next = await iterator.next()
      if (next.done) {
        finished = true
        return { type: "http.request", body: EMPTY_BODY, more: false }
      }

      const chunk: unknown = next.value
      return {
        type: "http.request",
        body: Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)),
        more: true,
      }
    } catch (err) {
      HTTP_SERVER_LOGGER.debug("Request body ended early", err)
      finished = true
      return { type: "http.disconnect" }
    }
  }
}

/**
 * Create the {@link Send} for a response
 *
 * @param response The {@link ServerResponse} to write to
 * @returns A {@link Send} that rejects once the client is gone
 */
export function createSend(response: ServerResponse): Send {
  return async (message) => {
    if (response.destroyed) {
      throw new ClientDisconnectedError()
    }

    switch (message.type) {
      case "http.response.start":
        for (const [name, value] of message.headers) {
          response.appendHeader(name, value)
        }
        response.writeHead(message.status)
        return
      case "http.response.body":
        if (message.body.length > 0 && !response.write(message.body)) {
          await once(response, "drain")
        }

        if (!message.more) {
          response.end()
        }
        return
      default:
        throw new Error(`Unsupported message ${message.type} for http`)
    }
  }
}

/**
 * Default implementation of the {@link HttpServer} using the node `http` package
 */
export class NodeHttpServer
  extends EmitterFor<HttpServerEvents>
  implements HttpServer
{
  readonly id: string

  private readonly _config: HttpServerConfig
  private readonly _logger: Logger
  private readonly _server: Server
  private readonly _lifespan: LifespanDriver
  private readonly _shutdownHook = () => this.close()
  private _ready: boolean

  constructor(config: HttpServerConfig, logger: Logger = HTTP_SERVER_LOGGER) {
    super({ captureRejections: true })

    this.id = config.name
    this._config = config
    this._logger = logger
    this._ready = false
    this._lifespan = new LifespanDriver(config.app)
    this._server = createServer((request, response) => {
      this._handle(request, response).catch((err: unknown) => {
        this._logger.error(`[${request.method} -> ${request.url}]`, err)
        response.destroy()
      })
    })

    this._server.on("upgrade", (_request, socket) => {
      socket.end("HTTP/1.1 501 Not Implemented\r\nConnection: close\r\n\r\n")
    })

    this._server.on("error", (err) => {
      this._logger.error(`Error: ${err.message}`, err)
      if (this.listenerCount("error") > 0) {
        this.emit("error", err)
      }
    })

    this.emit("initializing")
  }

  get isReady(): boolean {
    return this._ready
  }

  setReady(enabled: boolean): void {
    this._ready = enabled
  }

  async listen(port: number): Promise<number> {
    if (this._server.listening) {
      throw new Error("Server is already listening")
    }

    await this._lifespan.startup()

    const listening = new DeferredPromise()
    this._server.once("listening", () => listening.resolve())
    this._server.once("error", (err) => listening.reject(err))
    this._server.listen(port, this._config.host)
    await listening

    const address = this._server.address()
    const bound = isAddressInfo(address) ? address.port : port

    registerShutdown(this._shutdownHook)
    this._ready = this._config.enabledOnStart ?? true

    this._logger.info(`${this.id} listening on ${bound}`)
    this.emit("started")
    this.emit("listening", bound)

    return bound
  }

  async close(): Promise<void> {
    if (!this._server.listening) {
      return
    }

    this.emit("stopping")
    this._ready = false
    removeShutdown(this._shutdownHook)

    const closed = new DeferredPromise()
    this._server.close((err) => (err ? closed.reject(err) : closed.resolve()))
    this._server.closeIdleConnections()

    try {
      await closed
      await this._lifespan.shutdown()
    } finally {
      this._logger.info(`${this.id} closed`)
      this.emit("finished")
    }
  }

  private async _handle(
    request: IncomingMessage,
    response: ServerResponse,
  ): Promise<void> {
    // Handle health and readiness
    if (request.method === "GET") {
      if (request.url === "/health") {
        response.writeHead(HttpStatusCode.NO_CONTENT).end()
        return
      }

      if (request.url === "/ready") {
        response
          .writeHead(
            this._ready
              ? HttpStatusCode.NO_CONTENT
              : HttpStatusCode.SERVICE_UNAVAILABLE,
          )
          .end()
        return
      }
    }

    HttpServerMetrics.RequestStartedCounter().add(1)
    const timer = Timer.startNew()

    response.once("close", () => {
      HttpServerMetrics.RequestFinishedCounter().add(1)
      HttpServerMetrics.ResponseStatus().add(1, {
        status: response.statusCode.toString(),
      })
      HttpServerMetrics.IncomingRequestDuration().record(
        timer.stop().seconds(),
      )
    })

    const scope = buildScope(request)
    if (scope === undefined) {
      response.writeHead(HttpStatusCode.NOT_IMPLEMENTED).end()
      return
    }

    await this._config.app(scope, createReceive(request), createSend(response))

    if (!response.headersSent) {
      this._logger.warn(`No response for ${scope.method} ${scope.path}`)
      response.writeHead(HttpStatusCode.INTERNAL_SERVER_ERROR).end()
    } else if (!response.writableEnded) {
      response.end()
    }
  }
}

function isAddressInfo(value: unknown): value is AddressInfo {
  return typeof value === "object" && value !== null && "port" in value
}
