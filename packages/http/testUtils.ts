/**
 * Set of classes that are used for testing only
 */

import {
  MessageQueue,
  QueueClosedError,
} from "@trellis/core/structures/messageQueue.js"
import type { Optional } from "@trellis/core/type/utils.js"
import {
  HttpMethod,
  HttpRequestHeaders,
  HttpResponseHeaders,
  type ConnectionHandler,
  type HttpScope,
  type RawHeaders,
  type ReceiveMessage,
  type SendMessage,
  type WebSocketScope,
} from "./index.js"
import { LifespanDriver } from "./lifespan.js"
import type { MiddlewareFactory } from "./middleware/types.js"
import { IndexedHeaders, safeDecode } from "./utils.js"
import { WebSocketDisconnectError } from "./websocket.js"

/**
 * A response collected by the {@link TestClient}
 */
export interface TestResponse {
  status: number
  headers: IndexedHeaders
  body: Buffer
  /** The body chunks as they were sent */
  chunks: Buffer[]
  text(): string
  json(): unknown
}

/**
 * Options for a {@link TestClient} request
 */
export interface TestRequestOptions {
  headers?: Record<string, string>
  body?: string | Buffer
}

/**
 * Options for a {@link TestClient}
 */
export interface TestClientOptions {
  /** The host header to send (default is testserver.local) */
  host?: string
  /** Send requests as https (default is false) */
  secure?: boolean
}

/**
 * Drives a {@link ConnectionHandler} in process, keeping cookies between
 * requests
 */
export class TestClient {
  readonly cookies = new Map<string, string>()

  private readonly _app: ConnectionHandler
  private readonly _host: string
  private readonly _secure: boolean
  private readonly _lifespan: LifespanDriver

  constructor(app: ConnectionHandler, options?: TestClientOptions) {
    this._app = app
    this._host = options?.host ?? "testserver.local"
    this._secure = options?.secure ?? false
    this._lifespan = new LifespanDriver(app)
  }

  /** Run the lifespan startup */
  startup(): Promise<void> {
    return this._lifespan.startup()
  }

  /** Run the lifespan shutdown */
  shutdown(): Promise<void> {
    return this._lifespan.shutdown()
  }

  get(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request(HttpMethod.GET, path, options)
  }

  head(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request(HttpMethod.HEAD, path, options)
  }

  post(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request(HttpMethod.POST, path, options)
  }

  put(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request(HttpMethod.PUT, path, options)
  }

  patch(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request(HttpMethod.PATCH, path, options)
  }

  delete(path: string, options?: TestRequestOptions): Promise<TestResponse> {
    return this.request(HttpMethod.DELETE, path, options)
  }

  /**
   * Send a request through the handler and collect the response
   *
   * @param method The {@link HttpMethod}
   * @param target The path with an optional query string
   * @param options The {@link TestRequestOptions}
   * @returns The collected {@link TestResponse}
   *
   * @throws An error if the handler finishes without a complete response
   */
  async request(
    method: HttpMethod,
    target: string,
    options?: TestRequestOptions,
  ): Promise<TestResponse> {
    const scope: HttpScope = {
      ...this._scopeBase(target, options),
      type: "http",
      method,
      scheme: this._secure ? "https" : "http",
      httpVersion: "1.1",
    }

    const body =
      typeof options?.body === "string"
        ? Buffer.from(options.body, "utf8")
        : (options?.body ?? Buffer.alloc(0))

    let delivered = false
    let status: Optional<number>
    let headers: RawHeaders = []
    const chunks: Buffer[] = []
    let complete = false

    await this._app(
      scope,
      async (): Promise<ReceiveMessage> => {
        if (delivered) {
          return { type: "http.disconnect" }
        }
        delivered = true
        return { type: "http.request", body, more: false }
      },
      async (message) => {
        switch (message.type) {
          case "http.response.start":
            if (status !== undefined) {
              throw new Error("response already started")
            }
            status = message.status
            headers = [...message.headers]
            break
          case "http.response.body":
            if (status === undefined || complete) {
              throw new Error("response body sent out of order")
            }
            chunks.push(message.body)
            complete = !message.more
            break
          default:
            throw new Error(`unexpected message ${message.type}`)
        }
      },
    )

    if (status === undefined || !complete) {
      throw new Error(`no complete response for ${method} ${target}`)
    }

    const responseHeaders = new IndexedHeaders(headers)
    this._storeCookies(responseHeaders)

    const payload = Buffer.concat(chunks)
    return {
      status,
      headers: responseHeaders,
      body: payload,
      chunks,
      text: () => payload.toString("utf8"),
      json: (): unknown => JSON.parse(payload.toString("utf8")),
    }
  }

  /**
   * Open a WebSocket session, resolving once the handler accepts it
   *
   * @param target The path with an optional query string
   * @param options Extra headers and subprotocols
   * @returns The open {@link TestWebSocketSession}
   *
   * @throws A {@link WebSocketDisconnectError} if the handler closes the session
   * instead of accepting it
   */
  async websocketConnect(
    target: string,
    options?: { headers?: Record<string, string>; subprotocols?: string[] },
  ): Promise<TestWebSocketSession> {
    const scope: WebSocketScope = {
      ...this._scopeBase(target, options),
      type: "websocket",
      scheme: this._secure ? "wss" : "ws",
      subprotocols: options?.subprotocols ?? [],
    }

    const session = new TestWebSocketSession(this._app, scope)
    await session.waitForAccept()
    return session
  }

  private _scopeBase(
    target: string,
    options?: { headers?: Record<string, string> },
  ): Omit<HttpScope, "type" | "method" | "scheme" | "httpVersion"> {
    const url = new URL(target, "http://localhost")

    const headers: RawHeaders = [[HttpRequestHeaders.Host, this._host]]
    if (this.cookies.size > 0) {
      headers.push([
        HttpRequestHeaders.Cookie,
        [...this.cookies].map(([k, v]) => `${k}=${v}`).join("; "),
      ])
    }

    for (const [name, value] of Object.entries(options?.headers ?? {})) {
      headers.push([name.toLowerCase(), value])
    }

    return {
      path: safeDecode(url.pathname),
      rootPath: "",
      rawPath: url.pathname,
      queryString: url.search.slice(1),
      headers,
      pathParams: {},
      state: {},
      client: { host: "127.0.0.1", port: 50000 },
    }
  }

  private _storeCookies(headers: IndexedHeaders): void {
    for (const cookie of headers.getAll(HttpResponseHeaders.SetCookie)) {
      const [pair, ...attributes] = cookie.split(";")
      const idx = pair.indexOf("=")
      if (idx > 0) {
        const name = pair.slice(0, idx).trim()
        const expired = attributes.some((a) =>
          /^\s*max-age=0\s*$/i.test(a),
        )

        if (expired) {
          this.cookies.delete(name)
        } else {
          this.cookies.set(name, pair.slice(idx + 1).trim())
        }
      }
    }
  }
}

/**
 * The client side of a WebSocket session driven in process
 */
export class TestWebSocketSession {
  private readonly _toApp = new MessageQueue<ReceiveMessage>()
  private readonly _fromApp = new MessageQueue<SendMessage>()
  private readonly _task: Promise<void>
  private _error: unknown

  /** The subprotocol agreed on when accepted */
  subprotocol: Optional<string>
  /** The close code once the handler closed the session */
  closeCode: Optional<number>
  closeReason: Optional<string>

  constructor(app: ConnectionHandler, scope: WebSocketScope) {
    this._toApp.add({ type: "websocket.connect" })
    this._task = app(
      scope,
      () => this._toApp.remove(),
      async (message) => {
        this._fromApp.add(message)
      },
    ).then(
      () => this._fromApp.close(),
      (err: unknown) => {
        this._error = err
        this._fromApp.close()
      },
    )
  }

  /**
   * Wait for the handler to accept the session
   */
  async waitForAccept(): Promise<void> {
    const message = await this._next()
    if (message.type !== "websocket.accept") {
      throw new Error(`expected websocket.accept but received ${message.type}`)
    }

    this.subprotocol = message.subprotocol
  }

  sendText(text: string): void {
    this._toApp.add({ type: "websocket.receive", text })
  }

  sendBytes(bytes: Buffer): void {
    this._toApp.add({ type: "websocket.receive", bytes })
  }

  sendJson(value: unknown): void {
    this.sendText(JSON.stringify(value))
  }

  async receiveText(): Promise<string> {
    const message = await this._next()
    if (message.type !== "websocket.send" || message.text === undefined) {
      throw new Error(`expected a text frame but received ${message.type}`)
    }

    return message.text
  }

  async receiveBytes(): Promise<Buffer> {
    const message = await this._next()
    if (message.type !== "websocket.send" || message.bytes === undefined) {
      throw new Error(`expected a binary frame but received ${message.type}`)
    }

    return message.bytes
  }

  async receiveJson(): Promise<unknown> {
    return JSON.parse(await this.receiveText())
  }

  /**
   * Disconnect from the client side and wait for the handler to finish
   *
   * @param code The close code (default is 1000)
   */
  async close(code = 1000): Promise<void> {
    this._toApp.add({ type: "websocket.disconnect", code })
    await this._task
    this._toApp.close()
  }

  /**
   * Wait for the handler to finish on its own
   */
  async finished(): Promise<void> {
    await this._task
    this._toApp.close()
  }

  private async _next(): Promise<SendMessage> {
    let message: SendMessage
    try {
      message = await this._fromApp.remove()
    } catch (err) {
      if (err instanceof QueueClosedError && this._error !== undefined) {
        throw this._error
      }
      throw err
    }

    if (message.type === "websocket.close") {
      this.closeCode = message.code
      this.closeReason = message.reason
      throw new WebSocketDisconnectError(message.code)
    }

    return message
  }
}

/**
 * Build a middleware that records when the connection passes through it
 *
 * @param name The name recorded with each event
 * @param events The list to record into, `${name}:in` on the way in and
 * `${name}:out` on the way out
 * @param responseHeaders Optional list receiving the response header names
 * the middleware saw on `http.response.start`
 * @returns A {@link MiddlewareFactory}
 */
export function createRecordingMiddleware(
  name: string,
  events: string[],
  responseHeaders?: string[],
): MiddlewareFactory {
  return (app) => async (scope, receive, send) => {
    events.push(`${name}:in`)
    try {
      await app(scope, receive, async (message) => {
        if (message.type === "http.response.start" && responseHeaders) {
          responseHeaders.push(...message.headers.map(([h]) => h))
        }
        await send(message)
      })
    } finally {
      events.push(`${name}:out`)
    }
  }
}
