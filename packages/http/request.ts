/**
 * Request view over a connection scope
 */

import type { Optional } from "@trellis/core/type/utils.js"
import { ClientDisconnectedError } from "./errors.js"
import {
  HttpRequestHeaders,
  type ConnectionScope,
  type HttpHeaders,
  type HttpMethod,
  type Receive,
} from "./index.js"
import type { PathParameters } from "./routing/parameters.js"
import { IndexedHeaders, parseCookies } from "./utils.js"

/**
 * Read the full request body from the connection
 *
 * @param receive The {@link Receive} for the connection
 * @returns The concatenated body
 *
 * @throws A {@link ClientDisconnectedError} if the client leaves first
 */
export async function readBody(receive: Receive): Promise<Buffer> {
  const chunks: Buffer[] = []

  for (;;) {
    const message = await receive()
    if (message.type === "http.disconnect") {
      throw new ClientDisconnectedError()
    }

    if (message.type === "http.request") {
      chunks.push(message.body)
      if (!message.more) {
        return Buffer.concat(chunks)
      }
    }
  }
}

/**
 * An incoming HTTP request (or WebSocket handshake) as seen by handlers
 */
export class HttpRequest {
  readonly scope: ConnectionScope
  readonly headers: HttpHeaders
  readonly query: URLSearchParams

  private readonly _receive: Receive
  private _body: Optional<Promise<Buffer>>
  private _cookies: Optional<Map<string, string>>

  constructor(scope: ConnectionScope, receive: Receive) {
    this.scope = scope
    this.headers = new IndexedHeaders(scope.headers)
    this.query = new URLSearchParams(scope.queryString)
    this._receive = receive
  }

  /** The request method, undefined for WebSocket handshakes */
  get method(): Optional<HttpMethod> {
    return this.scope.type === "http" ? this.scope.method : undefined
  }

  /** The full path including any mount prefix */
  get path(): string {
    return `${this.scope.rootPath}${this.scope.path}`
  }

  get pathParams(): PathParameters {
    return this.scope.pathParams
  }

  get state(): Record<string, unknown> {
    return this.scope.state
  }

  get cookies(): Map<string, string> {
    return (this._cookies ??= parseCookies(
      this.headers.get(HttpRequestHeaders.Cookie),
    ))
  }

  /**
   * Read the request body, the result is cached for later calls
   */
  body(): Promise<Buffer> {
    return (this._body ??= readBody(this._receive))
  }

  async text(): Promise<string> {
    return (await this.body()).toString("utf8")
  }

  async json(): Promise<unknown> {
    const text = await this.text()
    return text.length > 0 ? JSON.parse(text) : undefined
  }
}
