/**
 * WebSocket sessions over the connection contract
 */

import { WebSocketException } from "./errors.js"
import type {
  RawHeaders,
  Receive,
  Send,
  WebSocketReceiveMessage,
  WebSocketScope,
} from "./index.js"
import { HttpRequest } from "./request.js"

/** States a {@link WebSocketConnection} moves through */
export type WebSocketState = "connecting" | "connected" | "disconnected"

/**
 * Raised when the client closed the session while the handler was reading
 */
export class WebSocketDisconnectError extends Error {
  readonly code: number

  constructor(code: number) {
    super(`websocket disconnected with code ${code}`)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * A WebSocket session handed to a WebSocket route handler
 */
export class WebSocketConnection extends HttpRequest {
  declare readonly scope: WebSocketScope

  private readonly _receiveMessage: Receive
  private readonly _send: Send
  private _state: WebSocketState = "connecting"

  constructor(scope: WebSocketScope, receive: Receive, send: Send) {
    super(scope, receive)
    this._receiveMessage = receive
    this._send = send
  }

  /** Where the session is in its handshake and close sequence */
  get connectionState(): WebSocketState {
    return this._state
  }

  /**
   * Wait for the client handshake and accept the session
   *
   * @param subprotocol The subprotocol to agree on
   * @param headers Extra handshake response headers
   */
  async accept(subprotocol?: string, headers?: RawHeaders): Promise<void> {
    if (this._state !== "connecting") {
      throw new WebSocketException(`cannot accept a ${this._state} session`)
    }

    const message = await this._receiveMessage()
    if (message.type !== "websocket.connect") {
      throw new WebSocketException(
        `expected websocket.connect but received ${message.type}`,
      )
    }

    await this._send({ type: "websocket.accept", subprotocol, headers })
    this._state = "connected"
  }

  async receiveText(): Promise<string> {
    const message = await this._receiveData()
    if (message.text === undefined) {
      throw new WebSocketException("expected a text frame")
    }

    return message.text
  }

  async receiveBytes(): Promise<Buffer> {
    const message = await this._receiveData()
    if (message.bytes === undefined) {
      throw new WebSocketException("expected a binary frame")
    }

    return message.bytes
  }

  async receiveJson(): Promise<unknown> {
    const message = await this._receiveData()
    return JSON.parse(message.text ?? message.bytes?.toString("utf8") ?? "")
  }

  async sendText(text: string): Promise<void> {
    this._ensureConnected()
    await this._send({ type: "websocket.send", text })
  }

  async sendBytes(bytes: Buffer): Promise<void> {
    this._ensureConnected()
    await this._send({ type: "websocket.send", bytes })
  }

  async sendJson(value: unknown): Promise<void> {
    await this.sendText(JSON.stringify(value))
  }

  /**
   * Close the session, closing an already closed session does nothing
   *
   * @param code The close code (default is 1000)
   * @param reason An optional reason
   */
  async close(code = 1000, reason?: string): Promise<void> {
    if (this._state !== "disconnected") {
      this._state = "disconnected"
      await this._send({ type: "websocket.close", code, reason })
    }
  }

  private async _receiveData(): Promise<WebSocketReceiveMessage> {
    this._ensureConnected()

    const message = await this._receiveMessage()
    switch (message.type) {
      case "websocket.receive":
        return message
      case "websocket.disconnect":
        this._state = "disconnected"
        throw new WebSocketDisconnectError(message.code)
      default:
        throw new WebSocketException(`unexpected message ${message.type}`)
    }
  }

  private _ensureConnected(): void {
    if (this._state !== "connected") {
      throw new WebSocketException(`session is ${this._state}`)
    }
  }
}
