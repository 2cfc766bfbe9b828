/**
 * Response compression
 */

import type { Optional } from "@trellis/core/type/utils.js"
import {
  brotliCompressSync,
  constants,
  createBrotliCompress,
  createGzip,
  gzipSync,
  type BrotliCompress,
  type Gzip,
} from "zlib"
import {
  CommonHttpHeaders,
  HttpRequestHeaders,
  HttpResponseHeaders,
  type ConnectionHandler,
  type HttpResponseStartMessage,
  type Send,
  type SendMessage,
} from "../index.js"
import { IndexedHeaders, getHeader } from "../utils.js"

/** Supported compression backends */
export type CompressionBackend = "gzip" | "brotli"

/** The content-encoding tokens for a backend */
type Encoding = "gzip" | "br"

/**
 * Configuration for {@link compressionMiddleware}
 */
export interface CompressionConfig {
  /** The preferred backend */
  backend: CompressionBackend
  /** Bodies smaller than this are sent as is (default is 500 bytes) */
  minimumSize?: number
  /** The gzip level (default is 9) */
  gzipCompressLevel?: number
  /** The brotli quality (default is 5) */
  brotliQuality?: number
  /** Fall back to gzip when the client does not accept brotli (default is true) */
  brotliGzipFallback?: boolean
}

const DEFAULT_MINIMUM_SIZE = 500

/**
 * Parse the accept-encoding header into the accepted tokens
 *
 * @param header The header value
 * @returns The set of accepted encodings
 */
export function parseAcceptEncoding(header: Optional<string>): Set<string> {
  const accepted = new Set<string>()

  for (const part of (header ?? "").split(",")) {
    const [token, ...params] = part.trim().toLowerCase().split(";")
    const rejected = params.some((p) => /^\s*q=0(\.0*)?\s*$/.test(p))
    if (token && !rejected) {
      accepted.add(token)
    }
  }

  return accepted
}

/**
 * Pick the encoding to apply for the request
 *
 * @param config The {@link CompressionConfig}
 * @param accepted The accepted encodings
 * @returns The encoding to use if any
 */
export function selectEncoding(
  config: CompressionConfig,
  accepted: Set<string>,
): Optional<Encoding> {
  const wildcard = accepted.has("*")

  if (config.backend === "brotli") {
    if (accepted.has("br") || wildcard) {
      return "br"
    }

    if (!(config.brotliGzipFallback ?? true)) {
      return
    }
  }

  return accepted.has("gzip") || wildcard ? "gzip" : undefined
}

/**
 * Compress response bodies the client accepts an encoding for
 *
 * @param app The next {@link ConnectionHandler}
 * @param config The {@link CompressionConfig}
 * @returns A new {@link ConnectionHandler}
 */
export function compressionMiddleware(
  app: ConnectionHandler,
  config: CompressionConfig,
): ConnectionHandler {
  const minimumSize = config.minimumSize ?? DEFAULT_MINIMUM_SIZE

  return async (scope, receive, send) => {
    if (scope.type !== "http") {
      return await app(scope, receive, send)
    }

    const encoding = selectEncoding(
      config,
      parseAcceptEncoding(
        getHeader(scope.headers, HttpRequestHeaders.AcceptEncoding),
      ),
    )

    if (encoding === undefined) {
      return await app(scope, receive, send)
    }

    const responder = new CompressionResponder(
      send,
      encoding,
      minimumSize,
      config,
    )

    try {
      await app(scope, receive, (message) => responder.send(message))
    } finally {
      responder.release()
    }
  }
}

/**
 * Tracks a single response while it is compressed
 */
class CompressionResponder {
  private readonly _send: Send
  private readonly _encoding: Encoding
  private readonly _minimumSize: number
  private readonly _config: CompressionConfig

  private _start: Optional<HttpResponseStartMessage>
  private _passthrough = false
  private _stream: Optional<Gzip | BrotliCompress>
  private readonly _output: Buffer[] = []

  constructor(
    send: Send,
    encoding: Encoding,
    minimumSize: number,
    config: CompressionConfig,
  ) {
    this._send = send
    this._encoding = encoding
    this._minimumSize = minimumSize
    this._config = config
  }

  async send(message: SendMessage): Promise<void> {
    if (message.type === "http.response.start") {
      this._start = message
      this._passthrough = getHeader(
        message.headers,
        CommonHttpHeaders.ContentEncoding,
      ) !== undefined
      return
    }

    if (message.type !== "http.response.body") {
      return await this._send(message)
    }

    const start = this._start
    if (start !== undefined) {
      this._start = undefined

      if (this._passthrough) {
        await this._send(start)
      } else if (!message.more) {
        // The whole body is available
        if (message.body.length < this._minimumSize) {
          await this._send(start)
        } else {
          const compressed = this._compressSync(message.body)
          await this._send(this._withEncoding(start, compressed.length))
          return await this._send({
            type: "http.response.body",
            body: compressed,
            more: false,
          })
        }
      } else {
        this._stream = this._createStream()
        this._stream.on("data", (chunk: Buffer) => this._output.push(chunk))
        await this._send(this._withEncoding(start))
      }
    }

    const stream = this._stream
    if (stream === undefined) {
      return await this._send(message)
    }

    if (message.body.length > 0) {
      stream.write(message.body)
    }

    if (message.more) {
      await new Promise<void>((resolve) => stream.flush(() => resolve()))
    } else {
      await new Promise<void>((resolve, reject) => {
        stream.once("error", reject)
        stream.once("end", resolve)
        stream.end()
      })
      this._stream = undefined
    }

    await this._send({
      type: "http.response.body",
      body: Buffer.concat(this._output.splice(0)),
      more: message.more,
    })
  }

  /**
   * Destroy the compressor if the response did not complete
   */
  release(): void {
    if (this._stream !== undefined && !this._stream.destroyed) {
      this._stream.destroy()
    }
    this._stream = undefined
  }

  private _compressSync(body: Buffer): Buffer {
    return this._encoding === "br"
      ? brotliCompressSync(body, {
          params: {
            [constants.BROTLI_PARAM_QUALITY]: this._config.brotliQuality ?? 5,
            [constants.BROTLI_PARAM_SIZE_HINT]: body.length,
          },
        })
      : gzipSync(body, { level: this._config.gzipCompressLevel ?? 9 })
  }

  private _createStream(): Gzip | BrotliCompress {
    return this._encoding === "br"
      ? createBrotliCompress({
          params: {
            [constants.BROTLI_PARAM_QUALITY]: this._config.brotliQuality ?? 5,
          },
        })
      : createGzip({ level: this._config.gzipCompressLevel ?? 9 })
  }

  private _withEncoding(
    start: HttpResponseStartMessage,
    length?: number,
  ): HttpResponseStartMessage {
    const headers = new IndexedHeaders([...start.headers])
    headers.set(CommonHttpHeaders.ContentEncoding, this._encoding)
    headers.append(HttpResponseHeaders.Vary, "accept-encoding")

    if (length === undefined) {
      headers.delete(CommonHttpHeaders.ContentLength)
    } else {
      headers.set(CommonHttpHeaders.ContentLength, String(length))
    }

    return { ...start, headers: headers.raw }
  }
}
