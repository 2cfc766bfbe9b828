/**
 * Drives the lifespan exchange of a connection handler from the host side
 */

import { DefaultLogger, type Logger } from "@trellis/core/logging.js"
import {
  MessageQueue,
  QueueClosedError,
} from "@trellis/core/structures/messageQueue.js"
import type { Optional } from "@trellis/core/type/utils.js"
import type {
  ConnectionHandler,
  ReceiveMessage,
  SendMessage,
} from "./index.js"

const LIFESPAN_LOGGER: Logger = new DefaultLogger({
  name: "http.lifespan",
})

/**
 * Raised when the application answers a lifespan phase with a failure
 */
export class LifespanError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

/**
 * Runs the startup and shutdown phases against a single long lived lifespan
 * invocation of the handler
 */
export class LifespanDriver {
  /** The state shared with the lifespan scope */
  readonly state: Record<string, unknown> = {}

  private readonly _app: ConnectionHandler
  private readonly _inbox = new MessageQueue<ReceiveMessage>()
  private readonly _outbox = new MessageQueue<SendMessage>()
  private _task: Optional<Promise<void>>

  constructor(app: ConnectionHandler) {
    this._app = app
  }

  get started(): boolean {
    return this._task !== undefined
  }

  /**
   * Send the startup message and wait for the reply, handlers that do not
   * take part in the lifespan exchange are treated as started
   *
   * @throws A {@link LifespanError} if the application reports a failure
   */
  async startup(): Promise<void> {
    if (this._task !== undefined) {
      throw new LifespanError("lifespan already started")
    }

    this._task = this._app(
      { type: "lifespan", state: this.state },
      () => this._inbox.remove(),
      async (message) => {
        this._outbox.add(message)
      },
    ).then(
      () => this._outbox.close(),
      (err: unknown) => {
        LIFESPAN_LOGGER.error("Lifespan handler failed", err)
        this._outbox.close()
      },
    )

    this._inbox.add({ type: "lifespan.startup" })
    await this._awaitReply("lifespan.startup.complete")
  }

  /**
   * Send the shutdown message and wait for the handler to finish
   *
   * @throws A {@link LifespanError} if the application reports a failure
   */
  async shutdown(): Promise<void> {
    const task = this._task
    if (task === undefined) {
      return
    }

    this._inbox.add({ type: "lifespan.shutdown" })
    try {
      await this._awaitReply("lifespan.shutdown.complete")
    } finally {
      this._inbox.close()
      await task
    }
  }

  private async _awaitReply(
    expected: "lifespan.startup.complete" | "lifespan.shutdown.complete",
  ): Promise<void> {
    let reply: SendMessage
    try {
      reply = await this._outbox.remove()
    } catch (err) {
      if (err instanceof QueueClosedError) {
        LIFESPAN_LOGGER.debug(`No lifespan reply, expected ${expected}`)
        return
      }
      throw err
    }

    if (
      reply.type === "lifespan.startup.failed" ||
      reply.type === "lifespan.shutdown.failed"
    ) {
      throw new LifespanError(reply.message)
    }

    if (reply.type !== expected) {
      throw new LifespanError(
        `Expected ${expected} but received ${reply.type}`,
      )
    }
  }
}
