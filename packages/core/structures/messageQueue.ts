/**
 * Package contains an unbounded queue whose readers wait for the next value
 */

import { DeferredPromise } from "../index.js"
import type { Optional } from "../type/utils.js"

/**
 * Raised to readers waiting on a {@link MessageQueue} that was closed
 */
export class QueueClosedError extends Error {
  constructor() {
    super("queue is closed")
    this.name = new.target.name
  }
}

/**
 * A first in, first out queue connecting producers to readers that await the
 * next value
 */
export class MessageQueue<T> implements AsyncIterable<T> {
  private readonly _values: T[] = []
  private readonly _readers: DeferredPromise<T>[] = []
  private _closed = false

  /** The number of values waiting to be read */
  get size(): number {
    return this._values.length
  }

  /** The number of readers waiting for a value */
  get waiting(): number {
    return this._readers.length
  }

  get closed(): boolean {
    return this._closed
  }

  /**
   * Add the value, handing it straight to the oldest waiting reader if any
   *
   * @param value The value to add
   * @returns False if the queue is closed
   */
  add(value: T): boolean {
    if (this._closed) {
      return false
    }

    const reader = this._readers.shift()
    if (reader !== undefined) {
      reader.resolve(value)
    } else {
      this._values.push(value)
    }

    return true
  }

  /**
   * Read the next value if one is available
   *
   * @returns An {@link Optional} value of T
   */
  tryRemove(): Optional<T> {
    return this._values.shift()
  }

  /**
   * Read the next value, waiting for one to be added
   *
   * @returns A promise for the next value
   *
   * @throws A {@link QueueClosedError} if the queue is closed and empty
   */
  remove(): Promise<T> {
    if (this._values.length > 0) {
      const [value] = this._values.splice(0, 1)
      return Promise.resolve(value)
    }

    if (this._closed) {
      return Promise.reject(new QueueClosedError())
    }

    const reader = new DeferredPromise<T>()
    this._readers.push(reader)
    return reader.then((value) => value)
  }

  /**
   * Close the queue, values already added can still be read and waiting
   * readers are rejected
   */
  close(): void {
    if (!this._closed) {
      this._closed = true
      for (const reader of this._readers.splice(0)) {
        reader.reject(new QueueClosedError())
      }
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (this._values.length > 0 || !this._closed) {
      try {
        yield await this.remove()
      } catch (err) {
        if (err instanceof QueueClosedError) {
          return
        }
        throw err
      }
    }
  }
}
