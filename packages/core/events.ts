import { EventEmitter } from "events"
import type { AnyArgs } from "./type/utils.js"

/**
 * Helper for interfaces that expose a typed {@link EventEmitter}
 */
export type Emitter<E> = EventEmitter<EventMap<E>>

/**
 * Typed {@link EventEmitter} built from an interface of listener signatures
 */
export class EmitterFor<E> extends EventEmitter<EventMap<E>> {
  constructor(options?: EventEmitterOptions) {
    super(options)
  }
}

/**
 * Maps listener signatures into the argument tuples {@link EventEmitter} expects
 */
type EventMap<E> = {
  [Key in EventKeys<E>]: EventArgs<E[Key]>
}

interface EventEmitterOptions {
  /** Enables automatic capturing of promise rejection */
  captureRejections?: boolean
}

type EventKeys<E> = {
  [Key in keyof E]: E[Key] extends (...args: AnyArgs) => void ? Key : never
}[keyof E]

type EventArgs<E> = E extends (...args: AnyArgs) => void ? Parameters<E> : never
