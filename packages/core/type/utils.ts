/**
 * Type manipulations used throughout the framework
 */

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type AnyArgs = any[]

/**
 * Describes any class (including abstract ones) whose instances are {@link T}
 */
export type ClassOf<T> = abstract new (...args: AnyArgs) => T

/**
 * A value of type {@link T} or undefined
 */
export type Optional<T = unknown> = T | undefined
