/**
 * Middleware declarations
 */

import type { AnyArgs } from "@trellis/core/type/utils.js"
import type { ConnectionHandler } from "../index.js"

/**
 * Wraps the next {@link ConnectionHandler} in the chain, any extra arguments
 * come from a {@link ConfiguredMiddleware} pair
 */
export type MiddlewareFactory = (
  app: ConnectionHandler,
  ...options: AnyArgs
) => ConnectionHandler

/**
 * A factory with the options it is applied with as `factory(app, options)`
 */
export type ConfiguredMiddleware = readonly [MiddlewareFactory, unknown]

/**
 * Middleware declared on a handler, router or application
 */
export type Middleware = MiddlewareFactory | ConfiguredMiddleware

/**
 * A single step of a composed chain
 */
export type ConnectionLayer = (next: ConnectionHandler) => ConnectionHandler

/**
 * Pair a factory with its options, keeping the option type checked
 *
 * @param factory The factory to apply
 * @param options The options passed as the second argument
 * @returns A {@link ConfiguredMiddleware}
 */
export function configureMiddleware<O>(
  factory: (app: ConnectionHandler, options: O) => ConnectionHandler,
  options: O,
): ConfiguredMiddleware {
  return [factory, options]
}

/**
 * Turn either middleware form into a {@link ConnectionLayer}
 *
 * @param middleware The {@link Middleware} to convert
 * @returns The {@link ConnectionLayer} that applies it
 */
export function asLayer(middleware: Middleware): ConnectionLayer {
  if (typeof middleware === "function") {
    return (next) => middleware(next)
  }

  const [factory, options] = middleware
  return (next) => factory(next, options)
}

/**
 * Fold the layers right to left around the terminal handler so the first
 * layer ends up outermost
 *
 * @param layers The {@link ConnectionLayer}s, outermost first
 * @param terminal The innermost {@link ConnectionHandler}
 * @returns The composed {@link ConnectionHandler}
 */
export function composeLayers(
  layers: readonly ConnectionLayer[],
  terminal: ConnectionHandler,
): ConnectionHandler {
  return layers.reduceRight<ConnectionHandler>(
    (app, layer) => layer(app),
    terminal,
  )
}
