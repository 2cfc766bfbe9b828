/**
 * Process lifecycle hooks
 */

import type { MaybeAwaitable } from "./index.js"
import { error, fatal } from "./logging.js"

/**
 * Set of supported events on an object with a defined lifecycle
 */
export interface LifecycleEvents {
  /**
   * Fired when the lifecycle is initializing
   */
  initializing: () => void

  /**
   * Fired when the lifecycle is started
   */
  started: () => void

  /**
   * Fired when the lifecycle is stopping
   */
  stopping: () => void

  /**
   * Fired when the lifecycle is finished
   */
  finished: () => void
}

export type ShutdownHook = () => MaybeAwaitable<unknown>

/** Set of shutdown hooks to fire on exit */
const shutdownHooks: ShutdownHook[] = []

let signalsInstalled = false

/**
 * Register the callback to be invoked on shutdown, the process signal handlers
 * are installed with the first registration
 *
 * @param callback The callback to invoke on a shutdown
 */
export function registerShutdown(callback: ShutdownHook): void {
  shutdownHooks.push(callback)

  if (!signalsInstalled) {
    signalsInstalled = true

    // Local process kill (ctrl+c)
    process.once("SIGINT", () => {
      fatal("Received SIGINT, shutting down system...")
      void shutdown()
    })

    // Container process kill (docker, etc.)
    process.once("SIGTERM", () => {
      fatal("Received SIGTERM, shutting down system...")
      void shutdown()
    })
  }
}

/**
 * Removes the callback if present from the global shutdowns
 *
 * @param callback The callback to remove
 * @returns True if the callback was removed
 */
export function removeShutdown(callback: ShutdownHook): boolean {
  const idx = shutdownHooks.indexOf(callback)
  if (idx >= 0) {
    shutdownHooks.splice(idx, 1)
    return true
  }

  return false
}

/**
 * Runs every registered shutdown hook, failures are logged and never rethrown
 *
 * @returns The number of hooks that failed
 */
export async function shutdown(): Promise<number> {
  fatal("Global shutdown started")

  const results = await Promise.allSettled(
    shutdownHooks.splice(0).map(async (hook) => await hook()),
  )

  let failures = 0
  for (const result of results) {
    if (result.status === "rejected") {
      failures++
      error("error during shutdown", result.reason)
    }
  }

  fatal("shutdown finished")
  return failures
}
