import { getDebugInfo } from "./index.js"
import type { Optional } from "./type/utils.js"

/**
 * Try to extract the message field of the error
 *
 * @param error The error object to extract from
 * @returns The error message if it exists or undefined
 */
export function getErrorMessage(error: unknown): Optional<string> {
  if (
    typeof error === "object" &&
    error !== null &&
    "message" in error &&
    typeof error.message === "string"
  ) {
    return error.message
  }

  return
}

/**
 * Normalize anything that was thrown into an {@link Error}
 *
 * @param err The value that was thrown
 * @returns The original value if it was an {@link Error}, otherwise a new
 * {@link Error} carrying it as the cause
 */
export function asError(err: unknown): Error {
  if (err instanceof Error) {
    return err
  }

  return new Error(
    getErrorMessage(err) ??
      (typeof err === "string" ? err : getDebugInfo(err, 2)),
    { cause: err },
  )
}
