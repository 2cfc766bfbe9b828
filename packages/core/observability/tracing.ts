import {
  SpanStatusCode,
  trace as Tracing,
  context as TracingContext,
  type Attributes,
  type Span,
  type Tracer,
} from "@opentelemetry/api"
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks"
import { getErrorMessage } from "../errors.js"
import type { Optional } from "../type/utils.js"
import { FRAMEWORK_VERSION } from "../version.js"

export { trace as Tracing, context as TracingContext } from "@opentelemetry/api"

let FRAMEWORK_TRACER: Optional<Tracer>

/**
 * Try to register the {@link AsyncLocalStorageContextManager} to ensure spans
 * are tracked across async barriers
 *
 * @returns True if the async tracing was enabled
 */
export function enableAsyncTracing(): boolean {
  return TracingContext.setGlobalContextManager(
    new AsyncLocalStorageContextManager().enable(),
  )
}

/**
 * Return the framework {@link Tracer}
 */
export function getTracer(): Tracer {
  return (
    FRAMEWORK_TRACER ??
    (FRAMEWORK_TRACER = Tracing.getTracer("trellis-framework", FRAMEWORK_VERSION))
  )
}

export function getActiveSpan(): Optional<Span> {
  return Tracing.getActiveSpan()
}

/**
 * Run the operation inside a new active span that is ended when the operation
 * settles. Failures are recorded on the span and rethrown.
 *
 * @param name The name of the span
 * @param operation The operation to run
 * @param attributes Optional {@link Attributes} for the span
 * @returns The result of the operation
 */
export function withSpan<T>(
  name: string,
  operation: (span: Span) => Promise<T>,
  attributes?: Attributes,
): Promise<T> {
  return getTracer().startActiveSpan(
    name,
    { attributes },
    async (span: Span): Promise<T> => {
      try {
        return await operation(span)
      } catch (err) {
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: getErrorMessage(err),
        })
        throw err
      } finally {
        span.end()
      }
    },
  )
}
