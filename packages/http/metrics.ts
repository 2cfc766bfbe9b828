/**
 * Http Metrics
 */

import { ValueType, type Meter } from "@opentelemetry/api"
import { getFrameworkMeter } from "@trellis/core/observability/metrics.js"
import type { Optional } from "@trellis/core/type/utils.js"

/**
 * Resolve the instrument against the current framework meter, recreating it
 * once metrics are enabled
 */
function lazyInstrument<T>(create: (meter: Meter) => T): () => T {
  let meter: Optional<Meter>
  let instrument: Optional<T>

  return () => {
    const current = getFrameworkMeter()
    if (instrument === undefined || meter !== current) {
      meter = current
      instrument = create(current)
    }

    return instrument
  }
}

const DURATION_BUCKETS = [
  0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 0.75, 1,
]

/**
 * Metrics related to http request handling (server)
 */
export const HttpServerMetrics = {
  RequestStartedCounter: lazyInstrument((meter) =>
    meter.createCounter("http_incoming_request_received", {
      description: "The number of requests that have been received",
      valueType: ValueType.INT,
    }),
  ),
  RequestFinishedCounter: lazyInstrument((meter) =>
    meter.createCounter("http_incoming_request_finished", {
      description: "The number of requests that have been finished",
      valueType: ValueType.INT,
    }),
  ),
  /** Record the incoming request duration in seconds */
  IncomingRequestDuration: lazyInstrument((meter) =>
    meter.createHistogram("http_incoming_request_duration", {
      description: "The amount of time the incoming request took to complete",
      valueType: ValueType.DOUBLE,
      unit: "seconds",
      advice: { explicitBucketBoundaries: DURATION_BUCKETS },
    }),
  ),
  /** Record the status for responses */
  ResponseStatus: lazyInstrument((meter) =>
    meter.createCounter("http_response_status", {
      description:
        "The total number responses by status type the server has returned",
      valueType: ValueType.INT,
    }),
  ),
} as const

/**
 * Metrics related to routing statistics
 */
export const RoutingMetrics = {
  /** Lookups by outcome (matched, notFound, methodNotAllowed, invalidParameter) */
  RouteLookups: lazyInstrument((meter) =>
    meter.createCounter("route_lookups", {
      description: "The total number of route lookups by outcome",
      valueType: ValueType.INT,
    }),
  ),
  RouteErrors: lazyInstrument((meter) =>
    meter.createCounter("unhandled_route_errors", {
      description: "The total number of unhandled errors from a specific route",
      valueType: ValueType.INT,
    }),
  ),
  RouteRequestDuration: lazyInstrument((meter) =>
    meter.createHistogram("incoming_route_duration", {
      description: "The amount of time the route request took to complete",
      valueType: ValueType.DOUBLE,
      unit: "seconds",
      advice: { explicitBucketBoundaries: DURATION_BUCKETS },
    }),
  ),
} as const
