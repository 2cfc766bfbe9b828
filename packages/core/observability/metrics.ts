/**
 * Helps to bootstrap the metrics for this framework
 */

import opentelemetry, { createNoopMeter, type Meter } from "@opentelemetry/api"
import { FRAMEWORK_VERSION } from "../version.js"

let _metricsEnabled = false
let _meter: Meter = createNoopMeter()

/**
 * Get the framework {@link Meter}, a no-op until {@link enableFrameworkMetrics}
 * is invoked.
 *
 * Instruments created before that call stay no-ops, so modules should resolve
 * their instruments lazily.
 */
export function getFrameworkMeter(): Meter {
  return _meter
}

/**
 * Check if {@link enableFrameworkMetrics} has been called
 */
export function frameworkMetricsEnabled(): boolean {
  return _metricsEnabled
}

/**
 * Enable the core framework metrics using the global meter provider
 */
export function enableFrameworkMetrics(): void {
  if (!_metricsEnabled) {
    _meter = opentelemetry.metrics
      .getMeterProvider()
      .getMeter("trellis-framework-metrics", FRAMEWORK_VERSION)
  }
  _metricsEnabled = true
}
