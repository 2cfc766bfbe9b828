/** The version reported to telemetry by the framework */
export const FRAMEWORK_VERSION = "0.1.0"
