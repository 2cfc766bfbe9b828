/**
 * Application settings read through a configuration manager
 */

import type { ConfigurationManager } from "@trellis/core/configuration.js"
import {
  parseLogLevel,
  setDefaultLogLevel,
  setGlobalLogLevel,
  type LogLevel,
} from "@trellis/core/logging.js"
import type { Optional } from "@trellis/core/type/utils.js"
import {
  setApplicationLogLevel,
  type ApplicationConfig,
} from "./application.js"
import { setDispatcherLogLevel } from "./dispatcher.js"
import { setExceptionsLogLevel } from "./exceptions.js"
import type { CompressionBackend } from "./middleware/compression.js"
import { setRoutingLogLevel } from "./routing/mapping.js"
import { setHttpServerLogLevel } from "./server.js"
import { setStaticFilesLogLevel } from "./staticFiles.js"

/** The configuration key holding the {@link ApplicationSettings} */
export const APPLICATION_SETTINGS_KEY = "trellis.application"

/**
 * Settings that can be changed without touching code
 */
export interface ApplicationSettings {
  debug?: boolean
  /** A level name (debug, info, warn, error, fatal) or value */
  logLevel?: string | number
  allowedHosts?: string[]
  compression?: {
    backend: CompressionBackend
    minimumSize?: number
    gzipCompressLevel?: number
    brotliQuality?: number
  }
  csrf?: {
    secret: string
    cookieName?: string
    headerName?: string
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isOptional(
  value: unknown,
  type: "boolean" | "number" | "string",
): boolean {
  return value === undefined || typeof value === type
}

/**
 * Check if the value has the {@link ApplicationSettings} shape
 *
 * @param value The value to inspect
 * @returns True if the value can be used as {@link ApplicationSettings}
 */
export function isApplicationSettings(
  value: unknown,
): value is ApplicationSettings {
  if (!isRecord(value)) {
    return false
  }

  const { debug, logLevel, allowedHosts, compression, csrf } = value

  if (!isOptional(debug, "boolean")) {
    return false
  }

  if (logLevel !== undefined && parseLogLevel(logLevel) === undefined) {
    return false
  }

  if (
    allowedHosts !== undefined &&
    !(
      Array.isArray(allowedHosts) &&
      allowedHosts.every((h) => typeof h === "string")
    )
  ) {
    return false
  }

  if (
    compression !== undefined &&
    !(
      isRecord(compression) &&
      (compression.backend === "gzip" || compression.backend === "brotli") &&
      isOptional(compression.minimumSize, "number") &&
      isOptional(compression.gzipCompressLevel, "number") &&
      isOptional(compression.brotliQuality, "number")
    )
  ) {
    return false
  }

  return (
    csrf === undefined ||
    (isRecord(csrf) &&
      typeof csrf.secret === "string" &&
      isOptional(csrf.cookieName, "string") &&
      isOptional(csrf.headerName, "string"))
  )
}

/**
 * Read the {@link ApplicationSettings} from the manager
 *
 * @param manager The {@link ConfigurationManager} to read from
 * @returns The settings if present and valid
 */
export function loadApplicationSettings(
  manager: ConfigurationManager,
): Optional<ApplicationSettings> {
  return manager.getConfiguration(
    APPLICATION_SETTINGS_KEY,
    isApplicationSettings,
  )
}

/**
 * Change the level of every framework logger
 *
 * @param level The new {@link LogLevel}
 */
export function setFrameworkLogLevel(level: LogLevel): void {
  setDefaultLogLevel(level)
  setGlobalLogLevel(level)
  setApplicationLogLevel(level)
  setDispatcherLogLevel(level)
  setExceptionsLogLevel(level)
  setRoutingLogLevel(level)
  setStaticFilesLogLevel(level)
  setHttpServerLogLevel(level)
}

/**
 * Merge the settings into an application configuration, values from the
 * settings win, and apply the log level
 *
 * @param config The {@link ApplicationConfig} declared in code
 * @param settings The {@link ApplicationSettings} to apply
 * @returns A new {@link ApplicationConfig}
 */
export function applySettings(
  config: ApplicationConfig,
  settings: ApplicationSettings,
): ApplicationConfig {
  const level = parseLogLevel(settings.logLevel)
  if (level !== undefined) {
    setFrameworkLogLevel(level)
  }

  return {
    ...config,
    debug: settings.debug ?? config.debug,
    allowedHosts:
      settings.allowedHosts !== undefined
        ? { ...config.allowedHosts, allowedHosts: settings.allowedHosts }
        : config.allowedHosts,
    compression:
      settings.compression !== undefined
        ? { ...config.compression, ...settings.compression }
        : config.compression,
    csrf:
      settings.csrf !== undefined
        ? { ...config.csrf, ...settings.csrf }
        : config.csrf,
  }
}
