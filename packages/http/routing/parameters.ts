/**
 * Path templates and typed path parameters
 */

import type { Optional } from "@trellis/core/type/utils.js"
import { RoutingError } from "../errors.js"

/**
 * The declared type of a path parameter
 */
export type PathParameterType =
  | "str"
  | "int"
  | "float"
  | "uuid"
  | "date"
  | "datetime"
  | "path"

const PATH_PARAMETER_TYPES: readonly PathParameterType[] = [
  "str",
  "int",
  "float",
  "uuid",
  "date",
  "datetime",
  "path",
]

/**
 * A parameter declared in a path template as `{name:type}`
 */
export interface PathParameterDefinition {
  /** The parameter name */
  readonly name: string
  /** The {@link PathParameterType} used for coercion */
  readonly type: PathParameterType
  /** The position of the parameter among the template parameters */
  readonly index: number
}

/** A literal segment or a parameter */
export type PathComponent = string | PathParameterDefinition

/** The value of a coerced path parameter */
export type PathParameterValue = string | number | Date

/** Coerced path parameters by name */
export type PathParameters = Record<string, PathParameterValue>

/**
 * A validated path template
 */
export interface ParsedPathTemplate {
  /** The normalized template */
  readonly path: string
  /** The decomposed segments */
  readonly components: readonly PathComponent[]
  /** The parameters in declaration order */
  readonly parameters: readonly PathParameterDefinition[]
}

export function isPathParameterDefinition(
  component: PathComponent,
): component is PathParameterDefinition {
  return typeof component === "object"
}

function isPathParameterType(value: string): value is PathParameterType {
  return PATH_PARAMETER_TYPES.some((t) => t === value)
}

/**
 * Normalize a path to a leading "/" with no empty or trailing segments
 *
 * @param path The path to normalize
 * @returns The normalized path
 */
export function normalizePath(path: string): string {
  return `/${splitPath(path).join("/")}`
}

/**
 * Split a path into its non-empty segments
 *
 * @param path The path to split
 * @returns The segments in order
 */
export function splitPath(path: string): string[] {
  return path.split("/").filter((s) => s.length > 0)
}

/**
 * Join path fragments into one normalized path
 *
 * @param paths The fragments to join
 * @returns The normalized path
 */
export function joinPaths(...paths: string[]): string {
  return normalizePath(paths.join("/"))
}

const PARAMETER_PATTERN = /^\{([^{}:]*)(?::([^{}]*))?\}$/
const PARAMETER_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/

/**
 * Parse a path template into its components
 *
 * @param template The template to parse, e.g. `/users/{userId:int}/posts`
 * @returns The {@link ParsedPathTemplate}
 *
 * @throws A {@link RoutingError} when a parameter is malformed, repeated, of
 * an unknown type, or a `path` parameter is not the last segment
 */
export function parsePathTemplate(template: string): ParsedPathTemplate {
  const segments = splitPath(template)
  const components: PathComponent[] = []
  const parameters: PathParameterDefinition[] = []

  for (const segment of segments) {
    if (parameters.some((p) => p.type === "path")) {
      throw new RoutingError(
        `A path type parameter must be the last segment of ${template}`,
      )
    }

    if (!segment.includes("{") && !segment.includes("}")) {
      components.push(segment)
      continue
    }

    const match = PARAMETER_PATTERN.exec(segment)
    if (match === null) {
      throw new RoutingError(
        `Malformed path parameter segment "${segment}" in ${template}`,
      )
    }

    const [, name, type] = match
    if (!PARAMETER_NAME.test(name)) {
      throw new RoutingError(`Invalid path parameter name "${name}" in ${template}`)
    }

    if (type === undefined || !isPathParameterType(type)) {
      throw new RoutingError(
        `Path parameter "${name}" in ${template} must declare one of ${PATH_PARAMETER_TYPES.join(", ")}`,
      )
    }

    if (parameters.some((p) => p.name === name)) {
      throw new RoutingError(`Duplicate path parameter "${name}" in ${template}`)
    }

    const definition: PathParameterDefinition = {
      name,
      type,
      index: parameters.length,
    }

    parameters.push(definition)
    components.push(definition)
  }

  return {
    path: `/${segments.join("/")}`,
    components,
    parameters,
  }
}

const INT_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/
const UUID_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/
const DATETIME_PREFIX = /^\d{4}-\d{2}-\d{2}[T ]/
const UTC_OFFSET = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/

/**
 * Coerce the raw value for a parameter
 *
 * @param type The {@link PathParameterType} to coerce to
 * @param raw The raw path value
 * @returns The {@link PathParameterValue} or undefined if the value does not
 * fit the type
 */
export function coercePathParameter(
  type: PathParameterType,
  raw: string,
): Optional<PathParameterValue> {
  if (raw.length === 0) {
    return
  }

  switch (type) {
    case "str":
    case "path":
      return raw
    case "int": {
      const value = Number(raw)
      return INT_PATTERN.test(raw) && Number.isSafeInteger(value)
        ? value
        : undefined
    }
    case "float": {
      const value = Number(raw)
      return FLOAT_PATTERN.test(raw) && Number.isFinite(value)
        ? value
        : undefined
    }
    case "uuid":
      return UUID_PATTERN.test(raw) ? raw.toLowerCase() : undefined
    case "date":
      return parseDate(raw)
    case "datetime": {
      if (!DATETIME_PREFIX.test(raw) || parseDate(raw.slice(0, 10)) === undefined) {
        return
      }

      // values without an offset are read as UTC
      const value = Date.parse(UTC_OFFSET.test(raw) ? raw : `${raw}Z`)
      return Number.isNaN(value) ? undefined : new Date(value)
    }
  }
}

function parseDate(raw: string): Optional<Date> {
  const match = DATE_PATTERN.exec(raw)
  if (match === null) {
    return
  }

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])
  const value = new Date(Date.UTC(year, month - 1, day))

  // Reject values Date.UTC rolls over (2023-02-30)
  return value.getUTCFullYear() === year &&
    value.getUTCMonth() === month - 1 &&
    value.getUTCDate() === day
    ? value
    : undefined
}
