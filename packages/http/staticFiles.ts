/**
 * Expose the ability to host folders below a mount path
 */

import {
  DefaultLogger,
  type LogLevel,
  type Logger,
} from "@trellis/core/logging.js"
import type { Optional } from "@trellis/core/type/utils.js"
import { createReadStream, existsSync, promises, type Stats } from "fs"
import { extname, join, resolve, sep } from "path"
import {
  MethodNotAllowedException,
  NotFoundException,
  PermissionDeniedException,
} from "./errors.js"
import { RawRouteHandler, type RouteHandlerOptions } from "./handlers.js"
import {
  CommonHttpHeaders,
  HttpMethod,
  HttpResponseHeaders,
  HttpStatusCode,
  type ConnectionHandler,
} from "./index.js"
import MEDIA_TYPES from "./mimeTypes.json"
import { IndexedHeaders, writeResponse } from "./utils.js"

const STATIC_FILES_LOGGER: Logger = new DefaultLogger({
  name: "http.static",
})

/**
 * Update the static file log levels
 *
 * @param level The new {@link LogLevel}
 */
export function setStaticFilesLogLevel(level: LogLevel): void {
  STATIC_FILES_LOGGER.setLevel(level)
}

/**
 * Options for configuring a static file tree
 */
export interface StaticFilesConfig extends Omit<RouteHandlerOptions, "path"> {
  /** The mount path, parameters are not allowed */
  path: string
  /** Directories searched in order for each file */
  directories: string[]
  /** Serve index.html for directories and 404.html for missing files */
  htmlMode?: boolean
}

const DEFAULT_MEDIA_TYPE = "application/octet-stream"
const INDEX_FILE = "index.html"
const NOT_FOUND_FILE = "404.html"

const EXTENSION_MAP: Readonly<Record<string, string>> = MEDIA_TYPES

/**
 * Lookup the media type for a file
 *
 * @param filePath The file to inspect
 * @returns The content-type header value
 */
export function fileToMediaType(filePath: string): string {
  return (
    EXTENSION_MAP[extname(filePath).slice(1).toLowerCase()] ??
    DEFAULT_MEDIA_TYPE
  )
}

interface ResolvedFile {
  filePath: string
  stats: Stats
}

/**
 * Create the mounted handler that serves files from the directories
 *
 * @param config The {@link StaticFilesConfig}
 * @returns A new static {@link RawRouteHandler}
 *
 * @throws An error if one of the directories does not exist
 */
export function createStaticFilesHandler(
  config: StaticFilesConfig,
): RawRouteHandler {
  const { path, directories, htmlMode, ...options } = config

  for (const directory of directories) {
    if (!existsSync(directory)) {
      throw new Error(`${directory} does not exist`)
    }
  }

  const roots = directories.map((d) => resolve(d))
  const html = htmlMode ?? false

  const serve: ConnectionHandler = async (scope, _receive, send) => {
    if (scope.type !== "http") {
      throw new NotFoundException()
    }

    if (scope.method !== HttpMethod.GET && scope.method !== HttpMethod.HEAD) {
      throw new MethodNotAllowedException(undefined, {
        headers: {
          [HttpResponseHeaders.Allow]: `${HttpMethod.GET}, ${HttpMethod.HEAD}`,
        },
      })
    }

    let status: number = HttpStatusCode.OK
    let file = await findFile(roots, scope.path, html)

    if (file === undefined && html) {
      file = await findFile(roots, `/${NOT_FOUND_FILE}`, false)
      status = HttpStatusCode.NOT_FOUND
    }

    if (file === undefined) {
      throw new NotFoundException()
    }

    const headers = new IndexedHeaders([
      [CommonHttpHeaders.ContentType, fileToMediaType(file.filePath)],
      [CommonHttpHeaders.ContentLength, String(file.stats.size)],
      [HttpResponseHeaders.LastModified, file.stats.mtime.toUTCString()],
      [
        HttpResponseHeaders.ETag,
        `"${Math.floor(file.stats.mtimeMs).toString(16)}-${file.stats.size.toString(16)}"`,
      ],
    ])

    const head = scope.method === HttpMethod.HEAD
    await writeResponse(
      {
        status,
        headers,
        body: head ? undefined : createReadStream(file.filePath),
      },
      send,
      { omitBody: head },
    )
  }

  return new RawRouteHandler({ ...options, path, isStatic: true }, serve)
}

/**
 * Find the first directory holding the file
 *
 * @throws A {@link PermissionDeniedException} if the path escapes a directory
 */
async function findFile(
  roots: readonly string[],
  requestPath: string,
  htmlMode: boolean,
): Promise<Optional<ResolvedFile>> {
  for (const root of roots) {
    const filePath = resolve(join(root, requestPath))

    if (filePath !== root && !filePath.startsWith(`${root}${sep}`)) {
      STATIC_FILES_LOGGER.warn(
        `Attempt to traverse file system detected: ${requestPath}`,
      )
      throw new PermissionDeniedException()
    }

    let stats = await tryStat(filePath)
    if (stats?.isDirectory() && htmlMode) {
      const indexPath = join(filePath, INDEX_FILE)
      stats = await tryStat(indexPath)
      if (stats?.isFile()) {
        return { filePath: indexPath, stats }
      }
    } else if (stats?.isFile()) {
      return { filePath, stats }
    }
  }

  return
}

async function tryStat(filePath: string): Promise<Optional<Stats>> {
  try {
    return await promises.stat(filePath)
  } catch (err) {
    STATIC_FILES_LOGGER.debug(`Unable to stat ${filePath}`, err)
    return
  }
}
