/**
 * Package for handling configuration in an application
 */

import fs from "fs"
import path from "path"
import { EmitterFor, type Emitter } from "./events.js"
import {
  DefaultLogger,
  type LogLevel,
  type LogWriter,
  type Logger,
} from "./logging.js"
import type { Optional } from "./type/utils.js"

export interface ConfigurationEvents {
  /**
   * Event fired when a configuration key is changed
   *
   * @param key The key that changed
   */
  changed(key: string): void

  /**
   * Event fired when a configuration key is removed
   *
   * @param key The key that was removed
   */
  removed(key: string): void

  /**
   * Event fired when a configuration key is added
   *
   * @param key The key that was added
   */
  added(key: string): void
}

/**
 * Guard used to validate a configuration value before handing it out
 */
export type ConfigurationGuard<T> = (value: unknown) => value is T

/**
 * Manages configuration values
 */
export interface ConfigurationManager extends Emitter<ConfigurationEvents> {
  /**
   * Iterate over the known keys
   */
  getKeys(): IterableIterator<string>

  /**
   * Gets the raw configuration value associated with the given key
   *
   * @param configKey The key for the configuration to load
   */
  getValue(configKey: string): unknown

  /**
   * Gets the configuration value associated with the given key if it passes
   * the guard
   *
   * @param configKey The key for the configuration to load
   * @param guard The {@link ConfigurationGuard} the value must satisfy
   * @param defaultValue The optional value to return if the key is missing or invalid
   */
  getConfiguration<T>(
    configKey: string,
    guard: ConfigurationGuard<T>,
    defaultValue?: T,
  ): Optional<T>

  /**
   * Release any resources held by the manager
   */
  close(): void
}

/**
 * Required shape for configuration items managed by the {@link FileSystemConfigurationManager}
 */
export type ConfigurationItem<T = unknown> = {
  /** The configuration key  */
  key: string

  /** The item contents associated with this key */
  item: T
}

/**
 * Check if the value has the {@link ConfigurationItem} shape
 */
export function isConfigurationItem(
  value: unknown,
): value is ConfigurationItem {
  return (
    typeof value === "object" &&
    value !== null &&
    "key" in value &&
    typeof value.key === "string" &&
    "item" in value
  )
}

/**
 * Base class for managers that keep their values in a map
 */
abstract class MappedConfigurationManager
  extends EmitterFor<ConfigurationEvents>
  implements ConfigurationManager
{
  protected readonly _configMap: Map<string, unknown> = new Map()

  getKeys(): IterableIterator<string> {
    return this._configMap.keys()
  }

  getValue(configKey: string): unknown {
    return this._configMap.get(configKey)
  }

  getConfiguration<T>(
    configKey: string,
    guard: ConfigurationGuard<T>,
    defaultValue?: T,
  ): Optional<T> {
    const value = this._configMap.get(configKey)
    return guard(value) ? value : defaultValue
  }

  /**
   * Set the value and fire the matching event
   */
  protected _setValue(key: string, value: unknown): void {
    const event = this._configMap.has(key) ? "changed" : "added"
    this._configMap.set(key, value)
    this.emit(event, key)
  }

  /**
   * Remove the value and fire the event if it existed
   */
  protected _removeValue(key: string): boolean {
    if (this._configMap.delete(key)) {
      this.emit("removed", key)
      return true
    }

    return false
  }

  abstract close(): void
}

/**
 * {@link ConfigurationManager} backed by memory, useful for tests and for
 * programmatic configuration
 */
export class InMemoryConfigurationManager extends MappedConfigurationManager {
  constructor(items?: Iterable<ConfigurationItem>) {
    super()

    for (const item of items ?? []) {
      this._configMap.set(item.key, item.item)
    }
  }

  set(key: string, value: unknown): void {
    this._setValue(key, value)
  }

  delete(key: string): boolean {
    return this._removeValue(key)
  }

  close(): void {
    this.removeAllListeners()
  }
}

/**
 * Options for the {@link FileSystemConfigurationManager}
 */
export interface FileSystemConfigurationManagerOptions {
  /** The directory to monitor (default is /etc/config) */
  configDirectory?: string
  /** The optional log writer to use */
  logWriter?: LogWriter
  /** The default logging level for this component */
  logLevel?: LogLevel
  /** Flag to watch the directory for changes (default is true) */
  watch?: boolean
}

/**
 * Implementation of the {@link ConfigurationManager} that reads JSON files
 * holding a {@link ConfigurationItem} or an array of them from a directory.
 *
 * The directory is read once when the manager is created and then watched for
 * changes.
 */
export class FileSystemConfigurationManager extends MappedConfigurationManager {
  private readonly _configDirectory: string
  private readonly _abortController: AbortController
  private readonly _logger: Logger

  private readonly _configLocations: Map<string, string[]> = new Map()

  constructor(options: FileSystemConfigurationManagerOptions) {
    // Verify the configuration directory
    const configDirectory = options.configDirectory ?? "/etc/config"

    if (!fs.existsSync(configDirectory)) {
      throw new Error(`${configDirectory} does not exist`)
    }

    if (!fs.statSync(configDirectory).isDirectory()) {
      throw new Error(`${configDirectory} is not a valid directory`)
    }

    super()

    this._configDirectory = configDirectory
    this._abortController = new AbortController()
    this._logger = new DefaultLogger({
      name: "FileSystemConfigurationManager",
      writer: options.logWriter,
      level: options.logLevel,
    })

    for (const entry of fs.readdirSync(configDirectory, {
      withFileTypes: true,
    })) {
      if (entry.isFile() && isJsonFile(entry.name)) {
        const fileName = path.join(configDirectory, entry.name)
        this._logger.debug(`Loading ${fileName}`)
        this._applyContents(fileName, fs.readFileSync(fileName, "utf8"))
      }
    }

    if (options.watch ?? true) {
      this._watch()
    }
  }

  close(): void {
    if (!this._abortController.signal.aborted) {
      this._abortController.abort("closing the manager")
    }
  }

  private _watch(): void {
    const watcher = fs.watch(
      this._configDirectory,
      {
        encoding: "utf8",
        recursive: false,
        persistent: false,
        signal: this._abortController.signal,
      },
      (event: fs.WatchEventType, file: string | null): void => {
        this._logger.debug(`${file} => ${event}`)

        if (file && isJsonFile(file)) {
          const fileName = path.join(this._configDirectory, file)
          if (fs.existsSync(fileName)) {
            this._loadConfig(fileName)
          } else {
            this._clearConfig(fileName)
          }
        }
      },
    )

    watcher.on("error", (err: Error) => {
      this._logger.error(`Watcher error: ${err.message}`, err)
    })
  }

  /**
   * Clear all configurations associated with the given file
   *
   * @param fileName The file to clear
   */
  private _clearConfig(fileName: string): void {
    this._logger.debug(`Clearing: ${fileName}`)
    const keys = this._configLocations.get(fileName) ?? []
    if (this._configLocations.delete(fileName)) {
      for (const key of keys) {
        if (this._removeValue(key)) {
          this._logger.debug(`Removed ${key}`)
        }
      }
    }
  }

  /**
   * Loads configurations from the file and fires events
   *
   * @param fileName The file to load
   */
  private _loadConfig(fileName: string): void {
    fs.readFile(fileName, "utf8", (err, data) => {
      if (err) {
        this._logger.error(`Failed to load file ${fileName}: ${err.message}`)
      } else {
        this._logger.info(`Loading ${fileName}`)
        this._applyContents(fileName, data)
      }
    })
  }

  private _applyContents(fileName: string, data: string): void {
    const contents = this._contentsAsItemArray(fileName, data)
    const previous = this._configLocations.get(fileName) ?? []
    const current = contents.map((c) => c.key)

    this._configLocations.set(fileName, current)

    for (const key of previous) {
      if (!current.includes(key)) {
        this._removeValue(key)
      }
    }

    for (const item of contents) {
      this._setValue(item.key, item.item)
    }
  }

  /**
   * Load the file contents assuming they are formatted as a single
   * {@link ConfigurationItem} or array
   *
   * @param fileName The file the contents came from
   * @param contents The file contents
   * @returns An array of {@link ConfigurationItem} loaded from the file
   */
  private _contentsAsItemArray(
    fileName: string,
    contents: string,
  ): ConfigurationItem[] {
    let json: unknown
    try {
      json = JSON.parse(contents)
    } catch (err) {
      this._logger.error(`(${fileName}) Invalid file contents`, err)
      return []
    }

    const items = Array.isArray(json) ? json : [json]
    return items.filter(isConfigurationItem)
  }
}

function isJsonFile(fileName: string): boolean {
  return path.extname(fileName) === ".json"
}
