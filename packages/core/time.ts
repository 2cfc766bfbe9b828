/**
 * Custom time manipulations
 */

/**
 * Custom class that tracks elapsed {@link Duration}
 */
export class Timer {
  private _running = false
  private _started = 0n

  /**
   * Start a new timer
   *
   * @returns A new {@link Timer} that has been started
   */
  public static startNew(): Timer {
    const timer = new Timer()
    timer.start()
    return timer
  }

  get running(): boolean {
    return this._running
  }

  /**
   * Starts the timer, calling this on a running timer does nothing
   */
  start(): void {
    if (!this._running) {
      this._started = process.hrtime.bigint()
      this._running = true
    }
  }

  /**
   * Stop the timer
   *
   * @returns The {@link Duration} the timer was running or {@link Duration.ZERO} if it was not started
   */
  stop(): Duration {
    if (this._running) {
      const elapsed = process.hrtime.bigint() - this._started
      this._running = false
      this._started = 0n
      return Duration.ofNano(elapsed)
    }

    return Duration.ZERO
  }

  /**
   * Check the current elapsed {@link Duration}
   *
   * @returns The {@link Duration} the timer has been running or {@link Duration.ZERO} if it was not started
   */
  elapsed(): Duration {
    return this._running
      ? Duration.ofNano(process.hrtime.bigint() - this._started)
      : Duration.ZERO
  }
}

/**
 * Timestamp with nanosecond precision anchored to the wall clock at load time
 */
export class Timestamp {
  private static readonly START_NANO: bigint = process.hrtime.bigint()
  private static readonly START_UTC: number = Date.now()

  private readonly _nano: bigint

  /**
   * Calculate the difference between the start and end
   *
   * @param begin The starting {@link Timestamp}
   * @param end The ending {@link Timestamp}
   * @returns The {@link Duration} between the stamps or {@link Duration.ZERO}
   * if negative
   */
  static duration(begin: Timestamp, end: Timestamp): Duration {
    return begin.difference(end)
  }

  /**
   * @param nanoseconds A reading of `process.hrtime.bigint()`
   */
  constructor(nanoseconds: bigint) {
    this._nano = nanoseconds
  }

  /**
   * Calculate the time elapsed from this timestamp until the other
   *
   * @param other The later {@link Timestamp}
   * @returns The {@link Duration} between the two timestamps
   */
  difference(other: Timestamp): Duration {
    return other._nano <= this._nano
      ? Duration.ZERO
      : Duration.ofNano(other._nano - this._nano)
  }

  /**
   * @returns The {@link Timestamp} in ISO format
   */
  toISOString(): string {
    return new Date(
      Timestamp.START_UTC +
        Number((this._nano - Timestamp.START_NANO) / 1_000_000n),
    ).toISOString()
  }
}

/** Factors for translating nanoseconds -> microseconds */
const NANO_PER_MICRO = 1_000n
const MICRO_PER_SECOND = 1_000_000
const MICRO_PER_MILLI = 1_000

/**
 * Represents a duration of time at microsecond resolution
 */
export class Duration {
  private readonly _microseconds: number

  private constructor(nanoseconds: bigint) {
    this._microseconds = Number(nanoseconds / NANO_PER_MICRO)
  }

  /**
   * @returns The number of seconds with 6 decimal places for microsecond resolution
   */
  public seconds(): number {
    return this._microseconds / MICRO_PER_SECOND
  }

  /**
   * @returns the number of milliseconds with 3 decimal places for microsecond resolution
   */
  public milliseconds(): number {
    return this._microseconds / MICRO_PER_MILLI
  }

  public microseconds(): number {
    return this._microseconds
  }

  public toString(): string {
    return `${this.seconds()}`
  }

  /**
   * Create a {@link Duration} from a nanosecond measurement
   */
  static ofNano(nanoseconds: bigint): Duration {
    return new Duration(nanoseconds)
  }

  /**
   * Create a {@link Duration} from a whole millisecond measurement
   */
  static ofMilli(milliseconds: number): Duration {
    return new Duration(1_000_000n * BigInt(Math.trunc(milliseconds)))
  }

  /**
   * Create a {@link Duration} from a whole second measurement
   */
  static ofSeconds(seconds: number): Duration {
    return new Duration(1_000_000_000n * BigInt(Math.trunc(seconds)))
  }

  static ZERO: Duration = Duration.ofNano(0n)
}

/**
 * A clock that can be used to track time at sub-millisecond precision
 */
export class HiResClock {
  /**
   * @returns The current {@link Timestamp}
   */
  public static timestamp(): Timestamp {
    return new Timestamp(process.hrtime.bigint())
  }
}
