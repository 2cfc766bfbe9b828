import util from "util"

/**
 * Get the information about an object to help with debugging that leverages the
 * `util.inspect` method
 *
 * @param target The target object to inspect
 * @param depth The maximum depth to traverse (default is 25)
 * @returns A string representation for the object
 */
export function getDebugInfo(target: unknown, depth = 25): string {
  return util.inspect(target, false, depth, false)
}

/** Simple type representing `T | PromiseLike<T>` */
export type MaybeAwaitable<T> = T | PromiseLike<T>

/**
 * A resolver type for {@link PromiseLike} constructors
 */
export type Resolver<T> = (value: MaybeAwaitable<T>) => void

/**
 * A rejector type for {@link PromiseLike} constructors
 */
export type Rejector = (reason: unknown) => void

/**
 * A {@link Promise} whose `resolve` and `reject` are exposed to the caller
 */
export class DeferredPromise<T = void> implements Promise<T> {
  #resolver: Resolver<T>
  #rejector: Rejector
  #promise: Promise<T>
  #settled = false

  constructor() {
    let resolver: Resolver<T> = () => {}
    let rejector: Rejector = () => {}

    this.#promise = new Promise<T>((resolve: Resolver<T>, reject: Rejector) => {
      resolver = resolve
      rejector = reject
    })

    this.#resolver = resolver
    this.#rejector = rejector

    Object.seal(this)
  }

  get [Symbol.toStringTag](): string {
    return `Deferred=>${this.#promise[Symbol.toStringTag]}`
  }

  /** True once either resolve or reject has been called */
  get settled(): boolean {
    return this.#settled
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?:
      | ((value: T) => TResult1 | PromiseLike<TResult1>)
      | null
      | undefined,
    onrejected?:
      | ((reason: unknown) => TResult2 | PromiseLike<TResult2>)
      | null
      | undefined,
  ): Promise<TResult1 | TResult2> {
    return this.#promise.then(onfulfilled, onrejected)
  }

  catch<TResult = never>(
    onrejected?:
      | ((reason: unknown) => TResult | PromiseLike<TResult>)
      | null
      | undefined,
  ): Promise<T | TResult> {
    return this.#promise.catch(onrejected)
  }

  finally(onfinally?: (() => void) | null | undefined): Promise<T> {
    return this.#promise.finally(onfinally)
  }

  /**
   * Resolve the underlying {@link Promise} with the given value
   *
   * @param value The {@link MaybeAwaitable} to provide to the {@link Promise} chain
   */
  resolve(value: MaybeAwaitable<T>): void {
    this.#settled = true
    this.#resolver(value)
  }

  /**
   * Reject the underlying {@link Promise} with the given value
   *
   * @param reason The reason to provide the {@link Promise} chain for rejection
   */
  reject(reason: unknown): void {
    this.#settled = true
    this.#rejector(reason)
  }
}
