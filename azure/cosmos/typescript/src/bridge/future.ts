/**
 * Awaitable handle for an operation submitted to the asynchronous dispatcher.
 */

import { OperationCancelledError } from '../errors/index.js';

/**
 * A promise-like result with best-effort cancellation.
 *
 * Cancelling rejects the future with {@link OperationCancelledError} and
 * aborts the signal handed to the operation. An operation still waiting for
 * a worker never starts; one already in flight may still complete remotely.
 */
export class BridgeFuture<T> implements PromiseLike<T> {
  private readonly promise: Promise<T>;
  private readonly controller: AbortController;
  private rejectObserver: (reason: unknown) => void = () => undefined;
  private state: 'pending' | 'fulfilled' | 'rejected' | 'cancelled' = 'pending';

  /**
   * @param start - begins the operation with the future's abort signal
   */
  constructor(start: (signal: AbortSignal) => Promise<T>) {
    this.controller = new AbortController();
    this.promise = new Promise<T>((resolve, reject) => {
      this.rejectObserver = reject;
      start(this.controller.signal).then(
        (value) => {
          if (this.state === 'pending') {
            this.state = 'fulfilled';
            resolve(value);
          }
        },
        (error: unknown) => {
          if (this.state === 'pending') {
            this.state = 'rejected';
            reject(error);
          }
        }
      );
    });
  }

  /** Signal passed to the operation; aborted on {@link cancel} */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get cancelled(): boolean {
    return this.state === 'cancelled';
  }

  /** Whether the future has settled, including by cancellation */
  get done(): boolean {
    return this.state !== 'pending';
  }

  /**
   * Requests cancellation. Returns `false` if the future had already settled.
   */
  cancel(reason?: string): boolean {
    if (this.state !== 'pending') {
      return false;
    }
    this.state = 'cancelled';
    this.controller.abort(new OperationCancelledError(reason));
    // the caller asked for this outcome; awaiting it still rejects
    this.promise.catch(() => undefined);
    this.rejectObserver(new OperationCancelledError(reason));
    return true;
  }

  then<TResult1 = T, TResult2 = never>(
    onfulfilled?: ((value: T) => TResult1 | PromiseLike<TResult1>) | null,
    onrejected?: ((reason: unknown) => TResult2 | PromiseLike<TResult2>) | null
  ): Promise<TResult1 | TResult2> {
    return this.promise.then(onfulfilled, onrejected);
  }

  catch<TResult = never>(
    onrejected?: ((reason: unknown) => TResult | PromiseLike<TResult>) | null
  ): Promise<T | TResult> {
    return this.promise.catch(onrejected);
  }

  finally(onfinally?: (() => void) | null): Promise<T> {
    return this.promise.finally(onfinally);
  }
}
