/**
 * Execution bridge between the public call surfaces and the transport.
 *
 * One bridge exists per process. It is created on first use and lives until
 * the process exits. Handles never hold it; they call {@link getExecutionBridge}
 * for each operation.
 *
 * - {@link ExecutionBridge.run} starts the operation at once; the caller awaits
 *   its own promise and independent callers proceed concurrently.
 * - {@link ExecutionBridge.submit} queues the operation on a bounded worker
 *   dispatcher and returns a cancellable {@link BridgeFuture}.
 *
 * The bridge applies no timeout and no retry; both belong to the transport.
 *
 * @module bridge
 */

import { OperationCancelledError } from '../errors/index.js';
import { NoopLogger, type Logger } from '../observability/index.js';
import { BridgeFuture } from './future.js';
import { Semaphore } from './semaphore.js';

export { BridgeFuture } from './future.js';
export { Semaphore } from './semaphore.js';

/**
 * An asynchronous transport operation. The signal is aborted when an
 * asynchronous caller cancels.
 */
export type BridgeOperation<T> = (signal: AbortSignal) => Promise<T>;

export interface ExecutionBridgeOptions {
  /** Worker slots of the asynchronous dispatcher. Default: 32 */
  maxWorkers?: number;
  logger?: Logger;
}

export interface BridgeStats {
  maxWorkers: number;
  /** Operations currently executing, from either path */
  inFlight: number;
  /** Submitted operations waiting for a worker */
  queued: number;
  completed: number;
  failed: number;
  cancelled: number;
}

export const DEFAULT_MAX_WORKERS = 32;

let instance: ExecutionBridge | undefined;
let constructions = 0;

export class ExecutionBridge {
  private readonly maxWorkers: number;
  private readonly dispatcher: Semaphore;
  private readonly logger: Logger;
  private inFlight = 0;
  private completed = 0;
  private failed = 0;
  private cancelledCount = 0;

  private constructor(options: ExecutionBridgeOptions) {
    constructions++;
    this.maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
    this.dispatcher = new Semaphore(this.maxWorkers);
    this.logger = options.logger ?? new NoopLogger();
    this.logger.debug('Execution bridge created', { maxWorkers: this.maxWorkers });
  }

  /**
   * Returns the process-wide bridge, creating it on first use. Options only
   * take effect on that first call.
   */
  static instance(options: ExecutionBridgeOptions = {}): ExecutionBridge {
    if (instance === undefined) {
      instance = new ExecutionBridge(options);
    }
    return instance;
  }

  /**
   * Runs an operation to completion for a caller that awaits it directly.
   */
  async run<T>(operation: BridgeOperation<T>, signal?: AbortSignal): Promise<T> {
    return this.execute(operation, signal ?? new AbortController().signal);
  }

  /**
   * Queues an operation on the worker dispatcher.
   *
   * @example
   * ```typescript
   * const future = getExecutionBridge().submit((signal) => transport.readItem(db, c, id, pk, signal));
   * future.cancel(); // best effort
   * ```
   */
  submit<T>(operation: BridgeOperation<T>): BridgeFuture<T> {
    return new BridgeFuture<T>((signal) => this.dispatch(operation, signal));
  }

  stats(): BridgeStats {
    return {
      maxWorkers: this.maxWorkers,
      inFlight: this.inFlight,
      queued: this.dispatcher.pending,
      completed: this.completed,
      failed: this.failed,
      cancelled: this.cancelledCount,
    };
  }

  private async dispatch<T>(operation: BridgeOperation<T>, signal: AbortSignal): Promise<T> {
    await this.dispatcher.acquire();
    try {
      if (signal.aborted) {
        this.cancelledCount++;
        throw new OperationCancelledError('cancelled before a worker was available');
      }
      return await this.execute(operation, signal);
    } finally {
      this.dispatcher.release();
    }
  }

  private async execute<T>(operation: BridgeOperation<T>, signal: AbortSignal): Promise<T> {
    this.inFlight++;
    try {
      const result = await operation(signal);
      this.completed++;
      return result;
    } catch (error) {
      if (signal.aborted) {
        this.cancelledCount++;
      } else {
        this.failed++;
      }
      throw error;
    } finally {
      this.inFlight--;
    }
  }
}

/**
 * Returns the process-wide execution bridge.
 */
export function getExecutionBridge(options?: ExecutionBridgeOptions): ExecutionBridge {
  return ExecutionBridge.instance(options);
}

/**
 * Number of times the bridge constructor has run in this process.
 */
export function executionBridgeConstructions(): number {
  return constructions;
}

/**
 * Drops the process-wide bridge so the next use creates a new one.
 * Intended for tests only.
 */
export function resetExecutionBridge(): void {
  instance = undefined;
  constructions = 0;
}
