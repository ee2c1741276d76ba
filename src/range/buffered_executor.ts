/**
 * @file buffered_executor.ts
 * @description Executor that computes results from a resource of inputs in
 * sequential chunks.
 *
 * The resource is walked lazily. Whenever the result buffer runs dry, the
 * next `chunkSize` inputs are taken from the resource and the compute
 * function is applied to each, in order. `next()` then hands the buffered
 * results out one at a time. Errors thrown by the resource or the compute
 * function propagate out of `next()` as they are.
 */

import { debugLog } from '../core/types.js';
import type { Executor } from './executor.js';
import { DEFAULT_EXECUTOR_OPTIONS, type ExecutorOptions } from './options.js';

/** Maps one input of the resource to its result. */
export type ComputeFn<I, R> = (input: I, index: number) => R;

export class BufferedExecutor<I, R> implements Executor<R> {
  private source: Iterator<I> | null;
  private compute: ComputeFn<I, R>;
  private chunkSize: number;
  private buffer: R[] = [];
  private pos = 0;
  private consumed = 0;
  /** Error raised while filling the current chunk, thrown once the results before it are drained */
  private failure: { error: unknown } | null = null;

  constructor(resource: Iterable<I>, compute: ComputeFn<I, R>, options: Partial<ExecutorOptions> = {}) {
    this.source = resource[Symbol.iterator]();
    this.compute = compute;
    this.chunkSize = options.chunkSize ?? DEFAULT_EXECUTOR_OPTIONS.chunkSize;
    if (!Number.isInteger(this.chunkSize) || this.chunkSize < 1)
      throw new RangeError(`chunkSize must be a positive integer, got ${this.chunkSize}`);
  }

  next(): IteratorResult<R, undefined> {
    if (this.pos >= this.buffer.length) {
      const failure = this.failure;
      if (failure !== null) {
        this.failure = null;
        throw failure.error;
      }
      if (!this.underflow())
        return { done: true, value: undefined };
    }
    const value = this.buffer[this.pos++];
    return { done: false, value };
  }

  /** Release the resource and drop any buffered results. */
  return(): IteratorResult<R, undefined> {
    const src = this.source;
    this.source = null;
    this.buffer = [];
    this.pos = 0;
    this.failure = null;
    src?.return?.();
    return { done: true, value: undefined };
  }

  /** True once the resource is known to be exhausted and the buffer is drained. */
  isEof(): boolean {
    return this.source === null && this.pos >= this.buffer.length && this.failure === null;
  }

  /** Number of inputs taken from the resource so far. */
  get inputsConsumed(): number {
    return this.consumed;
  }

  /**
   * Refill the buffer with the next chunk of results.
   *
   * If the resource or the compute function throws partway through, the
   * results before the failing input are kept and the error is deferred
   * until they have been handed out. With nothing computed yet it is thrown
   * at once.
   * @returns false if the resource had nothing left
   */
  private underflow(): boolean {
    const chunk: R[] = [];
    this.buffer = chunk;
    this.pos = 0;
    const src = this.source;
    if (src === null) return false;

    while (chunk.length < this.chunkSize) {
      try {
        const step = src.next();
        if (step.done === true) {
          this.source = null;
          break;
        }
        chunk.push(this.compute(step.value, this.consumed++));
      } catch (error) {
        if (chunk.length === 0) throw error;
        this.failure = { error };
        break;
      }
    }
    debugLog('underflow', () => `${chunk.length} results`);
    return chunk.length > 0;
  }
}
