/**
 * @file result_range.ts
 * @description Lazy, single-pass input range over the results of an executor.
 *
 * A ResultRange owns its executor and caches the most recently pulled
 * result. Traversal uses the familiar begin/end pair:
 *
 *   for (let it = range.begin(); it.notEquals(range.end()); it.next()) {
 *     use(it.value);
 *   }
 *
 * Results are computed lazily: nothing is pulled until `begin()` is called,
 * and each `next()` pulls exactly one more result. Reading the current value
 * only reads the cache. The end of the range is detected by comparing the
 * cursor with a stateless DefaultSentinel, so the executor never needs any
 * notion of position.
 *
 * Only one cursor may drive a range at a time. Every `begin()` performs a
 * fresh priming pull, so calling it again after a traversal has started
 * skips results rather than rewinding.
 */

import { ExecutorUnavailableError, LowlevelError } from '../core/error.js';
import { debugLog } from '../core/types.js';
import type { Executor } from './executor.js';

// ---------------------------------------------------------------------------
// DefaultSentinel
// ---------------------------------------------------------------------------

/**
 * Stateless end-of-range marker. Compares equal to a cursor once that
 * cursor's executor has been exhausted.
 */
export class DefaultSentinel {
  private readonly name = 'default_sentinel';

  equals<T>(it: ResultRangeIterator<T>): boolean {
    return it.equals(this);
  }

  notEquals<T>(it: ResultRangeIterator<T>): boolean {
    return it.notEquals(this);
  }

  toString(): string {
    return this.name;
  }
}

/** The shared sentinel instance returned by every `end()`. */
export const defaultSentinel = new DefaultSentinel();
Object.freeze(defaultSentinel);

// ---------------------------------------------------------------------------
// ResultRange
// ---------------------------------------------------------------------------

/**
 * An input range over the results generated by an executor.
 *
 * The range is the sole owner of the executor handed to it: callers must not
 * touch the executor afterwards. A range cannot be copied; ownership is
 * transferred with `move()`, which leaves the source without an executor.
 */
export class ResultRange<T> {
  private executor: Executor<T> | null;
  private cache: { value: T } | null = null;

  /**
   * Take ownership of `executor`. Without one, the range is an empty
   * placeholder and any traversal of it fails with ExecutorUnavailableError.
   */
  constructor(executor?: Executor<T>) {
    this.executor = executor ?? null;
  }

  /** Construct a range over `executor`, inferring the element type. */
  static from<T>(executor: Executor<T>): ResultRange<T> {
    return new ResultRange<T>(executor);
  }

  // -- Iterators ----------------------------------------------------------

  /**
   * Cursor to the first result. Constructing the cursor pulls the first
   * result from the executor.
   */
  begin(): ResultRangeIterator<T> {
    return new ResultRangeIterator<T>(this);
  }

  /** The end sentinel. Does not touch the executor. */
  end(): DefaultSentinel {
    return defaultSentinel;
  }

  /** Drive a single traversal; supports `for...of` and spread. */
  *[Symbol.iterator](): IterableIterator<T> {
    for (let it = this.begin(); it.notEquals(this.end()); it.next()) {
      yield it.get();
    }
  }

  // -- Ownership ----------------------------------------------------------

  /**
   * Transfer the executor and the cached result to a new range. This range
   * is left without an executor.
   */
  move(): ResultRange<T> {
    const target = new ResultRange<T>();
    target.executor = this.executor;
    target.cache = this.cache;
    this.executor = null;
    this.cache = null;
    return target;
  }

  /**
   * Release the executor (calling its `return()` if it has one). Further
   * pulls fail. Closing twice is a no-op.
   */
  close(): void {
    const ex = this.executor;
    if (ex === null) return;
    this.executor = null;
    ex.return?.();
  }

  // -- Cursor support -----------------------------------------------------

  /** @internal The last successfully pulled result, if any. */
  get _cache(): { readonly value: T } | null {
    return this.cache;
  }

  /**
   * @internal
   * Fetch the next result from the executor into the cache.
   * @returns true if a result was fetched, false if the executor is exhausted
   */
  _pull(): boolean {
    if (this.executor === null)
      throw new ExecutorUnavailableError();

    const res = this.executor.next();
    if (res.done === true) {
      debugLog('pull', () => 'exhausted');
      return false;
    }
    this.cache = { value: res.value };
    debugLog('pull', () => String(res.value));
    return true;
  }
}

// ---------------------------------------------------------------------------
// ResultRangeIterator
// ---------------------------------------------------------------------------

/**
 * Input iterator over a ResultRange.
 *
 * Dereferencing reads the range's cache; advancing pulls one result into it.
 * Only comparison with the end sentinel is defined, never between cursors.
 * After the end is reached `value` keeps returning the last result.
 */
export class ResultRangeIterator<T> {
  private range: ResultRange<T>;
  private atEnd = true;

  /** Bind to `range` and fetch its first result. */
  constructor(range: ResultRange<T>) {
    this.range = range;
    this.next();
  }

  /** The current result (undefined if nothing was ever pulled) */
  get value(): Readonly<T> | undefined {
    return this.range._cache?.value;
  }

  /**
   * The current result. Unlike `value`, throws if the executor never
   * produced anything.
   */
  get(): T {
    const slot = this.range._cache;
    if (slot === null)
      throw new LowlevelError('No result has been fetched.');
    return slot.value;
  }

  /**
   * Advance to the next result.
   * @returns this iterator (mutated) for chaining
   */
  next(): this {
    this.atEnd = !this.range._pull();
    return this;
  }

  /** True once the executor has reported exhaustion. */
  get isEnd(): boolean {
    return this.atEnd;
  }

  equals(_sentinel: DefaultSentinel): boolean {
    return this.atEnd;
  }

  notEquals(sentinel: DefaultSentinel): boolean {
    return !this.equals(sentinel);
  }
}

// ---------------------------------------------------------------------------
// Free comparison helpers
// ---------------------------------------------------------------------------

/** Cursor/sentinel equality, in either argument order. */
export function equal<T>(lhs: ResultRangeIterator<T>, rhs: DefaultSentinel): boolean;
export function equal<T>(lhs: DefaultSentinel, rhs: ResultRangeIterator<T>): boolean;
export function equal<T>(
  lhs: ResultRangeIterator<T> | DefaultSentinel,
  rhs: ResultRangeIterator<T> | DefaultSentinel,
): boolean {
  if (lhs instanceof ResultRangeIterator) return lhs.isEnd;
  if (rhs instanceof ResultRangeIterator) return rhs.isEnd;
  throw new TypeError('equal() needs a cursor on one side');
}

/** Negation of `equal`, in either argument order. */
export function notEqual<T>(lhs: ResultRangeIterator<T>, rhs: DefaultSentinel): boolean;
export function notEqual<T>(lhs: DefaultSentinel, rhs: ResultRangeIterator<T>): boolean;
export function notEqual<T>(
  lhs: ResultRangeIterator<T> | DefaultSentinel,
  rhs: ResultRangeIterator<T> | DefaultSentinel,
): boolean {
  if (lhs instanceof ResultRangeIterator) return !lhs.isEnd;
  if (rhs instanceof ResultRangeIterator) return !rhs.isEnd;
  throw new TypeError('notEqual() needs a cursor on one side');
}

/** Element type of a ResultRange */
export type RangeValue<R> = R extends ResultRange<infer T> ? T : never;
