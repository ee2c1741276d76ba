/**
 * @file executor.ts
 * @description The executor boundary consumed by ResultRange, plus the
 * associated-type plumbing generic code uses to name an executor's elements.
 *
 * An executor is any object following the iterator protocol: each `next()`
 * either yields one result and advances, or reports permanent exhaustion.
 * Every JavaScript iterator and generator qualifies.
 */

import type { intp } from '../core/types.js';

/**
 * A stateful, destructively consumed source of results.
 *
 * Once `next()` has reported `done`, later calls are expected to report
 * `done` again; the range relies on this without checking it. `next()` must
 * not be re-entered.
 */
export interface Executor<T> {
  /** Produce the next result, or `{ done: true }` once nothing is left. */
  next(): IteratorResult<T, unknown>;
  /** Release any resources early. Called when the owning range is closed. */
  return?(value?: unknown): IteratorResult<T, unknown>;
}

/** Element type yielded by an executor */
export type ValueType<E> = E extends Executor<infer T> ? T : never;

/** Read-only view of an element, as handed out by a cursor */
export type ReferenceType<E> = Readonly<ValueType<E>>;

/** Offset type; published for completeness, never used in arithmetic */
export type DifferenceType = intp;
