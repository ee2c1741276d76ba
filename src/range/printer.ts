/**
 * @file printer.ts
 * @description Consumers of a ResultRange: line printing and collection.
 */

import type { Writer } from '../util/writer.js';
import type { ResultRange } from './result_range.js';

/**
 * Write one line per result of `range` to `w`.
 * @param format - renders a result; defaults to String()
 * @returns the number of lines written
 */
export function printResults<T>(
  range: ResultRange<T>,
  w: Writer,
  format: (value: T, index: number) => string = (value) => String(value),
): number {
  let count = 0;
  for (let it = range.begin(); it.notEquals(range.end()); it.next()) {
    w.write(format(it.get(), count));
    w.write('\n');
    count++;
  }
  return count;
}

/** Drain `range` into an array. */
export function collectResults<T>(range: ResultRange<T>): T[] {
  return [...range];
}
