/**
 * @file buffered-executor.test.ts
 * @description Tests for chunked, lazy result computation through BufferedExecutor.
 */

import { describe, it, expect, afterEach } from 'vitest';
import { BufferedExecutor } from '../../src/range/buffered_executor.js';
import { ResultRange } from '../../src/range/result_range.js';
import { disableDebug, enableDebug, setDebugWriter } from '../../src/core/types.js';
import { StringWriter, type Writer } from '../../src/util/writer.js';

/** Compute function that records every input it sees. */
function tenfold(log: number[]): (x: number) => number {
  return (x) => {
    log.push(x);
    return x * 10;
  };
}

describe('BufferedExecutor', () => {
  it('computes one input at a time by default', () => {
    const log: number[] = [];
    const r = ResultRange.from(new BufferedExecutor([1, 2, 3], tenfold(log)));
    expect(log).toEqual([]);

    const it = r.begin();
    expect(it.value).toBe(10);
    expect(log).toEqual([1]);

    it.next();
    expect(it.value).toBe(20);
    expect(log).toEqual([1, 2]);
  });

  it('refills the buffer a chunk at a time', () => {
    const log: number[] = [];
    const r = ResultRange.from(new BufferedExecutor([1, 2, 3, 4, 5], tenfold(log), { chunkSize: 2 }));
    const it = r.begin();
    expect(log).toEqual([1, 2]);
    it.next();
    expect(it.value).toBe(20);
    expect(log).toEqual([1, 2]);
    it.next();
    expect(it.value).toBe(30);
    expect(log).toEqual([1, 2, 3, 4]);
  });

  it('keeps input order across chunks', () => {
    const ex = new BufferedExecutor([1, 2, 3, 4, 5, 6, 7], (x: number) => x * x, { chunkSize: 3 });
    expect([...ResultRange.from(ex)]).toEqual([1, 4, 9, 16, 25, 36, 49]);
  });

  it('passes the input index to the compute function', () => {
    const ex = new BufferedExecutor(['a', 'b'], (s: string, i: number) => `${i}:${s}`);
    expect([...ResultRange.from(ex)]).toEqual(['0:a', '1:b']);
    expect(ex.inputsConsumed).toBe(2);
  });

  it('reports exhaustion for an empty resource', () => {
    const ex = new BufferedExecutor([] as number[], (x: number) => x);
    expect(ex.isEof()).toBe(false);
    const it = new ResultRange(ex).begin();
    expect(it.isEnd).toBe(true);
    expect(ex.isEof()).toBe(true);
  });

  it('stays exhausted after the last result', () => {
    const ex = new BufferedExecutor([5], (x: number) => x + 1);
    expect(ex.next()).toEqual({ done: false, value: 6 });
    expect(ex.next()).toEqual({ done: true, value: undefined });
    expect(ex.next()).toEqual({ done: true, value: undefined });
    expect(ex.isEof()).toBe(true);
  });

  it('return() releases the resource', () => {
    let released = false;
    function* inputs(): Generator<number, void, unknown> {
      try {
        yield 1;
        yield 2;
        yield 3;
      } finally {
        released = true;
      }
    }
    const ex = new BufferedExecutor(inputs(), (x: number) => x);
    expect(ex.next()).toEqual({ done: false, value: 1 });
    ex.return();
    expect(released).toBe(true);
    expect(ex.next()).toEqual({ done: true, value: undefined });
  });

  it('is released when the owning range closes', () => {
    let released = false;
    function* inputs(): Generator<number, void, unknown> {
      try {
        for (let i = 0; ; i++) yield i;
      } finally {
        released = true;
      }
    }
    const r = ResultRange.from(new BufferedExecutor(inputs(), (x: number) => x));
    expect(r.begin().value).toBe(0);
    r.close();
    expect(released).toBe(true);
  });

  it('propagates compute errors at the pull that needs them', () => {
    const ex = new BufferedExecutor([1, 2, 3], (x: number) => {
      if (x === 3) throw new Error(`cannot compute ${x}`);
      return x;
    });
    const it = ResultRange.from(ex).begin();
    it.next();
    expect(it.value).toBe(2);
    expect(() => it.next()).toThrow('cannot compute 3');
  });

  it('reports a failure inside a chunk at its own position', () => {
    const ex = new BufferedExecutor([1, 2, 3, 4], (x: number) => {
      if (x === 2) throw new Error('bad');
      return x;
    }, { chunkSize: 3 });
    expect(ex.next()).toEqual({ done: false, value: 1 });
    expect(() => ex.next()).toThrow('bad');
    expect(ex.next()).toEqual({ done: false, value: 3 });
    expect(ex.next()).toEqual({ done: false, value: 4 });
    expect(ex.next()).toEqual({ done: true, value: undefined });
    expect(ex.inputsConsumed).toBe(4);
  });

  it('throws at once when the first input of a chunk fails', () => {
    const ex = new BufferedExecutor([1, 2], (x: number) => {
      if (x === 1) throw new Error('first');
      return x;
    }, { chunkSize: 2 });
    expect(() => ex.next()).toThrow('first');
    expect(ex.next()).toEqual({ done: false, value: 2 });
  });

  it('rejects a chunk size below one', () => {
    expect(() => new BufferedExecutor([1], (x: number) => x, { chunkSize: 0 })).toThrow(RangeError);
    expect(() => new BufferedExecutor([1], (x: number) => x, { chunkSize: 1.5 })).toThrow(RangeError);
  });
});

describe('BufferedExecutor tracing', () => {
  let prev: Writer | undefined;

  afterEach(() => {
    disableDebug();
    if (prev !== undefined) setDebugWriter(prev);
  });

  it('logs each buffer refill', () => {
    const w = new StringWriter();
    prev = setDebugWriter(w);
    enableDebug();
    const ex = new BufferedExecutor([1, 2, 3], (x: number) => x, { chunkSize: 2 });
    expect([...ResultRange.from(ex)]).toEqual([1, 2, 3]);
    expect(w.toString()).toBe(
      'underflow: 2 results\n' +
      'pull: 1\n' +
      'pull: 2\n' +
      'underflow: 1 results\n' +
      'pull: 3\n' +
      'pull: exhausted\n',
    );
  });
});
