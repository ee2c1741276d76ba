/**
 * @file types.ts
 * @description Shared scalar aliases and the library's debug switches.
 */

import { ConsoleWriter, type Writer } from '../util/writer.js';

/** Signed offset between two positions of a sequence */
export type intp = number;

// ---- Debug flags ----

/** Trace every pull and buffer refill to the debug writer */
export let RANGE_DEBUG = false;

let debugWriter: Writer = new ConsoleWriter(process.stderr);

/** Enable all debug flags */
export function enableDebug(): void {
  RANGE_DEBUG = true;
}

/** Disable all debug flags */
export function disableDebug(): void {
  RANGE_DEBUG = false;
}

/** Redirect debug output (defaults to stderr). Returns the previous writer. */
export function setDebugWriter(w: Writer): Writer {
  const prev = debugWriter;
  debugWriter = w;
  return prev;
}

/**
 * Write one trace line if debugging is on. The message is only built when
 * it will be written.
 */
export function debugLog(tag: string, msg: () => string): void {
  if (!RANGE_DEBUG) return;
  debugWriter.write(`${tag}: ${msg()}\n`);
}
