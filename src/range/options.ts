/**
 * @file options.ts
 * @description Configuration for executors: parsing of string-valued option
 * commands and environment variables into ExecutorOptions.
 */

import { ParseError } from '../core/error.js';
import { disableDebug, enableDebug } from '../core/types.js';

/** Tunables for a BufferedExecutor */
export interface ExecutorOptions {
  /** Number of inputs computed per buffer refill (>= 1) */
  chunkSize: number;
}

export const DEFAULT_EXECUTOR_OPTIONS: Readonly<ExecutorOptions> = Object.freeze({
  chunkSize: 1,
});

/**
 * Parse an integer from a string, supporting optional 0x (hex) and 0 (octal) prefixes.
 * Returns NaN if parsing fails.
 */
function parseIntAuto(s: string): number {
  s = s.trim();
  if (s.length === 0) return NaN;
  if (s.startsWith("0x") || s.startsWith("0X")) {
    return parseInt(s, 16);
  }
  if (s.startsWith("0") && s.length > 1) {
    return parseInt(s, 8);
  }
  return parseInt(s, 10);
}

/**
 * Parse an "on" or "off" string.
 * An empty string defaults to true. Any other value causes an exception.
 */
export function onOrOff(p: string): boolean {
  if (p.length === 0)
    return true;
  if (p === "on")
    return true;
  if (p === "off")
    return false;
  throw new ParseError("Must specify toggle value, on/off");
}

const INTEGER_LITERAL = /^(0[xX][0-9a-fA-F]+|0[0-7]*|[1-9]\d*)$/;

/** Check and return a chunk size parsed from `p`. */
function parseChunkSize(p: string): number {
  if (!INTEGER_LITERAL.test(p.trim()))
    throw new ParseError(`Bad chunk size: ${p}`);
  const val = parseIntAuto(p);
  if (!Number.isInteger(val) || val < 1)
    throw new ParseError(`Bad chunk size: ${p}`);
  return val;
}

/**
 * Build ExecutorOptions from option commands given as name/value strings.
 *
 * Recognized names:
 *   - `chunksize`: positive integer (decimal, 0x hex or 0 octal)
 *   - `debug`: on/off toggle for pull tracing
 *
 * Unrecognized names raise a ParseError.
 */
export function parseExecutorOptions(
  params: Readonly<Record<string, string>>,
  base: Readonly<ExecutorOptions> = DEFAULT_EXECUTOR_OPTIONS,
): ExecutorOptions {
  const res: ExecutorOptions = { ...base };
  let debug: boolean | undefined;
  for (const [name, value] of Object.entries(params)) {
    switch (name) {
      case "chunksize":
        res.chunkSize = parseChunkSize(value);
        break;
      case "debug":
        debug = onOrOff(value);
        break;
      default:
        throw new ParseError(`Unknown option: ${name}`);
    }
  }
  // Only touch the global flag once every entry parsed
  if (debug === true)
    enableDebug();
  else if (debug === false)
    disableDebug();
  return res;
}

/**
 * Read options from the environment: RESULT_RANGE_CHUNK_SIZE and
 * RESULT_RANGE_DEBUG. Unset variables leave the defaults in place.
 */
export function executorOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): ExecutorOptions {
  const params: Record<string, string> = {};
  const chunk = env.RESULT_RANGE_CHUNK_SIZE;
  if (chunk !== undefined)
    params.chunksize = chunk;
  const debug = env.RESULT_RANGE_DEBUG;
  if (debug !== undefined)
    params.debug = debug;
  return parseExecutorOptions(params);
}
