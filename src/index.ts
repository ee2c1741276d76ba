/**
 * @file index.ts
 * @description Public entry point of the result range library.
 */

export {
  ExecutorUnavailableError,
  LowlevelError,
  ParseError,
} from './core/error.js';
export {
  RANGE_DEBUG,
  disableDebug,
  enableDebug,
  setDebugWriter,
  type intp,
} from './core/types.js';
export { ConsoleWriter, StringWriter, type Writer } from './util/writer.js';
export type {
  DifferenceType,
  Executor,
  ReferenceType,
  ValueType,
} from './range/executor.js';
export {
  DefaultSentinel,
  ResultRange,
  ResultRangeIterator,
  defaultSentinel,
  equal,
  notEqual,
  type RangeValue,
} from './range/result_range.js';
export { BufferedExecutor, type ComputeFn } from './range/buffered_executor.js';
export {
  DEFAULT_EXECUTOR_OPTIONS,
  executorOptionsFromEnv,
  onOrOff,
  parseExecutorOptions,
  type ExecutorOptions,
} from './range/options.js';
export { collectResults, printResults } from './range/printer.js';
