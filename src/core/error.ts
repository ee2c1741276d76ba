/**
 * @file error.ts
 * @description Error classes raised by the result range library.
 */

/** A value handed to the configuration layer could not be parsed. */
export class ParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Base class for errors originating in this library (as opposed to errors
 * thrown by an executor, which are passed through untouched).
 */
export class LowlevelError extends Error {
  explain: string;
  constructor(message: string) {
    super(message);
    this.name = 'LowlevelError';
    this.explain = message;
  }
}

/**
 * A pull was attempted on a range that owns no executor: it was
 * default-constructed, moved from, or closed.
 */
export class ExecutorUnavailableError extends LowlevelError {
  constructor(message: string = 'No result executor available.') {
    super(message);
    this.name = 'ExecutorUnavailableError';
  }
}
