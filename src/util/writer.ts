/**
 * @file writer.ts
 * @description Writer interface for line-oriented string output.
 */

/**
 * Abstract writer interface.
 * Implementations can write to strings, streams, or other destinations.
 */
export interface Writer {
  write(s: string): void;
}

/**
 * Writer that accumulates output into a string buffer.
 */
export class StringWriter implements Writer {
  private buf: string[] = [];

  write(s: string): void {
    this.buf.push(s);
  }

  toString(): string {
    return this.buf.join('');
  }

  clear(): void {
    this.buf.length = 0;
  }
}

/**
 * Writer that writes to a process stream (stdout unless told otherwise).
 */
export class ConsoleWriter implements Writer {
  private stream: NodeJS.WritableStream;

  constructor(stream: NodeJS.WritableStream = process.stdout) {
    this.stream = stream;
  }

  write(s: string): void {
    this.stream.write(s);
  }
}

