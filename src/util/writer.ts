/**
 * @file writer.ts
 * @description Writer interface for string output.
 */

/**
 * Abstract writer interface.
 * Implementations can write to strings, files, or other destinations.
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
}

/**
 * Writer that writes to process stdout.
 */
export class ConsoleWriter implements Writer {
  write(s: string): void {
    process.stdout.write(s);
  }
}

/**
 * Writer that writes to process stderr, used for diagnostics so that
 * artifacts written to stdout stay clean.
 */
export class ErrorWriter implements Writer {
  write(s: string): void {
    process.stderr.write(s);
  }
}

/** Writer that discards everything */
export const nullWriter: Writer = { write: () => {} };

