/**
 * @file error.ts
 * @description Error classes shared by the exporter core and the console driver.
 */

/**
 * The lowest level error generated by the exporter.
 *
 * Every error thrown on purpose by this package derives from this class and
 * carries a human readable `explain` string that the driver prints verbatim.
 */
export class LowlevelError extends Error {
  readonly explain: string;

  constructor(s: string) {
    super(s);
    this.name = 'LowlevelError';
    this.explain = s;
  }
}

/**
 * A malformed or contradictory configuration value.
 *
 * Raised before any decompilation work starts.
 */
export class ConfigError extends LowlevelError {
  /** The option (or option group) that failed to parse */
  readonly option: string;

  constructor(option: string, s: string) {
    super(s);
    this.name = 'ConfigError';
    this.option = option;
  }
}

/** Program dump or record data that cannot be decoded */
export class DecoderError extends LowlevelError {
  constructor(s: string) {
    super(s);
    this.name = 'DecoderError';
  }
}

/**
 * Two incompatible shapes for the same identity, raised only when the
 * conflict policy is `strict`.
 */
export class ConflictError extends LowlevelError {
  readonly identity: string;

  constructor(identity: string, s: string) {
    super(s);
    this.name = 'ConflictError';
    this.identity = identity;
  }
}

/**
 * Extract the message to report for anything caught in a `catch` clause.
 */
export function explainError(err: unknown): string {
  if (err instanceof LowlevelError) return err.explain;
  if (err instanceof Error) return err.message;
  return String(err);
}
