/**
 * @file parallel.ts
 * @description Concurrent decompilation and per-function closure building.
 *
 * Each selected function becomes one ClosureJob. A job asks the decompiler for
 * the function's record and builds the function's own DeclarationSet; it never
 * touches another job's state. Results are stored by position, so the merge
 * that follows sees the same order however the jobs interleave.
 */

import { ConflictError, explainError } from '../core/error.js';
import type { Logger } from '../util/log.js';
import { type ConflictPolicy, DeclarationSet } from './declset.js';
import type { DecompilationRecord, DecompileOutcome, DecompilerSource, FunctionInfo } from './record.js';
import { closeSymbols } from './symclosure.js';
import { closeType } from './typeclosure.js';

// ---------------------------------------------------------------------------
// Closure of a single function
// ---------------------------------------------------------------------------

export interface ClosureOptions {
  includeGlobals: boolean;
  policy: ConflictPolicy;
}

/**
 * Build the declaration set one decompiled function needs.
 *
 * Types are closed in this order: the function's own prototype, every
 * referenced type, the types of referenced globals, then the prototypes of
 * called functions. Symbols follow. Prototypes of selected callees are
 * closed too, in case the callee fails to decompile and must be declared.
 */
export function buildFunctionClosure(
  record: DecompilationRecord, selectedNames: ReadonlySet<string>, opts: ClosureOptions
): DeclarationSet {
  const acc = new DeclarationSet(opts.policy, record.name);
  if (record.prototype !== undefined)
    closeType(record.prototype, acc);
  for (const ct of record.typeRefs)
    closeType(ct, acc);
  for (const ref of record.globals) {
    if (ref.storage === 'function' || opts.includeGlobals)
      closeType(ref.type, acc);
  }
  for (const call of record.calls) {
    if (call.prototype === undefined || call.name === record.name) continue;
    closeType(call.prototype, acc);
  }
  closeSymbols(record, selectedNames, acc, { includeGlobals: opts.includeGlobals });
  return acc;
}

// ---------------------------------------------------------------------------
// ClosureJob
// ---------------------------------------------------------------------------

/**
 * Result of a single closure job.
 */
export type ClosureResult =
  | { readonly kind: 'record'; readonly fn: FunctionInfo; readonly record: DecompilationRecord; readonly decls: DeclarationSet }
  | { readonly kind: 'failure'; readonly fn: FunctionInfo; readonly reason: string };

/**
 * Decompiles one function and closes over its declarations.
 */
export class ClosureJob {
  private readonly source: DecompilerSource;
  private readonly fn: FunctionInfo;
  private readonly selectedNames: ReadonlySet<string>;
  private readonly opts: ClosureOptions;

  constructor(source: DecompilerSource, fn: FunctionInfo, selectedNames: ReadonlySet<string>, opts: ClosureOptions) {
    this.source = source;
    this.fn = fn;
    this.selectedNames = selectedNames;
    this.opts = opts;
  }

  /**
   * Decompile and close. Decompiler errors, thrown or returned, become a
   * failure result.
   * @throws ConflictError under the strict conflict policy
   */
  async run(): Promise<ClosureResult> {
    let outcome: DecompileOutcome;
    try {
      outcome = await this.source.decompile(this.fn.id);
    } catch (err) {
      return { kind: 'failure', fn: this.fn, reason: explainError(err) };
    }
    if (outcome.kind === 'failure')
      return { kind: 'failure', fn: this.fn, reason: outcome.reason };
    try {
      const decls = buildFunctionClosure(outcome, this.selectedNames, this.opts);
      return { kind: 'record', fn: this.fn, record: outcome, decls };
    } catch (err) {
      if (err instanceof ConflictError) throw err;
      return { kind: 'failure', fn: this.fn, reason: explainError(err) };
    }
  }
}

// ---------------------------------------------------------------------------
// ParallelClosureBuilder
// ---------------------------------------------------------------------------

/**
 * Runs ClosureJobs with at most `concurrency` in flight.
 *
 * With a concurrency of 1 the jobs run one after another. Results are
 * returned in the same order as the input list.
 */
export class ParallelClosureBuilder {
  private readonly source: DecompilerSource;
  private readonly concurrency: number;
  private readonly logger: Logger | null;

  constructor(source: DecompilerSource, concurrency = 1, logger?: Logger) {
    this.source = source;
    this.concurrency = Math.max(1, Math.floor(concurrency));
    this.logger = logger ?? null;
  }

  async buildAll(
    functions: readonly FunctionInfo[], selectedNames: ReadonlySet<string>, opts: ClosureOptions
  ): Promise<ClosureResult[]> {
    if (functions.length === 0) return [];
    const results: ClosureResult[] = new Array<ClosureResult>(functions.length);
    const jobs = functions.map((fn, index) => ({
      index, fn, job: new ClosureJob(this.source, fn, selectedNames, opts),
    }));

    if (this.concurrency <= 1) {
      for (const { index, fn, job } of jobs) {
        this.logger?.debug(`Decompiling ${fn.name}`);
        results[index] = await job.run();
      }
      return results;
    }

    let running = 0;
    const waiting: Array<() => void> = [];

    const acquireSlot = (): Promise<void> => {
      if (running < this.concurrency) {
        running++;
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => {
        waiting.push(resolve);
      });
    };

    const releaseSlot = (): void => {
      const next = waiting.shift();
      if (next !== undefined) next(); // Slot passes straight to the next job
      else running--;
    };

    const promises = jobs.map(async ({ index, fn, job }) => {
      await acquireSlot();
      try {
        this.logger?.debug(`Decompiling ${fn.name}`);
        results[index] = await job.run();
      } finally {
        releaseSlot();
      }
    });

    await Promise.all(promises);
    return results;
  }
}
