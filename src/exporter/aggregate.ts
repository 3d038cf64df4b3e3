/**
 * @file aggregate.ts
 * @description Merging per-function declaration sets into the model the
 * renderer prints.
 */

import type { Logger } from '../util/log.js';
import {
  type ConflictPolicy,
  DeclarationSet,
  type EquateEntry,
  type ExportWarning,
  type FunctionDeclEntry,
  type GlobalEntry,
} from './declset.js';
import { type ClosureResult, ParallelClosureBuilder } from './parallel.js';
import type { DecompilationRecord, DecompilerSource, FunctionInfo } from './record.js';
import { addEquate, addFunctionDecl, addGlobal } from './symclosure.js';
import type { Datatype } from './type.js';

export interface AggregateOptions {
  includeGlobals: boolean;
  policy: ConflictPolicy;
  concurrency: number;
  logger?: Logger;
}

/** An entry of the implementations section, in selection order */
export type Implementation =
  | { readonly kind: 'body'; readonly fn: FunctionInfo; readonly record: DecompilationRecord }
  | { readonly kind: 'failure'; readonly fn: FunctionInfo; readonly reason: string };

/**
 * Everything the selected functions need, deduplicated, in order of first
 * discovery. Read-only once built.
 */
export interface AggregatedModel {
  readonly types: readonly Datatype[];
  readonly globals: readonly GlobalEntry[];
  readonly calledFunctions: readonly FunctionDeclEntry[];
  readonly equates: readonly EquateEntry[];
  readonly implementations: readonly Implementation[];
  readonly warnings: readonly ExportWarning[];
}

/** Warnings that repeat identically for every function sharing a type or callee */
function isSharedWarning(w: ExportWarning): boolean {
  return w.kind === 'opaque-type' || w.kind === 'missing-signature';
}

/**
 * Merge one function's declaration set into the accumulated set.
 *
 * Entries new to `target` are appended in `src` order. Entries already present
 * are checked for conflicts against the first one seen.
 */
export function mergeDeclarations(target: DeclarationSet, src: DeclarationSet, seen: Set<string>): void {
  target.origin = src.origin;
  for (const w of src.warnings) {
    if (isSharedWarning(w)) {
      const key = `${w.kind}\u0000${w.subject}\u0000${w.message}`;
      if (seen.has(key)) continue;
      seen.add(key);
    }
    target.warnings.push(w);
  }
  for (const [identity, entry] of src.types) {
    const prev = target.types.get(identity);
    if (prev === undefined) {
      target.types.set(identity, { identity, type: entry.type, state: 'closed' });
    } else if (prev.type !== entry.type && prev.type.getShape() !== entry.type.getShape()) {
      target.conflict('type-conflict', identity,
        `Conflicting definitions of ${identity}; keeping the first one seen`);
    }
  }
  for (const entry of src.globals.values()) addGlobal(target, entry);
  for (const entry of src.calledFunctions.values()) addFunctionDecl(target, entry);
  for (const entry of src.equates.values()) addEquate(target, entry);
  for (const entry of src.selectedCalls.values()) {
    if (!target.selectedCalls.has(entry.name)) target.selectedCalls.set(entry.name, entry);
  }
  target.origin = undefined;
}

/**
 * Fold the position-ordered closure results into one model.
 */
export function aggregateResults(results: readonly ClosureResult[], policy: ConflictPolicy): AggregatedModel {
  const acc = new DeclarationSet(policy);
  const seen = new Set<string>();
  const implementations: Implementation[] = [];
  for (const res of results) {
    if (res.kind === 'failure') {
      acc.origin = res.fn.name;
      acc.warn('decompile-failure', res.fn.name, `Unable to decompile '${res.fn.name}': ${res.reason}`);
      acc.origin = undefined;
      implementations.push({ kind: 'failure', fn: res.fn, reason: res.reason });
      continue;
    }
    mergeDeclarations(acc, res.decls, seen);
    implementations.push({ kind: 'body', fn: res.fn, record: res.record });
  }
  // A selected function without a body is declared the way its callers saw it
  for (const impl of implementations) {
    if (impl.kind !== 'failure') continue;
    const decl = acc.selectedCalls.get(impl.fn.name);
    if (decl !== undefined) addFunctionDecl(acc, decl);
  }
  return {
    types: acc.typeList(),
    globals: [...acc.globals.values()],
    calledFunctions: [...acc.calledFunctions.values()],
    equates: [...acc.equates.values()],
    implementations,
    warnings: acc.warnings,
  };
}

/**
 * Decompile the selected functions, close each one, and merge the closures
 * in selection order.
 * @throws ConflictError under the strict conflict policy
 */
export async function aggregate(
  source: DecompilerSource, selected: readonly FunctionInfo[], opts: AggregateOptions
): Promise<AggregatedModel> {
  const selectedNames = new Set(selected.map((fn) => fn.name));
  const builder = new ParallelClosureBuilder(source, opts.concurrency, opts.logger);
  const results = await builder.buildAll(selected, selectedNames,
    { includeGlobals: opts.includeGlobals, policy: opts.policy });
  return aggregateResults(results, opts.policy);
}
