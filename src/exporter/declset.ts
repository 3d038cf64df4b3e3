/**
 * @file declset.ts
 * @description The declaration set: everything a group of functions needs
 * declared, keyed by identity, plus the warnings raised while building it.
 */

import { ConflictError } from '../core/error.js';
import type { Datatype } from './type.js';

// ---------------------------------------------------------------------------
// Warnings
// ---------------------------------------------------------------------------

export type WarningKind =
  | 'type-conflict'
  | 'global-conflict'
  | 'function-conflict'
  | 'equate-conflict'
  | 'opaque-type'
  | 'missing-signature'
  | 'decompile-failure'
  | 'selection';

/** A problem that was absorbed rather than aborting the run */
export interface ExportWarning {
  readonly kind: WarningKind;
  /** Identity, symbol name or function the warning is about */
  readonly subject: string;
  readonly message: string;
  /** The selected function whose closure raised the warning */
  readonly origin?: string;
}

/**
 * What to do when two incompatible shapes share an identity.
 *
 * `first-seen` keeps the first and records a warning; `strict` throws.
 */
export type ConflictPolicy = 'first-seen' | 'strict';

// ---------------------------------------------------------------------------
// Entries
// ---------------------------------------------------------------------------

/**
 * A data-type in the closure. The entry is inserted `open` before the
 * data-type's components are visited and becomes `closed` afterwards.
 */
export interface TypeEntry {
  readonly identity: string;
  readonly type: Datatype;
  state: 'open' | 'closed';
}

export interface GlobalEntry {
  readonly name: string;
  readonly type: Datatype;
  readonly isConst: boolean;
  readonly isVolatile: boolean;
}

export interface FunctionDeclEntry {
  readonly name: string;
  /** Declaration text ending in `;`, or a comment standing in for it */
  readonly declaration: string;
  /** Form without whitespace or parameter names, used to detect conflicts */
  readonly normalized: string;
  /** Structural signature, where the decompiler supplied a prototype */
  readonly prototype?: string;
}

export interface EquateEntry {
  readonly name: string;
  readonly value: bigint;
}

// ---------------------------------------------------------------------------
// DeclarationSet
// ---------------------------------------------------------------------------

/**
 * Disjoint mappings from identity to declaration.
 *
 * Each mapping holds at most one entry per key and iterates in insertion
 * order, which is the order of first discovery.
 */
export class DeclarationSet {
  readonly types = new Map<string, TypeEntry>();
  readonly globals = new Map<string, GlobalEntry>();
  readonly calledFunctions = new Map<string, FunctionDeclEntry>();
  readonly equates = new Map<string, EquateEntry>();
  /** Declarations of selected callees, used only if their body is missing */
  readonly selectedCalls = new Map<string, FunctionDeclEntry>();
  readonly warnings: ExportWarning[] = [];
  readonly policy: ConflictPolicy;
  /** Function currently being closed, attached to warnings */
  origin: string | undefined;

  constructor(policy: ConflictPolicy = 'first-seen', origin?: string) {
    this.policy = policy;
    this.origin = origin;
  }

  warn(kind: WarningKind, subject: string, message: string): void {
    this.warnings.push(this.origin === undefined
      ? { kind, subject, message }
      : { kind, subject, message, origin: this.origin });
  }

  /**
   * Report two incompatible shapes for one identity.
   * @throws ConflictError under the strict policy
   */
  conflict(kind: WarningKind, subject: string, message: string): void {
    if (this.policy === 'strict')
      throw new ConflictError(subject, message);
    this.warn(kind, subject, message);
  }

  /** Ordered list of the data-types in the closure */
  typeList(): Datatype[] {
    return [...this.types.values()].map((e) => e.type);
  }
}
