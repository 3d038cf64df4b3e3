/**
 * @file symclosure.ts
 * @description Closure over the symbols a function body references: global
 * variables, called functions and named constants.
 */

import type { DeclarationSet, EquateEntry, FunctionDeclEntry, GlobalEntry } from './declset.js';
import { declarePrototype } from './printc.js';
import {
  type CalledFunctionRef,
  type DecompilationRecord,
  type GlobalRef,
  asDeclaration,
  normalizeSignature,
  withoutSemicolon,
} from './record.js';
import { TypeCode } from './type.js';

/** Comment standing in for the prototype of a function with no signature */
export function missingSignatureComment(name: string): string {
  return `/* WARNING: Could not decompile function ${name} */`;
}

export interface SymbolClosureOptions {
  /** Record global variables; function symbols are declared regardless */
  includeGlobals: boolean;
}

/**
 * Add the globals, called functions and equates of one record.
 *
 * Functions in `selectedNames` get their full body elsewhere and are never
 * declared here; neither is a function calling itself.
 */
export function closeSymbols(
  record: DecompilationRecord,
  selectedNames: ReadonlySet<string>,
  acc: DeclarationSet,
  opts: SymbolClosureOptions = { includeGlobals: true }
): void {
  for (const ref of record.globals) {
    if (ref.storage === 'function')
      closeFunctionGlobal(record, ref, selectedNames, acc);
    else if (opts.includeGlobals)
      addGlobal(acc, {
        name: ref.name, type: ref.type, isConst: ref.isConst ?? false, isVolatile: ref.isVolatile ?? false,
      });
  }
  for (const call of record.calls) {
    if (call.name === record.name) continue;
    if (selectedNames.has(call.name))
      recordSelectedCall(call, acc);
    else
      closeCall(call, acc);
  }
  for (const eq of record.equates)
    addEquate(acc, { name: eq.name, value: eq.value });
}

/** Insert a global, keeping the first declaration seen for a name */
export function addGlobal(acc: DeclarationSet, entry: GlobalEntry): void {
  const prev = acc.globals.get(entry.name);
  if (prev === undefined) {
    acc.globals.set(entry.name, entry);
    return;
  }
  if (prev.type.getIdentity() !== entry.type.getIdentity() ||
      prev.isConst !== entry.isConst || prev.isVolatile !== entry.isVolatile) {
    acc.conflict('global-conflict', entry.name,
      `Global ${entry.name} is declared as ${prev.type.getIdentity()} and ${entry.type.getIdentity()}; keeping the first one seen`);
  }
}

/** Insert an equate, keeping the first value seen for a name */
export function addEquate(acc: DeclarationSet, entry: EquateEntry): void {
  const prev = acc.equates.get(entry.name);
  if (prev === undefined) {
    acc.equates.set(entry.name, entry);
  } else if (prev.value !== entry.value) {
    acc.conflict('equate-conflict', entry.name,
      `Equate ${entry.name} has values ${prev.value} and ${entry.value}; keeping the first one seen`);
  }
}

/**
 * A function symbol referenced by address is declared through its prototype.
 */
function closeFunctionGlobal(
  record: DecompilationRecord, ref: GlobalRef, selectedNames: ReadonlySet<string>, acc: DeclarationSet
): void {
  if (ref.name === record.name || selectedNames.has(ref.name)) return;
  if (!(ref.type instanceof TypeCode)) {
    acc.warn('missing-signature', ref.name,
      `Function symbol ${ref.name} has no function type; not declared`);
    return;
  }
  const decl = declarePrototype(ref.name, ref.type);
  addFunctionDecl(acc, {
    name: ref.name, declaration: decl, normalized: normalizeSignature(decl), prototype: ref.type.getShape(),
  });
}

function callSignature(call: CalledFunctionRef): string | undefined {
  if (call.signature !== undefined && call.signature.trim().length !== 0) return call.signature;
  if (call.prototype !== undefined) return declarePrototype(call.name, call.prototype);
  return undefined;
}

/** Remember how a selected callee is declared, without a conflict check */
function recordSelectedCall(call: CalledFunctionRef, acc: DeclarationSet): void {
  if (acc.selectedCalls.has(call.name)) return;
  const signature = callSignature(call);
  if (signature === undefined) return;
  const decl = asDeclaration(signature);
  acc.selectedCalls.set(call.name, {
    name: call.name, declaration: decl, normalized: normalizeSignature(decl), prototype: call.prototype?.getShape(),
  });
}

function closeCall(call: CalledFunctionRef, acc: DeclarationSet): void {
  const signature = callSignature(call);
  if (signature === undefined) {
    if (acc.calledFunctions.has(call.name)) return;
    acc.warn('missing-signature', call.name, `No signature for called function ${call.name}`);
    const comment = missingSignatureComment(call.name);
    acc.calledFunctions.set(call.name, { name: call.name, declaration: comment, normalized: '' });
    return;
  }
  const decl = asDeclaration(signature);
  addFunctionDecl(acc, {
    name: call.name, declaration: decl, normalized: normalizeSignature(decl), prototype: call.prototype?.getShape(),
  });
}

/**
 * Insert a declaration, keeping the first one seen for a name. A comment
 * placeholder is replaced once a real signature turns up.
 */
export function addFunctionDecl(acc: DeclarationSet, entry: FunctionDeclEntry): void {
  const prev = acc.calledFunctions.get(entry.name);
  if (prev === undefined || (prev.normalized.length === 0 && entry.normalized.length !== 0)) {
    acc.calledFunctions.set(entry.name, entry);
    return;
  }
  if (entry.normalized.length === 0 || sameSignature(prev, entry)) return;
  acc.conflict('function-conflict', entry.name,
    `Conflicting signatures for ${entry.name}: ${withoutSemicolon(prev.declaration)} and ` +
    `${withoutSemicolon(entry.declaration)}; keeping the first one seen`);
}

/** Prototypes decide where both sides have one; parameter names never matter */
function sameSignature(a: FunctionDeclEntry, b: FunctionDeclEntry): boolean {
  if (a.prototype !== undefined && b.prototype !== undefined) return a.prototype === b.prototype;
  return a.normalized === b.normalized;
}
