/**
 * @file record.ts
 * @description The data exchanged with the decompiler: the function universe,
 * per-function decompilation records and decompilation failures.
 *
 * Everything here is plain data. Records are produced once by the decompiler
 * and never modified afterwards.
 */

import type { Datatype, TypeCode } from './type.js';

/** One function of the program as listed by the decompiler */
export interface FunctionInfo {
  /** Stable identifier, the entry address as hex when there is one */
  readonly id: string;
  readonly name: string;
  readonly address?: bigint;
  readonly tags: readonly string[];
}

/** How a referenced global symbol is stored */
export type GlobalStorage = 'data' | 'function';

/** A global symbol referenced by a function body */
export interface GlobalRef {
  readonly name: string;
  readonly type: Datatype;
  readonly address?: bigint;
  readonly isConst?: boolean;
  readonly isVolatile?: boolean;
  /**
   * `function` marks a function symbol referenced by address; it is declared
   * through a prototype rather than as a variable
   */
  readonly storage: GlobalStorage;
}

/** A function called directly by a function body */
export interface CalledFunctionRef {
  readonly name: string;
  readonly address?: bigint;
  /** Rendered signature, absent when the decompiler could not produce one */
  readonly signature?: string;
  readonly prototype?: TypeCode;
}

/** A named integer constant used by a function body */
export interface EquateRef {
  readonly name: string;
  readonly value: bigint;
}

/**
 * The decompiler's structured result for one function.
 */
export interface DecompilationRecord {
  readonly kind: 'record';
  readonly id: string;
  readonly name: string;
  readonly address?: bigint;
  /** Rendered signature, e.g. `int main(int argc,char **argv)` */
  readonly signature: string;
  /** Rendered definition text including the signature line */
  readonly body: string;
  readonly prototype?: TypeCode;
  /** Data-types in the order the renderer met them, casts included */
  readonly typeRefs: readonly Datatype[];
  readonly globals: readonly GlobalRef[];
  readonly calls: readonly CalledFunctionRef[];
  readonly equates: readonly EquateRef[];
}

export interface DecompilationFailure {
  readonly kind: 'failure';
  readonly id: string;
  readonly reason: string;
}

export type DecompileOutcome = DecompilationRecord | DecompilationFailure;

/**
 * The decompiler collaborator.
 *
 * `decompile` may finish synchronously or return a promise; a thrown error is
 * treated the same as a returned failure.
 */
export interface DecompilerSource {
  listFunctions(): readonly FunctionInfo[];
  decompile(id: string): DecompileOutcome | Promise<DecompileOutcome>;
}

/** Build a record, filling the optional reference lists */
export function makeRecord(
  fields: Omit<DecompilationRecord, 'kind' | 'typeRefs' | 'globals' | 'calls' | 'equates'> &
    Partial<Pick<DecompilationRecord, 'typeRefs' | 'globals' | 'calls' | 'equates'>>
): DecompilationRecord {
  return {
    kind: 'record',
    typeRefs: [],
    globals: [],
    calls: [],
    equates: [],
    ...fields,
  };
}

export function makeFailure(id: string, reason: string): DecompilationFailure {
  return { kind: 'failure', id, reason };
}

/** Add the trailing semicolon a declaration needs */
export function asDeclaration(signature: string): string {
  const sig = signature.trim();
  return sig.endsWith(';') ? sig : sig + ';';
}

/** Remove the trailing semicolon of a declaration */
export function withoutSemicolon(declaration: string): string {
  return declaration.endsWith(';') ? declaration.slice(0, -1) : declaration;
}

/**
 * Collapse whitespace and drop parameter names, so that cosmetic differences
 * are not conflicts: `int  f( char * s )` becomes `int f(char*);`.
 */
export function normalizeSignature(signature: string): string {
  const sig = asDeclaration(signature).replace(/\s+/g, ' ').replace(/\s*([(),*[\]])\s*/g, '$1');
  const start = sig.search(/[\w]\(/);
  if (start < 0) return sig;
  const open = start + 1;
  const close = matchingParen(sig, open);
  if (close < 0) return sig;
  const params = splitParams(sig.substring(open + 1, close)).map(stripParamName);
  return `${sig.substring(0, open + 1)}${params.join(',')}${sig.substring(close)}`;
}

const QUALIFIERS = new Set(['const', 'volatile', 'restrict']);

const TYPE_WORDS = new Set([
  'void', 'char', 'short', 'int', 'long', 'float', 'double', 'signed', 'unsigned', '_Bool', 'bool',
  'const', 'volatile', 'restrict', 'struct', 'union', 'enum',
]);

function matchingParen(text: string, open: number): number {
  let depth = 0;
  for (let i = open; i < text.length; ++i) {
    if (text[i] === '(') ++depth;
    else if (text[i] === ')' && --depth === 0) return i;
  }
  return -1;
}

/** Split a parameter list at the commas not nested in parentheses */
function splitParams(list: string): string[] {
  const res: string[] = [];
  let depth = 0;
  let begin = 0;
  for (let i = 0; i < list.length; ++i) {
    const c = list[i];
    if (c === '(' || c === '[') ++depth;
    else if (c === ')' || c === ']') --depth;
    else if (c === ',' && depth === 0) {
      res.push(list.substring(begin, i));
      begin = i + 1;
    }
  }
  res.push(list.substring(begin));
  return res;
}

function stripParamName(param: string): string {
  // Function pointer: void(*cb)(int)
  if (/\(\*+[A-Za-z_]\w*\)/.test(param))
    return param.replace(/\((\*+)[A-Za-z_]\w*\)/, '($1)');
  const m = /^(.*?)([A-Za-z_]\w*)((?:\[[^\]]*\])*)$/.exec(param);
  if (m === null) return param;
  const [, prefix, ident, arrays] = m;
  if (TYPE_WORDS.has(ident)) return param;
  const words = prefix.split(/[\s*]+/).filter((w) => w.length > 0);
  const last = words.length > 0 ? words[words.length - 1] : '';
  if (last === 'struct' || last === 'union' || last === 'enum') return param;
  const namesType = prefix.includes('*') || words.some((w) => !QUALIFIERS.has(w));
  if (!namesType) return param;
  return prefix.trimEnd() + arrays;
}
