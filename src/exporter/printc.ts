/**
 * @file printc.ts
 * @description Printing of C declarations: declarators for variables and
 * prototypes, and type definitions in an order a C compiler accepts.
 */

import { LowlevelError } from '../core/error.js';
import type { Writer } from '../util/writer.js';
import {
  type Datatype,
  TypeArray,
  TypeCode,
  TypeComposite,
  TypeEnum,
  TypeOpaque,
  TypePointer,
  TypePrimitive,
  TypeTypedef,
  preambleTypes,
} from './type.js';

// ---------------------------------------------------------------------------
// Declarators
// ---------------------------------------------------------------------------

/**
 * Print a declaration of `inner` with the given data-type.
 *
 * Named data-types print as their name (composites are referred to through
 * the typedef that forward declares them). Pointers to arrays and functions
 * get the parentheses C requires, so `declare(ptr(int[4]), "p")` is
 * `int (*p)[4]`. An empty `inner` prints an abstract declarator, as used in
 * parameter lists and casts.
 */
export function declare(ct: Datatype, inner: string): string {
  return declareWithin(ct, inner, new Set());
}

function declareWithin(ct: Datatype, inner: string, visiting: Set<Datatype>): string {
  if (ct.isNamed())
    return inner.length === 0 ? ct.getName() : `${ct.getName()} ${inner}`;
  if (visiting.has(ct)) {
    // A cycle through nothing but anonymous pointers and signatures
    return inner.length === 0 ? 'void *' : `void *${inner}`;
  }
  visiting.add(ct);
  let res: string;
  if (ct instanceof TypePointer) {
    const to = ct.getPtrTo();
    let decl = '*' + inner;
    if (!to.isNamed() && (to instanceof TypeArray || to instanceof TypeCode))
      decl = `(${decl})`;
    res = declareWithin(to, decl, visiting);
  } else if (ct instanceof TypeArray) {
    res = declareWithin(ct.getBase(), `${inner}[${ct.numElements()}]`, visiting);
  } else if (ct instanceof TypeCode) {
    res = declareWithin(ct.getReturnType(), `${inner}(${paramList(ct, visiting)})`, visiting);
  } else {
    throw new LowlevelError(`Cannot declare data-type ${ct.printRaw()}`);
  }
  visiting.delete(ct);
  return res;
}

function paramList(ct: TypeCode, visiting: Set<Datatype>): string {
  const params = ct.getParams().map((p) => declareWithin(p, '', visiting));
  if (ct.isVarargs()) {
    if (params.length === 0) return '...';
    params.push('...');
  }
  if (params.length === 0) return 'void';
  return params.join(', ');
}

/** Type qualifiers applying to a declared variable */
export interface Qualifiers {
  isConst?: boolean;
  isVolatile?: boolean;
}

function qualifierText(q: Qualifiers): string {
  const res: string[] = [];
  if (q.isConst) res.push('const');
  if (q.isVolatile) res.push('volatile');
  return res.join(' ');
}

/**
 * Print a variable declaration (without the trailing semicolon).
 *
 * Qualifiers apply to the variable itself: a constant pointer is printed as
 * `char *const p`, anything else as `const int x`.
 */
export function declareVariable(ct: Datatype, name: string, quals: Qualifiers = {}): string {
  const q = qualifierText(quals);
  if (q.length === 0) return declareStorage(ct, name);
  if (ct instanceof TypePointer) return declare(ct, `${q} ${name}`);
  return `${q} ${declareStorage(ct, name)}`;
}

/** Follow typedefs to the data-type they finally name */
function stripTypedefs(ct: Datatype): Datatype {
  const seen = new Set<Datatype>();
  let cur = ct;
  while (cur instanceof TypeTypedef && cur.numDepend() > 0 && !seen.has(cur)) {
    seen.add(cur);
    cur = cur.getAlias();
  }
  return cur;
}

/** Data-types that cannot be stored by value, directly or through typedefs */
function isVoidLike(ct: Datatype): boolean {
  const res = stripTypedefs(ct);
  return res instanceof TypeOpaque || (res instanceof TypePrimitive && res.getFlavor() === 'void');
}

/**
 * Print the declarator for a variable or field. Opaque and void data-types,
 * also when reached through a typedef, become a byte array of the same size.
 */
export function declareStorage(ct: Datatype, name: string): string {
  if (isVoidLike(ct))
    return `unsigned char ${name}[${Math.max(ct.getSize(), 1)}]`;
  if (ct instanceof TypeCode)
    return declare(ct, ct.isNamed() ? `*${name}` : `(*${name})`);
  return declare(ct, name);
}

/**
 * Print a prototype declaration for a function with the given signature.
 */
export function declarePrototype(name: string, proto: TypeCode): string {
  return `${declare(proto.getReturnType(), `${name}(${paramList(proto, new Set([proto]))})`)};`;
}

// ---------------------------------------------------------------------------
// Dependency order
// ---------------------------------------------------------------------------

/** Data-types whose definition is emitted after the forward declarations */
function isOrdered(ct: Datatype): boolean {
  if (ct instanceof TypeTypedef) return true;
  if (ct instanceof TypeCode) return ct.isNamed();
  if (ct instanceof TypeComposite) return hasBody(ct);
  return false;
}

/** A composite with no fields and no size stays an incomplete type */
function hasBody(ct: TypeComposite): boolean {
  return ct.numFields() > 0 || ct.getSize() > 0;
}

/**
 * Collect the definitions `ct` needs in front of it.
 *
 * A typedef or named signature must be declared before its name is used. A
 * composite must be complete only where it is stored by value (directly, as
 * an array element, or through a typedef); behind a pointer or inside a
 * prototype its forward declaration is enough.
 */
function collectDepends(ct: Datatype, needComplete: boolean, out: Datatype[], visiting: Set<Datatype>): void {
  if (visiting.has(ct)) return;
  visiting.add(ct);
  if (ct instanceof TypeComposite) {
    if (needComplete && hasBody(ct)) out.push(ct);
  } else if (ct instanceof TypeTypedef) {
    out.push(ct);
    if (needComplete) collectDepends(ct.getAlias(), true, out, visiting);
  } else if (ct instanceof TypeCode) {
    if (ct.isNamed()) {
      out.push(ct);
    } else {
      collectDepends(ct.getReturnType(), false, out, visiting);
      for (const p of ct.getParams()) collectDepends(p, false, out, visiting);
    }
  } else if (ct instanceof TypePointer) {
    collectDepends(ct.getPtrTo(), false, out, visiting);
  } else if (ct instanceof TypeArray) {
    collectDepends(ct.getBase(), needComplete, out, visiting);
  }
  visiting.delete(ct);
}

/** The definitions that must precede the definition of `ct` */
export function definitionDepends(ct: Datatype): Datatype[] {
  const out: Datatype[] = [];
  const visiting = new Set<Datatype>([ct]);
  if (ct instanceof TypeComposite) {
    for (const fld of ct.getFields()) collectDepends(fld.type, true, out, visiting);
  } else if (ct instanceof TypeTypedef) {
    collectDepends(ct.getAlias(), false, out, visiting);
  } else if (ct instanceof TypeCode) {
    collectDepends(ct.getReturnType(), false, out, visiting);
    for (const p of ct.getParams()) collectDepends(p, false, out, visiting);
  }
  return out;
}

/**
 * Write out dependency list recursively.
 */
function orderRecurse(deporder: Datatype[], mark: Set<Datatype>, ct: Datatype): void {
  if (mark.has(ct)) return; // Already inserted before
  mark.add(ct);
  for (const dep of definitionDepends(ct))
    orderRecurse(deporder, mark, dep);
  deporder.push(ct);
}

/**
 * Place the typedefs, named signatures and composite bodies of a closure in
 * an order such that if the definition of "a" depends on the definition of
 * "b", then "b" occurs earlier. Otherwise discovery order is kept.
 */
export function dependentOrder(types: readonly Datatype[]): Datatype[] {
  const deporder: Datatype[] = [];
  const mark = new Set<Datatype>();
  for (const ct of types) {
    if (isOrdered(ct)) orderRecurse(deporder, mark, ct);
  }
  return deporder;
}

// ---------------------------------------------------------------------------
// Equates
// ---------------------------------------------------------------------------

/** Small values print in decimal, everything else in hex */
export function formatEquateValue(val: bigint): string {
  if (val < 0n) return '-' + formatEquateValue(-val);
  if (val < 10n) return val.toString(10);
  return '0x' + val.toString(16);
}

// ---------------------------------------------------------------------------
// PrintC
// ---------------------------------------------------------------------------

export interface PrintCOptions {
  /** Spaces per indent level inside type bodies */
  indent: number;
  /** Line terminator */
  eol: string;
}

export const DEFAULT_PRINTC_OPTIONS: PrintCOptions = { indent: 4, eol: '\n' };

/**
 * Emits C type definitions and declarations to a Writer.
 */
export class PrintC {
  private readonly out: Writer;
  private readonly opts: PrintCOptions;

  constructor(out: Writer, opts: Partial<PrintCOptions> = {}) {
    this.out = out;
    this.opts = { ...DEFAULT_PRINTC_OPTIONS, ...opts };
  }

  private line(s: string): void {
    this.out.write(s + this.opts.eol);
  }

  private blank(): void {
    this.out.write(this.opts.eol);
  }

  private indent(): string {
    return ' '.repeat(this.opts.indent);
  }

  /**
   * Emit the fixed definitions of the decompiler's builtin stand-ins.
   */
  emitPreamble(): void {
    const pre = preambleTypes();
    const groups: string[][] = [[], [], [], [], []];
    for (const p of pre) {
      const decl = `typedef ${p.ctype} ${p.name};`;
      if (p.name.startsWith('unkbyte')) groups[0].push(decl);
      else if (p.name.startsWith('unkuint')) groups[1].push(decl);
      else if (p.name.startsWith('unkint')) groups[2].push(decl);
      else if (p.name.startsWith('unkfloat')) groups[3].push(decl);
      else groups[4].push(decl);
    }
    for (const grp of groups) {
      for (const decl of grp) this.line(decl);
      this.blank();
    }
    this.line('// C99 lacks bool, define it as byte for C-only output');
    this.line('#if !defined(__cplusplus) && !defined(NO_BOOL)');
    this.line('typedef unsigned char bool;');
    this.line('#endif');
    this.blank();
  }

  /** typedef for a decompiler specific primitive name */
  emitPrimitiveTypedef(ct: TypePrimitive): void {
    const approx = ct.getCTypeApproximation();
    const sep = approx.endsWith('*') ? '' : ' ';
    this.line(`typedef ${approx}${sep}${ct.getName()};`);
  }

  /** Forward declare a composite and make its tag usable as a plain name */
  emitForwardDeclaration(ct: TypeComposite): void {
    this.line(`typedef ${ct.getKeyword()} ${ct.getName()} ${ct.getName()};`);
  }

  emitOpaqueDefinition(ct: TypeOpaque): void {
    this.line(`typedef void ${ct.getName()};`);
  }

  emitEnumDefinition(ct: TypeEnum): void {
    const vals = ct.getValues();
    if (vals.length === 0) {
      // An empty enumeration list is not valid C
      this.line(`typedef ${integerTypeForEnum(ct)} ${ct.getName()};`);
      return;
    }
    this.line(`typedef enum ${ct.getName()} {`);
    vals.forEach(([nm, val], i) => {
      const sep = i + 1 < vals.length ? ',' : '';
      this.line(`${this.indent()}${nm}=${val.toString(10)}${sep}`);
    });
    this.line(`} ${ct.getName()};`);
  }

  emitStructDefinition(ct: TypeComposite): void {
    this.line(`${ct.getKeyword()} ${ct.getName()} {`);
    if (ct.numFields() === 0) {
      this.line(`${this.indent()}unsigned char _opaque[${Math.max(ct.getSize(), 1)}];`);
    }
    for (const fld of ct.getFields())
      this.line(`${this.indent()}${declareStorage(fld.type, fld.name)};`);
    this.line('};');
  }

  emitTypedefDefinition(ct: TypeTypedef): void {
    this.line(`typedef ${declare(ct.getAlias(), ct.getName())};`);
  }

  /** A named signature becomes a typedef of function type */
  emitCodeDefinition(ct: TypeCode): void {
    this.line(`typedef ${declarePrototype(ct.getName(), ct)}`);
  }

  /**
   * Emit a definition after forward declarations, dispatching on kind.
   */
  protected emitTypeDefinition(ct: Datatype): void {
    if (ct instanceof TypeComposite)
      this.emitStructDefinition(ct);
    else if (ct instanceof TypeTypedef)
      this.emitTypedefDefinition(ct);
    else if (ct instanceof TypeCode)
      this.emitCodeDefinition(ct);
    else
      throw new LowlevelError(`Unsupported type definition: ${ct.printRaw()}`);
  }

  /**
   * Emit the definitions of every data-type in the closure.
   *
   * Layout: preamble, typedefs for decompiler primitive names, a forward
   * declaration for every composite, enumerations, opaque placeholders, then
   * typedefs, named signatures and composite bodies in dependency order.
   * Forward declaring every composite up front lets structures point at each
   * other in any order.
   */
  docTypeDefinitions(types: readonly Datatype[]): void {
    this.emitPreamble();

    const prims = types.filter((ct): ct is TypePrimitive =>
      ct instanceof TypePrimitive && !ct.isNative() && !ct.isPreamble());
    for (const ct of prims) this.emitPrimitiveTypedef(ct);
    if (prims.length > 0) this.blank();

    const composites = types.filter((ct): ct is TypeComposite => ct instanceof TypeComposite);
    for (const ct of composites) this.emitForwardDeclaration(ct);
    if (composites.length > 0) this.blank();

    const enums = types.filter((ct): ct is TypeEnum => ct instanceof TypeEnum);
    for (const ct of enums) {
      this.emitEnumDefinition(ct);
      this.blank();
    }

    const opaques = types.filter((ct): ct is TypeOpaque => ct instanceof TypeOpaque);
    for (const ct of opaques) this.emitOpaqueDefinition(ct);
    if (opaques.length > 0) this.blank();

    for (const ct of dependentOrder(types)) {
      this.emitTypeDefinition(ct);
      this.blank();
    }
  }
}

function integerTypeForEnum(ct: TypeEnum): string {
  switch (ct.getSize()) {
    case 1: return 'unsigned char';
    case 2: return 'unsigned short';
    case 8: return 'unsigned long long';
    default: return 'unsigned int';
  }
}
