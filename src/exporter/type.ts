/**
 * @file type.ts
 * @description Classes describing the data-types referenced by decompiled
 * functions, their structural identity, and the factory that interns them.
 */

import { readFileSync } from 'fs';
import { DecoderError, LowlevelError } from '../core/error.js';

// =========================================================================
// Enums
// =========================================================================

/**
 * The meta-types making up the type algebra.
 */
export enum type_metatype {
  TYPE_PRIMITIVE = 0,
  TYPE_PTR = 1,
  TYPE_ARRAY = 2,
  TYPE_TYPEDEF = 3,
  TYPE_STRUCT = 4,
  TYPE_UNION = 5,
  TYPE_CODE = 6,
  TYPE_ENUM = 7,
  TYPE_OPAQUE = 8,
}

/** How a primitive is approximated by a C integer/float type */
export type PrimitiveFlavor =
  | 'void'
  | 'char'
  | 'signed'
  | 'unsigned'
  | 'bool'
  | 'float'
  | 'pointer'
  | 'unknown';

const PRIMITIVE_FLAVORS: readonly PrimitiveFlavor[] = [
  'void', 'char', 'signed', 'unsigned', 'bool', 'float', 'pointer', 'unknown',
];

export function isPrimitiveFlavor(s: string): s is PrimitiveFlavor {
  return (PRIMITIVE_FLAVORS as readonly string[]).includes(s);
}

/** Identity placeholder for a cycle that passes through no named data-type */
export const RECURSIVE_IDENTITY = '@recursive';

// =========================================================================
// Datatype base
// =========================================================================

/**
 * The base data-type class.
 *
 * Data-types form a possibly cyclic graph. Named data-types (primitives,
 * typedefs, composites, enums, opaque types and named function definitions)
 * are identified by kind and name. Derived data-types (pointers, arrays and
 * anonymous function signatures) are identified by the identity of the
 * data-types they are built from.
 */
export abstract class Datatype {
  protected readonly metatype: type_metatype;
  protected readonly name: string;
  protected size: number;
  private cachedIdentity: string | null = null;

  constructor(metatype: type_metatype, name: string, size: number) {
    this.metatype = metatype;
    this.name = name;
    this.size = size;
  }

  /** Name used in C declarations, empty for derived data-types */
  getName(): string { return this.name; }

  getSize(): number { return this.size; }

  /** Does this data-type have a name that stops identity recursion */
  isNamed(): boolean { return this.name.length !== 0; }

  isComposite(): this is TypeComposite {
    return this.metatype === type_metatype.TYPE_STRUCT || this.metatype === type_metatype.TYPE_UNION;
  }

  /** Return the number of component data-types this is built from */
  numDepend(): number { return 0; }

  /** Return the i-th component data-type */
  getDepend(index: number): Datatype {
    throw new LowlevelError(`Data-type ${this.getIdentity()} has no component ${index}`);
  }

  /**
   * Get the structural identity of this data-type.
   *
   * Two data-types with the same identity denote the same C type and collapse
   * to a single declaration.
   */
  getIdentity(): string {
    if (this.cachedIdentity === null) {
      this.cachedIdentity = this.isNamed() ? this.namedIdentity() : this.buildIdentity(new Set([this]));
    }
    return this.cachedIdentity;
  }

  /** @internal */
  identityWithin(visiting: Set<Datatype>): string {
    if (this.isNamed()) return this.namedIdentity();
    if (this.cachedIdentity !== null) return this.cachedIdentity;
    if (visiting.has(this)) return RECURSIVE_IDENTITY;
    visiting.add(this);
    const res = this.buildIdentity(visiting);
    visiting.delete(this);
    return res;
  }

  /** Identity of a named data-type */
  protected namedIdentity(): string { return this.name; }

  /** Compute the identity, recursing through derived components */
  protected buildIdentity(_visiting: Set<Datatype>): string {
    return this.namedIdentity();
  }

  /**
   * A description of the definition of this data-type.
   *
   * Two data-types with the same identity but different shapes are
   * conflicting definitions of one name.
   */
  getShape(): string { return this.getIdentity(); }

  /** Display form used in log messages */
  printRaw(): string { return this.getIdentity(); }
}

// =========================================================================
// TypePrimitive
// =========================================================================

/**
 * A base integer, float, character or void data-type, either a C keyword type
 * or a decompiler specific name such as `undefined4` or `uint`.
 */
export class TypePrimitive extends Datatype {
  private readonly flavor: PrimitiveFlavor;
  private readonly native: boolean;
  private readonly preamble: boolean;

  constructor(name: string, size: number, flavor: PrimitiveFlavor, native = false, preamble = false) {
    super(type_metatype.TYPE_PRIMITIVE, name, size);
    this.flavor = flavor;
    this.native = native;
    this.preamble = preamble;
  }

  getFlavor(): PrimitiveFlavor { return this.flavor; }

  /** Is this a C keyword type needing no declaration */
  isNative(): boolean { return this.native; }

  /** Is this declared by the fixed builtin preamble */
  isPreamble(): boolean { return this.preamble; }

  /**
   * Get the C type used to typedef this name into existence.
   */
  getCTypeApproximation(): string {
    switch (this.flavor) {
      case 'void':
        return 'void';
      case 'pointer':
        return 'void *';
      case 'bool':
        return 'unsigned char';
      case 'float':
        if (this.size <= 4) return 'float';
        if (this.size <= 8) return 'double';
        return 'long double';
      case 'signed':
      case 'char':
        return integerCTypeApproximation(this.size, true);
      case 'unsigned':
      case 'unknown':
        return integerCTypeApproximation(this.size, false);
    }
  }

  getShape(): string {
    return `${this.name}/${this.size}/${this.flavor}`;
  }
}

/**
 * Get the C integer type closest to (and at least as big as) the given size.
 * Sizes bigger than 8 bytes fall back to `long long`.
 */
export function integerCTypeApproximation(size: number, signed: boolean): string {
  let base: string;
  if (size <= 1) base = 'char';
  else if (size <= 2) base = 'short';
  else if (size <= 4) base = 'int';
  else base = 'long long';
  return signed ? base : 'unsigned ' + base;
}

// =========================================================================
// TypePointer
// =========================================================================

export class TypePointer extends Datatype {
  private readonly ptrto: Datatype;

  constructor(ptrto: Datatype, size = 8) {
    super(type_metatype.TYPE_PTR, '', size);
    this.ptrto = ptrto;
  }

  getPtrTo(): Datatype { return this.ptrto; }

  numDepend(): number { return 1; }

  getDepend(_index: number): Datatype { return this.ptrto; }

  protected buildIdentity(visiting: Set<Datatype>): string {
    return this.ptrto.identityWithin(visiting) + ' *';
  }
}

// =========================================================================
// TypeArray
// =========================================================================

export class TypeArray extends Datatype {
  private readonly arrayof: Datatype;
  private readonly arraysize: number;

  constructor(arrayof: Datatype, length: number) {
    super(type_metatype.TYPE_ARRAY, '', 0);
    this.arrayof = arrayof;
    this.arraysize = length;
  }

  /** Element size can change while a composite element is still being filled in */
  getSize(): number { return this.arrayof.getSize() * this.arraysize; }

  getBase(): Datatype { return this.arrayof; }

  /** Number of elements */
  numElements(): number { return this.arraysize; }

  numDepend(): number { return 1; }

  getDepend(_index: number): Datatype { return this.arrayof; }

  protected buildIdentity(visiting: Set<Datatype>): string {
    return `${this.arrayof.identityWithin(visiting)}[${this.arraysize}]`;
  }
}

// =========================================================================
// TypeTypedef
// =========================================================================

export class TypeTypedef extends Datatype {
  private aliasOf: Datatype | null = null;

  constructor(name: string) {
    super(type_metatype.TYPE_TYPEDEF, name, 0);
  }

  /** Set the aliased data-type; may be called after construction to close cycles */
  setAlias(ct: Datatype): void {
    this.aliasOf = ct;
    this.size = ct.getSize();
  }

  getAlias(): Datatype {
    if (this.aliasOf === null)
      throw new LowlevelError(`Typedef ${this.name} has no aliased type`);
    return this.aliasOf;
  }

  numDepend(): number { return this.aliasOf === null ? 0 : 1; }

  getDepend(_index: number): Datatype { return this.getAlias(); }

  protected namedIdentity(): string { return 'typedef ' + this.name; }

  getShape(): string {
    return this.aliasOf === null ? '' : this.aliasOf.getIdentity();
  }
}

// =========================================================================
// TypeComposite (structures and unions)
// =========================================================================

/**
 * A single component of a composite data-type
 */
export class TypeField {
  readonly name: string;
  readonly type: Datatype;
  /** Byte offset within the parent, -1 if unknown */
  readonly offset: number;

  constructor(name: string, type: Datatype, offset = -1) {
    this.name = name;
    this.type = type;
    this.offset = offset;
  }
}

export abstract class TypeComposite extends Datatype {
  protected field: TypeField[] = [];

  constructor(metatype: type_metatype, name: string, size: number) {
    super(metatype, name, size);
    if (name.length === 0)
      throw new LowlevelError('Composite data-types must be named');
  }

  /**
   * Set the fields. Separate from construction so that fields may refer back
   * to this composite.
   */
  setFields(fields: readonly TypeField[], size?: number): void {
    this.field = [...fields];
    if (size !== undefined) this.size = size;
  }

  numFields(): number { return this.field.length; }

  getFields(): readonly TypeField[] { return this.field; }

  numDepend(): number { return this.field.length; }

  getDepend(index: number): Datatype { return this.field[index].type; }

  /** The C keyword introducing this composite */
  abstract getKeyword(): 'struct' | 'union';

  protected namedIdentity(): string { return this.getKeyword() + ' ' + this.name; }

  getShape(): string {
    return this.field.map((f) => `${f.name}:${f.type.getIdentity()}`).join(';');
  }
}

export class TypeStruct extends TypeComposite {
  constructor(name: string, size = 0) {
    super(type_metatype.TYPE_STRUCT, name, size);
  }

  getKeyword(): 'struct' { return 'struct'; }
}

export class TypeUnion extends TypeComposite {
  constructor(name: string, size = 0) {
    super(type_metatype.TYPE_UNION, name, size);
  }

  getKeyword(): 'union' { return 'union'; }
}

// =========================================================================
// TypeEnum
// =========================================================================

export class TypeEnum extends Datatype {
  private readonly namedValues: ReadonlyArray<readonly [string, bigint]>;

  constructor(name: string, size: number, values: ReadonlyArray<readonly [string, bigint]>) {
    super(type_metatype.TYPE_ENUM, name, size);
    if (name.length === 0)
      throw new LowlevelError('Enumerations must be named');
    this.namedValues = values;
  }

  getValues(): ReadonlyArray<readonly [string, bigint]> { return this.namedValues; }

  protected namedIdentity(): string { return 'enum ' + this.name; }

  getShape(): string {
    return this.namedValues.map(([nm, val]) => `${nm}=${val}`).join(';');
  }
}

// =========================================================================
// TypeCode (function signatures)
// =========================================================================

/**
 * A function signature, used for function pointers, named function
 * definitions and the prototypes of decompiled functions.
 */
export class TypeCode extends Datatype {
  private readonly returnType: Datatype;
  private readonly params: readonly Datatype[];
  private readonly varargs: boolean;

  constructor(returnType: Datatype, params: readonly Datatype[], varargs = false, name = '') {
    super(type_metatype.TYPE_CODE, name, 1);
    this.returnType = returnType;
    this.params = params;
    this.varargs = varargs;
  }

  getReturnType(): Datatype { return this.returnType; }

  getParams(): readonly Datatype[] { return this.params; }

  isVarargs(): boolean { return this.varargs; }

  numDepend(): number { return this.params.length + 1; }

  getDepend(index: number): Datatype {
    return index === 0 ? this.returnType : this.params[index - 1];
  }

  protected namedIdentity(): string { return 'fn ' + this.name; }

  protected buildIdentity(visiting: Set<Datatype>): string {
    return this.signatureIdentity(visiting);
  }

  private signatureIdentity(visiting: Set<Datatype>): string {
    const parts = this.params.map((p) => p.identityWithin(visiting));
    if (this.varargs) parts.push('...');
    return `${this.returnType.identityWithin(visiting)}(${parts.join(',')})`;
  }

  getShape(): string {
    return this.signatureIdentity(new Set([this]));
  }
}

// =========================================================================
// TypeOpaque
// =========================================================================

/**
 * A data-type the decompiler could not resolve. Rendered as a void-like
 * stand-in so that code referencing it still compiles.
 */
export class TypeOpaque extends Datatype {
  constructor(name: string, size = 0) {
    super(type_metatype.TYPE_OPAQUE, name, size);
    if (name.length === 0)
      throw new LowlevelError('Opaque data-types must be named');
  }

  protected namedIdentity(): string { return 'opaque ' + this.name; }

  getShape(): string { return String(this.size); }
}

// =========================================================================
// Builtin preamble types
// =========================================================================

/** A builtin stand-in declared by the fixed type preamble */
export interface PreambleType {
  name: string;
  ctype: string;
}

/**
 * The decompiler's builtin stand-ins for odd-sized integers and floats,
 * declared unconditionally at the top of the type definitions.
 */
export function preambleTypes(): PreambleType[] {
  const res: PreambleType[] = [];
  for (let n = 9; n <= 16; ++n)
    res.push({ name: `unkbyte${n}`, ctype: integerCTypeApproximation(n, false) });
  for (let n = 9; n <= 16; ++n)
    res.push({ name: `unkuint${n}`, ctype: integerCTypeApproximation(n, false) });
  for (let n = 9; n <= 16; ++n)
    res.push({ name: `unkint${n}`, ctype: integerCTypeApproximation(n, true) });
  for (const n of [1, 2, 3])
    res.push({ name: `unkfloat${n}`, ctype: 'float' });
  for (const n of [5, 6, 7])
    res.push({ name: `unkfloat${n}`, ctype: 'double' });
  res.push({ name: 'unkfloat9', ctype: 'long double' });
  for (let n = 11; n <= 16; ++n)
    res.push({ name: `unkfloat${n}`, ctype: 'long double' });
  res.push({ name: 'BADSPACEBASE', ctype: 'void' });
  res.push({ name: 'code', ctype: 'void' });
  return res;
}

// =========================================================================
// TypeFactory
// =========================================================================

interface PrimitiveSpec {
  size: number;
  flavor: PrimitiveFlavor;
  native: boolean;
  preamble: boolean;
}

let primitiveTable: Map<string, PrimitiveSpec> | null = null;

function decodePrimitiveTable(text: string): Map<string, PrimitiveSpec> {
  const raw: unknown = JSON.parse(text);
  if (typeof raw !== 'object' || raw === null)
    throw new DecoderError('Primitive table must be a JSON object');
  const res = new Map<string, PrimitiveSpec>();
  for (const [nm, val] of Object.entries(raw)) {
    if (typeof val !== 'object' || val === null)
      throw new DecoderError(`Bad primitive entry: ${nm}`);
    const size: unknown = Reflect.get(val, 'size');
    const flavor: unknown = Reflect.get(val, 'flavor');
    if (typeof size !== 'number' || typeof flavor !== 'string' || !isPrimitiveFlavor(flavor))
      throw new DecoderError(`Bad primitive entry: ${nm}`);
    res.set(nm, {
      size,
      flavor,
      native: Reflect.get(val, 'native') === true,
      preamble: Reflect.get(val, 'preamble') === true,
    });
  }
  for (const pre of preambleTypes()) {
    if (res.has(pre.name)) continue;
    res.set(pre.name, { size: 0, flavor: 'unknown', native: false, preamble: true });
  }
  return res;
}

function getPrimitiveTable(): Map<string, PrimitiveSpec> {
  if (primitiveTable === null) {
    const url = new URL('../../data/primitives.json', import.meta.url);
    primitiveTable = decodePrimitiveTable(readFileSync(url, 'utf-8'));
  }
  return primitiveTable;
}

/**
 * Creates and interns data-types.
 *
 * Builtin primitives and derived data-types are interned by identity, so that
 * every reference to `int *` built through one factory is the same object.
 * Named user data-types are registered by the caller and looked up by name.
 */
export class TypeFactory {
  private readonly tree = new Map<string, Datatype>();
  private readonly nametree = new Map<string, Datatype>();
  private readonly pointerSize: number;

  constructor(pointerSize = 8) {
    this.pointerSize = pointerSize;
  }

  /** Is `nm` a builtin primitive name */
  static isBuiltin(nm: string): boolean {
    return getPrimitiveTable().has(nm);
  }

  private intern<T extends Datatype>(ct: T, cls: new (...args: never[]) => T): T {
    const id = ct.getIdentity();
    const prev = this.tree.get(id);
    if (prev instanceof cls) return prev;
    this.tree.set(id, ct);
    return ct;
  }

  getVoid(): TypePrimitive {
    const ct = this.getBase('void');
    if (ct === null) throw new LowlevelError('Missing void in primitive table');
    return ct;
  }

  /**
   * Get a builtin primitive by name.
   * @returns the primitive, or null if the name is not builtin
   */
  getBase(nm: string): TypePrimitive | null {
    const spec = getPrimitiveTable().get(nm);
    if (spec === undefined) return null;
    return this.intern(new TypePrimitive(nm, spec.size, spec.flavor, spec.native, spec.preamble), TypePrimitive);
  }

  getTypePointer(ptrto: Datatype): TypePointer {
    return this.intern(new TypePointer(ptrto, this.pointerSize), TypePointer);
  }

  getTypeArray(arrayof: Datatype, length: number): TypeArray {
    if (!Number.isInteger(length) || length < 0)
      throw new LowlevelError(`Bad array length ${length}`);
    return this.intern(new TypeArray(arrayof, length), TypeArray);
  }

  getTypeCode(returnType: Datatype, params: readonly Datatype[], varargs = false): TypeCode {
    return this.intern(new TypeCode(returnType, params, varargs), TypeCode);
  }

  /**
   * Register a named user data-type so later lookups by name find it.
   * @throws LowlevelError if a different data-type already owns the name
   */
  registerNamed<T extends Datatype>(ct: T): T {
    const prev = this.nametree.get(ct.getName());
    if (prev !== undefined && prev !== ct)
      throw new LowlevelError(`Duplicate data-type name: ${ct.getName()}`);
    this.nametree.set(ct.getName(), ct);
    return ct;
  }

  /** Find a registered user data-type or builtin primitive by name */
  findByName(nm: string): Datatype | null {
    return this.nametree.get(nm) ?? this.getBase(nm);
  }
}
