/**
 * @file jsonsource.ts
 * @description A DecompilerSource backed by a JSON program dump.
 *
 * The dump carries a named type table and, per function, either the
 * decompiler's record or the reason decompilation failed:
 *
 *   {
 *     "name": "prog",
 *     "types": { "Node": { "kind": "struct", "fields": [...] }, ... },
 *     "functions": [ { "name": "main", "address": "0x1000", "record": {...} } ]
 *   }
 *
 * A type reference is a name from the table or a builtin primitive, or one of
 * `{ "pointer": ref }`, `{ "array": ref, "length": n }` and
 * `{ "function": { "returns": ref, "params": [ref...], "varargs": bool } }`.
 * Unknown names become opaque placeholders.
 */

import * as fs from 'fs';

import { formatAddress, parseAddress } from '../core/address.js';
import { DecoderError } from '../core/error.js';
import {
  type CalledFunctionRef,
  type DecompileOutcome,
  type DecompilerSource,
  type EquateRef,
  type FunctionInfo,
  type GlobalRef,
  makeFailure,
  makeRecord,
} from '../exporter/record.js';
import {
  type Datatype,
  TypeCode,
  TypeComposite,
  TypeEnum,
  TypeFactory,
  TypeField,
  TypeOpaque,
  TypeStruct,
  TypeTypedef,
  TypeUnion,
} from '../exporter/type.js';

type JsonObject = Record<string, unknown>;

function isObject(v: unknown): v is JsonObject {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function expectObject(v: unknown, what: string): JsonObject {
  if (!isObject(v)) throw new DecoderError(`${what} must be an object`);
  return v;
}

function expectArray(v: unknown, what: string): unknown[] {
  if (v === undefined) return [];
  if (!Array.isArray(v)) throw new DecoderError(`${what} must be an array`);
  return v;
}

function expectString(v: unknown, what: string): string {
  if (typeof v !== 'string') throw new DecoderError(`${what} must be a string`);
  return v;
}

function optionalString(v: unknown, what: string): string | undefined {
  return v === undefined ? undefined : expectString(v, what);
}

function optionalBoolean(v: unknown, what: string): boolean | undefined {
  if (v === undefined) return undefined;
  if (typeof v !== 'boolean') throw new DecoderError(`${what} must be a boolean`);
  return v;
}

function expectSize(v: unknown, what: string): number {
  if (v === undefined) return 0;
  if (typeof v !== 'number' || !Number.isInteger(v) || v < 0)
    throw new DecoderError(`${what} must be a non-negative integer`);
  return v;
}

/** Integers arrive as JSON numbers or as decimal/hex strings */
function expectInteger(v: unknown, what: string): bigint {
  if (typeof v === 'number' && Number.isInteger(v)) return BigInt(v);
  if (typeof v === 'string') {
    const tok = v.trim();
    const neg = tok.startsWith('-');
    const digits = neg ? tok.substring(1) : tok;
    if (/^0[xX][0-9a-fA-F]+$/.test(digits) || /^[0-9]+$/.test(digits)) {
      const val = BigInt(digits);
      return neg ? -val : val;
    }
  }
  throw new DecoderError(`${what} must be an integer`);
}

function optionalAddress(v: unknown, what: string): bigint | undefined {
  if (v === undefined) return undefined;
  if (typeof v === 'number' && Number.isInteger(v) && v >= 0) return BigInt(v);
  const addr = parseAddress(expectString(v, what));
  if (addr === null) throw new DecoderError(`${what} is not a hex address: ${String(v)}`);
  return addr;
}

// ---------------------------------------------------------------------------
// Type table
// ---------------------------------------------------------------------------

/**
 * Decodes the type table and type references against one TypeFactory.
 */
export class TypeTableDecoder {
  private readonly factory: TypeFactory;
  private readonly table: JsonObject;
  /** Named signatures being decoded, to stop a signature naming itself */
  private readonly pending = new Set<string>();
  readonly warnings: string[] = [];

  constructor(table: JsonObject, factory: TypeFactory) {
    this.table = table;
    this.factory = factory;
  }

  /**
   * Create every named data-type, then fill in composites and typedefs so
   * that they may refer to each other in any order.
   */
  decodeAll(): void {
    const fill: Array<[string, JsonObject]> = [];
    for (const [nm, raw] of Object.entries(this.table)) {
      const def = expectObject(raw, `Type ${nm}`);
      const kind = expectString(def.kind, `Kind of type ${nm}`);
      switch (kind) {
        case 'struct':
          this.factory.registerNamed(new TypeStruct(nm, expectSize(def.size, `Size of ${nm}`)));
          fill.push([nm, def]);
          break;
        case 'union':
          this.factory.registerNamed(new TypeUnion(nm, expectSize(def.size, `Size of ${nm}`)));
          fill.push([nm, def]);
          break;
        case 'typedef':
          this.factory.registerNamed(new TypeTypedef(nm));
          fill.push([nm, def]);
          break;
        case 'enum':
          this.factory.registerNamed(this.decodeEnum(nm, def));
          break;
        case 'opaque':
          this.factory.registerNamed(new TypeOpaque(nm, expectSize(def.size, `Size of ${nm}`)));
          break;
        case 'function':
          break;  // Decoded on first reference
        default:
          throw new DecoderError(`Unknown kind of type ${nm}: ${kind}`);
      }
    }
    for (const nm of Object.keys(this.table)) this.findNamed(nm);
    for (const [nm, def] of fill) {
      const ct = this.factory.findByName(nm);
      if (ct instanceof TypeComposite) {
        const fields = expectArray(def.fields, `Fields of ${nm}`).map((raw, i) => {
          const fld = expectObject(raw, `Field ${i} of ${nm}`);
          const fname = expectString(fld.name, `Name of field ${i} of ${nm}`);
          const offset = fld.offset === undefined ? -1 : expectSize(fld.offset, `Offset of ${nm}.${fname}`);
          return new TypeField(fname, this.decodeRef(fld.type, `${nm}.${fname}`), offset);
        });
        ct.setFields(fields, def.size === undefined ? undefined : expectSize(def.size, `Size of ${nm}`));
      } else if (ct instanceof TypeTypedef) {
        ct.setAlias(this.decodeRef(def.alias, `Alias of ${nm}`));
      }
    }
  }

  private decodeEnum(nm: string, def: JsonObject): TypeEnum {
    const raw = expectObject(def.values ?? {}, `Values of ${nm}`);
    const values: Array<readonly [string, bigint]> = Object.entries(raw)
      .map(([vn, vv]) => [vn, expectInteger(vv, `Value ${nm}.${vn}`)] as const);
    return new TypeEnum(nm, def.size === undefined ? 4 : expectSize(def.size, `Size of ${nm}`), values);
  }

  private decodeSignature(def: JsonObject, what: string, name = ''): TypeCode {
    const returns = def.returns === undefined ? this.factory.getVoid() : this.decodeRef(def.returns, `Return type of ${what}`);
    const params = expectArray(def.params, `Parameters of ${what}`)
      .map((p, i) => this.decodeRef(p, `Parameter ${i} of ${what}`));
    const varargs = optionalBoolean(def.varargs, `Varargs of ${what}`) ?? false;
    if (name.length !== 0) return new TypeCode(returns, params, varargs, name);
    return this.factory.getTypeCode(returns, params, varargs);
  }

  /** Find a named data-type, decoding a named signature on first use */
  private findNamed(nm: string): Datatype | null {
    const ct = this.factory.findByName(nm);
    if (ct !== null) return ct;
    const def = this.table[nm];
    if (!isObject(def) || def.kind !== 'function') return null;
    if (this.pending.has(nm))
      throw new DecoderError(`Function type ${nm} refers to itself`);
    this.pending.add(nm);
    const code = this.decodeSignature(def, nm, nm);
    this.pending.delete(nm);
    return this.factory.registerNamed(code);
  }

  /** Decode a type reference */
  decodeRef(raw: unknown, what: string): Datatype {
    if (typeof raw === 'string') {
      const nm = raw.trim();
      const ct = this.findNamed(nm);
      if (ct !== null) return ct;
      this.warnings.push(`Unknown type ${nm} in ${what}; using an opaque placeholder`);
      return this.factory.registerNamed(new TypeOpaque(nm));
    }
    const obj = expectObject(raw, `Type reference in ${what}`);
    if (obj.pointer !== undefined)
      return this.factory.getTypePointer(this.decodeRef(obj.pointer, what));
    if (obj.array !== undefined)
      return this.factory.getTypeArray(this.decodeRef(obj.array, what), expectSize(obj.length, `Array length in ${what}`));
    if (obj.function !== undefined)
      return this.decodeSignature(expectObject(obj.function, `Signature in ${what}`), what);
    throw new DecoderError(`Bad type reference in ${what}`);
  }

  /** Decode a prototype written inline as `{ returns, params, varargs }` */
  decodePrototype(raw: unknown, what: string): TypeCode {
    return this.decodeSignature(expectObject(raw, what), what);
  }
}

// ---------------------------------------------------------------------------
// JsonProgramSource
// ---------------------------------------------------------------------------

interface FunctionEntry {
  info: FunctionInfo;
  raw: JsonObject;
}

/**
 * Serves the functions of a program dump. Records are decoded when they are
 * asked for, so a malformed record fails only its own function.
 */
export class JsonProgramSource implements DecompilerSource {
  readonly programName: string;
  private readonly types: TypeTableDecoder;
  private readonly entries: FunctionEntry[] = [];
  private readonly byId = new Map<string, FunctionEntry>();

  constructor(doc: unknown) {
    const root = expectObject(doc, 'Program dump');
    this.programName = optionalString(root.name, 'Program name') ?? 'exported_program';
    const pointerSize = root.pointerSize === undefined ? 8 : expectSize(root.pointerSize, 'Pointer size');
    this.types = new TypeTableDecoder(expectObject(root.types ?? {}, 'Type table'), new TypeFactory(pointerSize));
    this.types.decodeAll();

    expectArray(root.functions, 'Function list').forEach((raw, i) => {
      const fn = expectObject(raw, `Function ${i}`);
      const name = expectString(fn.name, `Name of function ${i}`);
      const address = optionalAddress(fn.address, `Address of ${name}`);
      const tags = expectArray(fn.tags, `Tags of ${name}`).map((t) => expectString(t, `Tag of ${name}`));
      const id = address === undefined ? name : formatAddress(address);
      if (this.byId.has(id))
        throw new DecoderError(`Duplicate function ${id}`);
      const info: FunctionInfo = address === undefined ? { id, name, tags } : { id, name, address, tags };
      const entry = { info, raw: fn };
      this.entries.push(entry);
      this.byId.set(id, entry);
    });
  }

  /** Warnings raised while decoding the type table and records */
  get warnings(): readonly string[] {
    return this.types.warnings;
  }

  static fromFile(path: string): JsonProgramSource {
    const text = fs.readFileSync(path, 'utf-8');
    let doc: unknown;
    try {
      doc = JSON.parse(text);
    } catch (err) {
      throw new DecoderError(`${path} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`);
    }
    return new JsonProgramSource(doc);
  }

  listFunctions(): readonly FunctionInfo[] {
    return this.entries.map((e) => e.info);
  }

  decompile(id: string): DecompileOutcome {
    const entry = this.byId.get(id);
    if (entry === undefined) return makeFailure(id, `No function ${id}`);
    const { info, raw } = entry;
    if (raw.failure !== undefined)
      return makeFailure(id, expectString(raw.failure, `Failure of ${info.name}`));
    if (raw.record === undefined)
      return makeFailure(id, 'No decompilation record');
    return this.decodeRecord(info, expectObject(raw.record, `Record of ${info.name}`));
  }

  private decodeRecord(info: FunctionInfo, rec: JsonObject): DecompileOutcome {
    const nm = info.name;
    const signature = expectString(rec.signature, `Signature of ${nm}`);
    const body = expectString(rec.body, `Body of ${nm}`);
    const typeRefs = expectArray(rec.typeRefs, `Types of ${nm}`)
      .map((t) => this.types.decodeRef(t, `function ${nm}`));
    const globals = expectArray(rec.globals, `Globals of ${nm}`)
      .map((g) => this.decodeGlobal(expectObject(g, `Global of ${nm}`), nm));
    const calls = expectArray(rec.calls, `Calls of ${nm}`)
      .map((c) => this.decodeCall(expectObject(c, `Call of ${nm}`), nm));
    const equates = expectArray(rec.equates, `Equates of ${nm}`).map((e): EquateRef => {
      const eq = expectObject(e, `Equate of ${nm}`);
      const ename = expectString(eq.name, `Equate name in ${nm}`);
      return { name: ename, value: expectInteger(eq.value, `Equate ${ename}`) };
    });
    const base = { id: info.id, name: nm, signature, body, typeRefs, globals, calls, equates };
    const withAddr = info.address === undefined ? base : { ...base, address: info.address };
    return rec.prototype === undefined
      ? makeRecord(withAddr)
      : makeRecord({ ...withAddr, prototype: this.types.decodePrototype(rec.prototype, `Prototype of ${nm}`) });
  }

  private decodeGlobal(g: JsonObject, fnName: string): GlobalRef {
    const name = expectString(g.name, `Global name in ${fnName}`);
    const storage = g.storage ?? 'data';
    if (storage !== 'data' && storage !== 'function')
      throw new DecoderError(`Bad storage for global ${name}: ${String(storage)}`);
    const ref: GlobalRef = {
      name,
      type: this.types.decodeRef(g.type, `global ${name}`),
      isConst: optionalBoolean(g.const, `const of ${name}`) ?? false,
      isVolatile: optionalBoolean(g.volatile, `volatile of ${name}`) ?? false,
      storage,
    };
    const address = optionalAddress(g.address, `Address of ${name}`);
    return address === undefined ? ref : { ...ref, address };
  }

  private decodeCall(c: JsonObject, fnName: string): CalledFunctionRef {
    const name = expectString(c.name, `Callee name in ${fnName}`);
    let ref: CalledFunctionRef = { name };
    const address = optionalAddress(c.address, `Address of ${name}`);
    if (address !== undefined) ref = { ...ref, address };
    const signature = optionalString(c.signature, `Signature of ${name}`);
    if (signature !== undefined) ref = { ...ref, signature };
    if (c.prototype !== undefined)
      ref = { ...ref, prototype: this.types.decodePrototype(c.prototype, `Prototype of ${name}`) };
    return ref;
  }
}
