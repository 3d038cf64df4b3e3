/**
 * @file printc.test.ts
 * @description Tests for C declarators, dependency order and type definitions.
 */
import { describe, it, expect } from 'vitest';
import {
  PrintC,
  declare,
  declarePrototype,
  declareVariable,
  dependentOrder,
  formatEquateValue,
} from '../../src/exporter/printc.js';
import {
  type Datatype,
  TypeCode,
  TypeEnum,
  TypeFactory,
  TypeField,
  TypeOpaque,
  TypePrimitive,
  TypeStruct,
  TypeTypedef,
  TypeUnion,
} from '../../src/exporter/type.js';
import { StringWriter } from '../../src/util/writer.js';

const factory = new TypeFactory();

function base(nm: string): TypePrimitive {
  const ct = factory.getBase(nm);
  if (ct === null) throw new Error(`${nm} missing`);
  return ct;
}

const int = base('int');
const char = base('char');

/** The type definitions that follow the fixed preamble */
function definitionsAfterPreamble(types: readonly Datatype[]): string {
  const out = new StringWriter();
  new PrintC(out).docTypeDefinitions(types);
  const text = out.toString();
  const marker = '#endif\n\n';
  return text.substring(text.indexOf(marker) + marker.length);
}

describe('declare', () => {
  it('prints pointers and arrays', () => {
    expect(declare(factory.getTypePointer(factory.getTypePointer(char)), 'argv')).toBe('char **argv');
    expect(declare(factory.getTypeArray(factory.getTypePointer(int), 4), 'a')).toBe('int *a[4]');
    expect(declare(factory.getTypePointer(factory.getTypeArray(int, 4)), 'p')).toBe('int (*p)[4]');
  });

  it('prints function pointers', () => {
    const cb = factory.getTypeCode(int, [int, factory.getTypePointer(char)]);
    expect(declare(factory.getTypePointer(cb), 'cb')).toBe('int (*cb)(int, char *)');
    const noargs = factory.getTypeCode(factory.getVoid(), []);
    expect(declare(factory.getTypePointer(noargs), 'f')).toBe('void (*f)(void)');
  });

  it('prints abstract declarators', () => {
    expect(declare(factory.getTypePointer(int), '')).toBe('int *');
    expect(declare(int, '')).toBe('int');
  });

  it('refers to composites by name', () => {
    const node = new TypeStruct('Node');
    expect(declare(new TypeFactory().getTypePointer(node), 'head')).toBe('Node *head');
  });
});

describe('declarePrototype', () => {
  it('prints a prototype with a semicolon', () => {
    const proto = factory.getTypeCode(int, [int, factory.getTypePointer(factory.getTypePointer(char))]);
    expect(declarePrototype('main', proto)).toBe('int main(int, char **);');
  });

  it('prints varargs', () => {
    const proto = factory.getTypeCode(int, [factory.getTypePointer(char)], true);
    expect(declarePrototype('printf', proto)).toBe('int printf(char *, ...);');
  });
});

describe('declareVariable', () => {
  it('applies qualifiers to the variable', () => {
    expect(declareVariable(factory.getTypePointer(char), 'name', { isConst: true })).toBe('char *const name');
    expect(declareVariable(int, 'flags', { isConst: true, isVolatile: true })).toBe('const volatile int flags');
    expect(declareVariable(int, 'count')).toBe('int count');
  });

  it('stores opaque types as bytes', () => {
    expect(declareVariable(new TypeOpaque('Blob', 12), 'blob')).toBe('unsigned char blob[12]');
    expect(declareVariable(new TypeOpaque('Unsized'), 'u')).toBe('unsigned char u[1]');
  });

  it('stores a typedef of an opaque type as bytes', () => {
    const handle = new TypeTypedef('HANDLE');
    handle.setAlias(new TypeOpaque('UnknownThing', 4));
    const alias = new TypeTypedef('HANDLE_ALIAS');
    alias.setAlias(handle);
    expect(declareVariable(handle, 'h')).toBe('unsigned char h[4]');
    expect(declareVariable(alias, 'h2', { isConst: true })).toBe('const unsigned char h2[4]');
    expect(declareVariable(factory.getTypePointer(handle), 'ph')).toBe('HANDLE *ph');
  });

  it('stops at typedefs naming each other', () => {
    const a = new TypeTypedef('LoopA');
    const b = new TypeTypedef('LoopB');
    a.setAlias(b);
    b.setAlias(a);
    expect(declareVariable(a, 'x')).toBe('LoopA x');
  });
});

describe('dependentOrder', () => {
  it('puts by-value members first', () => {
    const outer = new TypeStruct('Outer');
    const inner = new TypeStruct('Inner');
    inner.setFields([new TypeField('x', int)]);
    outer.setFields([new TypeField('in', inner)]);
    expect(dependentOrder([outer, inner, int])).toEqual([inner, outer]);
  });

  it('needs only forward declarations behind pointers', () => {
    const factory = new TypeFactory();
    const a = new TypeStruct('A');
    const b = new TypeStruct('B');
    a.setFields([new TypeField('b', factory.getTypePointer(b))]);
    b.setFields([new TypeField('a', factory.getTypePointer(a))]);
    expect(dependentOrder([a, b])).toEqual([a, b]);
  });

  it('completes a composite stored through a typedef', () => {
    const foo = new TypeStruct('Foo');
    foo.setFields([new TypeField('x', int)]);
    const t = new TypeTypedef('T');
    t.setAlias(foo);
    const s = new TypeStruct('S');
    s.setFields([new TypeField('t', t)]);
    expect(dependentOrder([s, t, foo])).toEqual([t, foo, s]);
  });

  it('declares a typedef before a structure pointing through it', () => {
    const factory = new TypeFactory();
    const node = new TypeStruct('Node');
    const pnode = new TypeTypedef('PNode');
    pnode.setAlias(factory.getTypePointer(node));
    node.setFields([new TypeField('next', pnode)]);
    expect(dependentOrder([node, pnode])).toEqual([pnode, node]);
  });
});

describe('PrintC', () => {
  it('starts with the builtin preamble', () => {
    const out = new StringWriter();
    new PrintC(out).docTypeDefinitions([]);
    const lines = out.toString().split('\n');
    expect(lines[0]).toBe('typedef unsigned long long unkbyte9;');
    expect(lines).toContain('typedef void BADSPACEBASE;');
    expect(lines).toContain('typedef void code;');
    expect(out.toString()).toContain(
      '// C99 lacks bool, define it as byte for C-only output\n' +
      '#if !defined(__cplusplus) && !defined(NO_BOOL)\n' +
      'typedef unsigned char bool;\n' +
      '#endif\n');
  });

  it('forward declares mutually referencing structures', () => {
    const factory = new TypeFactory();
    const a = new TypeStruct('A');
    const b = new TypeStruct('B');
    a.setFields([new TypeField('b', factory.getTypePointer(b))]);
    b.setFields([new TypeField('a', factory.getTypePointer(a))]);
    expect(definitionsAfterPreamble([a, factory.getTypePointer(b), b, factory.getTypePointer(a)])).toBe(
      'typedef struct A A;\n' +
      'typedef struct B B;\n' +
      '\n' +
      'struct A {\n' +
      '    B *b;\n' +
      '};\n' +
      '\n' +
      'struct B {\n' +
      '    A *a;\n' +
      '};\n' +
      '\n');
  });

  it('prints every kind of definition in order', () => {
    const factory = new TypeFactory();
    const color = new TypeEnum('Color', 4, [['RED', 0n], ['GREEN', 1n]]);
    const blob = new TypeOpaque('Blob', 8);
    const node = new TypeStruct('Node');
    const pnode = new TypeTypedef('PNode');
    pnode.setAlias(factory.getTypePointer(node));
    const handler = new TypeCode(factory.getVoid(), [int], false, 'handler_t');
    const val = new TypeUnion('Value');
    val.setFields([new TypeField('i', int), new TypeField('c', char)]);
    node.setFields([
      new TypeField('next', pnode),
      new TypeField('color', color),
      new TypeField('raw', base('undefined4')),
      new TypeField('data', blob),
      new TypeField('on_visit', factory.getTypePointer(handler)),
      new TypeField('value', val),
    ]);

    const types = [node, pnode, factory.getTypePointer(node), color, base('undefined4'), blob,
      factory.getTypePointer(handler), handler, int, factory.getVoid(), val, char];
    expect(definitionsAfterPreamble(types)).toBe(
      'typedef unsigned int undefined4;\n' +
      '\n' +
      'typedef struct Node Node;\n' +
      'typedef union Value Value;\n' +
      '\n' +
      'typedef enum Color {\n' +
      '    RED=0,\n' +
      '    GREEN=1\n' +
      '} Color;\n' +
      '\n' +
      'typedef void Blob;\n' +
      '\n' +
      'typedef Node *PNode;\n' +
      '\n' +
      'typedef void handler_t(int);\n' +
      '\n' +
      'union Value {\n' +
      '    int i;\n' +
      '    char c;\n' +
      '};\n' +
      '\n' +
      'struct Node {\n' +
      '    PNode next;\n' +
      '    Color color;\n' +
      '    undefined4 raw;\n' +
      '    unsigned char data[8];\n' +
      '    handler_t *on_visit;\n' +
      '    Value value;\n' +
      '};\n' +
      '\n');
  });

  it('stores a field typed through a typedef of an opaque type as bytes', () => {
    const thing = new TypeOpaque('UnknownThing', 4);
    const handle = new TypeTypedef('HANDLE');
    handle.setAlias(thing);
    const wrap = new TypeStruct('Wrap');
    wrap.setFields([new TypeField('h', handle), new TypeField('n', int)]);
    expect(definitionsAfterPreamble([wrap, handle, thing, int])).toBe(
      'typedef struct Wrap Wrap;\n' +
      '\n' +
      'typedef void UnknownThing;\n' +
      '\n' +
      'typedef UnknownThing HANDLE;\n' +
      '\n' +
      'struct Wrap {\n' +
      '    unsigned char h[4];\n' +
      '    int n;\n' +
      '};\n' +
      '\n');
  });

  it('leaves an empty composite incomplete', () => {
    const handle = new TypeStruct('Handle');
    expect(definitionsAfterPreamble([handle])).toBe('typedef struct Handle Handle;\n\n');
  });
});

describe('formatEquateValue', () => {
  it('prints small values in decimal and the rest in hex', () => {
    expect(formatEquateValue(7n)).toBe('7');
    expect(formatEquateValue(255n)).toBe('0xff');
    expect(formatEquateValue(-16n)).toBe('-0x10');
  });
});
