/**
 * @file typeclosure.test.ts
 * @description Tests for the transitive closure of referenced data-types,
 * including self-referencing and mutually referencing structures.
 */
import { describe, it, expect } from 'vitest';
import { ConflictError } from '../../src/core/error.js';
import { DeclarationSet } from '../../src/exporter/declset.js';
import { closeType } from '../../src/exporter/typeclosure.js';
import {
  TypeFactory,
  TypeField,
  TypeOpaque,
  TypePrimitive,
  TypeStruct,
  TypeTypedef,
} from '../../src/exporter/type.js';

function intType(factory: TypeFactory): TypePrimitive {
  const ct = factory.getBase('int');
  if (ct === null) throw new Error('int missing');
  return ct;
}

describe('closeType', () => {
  it('inserts the entry before visiting components', () => {
    const acc = new DeclarationSet();
    const statesSeen: string[] = [];
    // A component that reports the state of its parent's entry when visited
    class Probe extends TypePrimitive {
      numDepend(): number {
        statesSeen.push(acc.types.get('struct Node')?.state ?? 'absent');
        return 0;
      }
    }
    const factory = new TypeFactory();
    const node = new TypeStruct('Node');
    node.setFields([
      new TypeField('next', factory.getTypePointer(node)),
      new TypeField('probe', new Probe('probe_t', 4, 'signed')),
    ]);

    closeType(node, acc);

    expect(statesSeen).toEqual(['open']);
    expect(acc.types.get('struct Node')?.state).toBe('closed');
    expect([...acc.types.keys()]).toEqual(['struct Node', 'struct Node *', 'probe_t']);
  });

  it('closes mutually referencing structures', () => {
    const factory = new TypeFactory();
    const a = new TypeStruct('A');
    const b = new TypeStruct('B');
    a.setFields([new TypeField('b', factory.getTypePointer(b))]);
    b.setFields([new TypeField('a', factory.getTypePointer(a))]);
    const acc = new DeclarationSet();

    closeType(a, acc);

    expect([...acc.types.keys()]).toEqual(['struct A', 'struct B *', 'struct B', 'struct A *']);
    expect([...acc.types.values()].every((e) => e.state === 'closed')).toBe(true);
    expect(acc.warnings).toEqual([]);
  });

  it('follows typedefs, arrays and signatures', () => {
    const factory = new TypeFactory();
    const int = intType(factory);
    const node = new TypeStruct('Node');
    const pnode = new TypeTypedef('PNode');
    pnode.setAlias(factory.getTypePointer(node));
    node.setFields([
      new TypeField('next', pnode),
      new TypeField('vals', factory.getTypeArray(int, 4)),
    ]);
    const cb = factory.getTypeCode(factory.getVoid(), [pnode]);
    const acc = new DeclarationSet();

    closeType(factory.getTypePointer(cb), acc);

    expect([...acc.types.keys()]).toEqual([
      'void(typedef PNode) *', 'void(typedef PNode)', 'void', 'typedef PNode',
      'struct Node *', 'struct Node', 'int[4]', 'int',
    ]);
  });

  it('does nothing for a type already present', () => {
    const factory = new TypeFactory();
    const acc = new DeclarationSet();
    closeType(intType(factory), acc);
    closeType(intType(factory), acc);
    expect(acc.types.size).toBe(1);
  });

  it('warns about opaque fields and keeps the placeholder', () => {
    const holder = new TypeStruct('Holder');
    holder.setFields([new TypeField('blob', new TypeOpaque('Blob', 8))]);
    const acc = new DeclarationSet();

    closeType(holder, acc);

    expect([...acc.types.keys()]).toEqual(['struct Holder', 'opaque Blob']);
    expect(acc.warnings).toEqual([{
      kind: 'opaque-type',
      subject: 'opaque Blob',
      message: 'Field blob of struct Holder has unresolved type Blob; using a placeholder',
    }]);
  });

  it('keeps the first of two conflicting definitions', () => {
    const factory = new TypeFactory();
    const first = new TypeStruct('Foo');
    first.setFields([new TypeField('x', intType(factory))]);
    const second = new TypeStruct('Foo');
    second.setFields([new TypeField('y', intType(factory))]);
    const acc = new DeclarationSet('first-seen', 'main');

    closeType(first, acc);
    closeType(second, acc);

    expect(acc.types.get('struct Foo')?.type).toBe(first);
    expect(acc.warnings).toEqual([{
      kind: 'type-conflict',
      subject: 'struct Foo',
      message: 'Conflicting definitions of struct Foo; keeping the first one seen',
      origin: 'main',
    }]);
  });

  it('accepts a second object with the same definition', () => {
    const factory = new TypeFactory();
    const first = new TypeStruct('Foo');
    first.setFields([new TypeField('x', intType(factory))]);
    const second = new TypeStruct('Foo');
    second.setFields([new TypeField('x', intType(factory))]);
    const acc = new DeclarationSet();

    closeType(first, acc);
    closeType(second, acc);

    expect(acc.warnings).toEqual([]);
  });

  it('throws on a conflict under the strict policy', () => {
    const factory = new TypeFactory();
    const first = new TypeStruct('Foo');
    first.setFields([new TypeField('x', intType(factory))]);
    const second = new TypeStruct('Foo');
    const acc = new DeclarationSet('strict');

    closeType(first, acc);
    expect(() => closeType(second, acc)).toThrow(ConflictError);
  });
});
