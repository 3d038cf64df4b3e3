/**
 * @file parallel.test.ts
 * @description Tests for concurrent decompilation and per-function closures.
 *
 * Verifies that results keep selection order however the decompiler's answers
 * interleave, that the in-flight limit holds, and that concurrent runs render
 * the same artifacts as sequential ones.
 */

import { describe, it, expect } from 'vitest';
import { ClosureJob, ParallelClosureBuilder, buildFunctionClosure } from '../../src/exporter/parallel.js';
import { run } from '../../src/exporter/pipeline.js';
import { makeFailure, makeRecord } from '../../src/exporter/record.js';
import { defaultRenderConfig } from '../../src/exporter/render.js';
import { TypeFactory, TypeField, TypePrimitive, TypeStruct } from '../../src/exporter/type.js';
import { FakeSource, fn } from './fakesource.js';

const OPTS = { includeGlobals: true, policy: 'first-seen' } as const;

function base(factory: TypeFactory, nm: string): TypePrimitive {
  const ct = factory.getBase(nm);
  if (ct === null) throw new Error(`${nm} missing`);
  return ct;
}

/**
 * Five functions sharing types, answering slowest first. Function i refers to
 * structure S(i % 3) and calls `log_msg`.
 */
function slowProgram(): FakeSource {
  const factory = new TypeFactory();
  const int = base(factory, 'int');
  const structs = ['S0', 'S1', 'S2'].map((nm) => {
    const st = new TypeStruct(nm);
    st.setFields([new TypeField('v', int), new TypeField('next', factory.getTypePointer(st))]);
    return st;
  });
  const source = new FakeSource();
  for (let i = 0; i < 5; ++i) {
    const name = `f${i}`;
    const addr = BigInt(0x1000 + i * 0x100);
    source.add(fn(name, addr), makeRecord({
      id: '0x' + addr.toString(16), name, signature: `void ${name}(void)`,
      body: `void ${name}(void)\n{\n  log_msg(${i});\n}\n`,
      typeRefs: [factory.getTypePointer(structs[i % 3])],
      calls: [{ name: 'log_msg', signature: 'void log_msg(int level)' }],
      equates: [{ name: `LEVEL_${i}`, value: BigInt(i) }],
    }), 50 - i * 10);
  }
  return source;
}

describe('ParallelClosureBuilder', () => {
  it('returns results in input order', async () => {
    const source = slowProgram();
    const functions = source.listFunctions();
    const builder = new ParallelClosureBuilder(source, 3);

    const results = await builder.buildAll(functions, new Set(functions.map((f) => f.name)), OPTS);

    expect(results.map((r) => r.fn.name)).toEqual(['f0', 'f1', 'f2', 'f3', 'f4']);
    expect(results.every((r) => r.kind === 'record')).toBe(true);
    expect(source.maxInFlight).toBe(3);
  });

  it('runs one job at a time by default', async () => {
    const source = slowProgram();
    const functions = source.listFunctions();

    const results = await new ParallelClosureBuilder(source).buildAll(functions, new Set(), OPTS);

    expect(results).toHaveLength(5);
    expect(source.maxInFlight).toBe(1);
    expect(source.requested).toEqual(['0x1000', '0x1100', '0x1200', '0x1300', '0x1400']);
  });

  it('returns nothing for no functions', async () => {
    expect(await new ParallelClosureBuilder(slowProgram(), 4).buildAll([], new Set(), OPTS)).toEqual([]);
  });
});

describe('run with concurrency', () => {
  it('renders the same text as a sequential run', async () => {
    const sequential = await run(slowProgram(), {}, defaultRenderConfig(), { concurrency: 1 });
    const concurrent = await run(slowProgram(), {}, defaultRenderConfig(), { concurrency: 4 });

    expect(concurrent.ok).toBe(true);
    expect(concurrent.primaryArtifactText).toBe(sequential.primaryArtifactText);
    expect(concurrent.warnings).toEqual(sequential.warnings);
  });

  it('lists definitions in selection order', async () => {
    const res = await run(slowProgram(), {}, { ...defaultRenderConfig(), banners: false }, { concurrency: 5 });
    const text = res.primaryArtifactText ?? '';
    expect(text).toContain(
      'typedef struct S0 S0;\ntypedef struct S1 S1;\ntypedef struct S2 S2;\n');
    expect(text).toContain(
      '#define LEVEL_0 0\n#define LEVEL_1 1\n#define LEVEL_2 2\n#define LEVEL_3 3\n#define LEVEL_4 4\n');
  });
});

describe('ClosureJob', () => {
  it('turns a thrown error into a failure', async () => {
    const info = fn('broken', 0x10n);
    const source = new FakeSource().add(info, new Error('bad instruction'));
    const res = await new ClosureJob(source, info, new Set(), OPTS).run();
    expect(res).toEqual({ kind: 'failure', fn: info, reason: 'bad instruction' });
  });

  it('passes a returned failure through', async () => {
    const info = fn('broken', 0x10n);
    const source = new FakeSource().add(info, makeFailure('0x10', 'timeout'));
    const res = await new ClosureJob(source, info, new Set(), OPTS).run();
    expect(res).toEqual({ kind: 'failure', fn: info, reason: 'timeout' });
  });
});

describe('buildFunctionClosure', () => {
  it('closes the prototype, references, globals then callees', () => {
    const factory = new TypeFactory();
    const int = base(factory, 'int');
    const char = base(factory, 'char');
    const node = new TypeStruct('Node');
    node.setFields([new TypeField('v', int)]);
    const record = makeRecord({
      id: '0x10', name: 'walk', signature: 'int walk(Node *n)', body: '',
      prototype: factory.getTypeCode(int, [factory.getTypePointer(node)]),
      typeRefs: [char],
      globals: [{ name: 'names', type: factory.getTypePointer(char), storage: 'data' }],
      calls: [{ name: 'stop', prototype: factory.getTypeCode(factory.getVoid(), []) }],
    });

    const decls = buildFunctionClosure(record, new Set(['walk']), OPTS);

    expect([...decls.types.keys()]).toEqual([
      'int(struct Node *)', 'int', 'struct Node *', 'struct Node', 'char', 'char *', 'void()', 'void',
    ]);
    expect(decls.calledFunctions.get('stop')?.declaration).toBe('void stop(void);');
    expect(decls.origin).toBe('walk');
  });

  it('leaves out the types of globals that are not emitted', () => {
    const factory = new TypeFactory();
    const record = makeRecord({
      id: '0x10', name: 'walk', signature: 'void walk(void)', body: '',
      globals: [{ name: 'total', type: base(factory, 'long'), storage: 'data' }],
    });
    const decls = buildFunctionClosure(record, new Set(), { includeGlobals: false, policy: 'first-seen' });
    expect(decls.types.size).toBe(0);
    expect(decls.globals.size).toBe(0);
  });
});
