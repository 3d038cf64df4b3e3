/**
 * @file cli.test.ts
 * @description End-to-end tests of the command line driver against the
 * program dump in test/fixtures.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { main, wantsHelp } from '../../src/console/exportmain.js';
import { StringWriter } from '../../src/util/writer.js';

const FIXTURE = fileURLToPath(new URL('../fixtures/program.json', import.meta.url));

const EXPECTED_TAIL =
  'typedef struct Node Node;\n' +
  '\n' +
  'typedef enum Color {\n' +
  '    RED=0,\n' +
  '    GREEN=1,\n' +
  '    BLUE=16\n' +
  '} Color;\n' +
  '\n' +
  'typedef Node *PNode;\n' +
  '\n' +
  'struct Node {\n' +
  '    int value;\n' +
  '    Node *next;\n' +
  '};\n' +
  '\n' +
  'typedef void visit_fn(PNode);\n' +
  '\n' +
  '#define MAX_DEPTH 0x20\n' +
  '\n' +
  'int list_sum(PNode head);\n' +
  'void walk(PNode head, visit_fn *cb);\n' +
  'void log_value(int v);\n' +
  '\n' +
  'extern int g_total;\n' +
  '\n' +
  'int list_sum(PNode head)\n' +
  '{\n' +
  '  int total = 0;\n' +
  '  for (; head; head = head->next) {\n' +
  '    total += head->value;\n' +
  '    log_value(total);\n' +
  '  }\n' +
  '  g_total = total;\n' +
  '  return total;\n' +
  '}\n' +
  '\n' +
  'void walk(PNode head, visit_fn *cb)\n' +
  '{\n' +
  '  cb(head);\n' +
  '  list_sum(head);\n' +
  '}\n' +
  '\n' +
  '/*\n' +
  "Unable to decompile 'broken'\n" +
  'Cause: Unable to recover control flow\n' +
  '*/\n';

describe('closure-export command', () => {
  let outDir: string;
  let out: StringWriter;
  let err: StringWriter;

  beforeEach(() => {
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'closure-export-'));
    out = new StringWriter();
    err = new StringWriter();
  });

  afterEach(() => {
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  const common = (): string[] => [
    '--input', FIXTURE, '--output_dir', outDir, '--function_tag_filters', 'LIBRARY',
    '--banners', 'off', '--log_level', 'error',
  ];

  it('writes the translation unit', async () => {
    const code = await main(common(), out, err);

    expect(code).toBe(0);
    expect(err.toString()).toBe('');
    expect(fs.readdirSync(outDir)).toEqual(['demo.c']);
    const text = fs.readFileSync(path.join(outDir, 'demo.c'), 'utf-8');
    expect(text.startsWith('typedef unsigned long long unkbyte9;\n')).toBe(true);
    expect(text.substring(text.indexOf('#endif\n\n') + '#endif\n\n'.length)).toBe(EXPECTED_TAIL);
    expect(text).not.toContain('memset');
  });

  it('writes a header and a source including it', async () => {
    const code = await main([...common(), '--create_header_file', 'yes', '--base_name', 'demo_out'], out, err);

    expect(code).toBe(0);
    expect(fs.readdirSync(outDir).sort()).toEqual(['demo_out.c', 'demo_out.h']);
    const header = fs.readFileSync(path.join(outDir, 'demo_out.h'), 'utf-8');
    const source = fs.readFileSync(path.join(outDir, 'demo_out.c'), 'utf-8');
    expect(header.startsWith('#ifndef DEMO_OUT_H\n#define DEMO_OUT_H\n\n')).toBe(true);
    expect(header.endsWith('extern int g_total;\n\n#endif /* DEMO_OUT_H */\n')).toBe(true);
    expect(source.startsWith('#include "demo_out.h"\n\nint list_sum(PNode head)\n')).toBe(true);
  });

  it('writes the structured document', async () => {
    const code = await main([...common(), '--structured', 'true'], out, err);

    expect(code).toBe(0);
    expect(fs.readdirSync(outDir)).toEqual(['demo.json']);
    const doc: unknown = JSON.parse(fs.readFileSync(path.join(outDir, 'demo.json'), 'utf-8'));
    expect(doc).toMatchObject({
      functions: {
        '0x401000': { name: 'list_sum', signature: 'int list_sum(PNode head)' },
        '0x401100': { name: 'walk', signature: 'void walk(PNode head, visit_fn *cb)' },
      },
    });
  });

  it('reports warnings at the default level', async () => {
    const args = common().filter((a) => a !== '--log_level' && a !== 'error');
    const code = await main(args, out, err);

    expect(code).toBe(0);
    expect(err.toString()).toContain(
      "WARNING: broken: Unable to decompile 'broken': Unable to recover control flow\n");
  });

  it('selects by address range', async () => {
    const code = await main([...common(), '--address_set_str', '0x401100-0x4011ff'], out, err);

    expect(code).toBe(0);
    const text = fs.readFileSync(path.join(outDir, 'demo.c'), 'utf-8');
    expect(text).toContain('\nint list_sum(PNode head);\n');
    expect(text).not.toContain('int total = 0;');
    expect(text.endsWith('void walk(PNode head, visit_fn *cb)\n{\n  cb(head);\n  list_sum(head);\n}\n')).toBe(true);
  });

  it('prints usage', async () => {
    expect(await main(['--help'], out, err)).toBe(0);
    expect(out.toString().startsWith('usage: closure-export --input dump.json')).toBe(true);
  });

  it('takes -h as a value where an option expects one', async () => {
    const code = await main([...common(), '--base_name', '-h'], out, err);

    expect(code).toBe(0);
    expect(out.toString()).toBe('');
    expect(fs.readdirSync(outDir)).toEqual(['-h.c']);
  });

  it('finds help flags only at option names', () => {
    expect(wantsHelp(['-h'])).toBe(true);
    expect(wantsHelp(['--input', 'a.json', '--help'])).toBe(true);
    expect(wantsHelp(['--input=a.json', '-h'])).toBe(true);
    expect(wantsHelp(['--base_name', '-h'])).toBe(false);
    expect(wantsHelp(['--base_name', '--help', '--input', 'a.json'])).toBe(false);
  });

  it('requires an input', async () => {
    expect(await main(['--output_dir', outDir], out, err)).toBe(1);
    expect(err.toString()).toBe('ERROR: No input program dump given\nTry --help for the list of options\n');
  });

  it('rejects an unknown option', async () => {
    expect(await main(['--colour', 'blue'], out, err)).toBe(1);
    expect(err.toString()).toBe('ERROR: Unknown option: colour\nTry --help for the list of options\n');
  });

  it('fails on an unreadable dump', async () => {
    const missing = path.join(outDir, 'missing.json');
    expect(await main(['--input', missing, '--output_dir', outDir], out, err)).toBe(1);
    expect(err.toString().startsWith(`ERROR: Unable to read ${missing}: `)).toBe(true);
    expect(fs.readdirSync(outDir)).toEqual([]);
  });
});
