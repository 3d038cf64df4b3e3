/**
 * @file selection.test.ts
 * @description Tests for filtering functions by address range, tag and name.
 */
import { describe, it, expect } from 'vitest';
import type { FunctionInfo } from '../../src/exporter/record.js';
import { selectFunctions } from '../../src/exporter/selection.js';

const universe: FunctionInfo[] = [
  { id: '0x2000', name: 'parse', address: 0x2000n, tags: [] },
  { id: '0x1000', name: 'main', address: 0x1000n, tags: [] },
  { id: '0x3000', name: 'memcpy', address: 0x3000n, tags: ['LIBRARY'] },
  { id: 'thunk', name: 'thunk', tags: ['THUNK'] },
];

const names = (fns: readonly FunctionInfo[]): string[] => fns.map((f) => f.name);

describe('selectFunctions', () => {
  it('selects everything in listing order by default', () => {
    const res = selectFunctions(universe, {});
    expect(names(res.selected)).toEqual(['parse', 'main', 'memcpy', 'thunk']);
    expect(res.errors).toEqual([]);
    expect(res.warnings).toEqual([]);
  });

  it('filters by address range', () => {
    const res = selectFunctions(universe, { addressRanges: '0x1000-0x2fff' });
    expect(names(res.selected)).toEqual(['parse', 'main']);
  });

  it('never matches a function without an address to an address range', () => {
    const res = selectFunctions(universe, { addressRanges: '0x0-0xffffffff' });
    expect(names(res.selected)).toEqual(['parse', 'main', 'memcpy']);
  });

  it('excludes tagged functions by default', () => {
    const res = selectFunctions(universe, { tags: ['LIBRARY', 'THUNK'] });
    expect(names(res.selected)).toEqual(['parse', 'main']);
  });

  it('keeps only tagged functions when not excluding', () => {
    const res = selectFunctions(universe, { tags: ['LIBRARY'], excludeTags: false });
    expect(names(res.selected)).toEqual(['memcpy']);
  });

  it('narrows by name last', () => {
    const res = selectFunctions(universe, { addressRanges: '0x1000', names: ['main', 'parse'] });
    expect(names(res.selected)).toEqual(['main']);
  });

  it('warns about names and tags that match nothing', () => {
    const res = selectFunctions(universe, { names: ['main', 'missing'], tags: ['NOPE'] });
    expect(names(res.selected)).toEqual(['main']);
    expect(res.warnings).toEqual([
      { kind: 'selection', subject: 'NOPE', message: 'No function carries the tag NOPE' },
      { kind: 'selection', subject: 'missing', message: 'No function named missing' },
    ]);
  });

  it('selects nothing for a malformed address set', () => {
    const res = selectFunctions(universe, { addressRanges: '0x2000-0x1000' });
    expect(res.selected).toEqual([]);
    expect(res.errors).toEqual(['Reversed address range: 0x2000-0x1000']);
  });

  it('can ignore a malformed address set', () => {
    const res = selectFunctions(universe, { addressRanges: 'nowhere', tolerateBadRanges: true });
    expect(names(res.selected)).toEqual(['parse', 'main', 'memcpy', 'thunk']);
    expect(res.errors).toEqual([]);
    expect(res.warnings).toEqual([{
      kind: 'selection',
      subject: 'address_set_str',
      message: 'Invalid address: nowhere; ignoring the address constraint',
    }]);
  });

  it('treats a blank address set as no constraint', () => {
    expect(selectFunctions(universe, { addressRanges: '  ' }).selected).toHaveLength(4);
  });
});
