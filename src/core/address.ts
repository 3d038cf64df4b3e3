/**
 * @file address.ts
 * @description Entry-point addresses, inclusive address ranges, and the parser
 * for range lists such as "0x1000-0x2000,0x3000".
 */

import { ConfigError } from './error.js';

const HEX_PATTERN = /^(?:0[xX])?[0-9a-fA-F]+$/;

/**
 * Parse a hexadecimal address. The `0x` prefix is optional.
 * @returns the offset, or null if the string is not a hex number
 */
export function parseAddress(s: string): bigint | null {
  const tok = s.trim();
  if (!HEX_PATTERN.test(tok)) return null;
  const digits = tok.startsWith('0x') || tok.startsWith('0X') ? tok.substring(2) : tok;
  return BigInt('0x' + digits);
}

/** Render an address the way artifacts key functions: lower-case hex with 0x. */
export function formatAddress(addr: bigint): string {
  return '0x' + addr.toString(16);
}

// ---------------------------------------------------------------------------
// Range class
// ---------------------------------------------------------------------------

/**
 * A contiguous, inclusive range of addresses.
 */
export class Range {
  /** Offset of first byte in this Range */
  readonly first: bigint;
  /** Offset of last byte in this Range */
  readonly last: bigint;

  constructor(first: bigint, last: bigint) {
    this.first = first;
    this.last = last;
  }

  /** Print bounds: "first-last" */
  printBounds(): string {
    return `${formatAddress(this.first)}-${formatAddress(this.last)}`;
  }
}

// ---------------------------------------------------------------------------
// RangeList class
// ---------------------------------------------------------------------------

/**
 * A disjoint set of Ranges.
 *
 * Maintains a sorted list of non-overlapping Range objects; overlapping or
 * adjacent ranges are merged on insertion.
 */
export class RangeList {
  private tree: Range[] = [];

  /** Return true if this container is empty. */
  empty(): boolean {
    return this.tree.length === 0;
  }

  /** Return the number of Range objects in the container. */
  numRanges(): number {
    return this.tree.length;
  }

  /**
   * Insert a range of addresses, merging overlapping/adjacent ranges.
   */
  insertRange(first: bigint, last: bigint): void {
    let newFirst = first;
    let newLast = last;
    const kept: Range[] = [];
    for (const r of this.tree) {
      if (r.last + 1n < newFirst || newLast + 1n < r.first) {
        kept.push(r);
        continue;
      }
      if (r.first < newFirst) newFirst = r.first;
      if (r.last > newLast) newLast = r.last;
    }
    kept.push(new Range(newFirst, newLast));
    kept.sort((a, b) => (a.first < b.first ? -1 : a.first > b.first ? 1 : 0));
    this.tree = kept;
  }

  /** Is the given address covered by some Range in the list */
  inRange(addr: bigint): boolean {
    let lo = 0;
    let hi = this.tree.length - 1;
    while (lo <= hi) {
      const mid = (lo + hi) >> 1;
      const r = this.tree[mid];
      if (addr < r.first) hi = mid - 1;
      else if (addr > r.last) lo = mid + 1;
      else return true;
    }
    return false;
  }

  printBounds(): string {
    return this.tree.map((r) => r.printBounds()).join(',');
  }
}

/**
 * Parse a comma-separated list of addresses and inclusive ranges.
 *
 * Each entry is either `start-end` or a single address. Blank entries are
 * skipped, but the list as a whole must name at least one range.
 * @throws ConfigError on non-hex bounds, reversed bounds or an empty list
 */
export function parseAddressRanges(spec: string | readonly string[]): RangeList {
  const parts = typeof spec === 'string' ? spec.split(',') : spec.flatMap((s) => s.split(','));
  const res = new RangeList();
  for (const raw of parts) {
    const part = raw.trim();
    if (part.length === 0) continue;
    const dash = part.indexOf('-');
    if (dash < 0) {
      const addr = parseAddress(part);
      if (addr === null)
        throw new ConfigError('address_set_str', `Invalid address: ${part}`);
      res.insertRange(addr, addr);
      continue;
    }
    const first = parseAddress(part.substring(0, dash));
    const last = parseAddress(part.substring(dash + 1));
    if (first === null || last === null)
      throw new ConfigError('address_set_str', `Invalid address range: ${part}`);
    if (first > last)
      throw new ConfigError('address_set_str', `Reversed address range: ${part}`);
    res.insertRange(first, last);
  }
  if (res.empty())
    throw new ConfigError('address_set_str', 'Address set is empty after parsing');
  return res;
}
