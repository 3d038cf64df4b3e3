/**
 * @file selection.ts
 * @description Choosing which functions get their full body emitted.
 */

import { type RangeList, parseAddressRanges } from '../core/address.js';
import { ConfigError, explainError } from '../core/error.js';
import type { ExportWarning } from './declset.js';
import type { FunctionInfo } from './record.js';

export interface SelectionConfig {
  /** Only these function names survive, applied last */
  names?: readonly string[];
  /** Comma separated `start-end` or single addresses, or a list of them */
  addressRanges?: string | readonly string[];
  tags?: readonly string[];
  /** `true` drops functions carrying a tag, `false` keeps only those */
  excludeTags?: boolean;
  /** Treat an unparsable address set as no address constraint */
  tolerateBadRanges?: boolean;
}

export interface SelectionResult {
  readonly selected: FunctionInfo[];
  readonly errors: string[];
  readonly warnings: ExportWarning[];
}

function selectionWarning(subject: string, message: string): ExportWarning {
  return { kind: 'selection', subject, message };
}

/**
 * Resolve the address constraint, or null when there is none.
 * @throws ConfigError when the ranges are malformed and not tolerated
 */
function addressConstraint(config: SelectionConfig, warnings: ExportWarning[]): RangeList | null {
  const spec = config.addressRanges;
  if (spec === undefined) return null;
  if (typeof spec === 'string' ? spec.trim().length === 0 : spec.length === 0) return null;
  try {
    return parseAddressRanges(spec);
  } catch (err) {
    if (!(err instanceof ConfigError) || !config.tolerateBadRanges) throw err;
    warnings.push(selectionWarning('address_set_str',
      `${err.explain}; ignoring the address constraint`));
    return null;
  }
}

function hasAnyTag(fn: FunctionInfo, tags: ReadonlySet<string>): boolean {
  return fn.tags.some((t) => tags.has(t));
}

/**
 * Apply the filters to the function universe.
 *
 * Filters narrow in order: address ranges, tags, then names. The result keeps
 * the universe's order, ties broken by identifier. Nothing is selected when
 * the configuration is malformed; the message is returned in `errors`.
 */
export function selectFunctions(universe: readonly FunctionInfo[], config: SelectionConfig): SelectionResult {
  const warnings: ExportWarning[] = [];
  let ranges: RangeList | null;
  try {
    ranges = addressConstraint(config, warnings);
  } catch (err) {
    return { selected: [], errors: [explainError(err)], warnings };
  }

  let cur = universe.map((fn, index) => ({ fn, index }));
  if (ranges !== null) {
    const rl = ranges;
    cur = cur.filter(({ fn }) => fn.address !== undefined && rl.inRange(fn.address));
  }

  const tags = new Set((config.tags ?? []).map((t) => t.trim()).filter((t) => t.length > 0));
  if (tags.size > 0) {
    const known = new Set(universe.flatMap((fn) => fn.tags));
    for (const t of tags) {
      if (!known.has(t))
        warnings.push(selectionWarning(t, `No function carries the tag ${t}`));
    }
    const exclude = config.excludeTags ?? true;
    cur = cur.filter(({ fn }) => hasAnyTag(fn, tags) !== exclude);
  }

  const names = (config.names ?? []).map((n) => n.trim()).filter((n) => n.length > 0);
  if (names.length > 0) {
    const wanted = new Set(names);
    const universeNames = new Set(universe.map((fn) => fn.name));
    for (const nm of wanted) {
      if (!universeNames.has(nm))
        warnings.push(selectionWarning(nm, `No function named ${nm}`));
    }
    cur = cur.filter(({ fn }) => wanted.has(fn.name));
  }

  cur.sort((a, b) => a.index - b.index || (a.fn.id < b.fn.id ? -1 : a.fn.id > b.fn.id ? 1 : 0));
  return { selected: cur.map(({ fn }) => fn), errors: [], warnings };
}
