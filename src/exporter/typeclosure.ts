/**
 * @file typeclosure.ts
 * @description Transitive closure of the data-types a function depends on.
 */

import type { DeclarationSet, TypeEntry } from './declset.js';
import { type Datatype, TypeOpaque } from './type.js';

/**
 * Add a data-type and everything it is built from to the closure.
 *
 * The entry for `root` is inserted, still open, before any component is
 * visited. Any path that leads back to `root` (a structure holding a pointer
 * to itself, two structures pointing at each other) finds the entry already
 * present and stops there.
 *
 * Components are visited in declaration order: pointed-to type, array element,
 * aliased type, fields, return type then parameters.
 */
export function closeType(root: Datatype, acc: DeclarationSet): void {
  closeTypeFrom(root, acc, null);
}

/** Where a data-type was reached from, for placeholder warnings */
interface FieldContext {
  parent: Datatype;
  field: string;
}

function closeTypeFrom(root: Datatype, acc: DeclarationSet, from: FieldContext | null): void {
  const identity = root.getIdentity();
  const prev = acc.types.get(identity);
  if (prev !== undefined) {
    if (prev.type !== root) checkSameShape(prev, root, acc);
    return;
  }

  const entry: TypeEntry = { identity, type: root, state: 'open' };
  acc.types.set(identity, entry);

  if (root instanceof TypeOpaque) {
    if (from !== null)
      acc.warn('opaque-type', identity,
        `Field ${from.field} of ${from.parent.getIdentity()} has unresolved type ${root.getName()}; using a placeholder`);
    else
      acc.warn('opaque-type', identity, `Unresolved type ${root.getName()}; using a placeholder`);
  }

  if (root.isComposite()) {
    for (const fld of root.getFields())
      closeTypeFrom(fld.type, acc, { parent: root, field: fld.name });
  } else {
    const size = root.numDepend();
    for (let i = 0; i < size; ++i)
      closeTypeFrom(root.getDepend(i), acc, null);
  }

  entry.state = 'closed';
}

/**
 * Two distinct objects with one identity must describe the same definition.
 * Otherwise the first one seen wins.
 */
function checkSameShape(prev: TypeEntry, ct: Datatype, acc: DeclarationSet): void {
  if (prev.type.getShape() === ct.getShape()) return;
  acc.conflict('type-conflict', prev.identity,
    `Conflicting definitions of ${prev.identity}; keeping the first one seen`);
}
