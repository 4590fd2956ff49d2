/**
 * Default-value collection
 * Indexes `@Default` parameter markers by their owning type before any
 * candidate is classified.
 */

import { DefaultMarker, DefaultValueIndex, SymbolNode, TypeKey } from "./types";

export function createDefaultValueIndex(): DefaultValueIndex {
  return { entries: new Map(), collisions: [] };
}

/**
 * Walk enclosing declarations upward to the first aggregate type
 */
export function findOwner(node: SymbolNode): TypeKey | undefined {
  let current: SymbolNode | undefined = node.parent;
  while (current) {
    if (current.kind === "aggregate") {
      return current.key;
    }
    current = current.parent;
  }
  return undefined;
}

/**
 * Build the index for one round. Orphaned markers are dropped; for a repeated
 * (owner, parameter) pair the last marker wins and the pair is recorded as a
 * collision.
 */
export function collectDefaults(markers: Iterable<DefaultMarker>): DefaultValueIndex {
  const index = createDefaultValueIndex();

  for (const marker of markers) {
    const owner = findOwner(marker.declaration);
    if (owner === undefined) {
      continue;
    }

    let defaults = index.entries.get(owner);
    if (!defaults) {
      defaults = new Map();
      index.entries.set(owner, defaults);
    }

    if (defaults.has(marker.parameterName)) {
      index.collisions.push({
        owner,
        propertyName: marker.parameterName,
        previous: defaults.get(marker.parameterName),
        next: marker.expression,
      });
    }
    defaults.set(marker.parameterName, marker.expression);
  }

  return index;
}

export function lookupDefault(index: DefaultValueIndex, owner: TypeKey, propertyName: string): string | undefined {
  return index.entries.get(owner)?.get(propertyName);
}
