/**
 * Canonical value tree.
 *
 * Every payload and trait set is normalized into this JSON-like shape before
 * it is attached to an event. Values are frozen once built; equality is
 * structural.
 */

export type CanonicalPrimitive = null | boolean | number | string;

export type CanonicalList = readonly CanonicalValue[];

/** Ordered key/value map. Insertion order is kept for stable serialization. */
export interface CanonicalMap {
  readonly [key: string]: CanonicalValue;
}

export type CanonicalValue = CanonicalPrimitive | CanonicalList | CanonicalMap;

export const EMPTY_MAP: CanonicalMap = Object.freeze({});

export function isCanonicalList(value: CanonicalValue): value is CanonicalList {
  return Array.isArray(value);
}

export function isCanonicalMap(value: CanonicalValue): value is CanonicalMap {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Structural equality. Lists compare element-wise in order; maps compare by
 * key set and values, ignoring insertion order.
 */
export function canonicalEquals(a: CanonicalValue, b: CanonicalValue): boolean {
  if (a === b) return true;

  if (isCanonicalList(a)) {
    if (!isCanonicalList(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && canonicalEquals(item, other);
    });
  }

  if (isCanonicalMap(a)) {
    if (!isCanonicalMap(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => {
      const mine = a[key];
      const other = b[key];
      return mine !== undefined && other !== undefined && canonicalEquals(mine, other);
    });
  }

  return false;
}

/**
 * Deep-freezes a value tree in place and returns it. Children of an already
 * frozen node are still visited.
 */
export function freezeCanonical<T extends CanonicalValue>(value: T): T {
  freezeTree(value, new Set());
  return value;
}

function freezeTree(value: CanonicalValue, seen: Set<object>): void {
  if (value === null || typeof value !== 'object' || seen.has(value)) return;
  seen.add(value);
  Object.freeze(value);

  const children = isCanonicalList(value) ? value : Object.values(value);
  for (const item of children) freezeTree(item, seen);
}
