import type { PropertyBag, PropertyDiff, PropertyValue } from '../types/device.js';

/**
 * Apply a property diff to a bag, returning a new frozen bag.
 *
 * Keys whose diff value is `null` are removed, every other key in the diff
 * overwrites the current value, and keys absent from the diff are kept.
 *
 * @example
 * ```typescript
 * applyPropertyDiff({ state: 'OFF', brightness: 200 }, { brightness: null, state: 'ON' });
 * // => { state: 'ON' }
 * ```
 */
export function applyPropertyDiff(bag: PropertyBag, diff: PropertyDiff): PropertyBag {
  const next: Record<string, PropertyValue> = { ...bag };

  for (const [key, value] of Object.entries(diff)) {
    if (value === null) {
      delete next[key];
    } else {
      next[key] = value;
    }
  }

  return Object.freeze(next);
}

/**
 * Combine two diffs into one, `later` winning per key. A `null` in `later`
 * survives so that the deletion still applies.
 */
export function combinePropertyDiffs(earlier: PropertyDiff, later: PropertyDiff): PropertyDiff {
  return Object.freeze({ ...earlier, ...later });
}

/**
 * Structural equality for property values.
 */
export function propertyValuesEqual(a: PropertyValue | null, b: PropertyValue | null): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  if (typeof a !== 'object' || typeof b !== 'object') return false;

  if (isValueArray(a) || isValueArray(b)) {
    if (!isValueArray(a) || !isValueArray(b) || a.length !== b.length) return false;
    return a.every((item, index) => propertyValuesEqual(item, b[index] ?? null));
  }

  const aKeys = Object.keys(a);
  const bKeys = Object.keys(b);
  if (aKeys.length !== bKeys.length) return false;
  return aKeys.every((key) => key in b && propertyValuesEqual(a[key] ?? null, b[key] ?? null));
}

function isValueArray(value: PropertyValue): value is readonly PropertyValue[] {
  return Array.isArray(value);
}
