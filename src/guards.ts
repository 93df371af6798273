import type { types } from 'estree-toolkit';

import type { StaticValue } from './types';

/**
 * Checks whether a value is an array.
 *
 * Wrapper around `Array.isArray` that acts as a TypeScript **type guard**
 * (`value is readonly unknown[]`), so frozen arrays narrow as well.
 *
 * @param value  Value to test.
 * @returns      `true` if `value` is an array.
 */
export function isArray(value: unknown): value is readonly unknown[] {
  return Array.isArray(value);
}

/**
 * Determines whether a value is a "plain object" (a simple POJO / dictionary
 * object).
 *
 * A value is considered plain if all of the following are true:
 * 1. It is not `null`.
 * 2. `typeof value === "object"`.
 * 3. Its prototype is either:
 *    - `Object.prototype` (typical object literals / `new Object()`), or
 *    - `null` (objects created via `Object.create(null)`).
 *
 * As a result, this returns `false` for arrays, RegExps, Maps, Sets and class
 * instances.
 *
 * @param value
 *   The value to test.
 * @returns
 *   `true` if `value` is a plain object; otherwise `false`.
 */
export function isPlainObject(
  value: unknown
): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;

  const proto = Object.getPrototypeOf(value);
  return proto === null || proto === Object.prototype;
}

/**
 * Narrowing helper for "object-like" values.
 *
 * Many type guards start from `unknown`. This helper provides a safe first step:
 * it checks that the value is a non-null object so properties can be read without
 * runtime errors and without type assertions.
 *
 * @param value
 *   Unknown value to test.
 * @returns
 *   `true` if `value` is a non-null object; otherwise `false`.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Checks whether a runtime value is "node-like" enough to be treated as an
 * ESTree node by `estree-toolkit` type guards.
 *
 * This is a shallow bridge guard between the parser's own ESTree typings and
 * the `estree` typings used everywhere else:
 * - ensures the value is an object (not null)
 * - excludes arrays
 * - ensures a string `type` discriminator exists
 *
 * @param value
 *   Runtime value to validate (typically parser output).
 * @returns
 *   `true` if `value` has the minimal shape of an ESTree node.
 */
export function isNodeLike(value: unknown): value is types.Node {
  return isRecord(value) && !isArray(value) && typeof value.type === 'string';
}

/**
 * Checks whether a value is a {@link StaticValue}: a primitive, a RegExp, or
 * an array / plain object made of static values.
 *
 * Sparse array slots are skipped, matching how the extractor preserves
 * elisions.
 *
 * @param value
 *   Value to test.
 * @returns
 *   `true` if the whole tree is static data.
 */
export function isStaticValue(value: unknown): value is StaticValue {
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
    case 'undefined':
      return true;

    case 'object':
      if (value === null || value instanceof RegExp) return true;
      if (isArray(value)) return value.every(isStaticValue);
      if (isPlainObject(value)) {
        return (
          !Object.hasOwn(value, RESERVED_KEY) &&
          Object.values(value).every(isStaticValue)
        );
      }
      return false;

    default:
      return false;
  }
}

/**
 * The one key that cannot name a field or an object entry: assigning it
 * replaces the prototype instead of adding a property.
 */
export const RESERVED_KEY = '__proto__';

export function isReservedKey(key: string | number): boolean {
  return key === RESERVED_KEY;
}

/**
 * Recursively freezes arrays and plain objects in place.
 *
 * Used on override values and record defaults before they are stored, so a
 * value returned by an accessor cannot be mutated into the registry. RegExp
 * instances are left alone: freezing one breaks `exec` on global patterns.
 *
 * @param value
 *   Value to freeze.
 * @returns
 *   The same value, frozen.
 */
export function deepFreeze<T>(value: T): T {
  if (isArray(value)) {
    for (const item of value) deepFreeze(item);
    Object.freeze(value);
  } else if (isPlainObject(value)) {
    for (const item of Object.values(value)) deepFreeze(item);
    Object.freeze(value);
  }

  return value;
}
