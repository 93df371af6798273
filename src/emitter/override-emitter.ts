import type { FieldAnnotation, OverrideBinding } from '../types';
import { PLACEHOLDER } from '../types';
import { deepFreeze } from '../guards';

/**
 * Canonical key of an override binding.
 *
 * `JSON.stringify` over the tuple keeps names containing separators apart
 * (`["a.b","c"]` vs `["a","b.c"]`).
 */
export function bindingKey(kind: string, type: string, field: string): string {
  return JSON.stringify([kind, type, field]);
}

/**
 * Turns the pairs of one kind application into override bindings.
 *
 * Placeholders are dropped: the kind default stays in force for those fields.
 * Values are deep-frozen so later lookups hand out the registered literal
 * without exposing it to mutation.
 *
 * @param typeName
 *   Record the pairs belong to.
 * @param kind
 *   Kind that consumed the values.
 * @param annotations
 *   `(field, value)` pairs in declared field order.
 * @returns
 *   One binding per non-placeholder pair, in input order.
 */
export function emitOverrides(
  typeName: string,
  kind: string,
  annotations: readonly FieldAnnotation[]
): OverrideBinding[] {
  const bindings: OverrideBinding[] = [];

  for (const { field, value } of annotations) {
    if (value === PLACEHOLDER) continue;

    bindings.push({ kind, type: typeName, field, value: deepFreeze(value) });
  }

  return bindings;
}
