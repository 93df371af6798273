import { is, types } from 'estree-toolkit';
import { isReservedKey } from '../guards';
import { tryResolveStaticValue } from './static-resolver';

/**
 * Extracts the static name from a non-computed Identifier key.
 *
 * ---
 *
 * Labels vs. References:
 * In `{ min: 0 }` the key `min` is a label (the string "min"), not a variable
 * reference. Passing it to the static resolver would treat it as a lookup and
 * reject it, so labels are captured here from syntax alone.
 *
 * - `{ min: 0 }`   → computed: false, Identifier → "min"
 * - `{ [min]: 0 }` → computed: true → `null`; the resolver decides
 *
 * @param property
 *   The property node to inspect.
 * @returns
 *   The identifier name when the key is a static label; otherwise `null`.
 */
function tryExtractNamedKey(property: types.Property): string | null {
  if (!property.computed && is.identifier(property.key)) {
    return property.key.name;
  }
  return null;
}

/**
 * Extracts the key of an object property inside an annotation value.
 *
 * ---
 *
 * Pathways:
 * [A] Syntax: non-computed Identifier keys are labels (`{ a: … }` → "a").
 * [B] Data: literal and computed keys go through the shared static resolver,
 *     so constants resolve the same on both sides of the colon:
 *     - `{ "a": … }`        → "a"
 *     - `{ [1]: … }`        → 1
 *     - `{ [`id-${1}`]: … }` → "id-1"
 *
 * Key Type Constraints:
 * Only `string` and `number` keys are addressable. Anything else (dynamic
 * keys, `null`, booleans, RegExp) returns `null`, which makes the enclosing
 * value non-static. So does `__proto__` in any spelling: written into the
 * decoded object it would replace the prototype, not add an entry.
 *
 * @param property
 *   The property node to inspect.
 * @returns
 *   The key as `string | number`, or `null` when it is not statically
 *   addressable.
 */
export function extractPropertyKey(
  property: types.Property
): string | number | null {
  // [A] Static Named Keys (Syntax)
  const namedKey = tryExtractNamedKey(property);
  if (namedKey !== null) {
    return isReservedKey(namedKey) ? null : namedKey;
  }

  // [B] Data Resolution
  const resolution = tryResolveStaticValue(property.key);

  if (resolution.success) {
    const resolvedValue = resolution.value;

    if (
      (typeof resolvedValue === 'string' ||
        typeof resolvedValue === 'number') &&
      !isReservedKey(resolvedValue)
    ) {
      return resolvedValue;
    }
  }

  return null;
}
