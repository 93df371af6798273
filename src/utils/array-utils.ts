/**
 * Keeps an elision (`[0, , 1]`) as a hole in a decoded array value.
 *
 * ESTree writes an elision as a `null` entry in `ArrayExpression.elements`.
 * The decoded value must keep the slot missing rather than store `undefined`
 * there: `1 in [0, , 1]` is `false`, `1 in [0, undefined, 1]` is `true`, and
 * a bound such as `a | [0, , 1]` is registered exactly as written.
 *
 * Growing `length` past `slotIndex` without assigning creates the hole.
 *
 * @param result
 *   Array being decoded.
 * @param slotIndex
 *   Index of the elided slot.
 */
export function preserveArrayElision(
  result: unknown[],
  slotIndex: number
): void {
  if (result.length < slotIndex + 1) result.length = slotIndex + 1;
}
