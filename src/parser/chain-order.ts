import type { ChainReversal } from '../architecture';

/**
 * A chain value paired with the kind that consumes it.
 */
export type ChainAssignment<K, V> = {
  kind: K;
  value: V;
};

export type ChainValueAssignment<K, V> = {
  /**
   * Pairs in application order: the last-listed kind comes first.
   */
  assignments: ChainAssignment<K, V>[];

  /**
   * Written values no kind consumed, still in written order. Non-empty means
   * the field carries a residual chain.
   */
  remaining: V[];
};

/**
 * Distributes the written chain values of one field over the kinds of an
 * extension.
 *
 * ---
 *
 * Links run in reverse listing order and each one consumes the outermost
 * (rightmost) value left, so the last-listed kind takes the last written value,
 * the one before it takes the value before that, and so on
 * (see {@link ChainReversal}).
 *
 * - More kinds than values: the earliest-listed kinds get nothing.
 * - More values than kinds: the leftmost values are returned as `remaining`.
 *
 * Example:
 *   assignChainValues(['label', 'units', 'default'], [7, 'g', 'grams of bar'])
 *   // assignments: default ← 'grams of bar', units ← 'g', label ← 7
 *   // remaining:   []
 *
 * @param kinds
 *   Kinds in the order the extension lists them.
 * @param values
 *   Chain values in the order they were written.
 * @returns
 *   Assignments in application order and the unconsumed values.
 */
export function assignChainValues<K, V>(
  kinds: readonly K[],
  values: readonly V[]
): ChainValueAssignment<K, V> {
  const assignments: ChainAssignment<K, V>[] = [];

  let cursor = values.length;

  for (let index = kinds.length - 1; index >= 0 && cursor > 0; index--) {
    cursor--;
    assignments.push({ kind: kinds[index], value: values[cursor] });
  }

  return { assignments, remaining: values.slice(0, cursor) };
}
