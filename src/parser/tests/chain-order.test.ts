import { describe, expect, it, test } from 'vitest';
import { type ChainValueAssignment, assignChainValues } from '../chain-order';

type ChainScenario = {
  id: string;
  description: string;
  kinds: string[];
  values: unknown[];
  expected: ChainValueAssignment<string, unknown>;
};

/**
 * Test suite: positional assignment of chain values to kinds.
 *
 * Coverage:
 * - Reversal: last-listed kind takes the rightmost written value.
 * - Short chains: earliest-listed kinds get nothing.
 * - Residual values: leftmost values are returned unconsumed.
 * - `undefined` is a value, not a gap.
 */
describe('assignChainValues', () => {
  it('gives the rightmost value to the last-listed kind', () => {
    // 1. Three kinds, three values: `bar: Int | 7 | "g" | "grams of bar"`.
    const result = assignChainValues(
      ['label', 'units', 'default'],
      [7, 'g', 'grams of bar']
    );

    // 2. Application order runs from the last-listed kind backwards.
    expect(result.assignments).toEqual([
      { kind: 'default', value: 'grams of bar' },
      { kind: 'units', value: 'g' },
      { kind: 'label', value: 7 }
    ]);
    expect(result.remaining).toEqual([]);
  });

  const scenarios: ChainScenario[] = [
    {
      id: 'Single',
      description: 'One kind consumes the only value',
      kinds: ['default'],
      values: [4],
      expected: { assignments: [{ kind: 'default', value: 4 }], remaining: [] }
    },
    {
      id: 'Short Chain',
      description: 'Earliest-listed kinds get nothing when values run out',
      kinds: ['label', 'units', 'default'],
      values: ['g'],
      expected: {
        assignments: [{ kind: 'default', value: 'g' }],
        remaining: []
      }
    },
    {
      id: 'Two Of Three',
      description: 'Two values feed the two last-listed kinds',
      kinds: ['label', 'units', 'default'],
      values: ['g', 'grams'],
      expected: {
        assignments: [
          { kind: 'default', value: 'grams' },
          { kind: 'units', value: 'g' }
        ],
        remaining: []
      }
    },
    {
      id: 'Residual',
      description: 'Values beyond the kind count stay in written order',
      kinds: ['units'],
      values: [1, 2, 3],
      expected: {
        assignments: [{ kind: 'units', value: 3 }],
        remaining: [1, 2]
      }
    },
    {
      id: 'No Values',
      description: 'A field without a chain produces no assignment',
      kinds: ['label', 'units'],
      values: [],
      expected: { assignments: [], remaining: [] }
    },
    {
      id: 'No Kinds',
      description: 'Every value remains when there is no kind',
      kinds: [],
      values: [1],
      expected: { assignments: [], remaining: [1] }
    }
  ];

  test.for(scenarios)('[$id] $description', ({ kinds, values, expected }) => {
    expect(assignChainValues(kinds, values)).toEqual(expected);
  });

  it('treats undefined as a consumed value', () => {
    // 1. `a | undefined | 2` with two kinds.
    const result = assignChainValues(['first', 'second'], [undefined, 2]);

    // 2. Both slots are assigned; `undefined` is not skipped.
    expect(result.assignments).toEqual([
      { kind: 'second', value: 2 },
      { kind: 'first', value: undefined }
    ]);
    expect(result.assignments).toHaveLength(2);
    expect(result.remaining).toEqual([]);
  });

  it('does not mutate its inputs', () => {
    const kinds = Object.freeze(['a', 'b']);
    const values = Object.freeze([1, 2, 3]);

    const result = assignChainValues(kinds, values);

    expect(result.remaining).toEqual([1]);
    expect(values).toEqual([1, 2, 3]);
  });
});
