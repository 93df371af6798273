import { describe, it, expect, test } from 'vitest';
import { extractLiteral, extractStaticValueFromExpression } from '..';
import { getExpressionNode } from './estree-utils';
import type { ExtractionResult, TestScenario } from './types';

/**
 * Test suite: static-only extraction behavior.
 *
 * Coverage:
 * - Static container shapes.
 * - Leaves that are objects at runtime (RegExp, null).
 * - Sparse array preservation.
 * - The `extractLiteral` adapter on success.
 */
describe('Static Extraction Strategy (Static-Only)', () => {
  /**
   * Helper: Extracts a static value from a source expression.
   */
  const extractValue = (code: string): ExtractionResult =>
    extractStaticValueFromExpression(getExpressionNode(code), {}, 'root');

  /**
   * Static container shapes with nested arrays and objects.
   */
  describe('Static Containers', () => {
    const scenarios: TestScenario[] = [
      {
        id: 'Array of Primitives',
        description: 'Static array of primitives',
        code: '[1, "a", true]',
        expected: [1, 'a', true]
      },
      {
        id: 'Signed Bounds',
        description: 'Array of signed numbers',
        code: '[-1, +1]',
        expected: [-1, 1]
      },
      {
        id: 'Nested Arrays',
        description: 'Nested static arrays',
        code: '[[1], [2, 3]]',
        expected: [[1], [2, 3]]
      },
      {
        id: 'Nested Objects',
        description: 'Nested static objects',
        code: '{ a: { b: 2 }, c: "x" }',
        expected: { a: { b: 2 }, c: 'x' }
      },
      {
        id: 'Mixed Nesting',
        description: 'Mixed static nesting (objects and arrays)',
        code: '{ items: [1, { id: 2 }], flag: false }',
        expected: { items: [1, { id: 2 }], flag: false }
      },
      {
        id: 'Empty Containers',
        description: 'Empty array and object literals are static',
        code: '[[], {}]',
        expected: [[], {}]
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(extractValue(code)).toEqual(expected);
    });
  });

  describe('Object-Typed Leaves', () => {
    it('keeps RegExp literals as RegExp instances', () => {
      const value = extractValue('{ pattern: /^g(rams)?$/i }');

      expect(value).toEqual({ pattern: /^g(rams)?$/i });
    });

    it('keeps null distinct from undefined', () => {
      expect(extractValue('[null, undefined]')).toEqual([null, undefined]);
    });
  });

  /**
   * Sparse array preservation (holes are not coerced to undefined entries).
   */
  describe('Sparse Arrays', () => {
    it('preserves elisions as holes (index is absent, not an explicit undefined element)', () => {
      // 1. Extract a sparse array literal.
      const value = extractValue('[1, , 2]');

      // 2. Assert the result is an array.
      if (!Array.isArray(value)) {
        throw new Error('Expected an array.');
      }

      // 3. Assert structural shape (three positions total).
      expect(value).toHaveLength(3);

      // 4. Assert the static elements are preserved.
      expect(value[0]).toBe(1);
      expect(value[2]).toBe(2);

      // 5. Assert the elision is preserved as a hole (index 1 is not an own property).
      expect(Object.hasOwn(value, 1)).toBe(false);
    });
  });

  describe('extractLiteral', () => {
    it('wraps a static value in a success result', () => {
      expect(extractLiteral(getExpressionNode('[1, 4]'), 'Model.a')).toEqual({
        success: true,
        value: [1, 4]
      });
    });

    it('reports undefined as a value, not as a failure', () => {
      expect(extractLiteral(getExpressionNode('undefined'), 'Model.a')).toEqual(
        { success: true, value: undefined }
      );
    });
  });
});
