import { describe, expect, test } from 'vitest';
import { SKIP_VALUE } from '../constants';
import { extractStaticValueFromExpression } from '..';
import { getExpressionNode } from './estree-utils';
import type { ExtractionResult, TestScenario } from './types';

/**
 * Test suite: policy invariant proofs for static extraction.
 *
 * Scope:
 * - Array strictness.
 * - Object strictness.
 * - Propagation (any container bubbles child failure).
 *
 * Related coverage:
 * - Dynamic collapse cases live in extractor.dynamic.test.ts.
 * - Static-only cases live in extractor.static.test.ts.
 */
describe('Static Extraction Strategy (Policy Proofs)', () => {
  /**
   * Helper: Extracts a static value from a source expression.
   */
  const extractValue = (code: string): ExtractionResult =>
    extractStaticValueFromExpression(getExpressionNode(code), {}, 'root');

  /**
   * Invariant proofs that define how dynamic values affect containers.
   */
  describe('Policy Invariants', () => {
    const scenarios: TestScenario<ExtractionResult>[] = [
      {
        id: 'Array Strictness',
        description: 'Dynamic element collapses array to SKIP_VALUE.',
        code: '[someVar]',
        expected: SKIP_VALUE
      },
      {
        id: 'Object Strictness',
        description: 'Dynamic value collapses object; static entries are not kept.',
        code: '{ a: someVar, b: 1 }',
        expected: SKIP_VALUE
      },
      {
        id: 'Object Propagation',
        description: 'Object returns SKIP_VALUE when a child array collapses.',
        code: '{ a: [someVar] }',
        expected: SKIP_VALUE
      },
      {
        id: 'Array Propagation',
        description: 'Array returns SKIP_VALUE when a child object collapses.',
        code: '[{ a: someVar }]',
        expected: SKIP_VALUE
      },
      {
        id: 'Deep Propagation',
        description: 'Collapse bubbles through every level.',
        code: '{ a: [{ b: [1, someVar] }] }',
        expected: SKIP_VALUE
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(extractValue(code)).toEqual(expected);
    });
  });
});
