import { describe, expect, it, test } from 'vitest';

import type { DeclarationSubject } from '../../report';
import { parseFieldListSource, parseRecordSource } from '../parse-source';
import {
  assertNoResidualChain,
  readFieldList,
  toFieldDefinition
} from '../finalize';

const subject: DeclarationSubject = { extension: 'default', typeName: 'Model' };

/**
 * Test suite: declaration source parsing and field finalization.
 *
 * Coverage:
 * - Record sources (one labeled block) and field lists (bare or braced).
 * - Parser failures reported with their cause.
 * - Duplicate fields, residual chains and ordinary default decoding.
 */
describe('Declaration Source', () => {
  describe('parseRecordSource', () => {
    it('splits the label from the field statements', () => {
      const parsed = parseRecordSource('Model: { a; b: Int = 1; }', 'default');

      expect(parsed.typeName).toBe('Model');
      expect(parsed.label).toEqual({ type: 'Identifier', name: 'Model' });
      expect(parsed.statements.map(statement => statement.type)).toEqual([
        'ExpressionStatement',
        'LabeledStatement'
      ]);
    });

    it('accepts a record without fields', () => {
      expect(parseRecordSource('Empty: {}', 'default').statements).toEqual([]);
    });

    const malformed = [
      {
        id: 'Bare Block',
        description: 'A block without a label names no record',
        code: '{ a; }'
      },
      {
        id: 'Two Records',
        description: 'One declaration declares one record',
        code: 'A: { a; } B: { b; }'
      },
      {
        id: 'Labeled Field',
        description: 'The label must introduce a block',
        code: 'Model: Int;'
      },
      {
        id: 'Empty Source',
        description: 'Empty source declares nothing',
        code: ''
      }
    ];

    test.for(malformed)('[$id] $description', ({ code }) => {
      expect(() => parseRecordSource(code, 'default')).toThrow(
        '[field-metadata] Cannot expand declaration with "default": expected a single labeled block such as "Model: { a; b; }"'
      );
    });

    it('keeps the parser error as cause', () => {
      let caught: unknown;

      try {
        parseRecordSource('Model: { a: Int = ; }', 'default');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(Error);
      if (!(caught instanceof Error)) return;

      expect(caught.message).toMatch(
        /^\[field-metadata\] Cannot expand declaration with "default": source does not parse \(/
      );
      expect(caught.cause).toBeInstanceOf(Error);
    });
  });

  describe('parseFieldListSource', () => {
    const scenarios = [
      {
        id: 'Bare List',
        description: 'Statements without braces',
        code: 'a | 4; b | 9;',
        expected: 2
      },
      {
        id: 'Braced List',
        description: 'Statements wrapped in one block',
        code: '{ a | 4; b | 9; c; }',
        expected: 3
      },
      {
        id: 'Empty',
        description: 'An empty list annotates nothing',
        code: '',
        expected: 0
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(parseFieldListSource(code, subject)).toHaveLength(expected);
    });
  });

  describe('readFieldList', () => {
    it('reads fields in declared order', () => {
      const statements = parseFieldListSource('b; a: Int; c = 1;', subject);

      expect(readFieldList(statements, subject).map(field => field.name)).toEqual(
        ['b', 'a', 'c']
      );
    });

    it('rejects a field declared twice', () => {
      const statements = parseFieldListSource('a: Int; b; a | 2;', subject);

      expect(() => readFieldList(statements, subject)).toThrow(
        '[field-metadata] Cannot expand "Model" with "default": field "a" is declared more than once'
      );
    });
  });

  describe('assertNoResidualChain', () => {
    it('rejects values left after the last link', () => {
      const [field] = readFieldList(parseFieldListSource('a | 1 | 2;', subject), subject);
      if (!field) throw new Error('Expected a field.');

      expect(() => assertNoResidualChain(field, [1], subject)).toThrow(
        'field "a" still carries 1 annotation value(s) after expansion'
      );
      expect(() => assertNoResidualChain(field, [], subject)).not.toThrow();
    });
  });

  describe('toFieldDefinition', () => {
    const definitionOf = (code: string) => {
      const [field] = readFieldList(parseFieldListSource(code, subject), subject);
      if (!field) throw new Error('Expected a field.');
      return toFieldDefinition(field, subject);
    };

    const scenarios = [
      {
        id: 'No Default',
        description: 'A field without default says so',
        code: 'a: Int;',
        expected: { name: 'a', type: 'Int', hasDefault: false }
      },
      {
        id: 'Static Default',
        description: 'Chain values never reach the ordinary default',
        code: 'a: Int = 1 | 4;',
        expected: { name: 'a', type: 'Int', hasDefault: true, defaultValue: 1 }
      },
      {
        id: 'Container Default',
        description: 'Containers decode under the strict policy',
        code: 'range = { min: -1, max: 1 };',
        expected: {
          name: 'range',
          type: null,
          hasDefault: true,
          defaultValue: { min: -1, max: 1 }
        }
      }
    ];

    test.for(scenarios)('[$id] $description', ({ code, expected }) => {
      expect(definitionOf(code)).toEqual(expected);
    });

    it('freezes container defaults', () => {
      const definition = definitionOf('range = [0, 1];');

      expect(definition.hasDefault && Object.isFrozen(definition.defaultValue)).toBe(
        true
      );
    });

    it('rejects a dynamic ordinary default', () => {
      expect(() => definitionOf('a = Date.now();')).toThrow(
        '[field-metadata] Cannot expand "Model" with "default": field "a": ordinary default is not a static literal (at Model.a.<default>)'
      );
    });
  });
});
