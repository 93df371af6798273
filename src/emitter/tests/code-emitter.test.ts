import { describe, expect, it, test } from 'vitest';
import { parse } from 'meriyah';

import type { RegistrySnapshot } from '../../types';
import { createRegistry } from '../../registry/registry';
import { isArray } from '../../guards';
import {
  emitSnapshotModule,
  printDeclaration,
  readSnapshotModule
} from '../code-emitter';

/**
 * Test suite: printing declarations and snapshot modules.
 *
 * Coverage:
 * - Printed declarations re-parse to the unannotated source.
 * - Snapshot modules read back to the same data and restore into a fresh
 *   registry.
 * - Malformed snapshot modules.
 */
describe('Code Emitter', () => {
  describe('printDeclaration', () => {
    it('prints the unannotated declaration', () => {
      const registry = createRegistry();
      const units = registry.defineKind('units', () => 1);

      const expansion = units.expand(
        'Model: { a: Int = 1 | "kg"; b: Units.Gram | "g"; c | _; }'
      );
      const printed = printDeclaration(expansion);

      expect(parse(printed)).toEqual(
        parse('Model: { a: Int = 1; b: Units.Gram; c; }')
      );
      expect(printDeclaration(expansion.program)).toBe(printed);
    });

    it('leaves an unannotated declaration unchanged', () => {
      const registry = createRegistry();
      const units = registry.defineKind('units', () => 1);
      const source = 'Model: { a; b = [0, 1]; c: Int; }';

      expect(parse(printDeclaration(units.expand(source)))).toEqual(
        parse(source)
      );
    });
  });

  describe('Snapshot Modules', () => {
    const populate = () => {
      const registry = createRegistry();
      const units = registry.defineKind('units', () => 1);
      const meta = registry.defineKind<unknown>('meta', () => null);
      const Model = units.declare(
        'Model: { a: Int = -1 | "kg"; b = [0, 1]; c; }'
      );
      meta.annotate(Model, 'a | 10n; b | /^x+$/g; c | { hint: undefined };');
      return registry;
    };

    it('starts with a single default export', () => {
      const text = emitSnapshotModule({ records: [], bindings: [] });

      expect(text.startsWith('export default {')).toBe(true);
      expect(readSnapshotModule(text)).toEqual({ records: [], bindings: [] });
    });

    it('reads back the data it wrote', () => {
      const snapshot = populate().snapshot();

      expect(readSnapshotModule(emitSnapshotModule(snapshot))).toEqual(snapshot);
    });

    it('reads back frozen data without patterns', () => {
      const registry = createRegistry();
      const units = registry.defineKind<unknown>('units', () => 1);
      units.declare(
        'M: { a | [1, , 3]; b = { min: -1 } | NaN; c | -Infinity; d | -0; }'
      );
      const snapshot = registry.snapshot();

      const restored = readSnapshotModule(emitSnapshotModule(snapshot));
      const valueOf = (field: string) =>
        restored.bindings.find(binding => binding.field === field)?.value;

      const holes = valueOf('a');

      expect(restored).toEqual(snapshot);
      expect(isArray(holes)).toBe(true);
      expect(isArray(holes) && 1 in holes).toBe(false);
      expect(holes).toEqual([1, undefined, 3]);
      expect(valueOf('c')).toBe(-Infinity);
      expect(valueOf('d')).toBe(-0);
    });

    it('writes patterns nested in containers', () => {
      const registry = createRegistry();
      const meta = registry.defineKind<unknown>('meta', () => null);
      const Model = meta.declare(
        'Model: { a = [/y/g] | { pattern: /x/i, list: [/z/m] }; }'
      );
      const text = emitSnapshotModule(registry.snapshot());

      const restored = createRegistry();
      const restoredMeta = restored.defineKind<unknown>('meta', () => null);
      restored.restore(readSnapshotModule(text));

      expect(restoredMeta(restored.record('Model'), 'a')).toEqual({
        pattern: /x/i,
        list: [/z/m]
      });
      expect(restored.record('Model').create()).toEqual({ a: [/y/g] });
      expect(meta(Model, 'a')).toEqual(restoredMeta(restored.record('Model'), 'a'));
    });

    it('restores a printed snapshot into a fresh registry', () => {
      const text = emitSnapshotModule(populate().snapshot());

      const registry = createRegistry();
      const units = registry.defineKind('units', () => 1);
      const meta = registry.defineKind<unknown>('meta', () => null);
      registry.restore(readSnapshotModule(text));
      const Model = registry.record('Model');

      expect(units(Model)).toEqual(['kg', 1, 1]);
      expect(meta(Model)).toEqual([10n, /^x+$/g, { hint: undefined }]);
      expect(Model.create({ c: true })).toEqual({ a: -1, b: [0, 1], c: true });
    });

    const invalid = [
      {
        id: 'Syntax',
        description: 'Source must parse',
        text: 'export default {',
        expected: /^\[field-metadata\] Snapshot module is invalid: source does not parse \(/
      },
      {
        id: 'Extra Statements',
        description: 'Only the default export is allowed',
        text: 'const data = { records: [], bindings: [] };\nexport default data;',
        expected:
          '[field-metadata] Snapshot module is invalid: expected a single `export default` statement'
      },
      {
        id: 'Dynamic Export',
        description: 'The module is never evaluated',
        text: 'export default load();',
        expected:
          '[field-metadata] Snapshot module is invalid: default export is not static data (at snapshot)'
      },
      {
        id: 'Missing Lists',
        description: 'Both lists are required',
        text: 'export default { records: [] };',
        expected:
          '[field-metadata] Snapshot module is invalid: default export must have `records` and `bindings`'
      },
      {
        id: 'Bad Binding',
        description: 'Bindings name kind, type and field',
        text: 'export default { records: [], bindings: [{ kind: "units", type: "Model" }] };',
        expected:
          '[field-metadata] Snapshot module is invalid: snapshot.bindings[0] is not an override binding'
      },
      {
        id: 'Reserved Field',
        description: 'Field names cannot replace the prototype',
        text: 'export default { records: [{ typeName: "M", fields: [{ name: "__proto__", type: null, hasDefault: false }] }], bindings: [] };',
        expected:
          '[field-metadata] Snapshot module is invalid: snapshot.records[0].fields[0] is not a field definition'
      },
      {
        id: 'Bad Field',
        description: 'Field definitions carry a default flag',
        text: 'export default { records: [{ typeName: "Model", fields: [{ name: "a", type: null }] }], bindings: [] };',
        expected:
          '[field-metadata] Snapshot module is invalid: snapshot.records[0].fields[0] is not a field definition'
      }
    ];

    test.for(invalid)('[$id] $description', ({ text, expected }) => {
      expect(() => readSnapshotModule(text)).toThrow(expected);
    });

    it('drops a default value when the flag says there is none', () => {
      const snapshot: RegistrySnapshot = readSnapshotModule(
        'export default { records: [{ typeName: "M", fields: [{ name: "a", type: null, hasDefault: false, defaultValue: 1 }] }], bindings: [] };'
      );

      expect(snapshot.records[0]?.fields).toEqual([
        { name: 'a', type: null, hasDefault: false }
      ]);
    });
  });
});
