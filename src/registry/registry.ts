import type { RegistryLifecycle } from '../architecture';
import type {
  ChainHandle,
  DeclarationExpansion,
  DefaultExpression,
  KindHandle,
  Metadata,
  MetadataExtension,
  MetadataRegistry,
  OverrideBinding,
  RecordDeclaration,
  RecordTarget,
  RecordType,
  RegistryOptions,
  RegistrySnapshot
} from '../types';
import {
  reportDeclarationError,
  reportDuplicateExtension,
  reportEmptyChain,
  reportFrozenRegistry,
  reportInvalidTarget,
  reportRecordRedeclared,
  reportUndefinedExtension,
  reportUndefinedKind,
  reportUnknownField,
  reportUnknownRecord
} from '../report';
import { deepFreeze, isReservedKey } from '../guards';
import { aggregateFields } from './aggregate';
import { createBindingTable } from './binding-table';
import { type ExtensionHost, createExtension } from './extension';
import type { RecordExpansion } from './expansion';
import { createKindHandle } from './kind';
import {
  createRecordType,
  isRecordType,
  isSameDeclaration,
  typeOf
} from './record-type';

const DEFAULT_PLACEHOLDER = '_';

/**
 * Creates an empty registry in its load phase.
 *
 * Kinds, chains, record types and overrides live in the returned value only;
 * two registries never share state. See {@link RegistryLifecycle}.
 *
 * @example
 *   const registry = createRegistry();
 *   const bounds = registry.defineKind('bounds', () => [1e-7, 1.0]);
 *   const Model = bounds.declare(`Model: { a: Int | [1, 4]; }`);
 *   bounds(Model, 'a'); // [1, 4]
 *
 * @param options
 *   Placeholder token and diagnostics hooks.
 */
export function createRegistry(options: RegistryOptions = {}): MetadataRegistry {
  const placeholder = options.placeholder ?? DEFAULT_PLACEHOLDER;

  const extensions = new Map<string, MetadataExtension>();
  const defaults = new Map<string, DefaultExpression<unknown>>();
  const records = new Map<string, RecordType>();
  const table = createBindingTable();

  let frozen = false;

  const assertLoadPhase = (operation: string): void => {
    if (frozen) reportFrozenRegistry(operation);
  };

  /**
   * Resolves an accessor target to a record type of this registry.
   */
  const resolveTarget = (target: RecordTarget, extension: string): RecordType => {
    const type = isRecordType(target)
      ? target
      : (typeOf(target) ?? reportInvalidTarget(extension));

    if (records.get(type.name) !== type) {
      return reportUnknownRecord(type.name);
    }

    return type;
  };

  const resolveRecord = (target: RecordType | string): RecordType => {
    if (typeof target === 'string') {
      return records.get(target) ?? reportUnknownRecord(target);
    }
    if (records.get(target.name) !== target) {
      return reportUnknownRecord(target.name);
    }
    return target;
  };

  /**
   * Two-level lookup: the exact binding, else a fresh default.
   */
  const lookupValue = <V>(
    kind: string,
    type: RecordType,
    field: string,
    defaultExpr: DefaultExpression<V>
  ): Metadata<V> => {
    // Unknown fields fail here, with the record's own error.
    type.field(field);

    const binding = table.get(kind, type.name, field);
    if (binding !== undefined) return binding.value;

    return defaultExpr({ kind, type, field });
  };

  /**
   * Returns the type to use for a declaration: the existing one when the
   * fields are identical, a new one when the name is free.
   */
  const prepareRecord = (declaration: RecordDeclaration): RecordType | null => {
    const existing = records.get(declaration.typeName);
    if (existing === undefined) return null;

    if (!isSameDeclaration(existing.declaration, declaration)) {
      return reportRecordRedeclared(declaration.typeName);
    }
    return existing;
  };

  const writeBindings = (bindings: readonly OverrideBinding[]): void => {
    for (const binding of bindings) {
      const replaced = table.set(binding);
      options.onBinding?.({ binding, replaced });
    }
  };

  const host: ExtensionHost = {
    placeholder,
    assertLoadPhase,
    resolveRecord,

    commitDeclaration(expansion: RecordExpansion): RecordType {
      const type =
        prepareRecord(expansion.record) ?? createRecordType(expansion.record);
      records.set(type.name, type);

      writeBindings(expansion.bindings);
      options.onExpansion?.({
        extension: expansion.extension,
        typeName: expansion.typeName,
        form: 'declare',
        bindingCount: expansion.bindings.length
      });

      return type;
    },

    commitAnnotation(expansion: DeclarationExpansion): void {
      writeBindings(expansion.bindings);
      options.onExpansion?.({
        extension: expansion.extension,
        typeName: expansion.typeName,
        form: 'annotate',
        bindingCount: expansion.bindings.length
      });
    }
  };

  const registerName = (name: string, operation: string): void => {
    assertLoadPhase(operation);
    if (extensions.has(name)) reportDuplicateExtension(name);
  };

  return {
    placeholder,

    get isFrozen() {
      return frozen;
    },

    defineKind<V>(name: string, defaultExpr: DefaultExpression<V>): KindHandle<V> {
      registerName(name, `defineKind("${name}")`);

      const handle = createKindHandle<V>(createExtension(name, [name], host), {
        lookup: (target, field) =>
          lookupValue(name, resolveTarget(target, name), field, defaultExpr),

        aggregate: target => {
          const type = resolveTarget(target, name);
          return aggregateFields(type, field =>
            lookupValue(name, type, field, defaultExpr)
          );
        }
      });

      extensions.set(name, handle);
      defaults.set(name, defaultExpr);
      return handle;
    },

    defineChain(name: string, links: readonly string[]): ChainHandle {
      registerName(name, `defineChain("${name}")`);

      if (links.length === 0) reportEmptyChain(name);

      // Nested chains contribute their kinds in their own listing order.
      const kinds = links.flatMap(
        link =>
          (
            extensions.get(link) ??
            reportUndefinedExtension(`Chain "${name}"`, link)
          ).kinds
      );

      const chain = createExtension(name, kinds, host);
      extensions.set(name, chain);
      return chain;
    },

    extension: name =>
      extensions.get(name) ?? reportUndefinedExtension('extension()', name),

    record: name => records.get(name) ?? reportUnknownRecord(name),

    lookup(kind, target, field) {
      const defaultExpr = defaults.get(kind) ?? reportUndefinedKind(kind);
      return lookupValue(kind, resolveTarget(target, kind), field, defaultExpr);
    },

    freeze() {
      frozen = true;
    },

    snapshot: () => ({
      records: Array.from(records.values(), type => type.declaration),
      bindings: table.values()
    }),

    restore(snapshot: RegistrySnapshot): void {
      assertLoadPhase('restore()');

      // Validate everything before the first write.
      const declared = new Map<string, RecordDeclaration>();
      const pending: RecordDeclaration[] = [];

      for (const declaration of snapshot.records) {
        const earlier = declared.get(declaration.typeName);
        if (earlier !== undefined && !isSameDeclaration(earlier, declaration)) {
          reportRecordRedeclared(declaration.typeName);
        }
        declared.set(declaration.typeName, declaration);

        const reserved = declaration.fields.find(field => isReservedKey(field.name));
        if (reserved !== undefined) {
          reportDeclarationError(
            { extension: 'restore', typeName: declaration.typeName },
            `field "${reserved.name}" uses a reserved name`
          );
        }

        if (prepareRecord(declaration) === null) pending.push(declaration);
      }

      for (const binding of snapshot.bindings) {
        if (!defaults.has(binding.kind)) {
          reportUndefinedExtension('Snapshot binding', binding.kind);
        }

        const declaration =
          declared.get(binding.type) ??
          records.get(binding.type)?.declaration ??
          reportUnknownRecord(binding.type);

        if (!declaration.fields.some(field => field.name === binding.field)) {
          reportUnknownField(binding.type, binding.field);
        }
      }

      for (const declaration of pending) {
        if (!records.has(declaration.typeName)) {
          records.set(declaration.typeName, createRecordType(declaration));
        }
      }

      writeBindings(
        snapshot.bindings.map(binding => ({
          ...binding,
          value: deepFreeze(binding.value)
        }))
      );
    }
  };
}
