import { is, types } from 'estree-toolkit';
import { toJs } from 'estree-util-to-js';
import { valueToEstree } from 'estree-util-value-to-estree';
import { parseModule } from 'meriyah';

import type {
  DeclarationExpansion,
  FieldDefinition,
  OverrideBinding,
  RecordDeclaration,
  RegistrySnapshot,
  StaticValue
} from '../types';
import { extractLiteral } from '../extractor';
import {
  isArray,
  isNodeLike,
  isPlainObject,
  isReservedKey,
  isStaticValue
} from '../guards';

const PREFIX = '[field-metadata]';

/**
 * Prints a cleaned declaration back to source text.
 *
 * @param declaration
 *   An expansion result, or a program taken from one.
 * @returns
 *   JavaScript source of the fully unannotated declaration.
 */
export function printDeclaration(
  declaration: DeclarationExpansion | types.Program
): string {
  const program =
    'program' in declaration ? declaration.program : declaration;
  return toJs(program).value;
}

/**
 * Turns a static value into the expression that reads back to it.
 *
 * Containers are built here rather than by `valueToEstree`: registry data is
 * deep-frozen, which `valueToEstree` writes as `Object.defineProperties(…)`,
 * and it cannot print a RegExp nested inside a container. Signed and
 * non-finite numbers are written as `-x`, `NaN` and `Infinity`, the forms
 * the static resolver folds. Other leaves go through `valueToEstree`.
 */
function staticValueToEstree(value: StaticValue): types.Expression {
  if (value instanceof RegExp) {
    return {
      type: 'Literal',
      value,
      regex: { pattern: value.source, flags: value.flags }
    };
  }

  if (isArray(value)) {
    // Holes stay holes (`[1, , 3]`).
    return {
      type: 'ArrayExpression',
      elements: Array.from({ length: value.length }, (_, index) =>
        Object.hasOwn(value, index) ? staticValueToEstree(value[index]) : null
      )
    };
  }

  if (typeof value === 'object' && value !== null) {
    return {
      type: 'ObjectExpression',
      properties: Object.entries(value).map(([key, item]): types.Property => ({
        type: 'Property',
        kind: 'init',
        method: false,
        shorthand: false,
        computed: false,
        key: { type: 'Literal', value: key },
        value: staticValueToEstree(item)
      }))
    };
  }

  if (typeof value === 'number') {
    if (Number.isNaN(value)) return { type: 'Identifier', name: 'NaN' };

    if (value < 0 || Object.is(value, -0)) {
      return {
        type: 'UnaryExpression',
        operator: '-',
        prefix: true,
        argument: staticValueToEstree(-value)
      };
    }

    if (value === Infinity) return { type: 'Identifier', name: 'Infinity' };
  }

  return valueToEstree(value);
}

function fieldToStaticValue(field: FieldDefinition): StaticValue {
  return field.hasDefault
    ? {
        name: field.name,
        type: field.type,
        hasDefault: true,
        defaultValue: field.defaultValue
      }
    : { name: field.name, type: field.type, hasDefault: false };
}

/**
 * Rebuilds a snapshot as a static value with exactly the keys
 * {@link readSnapshotModule} reads back.
 */
function snapshotToStaticValue(snapshot: RegistrySnapshot): StaticValue {
  return {
    records: snapshot.records.map(record => ({
      typeName: record.typeName,
      fields: record.fields.map(fieldToStaticValue)
    })),
    bindings: snapshot.bindings.map(binding => ({
      kind: binding.kind,
      type: binding.type,
      field: binding.field,
      value: binding.value
    }))
  };
}

/**
 * Prints a registry snapshot as an ES module with one default export.
 *
 * The module is plain data: record declarations and override bindings, with
 * RegExp, bigint, `undefined` and non-finite numbers written as literals or
 * global constants. Kind defaults are code and stay out of the module; the
 * loading program defines its kinds before restoring.
 *
 * @example
 *   emitSnapshotModule(registry.snapshot())
 *   // -> 'export default {\n  "records": [...],\n  "bindings": [...]\n};\n'
 */
export function emitSnapshotModule(snapshot: RegistrySnapshot): string {
  const program: types.Program = {
    type: 'Program',
    sourceType: 'module',
    body: [
      {
        type: 'ExportDefaultDeclaration',
        declaration: staticValueToEstree(snapshotToStaticValue(snapshot))
      }
    ]
  };

  return toJs(program).value;
}

function invalidSnapshot(detail: string, cause?: unknown): never {
  const message = `${PREFIX} Snapshot module is invalid: ${detail}`;
  throw cause === undefined ? new Error(message) : new Error(message, { cause });
}

function readStaticValue(value: unknown, path: string): StaticValue {
  if (isStaticValue(value)) return value;
  return invalidSnapshot(`${path} is not a static value`);
}

function readFieldDefinition(value: unknown, path: string): FieldDefinition {
  if (
    !isPlainObject(value) ||
    typeof value.name !== 'string' ||
    isReservedKey(value.name) ||
    !(typeof value.type === 'string' || value.type === null) ||
    typeof value.hasDefault !== 'boolean'
  ) {
    return invalidSnapshot(`${path} is not a field definition`);
  }

  const { name, type } = value;

  if (!value.hasDefault) {
    return { name, type, hasDefault: false };
  }

  return {
    name,
    type,
    hasDefault: true,
    defaultValue: readStaticValue(value.defaultValue, `${path}.defaultValue`)
  };
}

function readRecordDeclaration(
  value: unknown,
  path: string
): RecordDeclaration {
  if (
    !isPlainObject(value) ||
    typeof value.typeName !== 'string' ||
    !isArray(value.fields)
  ) {
    return invalidSnapshot(`${path} is not a record declaration`);
  }

  return {
    typeName: value.typeName,
    fields: value.fields.map((field, index) =>
      readFieldDefinition(field, `${path}.fields[${index}]`)
    )
  };
}

function readBinding(value: unknown, path: string): OverrideBinding {
  if (
    !isPlainObject(value) ||
    typeof value.kind !== 'string' ||
    typeof value.type !== 'string' ||
    typeof value.field !== 'string'
  ) {
    return invalidSnapshot(`${path} is not an override binding`);
  }

  return {
    kind: value.kind,
    type: value.type,
    field: value.field,
    value: readStaticValue(value.value, `${path}.value`)
  };
}

/**
 * Reads a module written by {@link emitSnapshotModule} back into a snapshot.
 *
 * The module is parsed, never evaluated: its default export goes through the
 * same strict static extraction as annotation values, then the snapshot shape
 * is checked field by field.
 *
 * @param source
 *   Module source text.
 * @returns
 *   The snapshot, ready for `registry.restore`.
 * @throws
 *   When the module does not parse, has other statements than one default
 *   export, exports dynamic code, or does not have the snapshot shape.
 */
export function readSnapshotModule(source: string): RegistrySnapshot {
  let ast: unknown;

  try {
    ast = parseModule(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return invalidSnapshot(`source does not parse (${reason})`, error);
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    return invalidSnapshot('parser output is not an ESTree Program');
  }

  const [statement, ...rest] = ast.body;

  if (!statement || rest.length > 0 || !is.exportDefaultDeclaration(statement)) {
    return invalidSnapshot('expected a single `export default` statement');
  }

  const extracted = extractLiteral(statement.declaration, 'snapshot');

  if (!extracted.success) {
    return invalidSnapshot(
      `default export is not static data (at ${extracted.rejectedAt})`
    );
  }

  const snapshot = extracted.value;

  if (
    !isPlainObject(snapshot) ||
    !isArray(snapshot.records) ||
    !isArray(snapshot.bindings)
  ) {
    return invalidSnapshot('default export must have `records` and `bindings`');
  }

  return {
    records: snapshot.records.map((record, index) =>
      readRecordDeclaration(record, `snapshot.records[${index}]`)
    ),
    bindings: snapshot.bindings.map((binding, index) =>
      readBinding(binding, `snapshot.bindings[${index}]`)
    )
  };
}
