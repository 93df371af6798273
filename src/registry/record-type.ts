import type {
  FieldDefinition,
  RecordDeclaration,
  RecordInstance,
  RecordType,
  StaticValue
} from '../types';
import { reportMissingFieldValue, reportUnknownField } from '../report';
import { deepFreeze, isArray, isPlainObject } from '../guards';

/**
 * Every record type built by {@link createRecordType}, across registries.
 */
const recordTypes = new WeakSet<object>();

/**
 * Instance → the type that created it. Weak, so instances are collected
 * normally.
 */
const typeByInstance = new WeakMap<object, RecordType>();

export function isRecordType(value: unknown): value is RecordType {
  return typeof value === 'object' && value !== null && recordTypes.has(value);
}

/**
 * Returns the record type an instance was created from.
 *
 * @returns
 *   The type, or `undefined` when `value` was not built by a record type.
 */
export function typeOf(value: unknown): RecordType | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  return typeByInstance.get(value);
}

/**
 * Builds the record type for a fully unannotated declaration.
 *
 * The declaration is deep-frozen in place; field defaults are shared by every
 * instance, which is safe only because they can no longer change.
 *
 * @param declaration
 *   Record name and fields in declared order.
 * @returns
 *   A frozen record type.
 */
export function createRecordType(declaration: RecordDeclaration): RecordType {
  const frozen = deepFreeze({
    typeName: declaration.typeName,
    fields: declaration.fields.map(field => ({ ...field }))
  });

  const fieldByName = new Map<string, FieldDefinition>(
    frozen.fields.map(field => [field.name, field])
  );

  const field = (name: string): FieldDefinition =>
    fieldByName.get(name) ?? reportUnknownField(frozen.typeName, name);

  const recordType: RecordType = Object.freeze({
    name: frozen.typeName,
    fields: frozen.fields,
    declaration: frozen,

    hasField: (name: string) => fieldByName.has(name),

    field,

    create(values: Readonly<Record<string, unknown>> = {}): RecordInstance {
      for (const key of Object.keys(values)) field(key);

      const instance: Record<string, unknown> = {};

      for (const definition of frozen.fields) {
        if (Object.hasOwn(values, definition.name)) {
          instance[definition.name] = values[definition.name];
        } else if (definition.hasDefault) {
          instance[definition.name] = definition.defaultValue;
        } else {
          reportMissingFieldValue(frozen.typeName, definition.name);
        }
      }

      Object.freeze(instance);
      typeByInstance.set(instance, recordType);
      return instance;
    }
  });

  recordTypes.add(recordType);
  return recordType;
}

/**
 * Structural equality of two static values, following `Object.is` for
 * primitives (`NaN` equals `NaN`, `0` and `-0` differ). RegExps compare by
 * source and flags; holes in sparse arrays must line up.
 */
function isSameStaticValue(left: StaticValue, right: StaticValue): boolean {
  if (Object.is(left, right)) return true;

  if (left instanceof RegExp || right instanceof RegExp) {
    return (
      left instanceof RegExp &&
      right instanceof RegExp &&
      left.source === right.source &&
      left.flags === right.flags
    );
  }

  if (isArray(left) || isArray(right)) {
    return (
      isArray(left) &&
      isArray(right) &&
      left.length === right.length &&
      left.every(
        (item, index) =>
          Object.hasOwn(right, index) && isSameStaticValue(item, right[index])
      ) &&
      right.every((_, index) => Object.hasOwn(left, index))
    );
  }

  if (isPlainObject(left) && isPlainObject(right)) {
    const leftKeys = Object.keys(left);
    return (
      leftKeys.length === Object.keys(right).length &&
      leftKeys.every(
        key =>
          Object.hasOwn(right, key) && isSameStaticValue(left[key], right[key])
      )
    );
  }

  return false;
}

/**
 * Checks whether two declarations emit the same record: same name, and the
 * same fields in the same order with the same types and ordinary defaults.
 */
export function isSameDeclaration(
  left: RecordDeclaration,
  right: RecordDeclaration
): boolean {
  return (
    left.typeName === right.typeName &&
    left.fields.length === right.fields.length &&
    left.fields.every((field, index) => {
      const other = right.fields[index];
      if (
        other === undefined ||
        field.name !== other.name ||
        field.type !== other.type
      ) {
        return false;
      }
      if (!field.hasDefault || !other.hasDefault) {
        return field.hasDefault === other.hasDefault;
      }
      return isSameStaticValue(field.defaultValue, other.defaultValue);
    })
  );
}
