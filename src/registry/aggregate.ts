import type { RecordType } from '../types';

/**
 * Reads one value per field, in declared field order.
 *
 * No sorting, deduplication or filtering: a record without fields yields `[]`,
 * and the result always has one entry per field.
 *
 * @param type
 *   The record whose fields are read.
 * @param read
 *   The per-field accessor.
 */
export function aggregateFields<T>(
  type: RecordType,
  read: (field: string) => T
): T[] {
  return type.fields.map(field => read(field.name));
}
