import type {
  KindHandle,
  Metadata,
  MetadataExtension,
  RecordTarget
} from '../types';

/**
 * Reads for one kind, already bound to its name and default expression.
 */
export type KindReader<V> = {
  lookup(target: RecordTarget, field: string): Metadata<V>;
  aggregate(target: RecordTarget): Metadata<V>[];
};

/**
 * Makes a kind callable.
 *
 * The accessor dispatches on arity: with a field it reads one value, without
 * one it aggregates the whole type. The declaration forms are attached to the
 * function object, so `units(Model, 'a')` and `units.declare(…)` share one
 * handle.
 *
 * @param extension
 *   The kind's declaration forms.
 * @param reader
 *   The kind's lookups.
 */
export function createKindHandle<V>(
  extension: MetadataExtension,
  reader: KindReader<V>
): KindHandle<V> {
  function accessor(target: RecordTarget): readonly Metadata<V>[];
  function accessor(target: RecordTarget, field: string): Metadata<V>;
  function accessor(
    target: RecordTarget,
    field?: string
  ): Metadata<V> | readonly Metadata<V>[] {
    return field === undefined
      ? reader.aggregate(target)
      : reader.lookup(target, field);
  }

  return Object.assign(accessor, {
    extensionName: extension.extensionName,
    kinds: extension.kinds,
    declare: extension.declare,
    annotate: extension.annotate,
    expand: extension.expand
  });
}
