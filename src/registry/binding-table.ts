import type { OverrideBinding } from '../types';
import { bindingKey } from '../emitter/override-emitter';

/**
 * The override table: one binding per `(kind, type, field)`.
 *
 * Writes replace ("last writer wins"); there is no delete. Iteration follows
 * first-insertion order of each key, which keeps snapshots deterministic.
 */
export type BindingTable = {
  get(kind: string, type: string, field: string): OverrideBinding | undefined;

  /**
   * Stores a binding.
   *
   * @returns
   *   `true` when an existing binding for the same key was replaced.
   */
  set(binding: OverrideBinding): boolean;

  values(): OverrideBinding[];
};

export function createBindingTable(): BindingTable {
  const bindingByKey = new Map<string, OverrideBinding>();

  return {
    get: (kind, type, field) => bindingByKey.get(bindingKey(kind, type, field)),

    set(binding) {
      const key = bindingKey(binding.kind, binding.type, binding.field);
      const replaced = bindingByKey.has(key);
      bindingByKey.set(key, Object.freeze({ ...binding }));
      return replaced;
    },

    values: () => Array.from(bindingByKey.values())
  };
}
