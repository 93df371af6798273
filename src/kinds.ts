import type { KindHandle, MetadataRegistry } from './types';

/**
 * Handles of the standard kinds, keyed by kind name.
 */
export type StandardKinds = {
  default: KindHandle<null>;
  units: KindHandle<number>;
  prior: KindHandle<null>;
  description: KindHandle<string>;
  limits: KindHandle<[number, number]>;
  bounds: KindHandle<[number, number]>;
  label: KindHandle<string>;
  logscaled: KindHandle<boolean>;
  flattenable: KindHandle<boolean>;
  plottable: KindHandle<boolean>;
  selectable: KindHandle<null>;
};

/**
 * Defines the standard field-metadata kinds on a registry.
 *
 * | kind          | default                 |
 * | ------------- | ----------------------- |
 * | `default`     | `null`                  |
 * | `units`       | `1`                     |
 * | `prior`       | `null`                  |
 * | `description` | `""`                    |
 * | `limits`      | `[1e-7, 1.0]` (fresh)   |
 * | `bounds`      | `[1e-7, 1.0]` (fresh)   |
 * | `label`       | the field name          |
 * | `logscaled`   | `false`                 |
 * | `flattenable` | `true`                  |
 * | `plottable`   | `true`                  |
 * | `selectable`  | `null`                  |
 *
 * Range defaults are built per lookup, so a caller may mutate the array it
 * gets without affecting other lookups.
 *
 * @param registry
 *   A registry in its load phase with none of these names taken.
 * @returns
 *   The kind handles.
 */
export function registerStandardKinds(
  registry: MetadataRegistry
): StandardKinds {
  return {
    default: registry.defineKind('default', () => null),
    units: registry.defineKind('units', () => 1),
    prior: registry.defineKind('prior', () => null),
    description: registry.defineKind('description', () => ''),
    limits: registry.defineKind('limits', (): [number, number] => [1e-7, 1.0]),
    bounds: registry.defineKind('bounds', (): [number, number] => [1e-7, 1.0]),
    label: registry.defineKind('label', ({ field }) => field),
    logscaled: registry.defineKind('logscaled', () => false),
    flattenable: registry.defineKind('flattenable', () => true),
    plottable: registry.defineKind('plottable', () => true),
    selectable: registry.defineKind('selectable', () => null)
  };
}
