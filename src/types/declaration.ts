import type { types } from 'estree-toolkit';
import type { StaticValue } from './primitives';
import type { AllOrNothingExpansion } from '../architecture';

/**
 * Sentinel for the placeholder token (`_` by default) in a chain position.
 *
 * A placeholder consumes its chain slot like any other value but never
 * produces an {@link OverrideBinding}; the kind default stays in force.
 *
 * Uses `Symbol.for` so duplicate module instances agree on identity.
 */
export const PLACEHOLDER = Symbol.for('field-metadata.placeholder');

/**
 * A consumed chain value: a static literal or the placeholder sentinel.
 */
export type AnnotationValue = StaticValue | typeof PLACEHOLDER;

/**
 * One `(field, value)` pair consumed by a single kind application.
 */
export type FieldAnnotation = {
  field: string;
  value: AnnotationValue;
};

/**
 * A registered override: `(kind, type, field) → value`.
 *
 * Keys are unique; registering the same key again replaces the value.
 */
export type OverrideBinding = {
  kind: string;
  type: string;
  field: string;
  value: StaticValue;
};

/**
 * A field of the emitted record, after every annotation layer was removed.
 *
 * `hasDefault` separates "no ordinary default" from a default that happens to
 * be `undefined` (`a = undefined;`).
 */
export type FieldDefinition = {
  name: string;
  /**
   * Type annotation as written (`Int`, `Units.Gram`), or `null` when untyped.
   * Carried for display only; values are never checked against it.
   */
  type: string | null;
} & (
  | { hasDefault: false }
  | { hasDefault: true; defaultValue: StaticValue }
);

/**
 * A fully unannotated record declaration.
 */
export type RecordDeclaration = {
  typeName: string;
  fields: FieldDefinition[];
};

/**
 * The result of running one extension over a declaration source.
 *
 * Expansion is pure: nothing is registered until the owning registry commits
 * the expansion (see {@link AllOrNothingExpansion}).
 */
export type DeclarationExpansion = {
  /**
   * Name of the kind or chain that produced this expansion.
   */
  extension: string;

  /**
   * Record the bindings belong to.
   */
  typeName: string;

  /**
   * The cleaned record declaration for the bare form; `null` for the typed
   * form, which emits overrides only.
   */
  record: RecordDeclaration | null;

  /**
   * Cleaned source tree. Print it with `printDeclaration`.
   */
  program: types.Program;

  /**
   * Bindings in application order (first link to run first).
   */
  bindings: OverrideBinding[];
};
