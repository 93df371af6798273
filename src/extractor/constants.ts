import type { StaticValue } from '../types';
import type { StaticLiteralPolicy } from '../architecture';

/**
 * Represents a successful static resolution.
 *
 * Meaning:
 * - The input node was statically resolvable under the current resolver allowlist.
 * - `value` is what the node **evaluates to** under JavaScript evaluation
 *   rules, computed without running any code.
 */
export type StaticSuccess<T> = {
  /**
   * Discriminant flag indicating the resolution succeeded.
   */
  success: true;

  /**
   * The evaluated value.
   *
   * Note:
   * This may legitimately be `undefined`; this is distinct from failure
   * (`success: false`).
   */
  value: T;
};

/**
 * Represents a failed static resolution.
 *
 * Contract:
 * - Failure carries no value payload.
 * - Callers treat this as "dynamic / unresolvable" and apply their own policy
 *   (reject the container, report a declaration error, fall back to a default).
 */
export type StaticFailure = {
  success: false;
};

/**
 * Discriminated union representing the outcome of a resolution attempt.
 *
 * Rationale:
 * Distinguishes "evaluates to undefined" (success with `value === undefined`)
 * from "could not resolve" (failure). The override table relies on the same
 * distinction: `a | undefined` is a binding whose value is `undefined`.
 */
export type StaticResult<T = StaticValue> = StaticSuccess<T> | StaticFailure;

/**
 * Canonical failure sentinel for "unresolvable".
 */
export const UNRESOLVED: StaticFailure = { success: false } as const;

/**
 * Constructs a successful resolution result.
 *
 * @param value
 *   The evaluated value to wrap.
 * @returns
 *   A {@link StaticSuccess} wrapper containing `value`.
 */
export function resolved<T>(value: T): StaticSuccess<T> {
  return { success: true, value };
}

/**
 * Internal control sentinel for static extraction.
 *
 * Semantics:
 * Represents a "non-static" signal within the recursion engine. A subtree that
 * cannot be decoded into a {@link StaticValue} returns this sentinel, and every
 * enclosing container rejects itself in turn (see {@link StaticLiteralPolicy}).
 *
 * Implementation Strategy:
 * Uses `Symbol.for` to keep identity across duplicate module instances.
 *
 * Contract:
 * - Must NEVER leak into the registry; callers turn it into a declaration error.
 */
export const SKIP_VALUE = Symbol.for('field-metadata.extraction.skip');
