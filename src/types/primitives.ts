import type { StaticLiteralPolicy } from '../architecture';

/**
 * Atomic values the extractor can read straight from a literal token.
 *
 * Role: Leaf Constraint.
 * Mirrors the primitive forms of `tryResolveStaticValue` (literals, global
 * constants, fully static templates).
 */
export type StaticPrimitive =
  | string
  | number
  | boolean
  | bigint
  | null
  | undefined;

/**
 * A value that can be written as an annotation or an ordinary field default.
 *
 * Role: Data Model.
 * Everything the declaration source can state without executing code:
 * primitives, regular expression literals, and arrays/objects built from them.
 * See {@link StaticLiteralPolicy} for the rules that produce it.
 */
export type StaticValue =
  | StaticPrimitive
  | RegExp
  | readonly StaticValue[]
  | { readonly [key: string]: StaticValue };

/**
 * What a kind accessor returns.
 *
 * Role: Lookup Result.
 * Either the kind default (`V`, produced by the default expression) or a
 * literal override read from a declaration. Override values are not checked
 * against `V`.
 */
export type Metadata<V> = V | StaticValue;
