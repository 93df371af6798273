import type { assignChainValues } from './parser/chain-order';
import type { tryResolveStaticValue } from './extractor/static-resolver';

/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * RATIONALE
 * 1. Declaration Expansion Without Macros
 *
 * DEFINITION
 * 2. Declaration Surface
 * 3. Annotation Chain
 * 4. Static Literal Policy
 *
 * POLICY
 * 5. All-or-Nothing Expansion
 *
 * STRATEGY
 * 6. Chain Reversal
 *
 * LIFECYCLE
 * 7. Registry Lifecycle
 *
 * Recommended reading flow:
 * RATIONALE -> DEFINITION -> STRATEGY -> POLICY -> LIFECYCLE
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:     Non-negotiable rule (`must` / `must not`) and enforcement.
 * - STRATEGY:   Chosen implementation approach used to satisfy policies.
 * - DEFINITION: Formal meaning and scope of a term or boundary.
 * - RATIONALE:  Why a policy or strategy exists.
 * - LIFECYCLE:  Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL RATIONALE (1)
 * Declaration Expansion Without Macros
 *
 * ---
 *
 * Field metadata is attached where a record is declared and read back through
 * accessors keyed by `(type, field)`. Instances never carry it.
 *
 * TypeScript has no declaration macros, so expansion is an explicit load-time
 * pass over source text:
 *
 *   source text ──parse──▶ ESTree Program
 *               ──peel───▶ cleaned statements + (field, value) pairs
 *               ──emit───▶ override bindings
 *               ──commit─▶ registry (record type + bindings)
 *
 * Nothing is evaluated. Every value that reaches the registry was read from a
 * literal token (see {@link StaticLiteralPolicy}).
 */
export type DeclarationExpansionRationale = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Declaration Surface
 *
 * ---
 *
 * Declarations are plain JavaScript so that an off-the-shelf ESTree parser
 * reads them. A record is a labeled block; the label names the record, each
 * statement declares one field:
 *
 *   Model: {
 *     a;                    // untyped, no default
 *     b: Int;               // labeled statement = type annotation
 *     c: Int = 1;           // ordinary default
 *     d: Int = 1 | 4;       // form (a): the default is a chain
 *     e: Int | [0, 1];      // form (b): the declaration tail is a chain
 *     f | "label";          // form (b), untyped
 *   }
 *
 * The typed form (`annotate`) takes the statements alone, with or without
 * surrounding braces.
 *
 * Field statement shapes (ESTree)
 * -------------------------------
 * - `a;`            ExpressionStatement(Identifier)
 * - `a = x;`        ExpressionStatement(AssignmentExpression(Identifier, x))
 * - `a | x;`        ExpressionStatement(BinaryExpression '|')
 * - `a: T ...;`     LabeledStatement(a, ExpressionStatement(...)) where the
 *                   expression is `T`, `T = x` or `T | x`
 *
 * Type annotations are identifiers or non-computed member chains
 * (`Units.Gram`). Any other statement is malformed.
 */
export type DeclarationSurface = never;

/**
 * ARCHITECTURAL DEFINITION (3)
 * Annotation Chain
 *
 * ---
 *
 * `|` is left-associative, so `base | v1 | v2` parses as `(base | v1) | v2`.
 * The chain of a field is the list of right operands read from the innermost
 * `|` outward: `[v1, v2]`, in the order they were written.
 *
 * - The base (leftmost operand) is never consumed. For form (a) it is the
 *   ordinary default; for form (b) it is the field name or its type.
 * - The outermost value is the right operand of the top `|` node, i.e. the
 *   rightmost value as written.
 * - Peeling one layer removes the outermost value and keeps the rest of the
 *   chain in place.
 * - The placeholder token (`_` by default) fills a position without producing
 *   an override.
 *
 * Limitation:
 * A form (a) default that is itself a bitwise OR (`a = FLAG_A | FLAG_B`) reads
 * as a chain. Ordinary defaults must be static literals anyway, so such a
 * default is rejected rather than misread.
 */
export type AnnotationChain = never;

/**
 * ARCHITECTURAL DEFINITION (4)
 * Static Literal Policy
 *
 * ---
 *
 * Annotation values and ordinary defaults must be static: decodable to plain
 * data without executing code. Atomic values are handled by
 * {@link tryResolveStaticValue}; arrays and objects recurse into it.
 *
 * Unlike a best-effort extractor, containers are strict. A dynamic entry
 * anywhere inside a value rejects the whole value, because a partially read
 * `{ min: 0, max: LIMIT }` would register metadata that was never written.
 *
 * Rejection is a declaration error that names the failing path (for example
 * `Model.a[1]`).
 */
export type StaticLiteralPolicy = never;

/**
 * ARCHITECTURAL POLICY (5)
 * All-or-Nothing Expansion
 *
 * ---
 *
 * Expansion must not register anything. It returns the cleaned declaration
 * and the bindings; the registry commits both only after the whole
 * declaration, across every link of a chain, expanded without error.
 *
 * Errors that abort an expansion:
 * - source that does not parse, or a record source that is not one labeled block
 * - a statement that is not a field, or a `|` chain whose base is not a field
 *   name (untyped) or a type name (typed)
 * - a duplicate field name
 * - a non-static annotation value or ordinary default
 * - a residual chain after the last link ran
 * - (typed form) a field that the record does not declare
 *
 * A failed declaration leaves the registry exactly as it was.
 */
export type AllOrNothingExpansion = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * Chain Reversal
 *
 * ---
 *
 * A chain listed as `[E1, …, EN]` applies its links in reverse: EN runs
 * first, E1 runs last. Each link peels the outermost remaining value.
 * The two reversals cancel out positionally:
 *
 *   defineChain('columns', ['label', 'units', 'default'])
 *   bar: Int | 7 | "g" | "grams of bar"
 *
 *   run 1: default  takes "grams of bar"   → bar: Int | 7 | "g"
 *   run 2: units    takes "g"              → bar: Int | 7
 *   run 3: label    takes 7                → bar: Int
 *
 * A link that finds no chain left does nothing for that field.
 *
 * Running N separate peels and doing one pass with positional assignment give
 * the same result, so the engine does one pass per field through
 * {@link assignChainValues}, the single place where the reversal lives. Nested
 * chains are flattened to their kinds first; flattening preserves the order in
 * which links would have run.
 */
export type ChainReversal = never;

/**
 * ARCHITECTURAL LIFECYCLE (7)
 * Registry Lifecycle
 *
 * ---
 *
 * 1. Load phase (mutable)
 *    `defineKind`, `defineChain`, `declare`, `annotate` and `restore` write to
 *    the registry. The phase is single-threaded and synchronous; callers must
 *    not interleave loads of the same registry.
 *
 * 2. Freeze
 *    `freeze()` ends the load phase. Every writing call throws afterwards.
 *
 * 3. Lookup phase (read-only)
 *    Accessors resolve `(kind, type, field)` with two levels: the exact
 *    binding, else the kind default, evaluated afresh on each call.
 *
 * Lookups are also valid during the load phase; they observe whatever has been
 * committed so far.
 */
export type RegistryLifecycle = never;
