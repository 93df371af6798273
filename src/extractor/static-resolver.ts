import { is, types } from 'estree-toolkit';
import { type StaticResult, UNRESOLVED, resolved } from './constants';

/**
 * Resolves atomic values from ESTree `Literal` nodes.
 *
 * Supported Types:
 * - Primitives: `string`, `number`, `boolean`, `bigint`.
 * - Special Literals: `null`, `RegExp`.
 *
 * ---
 *
 * Why `null` and `RegExp` are handled here:
 * Both parse as `Literal` leaves yet evaluate to `typeof === 'object'`.
 * - `null` is a single keyword token.
 * - `/abc/g` is instantiated by the parser and attached to `node.value`, so
 *   the node is a `Literal` even though its value is a `RegExp` instance.
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   `success: true` when `node` is a supported `Literal` form.
 */
export function tryResolveLiteral(node: types.Node): StaticResult {
  if (is.literal(node)) {
    switch (typeof node.value) {
      case 'string':
      case 'number':
      case 'boolean':
      case 'bigint':
        return resolved(node.value);

      case 'object':
        if (node.value === null) {
          return resolved(null);
        }
        if (node.value instanceof RegExp) {
          return resolved(node.value);
        }
        break;
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves identifiers that name global constants: `undefined`, `NaN`,
 * `Infinity`.
 *
 * ---
 *
 * Constant Folding:
 * These are technically global bindings, not keywords, but annotations treat
 * them as constants so `a | Infinity` registers the number `Infinity`.
 *
 * Every other identifier is a reference to runtime state and stays
 * unresolved. The placeholder token is recognised by the annotation parser
 * before values reach this resolver.
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   `success: true` when `node` is a supported global-constant identifier.
 */
export function tryResolveIdentifier(node: types.Node): StaticResult {
  if (is.identifier(node)) {
    switch (node.name) {
      case 'undefined':
        return resolved(undefined);
      case 'NaN':
        return resolved(NaN);
      case 'Infinity':
        return resolved(Infinity);
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves sign operators applied to a static number or bigint.
 *
 * ---
 *
 * Negative numbers have no literal syntax: `-1` parses as
 * `UnaryExpression('-', Literal 1)`. Bounds such as `[-1, 1]` need them, and
 * `estree-util-value-to-estree` emits the same shape when a negative number is
 * printed back, so snapshot modules stay readable.
 *
 * Supported:
 * - `-x` for numbers and bigints (`-1`, `-Infinity`, `-1n`)
 * - `+x` for numbers (`+1`); unary plus on a bigint throws at runtime and is
 *   left unresolved
 *
 * Other unary operators (`!`, `~`, `typeof`, `void`, `delete`) stay
 * unresolved.
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   `success: true` when `node` is a supported sign expression.
 */
export function tryResolveUnary(node: types.Node): StaticResult {
  if (is.unaryExpression(node)) {
    if (node.operator !== '-' && node.operator !== '+') return UNRESOLVED;

    const operand = tryResolveStaticValue(node.argument);
    if (!operand.success) return UNRESOLVED;

    const value = operand.value;

    if (typeof value === 'number') {
      return resolved(node.operator === '-' ? -value : value);
    }

    if (typeof value === 'bigint' && node.operator === '-') {
      return resolved(-value);
    }
  }
  return UNRESOLVED;
}

/**
 * Resolves template strings whose every interpolation is static.
 *
 * ---
 *
 * 1. AST Structure (The "Bookend" Rule)
 *    A template always starts and ends with a quasi, so
 *    `quasis.length === expressions.length + 1`. Iterating over `quasis`
 *    covers the trailing text.
 *
 * 2. Invalid Escapes
 *    `cooked` is `undefined` for templates with invalid escape sequences;
 *    such templates are unresolved.
 *
 * 3. Stringification
 *    Interpolated values are converted with `${}` semantics, so `null`
 *    becomes `"null"` (not the empty string `join` would produce).
 *
 * Example:
 *    `v${ 1 }.${ 0 }` → quasis ["v", ".", ""], expressions [1, 0] → "v1.0"
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   `success: true` when the template and all interpolations are static.
 */
export function tryResolveTemplate(node: types.Node): StaticResult {
  if (is.templateLiteral(node)) {
    const parts: string[] = [];

    const expressions = node.expressions;

    for (const [index, quasi] of node.quasis.entries()) {
      const text = quasi.value.cooked;
      if (typeof text !== 'string') return UNRESOLVED;

      parts.push(text);

      if (index < expressions.length) {
        const expression = expressions[index];
        if (!expression) return UNRESOLVED;

        const result = tryResolveStaticValue(expression);

        if (!result.success) return UNRESOLVED;

        parts.push(String(result.value));
      }
    }

    return resolved(parts.join(''));
  }
  return UNRESOLVED;
}

/**
 * Master Dispatcher: Static Value Resolution
 *
 * Orchestrates the resolution of AST nodes into atomic static values.
 *
 * ---
 *
 * 1. Scope: Strictly Declarative Data
 *    Primitives, global constants, signed numbers and deterministic string
 *    composition. Containers (arrays, objects) are handled by the recursive
 *    extractor, which calls back into this function for every leaf.
 *
 * 2. Excluded (return UNRESOLVED)
 *    - Binary and logical operators (`1 + 1`, `a ?? b`). In annotation
 *      position `|` is the chain operator and never reaches this resolver.
 *    - Conditionals, sequences (`(0, 10)`), calls, member access, `new`.
 *
 * @param node
 *   The AST node to inspect.
 * @returns
 *   `success: true` with the evaluated value when a strategy succeeds.
 */
export function tryResolveStaticValue(node: types.Node): StaticResult {
  let result: StaticResult;

  // 1. Atomic Constants
  if ((result = tryResolveLiteral(node)).success) return result;
  if ((result = tryResolveIdentifier(node)).success) return result;

  // 2. Signed Numbers
  if ((result = tryResolveUnary(node)).success) return result;

  // 3. String Interpolation
  if ((result = tryResolveTemplate(node)).success) return result;

  // 4. Fallback: runtime dynamics and unsupported forms.
  return UNRESOLVED;
}
