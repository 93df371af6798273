import type { types } from 'estree-toolkit';
import { is } from 'estree-toolkit';

import type { StaticLiteralPolicy } from '../architecture';
import type { StaticValue } from '../types';

import { preserveArrayElision } from '../utils/array-utils';

import { extractPropertyKey } from './key-extractor';
import { tryResolveStaticValue } from './static-resolver';
import { SKIP_VALUE } from './constants';

export { SKIP_VALUE } from './constants';

export type ExtractOptions = {
  /**
   * Called once with the path label of the first subtree that could not be
   * decoded. Used by callers to point declaration errors at the exact slot.
   */
  onRejected?: (pathLabel: string) => void;
};

/**
 * Builds a human-readable path label for diagnostics.
 *
 * String segments are appended using dot notation, numeric segments use
 * bracket notation.
 *
 * Example:
 *   formatPath("Model.bounds", 0)   -> "Model.bounds[0]"
 *   formatPath("Model.range", "min") -> "Model.range.min"
 *
 * @param base
 *   Current path label prefix.
 * @param segment
 *   Next segment to append: an object key or an array index.
 * @returns
 *   A new path label with `segment` appended.
 */
export function formatPath(base: string, segment: string | number): string {
  return typeof segment === 'number'
    ? `${base}[${segment}]`
    : `${base}.${segment}`;
}

/**
 * Signals rejection of the subtree at `pathLabel` and returns the sentinel.
 */
function reject(options: ExtractOptions, pathLabel: string): typeof SKIP_VALUE {
  options.onRejected?.(pathLabel);
  return SKIP_VALUE;
}

/**
 * Arrays (Position-Addressed) -> STRICT POLICY
 *
 * - Rule: If *any* element is dynamic (including spreads), the entire array
 *   is rejected.
 * - Elisions: Preserved as sparse slots (hole ≠ explicit `undefined`).
 *
 * Control Flow:
 * Fail-fast. The first dynamic slot aborts the array and the signal
 * propagates to the parent, which rejects itself in turn.
 *
 * @param expressionNode
 *   The ArrayExpression node to decode.
 * @param options
 *   Diagnostics callbacks.
 * @param pathLabel
 *   Human-readable path label (e.g. `"Model.a"`).
 * @returns
 *   The decoded array, or `SKIP_VALUE`.
 */
function extractStaticValueFromArrayExpression(
  expressionNode: types.ArrayExpression,
  options: ExtractOptions,
  pathLabel: string
): StaticValue[] | typeof SKIP_VALUE {
  const candidate: StaticValue[] = [];

  for (const [index, elementNode] of expressionNode.elements.entries()) {
    const elementLabel = formatPath(pathLabel, index);

    if (elementNode === null) {
      preserveArrayElision(candidate, index);
      continue;
    }

    if (is.spreadElement(elementNode)) {
      return reject(options, elementLabel);
    }

    const extracted = extractStaticValueFromExpression(
      elementNode,
      options,
      elementLabel
    );

    if (extracted === SKIP_VALUE) {
      return SKIP_VALUE;
    }

    candidate.push(extracted);
  }

  return candidate;
}

/**
 * Objects (Key-Addressed) -> STRICT POLICY
 *
 * - Rule: A spread, a dynamic key or a dynamic value rejects the whole object.
 * - Rationale: an annotation is registered as written or not at all; a
 *   partially decoded object would register metadata nobody wrote
 *   (see {@link StaticLiteralPolicy}).
 *
 * @param expressionNode
 *   The ObjectExpression node to decode.
 * @param options
 *   Diagnostics callbacks.
 * @param pathLabel
 *   Human-readable path label (e.g. `"Model.range"`).
 * @returns
 *   The decoded object, or `SKIP_VALUE`.
 */
function extractStaticValueFromObjectExpression(
  expressionNode: types.ObjectExpression,
  options: ExtractOptions,
  pathLabel: string
): Record<string, StaticValue> | typeof SKIP_VALUE {
  const aggregate: Record<string, StaticValue> = {};

  for (const [index, propertyNode] of expressionNode.properties.entries()) {
    if (is.spreadElement(propertyNode)) {
      return reject(options, formatPath(pathLabel, `<spread ${index}>`));
    }

    const key = extractPropertyKey(propertyNode);
    if (key === null) {
      return reject(options, formatPath(pathLabel, `<key ${index}>`));
    }

    const valueLabel = formatPath(pathLabel, key);

    // Getters, setters and methods are code, not data.
    if (propertyNode.kind !== 'init' || propertyNode.method) {
      return reject(options, valueLabel);
    }

    const extracted = extractStaticValueFromExpression(
      propertyNode.value,
      options,
      valueLabel
    );

    if (extracted === SKIP_VALUE) {
      return SKIP_VALUE;
    }

    aggregate[key] = extracted;
  }

  return aggregate;
}

/**
 * Recursively decodes an ESTree node into a plain static value.
 *
 * Core Mechanisms:
 * 1. Leaves resolve through `tryResolveStaticValue`.
 * 2. Arrays and objects recurse with the strict policy.
 * 3. Everything else (identifiers other than global constants, calls, member
 *    access, functions, binary expressions) returns `SKIP_VALUE`.
 *
 * @param expressionNode
 *   The AST node to decode.
 * @param options
 *   Diagnostics callbacks.
 * @param pathLabel
 *   Human-readable path label (e.g. `"Model.a"`).
 * @returns
 *   - The decoded static value.
 *   - `SKIP_VALUE` if the node or any part of its subtree is dynamic.
 */
export function extractStaticValueFromExpression(
  expressionNode: types.Node,
  options: ExtractOptions,
  pathLabel: string
): StaticValue | typeof SKIP_VALUE {
  const staticResolution = tryResolveStaticValue(expressionNode);

  if (staticResolution.success) {
    return staticResolution.value;
  }

  if (is.arrayExpression(expressionNode)) {
    return extractStaticValueFromArrayExpression(
      expressionNode,
      options,
      pathLabel
    );
  }

  if (is.objectExpression(expressionNode)) {
    return extractStaticValueFromObjectExpression(
      expressionNode,
      options,
      pathLabel
    );
  }

  return reject(options, pathLabel);
}

/**
 * Decodes a literal written in a declaration.
 *
 * Adapter over {@link extractStaticValueFromExpression} for callers that need
 * the failing path as data rather than through a callback.
 *
 * @param node
 *   The annotation value or ordinary default expression.
 * @param pathLabel
 *   Label of the slot being decoded (e.g. `"Model.a"`).
 * @returns
 *   `{ success: true, value }` on success, otherwise
 *   `{ success: false, rejectedAt }` naming the first non-static subtree.
 */
export function extractLiteral(
  node: types.Node,
  pathLabel: string
):
  | { success: true; value: StaticValue }
  | { success: false; rejectedAt: string } {
  let rejectedAt = pathLabel;

  const extracted = extractStaticValueFromExpression(
    node,
    {
      onRejected: label => {
        rejectedAt = label;
      }
    },
    pathLabel
  );

  if (extracted === SKIP_VALUE) {
    return { success: false, rejectedAt };
  }

  return { success: true, value: extracted };
}
