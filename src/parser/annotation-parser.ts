import { is, types } from 'estree-toolkit';

import type { AnnotationChain, DeclarationSurface } from '../architecture';
import { type AnnotationValue, PLACEHOLDER } from '../types';
import { type DeclarationSubject, reportDeclarationError } from '../report';
import { extractLiteral, formatPath } from '../extractor';
import { isReservedKey } from '../guards';

/**
 * A type annotation: `Int` or a dotted name such as `Units.Gram`.
 */
export type TypeNameNode = types.Identifier | types.MemberExpression;

/**
 * One field statement, split into its parts.
 *
 * The chain lives on the ordinary default when the field has one (form (a))
 * and on the declaration tail otherwise (form (b)); the two forms cannot be
 * combined in one statement.
 */
export type FieldSyntax = {
  /**
   * Position of the statement in its block (for diagnostics).
   */
  index: number;

  name: string;

  nameNode: types.Identifier;

  typeNode: TypeNameNode | null;

  /**
   * Ordinary default with every chain value removed; `null` when absent.
   */
  defaultNode: types.Expression | null;

  /**
   * Chain values in written order (see {@link AnnotationChain}).
   */
  values: types.Expression[];
};

/**
 * Splits a left-associative `|` tree into its base and right operands.
 *
 * `base | v1 | v2` → `{ base, values: [v1, v2] }`
 */
function unwindChain(expression: types.Expression): {
  base: types.Expression;
  values: types.Expression[];
} {
  const values: types.Expression[] = [];
  let current = expression;

  while (is.binaryExpression(current) && current.operator === '|') {
    const left = current.left;
    // `#x in obj` is the only place a private name appears; never with `|`.
    if (left.type === 'PrivateIdentifier') break;

    values.unshift(current.right);
    current = left;
  }

  return { base: current, values };
}

/**
 * Re-applies chain values to a base expression, innermost first.
 */
function buildChain(
  base: types.Expression,
  values: readonly types.Expression[]
): types.Expression {
  return values.reduce<types.Expression>(
    (left, right) => ({ type: 'BinaryExpression', operator: '|', left, right }),
    base
  );
}

/**
 * Renders a type annotation as written, or `null` when the node is not one.
 *
 * Type annotations are identifiers or non-computed member chains.
 *
 * @example
 *   formatTypeName(<Units.Gram>) // -> 'Units.Gram'
 *   formatTypeName(<Units[0]>)   // -> null
 */
export function formatTypeName(node: types.Node): string | null {
  if (is.identifier(node)) return node.name;

  if (
    is.memberExpression(node) &&
    !node.computed &&
    is.identifier(node.property)
  ) {
    const object = formatTypeName(node.object);
    return object === null ? null : `${object}.${node.property.name}`;
  }

  return null;
}

export function isTypeName(node: types.Node): node is TypeNameNode {
  return formatTypeName(node) !== null;
}

/**
 * Reads the expression of an untyped field statement (`a`, `a = x`, `a | x`).
 */
function readUntypedField(
  expression: types.Expression,
  index: number,
  subject: DeclarationSubject
): FieldSyntax | null {
  if (is.identifier(expression)) {
    return {
      index,
      name: expression.name,
      nameNode: expression,
      typeNode: null,
      defaultNode: null,
      values: []
    };
  }

  if (
    is.assignmentExpression(expression) &&
    expression.operator === '=' &&
    is.identifier(expression.left)
  ) {
    const { base, values } = unwindChain(expression.right);
    return {
      index,
      name: expression.left.name,
      nameNode: expression.left,
      typeNode: null,
      defaultNode: base,
      values
    };
  }

  if (is.binaryExpression(expression) && expression.operator === '|') {
    const { base, values } = unwindChain(expression);

    if (!is.identifier(base)) {
      return reportDeclarationError(
        subject,
        `statement ${index + 1}: "|" chain must start with a field name (found ${base.type})`
      );
    }

    return {
      index,
      name: base.name,
      nameNode: base,
      typeNode: null,
      defaultNode: null,
      values
    };
  }

  return null;
}

/**
 * Reads the body of a typed field statement (`T`, `T = x`, `T | x`).
 */
function readTypedField(
  label: types.Identifier,
  expression: types.Expression,
  index: number,
  subject: DeclarationSubject
): FieldSyntax | null {
  const field = {
    index,
    name: label.name,
    nameNode: label
  };

  if (isTypeName(expression)) {
    return { ...field, typeNode: expression, defaultNode: null, values: [] };
  }

  if (
    is.assignmentExpression(expression) &&
    expression.operator === '=' &&
    isTypeName(expression.left)
  ) {
    const { base, values } = unwindChain(expression.right);
    return { ...field, typeNode: expression.left, defaultNode: base, values };
  }

  if (is.binaryExpression(expression) && expression.operator === '|') {
    const { base, values } = unwindChain(expression);

    if (!isTypeName(base)) {
      return reportDeclarationError(
        subject,
        `field "${label.name}": "|" chain must start with a type name (found ${base.type})`
      );
    }

    return { ...field, typeNode: base, defaultNode: null, values };
  }

  return null;
}

/**
 * Reads one field statement.
 *
 * Accepted shapes are listed in {@link DeclarationSurface}. Anything else is a
 * declaration error naming the statement.
 *
 * @param statement
 *   A statement of the record block or the field list.
 * @param index
 *   Its position (0-based).
 * @param subject
 *   Extension and record being expanded.
 * @returns
 *   The field split into name, type, ordinary default and chain values.
 */
export function readField(
  statement: types.Node,
  index: number,
  subject: DeclarationSubject
): FieldSyntax {
  let field: FieldSyntax | null = null;

  if (is.expressionStatement(statement)) {
    field = readUntypedField(statement.expression, index, subject);
  } else if (
    is.labeledStatement(statement) &&
    is.expressionStatement(statement.body)
  ) {
    field = readTypedField(
      statement.label,
      statement.body.expression,
      index,
      subject
    );
  }

  if (field === null) {
    return reportDeclarationError(
      subject,
      `statement ${index + 1} is not a field declaration (found ${describeStatement(statement)})`
    );
  }

  if (isReservedKey(field.name)) {
    return reportDeclarationError(
      subject,
      `field "${field.name}" uses a reserved name`
    );
  }

  return field;
}

function describeStatement(statement: types.Node): string {
  return is.expressionStatement(statement)
    ? statement.expression.type
    : statement.type;
}

/**
 * Rebuilds a field statement carrying the given chain values.
 *
 * Passing no values yields the fully unannotated field; untouched child nodes
 * are reused, so the result compares equal to the same field written without
 * annotations.
 *
 * @param field
 *   The field as read by {@link readField}.
 * @param values
 *   Chain values to keep, in written order.
 * @returns
 *   The rewritten statement.
 */
export function writeField(
  field: FieldSyntax,
  values: readonly types.Expression[]
): types.Statement {
  const head: types.Expression = field.typeNode ?? field.nameNode;

  const expression: types.Expression =
    field.defaultNode === null
      ? buildChain(head, values)
      : {
          type: 'AssignmentExpression',
          operator: '=',
          left: field.typeNode ?? field.nameNode,
          right: buildChain(field.defaultNode, values)
        };

  const body: types.ExpressionStatement = {
    type: 'ExpressionStatement',
    expression
  };

  if (field.typeNode === null) return body;

  return { type: 'LabeledStatement', label: field.nameNode, body };
}

/**
 * Decodes one chain value.
 *
 * The placeholder identifier is checked first and becomes {@link PLACEHOLDER};
 * everything else must be a static literal.
 *
 * @param node
 *   The chain value as written.
 * @param placeholder
 *   Identifier name of the placeholder token.
 * @param position
 *   1-based written position of the value (for diagnostics).
 */
export function resolveAnnotationValue(
  node: types.Expression,
  placeholder: string,
  field: FieldSyntax,
  position: number,
  subject: DeclarationSubject
): AnnotationValue {
  if (is.identifier(node) && node.name === placeholder) {
    return PLACEHOLDER;
  }

  const slot = formatPath(
    `${subject.typeName ?? ''}.${field.name}`,
    `<value ${position}>`
  );
  const result = extractLiteral(node, slot);

  if (!result.success) {
    return reportDeclarationError(
      subject,
      `field "${field.name}": annotation value ${position} is not a static literal (at ${result.rejectedAt})`
    );
  }

  return result.value;
}
