import type { types } from 'estree-toolkit';

import type { FieldDefinition } from '../types';
import { type DeclarationSubject, reportDeclarationError } from '../report';
import { extractLiteral, formatPath } from '../extractor';
import { deepFreeze } from '../guards';
import { type FieldSyntax, formatTypeName, readField } from './annotation-parser';

/**
 * Reads every statement of a record block or field list.
 *
 * @throws
 *   When a statement is not a field or a field name repeats.
 */
export function readFieldList(
  statements: readonly types.Node[],
  subject: DeclarationSubject
): FieldSyntax[] {
  const seen = new Set<string>();

  return statements.map((statement, index) => {
    const field = readField(statement, index, subject);

    if (seen.has(field.name)) {
      return reportDeclarationError(
        subject,
        `field "${field.name}" is declared more than once`
      );
    }

    seen.add(field.name);
    return field;
  });
}

/**
 * Rejects a field that still carries chain values after every link ran.
 */
export function assertNoResidualChain(
  field: FieldSyntax,
  remaining: readonly unknown[],
  subject: DeclarationSubject
): void {
  if (remaining.length === 0) return;

  reportDeclarationError(
    subject,
    `field "${field.name}" still carries ${remaining.length} annotation value(s) after expansion`
  );
}

/**
 * Turns a fully unannotated field into its emitted definition.
 *
 * The ordinary default must be a static literal; it is stored deep-frozen so
 * every instance shares the same value safely.
 */
export function toFieldDefinition(
  field: FieldSyntax,
  subject: DeclarationSubject
): FieldDefinition {
  const type = field.typeNode === null ? null : formatTypeName(field.typeNode);

  if (field.defaultNode === null) {
    return { name: field.name, type, hasDefault: false };
  }

  const slot = formatPath(`${subject.typeName ?? ''}.${field.name}`, '<default>');
  const result = extractLiteral(field.defaultNode, slot);

  if (!result.success) {
    return reportDeclarationError(
      subject,
      `field "${field.name}": ordinary default is not a static literal (at ${result.rejectedAt})`
    );
  }

  return {
    name: field.name,
    type,
    hasDefault: true,
    defaultValue: deepFreeze(result.value)
  };
}
