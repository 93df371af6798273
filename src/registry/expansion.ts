import type { types } from 'estree-toolkit';

import type { AllOrNothingExpansion, ChainReversal } from '../architecture';
import type {
  DeclarationExpansion,
  FieldAnnotation,
  OverrideBinding,
  RecordDeclaration,
  RecordType
} from '../types';
import { type DeclarationSubject, reportDeclarationError } from '../report';
import { parseFieldListSource, parseRecordSource } from '../parser/parse-source';
import {
  type FieldSyntax,
  resolveAnnotationValue,
  writeField
} from '../parser/annotation-parser';
import { assignChainValues } from '../parser/chain-order';
import {
  assertNoResidualChain,
  readFieldList,
  toFieldDefinition
} from '../parser/finalize';
import { emitOverrides } from '../emitter/override-emitter';

/**
 * What one extension needs to expand a declaration.
 */
export type ExpansionContext = {
  extension: string;

  /**
   * Kinds in listing order; a kind lists itself only.
   */
  kinds: readonly string[];

  placeholder: string;
};

/**
 * A bare-form expansion, which always carries its record.
 */
export type RecordExpansion = DeclarationExpansion & {
  record: RecordDeclaration;
};

type WrittenValue = {
  node: types.Expression;
  /**
   * 1-based position as written.
   */
  position: number;
};

/**
 * Runs every kind of the extension over every field.
 *
 * Per field, {@link assignChainValues} pairs chain values with kind positions
 * (see {@link ChainReversal}); the pairs are then regrouped per kind so each
 * kind application emits its overrides in declared field order. Bindings come
 * out in application order: the last-listed kind first.
 */
function expandFields(
  fields: readonly FieldSyntax[],
  context: ExpansionContext,
  subject: DeclarationSubject,
  typeName: string
): { statements: types.Statement[]; bindings: OverrideBinding[] } {
  const annotationsByPosition: FieldAnnotation[][] = context.kinds.map(
    () => []
  );
  const positions = Array.from(context.kinds.keys());

  const statements = fields.map(field => {
    const written: WrittenValue[] = field.values.map((node, index) => ({
      node,
      position: index + 1
    }));

    const { assignments, remaining } = assignChainValues(positions, written);

    assertNoResidualChain(field, remaining, subject);

    for (const { kind, value } of assignments) {
      annotationsByPosition[kind].push({
        field: field.name,
        value: resolveAnnotationValue(
          value.node,
          context.placeholder,
          field,
          value.position,
          subject
        )
      });
    }

    return writeField(field, []);
  });

  const bindings = [...positions]
    .reverse()
    .flatMap(position =>
      emitOverrides(
        typeName,
        context.kinds[position],
        annotationsByPosition[position]
      )
    );

  return { statements, bindings };
}

/**
 * Expands a bare-form declaration (`Model: { … }`).
 *
 * Pure: nothing is registered (see {@link AllOrNothingExpansion}).
 *
 * @param source
 *   A single labeled block.
 * @param context
 *   The extension being applied.
 * @returns
 *   The cleaned record, its printed-back program and the bindings.
 */
export function expandRecordSource(
  source: string,
  context: ExpansionContext
): RecordExpansion {
  const parsed = parseRecordSource(source, context.extension);
  const subject: DeclarationSubject = {
    extension: context.extension,
    typeName: parsed.typeName
  };

  const fields = readFieldList(parsed.statements, subject);
  const { statements, bindings } = expandFields(
    fields,
    context,
    subject,
    parsed.typeName
  );

  const record: RecordDeclaration = {
    typeName: parsed.typeName,
    fields: fields.map(field => toFieldDefinition(field, subject))
  };

  return {
    extension: context.extension,
    typeName: parsed.typeName,
    record,
    program: {
      type: 'Program',
      sourceType: 'script',
      body: [
        {
          type: 'LabeledStatement',
          label: parsed.label,
          body: { type: 'BlockStatement', body: statements }
        }
      ]
    },
    bindings
  };
}

/**
 * Expands a typed-form field list against an existing record.
 *
 * Each line names a field (`a | 4;`). A type label (`a: Int | 4;`) is
 * accepted and ignored: the record's own declaration owns the type. Ordinary
 * defaults are rejected. Every field must exist on the record.
 *
 * @param record
 *   The record being annotated.
 * @param source
 *   The field list, optionally wrapped in braces.
 * @param context
 *   The extension being applied.
 * @returns
 *   The bindings, with `record: null` and the cleaned field list as program.
 */
export function expandFieldListSource(
  record: RecordType,
  source: string,
  context: ExpansionContext
): DeclarationExpansion {
  const subject: DeclarationSubject = {
    extension: context.extension,
    typeName: record.name
  };

  const fields = readFieldList(parseFieldListSource(source, subject), subject);

  for (const field of fields) {
    if (field.defaultNode !== null) {
      reportDeclarationError(
        subject,
        `field "${field.name}": the typed form annotates existing fields and cannot declare an ordinary default`
      );
    }

    record.field(field.name);
  }

  const { statements, bindings } = expandFields(
    fields,
    context,
    subject,
    record.name
  );

  return {
    extension: context.extension,
    typeName: record.name,
    record: null,
    program: { type: 'Program', sourceType: 'script', body: statements },
    bindings
  };
}
