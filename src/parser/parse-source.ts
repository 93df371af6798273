import { is, types } from 'estree-toolkit';
import { parse } from 'meriyah';

import type { DeclarationSurface } from '../architecture';
import { type DeclarationSubject, reportDeclarationError } from '../report';
import { isNodeLike } from '../guards';

/**
 * A record source split into its label and field statements.
 */
export type ParsedRecordSource = {
  typeName: string;
  label: types.Identifier;
  statements: types.Node[];
};

/**
 * Parses declaration source as a classic script.
 *
 * Script mode keeps labeled statements legal everywhere and needs no
 * `import`/`export` support. Parser failures are reported as declaration
 * errors carrying the parser error as `cause`.
 */
function parseProgram(
  source: string,
  subject: DeclarationSubject
): types.Program {
  let ast: unknown;

  try {
    ast = parse(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return reportDeclarationError(
      subject,
      `source does not parse (${reason})`,
      error
    );
  }

  if (!isNodeLike(ast) || !is.program(ast)) {
    return reportDeclarationError(
      subject,
      'parser output is not an ESTree Program'
    );
  }

  return ast;
}

/**
 * Parses a bare-form declaration: exactly one labeled block.
 *
 * See {@link DeclarationSurface} for the accepted statements.
 *
 * @param source
 *   e.g. `Model: { a: Int = 1 | 4; b: Int = 4 | 9; }`
 * @param extension
 *   Name of the extension expanding the source (for diagnostics).
 * @returns
 *   The record name, its label node and the raw field statements.
 */
export function parseRecordSource(
  source: string,
  extension: string
): ParsedRecordSource {
  const subject: DeclarationSubject = { extension, typeName: null };
  const program = parseProgram(source, subject);

  const [declaration, ...rest] = program.body;

  if (
    rest.length > 0 ||
    !declaration ||
    !is.labeledStatement(declaration) ||
    !is.blockStatement(declaration.body)
  ) {
    return reportDeclarationError(
      subject,
      'expected a single labeled block such as "Model: { a; b; }"'
    );
  }

  return {
    typeName: declaration.label.name,
    label: declaration.label,
    statements: [...declaration.body.body]
  };
}

/**
 * Parses a typed-form field list.
 *
 * Accepts the statements alone (`a | 4; b | 9;`) or wrapped in one block
 * (`{ a | 4; b | 9; }`).
 *
 * @param source
 *   The field list.
 * @param subject
 *   Extension and record being annotated (for diagnostics).
 * @returns
 *   The raw field statements.
 */
export function parseFieldListSource(
  source: string,
  subject: DeclarationSubject
): types.Node[] {
  const program = parseProgram(source, subject);

  const [first, ...rest] = program.body;

  if (first && rest.length === 0 && is.blockStatement(first)) {
    return [...first.body];
  }

  return [...program.body];
}
