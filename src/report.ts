import type { AllOrNothingExpansion } from './architecture';

/**
 * Failure reporting
 * -----------------
 * Every failure in this package is a programmer error found while the program
 * loads: a malformed declaration, an unknown extension, a write after freeze.
 * None of them is recoverable at runtime, so each reporter throws a plain
 * `Error` and returns `never`.
 *
 * Message contract
 * ----------------
 * - Prefix `[field-metadata]` so the origin is visible in build logs.
 * - Name the record, field and extension involved, quoted.
 * - Parser failures keep the parser error as `cause`.
 *
 * Declaration errors abort the whole declaration; see
 * {@link AllOrNothingExpansion}.
 */

const PREFIX = '[field-metadata]';

/**
 * Where a declaration error happened.
 */
export type DeclarationSubject = {
  /**
   * Kind or chain being expanded.
   */
  extension: string;

  /**
   * Record being declared or annotated; `null` before the label was read.
   */
  typeName: string | null;
};

/**
 * Formats the subject line shared by all declaration errors.
 *
 * @example
 *   formatSubject({ extension: 'bounds', typeName: 'Model' })
 *   // -> 'Cannot expand "Model" with "bounds"'
 */
function formatSubject(subject: DeclarationSubject): string {
  const target =
    subject.typeName === null ? 'declaration' : `"${subject.typeName}"`;
  return `Cannot expand ${target} with "${subject.extension}"`;
}

/**
 * Report (and throw) a malformed or non-static declaration.
 *
 * @param subject - Extension and record being expanded
 * @param detail - What is wrong, naming the field or statement
 * @param cause - Underlying error (e.g. the parser's), kept as `cause`
 * @throws Always
 */
export function reportDeclarationError(
  subject: DeclarationSubject,
  detail: string,
  cause?: unknown
): never {
  const message = `${PREFIX} ${formatSubject(subject)}: ${detail}`;
  throw cause === undefined ? new Error(message) : new Error(message, { cause });
}

/**
 * Report (and throw) a lookup or annotation of a field the record does not
 * declare. This is the record's missing-member failure; accessors do not
 * handle it specially.
 */
export function reportUnknownField(typeName: string, field: string): never {
  throw new Error(`${PREFIX} Record "${typeName}" has no field "${field}".`);
}

/**
 * Report (and throw) a record instance built without a value for a field
 * that has no ordinary default.
 */
export function reportMissingFieldValue(
  typeName: string,
  field: string
): never {
  throw new Error(
    `${PREFIX} Record "${typeName}" requires a value for field "${field}" (no default declared).`
  );
}

/**
 * Report (and throw) a record lookup that the registry cannot resolve.
 *
 * @param name - Record name, or a description of the rejected target
 */
export function reportUnknownRecord(name: string): never {
  throw new Error(`${PREFIX} Record "${name}" is not declared in this registry.`);
}

/**
 * Report (and throw) an accessor call whose target is neither a record type
 * nor a record instance.
 */
export function reportInvalidTarget(extension: string): never {
  throw new Error(
    `${PREFIX} "${extension}" expects a record type or a record instance.`
  );
}

/**
 * Report (and throw) a reference to a kind or chain that was never defined.
 *
 * @param referrer - What referenced the name (e.g. `chain "columns"`)
 * @param name - The missing extension name
 */
export function reportUndefinedExtension(referrer: string, name: string): never {
  throw new Error(
    `${PREFIX} ${referrer} refers to "${name}", which is not a defined kind or chain.`
  );
}

/**
 * Report (and throw) a second definition under an existing name.
 */
export function reportDuplicateExtension(name: string): never {
  throw new Error(`${PREFIX} "${name}" is already defined as a kind or chain.`);
}

/**
 * Report (and throw) a write attempted after `freeze()`.
 *
 * @param operation - The rejected call (e.g. `defineKind("units")`)
 */
export function reportFrozenRegistry(operation: string): never {
  throw new Error(
    `${PREFIX} Registry is frozen; ${operation} must run during the load phase.`
  );
}

/**
 * Report (and throw) a bare-form declaration of a record name that is already
 * declared with different fields. Redeclaring identical fields is allowed.
 */
export function reportRecordRedeclared(typeName: string): never {
  throw new Error(
    `${PREFIX} Record "${typeName}" is already declared with different fields.`
  );
}

/**
 * Report (and throw) a lookup through a name that has no accessor: an unknown
 * name, or a chain.
 */
export function reportUndefinedKind(name: string): never {
  throw new Error(`${PREFIX} No kind named "${name}" is defined.`);
}

/**
 * Report (and throw) a chain definition without links.
 */
export function reportEmptyChain(name: string): never {
  throw new Error(
    `${PREFIX} Chain "${name}" must list at least one kind or chain.`
  );
}
