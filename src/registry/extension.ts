import type {
  DeclarationExpansion,
  MetadataExtension,
  RecordType
} from '../types';
import {
  type ExpansionContext,
  type RecordExpansion,
  expandFieldListSource,
  expandRecordSource
} from './expansion';

/**
 * The registry side of an extension: where expansions are committed.
 */
export type ExtensionHost = {
  readonly placeholder: string;

  /**
   * Throws once the registry is frozen.
   *
   * @param operation
   *   The attempted call, for the error message.
   */
  assertLoadPhase(operation: string): void;

  /**
   * Resolves a record type or name to a record declared in this registry.
   */
  resolveRecord(target: RecordType | string): RecordType;

  commitDeclaration(expansion: RecordExpansion): RecordType;

  commitAnnotation(expansion: DeclarationExpansion): void;
};

/**
 * Builds the declaration forms of a kind or chain.
 *
 * Both forms expand first and commit second, so a failing declaration never
 * reaches the host.
 *
 * @param extensionName
 *   Name of the kind or chain.
 * @param kinds
 *   Kinds it covers, in listing order.
 * @param host
 *   The owning registry.
 */
export function createExtension(
  extensionName: string,
  kinds: readonly string[],
  host: ExtensionHost
): MetadataExtension {
  const frozenKinds = Object.freeze([...kinds]);

  const context = (): ExpansionContext => ({
    extension: extensionName,
    kinds: frozenKinds,
    placeholder: host.placeholder
  });

  return {
    extensionName,
    kinds: frozenKinds,

    expand: source => expandRecordSource(source, context()),

    declare(source) {
      host.assertLoadPhase(`${extensionName}.declare()`);
      return host.commitDeclaration(expandRecordSource(source, context()));
    },

    annotate(target, source) {
      host.assertLoadPhase(`${extensionName}.annotate()`);
      const record = host.resolveRecord(target);
      host.commitAnnotation(expandFieldListSource(record, source, context()));
    }
  };
}
