import type {
  DeclarationExpansion,
  FieldDefinition,
  OverrideBinding,
  RecordDeclaration
} from './declaration';
import type { Metadata } from './primitives';
import type { RegistryLifecycle } from '../architecture';

/**
 * An instance built by {@link RecordType.create}.
 *
 * Instances are frozen plain objects holding field values only; metadata is
 * never stored on them. The type they were built from is recovered through
 * `typeOf`.
 */
export type RecordInstance = { readonly [field: string]: unknown };

/**
 * A record type emitted by the bare declaration form.
 */
export interface RecordType {
  readonly name: string;

  /**
   * Fields in declared order.
   */
  readonly fields: readonly FieldDefinition[];

  /**
   * The declaration the type was built from, as stored in snapshots.
   */
  readonly declaration: RecordDeclaration;

  hasField(field: string): boolean;

  /**
   * Returns the field definition.
   *
   * @throws
   *   The record's missing-member error when the field is not declared.
   */
  field(field: string): FieldDefinition;

  /**
   * Builds a frozen instance. Missing values fall back to ordinary defaults.
   *
   * @throws
   *   On unknown keys, or when a field without an ordinary default is missing.
   */
  create(values?: Readonly<Record<string, unknown>>): RecordInstance;
}

/**
 * Anything an accessor can be keyed by: the record type or one of its
 * instances.
 */
export type RecordTarget = RecordType | RecordInstance;

/**
 * What a default expression receives on every unoverridden lookup.
 */
export type LookupContext = {
  kind: string;
  type: RecordType;
  field: string;
};

/**
 * Produces the kind default. Evaluated on every lookup that has no binding;
 * the result is never cached, so returning a fresh array or object per call is
 * safe.
 */
export type DefaultExpression<V> = (context: LookupContext) => V;

/**
 * The two declaration forms shared by kinds and chains.
 */
export interface MetadataExtension {
  /**
   * Name the extension was registered under.
   */
  readonly extensionName: string;

  /**
   * Kinds covered by this extension, in the order they were listed. A kind
   * covers itself only; a chain covers the kinds of all its links.
   */
  readonly kinds: readonly string[];

  /**
   * Bare form: declares the record type together with its overrides.
   *
   * @param source
   *   A labeled block, e.g. `Model: { a: Int = 1 | 4; b | [0, 1]; }`.
   * @returns
   *   The emitted record type.
   */
  declare(source: string): RecordType;

  /**
   * Typed form: registers overrides for an existing record, emits no type.
   *
   * @param target
   *   The record type or the name it was declared under.
   * @param source
   *   A field list, e.g. `a | 4; b | 9;`, optionally wrapped in braces.
   */
  annotate(target: RecordType | string, source: string): void;

  /**
   * Runs the bare form without registering anything.
   */
  expand(source: string): DeclarationExpansion;
}

/**
 * The accessor family of one kind.
 *
 * - `kind(target, field)`: binding for `(type, field)` or the kind default.
 * - `kind(target)`: every field of the type, in declared order.
 */
export interface MetadataAccessor<V> {
  (target: RecordTarget): readonly Metadata<V>[];
  (target: RecordTarget, field: string): Metadata<V>;
}

/**
 * Handle returned by `defineKind`: callable accessor plus declaration forms.
 */
export type KindHandle<V> = MetadataAccessor<V> & MetadataExtension;

/**
 * Handle returned by `defineChain`.
 */
export type ChainHandle = MetadataExtension;

/**
 * Reported once per committed declaration.
 */
export type ExpansionEvent = {
  extension: string;
  typeName: string;
  form: 'declare' | 'annotate';
  bindingCount: number;
};

/**
 * Reported once per committed binding.
 */
export type BindingEvent = {
  binding: OverrideBinding;
  /**
   * `true` when the binding replaced an existing one for the same key.
   */
  replaced: boolean;
};

export type RegistryOptions = {
  /**
   * Identifier that marks a chain position as "keep the kind default".
   *
   * @default '_'
   */
  placeholder?: string;

  /**
   * Called after a declaration (bare or typed form) was committed.
   */
  onExpansion?: (event: ExpansionEvent) => void;

  /**
   * Called for every binding written to the override table, including
   * bindings loaded through `restore`.
   */
  onBinding?: (event: BindingEvent) => void;
};

/**
 * Plain-data image of a registry: everything except the default expressions,
 * which stay in code.
 */
export type RegistrySnapshot = {
  records: RecordDeclaration[];
  bindings: OverrideBinding[];
};

/**
 * The registry of kinds, chains, record types and overrides.
 *
 * Mutable during the load phase, read-only after {@link MetadataRegistry.freeze}
 * (see {@link RegistryLifecycle}).
 */
export interface MetadataRegistry {
  readonly placeholder: string;

  readonly isFrozen: boolean;

  /**
   * Defines a kind and returns its accessor family.
   *
   * @throws
   *   When `name` is already used by a kind or chain, or the registry is frozen.
   */
  defineKind<V>(name: string, defaultExpr: DefaultExpression<V>): KindHandle<V>;

  /**
   * Combines previously defined kinds or chains into one extension.
   *
   * @param links
   *   Extension names as the client lists them; the last one consumes the
   *   rightmost written value.
   * @throws
   *   When a link is not defined, the name is taken, or the registry is frozen.
   */
  defineChain(name: string, links: readonly string[]): ChainHandle;

  /**
   * Returns a previously defined kind or chain.
   */
  extension(name: string): MetadataExtension;

  /**
   * Returns a declared record type.
   */
  record(name: string): RecordType;

  /**
   * Two-level lookup: exact binding, else the kind default.
   */
  lookup(kind: string, target: RecordTarget, field: string): unknown;

  /**
   * Ends the load phase. Every defining or declaring call throws afterwards.
   */
  freeze(): void;

  snapshot(): RegistrySnapshot;

  /**
   * Loads records and bindings from a snapshot (load phase only). Kinds named
   * by the bindings must already be defined.
   */
  restore(snapshot: RegistrySnapshot): void;
}

