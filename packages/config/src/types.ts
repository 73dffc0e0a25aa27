/**
 * Core types shared by the document adapters, the schema model and the binders.
 */

import type { Logger } from '@docbind/logging';
import type { ValidationResult } from '@docbind/validation';
import type { ConfigError } from './config-error';
import type { DurationUnit } from './duration';

// --- Document model ---

export type NodeKind = 'mapping' | 'sequence' | 'scalar' | 'invalid';

/**
 * Location of a node in its source document. Lines and columns are 0-based.
 */
export interface Position {
	readonly source: string;
	readonly line: number;
	readonly column: number;
}

export interface MappingEntry {
	readonly key: string;
	readonly keyPosition: Position;
	readonly value: DocumentNode;
}

/**
 * Read-only view of one node of a parsed document.
 *
 * The binders only ever talk to this interface, so any parser able to
 * expose mappings, sequences and scalars with positions can feed them.
 */
export interface DocumentNode {
	readonly kind: NodeKind;
	readonly position: Position;
	/** Child of a mapping by key; `undefined` when absent or when this is not a mapping */
	get(key: string): DocumentNode | undefined;
	/** Mapping entries in document order; empty for other kinds */
	entries(): readonly MappingEntry[];
	/** Sequence items in document order; empty for other kinds */
	items(): readonly DocumentNode[];
	/** Scalar text; `null` scalars read as the empty string */
	text(): string;
}

// --- Binding ---

/**
 * Command-line overrides keyed by dotted document path (`server.port`).
 * Array fields take every value in order; other fields take the last one.
 */
export type OverrideTable = Readonly<Record<string, readonly string[]>>;

export interface BindOptions {
	/** Reject keys the schema does not declare (default: true) */
	strict?: boolean;
	overrides?: OverrideTable;
	/** Receives field resolution traces at debug level and non-strict warnings */
	logger?: Logger;
}

export type BindResult<T> =
	| { success: true; value: T; warnings: readonly ConfigError[] }
	| { success: false; error: ConfigError };

/** Internal result shape threaded through the binders */
export type Bound<T> = { success: true; value: T } | { success: false; error: ConfigError };

export function ok<T>(value: T): Bound<T> {
	return { success: true, value };
}

export function fail(error: ConfigError): { success: false; error: ConfigError } {
	return { success: false, error };
}

// --- Schema model ---

export type FieldKind = 'string' | 'integer' | 'number' | 'boolean' | 'enum' | 'record' | 'array' | 'duration' | 'custom';

/**
 * How a field's value is produced from a node, fixed when the schema is defined.
 * Listed in precedence order.
 */
export type ResolutionStrategy = 'converter' | 'fromString' | 'stringConstructor' | 'fieldwise' | 'native';

/** Per-field hook receiving the raw node */
export type Converter<T> = (node: DocumentNode) => T;

/** A type that parses itself from text through a static `fromString` */
export interface FromString<T> {
	fromString(text: string): T;
}

/** A class whose constructor takes the scalar text */
export type StringConstructible<T> = new (text: string) => T;

export type TextType<T> = FromString<T> | StringConstructible<T>;

/**
 * Compiled form of one field, built once by `Schema.define`.
 */
export interface FieldDescriptor {
	/** Property name on the bound record */
	readonly name: string;
	/** Document key */
	readonly source: string;
	readonly kind: FieldKind;
	readonly strategy: ResolutionStrategy;
	readonly optional: boolean;
	readonly setInfo: boolean;
	/** Value used when the field is absent or its record is disabled */
	readonly defaultValue: unknown;
	/** For SetInfo-wrapped fields: the same field without the wrapper */
	readonly inner?: FieldDescriptor;
	readonly converter?: Converter<unknown>;
	/** Scalar parser for the `fromString` and `stringConstructor` strategies */
	readonly parseText?: (text: string) => unknown;
	readonly key?: string;
	readonly element?: FieldDescriptor;
	readonly record?: SchemaModel;
	readonly values?: readonly string[];
	/** Unit of a suffix-form duration */
	readonly durationUnit?: DurationUnit;
	/** Absent required record that may still be satisfied entirely by defaults */
	readonly mightBeOptional: boolean;
}

/**
 * What the binders need from a record schema.
 */
export interface SchemaModel<T = unknown> {
	readonly name: string;
	readonly fields: readonly FieldDescriptor[];
	/** Document keys in schema order */
	readonly sourceNames: readonly string[];
	/** The `enabled` or `disabled` field, when the record declares one */
	readonly gate: FieldDescriptor | undefined;
	readonly defaults: T;
	/** Every field has a default or a zero value */
	readonly completeDefaults: boolean;
	readonly fromString: ((text: string) => T) | undefined;
	construct(values: Readonly<Record<string, unknown>>): T;
	/** `undefined` when the record declares no validation hook */
	check(value: T): ValidationResult | undefined;
}
