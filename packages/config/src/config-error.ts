/**
 * Configuration errors
 *
 * Every failure raised while binding a document carries the dotted path of the
 * offending field, the key inside that path (possibly empty) and the position
 * of the node in the source document.
 *
 * @example
 * ```typescript
 * const result = bindString(Config, 'server:\n  prot: 80', 'app.yaml');
 * if (!result.success) {
 *   console.error(result.error.format({ colors: true }));
 *   // app.yaml(1:2): server.prot: Key is not a valid member of this section. There are 2 valid keys: host, port
 * }
 * ```
 */

import { paint } from '@docbind/logging';
import { formatIssues, type ValidationIssue } from '@docbind/validation';
import { DURATION_UNITS } from './duration';
import type { NodeKind, Position } from './types';

export type ConfigErrorKind =
	| 'unknown-key'
	| 'missing-key'
	| 'type-mismatch'
	| 'duration-shape'
	| 'construction'
	| 'validation'
	| 'duplicate-key'
	| 'document-parse';

export interface FormatOptions {
	/** Decorate source, position and path with ANSI colors */
	colors?: boolean;
}

/**
 * Base class of every binding failure.
 */
export abstract class ConfigError extends Error {
	public abstract readonly kind: ConfigErrorKind;

	public constructor(
		public readonly path: string,
		public readonly key: string,
		public readonly position: Position,
		public readonly detail: string
	) {
		super(ConfigError.formatMessage(position, joinPath(path, key), detail));

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}

	/** `path.key`, or whichever of the two is set */
	public get fieldPath(): string {
		return joinPath(this.path, this.key);
	}

	/**
	 * Render as `source(line:column): path.key: detail`.
	 * Without colors this is exactly `message`.
	 */
	public format(options: FormatOptions = {}): string {
		const colors = options.colors ?? false;
		const { source, line, column } = this.position;
		const location =
			`${paint(source, 'yellow', colors)}(` +
			`${paint(String(line), 'cyan', colors)}:${paint(String(column), 'cyan', colors)}): `;
		const fieldPath = this.fieldPath;
		const prefix = fieldPath ? `${paint(fieldPath, 'yellow', colors)}: ` : '';
		return location + prefix + this.formatDetail(colors);
	}

	protected formatDetail(_colors: boolean): string {
		return this.detail;
	}

	private static formatMessage(position: Position, fieldPath: string, detail: string): string {
		const location = `${position.source}(${position.line}:${position.column}): `;
		return fieldPath ? `${location}${fieldPath}: ${detail}` : `${location}${detail}`;
	}
}

/**
 * A document key that no field of the schema declares.
 */
export class UnknownKeyError extends ConfigError {
	public override readonly name = 'UnknownKeyError';
	public readonly kind = 'unknown-key';

	public constructor(
		path: string,
		key: string,
		public readonly validKeys: readonly string[],
		position: Position
	) {
		super(path, key, position, UnknownKeyError.describe(validKeys, (keys) => keys));
	}

	protected override formatDetail(colors: boolean): string {
		return UnknownKeyError.describe(this.validKeys, (keys) => paint(keys, 'green', colors));
	}

	private static describe(validKeys: readonly string[], decorate: (keys: string) => string): string {
		return (
			'Key is not a valid member of this section. ' +
			`There are ${validKeys.length} valid keys: ${decorate(validKeys.join(', '))}`
		);
	}
}

/**
 * A required field absent from both the document and the overrides.
 * `path` is the full dotted path of the field.
 */
export class MissingKeyError extends ConfigError {
	public override readonly name = 'MissingKeyError';
	public readonly kind = 'missing-key';

	public constructor(path: string, position: Position) {
		super(path, '', position, 'Required key was not found in configuration or command line arguments');
	}
}

export class TypeMismatchError extends ConfigError {
	public override readonly name = 'TypeMismatchError';
	public readonly kind = 'type-mismatch';

	public constructor(
		path: string,
		public readonly expected: string,
		public readonly actual: string,
		position: Position
	) {
		super(path, '', position, `Expected to be of type ${expected}, but is a ${actual}`);
	}
}

/**
 * A mapping-form duration that is not a mapping, or that sets none of its units.
 */
export class DurationShapeError extends ConfigError {
	public override readonly name = 'DurationShapeError';
	public readonly kind = 'duration-shape';

	/**
	 * @param actual - Kind of the offending node; omit when the mapping set no unit
	 */
	public constructor(path: string, position: Position, actual?: NodeKind) {
		super(
			path,
			'',
			position,
			actual === undefined
				? "Expected one of the field's values to be set"
				: `Field is of type ${actual}, but expected a mapping with at least one of: ${DURATION_UNITS.join(', ')}`
		);
	}
}

/**
 * A converter, `fromString`, string constructor or scalar conversion threw.
 */
export class ConstructionError extends ConfigError {
	public override readonly name = 'ConstructionError';
	public readonly kind = 'construction';
	public override readonly cause: unknown;

	public constructor(path: string, position: Position, cause: unknown) {
		super(path, '', position, cause instanceof Error ? cause.message : String(cause));
		this.cause = cause;
	}
}

/**
 * A record's validation hook rejected the bound value.
 * `path` is the path of the record, not of one of its fields.
 */
export class ValidationFailedError extends ConfigError {
	public override readonly name = 'ValidationFailedError';
	public readonly kind = 'validation';

	public constructor(
		path: string,
		position: Position,
		public readonly issues: readonly ValidationIssue[]
	) {
		super(path, '', position, formatIssues(issues));
	}
}

/**
 * The same field supplied twice in strict mode: by the document and by a
 * key-transform name or a command-line override.
 */
export class DuplicateKeyError extends ConfigError {
	public override readonly name = 'DuplicateKeyError';
	public readonly kind = 'duplicate-key';

	public constructor(path: string, key: string, position: Position, detail = "'Key' field is specified twice") {
		super(path, key, position, detail);
	}
}

/**
 * The document could not be read or parsed. Only the loaders raise it.
 */
export class DocumentParseError extends ConfigError {
	public override readonly name = 'DocumentParseError';
	public readonly kind = 'document-parse';

	public constructor(position: Position, detail: string) {
		super('', '', position, detail);
	}
}

/**
 * Mistake in a schema definition, thrown by the field builders and `Schema.define`.
 *
 * @example
 * ```typescript
 * // SchemaDefinitionError: [Server.port] source name 'host' is already used by field 'host'
 * ```
 */
export class SchemaDefinitionError extends Error {
	public override readonly name = 'SchemaDefinitionError';

	public constructor(
		public readonly reason: string,
		public readonly schemaName?: string,
		public readonly fieldName?: string
	) {
		super(SchemaDefinitionError.formatMessage(reason, schemaName, fieldName));

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, SchemaDefinitionError);
		}
	}

	private static formatMessage(reason: string, schemaName?: string, fieldName?: string): string {
		if (schemaName === undefined) return reason;
		return fieldName === undefined ? `[${schemaName}] ${reason}` : `[${schemaName}.${fieldName}] ${reason}`;
	}
}

export function joinPath(path: string, segment: string): string {
	if (!path) return segment;
	if (!segment) return path;
	return `${path}.${segment}`;
}
