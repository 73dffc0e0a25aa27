/**
 * Field Builders
 *
 * Fluent, immutable builders describing how one property of a record is read
 * from a document. The document key defaults to the property name.
 *
 * @example
 * ```typescript
 * const Server = Schema.define('Server', {
 *   host: field().string(),
 *   port: field().integer().default(8080),
 *   timeout: field('timeout_seconds').duration(),
 *   peers: field().array(field().string()).optional(),
 *   interfaces: field().array(field().record(Interface)).key('name'),
 *   tag: field().string().setInfo()
 * });
 * ```
 */

import { SchemaDefinitionError } from './config-error';
import type { Duration } from './duration';
import type { RecordSchema } from './schema';
import type { SetInfo } from './set-info';
import type { Converter, FieldKind, SchemaModel, TextType } from './types';

/**
 * Raw declaration collected by the builders, compiled into a
 * `FieldDescriptor` by `Schema.define`.
 */
export interface FieldDef {
	readonly kind: FieldKind;
	/** Document key, when it differs from the property name */
	readonly source?: string;
	readonly optional: boolean;
	readonly hasDefault: boolean;
	readonly defaultValue?: unknown;
	readonly converter?: Converter<unknown>;
	/** Key attribute of an array of records read from a mapping of mappings */
	readonly key?: string;
	readonly setInfo: boolean;
	readonly element?: FieldDef;
	readonly record?: SchemaModel;
	readonly values?: readonly string[];
	readonly textType?: TextType<unknown>;
}

/**
 * Anything `Schema.define` accepts as a field. `_output` only carries the
 * bound type for inference and is never set.
 */
export interface FieldLike<T = unknown> {
	readonly _def: FieldDef;
	readonly _output: T;
}

export class FieldBuilder<T> implements FieldLike<T> {
	declare readonly _output: T;

	public constructor(public readonly _def: FieldDef) {}

	/** Read the field from `source` instead of the property name */
	public name(source: string): FieldBuilder<T> {
		return new FieldBuilder<T>({ ...this._def, source: checkName(this._def, source) });
	}

	/** The field may be absent; it then takes its default (or the kind's zero value) */
	public optional(): FieldBuilder<T> {
		return new FieldBuilder<T>({ ...this._def, optional: true });
	}

	/**
	 * Value used when the field is absent. A default that differs from the
	 * kind's zero value also makes the field optional.
	 */
	public default(value: T): FieldBuilder<T> {
		return new FieldBuilder<T>({ ...this._def, hasDefault: true, defaultValue: value });
	}

	/** Produce the value from the raw node, bypassing every other strategy */
	public convert(converter: Converter<T>): FieldBuilder<T> {
		if (this._def.converter !== undefined) {
			throw new SchemaDefinitionError('field already has a converter');
		}
		return new FieldBuilder<T>({ ...this._def, converter });
	}

	/**
	 * Read an array of records from a mapping of mappings, storing each
	 * mapping key into the element field whose document key is `attribute`.
	 */
	public key(attribute: string): FieldBuilder<T> {
		if (this._def.key !== undefined) {
			throw new SchemaDefinitionError(`field already has key attribute '${this._def.key}'`);
		}
		if (attribute === '') {
			throw new SchemaDefinitionError('key attribute must not be empty');
		}
		return new FieldBuilder<T>({ ...this._def, key: attribute });
	}

	/** Wrap the value in `SetInfo`, recording whether it was supplied */
	public setInfo(): SetInfoFieldBuilder<T> {
		return new SetInfoFieldBuilder<T>({ ...this._def, setInfo: true });
	}
}

/**
 * Builder for a SetInfo-wrapped field. Such fields are always optional.
 */
export class SetInfoFieldBuilder<T> implements FieldLike<SetInfo<T>> {
	declare readonly _output: SetInfo<T>;

	public constructor(public readonly _def: FieldDef) {}

	public name(source: string): SetInfoFieldBuilder<T> {
		return new SetInfoFieldBuilder<T>({ ...this._def, source: checkName(this._def, source) });
	}
}

function checkName(def: FieldDef, source: string): string {
	if (def.source !== undefined) {
		throw new SchemaDefinitionError(`field is already named '${def.source}'`);
	}
	if (source === '') {
		throw new SchemaDefinitionError('field name must not be empty');
	}
	return source;
}

/**
 * Kind selection returned by `field()`.
 */
export class FieldKindSelector {
	public constructor(private readonly source?: string) {}

	public string(): FieldBuilder<string> {
		return this.create<string>('string');
	}

	/** Safe integer */
	public integer(): FieldBuilder<number> {
		return this.create<number>('integer');
	}

	public number(): FieldBuilder<number> {
		return this.create<number>('number');
	}

	/** `true` or `false`, case-insensitive. Boolean fields are always optional */
	public boolean(): FieldBuilder<boolean> {
		return this.create<boolean>('boolean');
	}

	/** One of `values`; the first member is the zero value */
	public enumeration<const V extends readonly [string, ...string[]]>(values: V): FieldBuilder<V[number]> {
		if (new Set(values).size !== values.length) {
			throw new SchemaDefinitionError(`enumeration members must be unique: ${values.join(', ')}`);
		}
		return this.create<V[number]>('enum', { values });
	}

	/** Nested record bound from a mapping, or from a scalar when the schema declares `fromString` */
	public record<R>(schema: RecordSchema<R>): FieldBuilder<R> {
		return this.create<R>('record', { record: schema });
	}

	public array<E>(element: FieldLike<E>): FieldBuilder<E[]> {
		return this.create<E[]>('array', { element: element._def });
	}

	/**
	 * Time span. With a `_<unit>` suffix on the document key the value is an
	 * integer count of that unit, otherwise a mapping of unit counts.
	 */
	public duration(): FieldBuilder<Duration> {
		return this.create<Duration>('duration');
	}

	/** Value parsed from scalar text by a static `fromString` or a one-string constructor */
	public type<T>(textType: TextType<T>): FieldBuilder<T> {
		return this.create<T>('custom', { textType });
	}

	/** Value produced from the raw node by `converter` */
	public converted<T>(converter: Converter<T>): FieldBuilder<T> {
		return this.create<T>('custom', { converter });
	}

	private create<T>(kind: FieldKind, extra: Partial<FieldDef> = {}): FieldBuilder<T> {
		const def: FieldDef = { kind, optional: false, hasDefault: false, setInfo: false, ...extra };
		return new FieldBuilder<T>(this.source === undefined ? def : { ...def, source: this.source });
	}
}

/**
 * Start a field declaration.
 *
 * @param source - Document key, when it differs from the property name
 */
export function field(source?: string): FieldKindSelector {
	if (source === '') {
		throw new SchemaDefinitionError('field name must not be empty');
	}
	return new FieldKindSelector(source);
}
