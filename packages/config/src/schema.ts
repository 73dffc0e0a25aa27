/**
 * Record schemas
 *
 * `Schema.define` compiles field builders into an ordered, immutable list of
 * field descriptors once, at definition time. Binding never re-derives
 * optionality, defaults or resolution strategies.
 *
 * @example
 * ```typescript
 * const Interface = Schema.define('Interface', {
 *   name: field().string(),
 *   ip: field().string()
 * });
 *
 * const Node = Schema.define(
 *   'Node',
 *   {
 *     enabled: field().boolean().default(true),
 *     interfaces: field().array(field().record(Interface)).key('name'),
 *     retry: field('retry_delay_msecs').duration().default(Duration.of('msecs', 500))
 *   },
 *   { validate: (node) => { if (node.interfaces.length === 0) throw new Error('no interface'); } }
 * );
 *
 * type Node = Infer<typeof Node>;
 * ```
 */

import { isDeepStrictEqual } from 'node:util';
import { validateSync, type ValidationResult, type Validator } from '@docbind/validation';
import { SchemaDefinitionError } from './config-error';
import { Duration, durationUnitOfKey } from './duration';
import type { FieldDef, FieldLike } from './field';
import { SetInfo } from './set-info';
import type { FieldDescriptor, FromString, ResolutionStrategy, SchemaModel, TextType } from './types';

export interface SchemaOptions<T> {
	/** Checked after the record is built, unless the record is disabled */
	validate?: Validator<T>;
	/** Lets the whole record be written as a single scalar */
	fromString?: (text: string) => T;
}

export type FieldsInput = Readonly<Record<string, FieldLike>>;

export type InferFields<F extends FieldsInput> = { -readonly [K in keyof F]: F[K]['_output'] };

/**
 * Bound type of a schema.
 */
export type Infer<S> = S extends SchemaModel<infer T> ? T : never;

interface ZeroValue {
	readonly exists: boolean;
	readonly value: unknown;
}

const NO_ZERO: ZeroValue = { exists: false, value: undefined };

const GATE_NAMES: readonly string[] = ['enabled', 'disabled'];

export class RecordSchema<T> implements SchemaModel<T> {
	public readonly fields: readonly FieldDescriptor[];
	public readonly sourceNames: readonly string[];
	public readonly gate: FieldDescriptor | undefined;
	public readonly defaults: T;
	public readonly completeDefaults: boolean;
	public readonly fromString: ((text: string) => T) | undefined;
	private readonly validator: Validator<T> | undefined;

	public constructor(
		public readonly name: string,
		fields: FieldsInput,
		options: SchemaOptions<T> = {}
	) {
		const gateNames = Object.keys(fields).filter((fieldName) => GATE_NAMES.includes(fieldName));
		if (gateNames.length > 1) {
			throw new SchemaDefinitionError("declares both 'enabled' and 'disabled'", name);
		}
		const gated = gateNames.length === 1;

		const descriptors: FieldDescriptor[] = [];
		const fieldBySource = new Map<string, string>();
		for (const [fieldName, builder] of Object.entries(fields)) {
			const descriptor = describeField(builder._def, { schemaName: name, fieldName, gated, element: false });
			const previous = fieldBySource.get(descriptor.source);
			if (previous !== undefined) {
				throw new SchemaDefinitionError(
					`source name '${descriptor.source}' is already used by field '${previous}'`,
					name,
					fieldName
				);
			}
			fieldBySource.set(descriptor.source, fieldName);
			descriptors.push(descriptor);
		}

		const gate = descriptors.find((descriptor) => GATE_NAMES.includes(descriptor.name));
		if (gate && (gate.kind !== 'boolean' || gate.setInfo || gate.strategy !== 'native')) {
			throw new SchemaDefinitionError('gate field must be a plain boolean', name, gate.name);
		}

		this.fields = descriptors;
		this.sourceNames = descriptors.map((descriptor) => descriptor.source);
		this.gate = gate;
		this.completeDefaults = Object.values(fields).every(
			(builder) => builder._def.hasDefault || zeroValue(builder._def).exists
		);
		this.fromString = options.fromString;
		this.validator = options.validate;
		this.defaults = this.construct(
			Object.fromEntries(descriptors.map((descriptor) => [descriptor.name, descriptor.defaultValue]))
		);
	}

	public construct(values: Readonly<Record<string, unknown>>): T {
		return { ...values } as T;
	}

	public check(value: T): ValidationResult | undefined {
		return this.validator === undefined ? undefined : validateSync(this.validator, value);
	}
}

export const Schema = {
	/**
	 * Compile a record schema.
	 *
	 * @throws SchemaDefinitionError when two fields share a document key, a key
	 * attribute does not fit its field, the gate field is misdeclared, or a
	 * field that needs a default has neither a default nor a zero value
	 */
	define<F extends FieldsInput>(
		name: string,
		fields: F,
		options?: SchemaOptions<InferFields<F>>
	): RecordSchema<InferFields<F>> {
		return new RecordSchema<InferFields<F>>(name, fields, options);
	}
};

interface DescribeContext {
	readonly schemaName: string;
	readonly fieldName: string;
	/** The record declares an enabled/disabled gate, so every field needs a default */
	readonly gated: boolean;
	/** Describing an array element rather than a record field */
	readonly element: boolean;
}

function describeField(def: FieldDef, context: DescribeContext): FieldDescriptor {
	const invalid = (reason: string) => new SchemaDefinitionError(reason, context.schemaName, context.fieldName);

	if (def.setInfo) {
		const inner = describeField({ ...def, setInfo: false, optional: true }, context);
		return {
			...inner,
			setInfo: true,
			optional: true,
			defaultValue: new SetInfo(inner.defaultValue, false),
			inner,
			mightBeOptional: false
		};
	}

	const source = def.source ?? context.fieldName;
	const zero = zeroValue(def);
	const defaultValue = def.hasDefault ? def.defaultValue : zero.value;
	const optional =
		def.optional ||
		def.kind === 'boolean' ||
		(def.hasDefault && (!zero.exists || !isDeepStrictEqual(def.defaultValue, zero.value)));

	if (!context.element && (optional || context.gated) && !def.hasDefault && !zero.exists) {
		throw invalid(`${def.kind} field has no zero value and needs an explicit default`);
	}

	const values = def.values;
	if (def.kind === 'enum' && def.hasDefault && !values?.some((value) => value === def.defaultValue)) {
		throw invalid(`default ${String(def.defaultValue)} is not one of: ${values?.join(', ')}`);
	}

	let element: FieldDescriptor | undefined;
	if (def.element) {
		if (def.element.setInfo) {
			throw invalid('array elements cannot be SetInfo-wrapped');
		}
		element = describeField(def.element, { ...context, fieldName: `${context.fieldName}[]`, gated: false, element: true });
	}

	if (def.key !== undefined) {
		const record = element?.kind === 'record' && element.strategy === 'fieldwise' ? element.record : undefined;
		if (record === undefined) {
			throw invalid(`key attribute '${def.key}' requires an array of records`);
		}
		if (!record.sourceNames.includes(def.key)) {
			throw invalid(`key attribute '${def.key}' is not a field of ${record.name}`);
		}
	}

	const { strategy, parseText } = resolveStrategy(def);

	return {
		name: context.fieldName,
		source,
		kind: def.kind,
		strategy,
		optional,
		setInfo: false,
		defaultValue,
		converter: def.converter,
		parseText,
		key: def.key,
		element,
		record: def.record,
		values,
		durationUnit: def.kind === 'duration' && !context.element ? durationUnitOfKey(source) : undefined,
		mightBeOptional: def.kind === 'record' && strategy === 'fieldwise' && !optional
	};
}

/**
 * Converter > fromString > string constructor > fieldwise > native.
 */
function resolveStrategy(def: FieldDef): { strategy: ResolutionStrategy; parseText?: (text: string) => unknown } {
	if (def.converter) {
		return { strategy: 'converter' };
	}

	const textType = def.textType;
	if (def.kind === 'custom' && textType) {
		if (hasFromString(textType)) {
			return { strategy: 'fromString', parseText: (text) => textType.fromString(text) };
		}
		return { strategy: 'stringConstructor', parseText: (text) => new textType(text) };
	}

	if (def.kind === 'record') {
		const fromString = def.record?.fromString;
		return fromString ? { strategy: 'fromString', parseText: fromString } : { strategy: 'fieldwise' };
	}

	return { strategy: 'native' };
}

function hasFromString<T>(textType: TextType<T>): textType is FromString<T> {
	return 'fromString' in textType && typeof textType.fromString === 'function';
}

function zeroValue(def: FieldDef): ZeroValue {
	switch (def.kind) {
		case 'string':
			return { exists: true, value: '' };
		case 'integer':
		case 'number':
			return { exists: true, value: 0 };
		case 'boolean':
			return { exists: true, value: false };
		case 'enum':
			return { exists: true, value: def.values?.[0] };
		case 'array':
			return { exists: true, value: [] };
		case 'duration':
			return { exists: true, value: Duration.zero };
		case 'record':
			return def.record?.completeDefaults ? { exists: true, value: def.record.defaults } : NO_ZERO;
		case 'custom':
			return NO_ZERO;
	}
}
