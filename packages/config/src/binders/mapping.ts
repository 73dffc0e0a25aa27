/**
 * Mapping binder
 *
 * Binds a mapping node to a record, in this order:
 * 1. unknown keys (error in strict mode, warning otherwise)
 * 2. enabled/disabled gate: override, then document, then default
 * 3. each field in schema order: disabled default, key-transform value,
 *    command-line override, document value, then default or missing-key error
 * 4. construction, then the record's validation hook when enabled
 */

import { coerceBoolean } from '../coercion';
import {
	ConstructionError,
	DuplicateKeyError,
	MissingKeyError,
	TypeMismatchError,
	UnknownKeyError,
	ValidationFailedError
} from '../config-error';
import type { BindingContext } from '../context';
import { emptyMapping, scalarNode, sequenceNode } from '../document';
import { fail, ok, type Bound, type DocumentNode, type FieldDescriptor, type SchemaModel } from '../types';
import { bindField } from './leaf';

export interface MappingOptions {
	/**
	 * Declared default of the parent field holding this record. It seeds the
	 * gate and the fields of a disabled record; absent fields of an enabled
	 * record keep their own declared defaults.
	 */
	readonly defaults?: unknown;
	/** Values injected by key, used by the key-attribute transform */
	readonly injected?: ReadonlyMap<string, DocumentNode>;
}

export function bindMapping<T>(
	node: DocumentNode,
	schema: SchemaModel<T>,
	context: BindingContext,
	options: MappingOptions = {}
): Bound<T> {
	context.trace(`Binding ${schema.name}`, { entries: node.entries().length });

	for (const entry of node.entries()) {
		if (!schema.sourceNames.includes(entry.key)) {
			const error = new UnknownKeyError(context.path, entry.key, schema.sourceNames, entry.keyPosition);
			if (context.strict) {
				return fail(error);
			}
			context.warn(error);
		}
	}

	const gate = resolveGate(node, schema, context, options);
	if (!gate.success) return gate;
	const enabled = gate.value;

	const values: Record<string, unknown> = {};
	for (const field of schema.fields) {
		const resolved = enabled ? resolveField(node, field, context, options) : ok(disabledValue(field, schema, options));
		if (!resolved.success) return resolved;
		values[field.name] = resolved.value;
	}

	const value = schema.construct(values);

	if (enabled) {
		const check = schema.check(value);
		if (check !== undefined && !check.success) {
			return fail(new ValidationFailedError(context.path, node.position, check.issues));
		}
	} else {
		context.trace(`Skipping validation of disabled ${schema.name}`);
	}

	return ok(value);
}

/**
 * Whether the record's fields are bound from the document.
 * Records without an enabled/disabled field are always enabled.
 */
function resolveGate(
	node: DocumentNode,
	schema: SchemaModel,
	context: BindingContext,
	options: MappingOptions
): Bound<boolean> {
	const gate = schema.gate;
	if (gate === undefined) return ok(true);

	const gateContext = context.descend(gate.source);
	const overrides = gateContext.override();
	const gateNode = overrides ? scalarNode(overrides[overrides.length - 1] ?? '') : node.get(gate.source);

	let value: boolean;
	if (gateNode === undefined) {
		value = defaultOf(gate, options) === true;
	} else if (gateNode.kind !== 'scalar') {
		return fail(new TypeMismatchError(gateContext.path, 'scalar (value)', gateNode.kind, gateNode.position));
	} else {
		try {
			value = coerceBoolean(gateNode.text());
		} catch (error) {
			return fail(new ConstructionError(gateContext.path, gateNode.position, error));
		}
	}

	const enabled = gate.name === 'enabled' ? value : !value;
	context.trace(`${schema.name} is ${enabled ? 'enabled' : 'disabled'}`);
	return ok(enabled);
}

function resolveField(
	node: DocumentNode,
	field: FieldDescriptor,
	context: BindingContext,
	options: MappingOptions
): Bound<unknown> {
	const fieldContext = context.descend(field.source);
	const documentNode = node.get(field.source);

	const injectedNode = options.injected?.get(field.source);
	if (injectedNode !== undefined) {
		if (context.strict && documentNode !== undefined) {
			return fail(new DuplicateKeyError(context.path, field.source, node.position));
		}
		fieldContext.trace('Using injected key value');
		return bindField(injectedNode, field, fieldContext);
	}

	const overrideNode = overrideNodeFor(field, fieldContext);
	if (overrideNode !== undefined) {
		if (context.strict && documentNode !== undefined) {
			return fail(
				new DuplicateKeyError(
					context.path,
					field.source,
					documentNode.position,
					'Field is specified both in the document and on the command line'
				)
			);
		}
		fieldContext.trace('Using command-line override');
		return bindField(overrideNode, field, fieldContext);
	}

	if (documentNode !== undefined) {
		return bindField(documentNode, field, fieldContext);
	}

	const record = field.strategy === 'fieldwise' ? field.record : undefined;
	if (record !== undefined && (field.mightBeOptional || fieldContext.hasNestedOverride())) {
		fieldContext.trace('Section is absent, binding it from defaults');
		return bindMapping(emptyMapping(node.position), record, fieldContext, { defaults: field.defaultValue });
	}

	if (field.optional) {
		fieldContext.trace('Using default value of optional field');
		return ok(field.defaultValue);
	}

	return fail(new MissingKeyError(fieldContext.path, node.position));
}

/**
 * Arrays take every override value in order, other fields the last one.
 */
function overrideNodeFor(field: FieldDescriptor, context: BindingContext): DocumentNode | undefined {
	const values = context.override();
	if (values === undefined) return undefined;

	const target = field.inner ?? field;
	if (target.kind === 'array' && target.strategy === 'native') {
		return sequenceNode(values.map((value) => scalarNode(value)));
	}
	return scalarNode(values[values.length - 1] ?? '');
}

/**
 * Fields of a disabled record take their defaults, except the gate itself,
 * which keeps reporting the disabled state.
 */
function disabledValue(field: FieldDescriptor, schema: SchemaModel, options: MappingOptions): unknown {
	if (field === schema.gate) {
		return field.name === 'disabled';
	}
	return defaultOf(field, options);
}

function defaultOf(field: FieldDescriptor, options: MappingOptions): unknown {
	const defaults = options.defaults;
	if (isRecord(defaults) && Object.hasOwn(defaults, field.name)) {
		return defaults[field.name];
	}
	return field.defaultValue;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null;
}
