import { coerceBoolean, coerceEnum, coerceInteger, coerceNumber, coerceString } from '../coercion';
import { ConfigError, ConstructionError, TypeMismatchError } from '../config-error';
import type { BindingContext } from '../context';
import { SetInfo } from '../set-info';
import { fail, ok, type Bound, type DocumentNode, type FieldDescriptor } from '../types';
import { bindDuration } from './duration';
import { bindMapping } from './mapping';
import { bindArray } from './sequence';

/**
 * Bind a node known to be present to a field, following the field's
 * resolution strategy.
 */
export function bindField(node: DocumentNode, field: FieldDescriptor, context: BindingContext): Bound<unknown> {
	if (node.kind === 'invalid') {
		return fail(new TypeMismatchError(context.path, 'valid', node.kind, node.position));
	}

	if (field.inner !== undefined) {
		const inner = bindField(node, field.inner, context);
		return inner.success ? ok(new SetInfo(inner.value, true)) : inner;
	}

	switch (field.strategy) {
		case 'converter': {
			const converter = field.converter;
			if (converter === undefined) break;
			return attempt(() => converter(node), node, context);
		}

		case 'fromString':
		case 'stringConstructor': {
			const parseText = field.parseText;
			if (parseText === undefined) break;
			if (node.kind !== 'scalar') {
				return fail(new TypeMismatchError(context.path, 'scalar (value)', node.kind, node.position));
			}
			return attempt(() => parseText(node.text()), node, context);
		}

		case 'fieldwise': {
			const record = field.record;
			if (record === undefined) break;
			if (node.kind !== 'mapping') {
				return fail(new TypeMismatchError(context.path, 'mapping (object)', node.kind, node.position));
			}
			return bindMapping(node, record, context, { defaults: field.defaultValue });
		}

		case 'native':
			return bindNative(node, field, context);
	}

	throw new Error(`Field '${field.name}' uses strategy '${field.strategy}' but carries no resolver for it`);
}

function bindNative(node: DocumentNode, field: FieldDescriptor, context: BindingContext): Bound<unknown> {
	switch (field.kind) {
		case 'duration':
			return bindDuration(node, field, context);
		case 'array':
			return bindArray(node, field, context);
		case 'string':
		case 'integer':
		case 'number':
		case 'boolean':
		case 'enum': {
			if (node.kind !== 'scalar') {
				return fail(new TypeMismatchError(context.path, 'scalar (value)', node.kind, node.position));
			}
			const coerce = coercerFor(field);
			return attempt(() => coerce(node.text()), node, context);
		}
		case 'record':
		case 'custom':
			throw new Error(`Field '${field.name}' of kind '${field.kind}' has no native binding`);
	}
}

function coercerFor(field: FieldDescriptor): (text: string) => unknown {
	switch (field.kind) {
		case 'integer':
			return coerceInteger;
		case 'number':
			return coerceNumber;
		case 'boolean':
			return coerceBoolean;
		case 'enum': {
			const values = field.values ?? [];
			return (text) => coerceEnum(text, values);
		}
		default:
			return coerceString;
	}
}

/**
 * Run user-supplied or coercion code, turning anything it throws into a
 * ConstructionError at the node's position.
 */
export function attempt<T>(produce: () => T, node: DocumentNode, context: BindingContext): Bound<T> {
	try {
		return ok(produce());
	} catch (error) {
		if (error instanceof ConfigError) {
			return fail(error);
		}
		return fail(new ConstructionError(context.path, node.position, error));
	}
}
