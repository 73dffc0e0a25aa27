import { TypeMismatchError } from '../config-error';
import type { BindingContext } from '../context';
import { scalarNode } from '../document';
import { fail, ok, type Bound, type DocumentNode, type FieldDescriptor } from '../types';
import { bindField } from './leaf';
import { bindMapping } from './mapping';

/**
 * Bind an array field. Plain arrays read a sequence, element paths being
 * `field.0`, `field.1`, ... Arrays with a key attribute read a mapping of
 * mappings instead, see `bindKeyedArray`.
 */
export function bindArray(node: DocumentNode, field: FieldDescriptor, context: BindingContext): Bound<unknown[]> {
	const element = field.element;
	if (element === undefined) {
		throw new Error(`Array field '${field.name}' has no element descriptor`);
	}

	if (field.key !== undefined) {
		return bindKeyedArray(node, element, field.key, context);
	}

	if (node.kind !== 'sequence') {
		return fail(new TypeMismatchError(context.path, 'sequence (array)', node.kind, node.position));
	}

	const values: unknown[] = [];
	for (const [index, item] of node.items().entries()) {
		const bound = bindField(item, element, context.descend(String(index)));
		if (!bound.success) return bound;
		values.push(bound.value);
	}
	return ok(values);
}

/**
 * `{ eth0: { ip: ... }, wlan0: { ip: ... } }` with key `name` becomes
 * `[{ name: 'eth0', ip: ... }, { name: 'wlan0', ip: ... }]`, in document order.
 * The mapping key reaches the element through the injected values, so strict
 * mode rejects an element that also spells the key out.
 */
function bindKeyedArray(
	node: DocumentNode,
	element: FieldDescriptor,
	key: string,
	context: BindingContext
): Bound<unknown[]> {
	const record = element.record;
	if (record === undefined) {
		throw new Error(`Keyed array element '${element.name}' is not a record`);
	}

	if (node.kind !== 'mapping') {
		return fail(new TypeMismatchError(context.path, 'mapping (object)', node.kind, node.position));
	}

	const values: unknown[] = [];
	for (const entry of node.entries()) {
		const entryContext = context.descend(entry.key);
		if (entry.value.kind !== 'mapping') {
			return fail(
				new TypeMismatchError(
					entryContext.path,
					'sequence of mapping (array of objects)',
					`sequence of ${entry.value.kind}`,
					entry.value.position
				)
			);
		}

		const injected = new Map([[key, scalarNode(entry.key, entry.keyPosition)]]);
		const bound = bindMapping(entry.value, record, entryContext, { injected });
		if (!bound.success) return bound;
		values.push(bound.value);
	}
	return ok(values);
}
