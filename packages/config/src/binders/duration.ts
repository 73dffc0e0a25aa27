import { coerceInteger } from '../coercion';
import { DurationShapeError, TypeMismatchError } from '../config-error';
import type { BindingContext } from '../context';
import { Duration, DURATION_UNITS } from '../duration';
import { field } from '../field';
import { Schema } from '../schema';
import { fail, ok, type Bound, type DocumentNode, type FieldDescriptor } from '../types';
import { attempt } from './leaf';
import { bindMapping } from './mapping';

/**
 * Mapping form of a duration: every unit is an optional integer.
 * Bound through the ordinary mapping binder, so strict mode rejects unknown units.
 */
const DurationParts = Schema.define('Duration', {
	weeks: field().integer().setInfo(),
	days: field().integer().setInfo(),
	hours: field().integer().setInfo(),
	minutes: field().integer().setInfo(),
	seconds: field().integer().setInfo(),
	msecs: field().integer().setInfo(),
	usecs: field().integer().setInfo(),
	hnsecs: field().integer().setInfo(),
	nsecs: field().integer().setInfo()
});

/**
 * Suffix form (`timeout_seconds: 30`) when the field's document key ends in
 * a unit, mapping form (`timeout: { minutes: 1, seconds: 30 }`) otherwise.
 */
export function bindDuration(node: DocumentNode, field: FieldDescriptor, context: BindingContext): Bound<Duration> {
	const unit = field.durationUnit;
	if (unit !== undefined) {
		if (node.kind !== 'scalar') {
			return fail(new TypeMismatchError(context.path, 'integer value (scalar)', node.kind, node.position));
		}
		return attempt(() => Duration.of(unit, coerceInteger(node.text())), node, context);
	}

	if (node.kind !== 'mapping') {
		return fail(new DurationShapeError(context.path, node.position, node.kind));
	}

	const bound = bindMapping(node, DurationParts, context);
	if (!bound.success) return bound;
	const parts = bound.value;

	if (!DURATION_UNITS.some((part) => parts[part].isSet)) {
		if (field.optional && field.defaultValue instanceof Duration) {
			return ok(field.defaultValue);
		}
		return fail(new DurationShapeError(context.path, node.position));
	}

	return ok(DURATION_UNITS.reduce((total, part) => total.plus(Duration.of(part, parts[part].value)), Duration.zero));
}
