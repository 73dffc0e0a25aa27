import { describe, test, expect } from 'vitest';
import { bindString, Duration, field, Schema, type BindOptions, type BindResult, type ConfigError, type SchemaModel } from '../src/index';

function value<T>(result: BindResult<T>): T {
	if (!result.success) throw result.error;
	return result.value;
}

function failure<T>(result: BindResult<T>): ConfigError {
	if (result.success) throw new Error('expected binding to fail');
	return result.error;
}

const Suffixed = Schema.define('Suffixed', { timeout: field('timeout_minutes').duration() });

const Mapped = Schema.define('Mapped', { timeout: field().duration() });

const WithDefault = Schema.define('WithDefault', {
	grace: field().duration().default(Duration.of('seconds', 5))
});

function yaml<T>(schema: SchemaModel<T>, text: string, options?: BindOptions): BindResult<T> {
	return bindString(schema, text, 'app.yaml', options);
}

describe('duration binding', () => {
	test('should read a count of the suffix unit', () => {
		expect(value(yaml(Suffixed, 'timeout_minutes: 70\n')).timeout).toEqual(Duration.of('minutes', 70));
	});

	test('should sum the units of the mapping form', () => {
		const timeout = value(yaml(Mapped, 'timeout:\n  hours: 1\n  minutes: 10\n')).timeout;

		expect(timeout.equals(value(yaml(Suffixed, 'timeout_minutes: 70\n')).timeout)).toBe(true);
		expect(timeout.toString()).toBe('1 hour and 10 minutes');
	});

	test('should require a scalar for the suffix form', () => {
		const error = failure(yaml(Suffixed, 'timeout_minutes:\n  hours: 1\n'));

		expect(error.message).toBe(
			'app.yaml(1:2): timeout_minutes: Expected to be of type integer value (scalar), but is a mapping'
		);
	});

	test('should require an integer count for the suffix form', () => {
		const error = failure(yaml(Suffixed, 'timeout_minutes: 1.5\n'));

		expect(error.kind).toBe('construction');
		expect(error.message).toBe('app.yaml(0:17): timeout_minutes: coercion failed - expected integer, got: "1.5"');
	});

	test('should reject a scalar for the mapping form', () => {
		const error = failure(yaml(Mapped, 'timeout: 5\n'));

		expect(error.kind).toBe('duration-shape');
		expect(error.message).toBe(
			'app.yaml(0:9): timeout: Field is of type scalar, but expected a mapping with at least one of: ' +
				'weeks, days, hours, minutes, seconds, msecs, usecs, hnsecs, nsecs'
		);
	});

	test('should reject unknown units in strict mode', () => {
		const error = failure(yaml(Mapped, 'timeout:\n  hour: 1\n'));

		expect(error.kind).toBe('unknown-key');
		expect(error.fieldPath).toBe('timeout.hour');
	});

	test('should require one unit to be set', () => {
		const error = failure(yaml(Mapped, 'timeout: {}\n'));

		expect(error.message).toBe("app.yaml(0:9): timeout: Expected one of the field's values to be set");
	});

	test('should fall back to the default when an optional duration sets no unit', () => {
		expect(value(yaml(WithDefault, 'grace: {}\n')).grace).toEqual(Duration.of('seconds', 5));
	});

	test('should use the default when an optional duration is absent', () => {
		expect(value(yaml(WithDefault, '{}\n')).grace.milliseconds).toBe(5000);
	});

	test('should report a required duration that is absent', () => {
		expect(failure(yaml(Mapped, '{}\n')).kind).toBe('missing-key');
	});

	test('should apply overrides to single units', () => {
		const result = yaml(Mapped, 'timeout:\n  seconds: 30\n', { overrides: { 'timeout.minutes': ['3'] } });

		expect(value(result).timeout.total('seconds')).toBe(210);
	});
});
