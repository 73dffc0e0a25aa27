import { describe, test, expect } from 'vitest';
import { Duration, durationUnitOfKey } from '../src/index';

describe('Duration', () => {
	test('should add spans', () => {
		const timeout = Duration.of('hours', 1).plus(Duration.of('minutes', 10));

		expect(timeout.total('minutes')).toBe(70);
		expect(timeout.equals(Duration.of('minutes', 70))).toBe(true);
	});

	test('should sum parts', () => {
		expect(Duration.from({ seconds: 1, msecs: 500 }).milliseconds).toBe(1500);
	});

	test('should count hnsecs as hundreds of nanoseconds', () => {
		expect(Duration.of('hnsecs', 3).nanoseconds).toBe(300n);
	});

	test('should truncate totals toward zero', () => {
		expect(Duration.of('seconds', 90).total('minutes')).toBe(1);
	});

	test('should describe itself in words', () => {
		expect(Duration.zero.toString()).toBe('0 ns');
		expect(Duration.of('seconds', 1).toString()).toBe('1 second');
		expect(Duration.of('minutes', 70).toString()).toBe('1 hour and 10 minutes');
		expect(Duration.from({ days: 1, hours: 2, seconds: 1 }).toString()).toBe('1 day, 2 hours, and 1 second');
		expect(Duration.of('seconds', -5).toString()).toBe('-5 seconds');
	});

	test('should reject fractional amounts', () => {
		expect(() => Duration.of('seconds', 1.5)).toThrow(RangeError);
	});
});

describe('durationUnitOfKey', () => {
	test('should read the unit suffix', () => {
		expect(durationUnitOfKey('timeout_seconds')).toBe('seconds');
		expect(durationUnitOfKey('retry_delay_msecs')).toBe('msecs');
		expect(durationUnitOfKey('tick_hnsecs')).toBe('hnsecs');
	});

	test('should return undefined without a suffix', () => {
		expect(durationUnitOfKey('timeout')).toBeUndefined();
		expect(durationUnitOfKey('seconds')).toBeUndefined();
	});
});
