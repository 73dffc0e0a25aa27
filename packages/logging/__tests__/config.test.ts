import { describe, test, expect } from 'vitest';
import { readLogConfig, buildLoggerOptions, type LogConfig } from '../src/config';

describe('readLogConfig', () => {
	test('should return defaults for an empty environment', () => {
		expect(readLogConfig({})).toEqual({ level: 'info', jsonFormat: false, colors: undefined });
	});

	test('should read level, json and colors', () => {
		const config = readLogConfig({ LOG_LEVEL: 'Debug', LOG_JSON: 'true', LOG_COLORS: '0' });
		expect(config).toEqual({ level: 'debug', jsonFormat: true, colors: false });
	});

	test('should fall back to info for an invalid level', () => {
		expect(readLogConfig({ LOG_LEVEL: 'loud' }).level).toBe('info');
	});

	test('should treat blank flags as unset', () => {
		expect(readLogConfig({ LOG_JSON: ' ', LOG_COLORS: '' })).toEqual({
			level: 'info',
			jsonFormat: false,
			colors: undefined
		});
	});
});

describe('buildLoggerOptions', () => {
	test('should carry the level and a single console transport', () => {
		const config: LogConfig = { level: 'warn', jsonFormat: true, colors: false };
		const options = buildLoggerOptions(config);

		expect(options.level).toBe('warn');
		expect(options.transports).toHaveLength(1);
		expect(typeof options.transports?.[0]?.write).toBe('function');
	});
});
