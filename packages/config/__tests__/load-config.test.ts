import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';
import { Logger, levels, memoryTransport, type MemoryTransport } from '@docbind/logging';
import {
	bindFile,
	bindString,
	field,
	loadConfig,
	loadConfigSimple,
	MissingKeyError,
	parseCommandLine,
	Schema
} from '../src/index';

const Server = Schema.define('Server', {
	host: field().string(),
	port: field().integer().default(8080)
});

describe('loaders', () => {
	let dir: string;
	let memory: MemoryTransport;
	let logger: Logger;

	function writeConfig(name: string, text: string): string {
		const path = join(dir, name);
		writeFileSync(path, text);
		return path;
	}

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), 'docbind-'));
		memory = memoryTransport();
		logger = new Logger('Config', { transports: [memory] });
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
		Logger.reset();
	});

	describe('bindFile', () => {
		test('should bind a YAML file', () => {
			const path = writeConfig('server.yaml', 'host: example.test\n');

			expect(bindFile(Server, path)).toEqual({
				success: true,
				value: { host: 'example.test', port: 8080 },
				warnings: []
			});
		});

		test('should report errors with the file as source', () => {
			const path = writeConfig('server.yaml', 'port: 1\n');
			const result = bindFile(Server, path);

			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.message).toBe(
				`${path}(0:0): host: Required key was not found in configuration or command line arguments`
			);
		});

		test('should return an unreadable file as a parse error', () => {
			const path = join(dir, 'missing.yaml');
			const result = bindFile(Server, path);

			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.kind).toBe('document-parse');
			expect(result.error.position).toEqual({ source: path, line: 0, column: 0 });
			expect(result.error.detail.startsWith('Cannot read file: ')).toBe(true);
		});
	});

	describe('bindString', () => {
		test('should return malformed YAML as a parse error instead of throwing', () => {
			const result = bindString(Server, 'host: [a\n', 'broken.yaml');

			expect(result.success).toBe(false);
			if (result.success) return;
			expect(result.error.kind).toBe('document-parse');
		});
	});

	describe('loadConfig', () => {
		test('should apply command-line overrides', () => {
			const path = writeConfig('server.yaml', 'host: example.test\n');
			const args = parseCommandLine(['-c', path, '-O', 'port=9000']);

			expect(loadConfig(Server, args)).toEqual({ host: 'example.test', port: 9000 });
		});

		test('should throw the first error', () => {
			const path = writeConfig('server.yaml', 'port: 1\n');

			expect(() => loadConfig(Server, { configPath: path })).toThrow(MissingKeyError);
		});

		test('should honour non-strict mode', () => {
			const path = writeConfig('server.yaml', 'host: a\nprot: 1\n');

			expect(loadConfig(Server, { configPath: path }, { strict: false, logger })).toEqual({ host: 'a', port: 8080 });
			expect(memory.records.map((record) => record.level)).toEqual([levels.warn]);
		});
	});

	describe('loadConfigSimple', () => {
		test('should return the bound value', () => {
			const path = writeConfig('server.yaml', 'host: example.test\n');

			expect(loadConfigSimple(Server, path, { logger })).toEqual({ host: 'example.test', port: 8080 });
			expect(memory.records).toHaveLength(0);
		});

		test('should log the formatted error and return undefined', () => {
			const path = writeConfig('server.yaml', 'port: 1\n');

			expect(loadConfigSimple(Server, path, { logger, colors: false })).toBeUndefined();
			expect(memory.records).toHaveLength(1);
			expect(memory.records[0]!.level).toBe(levels.error);
			expect(memory.records[0]!.msg).toBe(
				`${path}(0:0): host: Required key was not found in configuration or command line arguments`
			);
			expect(memory.records[0]!.kind).toBe('missing-key');
		});
	});
});
