import { describe, test, expect } from 'vitest';
import { bind, bindString, ConstructionError, field, fromValue, Schema, type BindResult, type ConfigError } from '../src/index';

function value<T>(result: BindResult<T>): T {
	if (!result.success) throw result.error;
	return result.value;
}

function failure<T>(result: BindResult<T>): ConfigError {
	if (result.success) throw new Error('expected binding to fail');
	return result.error;
}

class Hostname {
	public constructor(public readonly value: string) {
		if (value.includes(' ')) throw new Error(`invalid hostname '${value}'`);
	}
}

class Version {
	private constructor(
		public readonly major: number,
		public readonly minor: number
	) {}

	public static fromString(text: string): Version {
		const [major, minor] = text.split('.').map(Number);
		if (major === undefined || minor === undefined) throw new Error('expected major.minor');
		return new Version(major, minor);
	}
}

describe('leaf binding', () => {
	describe('scalars', () => {
		const Scalars = Schema.define('Scalars', {
			name: field().string().optional(),
			ratio: field().number().optional(),
			verbose: field().boolean(),
			level: field().enumeration(['info', 'warn']).default('info')
		});

		test('should coerce numbers and booleans', () => {
			expect(value(bindString(Scalars, 'ratio: 0.5\nverbose: TRUE\n'))).toEqual({
				name: '',
				ratio: 0.5,
				verbose: true,
				level: 'info'
			});
		});

		test('should accept enumeration members', () => {
			expect(value(bindString(Scalars, 'level: warn\n')).level).toBe('warn');
		});

		test('should report values outside the enumeration as construction errors', () => {
			const error = failure(bindString(Scalars, 'level: Warn\n', 'app.yaml'));

			expect(error).toBeInstanceOf(ConstructionError);
			expect(error.message).toBe('app.yaml(0:7): level: not a member - expected one of info, warn, got: "Warn"');
		});

		test('should read a null value as an empty string', () => {
			expect(value(bindString(Scalars, 'name:\n')).name).toBe('');
		});

		test('should reject nodes that are not data', () => {
			const error = failure(bind(Scalars, fromValue({ name: new Date(0) })));

			expect(error.message).toBe('<value>(0:0): name: Expected to be of type valid, but is a invalid');
		});
	});

	describe('custom types', () => {
		const Custom = Schema.define('Custom', {
			host: field().type(Hostname).default(new Hostname('localhost')),
			version: field().type(Version).default(Version.fromString('1.0')),
			tags: field()
				.converted((node) => (node.kind === 'sequence' ? node.items().map((item) => item.text()) : node.text().split(',')))
				.default([])
		});

		test('should construct from the scalar text', () => {
			expect(value(bindString(Custom, 'host: example.test\n')).host).toEqual(new Hostname('example.test'));
		});

		test('should parse through a static fromString', () => {
			const version = value(bindString(Custom, 'version: 2.7\n')).version;

			expect(version.major).toBe(2);
			expect(version.minor).toBe(7);
		});

		test('should hand the raw node to converters', () => {
			expect(value(bindString(Custom, 'tags: [a, b]\n')).tags).toEqual(['a', 'b']);
			expect(value(bindString(Custom, 'tags: a,b\n')).tags).toEqual(['a', 'b']);
		});

		test('should wrap what a constructor throws', () => {
			const error = failure(bindString(Custom, 'host: "bad host"\n', 'app.yaml'));

			expect(error.kind).toBe('construction');
			expect(error.message).toBe("app.yaml(0:6): host: invalid hostname 'bad host'");
			expect(error instanceof ConstructionError && error.cause instanceof Error).toBe(true);
		});

		test('should require a scalar for text-parsed types', () => {
			const error = failure(bindString(Custom, 'version:\n  major: 1\n', 'app.yaml'));

			expect(error.message).toBe('app.yaml(1:2): version: Expected to be of type scalar (value), but is a mapping');
		});
	});

	describe('record-level fromString', () => {
		const Endpoint = Schema.define(
			'Endpoint',
			{ host: field().string(), port: field().integer() },
			{
				fromString: (text) => {
					const [host = '', port = ''] = text.split(':');
					return { host, port: Number(port) };
				}
			}
		);
		const Client = Schema.define('Client', { endpoint: field().record(Endpoint) });

		test('should build the record from a scalar', () => {
			expect(value(bindString(Client, 'endpoint: db.test:5432\n'))).toEqual({
				endpoint: { host: 'db.test', port: 5432 }
			});
		});
	});
});
