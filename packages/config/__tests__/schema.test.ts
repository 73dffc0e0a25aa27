import { describe, test, expect } from 'vitest';
import { Duration, field, Schema, SchemaDefinitionError, SetInfo, type FieldDescriptor, type SchemaModel } from '../src/index';

function descriptor(schema: SchemaModel, name: string): FieldDescriptor {
	const found = schema.fields.find((candidate) => candidate.name === name);
	if (found === undefined) throw new Error(`no field ${name}`);
	return found;
}

class Hostname {
	public constructor(public readonly value: string) {}
}

class Version {
	private constructor(public readonly major: number) {}

	public static fromString(text: string): Version {
		return new Version(Number(text.split('.')[0]));
	}
}

const Interface = Schema.define('Interface', {
	name: field().string(),
	ip: field().string()
});

describe('Schema.define', () => {
	test('should keep fields in declaration order', () => {
		const Server = Schema.define('Server', {
			host: field().string(),
			port: field('listen_port').integer()
		});

		expect(Server.fields.map((f) => f.name)).toEqual(['host', 'port']);
		expect(Server.sourceNames).toEqual(['host', 'listen_port']);
	});

	describe('optionality', () => {
		const Options = Schema.define('Options', {
			required: field().string(),
			explicit: field().string().optional(),
			flag: field().boolean(),
			nonZeroDefault: field().integer().default(5),
			zeroDefault: field().integer().default(0),
			tagged: field().string().setInfo(),
			mode: field().enumeration(['fast', 'safe']).default('safe'),
			firstMode: field().enumeration(['fast', 'safe']).default('fast'),
			peers: field().array(field().string()).default(['a.test'])
		});

		test('should treat fields without a default as required', () => {
			expect(descriptor(Options, 'required').optional).toBe(false);
		});

		test('should honour optional()', () => {
			expect(descriptor(Options, 'explicit').optional).toBe(true);
		});

		test('should treat booleans as optional', () => {
			expect(descriptor(Options, 'flag').optional).toBe(true);
		});

		test('should treat a default differing from the zero value as optional', () => {
			expect(descriptor(Options, 'nonZeroDefault').optional).toBe(true);
			expect(descriptor(Options, 'mode').optional).toBe(true);
			expect(descriptor(Options, 'peers').optional).toBe(true);
		});

		test('should not treat a default equal to the zero value as optional', () => {
			expect(descriptor(Options, 'zeroDefault').optional).toBe(false);
			expect(descriptor(Options, 'firstMode').optional).toBe(false);
		});

		test('should treat SetInfo fields as optional with an unset default', () => {
			const tagged = descriptor(Options, 'tagged');

			expect(tagged.optional).toBe(true);
			expect(tagged.setInfo).toBe(true);
			expect(tagged.defaultValue).toEqual(new SetInfo('', false));
			expect(tagged.inner?.kind).toBe('string');
		});
	});

	describe('defaults', () => {
		test('should build record defaults from declared defaults and zero values', () => {
			const Server = Schema.define('Server', {
				host: field().string(),
				port: field().integer().default(8080),
				timeout: field().duration()
			});

			expect(Server.defaults).toEqual({ host: '', port: 8080, timeout: Duration.zero });
			expect(Server.completeDefaults).toBe(true);
		});

		test('should use the nested record defaults as the zero value of a record field', () => {
			const Limits = Schema.define('Limits', { requests: field().integer().default(100) });
			const Node = Schema.define('Node', { limits: field().record(Limits) });

			expect(descriptor(Node, 'limits').defaultValue).toEqual({ requests: 100 });
			expect(descriptor(Node, 'limits').optional).toBe(false);
			expect(descriptor(Node, 'limits').mightBeOptional).toBe(true);
		});

		test('should report incomplete defaults when a custom field has no default', () => {
			const Host = Schema.define('Host', { name: field().type(Hostname) });

			expect(Host.completeDefaults).toBe(false);
		});
	});

	describe('resolution strategies', () => {
		const Strategies = Schema.define('Strategies', {
			converted: field().converted((node) => node.text().length),
			overridden: field().type(Version).convert(() => Version.fromString('9')),
			parsed: field().type(Version),
			constructed: field().type(Hostname),
			nested: field().record(Interface),
			scalar: field().integer(),
			list: field().array(field().string())
		});

		test('should pick exactly one strategy per field', () => {
			expect(Strategies.fields.map((f) => [f.name, f.strategy])).toEqual([
				['converted', 'converter'],
				['overridden', 'converter'],
				['parsed', 'fromString'],
				['constructed', 'stringConstructor'],
				['nested', 'fieldwise'],
				['scalar', 'native'],
				['list', 'native']
			]);
		});

		test('should use a record-level fromString before binding fieldwise', () => {
			const Endpoint = Schema.define(
				'Endpoint',
				{ host: field().string(), port: field().integer() },
				{
					fromString: (text) => {
						const [host = '', port = '0'] = text.split(':');
						return { host, port: Number(port) };
					}
				}
			);
			const Client = Schema.define('Client', { endpoint: field().record(Endpoint) });

			const endpoint = descriptor(Client, 'endpoint');
			expect(endpoint.strategy).toBe('fromString');
			expect(endpoint.parseText?.('db.test:5432')).toEqual({ host: 'db.test', port: 5432 });
		});
	});

	describe('durations', () => {
		test('should take the unit from a suffixed document key', () => {
			const Timeouts = Schema.define('Timeouts', {
				read: field('read_timeout_seconds').duration(),
				write: field().duration()
			});

			expect(descriptor(Timeouts, 'read').durationUnit).toBe('seconds');
			expect(descriptor(Timeouts, 'write').durationUnit).toBeUndefined();
		});
	});

	describe('definition errors', () => {
		test('should reject two fields sharing a document key', () => {
			expect(() =>
				Schema.define('Server', {
					host: field().string(),
					hostname: field('host').string()
				})
			).toThrow("[Server.hostname] source name 'host' is already used by field 'host'");
		});

		test('should reject a record with both enabled and disabled', () => {
			expect(() =>
				Schema.define('Feature', {
					enabled: field().boolean(),
					disabled: field().boolean()
				})
			).toThrow("[Feature] declares both 'enabled' and 'disabled'");
		});

		test('should reject a gate field that is not a plain boolean', () => {
			expect(() => Schema.define('Feature', { enabled: field().string() })).toThrow(
				'[Feature.enabled] gate field must be a plain boolean'
			);
		});

		test('should require a default for custom fields of a gated record', () => {
			expect(() =>
				Schema.define('Feature', {
					enabled: field().boolean(),
					host: field().type(Hostname)
				})
			).toThrow('[Feature.host] custom field has no zero value and needs an explicit default');
		});

		test('should require a default for optional custom fields', () => {
			expect(() => Schema.define('Client', { host: field().type(Hostname).optional() })).toThrow(
				SchemaDefinitionError
			);
		});

		test('should accept optional custom fields with a default', () => {
			const Client = Schema.define('Client', {
				host: field().type(Hostname).default(new Hostname('localhost'))
			});

			expect(descriptor(Client, 'host').optional).toBe(true);
		});

		test('should reject a key attribute on an array of scalars', () => {
			expect(() => Schema.define('Node', { names: field().array(field().string()).key('name') })).toThrow(
				"[Node.names] key attribute 'name' requires an array of records"
			);
		});

		test('should reject a key attribute the element record does not declare', () => {
			expect(() => Schema.define('Node', { interfaces: field().array(field().record(Interface)).key('id') })).toThrow(
				"[Node.interfaces] key attribute 'id' is not a field of Interface"
			);
		});

		test('should reject SetInfo-wrapped array elements', () => {
			expect(() => Schema.define('Node', { tags: field().array(field().string().setInfo()) })).toThrow(
				'[Node.tags] array elements cannot be SetInfo-wrapped'
			);
		});
	});
});
