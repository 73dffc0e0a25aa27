import type { DocumentNode, MappingEntry, NodeKind, Position } from './types';

/**
 * Expose an in-memory value (parsed JSON, programmatic configuration) as a
 * document. Plain objects are mappings, arrays are sequences, and strings,
 * numbers, booleans, bigints and `null` are scalars. Every node reports the
 * same position: line 0, column 0 of `source`.
 *
 * @example
 * ```typescript
 * const result = bind(Server, fromValue(JSON.parse(text), 'server.json'));
 * ```
 */
export function fromValue(value: unknown, source = '<value>'): DocumentNode {
	return new ValueNode(value, { source, line: 0, column: 0 });
}

class ValueNode implements DocumentNode {
	public readonly kind: NodeKind;

	public constructor(
		private readonly value: unknown,
		public readonly position: Position
	) {
		this.kind = kindOf(value);
	}

	public get(key: string): DocumentNode | undefined {
		const value = this.value;
		if (!isPlainObject(value) || !Object.hasOwn(value, key)) return undefined;
		return new ValueNode(value[key], this.position);
	}

	public entries(): readonly MappingEntry[] {
		const value = this.value;
		if (!isPlainObject(value)) return [];
		return Object.entries(value).map(([key, child]) => ({
			key,
			keyPosition: this.position,
			value: new ValueNode(child, this.position)
		}));
	}

	public items(): readonly DocumentNode[] {
		const value = this.value;
		return Array.isArray(value) ? value.map((item: unknown) => new ValueNode(item, this.position)) : [];
	}

	public text(): string {
		const value = this.value;
		if (value === null) return '';
		if (typeof value === 'string') return value;
		if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
			return String(value);
		}
		return '';
	}
}

function kindOf(value: unknown): NodeKind {
	if (Array.isArray(value)) return 'sequence';
	if (isPlainObject(value)) return 'mapping';
	if (value === null) return 'scalar';
	switch (typeof value) {
		case 'string':
		case 'number':
		case 'boolean':
		case 'bigint':
			return 'scalar';
		default:
			return 'invalid';
	}
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	if (typeof value !== 'object' || value === null) return false;
	const prototype: unknown = Object.getPrototypeOf(value);
	return prototype === Object.prototype || prototype === null;
}
