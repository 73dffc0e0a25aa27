/**
 * YAML adapter
 *
 * Exposes a document parsed by the `yaml` package through the DocumentNode
 * interface. Aliases are resolved transparently; positions are 0-based and
 * come from a LineCounter fed during parsing.
 */

import { isAlias, isMap, isNode, isScalar, isSeq, LineCounter, parseDocument, type Alias } from 'yaml';
import { DocumentParseError } from './config-error';
import { emptyMapping } from './document';
import { fail, ok, type Bound, type DocumentNode, type MappingEntry, type NodeKind, type Position } from './types';

/**
 * Parse `text` as a single YAML document.
 * Syntax errors and duplicate keys are returned as a DocumentParseError.
 * An empty document reads as an empty mapping.
 */
export function parseYaml(text: string, source: string): Bound<DocumentNode> {
	const lineCounter = new LineCounter();
	const doc = parseDocument(text, { lineCounter, prettyErrors: false });
	const context = new YamlContext((alias) => alias.resolve(doc), text, lineCounter, source);

	const [error] = doc.errors;
	if (error) {
		return fail(new DocumentParseError(context.positionAt(error.pos[0]), error.message));
	}

	if (doc.contents === null) {
		return ok(emptyMapping(context.positionAt(0)));
	}
	return ok(context.wrap(doc.contents, context.positionAt(0)));
}

class YamlContext {
	public constructor(
		private readonly resolveAlias: (alias: Alias) => unknown,
		private readonly text: string,
		private readonly lineCounter: LineCounter,
		private readonly source: string
	) {}

	public positionAt(offset: number): Position {
		const { line, col } = this.lineCounter.linePos(offset);
		return { source: this.source, line: line - 1, column: col - 1 };
	}

	public positionOf(node: unknown, fallback: Position): Position {
		if (!isNode(node) || !node.range) return fallback;
		return this.positionAt(node.range[0]);
	}

	/** Position is that of the alias itself when `node` is one */
	public wrap(node: unknown, fallback: Position): DocumentNode {
		const position = this.positionOf(node, fallback);
		const resolved = isAlias(node) ? this.resolveAlias(node) : node;
		return new YamlNode(resolved, position, this);
	}

	public rawText(start: number, end: number): string {
		return this.text.slice(start, end);
	}
}

class YamlNode implements DocumentNode {
	public readonly kind: NodeKind;
	private cachedEntries: readonly MappingEntry[] | undefined;

	public constructor(
		private readonly node: unknown,
		public readonly position: Position,
		private readonly context: YamlContext
	) {
		this.kind = kindOf(node);
	}

	public get(key: string): DocumentNode | undefined {
		return this.entries().find((entry) => entry.key === key)?.value;
	}

	public entries(): readonly MappingEntry[] {
		if (this.cachedEntries === undefined) {
			const node = this.node;
			this.cachedEntries = isMap(node)
				? node.items.map((pair) => {
						const keyPosition = this.context.positionOf(pair.key, this.position);
						return {
							key: keyText(pair.key),
							keyPosition,
							value: this.context.wrap(pair.value, keyPosition)
						};
					})
				: [];
		}
		return this.cachedEntries;
	}

	public items(): readonly DocumentNode[] {
		const node = this.node;
		return isSeq(node) ? node.items.map((item) => this.context.wrap(item, this.position)) : [];
	}

	/**
	 * Plain scalars read as written (`1.0` stays `1.0`), quoted ones as their value.
	 */
	public text(): string {
		const node = this.node;
		if (!isScalar(node)) return '';
		if (node.value === null || node.value === undefined) return '';
		if (typeof node.value === 'string') return node.value;
		if (node.type === 'PLAIN' && node.range) {
			return this.context.rawText(node.range[0], node.range[1]);
		}
		return String(node.value);
	}
}

function kindOf(node: unknown): NodeKind {
	if (node === null) return 'scalar';
	if (isMap(node)) return 'mapping';
	if (isSeq(node)) return 'sequence';
	if (isScalar(node)) return 'scalar';
	return 'invalid';
}

function keyText(key: unknown): string {
	if (isScalar(key)) {
		return key.value === null || key.value === undefined ? '' : String(key.value);
	}
	return String(key);
}
