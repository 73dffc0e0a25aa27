import type { DocumentNode, MappingEntry, NodeKind, Position } from './types';

/** Source name of nodes built from command-line overrides */
export const COMMAND_LINE_SOURCE = '<command line>';

export const COMMAND_LINE_POSITION: Position = { source: COMMAND_LINE_SOURCE, line: 0, column: 0 };

/**
 * Node built in memory rather than parsed: override values and the empty
 * mappings bound in place of absent sections.
 */
class SyntheticNode implements DocumentNode {
	public constructor(
		public readonly kind: NodeKind,
		public readonly position: Position,
		private readonly scalar = '',
		private readonly children: readonly DocumentNode[] = []
	) {}

	public get(_key: string): DocumentNode | undefined {
		return undefined;
	}

	public entries(): readonly MappingEntry[] {
		return [];
	}

	public items(): readonly DocumentNode[] {
		return this.kind === 'sequence' ? this.children : [];
	}

	public text(): string {
		return this.scalar;
	}
}

export function scalarNode(text: string, position: Position = COMMAND_LINE_POSITION): DocumentNode {
	return new SyntheticNode('scalar', position, text);
}

export function sequenceNode(items: readonly DocumentNode[], position: Position = COMMAND_LINE_POSITION): DocumentNode {
	return new SyntheticNode('sequence', position, '', items);
}

export function emptyMapping(position: Position): DocumentNode {
	return new SyntheticNode('mapping', position);
}
