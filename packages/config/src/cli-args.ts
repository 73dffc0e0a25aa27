/**
 * Command-line helper
 *
 * Reads the configuration path and the overrides from `argv`:
 *
 * ```
 * app --config prod.yaml -O server.port=9000 -O peers=a -O peers=b
 * ```
 *
 * gives `{ configPath: 'prod.yaml', overrides: { 'server.port': ['9000'], peers: ['a', 'b'] } }`.
 */

import { parseArgs } from 'node:util';
import type { OverrideTable } from './types';

export interface CommandLineOptions {
	/** Used when `--config` is absent (default: `config.yaml`) */
	defaultConfigPath?: string;
	/** Keep unrecognised arguments in `rest` instead of rejecting them (default: true) */
	passThrough?: boolean;
}

export interface CommandLineArgs {
	readonly configPath: string;
	readonly overrides: OverrideTable;
	/** Arguments left for the application, in their original order */
	readonly rest: readonly string[];
}

export class CommandLineError extends Error {
	public override readonly name = 'CommandLineError';

	public constructor(
		message: string,
		public readonly argument: string
	) {
		super(message);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, CommandLineError);
		}
	}
}

/**
 * @throws CommandLineError when an option lacks its value, or, without
 * pass-through, on any argument other than `--config` and `--override`
 */
export function parseCommandLine(argv: readonly string[], options: CommandLineOptions = {}): CommandLineArgs {
	const passThrough = options.passThrough ?? true;
	const { tokens } = parseArgs({
		args: [...argv],
		options: {
			config: { type: 'string', short: 'c' },
			override: { type: 'string', short: 'O', multiple: true }
		},
		strict: false,
		allowPositionals: true,
		tokens: true
	});

	let configPath = options.defaultConfigPath ?? 'config.yaml';
	const overrides = new Map<string, string[]>();
	const rest: string[] = [];
	// short options bundled in one argument (`-xv`) yield one token each
	let lastUnknownIndex = -1;

	for (const token of tokens ?? []) {
		if (token.kind === 'option-terminator') {
			rest.push('--');
			continue;
		}

		if (token.kind === 'positional') {
			if (!passThrough) {
				throw new CommandLineError(`Unexpected argument '${token.value}'`, token.value);
			}
			rest.push(token.value);
			continue;
		}

		const raw = argv[token.index] ?? token.rawName;
		if (token.name !== 'config' && token.name !== 'override') {
			if (!passThrough) {
				throw new CommandLineError(`Unknown option '${token.rawName}'`, raw);
			}
			if (token.index !== lastUnknownIndex) rest.push(raw);
			lastUnknownIndex = token.index;
			continue;
		}

		const value = token.value;
		if (typeof value !== 'string') {
			throw new CommandLineError(`Option '${token.rawName}' requires a value`, raw);
		}

		if (token.name === 'config') {
			configPath = value;
			continue;
		}

		const separator = value.indexOf('=');
		if (separator === -1) continue;
		const key = value.slice(0, separator);
		const values = overrides.get(key) ?? [];
		values.push(value.slice(separator + 1));
		overrides.set(key, values);
	}

	return { configPath, overrides: Object.fromEntries(overrides), rest };
}
