/**
 * Entry points
 *
 * `bind` works on any DocumentNode. `bindString` and `bindFile` parse YAML
 * first; `loadConfig` and `loadConfigSimple` are the application-facing
 * wrappers taking the output of `parseCommandLine`.
 *
 * @example
 * ```typescript
 * const args = parseCommandLine(process.argv.slice(2));
 * const config = loadConfigSimple(AppConfig, args);
 * if (config === undefined) process.exit(1);
 * ```
 */

import { readFileSync } from 'node:fs';
import { Logger, supportsColor } from '@docbind/logging';
import { bindMapping } from './binders/mapping';
import { ConfigError, DocumentParseError, TypeMismatchError } from './config-error';
import { BindingContext } from './context';
import { parseYaml } from './yaml-document';
import type { BindOptions, BindResult, DocumentNode, OverrideTable, SchemaModel } from './types';

/**
 * Bind `root` to `schema`. The root must be a mapping.
 * Never throws for document problems; the first one found is returned.
 */
export function bind<T>(schema: SchemaModel<T>, root: DocumentNode, options: BindOptions = {}): BindResult<T> {
	if (root.kind !== 'mapping') {
		return { success: false, error: new TypeMismatchError('', 'mapping (object)', root.kind, root.position) };
	}

	const context = BindingContext.root(options);
	const bound = bindMapping(root, schema, context);
	if (!bound.success) return bound;
	return { success: true, value: bound.value, warnings: context.warnings };
}

/**
 * Parse `text` as YAML and bind it.
 *
 * @param source - Name reported in error positions
 */
export function bindString<T>(
	schema: SchemaModel<T>,
	text: string,
	source = '<string>',
	options: BindOptions = {}
): BindResult<T> {
	const parsed = parseYaml(text, source);
	if (!parsed.success) return parsed;
	return bind(schema, parsed.value, options);
}

/**
 * Read and bind a YAML file. An unreadable file is reported as a
 * DocumentParseError at line 0, column 0 of `path`.
 */
export function bindFile<T>(schema: SchemaModel<T>, path: string, options: BindOptions = {}): BindResult<T> {
	let text: string;
	try {
		text = readFileSync(path, 'utf8');
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		return {
			success: false,
			error: new DocumentParseError({ source: path, line: 0, column: 0 }, `Cannot read file: ${reason}`)
		};
	}
	return bindString(schema, text, path, options);
}

/** What the loaders need from the command line */
export interface LoadArgs {
	readonly configPath: string;
	readonly overrides?: OverrideTable;
}

export interface LoadOptions {
	strict?: boolean;
	logger?: Logger;
	/** Colorize errors logged by `loadConfigSimple` (default: auto-detect on stderr) */
	colors?: boolean;
}

/**
 * Bind the configuration file named by `args`, applying its overrides.
 *
 * @throws ConfigError on the first problem found
 */
export function loadConfig<T>(schema: SchemaModel<T>, args: LoadArgs, options: LoadOptions = {}): T {
	const result = bindFile(schema, args.configPath, {
		strict: options.strict,
		overrides: args.overrides,
		logger: options.logger
	});
	if (!result.success) {
		throw result.error;
	}
	return result.value;
}

/**
 * Like `loadConfig`, but logs the formatted error and returns `undefined`
 * instead of throwing.
 */
export function loadConfigSimple<T>(
	schema: SchemaModel<T>,
	args: LoadArgs | string,
	options: LoadOptions = {}
): T | undefined {
	const log = options.logger ?? new Logger('Config');
	const loadArgs = typeof args === 'string' ? { configPath: args } : args;

	try {
		return loadConfig(schema, loadArgs, { ...options, logger: log });
	} catch (error) {
		if (!(error instanceof ConfigError)) throw error;
		log.error(error.format({ colors: options.colors ?? supportsColor(process.stderr) }), {
			kind: error.kind
		});
		return undefined;
	}
}
