import type { LoggerOptions } from './types';
import { parseLevelName, type LevelName } from './levels';
import { consoleTransport } from './transports/console';

/**
 * Logging configuration read from the environment.
 */
export interface LogConfig {
	/** Log level threshold (debug, info, warn, error). Default: 'info' */
	level: LevelName;
	/** Use JSON format (production) vs pretty format (dev) */
	jsonFormat: boolean;
	/** Force colors on or off; undefined = auto-detect */
	colors: boolean | undefined;
}

const DEFAULT_CONFIG: LogConfig = {
	level: 'info',
	jsonFormat: false,
	colors: undefined
};

function parseFlag(value: string | undefined): boolean | undefined {
	if (value === undefined || value.trim() === '') return undefined;
	return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

/**
 * Read logging configuration from environment variables.
 *
 * Reads these keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_JSON: true | false (default: false)
 * - LOG_COLORS: true | false (default: auto-detect)
 */
export function readLogConfig(env: Readonly<Record<string, string | undefined>> = process.env): LogConfig {
	return {
		level: parseLevelName(env.LOG_LEVEL) ?? DEFAULT_CONFIG.level,
		jsonFormat: parseFlag(env.LOG_JSON) ?? DEFAULT_CONFIG.jsonFormat,
		colors: parseFlag(env.LOG_COLORS) ?? DEFAULT_CONFIG.colors
	};
}

/**
 * Build logger options from a LogConfig.
 *
 * @example
 * ```ts
 * Logger.configure(buildLoggerOptions(readLogConfig()));
 * ```
 */
export function buildLoggerOptions(config: LogConfig): LoggerOptions {
	return {
		level: config.level,
		transports: [
			consoleTransport({
				json: config.jsonFormat,
				pretty: !config.jsonFormat,
				colors: config.colors
			})
		]
	};
}
