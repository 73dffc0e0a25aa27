import { inspect } from 'node:util';
import type { Transport, LogObject, LevelNumber } from '../types';
import { ANSI_COLORS, supportsColor } from '../colors';

export interface ConsoleTransportOptions {
	pretty?: boolean;
	json?: boolean;
	/** Depth for object inspection (default: 4) */
	depth?: number;
	/** Show colors in pretty mode (default: auto-detect TTY) */
	colors?: boolean;
	/** Where lines go (default: `console.error`, keeping stdout free for program output) */
	write?: (line: string) => void;
}

export interface FormatOptions {
	colors: boolean;
	depth: number;
}

const levelColors: Record<LevelNumber, string> = {
	10: ANSI_COLORS.magenta, // debug (D)
	20: ANSI_COLORS.cyan, // info (I)
	30: ANSI_COLORS.yellow, // warn (W)
	40: ANSI_COLORS.red // error (E)
};

const levelChars: Record<LevelNumber, string> = {
	10: 'D',
	20: 'I',
	30: 'W',
	40: 'E'
};

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const hours = date.getHours().toString().padStart(2, '0');
	const minutes = date.getMinutes().toString().padStart(2, '0');
	const seconds = date.getSeconds().toString().padStart(2, '0');
	return `${hours}:${minutes}:${seconds}`;
}

function formatValue(value: unknown, options: FormatOptions): string {
	if (value === null || value === undefined) {
		return String(value);
	}
	if (typeof value === 'string') {
		return value;
	}
	if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
		return String(value);
	}
	return inspect(value, { colors: options.colors, depth: options.depth, breakLength: Infinity });
}

function color(text: string, code: string, options: FormatOptions): string {
	return options.colors ? `${code}${text}${ANSI_COLORS.reset}` : text;
}

/**
 * Pretty line: `HH:MM:SS:L:Name message: key:value key:value`
 */
export function formatPretty(obj: LogObject, options: FormatOptions): string {
	const { time, level, msg, name, error, ...context } = obj;
	const levelChar = levelChars[level] ?? '?';

	const contextParts = Object.entries(context).map(
		([key, value]) => `${key}:${formatValue(value, options)}`
	);
	const contextStr = contextParts.length > 0 ? `: ${contextParts.join(' ')}` : '';

	const message =
		level === 40
			? color(msg, ANSI_COLORS.red, options)
			: level === 30
				? color(msg, ANSI_COLORS.yellow, options)
				: msg;

	let output =
		`${color(formatTime(time), ANSI_COLORS.gray, options)}:` +
		`${color(levelChar, levelColors[level] ?? ANSI_COLORS.reset, options)}:` +
		`${color(name ?? 'Application', ANSI_COLORS.yellow, options)} ${message}${contextStr}`;

	if (error instanceof Error) {
		output += '\n' + inspect(error, { colors: options.colors, depth: options.depth });
	}

	return output;
}

function formatJson(obj: LogObject): string {
	const { error, ...rest } = obj;
	if (error instanceof Error) {
		return JSON.stringify({ ...rest, error: { name: error.name, message: error.message } }, jsonReplacer);
	}
	return JSON.stringify(obj, jsonReplacer);
}

function jsonReplacer(_key: string, value: unknown): unknown {
	return typeof value === 'bigint' ? value.toString() : value;
}

function isPrettyMode(options: ConsoleTransportOptions): boolean {
	if (options.pretty !== undefined) return options.pretty;
	if (options.json !== undefined) return !options.json;
	return process.env.NODE_ENV !== 'production';
}

/**
 * Console transport - outputs to stderr with pretty or JSON formatting.
 *
 * @example
 * ```ts
 * // Auto-detect mode
 * consoleTransport()
 *
 * // Force pretty with colors
 * consoleTransport({ pretty: true, colors: true })
 *
 * // JSON for production
 * consoleTransport({ json: true })
 * ```
 */
export function consoleTransport(options: ConsoleTransportOptions = {}): Transport {
	const pretty = isPrettyMode(options);
	const formatOptions: FormatOptions = {
		colors: options.colors ?? supportsColor(process.stderr),
		depth: options.depth ?? 4
	};
	const write = options.write ?? ((line: string) => console.error(line));

	return {
		write(obj: LogObject): void {
			write(pretty ? formatPretty(obj, formatOptions) : formatJson(obj));
		},

		async flush(): Promise<void> {
			// Console writes are synchronous, nothing to flush
		},

		async close(): Promise<void> {
			// Console has no resources to close
		}
	};
}
