/**
 * Terminal color helpers.
 *
 * Shared by the console transport and by anything that renders
 * user-facing diagnostics (e.g. configuration errors).
 *
 * @module logging/colors
 */

// ANSI color codes for terminal output
export const ANSI_COLORS = {
	reset: '\x1b[0m',
	red: '\x1b[31m',
	green: '\x1b[32m',
	yellow: '\x1b[33m',
	blue: '\x1b[34m',
	magenta: '\x1b[35m',
	cyan: '\x1b[36m',
	white: '\x1b[37m',
	gray: '\x1b[90m'
} as const;

export type ColorName = Exclude<keyof typeof ANSI_COLORS, 'reset'>;

/**
 * Wraps `text` in the given color when `enabled`, returns it untouched otherwise.
 *
 * @example
 * ```ts
 * paint('config.yaml', 'yellow', true); // '\x1b[33mconfig.yaml\x1b[0m'
 * paint('config.yaml', 'yellow', false); // 'config.yaml'
 * ```
 */
export function paint(text: string, color: ColorName, enabled: boolean): string {
	if (!enabled) return text;
	return `${ANSI_COLORS[color]}${text}${ANSI_COLORS.reset}`;
}

/**
 * Whether colors should be used for a stream, honouring `NO_COLOR` and `FORCE_COLOR`.
 */
export function supportsColor(stream: { isTTY?: boolean } = process.stdout): boolean {
	if (process.env.NO_COLOR !== undefined) return false;
	if (process.env.FORCE_COLOR !== undefined) return process.env.FORCE_COLOR !== '0';
	return stream.isTTY ?? false;
}
