/**
 * Logging level utilities.
 */
import type { LevelName, LevelNumber } from './types';

export type { LevelName, LevelNumber };

/**
 * Log level constants (Pino-compatible numbering)
 */
export const levels: Readonly<Record<LevelName, LevelNumber>> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40
};

const levelNames: Readonly<Record<LevelNumber, LevelName>> = {
	10: 'debug',
	20: 'info',
	30: 'warn',
	40: 'error'
};

export function getLevelName(level: LevelNumber): LevelName {
	return levelNames[level];
}

export function isLevelEnabled(current: LevelNumber, threshold: LevelNumber): boolean {
	return current >= threshold;
}

/**
 * Narrow free-form text (environment variables, CLI flags) to a level name.
 * Matching is case-insensitive; anything else yields `undefined`.
 */
export function parseLevelName(value: string | undefined): LevelName | undefined {
	if (value === undefined) return undefined;
	const normalized = value.trim().toLowerCase();
	return isLevelName(normalized) ? normalized : undefined;
}

function isLevelName(value: string): value is LevelName {
	return Object.hasOwn(levels, value);
}
