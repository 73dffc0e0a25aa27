export { Logger, type LogObject, type Transport, type LoggerOptions } from './logger';
export { levels, getLevelName, isLevelEnabled, parseLevelName, type LevelName, type LevelNumber } from './levels';
export { ANSI_COLORS, paint, supportsColor, type ColorName } from './colors';
export type { LoggerGlobalOptions } from './types';
export {
	consoleTransport,
	formatPretty,
	memoryTransport,
	type ConsoleTransportOptions,
	type FormatOptions,
	type MemoryTransport
} from './transports/index';
export { readLogConfig, buildLoggerOptions, type LogConfig } from './config';
