import { levels, getLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
import { consoleTransport } from './transports/console';
import type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions } from './types';

export type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions };

/**
 * Small structured logger with Pino-inspired design.
 *
 * - Produces structured log objects
 * - Writes synchronously to configurable transports
 * - Immutable context via with()
 * - Named child loggers via child()
 *
 * @example
 * ```ts
 * const log = new Logger('Config');
 * log.debug('Resolving field', { path: 'server.port' });
 *
 * const scoped = log.with({ source: 'config.yaml' });
 * scoped.warn('Ignoring unknown key', { key: 'prot' });
 * ```
 */
export class Logger {
	private static globalTransports: Transport[] | null = null;
	private static globalLevel: LevelName = 'info';

	private readonly name: string;
	private readonly level: LevelNumber;
	private readonly explicitTransports: Transport[] | null;
	private readonly context: Readonly<Record<string, unknown>>;

	constructor(name: string, options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
		this.name = name;
		this.level = levels[options.level ?? Logger.globalLevel];
		// Store explicit transports, or null to use global (checked at write time)
		this.explicitTransports = options.transports ?? null;
		this.context = context;
	}

	private get transports(): Transport[] {
		return this.explicitTransports ?? Logger.globalTransports ?? [Logger.defaultTransport()];
	}

	/**
	 * Configure global defaults for all Logger instances.
	 * Loggers created afterwards pick up the level; transports apply to every
	 * logger without explicit transports, including existing ones.
	 */
	static configure(options: LoggerGlobalOptions): void {
		if (options.level) {
			Logger.globalLevel = options.level;
		}
		if (options.transports) {
			Logger.globalTransports = options.transports;
		}
	}

	/**
	 * Reset global configuration to defaults.
	 *
	 * **IMPORTANT**: Tests that call Logger.configure() MUST call Logger.reset()
	 * in afterEach() to prevent test pollution.
	 */
	static reset(): void {
		Logger.globalLevel = 'info';
		Logger.globalTransports = null;
	}

	/**
	 * Flush and close the global transports.
	 * Uses Promise.allSettled so one failing transport does not block the others.
	 */
	static async shutdown(): Promise<void> {
		const transports = Logger.globalTransports ?? [];
		await Promise.allSettled(transports.map((transport) => transport.flush()));
		await Promise.allSettled(transports.map((transport) => transport.close()));
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.debug, msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.info, msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.warn, msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.error, msg, data);
	}

	/**
	 * Whether a message at `level` would be written.
	 * Lets callers skip building expensive log payloads.
	 */
	isEnabled(level: LevelName): boolean {
		return isLevelEnabled(levels[level], this.level);
	}

	/**
	 * Creates a new logger with additional context (immutable)
	 */
	with(data: Record<string, unknown>): Logger {
		return new Logger(this.name, this.childOptions(), { ...this.context, ...data });
	}

	/**
	 * Creates a child logger with a new name (immutable)
	 * Inherits context, level, and transports from parent
	 */
	child(name: string): Logger {
		return new Logger(name, this.childOptions(), { ...this.context });
	}

	/**
	 * Creates a simple console-based logger at debug level
	 */
	static console(name = 'App'): Logger {
		return new Logger(name, { level: 'debug' });
	}

	private childOptions(): LoggerOptions {
		const options: LoggerOptions = { level: getLevelName(this.level) };
		if (this.explicitTransports) {
			options.transports = this.explicitTransports;
		}
		return options;
	}

	private log(level: LevelNumber, msg: string, data?: Record<string, unknown>): void {
		if (!isLevelEnabled(level, this.level)) {
			return;
		}

		const logObj: LogObject = {
			...this.context,
			...data,
			time: Date.now(),
			level,
			msg,
			name: this.name
		};

		for (const transport of this.transports) {
			transport.write(logObj);
		}
	}

	private static defaultTransport(): Transport {
		return consoleTransport();
	}
}
