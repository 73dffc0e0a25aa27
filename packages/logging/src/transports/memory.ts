import type { Transport, LogObject } from '../types';

export interface MemoryTransport extends Transport {
	/** Records written so far, oldest first */
	readonly records: readonly LogObject[];
	clear(): void;
}

/**
 * Transport that keeps records in memory.
 * Handy for asserting on log output in tests and for buffering diagnostics
 * before the real transports are known.
 *
 * @example
 * ```ts
 * const memory = memoryTransport();
 * const log = new Logger('Config', { transports: [memory] });
 * log.warn('Unknown key');
 * memory.records[0].msg; // 'Unknown key'
 * ```
 */
export function memoryTransport(): MemoryTransport {
	const records: LogObject[] = [];

	return {
		records,

		write(obj: LogObject): void {
			records.push(obj);
		},

		clear(): void {
			records.length = 0;
		},

		async flush(): Promise<void> {},

		async close(): Promise<void> {}
	};
}
