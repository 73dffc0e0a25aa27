import type { Logger } from '@docbind/logging';
import { joinPath, type ConfigError } from './config-error';
import type { BindOptions, OverrideTable } from './types';

/**
 * Per-call binding state. Descending into a field derives a new context;
 * the only shared part is the warning sink of the whole call.
 */
export class BindingContext {
	private constructor(
		public readonly strict: boolean,
		public readonly overrides: OverrideTable,
		public readonly path: string,
		private readonly logger: Logger | undefined,
		private readonly sink: ConfigError[]
	) {}

	public static root(options: BindOptions = {}): BindingContext {
		return new BindingContext(options.strict ?? true, options.overrides ?? {}, '', options.logger, []);
	}

	public get warnings(): readonly ConfigError[] {
		return this.sink;
	}

	public descend(segment: string): BindingContext {
		return new BindingContext(this.strict, this.overrides, joinPath(this.path, segment), this.logger, this.sink);
	}

	/** Override values for the current path, if any were given */
	public override(): readonly string[] | undefined {
		if (!Object.hasOwn(this.overrides, this.path)) return undefined;
		const values = this.overrides[this.path];
		return values !== undefined && values.length > 0 ? values : undefined;
	}

	/** Whether some override targets a path below the current one */
	public hasNestedOverride(): boolean {
		const prefix = `${this.path}.`;
		return Object.keys(this.overrides).some((key) => key.startsWith(prefix));
	}

	public warn(error: ConfigError): void {
		this.sink.push(error);
		this.logger?.warn(error.detail, { path: error.fieldPath, source: error.position.source });
	}

	public trace(msg: string, data?: Record<string, unknown>): void {
		if (this.logger?.isEnabled('debug')) {
			this.logger.debug(msg, { path: this.path, ...data });
		}
	}
}
