/**
 * Immutable time span with nanosecond precision.
 *
 * @example
 * ```typescript
 * const timeout = Duration.of('hours', 1).plus(Duration.of('minutes', 10));
 * timeout.total('minutes'); // 70
 * timeout.toString(); // '1 hour and 10 minutes'
 * ```
 */

/** Units accepted in documents, largest first */
export const DURATION_UNITS = ['weeks', 'days', 'hours', 'minutes', 'seconds', 'msecs', 'usecs', 'hnsecs', 'nsecs'] as const;

export type DurationUnit = (typeof DURATION_UNITS)[number];

const NANOS_PER_UNIT: Readonly<Record<DurationUnit, bigint>> = {
	weeks: 604_800_000_000_000n,
	days: 86_400_000_000_000n,
	hours: 3_600_000_000_000n,
	minutes: 60_000_000_000n,
	seconds: 1_000_000_000n,
	msecs: 1_000_000n,
	usecs: 1_000n,
	hnsecs: 100n, // hecto-nanoseconds
	nsecs: 1n
};

const UNIT_LABELS: Readonly<Record<DurationUnit, [singular: string, plural: string]>> = {
	weeks: ['week', 'weeks'],
	days: ['day', 'days'],
	hours: ['hour', 'hours'],
	minutes: ['minute', 'minutes'],
	seconds: ['second', 'seconds'],
	msecs: ['ms', 'ms'],
	usecs: ['μs', 'μs'],
	hnsecs: ['hnsec', 'hnsecs'],
	nsecs: ['ns', 'ns']
};

export class Duration {
	public static readonly zero = new Duration(0n);

	private constructor(public readonly nanoseconds: bigint) {}

	/**
	 * @throws RangeError when `amount` is not an integer
	 */
	public static of(unit: DurationUnit, amount: number | bigint): Duration {
		return new Duration(BigInt(amount) * NANOS_PER_UNIT[unit]);
	}

	/** Sum of the given parts; missing parts count as zero */
	public static from(parts: Partial<Record<DurationUnit, number | bigint>>): Duration {
		let total = 0n;
		for (const unit of DURATION_UNITS) {
			const amount = parts[unit];
			if (amount !== undefined) {
				total += BigInt(amount) * NANOS_PER_UNIT[unit];
			}
		}
		return new Duration(total);
	}

	public plus(other: Duration): Duration {
		return new Duration(this.nanoseconds + other.nanoseconds);
	}

	public equals(other: Duration): boolean {
		return this.nanoseconds === other.nanoseconds;
	}

	/** Whole number of `unit`s in this span, truncated toward zero */
	public total(unit: DurationUnit): number {
		return Number(this.nanoseconds / NANOS_PER_UNIT[unit]);
	}

	/** Milliseconds, for timers */
	public get milliseconds(): number {
		return this.total('msecs');
	}

	public toString(): string {
		if (this.nanoseconds === 0n) return '0 ns';

		const negative = this.nanoseconds < 0n;
		let remaining = negative ? -this.nanoseconds : this.nanoseconds;
		const parts: string[] = [];

		for (const unit of DURATION_UNITS) {
			const count = remaining / NANOS_PER_UNIT[unit];
			if (count === 0n) continue;
			remaining -= count * NANOS_PER_UNIT[unit];
			const [singular, plural] = UNIT_LABELS[unit];
			parts.push(`${count} ${count === 1n ? singular : plural}`);
		}

		const text =
			parts.length <= 2 ? parts.join(' and ') : `${parts.slice(0, -1).join(', ')}, and ${parts[parts.length - 1]}`;
		return negative ? `-${text}` : text;
	}
}

/**
 * Unit named by a `_<unit>` suffix of a document key, e.g. `timeout_seconds`.
 * Suffixes are tried largest unit first.
 */
export function durationUnitOfKey(key: string): DurationUnit | undefined {
	return DURATION_UNITS.find((unit) => key.endsWith(`_${unit}`));
}
