/**
 * A bound value together with whether the document or an override supplied it.
 *
 * `isSet` is true even when the supplied value equals the default.
 */
export class SetInfo<T> {
	public constructor(
		public readonly value: T,
		public readonly isSet: boolean
	) {}

	/** The bound value when set, `fallback` otherwise */
	public orElse(fallback: T): T {
		return this.isSet ? this.value : fallback;
	}
}
