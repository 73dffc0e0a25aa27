/**
 * Scalar Coercion Functions
 *
 * Turn scalar text into native values. Each throws CoercionError on input it
 * cannot convert; the leaf binder wraps that into a positioned ConstructionError.
 *
 * @example
 * ```typescript
 * coerceInteger('25');           // -> 25
 * coerceInteger('2.5');          // throws CoercionError
 * coerceBoolean('TRUE');         // -> true
 * coerceEnum('warn', ['info', 'warn']); // -> 'warn'
 * ```
 */

/**
 * Error thrown when scalar text does not convert to the expected type.
 */
export class CoercionError extends Error {
	public override readonly name = 'CoercionError';

	public constructor(
		public readonly reason: string,
		public readonly expectedType: string,
		public readonly actualValue: string
	) {
		super(`${reason} - expected ${expectedType}, got: "${actualValue}"`);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, CoercionError);
		}
	}
}

const INTEGER_PATTERN = /^[-+]?\d+$/;
const NUMBER_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export function coerceString(text: string): string {
	return text;
}

/**
 * Coerce to a safe integer. Only plain decimal digits with an optional sign are accepted.
 */
export function coerceInteger(text: string): number {
	const trimmed = text.trim();
	if (trimmed === '') {
		throw new CoercionError('cannot coerce empty string', 'integer', text);
	}
	if (!INTEGER_PATTERN.test(trimmed)) {
		throw new CoercionError('coercion failed', 'integer', text);
	}
	const value = Number(trimmed);
	if (!Number.isSafeInteger(value)) {
		throw new CoercionError('value out of range', 'integer', text);
	}
	// -0 reads as 0
	return value === 0 ? 0 : value;
}

export function coerceNumber(text: string): number {
	const trimmed = text.trim();
	if (trimmed === '') {
		throw new CoercionError('cannot coerce empty string', 'number', text);
	}
	if (!NUMBER_PATTERN.test(trimmed)) {
		throw new CoercionError('coercion failed', 'number', text);
	}
	const value = Number(trimmed);
	if (!Number.isFinite(value)) {
		throw new CoercionError('value out of range', 'number', text);
	}
	return value === 0 ? 0 : value;
}

/**
 * `true` or `false`, in any letter case.
 */
export function coerceBoolean(text: string): boolean {
	switch (text.trim().toLowerCase()) {
		case 'true':
			return true;
		case 'false':
			return false;
		default:
			throw new CoercionError('coercion failed', 'boolean', text);
	}
}

export function coerceEnum<V extends string>(text: string, values: readonly V[]): V {
	const member = values.find((value) => value === text);
	if (member === undefined) {
		throw new CoercionError('not a member', `one of ${values.join(', ')}`, text);
	}
	return member;
}
