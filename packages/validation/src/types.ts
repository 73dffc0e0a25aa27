import { Type, Kind, type Static, type TSchema } from '@sinclair/typebox';

// Re-export TypeBox for convenience
export { Type, Type as t };
export type { Static, TSchema };

/**
 * Standard Schema (v1) interface for library-agnostic validation.
 * Zod, Valibot and ArkType schemas all satisfy it.
 */
export interface StandardSchema<T = unknown> {
	'~standard': {
		version: 1;
		vendor: string;
		validate: (value: unknown) => StandardSchemaResult<T> | Promise<StandardSchemaResult<T>>;
	};
}

export type StandardSchemaResult<T> = { value: T; issues?: undefined } | { issues: readonly StandardSchemaIssue[] };

export interface StandardSchemaIssue {
	message: string;
	path?: readonly (PropertyKey | { key: PropertyKey })[];
}

/**
 * Custom check run against a freshly bound record.
 * Throw to reject the value; the return value is ignored.
 *
 * @example
 * ```ts
 * const checkPorts: ValidatorFn<Server> = (server) => {
 *   if (server.port === server.adminPort) {
 *     throw new Error('port and admin_port must differ');
 *   }
 * };
 * ```
 */
export type ValidatorFn<T> = (value: T) => void;

/**
 * Anything accepted as a record validation hook.
 */
export type Validator<T = unknown> = ValidatorFn<T> | TSchema | StandardSchema<T>;

export type ValidationResult = { success: true } | { success: false; issues: ValidationIssue[] };

export interface ValidationIssue {
	/** Location inside the validated value, empty for the value itself */
	path: string;
	message: string;
}

/**
 * Check if a validator is a plain function
 */
export function isValidatorFn<T>(validator: Validator<T>): validator is ValidatorFn<T> {
	return typeof validator === 'function';
}

/**
 * Check if a value is a Standard Schema (has ~standard property)
 */
export function isStandardSchema(schema: unknown): schema is StandardSchema {
	return typeof schema === 'object' && schema !== null && '~standard' in schema;
}

/**
 * Check if a value is a TypeBox schema
 */
export function isTypeBoxSchema(schema: unknown): schema is TSchema {
	return typeof schema === 'object' && schema !== null && Kind in schema;
}
