import type { TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import {
	isStandardSchema,
	isTypeBoxSchema,
	isValidatorFn,
	type StandardSchema,
	type StandardSchemaIssue,
	type ValidationIssue,
	type ValidationResult,
	type Validator,
	type ValidatorFn
} from './types';

/**
 * Run a validator against a value synchronously.
 *
 * Functions fail by throwing, TypeBox schemas are checked with `Value.Errors`
 * and Standard Schemas through their `~standard.validate` entry point.
 * A Standard Schema that answers with a promise is reported as a failure,
 * since record validation runs inside a synchronous bind.
 *
 * @example
 * ```ts
 * const result = validateSync(Type.Object({ port: Type.Integer({ minimum: 1 }) }), { port: 0 });
 * if (!result.success) console.log(formatIssues(result.issues));
 * ```
 */
export function validateSync<T>(validator: Validator<T>, value: T): ValidationResult {
	if (isValidatorFn(validator)) {
		return validateCustom(validator, value);
	}

	if (isStandardSchema(validator)) {
		return validateStandardSchema(validator, value);
	}

	if (isTypeBoxSchema(validator)) {
		return validateTypeBox(validator, value);
	}

	throw new Error('Unknown validator type');
}

/**
 * Join issues into a single line: `path: message; path: message`.
 */
export function formatIssues(issues: readonly ValidationIssue[]): string {
	return issues.map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message)).join('; ');
}

function validateCustom<T>(validator: ValidatorFn<T>, value: T): ValidationResult {
	try {
		validator(value);
		return { success: true };
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		return { success: false, issues: [{ path: '', message }] };
	}
}

function validateTypeBox(schema: TSchema, value: unknown): ValidationResult {
	const errors = [...Value.Errors(schema, value)];

	if (errors.length === 0) {
		return { success: true };
	}

	return {
		success: false,
		issues: errors.map((err) => ({ path: err.path, message: err.message }))
	};
}

function validateStandardSchema<T>(schema: StandardSchema<T>, value: unknown): ValidationResult {
	const result = schema['~standard'].validate(value);

	if (result instanceof Promise) {
		return {
			success: false,
			issues: [{ path: '', message: `${schema['~standard'].vendor} schema validated asynchronously` }]
		};
	}

	if (result.issues === undefined) {
		return { success: true };
	}

	return {
		success: false,
		issues: result.issues.map((issue) => ({ path: issuePath(issue), message: issue.message }))
	};
}

function issuePath(issue: StandardSchemaIssue): string {
	if (!issue.path) return '';
	return issue.path.map((segment) => String(typeof segment === 'object' ? segment.key : segment)).join('.');
}
