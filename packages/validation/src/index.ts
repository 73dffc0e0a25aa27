export { Type, t, isValidatorFn, isStandardSchema, isTypeBoxSchema } from './types';

export type {
	Static,
	TSchema,
	StandardSchema,
	StandardSchemaResult,
	StandardSchemaIssue,
	Validator,
	ValidatorFn,
	ValidationResult,
	ValidationIssue
} from './types';

export { validateSync, formatIssues } from './validate';
