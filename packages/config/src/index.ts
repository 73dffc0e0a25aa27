export { Schema, RecordSchema, type Infer, type InferFields, type FieldsInput, type SchemaOptions } from './schema';
export { field, FieldBuilder, FieldKindSelector, SetInfoFieldBuilder, type FieldDef, type FieldLike } from './field';
export { SetInfo } from './set-info';
export { Duration, DURATION_UNITS, durationUnitOfKey, type DurationUnit } from './duration';
export {
	ConfigError,
	UnknownKeyError,
	MissingKeyError,
	TypeMismatchError,
	DurationShapeError,
	ConstructionError,
	ValidationFailedError,
	DuplicateKeyError,
	DocumentParseError,
	SchemaDefinitionError,
	type ConfigErrorKind,
	type FormatOptions
} from './config-error';
export {
	CoercionError,
	coerceString,
	coerceInteger,
	coerceNumber,
	coerceBoolean,
	coerceEnum
} from './coercion';
export { bind, bindString, bindFile, loadConfig, loadConfigSimple, type LoadArgs, type LoadOptions } from './bind';
export {
	parseCommandLine,
	CommandLineError,
	type CommandLineArgs,
	type CommandLineOptions
} from './cli-args';
export { parseYaml } from './yaml-document';
export { fromValue } from './value-document';
export { COMMAND_LINE_SOURCE } from './document';

export type {
	BindOptions,
	BindResult,
	Converter,
	DocumentNode,
	FieldDescriptor,
	FieldKind,
	FromString,
	MappingEntry,
	NodeKind,
	OverrideTable,
	Position,
	ResolutionStrategy,
	SchemaModel,
	StringConstructible,
	TextType
} from './types';
