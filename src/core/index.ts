/**
 * Core validators, schemas, errors and logging for vetted
 */

// Schemas
export { Schema, SchemaBuilder, schema } from './contract/Schema';
export type {
  Cleaned,
  FieldDescription,
  FieldSpec,
  Fields,
  InferSchema,
  SchemaOptions,
  Shape,
} from './contract/Schema';

// Validators
export { v } from './contract/validators';
export { BaseValidator, DescribedValidator } from './contract/BaseValidator';
export type { FieldInfo } from './contract/BaseValidator';
export { StringValidator } from './contract/StringValidator';
export type { StringOptions } from './contract/StringValidator';
export { NumberValidator } from './contract/NumberValidator';
export type { NumberMode, NumberOptions } from './contract/NumberValidator';
export { BooleanValidator } from './contract/BooleanValidator';
export { DateValidator } from './contract/DateValidator';
export type { DateInput, DateOptions } from './contract/DateValidator';
export { TimeValidator, formatTime, parseTime } from './contract/TimeValidator';
export type { TimeInput, TimeOfDay, TimeOptions } from './contract/TimeValidator';
export { OptionalValidator, DefaultValidator } from './contract/OptionalValidator';
export type { OptionalOptions } from './contract/OptionalValidator';
export { EitherValidator } from './contract/EitherValidator';
export type { Branches, Variant } from './contract/EitherValidator';
export { EnumValidator, enumOf } from './contract/EnumValidator';
export type { EnumMember } from './contract/EnumValidator';
export { TagValidator } from './contract/TagValidator';
export { TaggedValidator, taggedOf } from './contract/TaggedValidator';
export type { SchemaShape } from './contract/TaggedValidator';
export { ListValidator } from './contract/ListValidator';
export { SetValidator } from './contract/SetValidator';
export { MapValidator, mapOf } from './contract/MapValidator';
export type { MapOptions } from './contract/MapValidator';
export { NestedValidator } from './contract/NestedValidator';
export type { SchemaSource } from './contract/NestedValidator';
export type { SizeOptions } from './contract/container';
export type { Bounds } from './contract/bounds';
export { FrozenMap, FrozenSet } from './contract/frozen';

// Validation results
export { formatPath, summarizeIssues } from './contract/Validator';
export type {
  FailureKind,
  Infer,
  Issue,
  PathSegment,
  ValidationFailure,
  ValidationResult,
  ValidationSuccess,
  Validator,
  ValidatorMeta,
} from './contract/Validator';

// Constants
export { FAILURE_KINDS, ISO_PATTERNS, MESSAGES, PATTERNS, SCHEMA_DEFAULTS, STRING_DEFAULTS } from './constants';

// Logging
export type { Logger, LogLevel, LogContext } from './types/Logger';
export { SilentLogger, ConsoleLogger, ContextLogger, withContext } from './types/Logger';

// Errors
export { VettedError, ValidationError, SchemaDefinitionError, ContractError } from './types/Errors';
export type { ErrorEntry, Failure, FlatIssue } from './types/Errors';
