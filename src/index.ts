/**
 * vetted - declarative validation and cleaning of untrusted mappings
 *
 * Describe a record once as a schema of typed fields, then validate raw input
 * against it: every failure is collected into one error report, and a valid
 * input comes back as an immutable, fully typed record.
 *
 * @packageDocumentation
 */

// ============================================================================
// CORE - Schemas, Validators, Errors, Logging
// ============================================================================

export {
  Schema,
  SchemaBuilder,
  schema,
  v,
  BaseValidator,
  DescribedValidator,
  StringValidator,
  NumberValidator,
  BooleanValidator,
  DateValidator,
  OptionalValidator,
  DefaultValidator,
  EitherValidator,
  EnumValidator,
  enumOf,
  TimeValidator,
  formatTime,
  parseTime,
  TagValidator,
  TaggedValidator,
  taggedOf,
  FrozenMap,
  FrozenSet,
  ListValidator,
  SetValidator,
  MapValidator,
  mapOf,
  NestedValidator,
  formatPath,
  summarizeIssues,
  FAILURE_KINDS,
  MESSAGES,
  PATTERNS,
  ISO_PATTERNS,
  SCHEMA_DEFAULTS,
  STRING_DEFAULTS,
  SilentLogger,
  ConsoleLogger,
  ContextLogger,
  withContext,
  VettedError,
  ValidationError,
  SchemaDefinitionError,
  ContractError,
} from './core';

export type {
  Cleaned,
  FieldDescription,
  FieldSpec,
  Fields,
  InferSchema,
  SchemaOptions,
  Shape,
  FieldInfo,
  StringOptions,
  NumberMode,
  NumberOptions,
  DateInput,
  DateOptions,
  TimeInput,
  TimeOfDay,
  TimeOptions,
  SchemaShape,
  Bounds,
  OptionalOptions,
  Branches,
  Variant,
  EnumMember,
  MapOptions,
  SchemaSource,
  SizeOptions,
  FailureKind,
  Infer,
  Issue,
  PathSegment,
  ValidationFailure,
  ValidationResult,
  ValidationSuccess,
  Validator,
  ValidatorMeta,
  Logger,
  LogLevel,
  LogContext,
  ErrorEntry,
  Failure,
  FlatIssue,
} from './core';

// ============================================================================
// MIDDLEWARE - Express/Koa-like handler chain with schema validation
// ============================================================================

export { compose, createContext, validate, validated } from './middleware';

export type {
  HandlerContext,
  Middleware,
  Handler,
  ComposedMiddleware,
  ValidationErrorResponse,
} from './middleware';
