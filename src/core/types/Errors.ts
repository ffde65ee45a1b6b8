import type { FailureKind, Issue } from '../contract/Validator';
import { formatPath, segmentKey } from '../contract/Validator';

/**
 * Base error class for all vetted errors
 */
export class VettedError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * A failure located directly at one segment of a report
 */
export interface Failure {
  readonly message: string;
  readonly kind: FailureKind;
}

/**
 * A failure with its path rendered as text, for logs and API responses
 */
export interface FlatIssue {
  readonly path: string;
  readonly message: string;
  readonly kind: FailureKind;
}

export type ErrorEntry = Failure | ValidationError;

/**
 * Aggregate report of every failure found by one validate call.
 *
 * Entries are keyed by the first segment of each failure path: a field name,
 * a list index, a mapping key or a `#position` for a rejected mapping key.
 * A segment with exactly one failure of its own maps to a {@link Failure}.
 * Any other segment maps to a nested ValidationError with paths relative to
 * that segment, whose own failures are listed by {@link failures}.
 */
export class ValidationError extends VettedError {
  readonly issues: readonly Issue[];
  private readonly entries: ReadonlyMap<string, ErrorEntry>;

  constructor(issues: readonly Issue[], schemaName: string = 'Schema') {
    const entries = groupIssues(issues, schemaName);
    const located = [...entries.keys()];
    const where = located.length > 0 ? located.join(', ') : issues.map((issue) => issue.message).join(', ');
    super(`${schemaName} validation failed: ${where}`, 'VALIDATION_ERROR', {
      schema: schemaName,
      issues: issues.length,
    });
    this.issues = Object.freeze([...issues]);
    this.entries = entries;
  }

  /**
   * Failures located at this report itself rather than under a segment
   */
  failures(): Failure[] {
    return this.issues
      .filter((issue) => issue.path.length === 0)
      .map((issue) => Object.freeze({ message: issue.message, kind: issue.kind }));
  }

  /**
   * Look up the failure (or nested report) for a field name, index or key
   */
  get(segment: string | number): ErrorEntry | undefined {
    return this.entries.get(String(segment));
  }

  has(segment: string | number): boolean {
    return this.entries.has(String(segment));
  }

  /**
   * Segments with failures, in the order they were found
   */
  keys(): string[] {
    return [...this.entries.keys()];
  }

  flatten(): FlatIssue[] {
    return this.issues.map((issue) => ({
      path: formatPath(issue.path),
      message: issue.message,
      kind: issue.kind,
    }));
  }

  kinds(): FailureKind[] {
    return this.issues.map((issue) => issue.kind);
  }

  toJSON(): { name: string; code: string; message: string; issues: FlatIssue[] } {
    return { name: this.name, code: this.code, message: this.message, issues: this.flatten() };
  }
}

const groupIssues = (issues: readonly Issue[], schemaName: string): ReadonlyMap<string, ErrorEntry> => {
  const groups = new Map<string, Issue[]>();
  for (const issue of issues) {
    if (issue.path.length === 0) {
      continue;
    }
    const key = segmentKey(issue.path[0]);
    const group = groups.get(key) ?? [];
    group.push(issue);
    groups.set(key, group);
  }

  const entries = new Map<string, ErrorEntry>();
  for (const [key, group] of groups) {
    const [first] = group;
    if (group.length === 1 && first.path.length === 1) {
      entries.set(key, Object.freeze({ message: first.message, kind: first.kind }));
    } else {
      const nested = group.map((issue) => ({ ...issue, path: issue.path.slice(1) }));
      entries.set(key, new ValidationError(nested, schemaName));
    }
  }
  return entries;
};

/**
 * Errors raised while a schema or validator is being defined.
 * - SchemaDefinitionError.duplicateField() - Field name registered twice
 * - SchemaDefinitionError.tooFewBranches() - Either with fewer than two branches
 * - SchemaDefinitionError.emptyEnum() - Enum without members
 * - SchemaDefinitionError.invalidConfig() - Contradictory validator options
 * - SchemaDefinitionError.duplicateTag() - Tag claimed by two schemas of a tagged union
 * - SchemaDefinitionError.circularReference() - Lazy schema that resolves to itself while resolving
 */
export class SchemaDefinitionError extends VettedError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }

  static duplicateField(message: string, details?: Record<string, unknown>): SchemaDefinitionError {
    return new SchemaDefinitionError(message, 'SCHEMA_DEFINITION_ERROR:DUPLICATE_FIELD', details);
  }

  static tooFewBranches(message: string, details?: Record<string, unknown>): SchemaDefinitionError {
    return new SchemaDefinitionError(message, 'SCHEMA_DEFINITION_ERROR:TOO_FEW_BRANCHES', details);
  }

  static emptyEnum(message: string, details?: Record<string, unknown>): SchemaDefinitionError {
    return new SchemaDefinitionError(message, 'SCHEMA_DEFINITION_ERROR:EMPTY_ENUM', details);
  }

  static invalidConfig(message: string, details?: Record<string, unknown>): SchemaDefinitionError {
    return new SchemaDefinitionError(message, 'SCHEMA_DEFINITION_ERROR:INVALID_CONFIG', details);
  }

  static duplicateTag(message: string, details?: Record<string, unknown>): SchemaDefinitionError {
    return new SchemaDefinitionError(message, 'SCHEMA_DEFINITION_ERROR:DUPLICATE_TAG', details);
  }

  static circularReference(message: string, details?: Record<string, unknown>): SchemaDefinitionError {
    return new SchemaDefinitionError(message, 'SCHEMA_DEFINITION_ERROR:CIRCULAR_REFERENCE', details);
  }
}

/**
 * Misuse of the public API, such as validating something that is not a mapping.
 * These are programming errors and are never folded into a ValidationError.
 * - ContractError.notAMapping() - Schema input that is not a mapping
 * - ContractError.unknownTag() - Serializing a record no tagged schema claims
 * - ContractError.immutable() - Write to a cleaned map or set
 */
export class ContractError extends VettedError {
  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message, code, details);
  }

  static notAMapping(message: string, details?: Record<string, unknown>): ContractError {
    return new ContractError(message, 'CONTRACT_ERROR:NOT_A_MAPPING', details);
  }

  static unknownTag(message: string, details?: Record<string, unknown>): ContractError {
    return new ContractError(message, 'CONTRACT_ERROR:UNKNOWN_TAG', details);
  }

  static immutable(message: string, details?: Record<string, unknown>): ContractError {
    return new ContractError(message, 'CONTRACT_ERROR:IMMUTABLE', details);
  }
}
