/**
 * Unified Error Hierarchy for Ratio Kit
 *
 * Base error classes that provide:
 * - Consistent error codes across the engine and the CLI
 * - HTTP status code mapping for callers that expose the engine over a service
 * - A clear split between caller errors and broken internal contracts
 *
 * Missing or zero statement values are never errors: the ratio engine reports
 * them as undefined ratio values.
 */

/**
 * Abstract base class for all Ratio Kit errors.
 * All domain-specific errors should extend this class.
 */
export abstract class RatioKitError extends Error {
  /** Error code for programmatic error handling */
  abstract readonly code: string;
  /** HTTP status code for API responses */
  abstract readonly httpStatus: number;

  constructor(
    message: string,
    public override readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * 400 Bad Request - Invalid input or request format
 */
export class BadRequestError extends RatioKitError {
  readonly code: string = 'BAD_REQUEST';
  readonly httpStatus = 400 as const;
}

/**
 * 409 Conflict - Two inputs disagree about the same fact
 */
export class ConflictError extends RatioKitError {
  readonly code: string = 'CONFLICT';
  readonly httpStatus = 409 as const;
}

/**
 * 500 Internal Server Error - A contract between components was broken
 */
export class InternalError extends RatioKitError {
  readonly code: string = 'INTERNAL_ERROR';
  readonly httpStatus = 500 as const;
}

/**
 * Two raw records carry the same fiscal period identifier.
 * The normalizer refuses to merge or pick one of them.
 */
export class AmbiguousPeriodError extends BadRequestError {
  override readonly code: string = 'AMBIGUOUS_PERIOD';

  constructor(
    public readonly periodId: string,
    public readonly recordIndexes: readonly number[]
  ) {
    super(`Multiple statement records share period "${periodId}" (records ${recordIndexes.join(', ')})`);
  }
}

/**
 * A period identifier is empty or names an invalid date
 */
export class InvalidPeriodError extends BadRequestError {
  override readonly code: string = 'INVALID_PERIOD';

  constructor(
    message: string,
    public readonly period?: unknown
  ) {
    super(message);
  }
}

/**
 * The alias table does not map canonical fields to label lists
 */
export class AliasTableError extends BadRequestError {
  override readonly code: string = 'INVALID_ALIAS_TABLE';

  constructor(
    message: string,
    public readonly issues: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * Two statement series report different values for the same field and period
 */
export class ConflictingFieldError extends ConflictError {
  override readonly code: string = 'CONFLICTING_FIELD';

  constructor(
    public readonly periodId: string,
    public readonly field: string,
    public readonly values: readonly [number, number]
  ) {
    super(`Conflicting values for ${field} in period ${periodId}: ${values[0]} vs ${values[1]}`);
  }
}

/**
 * Canonical input handed to the ratio engine is unsorted, has duplicate
 * period identifiers or does not follow the canonical field schema.
 */
export class InvariantViolationError extends InternalError {
  override readonly code: string = 'INVARIANT_VIOLATION';

  constructor(
    message: string,
    public readonly periodId?: string
  ) {
    super(message);
  }
}

/**
 * Type guard to check if an error is a RatioKitError
 */
export function isRatioKitError(error: unknown): error is RatioKitError {
  return error instanceof RatioKitError;
}

/**
 * Get a safe error message from an unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
