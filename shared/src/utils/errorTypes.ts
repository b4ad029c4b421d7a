/**
 * Common Error Type Definitions
 *
 * Domain errors raised by the renderer and the scene loader. Numerical
 * outcomes such as a ray missing every primitive or total internal
 * reflection are results, not errors, and never show up here.
 */

/**
 * Error type discriminator for domain errors.
 * Used in discriminated unions for exhaustive error handling.
 */
export type DomainErrorType =
  | 'VALIDATION_ERROR'
  | 'GEOMETRY_ERROR'
  | 'RENDER_ABORTED';

/**
 * Base class for domain-specific errors.
 * Provides common structure and serialization for all domain errors.
 */
export abstract class DomainError extends Error {
  abstract readonly type: DomainErrorType;

  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for JSON output
   */
  toJSON(): { type: DomainErrorType; message: string; context?: Record<string, unknown> } {
    return {
      type: this.type,
      message: this.message,
      ...(this.context && { context: this.context }),
    };
  }
}

/**
 * Validation error for scene descriptions and render options.
 *
 * Use when:
 * - A scene file fails schema validation
 * - A material references a texture or name that does not exist
 * - A numeric option is out of range
 *
 * @example
 * throw new ValidationError('Unknown material "gold"', 'primitives.0.material');
 * throw ValidationError.outOfRange('width', { min: 1, value: 0 });
 */
export class ValidationError extends DomainError {
  readonly type = 'VALIDATION_ERROR' as const;

  constructor(
    message: string,
    public readonly field?: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, ...(field && { field }) });
  }

  /**
   * Create a ValidationError for a required field
   */
  static required(field: string): ValidationError {
    return new ValidationError(`${field} is required`, field);
  }

  /**
   * Create a ValidationError for an invalid format
   */
  static invalidFormat(field: string, expectedFormat?: string): ValidationError {
    const message = expectedFormat
      ? `Invalid ${field} format. Expected: ${expectedFormat}`
      : `Invalid ${field} format`;
    return new ValidationError(message, field, { expectedFormat });
  }

  /**
   * Create a ValidationError for a value out of range
   */
  static outOfRange(field: string, options: { min?: number; max?: number; value?: number }): ValidationError {
    const { min, max, value } = options;
    let message = `${field} is out of range`;
    if (min !== undefined && max !== undefined) {
      message = `${field} must be between ${min} and ${max}`;
    } else if (min !== undefined) {
      message = `${field} must be at least ${min}`;
    } else if (max !== undefined) {
      message = `${field} must be at most ${max}`;
    }
    return new ValidationError(message, field, { min, max, value });
  }
}

/**
 * Raised when a direction that must be normalized has no length.
 *
 * Directions are a caller precondition: the renderer refuses them at the
 * construction site instead of letting NaN spread through a frame.
 */
export class DegenerateVectorError extends DomainError {
  readonly type = 'GEOMETRY_ERROR' as const;

  constructor(
    public readonly vector: { x: number; y: number; z: number },
    operation: string = 'normalize'
  ) {
    super(`Cannot ${operation} a zero-length vector (${vector.x}, ${vector.y}, ${vector.z})`, {
      operation,
      vector: { x: vector.x, y: vector.y, z: vector.z },
    });
  }
}

/**
 * Raised by the frame driver when its abort signal fires between rows.
 */
export class RenderAbortedError extends DomainError {
  readonly type = 'RENDER_ABORTED' as const;

  constructor(
    public readonly completedRows: number,
    public readonly totalRows: number
  ) {
    super(`Render aborted after ${completedRows} of ${totalRows} rows`, { completedRows, totalRows });
  }
}

/**
 * Type guard for ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Type guard for DegenerateVectorError
 */
export function isDegenerateVectorError(error: unknown): error is DegenerateVectorError {
  return error instanceof DegenerateVectorError;
}

/**
 * Type guard for RenderAbortedError
 */
export function isRenderAbortedError(error: unknown): error is RenderAbortedError {
  return error instanceof RenderAbortedError;
}

/**
 * Type guard for any DomainError
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

/**
 * Union of all domain error types, for exhaustive handling.
 */
export type AnyDomainError = ValidationError | DegenerateVectorError | RenderAbortedError;
