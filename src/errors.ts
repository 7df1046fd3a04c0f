/**
 * Error Classes for Animation Operations
 *
 * Tagged union errors raised synchronously by timelines, players and skeletons.
 */

import { ZodError, ZodIssue } from 'zod';
import { ERROR_CODES, ErrorCode } from './constants/errors';

/**
 * Base Animation Error Class
 *
 * Base error class for all animation operations with tagged union pattern.
 */
export abstract class BaseAnimationError extends Error {
  abstract readonly _tag: string;
  abstract readonly code: ErrorCode;
  readonly timestamp: Date;
  readonly context?: Record<string, unknown>;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context;
  }

  /**
   * Get error details for logging
   */
  getDetails(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      tag: this._tag,
      timestamp: this.timestamp,
      context: this.context,
    };
  }
}

/**
 * Invalid Argument Error
 *
 * Raised for negative, non-finite or out-of-range inputs.
 */
export class InvalidArgumentError extends BaseAnimationError {
  readonly _tag = 'InvalidArgumentError' as const;
  readonly code = ERROR_CODES.INVALID_ARGUMENT;
  readonly argument: string;

  constructor(message: string, argument: string, context?: Record<string, unknown>) {
    super(message, { argument, ...context });
    this.argument = argument;
  }
}

/**
 * Not Found Error
 *
 * Raised when a layer, channel, marker or tree node does not exist.
 */
export class NotFoundError extends BaseAnimationError {
  readonly _tag = 'NotFoundError' as const;
  readonly code = ERROR_CODES.NOT_FOUND;
  readonly entity: string;
  readonly key: string;

  constructor(entity: string, key: string, context?: Record<string, unknown>) {
    super(`No ${entity} with the identifier "${key}" was found`, { entity, key, ...context });
    this.entity = entity;
    this.key = key;
  }
}

/**
 * Type Mismatch Error
 *
 * Raised when the requested value kind differs from the stored one.
 */
export class TypeMismatchError extends BaseAnimationError {
  readonly _tag = 'TypeMismatchError' as const;
  readonly code = ERROR_CODES.TYPE_MISMATCH;
  readonly expected: string;
  readonly actual: string;

  constructor(message: string, expected: string, actual: string, context?: Record<string, unknown>) {
    super(message, { expected, actual, ...context });
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Duplicate Key Error
 *
 * Raised when two channels, layers or markers share a name.
 */
export class DuplicateKeyError extends BaseAnimationError {
  readonly _tag = 'DuplicateKeyError' as const;
  readonly code = ERROR_CODES.DUPLICATE_KEY;
  readonly key: string;

  constructor(message: string, key: string, context?: Record<string, unknown>) {
    super(message, { key, ...context });
    this.key = key;
  }
}

/**
 * Duplicate Keyframe Error
 *
 * Raised when two keyframes of one channel share a position.
 */
export class DuplicateKeyframeError extends DuplicateKeyError {
  readonly position: number;

  constructor(channel: string, position: number) {
    super(`Channel "${channel}" has more than one keyframe at ${position}s`, channel, { position });
    this.position = position;
  }
}

/**
 * Capacity Exceeded Error
 */
export class CapacityExceededError extends BaseAnimationError {
  readonly _tag = 'CapacityExceededError' as const;
  readonly code = ERROR_CODES.CAPACITY_EXCEEDED;
  readonly capacity: number;

  constructor(message: string, capacity: number, context?: Record<string, unknown>) {
    super(message, { capacity, ...context });
    this.capacity = capacity;
  }
}

/**
 * Read-Only Violation Error
 *
 * Raised when a read-only hierarchy is structurally modified.
 */
export class ReadOnlyViolationError extends BaseAnimationError {
  readonly _tag = 'ReadOnlyViolationError' as const;
  readonly code = ERROR_CODES.READ_ONLY_VIOLATION;
  readonly operation: string;

  constructor(message: string, operation: string) {
    super(message, { operation });
    this.operation = operation;
  }
}

/**
 * Schema Validation Error
 *
 * Error for document validation failures with Zod integration.
 */
export class SchemaValidationError extends BaseAnimationError {
  readonly _tag = 'SchemaValidationError' as const;
  readonly code = ERROR_CODES.SCHEMA_VALIDATION_FAILED;
  readonly path: string;
  readonly zodError?: ZodError;

  constructor(message: string, path: string, zodError?: ZodError) {
    super(message, { path, zodError });
    this.path = path;
    this.zodError = zodError;
  }

  /**
   * Get Zod validation issues
   */
  getValidationIssues(): ZodIssue[] {
    return this.zodError?.issues || [];
  }

  /**
   * Get formatted validation errors
   */
  getFormattedErrors(): string[] {
    return this.zodError?.issues.map(issue =>
      `${issue.path.join('.')}: ${issue.message}`
    ) || [];
  }
}

/**
 * Configuration Error
 */
export class ConfigError extends BaseAnimationError {
  readonly _tag = 'ConfigError' as const;
  readonly code = ERROR_CODES.CONFIG_INVALID;
  readonly configKey: string;

  constructor(message: string, configKey: string, context?: Record<string, unknown>) {
    super(message, { configKey, ...context });
    this.configKey = configKey;
  }
}

/**
 * Import Error
 *
 * Error for glTF content that cannot become a timeline or skeleton.
 */
export class ImportError extends BaseAnimationError {
  readonly _tag = 'ImportError' as const;
  readonly code = ERROR_CODES.IMPORT_FAILED;
  readonly stage: string;

  constructor(message: string, stage: string, context?: Record<string, unknown>) {
    super(message, { stage, ...context });
    this.stage = stage;
  }
}

/**
 * Union type for all animation errors
 */
export type AnimationError =
  | InvalidArgumentError
  | NotFoundError
  | TypeMismatchError
  | DuplicateKeyError
  | CapacityExceededError
  | ReadOnlyViolationError
  | SchemaValidationError
  | ConfigError
  | ImportError;

/**
 * Narrow an unknown thrown value to an animation error
 */
export function isAnimationError(error: unknown): error is AnimationError {
  return error instanceof BaseAnimationError;
}

/**
 * Error factory functions
 */
export const AnimationErrorFactory = {
  /**
   * Create invalid argument error
   */
  invalidArgument(message: string, argument: string, context?: Record<string, unknown>): InvalidArgumentError {
    return new InvalidArgumentError(message, argument, context);
  },

  /**
   * Create not found error
   */
  notFound(entity: string, key: string, context?: Record<string, unknown>): NotFoundError {
    return new NotFoundError(entity, key, context);
  },

  /**
   * Create type mismatch error
   */
  typeMismatch(message: string, expected: string, actual: string, context?: Record<string, unknown>): TypeMismatchError {
    return new TypeMismatchError(message, expected, actual, context);
  },

  /**
   * Create duplicate key error
   */
  duplicateKey(message: string, key: string, context?: Record<string, unknown>): DuplicateKeyError {
    return new DuplicateKeyError(message, key, context);
  },

  /**
   * Create capacity exceeded error
   */
  capacityExceeded(message: string, capacity: number, context?: Record<string, unknown>): CapacityExceededError {
    return new CapacityExceededError(message, capacity, context);
  },

  /**
   * Create schema validation error
   */
  schemaError(message: string, path: string, zodError?: ZodError): SchemaValidationError {
    return new SchemaValidationError(message, path, zodError);
  },

  /**
   * Create configuration error
   */
  configError(message: string, configKey: string, context?: Record<string, unknown>): ConfigError {
    return new ConfigError(message, configKey, context);
  },

  /**
   * Create import error
   */
  importError(message: string, stage: string, context?: Record<string, unknown>): ImportError {
    return new ImportError(message, stage, context);
  },
};
