/**
 * Error Constants for RigMotion
 */

/**
 * Error Codes
 */
export const ERROR_CODES = {
  INVALID_ARGUMENT: 'ANIM_INVALID_ARGUMENT',
  NOT_FOUND: 'ANIM_NOT_FOUND',
  TYPE_MISMATCH: 'ANIM_TYPE_MISMATCH',
  DUPLICATE_KEY: 'ANIM_DUPLICATE_KEY',
  CAPACITY_EXCEEDED: 'ANIM_CAPACITY_EXCEEDED',
  READ_ONLY_VIOLATION: 'ANIM_READ_ONLY_VIOLATION',
  SCHEMA_VALIDATION_FAILED: 'ANIM_SCHEMA_VALIDATION_FAILED',
  CONFIG_INVALID: 'ANIM_CONFIG_INVALID',
  IMPORT_FAILED: 'ANIM_IMPORT_FAILED',
} as const;

/**
 * Error Messages
 */
export const ERROR_MESSAGES = {
  NEGATIVE_DELTA: 'Update delta must not be negative',
  INVALID_INFLUENCE: 'Overlay influence must be a finite number',
  NON_FINITE_VALUE: 'Value must be a finite number',
  EMPTY_NAME: 'Name must not be empty',
  UNKNOWN_INTERPOLATION: 'Unknown interpolation method',
  NEGATIVE_RANGE: 'Range maximum must not be negative',
  DEFORMER_TOO_LARGE: 'Deformer exceeds the maximum number of matrices',
  DEFORMER_NOT_FLAT: 'Deformer entries must be flat 4x4 matrices',
  READ_ONLY: 'Hierarchy is read-only',
  SCHEMA_VALIDATION_FAILED: 'Document validation failed',
  INVALID_CONFIG: 'Invalid configuration',
} as const;

export type ErrorCode = typeof ERROR_CODES[keyof typeof ERROR_CODES];
