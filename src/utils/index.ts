/**
 * Utility exports
 */

export * from './logger';
export * from './math-utils';
export * from './matrix-utils';
export * from './name-utils';
