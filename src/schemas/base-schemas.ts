/**
 * Base Schemas
 *
 * Common validation schemas shared by configuration and documents.
 */

import { z } from 'zod';

/**
 * Log Level Schema
 */
export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/**
 * Value Kind Schema
 */
export const ValueKindSchema = z.enum(['scalar', 'vec2', 'vec3', 'quat', 'mat4']);

/**
 * Interpolation Method Schema (serialized names)
 */
export const InterpolationNameSchema = z.enum(['none', 'linear', 'cubic']);

/**
 * Non-empty Name Schema
 */
export const NameSchema = z.string().refine(name => name.trim().length > 0, 'Name cannot be empty');

/**
 * Time in seconds
 */
export const DurationSchema = z.number().finite();

/**
 * Flat 4x4 matrix, column-major
 */
export const Matrix4Schema = z.array(z.number().finite()).length(16, 'A matrix needs 16 components');
