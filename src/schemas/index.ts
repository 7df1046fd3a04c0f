/**
 * Zod Schemas for RigMotion
 *
 * All validation schemas using Zod for type safety and validation.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG } from '../constants/config';
import { LogLevelSchema } from './base-schemas';

/**
 * RigMotion Configuration Schema
 */
export const RigMotionConfigSchema = z.object({
  debug: z.boolean().optional().default(DEFAULT_CONFIG.DEBUG),
  logLevel: LogLevelSchema.optional().default(DEFAULT_CONFIG.LOG_LEVEL),
  sampleThreshold: z.number().finite().nonnegative().optional().default(DEFAULT_CONFIG.SAMPLE_THRESHOLD),
  loop: z.boolean().optional().default(DEFAULT_CONFIG.LOOP),
  overlayInfluence: z.number().min(0).max(1).optional().default(DEFAULT_CONFIG.OVERLAY_INFLUENCE),
  bakeRestPose: z.boolean().optional().default(DEFAULT_CONFIG.BAKE_REST_POSE),
});

/**
 * glTF Import Options Schema
 */
export const GltfImportOptionsSchema = z.object({
  bakeRestPose: z.boolean().optional().default(DEFAULT_CONFIG.BAKE_REST_POSE),
});

/**
 * Type exports for TypeScript inference
 */
export type RigMotionConfig = z.infer<typeof RigMotionConfigSchema>;
export type RigMotionConfigInput = z.input<typeof RigMotionConfigSchema>;
export type GltfImportOptions = z.infer<typeof GltfImportOptionsSchema>;
export type GltfImportOptionsInput = z.input<typeof GltfImportOptionsSchema>;

// Re-export base schemas
export {
  LogLevelSchema,
  ValueKindSchema,
  InterpolationNameSchema,
  NameSchema,
  DurationSchema,
  Matrix4Schema,
} from './base-schemas';

// Re-export document schemas
export {
  KeyframeValueSchema,
  KeyframeDocumentSchema,
  ChannelDocumentSchema,
  LayerDocumentSchema,
  MarkerDocumentSchema,
  TimelineDocumentSchema,
  type KeyframeDocument,
  type ChannelDocument,
  type LayerDocument,
  type MarkerDocument,
  type TimelineDocument,
} from './timeline-schemas';

export {
  BoneDocumentSchema,
  BoneNodeDocumentSchema,
  SkeletonDocumentSchema,
  type BoneDocument,
  type BoneNodeDocument,
  type SkeletonDocument,
} from './skeleton-schemas';
