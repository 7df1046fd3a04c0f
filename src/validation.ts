/**
 * Validation Schemas
 *
 * Re-export schemas from main schemas file.
 */

export {
  RigMotionConfigSchema,
  GltfImportOptionsSchema,
  LogLevelSchema,
  ValueKindSchema,
  InterpolationNameSchema,
  NameSchema,
  DurationSchema,
  Matrix4Schema,
  KeyframeDocumentSchema,
  ChannelDocumentSchema,
  LayerDocumentSchema,
  MarkerDocumentSchema,
  TimelineDocumentSchema,
  BoneDocumentSchema,
  BoneNodeDocumentSchema,
  SkeletonDocumentSchema,
} from './schemas';
