/**
 * Public Types
 *
 * Type-only exports of the core model and the schema-inferred documents.
 */

export type { ValueKind, ValueKindMap, Value, Interpolator } from './core/interpolation';
export type { Duration } from './core/keyframe';
export type { Animated, AnimationPlayerOptions } from './core/animation-player';
export type { PlaybackCursor } from './core/animation-player-layer';
export type { NodeHandle, HierarchyVisitor } from './core/hierarchy';
export type {
  BoneAttachment,
  DeformerAnimationPlayerOptions,
  LayerPair,
} from './core/deformer-animation-player';
export type { GltfImportResult } from './converters/gltf';
export type { LoggerContext, LoggerOptions } from './utils/logger';
export type {
  RigMotionConfig,
  RigMotionConfigInput,
  GltfImportOptions,
  GltfImportOptionsInput,
  KeyframeDocument,
  ChannelDocument,
  LayerDocument,
  MarkerDocument,
  TimelineDocument,
  BoneDocument,
  BoneNodeDocument,
  SkeletonDocument,
} from './schemas';
