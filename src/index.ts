/**
 * RigMotion
 *
 * Keyframe timelines, playback and skeletal deformation.
 *
 * @example
 * ```typescript
 * import { defineConfig } from 'rigmotion';
 *
 * const rig = defineConfig({ loop: true, overlayInfluence: 0.25 });
 *
 * const timeline = rig.loadTimeline(timelineJson);
 * const skeleton = rig.loadSkeleton(skeletonJson);
 * const player = rig.createDeformerPlayer(timeline, skeleton);
 *
 * player.animationPlayer.play();
 * player.update(1 / 60);
 * const matrices = player.getCurrentDeformer().toFloat32Array();
 * ```
 */

import { Document } from '@gltf-transform/core';
import { ZodError } from 'zod';
import { importGltf, GltfImportResult } from './converters/gltf';
import { deserializeSkeleton, serializeSkeleton } from './converters/skeleton-serializer';
import { deserializeTimeline, serializeTimeline } from './converters/timeline-serializer';
import { AnimationPlayer } from './core/animation-player';
import { DeformerAnimationPlayer } from './core/deformer-animation-player';
import type { Skeleton } from './core/skeleton';
import type { Timeline } from './core/timeline';
import { ERROR_MESSAGES } from './constants/errors';
import { AnimationErrorFactory } from './errors';
import {
  RigMotionConfigSchema,
  type RigMotionConfig,
  type RigMotionConfigInput,
  type SkeletonDocument,
  type TimelineDocument,
} from './schemas';
import { createLogger, Logger, LogLevel } from './utils/logger';

/**
 * Main framework class
 */
export class RigMotion {
  private config: RigMotionConfig;
  readonly logger: Logger;

  constructor(config: RigMotionConfigInput = {}) {
    try {
      this.config = RigMotionConfigSchema.parse(config);
    } catch (error) {
      if (error instanceof ZodError) {
        throw AnimationErrorFactory.configError(
          ERROR_MESSAGES.INVALID_CONFIG,
          'RigMotionConfig',
          { zodError: error }
        );
      }
      throw error;
    }

    const level = this.config.debug ? LogLevel.DEBUG : toLogLevel(this.config.logLevel);
    this.logger = createLogger({ level, prefix: 'RigMotion' });
    this.logger.debug('Configuration loaded', { operation: 'configure', ...this.config });
  }

  /**
   * Player over a timeline using the configured loop flag and sample threshold
   */
  createPlayer(timeline: Timeline): AnimationPlayer {
    return new AnimationPlayer(timeline, {
      loop: this.config.loop,
      sampleThreshold: this.config.sampleThreshold,
      logger: this.logger,
    });
  }

  createDeformerPlayer(timeline: Timeline, skeleton: Skeleton): DeformerAnimationPlayer {
    return new DeformerAnimationPlayer(timeline, skeleton, {
      loop: this.config.loop,
      sampleThreshold: this.config.sampleThreshold,
      overlayInfluence: this.config.overlayInfluence,
      logger: this.logger,
    });
  }

  /**
   * Build a timeline from a parsed JSON document
   *
   * @throws SchemaValidationError when the document is malformed
   */
  loadTimeline(document: unknown): Timeline {
    return deserializeTimeline(document, this.logger);
  }

  saveTimeline(timeline: Timeline): TimelineDocument {
    return serializeTimeline(timeline);
  }

  /**
   * Build a skeleton from a parsed JSON document
   *
   * @throws SchemaValidationError when the document is malformed
   */
  loadSkeleton(document: unknown): Skeleton {
    return deserializeSkeleton(document, this.logger);
  }

  saveSkeleton(skeleton: Skeleton): SkeletonDocument {
    return serializeSkeleton(skeleton);
  }

  /**
   * Timelines and skeletons of a glTF document read with `@gltf-transform/core`
   */
  importGltf(document: Document): GltfImportResult {
    return importGltf(document, { bakeRestPose: this.config.bakeRestPose }, this.logger);
  }

  /**
   * Get current configuration
   */
  getConfig(): RigMotionConfig {
    return { ...this.config };
  }
}

function toLogLevel(level: RigMotionConfig['logLevel']): LogLevel {
  switch (level) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    case 'silent':
      return LogLevel.SILENT;
  }
}

/**
 * Create framework instance with configuration
 *
 * @example
 * ```typescript
 * const rig = defineConfig({ logLevel: 'warn' });
 * ```
 */
export function defineConfig(config: RigMotionConfigInput = {}): RigMotion {
  return new RigMotion(config);
}

/**
 * TypeScript type exports
 */
export type * from './types';

/**
 * Core exports
 */
export { InterpolationMethod, INTERPOLATORS, VALUE_KINDS, getInterpolator, isValueKind } from './core/interpolation';
export { Keyframe } from './core/keyframe';
export { ChannelIdentifier } from './core/channel-identifier';
export { TimelineChannel, isChannelOfKind } from './core/timeline-channel';
export { TimelineLayer } from './core/timeline-layer';
export { Marker } from './core/marker';
export { Timeline } from './core/timeline';
export { AnimationPlayer } from './core/animation-player';
export { AnimationPlayerLayer, isPlayerLayerOfKind } from './core/animation-player-layer';
export { Hierarchy, HierarchyArena, ROOT_HANDLE } from './core/hierarchy';
export { Bone } from './core/bone';
export { Skeleton } from './core/skeleton';
export { Deformer } from './core/deformer';
export { DeformerAnimationPlayer } from './core/deformer-animation-player';

/**
 * Converter exports
 */
export { serializeTimeline, deserializeTimeline } from './converters/timeline-serializer';
export { serializeSkeleton, deserializeSkeleton } from './converters/skeleton-serializer';
export { importGltf, importGltfAnimations, importGltfSkeletons } from './converters/gltf';

export * from './constants';
export * from './errors';
export * from './validation';
export * from './utils';
