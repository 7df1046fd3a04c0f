/**
 * Deformer Animation Player
 *
 * Drives a skeleton from a timeline. Two players run over the same timeline:
 * the primary one and an overlay whose output is blended in by
 * `overlayInfluence`. Every bone with an identifier is bound to the layers
 * named after it once, at construction; timelines are immutable, so the
 * bindings never go stale.
 *
 * A bone is bound to either
 *  - a 4x4 matrix channel in the layer named like the bone, or
 *  - any of position, scale and rotation, each from the layer
 *    `<bone>_<component>` or from the channel `<component>` of the bone's
 *    layer.
 */

import { mat4, quat, vec3, ReadonlyMat4, ReadonlyQuat, ReadonlyVec3 } from 'gl-matrix';
import { CHANNEL_NAMES, TransformComponent } from '../constants/animation';
import { ERROR_MESSAGES } from '../constants/errors';
import { InvalidArgumentError } from '../errors';
import { logger as defaultLogger, Logger } from '../utils/logger';
import { saturate } from '../utils/math-utils';
import { createTransformation, IDENTITY_MATRIX, lerpMatrix } from '../utils/matrix-utils';
import { getComponentLayerName } from '../utils/name-utils';
import { Animated, AnimationPlayer, AnimationPlayerOptions } from './animation-player';
import type { AnimationPlayerLayer } from './animation-player-layer';
import type { Bone } from './bone';
import { Deformer } from './deformer';
import type { Hierarchy, NodeHandle } from './hierarchy';
import type { Value, ValueKind } from './interpolation';
import type { Duration } from './keyframe';
import type { Skeleton } from './skeleton';
import type { Timeline } from './timeline';

const DEFAULT_POSITION: ReadonlyVec3 = vec3.fromValues(0, 0, 0);
const DEFAULT_SCALE: ReadonlyVec3 = vec3.fromValues(1, 1, 1);
const DEFAULT_ROTATION: ReadonlyQuat = quat.create();

/**
 * The same channel in the primary and the overlay player.
 */
export interface LayerPair<K extends ValueKind> {
  primary: AnimationPlayerLayer<K>;
  overlay: AnimationPlayerLayer<K>;
}

/**
 * Animation bindings of one bone.
 */
export interface BoneAttachment {
  readonly bone: Bone;
  readonly transformation?: LayerPair<'mat4'>;
  readonly position?: LayerPair<'vec3'>;
  readonly scale?: LayerPair<'vec3'>;
  readonly rotation?: LayerPair<'quat'>;
}

export interface DeformerAnimationPlayerOptions extends AnimationPlayerOptions {
  /** Initial overlay influence, clamped to [0, 1]. */
  overlayInfluence?: number;
}

export class DeformerAnimationPlayer implements Animated {
  readonly animationPlayer: AnimationPlayer;
  readonly overlayAnimationPlayer: AnimationPlayer;
  readonly skeleton: Skeleton;

  private influence = 0;
  private readonly attachments: Hierarchy<BoneAttachment>;
  private readonly deformerSize: number;
  private readonly logger: Logger;

  constructor(timeline: Timeline, skeleton: Skeleton, options: DeformerAnimationPlayerOptions = {}) {
    this.logger = options.logger ?? defaultLogger;
    this.animationPlayer = new AnimationPlayer(timeline, options);
    this.overlayAnimationPlayer = new AnimationPlayer(timeline, options);
    this.skeleton = skeleton;
    this.overlayInfluence = options.overlayInfluence ?? 0;

    let attachedBones = 0;
    this.attachments = skeleton.convert(bone => {
      const attachment = this.attach(bone);
      if (hasBindings(attachment)) attachedBones++;
      return attachment;
    });
    this.deformerSize = skeleton.highestBoneIndex + 1;

    this.logger.info('Skeleton attached to timeline', {
      operation: 'attach',
      bones: skeleton.size,
      attachedBones,
      deformerSize: this.deformerSize,
    });
  }

  /**
   * Weight of the overlay player's transforms, clamped to [0, 1] on write.
   *
   * @throws InvalidArgumentError for NaN or infinite values
   */
  get overlayInfluence(): number {
    return this.influence;
  }

  set overlayInfluence(value: number) {
    if (!Number.isFinite(value)) {
      throw new InvalidArgumentError(ERROR_MESSAGES.INVALID_INFLUENCE, 'overlayInfluence', { value });
    }
    this.influence = saturate(value);
  }

  get isPlaying(): boolean {
    return this.animationPlayer.isPlaying || this.overlayAnimationPlayer.isPlaying;
  }

  /**
   * Advances both players by `delta` seconds.
   */
  update(delta: Duration): void {
    if (!Number.isFinite(delta) || delta < 0) {
      throw new InvalidArgumentError(ERROR_MESSAGES.NEGATIVE_DELTA, 'delta', { delta });
    }
    this.animationPlayer.update(delta);
    this.overlayAnimationPlayer.update(delta);
  }

  /**
   * Check if a bone with the given identifier received any animation layer
   */
  isAttached(boneIdentifier: string): boolean {
    for (const handle of this.attachments) {
      const attachment = this.attachments.getValue(handle);
      if (attachment.bone.identifier === boneIdentifier) return hasBindings(attachment);
    }
    return false;
  }

  /**
   * Bone matrices for the players' current positions.
   * Slots without a bone hold the identity matrix; when bones share an
   * index, the one visited last depth-first wins.
   */
  getCurrentDeformer(): Deformer {
    const matrices: ReadonlyMat4[] = new Array<ReadonlyMat4>(this.deformerSize).fill(IDENTITY_MATRIX);
    this.accumulate(this.attachments.root, IDENTITY_MATRIX, matrices);
    return Deformer.create(matrices, false);
  }

  private accumulate(handle: NodeHandle, parentTransform: ReadonlyMat4, matrices: ReadonlyMat4[]): void {
    const attachment = this.attachments.getValue(handle);
    const absolute = mat4.multiply(mat4.create(), parentTransform, this.getAnimatedTransform(attachment));

    const index = attachment.bone.index;
    if (index !== null) {
      matrices[index] = mat4.multiply(mat4.create(), absolute, attachment.bone.offset);
    }

    for (const child of this.attachments.getChildren(handle)) {
      this.accumulate(child, absolute, matrices);
    }
  }

  private getAnimatedTransform(attachment: BoneAttachment): ReadonlyMat4 {
    if (!hasBindings(attachment)) return IDENTITY_MATRIX;

    const primary = this.getRelativeTransform(attachment, 'primary');
    const overlay = this.getRelativeTransform(attachment, 'overlay');
    return lerpMatrix(mat4.create(), primary, overlay, this.influence);
  }

  private getRelativeTransform(attachment: BoneAttachment, player: keyof LayerPair<ValueKind>): ReadonlyMat4 {
    if (attachment.transformation !== undefined) {
      return attachment.transformation[player].currentValue;
    }
    return createTransformation(
      currentValue(attachment.position, player, DEFAULT_POSITION),
      currentValue(attachment.scale, player, DEFAULT_SCALE),
      currentValue(attachment.rotation, player, DEFAULT_ROTATION)
    );
  }

  private attach(bone: Bone): BoneAttachment {
    const identifier = bone.identifier;
    if (identifier === null) return { bone };

    const transformation = this.resolvePair(identifier, 'mat4');
    if (transformation !== undefined) {
      this.logger.debug(`Bone "${identifier}" bound to a transformation layer`, { boneIdentifier: identifier });
      return { bone, transformation };
    }

    const attachment: BoneAttachment = {
      bone,
      position: this.resolveComponent(identifier, CHANNEL_NAMES.POSITION, 'vec3'),
      scale: this.resolveComponent(identifier, CHANNEL_NAMES.SCALE, 'vec3'),
      rotation: this.resolveComponent(identifier, CHANNEL_NAMES.ROTATION, 'quat'),
    };
    this.logger.debug(`Bone "${identifier}" resolved`, {
      boneIdentifier: identifier,
      position: attachment.position !== undefined,
      scale: attachment.scale !== undefined,
      rotation: attachment.rotation !== undefined,
    });
    return attachment;
  }

  private resolveComponent<K extends ValueKind>(
    identifier: string,
    component: TransformComponent,
    kind: K
  ): LayerPair<K> | undefined {
    return this.resolvePair(getComponentLayerName(identifier, component), kind)
      ?? this.resolvePair(identifier, kind, component);
  }

  private resolvePair<K extends ValueKind>(layerName: string, kind: K, channelName?: string): LayerPair<K> | undefined {
    const primary = this.animationPlayer.tryGetLayer(layerName, kind, channelName);
    const overlay = this.overlayAnimationPlayer.tryGetLayer(layerName, kind, channelName);
    if (primary === undefined || overlay === undefined) return undefined;
    return { primary, overlay };
  }
}

function hasBindings(attachment: BoneAttachment): boolean {
  return attachment.transformation !== undefined
    || attachment.position !== undefined
    || attachment.scale !== undefined
    || attachment.rotation !== undefined;
}

function currentValue<K extends ValueKind>(
  pair: LayerPair<K> | undefined,
  player: keyof LayerPair<K>,
  fallback: Value<K>
): Value<K> {
  return pair === undefined ? fallback : pair[player].currentValue;
}
