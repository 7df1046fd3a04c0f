/**
 * glTF Animation Importer
 *
 * Turns each glTF animation into a timeline with one layer per animated
 * node. Translation, rotation and scale samplers become the position,
 * rotation and scale channels of that layer.
 */

import { Accessor, AnimationSampler, Document, Node } from '@gltf-transform/core';
import { CHANNEL_NAMES, TransformComponent } from '../../constants/animation';
import { GLTF, GLTF_TARGET_CHANNELS } from '../../constants/gltf';
import { ChannelIdentifier } from '../../core/channel-identifier';
import { getInterpolator, InterpolationMethod, ValueKind } from '../../core/interpolation';
import { Keyframe } from '../../core/keyframe';
import { Marker } from '../../core/marker';
import { Timeline } from '../../core/timeline';
import { TimelineChannel } from '../../core/timeline-channel';
import { TimelineLayer } from '../../core/timeline-layer';
import type { GltfImportOptions } from '../../schemas';
import { Logger } from '../../utils/logger';
import { generateFallbackName, makeUniqueName } from '../../utils/name-utils';
import { getNodeName } from './node-names';

type GltfInterpolation = ReturnType<AnimationSampler['getInterpolation']>;

const INTERPOLATION_METHODS: Record<GltfInterpolation, InterpolationMethod> = {
  STEP: InterpolationMethod.None,
  LINEAR: InterpolationMethod.Linear,
  CUBICSPLINE: InterpolationMethod.Cubic,
};

/**
 * Reads the keyframes of one sampler.
 * CUBICSPLINE outputs hold (in-tangent, value, out-tangent) per keyframe;
 * only the value is kept.
 */
function readKeyframes<K extends ValueKind>(
  kind: K,
  input: Accessor,
  output: Accessor,
  interpolation: GltfInterpolation
): Keyframe<K>[] | undefined {
  const interpolator = getInterpolator(kind);
  const count = input.getCount();
  const stride = interpolation === 'CUBICSPLINE' ? GLTF.CUBIC_SPLINE_STRIDE : 1;
  const offset = interpolation === 'CUBICSPLINE' ? GLTF.CUBIC_SPLINE_VALUE_OFFSET : 0;

  if (output.getElementSize() !== interpolator.size || output.getCount() < count * stride) {
    return undefined;
  }

  const keyframes: Keyframe<K>[] = [];
  for (let i = 0; i < count; i++) {
    const time = input.getScalar(i);
    const components = output.getElement(i * stride + offset, []);
    keyframes.push(new Keyframe<K>(time, interpolator.fromComponents(components)));
  }
  return keyframes;
}

/**
 * A single held keyframe with the node's rest value for `component`.
 */
function restPoseChannel(node: Node, component: TransformComponent, position: number): TimelineChannel {
  switch (component) {
    case CHANNEL_NAMES.POSITION:
      return new TimelineChannel(ChannelIdentifier.position, InterpolationMethod.None, [
        new Keyframe<'vec3'>(position, node.getTranslation()),
      ]);
    case CHANNEL_NAMES.SCALE:
      return new TimelineChannel(ChannelIdentifier.scale, InterpolationMethod.None, [
        new Keyframe<'vec3'>(position, node.getScale()),
      ]);
    case CHANNEL_NAMES.ROTATION:
      return new TimelineChannel(ChannelIdentifier.rotation, InterpolationMethod.None, [
        new Keyframe<'quat'>(position, node.getRotation()),
      ]);
  }
}

const TRANSFORM_COMPONENTS: readonly TransformComponent[] = [
  CHANNEL_NAMES.POSITION,
  CHANNEL_NAMES.ROTATION,
  CHANNEL_NAMES.SCALE,
];

/**
 * Import all animations of a document as timelines keyed by animation name.
 *
 * @param nodeNames - Unique node names; layers are named after their node
 */
export function importGltfAnimations(
  document: Document,
  nodeNames: ReadonlyMap<Node, string>,
  options: GltfImportOptions,
  logger: Logger
): Map<string, Timeline> {
  const root = document.getRoot();
  const animations = root.listAnimations();
  const timelines = new Map<string, Timeline>();

  if (animations.length === 0) {
    logger.info('No animations found in glTF document');
    return timelines;
  }

  const joints = new Set<Node>();
  for (const skin of root.listSkins()) {
    skin.listJoints().forEach(joint => joints.add(joint));
  }

  const takenNames = new Set<string>();
  animations.forEach((animation, animationIndex) => {
    const animationName = makeUniqueName(
      animation.getName().trim() || generateFallbackName(GLTF.UNNAMED_ANIMATION_PREFIX, animationIndex),
      takenNames
    );
    const channelsByNode = new Map<Node, TimelineChannel[]>();
    let start = Number.POSITIVE_INFINITY;
    let end = Number.NEGATIVE_INFINITY;

    for (const channel of animation.listChannels()) {
      const targetPath = channel.getTargetPath();
      const targetNode = channel.getTargetNode();

      if (targetPath !== 'translation' && targetPath !== 'rotation' && targetPath !== 'scale') {
        logger.warn('Skipping animation channel with unsupported target path', { animationName, targetPath });
        continue;
      }
      if (!targetNode) {
        logger.warn('Channel has no target node', { animationName, targetPath });
        continue;
      }

      const nodeName = getNodeName(nodeNames, targetNode);
      const sampler = channel.getSampler();
      const input = sampler?.getInput();
      const output = sampler?.getOutput();
      if (!sampler || !input || !output) {
        logger.warn('Channel sampler missing input or output', { animationName, targetNode: nodeName, targetPath });
        continue;
      }

      const target = GLTF_TARGET_CHANNELS[targetPath];
      const interpolation = sampler.getInterpolation();
      const keyframes = readKeyframes(target.kind, input, output, interpolation);
      if (keyframes === undefined) {
        logger.warn('Sampler output does not match its input', {
          animationName,
          targetNode: nodeName,
          targetPath,
          inputCount: input.getCount(),
          outputCount: output.getCount(),
          elementSize: output.getElementSize(),
        });
        continue;
      }

      const nodeChannels = channelsByNode.get(targetNode) ?? [];
      if (nodeChannels.some(existing => existing.name === target.name)) {
        logger.warn('Skipping second channel for the same node property', { animationName, targetNode: nodeName, targetPath });
        continue;
      }

      for (const keyframe of keyframes) {
        start = Math.min(start, keyframe.position);
        end = Math.max(end, keyframe.position);
      }

      nodeChannels.push(new TimelineChannel(
        new ChannelIdentifier(target.name, target.kind),
        INTERPOLATION_METHODS[interpolation],
        keyframes
      ));
      channelsByNode.set(targetNode, nodeChannels);
    }

    if (options.bakeRestPose) {
      // Rest keys sit at the first sample so they leave the range untouched
      const restPosition = Number.isFinite(start) ? start : 0;
      for (const joint of joints) {
        if (!channelsByNode.has(joint)) channelsByNode.set(joint, []);
      }
      for (const [node, nodeChannels] of channelsByNode) {
        for (const component of TRANSFORM_COMPONENTS) {
          if (!nodeChannels.some(channel => channel.name === component)) {
            nodeChannels.push(restPoseChannel(node, component, restPosition));
          }
        }
      }
    }

    const layers = Array.from(channelsByNode, ([node, nodeChannels]) =>
      new TimelineLayer(getNodeName(nodeNames, node), nodeChannels)
    );
    const markers = Number.isFinite(start)
      ? [new Marker(GLTF.START_MARKER, start), new Marker(GLTF.END_MARKER, end)]
      : [];
    const timeline = new Timeline(layers, markers);
    timelines.set(animationName, timeline);

    logger.info(`Imported animation "${animationName}"`, {
      animationName,
      layers: layers.length,
      start: timeline.start,
      end: timeline.end,
    });
  });

  return timelines;
}
