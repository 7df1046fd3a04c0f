/**
 * glTF Constants
 *
 * Mappings from glTF animation data to timeline channels.
 */

import { CHANNEL_NAMES } from './animation';

export const GLTF = {
  /**
   * Name prefixes for glTF objects without a name.
   */
  UNNAMED_NODE_PREFIX: 'node',
  UNNAMED_ANIMATION_PREFIX: 'animation',
  UNNAMED_SKIN_PREFIX: 'skin',

  /**
   * Markers added to every imported timeline at the bounds of its samplers.
   */
  START_MARKER: 'start',
  END_MARKER: 'end',

  /**
   * Number of elements per keyframe in a CUBICSPLINE sampler output
   * (in-tangent, value, out-tangent) and the index of the value.
   */
  CUBIC_SPLINE_STRIDE: 3,
  CUBIC_SPLINE_VALUE_OFFSET: 1,
} as const;

/**
 * glTF target paths and the channel each one becomes.
 */
export const GLTF_TARGET_CHANNELS = {
  translation: { name: CHANNEL_NAMES.POSITION, kind: 'vec3' },
  rotation: { name: CHANNEL_NAMES.ROTATION, kind: 'quat' },
  scale: { name: CHANNEL_NAMES.SCALE, kind: 'vec3' },
} as const;
