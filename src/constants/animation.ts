/**
 * Animation Constants
 *
 * Timing and naming constants shared by timelines and players.
 */
export const ANIMATION = {
  /**
   * Minimum cursor movement, in seconds, before a player layer samples its
   * channel again. Reads within this window return the cached value.
   */
  SAMPLE_THRESHOLD: 0.01,

  /**
   * Separator between a bone identifier and a component name when a bone's
   * position, scale and rotation live in separate layers ("arm_rotation").
   */
  COMPONENT_SEPARATOR: '_',
} as const;

/**
 * Well-known channel names of a bone transformation.
 */
export const CHANNEL_NAMES = {
  POSITION: 'position',
  SCALE: 'scale',
  ROTATION: 'rotation',
  TRANSFORMATION: 'transformation',
} as const;

export type TransformComponent =
  | typeof CHANNEL_NAMES.POSITION
  | typeof CHANNEL_NAMES.SCALE
  | typeof CHANNEL_NAMES.ROTATION;
