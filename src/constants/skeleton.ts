/**
 * Skeleton Constants
 *
 * Limits and names for bone hierarchies and deformers.
 */

export const SKELETON = {
  /**
   * Maximum number of matrices in a deformer.
   * Shaders receive the deformer as a fixed-size uniform array, so the
   * highest usable bone index is one less than this.
   */
  MAXIMUM_DEFORMER_SIZE: 128,

  /**
   * Highest value a bone index can take (unsigned byte).
   */
  MAXIMUM_BONE_INDEX: 255,

  /**
   * Identifier of the synthetic root bone every skeleton starts with.
   */
  ROOT_BONE_NAME: '_root',

  /**
   * Number of components in a flat 4x4 matrix.
   */
  MATRIX_COMPONENTS: 16,
} as const;
