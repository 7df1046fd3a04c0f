/**
 * Matrix Utilities
 *
 * Builds and blends 4x4 transformation matrices.
 * gl-matrix stores matrices column-major and multiplies column vectors, so a
 * child transform is applied as parent * child.
 */

import { mat4, ReadonlyMat4, ReadonlyQuat, ReadonlyVec3 } from 'gl-matrix';
import { SKELETON } from '../constants/skeleton';
import { lerp } from './math-utils';

/**
 * Identity matrix shared as a read-only default.
 * Never pass it as the output of a gl-matrix operation.
 */
export const IDENTITY_MATRIX: ReadonlyMat4 = mat4.create();

/**
 * Builds a transformation from translation, scale and rotation.
 * Scale is applied first, then rotation, then translation.
 */
export function createTransformation(
  position: ReadonlyVec3,
  scale: ReadonlyVec3,
  rotation: ReadonlyQuat
): mat4 {
  return mat4.fromRotationTranslationScale(mat4.create(), rotation, position, scale);
}

/**
 * Component-wise blend between two matrices.
 * A factor of 0 returns a copy of `from`, 1 a copy of `to`.
 */
export function lerpMatrix(out: mat4, from: ReadonlyMat4, to: ReadonlyMat4, t: number): mat4 {
  for (let i = 0; i < SKELETON.MATRIX_COMPONENTS; i++) {
    out[i] = lerp(from[i], to[i], t);
  }
  return out;
}

/**
 * Check if a value is a flat 4x4 matrix (16 finite numbers)
 */
export function isFlatMatrix(value: unknown): value is ReadonlyMat4 {
  if (!Array.isArray(value) && !(value instanceof Float32Array) && !(value instanceof Float64Array)) {
    return false;
  }
  if (value.length !== SKELETON.MATRIX_COMPONENTS) return false;
  for (let i = 0; i < value.length; i++) {
    const component: unknown = value[i];
    if (typeof component !== 'number' || !Number.isFinite(component)) return false;
  }
  return true;
}
