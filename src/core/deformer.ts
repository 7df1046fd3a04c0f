/**
 * Deformer
 *
 * A flat, read-only array of transformation matrices indexed by bone index,
 * consumed by mesh skinning.
 */

import { mat4, ReadonlyMat4 } from 'gl-matrix';
import { ERROR_MESSAGES } from '../constants/errors';
import { SKELETON } from '../constants/skeleton';
import { CapacityExceededError, InvalidArgumentError } from '../errors';
import { isFlatMatrix } from '../utils/matrix-utils';

export class Deformer implements Iterable<ReadonlyMat4> {
  static readonly MAXIMUM_SIZE = SKELETON.MAXIMUM_DEFORMER_SIZE;

  static readonly empty = new Deformer([]);

  private readonly matrices: readonly ReadonlyMat4[];

  private constructor(matrices: readonly ReadonlyMat4[]) {
    this.matrices = matrices;
  }

  /**
   * Creates a deformer from bone matrices.
   *
   * @param clone - Copy every matrix instead of keeping the caller's buffers
   * @throws CapacityExceededError when there are more than 128 matrices or an
   * entry is not a flat 4x4 matrix
   */
  static create(matrices: ArrayLike<ReadonlyMat4>, clone: boolean): Deformer {
    if (matrices.length > Deformer.MAXIMUM_SIZE) {
      throw new CapacityExceededError(
        `${ERROR_MESSAGES.DEFORMER_TOO_LARGE} (${matrices.length} > ${Deformer.MAXIMUM_SIZE})`,
        Deformer.MAXIMUM_SIZE,
        { length: matrices.length }
      );
    }

    const entries: ReadonlyMat4[] = [];
    for (let i = 0; i < matrices.length; i++) {
      const matrix: unknown = matrices[i];
      if (!isFlatMatrix(matrix)) {
        throw new CapacityExceededError(ERROR_MESSAGES.DEFORMER_NOT_FLAT, Deformer.MAXIMUM_SIZE, { index: i });
      }
      entries.push(clone ? mat4.clone(matrix) : matrix);
    }
    return new Deformer(entries);
  }

  get length(): number {
    return this.matrices.length;
  }

  get(index: number): ReadonlyMat4 {
    if (!Number.isInteger(index) || index < 0 || index >= this.matrices.length) {
      throw new InvalidArgumentError(`Deformer index ${index} is out of range`, 'index', { length: this.matrices.length });
    }
    return this.matrices[index];
  }

  /**
   * All matrices packed into one column-major buffer, 16 floats per bone
   */
  toFloat32Array(): Float32Array {
    const buffer = new Float32Array(this.matrices.length * SKELETON.MATRIX_COMPONENTS);
    this.matrices.forEach((matrix, index) => {
      buffer.set(matrix, index * SKELETON.MATRIX_COMPONENTS);
    });
    return buffer;
  }

  [Symbol.iterator](): Iterator<ReadonlyMat4> {
    return this.matrices[Symbol.iterator]();
  }
}
