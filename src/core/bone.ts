/**
 * Bone
 *
 * A node of a skeleton. The identifier ties the bone to animation layers and
 * the index selects its slot in a deformer; a bone without either is a
 * static pivot that only passes its parent's transform on.
 */

import { mat4, ReadonlyMat4 } from 'gl-matrix';
import { SKELETON } from '../constants/skeleton';
import { InvalidArgumentError } from '../errors';
import { IDENTITY_MATRIX, isFlatMatrix } from '../utils/matrix-utils';

export class Bone {
  static readonly empty = new Bone(null, null, IDENTITY_MATRIX);

  readonly identifier: string | null;
  readonly index: number | null;
  /** Inverse bind transform applied after the bone's animated transform. */
  readonly offset: ReadonlyMat4;

  constructor(identifier: string | null, index: number | null = null, offset: ReadonlyMat4 = IDENTITY_MATRIX) {
    if (identifier !== null && identifier.trim().length === 0) {
      throw new InvalidArgumentError('Bone identifier must be null or a non-empty string', 'identifier');
    }
    if (index !== null && (!Number.isInteger(index) || index < 0 || index > SKELETON.MAXIMUM_BONE_INDEX)) {
      throw new InvalidArgumentError(
        `Bone index must be an integer between 0 and ${SKELETON.MAXIMUM_BONE_INDEX}`,
        'index',
        { index }
      );
    }
    if (!isFlatMatrix(offset)) {
      throw new InvalidArgumentError('Bone offset must be a 4x4 matrix', 'offset', { identifier });
    }

    this.identifier = identifier;
    this.index = index;
    this.offset = mat4.clone(offset);
  }

  get hasIdentifier(): boolean {
    return this.identifier !== null;
  }

  get hasIndex(): boolean {
    return this.index !== null;
  }

  equals(other: Bone): boolean {
    return this.identifier === other.identifier
      && this.index === other.index
      && mat4.exactEquals(this.offset, other.offset);
  }

  toString(): string {
    const name = this.identifier ?? '(unnamed)';
    return this.index !== null ? `${name} #${this.index}` : name;
  }
}
