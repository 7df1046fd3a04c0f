/**
 * Skeleton
 *
 * A hierarchy of bones below a synthetic root bone.
 */

import { ReadonlyMat4 } from 'gl-matrix';
import { SKELETON } from '../constants/skeleton';
import { IDENTITY_MATRIX } from '../utils/matrix-utils';
import { Bone } from './bone';
import { Hierarchy, HierarchyArena, NodeHandle } from './hierarchy';

export class Skeleton extends Hierarchy<Bone> {
  static readonly ROOT_BONE_NAME = SKELETON.ROOT_BONE_NAME;

  /**
   * @param root - Offset of the root bone, or the arena of an existing skeleton
   */
  constructor(root: ReadonlyMat4 | HierarchyArena<Bone> = IDENTITY_MATRIX, readOnly = false) {
    super(root instanceof HierarchyArena ? root : new Bone(SKELETON.ROOT_BONE_NAME, null, root), readOnly);
  }

  /**
   * Bones in depth-first order, root first
   */
  get bones(): Bone[] {
    const bones: Bone[] = [];
    this.traverseDepthFirst(bone => bones.push(bone));
    return bones;
  }

  /**
   * Highest bone index in the skeleton, or -1 when no bone has an index
   */
  get highestBoneIndex(): number {
    let highest = -1;
    for (const handle of this) {
      const index = this.getValue(handle).index;
      if (index !== null && index > highest) highest = index;
    }
    return highest;
  }

  addBone(parent: NodeHandle, bone: Bone): NodeHandle {
    return this.addChild(parent, bone);
  }

  /**
   * Handle of the first bone, breadth-first, with the given identifier
   */
  findBone(identifier: string): NodeHandle | undefined {
    for (const handle of this) {
      if (this.getValue(handle).identifier === identifier) return handle;
    }
    return undefined;
  }

  override clone(): Skeleton {
    return new Skeleton(this.arena.map(bone => bone));
  }

  override toReadOnly(clone: boolean): Skeleton {
    return new Skeleton(clone ? this.arena.map(bone => bone) : this.arena, true);
  }
}
