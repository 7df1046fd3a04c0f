/**
 * glTF Skeleton Importer
 *
 * Turns each glTF skin into a skeleton. Joint i becomes the bone with index
 * i, named after its node, with inverse bind matrix i as its offset. Joints
 * keep their nearest joint ancestor as parent; joints without one hang off
 * the skeleton root.
 */

import { Document, Node, Skin } from '@gltf-transform/core';
import { mat4, ReadonlyMat4 } from 'gl-matrix';
import { GLTF } from '../../constants/gltf';
import { SKELETON } from '../../constants/skeleton';
import { Bone } from '../../core/bone';
import type { NodeHandle } from '../../core/hierarchy';
import { Skeleton } from '../../core/skeleton';
import { AnimationErrorFactory } from '../../errors';
import { Logger } from '../../utils/logger';
import { generateFallbackName, makeUniqueName } from '../../utils/name-utils';
import { createParentMap, getNodeName } from './node-names';

/**
 * Nearest ancestor of `node` that is one of `joints`
 */
function findJointParent(node: Node, joints: ReadonlySet<Node>, parents: ReadonlyMap<Node, Node>): Node | null {
  let current = parents.get(node);
  while (current !== undefined) {
    if (joints.has(current)) return current;
    current = parents.get(current);
  }
  return null;
}

function readInverseBindMatrix(skin: Skin, index: number, skinName: string): ReadonlyMat4 {
  const accessor = skin.getInverseBindMatrices();
  if (!accessor || index >= accessor.getCount()) {
    return mat4.create();
  }
  if (accessor.getElementSize() !== SKELETON.MATRIX_COMPONENTS) {
    throw AnimationErrorFactory.importError(
      `Inverse bind matrices of skin "${skinName}" are not 4x4 matrices`,
      'skin',
      { skinName, elementSize: accessor.getElementSize() }
    );
  }
  return accessor.getElement(index, []);
}

function buildSkeleton(
  skin: Skin,
  nodeNames: ReadonlyMap<Node, string>,
  parents: ReadonlyMap<Node, Node>,
  skinName: string
): Skeleton {
  const joints = skin.listJoints();
  if (joints.length > SKELETON.MAXIMUM_DEFORMER_SIZE) {
    throw AnimationErrorFactory.capacityExceeded(
      `Skin "${skinName}" has ${joints.length} joints, more than a deformer can hold`,
      SKELETON.MAXIMUM_DEFORMER_SIZE,
      { skinName, jointCount: joints.length }
    );
  }

  const jointSet = new Set(joints);
  const childrenOf = new Map<Node | null, Node[]>();
  for (const joint of joints) {
    const parent = findJointParent(joint, jointSet, parents);
    const siblings = childrenOf.get(parent) ?? [];
    siblings.push(joint);
    childrenOf.set(parent, siblings);
  }

  const skeleton = new Skeleton();
  const pending: Array<{ parent: NodeHandle; joint: Node }> = (childrenOf.get(null) ?? [])
    .map(joint => ({ parent: skeleton.root, joint }));

  while (pending.length > 0) {
    const entry = pending.shift();
    if (entry === undefined) break;
    const index = joints.indexOf(entry.joint);
    const bone = new Bone(getNodeName(nodeNames, entry.joint), index, readInverseBindMatrix(skin, index, skinName));
    const handle = skeleton.addBone(entry.parent, bone);
    for (const child of childrenOf.get(entry.joint) ?? []) {
      pending.push({ parent: handle, joint: child });
    }
  }

  return skeleton;
}

/**
 * Import all skins of a document as skeletons keyed by skin name.
 *
 * @param nodeNames - Unique node names; bone identifiers use them
 * @throws CapacityExceededError when a skin has more than 128 joints
 */
export function importGltfSkeletons(
  document: Document,
  nodeNames: ReadonlyMap<Node, string>,
  logger: Logger
): Map<string, Skeleton> {
  const skins = document.getRoot().listSkins();
  const skeletons = new Map<string, Skeleton>();

  if (skins.length === 0) {
    logger.info('No skins found in glTF document');
    return skeletons;
  }

  const parents = createParentMap(document);
  const takenNames = new Set<string>();
  skins.forEach((skin, skinIndex) => {
    const skinName = makeUniqueName(
      skin.getName().trim() || generateFallbackName(GLTF.UNNAMED_SKIN_PREFIX, skinIndex),
      takenNames
    );
    const skeleton = buildSkeleton(skin, nodeNames, parents, skinName);
    skeletons.set(skinName, skeleton);

    logger.info(`Imported skin "${skinName}"`, {
      skinName,
      jointCount: skin.listJoints().length,
      bones: skeleton.size,
    });
  });

  return skeletons;
}
