/**
 * Skeleton Serializer
 *
 * Converts skeletons to and from nested JSON documents.
 */

import { ZodError } from 'zod';
import { Bone } from '../core/bone';
import type { NodeHandle } from '../core/hierarchy';
import { Skeleton } from '../core/skeleton';
import { AnimationErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import {
  BoneDocument,
  BoneNodeDocument,
  SkeletonDocument,
  SkeletonDocumentSchema,
} from '../schemas/skeleton-schemas';
import { logger as defaultLogger, Logger } from '../utils/logger';

/**
 * Skeleton as a JSON-compatible document, root bone first
 */
export function serializeSkeleton(skeleton: Skeleton): SkeletonDocument {
  const serializeNode = (handle: NodeHandle): BoneNodeDocument => ({
    bone: serializeBone(skeleton.getValue(handle)),
    children: skeleton.getChildren(handle).map(serializeNode),
  });
  return { root: serializeNode(skeleton.root) };
}

function serializeBone(bone: Bone): BoneDocument {
  return {
    identifier: bone.identifier,
    index: bone.index,
    offset: Array.from(bone.offset),
  };
}

/**
 * Builds a skeleton from an untrusted document.
 * The document's root bone supplies the offset of the skeleton's root.
 *
 * @throws SchemaValidationError when the document does not match the schema
 */
export function deserializeSkeleton(input: unknown, logger: Logger = defaultLogger): Skeleton {
  let document: SkeletonDocument;
  try {
    document = SkeletonDocumentSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw AnimationErrorFactory.schemaError(ERROR_MESSAGES.SCHEMA_VALIDATION_FAILED, 'skeleton', error);
    }
    throw error;
  }

  const skeleton = new Skeleton(document.root.bone.offset);
  const pending: Array<{ parent: NodeHandle; node: BoneNodeDocument }> = document.root.children
    .map(node => ({ parent: skeleton.root, node }));

  while (pending.length > 0) {
    const entry = pending.shift();
    if (entry === undefined) break;
    const { identifier, index, offset } = entry.node.bone;
    const handle = skeleton.addBone(entry.parent, new Bone(identifier, index, offset));
    for (const child of entry.node.children) {
      pending.push({ parent: handle, node: child });
    }
  }

  logger.debug('Skeleton loaded', {
    operation: 'deserializeSkeleton',
    bones: skeleton.size,
    highestBoneIndex: skeleton.highestBoneIndex,
  });
  return skeleton;
}
