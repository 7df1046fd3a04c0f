/**
 * Skeleton Document Schemas
 *
 * JSON shape of a skeleton: a tree of bones starting at the root bone.
 */

import { z } from 'zod';
import { SKELETON } from '../constants/skeleton';
import { Matrix4Schema, NameSchema } from './base-schemas';

export const BoneDocumentSchema = z.object({
  identifier: NameSchema.nullable(),
  index: z.number().int().min(0).max(SKELETON.MAXIMUM_BONE_INDEX).nullable(),
  offset: Matrix4Schema,
});

export type BoneDocument = z.infer<typeof BoneDocumentSchema>;

export interface BoneNodeDocument {
  bone: BoneDocument;
  children: BoneNodeDocument[];
}

export const BoneNodeDocumentSchema: z.ZodType<BoneNodeDocument> = z.lazy(() =>
  z.object({
    bone: BoneDocumentSchema,
    children: z.array(BoneNodeDocumentSchema),
  })
);

export const SkeletonDocumentSchema = z.object({
  root: BoneNodeDocumentSchema,
});

export type SkeletonDocument = z.infer<typeof SkeletonDocumentSchema>;
