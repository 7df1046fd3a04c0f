/**
 * glTF Import
 *
 * Reads timelines and skeletons from an in-memory glTF document.
 *
 * @example
 * ```typescript
 * const document = await new NodeIO().read('character.glb');
 * const { timelines, skeletons } = importGltf(document);
 * ```
 */

import { Document } from '@gltf-transform/core';
import { ZodError } from 'zod';
import type { Skeleton } from '../../core/skeleton';
import type { Timeline } from '../../core/timeline';
import { ERROR_MESSAGES } from '../../constants/errors';
import { AnimationErrorFactory } from '../../errors';
import { GltfImportOptions, GltfImportOptionsInput, GltfImportOptionsSchema } from '../../schemas';
import { logger as defaultLogger, Logger } from '../../utils/logger';
import { importGltfAnimations } from './animation-importer';
import { createNodeNameMap } from './node-names';
import { importGltfSkeletons } from './skeleton-importer';

export interface GltfImportResult {
  timelines: Map<string, Timeline>;
  skeletons: Map<string, Skeleton>;
}

export function importGltf(
  document: Document,
  options: GltfImportOptionsInput = {},
  logger: Logger = defaultLogger
): GltfImportResult {
  let importOptions: GltfImportOptions;
  try {
    importOptions = GltfImportOptionsSchema.parse(options);
  } catch (error) {
    if (error instanceof ZodError) {
      throw AnimationErrorFactory.configError(`${ERROR_MESSAGES.INVALID_CONFIG}: glTF import options`, 'GltfImportOptions', { zodError: error });
    }
    throw error;
  }

  return logger.withTiming('importGltf', () => {
    const nodeNames = createNodeNameMap(document);
    return {
      skeletons: importGltfSkeletons(document, nodeNames, logger),
      timelines: importGltfAnimations(document, nodeNames, importOptions, logger),
    };
  });
}

export { importGltfAnimations } from './animation-importer';
export { importGltfSkeletons } from './skeleton-importer';
export { createNodeNameMap } from './node-names';
