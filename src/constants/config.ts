/**
 * Configuration Constants
 */

import { ANIMATION } from './animation';

/**
 * Default Configuration Values
 */
export const DEFAULT_CONFIG = {
  DEBUG: false,
  LOG_LEVEL: 'info' as const,
  SAMPLE_THRESHOLD: ANIMATION.SAMPLE_THRESHOLD,
  LOOP: false,
  OVERLAY_INFLUENCE: 0,
  BAKE_REST_POSE: true,
} as const;
