/**
 * Timeline Document Schemas
 *
 * JSON shape of a timeline: layers of channels of keyframes, plus markers.
 */

import { z } from 'zod';
import { INTERPOLATORS } from '../core/interpolation';
import { DurationSchema, InterpolationNameSchema, NameSchema, ValueKindSchema } from './base-schemas';

/**
 * Keyframe value: a number for scalars, a component list otherwise
 */
export const KeyframeValueSchema = z.union([z.number().finite(), z.array(z.number().finite())]);

export const KeyframeDocumentSchema = z.object({
  position: DurationSchema,
  value: KeyframeValueSchema,
});

export const ChannelDocumentSchema = z.object({
  name: NameSchema,
  kind: ValueKindSchema,
  interpolation: InterpolationNameSchema,
  keyframes: z.array(KeyframeDocumentSchema),
}).superRefine((channel, ctx) => {
  const size = INTERPOLATORS[channel.kind].size;
  channel.keyframes.forEach((keyframe, index) => {
    const components = typeof keyframe.value === 'number' ? 1 : keyframe.value.length;
    if (components !== size) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['keyframes', index, 'value'],
        message: `A ${channel.kind} value needs ${size} components, got ${components}`,
      });
    }
  });
});

export const LayerDocumentSchema = z.object({
  name: NameSchema,
  channels: z.array(ChannelDocumentSchema),
});

export const MarkerDocumentSchema = z.object({
  name: NameSchema,
  position: DurationSchema,
});

export const TimelineDocumentSchema = z.object({
  markers: z.array(MarkerDocumentSchema).optional().default([]),
  layers: z.array(LayerDocumentSchema),
});

export type KeyframeDocument = z.infer<typeof KeyframeDocumentSchema>;
export type ChannelDocument = z.infer<typeof ChannelDocumentSchema>;
export type LayerDocument = z.infer<typeof LayerDocumentSchema>;
export type MarkerDocument = z.infer<typeof MarkerDocumentSchema>;
export type TimelineDocument = z.infer<typeof TimelineDocumentSchema>;
