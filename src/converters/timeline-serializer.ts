/**
 * Timeline Serializer
 *
 * Converts timelines to and from plain JSON documents. Documents are
 * validated with zod before any timeline object is built.
 */

import { ZodError } from 'zod';
import { ChannelIdentifier } from '../core/channel-identifier';
import { getInterpolator, InterpolationMethod, ValueKind } from '../core/interpolation';
import { Keyframe } from '../core/keyframe';
import { Marker } from '../core/marker';
import { Timeline } from '../core/timeline';
import { TimelineChannel } from '../core/timeline-channel';
import { TimelineLayer } from '../core/timeline-layer';
import { AnimationErrorFactory } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';
import {
  ChannelDocument,
  KeyframeDocument,
  TimelineDocument,
  TimelineDocumentSchema,
} from '../schemas/timeline-schemas';
import { logger as defaultLogger, Logger } from '../utils/logger';

type InterpolationName = ChannelDocument['interpolation'];

const INTERPOLATION_BY_NAME: Record<InterpolationName, InterpolationMethod> = {
  none: InterpolationMethod.None,
  linear: InterpolationMethod.Linear,
  cubic: InterpolationMethod.Cubic,
};

const NAME_BY_INTERPOLATION: Record<InterpolationMethod, InterpolationName> = {
  [InterpolationMethod.None]: 'none',
  [InterpolationMethod.Linear]: 'linear',
  [InterpolationMethod.Cubic]: 'cubic',
};

/**
 * Timeline as a JSON-compatible document
 */
export function serializeTimeline(timeline: Timeline): TimelineDocument {
  return {
    markers: timeline.markers.map(marker => ({ name: marker.name, position: marker.position })),
    layers: timeline.layers.map(layer => ({
      name: layer.name,
      channels: Array.from(layer, channel => serializeChannel(channel)),
    })),
  };
}

function serializeChannel<K extends ValueKind>(channel: TimelineChannel<K>): ChannelDocument {
  const interpolator = channel.interpolator;
  return {
    name: channel.name,
    kind: channel.kind,
    interpolation: NAME_BY_INTERPOLATION[channel.interpolationMethod],
    keyframes: Array.from(channel, keyframe => {
      const components = interpolator.toComponents(keyframe.value);
      return {
        position: keyframe.position,
        value: channel.kind === 'scalar' ? components[0] : components,
      };
    }),
  };
}

/**
 * Builds a timeline from an untrusted document.
 *
 * @throws SchemaValidationError when the document does not match the schema
 * @throws DuplicateKeyError when names or keyframe positions repeat
 */
export function deserializeTimeline(input: unknown, logger: Logger = defaultLogger): Timeline {
  let document: TimelineDocument;
  try {
    document = TimelineDocumentSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw AnimationErrorFactory.schemaError(ERROR_MESSAGES.SCHEMA_VALIDATION_FAILED, 'timeline', error);
    }
    throw error;
  }

  const layers = document.layers.map(layer =>
    new TimelineLayer(layer.name, layer.channels.map(channel => deserializeChannel(channel.kind, channel)))
  );
  const markers = document.markers.map(marker => new Marker(marker.name, marker.position));
  const timeline = new Timeline(layers, markers);

  logger.debug('Timeline loaded', {
    operation: 'deserializeTimeline',
    layers: layers.length,
    markers: markers.length,
    start: timeline.start,
    end: timeline.end,
  });
  return timeline;
}

function deserializeChannel<K extends ValueKind>(kind: K, channel: ChannelDocument): TimelineChannel<K> {
  const interpolator = getInterpolator(kind);
  const keyframes = channel.keyframes.map((keyframe: KeyframeDocument) =>
    new Keyframe<K>(keyframe.position, interpolator.fromComponents(toComponents(keyframe.value)))
  );
  return new TimelineChannel(
    new ChannelIdentifier(channel.name, kind),
    INTERPOLATION_BY_NAME[channel.interpolation],
    keyframes
  );
}

function toComponents(value: KeyframeDocument['value']): number[] {
  return typeof value === 'number' ? [value] : value;
}
