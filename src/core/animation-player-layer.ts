/**
 * Animation Player Layer
 *
 * The current value of one channel under a player's cursor. Sampling is
 * memoized: the channel is only interpolated again once the cursor has moved
 * further than the sample threshold from the last sampled position.
 */

import type { ChannelIdentifier } from './channel-identifier';
import type { Value, ValueKind } from './interpolation';
import type { Duration } from './keyframe';
import type { TimelineChannel } from './timeline-channel';

/**
 * Read access to a playback position.
 */
export interface PlaybackCursor {
  readonly position: Duration;
}

export class AnimationPlayerLayer<K extends ValueKind = ValueKind> {
  readonly layerName: string;
  readonly channel: TimelineChannel<K>;
  readonly sampleThreshold: Duration;

  private readonly cursor: PlaybackCursor;
  private lastValue: Value<K>;
  private lastSamplePosition: Duration | undefined;

  constructor(cursor: PlaybackCursor, layerName: string, channel: TimelineChannel<K>, sampleThreshold: Duration) {
    this.cursor = cursor;
    this.layerName = layerName;
    this.channel = channel;
    this.sampleThreshold = sampleThreshold;
    this.lastValue = channel.interpolator.defaultValue;
  }

  get identifier(): ChannelIdentifier<K> {
    return this.channel.identifier;
  }

  get channelName(): string {
    return this.channel.name;
  }

  get kind(): K {
    return this.channel.kind;
  }

  /**
   * Position of the last sample, or undefined before the first read
   */
  get lastSampleTime(): Duration | undefined {
    return this.lastSamplePosition;
  }

  /**
   * Value of the channel at the player's position.
   */
  get currentValue(): Value<K> {
    this.updateCurrentValue();
    return this.lastValue;
  }

  /**
   * Samples the channel again when the cursor moved past the threshold.
   * Returns whether a new sample was taken.
   */
  private updateCurrentValue(): boolean {
    const position = this.cursor.position;
    if (this.lastSamplePosition !== undefined
      && Math.abs(position - this.lastSamplePosition) <= this.sampleThreshold) {
      return false;
    }

    this.lastValue = this.channel.sample(position);
    this.lastSamplePosition = position;
    return true;
  }

  toString(): string {
    return `${this.layerName}/${this.channel.name}`;
  }
}

/**
 * Check if a player layer carries values of the given kind
 */
export function isPlayerLayerOfKind<K extends ValueKind>(
  layer: AnimationPlayerLayer,
  kind: K
): layer is AnimationPlayerLayer<K> {
  return layer.identifier.matches(kind);
}
