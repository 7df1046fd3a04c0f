/**
 * Timeline Layer
 *
 * A named group of channels, usually all channels driving one bone.
 */

import { ERROR_MESSAGES } from '../constants/errors';
import { DuplicateKeyError, InvalidArgumentError, NotFoundError, TypeMismatchError } from '../errors';
import type { ValueKind } from './interpolation';
import type { Duration } from './keyframe';
import { isChannelOfKind, TimelineChannel } from './timeline-channel';

export class TimelineLayer implements Iterable<TimelineChannel> {
  readonly name: string;
  readonly start: Duration;
  readonly end: Duration;
  readonly length: Duration;

  private readonly channels: ReadonlyMap<string, TimelineChannel>;

  constructor(name: string, channels: Iterable<TimelineChannel>) {
    if (name.trim().length === 0) {
      throw new InvalidArgumentError(ERROR_MESSAGES.EMPTY_NAME, 'name');
    }

    const byName = new Map<string, TimelineChannel>();
    for (const channel of channels) {
      if (byName.has(channel.name)) {
        throw new DuplicateKeyError(
          `Layer "${name}" has more than one channel named "${channel.name}"`,
          channel.name,
          { layer: name }
        );
      }
      byName.set(channel.name, channel);
    }

    let start = Number.POSITIVE_INFINITY;
    let end = Number.NEGATIVE_INFINITY;
    for (const channel of byName.values()) {
      if (!channel.hasKeyframes) continue;
      start = Math.min(start, channel.start);
      end = Math.max(end, channel.end);
    }

    this.name = name;
    this.channels = byName;
    this.start = Number.isFinite(start) ? start : 0;
    this.end = Number.isFinite(end) ? end : 0;
    this.length = this.end - this.start;
  }

  get channelCount(): number {
    return this.channels.size;
  }

  get channelNames(): string[] {
    return Array.from(this.channels.keys());
  }

  /**
   * Check if any channel holds at least one keyframe
   */
  get hasKeyframes(): boolean {
    for (const channel of this.channels.values()) {
      if (channel.hasKeyframes) return true;
    }
    return false;
  }

  hasChannel(name: string): boolean {
    return this.channels.has(name);
  }

  /**
   * Channel by name, checked against the expected value kind.
   */
  getChannel<K extends ValueKind>(name: string, kind: K): TimelineChannel<K> {
    const channel = this.channels.get(name);
    if (channel === undefined) {
      throw new NotFoundError('channel', name, { layer: this.name });
    }
    if (!isChannelOfKind(channel, kind)) {
      throw new TypeMismatchError(
        `Channel "${name}" of layer "${this.name}" stores ${channel.kind} values, not ${kind}`,
        kind,
        channel.kind,
        { layer: this.name }
      );
    }
    return channel;
  }

  tryGetChannel(name: string): TimelineChannel | undefined {
    return this.channels.get(name);
  }

  /**
   * First channel, in insertion order, that stores values of the given kind
   */
  findChannel<K extends ValueKind>(kind: K): TimelineChannel<K> | undefined {
    for (const channel of this.channels.values()) {
      if (isChannelOfKind(channel, kind)) return channel;
    }
    return undefined;
  }

  [Symbol.iterator](): Iterator<TimelineChannel> {
    return this.channels.values();
  }

  toString(): string {
    return `${this.name} [${this.channelNames.join(', ')}]`;
  }
}
