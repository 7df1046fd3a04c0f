/**
 * Timeline Channel
 *
 * The keyframes of one animated parameter, sorted by position, with the
 * method used to interpolate between them.
 */

import { ERROR_MESSAGES } from '../constants/errors';
import { DuplicateKeyframeError, InvalidArgumentError } from '../errors';
import { ChannelIdentifier } from './channel-identifier';
import {
  getInterpolator,
  Interpolator,
  InterpolationMethod,
  isInterpolationMethod,
  Value,
  ValueKind,
} from './interpolation';
import { Duration, Keyframe } from './keyframe';

export class TimelineChannel<K extends ValueKind = ValueKind> implements Iterable<Keyframe<K>> {
  readonly identifier: ChannelIdentifier<K>;
  readonly interpolationMethod: InterpolationMethod;
  readonly interpolator: Interpolator<K>;
  readonly start: Duration;
  readonly end: Duration;
  readonly length: Duration;

  private readonly keyframes: readonly Keyframe<K>[];

  constructor(
    identifier: ChannelIdentifier<K>,
    interpolationMethod: InterpolationMethod,
    keyframes: Iterable<Keyframe<K>>
  ) {
    if (!isInterpolationMethod(interpolationMethod)) {
      throw new InvalidArgumentError(
        `${ERROR_MESSAGES.UNKNOWN_INTERPOLATION}: ${String(interpolationMethod)}`,
        'interpolationMethod',
        { channel: identifier.name }
      );
    }

    const interpolator = getInterpolator(identifier.kind);
    const sorted: Keyframe<K>[] = [];
    for (const keyframe of keyframes) {
      if (!interpolator.isValue(keyframe.value)) {
        throw new InvalidArgumentError(
          `Keyframe at ${keyframe.position}s is not a ${identifier.kind} value`,
          'keyframes',
          { channel: identifier.name }
        );
      }
      sorted.push(new Keyframe<K>(keyframe.position, interpolator.clone(keyframe.value)));
    }
    sorted.sort((a, b) => a.position - b.position);

    for (let i = 1; i < sorted.length; i++) {
      if (sorted[i].position === sorted[i - 1].position) {
        throw new DuplicateKeyframeError(identifier.name, sorted[i].position);
      }
    }

    this.identifier = identifier;
    this.interpolationMethod = interpolationMethod;
    this.interpolator = interpolator;
    this.keyframes = sorted;

    if (sorted.length > 0) {
      this.start = sorted[0].position;
      this.end = sorted[sorted.length - 1].position;
    } else {
      this.start = 0;
      this.end = 0;
    }
    this.length = this.end - this.start;
  }

  get name(): string {
    return this.identifier.name;
  }

  get kind(): K {
    return this.identifier.kind;
  }

  get keyframeCount(): number {
    return this.keyframes.length;
  }

  get hasKeyframes(): boolean {
    return this.keyframes.length > 0;
  }

  getKeyframe(index: number): Keyframe<K> {
    if (!Number.isInteger(index) || index < 0 || index >= this.keyframes.length) {
      throw new InvalidArgumentError(
        `Keyframe index ${index} is out of range`,
        'index',
        { channel: this.name, count: this.keyframes.length }
      );
    }
    return this.keyframes[index];
  }

  /**
   * Binary search for the keyframe at `position`.
   * Without an exact match this returns the index of the last keyframe before
   * `position`, clamped to 0, so positions ahead of the first keyframe map to
   * index 0.
   */
  getNearestKeyframeIndex(position: Duration): number {
    let lower = 0;
    let upper = this.keyframes.length - 1;

    while (lower <= upper) {
      const middle = lower + ((upper - lower) >> 1);
      const current = this.keyframes[middle].position;
      if (current === position) return middle;
      if (current < position) {
        lower = middle + 1;
      } else {
        upper = middle - 1;
      }
    }

    return Math.max(Math.min(lower, upper), 0);
  }

  /**
   * Keyframe at or before `position`, shifted by `offset` keyframes.
   */
  tryFindKeyframeBefore(position: Duration, offset = 0): Keyframe<K> | undefined {
    if (this.keyframes.length === 0) return undefined;

    const index = this.getNearestKeyframeIndex(position) + offset;
    if (index < 0 || index >= this.keyframes.length) return undefined;

    const keyframe = this.keyframes[index];
    return keyframe.position <= position ? keyframe : undefined;
  }

  /**
   * Keyframe strictly after `position`, shifted by `offset` keyframes.
   */
  tryFindKeyframeAfter(position: Duration, offset = 0): Keyframe<K> | undefined {
    if (this.keyframes.length === 0) return undefined;

    let index = this.getNearestKeyframeIndex(position);
    if (this.keyframes[index].position <= position) {
      index += offset + 1;
    } else {
      index += offset;
    }

    return index >= 0 && index < this.keyframes.length ? this.keyframes[index] : undefined;
  }

  /**
   * Keyframe closest to `position` in either direction, shifted by `offset`.
   */
  tryFindKeyframe(position: Duration, offset = 0): Keyframe<K> | undefined {
    if (this.keyframes.length === 0) return undefined;

    let index = this.getNearestKeyframeIndex(position);
    const successor = this.keyframes[index + 1];
    if (successor !== undefined
      && position - this.keyframes[index].position > successor.position - position) {
      index += 1;
    }

    index += offset;
    return index >= 0 && index < this.keyframes.length ? this.keyframes[index] : undefined;
  }

  /**
   * Interpolated value at `position`.
   * Positions outside the keyframe range hold the first or last value.
   */
  sample(position: Duration): Value<K> {
    const first = this.keyframes[0];
    if (first === undefined) return this.interpolator.defaultValue;
    const last = this.keyframes[this.keyframes.length - 1];

    const x = this.tryFindKeyframeBefore(position) ?? first;
    if (this.interpolationMethod === InterpolationMethod.None) {
      return x.value;
    }

    const y = this.tryFindKeyframeAfter(position) ?? last;
    const ratio = x.calculateRatioTo(y, position);

    if (this.interpolationMethod === InterpolationMethod.Linear) {
      return this.interpolator.interpolateLinear(x.value, y.value, ratio);
    }

    const beforeX = this.tryFindKeyframeBefore(position, -1) ?? x;
    const afterY = this.tryFindKeyframeAfter(position, 1) ?? y;
    return this.interpolator.interpolateCubic(beforeX.value, x.value, y.value, afterY.value, ratio);
  }

  [Symbol.iterator](): Iterator<Keyframe<K>> {
    return this.keyframes[Symbol.iterator]();
  }

  toString(): string {
    return `${this.identifier.toString()} [${this.keyframes.length} keyframes, ${InterpolationMethod[this.interpolationMethod]}]`;
  }
}

/**
 * Check if a channel stores values of the given kind
 */
export function isChannelOfKind<K extends ValueKind>(
  channel: TimelineChannel,
  kind: K
): channel is TimelineChannel<K> {
  return channel.identifier.matches(kind);
}
