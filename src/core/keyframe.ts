/**
 * Keyframe
 *
 * A timestamped sample of one animated value.
 */

import { assertFinite, saturate } from '../utils/math-utils';
import type { Value, ValueKind } from './interpolation';

/**
 * Time in seconds.
 */
export type Duration = number;

export class Keyframe<K extends ValueKind = ValueKind> {
  readonly position: Duration;
  readonly value: Value<K>;

  constructor(position: Duration, value: Value<K>) {
    assertFinite(position, 'position');
    this.position = position;
    this.value = value;
  }

  /**
   * Progress of `position` from this keyframe towards `other`, in [0, 1].
   * Returns 0 when both keyframes sit at the same position.
   */
  calculateRatioTo(other: Keyframe<K>, position: Duration): number {
    const span = other.position - this.position;
    if (span === 0) return 0;
    return saturate((position - this.position) / span);
  }

  toString(): string {
    return `${this.position}s: ${String(this.value)}`;
  }
}
