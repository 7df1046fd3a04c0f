/**
 * Marker
 *
 * A named point in time within a timeline, used to define playback ranges.
 */

import { ERROR_MESSAGES } from '../constants/errors';
import { InvalidArgumentError } from '../errors';
import { assertFinite } from '../utils/math-utils';
import type { Duration } from './keyframe';

export class Marker {
  readonly name: string;
  readonly position: Duration;

  constructor(name: string, position: Duration) {
    if (name.trim().length === 0) {
      throw new InvalidArgumentError(ERROR_MESSAGES.EMPTY_NAME, 'name');
    }
    assertFinite(position, 'position');
    this.name = name;
    this.position = position;
  }

  toString(): string {
    return `${this.name} @ ${this.position}s`;
  }
}
