/**
 * Channel Identifier
 *
 * Name and value kind of a timeline channel.
 */

import { CHANNEL_NAMES } from '../constants/animation';
import { ERROR_MESSAGES } from '../constants/errors';
import { InvalidArgumentError } from '../errors';
import type { ValueKind } from './interpolation';

export class ChannelIdentifier<K extends ValueKind = ValueKind> {
  static readonly position = new ChannelIdentifier(CHANNEL_NAMES.POSITION, 'vec3');
  static readonly scale = new ChannelIdentifier(CHANNEL_NAMES.SCALE, 'vec3');
  static readonly rotation = new ChannelIdentifier(CHANNEL_NAMES.ROTATION, 'quat');
  static readonly transformation = new ChannelIdentifier(CHANNEL_NAMES.TRANSFORMATION, 'mat4');

  readonly name: string;
  readonly kind: K;

  constructor(name: string, kind: K) {
    if (name.trim().length === 0) {
      throw new InvalidArgumentError(ERROR_MESSAGES.EMPTY_NAME, 'name');
    }
    this.name = name;
    this.kind = kind;
  }

  /**
   * Check if values of the given kind can be stored under this identifier
   */
  matches(kind: ValueKind): boolean {
    return this.kind === kind;
  }

  equals(other: ChannelIdentifier): boolean {
    return this.name === other.name && this.kind === other.kind;
  }

  toString(): string {
    return `${this.name} (${this.kind})`;
  }
}
