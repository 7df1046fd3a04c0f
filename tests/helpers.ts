import { expect } from 'vitest';
import { ChannelIdentifier } from '../src/core/channel-identifier';
import { InterpolationMethod, Value, ValueKind } from '../src/core/interpolation';
import { Keyframe } from '../src/core/keyframe';
import { TimelineChannel } from '../src/core/timeline-channel';
import { createLogger, LogLevel } from '../src/utils/logger';

export const silentLogger = createLogger({ level: LogLevel.SILENT });

export function expectCloseTo(actual: ArrayLike<number>, expected: readonly number[], digits = 5): void {
  expect(actual.length).toBe(expected.length);
  expected.forEach((value, index) => {
    expect(actual[index]).toBeCloseTo(value, digits);
  });
}

export function makeChannel<K extends ValueKind>(
  name: string,
  kind: K,
  method: InterpolationMethod,
  keyframes: Array<[number, Value<K>]>
): TimelineChannel<K> {
  return new TimelineChannel(
    new ChannelIdentifier(name, kind),
    method,
    keyframes.map(([position, value]) => new Keyframe<K>(position, value))
  );
}

/**
 * Column-major translation matrix
 */
export function translation(x: number, y: number, z: number): number[] {
  return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, x, y, z, 1];
}

export const IDENTITY = translation(0, 0, 0);
