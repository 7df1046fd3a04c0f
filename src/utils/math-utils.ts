/**
 * Math Utilities
 *
 * Scalar helpers shared by interpolators and players.
 */

import { InvalidArgumentError } from '../errors';
import { ERROR_MESSAGES } from '../constants/errors';

/** Linearly interpolate between p and q with respect to t.
 *  t is expected to be between 0.0 and 1.0.
 *  @example
 *  lerp(0.4, 0.8, 0.25); // 0.5
 */
export function lerp(p: number, q: number, t: number): number {
  return (1.0 - t) * p + t * q;
}

/** Clamp a number to a value between min and max, inclusive.
 *  @example
 *  clamp(1.1, 0.5, 1.0); // 1.0
 *  clamp(-0.3, 0.0, 0.1); // 0.0
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(Math.min(value, max), min);
}

/** Clamp a number to a value between 0.0 and 1.0, inclusive. */
export function saturate(value: number): number {
  return clamp(value, 0.0, 1.0);
}

/**
 * Four-point cubic through x (t = 0) and y (t = 1), shaped by the
 * neighbouring samples beforeX and afterY.
 */
export function cubic(beforeX: number, x: number, y: number, afterY: number, t: number): number {
  const a = afterY - y - beforeX + x;
  const b = beforeX - x - a;
  const c = y - beforeX;
  return a * t * t * t + b * t * t + c * t + x;
}

/**
 * Wraps a value into [0, maximum).
 * Any multiple of the maximum is removed, so overshoots of several lengths
 * land on the same spot as a single one. A zero maximum yields 0.
 */
export function wrap(value: number, maximum: number): number {
  if (!(maximum >= 0)) {
    throw new InvalidArgumentError(ERROR_MESSAGES.NEGATIVE_RANGE, 'maximum', { maximum });
  }
  if (maximum === 0) return 0;

  const remainder = value % maximum;
  return remainder < 0 ? remainder + maximum : remainder;
}

/**
 * Check if a value is a finite number
 */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Throws an InvalidArgumentError unless the value is a finite number
 */
export function assertFinite(value: number, argument: string): void {
  if (!Number.isFinite(value)) {
    throw new InvalidArgumentError(ERROR_MESSAGES.NON_FINITE_VALUE, argument, { value });
  }
}
