/**
 * Value Kinds and Interpolators
 *
 * Keyframe payloads come from a closed set of kinds. Each kind has one
 * interpolator that knows its default value, how to copy and validate a
 * value, and how to blend two or four samples.
 */

import {
  mat4,
  quat,
  vec2,
  vec3,
  ReadonlyMat4,
  ReadonlyQuat,
  ReadonlyVec2,
  ReadonlyVec3,
} from 'gl-matrix';
import { InvalidArgumentError } from '../errors';
import { cubic, isFiniteNumber, lerp } from '../utils/math-utils';

/**
 * Interpolation Method
 */
export enum InterpolationMethod {
  /** Hold the value of the keyframe at or before the position. */
  None = 0,
  Linear = 1,
  Cubic = 2,
}

/**
 * Check if a value is one of the defined interpolation methods
 */
export function isInterpolationMethod(value: unknown): value is InterpolationMethod {
  return value === InterpolationMethod.None
    || value === InterpolationMethod.Linear
    || value === InterpolationMethod.Cubic;
}

/**
 * Value type stored for each kind.
 */
export interface ValueKindMap {
  scalar: number;
  vec2: ReadonlyVec2;
  vec3: ReadonlyVec3;
  quat: ReadonlyQuat;
  mat4: ReadonlyMat4;
}

export type ValueKind = keyof ValueKindMap;

export type Value<K extends ValueKind> = ValueKindMap[K];

export const VALUE_KINDS: readonly ValueKind[] = ['scalar', 'vec2', 'vec3', 'quat', 'mat4'];

/**
 * Check if a string names a value kind
 */
export function isValueKind(value: unknown): value is ValueKind {
  return typeof value === 'string' && (VALUE_KINDS as readonly string[]).includes(value);
}

/**
 * Interpolation capability of one value kind.
 */
export interface Interpolator<K extends ValueKind> {
  readonly kind: K;
  /** Number of numeric components in a value. */
  readonly size: number;
  readonly defaultValue: Value<K>;
  clone(value: Value<K>): Value<K>;
  isValue(value: unknown): value is Value<K>;
  interpolateLinear(x: Value<K>, y: Value<K>, ratio: number): Value<K>;
  interpolateCubic(beforeX: Value<K>, x: Value<K>, y: Value<K>, afterY: Value<K>, ratio: number): Value<K>;
  toComponents(value: Value<K>): number[];
  fromComponents(components: ArrayLike<number>): Value<K>;
}

function isNumericVector(value: unknown, size: number): value is ArrayLike<number> {
  if (!Array.isArray(value) && !(value instanceof Float32Array) && !(value instanceof Float64Array)) {
    return false;
  }
  if (value.length !== size) return false;
  for (let i = 0; i < size; i++) {
    if (!isFiniteNumber(value[i])) return false;
  }
  return true;
}

function readComponents(components: ArrayLike<number>, size: number, kind: ValueKind): Float32Array {
  if (!isNumericVector(Array.from(components), size)) {
    throw new InvalidArgumentError(
      `A ${kind} value needs ${size} finite components, got ${components.length}`,
      'components',
      { kind }
    );
  }
  return Float32Array.from(components);
}

function lerpComponents(x: ArrayLike<number>, y: ArrayLike<number>, ratio: number, size: number): Float32Array {
  const out = new Float32Array(size);
  for (let i = 0; i < size; i++) {
    out[i] = lerp(x[i], y[i], ratio);
  }
  return out;
}

function cubicComponents(
  beforeX: ArrayLike<number>,
  x: ArrayLike<number>,
  y: ArrayLike<number>,
  afterY: ArrayLike<number>,
  ratio: number,
  size: number
): Float32Array {
  const out = new Float32Array(size);
  for (let i = 0; i < size; i++) {
    out[i] = cubic(beforeX[i], x[i], y[i], afterY[i], ratio);
  }
  return out;
}

const scalarInterpolator: Interpolator<'scalar'> = {
  kind: 'scalar',
  size: 1,
  defaultValue: 0,
  clone(value) {
    return value;
  },
  isValue(value): value is number {
    return isFiniteNumber(value);
  },
  interpolateLinear(x, y, ratio) {
    return lerp(x, y, ratio);
  },
  interpolateCubic(beforeX, x, y, afterY, ratio) {
    return cubic(beforeX, x, y, afterY, ratio);
  },
  toComponents(value) {
    return [value];
  },
  fromComponents(components) {
    return readComponents(components, 1, 'scalar')[0];
  },
};

const vec2Interpolator: Interpolator<'vec2'> = {
  kind: 'vec2',
  size: 2,
  defaultValue: vec2.create(),
  clone(value) {
    return vec2.clone(value);
  },
  isValue(value): value is ReadonlyVec2 {
    return isNumericVector(value, 2);
  },
  interpolateLinear(x, y, ratio) {
    return lerpComponents(x, y, ratio, 2);
  },
  interpolateCubic(beforeX, x, y, afterY, ratio) {
    return cubicComponents(beforeX, x, y, afterY, ratio, 2);
  },
  toComponents(value) {
    return Array.from(value);
  },
  fromComponents(components) {
    return readComponents(components, 2, 'vec2');
  },
};

const vec3Interpolator: Interpolator<'vec3'> = {
  kind: 'vec3',
  size: 3,
  defaultValue: vec3.create(),
  clone(value) {
    return vec3.clone(value);
  },
  isValue(value): value is ReadonlyVec3 {
    return isNumericVector(value, 3);
  },
  interpolateLinear(x, y, ratio) {
    return lerpComponents(x, y, ratio, 3);
  },
  interpolateCubic(beforeX, x, y, afterY, ratio) {
    return cubicComponents(beforeX, x, y, afterY, ratio, 3);
  },
  toComponents(value) {
    return Array.from(value);
  },
  fromComponents(components) {
    return readComponents(components, 3, 'vec3');
  },
};

/**
 * Rotations take the shorter arc and are renormalized after blending.
 * The cubic variant ignores the outer samples and uses a spherical blend.
 */
const quatInterpolator: Interpolator<'quat'> = {
  kind: 'quat',
  size: 4,
  defaultValue: quat.create(),
  clone(value) {
    return quat.clone(value);
  },
  isValue(value): value is ReadonlyQuat {
    return isNumericVector(value, 4);
  },
  interpolateLinear(x, y, ratio) {
    const target = quat.dot(x, y) < 0 ? quat.scale(quat.create(), y, -1) : y;
    const out = quat.lerp(quat.create(), x, target, ratio);
    return quat.normalize(out, out);
  },
  interpolateCubic(_beforeX, x, y, _afterY, ratio) {
    const out = quat.slerp(quat.create(), x, y, ratio);
    return quat.normalize(out, out);
  },
  toComponents(value) {
    return Array.from(value);
  },
  fromComponents(components) {
    return readComponents(components, 4, 'quat');
  },
};

const mat4Interpolator: Interpolator<'mat4'> = {
  kind: 'mat4',
  size: 16,
  defaultValue: mat4.create(),
  clone(value) {
    return mat4.clone(value);
  },
  isValue(value): value is ReadonlyMat4 {
    return isNumericVector(value, 16);
  },
  interpolateLinear(x, y, ratio) {
    return lerpComponents(x, y, ratio, 16);
  },
  interpolateCubic(beforeX, x, y, afterY, ratio) {
    return cubicComponents(beforeX, x, y, afterY, ratio, 16);
  },
  toComponents(value) {
    return Array.from(value);
  },
  fromComponents(components) {
    return readComponents(components, 16, 'mat4');
  },
};

/**
 * Interpolator for every value kind.
 */
export const INTERPOLATORS: { readonly [K in ValueKind]: Interpolator<K> } = {
  scalar: scalarInterpolator,
  vec2: vec2Interpolator,
  vec3: vec3Interpolator,
  quat: quatInterpolator,
  mat4: mat4Interpolator,
};

export function getInterpolator<K extends ValueKind>(kind: K): Interpolator<K> {
  return INTERPOLATORS[kind];
}
