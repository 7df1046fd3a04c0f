/**
 * Name Utilities
 *
 * Layer naming for bone components and unique names for imported objects.
 */

import { ANIMATION, TransformComponent } from '../constants/animation';

/**
 * Name of the layer holding one transform component of a bone.
 * Example: ('arm', 'rotation') -> 'arm_rotation'
 */
export function getComponentLayerName(boneIdentifier: string, component: TransformComponent): string {
  return `${boneIdentifier}${ANIMATION.COMPONENT_SEPARATOR}${component}`;
}

/**
 * Returns `name`, or `name_1`, `name_2`, ... when it is already taken.
 * The returned name is added to `taken`.
 */
export function makeUniqueName(name: string, taken: Set<string>): string {
  let candidate = name;
  let suffix = 1;
  while (taken.has(candidate)) {
    candidate = `${name}_${suffix++}`;
  }
  taken.add(candidate);
  return candidate;
}

/**
 * Name for an object that has none, from its kind and position in the document.
 */
export function generateFallbackName(prefix: string, index: number): string {
  return `${prefix}_${index}`;
}
