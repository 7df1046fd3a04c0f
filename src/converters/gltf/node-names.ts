/**
 * glTF Node Names
 *
 * Unique names for the nodes of a document. Bone identifiers and layer
 * names must match, so the animation and skin importers share one map.
 */

import { Document, Node } from '@gltf-transform/core';
import { GLTF } from '../../constants/gltf';
import { generateFallbackName, makeUniqueName } from '../../utils/name-utils';

export function createNodeNameMap(document: Document): Map<Node, string> {
  const taken = new Set<string>();
  const names = new Map<Node, string>();
  document.getRoot().listNodes().forEach((node, index) => {
    const name = node.getName().trim() || generateFallbackName(GLTF.UNNAMED_NODE_PREFIX, index);
    names.set(node, makeUniqueName(name, taken));
  });
  return names;
}

/**
 * Parent of every node that is some node's child
 */
export function createParentMap(document: Document): Map<Node, Node> {
  const parents = new Map<Node, Node>();
  for (const node of document.getRoot().listNodes()) {
    for (const child of node.listChildren()) {
      parents.set(child, node);
    }
  }
  return parents;
}

export function getNodeName(names: ReadonlyMap<Node, string>, node: Node): string {
  return names.get(node) ?? node.getName();
}
