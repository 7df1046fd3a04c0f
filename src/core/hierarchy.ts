/**
 * Hierarchy
 *
 * A rooted tree stored as an arena of nodes addressed by integer handles.
 * Parent and child links are handles. The root has handle 0; every node
 * added later receives the next handle, and handles of removed nodes are
 * never handed out again.
 *
 * A read-only hierarchy refuses structural changes. It either shares the
 * arena of the hierarchy it was made from (a view that follows later changes
 * of the source) or owns a copy of it.
 */

import { ERROR_MESSAGES } from '../constants/errors';
import { NotFoundError, ReadOnlyViolationError } from '../errors';

export type NodeHandle = number;

export interface NodeRecord<T> {
  value: T;
  parent: NodeHandle | null;
  children: NodeHandle[];
  depth: number;
}

export type HierarchyVisitor<T> = (value: T, handle: NodeHandle, depth: number) => void;

export const ROOT_HANDLE: NodeHandle = 0;

/**
 * Node storage shared between a hierarchy and its read-only views.
 */
export class HierarchyArena<T> {
  readonly nodes = new Map<NodeHandle, NodeRecord<T>>();
  nextHandle: NodeHandle = ROOT_HANDLE + 1;

  static withRoot<T>(value: T): HierarchyArena<T> {
    const arena = new HierarchyArena<T>();
    arena.nodes.set(ROOT_HANDLE, { value, parent: null, children: [], depth: 0 });
    return arena;
  }

  /**
   * Copy with the same handles and mapped values
   */
  map<U>(fn: (value: T, handle: NodeHandle) => U): HierarchyArena<U> {
    const arena = new HierarchyArena<U>();
    for (const [handle, record] of this.nodes) {
      arena.nodes.set(handle, {
        value: fn(record.value, handle),
        parent: record.parent,
        children: [...record.children],
        depth: record.depth,
      });
    }
    arena.nextHandle = this.nextHandle;
    return arena;
  }
}

export class Hierarchy<T> implements Iterable<NodeHandle> {
  readonly isReadOnly: boolean;

  protected readonly arena: HierarchyArena<T>;

  constructor(root: T | HierarchyArena<T>, readOnly = false) {
    this.arena = root instanceof HierarchyArena ? root : HierarchyArena.withRoot<T>(root);
    this.isReadOnly = readOnly;
  }

  get root(): NodeHandle {
    return ROOT_HANDLE;
  }

  get rootValue(): T {
    return this.getValue(ROOT_HANDLE);
  }

  /**
   * Number of nodes, root included
   */
  get size(): number {
    return this.arena.nodes.size;
  }

  /**
   * Highest handle assigned so far, including handles of removed nodes.
   * 0 while only the root was ever created.
   */
  get highestIndex(): NodeHandle {
    return this.arena.nextHandle - 1;
  }

  has(handle: NodeHandle): boolean {
    return this.arena.nodes.has(handle);
  }

  getValue(handle: NodeHandle): T {
    return this.getRecord(handle).value;
  }

  getParent(handle: NodeHandle): NodeHandle | null {
    return this.getRecord(handle).parent;
  }

  getChildren(handle: NodeHandle): readonly NodeHandle[] {
    return this.getRecord(handle).children;
  }

  getDepth(handle: NodeHandle): number {
    return this.getRecord(handle).depth;
  }

  addChild(parent: NodeHandle, value: T): NodeHandle {
    this.assertWritable('addChild');
    const parentRecord = this.getRecord(parent);

    const handle = this.arena.nextHandle++;
    this.arena.nodes.set(handle, { value, parent, children: [], depth: parentRecord.depth + 1 });
    parentRecord.children.push(handle);
    return handle;
  }

  /**
   * Detaches `child` and its subtree from `parent`.
   * Returns false when `child` is not a child of `parent`.
   */
  removeChild(parent: NodeHandle, child: NodeHandle): boolean {
    this.assertWritable('removeChild');
    const parentRecord = this.getRecord(parent);
    const position = parentRecord.children.indexOf(child);
    if (position < 0) return false;

    parentRecord.children.splice(position, 1);
    const pending = [child];
    while (pending.length > 0) {
      const handle = pending.pop();
      if (handle === undefined) break;
      const record = this.arena.nodes.get(handle);
      if (record === undefined) continue;
      pending.push(...record.children);
      this.arena.nodes.delete(handle);
    }
    return true;
  }

  setValue(handle: NodeHandle, value: T): void {
    this.assertWritable('setValue');
    this.getRecord(handle).value = value;
  }

  /**
   * Visits `start` and its descendants, parents before children.
   */
  traverseDepthFirst(visit: HierarchyVisitor<T>, start: NodeHandle = ROOT_HANDLE): void {
    const pending: NodeHandle[] = [start];
    while (pending.length > 0) {
      const handle = pending.pop();
      if (handle === undefined) break;
      const record = this.getRecord(handle);
      visit(record.value, handle, record.depth);
      for (let i = record.children.length - 1; i >= 0; i--) {
        pending.push(record.children[i]);
      }
    }
  }

  /**
   * Visits `start` and its descendants level by level.
   */
  traverseBreadthFirst(visit: HierarchyVisitor<T>, start: NodeHandle = ROOT_HANDLE): void {
    for (const handle of this.breadthFirst(start)) {
      const record = this.getRecord(handle);
      visit(record.value, handle, record.depth);
    }
  }

  [Symbol.iterator](): Iterator<NodeHandle> {
    return this.breadthFirst(ROOT_HANDLE);
  }

  /**
   * Mutable hierarchy of the same shape and handles with mapped values.
   */
  convert<U>(fn: (value: T, handle: NodeHandle) => U): Hierarchy<U> {
    return new Hierarchy<U>(this.arena.map(fn));
  }

  /**
   * Mutable deep copy of the structure. Values are copied by reference.
   */
  clone(): Hierarchy<T> {
    return new Hierarchy<T>(this.arena.map(value => value));
  }

  /**
   * Read-only hierarchy over this one, as a live view or as a copy.
   */
  toReadOnly(clone: boolean): Hierarchy<T> {
    return new Hierarchy<T>(clone ? this.arena.map(value => value) : this.arena, true);
  }

  protected getRecord(handle: NodeHandle): NodeRecord<T> {
    const record = this.arena.nodes.get(handle);
    if (record === undefined) {
      throw new NotFoundError('node', String(handle));
    }
    return record;
  }

  protected assertWritable(operation: string): void {
    if (this.isReadOnly) {
      throw new ReadOnlyViolationError(`${ERROR_MESSAGES.READ_ONLY}: ${operation} is not allowed`, operation);
    }
  }

  private *breadthFirst(start: NodeHandle): Generator<NodeHandle> {
    this.getRecord(start);
    const queue: NodeHandle[] = [start];
    for (let i = 0; i < queue.length; i++) {
      yield queue[i];
      const record = this.arena.nodes.get(queue[i]);
      if (record !== undefined) queue.push(...record.children);
    }
  }
}
