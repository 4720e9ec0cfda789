// src/scene/core/dirtyRoots.ts
import { INVALID } from "../interfaces.js";
import { walkSubtree, WalkStack } from "../tree/walk.js";
import type { TransformStore } from "./transformStore.js";

/**
 * Keeps the minimal set of dirty subtree roots: every dirty slot sits under
 * exactly one member, and no member sits under another.
 *
 * A dirty slot whose parent is clean is always a member, and everything below
 * a dirty slot is dirty. mark() leans on both facts to stay O(1) on repeat
 * edits and O(newly dirtied) otherwise.
 */
export class DirtyRootTracker {
  private readonly _roots = new Set<number>();
  private readonly _stack = new WalkStack();

  constructor(private readonly store: TransformStore) {}

  get size() {
    return this._roots.size;
  }

  /** Slots of the current dirty roots. Iteration order carries no meaning. */
  roots(): ReadonlySet<number> {
    return this._roots;
  }

  has(slot: number): boolean {
    return this._roots.has(slot);
  }

  /**
   * Mark `slot` and its subtree dirty.
   * Also re-settles membership for a slot that just moved under a new parent.
   */
  mark(slot: number) {
    const dirty = this.store.dirty;
    const parent = this.store.links.parent[slot]!;
    const covered = parent !== INVALID && dirty[parent] === 1;

    if (dirty[slot] === 1) {
      // Subtree already dirty and free of members below `slot`.
      if (covered) this._roots.delete(slot);
      else this._roots.add(slot);
      return;
    }

    if (!covered) this._roots.add(slot);

    const roots = this._roots;
    walkSubtree(this.store.links, slot, this._stack, this.store.nodes.size, (s) => {
      if (s !== slot && dirty[s] === 1) {
        // Dirty below a clean parent: a member now subsumed by `slot`.
        roots.delete(s);
        return false;
      }
      dirty[s] = 1;
      return true;
    });
  }

  /** Drops a slot that is being destroyed. */
  forget(slot: number) {
    this._roots.delete(slot);
  }

  clear() {
    this._roots.clear();
  }
}
