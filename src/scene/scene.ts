// src/scene/scene.ts
import { ChangedNodeLedger } from "./core/changeLedger.js";
import { DirtyRootTracker } from "./core/dirtyRoots.js";
import { FLOATS_PER_MATRIX, TransformStore } from "./core/transformStore.js";
import { HierarchyCycleError, InvalidHandleError } from "./errors.js";
import { INVALID, type DestroyListener, type Mat4Like, type NodeHandle, type TransformSource } from "./interfaces.js";
import { copy4x4_into } from "./math.js";
import { PropagateWorkspace, propagateTransforms } from "./systems/propagateTransforms.js";
import { appendChildAtEnd, childSlots, detachFromParent, isAncestor } from "./tree/links.js";
import { walkSubtree, WalkStack } from "./tree/walk.js";

export interface SceneConfig {
  initialCapacity?: number; // default 1024
}

/**
 * Scene-editing surface over one transform hierarchy.
 *
 * World transforms are push-propagated: edits only mark, propagate() does the
 * work, and getWorldTransform() returns whatever the last propagate() left,
 * dirty or not.
 *
 * Not reentrant. Do not edit while propagate() or a sync over this scene runs.
 */
export class Scene implements TransformSource {
  private readonly store: TransformStore;
  private readonly tracker: DirtyRootTracker;
  private readonly ledger = new ChangedNodeLedger();
  private readonly workspace = new PropagateWorkspace();
  private readonly walkStack = new WalkStack();
  private readonly destroyListeners = new Set<DestroyListener>();

  constructor(cfg: SceneConfig = {}) {
    this.store = new TransformStore(cfg.initialCapacity ?? 1024);
    this.tracker = new DirtyRootTracker(this.store);
  }

  /** Live node count. */
  get size() {
    return this.store.nodes.size;
  }

  private slotOrThrow(node: NodeHandle, op: string): number {
    const slot = this.store.nodes.resolve(node);
    if (slot < 0) throw new InvalidHandleError(node, op);
    return slot;
  }

  // ---- structure

  createNode(parent: NodeHandle = INVALID): NodeHandle {
    const parentSlot = parent === INVALID ? INVALID : this.slotOrThrow(parent, "createNode");
    const slot = this.store.allocate(parentSlot);
    return this.store.nodes.handleOf(slot);
  }

  /**
   * Notifies `listener` after each destroyNode() with the handles it removed,
   * so whoever maps nodes to drawables can drop theirs.
   */
  onNodesDestroyed(listener: DestroyListener): () => void {
    this.destroyListeners.add(listener);
    return () => {
      this.destroyListeners.delete(listener);
    };
  }

  /**
   * Removes `node` and its whole subtree, including any pending dirty/changed
   * entries. Returns the removed handles, pre-order.
   */
  destroyNode(node: NodeHandle): NodeHandle[] {
    const rootSlot = this.slotOrThrow(node, "destroyNode");
    const { store, tracker, ledger } = this;
    const links = store.links;

    detachFromParent(links, rootSlot);

    const doomed: number[] = [];
    walkSubtree(links, rootSlot, this.walkStack, store.nodes.size, (slot) => {
      doomed.push(slot);
      return true;
    });
    const handles = doomed.map((slot) => store.nodes.handleOf(slot));
    for (let i = 0; i < doomed.length; i++) {
      const slot = doomed[i]!;
      tracker.forget(slot);
      ledger.forget(handles[i]!);
      store.release(slot);
    }
    for (const listener of [...this.destroyListeners]) listener(handles);
    return handles;
  }

  /**
   * Moves `node` to the end of `parent`'s children (INVALID makes it a forest
   * root). The local transform is kept, so the world transform follows the new
   * parent on the next propagate().
   */
  setParent(node: NodeHandle, parent: NodeHandle) {
    const slot = this.slotOrThrow(node, "setParent");
    const parentSlot = parent === INVALID ? INVALID : this.slotOrThrow(parent, "setParent");
    const links = this.store.links;

    if (parentSlot === slot || isAncestor(links, slot, parentSlot))
      throw new HierarchyCycleError(`setParent: ${parent} is ${node} or one of its descendants`);
    if (links.parent[slot] === parentSlot) return;

    detachFromParent(links, slot);
    if (parentSlot !== INVALID) appendChildAtEnd(links, parentSlot, slot);
    this.tracker.mark(slot);
  }

  isAlive(node: NodeHandle): boolean {
    return this.store.nodes.isAlive(node);
  }

  parentOf(node: NodeHandle): NodeHandle {
    const slot = this.slotOrThrow(node, "parentOf");
    const parentSlot = this.store.links.parent[slot]!;
    return parentSlot === INVALID ? INVALID : this.store.nodes.handleOf(parentSlot);
  }

  childrenOf(node: NodeHandle): NodeHandle[] {
    const slot = this.slotOrThrow(node, "childrenOf");
    return childSlots(this.store.links, slot).map((s) => this.store.nodes.handleOf(s));
  }

  // ---- transforms

  setLocalTransform(node: NodeHandle, matrix: Mat4Like) {
    const slot = this.slotOrThrow(node, "setLocalTransform");
    if (matrix.length < FLOATS_PER_MATRIX)
      throw new RangeError(`setLocalTransform: expected 16 values, got ${matrix.length}`);
    copy4x4_into(matrix, 0, this.store.local, slot * FLOATS_PER_MATRIX);
    this.tracker.mark(slot);
  }

  getLocalTransform(node: NodeHandle): Float32Array {
    const o = this.slotOrThrow(node, "getLocalTransform") * FLOATS_PER_MATRIX;
    return this.store.local.slice(o, o + FLOATS_PER_MATRIX);
  }

  /** Last propagated world transform (a copy). Never recomputes. */
  getWorldTransform(node: NodeHandle): Float32Array {
    const o = this.slotOrThrow(node, "getWorldTransform") * FLOATS_PER_MATRIX;
    return this.store.world.slice(o, o + FLOATS_PER_MATRIX);
  }

  copyWorldInto(node: NodeHandle, out: Float32Array, offset = 0) {
    const o = this.slotOrThrow(node, "copyWorldInto") * FLOATS_PER_MATRIX;
    copy4x4_into(this.store.world, o, out, offset);
  }

  isDirty(node: NodeHandle): boolean {
    return this.store.dirty[this.slotOrThrow(node, "isDirty")] === 1;
  }

  // ---- propagation

  /** Handles of the current dirty roots. Order carries no meaning. */
  dirtyRoots(): NodeHandle[] {
    return Array.from(this.tracker.roots(), (slot) => this.store.nodes.handleOf(slot));
  }

  /** Returns the number of nodes recomputed; 0 when nothing was dirty. */
  propagate(): number {
    return propagateTransforms(this.store, this.tracker, this.ledger, this.workspace);
  }

  getChangedNodes(): ReadonlySet<NodeHandle> {
    return this.ledger.current();
  }

  clearChangedNodes() {
    this.ledger.clear();
  }
}
