// src/scene/drawables/registry.ts
import { IndexOutOfRangeError } from "../errors.js";
import type { Bounds, DrawableIndexMap, NodeHandle, TransformSource } from "../interfaces.js";
import { CullDataStore } from "./cullStore.js";
import { DrawDataStore, type DrawEntryInit } from "./drawStore.js";

/** One renderable section of a node (a mesh surface with its own material). */
export type SurfaceInit = Omit<DrawEntryInit, "transform"> & { bounds: Bounds };

type Owner = { scene: TransformSource; node: NodeHandle };

const EMPTY: readonly number[] = Object.freeze([]);

/**
 * Registration side of the drawable stores. Sole owner of resizing: add and
 * remove go through here so CullData and DrawData stay the same length, and
 * the node -> index map is patched when swap-remove moves a row. Scenes that
 * report destroys are watched while they own drawables, so a destroyed node's
 * drawables go with it.
 */
export class DrawableRegistry implements DrawableIndexMap<TransformSource> {
  readonly cull: CullDataStore;
  readonly draw: DrawDataStore;

  private readonly byScene = new Map<TransformSource, Map<NodeHandle, number[]>>();
  private readonly unsubscribe = new Map<TransformSource, () => void>();
  private owners: Owner[] = [];

  constructor(initialCapacity = 64) {
    this.cull = new CullDataStore(initialCapacity);
    this.draw = new DrawDataStore(initialCapacity);
  }

  get size() {
    return this.owners.length;
  }

  /**
   * Appends one drawable for `node`, seeded with its current world transform.
   * Throws InvalidHandleError if `node` is not alive in `scene`.
   */
  register(scene: TransformSource, node: NodeHandle, surface: SurfaceInit): number {
    const transform = new Float32Array(16);
    scene.copyWorldInto(node, transform);

    const { bounds, ...drawFields } = surface;
    const index = this.cull.add({ transform, bounds });
    const drawIndex = this.draw.add({ ...drawFields, transform });
    if (drawIndex !== index) throw new Error(`Drawable stores out of step: ${index} vs ${drawIndex}`);

    let nodes = this.byScene.get(scene);
    if (!nodes) {
      nodes = new Map();
      this.byScene.set(scene, nodes);
      const off = scene.onNodesDestroyed?.((dead) => {
        for (const n of dead) this.unregisterNode(scene, n);
      });
      if (off) this.unsubscribe.set(scene, off);
    }
    const list = nodes.get(node);
    if (list) list.push(index);
    else nodes.set(node, [index]);

    this.owners.push({ scene, node });
    return index;
  }

  /** Removes drawable `index` from both stores; the tail entry moves into its place. */
  unregister(index: number) {
    const owner = this.owners[index];
    if (!owner) throw new IndexOutOfRangeError("DrawableRegistry", index, this.owners.length);

    this.detachIndex(owner, index);

    const movedFrom = this.cull.swapRemove(index);
    this.draw.swapRemove(index);

    const moved = this.owners.pop();
    if (movedFrom >= 0 && moved) {
      this.owners[index] = moved;
      const list = this.byScene.get(moved.scene)?.get(moved.node);
      if (list) {
        const at = list.indexOf(movedFrom);
        if (at >= 0) list[at] = index;
      }
    }
  }

  /** Removes every drawable of `node`. Returns how many were removed. */
  unregisterNode(scene: TransformSource, node: NodeHandle): number {
    const list = this.byScene.get(scene)?.get(node);
    if (!list) return 0;
    let removed = 0;
    // Highest first: a swap-remove never moves a lower index of the same node.
    for (const index of [...list].sort((a, b) => b - a)) {
      this.unregister(index);
      removed++;
    }
    return removed;
  }

  lookup(scene: TransformSource, node: NodeHandle): readonly number[] {
    return this.byScene.get(scene)?.get(node) ?? EMPTY;
  }

  ownerOf(index: number): Readonly<Owner> | undefined {
    return this.owners[index];
  }

  private detachIndex(owner: Owner, index: number) {
    const nodes = this.byScene.get(owner.scene);
    const list = nodes?.get(owner.node);
    if (!nodes || !list) return;
    const at = list.indexOf(index);
    if (at >= 0) list.splice(at, 1);
    if (list.length === 0) nodes.delete(owner.node);
    if (nodes.size === 0) {
      this.byScene.delete(owner.scene);
      this.unsubscribe.get(owner.scene)?.();
      this.unsubscribe.delete(owner.scene);
    }
  }
}
