// src/scene/core/transformStore.ts
import { INVALID } from "../interfaces.js";
import { identityInto } from "../math.js";
import { appendChildAtEnd, createLinks, growLinks, resetSlot, type NodeLinks } from "../tree/links.js";
import { NodeAllocator } from "./nodeAllocator.js";

const GROW = (n: number) => Math.max(2, n << 1);
export const FLOATS_PER_MATRIX = 16;

/**
 * Slot-addressed storage for the scene graph: links, local/world matrices
 * (16 floats per slot, column-major) and the dirty flag. Handle checks live
 * in Scene; everything here trusts its slot arguments.
 */
export class TransformStore {
  readonly nodes: NodeAllocator;

  private _capacity: number;
  private _links: NodeLinks;
  private _local: Float32Array;
  private _world: Float32Array;
  private _dirty: Uint8Array;

  constructor(initialCapacity = 1024) {
    const cap = Math.max(1, initialCapacity | 0);
    this._capacity = cap;
    this.nodes = new NodeAllocator(cap);
    this._links = createLinks(cap);
    this._local = new Float32Array(cap * FLOATS_PER_MATRIX);
    this._world = new Float32Array(cap * FLOATS_PER_MATRIX);
    this._dirty = new Uint8Array(cap);
  }

  // ---- accessors (re-read after allocate(): growth swaps the arrays)
  get capacity() {
    return this._capacity;
  }
  get links(): NodeLinks {
    return this._links;
  }
  get local() {
    return this._local;
  }
  get world() {
    return this._world;
  }
  get dirty() {
    return this._dirty;
  }

  private growToFit(slot: number) {
    if (slot < this._capacity) return;
    let cap = this._capacity;
    while (cap <= slot) cap = GROW(cap);

    this._links = growLinks(this._links, cap);

    const local = new Float32Array(cap * FLOATS_PER_MATRIX);
    local.set(this._local);
    const world = new Float32Array(cap * FLOATS_PER_MATRIX);
    world.set(this._world);
    const dirty = new Uint8Array(cap);
    dirty.set(this._dirty);

    this._local = local;
    this._world = world;
    this._dirty = dirty;
    this._capacity = cap;
  }

  /**
   * New slot with identity local/world, linked at the end of `parentSlot`'s
   * children. A child of a dirty parent starts dirty, so the flag stays true
   * for everything under a pending dirty root.
   */
  allocate(parentSlot: number): number {
    const slot = this.nodes.create();
    this.growToFit(slot);

    resetSlot(this._links, slot);
    identityInto(this._local, slot * FLOATS_PER_MATRIX);
    identityInto(this._world, slot * FLOATS_PER_MATRIX);
    this._dirty[slot] = 0;

    if (parentSlot !== INVALID) {
      appendChildAtEnd(this._links, parentSlot, slot);
      this._dirty[slot] = this._dirty[parentSlot]!;
    }
    return slot;
  }

  /** Frees a slot whose links were already detached from any live neighbour. */
  release(slot: number) {
    resetSlot(this._links, slot);
    this._dirty[slot] = 0;
    this.nodes.destroySlot(slot);
  }
}
