// src/scene/core/nodeAllocator.ts
import type { NodeHandle } from "../interfaces.js";

const GROW = (n: number) => Math.max(2, n << 1);

const INDEX_BITS = 20;
export const MAX_NODES = 1 << INDEX_BITS;
const INDEX_MASK = MAX_NODES - 1;
const GENERATION_MASK = 0x7ff; // 11 bits keeps handles positive int32

export const slotOf = (handle: NodeHandle) => handle & INDEX_MASK;
export const generationOf = (handle: NodeHandle) => (handle >>> INDEX_BITS) & GENERATION_MASK;
export const makeHandle = (slot: number, generation: number): NodeHandle =>
  ((generation & GENERATION_MASK) << INDEX_BITS) | (slot & INDEX_MASK);

/**
 * Slot allocator with per-slot generations. Freed slots are reused LIFO with
 * their generation bumped, so the old handle stops resolving.
 */
export class NodeAllocator {
  private _free: number[] = [];
  private _next = 0;
  private _live = 0;
  private _alive: Uint8Array;
  private _generation: Uint16Array;

  constructor(initialCapacity: number) {
    const cap = Math.max(1, initialCapacity | 0);
    this._alive = new Uint8Array(cap);
    this._generation = new Uint16Array(cap);
  }

  get capacity() {
    return this._alive.length | 0;
  }
  /** Number of live slots. */
  get size() {
    return this._live;
  }

  private growToFit(slot: number) {
    if (slot < this._alive.length) return;
    let newCap = this._alive.length;
    while (newCap <= slot) newCap = GROW(newCap);
    const alive = new Uint8Array(newCap);
    alive.set(this._alive);
    const generation = new Uint16Array(newCap);
    generation.set(this._generation);
    this._alive = alive;
    this._generation = generation;
  }

  /** Returns the slot of the new node; `handleOf(slot)` gives its handle. */
  create(): number {
    let slot: number;
    const reused = this._free.pop();
    if (reused !== undefined) {
      slot = reused;
    } else {
      if (this._next >= MAX_NODES) throw new RangeError(`NodeAllocator: more than ${MAX_NODES} nodes`);
      slot = this._next++;
      this.growToFit(slot);
    }
    this._alive[slot] = 1;
    this._live++;
    return slot;
  }

  /** Frees a live slot. Returns false if it was not live. */
  destroySlot(slot: number): boolean {
    if (slot < 0 || slot >= this._alive.length || this._alive[slot] === 0) return false;
    this._alive[slot] = 0;
    this._generation[slot] = (this._generation[slot]! + 1) & GENERATION_MASK;
    this._free.push(slot);
    this._live--;
    return true;
  }

  handleOf(slot: number): NodeHandle {
    return makeHandle(slot, this._generation[slot] ?? 0);
  }

  isAlive(handle: NodeHandle): boolean {
    return this.resolve(handle) >= 0;
  }

  isSlotAlive(slot: number): boolean {
    return slot >= 0 && slot < this._alive.length && this._alive[slot] === 1;
  }

  /** Slot for a live handle, -1 for stale, negative or unknown handles. */
  resolve(handle: NodeHandle): number {
    if (!Number.isInteger(handle) || handle < 0) return -1;
    const slot = slotOf(handle);
    if (!this.isSlotAlive(slot)) return -1;
    return this._generation[slot] === generationOf(handle) ? slot : -1;
  }
}
