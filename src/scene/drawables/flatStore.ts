// src/scene/drawables/flatStore.ts
// Shared row storage for the index-aligned drawable stores.

import { IndexOutOfRangeError } from "../errors.js";
import type { UploadTarget } from "../interfaces.js";

export const BYTES_PER_LANE = 4;

const GROW = (n: number) => Math.max(2, n << 1);

/**
 * Fixed-stride rows in one ArrayBuffer with f32/i32 views over the same lanes.
 * Writes queue dirty row ranges so flush() can upload only what moved.
 * Indices are dense: add() appends, swapRemove() fills the hole with the tail.
 */
export abstract class FlatStore {
  protected cpu: ArrayBuffer;
  protected f32: Float32Array;
  protected i32: Int32Array;

  protected readonly lanesPerRow: number;
  protected count = 0;

  // dirty ranges tracked in row index space: [start0,end0,start1,end1,...]
  protected dirtyRanges: number[] = [];

  protected constructor(readonly name: string, lanesPerRow: number, initialCapacity = 64) {
    this.lanesPerRow = lanesPerRow | 0;
    const rows = Math.max(1, initialCapacity | 0);
    this.cpu = new ArrayBuffer(rows * this.rowSizeBytes);
    this.f32 = new Float32Array(this.cpu);
    this.i32 = new Int32Array(this.cpu);
  }

  get size(): number {
    return this.count;
  }
  get rowSizeBytes(): number {
    return this.lanesPerRow * BYTES_PER_LANE;
  }
  get sizeBytes(): number {
    return this.count * this.rowSizeBytes;
  }
  get capacity(): number {
    return (this.cpu.byteLength / this.rowSizeBytes) | 0;
  }

  protected assertIndex(index: number) {
    if (!Number.isInteger(index) || index < 0 || index >= this.count)
      throw new IndexOutOfRangeError(this.name, index, this.count);
  }

  /** Appends a zeroed row and returns its index. */
  protected allocRow(): number {
    if (this.count >= this.capacity) {
      const next = new ArrayBuffer(GROW(this.capacity) * this.rowSizeBytes);
      new Uint8Array(next).set(new Uint8Array(this.cpu));
      this.cpu = next;
      this.f32 = new Float32Array(this.cpu);
      this.i32 = new Int32Array(this.cpu);
    }
    const row = this.count++;
    this.i32.fill(0, row * this.lanesPerRow, (row + 1) * this.lanesPerRow);
    this.markRowDirty(row);
    return row;
  }

  /**
   * Removes `index` by moving the last row into it.
   * Returns the index the moved row came from, or -1 if `index` was the tail.
   */
  swapRemove(index: number): number {
    this.assertIndex(index);
    const last = this.count - 1;
    this.count = last;
    this.clampDirtyRanges();
    if (index === last) return -1;

    const lanes = this.lanesPerRow;
    this.i32.copyWithin(index * lanes, last * lanes, (last + 1) * lanes);
    this.markRowDirty(index);
    return last;
  }

  /**
   * Mark a single row dirty (coalesces with tail if adjacent). Once the queue
   * holds more ranges than there are rows it collapses to one full range, so
   * a store that is never flushed stays bounded.
   */
  protected markRowDirty(rowIndex: number) {
    if (rowIndex < 0) return;
    if (this.dirtyRanges.length === 0) {
      this.dirtyRanges.push(rowIndex, rowIndex);
      return;
    }
    const lastEndI = this.dirtyRanges.length - 1;
    const lastEnd = this.dirtyRanges[lastEndI]!;
    const lastStart = this.dirtyRanges[lastEndI - 1]!;
    if (rowIndex >= lastStart && rowIndex <= lastEnd) return;
    if (rowIndex === lastEnd + 1) {
      this.dirtyRanges[lastEndI] = rowIndex; // extend tail
    } else {
      this.dirtyRanges.push(rowIndex, rowIndex);
      if (this.dirtyRanges.length > 2 * this.count) {
        this.dirtyRanges.length = 0;
        this.dirtyRanges.push(0, this.count - 1);
      }
    }
  }

  get hasPendingUploads(): boolean {
    return this.dirtyRanges.length > 0;
  }

  // Rows past the tail no longer exist; keep queued ranges inside [0, count).
  private clampDirtyRanges() {
    const kept: number[] = [];
    for (let i = 0; i < this.dirtyRanges.length; i += 2) {
      const a = this.dirtyRanges[i]!;
      const b = Math.min(this.dirtyRanges[i + 1]!, this.count - 1);
      if (a <= b) kept.push(a, b);
    }
    this.dirtyRanges = kept;
  }

  /** Merge and upload all queued ranges; clears the queue. Returns the number of writes. */
  flush(target: UploadTarget): number {
    if (this.dirtyRanges.length === 0) return 0;

    // ranges arrive in change order, not row order
    const pairs: [number, number][] = [];
    for (let i = 0; i < this.dirtyRanges.length; i += 2) {
      pairs.push([this.dirtyRanges[i]!, this.dirtyRanges[i + 1]!]);
    }
    pairs.sort((x, y) => x[0] - y[0]);

    const merged: [number, number][] = [];
    for (const [a, b] of pairs) {
      const last = merged[merged.length - 1];
      if (last && a <= last[1] + 1) last[1] = Math.max(last[1], b);
      else merged.push([a, b]);
    }
    this.dirtyRanges.length = 0;

    // Fast-path: if merged coverage spans entire buffer, emit one full write
    const only = merged.length === 1 ? merged[0] : undefined;
    if (only && only[0] === 0 && only[1] === this.count - 1) {
      target.writeBuffer(0, this.cpu, 0, this.sizeBytes);
      return 1;
    }

    for (const [start, end] of merged) {
      const offset = start * this.rowSizeBytes;
      const size = (end - start + 1) * this.rowSizeBytes;
      target.writeBuffer(offset, this.cpu, offset, size);
    }
    return merged.length;
  }

  /** Copies 16 floats into lanes [0, 16) of row `index`. */
  writeTransform(index: number, src: ArrayLike<number>, srcOffset = 0) {
    this.assertIndex(index);
    const base = index * this.lanesPerRow;
    for (let i = 0; i < 16; i++) this.f32[base + i] = src[srcOffset + i]!;
    this.markRowDirty(index);
  }

  /** Live view of the transform lanes of row `index`; invalidated by growth. */
  transform(index: number): Float32Array {
    this.assertIndex(index);
    const base = index * this.lanesPerRow;
    return this.f32.subarray(base, base + 16);
  }
}
