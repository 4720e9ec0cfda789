// src/scene/core/changeLedger.ts
import type { NodeHandle } from "../interfaces.js";

/**
 * Handles whose world transform was recomputed since the caller last cleared.
 * Propagation only ever adds; several consumers can read the same contents
 * before one of them clears it.
 */
export class ChangedNodeLedger {
  private readonly _changed = new Set<NodeHandle>();

  record(node: NodeHandle) {
    this._changed.add(node);
  }

  has(node: NodeHandle): boolean {
    return this._changed.has(node);
  }

  get size() {
    return this._changed.size;
  }

  current(): ReadonlySet<NodeHandle> {
    return this._changed;
  }

  /** Drops a destroyed node so consumers never see its handle. */
  forget(node: NodeHandle) {
    this._changed.delete(node);
  }

  clear() {
    this._changed.clear();
  }
}
