// src/scene/systems/propagateTransforms.ts

import type { ChangedNodeLedger } from "../core/changeLedger.js";
import type { DirtyRootTracker } from "../core/dirtyRoots.js";
import { FLOATS_PER_MATRIX, type TransformStore } from "../core/transformStore.js";
import { INVALID } from "../interfaces.js";
import { copy4x4_into, mul4x4_into } from "../math.js";
import { walkSubtree, WalkStack } from "../tree/walk.js";

// Workspace can be kept and reused across frames
export class PropagateWorkspace {
  readonly stack = new WalkStack();
}

/**
 * Recompute world transforms under every dirty root, pre-order, so a parent's
 * world is always fresh before its children read it. Every visited node is
 * cleared and recorded in the ledger; children are visited unconditionally.
 * Roots are consumed. Returns the number of nodes recomputed.
 */
export function propagateTransforms(
  store: TransformStore,
  tracker: DirtyRootTracker,
  ledger: ChangedNodeLedger,
  workspace?: PropagateWorkspace
): number {
  if (tracker.size === 0) return 0;
  const ws = workspace ?? new PropagateWorkspace();

  const links = store.links;
  const local = store.local;
  const world = store.world;
  const dirty = store.dirty;
  const nodes = store.nodes;
  const maxNodes = nodes.size;

  let recomputed = 0;
  const enter = (slot: number) => {
    const o = slot * FLOATS_PER_MATRIX;
    const parent = links.parent[slot]!;
    if (parent === INVALID) {
      copy4x4_into(local, o, world, o);
    } else {
      // world = parent.world × local
      mul4x4_into(world, parent * FLOATS_PER_MATRIX, local, o, world, o);
    }
    dirty[slot] = 0;
    ledger.record(nodes.handleOf(slot));
    recomputed++;
    return true;
  };

  for (const root of tracker.roots()) {
    walkSubtree(links, root, ws.stack, maxNodes, enter);
  }
  tracker.clear();
  return recomputed;
}
