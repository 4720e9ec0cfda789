// src/scene/systems/syncDrawables.ts

import type { CullDataStore } from "../drawables/cullStore.js";
import type { DrawDataStore } from "../drawables/drawStore.js";
import type { DrawableIndexMap, NodeHandle, TransformSource } from "../interfaces.js";

const scratch = new Float32Array(16);

/**
 * Copy the world transform of every changed node into the CullData and
 * DrawData rows it maps to. Cost is the total fan-out of `changed`, never
 * the store size.
 *
 * Nodes that are gone from the scene, or that map to nothing, are skipped:
 * a drawable may be deregistered between the edit and the sync. Returns the
 * number of rows written.
 */
export function syncDrawables<S extends TransformSource>(
  changed: Iterable<NodeHandle>,
  scene: S,
  indexMap: DrawableIndexMap<S>,
  cull: CullDataStore,
  draw: DrawDataStore
): number {
  let written = 0;
  for (const node of changed) {
    if (!scene.isAlive(node)) continue;
    const indices = indexMap.lookup(scene, node);
    if (indices.length === 0) continue;

    scene.copyWorldInto(node, scratch, 0);
    for (let k = 0; k < indices.length; k++) {
      const i = indices[k]!;
      cull.writeTransform(i, scratch);
      draw.writeTransform(i, scratch);
      written++;
    }
  }
  return written;
}
