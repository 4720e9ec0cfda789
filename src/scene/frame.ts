// src/scene/frame.ts
import type { Camera } from "./camera.js";
import { visibleIndices } from "./culling/frustum.js";
import type { CullDataStore } from "./drawables/cullStore.js";
import type { DrawDataStore } from "./drawables/drawStore.js";
import type { DrawableIndexMap, Logger } from "./interfaces.js";
import type { Scene } from "./scene.js";
import { buildDrawList, type DrawList } from "./systems/buildDrawList.js";
import { syncDrawables } from "./systems/syncDrawables.js";

export interface FrameContext {
  scene: Scene;
  indexMap: DrawableIndexMap<Scene>;
  cull: CullDataStore;
  draw: DrawDataStore;
  camera: Camera;
  logger?: Logger; // per-frame summary at debug level; silent when omitted
}

export interface FrameResult extends DrawList {
  recomputed: number;
  synced: number;
  visible: number[];
}

/**
 * One update in the required order: propagate, sync, cull, order, then clear
 * the ledger. Edits must be finished before calling.
 */
export function runFrame(ctx: FrameContext): FrameResult {
  const { scene, indexMap, cull, draw, camera, logger } = ctx;

  const recomputed = scene.propagate();
  const synced = syncDrawables(scene.getChangedNodes(), scene, indexMap, cull, draw);
  const visible = visibleIndices(cull, camera.frustumPlanes, camera.viewMatrix().m);
  const list = buildDrawList(visible, draw, camera.position);
  scene.clearChangedNodes();

  logger?.debug(
    `frame: ${recomputed} recomputed, ${synced} synced, ${visible.length}/${cull.size} visible, ${list.stats.triangleCount} tris`
  );
  return { ...list, recomputed, synced, visible };
}
