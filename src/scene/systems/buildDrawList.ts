// src/scene/systems/buildDrawList.ts

import { DrawLayout, type DrawDataStore } from "../drawables/drawStore.js";
import { AlphaMode } from "../interfaces.js";
import type { Vector3 } from "../../utils/math.js";

export interface DrawStats {
  drawCount: number;
  triangleCount: number;
}

export interface DrawList {
  /** Opaque and masked draws, grouped by pipeline, then material, then mesh. */
  opaque: number[];
  /** Transparent draws, farthest from the camera first. */
  transparent: number[];
  stats: DrawStats;
}

/**
 * Order visible draws for submission. Opaque draws are sorted to minimise
 * state changes; transparent ones back-to-front for blending.
 */
export function buildDrawList(visible: readonly number[], draw: DrawDataStore, cameraPosition: Vector3): DrawList {
  const lanes = draw.intLanes();

  const opaque: number[] = [];
  const transparent: number[] = [];
  let triangleCount = 0;

  for (const i of visible) {
    const base = i * DrawLayout.LANES;
    if (draw.alphaModeOf(i) === AlphaMode.Transparent) transparent.push(i);
    else opaque.push(i);
    triangleCount += Math.floor(lanes[base + DrawLayout.INDEX_COUNT]! / 3);
  }

  opaque.sort((a, b) => {
    const ba = a * DrawLayout.LANES, bb = b * DrawLayout.LANES;
    return (lanes[ba + DrawLayout.PIPELINE]! - lanes[bb + DrawLayout.PIPELINE]!) ||
           (lanes[ba + DrawLayout.MATERIAL]! - lanes[bb + DrawLayout.MATERIAL]!) ||
           (lanes[ba + DrawLayout.MESH]! - lanes[bb + DrawLayout.MESH]!) ||
           (a - b);
  });

  // translation lives in lanes 12..14 of the transform
  const byDistance = transparent.map((i) => {
    const t = draw.transform(i);
    const dx = t[12]! - cameraPosition.x, dy = t[13]! - cameraPosition.y, dz = t[14]! - cameraPosition.z;
    return { i, d: Math.sqrt(dx * dx + dy * dy + dz * dz) };
  });
  byDistance.sort((a, b) => (b.d - a.d) || (a.i - b.i));
  const backToFront = byDistance.map((x) => x.i);

  return {
    opaque,
    transparent: backToFront,
    stats: { drawCount: opaque.length + backToFront.length, triangleCount },
  };
}
