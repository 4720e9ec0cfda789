// src/scene/drawables/cullStore.ts
// Per-drawable culling inputs: world transform copy + local-space bounds.

import { Vector3 } from "../../utils/math.js";
import type { Bounds, Mat4Like } from "../interfaces.js";
import { FlatStore } from "./flatStore.js";

// Row layout (32-bit lanes): TRANSFORM(16 f32) CENTER(3) HALF_EXTENTS(3) SPHERE_RADIUS(1) pad(1)
export const CullLayout = {
  TRANSFORM: 0,
  CENTER: 16,
  HALF_EXTENTS: 19,
  SPHERE_RADIUS: 22,
  LANES: 24,
} as const;

export type CullEntryInit = {
  transform?: Mat4Like;
  bounds: Bounds;
};

export class CullDataStore extends FlatStore {
  constructor(initialCapacity = 64) {
    super("CullData", CullLayout.LANES, initialCapacity);
  }

  add(init: CullEntryInit): number {
    const row = this.allocRow();
    const base = row * CullLayout.LANES;
    const f = this.f32;
    if (init.transform) {
      for (let i = 0; i < 16; i++) f[base + i] = init.transform[i]!;
    } else {
      f[base] = 1; f[base + 5] = 1; f[base + 10] = 1; f[base + 15] = 1;
    }
    this.setBounds(row, init.bounds);
    return row;
  }

  setBounds(index: number, bounds: Bounds) {
    this.assertIndex(index);
    const base = index * CullLayout.LANES;
    const { center: c, halfExtents: e } = bounds;
    const f = this.f32;
    f[base + CullLayout.CENTER] = c.x;
    f[base + CullLayout.CENTER + 1] = c.y;
    f[base + CullLayout.CENTER + 2] = c.z;
    f[base + CullLayout.HALF_EXTENTS] = e.x;
    f[base + CullLayout.HALF_EXTENTS + 1] = e.y;
    f[base + CullLayout.HALF_EXTENTS + 2] = e.z;
    f[base + CullLayout.SPHERE_RADIUS] = bounds.sphereRadius ?? e.length();
    this.markRowDirty(index);
  }

  bounds(index: number): Required<Bounds> {
    this.assertIndex(index);
    const base = index * CullLayout.LANES;
    const f = this.f32;
    return {
      center: new Vector3(f[base + 16]!, f[base + 17]!, f[base + 18]!),
      halfExtents: new Vector3(f[base + 19]!, f[base + 20]!, f[base + 21]!),
      sphereRadius: f[base + CullLayout.SPHERE_RADIUS]!,
    };
  }

  /** Raw lanes for the culling loop: row i starts at i * CullLayout.LANES. */
  lanes(): Float32Array {
    return this.f32;
  }
}

/** Local-space bounds of a packed xyz position array (min/max box). */
export function boundsFromPositions(positions: ArrayLike<number>): Required<Bounds> {
  if (positions.length < 3) {
    return { center: Vector3.zero(), halfExtents: Vector3.zero(), sphereRadius: 0 };
  }
  let minX = Infinity, minY = Infinity, minZ = Infinity;
  let maxX = -Infinity, maxY = -Infinity, maxZ = -Infinity;
  for (let i = 0; i + 2 < positions.length; i += 3) {
    const x = positions[i]!, y = positions[i + 1]!, z = positions[i + 2]!;
    if (x < minX) minX = x; if (x > maxX) maxX = x;
    if (y < minY) minY = y; if (y > maxY) maxY = y;
    if (z < minZ) minZ = z; if (z > maxZ) maxZ = z;
  }
  const halfExtents = new Vector3((maxX - minX) / 2, (maxY - minY) / 2, (maxZ - minZ) / 2);
  return {
    center: new Vector3((maxX + minX) / 2, (maxY + minY) / 2, (maxZ + minZ) / 2),
    halfExtents,
    sphereRadius: halfExtents.length(),
  };
}
