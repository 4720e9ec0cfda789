// src/scene/culling/frustum.ts
// View-space frustum vs. oriented-box test. Planes live in view space, so each
// object only needs view × world once instead of once per plane.

import { CullLayout, type CullDataStore } from "../drawables/cullStore.js";
import type { Bounds, FrustumPlane, FrustumPlanes, Mat4Like } from "../interfaces.js";
import { mul4x4_into } from "../math.js";

function plane(x: number, y: number, z: number, d: number): FrustumPlane {
  const len = Math.sqrt(x * x + y * y + z * z);
  if (len > 0) return { x: x / len, y: y / len, z: z / len, d: d / len };
  return { x, y, z, d };
}

/**
 * Six view-space planes from a projection matrix: row3 ± row{0,1,2},
 * normalized to unit normals. Depends on the projection only, so compute it
 * when the projection changes, not per frame.
 */
export function extractFrustumPlanes(proj: Mat4Like): FrustumPlanes {
  // row r of a column-major matrix: m[r], m[4+r], m[8+r], m[12+r]
  const row = (r: number) => [proj[r]!, proj[4 + r]!, proj[8 + r]!, proj[12 + r]!] as const;
  const [ax, ay, az, aw] = row(3);
  const side = (r: number, sign: 1 | -1) => {
    const [bx, by, bz, bw] = row(r);
    return plane(ax + sign * bx, ay + sign * by, az + sign * bz, aw + sign * bw);
  };
  return [
    side(0, 1),  // left
    side(0, -1), // right
    side(1, 1),  // bottom
    side(1, -1), // top
    side(2, 1),  // near
    side(2, -1), // far
  ];
}

const objectToView = new Float32Array(16);

/**
 * Conservative box test. The box extents go to view space through |R| of
 * view × world, which over-covers rotated boxes and is exact for axis-aligned
 * or scaled ones. Lanes: transform at [t, t+16), center at c, half extents at e.
 */
function boxInFrustum(
  lanes: ArrayLike<number>, t: number, c: number, e: number,
  planes: FrustumPlanes,
  view: Mat4Like
): boolean {
  mul4x4_into(view, 0, lanes, t, objectToView, 0);
  const m = objectToView;

  const cx = lanes[c]!, cy = lanes[c + 1]!, cz = lanes[c + 2]!;
  const vx = m[0]! * cx + m[4]! * cy + m[8]!  * cz + m[12]!;
  const vy = m[1]! * cx + m[5]! * cy + m[9]!  * cz + m[13]!;
  const vz = m[2]! * cx + m[6]! * cy + m[10]! * cz + m[14]!;

  const ex = lanes[e]!, ey = lanes[e + 1]!, ez = lanes[e + 2]!;
  const rx = Math.abs(m[0]!) * ex + Math.abs(m[4]!) * ey + Math.abs(m[8]!)  * ez;
  const ry = Math.abs(m[1]!) * ex + Math.abs(m[5]!) * ey + Math.abs(m[9]!)  * ez;
  const rz = Math.abs(m[2]!) * ex + Math.abs(m[6]!) * ey + Math.abs(m[10]!) * ez;

  for (let p = 0; p < 6; p++) {
    const pl = planes[p]!;
    const r = rx * Math.abs(pl.x) + ry * Math.abs(pl.y) + rz * Math.abs(pl.z);
    const d = pl.x * vx + pl.y * vy + pl.z * vz + pl.d;
    if (d + r < 0) return false;
  }
  return true;
}

export function isInFrustum(
  worldTransform: Mat4Like,
  bounds: Bounds,
  planes: FrustumPlanes,
  view: Mat4Like
): boolean {
  const { center: c, halfExtents: e } = bounds;
  const lanes = new Float32Array(22);
  for (let i = 0; i < 16; i++) lanes[i] = worldTransform[i]!;
  lanes[16] = c.x; lanes[17] = c.y; lanes[18] = c.z;
  lanes[19] = e.x; lanes[20] = e.y; lanes[21] = e.z;
  return boxInFrustum(lanes, 0, 16, 19, planes, view);
}

/** Indices of every CullData entry that passes all six planes, ascending. */
export function visibleIndices(cull: CullDataStore, planes: FrustumPlanes, view: Mat4Like): number[] {
  const lanes = cull.lanes();
  const out: number[] = [];
  for (let i = 0; i < cull.size; i++) {
    const base = i * CullLayout.LANES;
    if (boxInFrustum(lanes, base + CullLayout.TRANSFORM, base + CullLayout.CENTER, base + CullLayout.HALF_EXTENTS, planes, view)) {
      out.push(i);
    }
  }
  return out;
}
