// src/scene/math.ts
// Offset-addressed 4x4 helpers over flat Float32Array columns (column-major, m[col*4+row]).
// Nothing here allocates; callers own the scratch.

export const ORTHONORMAL_EPS = 1e-4;
const SINGULAR_EPS = 1e-12;

export function identityInto(out: Float32Array, o = 0) {
  for (let i = 0; i < 16; i++) out[o + i] = 0;
  out[o] = 1; out[o + 5] = 1; out[o + 10] = 1; out[o + 15] = 1;
}

export function copy4x4_into(src: ArrayLike<number>, so: number, out: Float32Array, o: number) {
  for (let i = 0; i < 16; i++) out[o + i] = src[so + i]!;
}

/** out := A * B. `out` must not overlap A or B. */
export function mul4x4_into(
  a: ArrayLike<number>, ao: number,
  b: ArrayLike<number>, bo: number,
  out: Float32Array, o: number
) {
  const a00 = a[ao]!,     a10 = a[ao + 1]!,  a20 = a[ao + 2]!,  a30 = a[ao + 3]!;
  const a01 = a[ao + 4]!, a11 = a[ao + 5]!,  a21 = a[ao + 6]!,  a31 = a[ao + 7]!;
  const a02 = a[ao + 8]!, a12 = a[ao + 9]!,  a22 = a[ao + 10]!, a32 = a[ao + 11]!;
  const a03 = a[ao + 12]!, a13 = a[ao + 13]!, a23 = a[ao + 14]!, a33 = a[ao + 15]!;

  for (let c = 0; c < 4; c++) {
    const b0 = b[bo + c * 4]!, b1 = b[bo + c * 4 + 1]!, b2 = b[bo + c * 4 + 2]!, b3 = b[bo + c * 4 + 3]!;
    out[o + c * 4]     = a00 * b0 + a01 * b1 + a02 * b2 + a03 * b3;
    out[o + c * 4 + 1] = a10 * b0 + a11 * b1 + a12 * b2 + a13 * b3;
    out[o + c * 4 + 2] = a20 * b0 + a21 * b1 + a22 * b2 + a23 * b3;
    out[o + c * 4 + 3] = a30 * b0 + a31 * b1 + a32 * b2 + a33 * b3;
  }
}

/** Orthonormal check on the columns of the upper 3x3. */
export function isOrthonormal3x3(m: ArrayLike<number>, o = 0): boolean {
  const c0x = m[o]!,     c0y = m[o + 1]!, c0z = m[o + 2]!;
  const c1x = m[o + 4]!, c1y = m[o + 5]!, c1z = m[o + 6]!;
  const c2x = m[o + 8]!, c2y = m[o + 9]!, c2z = m[o + 10]!;

  const d01 = c0x*c1x + c0y*c1y + c0z*c1z;
  const d02 = c0x*c2x + c0y*c2y + c0z*c2z;
  const d12 = c1x*c2x + c1y*c2y + c1z*c2z;

  const n0 = c0x*c0x + c0y*c0y + c0z*c0z;
  const n1 = c1x*c1x + c1y*c1y + c1z*c1z;
  const n2 = c2x*c2x + c2y*c2y + c2z*c2z;

  return Math.abs(d01) < ORTHONORMAL_EPS &&
         Math.abs(d02) < ORTHONORMAL_EPS &&
         Math.abs(d12) < ORTHONORMAL_EPS &&
         Math.abs(n0 - 1) < ORTHONORMAL_EPS &&
         Math.abs(n1 - 1) < ORTHONORMAL_EPS &&
         Math.abs(n2 - 1) < ORTHONORMAL_EPS;
}

/**
 * Inverse of an affine 4x4 (bottom row 0,0,0,1): inv = [R^-1 | -R^-1 t].
 * Rigid inputs take the transpose path. Throws on a singular linear part.
 */
export function invertAffine4x4_into(m: ArrayLike<number>, mo: number, out: Float32Array, o: number) {
  const r00 = m[mo]!,     r10 = m[mo + 1]!, r20 = m[mo + 2]!;
  const r01 = m[mo + 4]!, r11 = m[mo + 5]!, r21 = m[mo + 6]!;
  const r02 = m[mo + 8]!, r12 = m[mo + 9]!, r22 = m[mo + 10]!;
  const tx = m[mo + 12]!, ty = m[mo + 13]!, tz = m[mo + 14]!;

  let i00: number, i01: number, i02: number;
  let i10: number, i11: number, i12: number;
  let i20: number, i21: number, i22: number;

  if (isOrthonormal3x3(m, mo)) {
    i00 = r00; i01 = r10; i02 = r20;
    i10 = r01; i11 = r11; i12 = r21;
    i20 = r02; i21 = r12; i22 = r22;
  } else {
    const c00 =  (r11*r22 - r12*r21);
    const c01 = -(r10*r22 - r12*r20);
    const c02 =  (r10*r21 - r11*r20);

    const c10 = -(r01*r22 - r02*r21);
    const c11 =  (r00*r22 - r02*r20);
    const c12 = -(r00*r21 - r01*r20);

    const c20 =  (r01*r12 - r02*r11);
    const c21 = -(r00*r12 - r02*r10);
    const c22 =  (r00*r11 - r01*r10);

    const det = r00*c00 + r01*c01 + r02*c02;
    if (Math.abs(det) < SINGULAR_EPS) throw new Error("Singular matrix");
    const invDet = 1 / det;

    i00 = c00 * invDet; i01 = c10 * invDet; i02 = c20 * invDet;
    i10 = c01 * invDet; i11 = c11 * invDet; i12 = c21 * invDet;
    i20 = c02 * invDet; i21 = c12 * invDet; i22 = c22 * invDet;
  }

  out[o]      = i00; out[o + 1]  = i10; out[o + 2]  = i20; out[o + 3]  = 0;
  out[o + 4]  = i01; out[o + 5]  = i11; out[o + 6]  = i21; out[o + 7]  = 0;
  out[o + 8]  = i02; out[o + 9]  = i12; out[o + 10] = i22; out[o + 11] = 0;
  out[o + 12] = -(i00*tx + i01*ty + i02*tz);
  out[o + 13] = -(i10*tx + i11*ty + i12*tz);
  out[o + 14] = -(i20*tx + i21*ty + i22*tz);
  out[o + 15] = 1;
}
