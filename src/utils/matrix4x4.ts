import { Vector3 } from "./math.js";
import { invertAffine4x4_into, mul4x4_into } from "../scene/math.js";

export class Mat4 {
  /** Column-major storage: m[col*4 + row] */
  readonly m: Float32Array;

  constructor(data?: ArrayLike<number>) {
    this.m = new Float32Array(16);
    if (data) this.m.set(data);
    else Mat4.identityInto(this.m);
  }

  static identity(): Mat4 {
    return new Mat4();
  }

  static identityInto(out: Float32Array): Float32Array {
    out.fill(0);
    out[0] = 1; out[5] = 1; out[10] = 1; out[15] = 1;
    return out;
  }

  clone(): Mat4 {
    return new Mat4(this.m);
  }

  /** this = this * b */
  multiply(b: Mat4): this {
    const r = new Float32Array(16);
    mul4x4_into(this.m, 0, b.m, 0, r, 0);
    this.m.set(r);
    return this;
  }

  /** Affine inverse; throws on a singular matrix. */
  invert(): this {
    const r = new Float32Array(16);
    invertAffine4x4_into(this.m, 0, r, 0);
    this.m.set(r);
    return this;
  }

  setTranslation(p: Vector3): this {
    this.m[12] = p.x;
    this.m[13] = p.y;
    this.m[14] = p.z;
    this.m[15] = 1;
    return this;
  }

  getTranslation(): Vector3 {
    return new Vector3(this.m[12]!, this.m[13]!, this.m[14]!);
  }

  static fromTranslation(p: Vector3): Mat4 {
    return new Mat4().setTranslation(p);
  }

  static fromScale(s: Vector3): Mat4 {
    const out = new Mat4();
    out.m[0] = s.x;
    out.m[5] = s.y;
    out.m[10] = s.z;
    return out;
  }

  /** Right-handed rotation of `angleRad` around `axis`. */
  static fromAxisAngle(axis: Vector3, angleRad: number): Mat4 {
    const { x, y, z } = axis.normalize();
    const c = Math.cos(angleRad), s = Math.sin(angleRad), t = 1 - c;
    return new Mat4([
      t*x*x + c,     t*x*y + s*z, t*x*z - s*y, 0,
      t*x*y - s*z,   t*y*y + c,   t*y*z + s*x, 0,
      t*x*z + s*y,   t*y*z - s*x, t*z*z + c,   0,
      0,             0,           0,           1,
    ]);
  }

  /**
   * Right-handed perspective with zero-to-one depth, Y flipped for a
   * downward-Y clip space.
   */
  static perspective(fovYRad: number, aspect: number, near: number, far: number): Mat4 {
    const f = 1 / Math.tan(fovYRad / 2);
    const out = new Mat4();
    out.m.fill(0);
    out.m[0] = f / aspect;
    out.m[5] = -f;
    out.m[10] = far / (near - far);
    out.m[11] = -1;
    out.m[14] = -(far * near) / (far - near);
    return out;
  }

  /** Transforms a point (x,y,z,1) by this matrix, returning a NEW Vector3. */
  transformPoint(p: Vector3): Vector3 {
    const m = this.m;
    const x = p.x, y = p.y, z = p.z;
    const nx = m[0]! * x + m[4]! * y + m[8]!  * z + m[12]!;
    const ny = m[1]! * x + m[5]! * y + m[9]!  * z + m[13]!;
    const nz = m[2]! * x + m[6]! * y + m[10]! * z + m[14]!;
    // For affine matrices in this class, w will be 1 so no divide needed.
    return new Vector3(nx, ny, nz);
  }

  /** Transforms a direction (x,y,z,0) by this matrix (ignores translation). */
  transformDirection(v: Vector3): Vector3 {
    const m = this.m;
    const x = v.x, y = v.y, z = v.z;
    const nx = m[0]! * x + m[4]! * y + m[8]!  * z;
    const ny = m[1]! * x + m[5]! * y + m[9]!  * z;
    const nz = m[2]! * x + m[6]! * y + m[10]! * z;
    return new Vector3(nx, ny, nz);
  }
}
