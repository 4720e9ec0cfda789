// src/scene/camera.ts
import { Vector3, deg2rad } from "../utils/math.js";
import { Mat4 } from "../utils/matrix4x4.js";
import { extractFrustumPlanes } from "./culling/frustum.js";
import type { Extent, FrustumPlanes, Logger } from "./interfaces.js";

export interface CameraConfig {
  position?: Vector3;
  yaw?: number;   // radians
  pitch?: number; // radians
  logger?: Logger; // default console
}

type ProjectionKey = { width: number; height: number; fovDeg: number; near: number; far: number };

/**
 * FPS-style camera. Owns the projection and its view-space frustum planes,
 * which are only rebuilt when the projection inputs change.
 */
export class Camera {
  position: Vector3;
  yaw: number;
  pitch: number;

  private readonly logger: Logger;
  private _projection = Mat4.identity();
  private _planes: FrustumPlanes = extractFrustumPlanes(this._projection.m);
  private _last: ProjectionKey | null = null;

  constructor(cfg: CameraConfig = {}) {
    this.position = cfg.position ?? Vector3.zero();
    this.yaw = cfg.yaw ?? 0;
    this.pitch = cfg.pitch ?? 0;
    this.logger = cfg.logger ?? console;
  }

  get projection(): Mat4 {
    return this._projection;
  }
  get frustumPlanes(): FrustumPlanes {
    return this._planes;
  }

  /**
   * Rebuild projection + planes if the viewport or lens changed.
   * Returns true when it did. A zero-area extent (minimized window) is ignored.
   */
  updateProjection(extent: Extent, fovDeg: number, near: number, far: number): boolean {
    if (extent.width <= 0 || extent.height <= 0) {
      this.logger.warn(`Camera: ignoring ${extent.width}x${extent.height} extent`);
      return false;
    }
    const l = this._last;
    if (l && l.width === extent.width && l.height === extent.height &&
        l.fovDeg === fovDeg && l.near === near && l.far === far) {
      return false;
    }
    this._projection = Mat4.perspective(deg2rad(fovDeg), extent.width / extent.height, near, far);
    this._planes = extractFrustumPlanes(this._projection.m);
    this._last = { width: extent.width, height: extent.height, fovDeg, near, far };
    return true;
  }

  /** Yaw turns around -Y, pitch around the yawed X axis. */
  rotationMatrix(): Mat4 {
    const yawRot = Mat4.fromAxisAngle(new Vector3(0, -1, 0), this.yaw);
    const pitchRot = Mat4.fromAxisAngle(new Vector3(1, 0, 0), this.pitch);
    return yawRot.multiply(pitchRot);
  }

  /** Inverse of the camera's model matrix: the world moves opposite the camera. */
  viewMatrix(): Mat4 {
    return Mat4.fromTranslation(this.position).multiply(this.rotationMatrix()).invert();
  }

  /** Moves along the camera's own axes. */
  move(local: Vector3) {
    this.position = this.position.add(this.rotationMatrix().transformDirection(local));
  }
}
