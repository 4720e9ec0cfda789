import type { Vector3 } from "../utils/math.js";

/** Opaque node id: slot index in the low bits, slot generation above it. */
export type NodeHandle = number;

/** Parent value of a forest root, and the "no link" value of slot columns. */
export const INVALID = -1;

/** 4x4 affine matrix, column-major (m[col*4 + row]). */
export type Mat4Like = ArrayLike<number>;

export interface Bounds {
  center: Vector3;
  halfExtents: Vector3;
  /** Length of halfExtents; filled in by the cull store when omitted. */
  sphereRadius?: number;
}

/** Unit normal (x, y, z) and signed offset d: a point p is inside when n·p + d >= 0. */
export interface FrustumPlane {
  x: number;
  y: number;
  z: number;
  d: number;
}

/** left, right, bottom, top, near, far */
export type FrustumPlanes = readonly [
  FrustumPlane, FrustumPlane, FrustumPlane,
  FrustumPlane, FrustumPlane, FrustumPlane,
];

export const AlphaMode = {
  Opaque: 0,
  Masked: 1,
  Transparent: 2,
} as const;
export type AlphaMode = (typeof AlphaMode)[keyof typeof AlphaMode];

export type DestroyListener = (nodes: readonly NodeHandle[]) => void;

/** What the synchronizer and the registry need to read from a scene. */
export interface TransformSource {
  isAlive(node: NodeHandle): boolean;
  /** Writes the last propagated world transform of `node` into out[offset..offset+16). */
  copyWorldInto(node: NodeHandle, out: Float32Array, offset?: number): void;
  /** Called with every handle a destroy removed. Returns the unsubscribe function. */
  onNodesDestroyed?(listener: DestroyListener): () => void;
}

/**
 * Node -> drawable index lookup, owned by the registration subsystem.
 * Returns an empty list for nodes with nothing registered.
 */
export interface DrawableIndexMap<S = TransformSource> {
  lookup(scene: S, node: NodeHandle): readonly number[];
}

/** Sink for flat-store uploads (a GPU queue in the renderer, a recorder in tests). */
export interface UploadTarget {
  writeBuffer(offset: number, data: ArrayBuffer, dataOffset: number, size: number): void;
}

export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

export interface Extent {
  width: number;
  height: number;
}
