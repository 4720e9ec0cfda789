// src/scene/errors.ts

export type SceneErrorCode = "INVALID_HANDLE" | "INDEX_OUT_OF_RANGE" | "HIERARCHY_CYCLE";

export class SceneError extends Error {
  readonly code: SceneErrorCode;

  constructor(code: SceneErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Stale or unknown node handle. Usually a use-after-destroy in the caller. */
export class InvalidHandleError extends SceneError {
  readonly handle: number;

  constructor(handle: number, op: string) {
    super("INVALID_HANDLE", `${op}: invalid node handle ${handle}`);
    this.handle = handle;
  }
}

/** Flat-store access outside [0, size). */
export class IndexOutOfRangeError extends SceneError {
  readonly index: number;
  readonly size: number;

  constructor(store: string, index: number, size: number) {
    super("INDEX_OUT_OF_RANGE", `${store}: index ${index} out of range [0, ${size})`);
    this.index = index;
    this.size = size;
  }
}

/** Parent graph would contain (or already contains) a cycle. */
export class HierarchyCycleError extends SceneError {
  constructor(message: string) {
    super("HIERARCHY_CYCLE", message);
  }
}
