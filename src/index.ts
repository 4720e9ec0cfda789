export * from "./scene/interfaces.js";
export * from "./scene/errors.js";
export { Scene, type SceneConfig } from "./scene/scene.js";
export { ChangedNodeLedger } from "./scene/core/changeLedger.js";
export { DirtyRootTracker } from "./scene/core/dirtyRoots.js";
export { TransformStore } from "./scene/core/transformStore.js";
export { NodeAllocator, MAX_NODES } from "./scene/core/nodeAllocator.js";
export { PropagateWorkspace, propagateTransforms } from "./scene/systems/propagateTransforms.js";
export { syncDrawables } from "./scene/systems/syncDrawables.js";
export { buildDrawList, type DrawList, type DrawStats } from "./scene/systems/buildDrawList.js";
export { FlatStore } from "./scene/drawables/flatStore.js";
export { CullDataStore, CullLayout, boundsFromPositions, type CullEntryInit } from "./scene/drawables/cullStore.js";
export { DrawDataStore, DrawLayout, type DrawEntry, type DrawEntryInit } from "./scene/drawables/drawStore.js";
export { DrawableRegistry, type SurfaceInit } from "./scene/drawables/registry.js";
export { extractFrustumPlanes, isInFrustum, visibleIndices } from "./scene/culling/frustum.js";
export { Camera, type CameraConfig } from "./scene/camera.js";
export { runFrame, type FrameContext, type FrameResult } from "./scene/frame.js";
export { Mat4 } from "./utils/matrix4x4.js";
export { Vector3, deg2rad } from "./utils/math.js";
