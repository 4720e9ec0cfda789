// tests/scene/systems/buildDrawList.test.ts
import { DrawDataStore, type DrawEntryInit } from "../../../src/scene/drawables/drawStore.js";
import { AlphaMode } from "../../../src/scene/interfaces.js";
import { buildDrawList } from "../../../src/scene/systems/buildDrawList.js";
import { Vector3 } from "../../../src/utils/math.js";
import { translation } from "../../testUtils.js";

function drawStore(entries: DrawEntryInit[]) {
  const store = new DrawDataStore();
  for (const e of entries) store.add(e);
  return store;
}

const opaque = (pipelineId: number, materialId: number, meshId: number, indexCount: number): DrawEntryInit =>
  ({ pipelineId, materialId, meshId, indexCount });

const glass = (z: number, indexCount = 3): DrawEntryInit =>
  ({ transform: translation(0, 0, z), pipelineId: 9, materialId: 9, meshId: 9, indexCount, alphaMode: AlphaMode.Transparent });

describe("buildDrawList", () => {
  const store = drawStore([
    opaque(2, 1, 1, 6),                                   // 0
    opaque(1, 2, 0, 9),                                   // 1
    glass(-10),                                           // 2
    glass(-2),                                            // 3
    { ...opaque(1, 1, 5, 30), alphaMode: AlphaMode.Masked }, // 4
  ]);

  test("opaque by pipeline/material/mesh, transparent back to front", () => {
    const list = buildDrawList([0, 1, 2, 3, 4], store, Vector3.zero());
    expect(list.opaque).toEqual([4, 1, 0]);
    expect(list.transparent).toEqual([2, 3]);
    expect(list.stats).toEqual({ drawCount: 5, triangleCount: 17 });
  });

  test("only visible indices are listed", () => {
    const list = buildDrawList([0, 3], store, Vector3.zero());
    expect(list.opaque).toEqual([0]);
    expect(list.transparent).toEqual([3]);
    expect(list.stats).toEqual({ drawCount: 2, triangleCount: 3 });
  });

  test("transparent order follows the camera", () => {
    // camera past index 2: index 3 is now farther
    const list = buildDrawList([2, 3], store, new Vector3(0, 0, -12));
    expect(list.transparent).toEqual([3, 2]);
  });

  test("ties fall back to index order", () => {
    const tied = drawStore([opaque(1, 1, 1, 3), glass(-4), opaque(1, 1, 1, 3), glass(-4)]);
    const list = buildDrawList([3, 2, 1, 0], tied, Vector3.zero());
    expect(list.opaque).toEqual([0, 2]);
    expect(list.transparent).toEqual([1, 3]);
  });

  test("nothing visible", () => {
    expect(buildDrawList([], store, Vector3.zero())).toEqual({
      opaque: [],
      transparent: [],
      stats: { drawCount: 0, triangleCount: 0 },
    });
  });
});
