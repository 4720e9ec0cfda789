// tests/scene/drawables/flatStore.test.ts
import { Vector3 } from "../../../src/utils/math.js";
import { boundsFromPositions, CullDataStore } from "../../../src/scene/drawables/cullStore.js";
import { DrawDataStore } from "../../../src/scene/drawables/drawStore.js";
import { AlphaMode } from "../../../src/scene/interfaces.js";
import { IndexOutOfRangeError } from "../../../src/scene/errors.js";
import { MockUploadTarget } from "../../utils/upload.mock.js";
import { IDENTITY, translation } from "../../testUtils.js";

const ROW_BYTES = 24 * 4;

const unitBox = (x = 0) => ({ center: new Vector3(x, 0, 0), halfExtents: new Vector3(1, 1, 1) });

function cullWith(n: number, initialCapacity = 8) {
  const store = new CullDataStore(initialCapacity);
  for (let i = 0; i < n; i++) store.add({ bounds: unitBox(i) });
  return store;
}

describe("FlatStore: uploads, swap-remove, growth", () => {
  test("fresh rows upload in one full write", () => {
    const store = cullWith(3);
    const target = new MockUploadTarget();

    expect(store.rowSizeBytes).toBe(ROW_BYTES);
    expect(store.hasPendingUploads).toBe(true);
    expect(store.flush(target)).toBe(1);
    expect(target.writes).toEqual([{ offset: 0, dataOffset: 0, size: 3 * ROW_BYTES }]);
    expect(store.hasPendingUploads).toBe(false);
    expect(store.flush(target)).toBe(0);
  });

  test("a single edited row uploads only that row", () => {
    const store = cullWith(3);
    const target = new MockUploadTarget();
    store.flush(target);
    target.reset();

    store.writeTransform(1, translation(1, 2, 3));
    expect(store.flush(target)).toBe(1);
    expect(target.writes).toEqual([{ offset: ROW_BYTES, dataOffset: ROW_BYTES, size: ROW_BYTES }]);
  });

  test("disjoint rows upload separately, in row order", () => {
    const store = cullWith(3);
    const target = new MockUploadTarget();
    store.flush(target);
    target.reset();

    store.writeTransform(2, translation(1, 0, 0));
    store.writeTransform(0, translation(1, 0, 0));
    expect(store.flush(target)).toBe(2);
    expect(target.writes).toEqual([
      { offset: 0, dataOffset: 0, size: ROW_BYTES },
      { offset: 2 * ROW_BYTES, dataOffset: 2 * ROW_BYTES, size: ROW_BYTES },
    ]);
  });

  test("out-of-order edits that touch every row merge into one write", () => {
    const store = cullWith(3);
    const target = new MockUploadTarget();
    store.flush(target);
    target.reset();

    store.writeTransform(2, translation(1, 0, 0));
    store.writeTransform(0, translation(1, 0, 0));
    store.writeTransform(1, translation(1, 0, 0));
    expect(store.flush(target)).toBe(1);
    expect(target.writes).toEqual([{ offset: 0, dataOffset: 0, size: 3 * ROW_BYTES }]);
  });

  test("repeated scattered edits without a flush stay one queued range", () => {
    const store = cullWith(3);
    const target = new MockUploadTarget();
    store.flush(target);
    target.reset();

    for (let k = 0; k < 50; k++) {
      store.writeTransform(0, translation(k, 0, 0));
      store.writeTransform(2, translation(k, 0, 0));
    }
    expect(store.flush(target)).toBe(1);
    expect(target.writes).toEqual([{ offset: 0, dataOffset: 0, size: 3 * ROW_BYTES }]);
  });

  test("writeTransform stores the matrix in the transform lanes", () => {
    const store = cullWith(2);
    expect(Array.from(store.transform(0))).toEqual(IDENTITY);

    store.writeTransform(1, translation(4, 5, 6));
    expect(Array.from(store.transform(1))).toEqual(Array.from(translation(4, 5, 6)));
    expect(Array.from(store.transform(0))).toEqual(IDENTITY);
  });

  test("swapRemove moves the tail into the hole", () => {
    const store = cullWith(3);
    store.flush(new MockUploadTarget());

    expect(store.swapRemove(0)).toBe(2);
    expect(store.size).toBe(2);
    expect(store.bounds(0).center).toEqual(new Vector3(2, 0, 0));
    expect(store.bounds(1).center).toEqual(new Vector3(1, 0, 0));

    const target = new MockUploadTarget();
    store.flush(target);
    expect(target.writes).toEqual([{ offset: 0, dataOffset: 0, size: ROW_BYTES }]);

    expect(store.swapRemove(1)).toBe(-1);
    expect(store.size).toBe(1);
  });

  test("removing the tail drops its queued upload", () => {
    const store = cullWith(3);
    store.flush(new MockUploadTarget());

    store.writeTransform(2, translation(1, 0, 0));
    expect(store.swapRemove(2)).toBe(-1);
    expect(store.hasPendingUploads).toBe(false);
    expect(store.flush(new MockUploadTarget())).toBe(0);
  });

  test("grows by doubling and keeps existing rows", () => {
    const store = cullWith(3, 1);
    expect(store.capacity).toBe(4);
    expect(store.size).toBe(3);
    expect(store.sizeBytes).toBe(3 * ROW_BYTES);
    for (let i = 0; i < 3; i++) expect(store.bounds(i).center.x).toBe(i);
  });

  test("out-of-range access throws IndexOutOfRangeError", () => {
    const store = cullWith(2);
    expect(() => store.writeTransform(2, translation(0, 0, 0))).toThrow(IndexOutOfRangeError);
    expect(() => store.bounds(-1)).toThrow(IndexOutOfRangeError);
    expect(() => store.swapRemove(7)).toThrow(IndexOutOfRangeError);

    try {
      store.transform(5);
      throw new Error("unreachable");
    } catch (e) {
      expect(e).toBeInstanceOf(IndexOutOfRangeError);
      if (e instanceof IndexOutOfRangeError) {
        expect(e.code).toBe("INDEX_OUT_OF_RANGE");
        expect(e.index).toBe(5);
        expect(e.size).toBe(2);
      }
    }
  });
});

describe("CullDataStore", () => {
  test("defaults sphereRadius to the half-extent length", () => {
    const store = new CullDataStore();
    const i = store.add({ bounds: { center: Vector3.zero(), halfExtents: new Vector3(0, 3, 4) } });
    expect(store.bounds(i).sphereRadius).toBe(5);

    store.setBounds(i, { center: Vector3.zero(), halfExtents: new Vector3(1, 1, 1), sphereRadius: 9 });
    expect(store.bounds(i).sphereRadius).toBe(9);
  });

  test("boundsFromPositions takes the min/max box", () => {
    const b = boundsFromPositions([
      -1, 0, -2,
       3, 4,  2,
       0, 1,  0,
    ]);
    expect(b.center).toEqual(new Vector3(1, 2, 0));
    expect(b.halfExtents).toEqual(new Vector3(2, 2, 2));
    expect(b.sphereRadius).toBeCloseTo(Math.sqrt(12), 10);
  });

  test("boundsFromPositions of nothing is an empty box", () => {
    const b = boundsFromPositions([]);
    expect(b.halfExtents).toEqual(Vector3.zero());
    expect(b.sphereRadius).toBe(0);
  });
});

describe("DrawDataStore", () => {
  test("round-trips the render fields", () => {
    const store = new DrawDataStore();
    const i = store.add({
      transform: translation(1, 2, 3),
      indexCount: 36,
      firstIndex: 12,
      meshId: 7,
      materialId: 3,
      pipelineId: 2,
      alphaMode: AlphaMode.Masked,
    });
    const e = store.get(i);
    expect(Array.from(e.transform)).toEqual(Array.from(translation(1, 2, 3)));
    expect(e).toMatchObject({ indexCount: 36, firstIndex: 12, meshId: 7, materialId: 3, pipelineId: 2, alphaMode: AlphaMode.Masked });
  });

  test("firstIndex and alphaMode default, transform defaults to identity", () => {
    const store = new DrawDataStore();
    const i = store.add({ indexCount: 3, meshId: 1, materialId: 1, pipelineId: 1 });
    const e = store.get(i);
    expect(e.firstIndex).toBe(0);
    expect(e.alphaMode).toBe(AlphaMode.Opaque);
    expect(store.alphaModeOf(i)).toBe(AlphaMode.Opaque);
    expect(Array.from(e.transform)).toEqual(IDENTITY);
  });
});
