// tests/scene/camera.test.ts
import { Camera } from "../../src/scene/camera.js";
import type { Logger } from "../../src/scene/interfaces.js";
import { Vector3 } from "../../src/utils/math.js";

const silentLogger = (): jest.Mocked<Logger> => ({
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
});

describe("Camera", () => {
  test("projection is rebuilt only when the viewport or lens changes", () => {
    const cam = new Camera({ logger: silentLogger() });
    const initialPlanes = cam.frustumPlanes;

    expect(cam.updateProjection({ width: 800, height: 600 }, 90, 0.1, 100)).toBe(true);
    const planes = cam.frustumPlanes;
    expect(planes).not.toBe(initialPlanes);

    expect(cam.updateProjection({ width: 800, height: 600 }, 90, 0.1, 100)).toBe(false);
    expect(cam.frustumPlanes).toBe(planes);

    expect(cam.updateProjection({ width: 1024, height: 600 }, 90, 0.1, 100)).toBe(true);
    expect(cam.updateProjection({ width: 1024, height: 600 }, 60, 0.1, 100)).toBe(true);
    expect(cam.frustumPlanes).not.toBe(planes);
  });

  test("projection uses the extent's aspect ratio", () => {
    const cam = new Camera({ logger: silentLogger() });
    cam.updateProjection({ width: 800, height: 600 }, 90, 0.1, 100);
    const m = cam.projection.m;
    expect(m[0]).toBeCloseTo(0.75, 6);
    expect(m[5]).toBeCloseTo(-1, 6);
    expect(m[11]).toBe(-1);
  });

  test("a zero-area extent is ignored with a warning", () => {
    const logger = silentLogger();
    const cam = new Camera({ logger });
    cam.updateProjection({ width: 800, height: 600 }, 90, 0.1, 100);
    const before = cam.frustumPlanes;

    expect(cam.updateProjection({ width: 0, height: 600 }, 90, 0.1, 100)).toBe(false);
    expect(cam.frustumPlanes).toBe(before);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith("Camera: ignoring 0x600 extent");
  });

  test("view matrix is the inverse of the camera pose", () => {
    const cam = new Camera({ position: new Vector3(0, 0, 5) });
    const t = cam.viewMatrix().getTranslation();
    expect(t.x).toBeCloseTo(0, 6);
    expect(t.y).toBeCloseTo(0, 6);
    expect(t.z).toBeCloseTo(-5, 6);

    const p = cam.viewMatrix().transformPoint(new Vector3(0, 0, 5));
    expect(p.x).toBeCloseTo(0, 6);
    expect(p.y).toBeCloseTo(0, 6);
    expect(p.z).toBeCloseTo(0, 6);
  });

  test("yaw turns the view around Y", () => {
    const cam = new Camera({ yaw: Math.PI });
    // turned around: a point behind the start pose is now in front (-Z in view space)
    const p = cam.viewMatrix().transformPoint(new Vector3(0, 0, 10));
    expect(p.x).toBeCloseTo(0, 5);
    expect(p.z).toBeCloseTo(-10, 5);
  });

  test("move follows the camera's own axes", () => {
    const cam = new Camera();
    cam.move(new Vector3(0, 0, -1));
    expect(cam.position.z).toBeCloseTo(-1, 6);

    const turned = new Camera({ yaw: Math.PI / 2 });
    turned.move(new Vector3(0, 0, -1));
    expect(turned.position.x).toBeCloseTo(1, 6);
    expect(turned.position.y).toBeCloseTo(0, 6);
    expect(turned.position.z).toBeCloseTo(0, 6);
  });
});
