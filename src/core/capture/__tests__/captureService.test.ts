import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { CaptureError } from "../../errors.js";
import type { FrameRecord, RenderedImage } from "../../types/rendering.js";
import { defaultViewerState } from "../../types/viewer.js";
import { CaptureService } from "../captureService.js";
import type { ImageEncoder } from "../imageEncoder.js";

const sizeEncoder: ImageEncoder = {
  extension: "png",
  encode: async (image) => Uint8Array.from([image.width, image.height]),
};

const image: RenderedImage = { width: 3, height: 2, rgba: new Uint8Array(24) };

const record: FrameRecord = {
  width: 3,
  height: 2,
  passes: ["mesh"],
  draws: { mesh: 1 },
  meshGeneration: 1,
  triangleCount: 1,
  uniforms: { viewProjection: [], model: [], cameraPosition: [0, 0, 5] },
};

describe("CaptureService", () => {
  let dir = "";
  const capturedAt = new Date("2024-01-02T03:04:05.678Z");

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "meshview-capture-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  it("creates missing directories for a screenshot", async () => {
    const service = new CaptureService(sizeEncoder, path.join(dir, "captures"));
    const target = path.join(dir, "out", "nested", "shot.png");
    expect(await service.saveScreenshot(image, target)).toBe(target);
    expect(Array.from(await readFile(target))).toEqual([3, 2]);
  });

  it("names frame captures by timestamp and writes a record", async () => {
    const service = new CaptureService(sizeEncoder, path.join(dir, "captures"), () => capturedAt);
    const written = await service.saveFrame(image, record, defaultViewerState());
    expect(written).toBe(path.join(dir, "captures", "frame-2024-01-02T03-04-05-678Z.png"));

    const doc = JSON.parse(
      await readFile(path.join(dir, "captures", "frame-2024-01-02T03-04-05-678Z.json"), "utf8"),
    );
    expect(doc.capturedAt).toBe("2024-01-02T03:04:05.678Z");
    expect(doc.image).toBe("frame-2024-01-02T03-04-05-678Z.png");
    expect(doc.frame).toEqual(record);
    expect(doc.state.showWireframe).toBe(true);
  });

  it("writes a frame to an explicit path", async () => {
    const service = new CaptureService(sizeEncoder, "unused", () => capturedAt);
    const target = path.join(dir, "explicit", "f.png");
    expect(await service.saveFrame(image, record, defaultViewerState(), target)).toBe(target);
    const doc = JSON.parse(await readFile(path.join(dir, "explicit", "f.json"), "utf8"));
    expect(doc.image).toBe("f.png");
  });

  it("wraps encoder failures", async () => {
    const failing: ImageEncoder = {
      extension: "png",
      encode: async () => {
        throw new Error("nope");
      },
    };
    const service = new CaptureService(failing, dir);
    await expect(service.saveScreenshot(image, path.join(dir, "x.png"))).rejects.toThrow(
      new CaptureError("Failed to encode image: nope"),
    );
  });
});
