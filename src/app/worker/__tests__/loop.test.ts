import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { CaptureService } from "../../../core/capture/captureService.js";
import { LocalCommandQueue } from "../../../core/commandQueue.js";
import type { CommandResult, ViewerCommand } from "../../../core/commands.js";
import { InputError, SurfaceError } from "../../../core/errors.js";
import type { MeshGeometry } from "../../../core/mesh/meshGeometry.js";
import { computeMeshStats } from "../../../core/mesh/meshTopology.js";
import type {
  FrameOutput,
  FramePlan,
  FrameUniforms,
  ViewerRenderer,
} from "../../../core/types/rendering.js";
import {
  defaultViewerState,
  displayFlagValue,
  type DisplayFlag,
} from "../../../core/types/viewer.js";
import type { RenderSettings } from "../../../core/types/worker.js";
import {
  allocateViewerState,
  initializeViewerState,
  readViewerState,
  type ViewerStateContext,
} from "../../../core/viewerState.js";
import type { LoadedMesh } from "../../../loaders/mesh/meshLoader.js";
import { RenderLoop, type RenderLoopHost } from "../loop.js";

class FakeRenderer implements ViewerRenderer {
  public adapterName = "fake";
  public width = 800;
  public height = 600;
  public meshes: MeshGeometry[] = [];
  public frames: { plan: FramePlan; uniforms: FrameUniforms; readback: boolean }[] = [];
  public failNext: Error | null = null;

  public resize(width: number, height: number): void {
    this.width = width;
    this.height = height;
  }

  public setMesh(geometry: MeshGeometry): number {
    this.meshes.push(geometry);
    return this.meshes.length;
  }

  public async renderFrame(
    uniforms: FrameUniforms,
    plan: FramePlan,
    readback: boolean,
  ): Promise<FrameOutput> {
    const failure = this.failNext;
    if (failure) {
      this.failNext = null;
      throw failure;
    }
    this.frames.push({ plan, uniforms, readback });
    const output: FrameOutput = {
      record: {
        width: this.width,
        height: this.height,
        passes: ["mesh"],
        draws: { mesh: 1 },
        meshGeneration: this.meshes.length,
        triangleCount: 0,
        uniforms: { viewProjection: [], model: [], cameraPosition: [] },
      },
    };
    if (readback) output.image = { width: 1, height: 1, rgba: new Uint8Array(4) };
    return output;
  }

  public async destroy(): Promise<void> {}
}

class FakeHost implements RenderLoopHost {
  public submitted: ViewerCommand[] = [];
  public redraws: number[] = [];
  public results = new Map<number, CommandResult>();
  public exitCode: number | null = null;

  public submit(command: ViewerCommand): void {
    this.submitted.push(command);
  }

  public requestRedraw(delayMs: number): void {
    this.redraws.push(delayMs);
  }

  public reportResult(requestId: number, result: CommandResult): void {
    this.results.set(requestId, result);
  }

  public exit(code: number): void {
    this.exitCode = code;
  }
}

const trianglePositions = () => new Float32Array([0, 0, 0, 2, 0, 0, 0, 4, 0]);

async function fakeLoadMesh(filePath: string, meshName?: string): Promise<LoadedMesh> {
  if (filePath.endsWith("multi.glb") && meshName === undefined) {
    throw new InputError("GLB file contains 2 meshes", ["Body", "Lid"]);
  }
  const indices = new Uint32Array([0, 1, 2]);
  return { positions: trianglePositions(), indices, stats: computeMeshStats(3, indices) };
}

describe("RenderLoop", () => {
  let dir = "";
  let stateCtx: ViewerStateContext;
  let queue: LocalCommandQueue;
  let renderer: FakeRenderer;
  let host: FakeHost;

  beforeAll(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "meshview-loop-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  beforeEach(() => {
    for (const method of ["log", "warn", "error"] as const) {
      vi.spyOn(console, method).mockImplementation(() => {});
    }
    stateCtx = allocateViewerState().ctx;
    initializeViewerState(stateCtx, defaultViewerState());
    queue = new LocalCommandQueue();
    renderer = new FakeRenderer();
    host = new FakeHost();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const createLoop = (settings: Partial<RenderSettings> = {}) =>
    new RenderLoop({
      stateCtx,
      commands: queue,
      renderer,
      loadMesh: fakeLoadMesh,
      capture: new CaptureService(
        { extension: "png", encode: async () => new Uint8Array([1]) },
        dir,
      ),
      host,
      settings: {
        width: 800,
        height: 600,
        targetFps: 50,
        rpcAddress: "127.0.0.1:9001",
        captureEnabled: false,
        captureDir: dir,
        debug: false,
        ...settings,
      },
      now: () => 0,
    });

  const started = (settings?: Partial<RenderSettings>) => {
    const loop = createLoop(settings);
    loop.resume(null);
    return loop;
  };

  it("starts without a mesh", () => {
    const loop = started();
    expect(loop.phase).toBe("running");
    expect(host.redraws).toEqual([0]);
    expect(readViewerState(stateCtx)).toEqual(defaultViewerState());
  });

  it("frames the initial mesh", () => {
    const loop = createLoop();
    const indices = new Uint32Array([0, 1, 2]);
    loop.resume({ positions: trianglePositions(), indices, stats: computeMeshStats(3, indices) });

    const state = readViewerState(stateCtx);
    expect(renderer.meshes).toHaveLength(1);
    expect(state.meshGeneration).toBe(1);
    expect(state.stats.faceCount).toBe(1);
    expect(state.cameraTarget).toEqual([0, 0, 0]);
    expect(state.cameraPosition[0]).toBeCloseTo(5, 12);
    expect(state.cameraPosition[1]).toBeCloseTo(3, 12);
    expect(state.cameraPosition[2]).toBeCloseTo(10, 12);
  });

  it("applies queued commands in order before drawing", async () => {
    const loop = started();
    queue.send({ type: "set_rotation", rotation: [0.1, 0.2, 0.3] });
    queue.send({ type: "set_display_flag", flag: "wireframe", enabled: false });
    queue.send({ type: "flip_display_flag", flag: "ui" });
    queue.send({ type: "set_display_flag", flag: "wireframe", enabled: true });
    await loop.redraw();

    const state = readViewerState(stateCtx);
    expect(state.modelRotation).toEqual([0.1, 0.2, 0.3]);
    expect(state.showWireframe).toBe(true);
    expect(state.showUi).toBe(false);
    expect(renderer.frames).toHaveLength(1);
    expect(renderer.frames[0].plan).toEqual({ wireframe: true, backfaces: false, overlay: [] });
    expect(host.redraws.at(-1)).toBe(20);
  });

  const flags: DisplayFlag[] = ["wireframe", "backfaces", "ui"];
  const flipCases = flags.flatMap((flag) =>
    [0, 1, 2, 3, 4, 5].flatMap((n) => [true, false].map((initial) => ({ flag, n, initial }))),
  );

  it.each(flipCases)(
    "leaves $flag at $initial XOR odd after $n flips",
    async ({ flag, n, initial }) => {
      const loop = started();
      const other = flags.find((f) => f !== flag) ?? "ui";
      queue.send({ type: "set_display_flag", flag, enabled: initial });
      for (let i = 0; i < n; i++) {
        queue.send({ type: "flip_display_flag", flag });
        queue.send({ type: "set_display_flag", flag: other, enabled: i % 2 === 0 });
      }
      await loop.redraw();

      expect(displayFlagValue(readViewerState(stateCtx), flag)).toBe(initial !== (n % 2 === 1));
    },
  );

  it("draws the overlay while the UI is shown", async () => {
    const loop = started();
    await loop.redraw();
    const overlay = renderer.frames[0].plan.overlay;
    expect(overlay.at(-1)?.text).toBe("Active: 127.0.0.1:9001");
  });

  it("moves the camera to exact positions", async () => {
    const loop = started();
    queue.send({ type: "set_camera_target", target: [1, 1, 1] });
    queue.send({ type: "set_camera_position", position: [1.5, -2, 3.25] });
    await loop.processCommands();
    const state = readViewerState(stateCtx);
    expect(state.cameraPosition).toEqual([1.5, -2, 3.25]);
    expect(state.cameraTarget).toEqual([1, 1, 1]);
  });

  it("ignores a rotation about a zero axis", async () => {
    const loop = started();
    queue.send({ type: "rotate_around_axis", axis: [0, 0, 0], angle: 1 });
    await loop.processCommands();
    expect(readViewerState(stateCtx).modelRotation).toEqual([0, 0, 0]);
  });

  it("submits key bindings to the shared queue", () => {
    const loop = started();
    loop.handleEvent({ type: "KeyboardInput", key: "W", pressed: true });
    loop.handleEvent({ type: "KeyboardInput", key: "W", pressed: false });
    loop.handleEvent({ type: "KeyboardInput", key: "x", pressed: true });
    loop.handleEvent({ type: "KeyboardInput", key: "escape", pressed: true });
    expect(host.submitted).toEqual([
      { type: "flip_display_flag", flag: "wireframe" },
      { type: "quit" },
    ]);
  });

  it("orbits while the left button is held", () => {
    const loop = started();
    const phi = loop.camera.phi;
    loop.handleEvent({ type: "CursorMoved", x: 0, y: 0 });
    loop.handleEvent({ type: "CursorMoved", x: 10, y: 0 });
    expect(loop.camera.phi).toBe(phi);

    loop.handleEvent({ type: "MouseInput", button: "left", pressed: true });
    loop.handleEvent({ type: "CursorMoved", x: 20, y: 0 });
    expect(loop.camera.phi).toBeCloseTo(phi - 0.05, 12);
    expect(readViewerState(stateCtx).cameraPosition).toEqual(loop.camera.eye);
  });

  it("zooms on the wheel", () => {
    const loop = started();
    const distance = loop.camera.distance;
    loop.handleEvent({ type: "MouseWheel", delta: 1 });
    expect(loop.camera.distance).toBeCloseTo(distance * 0.9, 12);
  });

  it("reports a loaded model and bumps the generation", async () => {
    const loop = started();
    queue.send({ type: "load_model", path: "/models/tri.obj", requestId: 7 });
    await loop.processCommands();
    expect(host.results.get(7)).toEqual({ ok: true, message: "/models/tri.obj" });
    expect(readViewerState(stateCtx).meshGeneration).toBe(1);
  });

  it("keeps the current mesh when a load fails", async () => {
    const loop = started();
    queue.send({ type: "load_model", path: "/models/multi.glb", requestId: 8 });
    await loop.processCommands();
    expect(host.results.get(8)).toEqual({
      ok: false,
      message: "GLB file contains 2 meshes",
      availableNames: ["Body", "Lid"],
    });
    expect(readViewerState(stateCtx).meshGeneration).toBe(0);
    expect(renderer.meshes).toHaveLength(0);
  });

  it("refuses frame capture unless enabled", async () => {
    const loop = started();
    queue.send({ type: "capture_frame", requestId: 2 });
    await loop.redraw();
    expect(host.results.get(2)).toEqual({ ok: false, message: "Frame capture not enabled" });
    expect(renderer.frames[0].readback).toBe(false);
  });

  it("writes a screenshot from the next frame", async () => {
    const loop = started();
    const target = path.join(dir, "shot.png");
    queue.send({ type: "screenshot", path: target, requestId: 3 });
    await loop.redraw();
    expect(renderer.frames[0].readback).toBe(true);
    expect(host.results.get(3)).toEqual({ ok: true, message: target });
  });

  it("writes a frame capture when enabled", async () => {
    const loop = started({ captureEnabled: true });
    const target = path.join(dir, "frame.png");
    queue.send({ type: "capture_frame", path: target, requestId: 4 });
    await loop.redraw();
    expect(host.results.get(4)).toEqual({ ok: true, message: target });
  });

  it("keeps captures queued across a lost surface", async () => {
    const loop = started();
    const target = path.join(dir, "retry.png");
    renderer.failNext = new SurfaceError("Surface lost");
    queue.send({ type: "screenshot", path: target, requestId: 5 });
    await loop.redraw();
    expect(host.results.has(5)).toBe(false);
    await loop.redraw();
    expect(host.results.get(5)).toEqual({ ok: true, message: target });
  });

  it("fails captures when a frame cannot be rendered", async () => {
    const loop = started();
    renderer.failNext = new Error("device lost");
    queue.send({ type: "screenshot", path: path.join(dir, "never.png"), requestId: 6 });
    await loop.redraw();
    expect(host.results.get(6)).toEqual({
      ok: false,
      message: "Failed to render frame: device lost",
    });
  });

  it("quits without drawing and fails pending captures", async () => {
    const loop = started();
    queue.send({ type: "screenshot", path: path.join(dir, "late.png"), requestId: 9 });
    queue.send({ type: "quit" });
    queue.send({ type: "set_rotation", rotation: [1, 1, 1] });
    await loop.redraw();
    expect(loop.phase).toBe("exiting");
    expect(host.exitCode).toBe(0);
    expect(renderer.frames).toHaveLength(0);
    expect(host.results.get(9)).toEqual({ ok: false, message: "Viewer is shutting down" });
    expect(readViewerState(stateCtx).modelRotation).toEqual([0, 0, 0]);
  });

  it("exits on a close request and ignores later events", () => {
    const loop = started();
    loop.handleEvent({ type: "CloseRequested" });
    loop.handleEvent({ type: "KeyboardInput", key: "w", pressed: true });
    expect(host.exitCode).toBe(0);
    expect(host.submitted).toEqual([]);
  });

  it("resizes the renderer", () => {
    const loop = started();
    loop.handleEvent({ type: "Resized", width: 640, height: 480 });
    expect(renderer.width).toBe(640);
    expect(loop.camera.width).toBe(640);
    loop.handleEvent({ type: "Resized", width: 0, height: 480 });
    expect(renderer.width).toBe(640);
  });
});
