// src/app/worker/loop.ts
import { ArcBallCamera, framingEye } from "../../core/camera.js";
import type { CaptureService } from "../../core/capture/captureService.js";
import type { CommandReceiver } from "../../core/commandQueue.js";
import type {
  CaptureCommand,
  CommandResult,
  ViewerCommand,
} from "../../core/commands.js";
import {
  InputError,
  SurfaceError,
  toErrorMessage,
} from "../../core/errors.js";
import { buildMeshGeometry } from "../../core/mesh/meshGeometry.js";
import { layoutOverlay } from "../../core/rendering/overlay.js";
import {
  applyAxisRotation,
  modelMatrixFromEuler,
} from "../../core/rotation.js";
import type {
  FrameOutput,
  FramePlan,
  FrameUniforms,
  RenderedImage,
  ViewerRenderer,
} from "../../core/types/rendering.js";
import type {
  MeshStats,
  Point3,
  ViewerStateSnapshot,
} from "../../core/types/viewer.js";
import {
  defaultViewerState,
  displayFlagValue,
  withDisplayFlag,
} from "../../core/types/viewer.js";
import type { MouseButton, WindowEvent } from "../../core/types/window.js";
import type { RenderSettings } from "../../core/types/worker.js";
import {
  publishViewerState,
  readViewerState,
  type ViewerStateContext,
} from "../../core/viewerState.js";
import type { MeshLoadFn } from "../../loaders/mesh/loadMesh.js";

export type LoopPhase = "uninitialized" | "resumed" | "running" | "exiting";

/** Mesh data the loop can install: positions, triangle indices and stats. */
export interface InstallableMesh {
  positions: Float32Array;
  indices: Uint32Array;
  stats: MeshStats;
}

/**
 * What the loop needs from whoever runs it (the worker entry point in
 * production, a fake in tests).
 */
export interface RenderLoopHost {
  /** Puts a locally produced command on the shared queue. */
  submit(command: ViewerCommand): void;
  /** Schedules the next `redraw` after `delayMs`. */
  requestRedraw(delayMs: number): void;
  /** Answers a command that carried a `requestId`. */
  reportResult(requestId: number, result: CommandResult): void;
  exit(code: number): void;
}

export interface RenderLoopOptions {
  stateCtx: ViewerStateContext;
  commands: CommandReceiver;
  renderer: ViewerRenderer;
  loadMesh: MeshLoadFn;
  capture: CaptureService;
  host: RenderLoopHost;
  settings: RenderSettings;
  now?: () => number;
}

const KEY_BINDINGS = new Map<string, ViewerCommand>([
  ["w", { type: "flip_display_flag", flag: "wireframe" }],
  ["b", { type: "flip_display_flag", flag: "backfaces" }],
  ["u", { type: "flip_display_flag", flag: "ui" }],
  ["q", { type: "quit" }],
  ["escape", { type: "quit" }],
]);

/**
 * The render thread's state machine.
 *
 * @remarks
 * The loop is the single writer of the shared viewer state. Every mutation,
 * local or remote, arrives as a command and is applied in `redraw`, in
 * queue order, before the frame is drawn. Camera drags and zoom come
 * straight from window events since they are local to this thread.
 *
 * Phases: `uninitialized` → `resumed` (GPU ready, initial mesh being
 * installed) → `running` → `exiting`.
 */
export class RenderLoop {
  public readonly camera: ArcBallCamera;
  private _phase: LoopPhase = "uninitialized";
  private state: ViewerStateSnapshot;
  private pendingCaptures: CaptureCommand[] = [];
  private pressedButtons = new Set<MouseButton>();
  private lastCursor: { x: number; y: number } | null = null;
  private drawing = false;

  private stateCtx: ViewerStateContext;
  private commands: CommandReceiver;
  private renderer: ViewerRenderer;
  private loadMesh: MeshLoadFn;
  private capture: CaptureService;
  private host: RenderLoopHost;
  private settings: RenderSettings;
  private now: () => number;

  constructor(options: RenderLoopOptions) {
    this.stateCtx = options.stateCtx;
    this.commands = options.commands;
    this.renderer = options.renderer;
    this.loadMesh = options.loadMesh;
    this.capture = options.capture;
    this.host = options.host;
    this.settings = options.settings;
    this.now = options.now ?? (() => performance.now());

    this.state = readViewerState(this.stateCtx);
    this.camera = new ArcBallCamera(
      this.state.cameraPosition,
      this.state.cameraTarget,
      this.renderer.width,
      this.renderer.height,
    );
  }

  public get phase(): LoopPhase {
    return this._phase;
  }

  /** Latest state this loop published. */
  public get snapshot(): ViewerStateSnapshot {
    return this.state;
  }

  /**
   * Installs the initial mesh, if any, and starts drawing.
   *
   * @throws If the initial mesh cannot be uploaded; startup is then fatal.
   */
  public resume(initialMesh: InstallableMesh | null): void {
    if (this._phase !== "uninitialized") return;
    this._phase = "resumed";
    if (initialMesh) {
      this.installMesh(initialMesh);
    } else {
      this.commit(this.state);
    }
    this._phase = "running";
    this.host.requestRedraw(0);
  }

  public handleEvent(event: WindowEvent): void {
    if (this._phase !== "running") return;
    switch (event.type) {
      case "CloseRequested":
        this.shutdown();
        break;
      case "Resized": {
        if (event.width <= 0 || event.height <= 0) return;
        this.renderer.resize(event.width, event.height);
        this.camera.setViewport(this.renderer.width, this.renderer.height);
        break;
      }
      case "KeyboardInput": {
        if (!event.pressed) return;
        const command = KEY_BINDINGS.get(event.key.toLowerCase());
        if (command) this.host.submit(command);
        break;
      }
      case "MouseInput":
        if (event.pressed) {
          this.pressedButtons.add(event.button);
        } else {
          this.pressedButtons.delete(event.button);
        }
        break;
      case "CursorMoved": {
        const last = this.lastCursor;
        this.lastCursor = { x: event.x, y: event.y };
        if (!last) return;
        const dx = event.x - last.x;
        const dy = event.y - last.y;
        if (this.pressedButtons.has("left")) {
          this.camera.rotate(dx, dy);
          this.publishCamera();
        } else if (this.pressedButtons.has("right")) {
          this.camera.pan(dx, dy);
          this.publishCamera();
        }
        break;
      }
      case "MouseWheel":
        this.camera.zoom(event.delta);
        this.publishCamera();
        break;
      case "RedrawRequested":
        this.host.requestRedraw(0);
        break;
    }
  }

  /**
   * One frame: drain and apply commands, draw, present, write captures and
   * schedule the next frame. Calls made while a frame is in flight return
   * immediately.
   */
  public async redraw(): Promise<void> {
    if (this._phase !== "running" || this.drawing) return;
    this.drawing = true;
    const started = this.now();
    try {
      if (await this.processCommands()) return;
      await this.drawFrame();
    } finally {
      this.drawing = false;
    }
    if (this._phase === "running") {
      const interval = 1000 / this.settings.targetFps;
      this.host.requestRedraw(Math.max(0, interval - (this.now() - started)));
    }
  }

  /**
   * Applies every queued command in arrival order.
   *
   * @returns `true` when a `quit` ended the session.
   */
  public async processCommands(): Promise<boolean> {
    for (;;) {
      const command = this.commands.tryRecv();
      if (command === undefined) return false;
      if (this.settings.debug) {
        console.debug(`[Viewer] Applying ${command.type}`);
      }
      if (await this.apply(command)) return true;
    }
  }

  private async apply(command: ViewerCommand): Promise<boolean> {
    switch (command.type) {
      case "load_model": {
        const result = await this.loadModel(command.path, command.meshName);
        if (command.requestId !== undefined) {
          this.host.reportResult(command.requestId, result);
        }
        break;
      }
      case "set_rotation":
        this.commit({ ...this.state, modelRotation: [...command.rotation] });
        break;
      case "rotate_around_axis": {
        let rotation: Point3;
        try {
          rotation = applyAxisRotation(
            this.state.modelRotation,
            command.axis,
            command.angle,
          );
        } catch (e) {
          console.error(`[Viewer] Ignoring rotation: ${toErrorMessage(e)}`);
          break;
        }
        this.commit({ ...this.state, modelRotation: rotation });
        break;
      }
      case "set_camera_position":
        this.camera.setPosition(command.position);
        this.publishCamera();
        break;
      case "set_camera_target":
        this.camera.setTarget(command.target);
        this.publishCamera();
        break;
      case "set_display_flag":
        this.commit(withDisplayFlag(this.state, command.flag, command.enabled));
        break;
      case "flip_display_flag":
        this.commit(
          withDisplayFlag(
            this.state,
            command.flag,
            !displayFlagValue(this.state, command.flag),
          ),
        );
        break;
      case "screenshot":
      case "capture_frame":
        this.enqueueCapture(command);
        break;
      case "quit":
        this.shutdown();
        return true;
    }
    return false;
  }

  private async loadModel(
    filePath: string,
    meshName?: string,
  ): Promise<CommandResult> {
    console.log(`[Viewer] Loading model: ${filePath}`);
    try {
      const mesh = await this.loadMesh(filePath, meshName);
      this.installMesh(mesh);
      console.log(
        `[Viewer] Loaded ${filePath}: ${mesh.stats.vertexCount} vertices, ${mesh.stats.faceCount} faces`,
      );
      return { ok: true, message: filePath };
    } catch (e) {
      const message = toErrorMessage(e);
      console.error(`[Viewer] Failed to load model ${filePath}: ${message}`);
      const availableNames =
        e instanceof InputError ? [...e.availableNames] : [];
      return { ok: false, message, availableNames };
    }
  }

  /**
   * Uploads the mesh, reframes the camera and publishes stats and the new
   * generation. Nothing changes if the upload throws.
   */
  private installMesh(mesh: InstallableMesh): void {
    const geometry = buildMeshGeometry(mesh.positions, mesh.indices);
    const generation = this.renderer.setMesh(geometry);

    const defaults = defaultViewerState();
    const eye = framingEye(geometry.maxDimension) ?? defaults.cameraPosition;
    this.camera.setTarget(defaults.cameraTarget);
    this.camera.setPosition(eye);

    this.commit({
      ...this.state,
      cameraPosition: [...this.camera.eye],
      cameraTarget: [...this.camera.target],
      stats: { ...mesh.stats },
      meshGeneration: generation,
    });
  }

  private enqueueCapture(command: CaptureCommand): void {
    if (command.type === "capture_frame" && !this.settings.captureEnabled) {
      console.error("[Capture] Frame capture not enabled");
      this.report(command, false, "Frame capture not enabled");
      return;
    }
    this.pendingCaptures.push(command);
  }

  private async drawFrame(): Promise<void> {
    const wantsImage = this.pendingCaptures.length > 0;
    let output: FrameOutput;
    try {
      output = await this.renderer.renderFrame(
        this.frameUniforms(),
        this.framePlan(),
        wantsImage,
      );
    } catch (e) {
      if (e instanceof SurfaceError) {
        // Captures stay queued for the next frame.
        console.warn(`[Renderer] Skipping frame: ${e.message}`);
        return;
      }
      console.error("[Renderer] Frame failed:", toErrorMessage(e));
      this.failPendingCaptures(`Failed to render frame: ${toErrorMessage(e)}`);
      return;
    }

    if (!wantsImage) return;
    const captures = this.pendingCaptures;
    this.pendingCaptures = [];
    const image = output.image;
    if (!image) {
      for (const c of captures) this.report(c, false, "Frame read-back produced no image");
      return;
    }
    for (const command of captures) {
      await this.writeCapture(command, image, output);
    }
  }

  private async writeCapture(
    command: CaptureCommand,
    image: RenderedImage,
    output: FrameOutput,
  ): Promise<void> {
    try {
      const written =
        command.type === "screenshot"
          ? await this.capture.saveScreenshot(image, command.path)
          : await this.capture.saveFrame(
              image,
              output.record,
              this.state,
              command.path,
            );
      this.report(command, true, written);
    } catch (e) {
      const message = toErrorMessage(e);
      console.error(`[Capture] ${message}`);
      this.report(command, false, message);
    }
  }

  private failPendingCaptures(message: string): void {
    const captures = this.pendingCaptures;
    this.pendingCaptures = [];
    for (const command of captures) this.report(command, false, message);
  }

  private report(command: CaptureCommand, ok: boolean, message: string): void {
    if (command.requestId !== undefined) {
      this.host.reportResult(command.requestId, { ok, message });
    }
  }

  private frameUniforms(): FrameUniforms {
    return {
      viewProjection: this.camera.viewProjectionMatrix(),
      model: modelMatrixFromEuler(this.state.modelRotation),
      cameraPosition: [...this.camera.eye],
    };
  }

  private framePlan(): FramePlan {
    return {
      wireframe: this.state.showWireframe,
      backfaces: this.state.showBackfaces,
      overlay: this.state.showUi
        ? layoutOverlay(this.state.stats, this.settings.rpcAddress)
        : [],
    };
  }

  private publishCamera(): void {
    this.commit({
      ...this.state,
      cameraPosition: [...this.camera.eye],
      cameraTarget: [...this.camera.target],
    });
  }

  private commit(next: ViewerStateSnapshot): void {
    this.state = next;
    publishViewerState(this.stateCtx, next);
  }

  private shutdown(): void {
    if (this._phase === "exiting") return;
    this._phase = "exiting";
    this.failPendingCaptures("Viewer is shutting down");
    this.host.exit(0);
  }
}
