// src/app/worker/init.ts
import { parentPort } from "node:worker_threads";
import { create, globals } from "webgpu";
import { CaptureService } from "../../core/capture/captureService.js";
import { PngEncoder } from "../../core/capture/imageEncoder.js";
import { PortCommandReceiver } from "../../core/commandQueue.js";
import type { CommandResult, ViewerCommand } from "../../core/commands.js";
import { toErrorMessage } from "../../core/errors.js";
import { loadBitmapFont } from "../../core/rendering/bitmapFont.js";
import { WebGpuRenderer } from "../../core/rendering/renderer.js";
import {
  MSG_COMMAND_RESULT,
  MSG_EXIT,
  MSG_READY,
  MSG_SUBMIT_COMMAND,
  type CloneChecked,
  type InitMsg,
  type WorkerToMainMsg,
} from "../../core/types/worker.js";
import {
  createViewerStateContext,
  hasViewerStateHeader,
} from "../../core/viewerState.js";
import { loadMesh } from "../../loaders/mesh/loadMesh.js";
import { RenderLoop, type RenderLoopHost } from "./loop.js";
import { createRenderContext, state } from "./state.js";

/** Posts to the main thread; GPU handles are refused at compile time. */
export function postToMain<T extends WorkerToMainMsg>(
  msg: T & CloneChecked<T>,
): void {
  parentPort?.postMessage(msg);
}

/**
 * Sets up the render worker: GPU device, renderer, capture service and the
 * render loop, then starts drawing.
 *
 * @throws If the GPU or the shared state cannot be set up.
 */
export async function initWorker(msg: InitMsg): Promise<void> {
  console.log("[Worker] Initializing...");

  const stateCtx = createViewerStateContext(msg.sharedStateBuffer);
  if (!hasViewerStateHeader(stateCtx)) {
    throw new Error("Viewer state buffer has no valid header");
  }

  // Dawn's Node binding: WebGPU constants (GPUBufferUsage etc.) as globals.
  Object.assign(globalThis, globals);
  const gpu = create([]);

  const font = await loadBitmapFont();
  const { settings } = msg;
  const renderer = await WebGpuRenderer.create(
    gpu,
    settings.width,
    settings.height,
    font,
  );
  console.log(`[Renderer] Using adapter: ${renderer.adapterName}`);

  const loop = new RenderLoop({
    stateCtx,
    commands: new PortCommandReceiver(msg.commandPort),
    renderer,
    loadMesh,
    capture: new CaptureService(new PngEncoder(), settings.captureDir),
    host: createWorkerHost(),
    settings,
  });
  state.context = createRenderContext(renderer, loop);

  postToMain({ type: MSG_READY, adapter: renderer.adapterName });
  loop.resume(msg.initialMesh);
}

function createWorkerHost(): RenderLoopHost {
  return {
    submit(command: ViewerCommand) {
      postToMain({ type: MSG_SUBMIT_COMMAND, command });
    },
    requestRedraw(delayMs: number) {
      if (state.redrawTimer || state.exiting) return;
      state.redrawTimer = setTimeout(runFrame, delayMs);
    },
    reportResult(requestId: number, result: CommandResult) {
      postToMain({ type: MSG_COMMAND_RESULT, requestId, result });
    },
    exit(code: number) {
      shutdownWorker(code).catch((e: unknown) => {
        console.error("[Worker] Shutdown failed:", toErrorMessage(e));
      });
    },
  };
}

function runFrame(): void {
  state.redrawTimer = null;
  const loop = state.context?.loop;
  if (!loop) return;
  loop.redraw().catch((e: unknown) => {
    console.error("[Worker] Frame loop failed:", toErrorMessage(e));
  });
}

/**
 * Stops scheduling frames, releases the GPU and tells the main thread to
 * end the process.
 */
export async function shutdownWorker(code: number): Promise<void> {
  if (state.exiting) return;
  state.exiting = true;
  if (state.redrawTimer) {
    clearTimeout(state.redrawTimer);
    state.redrawTimer = null;
  }
  const context = state.context;
  state.context = null;
  try {
    await context?.renderer.destroy();
  } finally {
    postToMain({ type: MSG_EXIT, code });
  }
}
