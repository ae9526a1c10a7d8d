// src/app/worker/state.ts
import type { WebGpuRenderer } from "../../core/rendering/renderer.js";
import {
  RENDER_THREAD_ONLY,
  type RenderThreadOnly,
} from "../../core/types/worker.js";
import type { RenderLoop } from "./loop.js";

/**
 * GPU-owning objects of the render worker. Branded so the type checker
 * rejects it in any posted message.
 */
export interface RenderContext extends RenderThreadOnly {
  renderer: WebGpuRenderer;
  loop: RenderLoop;
}

export function createRenderContext(
  renderer: WebGpuRenderer,
  loop: RenderLoop,
): RenderContext {
  return { [RENDER_THREAD_ONLY]: true, renderer, loop };
}

/**
 * Shared state for the render worker.
 */
export interface WorkerState {
  context: RenderContext | null;
  redrawTimer: NodeJS.Timeout | null;
  exiting: boolean;
}

/**
 * Global worker state instance. All worker modules read and modify this
 * one object.
 */
export const state: WorkerState = {
  context: null,
  redrawTimer: null,
  exiting: false,
};
