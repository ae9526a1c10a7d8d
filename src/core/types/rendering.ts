// src/core/types/rendering.ts
import type { Mat4 } from "wgpu-matrix";
import type { MeshGeometry } from "../mesh/meshGeometry.js";
import type { ViewerStateSnapshot } from "./viewer.js";

/** RGBA in linear [0, 1]. */
export type Color4 = [number, number, number, number];

/** One line of overlay text, positioned in physical pixels. */
export interface OverlayLine {
  text: string;
  x: number;
  /** Top of the text box. */
  y: number;
  /** Nominal text size in pixels. */
  size: number;
  color: Color4;
}

/**
 * What the renderer draws this frame, derived from the viewer state.
 */
export interface FramePlan {
  wireframe: boolean;
  backfaces: boolean;
  /** Overlay text; empty when the UI is hidden. */
  overlay: OverlayLine[];
}

/**
 * Per-frame uniform values. Matrices are column-major, ready for upload.
 */
export interface FrameUniforms {
  viewProjection: Mat4;
  model: Mat4;
  cameraPosition: [number, number, number];
}

/** A read-back frame, tightly packed, top row first. */
export interface RenderedImage {
  width: number;
  height: number;
  rgba: Uint8Array;
}

/** What a frame contained, for frame captures. */
export interface FrameRecord {
  width: number;
  height: number;
  /** Render passes recorded, in submission order. */
  passes: string[];
  /** Indexed draws issued, per pipeline. */
  draws: Record<string, number>;
  meshGeneration: number;
  triangleCount: number;
  uniforms: {
    viewProjection: number[];
    model: number[];
    cameraPosition: number[];
  };
}

export interface FrameOutput {
  record: FrameRecord;
  /** Present only when a read-back was requested. */
  image?: RenderedImage;
}

/**
 * The GPU side of the viewer. The render loop talks to the GPU only
 * through this interface.
 */
export interface ViewerRenderer {
  /** Name of the GPU adapter, for logging. */
  readonly adapterName: string;
  readonly width: number;
  readonly height: number;
  /** Reconfigures the presentation surface and depth buffer. */
  resize(width: number, height: number): void;
  /**
   * Uploads a new mesh and swaps it in.
   *
   * @returns The generation number of the published buffers.
   */
  setMesh(geometry: MeshGeometry): number;
  /**
   * Records, submits and presents one frame. With `readback`, the colour
   * target is copied out before presentation.
   *
   * @throws {SurfaceError} When no presentable target could be acquired.
   */
  renderFrame(
    uniforms: FrameUniforms,
    plan: FramePlan,
    readback: boolean,
  ): Promise<FrameOutput>;
  destroy(): Promise<void>;
}

/** JSON written next to a captured frame. */
export interface FrameCaptureDocument {
  capturedAt: string;
  image: string;
  frame: FrameRecord;
  state: ViewerStateSnapshot;
}
