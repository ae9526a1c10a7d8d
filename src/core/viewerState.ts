// src/core/viewerState.ts

/**
 * Lock-free bridge between the render worker, which owns the viewer state,
 * and the threads that only need to look at it (RPC handlers, the CLI
 * host). The worker publishes complete snapshots through a seqlock; readers
 * never block the worker and never see a half-written snapshot.
 *
 * Memory ordering pattern:
 * - Writer (worker): Atomics.add(SEQ, 1) → store fields → Atomics.add(SEQ, 1).
 * - Reader: s0 = Atomics.load(SEQ) → load fields → s1 = Atomics.load(SEQ),
 *   accept when s0 is even and s0 === s1.
 */

import {
  CAMERA_POSITION_OFFSET,
  CAMERA_TARGET_OFFSET,
  MODEL_ROTATION_OFFSET,
  SHARED_VIEWER_STATE_BUFFER_SIZE,
  STATS_EDGE_COUNT_OFFSET,
  STATS_FACE_COUNT_OFFSET,
  STATS_HOLE_COUNT_OFFSET,
  STATS_IS_MANIFOLD_OFFSET,
  STATS_VERTEX_COUNT_OFFSET,
  VF_SHOW_BACKFACES,
  VF_SHOW_UI,
  VF_SHOW_WIREFRAME,
  VIEWER_FLAGS_OFFSET,
  VIEWER_STATE_GEN_OFFSET,
  VIEWER_STATE_MAGIC,
  VIEWER_STATE_MAGIC_OFFSET,
  VIEWER_STATE_SEQ_OFFSET,
  VIEWER_STATE_VERSION,
  VIEWER_STATE_VERSION_OFFSET,
} from "./sharedViewerStateLayout.js";
import type { Point3, ViewerStateSnapshot } from "./types/viewer.js";

/**
 * Typed-array views over the shared viewer state buffer. Both views share
 * the same backing memory.
 */
export interface ViewerStateContext {
  /** Int view for the header, flags and stats. */
  i32: Int32Array;
  /** Float view for the pose vectors. */
  f64: Float64Array;
}

const idx32 = (byteOffset: number) => byteOffset >> 2;
const idx64 = (byteOffset: number) => byteOffset >> 3;

/**
 * Allocates the shared buffer and wraps it in a context.
 */
export function allocateViewerState(): {
  buffer: SharedArrayBuffer;
  ctx: ViewerStateContext;
} {
  const buffer = new SharedArrayBuffer(SHARED_VIEWER_STATE_BUFFER_SIZE);
  return { buffer, ctx: createViewerStateContext(buffer) };
}

/**
 * Wraps an existing buffer, typically the one received by the worker.
 *
 * @throws If the buffer is smaller than the layout.
 */
export function createViewerStateContext(
  buffer: SharedArrayBuffer,
): ViewerStateContext {
  if (buffer.byteLength < SHARED_VIEWER_STATE_BUFFER_SIZE) {
    throw new Error(
      `Viewer state buffer too small: ${buffer.byteLength} < ${SHARED_VIEWER_STATE_BUFFER_SIZE}`,
    );
  }
  return { i32: new Int32Array(buffer), f64: new Float64Array(buffer) };
}

/**
 * Writes MAGIC/VERSION and the initial snapshot. Called once by the thread
 * that allocates the buffer, before the worker starts.
 */
export function initializeViewerState(
  ctx: ViewerStateContext,
  initial: ViewerStateSnapshot,
): void {
  Atomics.store(ctx.i32, idx32(VIEWER_STATE_MAGIC_OFFSET), VIEWER_STATE_MAGIC);
  Atomics.store(
    ctx.i32,
    idx32(VIEWER_STATE_VERSION_OFFSET),
    VIEWER_STATE_VERSION,
  );
  Atomics.store(ctx.i32, idx32(VIEWER_STATE_SEQ_OFFSET), 0);
  publishViewerState(ctx, initial);
}

/** True when the buffer carries this layout's header. */
export function hasViewerStateHeader(ctx: ViewerStateContext): boolean {
  return (
    Atomics.load(ctx.i32, idx32(VIEWER_STATE_MAGIC_OFFSET)) ===
      VIEWER_STATE_MAGIC &&
    Atomics.load(ctx.i32, idx32(VIEWER_STATE_VERSION_OFFSET)) ===
      VIEWER_STATE_VERSION
  );
}

const writeVec = (ctx: ViewerStateContext, byteOffset: number, v: Point3) => {
  const base = idx64(byteOffset);
  ctx.f64[base] = v[0];
  ctx.f64[base + 1] = v[1];
  ctx.f64[base + 2] = v[2];
};

const readVec = (ctx: ViewerStateContext, byteOffset: number): Point3 => {
  const base = idx64(byteOffset);
  return [ctx.f64[base], ctx.f64[base + 1], ctx.f64[base + 2]];
};

/**
 * Publishes a complete snapshot. Single writer only: the render worker
 * after startup, the allocating thread before it.
 */
export function publishViewerState(
  ctx: ViewerStateContext,
  state: ViewerStateSnapshot,
): void {
  const seq = idx32(VIEWER_STATE_SEQ_OFFSET);
  Atomics.add(ctx.i32, seq, 1);

  let flags = 0;
  if (state.showWireframe) flags |= VF_SHOW_WIREFRAME;
  if (state.showBackfaces) flags |= VF_SHOW_BACKFACES;
  if (state.showUi) flags |= VF_SHOW_UI;
  ctx.i32[idx32(VIEWER_FLAGS_OFFSET)] = flags;

  ctx.i32[idx32(STATS_VERTEX_COUNT_OFFSET)] = state.stats.vertexCount;
  ctx.i32[idx32(STATS_EDGE_COUNT_OFFSET)] = state.stats.edgeCount;
  ctx.i32[idx32(STATS_FACE_COUNT_OFFSET)] = state.stats.faceCount;
  ctx.i32[idx32(STATS_IS_MANIFOLD_OFFSET)] = state.stats.isManifold ? 1 : 0;
  ctx.i32[idx32(STATS_HOLE_COUNT_OFFSET)] = state.stats.holeCount;
  ctx.i32[idx32(VIEWER_STATE_GEN_OFFSET)] = state.meshGeneration;

  writeVec(ctx, CAMERA_POSITION_OFFSET, state.cameraPosition);
  writeVec(ctx, CAMERA_TARGET_OFFSET, state.cameraTarget);
  writeVec(ctx, MODEL_ROTATION_OFFSET, state.modelRotation);

  Atomics.add(ctx.i32, seq, 1);
}

function readFields(ctx: ViewerStateContext): ViewerStateSnapshot {
  const flags = ctx.i32[idx32(VIEWER_FLAGS_OFFSET)];
  return {
    cameraPosition: readVec(ctx, CAMERA_POSITION_OFFSET),
    cameraTarget: readVec(ctx, CAMERA_TARGET_OFFSET),
    modelRotation: readVec(ctx, MODEL_ROTATION_OFFSET),
    showWireframe: (flags & VF_SHOW_WIREFRAME) !== 0,
    showBackfaces: (flags & VF_SHOW_BACKFACES) !== 0,
    showUi: (flags & VF_SHOW_UI) !== 0,
    stats: {
      vertexCount: ctx.i32[idx32(STATS_VERTEX_COUNT_OFFSET)],
      edgeCount: ctx.i32[idx32(STATS_EDGE_COUNT_OFFSET)],
      faceCount: ctx.i32[idx32(STATS_FACE_COUNT_OFFSET)],
      isManifold: ctx.i32[idx32(STATS_IS_MANIFOLD_OFFSET)] === 1,
      holeCount: ctx.i32[idx32(STATS_HOLE_COUNT_OFFSET)],
    },
    meshGeneration: ctx.i32[idx32(VIEWER_STATE_GEN_OFFSET)],
  };
}

/**
 * Reads a consistent snapshot, retrying while the writer is mid-update.
 * Safe from any thread.
 */
export function readViewerState(ctx: ViewerStateContext): ViewerStateSnapshot {
  const seq = idx32(VIEWER_STATE_SEQ_OFFSET);
  for (;;) {
    const before = Atomics.load(ctx.i32, seq);
    if ((before & 1) !== 0) continue;
    const snapshot = readFields(ctx);
    if (Atomics.load(ctx.i32, seq) === before) return snapshot;
  }
}
