import { describe, expect, it } from "vitest";
import { SHARED_VIEWER_STATE_BUFFER_SIZE } from "../sharedViewerStateLayout.js";
import { defaultViewerState, type ViewerStateSnapshot } from "../types/viewer.js";
import {
  allocateViewerState,
  createViewerStateContext,
  hasViewerStateHeader,
  initializeViewerState,
  publishViewerState,
  readViewerState,
} from "../viewerState.js";

const sample: ViewerStateSnapshot = {
  cameraPosition: [0.1, 0.2, 0.3],
  cameraTarget: [-1.5, 2.25, 1e-7],
  modelRotation: [Math.PI, -Math.PI / 3, 0.5],
  showWireframe: false,
  showBackfaces: true,
  showUi: false,
  stats: { vertexCount: 8, edgeCount: 18, faceCount: 12, isManifold: true, holeCount: 0 },
  meshGeneration: 3,
};

describe("viewer state", () => {
  it("starts with the header and the default snapshot", () => {
    const { ctx } = allocateViewerState();
    expect(hasViewerStateHeader(ctx)).toBe(false);
    initializeViewerState(ctx, defaultViewerState());
    expect(hasViewerStateHeader(ctx)).toBe(true);
    expect(readViewerState(ctx)).toEqual(defaultViewerState());
  });

  it("reports zeroed stats before any mesh", () => {
    const { ctx } = allocateViewerState();
    initializeViewerState(ctx, defaultViewerState());
    expect(readViewerState(ctx).stats).toEqual({
      vertexCount: 0,
      edgeCount: 0,
      faceCount: 0,
      isManifold: false,
      holeCount: 0,
    });
  });

  it("round-trips float64 pose values exactly", () => {
    const { ctx } = allocateViewerState();
    initializeViewerState(ctx, defaultViewerState());
    publishViewerState(ctx, sample);
    expect(readViewerState(ctx)).toEqual(sample);
  });

  it("shares one buffer across contexts", () => {
    const { buffer, ctx } = allocateViewerState();
    initializeViewerState(ctx, sample);
    const other = createViewerStateContext(buffer);
    expect(hasViewerStateHeader(other)).toBe(true);
    expect(readViewerState(other).cameraTarget).toEqual([-1.5, 2.25, 1e-7]);
  });

  it("leaves the sequence even after each publish", () => {
    const { ctx } = allocateViewerState();
    initializeViewerState(ctx, defaultViewerState());
    publishViewerState(ctx, sample);
    // SEQ lives at byte 8.
    expect(Atomics.load(ctx.i32, 2) % 2).toBe(0);
  });

  it("rejects a buffer smaller than the layout", () => {
    const small = new SharedArrayBuffer(SHARED_VIEWER_STATE_BUFFER_SIZE - 8);
    expect(() => createViewerStateContext(small)).toThrow(
      "Viewer state buffer too small: 120 < 128",
    );
  });
});
