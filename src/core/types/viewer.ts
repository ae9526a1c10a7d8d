// src/core/types/viewer.ts

/** A point or direction in 3D space, kept in float64. */
export type Point3 = [number, number, number];

/** Summary statistics of the currently displayed mesh. */
export interface MeshStats {
  vertexCount: number;
  edgeCount: number;
  faceCount: number;
  isManifold: boolean;
  /** Number of boundary rings (closed loops of single-face edges). */
  holeCount: number;
}

/** Display toggles that can be flipped locally or over RPC. */
export type DisplayFlag = "wireframe" | "backfaces" | "ui";

export const DISPLAY_FLAGS: readonly DisplayFlag[] = [
  "wireframe",
  "backfaces",
  "ui",
];

/**
 * Immutable copy of the shared viewer state, as published by the render
 * thread.
 */
export interface ViewerStateSnapshot {
  cameraPosition: Point3;
  cameraTarget: Point3;
  /** Euler angles in radians, applied as Rz * Ry * Rx. */
  modelRotation: Point3;
  showWireframe: boolean;
  showBackfaces: boolean;
  showUi: boolean;
  stats: MeshStats;
  /** Incremented each time a new mesh is swapped in. */
  meshGeneration: number;
}

export const EMPTY_MESH_STATS: Readonly<MeshStats> = Object.freeze({
  vertexCount: 0,
  edgeCount: 0,
  faceCount: 0,
  isManifold: false,
  holeCount: 0,
});

/** State of a viewer started without a mesh. */
export function defaultViewerState(): ViewerStateSnapshot {
  return {
    cameraPosition: [5, 3, 5],
    cameraTarget: [0, 0, 0],
    modelRotation: [0, 0, 0],
    showWireframe: true,
    showBackfaces: false,
    showUi: true,
    stats: { ...EMPTY_MESH_STATS },
    meshGeneration: 0,
  };
}

/** Reads the toggle matching `flag` from a snapshot. */
export function displayFlagValue(
  state: ViewerStateSnapshot,
  flag: DisplayFlag,
): boolean {
  switch (flag) {
    case "wireframe":
      return state.showWireframe;
    case "backfaces":
      return state.showBackfaces;
    case "ui":
      return state.showUi;
  }
}

/** Returns a copy of `state` with `flag` set to `enabled`. */
export function withDisplayFlag(
  state: ViewerStateSnapshot,
  flag: DisplayFlag,
  enabled: boolean,
): ViewerStateSnapshot {
  switch (flag) {
    case "wireframe":
      return { ...state, showWireframe: enabled };
    case "backfaces":
      return { ...state, showBackfaces: enabled };
    case "ui":
      return { ...state, showUi: enabled };
  }
}
