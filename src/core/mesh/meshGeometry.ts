// src/core/mesh/meshGeometry.ts
import type { Point3 } from "../types/viewer.js";

/** Axis-aligned bounding box. */
export interface MeshBounds {
  min: Point3;
  max: Point3;
}

/**
 * Render-ready triangle soup. Every triangle owns three vertices, so the
 * index buffers are trivially in range whatever the source indexing was.
 */
export interface MeshGeometry {
  /** Re-centred positions, three floats per vertex, three vertices per triangle. */
  vertices: Float32Array;
  /** Front faces: [3i, 3i+1, 3i+2]. */
  indices: Uint32Array;
  /** Reversed winding: [3i, 3i+2, 3i+1]. */
  backfaceIndices: Uint32Array;
  /** Triangle edges as a line list, for the wireframe overlay. */
  wireframeIndices: Uint32Array;
  /** Bounds of the source positions, before re-centring. */
  bounds: MeshBounds | null;
  /** Largest side of the bounding box; 0 for an empty mesh. */
  maxDimension: number;
  triangleCount: number;
}

/**
 * Bounding box of a flattened position list, or `null` when it is empty.
 */
export function computeBounds(positions: ArrayLike<number>): MeshBounds | null {
  if (positions.length < 3) return null;
  const min: Point3 = [positions[0], positions[1], positions[2]];
  const max: Point3 = [positions[0], positions[1], positions[2]];
  for (let i = 3; i + 2 < positions.length; i += 3) {
    for (let k = 0; k < 3; k++) {
      const v = positions[i + k];
      if (v < min[k]) min[k] = v;
      if (v > max[k]) max[k] = v;
    }
  }
  return { min, max };
}

export function boundsCenter(bounds: MeshBounds): Point3 {
  return [
    (bounds.min[0] + bounds.max[0]) / 2,
    (bounds.min[1] + bounds.max[1]) / 2,
    (bounds.min[2] + bounds.max[2]) / 2,
  ];
}

export function boundsSize(bounds: MeshBounds): Point3 {
  return [
    bounds.max[0] - bounds.min[0],
    bounds.max[1] - bounds.min[1],
    bounds.max[2] - bounds.min[2],
  ];
}

/**
 * Expands an indexed mesh into a centred triangle soup with front, backface
 * and wireframe index lists.
 */
export function buildMeshGeometry(
  positions: Float32Array,
  indices: Uint32Array,
): MeshGeometry {
  const triangleCount = Math.floor(indices.length / 3);
  const bounds = computeBounds(positions);
  const center: Point3 = bounds ? boundsCenter(bounds) : [0, 0, 0];
  const size = bounds ? boundsSize(bounds) : [0, 0, 0];

  const vertices = new Float32Array(triangleCount * 9);
  const front = new Uint32Array(triangleCount * 3);
  const back = new Uint32Array(triangleCount * 3);
  const lines = new Uint32Array(triangleCount * 6);

  for (let t = 0; t < triangleCount; t++) {
    for (let c = 0; c < 3; c++) {
      const src = indices[t * 3 + c] * 3;
      const dst = (t * 3 + c) * 3;
      vertices[dst] = positions[src] - center[0];
      vertices[dst + 1] = positions[src + 1] - center[1];
      vertices[dst + 2] = positions[src + 2] - center[2];
    }
    const a = t * 3;
    const b = a + 1;
    const c = a + 2;
    front.set([a, b, c], t * 3);
    back.set([a, c, b], t * 3);
    lines.set([a, b, b, c, c, a], t * 6);
  }

  return {
    vertices,
    indices: front,
    backfaceIndices: back,
    wireframeIndices: lines,
    bounds,
    maxDimension: Math.max(size[0], size[1], size[2]),
    triangleCount,
  };
}
