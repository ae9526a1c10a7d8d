// src/app/report.ts
import { boundsSize, computeBounds } from "../core/mesh/meshGeometry.js";
import type { MeshStats } from "../core/types/viewer.js";

const fixed3 = (v: readonly number[]) => v.map((n) => n.toFixed(3)).join(", ");

/**
 * Lines printed by `meshview stats <file>`.
 */
export function formatMeshReport(
  positions: ArrayLike<number>,
  stats: MeshStats,
): string[] {
  const lines = [
    "",
    "=== Mesh Statistics ===",
    `Vertices:  ${stats.vertexCount}`,
    `Faces:     ${stats.faceCount}`,
    `Triangles: ${stats.faceCount}`,
    `Edges:     ${stats.edgeCount}`,
    `Manifold:  ${stats.isManifold ? "Yes" : "No"}`,
    `Holes:     ${stats.holeCount}`,
  ];

  const bounds = computeBounds(positions);
  if (bounds) {
    lines.push(
      "",
      "=== Bounding Box ===",
      `Min: (${fixed3(bounds.min)})`,
      `Max: (${fixed3(bounds.max)})`,
      `Size: (${fixed3(boundsSize(bounds))})`,
    );
  }
  return lines;
}
