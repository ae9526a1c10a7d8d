import { describe, expect, it } from "vitest";
import { computeMeshStats } from "../../core/mesh/meshTopology.js";
import { formatMeshReport } from "../report.js";

describe("formatMeshReport", () => {
  it("prints statistics and the bounding box", () => {
    const positions = new Float32Array([0, 0, 0, 2, 0, 0, 0, 4, 1]);
    const stats = computeMeshStats(3, new Uint32Array([0, 1, 2]));
    expect(formatMeshReport(positions, stats)).toEqual([
      "",
      "=== Mesh Statistics ===",
      "Vertices:  3",
      "Faces:     1",
      "Triangles: 1",
      "Edges:     3",
      "Manifold:  No",
      "Holes:     1",
      "",
      "=== Bounding Box ===",
      "Min: (0.000, 0.000, 0.000)",
      "Max: (2.000, 4.000, 1.000)",
      "Size: (2.000, 4.000, 1.000)",
    ]);
  });

  it("omits the bounding box for an empty mesh", () => {
    const lines = formatMeshReport(new Float32Array(), computeMeshStats(0, new Uint32Array()));
    expect(lines).toHaveLength(8);
    expect(lines[6]).toBe("Manifold:  No");
  });
});
