// src/core/mesh/meshTopology.ts
import type { MeshStats } from "../types/viewer.js";

/**
 * Union-find over vertex indices, used to group boundary edges into rings.
 */
class DisjointSet {
  private parent = new Map<number, number>();
  private size = new Map<number, number>();

  public find(x: number): number {
    if (!this.parent.has(x)) {
      this.parent.set(x, x);
      this.size.set(x, 1);
      return x;
    }
    let root = x;
    let next = this.parent.get(root);
    while (next !== undefined && next !== root) {
      root = next;
      next = this.parent.get(root);
    }
    // Path compression.
    let node = x;
    while (node !== root) {
      const up = this.parent.get(node) ?? root;
      this.parent.set(node, root);
      node = up;
    }
    return root;
  }

  public union(a: number, b: number): void {
    const ra = this.find(a);
    const rb = this.find(b);
    if (ra === rb) return;
    const sa = this.size.get(ra) ?? 1;
    const sb = this.size.get(rb) ?? 1;
    const [small, large] = sa < sb ? [ra, rb] : [rb, ra];
    this.parent.set(small, large);
    this.size.set(large, sa + sb);
  }

  public roots(): Set<number> {
    const out = new Set<number>();
    for (const key of this.parent.keys()) out.add(this.find(key));
    return out;
  }
}

const edgeKey = (a: number, b: number, vertexCount: number) =>
  a < b ? a * vertexCount + b : b * vertexCount + a;

/**
 * Computes summary statistics for an indexed triangle mesh.
 *
 * Edges are unique undirected vertex pairs. A hole is a connected group of
 * boundary edges (edges used by exactly one face). The mesh is manifold
 * when it has faces and no holes. Vertices are counted as given; nothing is
 * welded.
 */
export function computeMeshStats(
  vertexCount: number,
  indices: Uint32Array,
): MeshStats {
  const faceCount = Math.floor(indices.length / 3);
  const edgeUse = new Map<number, { a: number; b: number; uses: number }>();

  for (let f = 0; f < faceCount; f++) {
    const tri = [indices[f * 3], indices[f * 3 + 1], indices[f * 3 + 2]];
    for (let e = 0; e < 3; e++) {
      const a = tri[e];
      const b = tri[(e + 1) % 3];
      if (a === b) continue;
      const key = edgeKey(a, b, vertexCount);
      const entry = edgeUse.get(key);
      if (entry) entry.uses++;
      else edgeUse.set(key, { a, b, uses: 1 });
    }
  }

  const rings = new DisjointSet();
  for (const { a, b, uses } of edgeUse.values()) {
    if (uses === 1) rings.union(a, b);
  }
  const holeCount = rings.roots().size;

  return {
    vertexCount,
    edgeCount: edgeUse.size,
    faceCount,
    isManifold: faceCount > 0 && holeCount === 0,
    holeCount,
  };
}
