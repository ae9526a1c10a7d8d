// src/loaders/objLoader.ts
import { readFile } from "node:fs/promises";
import { FormatError } from "../core/errors.js";

/**
 * Geometry read from an OBJ file. Positions keep the file's vertex order so
 * shared vertices stay shared; indices are triangles.
 */
export interface OBJGeometry {
  positions: Float32Array; // Flattened [x,y,z,...]
  indices: Uint32Array; // Triangle indices
}

/**
 * Resolves one face-vertex token ("7", "7/2", "7//3", "-1") to a
 * zero-based position index.
 */
const resolveIndex = (
  token: string,
  vertexCount: number,
  lineNumber: number,
): number => {
  const raw = parseInt(token.split("/")[0], 10);
  if (Number.isNaN(raw) || raw === 0) {
    throw new FormatError(
      `Invalid face index '${token}' on line ${lineNumber}`,
    );
  }
  const index = raw > 0 ? raw - 1 : vertexCount + raw;
  if (index < 0 || index >= vertexCount) {
    throw new FormatError(
      `Face index ${raw} out of range on line ${lineNumber}`,
    );
  }
  return index;
};

/**
 * Parses the text content of an OBJ file.
 *
 * Only `v` and `f` records matter to the viewer; texture coordinates,
 * normals, groups and materials are skipped. Polygons are split with a
 * simple fan triangulation.
 *
 * @throws {FormatError} On malformed vertices or face indices.
 */
export const parseOBJ = (text: string): OBJGeometry => {
  const positions: number[] = [];
  const indices: number[] = [];
  const lines = text.split("\n");

  for (let n = 0; n < lines.length; n++) {
    const parts = lines[n].trim().split(/\s+/);
    const type = parts.shift();

    if (type === "v") {
      const xyz = parts.slice(0, 3).map(parseFloat);
      if (xyz.length < 3 || xyz.some(Number.isNaN)) {
        throw new FormatError(`Invalid vertex on line ${n + 1}`);
      }
      positions.push(xyz[0], xyz[1], xyz[2]);
    } else if (type === "f") {
      // Faces may only reference vertices declared above them
      const vertexCount = positions.length / 3;
      const face = parts.map((t) => resolveIndex(t, vertexCount, n + 1));
      if (face.length < 3) {
        throw new FormatError(`Face with fewer than 3 vertices on line ${n + 1}`);
      }
      for (let i = 1; i < face.length - 1; i++) {
        indices.push(face[0], face[i], face[i + 1]);
      }
    }
  }

  return {
    positions: new Float32Array(positions),
    indices: new Uint32Array(indices),
  };
};

/**
 * Reads an OBJ file from disk and parses it into geometry.
 */
export const loadOBJ = async (filePath: string): Promise<OBJGeometry> => {
  const text = await readFile(filePath, "utf-8");
  return parseOBJ(text);
};
