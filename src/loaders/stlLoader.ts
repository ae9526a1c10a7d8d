// src/loaders/stlLoader.ts
import { readFile } from "node:fs/promises";
import { FormatError } from "../core/errors.js";

export interface STLGeometry {
  positions: Float32Array; // flattened [x,y,z,...], three per facet
  indices: Uint32Array; // triangle indices
}

const decoder = new TextDecoder("utf-8");

/**
 * Parses the contents of an STL file.
 *
 * Binary files whose size matches the facet count in their header are read
 * as binary even when the header starts with "solid", which some exporters
 * write.
 *
 * @throws {FormatError} If the data is neither valid ASCII nor binary STL.
 */
export const parseSTL = (data: Uint8Array): STLGeometry => {
  const dv = new DataView(data.buffer, data.byteOffset, data.byteLength);

  const isBinary = (): boolean => {
    if (data.byteLength < 84) return false;
    const triangles = dv.getUint32(80, true);
    return 84 + triangles * 50 === data.byteLength;
  };

  if (isBinary()) return parseBinary(dv);

  const text = decoder.decode(data);
  if (!text.trimStart().toLowerCase().startsWith("solid")) {
    throw new FormatError("STL file is neither ASCII nor binary");
  }
  return parseASCII(text);
};

const parseBinary = (dv: DataView): STLGeometry => {
  const triangles = dv.getUint32(80, true);
  const positions = new Float32Array(triangles * 9);
  const indices = new Uint32Array(triangles * 3);
  let offset = 84;

  for (let i = 0; i < triangles; i++) {
    // Skip the facet normal; it is recomputed from the winding when drawn
    offset += 12;
    for (let v = 0; v < 3; v++) {
      const base = (i * 3 + v) * 3;
      positions[base] = dv.getFloat32(offset, true);
      positions[base + 1] = dv.getFloat32(offset + 4, true);
      positions[base + 2] = dv.getFloat32(offset + 8, true);
      indices[i * 3 + v] = i * 3 + v;
      offset += 12;
    }
    // Skip attribute byte count
    offset += 2;
  }

  return { positions, indices };
};

const parseASCII = (text: string): STLGeometry => {
  const positions: number[] = [];
  const indices: number[] = [];

  const vertexPattern =
    /vertex\s+([\d.+\-eE]+)\s+([\d.+\-eE]+)\s+([\d.+\-eE]+)/g;

  let match: RegExpExecArray | null;
  while ((match = vertexPattern.exec(text)) !== null) {
    indices.push(positions.length / 3);
    positions.push(
      parseFloat(match[1]),
      parseFloat(match[2]),
      parseFloat(match[3]),
    );
  }

  if (indices.length % 3 !== 0) {
    throw new FormatError(
      "Index count is not a multiple of 3 (non-triangular faces)",
    );
  }

  return {
    positions: new Float32Array(positions),
    indices: new Uint32Array(indices),
  };
};

/**
 * Reads an STL file from disk and parses it into geometry.
 */
export const loadSTL = async (filePath: string): Promise<STLGeometry> => {
  const data = new Uint8Array(await readFile(filePath));
  return parseSTL(data);
};
