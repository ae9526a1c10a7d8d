// src/loaders/mesh/gltfMeshLoader.ts
import { FormatError, InputError } from "../../core/errors.js";
import {
  getAccessorData,
  loadGLTF,
  type GLTFMesh,
  type GLTFPrimitive,
  type ParsedGLTF,
} from "../gltfLoader.js";
import type { IMeshLoader, RawMesh } from "./meshLoader.js";

const UNNAMED = "<unnamed>";
const TRIANGLES = 4;

const meshLabel = (mesh: GLTFMesh) => mesh.name ?? UNNAMED;

/**
 * Picks the mesh to display.
 *
 * A file with one mesh needs no name. With several, the caller must name
 * one; otherwise the error lists every mesh in the file.
 *
 * @throws {InputError} If the file has no meshes, the choice is ambiguous or
 *     the name is unknown.
 */
export function selectGltfMesh(
  meshes: readonly GLTFMesh[],
  meshName?: string,
): GLTFMesh {
  if (meshes.length === 0) {
    throw new InputError("GLB file contains no meshes");
  }
  const names = meshes.map(meshLabel);

  if (meshName === undefined) {
    if (meshes.length === 1) return meshes[0];
    throw new InputError(
      `GLB file contains ${meshes.length} meshes. Please specify one with --mesh <name>.\n` +
        `Available meshes: ${names.join(", ")}`,
      names,
    );
  }

  const found = meshes.find((m) => m.name === meshName);
  if (!found) {
    throw new InputError(
      `Mesh '${meshName}' not found in GLB file.\nAvailable meshes: ${names.join(", ")}`,
      names,
    );
  }
  return found;
}

function readPrimitive(
  gltf: ParsedGLTF,
  primitive: GLTFPrimitive,
): { positions: Float32Array; indices: Uint32Array } {
  if ((primitive.mode ?? TRIANGLES) !== TRIANGLES) {
    throw new FormatError(
      `Primitive mode ${primitive.mode} is not supported (triangles only)`,
    );
  }
  const positionAccessor = primitive.attributes.POSITION;
  if (positionAccessor === undefined) {
    throw new FormatError("Primitive has no position data");
  }
  const rawPositions = getAccessorData(gltf, positionAccessor);
  if (!(rawPositions instanceof Float32Array)) {
    throw new FormatError("Quantized POSITION data is not supported");
  }

  const vertexCount = rawPositions.length / 3;
  let indices: Uint32Array;
  if (primitive.indices !== undefined) {
    indices = Uint32Array.from(getAccessorData(gltf, primitive.indices));
  } else {
    // Non-indexed geometry: every three vertices form a triangle
    indices = new Uint32Array(vertexCount);
    for (let i = 0; i < vertexCount; i++) indices[i] = i;
  }
  return { positions: rawPositions, indices };
}

/**
 * Concatenates every primitive of `mesh` into one indexed triangle list.
 */
export function extractGltfMesh(
  gltf: ParsedGLTF,
  mesh: GLTFMesh,
): RawMesh & { name: string } {
  const parts = mesh.primitives.map((p) => readPrimitive(gltf, p));

  const totalPositions = parts.reduce((n, p) => n + p.positions.length, 0);
  const totalIndices = parts.reduce((n, p) => n + p.indices.length, 0);
  const positions = new Float32Array(totalPositions);
  const indices = new Uint32Array(totalIndices);

  let positionOffset = 0;
  let indexOffset = 0;
  for (const part of parts) {
    const vertexOffset = positionOffset / 3;
    positions.set(part.positions, positionOffset);
    for (let i = 0; i < part.indices.length; i++) {
      indices[indexOffset + i] = part.indices[i] + vertexOffset;
    }
    positionOffset += part.positions.length;
    indexOffset += part.indices.length;
  }

  if (indices.length % 3 !== 0) {
    throw new FormatError(
      "Index count is not a multiple of 3 (non-triangular faces)",
    );
  }
  return { name: meshLabel(mesh), positions, indices };
}

/**
 * Loader for meshes from .glb and .gltf files.
 */
export class GltfMeshLoader implements IMeshLoader {
  public async load(
    filePath: string,
    meshName?: string,
  ): Promise<RawMesh & { name: string }> {
    const gltf = await loadGLTF(filePath);
    const mesh = selectGltfMesh(gltf.json.meshes ?? [], meshName);
    console.log(`[MeshLoader] Loading mesh: ${meshLabel(mesh)}`);
    return extractGltfMesh(gltf, mesh);
  }
}
