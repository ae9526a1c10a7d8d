// src/loaders/mesh/meshLoader.ts
import path from "node:path";
import {
  FormatError,
  InputError,
  toErrorMessage,
} from "../../core/errors.js";
import { computeMeshStats } from "../../core/mesh/meshTopology.js";
import type { MeshStats } from "../../core/types/viewer.js";

/**
 * Raw triangle mesh as produced by a format reader.
 */
export interface RawMesh {
  positions: Float32Array; // Flattened [x,y,z,...]
  indices: Uint32Array; // Triangle indices
}

/** A validated mesh plus its statistics. */
export interface LoadedMesh extends RawMesh {
  /** Name of the selected sub-mesh, when the format has names. */
  name?: string;
  stats: MeshStats;
}

/**
 * Defines the contract for a file-format reader.
 */
export interface IMeshLoader {
  /**
   * Reads one mesh from `filePath`.
   *
   * @param meshName - Selects a named sub-mesh in formats that hold several.
   * @throws {InputError} For selection problems.
   * @throws {FormatError} For data that cannot be turned into triangles.
   */
  load(filePath: string, meshName?: string): Promise<RawMesh & { name?: string }>;
}

/**
 * Maps lower-case file extensions to readers.
 */
export class MeshLoaderRegistry {
  private loaders = new Map<string, IMeshLoader>();

  public register(extension: string, loader: IMeshLoader): void {
    this.loaders.set(extension.toLowerCase(), loader);
  }

  public getLoader(extension: string): IMeshLoader | undefined {
    return this.loaders.get(extension.toLowerCase());
  }

  public extensions(): string[] {
    return [...this.loaders.keys()];
  }
}

/**
 * Checks that every index points at a vertex and that the index list is
 * made of whole triangles.
 *
 * @throws {FormatError}
 */
export function validateRawMesh(mesh: RawMesh): void {
  if (mesh.positions.length % 3 !== 0) {
    throw new FormatError("Position count is not a multiple of 3");
  }
  if (mesh.indices.length % 3 !== 0) {
    throw new FormatError(
      "Index count is not a multiple of 3 (non-triangular faces)",
    );
  }
  const vertexCount = mesh.positions.length / 3;
  for (let i = 0; i < mesh.indices.length; i++) {
    if (mesh.indices[i] >= vertexCount) {
      throw new FormatError(
        `Index ${mesh.indices[i]} out of range for ${vertexCount} vertices`,
      );
    }
  }
}

/**
 * Loads a mesh through the registry entry matching the file's extension.
 *
 * @throws {InputError} For a missing or unsupported extension, an unreadable
 *     file or a bad mesh selection.
 * @throws {FormatError} For invalid mesh data.
 */
export async function loadMeshWith(
  registry: MeshLoaderRegistry,
  filePath: string,
  meshName?: string,
): Promise<LoadedMesh> {
  const ext = path.extname(filePath).slice(1);
  if (!ext) {
    throw new InputError("File has no extension");
  }
  const loader = registry.getLoader(ext);
  if (!loader) {
    throw new InputError(`Unsupported file format: ${ext.toLowerCase()}`);
  }

  let raw: RawMesh & { name?: string };
  try {
    raw = await loader.load(filePath, meshName);
  } catch (e) {
    if (e instanceof InputError || e instanceof FormatError) throw e;
    throw new InputError(
      `Failed to read ${filePath}: ${toErrorMessage(e)}`,
      [],
      { cause: e },
    );
  }

  validateRawMesh(raw);
  const stats = computeMeshStats(raw.positions.length / 3, raw.indices);
  return { ...raw, stats };
}
