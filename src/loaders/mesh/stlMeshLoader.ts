// src/loaders/mesh/stlMeshLoader.ts
import { loadSTL } from "../stlLoader.js";
import type { IMeshLoader, RawMesh } from "./meshLoader.js";

/**
 * Loader for meshes in .stl format (ASCII or binary).
 */
export class StlMeshLoader implements IMeshLoader {
  public async load(filePath: string): Promise<RawMesh> {
    return loadSTL(filePath);
  }
}
