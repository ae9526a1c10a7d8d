// src/loaders/mesh/objMeshLoader.ts
import { loadOBJ } from "../objLoader.js";
import type { IMeshLoader, RawMesh } from "./meshLoader.js";

/**
 * Loader for meshes in .obj format. OBJ files are treated as a single mesh,
 * so the mesh name is ignored.
 */
export class ObjMeshLoader implements IMeshLoader {
  public async load(filePath: string): Promise<RawMesh> {
    return loadOBJ(filePath);
  }
}
