// src/loaders/mesh/loadMesh.ts
import { GltfMeshLoader } from "./gltfMeshLoader.js";
import {
  loadMeshWith,
  MeshLoaderRegistry,
  type LoadedMesh,
} from "./meshLoader.js";
import { ObjMeshLoader } from "./objMeshLoader.js";
import { StlMeshLoader } from "./stlMeshLoader.js";

/**
 * Registry with every format the viewer reads.
 */
export function createDefaultMeshLoaderRegistry(): MeshLoaderRegistry {
  const registry = new MeshLoaderRegistry();
  const gltf = new GltfMeshLoader();
  registry.register("obj", new ObjMeshLoader());
  registry.register("stl", new StlMeshLoader());
  registry.register("glb", gltf);
  registry.register("gltf", gltf);
  return registry;
}

const defaultRegistry = createDefaultMeshLoaderRegistry();

/**
 * Loads `filePath` (selecting `meshName` in multi-mesh files) and computes
 * its statistics.
 */
export function loadMesh(
  filePath: string,
  meshName?: string,
): Promise<LoadedMesh> {
  return loadMeshWith(defaultRegistry, filePath, meshName);
}

export type MeshLoadFn = typeof loadMesh;
