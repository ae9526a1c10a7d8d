import { describe, expect, it } from "vitest";
import { FormatError, InputError } from "../../core/errors.js";
import { getAccessorData, parseGLTF } from "../gltfLoader.js";
import { extractGltfMesh, selectGltfMesh } from "../mesh/gltfMeshLoader.js";
import { dataUri, makeGlb, triangleBytes, twoMeshDocument } from "./gltfFixtures.js";

const encoder = new TextEncoder();

describe("parseGLTF", () => {
  it("reads a .gltf with an embedded data URI", async () => {
    const doc = twoMeshDocument(dataUri(triangleBytes()));
    const gltf = await parseGLTF(encoder.encode(JSON.stringify(doc)), "/unused");
    expect(gltf.buffers[0].byteLength).toBe(44);
    expect(Array.from(getAccessorData(gltf, 1))).toEqual([0, 1, 2]);
  });

  it("reads the BIN chunk of a GLB", async () => {
    const gltf = await parseGLTF(makeGlb(twoMeshDocument(), triangleBytes()), "/unused");
    expect(Array.from(getAccessorData(gltf, 0))).toEqual([0, 0, 0, 1, 0, 0, 0, 1, 0]);
  });

  it("rejects JSON without an asset block", async () => {
    await expect(parseGLTF(encoder.encode("{}"), "/unused")).rejects.toThrow(
      "glTF JSON is missing the asset block",
    );
  });

  it("rejects accessors that read past their buffer", async () => {
    const doc = twoMeshDocument(dataUri(triangleBytes().subarray(0, 20)));
    const gltf = await parseGLTF(encoder.encode(JSON.stringify(doc)), "/unused");
    expect(() => getAccessorData(gltf, 0)).toThrow(FormatError);
  });
});

describe("selectGltfMesh", () => {
  const meshes = twoMeshDocument().meshes ?? [];

  it("refuses to guess between several meshes", () => {
    try {
      selectGltfMesh(meshes);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(InputError);
      if (!(e instanceof InputError)) return;
      expect(e.message).toBe(
        "GLB file contains 2 meshes. Please specify one with --mesh <name>.\n" +
          "Available meshes: Cube, Wedge",
      );
      expect(e.availableNames).toEqual(["Cube", "Wedge"]);
    }
  });

  it("finds a mesh by name", () => {
    expect(selectGltfMesh(meshes, "Wedge").name).toBe("Wedge");
  });

  it("lists names for an unknown mesh", () => {
    expect(() => selectGltfMesh(meshes, "Sphere")).toThrow(
      "Mesh 'Sphere' not found in GLB file.\nAvailable meshes: Cube, Wedge",
    );
  });

  it("takes the only mesh without a name", () => {
    expect(selectGltfMesh(meshes.slice(0, 1)).name).toBe("Cube");
  });

  it("rejects a file without meshes", () => {
    expect(() => selectGltfMesh([])).toThrow("GLB file contains no meshes");
  });
});

describe("extractGltfMesh", () => {
  it("concatenates primitives with offset indices", async () => {
    const gltf = await parseGLTF(makeGlb(twoMeshDocument(), triangleBytes()), "/unused");
    const wedge = selectGltfMesh(gltf.json.meshes ?? [], "Wedge");
    const mesh = extractGltfMesh(gltf, wedge);
    expect(mesh.name).toBe("Wedge");
    expect(mesh.positions.length).toBe(18);
    expect(Array.from(mesh.indices)).toEqual([0, 1, 2, 3, 4, 5]);
  });
});
