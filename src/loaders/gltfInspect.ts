// src/loaders/gltfInspect.ts
import { mat3, mat4, quat } from "wgpu-matrix";
import type { GLTF, GLTFNode } from "./gltfLoader.js";

const UNNAMED = "<unnamed>";

export type EntityType = "Mesh" | "Camera" | "Transform";

export interface NodeTransform {
  translation: [number, number, number];
  /** Quaternion x, y, z, w. */
  rotation: [number, number, number, number];
  scale: [number, number, number];
}

export interface InspectedNode {
  name: string;
  transform: NodeTransform;
  types: EntityType[];
  mesh?: { name: string; primitive_count: number };
  extras?: unknown;
  children?: InspectedNode[];
}

export interface InspectedScene {
  name: string;
  nodes: InspectedNode[];
}

export interface InspectDocument {
  scenes: InspectedScene[];
}

const triple = (v: ArrayLike<number>): [number, number, number] => [v[0], v[1], v[2]];

/**
 * Splits a node's transform into translation, rotation and scale, whether
 * it is given as a matrix or as separate properties.
 */
export function decomposeNodeTransform(node: GLTFNode): NodeTransform {
  if (node.matrix) {
    const scale = triple(mat4.getScaling(node.matrix));
    const rotationMatrix = mat3.fromMat4(node.matrix);
    // Columns are padded to four floats.
    for (let c = 0; c < 3; c++) {
      for (let r = 0; r < 3; r++) rotationMatrix[c * 4 + r] /= scale[c] || 1;
    }
    const q = quat.fromMat(rotationMatrix);
    return {
      translation: triple(mat4.getTranslation(node.matrix)),
      rotation: [q[0], q[1], q[2], q[3]],
      scale,
    };
  }
  return {
    translation: node.translation ? [...node.translation] : [0, 0, 0],
    rotation: node.rotation ? [...node.rotation] : [0, 0, 0, 1],
    scale: node.scale ? [...node.scale] : [1, 1, 1],
  };
}

function inspectNode(gltf: GLTF, index: number, visiting: Set<number>): InspectedNode {
  const node = gltf.nodes?.[index];
  if (!node || visiting.has(index)) {
    return { name: UNNAMED, transform: decomposeNodeTransform({}), types: ["Transform"] };
  }
  visiting.add(index);

  const types: EntityType[] = [];
  const mesh = node.mesh !== undefined ? gltf.meshes?.[node.mesh] : undefined;
  if (mesh) types.push("Mesh");
  if (node.camera !== undefined) types.push("Camera");
  types.push("Transform");

  const out: InspectedNode = {
    name: node.name ?? UNNAMED,
    transform: decomposeNodeTransform(node),
    types,
  };
  if (mesh) {
    out.mesh = { name: mesh.name ?? UNNAMED, primitive_count: mesh.primitives.length };
  }
  if (node.extras !== undefined) out.extras = node.extras;
  const children = (node.children ?? []).map((c) => inspectNode(gltf, c, visiting));
  if (children.length > 0) out.children = children;

  visiting.delete(index);
  return out;
}

/** Scene and node tree of a glTF document. */
export function inspectGltf(gltf: GLTF): InspectDocument {
  return {
    scenes: (gltf.scenes ?? []).map((scene) => ({
      name: scene.name ?? UNNAMED,
      nodes: (scene.nodes ?? []).map((i) => inspectNode(gltf, i, new Set())),
    })),
  };
}

const fixed2 = (values: readonly number[]) =>
  values.map((v) => v.toFixed(2)).join(", ");

const isIdentity = (values: readonly number[], identity: readonly number[]) =>
  values.every((v, i) => v === identity[i]);

function formatNode(
  node: InspectedNode,
  prefix: string,
  isLast: boolean,
  out: string[],
): void {
  out.push(`${prefix}${isLast ? "└─" : "├─"} ${node.name} [${node.types.join(", ")}]`);

  const children = node.children ?? [];
  const childPrefix = `${prefix}${isLast ? "   " : "│  "}`;
  const propPrefix = `${childPrefix}${children.length > 0 ? "│  " : "   "}`;

  const { translation, rotation, scale } = node.transform;
  out.push(`${propPrefix}Position: (${fixed2(translation)})`);
  if (!isIdentity(scale, [1, 1, 1])) {
    out.push(`${propPrefix}Scale: (${fixed2(scale)})`);
  }
  if (!isIdentity(rotation, [0, 0, 0, 1])) {
    out.push(`${propPrefix}Rotation: (${fixed2(rotation)})`);
  }

  const extras = node.extras;
  if (typeof extras === "object" && extras !== null && !Array.isArray(extras)) {
    const entries = Object.entries(extras);
    if (entries.length > 0) {
      out.push(`${propPrefix}Custom Properties:`);
      for (const [key, value] of entries) {
        out.push(`${propPrefix}• ${key}: ${JSON.stringify(value)}`);
      }
    }
  }

  if (node.mesh) {
    out.push(
      `${propPrefix}Mesh: ${node.mesh.name} (${node.mesh.primitive_count} primitives)`,
    );
  }

  children.forEach((child, i) => {
    formatNode(child, childPrefix, i === children.length - 1, out);
  });
}

/**
 * Renders the document as a box-drawn tree, one scene after another.
 */
export function formatInspectTree(doc: InspectDocument): string[] {
  const out: string[] = [];
  doc.scenes.forEach((scene, i) => {
    out.push(`Scene ${i}: ${scene.name}`);
    scene.nodes.forEach((node, j) => {
      formatNode(node, "", j === scene.nodes.length - 1, out);
    });
  });
  return out;
}
