// src/loaders/gltfLoader.ts
import { readFile } from "node:fs/promises";
import path from "node:path";
import { FormatError } from "../core/errors.js";

// --- GLTF 2.0 Type Definitions ---
// Only the parts the viewer reads. See the Khronos glTF 2.0 reference:
// https://registry.khronos.org/glTF/specs/2.0/glTF-2.0.html

export interface GLTF {
  asset: { version: string; [k: string]: unknown };
  scenes?: GLTFScene[];
  scene?: number;
  nodes?: GLTFNode[];
  meshes?: GLTFMesh[];
  accessors?: GLTFAccessor[];
  bufferViews?: GLTFBufferView[];
  buffers?: GLTFBuffer[];
}

export interface GLTFScene {
  name?: string;
  nodes?: number[];
}

export interface GLTFNode {
  name?: string;
  mesh?: number;
  camera?: number;
  matrix?: number[];
  rotation?: [number, number, number, number]; // Quaternion
  scale?: [number, number, number];
  translation?: [number, number, number];
  children?: number[];
  extras?: unknown;
}

export interface GLTFMesh {
  name?: string;
  primitives: GLTFPrimitive[];
}

export interface GLTFPrimitive {
  attributes: Record<string, number>; // like { "POSITION": 1, "NORMAL": 2 }
  indices?: number;
  mode?: number; // 4 = TRIANGLES
}

export interface GLTFAccessor {
  bufferView?: number;
  byteOffset?: number;
  componentType: number; // 5120: BYTE, 5121: UNSIGNED_BYTE, 5122: SHORT, 5123: UNSIGNED_SHORT, 5125: UNSIGNED_INT, 5126: FLOAT
  normalized?: boolean;
  count: number;
  type: "SCALAR" | "VEC2" | "VEC3" | "VEC4" | "MAT2" | "MAT3" | "MAT4";
}

export interface GLTFBufferView {
  buffer: number;
  byteOffset?: number;
  byteLength: number;
  byteStride?: number;
}

export interface GLTFBuffer {
  uri?: string;
  byteLength: number;
}

// --- Parser Implementation ---

const GLB_MAGIC = 0x46546c67; // "glTF"
const CHUNK_TYPE_JSON = 0x4e4f534a; // "JSON"
const CHUNK_TYPE_BIN = 0x004e4942; // "BIN"

export interface ParsedGLTF {
  json: GLTF;
  buffers: Uint8Array[];
}

const decoder = new TextDecoder("utf-8");

function parseJsonChunk(bytes: Uint8Array): GLTF {
  let value: unknown;
  try {
    value = JSON.parse(decoder.decode(bytes));
  } catch (e) {
    throw new FormatError("glTF JSON is not valid JSON", { cause: e });
  }
  if (!isGltfRoot(value)) {
    throw new FormatError("glTF JSON is missing the asset block");
  }
  return value;
}

function isGltfRoot(value: unknown): value is GLTF {
  if (typeof value !== "object" || value === null) return false;
  if (!("asset" in value)) return false;
  const asset = value.asset;
  return typeof asset === "object" && asset !== null;
}

/**
 * Parses a glTF file (.gltf or .glb).
 *
 * @param data The file contents.
 * @param baseDir Directory used to resolve external buffer URIs.
 * @throws {FormatError} On a malformed container or unresolvable buffer.
 */
export async function parseGLTF(
  data: Uint8Array,
  baseDir: string,
): Promise<ParsedGLTF> {
  const dataView = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const magic = data.byteLength >= 4 ? dataView.getUint32(0, true) : 0;

  let json: GLTF;
  let binaryBuffer: Uint8Array | undefined;

  if (magic === GLB_MAGIC) {
    // --- Parse GLB container format ---
    if (data.byteLength < 20) {
      throw new FormatError("GLB file is truncated");
    }
    const version = dataView.getUint32(4, true);
    if (version !== 2) {
      throw new FormatError(`Unsupported GLB version ${version}`);
    }

    let chunkOffset = 12; // Header size
    // First chunk: JSON
    const jsonChunkLength = dataView.getUint32(chunkOffset, true);
    const jsonChunkType = dataView.getUint32(chunkOffset + 4, true);
    if (jsonChunkType !== CHUNK_TYPE_JSON) {
      throw new FormatError("First GLB chunk must be JSON");
    }
    json = parseJsonChunk(
      data.subarray(chunkOffset + 8, chunkOffset + 8 + jsonChunkLength),
    );
    chunkOffset += 8 + jsonChunkLength;

    // Second chunk (optional): BIN
    if (chunkOffset + 8 <= data.byteLength) {
      const binChunkLength = dataView.getUint32(chunkOffset, true);
      const binChunkType = dataView.getUint32(chunkOffset + 4, true);
      if (binChunkType !== CHUNK_TYPE_BIN) {
        throw new FormatError("Expected BIN chunk after JSON chunk");
      }
      binaryBuffer = data.slice(
        chunkOffset + 8,
        chunkOffset + 8 + binChunkLength,
      );
    }
  } else {
    // --- Assume .gltf (JSON) file ---
    json = parseJsonChunk(data);
  }

  // --- Load all buffers (external, data: URI or embedded) ---
  const buffers: Uint8Array[] = [];
  const bufferInfos = json.buffers ?? [];
  for (let i = 0; i < bufferInfos.length; i++) {
    const bufferInfo = bufferInfos[i];
    if (bufferInfo.uri) {
      buffers.push(await readBufferUri(bufferInfo.uri, baseDir));
    } else if (i === 0 && binaryBuffer) {
      // Embedded GLB buffer
      buffers.push(binaryBuffer);
    } else {
      throw new FormatError(`Buffer ${i} has no data`);
    }
  }

  return { json, buffers };
}

async function readBufferUri(uri: string, baseDir: string): Promise<Uint8Array> {
  if (uri.startsWith("data:")) {
    const comma = uri.indexOf(",");
    if (comma < 0 || !uri.slice(0, comma).endsWith(";base64")) {
      throw new FormatError("Only base64 data URIs are supported for buffers");
    }
    return new Uint8Array(Buffer.from(uri.slice(comma + 1), "base64"));
  }
  const file = path.resolve(baseDir, decodeURIComponent(uri));
  try {
    return new Uint8Array(await readFile(file));
  } catch (e) {
    throw new FormatError(`Failed to read glTF buffer: ${file}`, { cause: e });
  }
}

// --- Data Accessor Helpers ---

export type AccessorArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Uint32Array
  | Float32Array;

/** Bytes per component for each supported glTF componentType. */
const COMPONENT_BYTE_SIZE = new Map<number, number>([
  [5120, 1], // BYTE
  [5121, 1], // UNSIGNED_BYTE
  [5122, 2], // SHORT
  [5123, 2], // UNSIGNED_SHORT
  [5125, 4], // UNSIGNED_INT
  [5126, 4], // FLOAT
]);

function viewComponents(
  componentType: number,
  bytes: ArrayBuffer,
  length: number,
): AccessorArray {
  switch (componentType) {
    case 5120:
      return new Int8Array(bytes, 0, length);
    case 5121:
      return new Uint8Array(bytes, 0, length);
    case 5122:
      return new Int16Array(bytes, 0, length);
    case 5123:
      return new Uint16Array(bytes, 0, length);
    case 5125:
      return new Uint32Array(bytes, 0, length);
    default:
      return new Float32Array(bytes, 0, length);
  }
}

export const TYPE_COMPONENT_COUNT = {
  SCALAR: 1,
  VEC2: 2,
  VEC3: 3,
  VEC4: 4,
  MAT2: 4,
  MAT3: 9,
  MAT4: 16,
};

/**
 * Retrieves the data of a glTF accessor as a tightly packed typed array.
 *
 * @remarks
 * Handles both packed and interleaved (strided) buffer views. The result is
 * always a fresh copy, so it is correctly aligned whatever the source
 * offsets. Quantized data is returned raw.
 *
 * @throws {FormatError} If the accessor or its buffer view is invalid.
 */
export function getAccessorData(
  parsedGltf: ParsedGLTF,
  accessorIndex: number,
): AccessorArray {
  const { json, buffers } = parsedGltf;
  const accessor = json.accessors?.[accessorIndex];
  if (!accessor) {
    throw new FormatError(`Accessor ${accessorIndex} not found.`);
  }

  const componentSize = COMPONENT_BYTE_SIZE.get(accessor.componentType);
  if (componentSize === undefined) {
    throw new FormatError(
      `Unsupported componentType: ${accessor.componentType}`,
    );
  }

  const numComponents = TYPE_COMPONENT_COUNT[accessor.type];
  const elementSizeInBytes = numComponents * componentSize;
  const packed = new ArrayBuffer(accessor.count * elementSizeInBytes);
  if (accessor.bufferView === undefined) {
    // Sparse-only or zero-initialised accessor
    return viewComponents(
      accessor.componentType,
      packed,
      accessor.count * numComponents,
    );
  }

  const bufferView = json.bufferViews?.[accessor.bufferView];
  if (!bufferView) {
    throw new FormatError(`BufferView ${accessor.bufferView} not found.`);
  }
  const buffer = buffers[bufferView.buffer];
  if (!buffer) {
    throw new FormatError(`Buffer ${bufferView.buffer} not found.`);
  }

  const byteOffset = (bufferView.byteOffset ?? 0) + (accessor.byteOffset ?? 0);
  const stride = bufferView.byteStride ?? elementSizeInBytes;
  const lastByte =
    accessor.count === 0
      ? byteOffset
      : byteOffset + (accessor.count - 1) * stride + elementSizeInBytes;
  if (lastByte > buffer.byteLength) {
    throw new FormatError(
      `Accessor ${accessorIndex} reads past the end of buffer ${bufferView.buffer}.`,
    );
  }

  const dest = new Uint8Array(packed);
  if (stride === elementSizeInBytes) {
    dest.set(buffer.subarray(byteOffset, lastByte));
  } else {
    for (let i = 0; i < accessor.count; i++) {
      const src = byteOffset + i * stride;
      dest.set(
        buffer.subarray(src, src + elementSizeInBytes),
        i * elementSizeInBytes,
      );
    }
  }
  return viewComponents(
    accessor.componentType,
    packed,
    accessor.count * numComponents,
  );
}

/**
 * Reads and parses a glTF file from disk.
 */
export async function loadGLTF(filePath: string): Promise<ParsedGLTF> {
  const data = new Uint8Array(await readFile(filePath));
  return parseGLTF(data, path.dirname(filePath));
}
