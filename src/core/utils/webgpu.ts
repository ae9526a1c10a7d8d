// src/core/utils/webgpu.ts

type TypedArray = Float32Array | Uint32Array | Uint16Array | Uint8Array;

/**
 * Requests an adapter and a device from `gpu`.
 *
 * @throws If no adapter is available.
 */
export const requestGpuDevice = async (
  gpu: GPU,
): Promise<{ adapter: GPUAdapter; device: GPUDevice }> => {
  const adapter = await gpu.requestAdapter({
    powerPreference: "high-performance",
  });
  if (!adapter) {
    console.error("[Renderer] Couldn't request adapter.");
    throw new Error("Failed to get GPU adapter.");
  }
  const device = await adapter.requestDevice();
  return { adapter, device };
};

/** Human-readable adapter name, when the implementation reports one. */
export const describeAdapter = (adapter: GPUAdapter): string => {
  const info = adapter.info;
  const parts = [info.vendor, info.architecture, info.description].filter(
    (p) => p.length > 0,
  );
  return parts.length > 0 ? parts.join(" ") : "unknown adapter";
};

/**
 * Creates and populates a GPUBuffer from a TypedArray.
 *
 * @param usage - GPUBufferUsage flags; COPY_DST is always added so the data
 *   can be uploaded with writeBuffer.
 */
export const createGPUBuffer = (
  device: GPUDevice,
  data: TypedArray,
  usage: GPUBufferUsageFlags,
  label?: string,
): GPUBuffer => {
  // Pad the buffer size to a multiple of 4 bytes.
  const paddedSize = Math.max(4, Math.ceil(data.byteLength / 4) * 4);

  const gpuBuffer = device.createBuffer({
    label,
    size: paddedSize,
    usage: usage | GPUBufferUsage.COPY_DST,
    mappedAtCreation: false,
  });

  if (data.byteLength > 0) {
    device.queue.writeBuffer(gpuBuffer, 0, data);
  }

  return gpuBuffer;
};
