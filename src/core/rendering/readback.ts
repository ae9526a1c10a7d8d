// src/core/rendering/readback.ts

/** WebGPU requires texture-to-buffer copies to use 256-byte aligned rows. */
export const COPY_BYTES_PER_ROW_ALIGNMENT = 256;

export function paddedBytesPerRow(width: number): number {
  const unpadded = width * 4;
  return (
    Math.ceil(unpadded / COPY_BYTES_PER_ROW_ALIGNMENT) *
    COPY_BYTES_PER_ROW_ALIGNMENT
  );
}

/**
 * Strips row padding from a mapped read-back buffer.
 */
export function unpadRows(
  data: Uint8Array,
  width: number,
  height: number,
  bytesPerRow: number,
): Uint8Array {
  const rowBytes = width * 4;
  if (bytesPerRow === rowBytes) return data.slice(0, rowBytes * height);
  const out = new Uint8Array(rowBytes * height);
  for (let y = 0; y < height; y++) {
    const src = y * bytesPerRow;
    out.set(data.subarray(src, src + rowBytes), y * rowBytes);
  }
  return out;
}

/** Swaps the red and blue channels in place. */
export function bgraToRgba(pixels: Uint8Array): Uint8Array {
  for (let i = 0; i + 3 < pixels.length; i += 4) {
    const b = pixels[i];
    pixels[i] = pixels[i + 2];
    pixels[i + 2] = b;
  }
  return pixels;
}

/** True for surface formats stored blue-first. */
export function isBgraFormat(format: GPUTextureFormat): boolean {
  return format.startsWith("bgra");
}
