import { describe, expect, it } from "vitest";
import { bgraToRgba, isBgraFormat, paddedBytesPerRow, unpadRows } from "../readback.js";

describe("read-back helpers", () => {
  it("pads rows to 256 bytes", () => {
    expect(paddedBytesPerRow(1)).toBe(256);
    expect(paddedBytesPerRow(64)).toBe(256);
    expect(paddedBytesPerRow(65)).toBe(512);
  });

  it("strips row padding", () => {
    const padded = new Uint8Array([1, 2, 3, 4, 9, 9, 9, 9, 5, 6, 7, 8, 9, 9, 9, 9]);
    expect(Array.from(unpadRows(padded, 1, 2, 8))).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it("copies unpadded data", () => {
    const data = new Uint8Array([1, 2, 3, 4]);
    const out = unpadRows(data, 1, 1, 4);
    expect(Array.from(out)).toEqual([1, 2, 3, 4]);
    expect(out).not.toBe(data);
  });

  it("swaps blue and red", () => {
    expect(Array.from(bgraToRgba(new Uint8Array([1, 2, 3, 4, 10, 20, 30, 40])))).toEqual([
      3, 2, 1, 4, 30, 20, 10, 40,
    ]);
  });

  it("recognises blue-first formats", () => {
    expect(isBgraFormat("bgra8unorm")).toBe(true);
    expect(isBgraFormat("rgba8unorm")).toBe(false);
  });
});
