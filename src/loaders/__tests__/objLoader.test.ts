import { describe, expect, it } from "vitest";
import { FormatError } from "../../core/errors.js";
import { parseOBJ } from "../objLoader.js";

describe("parseOBJ", () => {
  it("fan-triangulates polygons", () => {
    const obj = parseOBJ("v 0 0 0\nv 1 0 0\nv 1 1 0\nv 0 1 0\nf 1 2 3 4\n");
    expect(Array.from(obj.positions)).toEqual([0, 0, 0, 1, 0, 0, 1, 1, 0, 0, 1, 0]);
    expect(Array.from(obj.indices)).toEqual([0, 1, 2, 0, 2, 3]);
  });

  it("accepts slash forms and negative indices", () => {
    const obj = parseOBJ(
      "# triangle\nv 0 0 0\nv 1 0 0\nv 0 1 0\nvn 0 0 1\n\nf 1/1/1 2//2 -1\n",
    );
    expect(Array.from(obj.indices)).toEqual([0, 1, 2]);
  });

  it("reports out-of-range faces with their line", () => {
    expect(() => parseOBJ("v 0 0 0\nv 1 0 0\nv 0 1 0\nf 1 2 9")).toThrow(
      "Face index 9 out of range on line 4",
    );
  });

  it("rejects malformed vertices", () => {
    expect(() => parseOBJ("v 0 zero 0")).toThrow(FormatError);
  });

  it("rejects degenerate faces", () => {
    expect(() => parseOBJ("v 0 0 0\nv 1 0 0\nf 1 2")).toThrow(
      "Face with fewer than 3 vertices on line 3",
    );
  });
});
