import { describe, expect, it } from "vitest";
import { parseAngle } from "../angle.js";

describe("parseAngle", () => {
  it.each([
    ["90d", Math.PI / 2],
    [" 45D ", Math.PI / 4],
    ["-180d", -Math.PI],
    ["1.57r", 1.57],
    ["2R", 2],
    ["1.57", 1.57],
    [".5", 0.5],
    ["1e2r", 100],
  ])("parses %j", (input, expected) => {
    expect(parseAngle(input)).toBeCloseTo(expected, 12);
  });

  it("rejects an empty string", () => {
    expect(() => parseAngle("   ")).toThrow("Empty angle string");
  });

  it("rejects a bad number before a unit", () => {
    expect(() => parseAngle("12dd")).toThrow("Invalid number in angle: 12d");
    expect(() => parseAngle("r")).toThrow("Invalid number in angle: ");
  });

  it("rejects angles that overflow to infinity", () => {
    expect(() => parseAngle("1e400d")).toThrow("Angle out of range: 1e400");
    expect(() => parseAngle("1e400")).toThrow("Angle out of range: 1e400");
  });

  it("rejects unknown formats", () => {
    expect(() => parseAngle("ninety")).toThrow(
      "Invalid angle format 'ninety'. Use '90d' for degrees or '1.57r' for radians",
    );
  });
});
