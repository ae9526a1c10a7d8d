import { describe, expect, it } from "vitest";
import {
  applyAxisRotation,
  axisAngleMatrix,
  eulerToMatrix,
  matrixToEuler,
  modelMatrixFromEuler,
} from "../rotation.js";
import { parseAngle } from "../../server/rpc/angle.js";

describe("applyAxisRotation", () => {
  it("turns 90d about Y into a pure Y rotation", () => {
    const rotation = applyAxisRotation([0, 0, 0], [0, 1, 0], parseAngle("90d"));
    const actual = eulerToMatrix(rotation);
    const expected = axisAngleMatrix([0, 1, 0], Math.PI / 2);
    for (let r = 0; r < 3; r++) {
      for (let c = 0; c < 3; c++) {
        expect(Math.abs(actual[r][c] - expected[r][c])).toBeLessThan(1e-4);
      }
    }
    expect(rotation[1]).toBeCloseTo(Math.PI / 2, 6);
  });

  it("composes successive rotations about the same axis", () => {
    const once = applyAxisRotation([0, 0, 0], [0, 0, 1], 0.3);
    const twice = applyAxisRotation(once, [0, 0, 1], 0.3);
    expect(twice[0]).toBeCloseTo(0, 9);
    expect(twice[1]).toBeCloseTo(0, 9);
    expect(twice[2]).toBeCloseTo(0.6, 9);
  });

  it("normalizes the axis", () => {
    const rotation = applyAxisRotation([0, 0, 0], [2, 0, 0], 0.5);
    expect(rotation[0]).toBeCloseTo(0.5, 9);
  });

  it("rejects a zero axis", () => {
    expect(() => applyAxisRotation([0, 0, 0], [0, 0, 0], 1)).toThrow(
      "Rotation axis must be a non-zero vector",
    );
  });
});

describe("matrixToEuler", () => {
  it("inverts eulerToMatrix away from the poles", () => {
    const angles: [number, number, number] = [0.4, -0.7, 1.1];
    const back = matrixToEuler(eulerToMatrix(angles));
    expect(back[0]).toBeCloseTo(0.4, 9);
    expect(back[1]).toBeCloseTo(-0.7, 9);
    expect(back[2]).toBeCloseTo(1.1, 9);
  });
});

describe("modelMatrixFromEuler", () => {
  it("is the identity for zero rotation", () => {
    const identity = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];
    Array.from(modelMatrixFromEuler([0, 0, 0])).forEach((v, i) => {
      expect(v).toBeCloseTo(identity[i], 12);
    });
  });

  it("stores columns for the GPU", () => {
    const m = modelMatrixFromEuler([0, 0, Math.PI / 2]);
    // First column is R * x = (cos, sin, 0) = (0, 1, 0).
    expect(m[0]).toBeCloseTo(0, 6);
    expect(m[1]).toBeCloseTo(1, 6);
    expect(m[4]).toBeCloseTo(-1, 6);
  });
});
