// src/core/rotation.ts
import { mat4, type Mat4 } from "wgpu-matrix";
import type { Point3 } from "./types/viewer.js";

/** Row-major 3x3 rotation matrix in float64. */
export type Mat3Rows = [Point3, Point3, Point3];

const GIMBAL_EPSILON = 1e-9;

/**
 * Rotation matrix for Euler angles (x, y, z) applied as Rz * Ry * Rx.
 */
export function eulerToMatrix([x, y, z]: Point3): Mat3Rows {
  const cx = Math.cos(x);
  const sx = Math.sin(x);
  const cy = Math.cos(y);
  const sy = Math.sin(y);
  const cz = Math.cos(z);
  const sz = Math.sin(z);
  return [
    [cz * cy, cz * sy * sx - sz * cx, cz * sy * cx + sz * sx],
    [sz * cy, sz * sy * sx + cz * cx, sz * sy * cx - cz * sx],
    [-sy, cy * sx, cy * cx],
  ];
}

/**
 * Inverse of {@link eulerToMatrix}. At the poles (|y| = π/2) the split
 * between x and z is arbitrary; z is reported as 0.
 */
export function matrixToEuler(m: Mat3Rows): Point3 {
  const r20 = m[2][0];
  if (Math.abs(r20) < 1 - GIMBAL_EPSILON) {
    const y = -Math.asin(r20);
    const x = Math.atan2(m[2][1], m[2][2]);
    const z = Math.atan2(m[1][0], m[0][0]);
    return [x, y, z];
  }
  if (r20 <= 0) {
    return [Math.atan2(m[0][1], m[0][2]), Math.PI / 2, 0];
  }
  return [Math.atan2(-m[0][1], -m[0][2]), -Math.PI / 2, 0];
}

/**
 * Rotation of `angle` radians about `axis` (normalized here).
 *
 * @throws If the axis has zero length.
 */
export function axisAngleMatrix(axis: Point3, angle: number): Mat3Rows {
  const len = Math.hypot(axis[0], axis[1], axis[2]);
  if (len === 0 || !Number.isFinite(len)) {
    throw new Error("Rotation axis must be a non-zero vector");
  }
  const x = axis[0] / len;
  const y = axis[1] / len;
  const z = axis[2] / len;
  const c = Math.cos(angle);
  const s = Math.sin(angle);
  const t = 1 - c;
  return [
    [t * x * x + c, t * x * y - s * z, t * x * z + s * y],
    [t * x * y + s * z, t * y * y + c, t * y * z - s * x],
    [t * x * z - s * y, t * y * z + s * x, t * z * z + c],
  ];
}

export function multiplyMat3(a: Mat3Rows, b: Mat3Rows): Mat3Rows {
  const row = (i: number): Point3 => [
    a[i][0] * b[0][0] + a[i][1] * b[1][0] + a[i][2] * b[2][0],
    a[i][0] * b[0][1] + a[i][1] * b[1][1] + a[i][2] * b[2][1],
    a[i][0] * b[0][2] + a[i][1] * b[1][2] + a[i][2] * b[2][2],
  ];
  return [row(0), row(1), row(2)];
}

/**
 * Applies an extra world-space rotation on top of `current` Euler angles
 * and returns the composed angles.
 */
export function applyAxisRotation(
  current: Point3,
  axis: Point3,
  angle: number,
): Point3 {
  const composed = multiplyMat3(
    axisAngleMatrix(axis, angle),
    eulerToMatrix(current),
  );
  return matrixToEuler(composed);
}

/**
 * Model matrix (column-major, for the GPU) for the given Euler angles.
 */
export function modelMatrixFromEuler(rotation: Point3, dst?: Mat4): Mat4 {
  const m = eulerToMatrix(rotation);
  const out = dst ?? mat4.identity();
  mat4.set(
    m[0][0], m[1][0], m[2][0], 0,
    m[0][1], m[1][1], m[2][1], 0,
    m[0][2], m[1][2], m[2][2], 0,
    0, 0, 0, 1,
    out,
  );
  return out;
}
