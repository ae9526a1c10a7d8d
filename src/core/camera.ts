// src/core/camera.ts
import { Mat4, mat4, vec3 } from "wgpu-matrix";
import type { Point3 } from "./types/viewer.js";

const ROTATE_SENSITIVITY = 0.005;
const PAN_SENSITIVITY_FACTOR = 0.0005;
const MIN_DISTANCE = 0.1;
const THETA_LIMIT = Math.PI / 2 - 0.01;

/**
 * Orbital camera circling a target point.
 *
 * The eye is parameterised as `target + distance * dir(theta, phi)` with
 * `dir = (cosθ·sinφ, −sinθ, cosθ·cosφ)`. Absolute setters keep the point
 * they were given and re-derive the spherical parameters from it, so the
 * two representations never drift apart.
 */
export class ArcBallCamera {
  /** Camera position in world space. */
  public eye: Point3;
  /** Look-at point. */
  public target: Point3;
  public readonly up: Point3 = [0, 1, 0];
  public distance = 0;
  /** Vertical angle (pitch). */
  public theta = 0;
  /** Horizontal angle (yaw). */
  public phi = 0;
  public width: number;
  public height: number;

  public fovYRadians = (45 * Math.PI) / 180;
  public near = 0.1;
  public far = 1000;

  constructor(eye: Point3, target: Point3, width: number, height: number) {
    this.eye = [...eye];
    this.target = [...target];
    this.width = width;
    this.height = height;
    this.deriveSpherical();
  }

  /** View matrix (right-handed look-at). */
  public viewMatrix(dst?: Mat4): Mat4 {
    return mat4.lookAt(this.eye, this.target, this.up, dst);
  }

  /** Perspective projection mapping depth to WebGPU's [0, 1] range. */
  public projectionMatrix(dst?: Mat4): Mat4 {
    const aspect = this.height > 0 ? this.width / this.height : 1;
    return mat4.perspective(this.fovYRadians, aspect, this.near, this.far, dst);
  }

  /** `projection * view`, ready for upload. */
  public viewProjectionMatrix(dst?: Mat4): Mat4 {
    return mat4.multiply(this.projectionMatrix(), this.viewMatrix(), dst);
  }

  /**
   * Orbits around the target. Pitch is clamped short of the poles so the
   * look-at basis never degenerates.
   */
  public rotate(dx: number, dy: number): void {
    if (!Number.isFinite(dx) || !Number.isFinite(dy)) return;
    this.phi -= dx * ROTATE_SENSITIVITY;
    this.theta = clamp(
      this.theta - dy * ROTATE_SENSITIVITY,
      -THETA_LIMIT,
      THETA_LIMIT,
    );
    this.updateEye();
  }

  /**
   * Slides eye and target together in the view plane. Speed scales with
   * distance.
   */
  public pan(dx: number, dy: number): void {
    const s = PAN_SENSITIVITY_FACTOR * this.distance;
    const forward = vec3.normalize(vec3.subtract(this.target, this.eye));
    const right = vec3.normalize(vec3.cross(forward, this.up));
    const camUp = vec3.cross(right, forward);

    const offset: Point3 = [0, 0, 0];
    for (let i = 0; i < 3; i++) {
      offset[i] = right[i] * (-dx * s) + camUp[i] * (dy * s);
      this.target[i] += offset[i];
      this.eye[i] += offset[i];
    }
  }

  /** Positive `delta` moves closer. Distance never drops below 0.1. */
  public zoom(delta: number): void {
    const next = this.distance * (1 - delta * 0.1);
    this.distance = Number.isNaN(next)
      ? MIN_DISTANCE
      : Math.max(next, MIN_DISTANCE);
    this.updateEye();
  }

  public setPosition(position: Point3): void {
    this.eye = [...position];
    this.deriveSpherical();
  }

  public setTarget(target: Point3): void {
    this.target = [...target];
    this.deriveSpherical();
  }

  public setViewport(width: number, height: number): void {
    this.width = width;
    this.height = height;
  }

  private deriveSpherical(): void {
    const tx = this.eye[0] - this.target[0];
    const ty = this.eye[1] - this.target[1];
    const tz = this.eye[2] - this.target[2];
    this.distance = Math.hypot(tx, ty, tz);
    this.theta = Math.atan2(-ty, Math.hypot(tx, tz));
    this.phi = Math.atan2(tx, tz);
  }

  private updateEye(): void {
    const cosTheta = Math.cos(this.theta);
    this.eye = [
      this.target[0] + this.distance * cosTheta * Math.sin(this.phi),
      this.target[1] - this.distance * Math.sin(this.theta),
      this.target[2] + this.distance * cosTheta * Math.cos(this.phi),
    ];
  }
}

const clamp = (v: number, lo: number, hi: number) =>
  Math.min(Math.max(v, lo), hi);

/**
 * Eye position that frames a mesh whose largest bounding-box side is
 * `maxDimension`, looking at the origin. Returns `null` for empty meshes.
 */
export function framingEye(maxDimension: number): Point3 | null {
  if (!(maxDimension > 0)) return null;
  const d = maxDimension * 2.5;
  return [d * 0.5, d * 0.3, d];
}
