// src/core/shaders/shader.ts
import { readFile } from "node:fs/promises";
import { projectFile } from "../utils/assets.js";

export class Shader {
  public readonly module: GPUShaderModule;
  public readonly vertexEntryPoint: string;

  constructor(
    device: GPUDevice,
    code: string,
    label?: string,
    vertexEntryPoint = "vs_main",
  ) {
    this.module = device.createShaderModule({ label, code });
    this.vertexEntryPoint = vertexEntryPoint;
  }

  /**
   * Loads a WGSL file from the project's `shaders/` directory.
   */
  public static async fromFile(
    device: GPUDevice,
    fileName: string,
    label?: string,
    vertexEntryPoint = "vs_main",
  ): Promise<Shader> {
    const code = await readFile(projectFile("shaders", fileName), "utf8");
    return new Shader(device, code, label, vertexEntryPoint);
  }
}
