// src/core/rendering/passes/overlayPass.ts
import { Shader } from "../../shaders/shader.js";
import type { OverlayLine } from "../../types/rendering.js";
import {
  buildGlyphInstances,
  GLYPH_INSTANCE_FLOATS,
  type BitmapFont,
} from "../bitmapFont.js";

const INSTANCE_STRIDE = GLYPH_INSTANCE_FLOATS * 4;

/**
 * Draws overlay text on top of the finished scene.
 *
 * @remarks
 * One instanced draw: every glyph is a quad whose instance data carries its
 * pixel rect, colour and atlas UVs. The pass uses `loadOp: 'load'` so the
 * mesh pass output stays underneath.
 */
export class OverlayPass {
  private device: GPUDevice;
  private pipeline: GPURenderPipeline;
  private quadVertexBuffer: GPUBuffer;
  private instanceBuffer: GPUBuffer;
  private instanceCapacity = 256;
  private screenUniformBuffer: GPUBuffer;
  private atlasTexture: GPUTexture;
  private bindGroup: GPUBindGroup;
  private font: BitmapFont;

  public static async create(
    device: GPUDevice,
    targetFormat: GPUTextureFormat,
    font: BitmapFont,
  ): Promise<OverlayPass> {
    const shader = await Shader.fromFile(device, "overlay.wgsl", "OVERLAY_SHADER");
    return new OverlayPass(device, targetFormat, font, shader);
  }

  constructor(
    device: GPUDevice,
    targetFormat: GPUTextureFormat,
    font: BitmapFont,
    shader: Shader,
  ) {
    this.device = device;
    this.font = font;

    // Unit quad corners (two triangles), used as both offset and UV weight.
    const quadVertices = new Float32Array([
      0, 0, 1, 0, 1, 1, 0, 0, 1, 1, 0, 1,
    ]);
    this.quadVertexBuffer = device.createBuffer({
      label: "OVERLAY_QUAD_VERTEX_BUFFER",
      size: quadVertices.byteLength,
      usage: GPUBufferUsage.VERTEX,
      mappedAtCreation: true,
    });
    new Float32Array(this.quadVertexBuffer.getMappedRange()).set(quadVertices);
    this.quadVertexBuffer.unmap();

    this.instanceBuffer = this.createInstanceBuffer(this.instanceCapacity);

    this.screenUniformBuffer = device.createBuffer({
      label: "OVERLAY_SCREEN_UNIFORM",
      size: 16, // vec2 + padding
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });

    const { atlas } = font;
    this.atlasTexture = device.createTexture({
      label: "OVERLAY_GLYPH_ATLAS",
      size: [atlas.width, atlas.height],
      format: "r8unorm",
      usage: GPUTextureUsage.TEXTURE_BINDING | GPUTextureUsage.COPY_DST,
    });
    device.queue.writeTexture(
      { texture: this.atlasTexture },
      atlas.data,
      { bytesPerRow: atlas.width },
      [atlas.width, atlas.height],
    );

    const bindGroupLayout = device.createBindGroupLayout({
      label: "OVERLAY_BIND_GROUP_LAYOUT",
      entries: [
        {
          binding: 0,
          visibility: GPUShaderStage.VERTEX,
          buffer: { type: "uniform" },
        },
        { binding: 1, visibility: GPUShaderStage.FRAGMENT, sampler: {} },
        {
          binding: 2,
          visibility: GPUShaderStage.FRAGMENT,
          texture: { sampleType: "float" },
        },
      ],
    });

    this.bindGroup = device.createBindGroup({
      label: "OVERLAY_BIND_GROUP",
      layout: bindGroupLayout,
      entries: [
        { binding: 0, resource: { buffer: this.screenUniformBuffer } },
        {
          binding: 1,
          resource: device.createSampler({
            magFilter: "nearest",
            minFilter: "nearest",
          }),
        },
        { binding: 2, resource: this.atlasTexture.createView() },
      ],
    });

    this.pipeline = device.createRenderPipeline({
      label: "OVERLAY_PIPELINE",
      layout: device.createPipelineLayout({
        label: "OVERLAY_PIPELINE_LAYOUT",
        bindGroupLayouts: [bindGroupLayout],
      }),
      vertex: {
        module: shader.module,
        entryPoint: shader.vertexEntryPoint,
        buffers: [
          {
            arrayStride: 8,
            attributes: [{ shaderLocation: 0, offset: 0, format: "float32x2" }],
          },
          {
            arrayStride: INSTANCE_STRIDE,
            stepMode: "instance",
            attributes: [
              { shaderLocation: 1, offset: 0, format: "float32x4" }, // rect
              { shaderLocation: 2, offset: 16, format: "float32x4" }, // color
              { shaderLocation: 3, offset: 32, format: "float32x4" }, // uvRect
            ],
          },
        ],
      },
      fragment: {
        module: shader.module,
        entryPoint: "fs_main",
        targets: [
          {
            format: targetFormat,
            blend: {
              color: {
                srcFactor: "src-alpha",
                dstFactor: "one-minus-src-alpha",
                operation: "add",
              },
              alpha: {
                srcFactor: "one",
                dstFactor: "one-minus-src-alpha",
                operation: "add",
              },
            },
          },
        ],
      },
      primitive: { topology: "triangle-list", cullMode: "none" },
    });
  }

  /**
   * Records the overlay pass into `encoder`.
   *
   * @returns The number of glyphs drawn.
   */
  public execute(
    encoder: GPUCommandEncoder,
    target: GPUTextureView,
    lines: readonly OverlayLine[],
    width: number,
    height: number,
  ): number {
    const { data, count } = buildGlyphInstances(this.font, lines);
    if (count === 0) return 0;

    this.ensureCapacity(count);
    this.device.queue.writeBuffer(this.instanceBuffer, 0, data);
    this.device.queue.writeBuffer(
      this.screenUniformBuffer,
      0,
      new Float32Array([width, height, 0, 0]),
    );

    const pass = encoder.beginRenderPass({
      label: "OVERLAY_RENDER_PASS",
      colorAttachments: [{ view: target, loadOp: "load", storeOp: "store" }],
    });
    pass.setViewport(0, 0, width, height, 0, 1);
    pass.setPipeline(this.pipeline);
    pass.setBindGroup(0, this.bindGroup);
    pass.setVertexBuffer(0, this.quadVertexBuffer);
    pass.setVertexBuffer(1, this.instanceBuffer);
    pass.draw(6, count, 0, 0);
    pass.end();
    return count;
  }

  public destroy(): void {
    this.quadVertexBuffer.destroy();
    this.instanceBuffer.destroy();
    this.screenUniformBuffer.destroy();
    this.atlasTexture.destroy();
  }

  private ensureCapacity(count: number): void {
    if (count <= this.instanceCapacity) return;
    this.instanceBuffer.destroy();
    this.instanceCapacity = Math.ceil(count * 1.5);
    this.instanceBuffer = this.createInstanceBuffer(this.instanceCapacity);
  }

  private createInstanceBuffer(capacity: number): GPUBuffer {
    return this.device.createBuffer({
      label: "OVERLAY_INSTANCE_BUFFER",
      size: capacity * INSTANCE_STRIDE,
      usage: GPUBufferUsage.VERTEX | GPUBufferUsage.COPY_DST,
    });
  }
}
