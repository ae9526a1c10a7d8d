// src/core/rendering/renderer.ts
import { MeshGeometryStore } from "../mesh/meshStore.js";
import type { MeshGeometry } from "../mesh/meshGeometry.js";
import { Shader } from "../shaders/shader.js";
import type {
  FrameOutput,
  FramePlan,
  FrameRecord,
  FrameUniforms,
  RenderedImage,
  ViewerRenderer,
} from "../types/rendering.js";
import {
  createGPUBuffer,
  describeAdapter,
  requestGpuDevice,
} from "../utils/webgpu.js";
import type { BitmapFont } from "./bitmapFont.js";
import { OverlayPass } from "./passes/overlayPass.js";
import {
  bgraToRgba,
  isBgraFormat,
  paddedBytesPerRow,
  unpadRows,
} from "./readback.js";
import { OffscreenSurface, type SurfaceFrame } from "./surface.js";

interface MeshBuffers {
  vertex: GPUBuffer;
  index: GPUBuffer;
  backfaceIndex: GPUBuffer;
  lineIndex: GPUBuffer;
  indexCount: number;
  lineIndexCount: number;
}

interface MeshPipelines {
  solid: GPURenderPipeline;
  backface: GPURenderPipeline;
  wireframe: GPURenderPipeline;
}

/** viewProjection(16) + model(16) + cameraPosition(4). */
const UNIFORM_FLOATS = 36;
const SURFACE_FORMAT: GPUTextureFormat = "rgba8unorm";
const DEPTH_FORMAT: GPUTextureFormat = "depth32float";

/**
 * WebGPU implementation of the viewer's drawing.
 *
 * @remarks
 * Each frame records a mesh pass (solid, then optional wireframe lines,
 * then optional back-face highlight), an optional overlay pass, and optionally
 * a copy of the colour target into a mappable buffer. The copy is submitted
 * with the frame, before presentation.
 */
export class WebGpuRenderer implements ViewerRenderer {
  public readonly adapterName: string;
  private device: GPUDevice;
  private surface: OffscreenSurface;
  private depthTexture: GPUTexture;
  private uniformBuffer: GPUBuffer;
  private uniformData = new Float32Array(UNIFORM_FLOATS);
  private uniformBindGroup: GPUBindGroup;
  private pipelines: MeshPipelines;
  private overlayPass: OverlayPass;
  private meshes: MeshGeometryStore<MeshBuffers>;

  /**
   * Acquires a device from `gpu` and builds every pipeline.
   */
  public static async create(
    gpu: GPU,
    width: number,
    height: number,
    font: BitmapFont,
  ): Promise<WebGpuRenderer> {
    const { adapter, device } = await requestGpuDevice(gpu);
    // catch WebGPU validation errors
    device.addEventListener("uncapturederror", (event) => {
      console.error("[WebGPU Error]", event.error.message);
    });
    device.pushErrorScope("validation");

    const shader = await Shader.fromFile(device, "mesh.wgsl", "MESH_SHADER");
    const overlayPass = await OverlayPass.create(device, SURFACE_FORMAT, font);
    const renderer = new WebGpuRenderer(
      device,
      describeAdapter(adapter),
      shader,
      overlayPass,
      width,
      height,
    );

    const error = await device.popErrorScope();
    if (error) {
      console.error("[WebGPU Validation Error during init]", error.message);
    }
    return renderer;
  }

  constructor(
    device: GPUDevice,
    adapterName: string,
    shader: Shader,
    overlayPass: OverlayPass,
    width: number,
    height: number,
  ) {
    this.device = device;
    this.adapterName = adapterName;
    this.overlayPass = overlayPass;
    this.surface = new OffscreenSurface(device, SURFACE_FORMAT, width, height);
    this.depthTexture = this.createDepthTexture();

    this.uniformBuffer = device.createBuffer({
      label: "VIEWER_UNIFORM_BUFFER",
      size: UNIFORM_FLOATS * 4,
      usage: GPUBufferUsage.UNIFORM | GPUBufferUsage.COPY_DST,
    });

    const bindGroupLayout = device.createBindGroupLayout({
      label: "VIEWER_BIND_GROUP_LAYOUT",
      entries: [
        {
          binding: 0,
          visibility: GPUShaderStage.VERTEX | GPUShaderStage.FRAGMENT,
          buffer: { type: "uniform" },
        },
      ],
    });
    this.uniformBindGroup = device.createBindGroup({
      label: "VIEWER_BIND_GROUP",
      layout: bindGroupLayout,
      entries: [{ binding: 0, resource: { buffer: this.uniformBuffer } }],
    });

    const layout = device.createPipelineLayout({
      label: "MESH_PIPELINE_LAYOUT",
      bindGroupLayouts: [bindGroupLayout],
    });
    this.pipelines = {
      solid: this.createMeshPipeline(layout, shader, "fs_solid", "triangle-list", "less"),
      backface: this.createMeshPipeline(layout, shader, "fs_backface", "triangle-list", "less"),
      wireframe: this.createMeshPipeline(layout, shader, "fs_wireframe", "line-list", "less-equal"),
    };

    this.meshes = new MeshGeometryStore<MeshBuffers>(
      (geometry) => this.uploadMesh(geometry),
      async (buffers) => {
        await this.device.queue.onSubmittedWorkDone();
        buffers.vertex.destroy();
        buffers.index.destroy();
        buffers.backfaceIndex.destroy();
        buffers.lineIndex.destroy();
      },
    );
  }

  public get width(): number {
    return this.surface.width;
  }

  public get height(): number {
    return this.surface.height;
  }

  public resize(width: number, height: number): void {
    if (width === this.surface.width && height === this.surface.height) return;
    this.surface.configure(width, height);
    this.depthTexture.destroy();
    this.depthTexture = this.createDepthTexture();
  }

  public setMesh(geometry: MeshGeometry): number {
    return this.meshes.replace(geometry).generation;
  }

  public async renderFrame(
    uniforms: FrameUniforms,
    plan: FramePlan,
    readback: boolean,
  ): Promise<FrameOutput> {
    const frame = this.surface.acquire();
    const { width, height } = this.surface;
    const mesh = this.meshes.current;
    const record: FrameRecord = {
      width,
      height,
      passes: [],
      draws: {},
      meshGeneration: this.meshes.generation,
      triangleCount: mesh?.geometry.triangleCount ?? 0,
      uniforms: {
        viewProjection: Array.from(uniforms.viewProjection),
        model: Array.from(uniforms.model),
        cameraPosition: [...uniforms.cameraPosition],
      },
    };

    this.uniformData.set(uniforms.viewProjection, 0);
    this.uniformData.set(uniforms.model, 16);
    this.uniformData.set(uniforms.cameraPosition, 32);
    this.uniformData[35] = 1;
    this.device.queue.writeBuffer(this.uniformBuffer, 0, this.uniformData);

    const encoder = this.device.createCommandEncoder({
      label: "VIEWER_FRAME_ENCODER",
    });

    const pass = encoder.beginRenderPass({
      label: "MESH_RENDER_PASS",
      colorAttachments: [
        {
          view: frame.view,
          clearValue: { r: 0, g: 0, b: 0, a: 1 },
          loadOp: "clear",
          storeOp: "store",
        },
      ],
      depthStencilAttachment: {
        view: this.depthTexture.createView(),
        depthClearValue: 1,
        depthLoadOp: "clear",
        depthStoreOp: "store",
      },
    });
    record.passes.push("mesh");
    if (mesh && mesh.resources.indexCount > 0) {
      const buffers = mesh.resources;
      pass.setBindGroup(0, this.uniformBindGroup);
      pass.setVertexBuffer(0, buffers.vertex);
      this.drawIndexed(pass, "solid", buffers.index, buffers.indexCount, record);
      if (plan.wireframe) {
        this.drawIndexed(pass, "wireframe", buffers.lineIndex, buffers.lineIndexCount, record);
      }
      if (plan.backfaces) {
        this.drawIndexed(pass, "backface", buffers.backfaceIndex, buffers.indexCount, record);
      }
    }
    pass.end();

    if (plan.overlay.length > 0) {
      const glyphs = this.overlayPass.execute(
        encoder,
        frame.view,
        plan.overlay,
        width,
        height,
      );
      if (glyphs > 0) {
        record.passes.push("overlay");
        record.draws.overlay = 1;
      }
    }

    const copy = readback ? this.recordReadback(encoder, frame) : undefined;

    this.device.queue.submit([encoder.finish()]);
    const presented = this.surface.present(frame);

    let image: RenderedImage | undefined;
    if (copy) {
      try {
        image = await this.mapReadback(copy.buffer, copy.bytesPerRow, width, height);
      } finally {
        copy.buffer.destroy();
      }
    }
    await presented;
    return { record, image };
  }

  public async destroy(): Promise<void> {
    this.meshes.clear();
    await this.device.queue.onSubmittedWorkDone();
    this.overlayPass.destroy();
    this.surface.destroy();
    this.depthTexture.destroy();
    this.uniformBuffer.destroy();
    this.device.destroy();
  }

  private drawIndexed(
    pass: GPURenderPassEncoder,
    pipeline: keyof MeshPipelines,
    indexBuffer: GPUBuffer,
    count: number,
    record: FrameRecord,
  ): void {
    pass.setPipeline(this.pipelines[pipeline]);
    pass.setIndexBuffer(indexBuffer, "uint32");
    pass.drawIndexed(count);
    record.draws[pipeline] = (record.draws[pipeline] ?? 0) + 1;
  }

  private recordReadback(
    encoder: GPUCommandEncoder,
    frame: SurfaceFrame,
  ): { buffer: GPUBuffer; bytesPerRow: number } {
    const { width, height } = this.surface;
    const bytesPerRow = paddedBytesPerRow(width);
    const buffer = this.device.createBuffer({
      label: "READBACK_BUFFER",
      size: bytesPerRow * height,
      usage: GPUBufferUsage.COPY_DST | GPUBufferUsage.MAP_READ,
    });
    encoder.copyTextureToBuffer(
      { texture: frame.texture },
      { buffer, bytesPerRow, rowsPerImage: height },
      [width, height],
    );
    return { buffer, bytesPerRow };
  }

  private async mapReadback(
    buffer: GPUBuffer,
    bytesPerRow: number,
    width: number,
    height: number,
  ): Promise<RenderedImage> {
    await buffer.mapAsync(GPUMapMode.READ);
    try {
      const mapped = new Uint8Array(buffer.getMappedRange());
      const rgba = unpadRows(mapped, width, height, bytesPerRow);
      if (isBgraFormat(this.surface.format)) bgraToRgba(rgba);
      return { width, height, rgba };
    } finally {
      buffer.unmap();
    }
  }

  private uploadMesh(geometry: MeshGeometry): MeshBuffers {
    const { device } = this;
    return {
      vertex: createGPUBuffer(device, geometry.vertices, GPUBufferUsage.VERTEX, "MESH_VERTEX_BUFFER"),
      index: createGPUBuffer(device, geometry.indices, GPUBufferUsage.INDEX, "MESH_INDEX_BUFFER"),
      backfaceIndex: createGPUBuffer(device, geometry.backfaceIndices, GPUBufferUsage.INDEX, "MESH_BACKFACE_INDEX_BUFFER"),
      lineIndex: createGPUBuffer(device, geometry.wireframeIndices, GPUBufferUsage.INDEX, "MESH_LINE_INDEX_BUFFER"),
      indexCount: geometry.indices.length,
      lineIndexCount: geometry.wireframeIndices.length,
    };
  }

  private createDepthTexture(): GPUTexture {
    return this.device.createTexture({
      label: "DEPTH_TEXTURE",
      size: [this.surface.width, this.surface.height],
      format: DEPTH_FORMAT,
      usage: GPUTextureUsage.RENDER_ATTACHMENT,
    });
  }

  private createMeshPipeline(
    layout: GPUPipelineLayout,
    shader: Shader,
    fragmentEntryPoint: string,
    topology: GPUPrimitiveTopology,
    depthCompare: GPUCompareFunction,
  ): GPURenderPipeline {
    return this.device.createRenderPipeline({
      label: `MESH_PIPELINE_${fragmentEntryPoint.toUpperCase()}`,
      layout,
      vertex: {
        module: shader.module,
        entryPoint: shader.vertexEntryPoint,
        buffers: [
          {
            arrayStride: 12,
            attributes: [{ shaderLocation: 0, offset: 0, format: "float32x3" }],
          },
        ],
      },
      fragment: {
        module: shader.module,
        entryPoint: fragmentEntryPoint,
        targets: [{ format: SURFACE_FORMAT }],
      },
      primitive: {
        topology,
        cullMode: topology === "line-list" ? "none" : "back",
        frontFace: "ccw",
      },
      depthStencil: {
        format: DEPTH_FORMAT,
        depthWriteEnabled: true,
        depthCompare,
      },
    });
  }
}
