// src/core/mesh/meshStore.ts
import type { MeshGeometry } from "./meshGeometry.js";

/** One published buffer set. */
export interface GeometryGeneration<T> {
  generation: number;
  geometry: MeshGeometry;
  resources: T;
}

/**
 * Holds the GPU resources of the displayed mesh and swaps them by
 * generation.
 *
 * `replace` builds the complete new resource set first and only then
 * publishes it; the previous set is handed to `release`, which is expected
 * to wait until the GPU no longer uses it. A failed upload leaves the
 * current generation in place.
 */
export class MeshGeometryStore<T> {
  private currentGeneration: GeometryGeneration<T> | null = null;
  private nextGeneration = 1;
  private upload: (geometry: MeshGeometry) => T;
  private release: (resources: T) => Promise<void>;

  constructor(
    upload: (geometry: MeshGeometry) => T,
    release: (resources: T) => Promise<void>,
  ) {
    this.upload = upload;
    this.release = release;
  }

  public get current(): GeometryGeneration<T> | null {
    return this.currentGeneration;
  }

  /** Generation number of the published set; 0 before any mesh. */
  public get generation(): number {
    return this.currentGeneration?.generation ?? 0;
  }

  /**
   * Uploads `geometry` and publishes it as the next generation.
   *
   * @throws Whatever `upload` throws; nothing is published in that case.
   */
  public replace(geometry: MeshGeometry): GeometryGeneration<T> {
    const resources = this.upload(geometry);
    const published: GeometryGeneration<T> = {
      generation: this.nextGeneration++,
      geometry,
      resources,
    };
    const previous = this.currentGeneration;
    this.currentGeneration = published;
    if (previous) this.retire(previous);
    return published;
  }

  /** Drops the current set, e.g. on shutdown. */
  public clear(): void {
    const previous = this.currentGeneration;
    this.currentGeneration = null;
    if (previous) this.retire(previous);
  }

  private retire(previous: GeometryGeneration<T>): void {
    this.release(previous.resources).catch((e: unknown) => {
      console.error(
        `[MeshStore] Failed to release generation ${previous.generation}:`,
        e,
      );
    });
  }
}
