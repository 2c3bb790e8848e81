/**
 * IsosurfacePipeline — shape → voxel grid → mesh, rebuilt on demand.
 *
 * Owns one Shape, one VoxelGrid and one TriangleMesh. Each update runs only
 * the stages its patch invalidates:
 *
 *   shape / transform / voxelSize   fit + voxelize + mesh
 *   isoLevel / algorithm            mesh
 *   smoothShading                   rewrite smoothing flags
 *
 * A failed update restores the previous settings before rethrowing.
 */

import type { Vec3 } from './vec3.js';
import { Shape, type ShapeParams, DEFAULT_SHAPES } from './shape.js';
import { type TransformParams, IDENTITY_TRANSFORM } from './transform.js';
import { VoxelGrid, DEFAULT_VOXEL_SIZE, type GridReadback } from './voxel-grid.js';
import { type TriangleMesh, createMesh, setSmoothing } from './mesh.js';
import { type MeshAlgorithm, DEFAULT_ALGORITHM, buildMesh } from './mesh-builder.js';
import { type MeshStats, meshStats, DEFAULT_DEGENERATE_THRESHOLD } from './diagnostics.js';

export interface PipelineSettings {
  shape: ShapeParams;
  transform: TransformParams;
  voxelSize: number;
  isoLevel: number;
  algorithm: MeshAlgorithm;
  smoothShading: boolean;
}

export type SettingsPatch = Partial<Omit<PipelineSettings, 'transform'>> & {
  transform?: Partial<TransformParams>;
};

export const DEFAULT_SETTINGS: PipelineSettings = {
  shape: DEFAULT_SHAPES.torus,
  transform: IDENTITY_TRANSFORM,
  voxelSize: DEFAULT_VOXEL_SIZE,
  isoLevel: 0,
  algorithm: DEFAULT_ALGORITHM,
  smoothShading: true,
};

export interface UpdateResult {
  voxelized: boolean;
  meshed: boolean;
  /** Milliseconds spent fitting and sampling the grid; 0 when skipped. */
  voxelizeMs: number;
  /** Milliseconds spent building the mesh; 0 when skipped. */
  meshMs: number;
}

function timed(fn: () => void): number {
  const start = performance.now();
  fn();
  return performance.now() - start;
}

export class IsosurfacePipeline {
  readonly shape: Shape;
  readonly grid: VoxelGrid;
  readonly mesh: TriangleMesh = createMesh();
  private isoLevel: number;
  private algorithm: MeshAlgorithm;
  private smoothShading: boolean;
  /** Timings of the most recent update (the initial build counts). */
  lastUpdate: UpdateResult;

  constructor(settings: Partial<PipelineSettings> = {}) {
    const s = { ...DEFAULT_SETTINGS, ...settings };
    this.shape = new Shape(s.shape, s.transform);
    this.grid = new VoxelGrid(s.voxelSize);
    this.isoLevel = s.isoLevel;
    this.algorithm = s.algorithm;
    this.smoothShading = s.smoothShading;
    this.lastUpdate = this.run(true, true);
  }

  get settings(): PipelineSettings {
    return {
      shape: this.shape.params,
      transform: this.shape.transformParams,
      voxelSize: this.grid.voxelSize,
      isoLevel: this.isoLevel,
      algorithm: this.algorithm,
      smoothShading: this.smoothShading,
    };
  }

  update(patch: SettingsPatch): UpdateResult {
    const previous = this.settings;
    try {
      return this.apply(patch);
    } catch (err) {
      this.restore(previous);
      throw err;
    }
  }

  private apply(patch: SettingsPatch): UpdateResult {
    let resample = false;
    let remesh = false;

    if (patch.voxelSize !== undefined && patch.voxelSize !== this.grid.voxelSize) {
      this.grid.voxelSize = patch.voxelSize;
      resample = true;
    }
    if (patch.shape !== undefined) {
      this.shape.setParams(patch.shape);
      resample = true;
    }
    if (patch.transform !== undefined) {
      this.shape.setTransform(patch.transform);
      resample = true;
    }
    if (patch.isoLevel !== undefined && patch.isoLevel !== this.isoLevel) {
      this.isoLevel = patch.isoLevel;
      remesh = true;
    }
    if (patch.algorithm !== undefined && patch.algorithm !== this.algorithm) {
      this.algorithm = patch.algorithm;
      remesh = true;
    }

    const restyle = patch.smoothShading !== undefined && patch.smoothShading !== this.smoothShading;
    if (patch.smoothShading !== undefined) this.smoothShading = patch.smoothShading;

    const result = this.run(resample, resample || remesh);
    if (restyle && !result.meshed) setSmoothing(this.mesh, this.smoothShading);
    this.lastUpdate = result;
    return result;
  }

  private run(resample: boolean, remesh: boolean): UpdateResult {
    const voxelizeMs = resample
      ? timed(() => {
          this.grid.fitToShape(this.shape);
          this.grid.voxelize(this.shape);
        })
      : 0;
    const meshMs = remesh
      ? timed(() => buildMesh(this.algorithm, this.grid, this.isoLevel, this.smoothShading, this.mesh))
      : 0;
    return { voxelized: resample, meshed: remesh, voxelizeMs, meshMs };
  }

  /** Put the settings back and rebuild the grid and mesh from them. */
  private restore(s: PipelineSettings): void {
    this.grid.voxelSize = s.voxelSize;
    this.shape.setParams(s.shape);
    this.shape.setTransform(s.transform);
    this.isoLevel = s.isoLevel;
    this.algorithm = s.algorithm;
    this.smoothShading = s.smoothShading;
    this.run(true, true);
  }

  // ─── Readback ──────────────────────────────────────────────

  worldDistance(p: Vec3): number {
    return this.shape.worldDistance(p);
  }

  getVoxel(x: number, y: number, z: number): number {
    return this.grid.getVoxel(x, y, z);
  }

  gridInfo(): GridReadback {
    return this.grid.readback();
  }

  stats(threshold = DEFAULT_DEGENERATE_THRESHOLD): MeshStats {
    return meshStats(this.mesh, this.grid.voxelSize, threshold);
  }
}
