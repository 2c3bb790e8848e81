/**
 * Session — the single in-memory isosurface pipeline the tools drive.
 *
 * Every mutating tool applies a settings patch here and returns the full
 * readback, so the agent always sees the current shape, grid and mesh.
 */

import {
  IsosurfacePipeline,
  MESH_BUILDERS,
  type PipelineSettings,
  type SettingsPatch,
  type ShapeReadback,
  type GridReadback,
  type MeshStats,
  type UpdateResult,
  type Vec3,
} from '@isomesh/kernel';

/** Smallest scale component a tool may set; keeps the transform invertible. */
export const MIN_SCALE = 0.001;

export interface SessionState {
  settings: PipelineSettings;
  algorithm_label: string;
  shape: ShapeReadback;
  grid: GridReadback;
  mesh: {
    vertex_count: number;
    triangle_count: number;
  };
  timing: {
    voxelized: boolean;
    meshed: boolean;
    voxelize_ms: number;
    mesh_ms: number;
  };
}

let defaults: Partial<PipelineSettings> = {};
let pipeline: IsosurfacePipeline | undefined;

function current(): IsosurfacePipeline {
  pipeline ??= new IsosurfacePipeline(defaults);
  return pipeline;
}

function round(ms: number): number {
  return Math.round(ms * 100) / 100;
}

function readback(p: IsosurfacePipeline, timing: UpdateResult): SessionState {
  const settings = p.settings;
  return {
    settings,
    algorithm_label: MESH_BUILDERS[settings.algorithm].label,
    shape: p.shape.readback(),
    grid: p.gridInfo(),
    mesh: {
      vertex_count: p.mesh.vertices.length,
      triangle_count: p.mesh.indices.length / 3,
    },
    timing: {
      voxelized: timing.voxelized,
      meshed: timing.meshed,
      voxelize_ms: round(timing.voxelizeMs),
      mesh_ms: round(timing.meshMs),
    },
  };
}

/** Settings the session starts from and returns to on reset(). */
export function configure(settings: Partial<PipelineSettings>): void {
  defaults = { ...settings };
  pipeline = undefined;
}

export function state(): SessionState {
  const p = current();
  return readback(p, p.lastUpdate);
}

/** Apply a patch, rebuilding only the stages it invalidates. */
export function update(patch: SettingsPatch): SessionState {
  const p = current();
  return readback(p, p.update(patch));
}

/** Discard the pipeline and rebuild from the configured defaults. */
export function reset(): SessionState {
  pipeline = undefined;
  return state();
}

export function clampScale(scale: Vec3): Vec3 {
  return [Math.max(scale[0], MIN_SCALE), Math.max(scale[1], MIN_SCALE), Math.max(scale[2], MIN_SCALE)];
}

export function stats(threshold?: number): MeshStats {
  return current().stats(threshold);
}

export function evaluatePoint(point: Vec3): { point: Vec3; distance: number; inside: boolean } {
  const p = current();
  const distance = p.worldDistance(point);
  return { point, distance, inside: distance < p.settings.isoLevel };
}

export function voxel(x: number, y: number, z: number): {
  index: Vec3;
  value: number;
  in_bounds: boolean;
  center: Vec3;
} {
  const grid = current().grid;
  return {
    index: [x, y, z],
    value: grid.getVoxel(x, y, z),
    in_bounds: grid.inBounds(x, y, z),
    center: grid.getVoxelCenterPos(x, y, z),
  };
}
