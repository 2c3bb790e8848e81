/**
 * Mesh builder dispatch — one entry per meshing algorithm.
 */

import type { VoxelGrid } from './voxel-grid.js';
import { createMesh, type TriangleMesh } from './mesh.js';
import { blockyMesh } from './blocky.js';
import { marchingCubesMesh } from './marching-cubes.js';
import { surfaceNetsMesh } from './surface-nets.js';

export type MeshAlgorithm = 'blocky' | 'marching-cubes' | 'surface-nets';

export const MESH_ALGORITHMS = ['blocky', 'marching-cubes', 'surface-nets'] as const satisfies readonly MeshAlgorithm[];

export const DEFAULT_ALGORITHM: MeshAlgorithm = 'marching-cubes';

export interface MeshBuilder {
  label: string;
  build(grid: VoxelGrid, isoLevel: number, smoothShading: boolean, out: TriangleMesh): TriangleMesh;
}

export const MESH_BUILDERS: Record<MeshAlgorithm, MeshBuilder> = {
  'blocky': { label: 'Blocky', build: blockyMesh },
  'marching-cubes': { label: 'Marching Cubes', build: marchingCubesMesh },
  'surface-nets': { label: 'Surface Nets', build: surfaceNetsMesh },
};

/**
 * Rebuild `out` (or a fresh mesh) from the grid. The previous contents are
 * replaced only once the build completes.
 */
export function buildMesh(
  algorithm: MeshAlgorithm,
  grid: VoxelGrid,
  isoLevel: number,
  smoothShading: boolean,
  out: TriangleMesh = createMesh(),
): TriangleMesh {
  return MESH_BUILDERS[algorithm].build(grid, isoLevel, smoothShading, out);
}
