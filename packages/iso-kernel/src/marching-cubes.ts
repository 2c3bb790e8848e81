/**
 * Marching Cubes — isosurface extraction over a sampled VoxelGrid.
 *
 * Each cell spans eight neighbouring voxel centers. Cells start one voxel
 * before the grid and end on its last voxel, so the out-of-range sentinel
 * closes any surface that touches the grid boundary.
 *
 * Algorithm:
 *   1. Classify the cell's 8 corners (bit i set when corner i is inside)
 *   2. Interpolate a vertex on every crossed edge
 *   3. Emit the table's triangles, reversed to wind outward
 *
 * Ambiguous face configurations are taken as the table gives them.
 */

import { type Vec3, lerp } from './vec3.js';
import type { VoxelGrid } from './voxel-grid.js';
import { MeshWriter, type TriangleMesh } from './mesh.js';
import { marchingTables } from './marching-tables.js';

// ─── Cell layout ───────────────────────────────────────────────

/** Corner offsets: bottom face (z=0) counter-clockwise, then top face (z=1). */
export const CORNERS: readonly Vec3[] = [
  [0, 0, 0], [1, 0, 0], [1, 1, 0], [0, 1, 0],
  [0, 0, 1], [1, 0, 1], [1, 1, 1], [0, 1, 1],
];

/**
 * Edge endpoints as corner indices, lower lattice coordinate first. Shared
 * edges are interpolated in the same direction from every cell that touches
 * them, so their vertices match bit for bit.
 */
export const EDGES: readonly (readonly [number, number])[] = [
  [0, 1], [1, 2], [3, 2], [0, 3],
  [4, 5], [5, 6], [7, 6], [4, 7],
  [0, 4], [1, 5], [2, 6], [3, 7],
];

/** Point on the segment a→b where the sampled value reaches isoLevel. */
export function interpolateCrossing(
  a: Vec3, da: number,
  b: Vec3, db: number,
  isoLevel: number,
): Vec3 {
  const t = (isoLevel - da) / (db - da);
  return lerp(a, b, t);
}

// ─── Core ──────────────────────────────────────────────────────

export function marchingCubes(grid: VoxelGrid, isoLevel: number, writer: MeshWriter): void {
  const { edgeTable, triTable } = marchingTables();
  const { width, height, depth } = grid;

  const positions: Vec3[] = CORNERS.map(() => [0, 0, 0]);
  const values = new Float64Array(8);
  const edgeVerts: Vec3[] = EDGES.map(() => [0, 0, 0]);

  for (let cz = -1; cz < depth; cz++) {
    for (let cy = -1; cy < height; cy++) {
      for (let cx = -1; cx < width; cx++) {
        let config = 0;
        for (let i = 0; i < 8; i++) {
          const [ox, oy, oz] = CORNERS[i];
          values[i] = grid.getVoxel(cx + ox, cy + oy, cz + oz);
          if (values[i] < isoLevel) config |= 1 << i;
        }

        const crossed = edgeTable[config];
        if (crossed === 0) continue;

        for (let i = 0; i < 8; i++) {
          const [ox, oy, oz] = CORNERS[i];
          positions[i] = grid.getVoxelCenterPos(cx + ox, cy + oy, cz + oz);
        }

        for (let e = 0; e < 12; e++) {
          if (!(crossed & (1 << e))) continue;
          const [s, t] = EDGES[e];
          edgeVerts[e] = interpolateCrossing(positions[s], values[s], positions[t], values[t], isoLevel);
        }

        const tris = triTable[config];
        for (let i = 0; i < tris.length; i += 3) {
          writer.triangle(edgeVerts[tris[i]], edgeVerts[tris[i + 2]], edgeVerts[tris[i + 1]]);
        }
      }
    }
  }
}

export function marchingCubesMesh(
  grid: VoxelGrid,
  isoLevel: number,
  smoothShading: boolean,
  out: TriangleMesh,
): TriangleMesh {
  const writer = new MeshWriter(smoothShading);
  marchingCubes(grid, isoLevel, writer);
  return writer.commit(out);
}
