/**
 * Surface Nets — dual contouring with averaged vertices.
 *
 * Every voxel-center edge whose endpoints disagree on inside/outside gets an
 * interpolated crossing point, credited to the four cells that share the
 * edge. A cell's vertex is the mean of its crossings, and each crossing edge
 * becomes one quad joining its four cells' vertices.
 *
 * Cell (i, j, k) is the dual cell whose minimum corner is voxel center
 * (i, j, k). Edges are walked from voxel -1, so the sentinel closes surfaces
 * that touch the grid boundary.
 */

import type { Vec3 } from './vec3.js';
import type { VoxelGrid } from './voxel-grid.js';
import { MeshWriter, type TriangleMesh } from './mesh.js';
import { interpolateCrossing } from './marching-cubes.js';

/** Edge direction per axis, and the four cells sharing an edge that starts at voxel (0,0,0). */
const AXIS_STEP: readonly Vec3[] = [[1, 0, 0], [0, 1, 0], [0, 0, 1]];

const SHARING_CELLS: readonly (readonly Vec3[])[] = [
  [[0, -1, -1], [0, 0, -1], [0, 0, 0], [0, -1, 0]],
  [[-1, 0, -1], [-1, 0, 0], [0, 0, 0], [0, 0, -1]],
  [[-1, -1, 0], [0, -1, 0], [0, 0, 0], [-1, 0, 0]],
];

/** First cell coordinate stored; cells run over [-2, dim - 1] per axis. */
const CELL_OFFSET = 2;

interface Crossing {
  x: number;
  y: number;
  z: number;
  axis: number;
  startInside: boolean;
}

class CellAccumulator {
  private readonly nx: number;
  private readonly ny: number;
  private readonly sums: Float64Array;
  private readonly counts: Uint32Array;

  constructor(width: number, height: number, depth: number) {
    this.nx = width + CELL_OFFSET;
    this.ny = height + CELL_OFFSET;
    const n = this.nx * this.ny * (depth + CELL_OFFSET);
    this.sums = new Float64Array(n * 3);
    this.counts = new Uint32Array(n);
  }

  private slot(x: number, y: number, z: number): number {
    return ((z + CELL_OFFSET) * this.ny + (y + CELL_OFFSET)) * this.nx + (x + CELL_OFFSET);
  }

  add(x: number, y: number, z: number, p: Vec3): void {
    const i = this.slot(x, y, z);
    this.sums[i * 3] += p[0];
    this.sums[i * 3 + 1] += p[1];
    this.sums[i * 3 + 2] += p[2];
    this.counts[i]++;
  }

  vertex(x: number, y: number, z: number): Vec3 {
    const i = this.slot(x, y, z);
    const n = this.counts[i];
    return [this.sums[i * 3] / n, this.sums[i * 3 + 1] / n, this.sums[i * 3 + 2] / n];
  }
}

export function surfaceNets(grid: VoxelGrid, isoLevel: number, writer: MeshWriter): void {
  const { width, height, depth } = grid;
  const cells = new CellAccumulator(width, height, depth);
  const crossings: Crossing[] = [];

  // Pass 1: find crossings and accumulate them into their cells
  for (let z = -1; z < depth; z++) {
    for (let y = -1; y < height; y++) {
      for (let x = -1; x < width; x++) {
        const d0 = grid.getVoxel(x, y, z);
        const startInside = d0 < isoLevel;

        for (let axis = 0; axis < 3; axis++) {
          const [sx, sy, sz] = AXIS_STEP[axis];
          const d1 = grid.getVoxel(x + sx, y + sy, z + sz);
          if (startInside === d1 < isoLevel) continue;

          const p = interpolateCrossing(
            grid.getVoxelCenterPos(x, y, z), d0,
            grid.getVoxelCenterPos(x + sx, y + sy, z + sz), d1,
            isoLevel,
          );
          for (const [ox, oy, oz] of SHARING_CELLS[axis]) {
            cells.add(x + ox, y + oy, z + oz, p);
          }
          crossings.push({ x, y, z, axis, startInside });
        }
      }
    }
  }

  // Pass 2: one quad per crossing edge, facing away from the inside endpoint
  for (const { x, y, z, axis, startInside } of crossings) {
    const [v0, v1, v2, v3] = SHARING_CELLS[axis].map(([ox, oy, oz]) => cells.vertex(x + ox, y + oy, z + oz));
    if (startInside) writer.quad(v0, v1, v2, v3);
    else writer.quad(v0, v3, v2, v1);
  }
}

export function surfaceNetsMesh(
  grid: VoxelGrid,
  isoLevel: number,
  smoothShading: boolean,
  out: TriangleMesh,
): TriangleMesh {
  const writer = new MeshWriter(smoothShading);
  surfaceNets(grid, isoLevel, writer);
  return writer.commit(out);
}
