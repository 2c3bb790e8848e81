/**
 * Blocky mesher — one axis-aligned quad per exposed voxel face.
 *
 * A voxel is solid when its value ≤ iso. Each face shared with a neighbour
 * whose value ≥ iso (the sentinel counts as outside) becomes two triangles.
 * Corners come from integer lattice coordinates, so adjacent faces share
 * vertices exactly.
 */

import type { Vec3 } from './vec3.js';
import type { VoxelGrid } from './voxel-grid.js';
import { MeshWriter, type TriangleMesh } from './mesh.js';

export function blocky(grid: VoxelGrid, isoLevel: number, writer: MeshWriter): void {
  const { width, height, depth } = grid;

  for (let z = 0; z < depth; z++) {
    for (let y = 0; y < height; y++) {
      for (let x = 0; x < width; x++) {
        if (grid.getVoxel(x, y, z) > isoLevel) continue;

        const [mx, my, mz] = grid.getVoxelCornerPos(x, y, z);
        const [Mx, My, Mz] = grid.getVoxelCornerPos(x + 1, y + 1, z + 1);

        // pN: bit 0 = +x, bit 1 = +y, bit 2 = +z
        const p0: Vec3 = [mx, my, mz];
        const p1: Vec3 = [Mx, my, mz];
        const p2: Vec3 = [mx, My, mz];
        const p3: Vec3 = [Mx, My, mz];
        const p4: Vec3 = [mx, my, Mz];
        const p5: Vec3 = [Mx, my, Mz];
        const p6: Vec3 = [mx, My, Mz];
        const p7: Vec3 = [Mx, My, Mz];

        const open = (dx: number, dy: number, dz: number) =>
          grid.getVoxel(x + dx, y + dy, z + dz) >= isoLevel;

        if (open(1, 0, 0)) writer.quad(p5, p1, p3, p7);
        if (open(-1, 0, 0)) writer.quad(p4, p6, p2, p0);
        if (open(0, 1, 0)) writer.quad(p2, p6, p7, p3);
        if (open(0, -1, 0)) writer.quad(p0, p1, p5, p4);
        if (open(0, 0, 1)) writer.quad(p5, p7, p6, p4);
        if (open(0, 0, -1)) writer.quad(p0, p2, p3, p1);
      }
    }
  }
}

export function blockyMesh(grid: VoxelGrid, isoLevel: number, smoothShading: boolean, out: TriangleMesh): TriangleMesh {
  const writer = new MeshWriter(smoothShading);
  blocky(grid, isoLevel, writer);
  return writer.commit(out);
}
