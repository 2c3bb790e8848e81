/** Shared mesh assertions for the builder tests. */

import { VoxelGrid, Shape, type ShapeParams, type TriangleMesh, type Vec3 } from '../src/index.js';
import { cross, dot, sub, distance, length } from '../src/vec3.js';

export function sampledGrid(params: ShapeParams, voxelSize: number): VoxelGrid {
  const shape = new Shape(params);
  const grid = new VoxelGrid(voxelSize);
  grid.fitToShape(shape);
  grid.voxelize(shape);
  return grid;
}

/**
 * 2×2×2 grid (voxel size 1, origin -1) whose only inside voxel is (1, 1, 1),
 * centered at (0.5, 0.5, 0.5).
 */
export function singleVoxelGrid(): VoxelGrid {
  const grid = new VoxelGrid(1);
  grid.fitToBounds({ min: [0, 0, 0], max: [0, 0, 0] });
  grid.voxelize({ worldDistance: (p) => distance(p, [0.5, 0.5, 0.5]) - 0.1 });
  return grid;
}

function corners(mesh: TriangleMesh, t: number): [Vec3, Vec3, Vec3] {
  return [
    mesh.vertices[mesh.indices[t * 3]],
    mesh.vertices[mesh.indices[t * 3 + 1]],
    mesh.vertices[mesh.indices[t * 3 + 2]],
  ];
}

/**
 * Triangles whose normal points back toward `center`. Triangles with
 * (near) zero area have no direction and are skipped.
 */
export function inwardTriangles(mesh: TriangleMesh, center: Vec3): number {
  let inward = 0;
  for (let t = 0; t < mesh.indices.length / 3; t++) {
    const [a, b, c] = corners(mesh, t);
    const n = cross(sub(b, a), sub(c, a));
    if (length(n) < 1e-12) continue;
    const centroid: Vec3 = [(a[0] + b[0] + c[0]) / 3, (a[1] + b[1] + c[1]) / 3, (a[2] + b[2] + c[2]) / 3];
    if (dot(n, sub(centroid, center)) < 0) inward++;
  }
  return inward;
}

/** Mean of the vertex positions. */
export function vertexCentroid(mesh: TriangleMesh): Vec3 {
  const sum: Vec3 = [0, 0, 0];
  for (const v of mesh.vertices) {
    for (let i = 0; i < 3; i++) sum[i] += v[i];
  }
  const n = mesh.vertices.length;
  return [sum[0] / n, sum[1] / n, sum[2] / n];
}

/**
 * True when every directed edge appears once and its reverse appears once:
 * the mesh is closed and consistently wound.
 */
export function isClosedAndOriented(mesh: TriangleMesh): boolean {
  const directed = new Map<string, number>();
  for (let t = 0; t < mesh.indices.length / 3; t++) {
    for (let k = 0; k < 3; k++) {
      const a = mesh.indices[t * 3 + k];
      const b = mesh.indices[t * 3 + ((k + 1) % 3)];
      const key = `${a}>${b}`;
      directed.set(key, (directed.get(key) ?? 0) + 1);
    }
  }
  for (const [key, count] of directed) {
    if (count !== 1) return false;
    const [a, b] = key.split('>');
    if (directed.get(`${b}>${a}`) !== 1) return false;
  }
  return true;
}

/** Number of distinct vertex positions (equals vertices.length when deduplicated). */
export function distinctPositions(mesh: TriangleMesh): number {
  return new Set(mesh.vertices.map((v) => v.join(','))).size;
}
