/**
 * Mesh diagnostics — size, extent and quality numbers for readback.
 */

import { type BoundingBox, type Vec3, cross, distance, dot, enclose } from './vec3.js';
import { type TriangleMesh, triangleCount, vertexCount } from './mesh.js';

/** Fraction of the voxel size below which a triangle edge counts as degenerate. */
export const DEFAULT_DEGENERATE_THRESHOLD = 0.05;

function triangle(mesh: TriangleMesh, t: number): [Vec3, Vec3, Vec3] {
  const i = t * 3;
  return [
    mesh.vertices[mesh.indices[i]],
    mesh.vertices[mesh.indices[i + 1]],
    mesh.vertices[mesh.indices[i + 2]],
  ];
}

/** Triangles whose shortest edge is at most voxelSize * threshold. */
export function countDegenerateTriangles(
  mesh: TriangleMesh,
  voxelSize: number,
  threshold = DEFAULT_DEGENERATE_THRESHOLD,
): number {
  const limit = voxelSize * threshold;
  let count = 0;
  for (let t = 0; t < triangleCount(mesh); t++) {
    const [a, b, c] = triangle(mesh, t);
    const shortest = Math.min(distance(a, b), distance(b, c), distance(c, a));
    if (shortest <= limit) count++;
  }
  return count;
}

/** Enclosing box of the vertices, or null for an empty mesh. */
export function meshBounds(mesh: TriangleMesh): BoundingBox | null {
  if (mesh.vertices.length === 0) return null;
  return enclose(mesh.vertices);
}

/**
 * Enclosed volume by the divergence theorem: sum of signed tetrahedra from
 * the origin. Positive for a closed mesh wound outward.
 */
export function meshVolume(mesh: TriangleMesh): number {
  let sum = 0;
  for (let t = 0; t < triangleCount(mesh); t++) {
    const [a, b, c] = triangle(mesh, t);
    sum += dot(a, cross(b, c));
  }
  return sum / 6;
}

export interface MeshStats {
  vertexCount: number;
  triangleCount: number;
  degenerateTriangles: number;
  bounds: BoundingBox | null;
  volume: number;
}

export function meshStats(
  mesh: TriangleMesh,
  voxelSize: number,
  threshold = DEFAULT_DEGENERATE_THRESHOLD,
): MeshStats {
  return {
    vertexCount: vertexCount(mesh),
    triangleCount: triangleCount(mesh),
    degenerateTriangles: countDegenerateTriangles(mesh, voxelSize, threshold),
    bounds: meshBounds(mesh),
    volume: meshVolume(mesh),
  };
}
