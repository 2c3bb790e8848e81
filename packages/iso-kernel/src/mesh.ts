/**
 * Triangle mesh types — output of every mesh builder.
 */

import type { Vec3 } from './vec3.js';

export type SmoothingFlag = 0 | 1;

export interface TriangleMesh {
  /** Vertex positions, deduplicated by exact coordinate equality. */
  vertices: Vec3[];
  /** Triangle indices into vertices[], groups of 3, counter-clockwise seen from outside. */
  indices: number[];
  /** One flag per triangle: 1 = smooth shading group, 0 = flat. */
  smoothing: SmoothingFlag[];
}

export function createMesh(): TriangleMesh {
  return { vertices: [], indices: [], smoothing: [] };
}

export function vertexCount(mesh: TriangleMesh): number {
  return mesh.vertices.length;
}

export function triangleCount(mesh: TriangleMesh): number {
  return mesh.indices.length / 3;
}

/** Rewrite every triangle's smoothing flag in place. */
export function setSmoothing(mesh: TriangleMesh, smooth: boolean): void {
  mesh.smoothing.fill(smooth ? 1 : 0);
}

// ─── Writer ────────────────────────────────────────────────────

/**
 * Accumulates triangles for one build. Vertices are keyed by their exact
 * coordinates, so positions computed by the same formula collapse to one
 * index. -0 and 0 print the same and merge.
 */
export class MeshWriter {
  private readonly vertices: Vec3[] = [];
  private readonly indices: number[] = [];
  private readonly smoothing: SmoothingFlag[] = [];
  private readonly lookup = new Map<string, number>();
  private readonly flag: SmoothingFlag;

  constructor(smoothShading: boolean) {
    this.flag = smoothShading ? 1 : 0;
  }

  vertex(p: Vec3): number {
    const key = `${p[0]},${p[1]},${p[2]}`;
    let index = this.lookup.get(key);
    if (index === undefined) {
      index = this.vertices.length;
      this.vertices.push([p[0], p[1], p[2]]);
      this.lookup.set(key, index);
    }
    return index;
  }

  triangle(a: Vec3, b: Vec3, c: Vec3): void {
    this.indices.push(this.vertex(a), this.vertex(b), this.vertex(c));
    this.smoothing.push(this.flag);
  }

  /** Quad (a, b, c, d) as triangles (a, b, c) and (a, c, d). */
  quad(a: Vec3, b: Vec3, c: Vec3, d: Vec3): void {
    this.triangle(a, b, c);
    this.triangle(a, c, d);
  }

  /** Replace the contents of `out` with everything written so far. */
  commit(out: TriangleMesh): TriangleMesh {
    out.vertices = this.vertices;
    out.indices = this.indices;
    out.smoothing = this.smoothing;
    return out;
  }
}

// ─── Renderer hand-off ─────────────────────────────────────────

export interface PackedMesh {
  /** x, y, z per vertex. */
  positions: Float32Array;
  indices: Uint32Array;
  /** A single (0, 0) coordinate shared by every vertex. */
  texCoords: Float32Array;
  faceSmoothingGroups: Int32Array;
}

export const DEFAULT_TEX_COORD: readonly [number, number] = [0, 0];

/** Flatten a mesh into the typed arrays a triangle-mesh renderer consumes. */
export function packMesh(mesh: TriangleMesh): PackedMesh {
  const positions = new Float32Array(mesh.vertices.length * 3);
  mesh.vertices.forEach((v, i) => positions.set(v, i * 3));
  return {
    positions,
    indices: Uint32Array.from(mesh.indices),
    texCoords: Float32Array.from(DEFAULT_TEX_COORD),
    faceSmoothingGroups: Int32Array.from(mesh.smoothing),
  };
}
