/**
 * VoxelGrid — dense scalar field sampled at voxel centers.
 *
 * Layout is row-major, x fastest: index = z*width*height + y*width + x.
 * Reads outside the grid return OUTSIDE_VALUE instead of failing, so mesh
 * builders can walk one cell past every edge without bounds branches.
 */

import type { Vec3, BoundingBox } from './vec3.js';
import type { DistanceField, Shape } from './shape.js';

/** Value reported for any coordinate outside the grid ("far outside"). */
export const OUTSIDE_VALUE = 10_000.0;

export const DEFAULT_VOXEL_SIZE = 0.1;

/** Hard ceiling on voxels per grid (~128 MiB of float32 at the next power of two). */
export const MAX_VOXEL_COUNT = 2 ** 25;

/** Smallest power of two ≥ n, and at least 1. */
export function nextPowerOfTwo(n: number): number {
  let p = 1;
  while (p < n) p *= 2;
  return p;
}

export interface GridReadback {
  origin: Vec3;
  dimensions: Vec3;
  voxelSize: number;
  voxelCount: number;
  capacity: number;
}

export class VoxelGrid {
  private size: number;
  private originPos: Vec3 = [0, 0, 0];
  private w = 0;
  private h = 0;
  private d = 0;
  private voxels = new Float32Array(0);

  constructor(voxelSize = DEFAULT_VOXEL_SIZE) {
    VoxelGrid.checkVoxelSize(voxelSize);
    this.size = voxelSize;
  }

  private static checkVoxelSize(voxelSize: number): void {
    if (!(voxelSize > 0) || !Number.isFinite(voxelSize)) {
      throw new Error(`Voxel size must be positive (got ${voxelSize})`);
    }
  }

  /** Edge length of one voxel in world units. Takes effect at the next fit. */
  get voxelSize(): number { return this.size; }
  set voxelSize(value: number) {
    VoxelGrid.checkVoxelSize(value);
    this.size = value;
  }

  /** World-space minimum corner of voxel (0, 0, 0). */
  get origin(): Vec3 { return [...this.originPos]; }
  get width(): number { return this.w; }
  get height(): number { return this.h; }
  get depth(): number { return this.d; }
  get voxelCount(): number { return this.w * this.h * this.d; }
  /** Allocated backing slots. Only ever grows. */
  get capacity(): number { return this.voxels.length; }

  // ─── Fitting ───────────────────────────────────────────────

  fitToShape(shape: Shape): void {
    this.fitToBounds(shape.worldBounds());
  }

  /**
   * Snap the grid to the voxel lattice around `bounds`, keeping at least one
   * voxel of padding on every side.
   */
  fitToBounds(bounds: BoundingBox): void {
    const vs = this.size;
    const origin: Vec3 = [0, 0, 0];
    const dims: Vec3 = [0, 0, 0];
    for (let i = 0; i < 3; i++) {
      const lo = Math.floor(bounds.min[i] / vs);
      const hi = Math.ceil(bounds.max[i] / vs);
      origin[i] = (lo - 1) * vs;
      dims[i] = hi - lo + 2;
      if (!Number.isFinite(origin[i]) || !Number.isSafeInteger(dims[i]) || dims[i] < 2) {
        throw new Error(`Cannot fit grid to bounds [${bounds.min}] – [${bounds.max}]`);
      }
    }

    const count = dims[0] * dims[1] * dims[2];
    if (count > MAX_VOXEL_COUNT) {
      throw new Error(
        `Grid too large: ${dims.join('×')} = ${count} voxels (max ${MAX_VOXEL_COUNT}). ` +
        `Increase the voxel size or shrink the shape.`
      );
    }

    this.originPos = origin;
    [this.w, this.h, this.d] = dims;
    if (count > this.voxels.length) {
      this.voxels = new Float32Array(nextPowerOfTwo(count));
    }
  }

  // ─── Sampling ──────────────────────────────────────────────

  /** Store the field's distance at every voxel center. */
  voxelize(field: DistanceField): void {
    const { w, h, d } = this;
    for (let z = 0; z < d; z++) {
      for (let y = 0; y < h; y++) {
        for (let x = 0; x < w; x++) {
          this.voxels[this.index(x, y, z)] = field.worldDistance(this.getVoxelCenterPos(x, y, z));
        }
      }
    }
  }

  // ─── Access ────────────────────────────────────────────────

  inBounds(x: number, y: number, z: number): boolean {
    return x >= 0 && y >= 0 && z >= 0 && x < this.w && y < this.h && z < this.d;
  }

  index(x: number, y: number, z: number): number {
    return z * this.w * this.h + y * this.w + x;
  }

  /** Stored value, or OUTSIDE_VALUE for coordinates outside the grid. */
  getVoxel(x: number, y: number, z: number): number {
    return this.inBounds(x, y, z) ? this.voxels[this.index(x, y, z)] : OUTSIDE_VALUE;
  }

  /** World position of a voxel's minimum corner. Valid for any integer coordinate. */
  getVoxelCornerPos(x: number, y: number, z: number): Vec3 {
    const vs = this.size;
    const o = this.originPos;
    return [o[0] + x * vs, o[1] + y * vs, o[2] + z * vs];
  }

  /** World position of a voxel's center. Valid for any integer coordinate. */
  getVoxelCenterPos(x: number, y: number, z: number): Vec3 {
    const vs = this.size;
    const o = this.originPos;
    return [o[0] + (x + 0.5) * vs, o[1] + (y + 0.5) * vs, o[2] + (z + 0.5) * vs];
  }

  readback(): GridReadback {
    return {
      origin: this.origin,
      dimensions: [this.w, this.h, this.d],
      voxelSize: this.size,
      voxelCount: this.voxelCount,
      capacity: this.capacity,
    };
  }
}
