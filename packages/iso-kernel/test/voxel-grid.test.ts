import { describe, it, expect } from 'vitest';
import { Shape, VoxelGrid, OUTSIDE_VALUE, DEFAULT_SHAPES } from '../src/index.js';
import type { DistanceField } from '../src/index.js';
import { nextPowerOfTwo } from '../src/voxel-grid.js';

function near(actual: number, expected: number, tol = 1e-9) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

describe('VoxelGrid.fitToShape', () => {
  it('box 2×2×2 at voxel size 0.5 → 6×6×6 from -1.5', () => {
    const grid = new VoxelGrid(0.5);
    grid.fitToShape(new Shape(DEFAULT_SHAPES.box));
    expect([grid.width, grid.height, grid.depth]).toEqual([6, 6, 6]);
    expect(grid.origin).toEqual([-1.5, -1.5, -1.5]);
    expect(grid.voxelCount).toBe(216);
    expect(grid.capacity).toBe(256);
  });

  it('unit sphere at voxel size 0.1 → 22 per axis', () => {
    const grid = new VoxelGrid(0.1);
    grid.fitToShape(new Shape(DEFAULT_SHAPES.sphere));
    expect([grid.width, grid.height, grid.depth]).toEqual([22, 22, 22]);
    for (const o of grid.origin) near(o, -1.1);
  });

  it('keeps a full voxel of margin around unaligned bounds', () => {
    const cases: Shape[] = [
      new Shape(DEFAULT_SHAPES.torus, { translation: [0.03, -0.07, 0.11] }),
      new Shape(DEFAULT_SHAPES.cone, { rotation: [20, 40, 60], scale: [1.3, 0.7, 1] }),
      new Shape({ kind: 'box', width: 0.33, height: 1.01, depth: 0.27 }, { translation: [-2.04, 0, 5.5] }),
    ];
    for (const shape of cases) {
      const grid = new VoxelGrid(0.1);
      grid.fitToShape(shape);
      const { min, max } = shape.worldBounds();
      const dims = [grid.width, grid.height, grid.depth];
      for (let i = 0; i < 3; i++) {
        expect(grid.origin[i]).toBeLessThanOrEqual(min[i] - 0.1 + 1e-9);
        expect(grid.origin[i] + dims[i] * 0.1).toBeGreaterThanOrEqual(max[i] + 0.1 - 1e-9);
      }
    }
  });

  it('capacity grows to the next power of two and never shrinks', () => {
    const grid = new VoxelGrid(0.1);
    grid.fitToShape(new Shape(DEFAULT_SHAPES.sphere));
    expect(grid.capacity).toBe(16384); // 22³ = 10648
    grid.fitToShape(new Shape({ kind: 'sphere', radius: 0.2 }));
    expect(grid.voxelCount).toBe(216);
    expect(grid.capacity).toBe(16384);
  });

  it('rejects grids over the voxel limit', () => {
    const grid = new VoxelGrid(0.001);
    expect(() => grid.fitToShape(new Shape(DEFAULT_SHAPES.sphere))).toThrow('Grid too large');
    expect(grid.voxelCount).toBe(0);
  });
});

describe('VoxelGrid.voxelSize', () => {
  it('rejects non-positive sizes', () => {
    expect(() => new VoxelGrid(0)).toThrow('Voxel size must be positive');
    const grid = new VoxelGrid();
    expect(grid.voxelSize).toBe(0.1);
    expect(() => { grid.voxelSize = -1; }).toThrow('Voxel size must be positive');
    expect(grid.voxelSize).toBe(0.1);
  });
});

describe('VoxelGrid sampling', () => {
  const grid = new VoxelGrid(0.5);
  grid.fitToShape(new Shape(DEFAULT_SHAPES.box));

  it('corner and center positions follow the lattice', () => {
    expect(grid.getVoxelCornerPos(0, 0, 0)).toEqual([-1.5, -1.5, -1.5]);
    expect(grid.getVoxelCornerPos(6, 6, 6)).toEqual([1.5, 1.5, 1.5]);
    expect(grid.getVoxelCenterPos(0, 2, 5)).toEqual([-1.25, -0.25, 1.25]);
    // no bounds check outside the grid
    expect(grid.getVoxelCenterPos(-1, 0, 0)).toEqual([-1.75, -1.25, -1.25]);
  });

  it('stores the field value at each voxel center', () => {
    const field: DistanceField = { worldDistance: (p) => p[0] + 2 * p[1] };
    grid.voxelize(field);
    expect(grid.getVoxel(0, 0, 0)).toBe(-3.75);
    expect(grid.getVoxel(5, 2, 3)).toBe(0.75);
  });

  it('samples shapes through worldDistance', () => {
    grid.voxelize(new Shape(DEFAULT_SHAPES.box));
    expect(grid.getVoxel(1, 1, 1)).toBe(-0.25);
    expect(grid.getVoxel(5, 2, 2)).toBe(0.25);
  });

  it('returns the sentinel outside the grid', () => {
    expect(OUTSIDE_VALUE).toBe(10000);
    for (const [x, y, z] of [[-1, 0, 0], [0, -1, 0], [0, 0, -1], [6, 0, 0], [0, 6, 0], [0, 0, 6], [-7, 99, 3]]) {
      expect(grid.getVoxel(x, y, z)).toBe(OUTSIDE_VALUE);
    }
  });

  it('readback summarizes the grid', () => {
    expect(grid.readback()).toEqual({
      origin: [-1.5, -1.5, -1.5],
      dimensions: [6, 6, 6],
      voxelSize: 0.5,
      voxelCount: 216,
      capacity: 256,
    });
  });
});

describe('nextPowerOfTwo', () => {
  it('rounds up with a minimum of 1', () => {
    expect(nextPowerOfTwo(0)).toBe(1);
    expect(nextPowerOfTwo(1)).toBe(1);
    expect(nextPowerOfTwo(216)).toBe(256);
    expect(nextPowerOfTwo(256)).toBe(256);
  });
});
