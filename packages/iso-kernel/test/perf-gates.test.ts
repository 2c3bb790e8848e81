/**
 * Performance gates — timed assertions that catch algorithmic regressions.
 *
 * Budgets are loose (several times the expected cost on a laptop) so CI
 * jitter does not trip them; a failure means something went quadratic.
 *
 * If a gate fails: profile the stage, don't just bump the budget.
 */

import { describe, it, expect } from 'vitest';
import { buildMesh, MESH_ALGORITHMS, DEFAULT_SHAPES, triangleCount } from '../src/index.js';
import { sampledGrid } from './mesh-checks.js';

/** Run fn, return [result, elapsed_ms]. */
function timed<T>(fn: () => T): [T, number] {
  const t0 = performance.now();
  const result = fn();
  return [result, performance.now() - t0];
}

describe('performance gates', () => {
  it('voxelizes the default torus (22×8×22) within 250ms', () => {
    const [grid, ms] = timed(() => sampledGrid(DEFAULT_SHAPES.torus, 0.1));
    expect(grid.voxelCount).toBe(22 * 8 * 22);
    expect(ms).toBeLessThan(250);
  });

  for (const algorithm of MESH_ALGORITHMS) {
    it(`${algorithm} meshes a sphere at voxel size 0.05 within 1500ms`, () => {
      const grid = sampledGrid(DEFAULT_SHAPES.sphere, 0.05);
      const [mesh, ms] = timed(() => buildMesh(algorithm, grid, 0, true));
      expect(triangleCount(mesh)).toBeGreaterThan(1000);
      expect(ms).toBeLessThan(1500);
    });
  }
});
