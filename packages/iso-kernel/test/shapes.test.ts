import { describe, it, expect } from 'vitest';
import { Shape, DEFAULT_SHAPES, localDistance, localBounds, describeShape } from '../src/index.js';
import type { Vec3 } from '../src/index.js';

const EPSILON = 1e-9;

function near(actual: number, expected: number, tol = EPSILON) {
  expect(Math.abs(actual - expected)).toBeLessThan(tol);
}

function nearVec(actual: Vec3, expected: Vec3, tol = EPSILON) {
  for (let i = 0; i < 3; i++) near(actual[i], expected[i], tol);
}

describe('Sphere', () => {
  const s = new Shape({ kind: 'sphere', radius: 1 });

  it('is zero on the surface', () => {
    near(s.worldDistance([1, 0, 0]), 0);
    near(s.worldDistance([0, -1, 0]), 0);
    near(s.worldDistance([0.6, 0.8, 0]), 0);
  });

  it('is negative inside and positive outside', () => {
    near(s.worldDistance([0, 0, 0]), -1);
    near(s.worldDistance([2, 0, 0]), 1);
  });

  it('bounds are a cube of side 2r', () => {
    expect(s.localBounds()).toEqual({ min: [-1, -1, -1], max: [1, 1, 1] });
  });
});

describe('Box', () => {
  const b = { kind: 'box', width: 2, height: 2, depth: 2 } as const;

  it('is exact inside, on faces and past edges', () => {
    near(localDistance(b, [0, 0, 0]), -1);
    near(localDistance(b, [1, 0, 0]), 0);
    near(localDistance(b, [2, 0, 0]), 1);
    near(localDistance(b, [2, 2, 0]), Math.SQRT2);
  });

  it('uses half extents per axis', () => {
    const slab = { kind: 'box', width: 4, height: 1, depth: 2 } as const;
    near(localDistance(slab, [0, 0, 0]), -0.5);
    near(localDistance(slab, [3, 0, 0]), 1);
    expect(localBounds(slab)).toEqual({ min: [-2, -0.5, -1], max: [2, 0.5, 1] });
  });
});

describe('Torus', () => {
  const t = DEFAULT_SHAPES.torus;

  it('ring lies in the XZ plane around Y', () => {
    near(localDistance(t, [0.7, 0, 0]), -0.3);
    near(localDistance(t, [0, 0, -0.7]), -0.3);
    near(localDistance(t, [1, 0, 0]), 0);
  });

  it('center of the hole is outside', () => {
    near(localDistance(t, [0, 0, 0]), 0.4);
    near(localDistance(t, [0, 1, 0]), Math.sqrt(0.49 + 1) - 0.3);
  });

  it('bounds are ±(R+r) in X/Z and ±r in Y', () => {
    const { min, max } = localBounds(t);
    nearVec(min, [-1, -0.3, -1]);
    nearVec(max, [1, 0.3, 1]);
  });
});

describe('Cone', () => {
  const c = DEFAULT_SHAPES.cone;

  it('apex at +h/2 is on the surface', () => {
    near(localDistance(c, [0, 1, 0]), 0);
  });

  it('is exact along the axis and past the base rim', () => {
    near(localDistance(c, [0, 2, 0]), 1);
    near(localDistance(c, [0, -2, 0]), 1);
    near(localDistance(c, [2, -1, 0]), 1);
  });

  it('center is inside, nearest the slant', () => {
    near(localDistance(c, [0, 0, 0]), -1 / Math.sqrt(5));
  });

  it('bounds', () => {
    expect(localBounds(c)).toEqual({ min: [-1, -1, -1], max: [1, 1, 1] });
  });
});

describe('describe', () => {
  it('names each kind with its parameters', () => {
    expect(describeShape(DEFAULT_SHAPES.sphere)).toBe('sphere(r=1)');
    expect(describeShape(DEFAULT_SHAPES.box)).toBe('box(2, 2, 2)');
    expect(describeShape(DEFAULT_SHAPES.torus)).toBe('torus(R=0.7, r=0.3)');
    expect(describeShape(DEFAULT_SHAPES.cone)).toBe('cone(r=1, h=2)');
  });
});

describe('Shape', () => {
  it('setParams swaps the primitive and keeps the transform', () => {
    const s = new Shape(DEFAULT_SHAPES.sphere, { translation: [5, 0, 0] });
    s.setParams(DEFAULT_SHAPES.box);
    expect(s.kind).toBe('box');
    near(s.worldDistance([5, 0, 0]), -1);
  });

  it('params are copies', () => {
    const s = new Shape({ kind: 'sphere', radius: 1 });
    const p = s.params;
    if (p.kind === 'sphere') p.radius = 3;
    expect(s.params).toEqual({ kind: 'sphere', radius: 1 });
  });

  it('readback reports name, kind and world bounds', () => {
    const s = new Shape(DEFAULT_SHAPES.sphere, { translation: [1, 2, 3] });
    const r = s.readback();
    expect(r.name).toBe('sphere(r=1)');
    expect(r.kind).toBe('sphere');
    expect(r.worldBounds).toEqual({ min: [0, 1, 2], max: [2, 3, 4] });
    expect(r.transform.translation).toEqual([1, 2, 3]);
  });
});
