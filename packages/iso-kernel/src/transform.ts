/**
 * Affine transforms for shapes.
 *
 * A shape's local frame maps to world space as
 *
 *   world = Translate ∘ RotateZ ∘ RotateY ∘ RotateX ∘ Scale (local)
 *
 * and back through the exact inverse, composed in reverse order. Both
 * matrices are rebuilt eagerly on every mutation, so queries never see a
 * stale transform.
 */

import type { Vec3 } from './vec3.js';
import { InvalidShapeConfiguration } from './errors.js';

/** Row-major 3×4 affine matrix: [r00 r01 r02 tx, r10 r11 r12 ty, r20 r21 r22 tz]. */
export type Affine = [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
];

export type Axis = 'x' | 'y' | 'z';

export const AXES: readonly Axis[] = ['x', 'y', 'z'];

// ─── Matrix helpers ────────────────────────────────────────────

export function identity(): Affine {
  return [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0];
}

export function translation(t: Vec3): Affine {
  return [1, 0, 0, t[0], 0, 1, 0, t[1], 0, 0, 1, t[2]];
}

export function scaling(s: Vec3): Affine {
  return [s[0], 0, 0, 0, 0, s[1], 0, 0, 0, 0, s[2], 0];
}

/** Counter-clockwise rotation about an axis, looking down the axis toward the origin. */
export function rotation(axis: Axis, deg: number): Affine {
  const rad = deg * Math.PI / 180;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  switch (axis) {
    case 'x': return [1, 0, 0, 0, 0, c, -s, 0, 0, s, c, 0];
    case 'y': return [c, 0, s, 0, 0, 1, 0, 0, -s, 0, c, 0];
    case 'z': return [c, -s, 0, 0, s, c, 0, 0, 0, 0, 1, 0];
  }
}

/** a ∘ b — the result applies b first, then a. */
export function multiply(a: Affine, b: Affine): Affine {
  const r = identity();
  for (let i = 0; i < 3; i++) {
    const row = i * 4;
    for (let j = 0; j < 4; j++) {
      let v = a[row] * b[j] + a[row + 1] * b[4 + j] + a[row + 2] * b[8 + j];
      if (j === 3) v += a[row + 3];
      r[row + j] = v;
    }
  }
  return r;
}

/** Compose left to right: compose(A, B, C) = A ∘ B ∘ C. */
export function compose(...ms: Affine[]): Affine {
  return ms.reduce((acc, m) => multiply(acc, m), identity());
}

export function apply(m: Affine, p: Vec3): Vec3 {
  return [
    m[0] * p[0] + m[1] * p[1] + m[2] * p[2] + m[3],
    m[4] * p[0] + m[5] * p[1] + m[6] * p[2] + m[7],
    m[8] * p[0] + m[9] * p[1] + m[10] * p[2] + m[11],
  ];
}

// ─── Transform ─────────────────────────────────────────────────

export interface TransformParams {
  /** Translation in world units. */
  translation: Vec3;
  /** Rotation about X, Y and Z in degrees; applied X first, then Y, then Z. */
  rotation: Vec3;
  /** Per-axis scale. No component may be zero. */
  scale: Vec3;
}

export const IDENTITY_TRANSFORM: Readonly<TransformParams> = {
  translation: [0, 0, 0],
  rotation: [0, 0, 0],
  scale: [1, 1, 1],
};

function copyParams(p: TransformParams): TransformParams {
  return {
    translation: [...p.translation],
    rotation: [...p.rotation],
    scale: [...p.scale],
  };
}

function forwardMatrix(p: TransformParams): Affine {
  return compose(
    translation(p.translation),
    rotation('z', p.rotation[2]),
    rotation('y', p.rotation[1]),
    rotation('x', p.rotation[0]),
    scaling(p.scale),
  );
}

function inverseMatrix(p: TransformParams): Affine {
  const s = p.scale;
  for (let i = 0; i < 3; i++) {
    if (s[i] === 0) {
      throw new InvalidShapeConfiguration(
        `Scale ${AXES[i]} is zero, so the world-to-local transform is undefined. ` +
        `Clamp scale inputs to a positive minimum before updating the shape.`
      );
    }
  }
  const t = p.translation;
  const r = p.rotation;
  return compose(
    scaling([1 / s[0], 1 / s[1], 1 / s[2]]),
    rotation('x', -r[0]),
    rotation('y', -r[1]),
    rotation('z', -r[2]),
    translation([-t[0], -t[1], -t[2]]),
  );
}

export class Transform {
  private params: TransformParams;
  private forward: Affine;
  private inverse: Affine;

  constructor(params: Partial<TransformParams> = {}) {
    const next = copyParams({ ...IDENTITY_TRANSFORM, ...params });
    this.inverse = inverseMatrix(next);
    this.forward = forwardMatrix(next);
    this.params = next;
  }

  get translation(): Vec3 { return [...this.params.translation]; }
  get rotation(): Vec3 { return [...this.params.rotation]; }
  get scale(): Vec3 { return [...this.params.scale]; }

  /**
   * Replace any subset of the parameters. Throws InvalidShapeConfiguration on
   * a zero scale component and leaves the previous transform in place.
   */
  set(patch: Partial<TransformParams>): void {
    const next = copyParams({ ...this.params, ...patch });
    const inverse = inverseMatrix(next);
    this.forward = forwardMatrix(next);
    this.inverse = inverse;
    this.params = next;
  }

  localToWorld(p: Vec3): Vec3 {
    return apply(this.forward, p);
  }

  worldToLocal(p: Vec3): Vec3 {
    return apply(this.inverse, p);
  }

  toJSON(): TransformParams {
    return copyParams(this.params);
  }
}
