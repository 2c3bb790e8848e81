/**
 * Shapes — signed distance primitives with an affine transform.
 *
 * Primitives form a closed tagged variant. Each kind registers its pure
 * distance/bounds functions in PRIMITIVES; Shape pairs one primitive with a
 * Transform and answers world-space queries.
 *
 *   const s = new Shape({ kind: 'torus', majorRadius: 0.7, minorRadius: 0.3 });
 *   s.setTransform({ rotation: [90, 0, 0] });
 *   s.worldDistance([0, -0.7, 0]);  // ≈ -0.3, ring now in the XY plane
 *
 * Distances are negative inside. Formulas follow Quilez's exact SDFs.
 */

import { type Vec3, type BoundingBox, vec3, length, len2d, clamp, boxCorners, enclose } from './vec3.js';
import { Transform, type TransformParams } from './transform.js';

// ─── Primitive parameters ──────────────────────────────────────

export interface ShapeParamMap {
  sphere: { radius: number };
  box: { width: number; height: number; depth: number };
  /** Ring in the XZ plane around the Y axis. */
  torus: { majorRadius: number; minorRadius: number };
  /** Axis along Y: apex at +height/2, base disc at -height/2. */
  cone: { radius: number; height: number };
}

export type ShapeKind = keyof ShapeParamMap;

export const SHAPE_KINDS = ['sphere', 'box', 'torus', 'cone'] as const satisfies readonly ShapeKind[];

/** Tagged parameter record. `ShapeParams` alone is the union over every kind. */
export type ShapeParams<K extends ShapeKind = ShapeKind> = {
  [P in K]: { kind: P } & ShapeParamMap[P];
}[K];

export interface Primitive<K extends ShapeKind> {
  /** Signed distance in the shape's local frame. */
  distance(params: ShapeParams<K>, p: Vec3): number;
  /** Tight local-space bounds. */
  bounds(params: ShapeParams<K>): BoundingBox;
  /** Human-readable name for readback. */
  describe(params: ShapeParams<K>): string;
}

// ─── Primitive table ───────────────────────────────────────────

export const PRIMITIVES: { [K in ShapeKind]: Primitive<K> } = {
  sphere: {
    distance: ({ radius }, p) => length(p) - radius,
    bounds: ({ radius: r }) => ({ min: vec3(-r, -r, -r), max: vec3(r, r, r) }),
    describe: ({ radius }) => `sphere(r=${radius})`,
  },

  box: {
    distance: ({ width, height, depth }, p) => {
      const qx = Math.abs(p[0]) - width / 2;
      const qy = Math.abs(p[1]) - height / 2;
      const qz = Math.abs(p[2]) - depth / 2;
      return (
        length([Math.max(qx, 0), Math.max(qy, 0), Math.max(qz, 0)]) +
        Math.min(Math.max(qx, Math.max(qy, qz)), 0)
      );
    },
    bounds: ({ width, height, depth }) => {
      const hx = width / 2, hy = height / 2, hz = depth / 2;
      return { min: vec3(-hx, -hy, -hz), max: vec3(hx, hy, hz) };
    },
    describe: ({ width, height, depth }) => `box(${width}, ${height}, ${depth})`,
  },

  torus: {
    distance: ({ majorRadius, minorRadius }, p) => {
      const qx = len2d(p[0], p[2]) - majorRadius;
      return len2d(qx, p[1]) - minorRadius;
    },
    bounds: ({ majorRadius, minorRadius }) => {
      const rw = majorRadius + minorRadius;
      return { min: vec3(-rw, -minorRadius, -rw), max: vec3(rw, minorRadius, rw) };
    },
    describe: ({ majorRadius, minorRadius }) => `torus(R=${majorRadius}, r=${minorRadius})`,
  },

  cone: {
    distance: ({ radius, height }, p) => {
      // Profile point w in (radial, axial) space, measured from the apex.
      // q runs from the apex to the base rim.
      const qx = radius, qy = -height;
      const wx = len2d(p[0], p[2]);
      const wy = p[1] - height / 2;

      // Closest point on the slant edge, and on the base segment
      const tSlant = clamp((wx * qx + wy * qy) / (qx * qx + qy * qy), 0, 1);
      const tBase = clamp(wx / qx, 0, 1);
      const ax = wx - qx * tSlant, ay = wy - qy * tSlant;
      const bx = wx - qx * tBase, by = wy - qy;

      const k = Math.sign(qy);
      const d = Math.min(ax * ax + ay * ay, bx * bx + by * by);
      const s = Math.max(k * (wx * qy - wy * qx), k * (wy - qy));
      return Math.sqrt(d) * Math.sign(s);
    },
    bounds: ({ radius: r, height }) => {
      const hh = height / 2;
      return { min: vec3(-r, -hh, -r), max: vec3(r, hh, r) };
    },
    describe: ({ radius, height }) => `cone(r=${radius}, h=${height})`,
  },
};

/** Parameters the original settings panel starts each kind with. */
export const DEFAULT_SHAPES: { [K in ShapeKind]: ShapeParams<K> } = {
  sphere: { kind: 'sphere', radius: 1 },
  box: { kind: 'box', width: 2, height: 2, depth: 2 },
  torus: { kind: 'torus', majorRadius: 0.7, minorRadius: 0.3 },
  cone: { kind: 'cone', radius: 1, height: 2 },
};

function primitiveFor<K extends ShapeKind>(params: ShapeParams<K>): Primitive<K> {
  const kind: K = params.kind;
  return PRIMITIVES[kind];
}

export function localDistance<K extends ShapeKind>(params: ShapeParams<K>, p: Vec3): number {
  return primitiveFor(params).distance(params, p);
}

export function localBounds<K extends ShapeKind>(params: ShapeParams<K>): BoundingBox {
  return primitiveFor(params).bounds(params);
}

export function describeShape<K extends ShapeKind>(params: ShapeParams<K>): string {
  return primitiveFor(params).describe(params);
}

// ─── Shape ─────────────────────────────────────────────────────

/** Anything a VoxelGrid can sample. */
export interface DistanceField {
  worldDistance(p: Vec3): number;
}

export interface ShapeReadback {
  name: string;
  kind: ShapeKind;
  params: ShapeParams;
  transform: TransformParams;
  worldBounds: BoundingBox;
}

export class Shape implements DistanceField {
  private current: ShapeParams;
  private readonly transform: Transform;

  constructor(params: ShapeParams, transform: Partial<TransformParams> = {}) {
    this.current = { ...params };
    this.transform = new Transform(transform);
  }

  get kind(): ShapeKind { return this.current.kind; }

  get params(): ShapeParams { return { ...this.current }; }

  get transformParams(): TransformParams { return this.transform.toJSON(); }

  /** Swap the primitive (kind and parameters). The transform is kept. */
  setParams(params: ShapeParams): void {
    this.current = { ...params };
  }

  /** Throws InvalidShapeConfiguration if the patch leaves a zero scale component. */
  setTransform(patch: Partial<TransformParams>): void {
    this.transform.set(patch);
  }

  localDistance(p: Vec3): number {
    return localDistance(this.current, p);
  }

  localBounds(): BoundingBox {
    return localBounds(this.current);
  }

  localToWorld(p: Vec3): Vec3 {
    return this.transform.localToWorld(p);
  }

  worldToLocal(p: Vec3): Vec3 {
    return this.transform.worldToLocal(p);
  }

  /** Enclosing world-space box of the 8 transformed local-bounds corners. */
  worldBounds(): BoundingBox {
    return enclose(boxCorners(this.localBounds()).map((c) => this.localToWorld(c)));
  }

  worldDistance(p: Vec3): number {
    return this.localDistance(this.worldToLocal(p));
  }

  describe(): string {
    return describeShape(this.current);
  }

  readback(): ShapeReadback {
    return {
      name: this.describe(),
      kind: this.kind,
      params: this.params,
      transform: this.transformParams,
      worldBounds: this.worldBounds(),
    };
  }
}
