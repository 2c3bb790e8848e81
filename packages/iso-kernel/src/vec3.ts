/** Minimal 3D vectors — plain tuples for speed, helpers for clarity. */
export type Vec3 = [number, number, number];

/** Axis-aligned bounding box. */
export interface BoundingBox { min: Vec3; max: Vec3; }

export function vec3(x: number, y: number, z: number): Vec3 {
  return [x, y, z];
}

export function sub(a: Vec3, b: Vec3): Vec3 {
  return [a[0] - b[0], a[1] - b[1], a[2] - b[2]];
}

export function dot(a: Vec3, b: Vec3): number {
  return a[0] * b[0] + a[1] * b[1] + a[2] * b[2];
}

export function length(a: Vec3): number {
  return Math.sqrt(a[0] * a[0] + a[1] * a[1] + a[2] * a[2]);
}

export function distance(a: Vec3, b: Vec3): number {
  return length(sub(a, b));
}

export function cross(a: Vec3, b: Vec3): Vec3 {
  return [
    a[1] * b[2] - a[2] * b[1],
    a[2] * b[0] - a[0] * b[2],
    a[0] * b[1] - a[1] * b[0],
  ];
}

/** `a * (1 - t) + b * t`, componentwise. Same operand order every call so shared edges agree bit-for-bit. */
export function lerp(a: Vec3, b: Vec3, t: number): Vec3 {
  const u = 1 - t;
  return [a[0] * u + b[0] * t, a[1] * u + b[1] * t, a[2] * u + b[2] * t];
}

export function len2d(x: number, y: number): number {
  return Math.sqrt(x * x + y * y);
}

export function clamp(x: number, lo: number, hi: number): number {
  return Math.min(Math.max(x, lo), hi);
}

/** The 8 corners of a box, in no particular order. */
export function boxCorners(b: BoundingBox): Vec3[] {
  const corners: Vec3[] = [];
  for (const x of [b.min[0], b.max[0]])
    for (const y of [b.min[1], b.max[1]])
      for (const z of [b.min[2], b.max[2]])
        corners.push([x, y, z]);
  return corners;
}

/** Smallest box enclosing all points. Empty input gives an empty (inverted) box. */
export function enclose(points: Iterable<Vec3>): BoundingBox {
  const min: Vec3 = [Infinity, Infinity, Infinity];
  const max: Vec3 = [-Infinity, -Infinity, -Infinity];
  for (const p of points) {
    for (let i = 0; i < 3; i++) {
      if (p[i] < min[i]) min[i] = p[i];
      if (p[i] > max[i]) max[i] = p[i];
    }
  }
  return { min, max };
}
