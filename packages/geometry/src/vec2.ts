// Homogeneous 2D/3D points. The weight component is always 1 and is supplied
// by Mat3/Mat4 when a transform is applied, so the records only carry x/y(/z).
export interface Vec2 {
  readonly x: number;
  readonly y: number;
}

export const Vec2 = {
  create: (x: number = 0, y: number = 0): Vec2 => ({ x, y }),

  add: (a: Vec2, b: Vec2): Vec2 => ({ x: a.x + b.x, y: a.y + b.y }),

  sub: (a: Vec2, b: Vec2): Vec2 => ({ x: a.x - b.x, y: a.y - b.y }),

  mul: (v: Vec2, s: number): Vec2 => ({ x: v.x * s, y: v.y * s }),

  neg: (v: Vec2): Vec2 => ({ x: -v.x, y: -v.y }),

  dot: (a: Vec2, b: Vec2): number => a.x * b.x + a.y * b.y,

  cross: (a: Vec2, b: Vec2): number => a.x * b.y - a.y * b.x, // 2D Cross Product (Scalar)

  len: (v: Vec2): number => Math.hypot(v.x, v.y),

  dist: (a: Vec2, b: Vec2): number => Math.hypot(a.x - b.x, a.y - b.y),

  lerp: (a: Vec2, b: Vec2, t: number): Vec2 => ({
    x: a.x + (b.x - a.x) * t,
    y: a.y + (b.y - a.y) * t
  }),

  equals: (a: Vec2, b: Vec2, epsilon: number = 0): boolean => {
    if (epsilon === 0) return a.x === b.x && a.y === b.y;
    return Math.abs(a.x - b.x) <= epsilon && Math.abs(a.y - b.y) <= epsilon;
  },

  /** Arithmetic mean of the points; the origin for an empty list. */
  centroid: (points: readonly Vec2[]): Vec2 => {
    if (points.length === 0) return { x: 0, y: 0 };
    let sx = 0;
    let sy = 0;
    for (const p of points) {
      sx += p.x;
      sy += p.y;
    }
    return { x: sx / points.length, y: sy / points.length };
  }
};

export interface Vec3 {
  readonly x: number;
  readonly y: number;
  readonly z: number;
}

export const Vec3 = {
  create: (x: number = 0, y: number = 0, z: number = 0): Vec3 => ({ x, y, z }),

  add: (a: Vec3, b: Vec3): Vec3 => ({ x: a.x + b.x, y: a.y + b.y, z: a.z + b.z }),

  sub: (a: Vec3, b: Vec3): Vec3 => ({ x: a.x - b.x, y: a.y - b.y, z: a.z - b.z }),

  mul: (v: Vec3, s: number): Vec3 => ({ x: v.x * s, y: v.y * s, z: v.z * s }),

  neg: (v: Vec3): Vec3 => ({ x: -v.x, y: -v.y, z: -v.z }),

  equals: (a: Vec3, b: Vec3, epsilon: number = 0): boolean => {
    if (epsilon === 0) return a.x === b.x && a.y === b.y && a.z === b.z;
    return (
      Math.abs(a.x - b.x) <= epsilon &&
      Math.abs(a.y - b.y) <= epsilon &&
      Math.abs(a.z - b.z) <= epsilon
    );
  },

  centroid: (points: readonly Vec3[]): Vec3 => {
    if (points.length === 0) return { x: 0, y: 0, z: 0 };
    let sx = 0;
    let sy = 0;
    let sz = 0;
    for (const p of points) {
      sx += p.x;
      sy += p.y;
      sz += p.z;
    }
    const n = points.length;
    return { x: sx / n, y: sy / n, z: sz / n };
  }
};
