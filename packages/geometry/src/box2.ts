import type { Vec2 } from './vec2.js';

/** Axis-aligned rectangle; clip boundaries are expressed as one of these. */
export interface Box2 {
  min: Vec2;
  max: Vec2;
}

export const Box2 = {
  create: (min: Vec2, max: Vec2): Box2 => ({
    min: { x: min.x, y: min.y },
    max: { x: max.x, y: max.y }
  }),

  fromPoints: (points: readonly Vec2[]): Box2 => {
    let minX = Infinity;
    let minY = Infinity;
    let maxX = -Infinity;
    let maxY = -Infinity;

    for (const p of points) {
      if (p.x < minX) minX = p.x;
      if (p.y < minY) minY = p.y;
      if (p.x > maxX) maxX = p.x;
      if (p.y > maxY) maxY = p.y;
    }

    return {
      min: { x: minX, y: minY },
      max: { x: maxX, y: maxY },
    };
  },

  /** Boundary points count as inside. */
  contains: (box: Box2, p: Vec2): boolean => {
    return (
      p.x >= box.min.x &&
      p.x <= box.max.x &&
      p.y >= box.min.y &&
      p.y <= box.max.y
    );
  },

  intersects: (a: Box2, b: Box2): boolean => {
    return (
      a.min.x <= b.max.x &&
      a.max.x >= b.min.x &&
      a.min.y <= b.max.y &&
      a.max.y >= b.min.y
    );
  },

  shrink: (box: Box2, margin: number): Box2 => ({
    min: { x: box.min.x + margin, y: box.min.y + margin },
    max: { x: box.max.x - margin, y: box.max.y - margin }
  }),

  width: (box: Box2): number => box.max.x - box.min.x,
  height: (box: Box2): number => box.max.y - box.min.y,
  center: (box: Box2): Vec2 => ({
      x: (box.min.x + box.max.x) / 2,
      y: (box.min.y + box.max.y) / 2
  })
};

/** The normalized device square [-1, 1] x [-1, 1]. */
export const NDC_BOUNDS: Box2 = {
  min: { x: -1, y: -1 },
  max: { x: 1, y: 1 }
};
