import type { Box2, Vec2 } from "@vecta/geometry";

export const Region = {
  INSIDE: 0b0000,
  LEFT: 0b0001,
  RIGHT: 0b0010,
  BOTTOM: 0b0100,
  TOP: 0b1000
} as const;

/** 4-bit Cohen-Sutherland region code; a point is never both LEFT and RIGHT, nor TOP and BOTTOM. */
export function regionOf(p: Vec2, bounds: Box2): number {
  let code: number = Region.INSIDE;

  if (p.x < bounds.min.x) code |= Region.LEFT;
  else if (p.x > bounds.max.x) code |= Region.RIGHT;

  if (p.y > bounds.max.y) code |= Region.TOP;
  else if (p.y < bounds.min.y) code |= Region.BOTTOM;

  return code;
}
