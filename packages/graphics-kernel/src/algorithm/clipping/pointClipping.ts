import { Box2, type Vec2 } from "@vecta/geometry";

/** Inclusive on every edge: boundary points are visible. */
export function clipPoint(p: Vec2, bounds: Box2): boolean {
  return Box2.contains(bounds, p);
}
