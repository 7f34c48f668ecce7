import type { Box2, Vec2 } from "@vecta/geometry";
import { Region, regionOf } from "./outcode.js";
import { MAX_CLIP_ITERATIONS, type Segment } from "./types.js";

// Boundaries are tested TOP, BOTTOM, RIGHT, LEFT. A zero delta along the
// slope's denominator means the segment runs along that boundary's direction
// and the other coordinate is kept.
function intersectBoundary(p0: Vec2, p1: Vec2, code: number, bounds: Box2): Vec2 {
  const dx = p1.x - p0.x;
  const dy = p1.y - p0.y;

  if (code & Region.TOP) {
    const y = bounds.max.y;
    return { x: dy === 0 ? p0.x : p0.x + (dx / dy) * (y - p0.y), y };
  }
  if (code & Region.BOTTOM) {
    const y = bounds.min.y;
    return { x: dy === 0 ? p0.x : p0.x + (dx / dy) * (y - p0.y), y };
  }
  if (code & Region.RIGHT) {
    const x = bounds.max.x;
    return { x, y: dx === 0 ? p0.y : p0.y + (dy / dx) * (x - p0.x) };
  }
  const x = bounds.min.x;
  return { x, y: dx === 0 ? p0.y : p0.y + (dy / dx) * (x - p0.x) };
}

export function cohenSutherlandClip(segment: Segment, bounds: Box2): Segment | null {
  let start = segment.start;
  let end = segment.end;
  let startCode = regionOf(start, bounds);
  let endCode = regionOf(end, bounds);

  for (let i = 0; i < MAX_CLIP_ITERATIONS; i++) {
    if ((startCode | endCode) === Region.INSIDE) return { start, end };
    if ((startCode & endCode) !== 0) return null;

    if (startCode !== Region.INSIDE) {
      start = intersectBoundary(start, end, startCode, bounds);
      startCode = regionOf(start, bounds);
    } else {
      end = intersectBoundary(start, end, endCode, bounds);
      endCode = regionOf(end, bounds);
    }
  }

  return null;
}
