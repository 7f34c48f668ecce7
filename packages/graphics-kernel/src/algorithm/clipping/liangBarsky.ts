import type { Box2 } from "@vecta/geometry";
import type { Segment } from "./types.js";

/**
 * Parametric clip of P(t) = P0 + t (P1 - P0), t in [0, 1]. An axis the segment
 * is parallel to either rejects it outright or adds no constraint.
 */
export function liangBarskyClip(segment: Segment, bounds: Box2): Segment | null {
  const { start, end } = segment;

  const p1 = start.x - end.x;
  const p2 = -p1;
  const p3 = start.y - end.y;
  const p4 = -p3;

  const q1 = start.x - bounds.min.x;
  const q2 = bounds.max.x - start.x;
  const q3 = start.y - bounds.min.y;
  const q4 = bounds.max.y - start.y;

  const negatives = [0];
  const positives = [1];

  if (p1 === 0) {
    if (q1 < 0 || q2 < 0) return null;
  } else {
    const r1 = q1 / p1;
    const r2 = q2 / p2;
    if (p1 < 0) {
      negatives.push(r1);
      positives.push(r2);
    } else {
      negatives.push(r2);
      positives.push(r1);
    }
  }

  if (p3 === 0) {
    if (q3 < 0 || q4 < 0) return null;
  } else {
    const r3 = q3 / p3;
    const r4 = q4 / p4;
    if (p3 < 0) {
      negatives.push(r3);
      positives.push(r4);
    } else {
      negatives.push(r4);
      positives.push(r3);
    }
  }

  const tEntry = Math.max(...negatives);
  const tExit = Math.min(...positives);
  if (tEntry > tExit) return null;

  // t = 0 and t = 1 return the original endpoints untouched.
  return {
    start: tEntry === 0 ? start : { x: start.x + p2 * tEntry, y: start.y + p4 * tEntry },
    end: tExit === 1 ? end : { x: start.x + p2 * tExit, y: start.y + p4 * tExit }
  };
}
