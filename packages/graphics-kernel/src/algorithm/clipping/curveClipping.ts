import { Vec2, type Box2 } from "@vecta/geometry";
import { clipLine, type LineClipperRegistry } from "./lineClipping.js";
import { CLIP_EPSILON, type LineClippingMethod } from "./types.js";

/**
 * Clips a tessellated curve one segment at a time. Surviving segments that
 * share an endpoint are chained into one run; a segment that is clipped away
 * ends the run, and no bridge is drawn across the gap.
 */
export function clipCurve(
  vertices: readonly Vec2[],
  bounds: Box2,
  method: LineClippingMethod = "cohen-sutherland",
  registry?: LineClipperRegistry
): Vec2[][] {
  const runs: Vec2[][] = [];
  let run: Vec2[] | null = null;

  for (let i = 0; i + 1 < vertices.length; i++) {
    const clipped = clipLine({ start: vertices[i]!, end: vertices[i + 1]! }, bounds, method, registry);
    if (!clipped) {
      run = null;
      continue;
    }

    const last = run ? run[run.length - 1] : undefined;
    if (run && last && Vec2.equals(last, clipped.start, CLIP_EPSILON)) {
      run.push(clipped.end);
    } else {
      run = [clipped.start, clipped.end];
      runs.push(run);
    }
  }

  return runs;
}
