import type { Vec2 } from "@vecta/geometry";
import { BEZIER_BASIS, DEFAULT_CURVE_STEPS, rowTimesMatrix, validateControlPoints, validateSteps, window4 } from "./basis.js";

/**
 * Chained cubic Bezier segments; segment k uses controls [3k .. 3k+3].
 * Each segment is sampled at `steps` uniform intervals of t and the shared
 * joint sample is emitted once.
 */
export function tessellateBezier(controls: readonly Vec2[], steps: number = DEFAULT_CURVE_STEPS): Vec2[] {
  validateControlPoints("bezier", controls);
  validateSteps(steps);

  const points: Vec2[] = [];
  const segments = (controls.length - 1) / 3;

  for (let k = 0; k < segments; k++) {
    const g = window4(controls, k * 3);
    if (!g) break;

    for (let i = k === 0 ? 0 : 1; i <= steps; i++) {
      const t = i / steps;
      // Blend weights first: at t = 0 and t = 1 they are exactly [1,0,0,0] and [0,0,0,1].
      const w = rowTimesMatrix([t * t * t, t * t, t, 1], BEZIER_BASIS);
      points.push({
        x: w[0] * g[0].x + w[1] * g[1].x + w[2] * g[2].x + w[3] * g[3].x,
        y: w[0] * g[0].y + w[1] * g[1].y + w[2] * g[2].y + w[3] * g[3].y
      });
    }
  }

  return points;
}
