import type { Vec2 } from "@vecta/geometry";
import {
  BSPLINE_BASIS,
  DEFAULT_CURVE_STEPS,
  matrixTimesColumn,
  validateControlPoints,
  validateSteps,
  window4,
  xs,
  ys,
  type Cubic
} from "./basis.js";

type Differences = { value: number; d1: number; d2: number; d3: number };

/** FD(delta) · C for cubic coefficients C = [a, b, c, d] of a t^3 + b t^2 + c t + d. */
function forwardDifferences(c: Cubic, delta: number): Differences {
  const d2 = delta * delta;
  const d3 = d2 * delta;
  return {
    value: c[3],
    d1: d3 * c[0] + d2 * c[1] + delta * c[2],
    d2: 6 * d3 * c[0] + 2 * d2 * c[1],
    d3: 6 * d3 * c[0]
  };
}

/**
 * Uniform cubic B-spline over a sliding window of four control points,
 * evaluated by forward differences. Difference state is rebuilt for every
 * window so rounding error cannot accumulate across segments.
 */
export function tessellateBSpline(controls: readonly Vec2[], steps: number = DEFAULT_CURVE_STEPS): Vec2[] {
  validateControlPoints("bspline", controls);
  validateSteps(steps);

  const points: Vec2[] = [];
  const delta = 1 / steps;

  for (let i = 3; i < controls.length; i++) {
    const g = window4(controls, i - 3);
    if (!g) break;

    const x = forwardDifferences(matrixTimesColumn(BSPLINE_BASIS, xs(g), 1 / 6), delta);
    const y = forwardDifferences(matrixTimesColumn(BSPLINE_BASIS, ys(g), 1 / 6), delta);

    if (i === 3) points.push({ x: x.value, y: y.value });

    for (let k = 0; k < steps; k++) {
      x.value += x.d1;
      x.d1 += x.d2;
      x.d2 += x.d3;

      y.value += y.d1;
      y.d1 += y.d2;
      y.d2 += y.d3;

      points.push({ x: x.value, y: y.value });
    }
  }

  return points;
}
