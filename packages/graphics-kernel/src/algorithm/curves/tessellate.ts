import type { Vec2 } from "@vecta/geometry";
import { DEFAULT_CURVE_STEPS, validateControlPoints, type CurveBasis } from "./basis.js";
import { tessellateBezier } from "./bezier.js";
import { tessellateBSpline } from "./bspline.js";

export function tessellate(basis: CurveBasis, controls: readonly Vec2[], steps: number = DEFAULT_CURVE_STEPS): Vec2[] {
  switch (basis) {
    case "bezier":
      return tessellateBezier(controls, steps);
    case "bspline":
      return tessellateBSpline(controls, steps);
    case "polyline":
      validateControlPoints("polyline", controls);
      return controls.map((p) => ({ x: p.x, y: p.y }));
  }
}
