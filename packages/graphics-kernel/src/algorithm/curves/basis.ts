import type { Vec2 } from "@vecta/geometry";
import { ValidationError } from "../../errors.js";

export type CurveBasis = "bezier" | "bspline" | "polyline";

export type Mat4x4 = readonly [
  readonly [number, number, number, number],
  readonly [number, number, number, number],
  readonly [number, number, number, number],
  readonly [number, number, number, number]
];

export type Cubic = readonly [number, number, number, number];

export const DEFAULT_CURVE_STEPS = 20;

export const BEZIER_BASIS: Mat4x4 = [
  [-1, 3, -3, 1],
  [3, -6, 3, 0],
  [-3, 3, 0, 0],
  [1, 0, 0, 0]
];

// Uniform cubic B-spline basis, still to be divided by 6.
export const BSPLINE_BASIS: Mat4x4 = [
  [-1, 3, -3, 1],
  [3, -6, 3, 0],
  [-3, 0, 3, 0],
  [1, 4, 1, 0]
];

/** Row vector times matrix: v · M. */
export function rowTimesMatrix(v: Cubic, m: Mat4x4): Cubic {
  const column = (c: 0 | 1 | 2 | 3) => v[0] * m[0][c] + v[1] * m[1][c] + v[2] * m[2][c] + v[3] * m[3][c];
  return [column(0), column(1), column(2), column(3)];
}

/** Matrix times column vector: M · v. */
export function matrixTimesColumn(m: Mat4x4, v: Cubic, scale = 1): Cubic {
  const row = (r: readonly [number, number, number, number]) =>
    (r[0] * v[0] + r[1] * v[1] + r[2] * v[2] + r[3] * v[3]) * scale;
  return [row(m[0]), row(m[1]), row(m[2]), row(m[3])];
}

export function xs(points: readonly [Vec2, Vec2, Vec2, Vec2]): Cubic {
  return [points[0].x, points[1].x, points[2].x, points[3].x];
}

export function ys(points: readonly [Vec2, Vec2, Vec2, Vec2]): Cubic {
  return [points[0].y, points[1].y, points[2].y, points[3].y];
}

/** Four consecutive control points starting at `start`, or null past the end. */
export function window4(controls: readonly Vec2[], start: number): [Vec2, Vec2, Vec2, Vec2] | null {
  const a = controls[start];
  const b = controls[start + 1];
  const c = controls[start + 2];
  const d = controls[start + 3];
  if (!a || !b || !c || !d) return null;
  return [a, b, c, d];
}

export function validateControlPoints(basis: CurveBasis, controls: readonly Vec2[]): void {
  if (basis === "polyline") {
    if (controls.length < 3) {
      throw new ValidationError(`A polyline curve needs at least 3 vertices, got ${controls.length}`);
    }
    return;
  }

  if (controls.length < 4) {
    throw new ValidationError(`A ${basis} curve needs at least 4 control points, got ${controls.length}`);
  }
  if (basis === "bezier" && (controls.length - 1) % 3 !== 0) {
    throw new ValidationError(
      `A bezier curve needs 3k + 1 control points (segments share endpoints), got ${controls.length}`
    );
  }
}

export function validateSteps(steps: number): void {
  if (!Number.isInteger(steps) || steps < 1) {
    throw new ValidationError(`Curve steps must be a positive integer, got ${steps}`);
  }
}
