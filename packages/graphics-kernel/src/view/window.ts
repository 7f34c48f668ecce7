import { Box2, Mat3, Vec2 } from "@vecta/geometry";
import { ValidationError } from "../errors.js";

/**
 * The viewed region of the world: an axis-aligned rectangle in its own frame,
 * rotated by `angle` degrees about its centre.
 */
export type Window = {
  readonly min: Vec2;
  readonly max: Vec2;
  readonly angle: number;
};

export type Size = { width: number; height: number };

function create(min: Vec2, max: Vec2, angle = 0): Window {
  if (![min.x, min.y, max.x, max.y, angle].every(Number.isFinite)) {
    throw new ValidationError("Window corners and angle must be finite");
  }
  if (!(max.x > min.x) || !(max.y > min.y)) {
    throw new ValidationError(
      `Window max (${max.x}, ${max.y}) must exceed min (${min.x}, ${min.y}) on both axes`
    );
  }
  return { min: { x: min.x, y: min.y }, max: { x: max.x, y: max.y }, angle };
}

function center(w: Window): Vec2 {
  return { x: (w.min.x + w.max.x) / 2, y: (w.min.y + w.max.y) / 2 };
}

function width(w: Window): number {
  return w.max.x - w.min.x;
}

function height(w: Window): number {
  return w.max.y - w.min.y;
}

export const Window = {
  create,
  center,
  width,
  height,

  /** The unrotated rectangle, for clipping geometry already brought into the window frame. */
  bounds: (w: Window): Box2 => Box2.create(w.min, w.max),

  /** Moves both corners; the angle is kept. */
  translate: (w: Window, offset: Vec2): Window =>
    create(Vec2.add(w.min, offset), Vec2.add(w.max, offset), w.angle),

  /** Scales both corners about the centre: factor < 1 zooms in, > 1 zooms out. */
  zoom: (w: Window, factor: number): Window => {
    if (!Number.isFinite(factor) || factor <= 0) {
      throw new ValidationError(`Zoom factor must be a positive number, got ${factor}`);
    }
    const c = center(w);
    const m = Mat3.aroundPivot(Mat3.scale(factor, factor), c);
    return create(Mat3.apply(m, w.min), Mat3.apply(m, w.max), w.angle);
  },

  /** Accumulates into the angle; corners do not move. */
  rotate: (w: Window, deltaDegrees: number): Window => create(w.min, w.max, w.angle + deltaDegrees),

  /** A window the size of the device area, centred on the world origin. */
  fromViewportSize: (size: Size): Window =>
    create({ x: -size.width / 2, y: -size.height / 2 }, { x: size.width / 2, y: size.height / 2 }),

  /** Keeps the world-per-pixel ratio when the device area changes size. */
  resizeProportionally: (w: Window, previous: Size, next: Size): Window => {
    if (previous.width <= 0 || previous.height <= 0 || next.width <= 0 || next.height <= 0) {
      throw new ValidationError("Viewport sizes must be positive to resize the window");
    }
    const sx = next.width / previous.width;
    const sy = next.height / previous.height;
    return create({ x: w.min.x * sx, y: w.min.y * sy }, { x: w.max.x * sx, y: w.max.y * sy }, w.angle);
  },

  /** Rotates an offset given along the window's own axes into world coordinates. */
  toWorldOffset: (w: Window, local: Vec2): Vec2 => Mat3.apply(Mat3.rotation(w.angle), local),

  /** World-space corners in counter-clockwise order starting at min. */
  corners: (w: Window): Vec2[] => {
    const m = Mat3.aroundPivot(Mat3.rotation(w.angle), center(w));
    return Mat3.applyAll(m, [
      w.min,
      { x: w.max.x, y: w.min.y },
      w.max,
      { x: w.min.x, y: w.max.y }
    ]);
  }
};
