import { Box2, Vec2 } from "@vecta/geometry";
import { ValidationError } from "../errors.js";
import type { Size } from "./window.js";

/** Device-space rectangle the window is mapped onto; y grows downward. */
export type Viewport = {
  readonly min: Vec2;
  readonly max: Vec2;
};

function create(min: Vec2, max: Vec2): Viewport {
  if (!(max.x > min.x) || !(max.y > min.y)) {
    throw new ValidationError(
      `Viewport (${min.x}, ${min.y})-(${max.x}, ${max.y}) must have a positive width and height`
    );
  }
  return { min: { x: min.x, y: min.y }, max: { x: max.x, y: max.y } };
}

export const Viewport = {
  create,

  fromSize: (size: Size): Viewport => create({ x: 0, y: 0 }, { x: size.width, y: size.height }),

  /** Shrinks every side by `margin` device units. */
  withMargin: (vp: Viewport, margin: number): Viewport => {
    const inner = Box2.shrink(vp, margin);
    return create(inner.min, inner.max);
  },

  width: (vp: Viewport): number => vp.max.x - vp.min.x,
  height: (vp: Viewport): number => vp.max.y - vp.min.y,
  center: (vp: Viewport): Vec2 => Box2.center(vp),

  /** Closed outline of the viewport, for drawing its frame. */
  outline: (vp: Viewport): Vec2[] => [
    { x: vp.min.x, y: vp.min.y },
    { x: vp.max.x, y: vp.min.y },
    { x: vp.max.x, y: vp.max.y },
    { x: vp.min.x, y: vp.max.y }
  ]
};
