import type { Box2, Vec2 } from "@vecta/geometry";

export type Segment = {
  readonly start: Vec2;
  readonly end: Vec2;
};

export const LINE_CLIPPING_METHODS = ["cohen-sutherland", "liang-barsky", "skala", "nicholl"] as const;

/**
 * Known line clipping methods. Only Cohen-Sutherland and Liang-Barsky ship an
 * implementation; the others are recognised names that fail when selected.
 */
export type LineClippingMethod = (typeof LINE_CLIPPING_METHODS)[number];

export type LineClipper = (segment: Segment, bounds: Box2) => Segment | null;

/** Upper bound on Cohen-Sutherland endpoint replacements for one segment. */
export const MAX_CLIP_ITERATIONS = 16;

/** Distance under which two clipped endpoints count as the same point. */
export const CLIP_EPSILON = 1e-9;

export function isLineClippingMethod(value: string): value is LineClippingMethod {
  return LINE_CLIPPING_METHODS.some((m) => m === value);
}
