import type { DrawStyle } from "@vecta/rendering-core";

/** Radius, in device units, of the disc drawn for a point object. */
export const POINT_RADIUS = 3;

export const EDITOR_COLORS = {
  OBJECT: "#1f1f1f",
  FILL: "#4a90d9",
  VIEWPORT_FRAME: "#d0021b"
};

export const LINE_WIDTHS = {
  OBJECT: 1,
  VIEWPORT_FRAME: 2
};

export const OBJECT_STYLE: DrawStyle = {
  strokeColor: EDITOR_COLORS.OBJECT,
  fillColor: EDITOR_COLORS.FILL,
  lineWidth: LINE_WIDTHS.OBJECT
};

export const FRAME_STYLE: DrawStyle = {
  strokeColor: EDITOR_COLORS.VIEWPORT_FRAME,
  lineWidth: LINE_WIDTHS.VIEWPORT_FRAME
};
