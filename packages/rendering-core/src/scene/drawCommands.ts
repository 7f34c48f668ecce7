import type { Point } from "../math/types.js";

export type DrawStyle = {
  strokeColor?: string;
  fillColor?: string;
  lineWidth?: number;
};

export type DrawCommandBase = {
  /** Name of the scene object the command was generated from. */
  source?: string;
  style?: DrawStyle;
};

export type LineCommand = DrawCommandBase & {
  kind: "line";
  a: Point;
  b: Point;
};

export type PolylineCommand = DrawCommandBase & {
  kind: "polyline";
  points: Point[];
  closed: boolean;
  filled: boolean;
};

export type ArcCommand = DrawCommandBase & {
  kind: "arc";
  center: Point;
  radius: number;
};

export type DrawCommand = LineCommand | PolylineCommand | ArcCommand;
