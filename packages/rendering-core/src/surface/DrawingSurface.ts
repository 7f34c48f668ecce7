import type { Point } from "../math/types.js";
import type { DrawStyle } from "../scene/drawCommands.js";

/**
 * Pixel-level painting capability. Every coordinate handed to a surface has
 * already been through the viewport transform.
 */
export interface DrawingSurface {
  drawLine(a: Point, b: Point, style?: DrawStyle): void;
  drawPolyline(points: readonly Point[], closed: boolean, filled: boolean, style?: DrawStyle): void;
  drawArc(center: Point, radius: number, style?: DrawStyle): void;
}
