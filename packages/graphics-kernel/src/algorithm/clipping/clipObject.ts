import type { Box2, Vec2 } from "@vecta/geometry";
import type { GraphicObject } from "../../model/graphicObject.js";
import { clipCurve } from "./curveClipping.js";
import { clipLine, type LineClipperRegistry } from "./lineClipping.js";
import { clipPoint } from "./pointClipping.js";
import { clipPolygon } from "./polygonClipping.js";
import type { LineClippingMethod } from "./types.js";

/** The visible part of an object, in the same space as the vertices that were clipped. */
export type ClippedShape =
  | { kind: "point"; position: Vec2 }
  | { kind: "line"; start: Vec2; end: Vec2 }
  | { kind: "polygon"; vertices: Vec2[]; filled: boolean }
  | { kind: "curve"; runs: Vec2[][] };

export type ClipOptions = {
  method?: LineClippingMethod;
  registry?: LineClipperRegistry;
};

/**
 * Clips `vertices` (the object's vertices in clip space, normally its
 * normalized vertices) against `bounds`. Returns null when nothing is visible.
 */
export function clipObject(
  obj: GraphicObject,
  vertices: readonly Vec2[],
  bounds: Box2,
  options: ClipOptions = {}
): ClippedShape | null {
  const method = options.method ?? "cohen-sutherland";

  switch (obj.kind) {
    case "point": {
      const position = vertices[0];
      if (!position || !clipPoint(position, bounds)) return null;
      return { kind: "point", position };
    }
    case "line": {
      const start = vertices[0];
      const end = vertices[1];
      if (!start || !end) return null;
      const clipped = clipLine({ start, end }, bounds, method, options.registry);
      return clipped ? { kind: "line", start: clipped.start, end: clipped.end } : null;
    }
    case "polygon": {
      const clipped = clipPolygon(vertices, bounds);
      return clipped.length > 0 ? { kind: "polygon", vertices: clipped, filled: obj.filled } : null;
    }
    case "curve": {
      const runs = clipCurve(vertices, bounds, method, options.registry);
      return runs.length > 0 ? { kind: "curve", runs } : null;
    }
  }
}
