import { Mat3, Vec2 } from "@vecta/geometry";
import {
  centroidOf,
  createCurve,
  createLine,
  createPoint,
  createPolygon,
  type GraphicObject
} from "./graphicObject.js";

/** Pivot used when rotating objects. */
export type RotationReference =
  | { kind: "center" }
  | { kind: "origin" }
  | { kind: "absolute"; point: Vec2 };

/**
 * Maps the object's geometry through `m` and rebuilds it with its factory, so
 * a transform that collapses a line or writes a non-finite coordinate throws
 * `ValidationError` instead of producing a degenerate object.
 */
export function transformObject<T extends GraphicObject>(obj: T, m: Mat3): T;
export function transformObject(obj: GraphicObject, m: Mat3): GraphicObject {
  switch (obj.kind) {
    case "point":
      return createPoint(Mat3.apply(m, obj.position), obj.name);
    case "line":
      return createLine(Mat3.apply(m, obj.start), Mat3.apply(m, obj.end), obj.name);
    case "polygon":
      return createPolygon(Mat3.applyAll(m, obj.vertices), { name: obj.name, filled: obj.filled });
    case "curve":
      // Affine maps commute with tessellation.
      return createCurve(Mat3.applyAll(m, obj.controlPoints), {
        name: obj.name,
        basis: obj.basis,
        steps: obj.steps
      });
  }
}

export function translateObject<T extends GraphicObject>(obj: T, offset: Vec2): T {
  return transformObject(obj, Mat3.translation(offset.x, offset.y));
}

/** Scales about the object's own centroid. */
export function scaleObject<T extends GraphicObject>(obj: T, factor: Vec2): T {
  return transformObject(obj, Mat3.aroundPivot(Mat3.scale(factor.x, factor.y), centroidOf(obj)));
}

export function rotationPivot(obj: GraphicObject, reference: RotationReference): Vec2 {
  switch (reference.kind) {
    case "center":
      return centroidOf(obj);
    case "origin":
      return Vec2.create(0, 0);
    case "absolute":
      return reference.point;
  }
}

export function rotateObject<T extends GraphicObject>(obj: T, angleDegrees: number, reference: RotationReference): T {
  return transformObject(obj, Mat3.aroundPivot(Mat3.rotation(angleDegrees), rotationPivot(obj, reference)));
}
