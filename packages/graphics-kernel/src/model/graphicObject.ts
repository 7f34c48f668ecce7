import { Vec2 } from "@vecta/geometry";
import { ValidationError } from "../errors.js";
import { DEFAULT_CURVE_STEPS, validateControlPoints, type CurveBasis } from "../algorithm/curves/basis.js";
import { tessellate } from "../algorithm/curves/tessellate.js";

export type PointObject = {
  readonly kind: "point";
  readonly name: string;
  readonly position: Vec2;
};

export type LineObject = {
  readonly kind: "line";
  readonly name: string;
  readonly start: Vec2;
  readonly end: Vec2;
};

export type PolygonObject = {
  readonly kind: "polygon";
  readonly name: string;
  /** Implicitly closed: the last vertex connects back to the first. */
  readonly vertices: readonly Vec2[];
  readonly filled: boolean;
};

export type CurveObject = {
  readonly kind: "curve";
  readonly name: string;
  readonly basis: CurveBasis;
  readonly controlPoints: readonly Vec2[];
  readonly steps: number;
  /** Tessellated polyline derived from the control points. */
  readonly vertices: readonly Vec2[];
};

export type GraphicObject = PointObject | LineObject | PolygonObject | CurveObject;

export type GraphicObjectKind = GraphicObject["kind"];

function assertFinite(points: readonly Vec2[], what: string): void {
  for (const p of points) {
    if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
      throw new ValidationError(`${what} has a non-finite coordinate (${p.x}, ${p.y})`);
    }
  }
}

function copy(points: readonly Vec2[]): Vec2[] {
  return points.map((p) => ({ x: p.x, y: p.y }));
}

export function createPoint(position: Vec2, name = ""): PointObject {
  assertFinite([position], "Point");
  return { kind: "point", name, position: { x: position.x, y: position.y } };
}

export function createLine(start: Vec2, end: Vec2, name = ""): LineObject {
  assertFinite([start, end], "Line");
  if (Vec2.equals(start, end)) {
    throw new ValidationError(`Line "${name}" has coincident start and end (${start.x}, ${start.y})`);
  }
  return { kind: "line", name, start: { x: start.x, y: start.y }, end: { x: end.x, y: end.y } };
}

export function createPolygon(vertices: readonly Vec2[], options: { name?: string; filled?: boolean } = {}): PolygonObject {
  const name = options.name ?? "";
  if (vertices.length < 3) {
    throw new ValidationError(`Polygon "${name}" needs at least 3 vertices, got ${vertices.length}`);
  }
  assertFinite(vertices, "Polygon");
  return { kind: "polygon", name, vertices: copy(vertices), filled: options.filled ?? false };
}

export function createCurve(
  controlPoints: readonly Vec2[],
  options: { name?: string; basis?: CurveBasis; steps?: number } = {}
): CurveObject {
  const basis = options.basis ?? "bezier";
  const steps = options.steps ?? DEFAULT_CURVE_STEPS;
  validateControlPoints(basis, controlPoints);
  assertFinite(controlPoints, "Curve");
  return {
    kind: "curve",
    name: options.name ?? "",
    basis,
    controlPoints: copy(controlPoints),
    steps,
    vertices: tessellate(basis, controlPoints, steps)
  };
}

/** World-space vertices in drawing order (the tessellation for curves). */
export function verticesOf(obj: GraphicObject): readonly Vec2[] {
  switch (obj.kind) {
    case "point":
      return [obj.position];
    case "line":
      return [obj.start, obj.end];
    case "polygon":
      return obj.vertices;
    case "curve":
      return obj.vertices;
  }
}

export function centroidOf(obj: GraphicObject): Vec2 {
  return Vec2.centroid(obj.kind === "curve" ? obj.controlPoints : verticesOf(obj));
}

export function renameObject<T extends GraphicObject>(obj: T, name: string): T {
  return { ...obj, name };
}
