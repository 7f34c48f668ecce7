import { Mat4, Vec2, Vec3 } from "@vecta/geometry";
import { ValidationError } from "../errors.js";
import { createLine, type LineObject } from "./graphicObject.js";

/** A 3D object drawn as edges between indexed vertices. */
export type Wireframe3D = {
  readonly name: string;
  readonly vertices: readonly Vec3[];
  readonly edges: readonly (readonly [number, number])[];
};

export function createWireframe(
  vertices: readonly Vec3[],
  edges: readonly (readonly [number, number])[],
  name = ""
): Wireframe3D {
  if (vertices.length === 0) {
    throw new ValidationError(`Wireframe "${name}" has no vertices`);
  }
  for (const [a, b] of edges) {
    if (!Number.isInteger(a) || !Number.isInteger(b) || a < 0 || b < 0 || a >= vertices.length || b >= vertices.length) {
      throw new ValidationError(`Wireframe "${name}" edge (${a}, ${b}) references a missing vertex`);
    }
    if (a === b) {
      throw new ValidationError(`Wireframe "${name}" edge (${a}, ${b}) is a loop`);
    }
  }
  return {
    name,
    vertices: vertices.map((v) => ({ x: v.x, y: v.y, z: v.z })),
    edges: edges.map(([a, b]) => [a, b] as const)
  };
}

export function transformWireframe(obj: Wireframe3D, m: Mat4): Wireframe3D {
  return { ...obj, vertices: Mat4.applyAll(m, obj.vertices) };
}

export function translateWireframe(obj: Wireframe3D, offset: Vec3): Wireframe3D {
  return transformWireframe(obj, Mat4.translation(offset));
}

/** Scales about the origin. */
export function scaleWireframe(obj: Wireframe3D, factor: Vec3): Wireframe3D {
  return transformWireframe(obj, Mat4.scale(factor));
}

/** Rotates about X, then Y, then Z, around `pivot` (the centroid when omitted). */
export function rotateWireframe(obj: Wireframe3D, ax: number, ay: number, az: number, pivot?: Vec3): Wireframe3D {
  const center = pivot ?? Vec3.centroid(obj.vertices);
  return transformWireframe(obj, Mat4.aroundPivot(Mat4.rotation(ax, ay, az), center));
}

/**
 * Parallel projection onto the XY plane. Edges that collapse to a point are
 * skipped since a line cannot be zero length.
 */
export function projectParallel(obj: Wireframe3D): LineObject[] {
  const lines: LineObject[] = [];
  obj.edges.forEach(([a, b], i) => {
    const va = obj.vertices[a];
    const vb = obj.vertices[b];
    if (!va || !vb) return;
    const start = Vec2.create(va.x, va.y);
    const end = Vec2.create(vb.x, vb.y);
    if (Vec2.equals(start, end)) return;
    lines.push(createLine(start, end, `${obj.name}#${i}`));
  });
  return lines;
}
