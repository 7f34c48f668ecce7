import type { Box2, Vec2 } from "@vecta/geometry";
import { toWindowFrame } from "../../view/coordinateSystem.js";
import { Window } from "../../view/window.js";

type HalfPlane = {
  inside(p: Vec2): boolean;
  intersect(a: Vec2, b: Vec2): Vec2;
};

function verticalBoundary(x: number, keep: "above" | "below"): HalfPlane {
  return {
    inside: (p) => (keep === "above" ? p.x >= x : p.x <= x),
    intersect: (a, b) => {
      const dx = b.x - a.x;
      if (dx === 0) return { x, y: a.y };
      return { x, y: a.y + ((x - a.x) / dx) * (b.y - a.y) };
    }
  };
}

function horizontalBoundary(y: number, keep: "above" | "below"): HalfPlane {
  return {
    inside: (p) => (keep === "above" ? p.y >= y : p.y <= y),
    intersect: (a, b) => {
      const dy = b.y - a.y;
      if (dy === 0) return { x: a.x, y };
      return { x: a.x + ((y - a.y) / dy) * (b.x - a.x), y };
    }
  };
}

/** LEFT, RIGHT, BOTTOM, TOP. */
function halfPlanesOf(bounds: Box2): HalfPlane[] {
  return [
    verticalBoundary(bounds.min.x, "above"),
    verticalBoundary(bounds.max.x, "below"),
    horizontalBoundary(bounds.min.y, "above"),
    horizontalBoundary(bounds.max.y, "below")
  ];
}

function clipAgainst(vertices: readonly Vec2[], plane: HalfPlane): Vec2[] {
  const out: Vec2[] = [];
  const n = vertices.length;
  if (n === 0) return out;

  // Edges are walked as (previous, current), starting with the wrap-around edge,
  // so an untouched polygon keeps its vertex order.
  let prev = vertices[n - 1]!;
  let prevInside = plane.inside(prev);

  for (const cur of vertices) {
    const curInside = plane.inside(cur);

    if (curInside) {
      if (!prevInside) out.push(plane.intersect(prev, cur));
      out.push(cur);
    } else if (prevInside) {
      out.push(plane.intersect(prev, cur));
    }

    prev = cur;
    prevInside = curInside;
  }

  return out;
}

/**
 * Sutherland-Hodgman sweep against the four half-planes of `bounds`. An empty
 * result means the polygon lies entirely outside.
 */
export function clipPolygon(vertices: readonly Vec2[], bounds: Box2): Vec2[] {
  let current: Vec2[] = [...vertices];
  for (const plane of halfPlanesOf(bounds)) {
    current = clipAgainst(current, plane);
    if (current.length === 0) break;
  }
  return current;
}

/**
 * Clips world-space vertices against a possibly rotated window. The result is
 * expressed in the window's unrotated frame.
 */
export function clipPolygonInWindow(vertices: readonly Vec2[], window: Window): Vec2[] {
  return clipPolygon(toWindowFrame(vertices, window), Window.bounds(window));
}
