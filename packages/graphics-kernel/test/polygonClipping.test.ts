import test from "node:test";
import assert from "node:assert/strict";
import { Box2, Vec2 } from "@vecta/geometry";
import { Window, clipCurve, clipObject, clipPolygon, clipPolygonInWindow, createCurve, createPoint, createPolygon } from "../src/index.js";
import { nearPoint, WINDOW_BOUNDS } from "./helpers.js";

test("a square covering the window collapses to the window corners", () => {
  const square = [
    { x: -20, y: -20 },
    { x: 20, y: -20 },
    { x: 20, y: 20 },
    { x: -20, y: 20 }
  ];
  assert.deepEqual(clipPolygon(square, WINDOW_BOUNDS), [
    { x: -10, y: 10 },
    { x: -10, y: -10 },
    { x: 10, y: -10 },
    { x: 10, y: 10 }
  ]);
});

test("a polygon fully inside keeps its vertices in order", () => {
  const triangle = [
    { x: 0, y: 0 },
    { x: 5, y: 0 },
    { x: 0, y: 5 }
  ];
  assert.deepEqual(clipPolygon(triangle, WINDOW_BOUNDS), triangle);
});

test("a polygon fully outside clips to nothing", () => {
  const triangle = [
    { x: 20, y: 20 },
    { x: 30, y: 20 },
    { x: 25, y: 30 }
  ];
  assert.deepEqual(clipPolygon(triangle, WINDOW_BOUNDS), []);
});

test("a convex polygon gains at most four vertices", () => {
  const hexagon = Array.from({ length: 6 }, (_, i) => {
    const a = (i * Math.PI) / 3;
    return { x: 13 * Math.cos(a), y: 13 * Math.sin(a) };
  });
  const clipped = clipPolygon(hexagon, WINDOW_BOUNDS);

  assert.ok(clipped.length > 0);
  assert.ok(clipped.length <= hexagon.length + 4, `got ${clipped.length} vertices`);
  for (const p of clipped) {
    assert.ok(Box2.contains(Box2.create({ x: -10 - 1e-9, y: -10 - 1e-9 }, { x: 10 + 1e-9, y: 10 + 1e-9 }), p));
  }
});

test("clipPolygonInWindow clips against a rotated window in its own frame", () => {
  const window = Window.create({ x: -10, y: -10 }, { x: 10, y: 10 }, 45);
  const big = [
    { x: -100, y: -100 },
    { x: 100, y: -100 },
    { x: 100, y: 100 },
    { x: -100, y: 100 }
  ];
  const clipped = clipPolygonInWindow(big, window);

  assert.equal(clipped.length, 4);
  for (const p of clipped) {
    assert.ok(Math.abs(Math.abs(p.x) - 10) < 1e-9 && Math.abs(Math.abs(p.y) - 10) < 1e-9, JSON.stringify(p));
  }
});

test("clipCurve chains surviving pieces into one run", () => {
  const runs = clipCurve(
    [
      { x: -20, y: 0 },
      { x: 0, y: 0 },
      { x: 20, y: 0 }
    ],
    WINDOW_BOUNDS
  );
  assert.equal(runs.length, 1);
  const [run] = runs;
  assert.ok(run);
  assert.equal(run.length, 3);
  nearPoint(run[0]!, { x: -10, y: 0 });
  nearPoint(run[1]!, { x: 0, y: 0 });
  nearPoint(run[2]!, { x: 10, y: 0 });
});

test("clipCurve starts a new run after a piece is clipped away", () => {
  const runs = clipCurve(
    [
      { x: -5, y: 0 },
      { x: 5, y: 0 },
      { x: 5, y: 20 },
      { x: -5, y: 20 },
      { x: -5, y: 5 },
      { x: 5, y: 5 }
    ],
    WINDOW_BOUNDS,
    "cohen-sutherland"
  );

  assert.equal(runs.length, 2);
  assert.deepEqual(runs[0], [
    { x: -5, y: 0 },
    { x: 5, y: 0 },
    { x: 5, y: 10 }
  ]);
  assert.deepEqual(runs[1], [
    { x: -5, y: 10 },
    { x: -5, y: 5 },
    { x: 5, y: 5 }
  ]);
});

test("clipObject dispatches on the object kind", () => {
  const point = createPoint({ x: 20, y: 0 }, "far");
  assert.equal(clipObject(point, [point.position], WINDOW_BOUNDS), null);

  const square = createPolygon(
    [
      { x: -20, y: -20 },
      { x: 20, y: -20 },
      { x: 20, y: 20 },
      { x: -20, y: 20 }
    ],
    { filled: true }
  );
  const shape = clipObject(square, square.vertices, WINDOW_BOUNDS);
  assert.ok(shape && shape.kind === "polygon");
  assert.equal(shape.filled, true);
  assert.equal(shape.vertices.length, 4);

  const curve = createCurve([Vec2.create(0, 0), Vec2.create(1, 1), Vec2.create(2, 1), Vec2.create(3, 0)]);
  const clippedCurve = clipObject(curve, curve.vertices, WINDOW_BOUNDS, { method: "liang-barsky" });
  assert.ok(clippedCurve && clippedCurve.kind === "curve");
  assert.equal(clippedCurve.runs.length, 1);
  assert.equal(clippedCurve.runs[0]!.length, curve.vertices.length);
});
