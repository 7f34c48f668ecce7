import test from "node:test";
import assert from "node:assert/strict";
import { Box2 } from "@vecta/geometry";
import {
  LineClipperRegistry,
  UnsupportedAlgorithmError,
  clipLine,
  clipPoint,
  cohenSutherlandClip,
  createDefaultLineClippers,
  liangBarskyClip,
  registerLineClipper,
  regionOf,
  Region,
  type LineClippingMethod,
  type Segment
} from "../src/index.js";
import { lcg, nearPoint, WINDOW_BOUNDS } from "./helpers.js";

const METHODS: LineClippingMethod[] = ["cohen-sutherland", "liang-barsky"];

function seg(x0: number, y0: number, x1: number, y1: number): Segment {
  return { start: { x: x0, y: y0 }, end: { x: x1, y: y1 } };
}

test("regionOf sets one bit per violated boundary", () => {
  assert.equal(regionOf({ x: 0, y: 0 }, WINDOW_BOUNDS), Region.INSIDE);
  assert.equal(regionOf({ x: -11, y: 0 }, WINDOW_BOUNDS), Region.LEFT);
  assert.equal(regionOf({ x: 11, y: 11 }, WINDOW_BOUNDS), Region.RIGHT | Region.TOP);
  assert.equal(regionOf({ x: -11, y: -11 }, WINDOW_BOUNDS), Region.LEFT | Region.BOTTOM);
  assert.equal(regionOf({ x: 10, y: -10 }, WINDOW_BOUNDS), Region.INSIDE);
});

test("clipPoint keeps boundary points", () => {
  assert.equal(clipPoint({ x: 10, y: -10 }, WINDOW_BOUNDS), true);
  assert.equal(clipPoint({ x: 10.000001, y: 0 }, WINDOW_BOUNDS), false);
});

for (const method of METHODS) {
  test(`${method}: horizontal line through the window is cut at both sides`, () => {
    const clipped = clipLine(seg(-20, 0, 20, 0), WINDOW_BOUNDS, method);
    assert.ok(clipped);
    nearPoint(clipped.start, { x: -10, y: 0 });
    nearPoint(clipped.end, { x: 10, y: 0 });
  });

  test(`${method}: a line fully inside comes back unchanged`, () => {
    const line = seg(-5, -5, 5, 3);
    assert.deepEqual(clipLine(line, WINDOW_BOUNDS, method), line);
  });

  test(`${method}: lines outside one boundary are rejected`, () => {
    assert.equal(clipLine(seg(-20, -5, -15, 5), WINDOW_BOUNDS, method), null);
    assert.equal(clipLine(seg(-5, 12, 5, 30), WINDOW_BOUNDS, method), null);
  });

  test(`${method}: axis-parallel lines`, () => {
    assert.equal(clipLine(seg(15, -20, 15, 20), WINDOW_BOUNDS, method), null);

    const vertical = clipLine(seg(0, -20, 0, 20), WINDOW_BOUNDS, method);
    assert.ok(vertical);
    nearPoint(vertical.start, { x: 0, y: -10 });
    nearPoint(vertical.end, { x: 0, y: 10 });
  });

  test(`${method}: diagonal through opposite corners`, () => {
    const clipped = clipLine(seg(-20, -20, 20, 20), WINDOW_BOUNDS, method);
    assert.ok(clipped);
    nearPoint(clipped.start, { x: -10, y: -10 });
    nearPoint(clipped.end, { x: 10, y: 10 });
  });

  test(`${method}: a line grazing a corner collapses to that corner`, () => {
    assert.deepEqual(clipLine(seg(-20, 0, 0, 20), WINDOW_BOUNDS, method), seg(-10, 10, -10, 10));
  });

  test(`${method}: a line crossing a corner region without entering is rejected`, () => {
    assert.equal(clipLine(seg(-20, 5, -5, 20), WINDOW_BOUNDS, method), null);
  });
}

test("Cohen-Sutherland and Liang-Barsky agree on random segments", () => {
  const next = lcg(7);
  const coord = () => next() * 60 - 30;

  for (let i = 0; i < 200; i++) {
    const line = seg(coord(), coord(), coord(), coord());
    const a = cohenSutherlandClip(line, WINDOW_BOUNDS);
    const b = liangBarskyClip(line, WINDOW_BOUNDS);

    if (a === null || b === null) {
      assert.equal(a, b, `segment ${i}: ${JSON.stringify(line)}`);
      continue;
    }
    nearPoint(a.start, b.start, 1e-7);
    nearPoint(a.end, b.end, 1e-7);
  }
});

test("clipping against NDC bounds", () => {
  const ndc = Box2.create({ x: -1, y: -1 }, { x: 1, y: 1 });
  const clipped = clipLine(seg(0, 0, 4, 2), ndc, "liang-barsky");
  assert.ok(clipped);
  assert.deepEqual(clipped.start, { x: 0, y: 0 });
  nearPoint(clipped.end, { x: 1, y: 0.5 });
});

test("known but unimplemented methods throw UnsupportedAlgorithmError", () => {
  assert.throws(() => clipLine(seg(0, 0, 1, 1), WINDOW_BOUNDS, "skala"), UnsupportedAlgorithmError);
  assert.throws(
    () => clipLine(seg(0, 0, 1, 1), WINDOW_BOUNDS, "nicholl"),
    (error: unknown) => error instanceof UnsupportedAlgorithmError && error.method === "nicholl"
  );
});

test("a registry only knows the strategies registered on it", () => {
  const defaults = createDefaultLineClippers();
  assert.deepEqual(defaults.methods(), ["cohen-sutherland", "liang-barsky"]);

  const custom = new LineClipperRegistry().register("skala", () => null);
  assert.equal(custom.has("skala"), true);
  assert.equal(clipLine(seg(0, 0, 1, 1), WINDOW_BOUNDS, "skala", custom), null);
  assert.throws(() => clipLine(seg(0, 0, 1, 1), WINDOW_BOUNDS, "cohen-sutherland", custom), UnsupportedAlgorithmError);
});

test("registerLineClipper makes a strategy available to clipLine", () => {
  registerLineClipper("nicholl", liangBarskyClip);
  const clipped = clipLine(seg(-20, 0, 20, 0), WINDOW_BOUNDS, "nicholl");
  assert.ok(clipped);
  nearPoint(clipped.start, { x: -10, y: 0 });
});
