import test from "node:test";
import assert from "node:assert/strict";
import { Box2, NDC_BOUNDS } from "../src/box2.js";

function box(minX: number, minY: number, maxX: number, maxY: number) {
  return Box2.create({ x: minX, y: minY }, { x: maxX, y: maxY });
}

test("Box2.contains: boundary points are inside", () => {
  const b = box(-10, -10, 10, 10);
  assert.equal(Box2.contains(b, { x: -10, y: 0 }), true);
  assert.equal(Box2.contains(b, { x: 10, y: 10 }), true);
  assert.equal(Box2.contains(b, { x: 0, y: 0 }), true);
});

test("Box2.contains: points past any edge are outside", () => {
  const b = box(-10, -10, 10, 10);
  assert.equal(Box2.contains(b, { x: -10.001, y: 0 }), false);
  assert.equal(Box2.contains(b, { x: 0, y: 10.5 }), false);
  assert.equal(Box2.contains(b, { x: 11, y: -11 }), false);
});

test("Box2.intersects: disjoint (separated on x)", () => {
  const a = box(0, 0, 10, 10);
  const b = box(11, 0, 20, 10);
  assert.equal(Box2.intersects(a, b), false);
  assert.equal(Box2.intersects(b, a), false);
});

test("Box2.intersects: touch at corner is treated as intersect (inclusive)", () => {
  const a = box(0, 0, 10, 10);
  const b = box(10, 10, 12, 12); // share point (10,10)
  assert.equal(Box2.intersects(a, b), true);
});

test("Box2.fromPoints spans every point", () => {
  const b = Box2.fromPoints([{ x: 3, y: -1 }, { x: -2, y: 4 }, { x: 0, y: 0 }]);
  assert.deepEqual(b, { min: { x: -2, y: -1 }, max: { x: 3, y: 4 } });
});

test("Box2.shrink moves every side inward", () => {
  const b = Box2.shrink(box(0, 0, 100, 50), 10);
  assert.deepEqual(b, { min: { x: 10, y: 10 }, max: { x: 90, y: 40 } });
  assert.equal(Box2.width(b), 80);
  assert.equal(Box2.height(b), 30);
  assert.deepEqual(Box2.center(b), { x: 50, y: 25 });
});

test("NDC_BOUNDS is the unit square around the origin", () => {
  assert.equal(Box2.width(NDC_BOUNDS), 2);
  assert.equal(Box2.height(NDC_BOUNDS), 2);
  assert.deepEqual(Box2.center(NDC_BOUNDS), { x: 0, y: 0 });
});
