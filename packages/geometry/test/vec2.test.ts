import test from "node:test";
import assert from "node:assert/strict";
import { Vec2, Vec3 } from "../src/index.js";

test("Vec2 arithmetic", () => {
  const a = Vec2.create(3, 4);
  const b = Vec2.create(1, -2);

  assert.deepEqual(Vec2.add(a, b), { x: 4, y: 2 });
  assert.deepEqual(Vec2.sub(a, b), { x: 2, y: 6 });
  assert.deepEqual(Vec2.mul(a, 2), { x: 6, y: 8 });
  assert.deepEqual(Vec2.neg(b), { x: -1, y: 2 });
  assert.equal(Vec2.dot(a, b), -5);
  assert.equal(Vec2.cross(a, b), -10);
  assert.equal(Vec2.len(a), 5);
  assert.equal(Vec2.dist(a, b), Math.hypot(2, 6));
  assert.deepEqual(Vec2.lerp(a, b, 0.5), { x: 2, y: 1 });
});

test("Vec2.equals is exact by default and tolerant with an epsilon", () => {
  assert.equal(Vec2.equals({ x: 0.1 + 0.2, y: 0 }, { x: 0.3, y: 0 }), false);
  assert.equal(Vec2.equals({ x: 0.1 + 0.2, y: 0 }, { x: 0.3, y: 0 }, 1e-12), true);
});

test("centroids", () => {
  assert.deepEqual(Vec2.centroid([]), { x: 0, y: 0 });
  assert.deepEqual(
    Vec2.centroid([
      { x: 0, y: 0 },
      { x: 4, y: 0 },
      { x: 4, y: 2 },
      { x: 0, y: 2 }
    ]),
    { x: 2, y: 1 }
  );
  assert.deepEqual(
    Vec3.centroid([
      { x: 0, y: 0, z: 0 },
      { x: 2, y: 4, z: 6 }
    ]),
    { x: 1, y: 2, z: 3 }
  );
});
