import test from "node:test";
import assert from "node:assert/strict";
import { Mat4, Vec3 } from "../src/index.js";

function nearPoint(p: Vec3, q: Vec3, eps = 1e-9) {
  assert.ok(Vec3.equals(p, q, eps), `expected ${JSON.stringify(p)} ~ ${JSON.stringify(q)} (eps=${eps})`);
}

test("Mat4.translation and Mat4.scale", () => {
  assert.deepEqual(Mat4.apply(Mat4.translation({ x: 1, y: 2, z: 3 }), { x: 1, y: 1, z: 1 }), { x: 2, y: 3, z: 4 });
  assert.deepEqual(Mat4.apply(Mat4.scale({ x: 2, y: 3, z: 4 }), { x: 1, y: 1, z: 1 }), { x: 2, y: 3, z: 4 });
});

test("single-axis rotations follow the right-hand rule", () => {
  nearPoint(Mat4.apply(Mat4.rotationX(90), { x: 0, y: 1, z: 0 }), { x: 0, y: 0, z: 1 });
  nearPoint(Mat4.apply(Mat4.rotationY(90), { x: 0, y: 0, z: 1 }), { x: 1, y: 0, z: 0 });
  nearPoint(Mat4.apply(Mat4.rotationZ(90), { x: 1, y: 0, z: 0 }), { x: 0, y: 1, z: 0 });
});

test("Mat4.rotation applies X, then Y, then Z", () => {
  const p = { x: 0, y: 1, z: 0 };
  const expected = Mat4.apply(Mat4.rotationZ(90), Mat4.apply(Mat4.rotationY(90), Mat4.apply(Mat4.rotationX(90), p)));
  nearPoint(Mat4.apply(Mat4.rotation(90, 90, 90), p), expected);
  // (0,1,0) -X-> (0,0,1) -Y-> (1,0,0) -Z-> (0,1,0)
  nearPoint(expected, { x: 0, y: 1, z: 0 });
});

test("Mat4.aroundPivot keeps the pivot fixed", () => {
  const pivot = { x: 1, y: 2, z: 3 };
  const m = Mat4.aroundPivot(Mat4.rotation(30, 45, 60), pivot);
  nearPoint(Mat4.apply(m, pivot), pivot);
});

test("Mat4.multiply and Mat4.compose return full 4x4 matrices", () => {
  const t = Mat4.translation({ x: 1, y: 2, z: 3 });
  assert.deepEqual(Mat4.multiply(Mat4.identity(), t), t);
  assert.deepEqual(Mat4.compose(t, Mat4.scale({ x: 2, y: 2, z: 2 })), [
    2, 0, 0, 0,
    0, 2, 0, 0,
    0, 0, 2, 0,
    2, 4, 6, 1
  ]);
});
