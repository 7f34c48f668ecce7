import assert from "node:assert/strict";
import { Box2, Vec2 } from "@vecta/geometry";

export function near(actual: number, expected: number, eps = 1e-9): void {
  assert.ok(Math.abs(actual - expected) <= eps, `expected ${actual} ~ ${expected} (eps=${eps})`);
}

export function nearPoint(p: Vec2, q: Vec2, eps = 1e-9): void {
  assert.ok(Vec2.equals(p, q, eps), `expected ${JSON.stringify(p)} ~ ${JSON.stringify(q)} (eps=${eps})`);
}

export function nearPoints(ps: readonly Vec2[], qs: readonly Vec2[], eps = 1e-9): void {
  assert.equal(ps.length, qs.length, `expected ${qs.length} points, got ${ps.length}`);
  ps.forEach((p, i) => nearPoint(p, qs[i]!, eps));
}

/** Deterministic pseudo-random numbers in [0, 1). */
export function lcg(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export const WINDOW_BOUNDS = Box2.create({ x: -10, y: -10 }, { x: 10, y: 10 });
