import type { Vec2 } from "./vec2.js";

// Matrix3 (2D affine transform, 3x3, row-major)
// Row-vector convention: [x y 1] · M. The translation lives in the last row,
// and a composite applies its factors left to right.
// [ m0, m1, m2 ]
// [ m3, m4, m5 ]
// [ m6, m7, m8 ]
export type Mat3 = readonly [
  number, number, number,
  number, number, number,
  number, number, number
];

const DEG_TO_RAD = Math.PI / 180;

function identity(): Mat3 {
  return [
    1, 0, 0,
    0, 1, 0,
    0, 0, 1
  ];
}

function translation(dx: number, dy: number): Mat3 {
  return [
    1, 0, 0,
    0, 1, 0,
    dx, dy, 1
  ];
}

function apply(m: Mat3, v: Vec2): Vec2 {
  const w = v.x * m[2] + v.y * m[5] + m[8];
  const x = v.x * m[0] + v.y * m[3] + m[6];
  const y = v.x * m[1] + v.y * m[4] + m[7];
  return w === 1 ? { x, y } : { x: x / w, y: y / w };
}

function multiply(a: Mat3, b: Mat3): Mat3 {
  const out: number[] = new Array<number>(9).fill(0);
  for (let r = 0; r < 3; r++) {
    for (let c = 0; c < 3; c++) {
      let sum = 0;
      for (let k = 0; k < 3; k++) sum += a[r * 3 + k]! * b[k * 3 + c]!;
      out[r * 3 + c] = sum;
    }
  }
  return [out[0]!, out[1]!, out[2]!, out[3]!, out[4]!, out[5]!, out[6]!, out[7]!, out[8]!];
}

export const Mat3 = {
  identity,

  translation,

  scale: (sx: number, sy: number): Mat3 => [
    sx, 0, 0,
    0, sy, 0,
    0, 0, 1
  ],

  /** Counter-clockwise rotation about the origin, angle in degrees. */
  rotation: (angleDegrees: number): Mat3 => {
    const rad = angleDegrees * DEG_TO_RAD;
    const c = Math.cos(rad);
    const s = Math.sin(rad);
    return [
      c, s, 0,
      -s, c, 0,
      0, 0, 1
    ];
  },

  multiply,

  /** Product of the matrices in application order: compose(a, b) applies a, then b. */
  compose: (...matrices: Mat3[]): Mat3 => matrices.reduce<Mat3>((acc, m) => multiply(acc, m), identity()),

  /** Conjugates `m` so that it acts about `pivot` instead of the origin. */
  aroundPivot: (m: Mat3, pivot: Vec2): Mat3 =>
    multiply(multiply(translation(-pivot.x, -pivot.y), m), translation(pivot.x, pivot.y)),

  apply,

  applyAll: (m: Mat3, points: readonly Vec2[]): Vec2[] => points.map((p) => apply(m, p)),

  equals: (a: Mat3, b: Mat3, epsilon: number = 0): boolean => {
    for (let i = 0; i < 9; i++) {
      if (Math.abs(a[i]! - b[i]!) > epsilon) return false;
    }
    return true;
  }
};
