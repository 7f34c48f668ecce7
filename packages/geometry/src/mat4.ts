import type { Vec3 } from "./vec2.js";

// 4x4 affine transform for the 3D extension, same row-vector convention as Mat3.
// [ m0,  m1,  m2,  m3  ]
// [ m4,  m5,  m6,  m7  ]
// [ m8,  m9,  m10, m11 ]
// [ m12, m13, m14, m15 ]
export type Mat4 = readonly [
  number, number, number, number,
  number, number, number, number,
  number, number, number, number,
  number, number, number, number
];

const DEG_TO_RAD = Math.PI / 180;

function multiply(a: Mat4, b: Mat4): Mat4 {
  const out: number[] = new Array<number>(16).fill(0);
  for (let r = 0; r < 4; r++) {
    for (let c = 0; c < 4; c++) {
      let sum = 0;
      for (let k = 0; k < 4; k++) sum += a[r * 4 + k]! * b[k * 4 + c]!;
      out[r * 4 + c] = sum;
    }
  }
  return [
    out[0]!, out[1]!, out[2]!, out[3]!,
    out[4]!, out[5]!, out[6]!, out[7]!,
    out[8]!, out[9]!, out[10]!, out[11]!,
    out[12]!, out[13]!, out[14]!, out[15]!
  ];
}

function identity(): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1
  ];
}

function translation(v: Vec3): Mat4 {
  return [
    1, 0, 0, 0,
    0, 1, 0, 0,
    0, 0, 1, 0,
    v.x, v.y, v.z, 1
  ];
}

function apply(m: Mat4, v: Vec3): Vec3 {
  const x = v.x * m[0] + v.y * m[4] + v.z * m[8] + m[12];
  const y = v.x * m[1] + v.y * m[5] + v.z * m[9] + m[13];
  const z = v.x * m[2] + v.y * m[6] + v.z * m[10] + m[14];
  const w = v.x * m[3] + v.y * m[7] + v.z * m[11] + m[15];
  return w === 1 ? { x, y, z } : { x: x / w, y: y / w, z: z / w };
}

function rotationX(angleDegrees: number): Mat4 {
  const rad = angleDegrees * DEG_TO_RAD;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  return [
    1, 0, 0, 0,
    0, c, s, 0,
    0, -s, c, 0,
    0, 0, 0, 1
  ];
}

function rotationY(angleDegrees: number): Mat4 {
  const rad = angleDegrees * DEG_TO_RAD;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  return [
    c, 0, -s, 0,
    0, 1, 0, 0,
    s, 0, c, 0,
    0, 0, 0, 1
  ];
}

function rotationZ(angleDegrees: number): Mat4 {
  const rad = angleDegrees * DEG_TO_RAD;
  const c = Math.cos(rad);
  const s = Math.sin(rad);
  return [
    c, s, 0, 0,
    -s, c, 0, 0,
    0, 0, 1, 0,
    0, 0, 0, 1
  ];
}

export const Mat4 = {
  identity,

  translation,

  scale: (v: Vec3): Mat4 => [
    v.x, 0, 0, 0,
    0, v.y, 0, 0,
    0, 0, v.z, 0,
    0, 0, 0, 1
  ],

  rotationX,
  rotationY,
  rotationZ,

  /** Rotation about X, then Y, then Z (degrees). */
  rotation: (ax: number, ay: number, az: number): Mat4 =>
    multiply(multiply(rotationX(ax), rotationY(ay)), rotationZ(az)),

  multiply,

  compose: (...matrices: Mat4[]): Mat4 => matrices.reduce<Mat4>((acc, m) => multiply(acc, m), identity()),

  aroundPivot: (m: Mat4, pivot: Vec3): Mat4 =>
    multiply(multiply(translation({ x: -pivot.x, y: -pivot.y, z: -pivot.z }), m), translation(pivot)),

  apply,

  applyAll: (m: Mat4, points: readonly Vec3[]): Vec3[] => points.map((p) => apply(m, p))
};
