export { Vec2, Vec3 } from "./vec2.js";
export { Mat3 } from "./mat3.js";
export { Mat4 } from "./mat4.js";
export { Box2, NDC_BOUNDS } from "./box2.js";
