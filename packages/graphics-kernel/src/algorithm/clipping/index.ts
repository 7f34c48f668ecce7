export { Region, regionOf } from "./outcode.js";
export { cohenSutherlandClip } from "./cohenSutherland.js";
export { liangBarskyClip } from "./liangBarsky.js";
export { LineClipperRegistry, clipLine, createDefaultLineClippers, registerLineClipper } from "./lineClipping.js";
export { clipPoint } from "./pointClipping.js";
export { clipPolygon, clipPolygonInWindow } from "./polygonClipping.js";
export { clipCurve } from "./curveClipping.js";
export { clipObject, type ClipOptions, type ClippedShape } from "./clipObject.js";
export {
  CLIP_EPSILON,
  LINE_CLIPPING_METHODS,
  MAX_CLIP_ITERATIONS,
  isLineClippingMethod,
  type LineClipper,
  type LineClippingMethod,
  type Segment
} from "./types.js";
