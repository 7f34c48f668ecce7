export { Canvas2DSurface } from "./renderer/Canvas2DSurface.js";
export type { Canvas2DContext } from "./renderer/Canvas2DSurface.js";
