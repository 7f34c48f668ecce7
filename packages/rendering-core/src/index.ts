export type {
  ArcCommand,
  DrawCommand,
  DrawCommandBase,
  DrawStyle,
  LineCommand,
  PolylineCommand
} from "./scene/drawCommands.js";

export type { Point } from "./math/types.js";

export type { DrawingSurface } from "./surface/DrawingSurface.js";

export type { PaintOptions, PaintStats, RendererError } from "./renderer/types.js";

export { paintCommands } from "./renderer/paint.js";
