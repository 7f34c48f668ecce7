import type { DrawCommand } from "../scene/drawCommands.js";
import type { DrawingSurface } from "../surface/DrawingSurface.js";
import type { PaintOptions, PaintStats } from "./types.js";

function paintOne(surface: DrawingSurface, command: DrawCommand): void {
  switch (command.kind) {
    case "line":
      surface.drawLine(command.a, command.b, command.style);
      return;
    case "polyline":
      surface.drawPolyline(command.points, command.closed, command.filled, command.style);
      return;
    case "arc":
      surface.drawArc(command.center, command.radius, command.style);
      return;
  }
}

export function paintCommands(
  surface: DrawingSurface,
  commands: readonly DrawCommand[],
  options: PaintOptions = {}
): PaintStats {
  let drawCalls = 0;
  let failed = 0;

  for (let i = 0; i < commands.length; i++) {
    const command = commands[i];
    if (!command) continue;

    try {
      paintOne(surface, command);
      drawCalls++;
    } catch (cause) {
      failed++;
      if (!options.onError) throw cause;
      options.onError({
        message: "DrawCommand paint failed",
        source: command.source,
        commandIndex: i,
        cause
      });
    }
  }

  return { drawCalls, failed };
}
