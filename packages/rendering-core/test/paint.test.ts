import test from "node:test";
import assert from "node:assert/strict";
import { paintCommands, type DrawCommand, type DrawingSurface, type Point, type RendererError } from "../src/index.js";

class RecordingSurface implements DrawingSurface {
  calls: string[] = [];

  drawLine(a: Point, b: Point): void {
    this.calls.push(`line ${a.x},${a.y} ${b.x},${b.y}`);
  }

  drawPolyline(points: readonly Point[], closed: boolean, filled: boolean): void {
    this.calls.push(`polyline ${points.length} closed=${closed} filled=${filled}`);
  }

  drawArc(center: Point, radius: number): void {
    this.calls.push(`arc ${center.x},${center.y} r=${radius}`);
  }
}

const commands: DrawCommand[] = [
  { kind: "line", a: { x: 0, y: 0 }, b: { x: 10, y: 5 } },
  { kind: "polyline", points: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }], closed: true, filled: true },
  { kind: "arc", center: { x: 4, y: 4 }, radius: 1 }
];

test("paintCommands dispatches each command to the matching surface call", () => {
  const surface = new RecordingSurface();
  const stats = paintCommands(surface, commands);

  assert.deepEqual(surface.calls, [
    "line 0,0 10,5",
    "polyline 3 closed=true filled=true",
    "arc 4,4 r=1"
  ]);
  assert.deepEqual(stats, { drawCalls: 3, failed: 0 });
});

test("paintCommands reports failing commands through onError and keeps going", () => {
  const surface = new RecordingSurface();
  surface.drawLine = () => {
    throw new Error("surface lost");
  };
  const errors: RendererError[] = [];

  const stats = paintCommands(
    surface,
    [{ ...commands[0]!, source: "edge" }, commands[2]!],
    { onError: (error) => errors.push(error) }
  );

  assert.deepEqual(stats, { drawCalls: 1, failed: 1 });
  assert.equal(errors.length, 1);
  assert.equal(errors[0]!.source, "edge");
  assert.equal(errors[0]!.commandIndex, 0);
  assert.deepEqual(surface.calls, ["arc 4,4 r=1"]);
});

test("paintCommands rethrows without an onError handler", () => {
  const surface = new RecordingSurface();
  surface.drawArc = () => {
    throw new Error("surface lost");
  };
  assert.throws(() => paintCommands(surface, commands), /surface lost/);
});
