import type { Vec2 } from "@vecta/geometry";
import { ParseError, ValidationError } from "../errors.js";
import {
  createCurve,
  createLine,
  createPoint,
  createPolygon,
  verticesOf,
  type GraphicObject
} from "../model/graphicObject.js";
import type { SceneDocument } from "../scene/document.js";
import { Window } from "../view/window.js";
import type { FileCodec } from "./types.js";

const WINDOW_OBJECT_NAME = "window";

type DecodeState = {
  vertices: Vec2[];
  name: string;
  filledPending: boolean;
  objects: GraphicObject[];
  window: Window | null;
};

type Directive = {
  line: number;
  text: string;
  args: string[];
};

function fail(d: Directive, reason: string, cause?: unknown): never {
  throw new ParseError(d.line, d.text, reason, cause === undefined ? undefined : { cause });
}

function expectArgs(d: Directive, min: number, max = min): void {
  if (d.args.length < min || d.args.length > max) {
    const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
    fail(d, `expected ${expected} argument(s), got ${d.args.length}`);
  }
}

function parseNumber(d: Directive, token: string): number {
  const value = Number(token);
  if (!Number.isFinite(value)) fail(d, `"${token}" is not a number`);
  return value;
}

function resolveVertex(d: Directive, state: DecodeState, token: string): Vec2 {
  const index = Number(token);
  if (!Number.isInteger(index)) fail(d, `"${token}" is not a vertex index`);
  const vertex = state.vertices[index - 1];
  if (index < 1 || !vertex) {
    fail(d, `vertex index ${index} is out of range (${state.vertices.length} declared)`);
  }
  return vertex;
}

/** Runs a factory and reports its ValidationError against the current line. */
function build<T>(d: Directive, make: () => T): T {
  try {
    return make();
  } catch (error) {
    if (error instanceof ValidationError) fail(d, error.message, error);
    throw error;
  }
}

function decodeElements(d: Directive, state: DecodeState): GraphicObject {
  expectArgs(d, 2, Infinity);
  const [first = "", second = ""] = d.args;
  const last = d.args[d.args.length - 1];
  const name = state.name;

  if (d.args.length === 2) {
    const start = resolveVertex(d, state, first);
    const end = resolveVertex(d, state, second);
    return build(d, () => createLine(start, end, name));
  }

  if (Number(first) === Number(last)) {
    // Closed loop: the repeated first index is not a vertex of its own.
    const vertices = d.args.slice(0, -1).map((t) => resolveVertex(d, state, t));
    const filled = state.filledPending;
    state.filledPending = false;
    return build(d, () => createPolygon(vertices, { name, filled }));
  }

  const vertices = d.args.map((t) => resolveVertex(d, state, t));
  return build(d, () => createCurve(vertices, { name, basis: "polyline" }));
}

function decodeDirective(d: Directive, keyword: string, state: DecodeState): void {
  switch (keyword) {
    case "v": {
      expectArgs(d, 2, 3);
      const [x = 0, y = 0, weight = 1] = d.args.map((t) => parseNumber(d, t));
      if (weight === 0) fail(d, "vertex weight must not be zero");
      state.vertices.push({ x: x / weight, y: y / weight });
      return;
    }
    case "o":
      state.name = d.args.join(" ");
      return;
    case "usemtl":
      expectArgs(d, 1);
      if (d.args[0] !== "filled") fail(d, `unknown material "${d.args[0]}"`);
      state.filledPending = true;
      return;
    case "p": {
      expectArgs(d, 1);
      const [index = ""] = d.args;
      const position = resolveVertex(d, state, index);
      state.objects.push(build(d, () => createPoint(position, state.name)));
      return;
    }
    case "l":
      state.objects.push(decodeElements(d, state));
      return;
    case "w": {
      expectArgs(d, 2);
      const [minIndex = "", maxIndex = ""] = d.args;
      const min = resolveVertex(d, state, minIndex);
      const max = resolveVertex(d, state, maxIndex);
      state.window = build(d, () => Window.create(min, max));
      return;
    }
    default:
      fail(d, `unknown directive "${keyword}"`);
  }
}

function formatVertex(p: Vec2): string {
  return `v ${p.x} ${p.y} 1.0`;
}

/**
 * Line-oriented scene format: `v x y [w]` vertices numbered from 1, `o name`,
 * `usemtl filled`, `p i`, `l i j ...` and `w min max`. A `l` whose last index
 * repeats the first is a polygon, two indices a line, anything longer a curve.
 */
export class ObjSceneCodec implements FileCodec<SceneDocument> {
  decode(text: string): SceneDocument {
    const state: DecodeState = { vertices: [], name: "", filledPending: false, objects: [], window: null };

    text.split(/\r?\n/).forEach((raw, i) => {
      const trimmed = raw.trim();
      if (trimmed === "" || trimmed.startsWith("#")) return;
      const [keyword = "", ...args] = trimmed.split(/\s+/);
      decodeDirective({ line: i + 1, text: raw, args }, keyword, state);
    });

    return { objects: state.objects, window: state.window };
  }

  encode(doc: SceneDocument): string {
    const lines: string[] = [];
    let nextIndex = 1;

    const declare = (points: readonly Vec2[]): number[] =>
      points.map((p) => {
        lines.push(formatVertex(p));
        return nextIndex++;
      });

    if (doc.window) {
      const [min, max] = declare([doc.window.min, doc.window.max]);
      lines.push(`o ${WINDOW_OBJECT_NAME}`, `w ${min} ${max}`);
    }

    for (const obj of doc.objects) {
      const indices = declare(verticesOf(obj));
      if (indices.length === 0) continue;

      lines.push(obj.name === "" ? "o" : `o ${obj.name}`);
      switch (obj.kind) {
        case "point":
          lines.push(`p ${indices[0]}`);
          break;
        case "line":
          lines.push(`l ${indices.join(" ")}`);
          break;
        case "polygon":
          if (obj.filled) lines.push("usemtl filled");
          lines.push(`l ${indices.join(" ")} ${indices[0]}`);
          break;
        case "curve":
          lines.push(`l ${indices.join(" ")}`);
          break;
      }
    }

    return lines.length > 0 ? `${lines.join("\n")}\n` : "";
  }
}
