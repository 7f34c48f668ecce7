import type { Box2 } from "@vecta/geometry";
import { UnsupportedAlgorithmError } from "../../errors.js";
import { cohenSutherlandClip } from "./cohenSutherland.js";
import { liangBarskyClip } from "./liangBarsky.js";
import type { LineClipper, LineClippingMethod, Segment } from "./types.js";

/** Maps clipping method names to implementations; new strategies plug in here. */
export class LineClipperRegistry {
  private clippers = new Map<LineClippingMethod, LineClipper>();

  constructor(entries: Iterable<readonly [LineClippingMethod, LineClipper]> = []) {
    for (const [method, clipper] of entries) this.clippers.set(method, clipper);
  }

  register(method: LineClippingMethod, clipper: LineClipper): this {
    this.clippers.set(method, clipper);
    return this;
  }

  has(method: LineClippingMethod): boolean {
    return this.clippers.has(method);
  }

  /** @throws UnsupportedAlgorithmError when no implementation is registered. */
  get(method: LineClippingMethod): LineClipper {
    const clipper = this.clippers.get(method);
    if (!clipper) throw new UnsupportedAlgorithmError(method);
    return clipper;
  }

  methods(): LineClippingMethod[] {
    return Array.from(this.clippers.keys());
  }
}

export function createDefaultLineClippers(): LineClipperRegistry {
  return new LineClipperRegistry([
    ["cohen-sutherland", cohenSutherlandClip],
    ["liang-barsky", liangBarskyClip]
  ]);
}

const builtInClippers = createDefaultLineClippers();

export function clipLine(
  segment: Segment,
  bounds: Box2,
  method: LineClippingMethod = "cohen-sutherland",
  registry: LineClipperRegistry = builtInClippers
): Segment | null {
  return registry.get(method)(segment, bounds);
}

/** Adds or replaces a strategy in the registry `clipLine` uses by default. */
export function registerLineClipper(method: LineClippingMethod, clipper: LineClipper): void {
  builtInClippers.register(method, clipper);
}
