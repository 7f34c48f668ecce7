import { Mat3, NDC_BOUNDS, type Box2, type Vec2 } from "@vecta/geometry";
import type { DrawCommand } from "@vecta/rendering-core";
import { clipObject, type ClippedShape } from "../algorithm/clipping/clipObject.js";
import type { LineClipperRegistry } from "../algorithm/clipping/lineClipping.js";
import type { LineClippingMethod } from "../algorithm/clipping/types.js";
import { verticesOf, type GraphicObject } from "../model/graphicObject.js";
import type { Scene } from "../scene/Scene.js";
import { FRAME_STYLE, OBJECT_STYLE, POINT_RADIUS } from "./constants.js";
import { toWindowFrame, viewportMatrix } from "./coordinateSystem.js";
import { Viewport } from "./viewport.js";
import { Window } from "./window.js";

/**
 * Where clipping happens: against [-1, 1]^2 after normalization, or against
 * the window rectangle after undoing the window's rotation.
 */
export type ClipSpace = "ndc" | "window";

export type FrameBuilderInput = {
  scene: Scene;
  /** Device area the window is mapped onto, margin already applied. */
  viewport: Viewport;
  clippingMethod: LineClippingMethod;
  clipSpace: ClipSpace;
  registry?: LineClipperRegistry;
};

export type Frame = {
  commands: DrawCommand[];
  /** Objects with nothing left inside the clip bounds. */
  culled: number;
};

type ClipStage = {
  bounds: Box2;
  verticesFor(index: number, obj: GraphicObject): readonly Vec2[];
  /** Clip space -> device. */
  toDevice: Mat3;
};

export class FrameBuilder {
  generate(input: FrameBuilderInput): Frame {
    const { scene, viewport } = input;
    const stage = this.clipStage(input);
    const commands: DrawCommand[] = [];
    let culled = 0;

    scene.getObjects().forEach((obj, index) => {
      const shape = clipObject(obj, stage.verticesFor(index, obj), stage.bounds, {
        method: input.clippingMethod,
        registry: input.registry
      });
      if (!shape) {
        culled++;
        return;
      }
      commands.push(...this.shapeToCommands(shape, obj.name, stage.toDevice));
    });

    commands.push({
      kind: "polyline",
      points: Viewport.outline(viewport),
      closed: true,
      filled: false,
      source: "viewport",
      style: FRAME_STYLE
    });

    return { commands, culled };
  }

  private clipStage(input: FrameBuilderInput): ClipStage {
    const { scene, viewport } = input;
    const toViewport = viewportMatrix(viewport);

    if (input.clipSpace === "ndc") {
      return {
        bounds: NDC_BOUNDS,
        verticesFor: (index) => scene.getNormalized(index) ?? [],
        toDevice: toViewport
      };
    }

    const window = scene.getWindow();
    const c = Window.center(window);
    return {
      bounds: Window.bounds(window),
      verticesFor: (_index, obj) => toWindowFrame(verticesOf(obj), window),
      toDevice: Mat3.compose(
        Mat3.translation(-c.x, -c.y),
        Mat3.scale(2 / Window.width(window), 2 / Window.height(window)),
        toViewport
      )
    };
  }

  private shapeToCommands(shape: ClippedShape, source: string, m: Mat3): DrawCommand[] {
    switch (shape.kind) {
      case "point":
        return [{ kind: "arc", center: Mat3.apply(m, shape.position), radius: POINT_RADIUS, source, style: OBJECT_STYLE }];
      case "line":
        return [{ kind: "line", a: Mat3.apply(m, shape.start), b: Mat3.apply(m, shape.end), source, style: OBJECT_STYLE }];
      case "polygon":
        return [
          {
            kind: "polyline",
            points: Mat3.applyAll(m, shape.vertices),
            closed: true,
            filled: shape.filled,
            source,
            style: OBJECT_STYLE
          }
        ];
      case "curve":
        return shape.runs.map((run): DrawCommand => ({
          kind: "polyline",
          points: Mat3.applyAll(m, run),
          closed: false,
          filled: false,
          source,
          style: OBJECT_STYLE
        }));
    }
  }
}
