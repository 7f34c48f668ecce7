import { DEFAULT_CURVE_STEPS } from "../algorithm/curves/basis.js";
import type { LineClippingMethod } from "../algorithm/clipping/types.js";
import type { RotationReference } from "../model/objectTransforms.js";
import type { ClipSpace } from "../view/FrameBuilder.js";

export type EditorOptions = {
  clippingMethod: LineClippingMethod;
  /** Pivot for `rotateObjects`. */
  rotationReference: RotationReference;
  /** Intervals per curve segment for curves built through the editor. */
  curveSteps: number;
  /** Device units left free on every side of the drawing area. */
  viewportMargin: number;
  clipSpace: ClipSpace;
};

export const DEFAULT_EDITOR_OPTIONS: EditorOptions = {
  clippingMethod: "cohen-sutherland",
  rotationReference: { kind: "center" },
  curveSteps: DEFAULT_CURVE_STEPS,
  viewportMargin: 10,
  clipSpace: "ndc"
};
