import { Mat3, type Vec2 } from "@vecta/geometry";
import { Viewport } from "./viewport.js";
import { Window } from "./window.js";

/**
 * World -> normalized device space: the window centre goes to the origin, the
 * window's own rotation is undone, and the window maps onto [-1, 1]^2.
 */
export function normalizationMatrix(window: Window): Mat3 {
  const c = Window.center(window);
  return Mat3.compose(
    Mat3.translation(-c.x, -c.y),
    Mat3.rotation(-window.angle),
    Mat3.scale(2 / Window.width(window), 2 / Window.height(window))
  );
}

/** Normalized device space -> device pixels; y flips because device space grows downward. */
export function viewportMatrix(viewport: Viewport): Mat3 {
  const c = Viewport.center(viewport);
  return Mat3.compose(
    Mat3.scale(Viewport.width(viewport) / 2, -Viewport.height(viewport) / 2),
    Mat3.translation(c.x, c.y)
  );
}

export function worldToDeviceMatrix(window: Window, viewport: Viewport): Mat3 {
  return Mat3.compose(normalizationMatrix(window), viewportMatrix(viewport));
}

export function normalizeVertices(vertices: readonly Vec2[], window: Window): Vec2[] {
  return Mat3.applyAll(normalizationMatrix(window), vertices);
}

export function toDevice(points: readonly Vec2[], viewport: Viewport): Vec2[] {
  return Mat3.applyAll(viewportMatrix(viewport), points);
}

/**
 * World -> the window's unrotated frame (rotation by -angle about the window
 * centre), so the window can be clipped against as an axis-aligned rectangle.
 */
export function toWindowFrame(vertices: readonly Vec2[], window: Window): Vec2[] {
  return Mat3.applyAll(Mat3.aroundPivot(Mat3.rotation(-window.angle), Window.center(window)), vertices);
}

/**
 * Converts a pointer drag in device units into a window-frame offset that
 * keeps the content under the pointer: x is inverted, y is flipped.
 */
export function deviceDeltaToWindowOffset(delta: Vec2, viewport: Viewport, window: Window): Vec2 {
  return {
    x: (-delta.x / Viewport.width(viewport)) * Window.width(window),
    y: (delta.y / Viewport.height(viewport)) * Window.height(window)
  };
}
