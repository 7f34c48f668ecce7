import type { GraphicObject } from "../model/graphicObject.js";
import type { Window } from "../view/window.js";

/** What a scene file holds: objects in declaration order and an optional window. */
export type SceneDocument = {
  objects: GraphicObject[];
  window: Window | null;
};
