import type { Mat3, Vec2 } from "@vecta/geometry";
import { verticesOf, type GraphicObject } from "../model/graphicObject.js";
import { transformObject } from "../model/objectTransforms.js";
import { normalizeVertices } from "../view/coordinateSystem.js";
import { Window } from "../view/window.js";
import type { SceneDocument } from "./document.js";

export type SceneChangeSet = {
  added: number[];
  updated: number[];
  /** Indices as they were before removal, highest first. */
  removed: number[];
  windowChanged: boolean;
};

const DEFAULT_WINDOW = Window.create({ x: -1, y: -1 }, { x: 1, y: 1 });

function emptyChangeSet(): SceneChangeSet {
  return { added: [], updated: [], removed: [], windowChanged: false };
}

/**
 * Ordered display list plus the current window. Each object's normalized
 * vertices are cached and recomputed by every mutation, so reads always match
 * the current window.
 */
export class Scene {
  private objects: GraphicObject[] = [];
  private normalized: Vec2[][] = [];
  private window: Window;

  constructor(window: Window = DEFAULT_WINDOW) {
    this.window = window;
  }

  get size(): number {
    return this.objects.length;
  }

  getWindow(): Window {
    return this.window;
  }

  getObjects(): readonly GraphicObject[] {
    return this.objects;
  }

  getObject(index: number): GraphicObject | undefined {
    return this.objects[index];
  }

  getNormalized(index: number): readonly Vec2[] | undefined {
    return this.normalized[index];
  }

  addObject(obj: GraphicObject): SceneChangeSet {
    this.objects.push(obj);
    this.normalized.push(normalizeVertices(verticesOf(obj), this.window));
    return { ...emptyChangeSet(), added: [this.objects.length - 1] };
  }

  /**
   * Removes several objects at once. Duplicates are ignored; any index out of
   * range rejects the whole call before anything is removed.
   */
  removeObjects(indices: readonly number[]): SceneChangeSet {
    for (const index of indices) this.assertIndex(index);

    // Highest first, so the indices still to be removed stay valid.
    const removed = Array.from(new Set(indices)).sort((a, b) => b - a);
    for (const index of removed) {
      this.objects.splice(index, 1);
      this.normalized.splice(index, 1);
    }
    return { ...emptyChangeSet(), removed };
  }

  replaceObject(index: number, obj: GraphicObject): SceneChangeSet {
    this.assertIndex(index);
    this.objects[index] = obj;
    this.normalized[index] = normalizeVertices(verticesOf(obj), this.window);
    return { ...emptyChangeSet(), updated: [index] };
  }

  transformObject(index: number, m: Mat3): SceneChangeSet {
    const obj = this.assertIndex(index);
    return this.replaceObject(index, transformObject(obj, m));
  }

  setWindow(window: Window): SceneChangeSet {
    this.window = window;
    this.updateNormalized();
    return { ...emptyChangeSet(), windowChanged: true };
  }

  translateWindow(offset: Vec2): SceneChangeSet {
    return this.setWindow(Window.translate(this.window, offset));
  }

  zoomWindow(factor: number): SceneChangeSet {
    return this.setWindow(Window.zoom(this.window, factor));
  }

  rotateWindow(deltaDegrees: number): SceneChangeSet {
    return this.setWindow(Window.rotate(this.window, deltaDegrees));
  }

  /** Recomputes every cached normalized vertex list from the current window. */
  updateNormalized(): void {
    this.normalized = this.objects.map((obj) => normalizeVertices(verticesOf(obj), this.window));
  }

  /** Replaces the contents; the window is kept when the document has none. */
  load(doc: SceneDocument): SceneChangeSet {
    const removed = this.reset().removed;
    this.objects = [...doc.objects];
    if (doc.window) this.window = doc.window;
    this.updateNormalized();
    return {
      added: this.objects.map((_, i) => i),
      updated: [],
      removed,
      windowChanged: doc.window !== null
    };
  }

  save(): SceneDocument {
    return { objects: [...this.objects], window: this.window };
  }

  reset(): SceneChangeSet {
    const removed = this.objects.map((_, i) => i).reverse();
    this.objects = [];
    this.normalized = [];
    return { ...emptyChangeSet(), removed };
  }

  private assertIndex(index: number): GraphicObject {
    const obj = Number.isInteger(index) ? this.objects[index] : undefined;
    if (!obj) {
      throw new RangeError(`Object index ${index} is out of range (scene has ${this.objects.length})`);
    }
    return obj;
  }
}
