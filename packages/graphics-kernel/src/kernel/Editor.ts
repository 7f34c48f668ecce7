import { EventBus, Topics, type LogLevel, type SceneWindowChangedPayload } from "@vecta/event-bus";
import type { Vec2 } from "@vecta/geometry";
import { paintCommands, type DrawingSurface, type PaintStats } from "@vecta/rendering-core";
import { UnsupportedAlgorithmError, isEditorError } from "../errors.js";
import { createDefaultLineClippers, type LineClipperRegistry } from "../algorithm/clipping/lineClipping.js";
import type { LineClippingMethod } from "../algorithm/clipping/types.js";
import type { CurveBasis } from "../algorithm/curves/basis.js";
import { ObjSceneCodec } from "../file/objCodec.js";
import type { FileCodec } from "../file/types.js";
import { createCurve, type GraphicObject } from "../model/graphicObject.js";
import {
  rotateObject,
  scaleObject,
  translateObject,
  type RotationReference
} from "../model/objectTransforms.js";
import type { SceneDocument } from "../scene/document.js";
import { Scene } from "../scene/Scene.js";
import { deviceDeltaToWindowOffset } from "../view/coordinateSystem.js";
import { FrameBuilder, type Frame } from "../view/FrameBuilder.js";
import { Viewport } from "../view/viewport.js";
import { Window, type Size } from "../view/window.js";
import { DEFAULT_EDITOR_OPTIONS, type EditorOptions } from "./options.js";

export type EditorInit = {
  /** Size of the device drawing area, before the margin. */
  viewportSize: Size;
  options?: Partial<EditorOptions>;
  bus?: EventBus;
  codec?: FileCodec<SceneDocument>;
  clippers?: LineClipperRegistry;
};

function describe(obj: GraphicObject): string {
  return obj.name === "" ? `<${obj.kind}>` : `${obj.name} <${obj.kind}>`;
}

/**
 * Owns the scene, the viewport and the editing options, and is the boundary
 * where user-level failures become log messages: operations that fail with a
 * validation, parse, range or unsupported-method error log it on `editor:log`
 * and report failure through their return value.
 */
export class Editor {
  readonly bus: EventBus;

  private readonly scene: Scene;
  private readonly codec: FileCodec<SceneDocument>;
  private readonly clippers: LineClipperRegistry;
  private readonly frameBuilder = new FrameBuilder();

  private options: EditorOptions;
  private viewportSize: Size;
  private viewport: Viewport;

  constructor(init: EditorInit) {
    this.options = { ...DEFAULT_EDITOR_OPTIONS, ...init.options };
    this.bus = init.bus ?? new EventBus();
    this.codec = init.codec ?? new ObjSceneCodec();
    this.clippers = init.clippers ?? createDefaultLineClippers();

    this.viewportSize = { ...init.viewportSize };
    this.viewport = this.viewportFor(this.viewportSize);
    this.scene = new Scene(Window.fromViewportSize(this.viewportSize));
  }

  getScene(): Scene {
    return this.scene;
  }

  getOptions(): Readonly<EditorOptions> {
    return this.options;
  }

  getViewport(): Viewport {
    return this.viewport;
  }

  /** Accepts a ready object or a factory, so construction failures are caught here too. */
  addObject(input: GraphicObject | (() => GraphicObject)): number | null {
    return this.guard("invalid object", () => {
      const obj = typeof input === "function" ? input() : input;
      this.scene.addObject(obj);
      const index = this.scene.size - 1;
      this.bus.publish(Topics.SCENE_OBJECT_ADDED, { index, name: obj.name, kind: obj.kind });
      this.log("info", `Object added: ${describe(obj)}`);
      return index;
    });
  }

  /** Builds a curve with the configured step count and adds it. */
  addCurve(controlPoints: readonly Vec2[], options: { name?: string; basis?: CurveBasis } = {}): number | null {
    return this.addObject(() => createCurve(controlPoints, { ...options, steps: this.options.curveSteps }));
  }

  removeObjects(indices: readonly number[]): boolean {
    return this.succeeded("cannot remove objects", () => {
      const { removed } = this.scene.removeObjects(indices);
      this.bus.publish(Topics.SCENE_OBJECTS_REMOVED, { indices: removed });
      this.log("info", `Objects removed: ${removed.length}`);
    });
  }

  translateObjects(indices: readonly number[], offset: Vec2): boolean {
    return this.updateObjects("cannot move objects", indices, (obj) => translateObject(obj, offset));
  }

  scaleObjects(indices: readonly number[], factor: Vec2): boolean {
    return this.updateObjects("cannot scale objects", indices, (obj) => scaleObject(obj, factor));
  }

  /** Rotates about the pivot chosen by the current rotation reference. */
  rotateObjects(indices: readonly number[], angleDegrees: number): boolean {
    const reference = this.options.rotationReference;
    return this.updateObjects("cannot rotate objects", indices, (obj) => rotateObject(obj, angleDegrees, reference));
  }

  /** Moves the window along its own axes. */
  panWindow(offset: Vec2): boolean {
    return this.succeeded("cannot move window", () => {
      this.scene.translateWindow(Window.toWorldOffset(this.scene.getWindow(), offset));
      this.publishWindow("translate");
    });
  }

  /** Pans so the content follows a pointer drag of `deviceDelta` device units. */
  dragWindow(deviceDelta: Vec2): boolean {
    const offset = deviceDeltaToWindowOffset(deviceDelta, this.viewport, this.scene.getWindow());
    return this.panWindow(offset);
  }

  zoomWindow(factor: number): boolean {
    return this.succeeded("cannot zoom window", () => {
      this.scene.zoomWindow(factor);
      this.publishWindow("zoom");
    });
  }

  rotateWindow(deltaDegrees: number): boolean {
    return this.succeeded("cannot rotate window", () => {
      this.scene.rotateWindow(deltaDegrees);
      this.publishWindow("rotate");
    });
  }

  /** Keeps the world-per-pixel ratio: the window grows or shrinks with the drawing area. */
  resizeViewport(size: Size): boolean {
    return this.succeeded("cannot resize viewport", () => {
      const viewport = this.viewportFor(size);
      const window = Window.resizeProportionally(this.scene.getWindow(), this.viewportSize, size);

      this.viewportSize = { ...size };
      this.viewport = viewport;
      this.scene.setWindow(window);

      this.bus.publish(Topics.EDITOR_VIEWPORT_RESIZED, { width: size.width, height: size.height });
      this.publishWindow("resize");
    });
  }

  setClippingMethod(method: LineClippingMethod): boolean {
    return this.succeeded("cannot select clipping method", () => {
      if (!this.clippers.has(method)) throw new UnsupportedAlgorithmError(method);
      this.options = { ...this.options, clippingMethod: method };
      this.bus.publish(Topics.EDITOR_CLIPPING_METHOD_CHANGED, { method });
      this.log("info", `Clipping method: ${method}`);
    });
  }

  setRotationReference(reference: RotationReference): void {
    this.options = { ...this.options, rotationReference: reference };
    this.bus.publish(Topics.EDITOR_ROTATION_REFERENCE_CHANGED, { reference });
  }

  /** Replaces the scene with the decoded text; on a parse error the scene is left untouched. */
  loadScene(text: string): boolean {
    return this.succeeded("cannot load scene", () => {
      const doc = this.codec.decode(text);
      this.scene.load(doc);
      this.bus.publish(Topics.SCENE_LOADED, { objectCount: doc.objects.length, hasWindow: doc.window !== null });
      if (doc.window) this.publishWindow("set");
      this.log("info", `Scene loaded: ${doc.objects.length} object(s)`);
    });
  }

  saveScene(): string {
    return this.codec.encode(this.scene.save());
  }

  buildFrame(): Frame {
    const frame = this.frameBuilder.generate({
      scene: this.scene,
      viewport: this.viewport,
      clippingMethod: this.options.clippingMethod,
      clipSpace: this.options.clipSpace,
      registry: this.clippers
    });
    this.bus.publish(Topics.EDITOR_FRAME_BUILT, {
      commandCount: frame.commands.length,
      culledCount: frame.culled
    });
    return frame;
  }

  render(surface: DrawingSurface): PaintStats {
    return paintCommands(surface, this.buildFrame().commands, {
      onError: (error) => {
        const source = error.source ? ` (${error.source})` : "";
        this.log("error", `ERROR: ${error.message}${source}`);
      }
    });
  }

  private updateObjects(
    action: string,
    indices: readonly number[],
    update: (obj: GraphicObject) => GraphicObject
  ): boolean {
    return this.succeeded(action, () => {
      const targets = indices.map((index) => {
        const obj = this.scene.getObject(index);
        if (!obj) throw new RangeError(`Object index ${index} is out of range (scene has ${this.scene.size})`);
        return { index, obj: update(obj) };
      });
      for (const { index, obj } of targets) {
        this.scene.replaceObject(index, obj);
        this.bus.publish(Topics.SCENE_OBJECT_UPDATED, { index, name: obj.name, kind: obj.kind });
      }
    });
  }

  private viewportFor(size: Size): Viewport {
    return Viewport.withMargin(Viewport.fromSize(size), this.options.viewportMargin);
  }

  private publishWindow(reason: SceneWindowChangedPayload["reason"]): void {
    const { min, max, angle } = this.scene.getWindow();
    this.bus.publish(Topics.SCENE_WINDOW_CHANGED, { window: { min, max, angle }, reason });
  }

  private log(level: LogLevel, message: string): void {
    this.bus.publish(Topics.EDITOR_LOG, { level, message });
  }

  private succeeded(action: string, run: () => void): boolean {
    return this.guard(action, () => {
      run();
      return true;
    }) ?? false;
  }

  private guard<T>(action: string, run: () => T): T | null {
    try {
      return run();
    } catch (error) {
      if (!isEditorError(error) && !(error instanceof RangeError)) throw error;
      this.log("error", `ERROR: ${action}: ${error.message}`);
      return null;
    }
  }
}
