export { ParseError, UnsupportedAlgorithmError, ValidationError, isEditorError } from "./errors.js";

export * from "./algorithm/clipping/index.js";

export { BEZIER_BASIS, BSPLINE_BASIS, DEFAULT_CURVE_STEPS, validateControlPoints, validateSteps } from "./algorithm/curves/basis.js";
export type { CurveBasis } from "./algorithm/curves/basis.js";
export { tessellateBezier } from "./algorithm/curves/bezier.js";
export { tessellateBSpline } from "./algorithm/curves/bspline.js";
export { tessellate } from "./algorithm/curves/tessellate.js";

export {
  centroidOf,
  createCurve,
  createLine,
  createPoint,
  createPolygon,
  renameObject,
  verticesOf
} from "./model/graphicObject.js";
export type {
  CurveObject,
  GraphicObject,
  GraphicObjectKind,
  LineObject,
  PointObject,
  PolygonObject
} from "./model/graphicObject.js";
export {
  rotateObject,
  rotationPivot,
  scaleObject,
  transformObject,
  translateObject
} from "./model/objectTransforms.js";
export type { RotationReference } from "./model/objectTransforms.js";
export {
  createWireframe,
  projectParallel,
  rotateWireframe,
  scaleWireframe,
  transformWireframe,
  translateWireframe
} from "./model/wireframe3d.js";
export type { Wireframe3D } from "./model/wireframe3d.js";

export { Scene } from "./scene/Scene.js";
export type { SceneChangeSet } from "./scene/Scene.js";
export type { SceneDocument } from "./scene/document.js";

export { ObjSceneCodec } from "./file/objCodec.js";
export type { FileCodec } from "./file/types.js";

export { Window } from "./view/window.js";
export type { Size } from "./view/window.js";
export { Viewport } from "./view/viewport.js";
export {
  deviceDeltaToWindowOffset,
  normalizationMatrix,
  normalizeVertices,
  toDevice,
  toWindowFrame,
  viewportMatrix,
  worldToDeviceMatrix
} from "./view/coordinateSystem.js";
export { EDITOR_COLORS, FRAME_STYLE, LINE_WIDTHS, OBJECT_STYLE, POINT_RADIUS } from "./view/constants.js";
export { FrameBuilder } from "./view/FrameBuilder.js";
export type { ClipSpace, Frame, FrameBuilderInput } from "./view/FrameBuilder.js";

export { Editor } from "./kernel/Editor.js";
export type { EditorInit } from "./kernel/Editor.js";
export { DEFAULT_EDITOR_OPTIONS } from "./kernel/options.js";
export type { EditorOptions } from "./kernel/options.js";
