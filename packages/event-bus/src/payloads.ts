// Payloads stay structural: the bus sits below the graphics kernel and cannot
// import its types without a cycle.

export type PointPayload = {
  x: number;
  y: number;
};

export type WindowPayload = {
  min: PointPayload;
  max: PointPayload;
  angle: number;
};

export type SceneObjectAddedPayload = {
  index: number;
  name: string;
  kind: string;
};

export type SceneObjectsRemovedPayload = {
  indices: number[];
};

export type SceneObjectUpdatedPayload = {
  index: number;
  name: string;
  kind: string;
};

export type SceneWindowChangedPayload = {
  window: WindowPayload;
  reason: "set" | "translate" | "zoom" | "rotate" | "resize";
};

export type SceneLoadedPayload = {
  objectCount: number;
  hasWindow: boolean;
};

export type EditorClippingMethodChangedPayload = {
  method: string;
};

export type EditorRotationReferenceChangedPayload = {
  reference: { kind: "center" } | { kind: "origin" } | { kind: "absolute"; point: PointPayload };
};

export type EditorViewportResizedPayload = {
  width: number;
  height: number;
};

export type EditorFrameBuiltPayload = {
  commandCount: number;
  culledCount: number;
};

export type LogLevel = "info" | "warn" | "error";

export type EditorLogPayload = {
  level: LogLevel;
  message: string;
};

export type LogEventPayload = {
  topic: string;
  payload: unknown;
};

type TopicsConst = typeof import("./topics.js").Topics;

export type TopicPayloadMap = {
  [K in TopicsConst["SCENE_OBJECT_ADDED"]]: SceneObjectAddedPayload;
} & {
  [K in TopicsConst["SCENE_OBJECTS_REMOVED"]]: SceneObjectsRemovedPayload;
} & {
  [K in TopicsConst["SCENE_OBJECT_UPDATED"]]: SceneObjectUpdatedPayload;
} & {
  [K in TopicsConst["SCENE_WINDOW_CHANGED"]]: SceneWindowChangedPayload;
} & {
  [K in TopicsConst["SCENE_LOADED"]]: SceneLoadedPayload;
} & {
  [K in TopicsConst["EDITOR_CLIPPING_METHOD_CHANGED"]]: EditorClippingMethodChangedPayload;
} & {
  [K in TopicsConst["EDITOR_ROTATION_REFERENCE_CHANGED"]]: EditorRotationReferenceChangedPayload;
} & {
  [K in TopicsConst["EDITOR_VIEWPORT_RESIZED"]]: EditorViewportResizedPayload;
} & {
  [K in TopicsConst["EDITOR_FRAME_BUILT"]]: EditorFrameBuiltPayload;
} & {
  [K in TopicsConst["EDITOR_LOG"]]: EditorLogPayload;
} & {
  [K in TopicsConst["LOG_EVENT"]]: LogEventPayload;
};

export type KnownTopic = keyof TopicPayloadMap;
