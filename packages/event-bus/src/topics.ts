export const Topics = {
  SCENE_OBJECT_ADDED: "scene:object-added",
  SCENE_OBJECTS_REMOVED: "scene:objects-removed",
  SCENE_OBJECT_UPDATED: "scene:object-updated",
  SCENE_WINDOW_CHANGED: "scene:window-changed",
  SCENE_LOADED: "scene:loaded",

  EDITOR_CLIPPING_METHOD_CHANGED: "editor:clipping-method-changed",
  EDITOR_ROTATION_REFERENCE_CHANGED: "editor:rotation-reference-changed",
  EDITOR_VIEWPORT_RESIZED: "editor:viewport-resized",
  EDITOR_FRAME_BUILT: "editor:frame-built",
  EDITOR_LOG: "editor:log",

  LOG_EVENT: "log:event"
} as const;
