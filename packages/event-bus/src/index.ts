export type {
  EditorClippingMethodChangedPayload,
  EditorFrameBuiltPayload,
  EditorLogPayload,
  EditorRotationReferenceChangedPayload,
  EditorViewportResizedPayload,
  KnownTopic,
  LogEventPayload,
  LogLevel,
  PointPayload,
  SceneLoadedPayload,
  SceneObjectAddedPayload,
  SceneObjectsRemovedPayload,
  SceneObjectUpdatedPayload,
  SceneWindowChangedPayload,
  TopicPayloadMap,
  WindowPayload
} from "./payloads.js";
export type { EventBusHandler, EventBusMiddleware, EventBusTopic, Unsubscribe } from "./eventBus.js";
export { EventBus, createEventLoggerMiddleware, createLogSinkMiddleware } from "./eventBus.js";
export { Topics } from "./topics.js";
