import { test, describe } from 'node:test';
import assert from 'node:assert';
import { EventBus, createEventLoggerMiddleware, createLogSinkMiddleware } from './eventBus.js';
import { Topics } from './topics.js';
import type { LogEventPayload, LogLevel } from './payloads.js';

describe('EventBus', () => {
  test('subscribe receives published payloads until unsubscribed', () => {
    const bus = new EventBus();
    const received: number[] = [];

    const off = bus.subscribe(Topics.SCENE_OBJECT_ADDED, (payload) => {
      received.push(payload.index);
    });

    bus.publish(Topics.SCENE_OBJECT_ADDED, { index: 0, name: 'a', kind: 'point' });
    off();
    bus.publish(Topics.SCENE_OBJECT_ADDED, { index: 1, name: 'b', kind: 'line' });

    assert.deepStrictEqual(received, [0]);
    assert.strictEqual(bus.hasSubscribers(Topics.SCENE_OBJECT_ADDED), false);
  });

  test('middlewares run in order around dispatch', () => {
    const order: string[] = [];
    const bus = new EventBus({
      middlewares: [
        (_event, next) => {
          order.push('first:before');
          next();
          order.push('first:after');
        },
        (_event, next) => {
          order.push('second');
          next();
        }
      ]
    });
    bus.subscribe('custom', () => order.push('handler'));

    bus.publish('custom', null);

    assert.deepStrictEqual(order, ['first:before', 'second', 'handler', 'first:after']);
  });

  test('a middleware that does not call next swallows the event', () => {
    const bus = new EventBus({ middlewares: [() => undefined] });
    let called = false;
    bus.subscribe('custom', () => {
      called = true;
    });

    bus.publish('custom', 1);

    assert.strictEqual(called, false);
  });
});

describe('createEventLoggerMiddleware', () => {
  test('re-publishes non-ignored events on the log topic', () => {
    const bus = new EventBus({
      middlewares: [
        createEventLoggerMiddleware({
          ignoreTopics: [Topics.EDITOR_FRAME_BUILT],
          logTopic: Topics.LOG_EVENT
        })
      ]
    });
    const logged: LogEventPayload[] = [];
    bus.subscribe(Topics.LOG_EVENT, (payload) => logged.push(payload));

    bus.publish(Topics.SCENE_OBJECTS_REMOVED, { indices: [2, 0] });
    bus.publish(Topics.EDITOR_FRAME_BUILT, { commandCount: 3, culledCount: 0 });

    assert.deepStrictEqual(logged, [
      { topic: Topics.SCENE_OBJECTS_REMOVED, payload: { indices: [2, 0] } }
    ]);
  });
});

describe('createLogSinkMiddleware', () => {
  test('forwards editor log messages at or above the threshold', () => {
    const lines: string[] = [];
    const bus = new EventBus({
      middlewares: [
        createLogSinkMiddleware({
          minLevel: 'warn',
          sink: (level: LogLevel, message: string) => lines.push(`${level}: ${message}`)
        })
      ]
    });

    bus.publish(Topics.EDITOR_LOG, { level: 'info', message: 'Object added: <point>' });
    bus.publish(Topics.EDITOR_LOG, { level: 'error', message: 'ERROR: invalid object' });
    bus.publish(Topics.SCENE_LOADED, { objectCount: 1, hasWindow: true });

    assert.deepStrictEqual(lines, ['error: ERROR: invalid object']);
  });
});
