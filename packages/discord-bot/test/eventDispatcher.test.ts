/**
 * @description: Verifies listener ordering, failure isolation and subscription bookkeeping.
 * @scope: test
 * @module: EventDispatcherTests
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { Event } from '../src/events/Event.js';
import { EventDispatcher } from '../src/utils/eventDispatcher.js';

test('publish runs every listener in order even when one throws', async () => {
  const dispatcher = new EventDispatcher();
  const calls: string[] = [];

  dispatcher.subscribe('ready', () => {
    calls.push('first');
  });
  dispatcher.subscribe('ready', () => {
    calls.push('second');
    throw new Error('listener failure');
  });
  dispatcher.subscribe('ready', async () => {
    calls.push('third');
  });

  await dispatcher.publish('ready', {});
  assert.deepEqual(calls, ['first', 'second', 'third']);
});

test('async listeners finish before the next one starts', async () => {
  const dispatcher = new EventDispatcher();
  const calls: string[] = [];

  dispatcher.subscribe('tick', async () => {
    await new Promise((resolve) => setTimeout(resolve, 10));
    calls.push('slow');
  });
  dispatcher.subscribe('tick', () => {
    calls.push('fast');
  });

  await dispatcher.publish('tick', undefined);
  assert.deepEqual(calls, ['slow', 'fast']);
});

test('listeners receive the published payload', async () => {
  const dispatcher = new EventDispatcher();
  const payloads: unknown[] = [];
  const payload = { id: 'guild' };

  dispatcher.subscribe('guildCreate', (received) => {
    payloads.push(received);
  });

  await dispatcher.publish('guildCreate', payload);
  await dispatcher.publish('somethingElse', 'ignored');
  assert.deepEqual(payloads, [payload]);
});

test('subscribing the same handler twice fires it twice', async () => {
  const dispatcher = new EventDispatcher();
  let count = 0;
  const handler = () => {
    count += 1;
  };

  dispatcher.subscribe('ready', handler);
  dispatcher.subscribe('ready', handler);

  await dispatcher.publish('ready', null);
  assert.equal(count, 2);
  assert.equal(dispatcher.listenerCount('ready'), 2);
});

test('once listeners fire a single time', async () => {
  const dispatcher = new EventDispatcher();
  let count = 0;

  dispatcher.subscribe('ready', () => {
    count += 1;
  }, { once: true });

  await dispatcher.publish('ready', null);
  await dispatcher.publish('ready', null);
  assert.equal(count, 1);
  assert.equal(dispatcher.listenerCount('ready'), 0);
});

test('unsubscribe removes only the given registration', async () => {
  const dispatcher = new EventDispatcher();
  const calls: string[] = [];

  const first = dispatcher.subscribe('ready', () => {
    calls.push('first');
  });
  dispatcher.subscribe('ready', () => {
    calls.push('second');
  });

  assert.equal(dispatcher.unsubscribe(first), true);
  assert.equal(dispatcher.unsubscribe(first), false);

  await dispatcher.publish('ready', null);
  assert.deepEqual(calls, ['second']);
});

test('restore puts a listener back at its original position', async () => {
  const dispatcher = new EventDispatcher();
  const calls: string[] = [];

  dispatcher.subscribe('ready', () => {
    calls.push('a');
  });
  const middle = dispatcher.subscribe('ready', () => {
    calls.push('b');
  });
  dispatcher.subscribe('ready', () => {
    calls.push('c');
  });

  dispatcher.unsubscribe(middle);
  assert.equal(dispatcher.restore(middle), true);
  assert.equal(dispatcher.restore(middle), false);

  await dispatcher.publish('ready', null);
  assert.deepEqual(calls, ['a', 'b', 'c']);
});

test('listenerCount and eventNames reflect current subscriptions', () => {
  const dispatcher = new EventDispatcher();
  const listener = dispatcher.subscribe('ready', () => undefined);
  dispatcher.subscribe('messageCreate', () => undefined);
  dispatcher.subscribe('messageCreate', () => undefined);

  assert.equal(dispatcher.listenerCount(), 3);
  assert.deepEqual(dispatcher.eventNames(), ['ready', 'messageCreate']);

  dispatcher.unsubscribe(listener);
  assert.deepEqual(dispatcher.eventNames(), ['messageCreate']);
});

class ShoutEvent extends Event<string> {
  public readonly heard: string[] = [];

  constructor(once: boolean) {
    super({ name: 'shout', once });
  }

  protected accepts(payload: unknown): payload is string {
    return typeof payload === 'string';
  }

  public execute(payload: string): void {
    this.heard.push(payload.toUpperCase());
  }
}

test('Event subclasses subscribe themselves and skip payloads they do not accept', async () => {
  const dispatcher = new EventDispatcher();
  const event = new ShoutEvent(false);
  const listener = event.register(dispatcher);

  assert.equal(listener.once, false);
  assert.equal(listener.event, 'shout');

  await dispatcher.publish('shout', 42);
  await dispatcher.publish('shout', 'hello');
  assert.deepEqual(event.heard, ['HELLO']);
});

test('a once Event is consumed even by a payload it does not accept', async () => {
  const dispatcher = new EventDispatcher();
  const event = new ShoutEvent(true);
  event.register(dispatcher);

  await dispatcher.publish('shout', 42);
  await dispatcher.publish('shout', 'hello');
  assert.deepEqual(event.heard, []);
});
