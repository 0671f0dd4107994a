/**
 * @description: Checks how chat messages and interactions become invocations.
 * @scope: test
 * @module: RoutingTests
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import {
  invocationFromContextMenu,
  invocationFromMessage,
  invocationFromSlash,
  type SlashInteractionLike
} from '../src/bot/routing.js';
import { CommandKind, GLOBAL_SCOPE } from '../src/commands/BaseCommand.js';
import { AUTHOR_ID, CHANNEL_ID, GUILD_ID, OTHER_USER_ID, createMessage } from './helpers.js';

test('prefixed messages become message invocations with positional arguments', () => {
  const invocation = invocationFromMessage(createMessage('!say "hello there" 2'), '!');

  assert.ok(invocation);
  assert.equal(invocation.name, 'say');
  assert.equal(invocation.kind, CommandKind.Message);
  assert.equal(invocation.scope, GUILD_ID);
  assert.deepEqual(invocation.args, ['hello there', '2']);
  assert.equal(invocation.context.authorId, AUTHOR_ID);
  assert.equal(invocation.context.channelId, CHANNEL_ID);
});

test('direct messages resolve in the global scope', () => {
  const invocation = invocationFromMessage(createMessage('!ping', { guildId: null }), '!');
  assert.equal(invocation?.scope, GLOBAL_SCOPE);
});

test('messages that are not commands produce no invocation', () => {
  assert.equal(invocationFromMessage(createMessage('ping'), '!'), null);
  assert.equal(invocationFromMessage(createMessage('!'), '!'), null);
  assert.equal(invocationFromMessage(createMessage('!ping', { bot: true }), '!'), null);
  assert.equal(invocationFromMessage(createMessage('!ping'), ''), null);
});

test('multi-character prefixes are stripped before tokenising', () => {
  const invocation = invocationFromMessage(createMessage('bot> roll 20'), 'bot>');
  assert.equal(invocation?.name, 'roll');
  assert.deepEqual(invocation?.args, ['20']);
});

test('context replies go back through the source message', async () => {
  const message = createMessage('!ping');
  const invocation = invocationFromMessage(message, '!');

  await invocation?.context.reply('pong');
  assert.deepEqual(message.replies, ['pong']);
  assert.equal(invocation?.context.source, message);
});

test('slash interactions flatten option values by name', async () => {
  const replies: string[] = [];
  const interaction: SlashInteractionLike = {
    commandName: 'config',
    guildId: GUILD_ID,
    channelId: null,
    user: { id: AUTHOR_ID },
    options: {
      data: [
        { name: 'set', options: [{ name: 'key', value: 'prefix' }, { name: 'value', value: '?' }] },
        { name: 'verbose', value: true }
      ]
    },
    reply: async (content: string) => {
      replies.push(content);
    }
  };

  const invocation = invocationFromSlash(interaction);
  assert.equal(invocation.kind, CommandKind.Slash);
  assert.equal(invocation.scope, GUILD_ID);
  assert.deepEqual(invocation.args, { key: 'prefix', value: '?', verbose: true });
  assert.equal(invocation.context.channelId, undefined);

  await invocation.context.reply('saved');
  assert.deepEqual(replies, ['saved']);
});

test('context-menu interactions carry their target', () => {
  const invocation = invocationFromContextMenu({
    commandName: 'Show ID',
    guildId: null,
    channelId: CHANNEL_ID,
    user: { id: AUTHOR_ID },
    targetId: OTHER_USER_ID,
    reply: async () => undefined
  });

  assert.equal(invocation.kind, CommandKind.ContextMenu);
  assert.equal(invocation.scope, GLOBAL_SCOPE);
  assert.deepEqual(invocation.args, {});
  assert.equal(invocation.context.targetId, OTHER_USER_ID);
});
