/**
 * @description: Verifies application command payloads and per-scope sync routes without touching Discord.
 * @scope: test
 * @module: CommandDeployerTests
 * @risk: low - Uses a recording transport in place of the REST client.
 */

import test from 'node:test';
import assert from 'node:assert/strict';
import { ApplicationCommandOptionType, ApplicationCommandType, Routes } from 'discord.js';

import { CommandKind, OptionType, defineCommand } from '../src/commands/BaseCommand.js';
import {
  buildSlashCommand,
  deployCommands,
  groupByScope,
  toApplicationCommand,
  type CommandSyncTransport
} from '../src/utils/commandDeployer.js';
import { GUILD_ID } from './helpers.js';

const CLIENT_ID = 'test-client';

const echo = defineCommand({
  name: 'echo',
  description: 'Repeat a message back',
  kind: CommandKind.Slash,
  options: [{ name: 'text', type: OptionType.String, description: 'What to repeat', required: true }],
  execute: () => undefined
});

function recordingTransport() {
  const calls: Array<{ route: string; body: unknown }> = [];
  const transport: CommandSyncTransport = {
    put: async (route, options) => {
      calls.push({ route, body: options.body });
      return [];
    }
  };
  return { calls, transport };
}

test('slash commands become chat input payloads with their options', () => {
  const payload = buildSlashCommand(echo);

  assert.equal(payload.name, 'echo');
  assert.equal(payload.description, 'Repeat a message back');

  const [option] = payload.options ?? [];
  assert.ok(option);
  assert.equal(option.type, ApplicationCommandOptionType.String);
  assert.equal(option.name, 'text');
  assert.equal('required' in option ? option.required : undefined, true);
});

test('context-menu commands use their target type and message commands are not synced', () => {
  const userMenu = toApplicationCommand(defineCommand({ name: 'Show ID', kind: CommandKind.ContextMenu, execute: () => undefined }));
  const messageMenu = toApplicationCommand(defineCommand({
    name: 'Quote',
    kind: CommandKind.ContextMenu,
    target: 'message',
    execute: () => undefined
  }));

  assert.equal(userMenu?.type, ApplicationCommandType.User);
  assert.equal(messageMenu?.type, ApplicationCommandType.Message);
  assert.equal(toApplicationCommand(defineCommand({ name: 'ping', kind: CommandKind.Message, execute: () => 'pong' })), null);
});

test('groupByScope keeps requested scopes even when they end up empty', () => {
  const grouped = groupByScope([echo], ['global', GUILD_ID]);

  assert.deepEqual([...grouped.keys()], ['global', GUILD_ID]);
  assert.equal(grouped.get('global')?.length, 1);
  assert.equal(grouped.get(GUILD_ID)?.length, 0);
});

test('deployCommands issues one PUT per scope', async () => {
  const { calls, transport } = recordingTransport();
  const guildOnly = defineCommand({ ...echo, name: 'guild-echo', scope: GUILD_ID });
  const ping = defineCommand({ name: 'ping', kind: CommandKind.Message, execute: () => 'pong' });

  const results = await deployCommands([echo, guildOnly, ping], { token: 'test-token', clientId: CLIENT_ID, transport });

  assert.deepEqual(results, [
    { scope: 'global', route: Routes.applicationCommands(CLIENT_ID), count: 1 },
    { scope: GUILD_ID, route: Routes.applicationGuildCommands(CLIENT_ID, GUILD_ID), count: 1 }
  ]);
  assert.deepEqual(calls.map((call) => call.route), [
    Routes.applicationCommands(CLIENT_ID),
    Routes.applicationGuildCommands(CLIENT_ID, GUILD_ID)
  ]);
});

test('deployCommands propagates transport failures', async () => {
  const failure = new Error('401: Unauthorized');
  const transport: CommandSyncTransport = {
    put: async () => {
      throw failure;
    }
  };

  await assert.rejects(deployCommands([echo], { token: 'test-token', clientId: CLIENT_ID, transport }), failure);
});
