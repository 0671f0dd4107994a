/**
 * @description: Example extension greeting users and guilds, with a user context-menu command.
 * @scope: extension
 * @module: GreetingsExtension
 * @risk: low - Replies and log lines only.
 */

import { Guild, MessageComponentInteraction, MessageFlags } from 'discord.js';
import { CommandKind, OptionType, defineCommand } from '../commands/BaseCommand.js';
import { HostEvents } from '../events/Event.js';
import type { ExtensionHost } from '../utils/extensionLoader.js';

export const hello = defineCommand({
  name: 'hello',
  description: 'Say hello to yourself or someone else',
  kind: CommandKind.Message,
  options: [{ name: 'who', type: OptionType.User, description: 'Who to greet' }],
  execute: async (context, options) => {
    const target = typeof options.who === 'string' ? options.who : context.authorId;
    const greeting = target ? `Hello, <@${target}>!` : 'Hello!';
    await context.reply(greeting);
    return greeting;
  }
});

export const showId = defineCommand({
  name: 'Show ID',
  kind: CommandKind.ContextMenu,
  target: 'user',
  execute: async (context) => {
    const content = context.targetId ? `ID: ${context.targetId}` : 'No target selected';
    await context.reply(content);
    return content;
  }
});

export function setup(host: ExtensionHost): void {
  host.register(hello);
  host.register(showId);

  host.subscribe(HostEvents.GuildCreated, (payload) => {
    if (payload instanceof Guild) {
      host.logger.info(`Joined guild ${payload.name} (${payload.id})`);
    }
  });

  host.subscribe(HostEvents.ComponentInteraction, async (payload) => {
    if (payload instanceof MessageComponentInteraction && payload.customId === 'greetings:wave') {
      await payload.reply({ content: '👋', flags: MessageFlags.Ephemeral });
    }
  });
}

export function teardown(host: ExtensionHost): void {
  host.logger.info('Greetings extension unloaded');
}
