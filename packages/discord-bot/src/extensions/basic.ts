/**
 * @description: Example extension with a chat ping, a slash echo and a dice roll.
 * @scope: extension
 * @module: BasicExtension
 * @risk: low - Demonstration commands with no side effects beyond replies.
 */

import { Client } from 'discord.js';
import { CommandKind, OptionType, defineCommand, type CommandContext } from '../commands/BaseCommand.js';
import { Event, HostEvents } from '../events/Event.js';
import type { ExtensionHost } from '../utils/extensionLoader.js';

const DEFAULT_SIDES = 6;

export const ping = defineCommand({
  name: 'ping',
  description: 'Check that the bot is listening',
  kind: CommandKind.Message,
  execute: async (context: CommandContext) => {
    await context.reply('pong');
    return 'pong';
  }
});

export const echo = defineCommand({
  name: 'echo',
  description: 'Repeat a message back',
  kind: CommandKind.Slash,
  options: [{ name: 'text', type: OptionType.String, description: 'What to repeat', required: true }],
  execute: async (context, options) => {
    const text = String(options.text);
    await context.reply(text);
    return text;
  }
});

/**
 * Rolls a die. `random` is injectable so the result can be pinned in tests.
 */
export function createRollCommand(random: () => number = Math.random) {
  return defineCommand({
    name: 'roll',
    description: 'Roll a die',
    kind: CommandKind.Slash,
    options: [{ name: 'sides', type: OptionType.Integer, description: 'Number of sides (default 6)' }],
    execute: async (context, options) => {
      const sides = typeof options.sides === 'number' ? options.sides : DEFAULT_SIDES;
      if (sides < 2) {
        throw new RangeError('A die needs at least 2 sides');
      }
      const result = Math.floor(random() * sides) + 1;
      await context.reply(`🎲 ${result} (d${sides})`);
      return result;
    },
    onError: async (error, context) => {
      const reason = error instanceof RangeError ? error.message : 'Something went wrong rolling the die';
      await context.reply(reason);
    }
  });
}

class ReadyLogger extends Event<Client<true>> {
  constructor(private readonly host: ExtensionHost) {
    super({ name: HostEvents.Ready, once: true });
  }

  protected accepts(payload: unknown): payload is Client<true> {
    return payload instanceof Client && payload.isReady();
  }

  public execute(client: Client<true>): void {
    this.host.logger.info(`Ready as ${client.user.tag}; serving ${client.guilds.cache.size} guilds`);
  }
}

export function setup(host: ExtensionHost): void {
  host.register(ping);
  host.register(echo);
  host.register(createRollCommand());
  new ReadyLogger(host).register(host);
}
