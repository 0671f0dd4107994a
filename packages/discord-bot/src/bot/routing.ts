/**
 * @description: Translates discord.js messages and interactions into registry invocations.
 * @scope: core
 * @module: Routing
 * @risk: moderate - A wrong scope or argument mapping resolves the wrong command or rejects valid input.
 */

import {
  CommandKind,
  GLOBAL_SCOPE,
  type CommandContext,
  type Invocation
} from '../commands/BaseCommand.js';
import { tokenize } from '../utils/options.js';

/**
 * The parts of a discord.js `Message` routing reads.
 */
export interface MessageLike {
  content: string;
  author: { id: string; bot: boolean };
  guildId: string | null;
  channelId: string;
  reply(content: string): Promise<unknown>;
}

interface InteractionOptionLike {
  name: string;
  value?: string | number | boolean;
  options?: readonly InteractionOptionLike[];
}

interface InteractionLike {
  commandName: string;
  guildId: string | null;
  channelId: string | null;
  user: { id: string };
  reply(content: string): Promise<unknown>;
}

/**
 * The parts of a discord.js `ChatInputCommandInteraction` routing reads.
 */
export interface SlashInteractionLike extends InteractionLike {
  options: { readonly data: readonly InteractionOptionLike[] };
}

/**
 * The parts of a discord.js `ContextMenuCommandInteraction` routing reads.
 */
export interface ContextMenuInteractionLike extends InteractionLike {
  targetId: string;
}

const scopeOf = (guildId: string | null): string => guildId ?? GLOBAL_SCOPE;

function buildContext(
  source: MessageLike | InteractionLike,
  fields: { commandName: string; kind: CommandKind; scope: string; authorId: string; channelId?: string; targetId?: string }
): CommandContext {
  return {
    ...fields,
    source,
    reply: async (content: string) => {
      await source.reply(content);
    }
  };
}

/**
 * Builds a message-command invocation from a chat message, or returns null when the message is not a command:
 * a bot author, no prefix, or nothing after the prefix.
 */
export function invocationFromMessage(message: MessageLike, prefix: string): Invocation | null {
  if (message.author.bot || prefix.length === 0 || !message.content.startsWith(prefix)) {
    return null;
  }

  const [name, ...args] = tokenize(message.content.slice(prefix.length));
  if (!name) {
    return null;
  }

  const scope = scopeOf(message.guildId);
  return {
    name,
    kind: CommandKind.Message,
    scope,
    args,
    context: buildContext(message, {
      commandName: name,
      kind: CommandKind.Message,
      scope,
      authorId: message.author.id,
      channelId: message.channelId
    })
  };
}

/**
 * Flattens the interaction's option tree into a name → value map. Subcommand
 * groups and subcommands contribute their nested options.
 */
function collectOptionValues(options: readonly InteractionOptionLike[], into: Record<string, unknown> = {}): Record<string, unknown> {
  for (const option of options) {
    if (option.options) {
      collectOptionValues(option.options, into);
    } else if (option.value !== undefined) {
      into[option.name] = option.value;
    }
  }
  return into;
}

export function invocationFromSlash(interaction: SlashInteractionLike): Invocation {
  const scope = scopeOf(interaction.guildId);
  return {
    name: interaction.commandName,
    kind: CommandKind.Slash,
    scope,
    args: collectOptionValues(interaction.options.data),
    context: buildContext(interaction, {
      commandName: interaction.commandName,
      kind: CommandKind.Slash,
      scope,
      authorId: interaction.user.id,
      channelId: interaction.channelId ?? undefined
    })
  };
}

export function invocationFromContextMenu(interaction: ContextMenuInteractionLike): Invocation {
  const scope = scopeOf(interaction.guildId);
  return {
    name: interaction.commandName,
    kind: CommandKind.ContextMenu,
    scope,
    args: {},
    context: buildContext(interaction, {
      commandName: interaction.commandName,
      kind: CommandKind.ContextMenu,
      scope,
      authorId: interaction.user.id,
      channelId: interaction.channelId ?? undefined,
      targetId: interaction.targetId
    })
  };
}
