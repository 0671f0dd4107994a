/**
 * @module: CommandDeployer
 * @risk: high
 * @scope: core
 *
 * @description: Converts registered slash and context-menu commands to application command payloads and syncs them with Discord.
 *
 * @impact
 * Risk: A failed sync leaves Discord showing stale commands; message commands are never synced.
 */

import {
  ApplicationCommandType,
  ContextMenuCommandBuilder,
  REST,
  Routes,
  SlashCommandBuilder,
  type RESTPostAPIApplicationCommandsJSONBody,
  type RESTPostAPIChatInputApplicationCommandsJSONBody,
  type RESTPostAPIContextMenuApplicationCommandsJSONBody
} from 'discord.js';
import { CommandKind, GLOBAL_SCOPE, OptionType, type Command, type CommandOption, type CommandScope } from '../commands/BaseCommand.js';
import { logger } from './logger.js';

const deployLogger = logger.child({ module: 'commandDeployer' });

const DEFAULT_DESCRIPTION = 'No description provided';

/**
 * The slice of `@discordjs/rest` the deployer uses; lets callers substitute a recording transport.
 */
export interface CommandSyncTransport {
  put(route: `/${string}`, options: { body: unknown }): Promise<unknown>;
}

export interface DeployResult {
  scope: CommandScope;
  route: string;
  count: number;
}

function addOption(builder: SlashCommandBuilder, option: CommandOption): void {
  const description = option.description ?? DEFAULT_DESCRIPTION;
  const required = option.required ?? false;

  switch (option.type) {
    case OptionType.String:
      builder.addStringOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
    case OptionType.Integer:
      builder.addIntegerOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
    case OptionType.Number:
      builder.addNumberOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
    case OptionType.Boolean:
      builder.addBooleanOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
    case OptionType.User:
      builder.addUserOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
    case OptionType.Channel:
      builder.addChannelOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
    case OptionType.Role:
      builder.addRoleOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
    case OptionType.Mentionable:
      builder.addMentionableOption((o) => o.setName(option.name).setDescription(description).setRequired(required));
      break;
  }
}

export function buildSlashCommand(command: Command): RESTPostAPIChatInputApplicationCommandsJSONBody {
  const builder = new SlashCommandBuilder()
    .setName(command.name)
    .setDescription(command.description ?? DEFAULT_DESCRIPTION);
  for (const option of command.options) {
    addOption(builder, option);
  }
  return builder.toJSON();
}

export function buildContextMenuCommand(command: Command): RESTPostAPIContextMenuApplicationCommandsJSONBody {
  return new ContextMenuCommandBuilder()
    .setName(command.name)
    .setType(command.target === 'message' ? ApplicationCommandType.Message : ApplicationCommandType.User)
    .toJSON();
}

/**
 * Builds the application command payload for a slash or context-menu command.
 * @returns null for message commands, which Discord does not know about
 */
export function toApplicationCommand(command: Command): RESTPostAPIApplicationCommandsJSONBody | null {
  switch (command.kind) {
    case CommandKind.Slash:
      return buildSlashCommand(command);
    case CommandKind.ContextMenu:
      return buildContextMenuCommand(command);
    case CommandKind.Message:
      return null;
  }
}

/**
 * Groups syncable commands by scope. Every scope in `scopes` gets an entry even
 * when empty, so a sync can clear commands that no longer exist.
 */
export function groupByScope(
  commands: readonly Command[],
  scopes: readonly CommandScope[] = []
): Map<CommandScope, RESTPostAPIApplicationCommandsJSONBody[]> {
  const grouped = new Map<CommandScope, RESTPostAPIApplicationCommandsJSONBody[]>();
  for (const scope of scopes) {
    grouped.set(scope, []);
  }

  for (const command of commands) {
    const payload = toApplicationCommand(command);
    if (!payload) continue;
    const bucket = grouped.get(command.scope) ?? [];
    bucket.push(payload);
    grouped.set(command.scope, bucket);
  }
  return grouped;
}

export interface DeployOptions {
  token: string;
  clientId: string;
  /** Scopes to overwrite even when no command targets them. */
  scopes?: readonly CommandScope[];
  transport?: CommandSyncTransport;
}

/**
 * Overwrites Discord's application commands with the given ones, one PUT per scope.
 * @throws {Error} If registration fails
 */
export async function deployCommands(commands: readonly Command[], options: DeployOptions): Promise<DeployResult[]> {
  const transport = options.transport ?? new REST({ version: '10' }).setToken(options.token);
  const results: DeployResult[] = [];

  try {
    for (const [scope, body] of groupByScope(commands, options.scopes)) {
      const route = scope === GLOBAL_SCOPE
        ? Routes.applicationCommands(options.clientId)
        : Routes.applicationGuildCommands(options.clientId, scope);

      deployLogger.debug(`Registering ${body.length} commands for ${scope === GLOBAL_SCOPE ? 'application' : `guild ${scope}`}`);
      await transport.put(route, { body });
      results.push({ scope, route, count: body.length });
    }
  } catch (error) {
    deployLogger.error('Failed to register commands:', error);
    throw error;
  }

  const total = results.reduce((sum, result) => sum + result.count, 0);
  deployLogger.info(`Successfully synced ${total} commands across ${results.length} scopes.`);
  return results;
}
