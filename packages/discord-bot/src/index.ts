/**
 * @description Public exports for extension authors and embedders of the bot host.
 * @scope interface
 * @module DiscordBotIndex
 */

export { BotHost, COMMAND_FAILED_REPLY } from './bot/index.js';
export type { BotHostOptions, CommandErrorEvent } from './bot/index.js';
export {
  invocationFromContextMenu,
  invocationFromMessage,
  invocationFromSlash
} from './bot/routing.js';
export type { ContextMenuInteractionLike, MessageLike, SlashInteractionLike } from './bot/routing.js';

export { CommandKind, GLOBAL_SCOPE, OptionType, defineCommand } from './commands/BaseCommand.js';
export type {
  Command,
  CommandCheck,
  CommandContext,
  CommandDefinition,
  CommandErrorHook,
  CommandHandler,
  CommandOption,
  CommandPreHook,
  CommandScope,
  Invocation,
  OptionValue,
  ParsedOptions,
  RawArguments
} from './commands/BaseCommand.js';

export { Event, HostEvents } from './events/Event.js';
export type { HostEventName } from './events/Event.js';

export { CommandRegistry } from './utils/commandRegistry.js';
export type { CommandFilter, CommandRegistryOptions } from './utils/commandRegistry.js';
export { EventDispatcher } from './utils/eventDispatcher.js';
export type { EventHandler, EventListener, EventSubscriber, SubscribeOptions } from './utils/eventDispatcher.js';
export { ExtensionLoader } from './utils/extensionLoader.js';
export type {
  ExtensionHost,
  ExtensionImporter,
  ExtensionLoaderOptions,
  ExtensionModule,
  ExtensionRecord
} from './utils/extensionLoader.js';
export {
  buildContextMenuCommand,
  buildSlashCommand,
  deployCommands,
  groupByScope,
  toApplicationCommand
} from './utils/commandDeployer.js';
export type { CommandSyncTransport, DeployOptions, DeployResult } from './utils/commandDeployer.js';
export { parseOptions, tokenize } from './utils/options.js';
export * from './utils/errors.js';
export { loadConfig } from './utils/env.js';
export type { BotConfig } from './utils/env.js';
