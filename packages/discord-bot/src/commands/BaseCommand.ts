/**
 * @description: Defines the command contract extensions register and the declaration helper they build commands with.
 * @scope: interface
 * @module: BaseCommand
 * @risk: low - Incorrect typing can break command registration or execution wiring.
 */

import { CommandDefinitionError } from '../utils/errors.js';

/**
 * Trigger mechanism for a command.
 */
export const CommandKind = {
  Message: 'message',
  Slash: 'slash',
  ContextMenu: 'context_menu'
} as const;
export type CommandKind = (typeof CommandKind)[keyof typeof CommandKind];

/** Scope of commands available everywhere; any other scope is a guild id. */
export const GLOBAL_SCOPE = 'global';
export type CommandScope = string;

export const OptionType = {
  String: 'string',
  Integer: 'integer',
  Number: 'number',
  Boolean: 'boolean',
  User: 'user',
  Channel: 'channel',
  Role: 'role',
  Mentionable: 'mentionable'
} as const;
export type OptionType = (typeof OptionType)[keyof typeof OptionType];

export interface CommandOption {
  name: string;
  type: OptionType;
  description?: string;
  required?: boolean;
}

export type OptionValue = string | number | boolean;
export type ParsedOptions = Record<string, OptionValue>;

/**
 * Arguments as they arrive: positional for chat messages, named for interactions.
 */
export type RawArguments = readonly unknown[] | Readonly<Record<string, unknown>>;

/**
 * What a handler sees of the invocation. The raw discord.js object stays
 * reachable through `source` for handlers that need more than a reply.
 */
export interface CommandContext {
  commandName: string;
  kind: CommandKind;
  scope: CommandScope;
  authorId?: string;
  channelId?: string;
  /** Context-menu target (user or message id). */
  targetId?: string;
  source?: unknown;
  reply(content: string): Promise<void>;
}

export interface Invocation {
  name: string;
  kind: CommandKind;
  scope: CommandScope;
  args: RawArguments;
  context: CommandContext;
}

export type CommandHandler = (context: CommandContext, options: ParsedOptions) => unknown;
export type CommandErrorHook = (error: unknown, context: CommandContext) => void | Promise<void>;
export type CommandPreHook = (context: CommandContext) => void | Promise<void>;
export type CommandCheck = (context: CommandContext) => boolean | Promise<boolean>;

export interface Command {
  name: string;
  description?: string;
  kind: CommandKind;
  scope: CommandScope;
  options: readonly CommandOption[];
  /** Context-menu flavour used when syncing to Discord. */
  target?: 'user' | 'message';
  checks?: readonly CommandCheck[];
  preRun?: CommandPreHook;
  execute: CommandHandler;
  onError?: CommandErrorHook;
}

export type CommandDefinition = Omit<Command, 'scope' | 'options'> & {
  scope?: CommandScope;
  options?: readonly CommandOption[];
};

// Discord's naming rules: slash names are lowercase, context-menu names are free text.
const SLASH_NAME_PATTERN = /^[-_\p{Ll}\p{Lo}\p{N}]{1,32}$/u;
const OPTION_NAME_PATTERN = SLASH_NAME_PATTERN;
const MESSAGE_NAME_PATTERN = /^\S{1,64}$/;

function assertName(definition: CommandDefinition): void {
  const { name, kind } = definition;

  if (kind === CommandKind.Slash && !SLASH_NAME_PATTERN.test(name)) {
    throw new CommandDefinitionError(name, 'slash command names must be 1-32 lowercase characters without spaces');
  }
  if (kind === CommandKind.ContextMenu && (name.trim().length === 0 || name.length > 32)) {
    throw new CommandDefinitionError(name, 'context menu names must be 1-32 characters');
  }
  if (kind === CommandKind.Message && !MESSAGE_NAME_PATTERN.test(name)) {
    throw new CommandDefinitionError(name, 'message command names cannot be empty or contain whitespace');
  }
}

function assertOptions(name: string, kind: CommandKind, options: readonly CommandOption[]): void {
  if (kind === CommandKind.ContextMenu && options.length > 0) {
    throw new CommandDefinitionError(name, 'context menu commands take no options');
  }

  const seen = new Set<string>();
  let optionalSeen = false;
  for (const option of options) {
    if (!OPTION_NAME_PATTERN.test(option.name)) {
      throw new CommandDefinitionError(name, `option name "${option.name}" must be 1-32 lowercase characters`);
    }
    if (seen.has(option.name)) {
      throw new CommandDefinitionError(name, `option "${option.name}" is declared twice`);
    }
    seen.add(option.name);

    if (option.required) {
      if (optionalSeen) {
        throw new CommandDefinitionError(name, `required option "${option.name}" follows an optional one`);
      }
    } else {
      optionalSeen = true;
    }
  }
}

/**
 * Builds a {@link Command} record from a declaration, filling defaults and
 * rejecting names or option lists the dispatcher could never resolve.
 */
export function defineCommand(definition: CommandDefinition): Command {
  const options = definition.options ?? [];
  assertName(definition);
  assertOptions(definition.name, definition.kind, options);

  return {
    ...definition,
    scope: definition.scope ?? GLOBAL_SCOPE,
    options
  };
}
