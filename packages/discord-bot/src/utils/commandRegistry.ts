/**
 * @module: CommandRegistry
 * @risk: high
 * @scope: core
 *
 * @description: Holds every registered command and routes invocations to their handlers.
 *
 * @impact
 * Risk: Lookup or hook ordering mistakes send invocations to the wrong handler or swallow failures users should see.
 */

import { Collection } from 'discord.js';
import {
  GLOBAL_SCOPE,
  type Command,
  type CommandContext,
  type CommandKind,
  type CommandScope,
  type Invocation
} from '../commands/BaseCommand.js';
import {
  BotError,
  CommandCheckError,
  DuplicateCommandError,
  HandlerError,
  HandlerTimeoutError,
  UnknownCommandError
} from './errors.js';
import { parseOptions } from './options.js';
import { logger } from './logger.js';

const registryLogger = logger.child({ module: 'commandRegistry' });

export interface CommandRegistryOptions {
  /** Fails a handler still running after this many milliseconds. 0 or absent disables the limit. */
  handlerTimeoutMs?: number;
}

export interface CommandFilter {
  kind?: CommandKind;
  scope?: CommandScope;
}

const commandKey = (name: string, kind: CommandKind, scope: CommandScope): string => `${kind}:${scope}:${name}`;

/**
 * Registry of chat, slash and context-menu commands, keyed by (name, kind, scope).
 * @class CommandRegistry
 */
export class CommandRegistry {
  /** Registered commands, keyed by `kind:scope:name` */
  private commands = new Collection<string, Command>();
  private readonly handlerTimeoutMs: number;

  constructor(options: CommandRegistryOptions = {}) {
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 0;
  }

  /**
   * Adds a command.
   * @throws {DuplicateCommandError} If a command with the same name, kind and scope exists
   */
  register(command: Command): Command {
    const key = commandKey(command.name, command.kind, command.scope);
    if (this.commands.has(key)) {
      throw new DuplicateCommandError(command.name, command.kind, command.scope);
    }

    this.commands.set(key, command);
    registryLogger.debug(`Registered ${command.kind} command: ${command.name} (scope: ${command.scope})`);
    return command;
  }

  /**
   * Removes a command. Absent commands are a no-op.
   * @returns Whether a command was removed
   */
  unregister(name: string, kind: CommandKind, scope: CommandScope = GLOBAL_SCOPE): boolean {
    const removed = this.commands.delete(commandKey(name, kind, scope));
    if (removed) {
      registryLogger.debug(`Unregistered ${kind} command: ${name} (scope: ${scope})`);
    }
    return removed;
  }

  /**
   * Exact lookup, without the global fallback {@link resolve} applies.
   */
  get(name: string, kind: CommandKind, scope: CommandScope = GLOBAL_SCOPE): Command | undefined {
    return this.commands.get(commandKey(name, kind, scope));
  }

  list(filter: CommandFilter = {}): Command[] {
    return [...this.commands.values()].filter((command) =>
      (filter.kind === undefined || command.kind === filter.kind)
      && (filter.scope === undefined || command.scope === filter.scope));
  }

  get size(): number {
    return this.commands.size;
  }

  /**
   * Finds the command for an invocation, preferring one registered for the invocation's scope over a global one.
   */
  find(name: string, kind: CommandKind, scope: CommandScope): Command | undefined {
    return this.get(name, kind, scope) ?? (scope === GLOBAL_SCOPE ? undefined : this.get(name, kind, GLOBAL_SCOPE));
  }

  /**
   * Parses the invocation's arguments and runs checks, the pre-run hook and the handler.
   * A failure past argument parsing goes to the command's error hook when it has one; resolve then returns undefined.
   * @returns The handler's result
   * @throws {UnknownCommandError} If no command matches
   * @throws {OptionValidationError} If the arguments do not fit the declared options
   * @throws {HandlerError | CommandCheckError | HandlerTimeoutError} If the command fails without an error hook
   */
  async resolve(invocation: Invocation): Promise<unknown> {
    const { name, kind, scope, args, context } = invocation;
    const command = this.find(name, kind, scope);
    if (!command) {
      throw new UnknownCommandError(name, kind, scope);
    }

    const options = parseOptions(command.name, command.options, args);

    try {
      await this.runChecks(command, context);
      await command.preRun?.(context);
      return await this.runHandler(command, () => command.execute(context, options));
    } catch (error) {
      if (command.onError) {
        registryLogger.debug(`Routing failure of ${kind} command ${name} to its error hook`);
        await command.onError(error, context);
        return undefined;
      }
      throw error instanceof BotError ? error : new HandlerError(`${kind} command "${command.name}"`, error);
    }
  }

  private async runChecks(command: Command, context: CommandContext): Promise<void> {
    const checks = command.checks ?? [];
    for (const [index, check] of checks.entries()) {
      if (!(await check(context))) {
        throw new CommandCheckError(command.name, index);
      }
    }
  }

  private async runHandler(command: Command, run: () => unknown): Promise<unknown> {
    if (this.handlerTimeoutMs <= 0) {
      return run();
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new HandlerTimeoutError(command.name, this.handlerTimeoutMs)), this.handlerTimeoutMs);
    });

    try {
      return await Promise.race([Promise.resolve().then(run), timeout]);
    } finally {
      clearTimeout(timer);
    }
  }
}
