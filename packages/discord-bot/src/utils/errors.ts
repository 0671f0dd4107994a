/**
 * @module: Errors
 * @risk: moderate
 * @scope: core
 *
 * @description
 * Error taxonomy for command registration, dispatch and extension lifecycle.
 * Every error carries a stable `code` so callers can branch without `instanceof` chains across package boundaries.
 */

import type { CommandKind, CommandScope } from '../commands/BaseCommand.js';

export type BotErrorCode =
  | 'DUPLICATE_COMMAND'
  | 'UNKNOWN_COMMAND'
  | 'OPTION_VALIDATION'
  | 'COMMAND_DEFINITION'
  | 'COMMAND_CHECK'
  | 'HANDLER'
  | 'HANDLER_TIMEOUT'
  | 'ALREADY_LOADED'
  | 'NOT_LOADED'
  | 'EXTENSION_LOAD';

export class BotError extends Error {
  constructor(public readonly code: BotErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

const describeCommand = (name: string, kind: CommandKind, scope: CommandScope): string =>
  `${kind} command "${name}" (scope: ${scope})`;

export class DuplicateCommandError extends BotError {
  constructor(public readonly commandName: string, public readonly kind: CommandKind, public readonly scope: CommandScope) {
    super('DUPLICATE_COMMAND', `${describeCommand(commandName, kind, scope)} is already registered`);
  }
}

export class UnknownCommandError extends BotError {
  constructor(public readonly commandName: string, public readonly kind: CommandKind, public readonly scope: CommandScope) {
    super('UNKNOWN_COMMAND', `No ${describeCommand(commandName, kind, scope)} is registered`);
  }
}

export class OptionValidationError extends BotError {
  constructor(
    public readonly commandName: string,
    public readonly optionName: string | undefined,
    public readonly reason: string
  ) {
    super(
      'OPTION_VALIDATION',
      optionName
        ? `Invalid option "${optionName}" for command "${commandName}": ${reason}`
        : `Invalid arguments for command "${commandName}": ${reason}`
    );
  }
}

export class CommandDefinitionError extends BotError {
  constructor(public readonly commandName: string, reason: string) {
    super('COMMAND_DEFINITION', `Invalid definition for command "${commandName}": ${reason}`);
  }
}

export class CommandCheckError extends BotError {
  constructor(public readonly commandName: string, public readonly checkIndex: number) {
    super('COMMAND_CHECK', `Check #${checkIndex + 1} rejected command "${commandName}"`);
  }
}

/**
 * Wraps an exception raised inside a command handler or event listener.
 */
export class HandlerError extends BotError {
  constructor(public readonly source: string, cause: unknown) {
    super('HANDLER', `Handler for ${source} failed`, { cause });
  }
}

export class HandlerTimeoutError extends BotError {
  constructor(public readonly commandName: string, public readonly timeoutMs: number) {
    super('HANDLER_TIMEOUT', `Command "${commandName}" did not finish within ${timeoutMs}ms`);
  }
}

export class AlreadyLoadedError extends BotError {
  constructor(public readonly reference: string) {
    super('ALREADY_LOADED', `Extension "${reference}" is already loaded`);
  }
}

export class NotLoadedError extends BotError {
  constructor(public readonly reference: string) {
    super('NOT_LOADED', `Extension "${reference}" is not loaded`);
  }
}

export class ExtensionLoadError extends BotError {
  constructor(public readonly reference: string, reason: string, cause?: unknown) {
    super('EXTENSION_LOAD', `Failed to load extension "${reference}": ${reason}`, { cause });
  }
}
