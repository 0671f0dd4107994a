/**
 * @module: OptionParser
 * @risk: moderate
 * @scope: core
 *
 * @description
 * Validates raw command arguments against a command's declared options and coerces them to typed values.
 * Chat messages deliver positional strings; interactions deliver values already typed by Discord, keyed by name.
 */

import {
  OptionType,
  type CommandOption,
  type OptionValue,
  type ParsedOptions,
  type RawArguments
} from '../commands/BaseCommand.js';
import { OptionValidationError } from './errors.js';

const SNOWFLAKE = /^\d{17,20}$/;
const USER_MENTION = /^<@!?(\d{17,20})>$/;
const ROLE_MENTION = /^<@&(\d{17,20})>$/;
const CHANNEL_MENTION = /^<#(\d{17,20})>$/;
const INTEGER = /^[+-]?\d+$/;

const TRUE_WORDS = new Set(['true', 'yes', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'off', '0']);

/**
 * Splits message content into arguments on whitespace, keeping double-quoted phrases together.
 * An unterminated quote runs to the end of the input.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  const pattern = /"([^"]*)"?|(\S+)/g;
  for (const match of input.matchAll(pattern)) {
    tokens.push(match[1] ?? match[2] ?? '');
  }
  return tokens;
}

function extractId(value: string, mentionPatterns: readonly RegExp[]): string | undefined {
  if (SNOWFLAKE.test(value)) return value;
  for (const pattern of mentionPatterns) {
    const match = pattern.exec(value);
    if (match?.[1]) return match[1];
  }
  return undefined;
}

/**
 * Coerces one raw value. Returns an error reason instead of throwing so the caller can attach the option name.
 */
function coerce(option: CommandOption, raw: unknown): { value: OptionValue } | { reason: string } {
  switch (option.type) {
    case OptionType.String:
      return typeof raw === 'string' ? { value: raw } : { reason: 'expected text' };

    case OptionType.Integer: {
      if (typeof raw === 'number' && Number.isSafeInteger(raw)) return { value: raw };
      if (typeof raw === 'string' && INTEGER.test(raw.trim())) {
        const parsed = Number(raw.trim());
        if (Number.isSafeInteger(parsed)) return { value: parsed };
      }
      return { reason: 'expected a whole number' };
    }

    case OptionType.Number: {
      if (typeof raw === 'number' && Number.isFinite(raw)) return { value: raw };
      if (typeof raw === 'string' && raw.trim().length > 0) {
        const parsed = Number(raw.trim());
        if (Number.isFinite(parsed)) return { value: parsed };
      }
      return { reason: 'expected a number' };
    }

    case OptionType.Boolean: {
      if (typeof raw === 'boolean') return { value: raw };
      if (typeof raw === 'string') {
        const normalized = raw.trim().toLowerCase();
        if (TRUE_WORDS.has(normalized)) return { value: true };
        if (FALSE_WORDS.has(normalized)) return { value: false };
      }
      return { reason: 'expected true or false' };
    }

    case OptionType.User:
    case OptionType.Channel:
    case OptionType.Role:
    case OptionType.Mentionable: {
      if (typeof raw !== 'string') return { reason: `expected a ${option.type}` };
      const patterns = {
        [OptionType.User]: [USER_MENTION],
        [OptionType.Channel]: [CHANNEL_MENTION],
        [OptionType.Role]: [ROLE_MENTION],
        [OptionType.Mentionable]: [USER_MENTION, ROLE_MENTION]
      }[option.type];
      const id = extractId(raw.trim(), patterns);
      return id ? { value: id } : { reason: `expected a ${option.type} mention or id` };
    }
  }
}

function isPositional(args: RawArguments): args is readonly unknown[] {
  return Array.isArray(args);
}

/**
 * Parses `args` against `declared`. Missing optional options are left out of the result.
 * @throws {OptionValidationError} On a type mismatch, a missing required option, or an argument no option declares.
 */
export function parseOptions(commandName: string, declared: readonly CommandOption[], args: RawArguments): ParsedOptions {
  const rawByName = new Map<string, unknown>();

  if (isPositional(args)) {
    if (args.length > declared.length) {
      throw new OptionValidationError(
        commandName,
        undefined,
        `expected at most ${declared.length} argument${declared.length === 1 ? '' : 's'}, got ${args.length}`
      );
    }
    args.forEach((value, index) => {
      const option = declared[index];
      if (option) rawByName.set(option.name, value);
    });
  } else {
    const known = new Set(declared.map((option) => option.name));
    for (const [name, value] of Object.entries(args)) {
      if (!known.has(name)) {
        throw new OptionValidationError(commandName, name, 'unknown option');
      }
      rawByName.set(name, value);
    }
  }

  const parsed: ParsedOptions = {};
  for (const option of declared) {
    const raw = rawByName.get(option.name);
    if (raw === undefined || raw === null) {
      if (option.required) {
        throw new OptionValidationError(commandName, option.name, 'missing required option');
      }
      continue;
    }

    const result = coerce(option, raw);
    if ('reason' in result) {
      throw new OptionValidationError(commandName, option.name, result.reason);
    }
    parsed[option.name] = result.value;
  }

  return parsed;
}
