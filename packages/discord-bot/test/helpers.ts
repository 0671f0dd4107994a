/**
 * @description: Builders for invocations and chat messages used across the bot tests.
 * @scope: test
 * @module: TestHelpers
 */

import {
  GLOBAL_SCOPE,
  type CommandContext,
  type CommandKind,
  type CommandScope,
  type Invocation,
  type RawArguments
} from '../src/commands/BaseCommand.js';
import type { MessageLike } from '../src/bot/routing.js';

export const AUTHOR_ID = '100000000000000001';
export const OTHER_USER_ID = '100000000000000002';
export const GUILD_ID = '200000000000000001';
export const CHANNEL_ID = '300000000000000001';

export interface RecordedInvocation {
  invocation: Invocation;
  replies: string[];
}

export function createInvocation(
  name: string,
  kind: CommandKind,
  scope: CommandScope = GLOBAL_SCOPE,
  args: RawArguments = []
): RecordedInvocation {
  const replies: string[] = [];
  const context: CommandContext = {
    commandName: name,
    kind,
    scope,
    authorId: AUTHOR_ID,
    channelId: CHANNEL_ID,
    reply: async (content) => {
      replies.push(content);
    }
  };
  return { invocation: { name, kind, scope, args, context }, replies };
}

export interface RecordedMessage extends MessageLike {
  replies: string[];
}

export function createMessage(content: string, options: { bot?: boolean; guildId?: string | null } = {}): RecordedMessage {
  const replies: string[] = [];
  return {
    content,
    author: { id: AUTHOR_ID, bot: options.bot ?? false },
    guildId: options.guildId === undefined ? GUILD_ID : options.guildId,
    channelId: CHANNEL_ID,
    replies,
    reply: async (reply: string) => {
      replies.push(reply);
    }
  };
}
