/**
 * @module: BotHost
 * @risk: critical
 * @scope: core
 *
 * @description
 * Long-lived host composing the command registry, event dispatcher and extension loader, bound to a discord.js client.
 *
 * @impact
 * Risk: Extensions must be loaded before the session accepts events; routing failures here silence every command.
 */

import { Client, Events, GatewayIntentBits, type Guild, type Interaction } from 'discord.js';
import { CommandKind, GLOBAL_SCOPE, type Invocation } from '../commands/BaseCommand.js';
import { HostEvents } from '../events/Event.js';
import { CommandRegistry } from '../utils/commandRegistry.js';
import { deployCommands, type CommandSyncTransport, type DeployResult } from '../utils/commandDeployer.js';
import { OptionValidationError, UnknownCommandError } from '../utils/errors.js';
import { EventDispatcher } from '../utils/eventDispatcher.js';
import { ExtensionLoader, type ExtensionImporter, type ExtensionRecord } from '../utils/extensionLoader.js';
import { describeError, logger } from '../utils/logger.js';
import {
  invocationFromContextMenu,
  invocationFromMessage,
  invocationFromSlash,
  type MessageLike
} from './routing.js';

const hostLogger = logger.child({ module: 'botHost' });

export const COMMAND_FAILED_REPLY = 'Something went wrong while running that command.';

export interface BotHostOptions {
  token: string;
  clientId: string;
  /** Guild command syncs target while developing. Commands registered with the global scope stay global. */
  guildId?: string;
  commandPrefix?: string;
  /** Extension references loaded by {@link BotHost.start}, in order. */
  extensions?: readonly string[];
  extensionBaseDir?: string;
  importer?: ExtensionImporter;
  deployCommands?: boolean;
  handlerTimeoutMs?: number;
  client?: Client;
  syncTransport?: CommandSyncTransport;
}

/**
 * Payload of {@link HostEvents.CommandError}.
 */
export interface CommandErrorEvent {
  invocation: Invocation;
  error: unknown;
}

export class BotHost {
  public readonly registry: CommandRegistry;
  public readonly dispatcher: EventDispatcher;
  public readonly extensions: ExtensionLoader;
  public readonly client: Client;
  private readonly commandPrefix: string;
  private started = false;

  constructor(private readonly options: BotHostOptions) {
    this.registry = new CommandRegistry({ handlerTimeoutMs: options.handlerTimeoutMs });
    this.dispatcher = new EventDispatcher();
    this.extensions = new ExtensionLoader(this.registry, this.dispatcher, {
      baseDir: options.extensionBaseDir,
      importer: options.importer
    });
    this.commandPrefix = options.commandPrefix ?? '!';
    this.client = options.client ?? new Client({
      intents: [
        GatewayIntentBits.Guilds,
        GatewayIntentBits.GuildMessages,
        GatewayIntentBits.MessageContent,
        GatewayIntentBits.DirectMessages
      ]
    });
  }

  public loadExtension(reference: string): Promise<ExtensionRecord> {
    return this.extensions.load(reference);
  }

  public unloadExtension(reference: string): Promise<void> {
    return this.extensions.unload(reference);
  }

  public reloadExtension(reference: string): Promise<ExtensionRecord> {
    return this.extensions.reload(reference);
  }

  public get isStarted(): boolean {
    return this.started;
  }

  /**
   * Loads the configured extensions, binds client events, optionally syncs commands, then logs in.
   * A failing extension is logged and skipped.
   */
  public async start(): Promise<void> {
    if (this.started) {
      throw new Error('Bot host is already started');
    }
    this.started = true;

    for (const reference of this.options.extensions ?? []) {
      try {
        await this.loadExtension(reference);
      } catch (error) {
        hostLogger.error(`Skipping extension ${reference}: ${describeError(error)}`);
      }
    }
    hostLogger.info(`Loaded ${this.extensions.list().length} extensions with ${this.registry.size} commands.`);

    this.bindClient();

    if (this.options.deployCommands) {
      await this.syncCommands();
    }

    await this.client.login(this.options.token);
    hostLogger.info('Bot is connected to Discord');
  }

  public async stop(): Promise<void> {
    await this.client.destroy();
    this.started = false;
    hostLogger.info('Bot session closed');
  }

  /**
   * Pushes slash and context-menu commands to Discord. Global-scope commands go to the development guild when one is configured.
   */
  public async syncCommands(): Promise<DeployResult[]> {
    const { guildId } = this.options;
    const commands = this.registry
      .list()
      .map((command) => (guildId && command.scope === GLOBAL_SCOPE ? { ...command, scope: guildId } : command));

    return deployCommands(commands, {
      token: this.options.token,
      clientId: this.options.clientId,
      scopes: [guildId ?? GLOBAL_SCOPE],
      transport: this.options.syncTransport
    });
  }

  /**
   * Publishes the message, then runs it as a prefix command when it is one.
   */
  public async handleMessage(message: MessageLike): Promise<void> {
    await this.dispatcher.publish(HostEvents.MessageCreated, message);

    const invocation = invocationFromMessage(message, this.commandPrefix);
    if (invocation) {
      await this.dispatch(invocation);
    }
  }

  public async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      await this.dispatch(invocationFromSlash(interaction));
    } else if (interaction.isContextMenuCommand()) {
      await this.dispatch(invocationFromContextMenu(interaction));
    } else if (interaction.isMessageComponent()) {
      await this.dispatcher.publish(HostEvents.ComponentInteraction, interaction);
    }
  }

  /**
   * Resolves an invocation on behalf of the client. Failures never escape: unknown prefix commands are ignored,
   * bad arguments are explained to the invoker and anything else is logged and published as a command error.
   * Slash and context-menu invokers are also told the command failed.
   */
  public async dispatch(invocation: Invocation): Promise<unknown> {
    try {
      return await this.registry.resolve(invocation);
    } catch (error) {
      if (error instanceof UnknownCommandError && invocation.kind === CommandKind.Message) {
        hostLogger.debug(`Ignoring unknown message command: ${invocation.name}`);
        return undefined;
      }

      if (error instanceof OptionValidationError) {
        await this.replySafely(invocation, error.message);
        return undefined;
      }

      hostLogger.error(`Command ${invocation.name} failed: ${describeError(error)}`);
      const event: CommandErrorEvent = { invocation, error };
      await this.dispatcher.publish(HostEvents.CommandError, event);
      // Interactions must always be answered.
      if (invocation.kind !== CommandKind.Message) {
        await this.replySafely(invocation, COMMAND_FAILED_REPLY);
      }
      return undefined;
    }
  }

  private async replySafely(invocation: Invocation, content: string): Promise<void> {
    try {
      await invocation.context.reply(content);
    } catch (error) {
      hostLogger.warn(`Could not reply to ${invocation.name}: ${describeError(error)}`);
    }
  }

  private bindClient(): void {
    this.client.once(Events.ClientReady, (client) => {
      hostLogger.info(`Logged in as ${client.user.tag}`);
      void this.dispatcher.publish(HostEvents.Ready, client);
    });
    this.client.on(Events.GuildCreate, (guild: Guild) => {
      void this.dispatcher.publish(HostEvents.GuildCreated, guild);
    });
    this.client.on(Events.MessageCreate, (message) => {
      this.handleMessage(message).catch((error: unknown) => {
        hostLogger.error(`Failed to handle message: ${describeError(error)}`);
      });
    });
    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction).catch((error: unknown) => {
        hostLogger.error(`Failed to handle interaction: ${describeError(error)}`);
      });
    });
  }
}
