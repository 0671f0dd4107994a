/**
 * @module: ExtensionLoader
 * @risk: high
 * @scope: core
 *
 * @description: Imports extension modules, runs their setup against a recording host and reverses what they registered on unload.
 *
 * @impact
 * Risk: Handles dynamic imports and rollback. A partial load or reload would leave commands half-registered.
 */

import path from 'path';
import { pathToFileURL } from 'url';
import type { Logger } from 'winston';
import type { Command } from '../commands/BaseCommand.js';
import type { CommandRegistry } from './commandRegistry.js';
import type { EventDispatcher, EventHandler, EventListener, EventSubscriber, SubscribeOptions } from './eventDispatcher.js';
import { AlreadyLoadedError, ExtensionLoadError, NotLoadedError } from './errors.js';
import { describeError, logger } from './logger.js';

const loaderLogger = logger.child({ module: 'extensionLoader' });

/**
 * What `setup` and `teardown` receive. Registrations made through it are recorded against the extension.
 */
export interface ExtensionHost extends EventSubscriber {
  readonly reference: string;
  readonly logger: Logger;
  register(command: Command): Command;
  loadExtension(reference: string): Promise<ExtensionRecord>;
  unloadExtension(reference: string): Promise<void>;
}

/**
 * Contract an extension module fulfils, either as named exports or on its default export.
 */
export interface ExtensionModule {
  setup(host: ExtensionHost): void | Promise<void>;
  teardown?(host: ExtensionHost): void | Promise<void>;
}

export interface ExtensionRecord {
  readonly reference: string;
  readonly module: ExtensionModule;
  readonly commands: Command[];
  readonly listeners: EventListener[];
  /** References this extension loaded through its host, in load order. They are unloaded with it. */
  readonly children: string[];
  readonly loadedAt: Date;
}

interface Registrations {
  commands: Command[];
  listeners: EventListener[];
}

interface SuspendedExtension {
  record: ExtensionRecord;
  live: Registrations;
}

export type ExtensionImporter = (specifier: string) => Promise<unknown>;

export interface ExtensionLoaderOptions {
  /** Directory relative references resolve against. Defaults to the working directory. */
  baseDir?: string;
  /** Extension appended to path references without one. Defaults to the extension this file runs from. */
  fileExtension?: string;
  importer?: ExtensionImporter;
}

const defaultImporter: ExtensionImporter = (specifier) => import(specifier);

// Running from sources (tsx) or from the build decides which files exist beside us.
const runtimeExtension = path.extname(new URL(import.meta.url).pathname) || '.js';

function hasSetup(value: unknown): value is ExtensionModule {
  return typeof value === 'object'
    && value !== null
    && 'setup' in value
    && typeof value.setup === 'function'
    && (!('teardown' in value) || value.teardown === undefined || typeof value.teardown === 'function');
}

/**
 * Accepts `export function setup` as well as `export default { setup }`.
 */
function pickExtensionModule(namespace: unknown): ExtensionModule | undefined {
  if (hasSetup(namespace)) {
    return namespace;
  }
  if (typeof namespace === 'object' && namespace !== null && 'default' in namespace && hasSetup(namespace.default)) {
    return namespace.default;
  }
  return undefined;
}

/**
 * Loads, unloads and reloads extensions against one registry and dispatcher.
 * @class ExtensionLoader
 */
export class ExtensionLoader {
  private extensions = new Map<string, ExtensionRecord>();
  /** References with a load or reload in flight. */
  private pending = new Set<string>();
  /** Import generation per reference, bumped on reload to bypass the module cache. */
  private generations = new Map<string, number>();
  private readonly baseDir: string;
  private readonly fileExtension: string;
  private readonly importer: ExtensionImporter;

  constructor(
    private readonly registry: CommandRegistry,
    private readonly dispatcher: EventDispatcher,
    options: ExtensionLoaderOptions = {}
  ) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.fileExtension = options.fileExtension ?? runtimeExtension;
    this.importer = options.importer ?? defaultImporter;
  }

  isLoaded(reference: string): boolean {
    return this.extensions.has(reference);
  }

  get(reference: string): ExtensionRecord | undefined {
    return this.extensions.get(reference);
  }

  list(): string[] {
    return [...this.extensions.keys()];
  }

  /**
   * Imports the extension and runs its setup. Everything setup registered is removed again if it throws.
   * @throws {AlreadyLoadedError} If the reference is loaded or loading
   * @throws {ExtensionLoadError} If the import fails, the module has no setup, or setup throws
   */
  async load(reference: string): Promise<ExtensionRecord> {
    if (this.extensions.has(reference) || this.pending.has(reference)) {
      throw new AlreadyLoadedError(reference);
    }

    this.pending.add(reference);
    try {
      return await this.loadUntracked(reference);
    } finally {
      this.pending.delete(reference);
    }
  }

  /**
   * Unloads the extensions it loaded (latest first), runs its teardown, then removes every command and listener it registered.
   * @throws {NotLoadedError} If the reference is not loaded
   */
  async unload(reference: string): Promise<void> {
    const record = this.extensions.get(reference);
    if (!record || this.pending.has(reference)) {
      throw new NotLoadedError(reference);
    }

    await this.unloadChildren(record);
    await this.runTeardown(record);
    this.detach(record);
    this.extensions.delete(reference);
    loaderLogger.info(`Unloaded extension ${reference}`);
  }

  /**
   * Loads the extension, and the extensions it loaded, from fresh module instances.
   * The previous versions are torn down only once the new one is in place; if loading fails,
   * their registrations are restored untouched and the load error is rethrown.
   * @throws {NotLoadedError} If the reference is not loaded
   */
  async reload(reference: string): Promise<ExtensionRecord> {
    const previous = this.extensions.get(reference);
    if (!previous || this.pending.has(reference)) {
      throw new NotLoadedError(reference);
    }

    this.pending.add(reference);
    try {
      const suspended = this.collectTree(previous).map((record) => this.suspend(record));

      let record: ExtensionRecord;
      try {
        record = await this.loadUntracked(reference);
      } catch (error) {
        for (const { record: old, live } of suspended) {
          this.attach(live);
          this.extensions.set(old.reference, old);
        }
        loaderLogger.warn(`Reload of ${reference} failed; restored previous registrations`);
        throw error;
      }

      for (const { record: old } of [...suspended].reverse()) {
        await this.runTeardown(old);
      }
      loaderLogger.info(`Reloaded extension ${reference}`);
      return record;
    } finally {
      this.pending.delete(reference);
    }
  }

  private async loadUntracked(reference: string): Promise<ExtensionRecord> {
    const specifier = this.toSpecifier(reference);
    loaderLogger.debug(`Importing extension ${reference} from ${specifier}`);

    let namespace: unknown;
    try {
      namespace = await this.importer(specifier);
    } catch (error) {
      throw new ExtensionLoadError(reference, 'module could not be imported', error);
    }

    const module = pickExtensionModule(namespace);
    if (!module) {
      throw new ExtensionLoadError(reference, 'module does not export a setup function');
    }

    const record: ExtensionRecord = {
      reference,
      module,
      commands: [],
      listeners: [],
      children: [],
      loadedAt: new Date()
    };

    try {
      await module.setup(this.createHost(record));
    } catch (error) {
      await this.unloadChildren(record);
      this.detach(record);
      throw new ExtensionLoadError(reference, 'setup failed', error);
    }

    this.extensions.set(reference, record);
    loaderLogger.info(
      `Loaded extension ${reference} (${record.commands.length} commands, ${record.listeners.length} listeners)`
    );
    return record;
  }

  private createHost(record: ExtensionRecord): ExtensionHost {
    const { registry, dispatcher } = this;
    return {
      reference: record.reference,
      logger: logger.child({ module: `extension:${record.reference}` }),
      register: (command: Command): Command => {
        const registered = registry.register(command);
        record.commands.push(registered);
        return registered;
      },
      subscribe: (event: string, handler: EventHandler, options?: SubscribeOptions): EventListener => {
        const listener = dispatcher.subscribe(event, handler, options);
        record.listeners.push(listener);
        return listener;
      },
      unsubscribe: (listener: EventListener): boolean => {
        const index = record.listeners.indexOf(listener);
        if (index === -1) {
          return false;
        }
        record.listeners.splice(index, 1);
        return dispatcher.unsubscribe(listener);
      },
      loadExtension: async (reference: string): Promise<ExtensionRecord> => {
        const child = await this.load(reference);
        record.children.push(reference);
        return child;
      },
      unloadExtension: async (reference: string): Promise<void> => {
        await this.unload(reference);
        const index = record.children.indexOf(reference);
        if (index !== -1) {
          record.children.splice(index, 1);
        }
      }
    };
  }

  private async unloadChildren(record: ExtensionRecord): Promise<void> {
    for (const child of [...record.children].reverse()) {
      if (this.extensions.has(child) && !this.pending.has(child)) {
        await this.unload(child);
      }
    }
  }

  /**
   * The record followed by every loaded extension it owns, depth first.
   */
  private collectTree(record: ExtensionRecord, seen = new Set<string>()): ExtensionRecord[] {
    seen.add(record.reference);
    const tree = [record];
    for (const child of record.children) {
      const childRecord = this.extensions.get(child);
      if (childRecord && !seen.has(child)) {
        tree.push(...this.collectTree(childRecord, seen));
      }
    }
    return tree;
  }

  /**
   * Takes a loaded extension out of service without tearing it down, and bumps its import generation.
   */
  private suspend(record: ExtensionRecord): SuspendedExtension {
    const live = this.detach(record);
    this.extensions.delete(record.reference);
    this.generations.set(record.reference, (this.generations.get(record.reference) ?? 0) + 1);
    return { record, live };
  }

  private async runTeardown(record: ExtensionRecord): Promise<void> {
    if (!record.module.teardown) {
      return;
    }
    try {
      await record.module.teardown(this.createHost(record));
    } catch (error) {
      loaderLogger.warn(`Teardown of ${record.reference} failed, unloading anyway: ${describeError(error)}`);
    }
  }

  /**
   * Removes the record's registrations and returns those that were still live,
   * so a rollback does not revive a `once` listener that already fired.
   */
  private detach(record: ExtensionRecord): Registrations {
    const commands = record.commands.filter((command) =>
      this.registry.unregister(command.name, command.kind, command.scope));
    const listeners = record.listeners.filter((listener) => this.dispatcher.unsubscribe(listener));
    return { commands, listeners };
  }

  private attach(registrations: Registrations): void {
    for (const command of registrations.commands) {
      this.registry.register(command);
    }
    for (const listener of registrations.listeners) {
      this.dispatcher.restore(listener);
    }
  }

  private toSpecifier(reference: string): string {
    const isPath = reference.startsWith('.') || path.isAbsolute(reference);
    if (!isPath && !reference.startsWith('file:')) {
      return reference;
    }

    const url = isPath
      ? pathToFileURL(this.withExtension(path.resolve(this.baseDir, reference)))
      : new URL(reference);
    const generation = this.generations.get(reference) ?? 0;
    if (generation > 0) {
      url.searchParams.set('generation', String(generation));
    }
    return url.href;
  }

  private withExtension(filePath: string): string {
    return path.extname(filePath) ? filePath : `${filePath}${this.fileExtension}`;
  }
}
