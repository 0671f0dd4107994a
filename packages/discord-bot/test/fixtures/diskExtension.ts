/**
 * @description: Extension loaded from disk by path reference in the loader tests.
 * @scope: test
 * @module: DiskExtensionFixture
 */

import { CommandKind, defineCommand } from '../../src/commands/BaseCommand.js';
import type { ExtensionHost } from '../../src/utils/extensionLoader.js';

export function setup(host: ExtensionHost): void {
  host.register(defineCommand({
    name: 'disk',
    kind: CommandKind.Message,
    execute: () => 'loaded from disk'
  }));
}
