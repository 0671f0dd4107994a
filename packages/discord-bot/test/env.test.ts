/**
 * @description: Validates configuration parsing, defaults and required variables.
 * @scope: test
 * @module: EnvConfigTests
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { getBooleanEnv, getNumberEnv, getStringArrayEnv, loadConfig } from '../src/utils/env.js';

const required = { DISCORD_TOKEN: 'test-token', CLIENT_ID: 'test-client' };

test('loadConfig fails when required variables are missing', () => {
  assert.throws(() => loadConfig({ CLIENT_ID: 'test-client' }), {
    message: 'Missing required environment variable: DISCORD_TOKEN'
  });
  assert.throws(() => loadConfig({ DISCORD_TOKEN: '  ' }), {
    message: 'Missing required environment variable: DISCORD_TOKEN, CLIENT_ID'
  });
});

test('loadConfig applies defaults', () => {
  assert.deepEqual(loadConfig(required), {
    token: 'test-token',
    clientId: 'test-client',
    guildId: undefined,
    env: 'development',
    isProduction: false,
    commandPrefix: '!',
    extensions: ['./extensions/basic', './extensions/greetings'],
    deployCommands: false,
    handlerTimeoutMs: 0
  });
});

test('loadConfig reads overrides', () => {
  const config = loadConfig({
    ...required,
    GUILD_ID: ' 200000000000000001 ',
    NODE_ENV: 'production',
    COMMAND_PREFIX: '?',
    EXTENSIONS: './extensions/basic, , my-extension',
    DEPLOY_COMMANDS: 'TRUE',
    HANDLER_TIMEOUT_MS: '5000'
  });

  assert.equal(config.guildId, '200000000000000001');
  assert.equal(config.isProduction, true);
  assert.equal(config.commandPrefix, '?');
  assert.deepEqual(config.extensions, ['./extensions/basic', 'my-extension']);
  assert.equal(config.deployCommands, true);
  assert.equal(config.handlerTimeoutMs, 5000);
});

test('invalid values fall back to defaults', () => {
  assert.equal(getNumberEnv({ LIMIT: 'soon' }, 'LIMIT', 10), 10);
  assert.equal(getNumberEnv({ LIMIT: '-1' }, 'LIMIT', 10), 10);
  assert.equal(getBooleanEnv({}, 'FLAG', true), true);
  assert.equal(getBooleanEnv({ FLAG: 'yes' }, 'FLAG', true), false);
  assert.deepEqual(getStringArrayEnv({ LIST: ' , ' }, 'LIST', ['a']), ['a']);
});
