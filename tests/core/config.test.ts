import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';

import { ConfigManager, getDefaultConfig, parseConfig } from '../../src/core/config.js';
import { ConfigError } from '../../src/utils/errors.js';
import { createTempRoot, removeTempRoot, writeFiles } from '../test-helpers.js';

describe('ConfigManager', () => {
  let configDir: string;

  beforeEach(async () => {
    configDir = await createTempRoot('config');
  });

  afterEach(async () => {
    await removeTempRoot(configDir);
  });

  it('falls back to defaults when no config file exists', async () => {
    const config = await new ConfigManager(configDir, {}).load();
    assert.deepEqual(config, {
      provider: { command: 'apkg', args: ['get-pypi', '{package}', '-t', '{target}'] },
      entryPoint: { extensions: ['.py'], marker: 'def main()' }
    });
  });

  it('reads config.jsonc with comments and merges over the defaults', async () => {
    await writeFiles(configDir, {
      'config.jsonc': [
        '{',
        '  // scan JavaScript packages instead',
        '  "entryPoint": { "extensions": [".js", ".mjs"], "marker": "function main(" },',
        '}'
      ].join('\n')
    });

    const config = await new ConfigManager(configDir, {}).load();
    assert.deepEqual(config.entryPoint, { extensions: ['.js', '.mjs'], marker: 'function main(' });
    assert.deepEqual(config.provider, getDefaultConfig().provider);
  });

  it('prefers config.jsonc over config.json', async () => {
    await writeFiles(configDir, {
      'config.jsonc': '{ "provider": { "command": "from-jsonc" } }',
      'config.json': '{ "provider": { "command": "from-json" } }'
    });

    const config = await new ConfigManager(configDir, {}).load();
    assert.equal(config.provider.command, 'from-jsonc');
  });

  it('applies the AAPP_PROVIDER override last', async () => {
    await writeFiles(configDir, {
      'config.json': '{ "provider": { "command": "from-file", "args": ["{package}"] } }'
    });

    const config = await new ConfigManager(configDir, { AAPP_PROVIDER: 'from-env' }).load();
    assert.deepEqual(config.provider, { command: 'from-env', args: ['{package}'] });
  });

  it('reports unparseable files as ConfigError', async () => {
    await writeFiles(configDir, { 'config.json': '{ "provider": ' });
    await assert.rejects(new ConfigManager(configDir, {}).load(), ConfigError);
  });
});

describe('parseConfig', () => {
  it('rejects documents of the wrong shape', () => {
    assert.throws(() => parseConfig([]), ConfigError);
    assert.throws(() => parseConfig({ provider: 'apkg' }), ConfigError);
    assert.throws(() => parseConfig({ provider: { args: [1] } }), ConfigError);
    assert.throws(() => parseConfig({ entryPoint: { marker: '' } }), ConfigError);
  });

  it('accepts an empty object', () => {
    assert.deepEqual(parseConfig({}), getDefaultConfig());
  });
});
