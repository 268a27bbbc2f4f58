import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';

import { bootstrapBundle } from '../../../src/core/bundle/bootstrap.js';
import { ErrorCodes } from '../../../src/types/index.js';
import {
  createFakeProvider,
  createRecordingOutput,
  createTempRoot,
  createTestContext,
  pathExists,
  removeTempRoot,
  writeFiles
} from '../../test-helpers.js';

describe('bootstrapBundle', () => {
  let homeDir: string;
  let bundleDir: string;

  beforeEach(async () => {
    homeDir = await createTempRoot('bootstrap');
    bundleDir = join(homeDir, '.apps');
  });

  afterEach(async () => {
    await removeTempRoot(homeDir);
  });

  it('bundles a package with a bin/ directory under the sanitized name', async () => {
    const provider = createFakeProvider({ 'bin/run.sh': '#!/bin/sh\necho hi\n', 'README.md': 'demo' });
    const output = createRecordingOutput();
    const ctx = await createTestContext(homeDir, { provider, output });

    const result = await bootstrapBundle(ctx, 'demo-pkg');

    assert.equal(result.success, true);
    if (!result.success) return;

    assert.deepEqual(provider.calls, [{ packageName: 'demo-pkg', targetDir: join(bundleDir, 'demo-pkg') }]);
    assert.equal(result.data.bundleName, 'demo_pkg');
    assert.equal(result.data.bundleRoot, join(bundleDir, 'demo_pkg'));
    assert.equal(result.data.entrySource, 'bin');
    assert.deepEqual(result.data.metadata, {
      name: 'demo_pkg',
      bin: 'bin/run.sh',
      version: '1.0.0',
      description: 'App bundle for demo_pkg'
    });

    const stored = JSON.parse(await fs.readFile(join(bundleDir, 'demo_pkg', 'metadata.json'), 'utf8'));
    assert.equal(stored.bin, 'bin/run.sh');
    assert.equal(await pathExists(join(bundleDir, 'demo_pkg', 'bin', 'run.sh')), true);
    assert.equal(await pathExists(join(bundleDir, 'demo-pkg')), false);

    assert.deepEqual(output.messages, [
      { level: 'step', message: "Fetching 'demo-pkg' into '~/.apps/demo-pkg'" },
      { level: 'info', message: "'demo-pkg' successfully installed in '~/.apps/demo-pkg'." },
      { level: 'success', message: "App bundle created at '~/.apps/demo_pkg'." }
    ]);
  });

  it('creates both root directories', async () => {
    const provider = createFakeProvider({ 'bin/tool': '' });
    const ctx = await createTestContext(homeDir, { provider });

    await bootstrapBundle(ctx, 'tool');

    assert.equal(await pathExists(join(homeDir, '.aapp-cli', 'tmp')), true);
    assert.equal(await pathExists(bundleDir), true);
  });

  it('falls back to the marked source file when there is no bin/', async () => {
    const provider = createFakeProvider({
      'app/__init__.py': '',
      'app/start.py': 'import sys\n\ndef main():\n    print(sys.argv)\n'
    });
    const ctx = await createTestContext(homeDir, { provider });

    const result = await bootstrapBundle(ctx, 'starter');

    assert.equal(result.success, true);
    if (!result.success) return;
    assert.equal(result.data.metadata.bin, 'app/start.py');
    assert.equal(result.data.entrySource, 'source-scan');
    assert.equal(await pathExists(join(bundleDir, 'starter', 'metadata.json')), true);
  });

  it('reports NO_ENTRY_POINT, writes no metadata and keeps the fetched files', async () => {
    const provider = createFakeProvider({ 'lib/helpers.py': 'def helper():\n    pass\n' });
    const output = createRecordingOutput();
    const ctx = await createTestContext(homeDir, { provider, output });

    const result = await bootstrapBundle(ctx, 'empty-pkg');

    assert.deepEqual(result, {
      success: false,
      code: ErrorCodes.NO_ENTRY_POINT,
      error: "No files in 'bin' and no file containing 'def main()' found in 'empty-pkg'; app bundle not created."
    });
    assert.equal(await pathExists(join(bundleDir, 'empty-pkg', 'lib', 'helpers.py')), true);
    assert.equal(await pathExists(join(bundleDir, 'empty-pkg', 'metadata.json')), false);
    assert.equal(await pathExists(join(bundleDir, 'empty_pkg')), false);
    assert.equal(output.messages.at(-1)?.level, 'error');
  });

  it('reports FETCH_FAILED when the provider fails', async () => {
    const provider = createFakeProvider({}, "'apkg' exited with code 1");
    const ctx = await createTestContext(homeDir, { provider });

    const result = await bootstrapBundle(ctx, 'demo');

    assert.deepEqual(result, {
      success: false,
      code: ErrorCodes.FETCH_FAILED,
      error: "Failed to download and install 'demo': 'apkg' exited with code 1"
    });
    assert.equal(await pathExists(join(bundleDir, 'demo')), false);
  });

  it('rejects names that are not a single path segment before fetching', async () => {
    const provider = createFakeProvider({ 'bin/tool': '' });
    const ctx = await createTestContext(homeDir, { provider });

    const result = await bootstrapBundle(ctx, '../escape');

    assert.equal(result.success, false);
    if (result.success) return;
    assert.equal(result.code, ErrorCodes.INVALID_NAME);
    assert.equal(provider.calls.length, 0);
  });

  it('replaces an existing bundle of the same name', async () => {
    const first = await createTestContext(homeDir, { provider: createFakeProvider({ 'bin/a': '' }) });
    await bootstrapBundle(first, 'my-tool');

    const second = await createTestContext(homeDir, { provider: createFakeProvider({ 'bin/b': '' }) });
    const result = await bootstrapBundle(second, 'my-tool');

    assert.equal(result.success, true);
    if (!result.success) return;
    assert.equal(result.data.metadata.bin, 'bin/b');
    assert.equal(await pathExists(join(bundleDir, 'my_tool', 'bin', 'a')), false);
  });

  it('drops files of the previous bundle when the name needs no sanitizing', async () => {
    const first = await createTestContext(homeDir, {
      provider: createFakeProvider({ 'bin/a': '', 'old.txt': 'stale' })
    });
    await bootstrapBundle(first, 'tool');

    const second = await createTestContext(homeDir, { provider: createFakeProvider({ 'bin/b': '' }) });
    const result = await bootstrapBundle(second, 'tool');

    assert.equal(result.success, true);
    if (!result.success) return;
    assert.equal(result.data.metadata.bin, 'bin/b');
    assert.deepEqual((await fs.readdir(join(bundleDir, 'tool'))).sort(), ['bin', 'metadata.json']);
    assert.deepEqual(await fs.readdir(join(bundleDir, 'tool', 'bin')), ['b']);
  });

  it('clears a leftover fetch directory before fetching again', async () => {
    await writeFiles(bundleDir, { 'my-tool/bin/a': '' });
    const ctx = await createTestContext(homeDir, { provider: createFakeProvider({ 'bin/b': '' }) });

    const result = await bootstrapBundle(ctx, 'my-tool');

    assert.equal(result.success, true);
    if (!result.success) return;
    assert.equal(result.data.metadata.bin, 'bin/b');
    assert.equal(await pathExists(join(bundleDir, 'my-tool')), false);
  });
});
