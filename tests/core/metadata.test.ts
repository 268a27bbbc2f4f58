import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';

import { readBundleMetadata, writeBundleMetadata } from '../../src/core/metadata.js';
import { createTempRoot, removeTempRoot, writeFiles } from '../test-helpers.js';

describe('bundle metadata store', () => {
  let bundleDir: string;

  beforeEach(async () => {
    bundleDir = await createTempRoot('metadata');
  });

  afterEach(async () => {
    await removeTempRoot(bundleDir);
  });

  it('writes the full record into a freshly created bundle directory', async () => {
    const written = await writeBundleMetadata(join(bundleDir, 'nested', 'store'), 'demo_pkg', 'bin/run.sh');

    assert.deepEqual(written, {
      name: 'demo_pkg',
      bin: 'bin/run.sh',
      version: '1.0.0',
      description: 'App bundle for demo_pkg'
    });

    const raw = await fs.readFile(join(bundleDir, 'nested', 'store', 'demo_pkg', 'metadata.json'), 'utf8');
    assert.equal(
      raw,
      '{\n' +
        '  "name": "demo_pkg",\n' +
        '  "bin": "bin/run.sh",\n' +
        '  "version": "1.0.0",\n' +
        '  "description": "App bundle for demo_pkg"\n' +
        '}\n'
    );
  });

  it('round-trips the bin field exactly', async () => {
    const bins = ['bin/run.sh', 'app/start.py', 'deep/er/path with space.py'];
    for (const bin of bins) {
      await writeBundleMetadata(bundleDir, 'roundtrip', bin);
      const read = await readBundleMetadata(join(bundleDir, 'roundtrip'));
      assert.equal(read.status, 'ok');
      if (read.status === 'ok') {
        assert.equal(read.metadata.bin, bin);
      }
    }
  });

  it('overwrites an existing record without merging', async () => {
    await writeFiles(bundleDir, {
      'app/metadata.json': JSON.stringify({ name: 'app', bin: 'old', homepage: 'https://example.test' })
    });

    await writeBundleMetadata(bundleDir, 'app', 'bin/new');
    const read = await readBundleMetadata(join(bundleDir, 'app'));

    assert.equal(read.status, 'ok');
    if (read.status === 'ok') {
      assert.equal(read.metadata.bin, 'bin/new');
      assert.deepEqual(read.metadata.extra, {});
    }
  });

  it('reports a missing record as not-found', async () => {
    await fs.mkdir(join(bundleDir, 'empty'));
    const read = await readBundleMetadata(join(bundleDir, 'empty'));
    assert.deepEqual(read, { status: 'not-found', path: join(bundleDir, 'empty', 'metadata.json') });
  });

  it('reports unparseable JSON and non-object records as corrupt', async () => {
    await writeFiles(bundleDir, {
      'broken/metadata.json': '{ "name": ',
      'array/metadata.json': '["bin/run.sh"]',
      'null/metadata.json': 'null'
    });

    for (const name of ['broken', 'array', 'null']) {
      const read = await readBundleMetadata(join(bundleDir, name));
      assert.equal(read.status, 'corrupt', name);
    }
  });

  it('reports an unreadable record as corrupt', async () => {
    const metadataPath = join(bundleDir, 'dir', 'metadata.json');
    await fs.mkdir(metadataPath, { recursive: true });

    const read = await readBundleMetadata(join(bundleDir, 'dir'));

    assert.deepEqual(read, {
      status: 'corrupt',
      path: metadataPath,
      reason: `File system error: Failed to read file: ${metadataPath}`
    });
  });

  it('tolerates missing fields, wrong types and unknown fields', async () => {
    await writeFiles(bundleDir, {
      'lenient/metadata.json': JSON.stringify({ bin: 'bin/tool', version: 2, homepage: 'https://example.test' })
    });

    const read = await readBundleMetadata(join(bundleDir, 'lenient'));
    assert.equal(read.status, 'ok');
    if (read.status === 'ok') {
      assert.deepEqual(read.metadata, {
        bin: 'bin/tool',
        extra: { homepage: 'https://example.test' }
      });
    }
  });
});
