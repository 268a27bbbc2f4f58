import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { join } from 'path';

import {
  processPrivilegeCheck,
  resolvePrivilegeContext,
  resolveRootDirectories
} from '../../src/core/privilege-context.js';
import { elevated, unprivileged } from '../test-helpers.js';

describe('resolveRootDirectories', () => {
  it('uses fixed system-wide paths when elevated', () => {
    assert.deepEqual(resolveRootDirectories(true, '/home/alex'), {
      tempDir: '/usr/share/aapp-cli/temp',
      bundleDir: '/usr/apps',
      configDir: '/usr/share/aapp-cli'
    });
  });

  it('roots everything under the home directory otherwise', () => {
    const home = join('/home', 'alex');
    assert.deepEqual(resolveRootDirectories(false, home), {
      tempDir: join(home, '.aapp-cli', 'tmp'),
      bundleDir: join(home, '.apps'),
      configDir: join(home, '.aapp-cli')
    });
  });
});

describe('resolvePrivilegeContext', () => {
  it('derives the directories from the injected check', () => {
    const home = join('/home', 'sam');

    const root = resolvePrivilegeContext(elevated, home);
    assert.equal(root.elevated, true);
    assert.equal(root.directories.bundleDir, '/usr/apps');

    const user = resolvePrivilegeContext(unprivileged, home);
    assert.equal(user.elevated, false);
    assert.equal(user.directories.bundleDir, join(home, '.apps'));
  });

  it('consults the check exactly once', () => {
    let calls = 0;
    resolvePrivilegeContext({ isElevated: () => { calls++; return false; } }, '/tmp/home');
    assert.equal(calls, 1);
  });
});

describe('processPrivilegeCheck', () => {
  it('matches the effective uid of the test process', () => {
    const expected = typeof process.geteuid === 'function' && process.geteuid() === 0;
    assert.equal(processPrivilegeCheck.isElevated(), expected);
  });
});
