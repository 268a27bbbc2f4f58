import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { exitCodeForError } from '../../src/cli/error-handling.js';
import { AappError, ErrorCodes } from '../../src/types/index.js';
import { ConfigError, FileSystemError, InvalidNameError } from '../../src/utils/errors.js';

describe('exitCodeForError', () => {
  it('maps aapp errors to the exit code of their kind', () => {
    assert.equal(exitCodeForError(new ConfigError('Invalid config file')), 3);
    assert.equal(exitCodeForError(new FileSystemError('Failed to locate or create directory: /usr/apps')), 1);
    assert.equal(exitCodeForError(new InvalidNameError('bundle', '..', 'name cannot be a relative path segment')), 2);
    assert.equal(exitCodeForError(new AappError('fetch failed', ErrorCodes.FETCH_FAILED)), 10);
  });

  it('exits 1 for anything else', () => {
    assert.equal(exitCodeForError(new Error('boom')), 1);
    assert.equal(exitCodeForError('boom'), 1);
  });
});
