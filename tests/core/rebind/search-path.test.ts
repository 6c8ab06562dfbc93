import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { createResolverConfig, hasSearchPathEntry, prependSearchPath } from '../../../src/core/rebind/search-path.js';

const SITE = '/usr/local/lib/python3.10/site-packages';

describe('prependSearchPath', () => {
  it('should put the entry first in an empty path', () => {
    const next = prependSearchPath(createResolverConfig([]), SITE);
    assert.deepStrictEqual(next.searchPath, [SITE]);
  });

  it('should put the entry in front of existing entries', () => {
    const next = prependSearchPath(createResolverConfig(['', '/usr/lib/python3.10']), SITE);
    assert.deepStrictEqual(next.searchPath, [SITE, '', '/usr/lib/python3.10']);
  });

  it('should move an existing entry to the front instead of duplicating it', () => {
    const next = prependSearchPath(createResolverConfig(['', SITE, '/usr/lib/python3.10', SITE]), SITE);
    assert.deepStrictEqual(next.searchPath, [SITE, '', '/usr/lib/python3.10']);
  });

  it('should leave a path that already starts with the entry unchanged', () => {
    const next = prependSearchPath(createResolverConfig([SITE, '']), SITE);
    assert.deepStrictEqual(next.searchPath, [SITE, '']);
  });

  it('should return a new config and leave the input untouched', () => {
    const original = createResolverConfig(['/a']);
    const next = prependSearchPath(original, SITE);
    assert.notStrictEqual(next, original);
    assert.deepStrictEqual(original.searchPath, ['/a']);
    assert.strictEqual(hasSearchPathEntry(original, SITE), false);
    assert.strictEqual(hasSearchPathEntry(next, SITE), true);
  });
});
