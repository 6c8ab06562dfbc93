import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { downloadToFile } from '../../src/utils/download.js';
import { DownloadError } from '../../src/utils/errors.js';
import { makeTempDir, removeTempDir, startStubServer, type StubServer } from '../test-helpers.js';

describe('downloadToFile', () => {
  let server: StubServer;
  let dir: string;

  before(async () => {
    server = await startStubServer({ '/payload.sh': 'echo payload\n' });
    dir = await makeTempDir('download');
  });

  after(async () => {
    await server.close();
    await removeTempDir(dir);
  });

  it('should stream the response body to the destination file', async () => {
    const dest = join(dir, 'payload.sh');
    await downloadToFile(`${server.url}/payload.sh`, dest);
    assert.strictEqual(await readFile(dest, 'utf8'), 'echo payload\n');
  });

  it('should raise DownloadError for a non-2xx response', async () => {
    const url = `${server.url}/missing.sh`;
    await assert.rejects(
      downloadToFile(url, join(dir, 'missing.sh')),
      (error: unknown) => {
        assert.ok(error instanceof DownloadError);
        assert.strictEqual(error.message, `Failed to download ${url}: 404 Not Found`);
        return true;
      }
    );
  });
});
