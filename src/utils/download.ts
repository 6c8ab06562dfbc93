import { createWriteStream } from 'fs';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { DownloadError } from './errors.js';
import { logger } from './logger.js';

/**
 * Fetch a URL and stream the body into `destPath`.
 * Network failures and non-2xx responses raise DownloadError.
 */
export async function downloadToFile(url: string, destPath: string): Promise<void> {
  let response: Response;
  try {
    response = await fetch(url, { redirect: 'follow' });
  } catch (error) {
    throw new DownloadError(url, error instanceof Error ? error.message : String(error), { error });
  }

  if (!response.ok || !response.body) {
    throw new DownloadError(url, `${response.status} ${response.statusText}`.trim(), { status: response.status });
  }

  try {
    await pipeline(Readable.fromWeb(response.body), createWriteStream(destPath));
  } catch (error) {
    throw new DownloadError(url, error instanceof Error ? error.message : String(error), { error, destPath });
  }
  logger.debug(`Downloaded ${url} -> ${destPath}`);
}
