/**
 * Kernel controllers.
 *
 * Only the host can restart the notebook kernel. A restart request is a
 * one-way notification: nothing here waits for the kernel to come back,
 * and post-restart state is the post-install check's business.
 */

import type { KernelConfig } from '../../types/index.js';
import { KernelRestartError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import type { OutputPort } from '../ports/output.js';

export interface KernelController {
  requestRestart(): Promise<void>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface JupyterKernelOptions {
  url: string;
  id: string;
  token?: string;
  fetch?: FetchFn;
}

/**
 * Restarts a kernel through the Jupyter Server REST API
 */
export class JupyterKernelController implements KernelController {
  private readonly endpoint: string;
  private readonly token?: string;
  private readonly fetchFn: FetchFn;

  constructor(options: JupyterKernelOptions) {
    const base = options.url.replace(/\/+$/, '');
    this.endpoint = `${base}/api/kernels/${encodeURIComponent(options.id)}/restart`;
    this.token = options.token;
    this.fetchFn = options.fetch ?? fetch;
  }

  async requestRestart(): Promise<void> {
    const headers: Record<string, string> = {};
    if (this.token) {
      headers.Authorization = `token ${this.token}`;
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, { method: 'POST', headers });
    } catch (error) {
      throw new KernelRestartError(error instanceof Error ? error.message : String(error), { endpoint: this.endpoint });
    }

    if (!response.ok) {
      throw new KernelRestartError(`${response.status} ${response.statusText}`.trim(), { endpoint: this.endpoint });
    }
    logger.debug(`Kernel restart requested via ${this.endpoint}`);
  }
}

/**
 * Used when no kernel endpoint is configured: asks the user to restart
 */
export class ManualRestartController implements KernelController {
  constructor(private readonly output: OutputPort) {}

  async requestRestart(): Promise<void> {
    this.output.note(
      'Restart the notebook kernel (Runtime → Restart session) to start using the new environment.',
      'Restart required'
    );
  }
}

export function createKernelController(config: KernelConfig, output: OutputPort): KernelController {
  if (config.url && config.id) {
    return new JupyterKernelController({ url: config.url, id: config.id, token: config.token });
  }
  logger.debug('No kernel endpoint configured, falling back to a manual restart', { url: config.url, id: config.id });
  return new ManualRestartController(output);
}
