import { createServer, type Server } from 'node:http';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import type { OutputPort, UnifiedSpinner } from '../src/core/ports/output.js';
import type { InterpreterProbe, InterpreterSnapshot } from '../src/core/rebind/interpreter.js';
import type { KernelController } from '../src/core/rebind/kernel-controller.js';

export interface RecordedOutput extends OutputPort {
  lines: string[];
}

/**
 * OutputPort that records every message as "<kind>: <text>"
 */
export function createRecordingOutput(confirmAnswer = true): RecordedOutput {
  const lines: string[] = [];
  const spinner: UnifiedSpinner = {
    start: (message) => { lines.push(`spinner: ${message}`); },
    stop: (finalMessage) => { lines.push(`spinner-stop: ${finalMessage ?? ''}`); },
    message: (text) => { lines.push(`spinner-message: ${text}`); }
  };
  return {
    lines,
    info: (message) => { lines.push(`info: ${message}`); },
    step: (message) => { lines.push(`step: ${message}`); },
    message: (message) => { lines.push(`message: ${message}`); },
    success: (message) => { lines.push(`success: ${message}`); },
    error: (message) => { lines.push(`error: ${message}`); },
    warn: (message) => { lines.push(`warn: ${message}`); },
    note: (content, title) => { lines.push(`note: ${title ?? ''}: ${content}`); },
    confirm: async (message) => {
      lines.push(`confirm: ${message}`);
      return confirmAnswer;
    },
    spinner: () => spinner
  };
}

export async function makeTempDir(label: string): Promise<string> {
  return await mkdtemp(path.join(tmpdir(), `condabind-${label}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Probe stand-in that reports a fixed interpreter and records what it was asked about
 */
export function createFakeProbe(snapshot: InterpreterSnapshot): InterpreterProbe & { calls: string[] } {
  const calls: string[] = [];
  const probe = async (executable: string): Promise<InterpreterSnapshot> => {
    calls.push(executable);
    return { ...snapshot, searchPath: [...snapshot.searchPath] };
  };
  return Object.assign(probe, { calls });
}

export class FakeKernelController implements KernelController {
  restarts = 0;

  async requestRestart(): Promise<void> {
    this.restarts++;
  }
}

export interface StubServer {
  url: string;
  requests: string[];
  close(): Promise<void>;
}

/**
 * In-process HTTP server: `routes` maps a path to a body; anything else is a 404
 */
export async function startStubServer(routes: Record<string, string>): Promise<StubServer> {
  const requests: string[] = [];
  const server: Server = createServer((req, res) => {
    const url = req.url ?? '/';
    requests.push(`${req.method ?? 'GET'} ${url}`);
    const body = routes[url];
    if (body === undefined) {
      res.statusCode = 404;
      res.end('not found');
      return;
    }
    res.statusCode = 200;
    res.setHeader('Content-Type', 'application/octet-stream');
    res.end(body);
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('stub server has no TCP address');
  }
  const { port } = address;

  return {
    url: `http://127.0.0.1:${port}`,
    requests,
    close: () => new Promise<void>((resolve, reject) => {
      server.closeAllConnections();
      server.close((error) => (error ? reject(error) : resolve()));
    })
  };
}
