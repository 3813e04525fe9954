/**
 * GridCalc Engine - HTTP transport for GET()
 *
 * Recalculation is synchronous, so the fetch runs in a child Node process
 * and the engine blocks on it with spawnSync.
 */

import {
  spawnSync,
  type SpawnSyncOptionsWithStringEncoding,
  type SpawnSyncReturns,
} from 'node:child_process';
import { z } from 'zod';
import type { Logger } from '../logging/logger.js';
import type { Result } from './errors.js';

export interface HttpClient {
  /** Blocking GET returning the response body, or a failure message */
  getText(url: string): Result<string, string>;
}

export type SpawnSyncFn = (
  command: string,
  args: readonly string[],
  options: SpawnSyncOptionsWithStringEncoding
) => SpawnSyncReturns<string>;

export interface ProcessHttpClientOptions {
  /** 0 disables the timeout */
  timeoutMs?: number;
  /** Largest response accepted from the child, in bytes */
  maxBufferBytes?: number;
  /** Override the Node binary; defaults to the running one */
  execPath?: string;
  /** Override `spawnSync` for tests */
  spawnSync?: SpawnSyncFn;
  logger?: Logger;
}

const FETCH_SCRIPT = `
const url = process.argv[1];
fetch(url)
  .then(async (res) => {
    const body = await res.text();
    process.stdout.write(JSON.stringify({ status: res.status, body }));
  })
  .catch((err) => {
    process.stdout.write(JSON.stringify({ error: String((err && err.message) || err) }));
  });
`;

const ChildReplySchema = z.union([
  z.object({ status: z.number().int(), body: z.string() }),
  z.object({ error: z.string() }),
]);

export function isHttpUrl(url: string): boolean {
  if (!URL.canParse(url)) return false;
  const { protocol } = new URL(url);
  return protocol === 'http:' || protocol === 'https:';
}

export class ProcessHttpClient implements HttpClient {
  private readonly timeoutMs: number;
  private readonly maxBufferBytes: number;
  private readonly execPath: string;
  private readonly spawn: SpawnSyncFn;
  private readonly logger: Logger | undefined;

  constructor(options: ProcessHttpClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 0;
    this.maxBufferBytes = options.maxBufferBytes ?? 16 * 1024 * 1024;
    this.execPath = options.execPath ?? process.execPath;
    this.spawn = options.spawnSync ?? spawnSync;
    this.logger = options.logger;
  }

  getText(url: string): Result<string, string> {
    if (!isHttpUrl(url)) {
      return { ok: false, error: `Invalid URL '${url}'` };
    }

    const result = this.fetchInChild(url);
    if (result.ok) {
      this.logger?.debug({ url }, 'http_get_ok');
    } else {
      this.logger?.debug({ url, reason: result.error }, 'http_get_failed');
    }
    return result;
  }

  private fetchInChild(url: string): Result<string, string> {
    const options: SpawnSyncOptionsWithStringEncoding = {
      encoding: 'utf8',
      maxBuffer: this.maxBufferBytes,
      windowsHide: true,
    };
    if (this.timeoutMs > 0) options.timeout = this.timeoutMs;

    const child = this.spawn(this.execPath, ['-e', FETCH_SCRIPT, url], options);

    if (child.error) {
      return { ok: false, error: child.error.message };
    }
    if (child.status !== 0) {
      const detail = child.signal ? `signal ${child.signal}` : `exit code ${String(child.status)}`;
      return { ok: false, error: `Fetch process failed (${detail})` };
    }

    let payload: unknown;
    try {
      payload = JSON.parse(child.stdout);
    } catch {
      return { ok: false, error: 'Malformed reply from fetch process' };
    }

    const reply = ChildReplySchema.safeParse(payload);
    if (!reply.success) {
      return { ok: false, error: 'Malformed reply from fetch process' };
    }
    if ('error' in reply.data) {
      return { ok: false, error: reply.data.error };
    }
    if (reply.data.status < 200 || reply.data.status > 299) {
      return { ok: false, error: `HTTP ${reply.data.status}` };
    }
    return { ok: true, value: reply.data.body };
  }
}
