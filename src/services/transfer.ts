import { createWriteStream, promises as fsp } from 'node:fs';
import path from 'node:path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { TransferError } from '../errors.js';
import { ensureDir, pathExists, removeWithRetry, tempSiblingPath } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type Downloader = {
  fetch(url: string, destination: string, force: boolean): Promise<string>;
};

export type TransferOptions = {
  logger: Logger;
  fetch?: FetchLike;
  timeoutMs?: number;
};

/**
 * Plain HTTP(S) download into a cache path.
 *
 * The timeout only bounds the wait for response headers; once the body starts
 * streaming it runs until completion.
 */
export class Transfer implements Downloader {
  private readonly logger: Logger;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor({ logger, fetch: fetchImpl = fetch, timeoutMs = 60_000 }: TransferOptions) {
    this.logger = logger;
    this.fetchImpl = fetchImpl;
    this.timeoutMs = timeoutMs;
  }

  async fetch(url: string, destination: string, force: boolean): Promise<string> {
    await ensureDir(path.dirname(destination));
    if (!force && (await pathExists(destination))) {
      this.logger.info(`using cached ${destination}`);
      return destination;
    }

    this.logger.info(`downloading ${url}`);
    const response = await this.request(url);
    if (!response.ok) {
      throw new TransferError(url, response.status);
    }

    await saveResponse(response, destination);
    this.logger.info(`saved ${destination}`);
    return destination;
  }

  async request(url: string, headers?: Record<string, string>): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await this.fetchImpl(url, { headers, signal: controller.signal, redirect: 'follow' });
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Streams the body to a per-process temp file beside the destination and
 * renames it into place once the body is complete. The destination is only
 * ever replaced by a complete file.
 */
export async function saveResponse(response: Response, destination: string): Promise<string> {
  await ensureDir(path.dirname(destination));
  const tmp = tempSiblingPath(destination);

  try {
    if (response.body) {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(tmp));
    } else {
      await fsp.writeFile(tmp, '');
    }
    await fsp.rename(tmp, destination);
  } finally {
    await removeWithRetry(tmp);
  }

  return destination;
}
