import path from 'node:path';
import { ConfirmationTokenMissing, IdentifierError, PermissionDenied, TransferError } from '../errors.js';
import { ensureDir, pathExists } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import { saveResponse, type Downloader, type Transfer } from './transfer.js';

export const INTERACTIVE_HOSTS = ['drive.google.com', 'drive.usercontent.google.com'];

const DEFAULT_ENDPOINT = 'https://drive.google.com/uc';

export function isInteractiveHostUrl(url: string): boolean {
  try {
    return INTERACTIVE_HOSTS.includes(new URL(url).hostname);
  } catch {
    return false;
  }
}

export function extractFileId(url: string): string {
  let parsed: URL | null = null;
  try {
    parsed = new URL(url);
  } catch {
    parsed = null;
  }

  const fromQuery = parsed?.searchParams.get('id');
  if (fromQuery) {
    return fromQuery;
  }

  const match = /\/file\/d\/([A-Za-z0-9_-]+)/.exec(url);
  if (match) {
    return match[1];
  }

  throw new IdentifierError(url);
}

export type ConfirmationPage = {
  body: string;
  cookies: ReadonlyMap<string, string>;
};

/**
 * Looks for the confirm token in, in order: a `confirm=` link parameter,
 * a hidden `confirm` form field, a non-empty `download_warning*` cookie.
 */
export function extractConfirmToken({ body, cookies }: ConfirmationPage): string | null {
  const fromLink = /(?:[?&]|&amp;)confirm=([0-9A-Za-z_-]+)/.exec(body);
  if (fromLink) {
    return fromLink[1];
  }

  const fromField = /name="confirm"\s+value="([^"]+)"/.exec(body);
  if (fromField) {
    return fromField[1];
  }

  for (const [name, value] of cookies) {
    if (name.startsWith('download_warning') && value) {
      return value;
    }
  }

  return null;
}

export function isHtmlResponse(response: Response): boolean {
  return (response.headers.get('content-type') ?? '').toLowerCase().includes('text/html');
}

/** Cookies carried between the two rounds of the handshake. */
export class CookieJar {
  private readonly cookies = new Map<string, string>();

  store(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(';', 1)[0];
      const separator = pair.indexOf('=');
      if (separator <= 0) {
        continue;
      }
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }

  entries(): ReadonlyMap<string, string> {
    return this.cookies;
  }

  header(): string | undefined {
    if (this.cookies.size === 0) {
      return undefined;
    }
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ');
  }
}

export type InteractiveHostDownloaderOptions = {
  transfer: Transfer;
  logger: Logger;
  endpoint?: string;
};

export class InteractiveHostDownloader implements Downloader {
  private readonly transfer: Transfer;
  private readonly logger: Logger;
  private readonly endpoint: string;

  constructor({ transfer, logger, endpoint = DEFAULT_ENDPOINT }: InteractiveHostDownloaderOptions) {
    this.transfer = transfer;
    this.logger = logger;
    this.endpoint = endpoint;
  }

  async fetch(url: string, destination: string, force: boolean): Promise<string> {
    await ensureDir(path.dirname(destination));
    if (!force && (await pathExists(destination))) {
      this.logger.info(`using cached ${destination}`);
      return destination;
    }

    const fileId = extractFileId(url);
    this.logger.info(`downloading file ${fileId} from ${new URL(this.endpoint).hostname}`);

    const jar = new CookieJar();
    const params = new URLSearchParams({ export: 'download', id: fileId });

    const first = await this.get(params, jar);
    if (!isHtmlResponse(first)) {
      return this.save(first, destination);
    }

    const token = extractConfirmToken({ body: await first.text(), cookies: jar.entries() });
    if (!token) {
      throw new ConfirmationTokenMissing(fileId);
    }

    params.set('confirm', token);
    const second = await this.get(params, jar);
    if (isHtmlResponse(second)) {
      await second.body?.cancel();
      throw new PermissionDenied(fileId);
    }

    return this.save(second, destination);
  }

  private async get(params: URLSearchParams, jar: CookieJar): Promise<Response> {
    const url = `${this.endpoint}?${params.toString()}`;
    const cookie = jar.header();
    const response = await this.transfer.request(url, cookie ? { cookie } : undefined);
    if (!response.ok) {
      throw new TransferError(url, response.status);
    }
    jar.store(response);
    return response;
  }

  private async save(response: Response, destination: string): Promise<string> {
    await saveResponse(response, destination);
    this.logger.info(`saved ${destination}`);
    return destination;
  }
}

/** Routes interactive-host URLs to the handshake downloader, everything else to plain transfer. */
export function createDownloader(transfer: Transfer, interactive: InteractiveHostDownloader): Downloader {
  return {
    fetch: (url, destination, force) =>
      isInteractiveHostUrl(url)
        ? interactive.fetch(url, destination, force)
        : transfer.fetch(url, destination, force),
  };
}
