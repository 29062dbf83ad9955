import { createWriteStream, promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import archiver from 'archiver';
import { c as createTar } from 'tar';
import { vi } from 'vitest';
import { createCacheLayout } from '../config.js';
import type { CacheLayout } from '../types/sources.js';
import type { CommandRunner, RunOptions } from '../utils/command-runner.js';
import type { Logger } from '../utils/logger.js';

export async function makeTempDir(prefix = 'sql-bootstrap-test-'): Promise<string> {
  return fsp.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function makeTempLayout(): Promise<CacheLayout> {
  return createCacheLayout(await makeTempDir());
}

export async function removeTempDir(dir: string): Promise<void> {
  await fsp.rm(dir, { recursive: true, force: true });
}

export type MemoryLogger = Logger & { lines: string[] };

export function createMemoryLogger(): MemoryLogger {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
  };
}

export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [name, contents] of Object.entries(files)) {
    const target = path.join(root, name);
    await fsp.mkdir(path.dirname(target), { recursive: true });
    await fsp.writeFile(target, contents, 'utf8');
  }
}

export async function makeTarGz(files: Record<string, string>): Promise<Buffer> {
  const workDir = await makeTempDir('sql-bootstrap-tgz-');
  try {
    const sourceDir = path.join(workDir, 'src');
    await writeTree(sourceDir, files);
    const archivePath = path.join(workDir, 'bundle.tgz');
    await createTar({ gzip: true, file: archivePath, cwd: sourceDir }, Object.keys(files));
    return await fsp.readFile(archivePath);
  } finally {
    await removeTempDir(workDir);
  }
}

export async function makeZip(files: Record<string, string>): Promise<Buffer> {
  const workDir = await makeTempDir('sql-bootstrap-zip-');
  const archivePath = path.join(workDir, 'archive.zip');
  try {
    await new Promise<void>((resolve, reject) => {
      const output = createWriteStream(archivePath);
      const archive = archiver('zip', { zlib: { level: 9 } });

      output.on('close', resolve);
      output.on('error', reject);
      archive.on('error', reject);

      archive.pipe(output);
      for (const [name, contents] of Object.entries(files)) {
        archive.append(contents, { name });
      }
      void archive.finalize();
    });
    return await fsp.readFile(archivePath);
  } finally {
    await removeTempDir(workDir);
  }
}

export function fileResponse(body: string | Buffer, contentType = 'application/octet-stream'): Response {
  return new Response(body, { status: 200, headers: { 'content-type': contentType } });
}

export function htmlResponse(body: string, cookies: string[] = []): Response {
  const headers = new Headers({ 'content-type': 'text/html; charset=utf-8' });
  for (const cookie of cookies) {
    headers.append('set-cookie', cookie);
  }
  return new Response(body, { status: 200, headers });
}

export function createFetchMock(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  return vi.fn(async (url: string, init?: RequestInit) => handler(url, init));
}

export type RecordedCommand = {
  command: string;
  args: string[];
  options: RunOptions;
};

/** Records every invocation; `respond` decides the exit code and may write the output file. */
export class FakeCommandRunner implements CommandRunner {
  readonly calls: RecordedCommand[] = [];

  constructor(
    private readonly respond: (call: RecordedCommand) => number | Promise<number> = () => 0
  ) {}

  async run(command: string, args: string[], options: RunOptions = {}): Promise<number> {
    const call = { command, args, options };
    this.calls.push(call);
    return this.respond(call);
  }
}

export async function listFiles(dir: string): Promise<string[]> {
  try {
    return (await fsp.readdir(dir)).sort();
  } catch {
    return [];
  }
}
