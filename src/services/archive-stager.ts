import { promises as fsp } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import extract from 'extract-zip';
import { x as extractTar } from 'tar';
import { ArchiveCorrupt, MemberNotFound } from '../errors.js';
import { atomicCopy, ensureDir, pathExists, removeWithRetry } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';

export const EXTRACTION_MARKER = '.extracted.ok';

const ZIP_PREVIEW_LIMIT = 20;

export class ArchiveStager {
  constructor(private readonly logger: Logger) {}

  /** Extracts a tar-gzip bundle into `destDir` once; the marker file records a complete extraction. */
  async extract(archivePath: string, destDir: string, force: boolean): Promise<string> {
    await ensureDir(destDir);
    const marker = path.join(destDir, EXTRACTION_MARKER);

    if (!force && (await pathExists(marker))) {
      this.logger.info(`using cached extracted bundle ${destDir}`);
      return destDir;
    }

    for (const entry of await fsp.readdir(destDir)) {
      await removeWithRetry(path.join(destDir, entry));
    }

    this.logger.info(`extracting ${path.basename(archivePath)} -> ${destDir}`);
    try {
      await extractTar({ file: archivePath, cwd: destDir, strict: true });
    } catch (error) {
      throw new ArchiveCorrupt(archivePath, error);
    }

    await fsp.writeFile(marker, '');
    this.logger.info(`extracted ${destDir}`);
    return destDir;
  }

  async locateMember(root: string, name: string): Promise<string> {
    const direct = path.join(root, name);
    if (await isFile(direct)) {
      return direct;
    }

    const matches = await findFiles(root, path.basename(name));
    if (matches.length === 0) {
      throw new MemberNotFound(name, root);
    }
    if (matches.length > 1) {
      this.logger.warn(`${matches.length} files named ${name} under ${root}, using ${matches[0]}`);
    }
    return matches[0];
  }

  /** Copies one named entry of a zip archive to `destination`. */
  async stageZipMember(zipPath: string, member: string, destination: string): Promise<string> {
    const tmpDir = await fsp.mkdtemp(path.join(os.tmpdir(), 'sql-bootstrap-zip-'));
    const entries: string[] = [];

    try {
      try {
        await extract(zipPath, {
          dir: tmpDir,
          onEntry: (entry) => {
            entries.push(entry.fileName);
          },
        });
      } catch (error) {
        throw new ArchiveCorrupt(zipPath, error);
      }

      if (!entries.includes(member)) {
        throw new MemberNotFound(member, zipPath, entries.slice(0, ZIP_PREVIEW_LIMIT));
      }

      this.logger.info(`extracting '${member}' from ${path.basename(zipPath)}`);
      return await atomicCopy(path.join(tmpDir, member), destination);
    } finally {
      await fsp.rm(tmpDir, { recursive: true, force: true });
    }
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await fsp.stat(target)).isFile();
  } catch {
    return false;
  }
}

// depth-first, siblings in code-unit order, so repeated searches pick the same match
async function findFiles(dir: string, name: string): Promise<string[]> {
  const entries = await fsp.readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const matches: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      matches.push(...(await findFiles(full, name)));
    } else if (entry.isFile() && entry.name === name) {
      matches.push(full);
    }
  }
  return matches;
}
