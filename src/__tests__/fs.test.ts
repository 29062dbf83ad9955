import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CacheDirectoryError } from '../errors.js';
import { atomicCopy, ensureDir, removeWithRetry, tempSiblingPath } from '../utils/fs.js';
import { listFiles, makeTempDir, removeTempDir } from './helpers.js';

describe('fs helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('names temp files after the process', () => {
    expect(tempSiblingPath('/cache/x.sql')).toMatch(new RegExp(`^/cache/x\\.sql\\.part\\.${process.pid}\\.\\d+$`));
  });

  it('turns directory creation failures into CacheDirectoryError', async () => {
    const blocker = path.join(dir, 'blocker');
    await fsp.writeFile(blocker, '');

    await expect(ensureDir(path.join(blocker, 'child'))).rejects.toBeInstanceOf(CacheDirectoryError);
  });

  it('copies through a temp file', async () => {
    await fsp.writeFile(path.join(dir, 'source.sql'), 'CREATE TABLE t (id INT);');

    await atomicCopy(path.join(dir, 'source.sql'), path.join(dir, 'out', 'copy.sql'));

    expect(await fsp.readFile(path.join(dir, 'out', 'copy.sql'), 'utf8')).toBe('CREATE TABLE t (id INT);');
    expect(await listFiles(path.join(dir, 'out'))).toEqual(['copy.sql']);
  });

  it('removes directories and tolerates missing paths', async () => {
    await fsp.mkdir(path.join(dir, 'tree', 'leaf'), { recursive: true });

    expect(await removeWithRetry(path.join(dir, 'tree'))).toBe(true);
    expect(await removeWithRetry(path.join(dir, 'absent'))).toBe(true);
    expect(await listFiles(dir)).toEqual([]);
  });
});
