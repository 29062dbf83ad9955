import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DbAdminError, ImportFailed, SnapshotError } from '../errors.js';
import { buildEnsureDatabaseSql, DbOrchestrator, quoteIdentifier } from '../services/db-orchestrator.js';
import type { EngineDescriptor, EngineId } from '../types/sources.js';
import { createMemoryLogger, FakeCommandRunner, listFiles, makeTempDir, removeTempDir } from './helpers.js';

const ENGINES: Record<EngineId, EngineDescriptor> = {
  mysql: { container: 'text2sql-mysql', client: 'mysql', dump: 'mysqldump' },
  mariadb: { container: 'text2sql-mariadb', client: 'mariadb', dump: 'mariadb-dump' },
};

const CREDS = { rootPassword: 'test-secret' };

describe('buildEnsureDatabaseSql', () => {
  it('creates with the universal character set', () => {
    expect(buildEnsureDatabaseSql('imdb', false)).toBe(
      'CREATE DATABASE IF NOT EXISTS `imdb` CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci;'
    );
  });

  it('drops first when resetting', () => {
    expect(buildEnsureDatabaseSql('imdb', true)).toBe(
      'DROP DATABASE IF EXISTS `imdb`; CREATE DATABASE IF NOT EXISTS `imdb` CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci;'
    );
  });

  it('escapes backticks in names', () => {
    expect(quoteIdentifier('we`ird')).toBe('`we``ird`');
  });
});

describe('DbOrchestrator', () => {
  let schemas: string;

  beforeEach(async () => {
    schemas = await makeTempDir();
  });

  afterEach(async () => {
    await removeTempDir(schemas);
  });

  function build(runner: FakeCommandRunner) {
    return new DbOrchestrator({ engines: ENGINES, layout: { schemas }, runner, logger: createMemoryLogger() });
  }

  it('drops and creates in a single admin command', async () => {
    const runner = new FakeCommandRunner();

    await build(runner).ensureDatabase('mysql', CREDS, 'imdb', true);

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].command).toBe('docker');
    expect(runner.calls[0].args).toEqual([
      'exec',
      '-i',
      'text2sql-mysql',
      'mysql',
      '-uroot',
      '-ptest-secret',
      '-e',
      'DROP DATABASE IF EXISTS `imdb`; CREATE DATABASE IF NOT EXISTS `imdb` CHARACTER SET utf8mb4 COLLATE utf8mb4_unicode_ci;',
    ]);
  });

  it('fails the pair when the admin client exits non-zero', async () => {
    const runner = new FakeCommandRunner(() => 1);

    const error = await build(runner)
      .ensureDatabase('mariadb', CREDS, 'yelp', false)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(DbAdminError);
    expect(error).toMatchObject({ details: { engine: 'mariadb', database: 'yelp', exitCode: 1 } });
  });

  it('streams the SQL file into the client for the target database', async () => {
    const runner = new FakeCommandRunner();

    await build(runner).importSqlFile('mariadb', CREDS, 'yelp', '/cache/staged-sql/yelp.sql');

    expect(runner.calls[0].args).toEqual([
      'exec',
      '-i',
      'text2sql-mariadb',
      'mariadb',
      '-uroot',
      '-ptest-secret',
      'yelp',
    ]);
    expect(runner.calls[0].options).toEqual({ input: '/cache/staged-sql/yelp.sql' });
  });

  it('raises ImportFailed on a non-zero import', async () => {
    const runner = new FakeCommandRunner(() => 1);

    await expect(build(runner).importSqlFile('mysql', CREDS, 'imdb', '/tmp/imdb.sql')).rejects.toBeInstanceOf(
      ImportFailed
    );
  });

  it('writes a structure-only dump to the engine and dataset path', async () => {
    const runner = new FakeCommandRunner(async ({ options }) => {
      if (options.output) {
        await fsp.writeFile(options.output, 'CREATE TABLE `actor` (`aid` int);\n');
      }
      return 0;
    });

    const snapshot = await build(runner).dumpSchemaSnapshot('mysql', CREDS, 'imdb');

    expect(snapshot).toBe(path.join(schemas, 'mysql', 'imdb.schema.sql'));
    expect(await fsp.readFile(snapshot, 'utf8')).toBe('CREATE TABLE `actor` (`aid` int);\n');
    expect(runner.calls[0].args).toEqual([
      'exec',
      '-i',
      'text2sql-mysql',
      'mysqldump',
      '-uroot',
      '-ptest-secret',
      '--no-data',
      '--routines',
      '--triggers',
      'imdb',
    ]);
    expect(await listFiles(path.join(schemas, 'mysql'))).toEqual(['imdb.schema.sql']);
  });

  it('leaves no snapshot behind when the dump fails', async () => {
    const runner = new FakeCommandRunner(async ({ options }) => {
      if (options.output) {
        await fsp.writeFile(options.output, '-- partial');
      }
      return 2;
    });

    await expect(build(runner).dumpSchemaSnapshot('mariadb', CREDS, 'yelp')).rejects.toBeInstanceOf(SnapshotError);
    expect(await listFiles(path.join(schemas, 'mariadb'))).toEqual([]);
  });
});
