import path from 'node:path';
import { promises as fsp } from 'node:fs';
import { DbAdminError, ImportFailed, SnapshotError } from '../errors.js';
import type { CacheLayout, Credentials, EngineDescriptor, EngineId } from '../types/sources.js';
import type { CommandRunner } from '../utils/command-runner.js';
import { ensureDir, removeWithRetry, tempSiblingPath } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';

export const DATABASE_CHARSET = 'utf8mb4';
export const DATABASE_COLLATION = 'utf8mb4_unicode_ci';

export type DbOrchestratorOptions = {
  engines: Record<EngineId, EngineDescriptor>;
  layout: Pick<CacheLayout, 'schemas'>;
  runner: CommandRunner;
  logger: Logger;
};

export function quoteIdentifier(name: string): string {
  return `\`${name.replace(/`/g, '``')}\``;
}

export function buildEnsureDatabaseSql(name: string, reset: boolean): string {
  const statements: string[] = [];
  if (reset) {
    statements.push(`DROP DATABASE IF EXISTS ${quoteIdentifier(name)};`);
  }
  statements.push(
    `CREATE DATABASE IF NOT EXISTS ${quoteIdentifier(name)} CHARACTER SET ${DATABASE_CHARSET} COLLATE ${DATABASE_COLLATION};`
  );
  return statements.join(' ');
}

/**
 * Drives MySQL-family engines running in containers through `docker exec`.
 * Each call is one subprocess; its exit code is the only signal consulted.
 */
export class DbOrchestrator {
  private readonly engines: Record<EngineId, EngineDescriptor>;
  private readonly layout: Pick<CacheLayout, 'schemas'>;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor({ engines, layout, runner, logger }: DbOrchestratorOptions) {
    this.engines = engines;
    this.layout = layout;
    this.runner = runner;
    this.logger = logger;
  }

  snapshotPath(engine: EngineId, database: string): string {
    return path.join(this.layout.schemas, engine, `${database}.schema.sql`);
  }

  async ensureDatabase(engine: EngineId, creds: Credentials, name: string, reset: boolean): Promise<void> {
    const descriptor = this.engines[engine];
    if (reset) {
      this.logger.info(`dropping database '${name}' on ${engine} (if exists)`);
    }
    this.logger.info(`creating database '${name}' on ${engine} (if not exists)`);

    const exitCode = await this.runner.run('docker', [
      ...execPrefix(descriptor, descriptor.client, creds),
      '-e',
      buildEnsureDatabaseSql(name, reset),
    ]);
    if (exitCode !== 0) {
      throw new DbAdminError(engine, name, exitCode);
    }
  }

  async importSqlFile(engine: EngineId, creds: Credentials, database: string, sqlFile: string): Promise<void> {
    const descriptor = this.engines[engine];
    this.logger.info(`importing ${path.basename(sqlFile)} into ${engine}:${database}`);

    const exitCode = await this.runner.run('docker', [...execPrefix(descriptor, descriptor.client, creds), database], {
      input: sqlFile,
    });
    if (exitCode !== 0) {
      throw new ImportFailed(engine, database, exitCode);
    }
    this.logger.info(`import complete: ${engine}:${database}`);
  }

  async dumpSchemaSnapshot(engine: EngineId, creds: Credentials, database: string): Promise<string> {
    const descriptor = this.engines[engine];
    const destination = this.snapshotPath(engine, database);
    await ensureDir(path.dirname(destination));
    const tmp = tempSiblingPath(destination);

    this.logger.info(`writing schema snapshot ${destination}`);
    try {
      const exitCode = await this.runner.run(
        'docker',
        [...execPrefix(descriptor, descriptor.dump, creds), '--no-data', '--routines', '--triggers', database],
        { output: tmp }
      );
      if (exitCode !== 0) {
        throw new SnapshotError(engine, database, exitCode);
      }
      await fsp.rename(tmp, destination);
    } finally {
      await removeWithRetry(tmp);
    }
    return destination;
  }
}

function execPrefix(descriptor: EngineDescriptor, binary: string, creds: Credentials): string[] {
  return ['exec', '-i', descriptor.container, binary, '-uroot', `-p${creds.rootPassword}`];
}
