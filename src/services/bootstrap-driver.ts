import { promises as fsp } from 'node:fs';
import { CacheDirectoryError, ConfigError, ImportFailed, describeError } from '../errors.js';
import type { CacheLayout, Credentials, EngineId } from '../types/sources.js';
import type { Logger } from '../utils/logger.js';
import type { AssetResolver } from './asset-resolver.js';
import type { DbOrchestrator } from './db-orchestrator.js';
import { compareSchemaObjects, listSchemaObjects, type SchemaObject } from './schema-objects.js';

export type BootstrapOptions = {
  engines: EngineId[];
  datasets: string[];
  reset: boolean;
  forceDownload: boolean;
  skipSchemaDump: boolean;
  credentials: Record<EngineId, Credentials>;
};

export type PairStatus = 'imported' | 'no-source' | 'resolve-failed' | 'db-failed' | 'import-failed';

export type SnapshotStatus = 'written' | 'failed' | 'skipped';

export type PairOutcome = {
  engine: EngineId;
  dataset: string;
  status: PairStatus;
  snapshot: SnapshotStatus;
  sqlFile?: string;
  snapshotFile?: string;
  missingObjects?: SchemaObject[];
  error?: string;
};

export type BootstrapReport = {
  outcomes: PairOutcome[];
  abortedEngines: EngineId[];
  ok: boolean;
};

export type BootstrapDriverOptions = {
  resolver: AssetResolver;
  orchestrator: DbOrchestrator;
  layout: Pick<CacheLayout, 'stagedQuestions'>;
  logger: Logger;
};

function isFatal(error: unknown): boolean {
  return error instanceof CacheDirectoryError || error instanceof ConfigError;
}

/**
 * Runs every engine × dataset pair in order. Resolution and admin failures skip
 * the pair; an import failure stops the remaining datasets of that engine.
 */
export class BootstrapDriver {
  private readonly resolver: AssetResolver;
  private readonly orchestrator: DbOrchestrator;
  private readonly layout: Pick<CacheLayout, 'stagedQuestions'>;
  private readonly logger: Logger;

  constructor({ resolver, orchestrator, layout, logger }: BootstrapDriverOptions) {
    this.resolver = resolver;
    this.orchestrator = orchestrator;
    this.layout = layout;
    this.logger = logger;
  }

  async run(options: BootstrapOptions): Promise<BootstrapReport> {
    const { engines, datasets, reset, forceDownload, skipSchemaDump } = options;
    this.logger.info(`targets: ${engines.join(', ')}`);
    this.logger.info(`datasets: ${datasets.join(', ')}`);
    this.logger.info(`reset: ${reset}, force download: ${forceDownload}, schema dump: ${!skipSchemaDump}`);

    const outcomes: PairOutcome[] = [];
    const abortedEngines: EngineId[] = [];

    for (const engine of engines) {
      this.logger.info(`=== ${engine} ===`);
      for (const dataset of datasets) {
        const outcome = await this.runPair(engine, dataset, options);
        outcomes.push(outcome);
        if (outcome.status === 'import-failed') {
          this.logger.error(`stopping ${engine}: check the container logs and SQL compatibility`);
          abortedEngines.push(engine);
          break;
        }
      }
    }

    const imported = outcomes.filter((outcome) => outcome.status === 'imported').length;
    this.logger.info(`done: ${imported}/${outcomes.length} pairs imported`);
    this.logger.info(`questions are staged under ${this.layout.stagedQuestions} when a bundle provides them`);

    return { outcomes, abortedEngines, ok: abortedEngines.length === 0 };
  }

  private async runPair(engine: EngineId, dataset: string, options: BootstrapOptions): Promise<PairOutcome> {
    const creds = options.credentials[engine];
    const outcome: PairOutcome = { engine, dataset, status: 'no-source', snapshot: 'skipped' };
    this.logger.info(`--- ${dataset} ---`);

    let sqlFile: string | null;
    try {
      sqlFile = await this.resolver.resolve(dataset, options.forceDownload);
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      this.logger.error(`could not resolve '${dataset}': ${describeError(error)}`);
      return { ...outcome, status: 'resolve-failed', error: describeError(error) };
    }
    if (!sqlFile) {
      return outcome;
    }
    outcome.sqlFile = sqlFile;

    try {
      await this.orchestrator.ensureDatabase(engine, creds, dataset, options.reset);
    } catch (error) {
      this.logger.error(describeError(error));
      return { ...outcome, status: 'db-failed', error: describeError(error) };
    }

    try {
      await this.orchestrator.importSqlFile(engine, creds, dataset, sqlFile);
    } catch (error) {
      const message = error instanceof ImportFailed ? error.message : `import failed: ${describeError(error)}`;
      this.logger.error(message);
      return { ...outcome, status: 'import-failed', error: message };
    }
    outcome.status = 'imported';

    if (options.skipSchemaDump) {
      return outcome;
    }

    let snapshotFile: string;
    try {
      snapshotFile = await this.orchestrator.dumpSchemaSnapshot(engine, creds, dataset);
    } catch (error) {
      if (isFatal(error)) {
        throw error;
      }
      this.logger.warn(`schema snapshot failed: ${describeError(error)}`);
      return { ...outcome, snapshot: 'failed' };
    }

    try {
      const missingObjects = await this.verifySnapshot(sqlFile, snapshotFile);
      return { ...outcome, snapshot: 'written', snapshotFile, missingObjects };
    } catch (error) {
      this.logger.warn(`could not compare snapshot with ${sqlFile}: ${describeError(error)}`);
      return { ...outcome, snapshot: 'written', snapshotFile };
    }
  }

  private async verifySnapshot(sqlFile: string, snapshotFile: string): Promise<SchemaObject[]> {
    const [source, snapshot] = await Promise.all([
      fsp.readFile(sqlFile, 'utf8'),
      fsp.readFile(snapshotFile, 'utf8'),
    ]);
    const { missing } = compareSchemaObjects(listSchemaObjects(source), listSchemaObjects(snapshot));
    if (missing.length > 0) {
      const names = missing.map((object) => `${object.kind} ${object.name}`).join(', ');
      this.logger.warn(`snapshot is missing ${missing.length} object(s) declared by the import: ${names}`);
    }
    return missing;
  }
}
