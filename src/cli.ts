#!/usr/bin/env node
import 'dotenv/config';
import { Command, Option } from 'commander';
import { createCacheLayout, DEFAULT_REGISTRY_PATH, loadEnvConfig, loadRegistry } from './config.js';
import { describeError, isBootstrapError } from './errors.js';
import { ArchiveStager } from './services/archive-stager.js';
import { AssetResolver } from './services/asset-resolver.js';
import { BootstrapDriver } from './services/bootstrap-driver.js';
import { DbOrchestrator } from './services/db-orchestrator.js';
import { createDownloader, InteractiveHostDownloader } from './services/interactive-download.js';
import { Transfer } from './services/transfer.js';
import { ENGINE_IDS, type EngineId } from './types/sources.js';
import { spawnCommandRunner } from './utils/command-runner.js';
import { createConsoleLogger } from './utils/logger.js';

type CliOptions = {
  datasets?: string[];
  only?: EngineId;
  resetDb: boolean;
  forceDownload: boolean;
  schemaDump: boolean;
  registry: string;
};

const EXIT_CODES = {
  SUCCESS: 0,
  IMPORT_FAILED: 1,
  FATAL: 2,
} as const;

function buildProgram(): Command {
  return new Command()
    .name('sql-bootstrap')
    .description('Download SQL dumps, import them into MySQL/MariaDB containers and write schema snapshots')
    .option('--datasets <names...>', 'datasets to import (default: registry defaults)')
    .addOption(new Option('--only <engine>', 'only run for one engine').choices([...ENGINE_IDS]))
    .option('--reset-db', 'drop dataset databases before importing', false)
    .option('--force-download', 'download and extract assets again even if cached', false)
    .option('--no-schema-dump', 'skip schema snapshot extraction')
    .option('--registry <file>', 'source registry JSON file', DEFAULT_REGISTRY_PATH);
}

async function main(argv: string[] = process.argv): Promise<number> {
  const program = buildProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();
  const logger = createConsoleLogger('bootstrap');

  try {
    const env = loadEnvConfig();
    const registry = loadRegistry(options.registry);
    const layout = createCacheLayout(env.dataDir);

    const transfer = new Transfer({ logger, timeoutMs: env.httpTimeoutMs });
    const interactive = new InteractiveHostDownloader({ transfer, logger });
    const resolver = new AssetResolver({
      layout,
      registry,
      downloader: createDownloader(transfer, interactive),
      stager: new ArchiveStager(logger),
      logger,
    });
    const orchestrator = new DbOrchestrator({ engines: registry.engines, layout, runner: spawnCommandRunner, logger });
    const driver = new BootstrapDriver({ resolver, orchestrator, layout, logger });

    const report = await driver.run({
      engines: options.only ? [options.only] : [...ENGINE_IDS],
      datasets: options.datasets ?? registry.defaultDatasets,
      reset: options.resetDb,
      forceDownload: options.forceDownload,
      skipSchemaDump: !options.schemaDump,
      credentials: env.credentials,
    });
    return report.ok ? EXIT_CODES.SUCCESS : EXIT_CODES.IMPORT_FAILED;
  } catch (error) {
    const code = isBootstrapError(error) ? ` [${error.code}]` : '';
    logger.error(`fatal${code}: ${describeError(error)}`);
    return EXIT_CODES.FATAL;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = EXIT_CODES.FATAL;
  }
);
