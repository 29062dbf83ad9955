import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type {
  BundleDescriptor,
  CacheLayout,
  Credentials,
  EngineId,
  SourceDescriptor,
  SourceRegistry,
} from './types/sources.js';

const currentDir = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_REGISTRY_PATH = path.resolve(currentDir, '../config/bootstrap.json');

const envSchema = z.object({
  BOOTSTRAP_DATA_DIR: z.string().min(1).default('data'),
  MYSQL_ROOT_PASSWORD: z.string().min(1).default('root123'),
  MARIADB_ROOT_PASSWORD: z.string().min(1).default('root123'),
  BOOTSTRAP_HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
});

export type EnvConfig = {
  dataDir: string;
  httpTimeoutMs: number;
  credentials: Record<EngineId, Credentials>;
};

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError('invalid environment', parsed.error.issues);
  }
  const values = parsed.data;
  return {
    dataDir: path.resolve(values.BOOTSTRAP_DATA_DIR),
    httpTimeoutMs: values.BOOTSTRAP_HTTP_TIMEOUT_MS,
    credentials: {
      mysql: { rootPassword: values.MYSQL_ROOT_PASSWORD },
      mariadb: { rootPassword: values.MARIADB_ROOT_PASSWORD },
    },
  };
}

export function createCacheLayout(root: string): CacheLayout {
  return {
    root,
    archives: path.join(root, 'archives'),
    extracted: path.join(root, 'extracted'),
    stagedSql: path.join(root, 'staged-sql'),
    stagedQuestions: path.join(root, 'staged-questions'),
    schemas: path.join(root, 'schemas'),
  };
}

const engineSchema = z.object({
  container: z.string().min(1),
  client: z.string().min(1),
  dump: z.string().min(1),
});

const bundleSchema = z.object({
  kind: z.string().min(1),
  url: z.string().url(),
  archiveName: z.string().min(1).optional(),
  extractDir: z.string().min(1).optional(),
  sqlMembers: z.record(z.string().min(1)),
  questionsMembers: z.record(z.string().min(1)).default({}),
});

const datasetSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('direct-sql'),
    url: z.string().url(),
    stagedName: z.string().min(1).optional(),
  }),
  z.object({
    kind: z.literal('zip-member'),
    url: z.string().url(),
    archiveName: z.string().min(1).optional(),
    memberPath: z.string().min(1),
    stagedName: z.string().min(1).optional(),
  }),
  z.object({
    kind: z.literal('bundle-member'),
    bundleId: z.string().min(1),
    key: z.string().min(1).optional(),
    stagedName: z.string().min(1).optional(),
  }),
]);

const registrySchema = z.object({
  engines: z.object({
    mysql: engineSchema,
    mariadb: engineSchema,
  }),
  bundles: z.record(bundleSchema).default({}),
  datasets: z.record(datasetSchema),
  defaultDatasets: z.array(z.string().min(1)).default([]),
});

type RawDataset = z.infer<typeof datasetSchema>;

function toSourceDescriptor(dataset: string, raw: RawDataset): SourceDescriptor {
  const stagedName = raw.stagedName ?? `${dataset}.sql`;
  switch (raw.kind) {
    case 'direct-sql':
      return { kind: 'direct-sql', url: raw.url, stagedName };
    case 'zip-member':
      return {
        kind: 'zip-member',
        url: raw.url,
        archiveName: raw.archiveName ?? `${dataset}.zip`,
        memberPath: raw.memberPath,
        stagedName,
      };
    case 'bundle-member':
      return { kind: 'bundle-member', bundleId: raw.bundleId, key: raw.key ?? dataset, stagedName };
  }
}

/** One archive name per source URL, one extraction directory per bundle. */
function checkCacheOwnership(
  bundles: Record<string, BundleDescriptor>,
  datasets: Record<string, SourceDescriptor>
): void {
  const archiveOwners = new Map<string, { owner: string; url: string }>();
  const claimArchive = (archiveName: string, owner: string, url: string) => {
    const existing = archiveOwners.get(archiveName);
    if (existing && existing.url !== url) {
      throw new ConfigError(`archive '${archiveName}' is claimed by both ${existing.owner} and ${owner}`);
    }
    archiveOwners.set(archiveName, existing ?? { owner, url });
  };

  const extractOwners = new Map<string, string>();
  for (const [id, bundle] of Object.entries(bundles)) {
    claimArchive(bundle.archiveName, `bundle '${id}'`, bundle.url);
    const existing = extractOwners.get(bundle.extractDir);
    if (existing) {
      throw new ConfigError(
        `extract directory '${bundle.extractDir}' is claimed by both bundle '${existing}' and bundle '${id}'`
      );
    }
    extractOwners.set(bundle.extractDir, id);
  }
  for (const [name, dataset] of Object.entries(datasets)) {
    if (dataset.kind === 'zip-member') {
      claimArchive(dataset.archiveName, `dataset '${name}'`, dataset.url);
    }
  }
}

export function parseRegistry(input: unknown): SourceRegistry {
  const parsed = registrySchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError('invalid source registry', parsed.error.issues);
  }
  const raw = parsed.data;

  const bundles: Record<string, BundleDescriptor> = {};
  for (const [id, bundle] of Object.entries(raw.bundles)) {
    bundles[id] = {
      kind: bundle.kind,
      url: bundle.url,
      archiveName: bundle.archiveName ?? `${id}.tgz`,
      extractDir: bundle.extractDir ?? id,
      sqlMembers: bundle.sqlMembers,
      questionsMembers: bundle.questionsMembers,
    };
  }

  const datasets: Record<string, SourceDescriptor> = {};
  for (const [name, dataset] of Object.entries(raw.datasets)) {
    const descriptor = toSourceDescriptor(name, dataset);
    if (descriptor.kind === 'bundle-member') {
      const bundle = bundles[descriptor.bundleId];
      // unknown bundle ids surface as UnknownBundle when resolved
      if (bundle && !(descriptor.key in bundle.sqlMembers)) {
        throw new ConfigError(
          `dataset '${name}' uses key '${descriptor.key}' which bundle '${descriptor.bundleId}' does not map`
        );
      }
    }
    datasets[name] = descriptor;
  }

  checkCacheOwnership(bundles, datasets);

  return {
    engines: raw.engines,
    bundles,
    datasets,
    defaultDatasets: raw.defaultDatasets,
  };
}

export function loadRegistry(file: string = DEFAULT_REGISTRY_PATH): SourceRegistry {
  let contents: unknown;
  try {
    contents = JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new ConfigError(`cannot read source registry ${file}`, error);
  }
  return parseRegistry(contents);
}
