import path from 'node:path';
import { CacheDirectoryError, MemberNotFound, UnknownBundle, UnsupportedBundleKind, describeError } from '../errors.js';
import type {
  BundleDescriptor,
  BundleMemberSource,
  CacheLayout,
  DirectSqlSource,
  SourceDescriptor,
  SourceRegistry,
  ZipMemberSource,
} from '../types/sources.js';
import { atomicCopy, ensureDir, pathExists } from '../utils/fs.js';
import type { Logger } from '../utils/logger.js';
import type { ArchiveStager } from './archive-stager.js';
import type { Downloader } from './transfer.js';

export type AssetResolverOptions = {
  layout: CacheLayout;
  registry: Pick<SourceRegistry, 'bundles' | 'datasets'>;
  downloader: Downloader;
  stager: ArchiveStager;
  logger: Logger;
};

/** Maps a dataset name to its staged SQL file, downloading and extracting as needed. */
export class AssetResolver {
  private readonly layout: CacheLayout;
  private readonly registry: Pick<SourceRegistry, 'bundles' | 'datasets'>;
  private readonly downloader: Downloader;
  private readonly stager: ArchiveStager;
  private readonly logger: Logger;

  constructor({ layout, registry, downloader, stager, logger }: AssetResolverOptions) {
    this.layout = layout;
    this.registry = registry;
    this.downloader = downloader;
    this.stager = stager;
    this.logger = logger;
  }

  stagedSqlPath(stagedName: string): string {
    return path.join(this.layout.stagedSql, stagedName);
  }

  stagedQuestionsPath(dataset: string): string {
    return path.join(this.layout.stagedQuestions, `${dataset}.questions.txt`);
  }

  async resolve(dataset: string, force: boolean): Promise<string | null> {
    const source: SourceDescriptor | undefined = this.registry.datasets[dataset];
    if (!source) {
      this.logger.warn(`no SQL source configured for dataset '${dataset}', skipping`);
      return null;
    }

    switch (source.kind) {
      case 'direct-sql':
        return this.resolveDirect(source, force);
      case 'zip-member':
        return this.resolveZipMember(dataset, source, force);
      case 'bundle-member':
        return this.resolveBundleMember(dataset, source, force);
      default: {
        const unreachable: never = source;
        return unreachable;
      }
    }
  }

  private resolveDirect(source: DirectSqlSource, force: boolean): Promise<string> {
    return this.downloader.fetch(source.url, this.stagedSqlPath(source.stagedName), force);
  }

  private async resolveZipMember(dataset: string, source: ZipMemberSource, force: boolean): Promise<string> {
    const zipPath = await this.downloader.fetch(
      source.url,
      path.join(this.layout.archives, source.archiveName),
      force
    );

    const staged = this.stagedSqlPath(source.stagedName);
    if (!force && (await pathExists(staged))) {
      this.logger.info(`using cached staged SQL ${staged}`);
      return staged;
    }

    await this.stager.stageZipMember(zipPath, source.memberPath, staged);
    this.logger.info(`staged ${dataset} SQL -> ${staged}`);
    return staged;
  }

  private async resolveBundleMember(dataset: string, source: BundleMemberSource, force: boolean): Promise<string> {
    const bundle = this.lookupBundle(source.bundleId);
    const archivePath = await this.downloader.fetch(
      bundle.url,
      path.join(this.layout.archives, bundle.archiveName),
      force
    );
    const root = await this.stager.extract(archivePath, path.join(this.layout.extracted, bundle.extractDir), force);

    const memberName: string | undefined = bundle.sqlMembers[source.key];
    if (!memberName) {
      throw new MemberNotFound(source.key, `the SQL members of bundle '${source.bundleId}'`);
    }
    const memberPath = await this.stager.locateMember(root, memberName);
    const staged = this.stagedSqlPath(source.stagedName);
    await this.stageCopy(memberPath, staged, force, 'SQL');

    await this.stageQuestions(dataset, bundle, source.key, root, force);
    return staged;
  }

  private lookupBundle(bundleId: string): BundleDescriptor {
    const bundle: BundleDescriptor | undefined = this.registry.bundles[bundleId];
    if (!bundle) {
      throw new UnknownBundle(bundleId, Object.keys(this.registry.bundles));
    }
    if (bundle.kind !== 'tar-gzip') {
      throw new UnsupportedBundleKind(bundleId, bundle.kind);
    }
    return bundle;
  }

  // best-effort: a missing or unreadable questions file never fails SQL resolution
  private async stageQuestions(
    dataset: string,
    bundle: BundleDescriptor,
    key: string,
    root: string,
    force: boolean
  ): Promise<void> {
    const member: string | undefined = bundle.questionsMembers[key];
    if (!member) {
      return;
    }
    try {
      const memberPath = await this.stager.locateMember(root, member);
      await this.stageCopy(memberPath, this.stagedQuestionsPath(dataset), force, 'questions');
    } catch (error) {
      if (error instanceof CacheDirectoryError) {
        throw error;
      }
      this.logger.warn(`could not stage questions for '${dataset}': ${describeError(error)}`);
    }
  }

  private async stageCopy(source: string, destination: string, force: boolean, label: string): Promise<void> {
    await ensureDir(path.dirname(destination));
    if (!force && (await pathExists(destination))) {
      this.logger.info(`using cached ${label} ${destination}`);
      return;
    }
    this.logger.info(`staging ${label}: ${path.basename(source)} -> ${destination}`);
    await atomicCopy(source, destination);
  }
}
