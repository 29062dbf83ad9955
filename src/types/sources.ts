export type EngineId = 'mysql' | 'mariadb';

export const ENGINE_IDS: readonly EngineId[] = ['mysql', 'mariadb'];

export type DirectSqlSource = {
  kind: 'direct-sql';
  url: string;
  stagedName: string;
};

export type ZipMemberSource = {
  kind: 'zip-member';
  url: string;
  archiveName: string;
  memberPath: string;
  stagedName: string;
};

export type BundleMemberSource = {
  kind: 'bundle-member';
  bundleId: string;
  key: string;
  stagedName: string;
};

export type SourceDescriptor = DirectSqlSource | ZipMemberSource | BundleMemberSource;

export type BundleDescriptor = {
  // only 'tar-gzip' is supported; other values are rejected when the bundle is resolved
  kind: string;
  url: string;
  archiveName: string;
  extractDir: string;
  sqlMembers: Record<string, string>;
  questionsMembers: Record<string, string>;
};

export type EngineDescriptor = {
  container: string;
  client: string;
  dump: string;
};

export type SourceRegistry = {
  engines: Record<EngineId, EngineDescriptor>;
  bundles: Record<string, BundleDescriptor>;
  datasets: Record<string, SourceDescriptor>;
  defaultDatasets: string[];
};

export type CacheLayout = {
  root: string;
  archives: string;
  extracted: string;
  stagedSql: string;
  stagedQuestions: string;
  schemas: string;
};

export type Credentials = {
  rootPassword: string;
};
