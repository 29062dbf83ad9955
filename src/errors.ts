export type BootstrapErrorCode =
  | 'transfer_failed'
  | 'identifier_missing'
  | 'confirmation_token_missing'
  | 'permission_denied'
  | 'archive_corrupt'
  | 'member_not_found'
  | 'unknown_bundle'
  | 'unsupported_bundle_kind'
  | 'db_admin_failed'
  | 'import_failed'
  | 'snapshot_failed'
  | 'cache_directory_failed'
  | 'config_invalid';

export class BootstrapError extends Error {
  readonly code: BootstrapErrorCode;
  readonly details?: unknown;

  constructor(code: BootstrapErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class TransferError extends BootstrapError {
  readonly status: number;

  constructor(url: string, status: number) {
    super('transfer_failed', `GET ${url} failed with HTTP ${status}`, { url });
    this.status = status;
  }
}

export class IdentifierError extends BootstrapError {
  constructor(url: string) {
    super('identifier_missing', `could not extract a file id from ${url}`, { url });
  }
}

export class ConfirmationTokenMissing extends BootstrapError {
  constructor(fileId: string) {
    super(
      'confirmation_token_missing',
      `confirmation token not found for file ${fileId}; the resource might not be shared publicly (share it as "anyone with the link")`,
      { fileId }
    );
  }
}

export class PermissionDenied extends BootstrapError {
  constructor(fileId: string) {
    super(
      'permission_denied',
      `host returned a confirmation page again for file ${fileId}; the resource requires sign-in or is not public`,
      { fileId }
    );
  }
}

export class ArchiveCorrupt extends BootstrapError {
  constructor(archivePath: string, cause: unknown) {
    super('archive_corrupt', `archive ${archivePath} could not be extracted: ${describeError(cause)}`, {
      archivePath,
    });
  }
}

export class MemberNotFound extends BootstrapError {
  constructor(member: string, location: string, available?: string[]) {
    const preview = available ? ` (available: ${available.join(', ')})` : '';
    super('member_not_found', `member '${member}' not found in ${location}${preview}`, available);
  }
}

export class UnknownBundle extends BootstrapError {
  constructor(bundleId: string, known: string[]) {
    super('unknown_bundle', `bundle '${bundleId}' is not configured (known: ${known.join(', ') || 'none'})`, {
      bundleId,
    });
  }
}

export class UnsupportedBundleKind extends BootstrapError {
  constructor(bundleId: string, kind: string) {
    super('unsupported_bundle_kind', `bundle '${bundleId}' has unsupported kind '${kind}'`, { bundleId, kind });
  }
}

export class DbAdminError extends BootstrapError {
  constructor(engine: string, database: string, exitCode: number) {
    super('db_admin_failed', `admin command for ${engine}:${database} exited with code ${exitCode}`, {
      engine,
      database,
      exitCode,
    });
  }
}

export class ImportFailed extends BootstrapError {
  constructor(engine: string, database: string, exitCode: number) {
    super('import_failed', `import into ${engine}:${database} exited with code ${exitCode}`, {
      engine,
      database,
      exitCode,
    });
  }
}

export class SnapshotError extends BootstrapError {
  constructor(engine: string, database: string, exitCode: number) {
    super('snapshot_failed', `schema dump of ${engine}:${database} exited with code ${exitCode}`, {
      engine,
      database,
      exitCode,
    });
  }
}

export class CacheDirectoryError extends BootstrapError {
  constructor(dir: string, cause: unknown) {
    super('cache_directory_failed', `cannot create cache directory ${dir}: ${describeError(cause)}`, { dir });
  }
}

export class ConfigError extends BootstrapError {
  constructor(message: string, details?: unknown) {
    super('config_invalid', message, details);
  }
}

export function isBootstrapError(value: unknown): value is BootstrapError {
  return value instanceof BootstrapError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
