import { describe, expect, it } from 'vitest';
import { ConfigError, describeError, ImportFailed, isBootstrapError } from '../errors.js';

describe('isBootstrapError', () => {
  it('recognizes every error of the pipeline by its code', () => {
    const error: unknown = new ImportFailed('mysql', 'imdb', 1);

    expect(isBootstrapError(error)).toBe(true);
    expect(isBootstrapError(error) && error.code).toBe('import_failed');
    expect(isBootstrapError(new ConfigError('invalid source registry'))).toBe(true);
  });

  it('rejects foreign errors and plain values', () => {
    expect(isBootstrapError(new Error('EACCES'))).toBe(false);
    expect(isBootstrapError('import_failed')).toBe(false);
  });
});

describe('describeError', () => {
  it('uses the message of errors and stringifies anything else', () => {
    expect(describeError(new ImportFailed('mariadb', 'yelp', 2))).toBe('import into mariadb:yelp exited with code 2');
    expect(describeError(42)).toBe('42');
  });
});
