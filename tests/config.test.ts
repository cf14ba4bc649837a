import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, parseBoolean } from '../src/config.js';

describe('loadConfig', () => {
  it('returns defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads every variable', () => {
    const config = loadConfig({
      CLONE_DEFAULT_OVERWRITE: 'true',
      CLONE_CREATE_BACKUP: '0',
      CLONE_COPY_REFERENCES: 'no',
      CLONE_VALIDATE_DATA: 'off',
      CLONE_ENABLED_SCHEMAS: ' post, product ,,',
      CLONE_MAX_SOURCE_CANDIDATES: '10',
      BACKUP_RETENTION_DAYS: '0',
      BACKUP_MAX_COUNT: '5',
      BACKUP_FAILURE_POLICY: 'proceed',
      LOG_LEVEL: 'DEBUG',
    });

    expect(config).toEqual({
      cloneDefaults: {
        overwriteExisting: true,
        createBackup: false,
        copyReferences: false,
        validateData: false,
      },
      enabledSchemas: ['post', 'product'],
      maxSourceCandidates: 10,
      backup: { retentionDays: 0, maxCount: 5, failurePolicy: 'proceed' },
      logLevel: 'debug',
    });
  });

  it('throws on malformed values', () => {
    expect(() => loadConfig({ CLONE_CREATE_BACKUP: 'maybe' })).toThrow(
      'CLONE_CREATE_BACKUP must be a boolean, got "maybe"'
    );
    expect(() => loadConfig({ BACKUP_MAX_COUNT: '-1' })).toThrow(
      'BACKUP_MAX_COUNT must be a non-negative integer, got "-1"'
    );
    expect(() => loadConfig({ BACKUP_RETENTION_DAYS: '1.5' })).toThrow(/BACKUP_RETENTION_DAYS/);
    expect(() => loadConfig({ BACKUP_FAILURE_POLICY: 'ignore' })).toThrow(/BACKUP_FAILURE_POLICY/);
    expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});

describe('parseBoolean', () => {
  it('maps the accepted spellings', () => {
    expect(['true', '1', 'YES', ' on '].map(parseBoolean)).toEqual([true, true, true, true]);
    expect(['false', '0', 'no', 'off', ''].map(parseBoolean)).toEqual([false, false, false, false, false]);
    expect(parseBoolean('2')).toBeNull();
  });
});
