/**
 * Runtime configuration.
 * Values come from environment variables; anything unset falls back to DEFAULT_CONFIG.
 */

import type { CloneOptions } from './types/models.js';
import type { LogLevel } from './providers/ILogProvider.js';

/** What to do when the pre-clone snapshot cannot be persisted. */
export type BackupFailurePolicy = 'abort' | 'proceed';

export interface BackupConfig {
  /** Delete backups older than this many days. 0 disables the age rule. */
  retentionDays: number;
  /** Keep at most this many backups overall. 0 disables the count rule. */
  maxCount: number;
  failurePolicy: BackupFailurePolicy;
}

export interface AppConfig {
  cloneDefaults: CloneOptions;
  /** Schema ids cloning is enabled for. */
  enabledSchemas: string[];
  maxSourceCandidates: number;
  backup: BackupConfig;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG: AppConfig = {
  cloneDefaults: {
    overwriteExisting: false,
    createBackup: true,
    copyReferences: true,
    validateData: true,
  },
  enabledSchemas: ['post', 'page'],
  maxSourceCandidates: 50,
  backup: {
    retentionDays: 30,
    maxCount: 100,
    failurePolicy: 'abort',
  },
  logLevel: 'info',
};

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  return {
    cloneDefaults: {
      overwriteExisting: readBoolean(env, 'CLONE_DEFAULT_OVERWRITE', DEFAULT_CONFIG.cloneDefaults.overwriteExisting),
      createBackup: readBoolean(env, 'CLONE_CREATE_BACKUP', DEFAULT_CONFIG.cloneDefaults.createBackup),
      copyReferences: readBoolean(env, 'CLONE_COPY_REFERENCES', DEFAULT_CONFIG.cloneDefaults.copyReferences),
      validateData: readBoolean(env, 'CLONE_VALIDATE_DATA', DEFAULT_CONFIG.cloneDefaults.validateData),
    },
    enabledSchemas: readList(env, 'CLONE_ENABLED_SCHEMAS', DEFAULT_CONFIG.enabledSchemas),
    maxSourceCandidates: readInteger(env, 'CLONE_MAX_SOURCE_CANDIDATES', DEFAULT_CONFIG.maxSourceCandidates),
    backup: {
      retentionDays: readInteger(env, 'BACKUP_RETENTION_DAYS', DEFAULT_CONFIG.backup.retentionDays),
      maxCount: readInteger(env, 'BACKUP_MAX_COUNT', DEFAULT_CONFIG.backup.maxCount),
      failurePolicy: readFailurePolicy(env),
    },
    logLevel: readLogLevel(env),
  };
}

/** Accepts true/false/1/0/yes/no/on/off, case-insensitive. */
export function parseBoolean(raw: string): boolean | null {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
    case '':
      return false;
    default:
      return null;
  }
}

// ── Private ──

function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined) return fallback;
  const parsed = parseBoolean(raw);
  if (parsed === null) {
    throw new Error(`${name} must be a boolean, got "${raw}"`);
  }
  return parsed;
}

function readInteger(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return parsed;
}

function readList(env: Env, name: string, fallback: string[]): string[] {
  const raw = env[name];
  if (raw === undefined) return fallback;
  return raw
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

function readFailurePolicy(env: Env): BackupFailurePolicy {
  const raw = env.BACKUP_FAILURE_POLICY;
  if (raw === undefined) return DEFAULT_CONFIG.backup.failurePolicy;
  if (raw === 'abort' || raw === 'proceed') return raw;
  throw new Error(`BACKUP_FAILURE_POLICY must be "abort" or "proceed", got "${raw}"`);
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL;
  if (raw === undefined) return DEFAULT_CONFIG.logLevel;
  const level = LOG_LEVELS.find((l) => l === raw.toLowerCase());
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`);
  }
  return level;
}
