/**
 * Small request/response helpers shared by the endpoint modules.
 */

import { ValidationError } from '../errors.js';
import type { CloneOptions } from '../types/models.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}

/**
 * Path segment counted back from the end: 0 is the last segment.
 * `/api/v1/backups/abc/restore` with offset 1 gives "abc".
 */
export function pathParam(req: Request, offsetFromEnd: number): string {
  const parts = new URL(req.url).pathname.split('/').filter((p) => p.length > 0);
  const value = parts[parts.length - 1 - offsetFromEnd];
  if (!value) {
    throw new ValidationError('Missing path parameter');
  }
  return decodeURIComponent(value);
}

export function requireQuery(req: Request, name: string): string {
  const value = new URL(req.url).searchParams.get(name)?.trim();
  if (!value) {
    throw new ValidationError(`${name} query parameter is required`);
  }
  return value;
}

export function optionalQuery(req: Request, name: string): string | undefined {
  const value = new URL(req.url).searchParams.get(name)?.trim();
  return value ? value : undefined;
}

export function readString(body: Record<string, unknown>, name: string): string {
  const value = body[name];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${name} must be a non-empty string`);
  }
  return value.trim();
}

export function readStringArray(body: Record<string, unknown>, name: string): string[] {
  const value = body[name];
  if (!Array.isArray(value)) {
    throw new ValidationError(`${name} must be an array`);
  }
  return value.filter((v): v is string => typeof v === 'string');
}

/** Accepts a boolean or one of "true", "false", "1", "0". */
export function readFlag(raw: unknown, name: string): boolean | undefined {
  if (raw === undefined || raw === null) return undefined;
  if (typeof raw === 'boolean') return raw;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new ValidationError(`${name} must be a boolean`);
}

export function readCloneOptions(raw: unknown): Partial<CloneOptions> {
  if (raw === undefined || raw === null) return {};
  if (typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ValidationError('options must be an object');
  }

  const options = new Map(Object.entries(raw));
  const out: Partial<CloneOptions> = {};

  const overwriteExisting = readFlag(options.get('overwriteExisting'), 'options.overwriteExisting');
  const createBackup = readFlag(options.get('createBackup'), 'options.createBackup');
  const copyReferences = readFlag(options.get('copyReferences'), 'options.copyReferences');
  const validateData = readFlag(options.get('validateData'), 'options.validateData');

  if (overwriteExisting !== undefined) out.overwriteExisting = overwriteExisting;
  if (createBackup !== undefined) out.createBackup = createBackup;
  if (copyReferences !== undefined) out.copyReferences = copyReferences;
  if (validateData !== undefined) out.validateData = validateData;

  return out;
}
