/**
 * Actor registration and API-key authentication.
 */

import { createHash, randomBytes } from 'node:crypto';
import type { IActorRepository } from '../repositories/IActorRepository.js';
import type { Actor, ActorRole } from '../types/models.js';
import { NotFoundError, UnauthorizedError, ValidationError } from '../errors.js';
import { rowToActor } from './entities.js';

const API_KEY_PREFIX = 'fc_key_';
const MAX_DISPLAY_NAME_LENGTH = 100;

export interface RegisteredActor {
  id: string;
  displayName: string;
  role: ActorRole;
  /** Shown once; only its hash is stored. */
  apiKey: string;
}

export class ActorService {
  constructor(private readonly actorRepo: IActorRepository) {}

  async register(displayName: string, role: ActorRole): Promise<RegisteredActor> {
    const name = displayName.trim();
    if (name.length === 0) {
      throw new ValidationError('displayName is required');
    }
    if (name.length > MAX_DISPLAY_NAME_LENGTH) {
      throw new ValidationError(
        `displayName must be ${MAX_DISPLAY_NAME_LENGTH} characters or less`
      );
    }

    const apiKey = `${API_KEY_PREFIX}${randomBytes(32).toString('base64url')}`;
    const row = await this.actorRepo.insert({
      id: `${slugify(name)}-${randomBytes(4).toString('hex')}`,
      api_key_hash: hashApiKey(apiKey),
      display_name: name,
      role,
    });

    return { id: row.id, displayName: row.display_name, role, apiKey };
  }

  async authenticate(apiKey: string): Promise<Actor> {
    if (!apiKey) {
      throw new UnauthorizedError();
    }

    const row = await this.actorRepo.findByApiKeyHash(hashApiKey(apiKey));
    if (!row) {
      throw new UnauthorizedError();
    }

    return rowToActor(row);
  }

  async getById(id: string): Promise<Actor> {
    const row = await this.actorRepo.findById(id);
    if (!row) {
      throw new NotFoundError(`Actor "${id}" not found`);
    }
    return rowToActor(row);
  }
}

/** SHA-256 keeps lookup-by-hash possible; keys are random, not passwords. */
export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex');
}

function slugify(displayName: string): string {
  const slug = displayName
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-|-$/g, '');
  return slug || 'actor';
}
