/**
 * Actor endpoints.
 * POST /api/v1/actors   Register an actor and issue its API key (administrators)
 * GET  /api/v1/me       The authenticated actor
 */

import { pipeline, errorHandler, requireActor } from '../middleware/index.js';
import { validateBody, readJsonObject } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import { ForbiddenError, ValidationError } from '../errors.js';
import { canAdminister } from '../services/capabilities.js';
import { isRole } from '../services/entities.js';
import { json, readString } from './http.js';

const registerSchema: BodySchema = {
  displayName: { type: 'string', required: true, maxLength: 100 },
  role: {
    type: 'string',
    required: true,
    enum: ['administrator', 'editor', 'author', 'contributor'],
  },
};

export function createActorHandlers(container: Container) {
  const register: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(registerSchema)
  )(async (req, ctx) => {
    if (!canAdminister(requireActor(ctx))) {
      throw new ForbiddenError('Only administrators can register actors');
    }

    const body = await readJsonObject(req);
    const role = readString(body, 'role');
    if (!isRole(role)) {
      throw new ValidationError(`Unknown role "${role}"`);
    }

    const result = await container.actorService.register(readString(body, 'displayName'), role);
    return json(result, 201);
  });

  const me: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate
  )(async (_req, ctx) => {
    const actor = requireActor(ctx);
    return json({
      id: actor.id,
      displayName: actor.displayName,
      role: actor.role,
      createdAt: actor.createdAt.toISOString(),
    });
  });

  return { register, me };
}
