/**
 * Authentication middleware.
 * Extracts Bearer token from Authorization header, validates via ActorService,
 * and attaches the authenticated actor to context.
 */

import type { ActorService } from '../services/ActorService.js';
import type { Handler, Middleware } from './pipeline.js';
import { UnauthorizedError } from '../errors.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

export function createAuthMiddleware(actorService: ActorService): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const authHeader = req.headers.get('Authorization');

      if (!authHeader || !authHeader.startsWith('Bearer ')) {
        return unauthorized('Missing or invalid Authorization header. Use: Bearer <api_key>');
      }

      const apiKey = authHeader.slice(7).trim();

      if (!apiKey) {
        return unauthorized('API key is empty');
      }

      try {
        ctx.actor = await actorService.authenticate(apiKey);
      } catch (err) {
        if (err instanceof UnauthorizedError) {
          return unauthorized('Invalid API key');
        }
        throw err;
      }

      return next(req, ctx);
    };
  };
}

function unauthorized(message: string): Response {
  return new Response(
    JSON.stringify({ error: { code: 'UNAUTHORIZED', message } }),
    { status: 401, headers: JSON_HEADERS }
  );
}
