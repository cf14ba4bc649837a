/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic; works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { createCloneHandlers } from './clone.js';
import { createBackupHandlers } from './backups.js';
import { createActorHandlers } from './actors.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const clone = createCloneHandlers(container);
  const backups = createBackupHandlers(container);
  const actors = createActorHandlers(container);

  const routes: Route[] = [
    // Clone
    { method: 'GET', pattern: /^\/api\/v1\/candidates\/?$/, handler: clone.candidates },
    { method: 'GET', pattern: /^\/api\/v1\/preview\/?$/, handler: clone.preview },
    { method: 'POST', pattern: /^\/api\/v1\/clone\/?$/, handler: clone.execute },
    { method: 'POST', pattern: /^\/api\/v1\/clone\/validate\/?$/, handler: clone.validate },

    // Entities
    { method: 'GET', pattern: /^\/api\/v1\/entities\/[^/]+\/backups\/?$/, handler: backups.list },
    { method: 'GET', pattern: /^\/api\/v1\/entities\/[^/]+\/activity\/?$/, handler: backups.activity },

    // Backups
    { method: 'POST', pattern: /^\/api\/v1\/backups\/sweep\/?$/, handler: backups.sweep },
    { method: 'POST', pattern: /^\/api\/v1\/backups\/[^/]+\/restore\/?$/, handler: backups.restore },
    { method: 'DELETE', pattern: /^\/api\/v1\/backups\/[^/]+\/?$/, handler: backups.delete },

    // Actors
    { method: 'POST', pattern: /^\/api\/v1\/actors\/?$/, handler: actors.register },
    { method: 'GET', pattern: /^\/api\/v1\/me\/?$/, handler: actors.me },
  ];

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_REQUEST',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return new Response(
      JSON.stringify({
        error: {
          code: 'NOT_FOUND',
          message: `No route matches ${method} ${url.pathname}`,
        },
      }),
      {
        status: 404,
        headers: { 'Content-Type': 'application/json', ...corsHeaders() },
      }
    );
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
    'Access-Control-Allow-Headers': 'Authorization, Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
