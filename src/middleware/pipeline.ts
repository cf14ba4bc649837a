/**
 * Composable middleware pipeline for serverless function handlers.
 * Middleware wraps handlers in order (left to right), forming an onion model.
 */

import type { Actor } from '../types/models.js';
import { UnauthorizedError } from '../errors.js';

export interface HandlerContext {
  actor: Actor | null;
}

export type Handler = (req: Request, ctx: HandlerContext) => Promise<Response>;
export type Middleware = (next: Handler) => Handler;

/**
 * Compose middleware into a function that wraps a handler.
 * Middleware is applied left-to-right:
 *   pipeline(logging, errorHandler, authenticate)(handler)
 *   → logging wraps (errorHandler wraps (authenticate wraps handler))
 */
export function pipeline(...middlewares: Middleware[]) {
  return (handler: Handler): Handler => {
    return middlewares.reduceRight<Handler>(
      (next, mw) => mw(next),
      handler
    );
  };
}

/** The authenticated actor; handlers behind the auth middleware always have one. */
export function requireActor(ctx: HandlerContext): Actor {
  if (!ctx.actor) {
    throw new UnauthorizedError();
  }
  return ctx.actor;
}
