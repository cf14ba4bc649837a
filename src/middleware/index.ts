export { pipeline, requireActor } from './pipeline.js';
export type { Handler, HandlerContext, Middleware } from './pipeline.js';
export { errorHandler } from './error-handler.js';
export { createAuthMiddleware } from './authenticate.js';
export { validateBody, readJsonObject } from './validate-body.js';
export { createLoggingMiddleware } from './logging.js';
