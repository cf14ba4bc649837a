/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { createProductionContainer } from '../../src/container.production.js';

export default async (req: Request, _context: Context) => {
  // Services are built per request; repositories and the log provider are shared.
  const container = createProductionContainer();
  const router = createRouter(container);

  try {
    return await router.handle(req, { actor: null });
  } finally {
    await container.logProvider.flush();
  }
};

export const config = {
  path: '/api/v1/*',
};
