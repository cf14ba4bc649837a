/**
 * Clone endpoints.
 * GET  /api/v1/candidates?schemaId=&exclude=   Entities that can serve as a source
 * GET  /api/v1/preview?source=&target=         Cloneable fields of a source/target pair
 * POST /api/v1/clone                           Execute a clone
 * POST /api/v1/clone/validate                  Check a selection without writing
 */

import { pipeline, errorHandler, requireActor } from '../middleware/index.js';
import { validateBody, readJsonObject } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import {
  json,
  optionalQuery,
  readCloneOptions,
  readString,
  readStringArray,
  requireQuery,
} from './http.js';

const MAX_FIELD_KEYS = 500;

const cloneSchema: BodySchema = {
  sourceEntityId: { type: 'string', required: true, maxLength: 200 },
  targetEntityId: { type: 'string', required: true, maxLength: 200 },
  fieldKeys: { type: 'array', required: true, items: 'string', maxItems: MAX_FIELD_KEYS },
  options: { type: 'object', required: false },
};

const validateSchema: BodySchema = {
  sourceEntityId: { type: 'string', required: true, maxLength: 200 },
  targetEntityId: { type: 'string', required: true, maxLength: 200 },
  fieldKeys: { type: 'array', required: true, items: 'string', maxItems: MAX_FIELD_KEYS },
};

export function createCloneHandlers(container: Container) {
  const candidates: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const result = await container.previewService.listSourceCandidates(
      requireQuery(req, 'schemaId'),
      optionalQuery(req, 'exclude'),
      requireActor(ctx)
    );
    return json(result);
  });

  const preview: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate
  )(async (req, ctx) => {
    const result = await container.previewService.previewFields(
      requireQuery(req, 'source'),
      requireQuery(req, 'target'),
      requireActor(ctx)
    );
    return json(result);
  });

  const execute: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(cloneSchema)
  )(async (req, ctx) => {
    const body = await readJsonObject(req);

    const outcome = await container.cloneService.cloneFields(
      readString(body, 'sourceEntityId'),
      readString(body, 'targetEntityId'),
      readStringArray(body, 'fieldKeys'),
      readCloneOptions(body.options),
      requireActor(ctx)
    );
    return json(outcome);
  });

  const validate: Handler = pipeline(
    container.logging,
    errorHandler,
    container.authenticate,
    validateBody(validateSchema)
  )(async (req, ctx) => {
    const body = await readJsonObject(req);

    const result = await container.previewService.validateSelection(
      readString(body, 'sourceEntityId'),
      readString(body, 'targetEntityId'),
      readStringArray(body, 'fieldKeys'),
      requireActor(ctx)
    );
    return json(result);
  });

  return { candidates, preview, execute, validate };
}
