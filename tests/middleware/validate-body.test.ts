import { describe, it, expect } from 'vitest';
import { readJsonObject, validateBody } from '../../src/middleware/validate-body.js';
import { ValidationError } from '../../src/errors.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';
import type { BodySchema } from '../../src/types/common.js';

describe('validateBody', () => {
  const ctx: HandlerContext = { actor: null };

  const echoHandler: Handler = async (req) => new Response(await req.text(), { status: 200 });

  function makeReq(body: unknown): Request {
    return new Request('http://test', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  const schema: BodySchema = {
    sourceId: { type: 'string', required: true, maxLength: 20 },
    limit: { type: 'number', required: false, min: 0, max: 150 },
    overwriteExisting: { type: 'boolean', required: false },
    fieldKeys: { type: 'array', required: false, minItems: 1, maxItems: 3, items: 'string' },
    role: { type: 'string', required: false, enum: ['editor', 'author'] },
  };

  it('should pass a valid body through to the handler', async () => {
    const body = { sourceId: '10', limit: 25, overwriteExisting: true, fieldKeys: ['price'] };
    const res = await validateBody(schema)(echoHandler)(makeReq(body), ctx);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(body);
  });

  it('should reject a missing required field', async () => {
    const res = await validateBody(schema)(echoHandler)(makeReq({ limit: 25 }), ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'sourceId is required',
        details: { fields: ['sourceId is required'] },
      },
    });
  });

  it('should join several errors', async () => {
    const res = await validateBody(schema)(echoHandler)(
      makeReq({ sourceId: 12, limit: 200, role: 'owner' }),
      ctx
    );

    expect(await res.json()).toMatchObject({
      error: {
        message: 'sourceId must be a string; limit must be at most 150; role must be one of: editor, author',
      },
    });
  });

  it('should check string length and number bounds', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    expect((await wrapped(makeReq({ sourceId: 'a'.repeat(21) }), ctx)).status).toBe(400);
    expect((await wrapped(makeReq({ sourceId: '1', limit: -1 }), ctx)).status).toBe(400);
  });

  it('should check array length and element types', async () => {
    const wrapped = validateBody(schema)(echoHandler);

    expect(await (await wrapped(makeReq({ sourceId: '1', fieldKeys: [] }), ctx)).json()).toMatchObject({
      error: { message: 'fieldKeys must have at least 1 item(s)' },
    });
    expect(
      await (await wrapped(makeReq({ sourceId: '1', fieldKeys: ['a', 'b', 'c', 'd'] }), ctx)).json()
    ).toMatchObject({
      error: { message: 'fieldKeys must have at most 3 item(s)' },
    });
    expect(await (await wrapped(makeReq({ sourceId: '1', fieldKeys: ['a', 2] }), ctx)).json()).toMatchObject({
      error: { message: 'fieldKeys must contain only string values' },
    });
  });

  it('should reject a non-JSON body', async () => {
    const req = new Request('http://test', { method: 'POST', body: 'not json' });
    const res = await validateBody(schema)(echoHandler)(req, ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'Request body must be a JSON object' },
    });
  });
});

describe('readJsonObject', () => {
  it('should treat an empty body as an empty object', async () => {
    expect(await readJsonObject(new Request('http://test', { method: 'POST', body: '  ' }))).toEqual({});
  });

  it('should reject arrays', async () => {
    const req = new Request('http://test', { method: 'POST', body: '[1]' });

    await expect(readJsonObject(req)).rejects.toThrow(ValidationError);
  });
});
