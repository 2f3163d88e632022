import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ValidationError } from '../error/validationError.js';
import { decodeBody, readResponseBody, releaseResponseBody } from './readResponse.js';

describe('readResponseBody', () => {
  it('reads the whole body as text', async () => {
    const [err, text] = await readResponseBody(new Response('{"ok":true}', { status: 200 }));

    expect(err).toBeNull();
    expect(text).toBe('{"ok":true}');
  });

  it('reads a missing body as empty text', async () => {
    const [, text] = await readResponseBody(new Response(null, { status: 204 }));

    expect(text).toBe('');
  });

  it('fails on a body that was already consumed', async () => {
    const response = new Response('once');
    await response.text();

    const [err] = await readResponseBody(response);

    expect(err?.message).toBe('error reading response body');
  });
});

describe('releaseResponseBody', () => {
  it('cancels an unread body', async () => {
    const [err] = await releaseResponseBody(new Response('server busy', { status: 503 }));

    expect(err).toBeNull();
  });

  it('is a no-op without a body', async () => {
    const [err] = await releaseResponseBody(new Response(null, { status: 503 }));

    expect(err).toBeNull();
  });
});

describe('decodeBody', () => {
  const schema = z.object({ ObjectID: z.number() });

  it('parses and validates json', async () => {
    const [err, data] = await decodeBody('{"ObjectID":5,"Name":"x"}', schema);

    expect(err).toBeNull();
    expect(data).toEqual({ ObjectID: 5 });
  });

  it('decodes an empty body as null', async () => {
    const [err, data] = await decodeBody('', z.null());

    expect(err).toBeNull();
    expect(data).toBeNull();
  });

  it('holds an empty body to the schema', async () => {
    const [err] = await decodeBody('  ', schema);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error validating data; issues: Expected object, received null');
  });

  it('fails with a ValidationError on invalid json', async () => {
    const [err] = await decodeBody('<html>', schema);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err?.message).toBe('error parsing json response body');
    expect(err?.cause).toBeInstanceOf(SyntaxError);
  });
});
