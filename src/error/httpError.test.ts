import { describe, expect, it } from 'vitest';
import { getHttpError, HTTPError, isHttpError } from './httpError.js';

describe('HTTPError', () => {
  it('expect shallow to correctly return true', () => {
    const err = new HTTPError(new Response(null, { status: 400 }));

    expect(isHttpError(err)).toEqual(true);
    expect(err.message).toBe('HTTP Error: 400');
  });

  it('exposes status, response and body text', () => {
    const response = new Response(null, { status: 403 });
    const err = new HTTPError(response, 'error in POST request', { body: '{"error":"forbidden"}' });

    expect(err.status).toBe(403);
    expect(err.response).toBe(response);
    expect(err.body).toBe('{"error":"forbidden"}');
  });

  it('defaults body to empty', () => {
    expect(new HTTPError(new Response(null, { status: 500 })).body).toBe('');
  });

  it('unwraps from a wrapped cause', () => {
    const err = new HTTPError(new Response(null, { status: 502 }));
    const wrapped = new Error('error doing request', { cause: err });

    expect(getHttpError(wrapped)?.status).toBe(502);
    expect(getHttpError(new Error('plain'))).toBeNull();
  });
});
