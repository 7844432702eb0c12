import { describe, expect, it } from 'vitest';
import type { ConnectionResponse } from './adapters/base';
import {
  ClientError,
  ConnectionError,
  ForbiddenAccess,
  Redirection,
  ResourceInvalid,
  ResourceNotFound,
  ServerError,
  errorForResponse,
} from './errors';

const response = (statusCode: number, headers: Record<string, string> = {}): ConnectionResponse => ({
  statusCode,
  headers,
  body: '',
  elapsedMs: 0,
});

describe('errorForResponse', () => {
  it('returns nothing for 2xx', () => {
    expect(errorForResponse(response(200), '/people.json')).toBeUndefined();
    expect(errorForResponse(response(204), '/people/1.json')).toBeUndefined();
  });

  it('maps known client codes to their classes', () => {
    const notFound = errorForResponse(response(404), '/people/9.json');
    expect(notFound).toBeInstanceOf(ResourceNotFound);
    expect(notFound).toBeInstanceOf(ClientError);
    expect(notFound?.status).toBe(404);
    expect(notFound?.url).toBe('/people/9.json');
    expect(notFound?.name).toBe('ResourceNotFound');
    expect(notFound?.message).toBe('Resource not found: /people/9.json');

    expect(errorForResponse(response(403), '/x')).toBeInstanceOf(ForbiddenAccess);
    expect(errorForResponse(response(422), '/x')).toBeInstanceOf(ResourceInvalid);
  });

  it('falls back to ClientError for other 4xx', () => {
    const err = errorForResponse(response(418), '/x');
    expect(err?.constructor).toBe(ClientError);
  });

  it('maps 5xx to ServerError', () => {
    const err = errorForResponse(response(503), '/x');
    expect(err).toBeInstanceOf(ServerError);
    expect(err?.message).toBe('Failed with 503: /x');
  });

  it('maps redirects and keeps the location', () => {
    const err = errorForResponse(response(302, { location: 'http://elsewhere/people/1' }), '/people/1.json');
    expect(err).toBeInstanceOf(Redirection);
    expect(err instanceof Redirection && err.location).toBe('http://elsewhere/people/1');
  });

  it('uses ConnectionError for unexpected codes', () => {
    const err = errorForResponse(response(100), '/x');
    expect(err?.constructor).toBe(ConnectionError);
  });
});
