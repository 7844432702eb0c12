/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Error taxonomy.
 */

import type { ConnectionResponse } from './adapters/base';

export class RestmapError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

// ---------------------------------------------------------------------------
// Local failures (raised before or without a response)
// ---------------------------------------------------------------------------

export class ResourceConfigurationError extends RestmapError {}

/** The adapter could not complete the exchange. */
export class TransportError extends RestmapError {
  readonly url?: string;

  constructor(message: string, options?: { url?: string; cause?: unknown }) {
    super(message);
    this.url = options?.url;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class DecodeError extends RestmapError {
  /** Raw text that failed to decode, when there was one. */
  readonly body?: string;

  constructor(message: string, body?: string) {
    super(message);
    this.body = body;
  }
}

export class MissingPrefixParamError extends RestmapError {
  constructor(readonly param: string, readonly template: string) {
    super(`Missing prefix parameter "${param}" for "${template}"`);
  }
}

/** An operation was attempted on a resource that has been deleted. */
export class ResourceGoneError extends RestmapError {}

// ---------------------------------------------------------------------------
// Response failures
// ---------------------------------------------------------------------------

export class ConnectionError extends RestmapError {
  readonly status: number;
  readonly url: string;
  readonly response: ConnectionResponse;

  constructor(response: ConnectionResponse, url: string, message?: string) {
    super(message ?? `Failed with ${response.statusCode}: ${url}`);
    this.status = response.statusCode;
    this.url = url;
    this.response = response;
  }
}

/** A success status arrived without the data that must accompany it. */
export class ProtocolError extends ConnectionError {}

export class Redirection extends ConnectionError {
  get location(): string | undefined {
    return this.response.headers['location'];
  }
}

export class ClientError extends ConnectionError {}
export class BadRequest extends ClientError {}
export class UnauthorizedAccess extends ClientError {}
export class ForbiddenAccess extends ClientError {}
export class ResourceNotFound extends ClientError {
  constructor(response: ConnectionResponse, url: string) {
    super(response, url, `Resource not found: ${url}`);
  }
}
export class MethodNotAllowed extends ClientError {}
export class ResourceConflict extends ClientError {}
export class ResourceGone extends ClientError {}
export class ResourceInvalid extends ClientError {}

export class ServerError extends ConnectionError {}

const CLIENT_ERRORS: Record<number, typeof ClientError> = {
  400: BadRequest,
  401: UnauthorizedAccess,
  403: ForbiddenAccess,
  404: ResourceNotFound,
  405: MethodNotAllowed,
  409: ResourceConflict,
  410: ResourceGone,
  422: ResourceInvalid,
};

const REDIRECT_CODES = new Set([301, 302, 303, 307, 308]);

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

/** Map a non-2xx response to its taxonomy error; `undefined` for 2xx. */
export function errorForResponse(response: ConnectionResponse, url: string): ConnectionError | undefined {
  const status = response.statusCode;
  if (isSuccess(status)) return undefined;
  if (REDIRECT_CODES.has(status)) return new Redirection(response, url);

  const specific = CLIENT_ERRORS[status];
  if (specific) return new specific(response, url);
  if (status >= 400 && status < 500) return new ClientError(response, url);
  if (status >= 500 && status < 600) return new ServerError(response, url);
  return new ConnectionError(response, url);
}
