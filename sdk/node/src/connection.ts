/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Single-exchange request execution for a resource type.
 */

import { ConnectionRequest, ConnectionResponse, HttpMethod } from './adapters/base';
import type { ResourceConfig } from './config';
import { Document } from './document';
import { DecodeError, ResourceConfigurationError, errorForResponse } from './errors';
import { createLogger } from './logger';

const log = createLogger('connection');

export class Connection {
  constructor(
    private readonly typeName: string,
    private readonly config: ResourceConfig,
  ) {}

  private buildReq(method: HttpMethod, path: string, body?: string): ConnectionRequest {
    const headers: Record<string, string> = { Accept: this.config.format.mimeType, ...this.config.headers };
    if (body !== undefined) headers['Content-Type'] = this.config.format.mimeType;
    return { method, path, headers, body };
  }

  /**
   * Send one request and interpret its status.
   * Non-2xx responses reject with the matching taxonomy error.
   */
  async exec(method: HttpMethod, path: string, body?: string): Promise<ConnectionResponse> {
    const adapter = this.config.adapter;
    if (!adapter) {
      throw new ResourceConfigurationError(`${this.typeName} has no site or adapter configured`);
    }

    const hooks = this.config.hooks;
    const scope = { resource: this.typeName, url: path };
    const req = await hooks.fireBeforeRequest(this.buildReq(method, path, body), scope);

    log.info({ resource: this.typeName }, `${req.method} ${req.path}`);
    if (req.body !== undefined) log.debug({ body: req.body }, 'request body');

    let res: ConnectionResponse;
    try {
      res = await adapter.send(req);
    } catch (e) {
      const err = e instanceof Error ? e : new Error(String(e));
      log.warn({ err }, `${req.method} ${req.path} failed`);
      hooks.fireError(err);
      throw e;
    }

    hooks.fireAfterResponse(res, scope);
    log.info({ elapsedMs: res.elapsedMs }, `--> ${res.statusCode} ${Buffer.byteLength(res.body)}b`);
    if (res.body) log.debug({ body: res.body }, 'response body');

    const failure = errorForResponse(res, req.path);
    if (failure) {
      hooks.fireError(failure);
      throw failure;
    }
    return res;
  }

  /** Decode a body that must be present. */
  decode(response: ConnectionResponse, path: string): Document {
    if (!response.body.trim()) {
      throw new DecodeError(`Empty response body from ${path}`);
    }
    return this.config.format.decode(response.body);
  }

  /** Decode a body that may be empty, as after a 204. */
  decodeOptional(response: ConnectionResponse): Document | undefined {
    if (!response.body.trim()) return undefined;
    return this.config.format.decode(response.body);
  }

  async get(path: string): Promise<Document> {
    return this.decode(await this.exec('GET', path), path);
  }

  async head(path: string): Promise<ConnectionResponse> {
    return this.exec('HEAD', path);
  }

  async post(path: string, body?: string): Promise<ConnectionResponse> {
    return this.exec('POST', path, body);
  }

  async put(path: string, body?: string): Promise<ConnectionResponse> {
    return this.exec('PUT', path, body);
  }

  async delete(path: string): Promise<ConnectionResponse> {
    return this.exec('DELETE', path);
  }
}
