/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * HTTP/REST transport adapter (default).
 */

import { TransportError } from '../errors';
import { BaseAdapter, ConnectionRequest, ConnectionResponse } from './base';

export interface HttpAdapterOptions {
  /** Site URL. Only its origin is used here; the path belongs to the request path. */
  site: string;
  user?: string;
  password?: string;
  timeout?: number;
}

export class HttpAdapter extends BaseAdapter {
  private readonly origin: string;
  private readonly authorization?: string;
  private readonly timeout: number;
  private connected = false;

  constructor(options: HttpAdapterOptions) {
    super();
    const site = new URL(options.site);
    this.origin = site.origin;

    const user = options.user ?? decodeURIComponent(site.username);
    const password = options.password ?? decodeURIComponent(site.password);
    if (user || password) {
      this.authorization = `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
    }

    this.timeout = options.timeout ?? 30_000;
    this.connected = true;
  }

  async send(request: ConnectionRequest): Promise<ConnectionResponse> {
    const url = new URL(request.path, this.origin).toString();
    if (!this.connected) {
      throw new TransportError(`${request.method} ${url} failed: adapter is closed`, { url });
    }

    const headers: Record<string, string> = { ...request.headers };
    if (this.authorization) {
      headers['Authorization'] = this.authorization;
    }

    const start = performance.now();

    let resp: Response;
    try {
      resp = await fetch(url, {
        method: request.method,
        headers,
        body: request.body,
        signal: AbortSignal.timeout(this.timeout),
      });
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new TransportError(`${request.method} ${url} failed: ${reason}`, { url, cause: e });
    }

    let body: string;
    try {
      body = await resp.text();
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new TransportError(`Reading response of ${request.method} ${url} failed: ${reason}`, { url, cause: e });
    }

    const elapsed = performance.now() - start;

    return {
      statusCode: resp.status,
      headers: Object.fromEntries(resp.headers.entries()),
      body,
      elapsedMs: Math.round(elapsed * 100) / 100,
    };
  }

  close(): void {
    this.connected = false;
  }

  get isConnected(): boolean {
    return this.connected;
  }
}
