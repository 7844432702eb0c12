/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Mock transport adapter for testing.
 */

import { TransportError } from '../errors';
import { BaseAdapter, ConnectionRequest, ConnectionResponse, HttpMethod } from './base';

export interface MockResponse {
  statusCode: number;
  headers?: Record<string, string>;
  body?: string;
}

type MockEntry = { response: ConnectionResponse } | { failure: TransportError };

export class MockAdapter extends BaseAdapter {
  private readonly entries = new Map<string, MockEntry>();
  private readonly sent: ConnectionRequest[] = [];

  /** Add a mocked response keyed by `METHOD /path?query`. */
  mock(method: HttpMethod, path: string, response: MockResponse): this {
    const headers: Record<string, string> = {};
    for (const [name, value] of Object.entries(response.headers ?? {})) {
      headers[name.toLowerCase()] = value;
    }
    this.entries.set(`${method} ${path}`, {
      response: { statusCode: response.statusCode, headers, body: response.body ?? '', elapsedMs: 0 },
    });
    return this;
  }

  /** Make the exchange for `METHOD /path` fail as if the network were down. */
  fail(method: HttpMethod, path: string, message = 'connection refused'): this {
    this.entries.set(`${method} ${path}`, { failure: new TransportError(message, { url: path }) });
    return this;
  }

  async send(request: ConnectionRequest): Promise<ConnectionResponse> {
    this.sent.push(request);
    const match = this.entries.get(`${request.method} ${request.path}`);
    if (!match) {
      return { statusCode: 404, headers: {}, body: '', elapsedMs: 0 };
    }
    if ('failure' in match) throw match.failure;
    return match.response;
  }

  close(): void {
    this.entries.clear();
    this.sent.length = 0;
  }

  get isConnected(): boolean {
    return true;
  }

  /** All requests that have been sent through this adapter. */
  get sentRequests(): ConnectionRequest[] {
    return [...this.sent];
  }

  get lastRequest(): ConnectionRequest | undefined {
    return this.sent[this.sent.length - 1];
  }
}
