/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Connection adapter contract.
 */

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD';

/** Outbound request, path relative to the adapter's site. */
export interface ConnectionRequest {
  method: HttpMethod;
  path: string;
  headers: Record<string, string>;
  body?: string;
}

/** Inbound response. Header names are lowercase. */
export interface ConnectionResponse {
  statusCode: number;
  headers: Record<string, string>;
  body: string;
  elapsedMs: number;
}

/**
 * Abstract base for all transport adapters.
 *
 * `send` performs exactly one exchange and rejects with `TransportError`
 * when no response could be obtained. Non-2xx statuses resolve normally.
 */
export abstract class BaseAdapter {
  abstract send(request: ConnectionRequest): Promise<ConnectionResponse>;
  abstract close(): void;
  abstract get isConnected(): boolean;
}
