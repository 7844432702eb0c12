/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Lifecycle Hook Registry.
 */

import type { ConnectionRequest, ConnectionResponse } from './adapters/base';
import { createLogger } from './logger';

const log = createLogger('hooks');

// ---------------------------------------------------------------------------
// Data structures
// ---------------------------------------------------------------------------

export type ResourceState = 'new' | 'persisted' | 'deleted';

/** Identifies the resource type an exchange is made for. */
export interface RequestScope {
  resource: string;
  url: string;
}

/** Minimal view of a resource handed to state-change callbacks. */
export interface StateSubject {
  readonly typeName: string;
  readonly id: unknown;
}

// ---------------------------------------------------------------------------
// Callback types
// ---------------------------------------------------------------------------

export type BeforeRequestCallback = (
  req: ConnectionRequest,
  scope: RequestScope,
) => ConnectionRequest | Promise<ConnectionRequest>;
export type AfterResponseCallback = (res: ConnectionResponse, scope: RequestScope) => void;
export type StateChangeCallback = (subject: StateSubject, from: ResourceState, to: ResourceState) => void;
export type ErrorCallback = (err: Error) => void;

function asError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// ---------------------------------------------------------------------------
// HookRegistry
// ---------------------------------------------------------------------------

export class HookRegistry {
  private beforeRequestCallbacks: BeforeRequestCallback[] = [];
  private afterResponseCallbacks: AfterResponseCallback[] = [];
  private stateChangeCallbacks: StateChangeCallback[] = [];
  private errorCallbacks: ErrorCallback[] = [];

  // -- Registration --------------------------------------------------------

  onBeforeRequest(cb: BeforeRequestCallback): this {
    this.beforeRequestCallbacks.push(cb);
    return this;
  }

  onAfterResponse(cb: AfterResponseCallback): this {
    this.afterResponseCallbacks.push(cb);
    return this;
  }

  onStateChange(cb: StateChangeCallback): this {
    this.stateChangeCallbacks.push(cb);
    return this;
  }

  onError(cb: ErrorCallback): this {
    this.errorCallbacks.push(cb);
    return this;
  }

  // -- Firing --------------------------------------------------------------

  async fireBeforeRequest(request: ConnectionRequest, scope: RequestScope): Promise<ConnectionRequest> {
    let current = request;
    for (const cb of this.beforeRequestCallbacks) {
      try { current = await cb(current, scope); } catch (e) { this.report(e); }
    }
    return current;
  }

  fireAfterResponse(response: ConnectionResponse, scope: RequestScope): void {
    for (const cb of this.afterResponseCallbacks) {
      try { cb(response, scope); } catch (e) { this.report(e); }
    }
  }

  fireStateChange(subject: StateSubject, from: ResourceState, to: ResourceState): void {
    for (const cb of this.stateChangeCallbacks) {
      try { cb(subject, from, to); } catch (e) { this.report(e); }
    }
  }

  private report(e: unknown): void {
    const err = asError(e);
    log.warn({ err }, 'hook failed');
    this.fireError(err);
  }

  fireError(error: Error): void {
    for (const cb of this.errorCallbacks) {
      try {
        cb(error);
      } catch (e) {
        // logged only
        log.warn({ err: asError(e) }, 'error hook failed');
      }
    }
  }
}
