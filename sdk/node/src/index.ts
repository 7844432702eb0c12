/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Public API surface.
 */

export const VERSION = '0.1.0';

// Resources
export { Resource, GenericResource, elementNameOf, collectionNameOf, prefixParametersOf } from './resource';
export type { ResourceClass, FindOptions, CustomRequestOptions } from './resource';
export { Collection } from './collection';
export { ValidationErrors } from './validation-errors';

// Configuration
export { defineResource } from './config';
export type { ResourceConfig, ResourceOptions } from './config';

// Mapping
export { decodeResource, decodeAttributes, encodeResource } from './mapper';
export type { AttributeValue, Attributes, AttributeInput, InputValue } from './mapper';
export { JsonFormat, isMapping, isScalar, isSequence, parseDocument } from './document';
export type { Document, DocumentMapping, Format, Scalar } from './document';
export { buildPath, idFromLocation, prefixParameters, splitOptions, toQueryString } from './path';
export type { PathOptions, PrefixOptions, QueryParams, QueryValue, ResourceId } from './path';

// Infrastructure
export { HookRegistry } from './hooks';
export type { RequestScope, ResourceState, StateSubject } from './hooks';
export { Connection } from './connection';
export { createLogger } from './logger';

// Errors
export {
  RestmapError,
  ResourceConfigurationError,
  TransportError,
  DecodeError,
  MissingPrefixParamError,
  ResourceGoneError,
  ConnectionError,
  ProtocolError,
  Redirection,
  ClientError,
  BadRequest,
  UnauthorizedAccess,
  ForbiddenAccess,
  ResourceNotFound,
  MethodNotAllowed,
  ResourceConflict,
  ResourceGone,
  ResourceInvalid,
  ServerError,
  errorForResponse,
} from './errors';

// Adapters
export { BaseAdapter, HttpAdapter, MockAdapter } from './adapters';
export type { ConnectionRequest, ConnectionResponse, HttpAdapterOptions, HttpMethod, MockResponse } from './adapters';
