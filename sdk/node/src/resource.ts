/**
 * Copyright (C) 2026 Garudex Labs. All Rights Reserved.
 *
 * Resource base class and CRUD protocol.
 */

import type { ConnectionResponse, HttpMethod } from './adapters/base';
import { Collection } from './collection';
import { DATA_ONLY_CONFIG, ResourceConfig } from './config';
import { Connection } from './connection';
import { Document, DocumentMapping, isMapping, isSequence } from './document';
import {
  DecodeError,
  ProtocolError,
  ResourceGoneError,
  ResourceInvalid,
  ResourceNotFound,
  RestmapError,
} from './errors';
import type { ResourceState } from './hooks';
import { createLogger } from './logger';
import {
  AttributeInput,
  AttributeValue,
  Attributes,
  InputValue,
  NestedRegistry,
  decodeAttributes,
  decodeOne,
  encodeResource,
} from './mapper';
import { collectionNameFor, elementNameFor } from './naming';
import {
  PrefixOptions,
  QueryParams,
  ResourceId,
  buildPath,
  idFromLocation,
  prefixParameters,
  splitOptions,
  toQueryString,
} from './path';
import { ValidationErrors } from './validation-errors';

const log = createLogger('resource');

/** Constructor side of a resource type. */
export interface ResourceClass<R extends Resource = Resource> {
  new (attributes?: AttributeInput, prefixOptions?: PrefixOptions): R;
  readonly config: ResourceConfig;
  readonly name: string;
}

export type FindOptions = {
  /** Custom path to fetch the collection from; every param becomes query. */
  from?: string;
};

export interface CustomRequestOptions {
  body?: Document;
  params?: QueryParams;
}

// ---------------------------------------------------------------------------
// Naming and paths for a resource type
// ---------------------------------------------------------------------------

export function elementNameOf(type: ResourceClass): string {
  return type.config.elementName ?? elementNameFor(type.name);
}

export function collectionNameOf(type: ResourceClass): string {
  return type.config.collectionName ?? collectionNameFor(elementNameOf(type));
}

/** Last segment of the collection template, used as a response root. */
function collectionRootOf(type: ResourceClass): string {
  const segments = collectionNameOf(type).split('/');
  return segments[segments.length - 1];
}

export function prefixParametersOf(type: ResourceClass): string[] {
  return prefixParameters(`${type.config.sitePath}/${collectionNameOf(type)}`);
}

function pathFor(
  type: ResourceClass,
  options: { id?: ResourceId; prefixOptions?: PrefixOptions; query?: QueryParams; action?: string } = {},
): string {
  return buildPath({
    collection: collectionNameOf(type),
    prefix: type.config.sitePath,
    extension: type.config.extension,
    ...options,
  });
}

function connectionFor(type: ResourceClass): Connection {
  return new Connection(type.name, type.config);
}

function unwrapRoot(document: Document, root: string): Document {
  if (isMapping(document)) {
    const keys = Object.keys(document);
    if (keys.length === 1 && keys[0] === root) return document[root];
  }
  return document;
}

function asId(value: unknown): ResourceId | undefined {
  return typeof value === 'string' || typeof value === 'number' ? value : undefined;
}

function singleFrom(type: ResourceClass, document: Document, path: string): DocumentMapping {
  const unwrapped = unwrapRoot(document, elementNameOf(type));
  if (!isMapping(unwrapped)) {
    throw new DecodeError(`Expected a single ${type.name} from ${path}`);
  }
  return unwrapped;
}

// ---------------------------------------------------------------------------
// Resource
// ---------------------------------------------------------------------------

/**
 * An object mapped to a REST collection.
 *
 * ```ts
 * class Person extends Resource {
 *   static config = defineResource({ site: 'https://api.example.com' });
 * }
 *
 * const tyler = await Person.find(1);
 * tyler.set('first', 'Tyler');
 * await tyler.save();
 * ```
 *
 * Attributes live in one key-value container and are read and written
 * with `get` and `set`, so any key the server sends is available.
 */
export class Resource {
  static config: ResourceConfig = DATA_ONLY_CONFIG;

  readonly errors: ValidationErrors = new ValidationErrors(this);

  private readonly klass: ResourceClass;
  private _attributes: Attributes = {};
  private _prefixOptions: PrefixOptions;
  private _state: ResourceState = 'new';

  constructor(attributes: AttributeInput = {}, prefixOptions?: PrefixOptions) {
    this.klass = new.target;
    this.load(attributes);
    this._prefixOptions = prefixOptions ? { ...prefixOptions } : this.prefixOptionsFromAttributes();
  }

  // -- Class-level protocol ------------------------------------------------

  /** Fetch one resource by id. */
  static find<R extends Resource>(this: ResourceClass<R>, id: ResourceId, params?: QueryParams): Promise<R>;
  /** Fetch the collection, optionally filtered by query params. */
  static find<R extends Resource>(this: ResourceClass<R>, params?: QueryParams, options?: FindOptions): Promise<Collection<R>>;
  static async find<R extends Resource>(
    this: ResourceClass<R>,
    idOrParams?: ResourceId | QueryParams,
    second: QueryParams | FindOptions = {},
  ): Promise<R | Collection<R>> {
    if (typeof idOrParams === 'string' || typeof idOrParams === 'number') {
      return findSingle(this, idOrParams, second);
    }
    const from = typeof second.from === 'string' ? second.from : undefined;
    return findEvery(this, idOrParams ?? {}, from);
  }

  static async findFirst<R extends Resource>(this: ResourceClass<R>, params: QueryParams = {}, options: FindOptions = {}): Promise<R | undefined> {
    const collection = await findEvery(this, params, options.from);
    return collection.first();
  }

  /** Fetch a single resource from a one-off path. */
  static async findOne<R extends Resource>(this: ResourceClass<R>, from: string, params: QueryParams = {}): Promise<R> {
    const path = `${from}${toQueryString(params)}`;
    const document = await connectionFor(this).get(path);
    return decodeOne(singleFrom(this, document, path), this);
  }

  /** HEAD the element; `false` only when the server answers 404. */
  static async exists(this: ResourceClass, id: ResourceId, params: QueryParams = {}): Promise<boolean> {
    const { prefixOptions, query } = splitOptions(params, prefixParametersOf(this));
    try {
      await connectionFor(this).head(pathFor(this, { id, prefixOptions, query }));
      return true;
    } catch (e) {
      if (e instanceof ResourceNotFound) return false;
      throw e;
    }
  }

  static async create<R extends Resource>(this: ResourceClass<R>, attributes: AttributeInput = {}, prefixOptions?: PrefixOptions): Promise<R> {
    const resource = new this(attributes, prefixOptions);
    await resource.save();
    return resource;
  }

  static async delete(this: ResourceClass, id: ResourceId, params: QueryParams = {}): Promise<void> {
    const { prefixOptions, query } = splitOptions(params, prefixParametersOf(this));
    await connectionFor(this).delete(pathFor(this, { id, prefixOptions, query }));
  }

  /** GET `/<collection>/<action>` and return the decoded document. */
  static async customGet(this: ResourceClass, action: string, params: QueryParams = {}): Promise<Document> {
    const { prefixOptions, query } = splitOptions(params, prefixParametersOf(this));
    return connectionFor(this).get(pathFor(this, { prefixOptions, query, action }));
  }

  /** Send `method` to `/<collection>/<action>` and return the raw response. */
  static async custom(this: ResourceClass, method: HttpMethod, action: string, options: CustomRequestOptions = {}): Promise<ConnectionResponse> {
    const { prefixOptions, query } = splitOptions(options.params ?? {}, prefixParametersOf(this));
    const body = options.body === undefined ? undefined : this.config.format.encode(options.body);
    return connectionFor(this).exec(method, pathFor(this, { prefixOptions, query, action }), body);
  }

  // -- Attributes ----------------------------------------------------------

  get typeName(): string {
    return this.klass.name;
  }

  get attributes(): Readonly<Attributes> {
    return { ...this._attributes };
  }

  get prefixOptions(): Readonly<PrefixOptions> {
    return { ...this._prefixOptions };
  }

  get id(): ResourceId | undefined {
    return asId(this._attributes[this.klass.config.primaryKey]);
  }

  set id(value: ResourceId | undefined) {
    const key = this.klass.config.primaryKey;
    if (value === undefined) delete this._attributes[key];
    else this._attributes[key] = value;
  }

  get(name: string): AttributeValue | undefined {
    return this._attributes[name];
  }

  set(name: string, value: InputValue): this {
    Object.assign(this._attributes, decodeAttributes({ [name]: value }, this.nestedRegistry()));
    return this;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this._attributes, name);
  }

  unset(name: string): this {
    delete this._attributes[name];
    return this;
  }

  /** Merge attributes, converting nested mappings into resources. */
  load(attributes: AttributeInput): this {
    Object.assign(this._attributes, decodeAttributes(attributes, this.nestedRegistry()));
    return this;
  }

  protected nestedRegistry(): NestedRegistry {
    return this.klass.config.nested;
  }

  prefixParameterNames(): string[] {
    return prefixParametersOf(this.klass);
  }

  transientNames(): readonly string[] {
    return this.klass.config.transient;
  }

  private prefixOptionsFromAttributes(): PrefixOptions {
    const options: PrefixOptions = {};
    for (const name of this.prefixParameterNames()) {
      const value = asId(this._attributes[name]);
      if (value !== undefined) options[name] = value;
    }
    return options;
  }

  // -- State ---------------------------------------------------------------

  get state(): ResourceState {
    return this._state;
  }

  get persisted(): boolean {
    return this._state === 'persisted';
  }

  isNew(): boolean {
    return this._state === 'new';
  }

  isValid(): boolean {
    return this.errors.size === 0;
  }

  /** @internal Set state without notifying hooks, as when decoding. */
  _restore(state: ResourceState): void {
    this._state = state;
  }

  private transition(to: ResourceState): void {
    const from = this._state;
    this._state = to;
    if (from !== to) this.klass.config.hooks.fireStateChange(this, from, to);
  }

  private assertUsable(operation: string): void {
    if (this._state === 'deleted') {
      throw new ResourceGoneError(`Cannot ${operation} ${this.typeName}(${String(this.id)}): it has been deleted`);
    }
  }

  private requireId(operation: string): ResourceId {
    const id = this.id;
    if (id === undefined) {
      throw new RestmapError(`Cannot ${operation} ${this.typeName} without "${this.klass.config.primaryKey}"`);
    }
    return id;
  }

  // -- Serialization -------------------------------------------------------

  /** Full attribute graph as a document, id included. */
  toDocument(): DocumentMapping {
    return encodeResource(this);
  }

  toJSON(): DocumentMapping {
    return this.toDocument();
  }

  /** Request body for create and update: the primary key is left out. */
  encode(): string {
    const config = this.klass.config;
    const document = encodeResource(this, { exclude: [config.primaryKey] });
    return config.format.encode(config.includeRoot ? { [elementNameOf(this.klass)]: document } : document);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof Resource) || other.klass !== this.klass || other.typeName !== this.typeName) return false;
    if (other.id !== this.id) return false;
    const mine = Object.entries(this._prefixOptions);
    const theirs = other.prefixOptions;
    return mine.length === Object.keys(theirs).length && mine.every(([k, v]) => theirs[k] === v);
  }

  toString(): string {
    return `${this.typeName}(${String(this.id)})`;
  }

  // -- Instance protocol ---------------------------------------------------

  /**
   * Create (no id) or update (id present) on the server.
   *
   * On failure attributes and state are left as they were; a 422 fills
   * `errors` before `ResourceInvalid` is thrown.
   */
  async save(): Promise<this> {
    this.assertUsable('save');
    this.errors.clear();
    try {
      if (this.id === undefined) await this.createRemote();
      else await this.updateRemote(this.id);
    } catch (e) {
      if (e instanceof ResourceInvalid) this.errors.fromBody(e.response.body, this.klass.config.format);
      throw e;
    }
    return this;
  }

  private async createRemote(): Promise<void> {
    const type = this.klass;
    const path = pathFor(type, { prefixOptions: this._prefixOptions });
    const connection = connectionFor(type);
    const response = await connection.post(path, this.encode());

    const location = response.headers['location'];
    let id = idFromLocation(location);
    if (response.statusCode === 201 && id === undefined) {
      const reason = location ? `unparsable Location header "${location}"` : 'no Location header';
      throw new ProtocolError(response, path, `${type.name} created with ${reason}`);
    }

    const attributes = this.responseAttributes(connection, response, path);
    if (id === undefined && attributes) {
      id = asId(attributes[type.config.primaryKey]);
    }
    if (id === undefined) {
      throw new ProtocolError(response, path, `${type.name} created without an id`);
    }

    if (attributes) this.load(attributes);
    this.id = id;
    this.transition('persisted');
    log.debug({ resource: type.name, id }, 'created');
  }

  private async updateRemote(id: ResourceId): Promise<void> {
    const type = this.klass;
    const path = pathFor(type, { id, prefixOptions: this._prefixOptions });
    const connection = connectionFor(type);
    const response = await connection.put(path, this.encode());

    const attributes = this.responseAttributes(connection, response, path);
    if (attributes) this.load(attributes);
    this.transition('persisted');
    log.debug({ resource: type.name, id }, 'updated');
  }

  /**
   * Attributes echoed back by a create or update. The change has already
   * been applied, so a body that is not a resource document merges nothing.
   */
  private responseAttributes(connection: Connection, response: ConnectionResponse, path: string): DocumentMapping | undefined {
    let document: Document | undefined;
    try {
      document = connection.decodeOptional(response);
    } catch (e) {
      if (!(e instanceof DecodeError)) throw e;
      log.warn({ resource: this.typeName, err: e }, `ignoring undecodable response body from ${path}`);
      return undefined;
    }
    if (document === undefined) return undefined;
    const unwrapped = unwrapRoot(document, elementNameOf(this.klass));
    if (!isMapping(unwrapped)) {
      log.warn({ resource: this.typeName }, `ignoring non-mapping response body from ${path}`);
      return undefined;
    }
    return unwrapped;
  }

  /** DELETE the element; the instance becomes `deleted`. */
  async delete(): Promise<void> {
    this.assertUsable('delete');
    const id = this.requireId('delete');
    await connectionFor(this.klass).delete(pathFor(this.klass, { id, prefixOptions: this._prefixOptions }));
    this.transition('deleted');
  }

  /** Replace attributes with the server's current copy. */
  async reload(): Promise<this> {
    this.assertUsable('reload');
    const id = this.requireId('reload');
    const path = pathFor(this.klass, { id, prefixOptions: this._prefixOptions });
    const document = await connectionFor(this.klass).get(path);
    const attributes = singleFrom(this.klass, document, path);
    this._attributes = {};
    this.load(attributes);
    this.transition('persisted');
    return this;
  }

  private customPath(action: string, params: QueryParams): string {
    const { prefixOptions, query } = splitOptions(params, this.prefixParameterNames());
    return pathFor(this.klass, {
      id: this.id ?? 'new',
      prefixOptions: { ...this._prefixOptions, ...prefixOptions },
      query,
      action,
    });
  }

  /** GET `/<collection>/<id>/<action>` and return the decoded document. */
  async customGet(action: string, params: QueryParams = {}): Promise<Document> {
    this.assertUsable(action);
    return connectionFor(this.klass).get(this.customPath(action, params));
  }

  /**
   * Send `method` to `/<collection>/<id>/<action>`, or `/<collection>/new/<action>`
   * for an instance without id. A POST without body from such an instance
   * sends the instance itself.
   */
  async custom(method: HttpMethod, action: string, options: CustomRequestOptions = {}): Promise<ConnectionResponse> {
    this.assertUsable(action);
    const format = this.klass.config.format;
    let body = options.body === undefined ? undefined : format.encode(options.body);
    if (body === undefined && method === 'POST' && this.id === undefined) body = this.encode();
    return connectionFor(this.klass).exec(method, this.customPath(action, options.params ?? {}), body);
  }
}

// ---------------------------------------------------------------------------
// GenericResource
// ---------------------------------------------------------------------------

/**
 * Data-only resource for nested mappings with no registered class.
 * Its type name comes from the attribute key it was decoded under.
 */
export class GenericResource extends Resource {
  private readonly _typeName: string;
  private readonly registry: NestedRegistry;

  constructor(typeName: string, attributes: AttributeInput = {}, registry: NestedRegistry = {}) {
    super();
    this._typeName = typeName;
    this.registry = registry;
    this.load(attributes);
  }

  override get typeName(): string {
    return this._typeName;
  }

  protected override nestedRegistry(): NestedRegistry {
    return this.registry;
  }
}

// ---------------------------------------------------------------------------
// Finders
// ---------------------------------------------------------------------------

async function findSingle<R extends Resource>(type: ResourceClass<R>, id: ResourceId, params: QueryParams): Promise<R> {
  const { prefixOptions, query } = splitOptions(params, prefixParametersOf(type));
  const path = pathFor(type, { id, prefixOptions, query });
  const document = await connectionFor(type).get(path);
  return decodeOne(singleFrom(type, document, path), type, prefixOptions);
}

async function findEvery<R extends Resource>(type: ResourceClass<R>, params: QueryParams, from?: string): Promise<Collection<R>> {
  let path: string;
  let prefixOptions: PrefixOptions = {};
  if (from) {
    path = `${from}${toQueryString(params)}`;
  } else {
    const split = splitOptions(params, prefixParametersOf(type));
    prefixOptions = split.prefixOptions;
    path = pathFor(type, { prefixOptions, query: split.query });
  }

  const connection = connectionFor(type);
  const response = await connection.exec('GET', path);
  const document = unwrapRoot(connection.decode(response, path), collectionRootOf(type));
  if (!isSequence(document)) {
    throw new DecodeError(`Expected a collection of ${type.name} from ${path}`, response.body);
  }

  const items = document.map((element, index) => {
    if (!isMapping(element)) {
      throw new DecodeError(`Element ${index} of ${path} is not a ${type.name}`, response.body);
    }
    const resource = decodeOne(element, type, prefixOptions);
    if (resource.id === undefined) {
      throw new ProtocolError(response, path, `Element ${index} of ${path} has no "${type.config.primaryKey}"`);
    }
    return resource;
  });

  return new Collection(items, { headers: response.headers, params });
}
