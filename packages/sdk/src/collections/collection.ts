import { z } from 'zod';
import type { ApiEnvelope, QueryParams } from '@helio/models';
import type { ApiClient } from '../client/api-client.js';
import { envelopeOf, type ResponseSchema } from '../schemas.js';

/**
 * @public
 */
export interface CallOptions {
  signal?: AbortSignal;
}

const AnyBody = z.unknown();

/**
 * CRUD access to one platform resource path.
 *
 * Bodies are sent as given; responses are checked against the resource
 * schema and returned in their `{ data, paging? }` envelope.
 * @public
 */
export class Collection<T, TCreate = Partial<T>> {
  private readonly itemSchema: ResponseSchema<ApiEnvelope<T>>;
  private readonly listSchema: ResponseSchema<ApiEnvelope<T[]>>;

  public constructor(
    protected readonly client: ApiClient,
    public readonly path: string,
    schema: ResponseSchema<T>,
  ) {
    this.itemSchema = envelopeOf(schema);
    this.listSchema = envelopeOf(z.array(schema));
  }

  public async list(
    query?: QueryParams,
    options: CallOptions = {},
  ): Promise<ApiEnvelope<T[]>> {
    return this.client.request('GET', this.path, this.listSchema, {
      query,
      signal: options.signal,
    });
  }

  public async get(
    id: string,
    options: CallOptions = {},
  ): Promise<ApiEnvelope<T>> {
    return this.client.request('GET', this.itemPath(id), this.itemSchema, {
      signal: options.signal,
    });
  }

  public async create(
    body: TCreate,
    options: CallOptions = {},
  ): Promise<ApiEnvelope<T>> {
    return this.client.request('POST', this.path, this.itemSchema, {
      body,
      signal: options.signal,
    });
  }

  public async update(
    id: string,
    body: Partial<TCreate>,
    options: CallOptions = {},
  ): Promise<ApiEnvelope<T>> {
    return this.client.request('PUT', this.itemPath(id), this.itemSchema, {
      body,
      signal: options.signal,
    });
  }

  /**
   * Deletes a record. The response body, if any, is returned unchecked.
   */
  public async delete(
    id: string,
    query?: QueryParams,
    options: CallOptions = {},
  ): Promise<unknown> {
    return this.client.request('DELETE', this.itemPath(id), AnyBody, {
      query,
      signal: options.signal,
    });
  }

  protected itemPath(id: string, ...rest: string[]): string {
    if (!id) {
      throw new TypeError(`${this.path}: id is required`);
    }
    return [this.path, encodeURIComponent(id), ...rest].join('/');
  }
}
