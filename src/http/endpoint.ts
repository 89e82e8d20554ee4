import { z } from 'zod';
import { DEFAULT_API_VERSION, DEFAULT_TIMEOUT_MS } from '../config.js';
import { EndpointError, InvalidArgumentError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { QueryPayload } from '../query/types.js';
import { rawRecordSchema } from '../records/record-mapper.js';
import type { CollectionRef, Endpoint, PropertyBag, QueryResult, RawRecord } from '../types.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export interface HttpEndpointConfig {
  baseUrl: string;
  token: string;
  /** Value of the API version header. */
  apiVersion?: string;
  timeoutMs?: number;
  headers?: Record<string, string>;
  /** Defaults to the global fetch. */
  fetch?: FetchFn;
  logger?: Logger;
}

export const VERSION_HEADER = 'DocDb-Version';

const queryResponseSchema = z
  .object({
    results: z.array(rawRecordSchema),
    has_more: z.boolean(),
    next_cursor: z.string().nullable(),
  })
  .passthrough();

const errorBodySchema = z
  .object({
    code: z.string(),
    message: z.string(),
  })
  .passthrough();

type Method = 'GET' | 'POST' | 'PATCH';

interface ApiResponse {
  status: number;
  body: unknown;
}

/** Endpoint over the remote REST API. Failures surface as EndpointError. */
export class HttpEndpoint implements Endpoint {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(config: HttpEndpointConfig) {
    if (config.token.length === 0) {
      throw new InvalidArgumentError('An API token is required');
    }
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.headers = {
      ...config.headers,
      'Content-Type': 'application/json',
      Authorization: `Bearer ${config.token}`,
      [VERSION_HEADER]: config.apiVersion ?? DEFAULT_API_VERSION,
    };
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.logger = config.logger ?? silentLogger;
  }

  async query(collection: CollectionRef, payload: QueryPayload): Promise<QueryResult> {
    const response = await this.request('POST', `/databases/${encodeURIComponent(collection)}/query`, payload);
    const parsed = parseBody(queryResponseSchema, response, 'query response');
    return { records: parsed.results, hasMore: parsed.has_more, nextCursor: parsed.next_cursor };
  }

  async create(collection: CollectionRef, properties: PropertyBag): Promise<RawRecord> {
    const response = await this.request('POST', '/pages', { parent: { database_id: collection }, properties });
    return parseBody(rawRecordSchema, response, 'created record');
  }

  async update(recordId: string, properties: PropertyBag): Promise<RawRecord> {
    const response = await this.request('PATCH', `/pages/${encodeURIComponent(recordId)}`, { properties });
    return parseBody(rawRecordSchema, response, 'updated record');
  }

  async retrieve(recordId: string): Promise<RawRecord> {
    const response = await this.request('GET', `/pages/${encodeURIComponent(recordId)}`);
    return parseBody(rawRecordSchema, response, 'record');
  }

  async setArchived(recordId: string, archived: boolean): Promise<RawRecord> {
    const response = await this.request('PATCH', `/pages/${encodeURIComponent(recordId)}`, { archived });
    return parseBody(rawRecordSchema, response, archived ? 'archived record' : 'restored record');
  }

  private async request(method: Method, path: string, body?: unknown): Promise<ApiResponse> {
    const url = `${this.baseUrl}${path}`;
    const init: RequestInit = {
      method,
      headers: this.headers,
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (body !== undefined) {
      init.body = JSON.stringify(body);
    }

    this.logger.debug({ method, url }, 'api request');

    let response: Response;
    try {
      response = await this.fetchFn(url, init);
    } catch (err) {
      if (err instanceof Error && err.name === 'TimeoutError') {
        throw new EndpointError(0, 'timeout', `${method} ${path} timed out after ${this.timeoutMs}ms`, { cause: err });
      }
      throw new EndpointError(0, 'network_error', `${method} ${path} failed: ${describe(err)}`, { cause: err });
    }

    const text = await response.text();
    let json: unknown = null;
    try {
      json = text.length === 0 ? null : JSON.parse(text);
    } catch (err) {
      if (response.ok) {
        throw new EndpointError(response.status, 'invalid_json', `${method} ${path} returned a body that is not JSON`, {
          cause: err,
        });
      }
      this.logger.debug({ method, url, status: response.status }, 'error response body is not JSON');
    }

    if (!response.ok) {
      const error = errorBodySchema.safeParse(json);
      const code = error.success ? error.data.code : 'http_error';
      const message = error.success ? error.data.message : `${response.status} ${response.statusText}`;
      this.logger.warn({ method, url, status: response.status, code }, 'api request failed');
      throw new EndpointError(response.status, code, message);
    }
    return { status: response.status, body: json };
  }
}

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, response: ApiResponse, what: string): T {
  const parsed = schema.safeParse(response.body);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new EndpointError(response.status, 'invalid_response', `Malformed ${what}: ${details}`, { cause: parsed.error });
  }
  return parsed.data;
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
