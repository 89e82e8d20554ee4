import { z } from 'zod';
import { HttpEndpoint } from '../../src/http/endpoint.js';
import type { FetchFn } from '../../src/http/endpoint.js';
import type { PropertyBag, RawRecord, WireProperty } from '../../src/types.js';

export const BASE_URL = 'https://api.example.test/v1';
export const TOKEN = 'test-secret';

const looseRecord = z.record(z.string(), z.unknown());

const queryBody = z.object({
  filter: looseRecord.optional(),
  sorts: z
    .array(
      z.object({
        property: z.string().optional(),
        timestamp: z.enum(['created_time', 'last_edited_time']).optional(),
        direction: z.enum(['ascending', 'descending']),
      }),
    )
    .optional(),
  page_size: z.number().int().min(1).max(100).optional(),
  start_cursor: z.string().optional(),
});

const createBody = z.object({
  parent: z.object({ database_id: z.string() }),
  properties: z.record(z.string(), looseRecord),
});

const updateBody = z.object({
  properties: z.record(z.string(), looseRecord).optional(),
  archived: z.boolean().optional(),
});

const namedPayload = z.object({ name: z.string() }).passthrough();
const datedPayload = z.object({ start: z.string() }).passthrough();
const textPayload = z.array(
  z
    .object({
      plain_text: z.string().optional(),
      text: z.object({ content: z.string() }).optional(),
    })
    .passthrough(),
);

type Scalar = string | number | boolean | null;

/** Wire-shaped property values for seeding. */
export const wire = {
  title: (content: string): WireProperty => ({
    type: 'title',
    title: [{ type: 'text', plain_text: content, text: { content } }],
  }),
  select: (name: string): WireProperty => ({ type: 'select', select: { name } }),
  number: (value: number): WireProperty => ({ type: 'number', number: value }),
  date: (start: string): WireProperty => ({ type: 'date', date: { start, end: null } }),
};

export interface RecordedRequest {
  method: string;
  path: string;
  body: unknown;
}

interface StoredPage {
  id: string;
  collection: string;
  created_time: string;
  last_edited_time: string;
  archived: boolean;
  properties: PropertyBag;
}

/**
 * In-process stand-in for the remote API. Serves the routes HttpEndpoint
 * calls, keeps pages in memory and paginates query results with opaque
 * "cursor-N" offsets.
 */
export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly pages = new Map<string, StoredPage>();
  private sequence = 0;

  readonly fetch: FetchFn = async (input, init) => this.handle(input, init);

  endpoint(): HttpEndpoint {
    return new HttpEndpoint({ baseUrl: BASE_URL, token: TOKEN, fetch: this.fetch });
  }

  seed(collection: string, properties: PropertyBag): string {
    const page = this.store(collection, properties);
    return page.id;
  }

  page(id: string): StoredPage | undefined {
    return this.pages.get(id);
  }

  private store(collection: string, properties: PropertyBag): StoredPage {
    this.sequence += 1;
    const now = this.timestamp();
    const page: StoredPage = {
      id: `page-${this.sequence}`,
      collection,
      created_time: now,
      last_edited_time: now,
      archived: false,
      properties: {},
    };
    this.merge(page, properties);
    this.pages.set(page.id, page);
    return page;
  }

  private timestamp(): string {
    return new Date(Date.UTC(2024, 5, 1) + this.sequence * 60_000).toISOString();
  }

  private merge(page: StoredPage, properties: Record<string, Record<string, unknown>>): void {
    for (const [name, incoming] of Object.entries(properties)) {
      const tag = Object.keys(incoming).find((key) => key !== 'id' && key !== 'type');
      if (tag === undefined) {
        continue;
      }
      page.properties[name] = {
        id: page.properties[name]?.['id'] ?? name.toLowerCase(),
        type: tag,
        [tag]: incoming[tag],
      };
    }
  }

  private async handle(input: string, init: RequestInit): Promise<Response> {
    const method = init.method ?? 'GET';
    const path = decodeURIComponent(new URL(input).pathname.replace(/^\/v1/, ''));
    const body: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : undefined;
    this.requests.push({ method, path, body });

    const headers = new Headers(init.headers);
    if (headers.get('Authorization') !== `Bearer ${TOKEN}`) {
      return respond(401, { object: 'error', code: 'unauthorized', message: 'API token is invalid.' });
    }

    const query = /^\/databases\/([^/]+)\/query$/.exec(path);
    if (method === 'POST' && query?.[1] !== undefined) {
      return this.query(query[1], queryBody.parse(body));
    }
    if (method === 'POST' && path === '/pages') {
      const { parent, properties } = createBody.parse(body);
      return respond(200, this.toWire(this.store(parent.database_id, properties)));
    }

    const pageRoute = /^\/pages\/([^/]+)$/.exec(path);
    const page = pageRoute?.[1] !== undefined ? this.pages.get(pageRoute[1]) : undefined;
    if (pageRoute === null) {
      return respond(400, { object: 'error', code: 'invalid_request_url', message: `No route for ${path}` });
    }
    if (page === undefined) {
      return respond(404, { object: 'error', code: 'object_not_found', message: 'Could not find page.' });
    }
    if (method === 'PATCH') {
      this.sequence += 1;
      const update = updateBody.parse(body);
      this.merge(page, update.properties ?? {});
      if (update.archived !== undefined) {
        page.archived = update.archived;
      }
      page.last_edited_time = this.timestamp();
    }
    return respond(200, this.toWire(page));
  }

  private query(collection: string, request: z.infer<typeof queryBody>): Response {
    const filter = request.filter;
    const found = [...this.pages.values()].filter(
      (page) =>
        page.collection === collection && !page.archived && (filter === undefined || matches(filter, page)),
    );
    for (const sort of [...(request.sorts ?? [])].reverse()) {
      const sign = sort.direction === 'ascending' ? 1 : -1;
      found.sort((a, b) => sign * compare(sortKey(a, sort), sortKey(b, sort)));
    }

    const start = request.start_cursor === undefined ? 0 : Number(request.start_cursor.slice('cursor-'.length));
    const end = start + (request.page_size ?? 100);
    const hasMore = end < found.length;
    return respond(200, {
      object: 'list',
      results: found.slice(start, end).map((page) => this.toWire(page)),
      has_more: hasMore,
      next_cursor: hasMore ? `cursor-${end}` : null,
    });
  }

  private toWire(page: StoredPage): RawRecord {
    return {
      id: page.id,
      created_time: page.created_time,
      last_edited_time: page.last_edited_time,
      url: `https://example.test/${page.id}`,
      archived: page.archived,
      properties: structuredClone(page.properties),
    };
  }
}

function respond(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

function readValue(property: WireProperty | undefined): Scalar {
  const tag = property?.['type'];
  if (property === undefined || typeof tag !== 'string') {
    return null;
  }
  const payload = property[tag];
  if (typeof payload === 'string' || typeof payload === 'number' || typeof payload === 'boolean') {
    return payload;
  }
  const text = textPayload.safeParse(payload);
  if (text.success) {
    return text.data.map((item) => item.plain_text ?? item.text?.content ?? '').join('');
  }
  const named = namedPayload.safeParse(payload);
  if (named.success) {
    return named.data.name;
  }
  const dated = datedPayload.safeParse(payload);
  return dated.success ? dated.data.start : null;
}

function sortKey(page: StoredPage, sort: { property?: string | undefined; timestamp?: string | undefined }): Scalar {
  if (sort.timestamp === 'created_time') {
    return page.created_time;
  }
  if (sort.timestamp === 'last_edited_time') {
    return page.last_edited_time;
  }
  return sort.property === undefined ? null : readValue(page.properties[sort.property]);
}

/** Nulls sort last in either direction of the underlying comparison. */
function compare(a: Scalar, b: Scalar): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

function matches(filter: Record<string, unknown>, page: StoredPage): boolean {
  const and = filter['and'];
  if (Array.isArray(and)) {
    return and.every((child) => matches(looseRecord.parse(child), page));
  }
  const or = filter['or'];
  if (Array.isArray(or)) {
    return or.some((child) => matches(looseRecord.parse(child), page));
  }

  const property = filter['property'];
  const timestamp = filter['timestamp'];
  const tag = Object.keys(filter).find((key) => key !== 'property' && key !== 'timestamp');
  if (tag === undefined) {
    return true;
  }
  const condition = Object.entries(looseRecord.parse(filter[tag]))[0];
  const value =
    typeof property === 'string'
      ? readValue(page.properties[property])
      : timestamp === 'created_time'
        ? page.created_time
        : page.last_edited_time;
  return passes(value, condition?.[0], condition?.[1]);
}

function passes(value: Scalar, operator: string | undefined, operand: unknown): boolean {
  switch (operator) {
    case 'equals':
      return value === operand;
    case 'does_not_equal':
      return value !== operand;
    case 'contains':
      return typeof value === 'string' && typeof operand === 'string' && value.includes(operand);
    case 'greater_than':
      return typeof value === 'number' && typeof operand === 'number' && value > operand;
    case 'less_than':
      return typeof value === 'number' && typeof operand === 'number' && value < operand;
    case 'before':
    case 'on_or_before':
    case 'after':
    case 'on_or_after':
      return typeof value === 'string' && typeof operand === 'string' && compareDates(operator, value, operand);
    case 'is_empty':
      return value === null || value === '';
    case 'is_not_empty':
      return value !== null && value !== '';
    default:
      throw new Error(`FakeApi does not support the "${String(operator)}" operator`);
  }
}

function compareDates(operator: string, value: string, operand: string): boolean {
  const diff = Date.parse(value) - Date.parse(operand);
  switch (operator) {
    case 'before':
      return diff < 0;
    case 'on_or_before':
      return diff <= 0;
    case 'after':
      return diff > 0;
    default:
      return diff >= 0;
  }
}
