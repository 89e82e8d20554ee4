import { describe, it, expect, beforeEach } from 'vitest';
import { createClient } from '../../src/client.js';
import { silentLogger } from '../../src/logger.js';
import { field } from '../../src/schema/schema.js';
import { prop } from '../../src/schema/property-types.js';
import { date, select, text } from '../../src/query/constraints.js';
import { EndpointError, RemoteFetchError } from '../../src/errors.js';
import { HttpEndpoint } from '../../src/http/endpoint.js';
import { BASE_URL, FakeApi, wire } from './helpers.js';

const fields = {
  name: field('Name', prop.title()),
  priority: field('Priority', prop.select(['High', 'Low'])),
  due: field('Due Date', prop.date()),
};

let api: FakeApi;

function tasks() {
  const client = createClient({ endpoint: api.endpoint(), env: {}, logger: silentLogger });
  return client.collection({ collection: 'tasks-db', fields });
}

function seedTask(name: string, priority: string, due: string): void {
  api.seed('tasks-db', { Name: wire.title(name), Priority: wire.select(priority), 'Due Date': wire.date(due) });
}

beforeEach(() => {
  api = new FakeApi();
  seedTask('T1', 'High', '2024-07-05');
  seedTask('T2', 'High', '2024-07-01');
  seedTask('T3', 'High', '2024-07-04');
  seedTask('T4', 'High', '2024-07-02');
  seedTask('T5', 'High', '2024-07-03');
  seedTask('T6', 'Low', '2024-06-30');
  seedTask('T7', 'Low', '2024-07-10');
  api.seed('other-db', { Name: wire.title('Elsewhere'), Priority: wire.select('High') });
});

describe('query over HTTP', () => {
  it('filter, sort and limit return the earliest matches in one request', async () => {
    const results = await tasks()
      .query()
      .filter('Priority', select.equals('High'))
      .sort('Due Date', 'ascending')
      .limit(2)
      .execute()
      .toArray();

    expect(results.map((task) => task.name)).toEqual(['T2', 'T4']);
    expect(results[0]?.due).toEqual({ start: '2024-07-01', end: null });
    expect(api.requests).toEqual([
      {
        method: 'POST',
        path: '/databases/tasks-db/query',
        body: {
          filter: { property: 'Priority', select: { equals: 'High' } },
          sorts: [{ property: 'Due Date', direction: 'ascending' }],
          page_size: 2,
        },
      },
    ]);
  });

  it('a limit below the page size stops inside the first of two pages', async () => {
    const sequence = tasks()
      .query()
      .filter('Priority', select.equals('High'))
      .sort('Due Date', 'ascending')
      .pageSize(3)
      .limit(2)
      .execute();

    const results = await sequence.toArray();

    expect(results.map((task) => task.name)).toEqual(['T2', 'T4']);
    expect(sequence.pagesFetched).toBe(1);
    expect(api.requests).toHaveLength(1);
    expect(api.requests[0]?.body).toMatchObject({ page_size: 3 });
  });

  it('a limit above the page size crosses into the second page', async () => {
    const results = await tasks()
      .query()
      .filter('Priority', select.equals('High'))
      .sort('Due Date', 'ascending')
      .pageSize(3)
      .limit(4)
      .execute()
      .toArray();

    expect(results.map((task) => task.name)).toEqual(['T2', 'T4', 'T5', 'T3']);
    expect(api.requests).toHaveLength(2);
  });

  it('follows cursors across pages until the server runs out', async () => {
    const sequence = tasks()
      .query()
      .filter('Priority', select.equals('High'))
      .sort('Due Date')
      .pageSize(2)
      .execute();

    const names: string[] = [];
    for await (const task of sequence) {
      names.push(task.name);
    }

    expect(names).toEqual(['T2', 'T4', 'T5', 'T3', 'T1']);
    expect(sequence.pagesFetched).toBe(3);
    expect(sequence.state).toBe('exhausted');
    const cursors = api.requests.map((request) =>
      typeof request.body === 'object' && request.body !== null && 'start_cursor' in request.body
        ? request.body.start_cursor
        : undefined,
    );
    expect(cursors).toEqual([undefined, 'cursor-2', 'cursor-4']);
  });

  it('stops fetching once the limit is reached', async () => {
    const results = await tasks()
      .query()
      .filter('Priority', select.equals('High'))
      .sort('Due Date')
      .pageSize(2)
      .limit(3)
      .execute()
      .toArray();

    expect(results.map((task) => task.name)).toEqual(['T2', 'T4', 'T5']);
    expect(api.requests).toHaveLength(2);
  });

  it('AND-combines filters', async () => {
    const results = await tasks()
      .query()
      .filter('Priority', select.equals('High'))
      .filter('Due Date', date.onOrAfter('2024-07-04'))
      .sort('Due Date')
      .execute()
      .toArray();

    expect(results.map((task) => task.name)).toEqual(['T3', 'T1']);
  });

  it('filterAny() matches either clause', async () => {
    const Tasks = tasks();
    const query = Tasks.query();
    const results = await query
      .filterAny(query.clause('Name', text.equals('T6')), query.clause('Name', text.equals('T7')))
      .sort('Due Date', 'descending')
      .execute()
      .toArray();

    expect(results.map((task) => task.name)).toEqual(['T7', 'T6']);
    expect(results.every((task) => task.priority === 'Low')).toBe(true);
  });

  it('first() asks for a single record', async () => {
    const latest = await tasks()
      .query()
      .filter('Priority', select.equals('High'))
      .sort('Due Date', 'descending')
      .first();

    expect(latest?.name).toBe('T1');
    expect(latest?.state).toBe('bound');
    expect(api.requests[0]?.body).toMatchObject({ page_size: 1 });
  });

  it('first() is undefined when nothing matches', async () => {
    const none = await tasks().query().filter('Name', text.contains('nothing like this')).first();
    expect(none).toBeUndefined();
  });

  it('surfaces API errors as RemoteFetchError', async () => {
    const endpoint = new HttpEndpoint({ baseUrl: BASE_URL, token: 'wrong-token', fetch: api.fetch });
    const client = createClient({ endpoint, env: {}, logger: silentLogger });
    const error = await client.query('tasks-db').execute().toArray().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteFetchError);
    expect(error).toMatchObject({ yielded: 0 });
    const cause = error instanceof RemoteFetchError ? error.cause : undefined;
    expect(cause).toBeInstanceOf(EndpointError);
    expect(cause).toMatchObject({ status: 401, code: 'unauthorized' });
  });
});
