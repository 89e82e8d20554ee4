import { describe, it, expect, beforeEach } from 'vitest';
import { createClient } from '../../src/client.js';
import { silentLogger } from '../../src/logger.js';
import { field } from '../../src/schema/schema.js';
import { prop } from '../../src/schema/property-types.js';
import { EndpointError, RemoteFetchError, RemoteWriteError } from '../../src/errors.js';
import { HttpEndpoint } from '../../src/http/endpoint.js';
import { BASE_URL, FakeApi, wire } from './helpers.js';

const definition = {
  collection: 'tasks-db',
  fields: {
    name: field('Name', prop.title()),
    priority: field('Priority', prop.select(['High', 'Low'])),
    due: field('Due Date', prop.date()),
    estimate: field('Estimate', prop.number()),
  },
};

let api: FakeApi;

function tasks(endpoint = api.endpoint()) {
  return createClient({ endpoint, env: {}, logger: silentLogger }).collection(definition);
}

beforeEach(() => {
  api = new FakeApi();
});

describe('record lifecycle over HTTP', () => {
  it('create then commit stores the record on the server', async () => {
    const task = tasks().create({ name: 'Write docs', priority: 'High', due: '2024-07-01' });

    await task.commit();

    expect(task.state).toBe('committed');
    expect(task.id).toBe('page-1');
    expect(task.createdTime).toEqual(new Date('2024-06-01T00:01:00.000Z'));
    expect(api.page('page-1')?.properties).toEqual({
      Name: { id: 'name', type: 'title', title: [{ type: 'text', text: { content: 'Write docs' } }] },
      Priority: { id: 'priority', type: 'select', select: { name: 'High' } },
      'Due Date': { id: 'due date', type: 'date', date: { start: '2024-07-01', end: null } },
    });
    expect(task.due).toEqual({ start: '2024-07-01', end: null });
  });

  it('commit after a change sends only that property', async () => {
    const id = api.seed('tasks-db', { Name: wire.title('Review'), Estimate: wire.number(3) });
    const task = await tasks().retrieve(id);

    task.estimate = 8;
    await task.commit();

    const patch = api.requests.at(-1);
    expect(patch).toEqual({
      method: 'PATCH',
      path: `/pages/${id}`,
      body: { properties: { Estimate: { number: 8 } } },
    });
    expect(task.state).toBe('committed');
    expect(task.estimate).toBe(8);
    expect(task.name).toBe('Review');
    expect(task.lastEditedTime).toEqual(new Date('2024-06-01T00:02:00.000Z'));
  });

  it('a retrieved record reflects earlier commits', async () => {
    const Tasks = tasks();
    const task = Tasks.create({ name: 'Plan', estimate: 2 });
    await task.commit();
    task.priority = 'Low';
    await task.commit();

    const again = await Tasks.retrieve('page-1');
    expect(again.name).toBe('Plan');
    expect(again.priority).toBe('Low');
    expect(again.estimate).toBe(2);
  });

  it('refresh() discards local edits', async () => {
    const id = api.seed('tasks-db', { Name: wire.title('Review'), Estimate: wire.number(3) });
    const task = await tasks().retrieve(id);
    task.estimate = 40;

    await task.refresh();

    expect(task.estimate).toBe(3);
    expect(task.dirty.size).toBe(0);
  });

  it('archived records drop out of queries until restored', async () => {
    const Tasks = tasks();
    const id = api.seed('tasks-db', { Name: wire.title('Old') });
    api.seed('tasks-db', { Name: wire.title('Current') });
    const task = await Tasks.retrieve(id);

    await task.archive();

    expect(task.archived).toBe(true);
    expect(api.requests.at(-1)).toEqual({ method: 'PATCH', path: `/pages/${id}`, body: { archived: true } });
    expect((await Tasks.query().execute().toArray()).map((t) => t.name)).toEqual(['Current']);

    await task.restore();

    expect(task.archived).toBe(false);
    expect((await Tasks.query().execute().toArray()).map((t) => t.name)).toEqual(['Old', 'Current']);
  });

  it('retrieving a missing record fails with the API error as cause', async () => {
    const error = await tasks().retrieve('page-404').catch((err: unknown) => err);
    expect(error).toBeInstanceOf(RemoteFetchError);
    const cause = error instanceof RemoteFetchError ? error.cause : undefined;
    expect(cause).toMatchObject({ status: 404, code: 'object_not_found' });
  });

  it('a rejected write keeps the record new with its changes', async () => {
    const endpoint = new HttpEndpoint({ baseUrl: BASE_URL, token: 'wrong-token', fetch: api.fetch });
    const task = tasks(endpoint).create({ name: 'Draft' });

    const error = await task.commit().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteWriteError);
    const cause = error instanceof RemoteWriteError ? error.cause : undefined;
    expect(cause).toBeInstanceOf(EndpointError);
    expect(task.state).toBe('new');
    expect([...task.dirty]).toEqual(['Name']);
    expect(api.page('page-1')).toBeUndefined();
  });
});
