import assert from 'node:assert/strict';
import { test, type TestContext } from 'node:test';

import { createApp } from '../src/app';
import { InMemoryObjectStore, InMemoryTodoRepository, makeConfig, sequentialIds } from './helpers';

const USER_A = '11111111-1111-4111-8111-111111111111';
const USER_B = '22222222-2222-4222-8222-222222222222';
const FIRST_TODO_ID = '00000000-0000-4000-8000-000000000001';
const SECOND_TODO_ID = '00000000-0000-4000-8000-000000000002';

function fixedClock(...isoTimes: string[]) {
  let index = 0;
  return () => {
    const value = isoTimes[Math.min(index, isoTimes.length - 1)];
    index += 1;
    return new Date(value);
  };
}

async function buildApp(t: TestContext, clock = fixedClock('2025-05-01T10:00:00.000Z')) {
  const repository = new InMemoryTodoRepository();
  const { app } = await createApp(makeConfig(), {
    objectStore: new InMemoryObjectStore(),
    todoRepository: repository,
    generateId: sequentialIds(),
    now: clock
  });
  t.after(async () => {
    await app.close();
  });
  return { app, repository };
}

test('creates, lists and fetches todos for the calling user', async (t) => {
  const { app } = await buildApp(t);

  const created = await app.inject({
    method: 'POST',
    url: '/todos',
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Review outpaint results', due_date: '2025-05-03T12:00:00Z', priority: 'High' }
  });

  assert.equal(created.statusCode, 201);
  assert.deepEqual(created.json(), {
    id: FIRST_TODO_ID,
    user_id: USER_A,
    description: 'Review outpaint results',
    due_date: '2025-05-03T12:00:00.000Z',
    priority: 'High',
    is_completed: false,
    created_at: '2025-05-01T10:00:00.000Z',
    completed_at: null
  });

  const list = await app.inject({ method: 'GET', url: '/todos', headers: { 'x-gateway-user': USER_A } });
  assert.equal(list.statusCode, 200);
  assert.deepEqual(
    list.json().map((todo: { id: string }) => todo.id),
    [FIRST_TODO_ID]
  );

  const fetched = await app.inject({
    method: 'GET',
    url: `/todos/${FIRST_TODO_ID}`,
    headers: { 'x-gateway-user': USER_A }
  });
  assert.equal(fetched.statusCode, 200);
  assert.equal(fetched.json().description, 'Review outpaint results');
});

test('priority defaults to Medium and due date to null', async (t) => {
  const { app } = await buildApp(t);

  const created = await app.inject({
    method: 'POST',
    url: '/todos',
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Tidy bucket' }
  });

  assert.equal(created.statusCode, 201);
  assert.equal(created.json().priority, 'Medium');
  assert.equal(created.json().due_date, null);
});

test('todos belonging to another user are not found', async (t) => {
  const { app } = await buildApp(t);
  await app.inject({
    method: 'POST',
    url: '/todos',
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Private' }
  });

  const list = await app.inject({ method: 'GET', url: '/todos', headers: { 'x-gateway-user': USER_B } });
  assert.deepEqual(list.json(), []);

  const fetched = await app.inject({
    method: 'GET',
    url: `/todos/${FIRST_TODO_ID}`,
    headers: { 'x-gateway-user': USER_B }
  });
  assert.equal(fetched.statusCode, 404);
  assert.deepEqual(fetched.json(), { detail: `Todo with id ${FIRST_TODO_ID} not found` });

  const deleted = await app.inject({
    method: 'DELETE',
    url: `/todos/${FIRST_TODO_ID}`,
    headers: { 'x-gateway-user': USER_B }
  });
  assert.equal(deleted.statusCode, 404);
});

test('requests without a valid principal are rejected', async (t) => {
  const { app } = await buildApp(t);

  const missing = await app.inject({ method: 'GET', url: '/todos' });
  assert.equal(missing.statusCode, 401);
  assert.deepEqual(missing.json(), { detail: 'Missing or invalid user principal' });

  const invalid = await app.inject({ method: 'GET', url: '/todos', headers: { 'x-gateway-user': 'alice' } });
  assert.equal(invalid.statusCode, 401);
});

test('updates only the provided fields', async (t) => {
  const { app } = await buildApp(t);
  await app.inject({
    method: 'POST',
    url: '/todos',
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Draft', due_date: '2025-06-01T00:00:00Z', priority: 'Low' }
  });

  const updated = await app.inject({
    method: 'PUT',
    url: `/todos/${FIRST_TODO_ID}`,
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Final', priority: 'Top' }
  });

  assert.equal(updated.statusCode, 200);
  const body = updated.json();
  assert.equal(body.description, 'Final');
  assert.equal(body.priority, 'Top');
  assert.equal(body.due_date, '2025-06-01T00:00:00.000Z');

  const cleared = await app.inject({
    method: 'PUT',
    url: `/todos/${FIRST_TODO_ID}`,
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Final', due_date: null }
  });
  assert.equal(cleared.json().due_date, null);
});

test('rejects unknown priorities', async (t) => {
  const { app } = await buildApp(t);

  const response = await app.inject({
    method: 'POST',
    url: '/todos',
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Triage', priority: 'Urgent' }
  });

  assert.equal(response.statusCode, 400);
  assert.equal(response.json().detail, 'Request validation failed');
});

test('completing a todo is idempotent', async (t) => {
  const { app } = await buildApp(
    t,
    fixedClock('2025-05-01T10:00:00.000Z', '2025-05-02T08:30:00.000Z', '2025-05-09T00:00:00.000Z')
  );
  await app.inject({
    method: 'POST',
    url: '/todos',
    headers: { 'x-gateway-user': USER_A },
    payload: { description: 'Ship release' }
  });

  const first = await app.inject({
    method: 'PUT',
    url: `/todos/${FIRST_TODO_ID}/complete`,
    headers: { 'x-gateway-user': USER_A }
  });
  assert.equal(first.statusCode, 200);
  assert.equal(first.json().is_completed, true);
  assert.equal(first.json().completed_at, '2025-05-02T08:30:00.000Z');

  const second = await app.inject({
    method: 'PUT',
    url: `/todos/${FIRST_TODO_ID}/complete`,
    headers: { 'x-gateway-user': USER_A }
  });
  assert.equal(second.statusCode, 200);
  assert.equal(second.json().completed_at, '2025-05-02T08:30:00.000Z');
});

test('deletes a todo', async (t) => {
  const { app, repository } = await buildApp(t);
  for (const description of ['One', 'Two']) {
    await app.inject({
      method: 'POST',
      url: '/todos',
      headers: { 'x-gateway-user': USER_A },
      payload: { description }
    });
  }

  const deleted = await app.inject({
    method: 'DELETE',
    url: `/todos/${FIRST_TODO_ID}`,
    headers: { 'x-gateway-user': USER_A }
  });
  assert.equal(deleted.statusCode, 204);
  assert.equal(deleted.body, '');
  assert.deepEqual([...repository.records.keys()], [SECOND_TODO_ID]);

  const again = await app.inject({
    method: 'DELETE',
    url: `/todos/${FIRST_TODO_ID}`,
    headers: { 'x-gateway-user': USER_A }
  });
  assert.equal(again.statusCode, 404);
});

test('malformed todo ids are rejected before lookup', async (t) => {
  const { app } = await buildApp(t);

  const response = await app.inject({
    method: 'GET',
    url: '/todos/not-a-uuid',
    headers: { 'x-gateway-user': USER_A }
  });

  assert.equal(response.statusCode, 400);
  assert.equal(response.json().detail, 'Request validation failed');
});

test('repository failures become persistence errors', async (t) => {
  const { app, repository } = await buildApp(t);
  repository.listForUser = async () => {
    throw new Error('connection reset');
  };

  const response = await app.inject({ method: 'GET', url: '/todos', headers: { 'x-gateway-user': USER_A } });

  assert.equal(response.statusCode, 500);
  assert.deepEqual(response.json(), { detail: 'An unexpected error occurred. Please try again later.' });
});
