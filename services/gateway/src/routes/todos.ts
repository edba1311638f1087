import type { FastifyInstance, FastifyRequest } from 'fastify';
import { z } from 'zod';

import { GatewayError } from '../errors';
import { serializeTodo, TODO_PRIORITIES } from '../todos/types';
import type { AppContext } from '../types';
import { sendValidationError } from './shared';

const PRINCIPAL_HEADER = 'x-gateway-user';

const principalSchema = z.string().trim().uuid();

const todoParamsSchema = z.object({
  todoId: z.string().uuid()
});

const todoBodySchema = z.object({
  description: z.string().trim().min(1),
  due_date: z.string().datetime({ offset: true }).nullable().optional(),
  priority: z.enum(TODO_PRIORITIES).optional()
});

function resolvePrincipal(request: FastifyRequest): string {
  const header = request.headers[PRINCIPAL_HEADER];
  const value = Array.isArray(header) ? header[0] : header;
  const parsed = principalSchema.safeParse(value);
  if (!parsed.success) {
    throw new GatewayError('Missing or invalid user principal', 'MISSING_PRINCIPAL');
  }
  return parsed.data;
}

function toDueDate(value: string | null | undefined): Date | null | undefined {
  if (value === undefined || value === null) {
    return value;
  }
  return new Date(value);
}

export const registerTodoRoutes = (app: FastifyInstance, ctx: AppContext) => {
  app.post('/todos', async (request, reply) => {
    const userId = resolvePrincipal(request);
    const parseResult = todoBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }

    const { description, due_date: dueDate, priority } = parseResult.data;
    const created = await ctx.todos.create(userId, { description, dueDate: toDueDate(dueDate), priority });
    ctx.metrics.todoOperations.inc({ operation: 'create' });
    reply.status(201);
    return serializeTodo(created);
  });

  app.get('/todos', async (request) => {
    const userId = resolvePrincipal(request);
    const todos = await ctx.todos.list(userId);
    ctx.metrics.todoOperations.inc({ operation: 'list' });
    return todos.map(serializeTodo);
  });

  app.get('/todos/:todoId', async (request, reply) => {
    const userId = resolvePrincipal(request);
    const params = todoParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }

    const todo = await ctx.todos.get(userId, params.data.todoId);
    ctx.metrics.todoOperations.inc({ operation: 'get' });
    return serializeTodo(todo);
  });

  app.put('/todos/:todoId', async (request, reply) => {
    const userId = resolvePrincipal(request);
    const params = todoParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }
    const parseResult = todoBodySchema.safeParse(request.body);
    if (!parseResult.success) {
      return sendValidationError(reply, parseResult.error);
    }

    const { description, due_date: dueDate, priority } = parseResult.data;
    const updated = await ctx.todos.update(userId, params.data.todoId, {
      description,
      dueDate: toDueDate(dueDate),
      priority
    });
    ctx.metrics.todoOperations.inc({ operation: 'update' });
    return serializeTodo(updated);
  });

  app.put('/todos/:todoId/complete', async (request, reply) => {
    const userId = resolvePrincipal(request);
    const params = todoParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }

    const completed = await ctx.todos.complete(userId, params.data.todoId);
    ctx.metrics.todoOperations.inc({ operation: 'complete' });
    return serializeTodo(completed);
  });

  app.delete('/todos/:todoId', async (request, reply) => {
    const userId = resolvePrincipal(request);
    const params = todoParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error);
    }

    await ctx.todos.delete(userId, params.data.todoId);
    ctx.metrics.todoOperations.inc({ operation: 'delete' });
    return reply.status(204).send();
  });
};
