import { randomUUID } from 'node:crypto';

import { GatewayError } from '../errors';
import {
  DEFAULT_TODO_PRIORITY,
  type TodoCreateInput,
  type TodoRecord,
  type TodoRepository,
  type TodoUpdateInput
} from './types';

type TodoLogger = {
  info(obj: Record<string, unknown>, msg: string): void;
  warn(obj: Record<string, unknown>, msg: string): void;
  error(obj: Record<string, unknown>, msg: string): void;
};

export interface TodoServiceOptions {
  repository: TodoRepository;
  logger: TodoLogger;
  now?: () => Date;
  generateId?: () => string;
}

function todoNotFound(todoId: string): GatewayError {
  return new GatewayError(`Todo with id ${todoId} not found`, 'TODO_NOT_FOUND', { todoId });
}

export class TodoService {
  private readonly repository: TodoRepository;
  private readonly logger: TodoLogger;
  private readonly now: () => Date;
  private readonly generateId: () => string;

  constructor(options: TodoServiceOptions) {
    this.repository = options.repository;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  async create(userId: string, input: TodoCreateInput): Promise<TodoRecord> {
    const record: TodoRecord = {
      id: this.generateId(),
      userId,
      description: input.description,
      dueDate: input.dueDate ?? null,
      priority: input.priority ?? DEFAULT_TODO_PRIORITY,
      isCompleted: false,
      createdAt: this.now(),
      completedAt: null
    };
    const created = await this.persist('create', userId, () => this.repository.insert(record));
    this.logger.info({ userId, todoId: created.id }, 'Created todo');
    return created;
  }

  async list(userId: string): Promise<TodoRecord[]> {
    const todos = await this.persist('list', userId, () => this.repository.listForUser(userId));
    this.logger.info({ userId, count: todos.length }, 'Retrieved todos');
    return todos;
  }

  async get(userId: string, todoId: string): Promise<TodoRecord> {
    const todo = await this.persist('get', userId, () => this.repository.findForUser(userId, todoId));
    if (!todo) {
      this.logger.warn({ userId, todoId }, 'Todo not found');
      throw todoNotFound(todoId);
    }
    return todo;
  }

  async update(userId: string, todoId: string, input: TodoUpdateInput): Promise<TodoRecord> {
    const updated = await this.persist('update', userId, () => this.repository.updateForUser(userId, todoId, input));
    if (!updated) {
      throw todoNotFound(todoId);
    }
    this.logger.info({ userId, todoId }, 'Updated todo');
    return updated;
  }

  /** Completing an already completed todo returns it unchanged. */
  async complete(userId: string, todoId: string): Promise<TodoRecord> {
    const existing = await this.get(userId, todoId);
    if (existing.isCompleted) {
      return existing;
    }
    const completed = await this.persist('complete', userId, () =>
      this.repository.markCompleted(userId, todoId, this.now())
    );
    if (completed) {
      this.logger.info({ userId, todoId }, 'Completed todo');
      return completed;
    }
    // Lost a race with another completion or a delete.
    return this.get(userId, todoId);
  }

  async delete(userId: string, todoId: string): Promise<void> {
    const deleted = await this.persist('delete', userId, () => this.repository.deleteForUser(userId, todoId));
    if (!deleted) {
      throw todoNotFound(todoId);
    }
    this.logger.info({ userId, todoId }, 'Deleted todo');
  }

  private async persist<T>(operation: string, userId: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof GatewayError) {
        throw err;
      }
      this.logger.error({ err, operation, userId }, 'Todo persistence failed');
      throw new GatewayError(`Failed to ${operation} todo`, 'TODO_PERSISTENCE_FAILED', { operation });
    }
  }
}
