import type { PoolClient } from 'pg';
import type { PostgresHelpers } from '@outpaint-gateway/shared';

import {
  DEFAULT_TODO_PRIORITY,
  isTodoPriority,
  type TodoRecord,
  type TodoRepository,
  type TodoUpdateInput
} from './types';

interface TodoRow {
  id: string;
  user_id: string;
  description: string;
  due_date: Date | null;
  priority: string;
  is_completed: boolean;
  created_at: Date;
  completed_at: Date | null;
}

const TODO_COLUMNS = 'id, user_id, description, due_date, priority, is_completed, created_at, completed_at';

function toRecord(row: TodoRow): TodoRecord {
  return {
    id: row.id,
    userId: row.user_id,
    description: row.description,
    dueDate: row.due_date,
    priority: isTodoPriority(row.priority) ? row.priority : DEFAULT_TODO_PRIORITY,
    isCompleted: row.is_completed,
    createdAt: row.created_at,
    completedAt: row.completed_at
  } satisfies TodoRecord;
}

function firstRecord(rows: TodoRow[]): TodoRecord | null {
  return rows.length > 0 ? toRecord(rows[0]) : null;
}

/**
 * Todo persistence against the existing `todos` table. Every statement filters on the
 * owning user.
 */
export class PostgresTodoRepository implements TodoRepository {
  constructor(private readonly postgres: PostgresHelpers) {}

  private query<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
    return this.postgres.withConnection(fn);
  }

  listForUser(userId: string): Promise<TodoRecord[]> {
    return this.query(async (client) => {
      const result = await client.query<TodoRow>(
        `SELECT ${TODO_COLUMNS}
           FROM todos
          WHERE user_id = $1
          ORDER BY created_at ASC, id ASC`,
        [userId]
      );
      return result.rows.map(toRecord);
    });
  }

  findForUser(userId: string, todoId: string): Promise<TodoRecord | null> {
    return this.query(async (client) => {
      const result = await client.query<TodoRow>(
        `SELECT ${TODO_COLUMNS} FROM todos WHERE id = $1 AND user_id = $2`,
        [todoId, userId]
      );
      return firstRecord(result.rows);
    });
  }

  insert(record: TodoRecord): Promise<TodoRecord> {
    return this.query(async (client) => {
      const result = await client.query<TodoRow>(
        `INSERT INTO todos (${TODO_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${TODO_COLUMNS}`,
        [
          record.id,
          record.userId,
          record.description,
          record.dueDate,
          record.priority,
          record.isCompleted,
          record.createdAt,
          record.completedAt
        ]
      );
      const inserted = firstRecord(result.rows);
      if (!inserted) {
        throw new Error(`Insert of todo ${record.id} returned no row`);
      }
      return inserted;
    });
  }

  updateForUser(userId: string, todoId: string, input: TodoUpdateInput): Promise<TodoRecord | null> {
    const assignments = ['description = $3'];
    const values: Array<string | Date | null> = [todoId, userId, input.description];
    if (input.dueDate !== undefined) {
      values.push(input.dueDate);
      assignments.push(`due_date = $${values.length}`);
    }
    if (input.priority !== undefined) {
      values.push(input.priority);
      assignments.push(`priority = $${values.length}`);
    }

    return this.query(async (client) => {
      const result = await client.query<TodoRow>(
        `UPDATE todos
            SET ${assignments.join(', ')}
          WHERE id = $1 AND user_id = $2
          RETURNING ${TODO_COLUMNS}`,
        values
      );
      return firstRecord(result.rows);
    });
  }

  markCompleted(userId: string, todoId: string, completedAt: Date): Promise<TodoRecord | null> {
    return this.query(async (client) => {
      const result = await client.query<TodoRow>(
        `UPDATE todos
            SET is_completed = TRUE,
                completed_at = $3
          WHERE id = $1 AND user_id = $2 AND is_completed = FALSE
          RETURNING ${TODO_COLUMNS}`,
        [todoId, userId, completedAt]
      );
      return firstRecord(result.rows);
    });
  }

  deleteForUser(userId: string, todoId: string): Promise<boolean> {
    return this.query(async (client) => {
      const result = await client.query('DELETE FROM todos WHERE id = $1 AND user_id = $2', [todoId, userId]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  async ping(): Promise<void> {
    await this.query((client) => client.query('SELECT 1'));
  }

  close(): Promise<void> {
    return this.postgres.closePool();
  }
}
