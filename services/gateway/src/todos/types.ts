export const TODO_PRIORITIES = ['Normal', 'Low', 'Medium', 'High', 'Top'] as const;

export type TodoPriority = (typeof TODO_PRIORITIES)[number];

export const DEFAULT_TODO_PRIORITY: TodoPriority = 'Medium';

export interface TodoRecord {
  id: string;
  userId: string;
  description: string;
  dueDate: Date | null;
  priority: TodoPriority;
  isCompleted: boolean;
  createdAt: Date;
  completedAt: Date | null;
}

export interface TodoCreateInput {
  description: string;
  dueDate?: Date | null;
  priority?: TodoPriority;
}

/** Fields left undefined keep their stored value. */
export interface TodoUpdateInput {
  description: string;
  dueDate?: Date | null;
  priority?: TodoPriority;
}

export interface TodoRepository {
  listForUser(userId: string): Promise<TodoRecord[]>;
  findForUser(userId: string, todoId: string): Promise<TodoRecord | null>;
  insert(record: TodoRecord): Promise<TodoRecord>;
  updateForUser(userId: string, todoId: string, input: TodoUpdateInput): Promise<TodoRecord | null>;
  markCompleted(userId: string, todoId: string, completedAt: Date): Promise<TodoRecord | null>;
  deleteForUser(userId: string, todoId: string): Promise<boolean>;
  ping(): Promise<void>;
  close(): Promise<void>;
}

export function isTodoPriority(value: string): value is TodoPriority {
  return TODO_PRIORITIES.some((priority) => priority === value);
}

export interface SerializedTodo {
  id: string;
  user_id: string;
  description: string;
  due_date: string | null;
  priority: TodoPriority;
  is_completed: boolean;
  created_at: string;
  completed_at: string | null;
}

export function serializeTodo(todo: TodoRecord): SerializedTodo {
  return {
    id: todo.id,
    user_id: todo.userId,
    description: todo.description,
    due_date: todo.dueDate ? todo.dueDate.toISOString() : null,
    priority: todo.priority,
    is_completed: todo.isCompleted,
    created_at: todo.createdAt.toISOString(),
    completed_at: todo.completedAt ? todo.completedAt.toISOString() : null
  };
}
