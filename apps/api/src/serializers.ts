import type { Tag, Task } from '@tasklane/core';

export interface TagResponse {
  id: number;
  name: string;
}

/** Wire shape of a task. Storage-only fields (visibility) stay internal. */
export interface TaskResponse {
  id: number;
  title: string;
  description: string | null;
  priority: number;
  due_date: string;
  completed: boolean;
  tags: TagResponse[];
  created_at: string;
  updated_at: string;
}

function toTagResponse(tag: Tag): TagResponse {
  return { id: tag.id, name: tag.name };
}

export function toTaskResponse(task: Task): TaskResponse {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    priority: task.priority,
    due_date: task.dueDate,
    completed: task.completed,
    tags: task.tags.map(toTagResponse),
    created_at: task.createdAt,
    updated_at: task.updatedAt,
  };
}
