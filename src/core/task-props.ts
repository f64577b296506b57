import type { Task } from '../schema/index.js';
import { daysBetween, formatDate } from './date-utils.js';

const DATE_FIELDS = ['due', 'scheduled', 'wait', 'start', 'entry', 'modified', 'end'] as const;
type DateField = (typeof DATE_FIELDS)[number];

function isDateField(field: string): field is DateField {
  return (DATE_FIELDS as readonly string[]).includes(field);
}

function isOpen(task: Task): boolean {
  return task.status !== 'completed' && task.status !== 'deleted';
}

export function isStarted(task: Task): boolean {
  return task.start !== undefined;
}

export function isOverdue(task: Task, now: Date): boolean {
  return isOpen(task) && task.due !== undefined && task.due.getTime() < now.getTime();
}

export function isDueToday(task: Task, now: Date): boolean {
  return isOpen(task) && task.due !== undefined && daysBetween(now, task.due) === 0;
}

/**
 * Resolves a field name to display text. Used by columns, the detail view and
 * custom command templates. Unknown fields resolve to undefined.
 */
export function getTaskProperty(task: Task, field: string): string | undefined {
  switch (field) {
    case 'id':
      return task.id !== undefined ? String(task.id) : '';
    case 'uuid':
      return task.uuid;
    case 'description':
      return task.description;
    case 'project':
      return task.project ?? '';
    case 'priority':
      return task.priority ?? '';
    case 'status':
      return task.status;
    case 'tags':
      return task.tags.join(',');
    case 'urgency':
      return task.urgency.toFixed(1);
    case 'depends':
      return task.depends.join(',');
    case 'annotations':
      return task.annotations.map((a) => a.description).join('; ');
  }
  if (isDateField(field)) {
    const value = task[field];
    return value ? formatDate(value) : '';
  }
  return task.udas[field];
}

export function toMarkdown(task: Task): string {
  let box = ' ';
  if (task.status === 'completed') box = 'x';
  else if (task.status === 'deleted') box = '-';
  else if (isStarted(task)) box = 'S';
  return `* [${box}] ${task.description} (${task.uuid.slice(0, 8)})`;
}

export function tasksToMarkdown(tasks: readonly Task[]): string {
  return tasks.map(toMarkdown).join('\n');
}
