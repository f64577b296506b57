import type { SortMethod, Task } from '../schema/index.js';

function compareDateNullable(a: Date | undefined, b: Date | undefined): number {
  if (!a && !b) return 0;
  if (!a) return 1;
  if (!b) return -1;
  return a.getTime() - b.getTime();
}

function compareByMethod(a: Task, b: Task, method: SortMethod): number {
  switch (method) {
    case 'alphabetic':
    case 'alpha':
    case 'description': {
      const left = a.description.toLowerCase();
      const right = b.description.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    }
    case 'due':
      return compareDateNullable(a.due, b.due);
    case 'scheduled':
      return compareDateNullable(a.scheduled, b.scheduled);
    case 'created':
    case 'entry':
      return compareDateNullable(a.entry, b.entry);
    case 'modified':
      return compareDateNullable(a.modified, b.modified);
    case 'urgency':
      // Higher urgency first.
      return b.urgency - a.urgency;
  }
}

/**
 * Stable sort for a flat task list. Completed tasks always trail the rest;
 * `reverse` flips only the method comparison, never that partition.
 */
export function sortTasks(tasks: readonly Task[], method?: SortMethod, reverse = false): Task[] {
  return tasks.slice().sort((a, b) => {
    const aDone = a.status === 'completed';
    const bDone = b.status === 'completed';
    if (aDone !== bDone) return aDone ? 1 : -1;
    if (!method) return 0;
    const cmp = compareByMethod(a, b, method);
    return reverse ? -cmp : cmp;
  });
}
