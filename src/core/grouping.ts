import type { ProjectSummary, Task, TaskGroup } from '../schema/index.js';

export const NO_GROUP_NAME = '(none)';
export const PROJECT_DELIMITER = '.';

function byNameNoneLast(a: TaskGroup, b: TaskGroup): number {
  if (a.name === NO_GROUP_NAME) return b.name === NO_GROUP_NAME ? 0 : 1;
  if (b.name === NO_GROUP_NAME) return -1;
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * One group per distinct tag; a task carrying several tags shows up in each.
 * Untagged tasks land in a trailing "(none)" group.
 */
export function groupByTag(tasks: readonly Task[]): TaskGroup[] {
  const byTag = new Map<string, Task[]>();
  for (const task of tasks) {
    const tags = task.tags.length > 0 ? Array.from(new Set(task.tags)) : [NO_GROUP_NAME];
    for (const tag of tags) {
      const bucket = byTag.get(tag) ?? [];
      bucket.push(task);
      byTag.set(tag, bucket);
    }
  }

  return Array.from(byTag.entries())
    .map(([name, grouped]) => ({ name, count: grouped.length, tasks: grouped, depth: 0 }))
    .sort(byNameNoneLast);
}

interface ProjectNode {
  name: string;
  depth: number;
  tasks: Task[];
  children: Map<string, ProjectNode>;
}

function createNode(name: string, depth: number): ProjectNode {
  return { name, depth, tasks: [], children: new Map() };
}

function subtreeTasks(node: ProjectNode): Task[] {
  const out = [...node.tasks];
  for (const child of node.children.values()) out.push(...subtreeTasks(child));
  return out;
}

/**
 * Builds the project hierarchy from dotted names (`a.b.c` under `a.b` under `a`).
 * Each node counts its whole subtree. Percentages come from `summaries` when the
 * backend reported the project. Rows are emitted depth-first, siblings by name,
 * with tasks lacking a project in a trailing "(none)" group.
 */
export function groupByProject(tasks: readonly Task[], summaries: readonly ProjectSummary[] = []): TaskGroup[] {
  const roots = new Map<string, ProjectNode>();
  const unassigned: Task[] = [];

  for (const task of tasks) {
    const parts = (task.project ?? '').split(PROJECT_DELIMITER).filter((p) => p.length > 0);
    if (parts.length === 0) {
      unassigned.push(task);
      continue;
    }
    let level = roots;
    let node: ProjectNode | undefined;
    parts.forEach((_, depth) => {
      const name = parts.slice(0, depth + 1).join(PROJECT_DELIMITER);
      let next = level.get(name);
      if (!next) {
        next = createNode(name, depth);
        level.set(name, next);
      }
      node = next;
      level = next.children;
    });
    node?.tasks.push(task);
  }

  const percentages = new Map(summaries.map((s) => [s.name, s.percentage]));
  const groups: TaskGroup[] = [];

  const emit = (level: Map<string, ProjectNode>): void => {
    const sorted = Array.from(level.values()).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
    for (const node of sorted) {
      const grouped = subtreeTasks(node);
      const group: TaskGroup = { name: node.name, count: grouped.length, tasks: grouped, depth: node.depth };
      const percentage = percentages.get(node.name);
      if (percentage !== undefined) group.percentage = percentage;
      groups.push(group);
      emit(node.children);
    }
  };
  emit(roots);

  if (unassigned.length > 0) {
    groups.push({ name: NO_GROUP_NAME, count: unassigned.length, tasks: unassigned, depth: 0 });
  }
  return groups;
}

export function uniqueProjects(tasks: readonly Task[]): string[] {
  return uniqueSorted(tasks.flatMap((t) => (t.project ? [t.project] : [])));
}

export function uniqueTags(tasks: readonly Task[]): string[] {
  return uniqueSorted(tasks.flatMap((t) => t.tags));
}

function uniqueSorted(values: string[]): string[] {
  const seen = new Map<string, string>();
  for (const v of values) {
    const key = v.toLowerCase();
    if (!seen.has(key)) seen.set(key, v);
  }
  return Array.from(seen.values()).sort((a, b) => {
    const left = a.toLowerCase();
    const right = b.toLowerCase();
    return left < right ? -1 : left > right ? 1 : 0;
  });
}
