import type { ProjectSummary, SortMethod, Task, TaskGroup } from '../schema/index.js';
import type { GroupKind } from '../core/sections.js';
import { groupByProject, groupByTag } from '../core/grouping.js';
import { sortTasks } from '../core/task-sort.js';

export type ListDisplay =
  | { kind: 'flat' }
  | { kind: 'grouped'; groupKind: GroupKind; groups: readonly TaskGroup[] }
  | { kind: 'drilled'; groupKind: GroupKind; group: TaskGroup };

export interface ListOrdering {
  sort?: SortMethod;
  reverse: boolean;
}

export interface TaskListState {
  /** Everything the last successful load returned. */
  allTasks: readonly Task[];
  /** Tasks shown in flat or drilled display, ordered. */
  rows: readonly Task[];
  display: ListDisplay;
  cursor: number;
  /** First visible row. */
  scroll: number;
  /** Marked task uuids, in marking order. */
  selected: readonly string[];
  ordering: ListOrdering;
}

export function createTaskList(groupKind: GroupKind | null = null, ordering: ListOrdering = { reverse: false }): TaskListState {
  return {
    allTasks: [],
    rows: [],
    display: groupKind ? { kind: 'grouped', groupKind, groups: [] } : { kind: 'flat' },
    cursor: 0,
    scroll: 0,
    selected: [],
    ordering,
  };
}

export function computeGroups(
  groupKind: GroupKind,
  tasks: readonly Task[],
  summaries: readonly ProjectSummary[]
): TaskGroup[] {
  return groupKind === 'tag' ? groupByTag(tasks) : groupByProject(tasks, summaries);
}

function order(tasks: readonly Task[], ordering: ListOrdering): Task[] {
  return sortTasks(tasks, ordering.sort, ordering.reverse);
}

export function itemCount(state: TaskListState): number {
  return state.display.kind === 'grouped' ? state.display.groups.length : state.rows.length;
}

function clampCursor(state: TaskListState, cursor: number): number {
  const count = itemCount(state);
  if (count === 0) return 0;
  return Math.max(0, Math.min(cursor, count - 1));
}

export function isGroupedView(state: TaskListState): boolean {
  return state.display.kind === 'grouped';
}

export function cursorTask(state: TaskListState): Task | null {
  if (state.display.kind === 'grouped') return null;
  return state.rows[state.cursor] ?? null;
}

export function cursorGroup(state: TaskListState): TaskGroup | null {
  if (state.display.kind !== 'grouped') return null;
  return state.display.groups[state.cursor] ?? null;
}

/**
 * Section switch: back to the top with no selection, and grouped display for
 * the grouped sections.
 */
export function resetForSection(state: TaskListState, groupKind: GroupKind | null, ordering: ListOrdering): TaskListState {
  return {
    ...state,
    display: groupKind ? { kind: 'grouped', groupKind, groups: [] } : { kind: 'flat' },
    cursor: 0,
    scroll: 0,
    selected: [],
    ordering,
  };
}

/**
 * Replaces the collection wholesale after a load. Grouped display regroups
 * the full set; a drilled group is re-derived from it by name.
 */
export function setTasks(
  state: TaskListState,
  tasks: readonly Task[],
  summaries: readonly ProjectSummary[] = []
): TaskListState {
  const display = state.display;
  let next: TaskListState;

  if (display.kind === 'grouped') {
    next = {
      ...state,
      allTasks: tasks,
      rows: [],
      display: { ...display, groups: computeGroups(display.groupKind, tasks, summaries) },
    };
  } else if (display.kind === 'drilled') {
    const group =
      computeGroups(display.groupKind, tasks, summaries).find((g) => g.name === display.group.name) ??
      { ...display.group, count: 0, tasks: [] };
    next = { ...state, allTasks: tasks, rows: order(group.tasks, state.ordering), display: { ...display, group } };
  } else {
    next = { ...state, allTasks: tasks, rows: order(tasks, state.ordering) };
  }

  const present = new Set(next.rows.map((t) => t.uuid));
  return {
    ...next,
    cursor: next.cursor >= itemCount(next) ? 0 : next.cursor,
    selected: next.selected.filter((uuid) => present.has(uuid)),
  };
}

/**
 * Refreshes project groups once completion percentages arrive.
 */
export function applyProjectSummary(state: TaskListState, summaries: readonly ProjectSummary[]): TaskListState {
  const display = state.display;
  if (display.kind !== 'grouped' || display.groupKind !== 'project') return state;
  const next: TaskListState = {
    ...state,
    display: { ...display, groups: computeGroups('project', state.allTasks, summaries) },
  };
  return { ...next, cursor: clampCursor(next, next.cursor) };
}

export function moveCursor(state: TaskListState, delta: number): TaskListState {
  return { ...state, cursor: clampCursor(state, state.cursor + delta) };
}

export function moveCursorTo(state: TaskListState, index: number): TaskListState {
  return { ...state, cursor: clampCursor(state, index) };
}

export function toggleSelection(state: TaskListState): TaskListState {
  const task = cursorTask(state);
  if (!task) return state;
  const selected = state.selected.includes(task.uuid)
    ? state.selected.filter((uuid) => uuid !== task.uuid)
    : [...state.selected, task.uuid];
  return { ...state, selected };
}

export function clearSelection(state: TaskListState): TaskListState {
  return state.selected.length === 0 ? state : { ...state, selected: [] };
}

export function hasSelection(state: TaskListState): boolean {
  return state.selected.length > 0;
}

export function isSelected(state: TaskListState, uuid: string): boolean {
  return state.selected.includes(uuid);
}

/**
 * Marked tasks in list order, or the task under the cursor when nothing is
 * marked. Empty in grouped display.
 */
export function selectedTasks(state: TaskListState): Task[] {
  if (state.display.kind === 'grouped') return [];
  if (state.selected.length === 0) {
    const task = cursorTask(state);
    return task ? [task] : [];
  }
  const marked = new Set(state.selected);
  return state.rows.filter((t) => marked.has(t.uuid));
}

export function drillDown(state: TaskListState): TaskListState {
  const display = state.display;
  const group = cursorGroup(state);
  if (display.kind !== 'grouped' || !group) return state;
  return {
    ...state,
    rows: order(group.tasks, state.ordering),
    display: { kind: 'drilled', groupKind: display.groupKind, group },
    cursor: 0,
    scroll: 0,
    selected: [],
  };
}

/**
 * Leaves a drilled group and regroups the full loaded set.
 */
export function backToGroups(state: TaskListState, summaries: readonly ProjectSummary[] = []): TaskListState {
  const display = state.display;
  if (display.kind !== 'drilled') return state;
  const groups = computeGroups(display.groupKind, state.allTasks, summaries);
  const index = groups.findIndex((g) => g.name === display.group.name);
  return {
    ...state,
    rows: [],
    display: { kind: 'grouped', groupKind: display.groupKind, groups },
    cursor: Math.max(0, index),
    scroll: 0,
    selected: [],
  };
}

/**
 * Scrolls just enough to keep the cursor inside a viewport of `height` rows.
 */
export function keepCursorVisible(state: TaskListState, height: number): TaskListState {
  const count = itemCount(state);
  const rows = Math.max(1, height);
  let scroll = state.scroll;
  if (state.cursor < scroll) scroll = state.cursor;
  else if (state.cursor >= scroll + rows) scroll = state.cursor - rows + 1;
  scroll = Math.max(0, Math.min(scroll, Math.max(0, count - rows)));
  return scroll === state.scroll ? state : { ...state, scroll };
}

/**
 * Jumps to the n-th visible row (1-based). Out-of-range numbers are ignored.
 */
export function quickJump(state: TaskListState, n: number, height: number): TaskListState {
  const target = state.scroll + n - 1;
  if (n < 1 || n > Math.max(1, height) || target >= itemCount(state)) return state;
  return { ...state, cursor: target };
}
