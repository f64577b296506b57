import type { KeyAction } from '../config/loader.js';
import type { ProjectSummary, Task } from '../schema/index.js';
import { effectiveFilter, groupKindOf, isSearchSection } from '../core/sections.js';
import { tasksToMarkdown } from '../core/task-props.js';
import type { Command, LoadOrigin, Mutation } from './commands.js';
import { expandTemplate, parseCommandLine, TemplateError } from './custom-command.js';
import { detailLines } from './detail.js';
import type { AppEvent, Outcome, StatusLevel } from './events.js';
import { detectFieldContext } from './field-context.js';
import { addToHistory, historyDown, historyUp, resetHistoryWalk } from './filter-history.js';
import { digitOf, isSpaceKeyName } from './key-utils.js';
import { keyMatches } from './keymap.js';
import { deriveLayout, listViewportHeight, splitWidths } from './layout.js';
import { openOverlay, routeOverlayKey, type CompletionSources, type TextInputModeKind } from './overlay.js';
import { currentSection, isTextInputMode, type AppState, type Mode, type TextInputMode } from './state.js';
import {
  applyProjectSummary,
  backToGroups,
  clearSelection,
  cursorTask,
  drillDown,
  hasSelection,
  isGroupedView,
  keepCursorVisible,
  moveCursor,
  moveCursorTo,
  quickJump,
  resetForSection,
  selectedTasks,
  setTasks,
  toggleSelection,
  type TaskListState,
} from './task-list.js';
import { applyTextInputKey, createTextInput } from './text-input.js';

export type Transition = [AppState, Command[]];

const NORMAL: Mode = { kind: 'normal' };

const MAX_SECTION_DIGIT = 5;
const SECTION_NEXT_KEYS = new Set(['TAB', 'l', 'RIGHT']);
const SECTION_PREV_KEYS = new Set(['SHIFT_TAB', 'h', 'LEFT']);
const HELP_CLOSE_KEYS = new Set(['ESCAPE', 'q', '?']);

export function listHeight(state: AppState): number {
  return listViewportHeight(state.height, { inputActive: isTextInputMode(state.mode) });
}

function withList(state: AppState, list: TaskListState): AppState {
  const before = cursorTask(state.list)?.uuid;
  const after = cursorTask(list)?.uuid;
  return {
    ...state,
    list: keepCursorVisible(list, listHeight(state)),
    detailScroll: before === after ? state.detailScroll : 0,
  };
}

function withMessage(state: AppState, level: StatusLevel, text: string): AppState {
  return { ...state, message: { level, text } };
}

function onSearchTab(state: AppState): boolean {
  return isSearchSection(currentSection(state));
}

function loadTasks(state: AppState, origin: LoadOrigin): Transition {
  const requestId = state.latestLoadId + 1;
  return [
    { ...state, latestLoadId: requestId, loading: true },
    [{ kind: 'loadTasks', requestId, origin, filter: effectiveFilter(state.activeFilter, onSearchTab(state)) }],
  ];
}

/** Commands to run once at startup. */
export function initialize(state: AppState): Transition {
  const [next, commands] = loadTasks(state, 'startup');
  return [next, [...commands, { kind: 'loadCompletions' }]];
}

export function transition(state: AppState, event: AppEvent): Transition {
  switch (event.kind) {
    case 'key':
      return handleKey(state, event.name, event.at);
    case 'resize':
      return [applyResize(state, event.width, event.height), []];
    case 'tasksLoaded':
      return onTasksLoaded(state, event.requestId, event.origin, event.result);
    case 'projectSummaryLoaded':
      return onProjectSummary(state, event.result);
    case 'completionsLoaded':
      return [{ ...state, completions: event.result.ok ? event.result.value : { projects: [], tags: [] } }, []];
    case 'mutationCompleted':
      return onMutationCompleted(state, event.error);
    case 'status':
      return [withMessage(state, event.level, event.text), []];
  }
}

// ---------------------------------------------------------------------------
// Results

function applyResize(state: AppState, width: number, height: number): AppState {
  const next: AppState = {
    ...state,
    width,
    height,
    layout: deriveLayout(state.layout, state.preferredLayout, width),
  };
  return { ...next, list: keepCursorVisible(next.list, listHeight(next)) };
}

function onTasksLoaded(
  state: AppState,
  requestId: number,
  origin: LoadOrigin,
  result: Outcome<Task[]>
): Transition {
  if (requestId < state.latestLoadId) return [state, []];
  const loaded: AppState = { ...state, loading: false };

  if (!result.ok) {
    const failed = withMessage(loaded, 'error', `Failed to load tasks: ${result.error}`);
    if (origin === 'filter' && failed.mode.kind === 'normal') {
      return [{ ...failed, mode: { kind: 'filterInput', input: createTextInput(failed.activeFilter), overlay: null } }, []];
    }
    return [failed, []];
  }

  const message = loaded.message?.level === 'error' ? null : loaded.message;
  const next = withList({ ...loaded, message }, setTasks(loaded.list, result.value, loaded.summaries));
  const display = next.list.display;
  if (display.kind === 'grouped' && display.groupKind === 'project') {
    return [next, [{ kind: 'loadProjectSummary' }]];
  }
  return [next, []];
}

function onProjectSummary(state: AppState, result: Outcome<ProjectSummary[]>): Transition {
  if (!result.ok) return [withMessage(state, 'error', `Failed to load project summary: ${result.error}`), []];
  return [withList({ ...state, summaries: result.value }, applyProjectSummary(state.list, result.value)), []];
}

function onMutationCompleted(state: AppState, error: string | null): Transition {
  if (error !== null) {
    return [withMessage({ ...state, loading: false }, 'error', `Task operation failed: ${error}`), []];
  }
  const [next, commands] = loadTasks(withMessage(state, 'info', 'Task updated successfully'), 'mutation');
  return [next, [...commands, { kind: 'loadCompletions' }]];
}

// ---------------------------------------------------------------------------
// Keys

function handleKey(state: AppState, name: string, at: Date): Transition {
  if (name === 'CTRL_C') return [{ ...state, quitting: true }, []];

  const mode = state.mode;
  if (isTextInputMode(mode)) {
    if (mode.overlay) {
      const routed = routeOverlayKey(mode.overlay, mode.input, name, at);
      return [{ ...state, mode: { ...mode, input: routed.buffer, overlay: routed.overlay } }, []];
    }
    return handleTextInputKey(state, mode, name, at);
  }

  switch (mode.kind) {
    case 'help':
      return [handleHelpKey(state, mode.scroll, name), []];
    case 'confirm':
      return handleConfirmKey(state, mode.action.uuids, name);
    case 'normal':
      return handleNormalKey(state, name, at);
  }
}

function handleHelpKey(state: AppState, scroll: number, name: string): AppState {
  if (HELP_CLOSE_KEYS.has(name)) return { ...state, mode: NORMAL };
  if (name === 'UP' || name === 'k') return { ...state, mode: { kind: 'help', scroll: Math.max(0, scroll - 1) } };
  if (name === 'DOWN' || name === 'j') return { ...state, mode: { kind: 'help', scroll: scroll + 1 } };
  return state;
}

function handleConfirmKey(state: AppState, uuids: string[], name: string): Transition {
  if (name === 'y' || name === 'Y') {
    const mutations: Mutation[] = uuids.map((uuid) => ({ kind: 'delete', uuid }));
    return [{ ...state, mode: NORMAL, list: clearSelection(state.list) }, [{ kind: 'mutate', mutations }]];
  }
  if (name === 'ESCAPE' || name === 'n' || name === 'N') {
    return [{ ...state, mode: NORMAL }, []];
  }
  return [state, []];
}

function openInput(state: AppState, kind: TextInputModeKind, initial = ''): AppState {
  const next: AppState = { ...state, mode: { kind, input: createTextInput(initial), overlay: null } };
  // The input panel shrinks the list viewport.
  return { ...next, list: keepCursorVisible(next.list, listHeight(next)) };
}

function closeInput(state: AppState): AppState {
  const next: AppState = { ...state, mode: NORMAL, history: resetHistoryWalk(state.history) };
  return { ...next, list: keepCursorVisible(next.list, listHeight(next)) };
}

/** Tab opens the picker matching the text before the cursor. Annotations get no completion. */
function tryComplete(state: AppState, mode: TextInputMode, at: Date): AppState {
  if (mode.kind === 'annotateInput') return state;
  const context = detectFieldContext(mode.input.value, mode.input.cursor);
  if (!context) return state;
  const sources: CompletionSources = state.completions;
  return { ...state, mode: { ...mode, overlay: openOverlay(context, mode.kind, sources, at) } };
}

function handleTextInputKey(state: AppState, mode: TextInputMode, name: string, at: Date): Transition {
  if (name === 'ESCAPE') return [closeInput(state), []];
  if (name === 'TAB') return [tryComplete(state, mode, at), []];
  if (name === 'ENTER') return submitInput(state, mode);

  if (mode.kind === 'filterInput' && (name === 'UP' || name === 'DOWN')) {
    const step = name === 'UP' ? historyUp(state.history, mode.input.value) : historyDown(state.history);
    if (!step) return [state, []];
    return [{ ...state, history: step.history, mode: { ...mode, input: createTextInput(step.value) } }, []];
  }

  const update = applyTextInputKey(mode.input, name);
  if (!update) return [state, []];
  const history = update.didChangeValue ? resetHistoryWalk(state.history) : state.history;
  return [{ ...state, history, mode: { ...mode, input: update.state } }, []];
}

function submitInput(state: AppState, mode: TextInputMode): Transition {
  const text = mode.input.value;
  switch (mode.kind) {
    case 'filterInput': {
      const searchTab = onSearchTab(state);
      const next: AppState = {
        ...closeInput(state),
        history: addToHistory(state.history, text),
        activeFilter: text.trim(),
        searchFilter: searchTab ? text.trim() : state.searchFilter,
      };
      return loadTasks(next, 'filter');
    }
    case 'modifyInput':
    case 'annotateInput': {
      const closed = closeInput(state);
      const tasks = selectedTasks(state.list);
      if (text.trim() === '' || tasks.length === 0) return [closed, []];
      const kind = mode.kind === 'modifyInput' ? 'modify' : 'annotate';
      const mutations: Mutation[] = tasks.map((t) => ({ kind, uuid: t.uuid, text: text.trim() }));
      return [{ ...closed, list: clearSelection(closed.list) }, [{ kind: 'mutate', mutations }]];
    }
    case 'newTaskInput': {
      const closed = closeInput(state);
      if (text.trim() === '') return [closed, []];
      return [closed, [{ kind: 'create', description: text.trim() }]];
    }
  }
}

export function changeSection(state: AppState, index: number): Transition {
  const section = state.sections[index];
  if (!section) return [state, []];
  const search = isSearchSection(section);
  const list = resetForSection(state.list, groupKindOf(section), {
    sort: section.sort,
    reverse: section.reverse ?? false,
  });
  return loadTasks(
    {
      ...state,
      sectionIndex: index,
      list,
      activeFilter: search ? state.searchFilter : section.filter,
      message: null,
      detailScroll: 0,
    },
    'section'
  );
}

function cycleSection(state: AppState, delta: number): Transition {
  const count = state.sections.length;
  if (count === 0) return [state, []];
  return changeSection(state, (state.sectionIndex + delta + count) % count);
}

function templateFailure(state: AppState, prefix: string, error: unknown): AppState {
  if (error instanceof TemplateError) return withMessage(state, 'error', `${prefix}: ${error.message}`);
  throw error;
}

function runCustomCommand(state: AppState, name: string): Transition | null {
  const custom = state.settings.customCommands.get(name);
  if (!custom) return null;
  if (isGroupedView(state.list)) return [state, []];

  const task = cursorTask(state.list);
  if (!task) return [withMessage(state, 'info', 'No task selected'), []];

  let expanded: string;
  try {
    expanded = expandTemplate(custom.command, task);
  } catch (error) {
    return [templateFailure(state, 'Command expansion failed', error), []];
  }
  let argv: string[];
  try {
    argv = parseCommandLine(expanded);
  } catch (error) {
    return [templateFailure(state, 'Command parsing failed', error), []];
  }

  if (argv.length === 0) return [withMessage(state, 'error', 'Empty command after expansion'), []];
  return [state, [{ kind: 'runCustomCommand', name: custom.name, argv }]];
}

function navigate(state: AppState, name: string): AppState | null {
  const keymap = state.settings.keymap;
  const half = Math.max(1, Math.floor(listHeight(state) / 2));
  if (keyMatches(keymap, name, 'up') || name === 'UP') return withList(state, moveCursor(state.list, -1));
  if (keyMatches(keymap, name, 'down') || name === 'DOWN') return withList(state, moveCursor(state.list, 1));
  if (keyMatches(keymap, name, 'first') || name === 'HOME') return withList(state, moveCursorTo(state.list, 0));
  if (keyMatches(keymap, name, 'last') || name === 'END') {
    return withList(state, moveCursorTo(state.list, Number.MAX_SAFE_INTEGER));
  }
  if (keyMatches(keymap, name, 'page_up')) return withList(state, moveCursor(state.list, -half));
  if (keyMatches(keymap, name, 'page_down')) return withList(state, moveCursor(state.list, half));
  return null;
}

function detailVisible(state: AppState): boolean {
  return state.layout === 'listWithSidebar' || state.layout === 'smallTaskDetail';
}

function scrollDetail(state: AppState, name: string, at: Date): AppState | null {
  const height = listHeight(state);
  const half = Math.max(1, Math.floor(height / 2));
  const steps: Record<string, number> = {
    J: 1,
    K: -1,
    CTRL_D: half,
    CTRL_U: -half,
    CTRL_F: height,
    CTRL_B: -height,
    PAGE_DOWN: height,
    PAGE_UP: -height,
  };
  const step = steps[name];
  if (step === undefined) return null;

  const task = cursorTask(state.list);
  const width = splitWidths(state.layout, state.width, state.settings.sidebarPercent).detail;
  const total = task ? detailLines(task, Math.max(1, width - 2), at).length : 0;
  const max = Math.max(0, total - height);
  return { ...state, detailScroll: Math.max(0, Math.min(max, state.detailScroll + step)) };
}

function handleEscape(state: AppState): AppState {
  if (state.layout === 'smallTaskDetail') return { ...state, layout: 'small' };
  if (hasSelection(state.list)) return { ...state, list: clearSelection(state.list) };
  if (state.list.display.kind === 'drilled') return withList(state, backToGroups(state.list, state.summaries));
  return state;
}

function handleEnter(state: AppState): AppState {
  if (state.list.display.kind === 'grouped') {
    return state.list.display.groups.length > 0 ? withList(state, drillDown(state.list)) : state;
  }
  switch (state.layout) {
    case 'small':
      return { ...state, layout: 'smallTaskDetail', detailScroll: 0 };
    case 'list':
      return { ...state, layout: 'listWithSidebar', preferredLayout: 'listWithSidebar', detailScroll: 0 };
    case 'listWithSidebar':
      return { ...state, layout: 'list', preferredLayout: 'list' };
    case 'smallTaskDetail':
      return state;
  }
}

function handleNormalKey(state: AppState, name: string, at: Date): Transition {
  const keymap = state.settings.keymap;
  const is = (action: KeyAction) => keyMatches(keymap, name, action);

  if (is('quit')) return [{ ...state, quitting: true }, []];
  if (is('help')) return [{ ...state, mode: { kind: 'help', scroll: 0 } }, []];

  if (isSpaceKeyName(name)) {
    return [isGroupedView(state.list) ? state : { ...state, list: toggleSelection(state.list) }, []];
  }
  if (name === 'ESCAPE') return [handleEscape(state), []];

  if (is('filter')) {
    const initial = state.activeFilter !== '' ? `${state.activeFilter} ` : '';
    return [{ ...openInput(state, 'filterInput', initial), history: resetHistoryWalk(state.history) }, []];
  }
  if (is('refresh')) return loadTasks(state, 'refresh');
  if (name === 'ENTER') return [handleEnter(state), []];

  if (is('done')) {
    const tasks = selectedTasks(state.list);
    if (tasks.length === 0) return [state, []];
    const mutations: Mutation[] = tasks.map((t) => ({ kind: 'complete', uuid: t.uuid }));
    return [{ ...state, list: clearSelection(state.list) }, [{ kind: 'mutate', mutations }]];
  }
  if (is('start_stop')) {
    const tasks = selectedTasks(state.list);
    if (tasks.length === 0) return [state, []];
    const mutations: Mutation[] = tasks.map((t) => ({ kind: t.start ? 'stop' : 'start', uuid: t.uuid }));
    return [{ ...state, list: clearSelection(state.list) }, [{ kind: 'mutate', mutations }]];
  }
  if (is('delete')) {
    const tasks = selectedTasks(state.list);
    if (tasks.length === 0) return [state, []];
    return [{ ...state, mode: { kind: 'confirm', action: { kind: 'delete', uuids: tasks.map((t) => t.uuid) } } }, []];
  }
  if (is('undo')) return [state, [{ kind: 'undo' }]];
  if (is('new')) return [openInput(state, 'newTaskInput'), []];
  if (is('modify')) {
    return [selectedTasks(state.list).length > 0 ? openInput(state, 'modifyInput') : state, []];
  }
  if (is('export_markdown')) {
    const tasks = selectedTasks(state.list);
    if (tasks.length === 0) return [state, []];
    return [{ ...state, list: clearSelection(state.list) }, [{ kind: 'copyToClipboard', text: tasksToMarkdown(tasks) }]];
  }
  if (is('annotate')) {
    return [selectedTasks(state.list).length > 0 ? openInput(state, 'annotateInput') : state, []];
  }
  if (is('edit')) {
    const task = cursorTask(state.list);
    return [state, task ? [{ kind: 'editTask', uuid: task.uuid }] : []];
  }

  if (SECTION_NEXT_KEYS.has(name) || is('next_section')) return cycleSection(state, 1);
  if (SECTION_PREV_KEYS.has(name) || is('prev_section')) return cycleSection(state, -1);

  const digit = digitOf(name);
  if (digit !== null && digit > 0) {
    if (digit <= MAX_SECTION_DIGIT && digit <= state.sections.length) return changeSection(state, digit - 1);
    return [withList(state, quickJump(state.list, digit, listHeight(state))), []];
  }

  const custom = runCustomCommand(state, name);
  if (custom) return custom;

  const moved = navigate(state, name);
  if (moved) return [moved, []];

  if (detailVisible(state)) {
    const scrolled = scrollDetail(state, name, at);
    if (scrolled) return [scrolled, []];
  }
  return [state, []];
}
