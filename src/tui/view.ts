import type { KeyAction } from '../config/loader.js';
import type { Task, TaskGroup } from '../schema/index.js';
import { isSearchSection, SEARCH_EMPTY_MESSAGE } from '../core/sections.js';
import { getTaskProperty, isDueToday, isOverdue, isStarted } from '../core/task-props.js';
import { detailLines } from './detail.js';
import { listViewportHeight, splitWidths } from './layout.js';
import type { TextInputModeKind } from './overlay.js';
import { renderOverlay } from './picker-render.js';
import { fit, fitLine, lineWidth, seg, textWidth, truncateByWidth, type Line, type StyleName } from './segments.js';
import { currentSection, isTextInputMode, type AppState, type Column, type TextInputMode } from './state.js';
import { cursorTask, isSelected, itemCount } from './task-list.js';
import { textBeforeCursor } from './text-input.js';

export interface Screen {
  /** Exactly `height` lines, each exactly `width` columns. */
  lines: Line[];
  /** Floating picker box, 0-based position. */
  popup: { row: number; col: number; lines: Line[] } | null;
  /** Terminal cursor position (0-based) while typing. */
  cursor: { row: number; col: number } | null;
}

const INPUT_LABELS: Record<TextInputModeKind, string> = {
  filterInput: 'Filter: ',
  modifyInput: 'Modify: ',
  annotateInput: 'Annotate: ',
  newTaskInput: 'New task: ',
};

export const ACTION_LABELS: ReadonlyArray<readonly [KeyAction, string]> = [
  ['quit', 'Quit'],
  ['help', 'Toggle help'],
  ['up', 'Move up'],
  ['down', 'Move down'],
  ['page_up', 'Page up'],
  ['page_down', 'Page down'],
  ['first', 'Go to first task'],
  ['last', 'Go to last task'],
  ['next_section', 'Next section'],
  ['prev_section', 'Previous section'],
  ['done', 'Mark done'],
  ['delete', 'Delete'],
  ['edit', 'Edit in $EDITOR'],
  ['modify', 'Modify'],
  ['annotate', 'Annotate'],
  ['new', 'New task'],
  ['undo', 'Undo'],
  ['filter', 'Filter'],
  ['refresh', 'Refresh'],
  ['start_stop', 'Start / stop'],
  ['export_markdown', 'Copy as markdown'],
];

const FIXED_COLUMN_WIDTHS: Record<string, number> = {
  id: 4,
  priority: 2,
  project: 14,
  tags: 14,
  due: 10,
  scheduled: 10,
  wait: 10,
  entry: 10,
  modified: 10,
  start: 10,
  end: 10,
  urgency: 6,
  status: 9,
  uuid: 8,
};
const DEFAULT_COLUMN_WIDTH = 10;
const MIN_DESCRIPTION_WIDTH = 10;

/** Key names back into the short form used in config files. */
export function keyLabel(name: string): string {
  if (name === ' ') return 'space';
  if (Array.from(name).length === 1) return name;
  return name.toLowerCase().replace(/_/g, '+').replace('escape', 'esc');
}

// ---------------------------------------------------------------------------
// Task list

export function columnWidths(columns: readonly Column[], width: number): number[] {
  const fixed = columns.map((c) => (c.name === 'description' ? 0 : FIXED_COLUMN_WIDTHS[c.name] ?? DEFAULT_COLUMN_WIDTH));
  const gaps = Math.max(0, columns.length - 1);
  // Two columns for the selection marker.
  const used = 2 + gaps + fixed.reduce((a, b) => a + b, 0);
  const description = Math.max(MIN_DESCRIPTION_WIDTH, width - used);
  return columns.map((c, i) => (c.name === 'description' ? description : fixed[i] ?? DEFAULT_COLUMN_WIDTH));
}

function cellText(task: Task, column: Column): string {
  const value = getTaskProperty(task, column.name) ?? '';
  if (column.name === 'uuid') return value.slice(0, 8);
  if (column.name === 'tags') return task.tags.map((t) => `+${t}`).join(' ');
  return value;
}

function taskStyle(task: Task, now: Date): StyleName {
  if (task.status === 'completed' || task.status === 'deleted') return 'dim';
  if (isOverdue(task, now)) return 'red';
  if (isStarted(task)) return 'green';
  if (isDueToday(task, now)) return 'yellow';
  return 'text';
}

function headerLine(columns: readonly Column[], widths: readonly number[]): Line {
  const cells = columns.map((c, i) => fit(c.label, widths[i] ?? DEFAULT_COLUMN_WIDTH));
  return [seg('  '), seg(cells.join(' '), 'bold')];
}

export interface RowOptions {
  cursor: boolean;
  selected: boolean;
  now: Date;
}

export function taskRow(task: Task, columns: readonly Column[], widths: readonly number[], options: RowOptions): Line {
  const marker = options.selected ? '* ' : '  ';
  const text = columns.map((c, i) => fit(cellText(task, c), widths[i] ?? DEFAULT_COLUMN_WIDTH)).join(' ');
  if (options.cursor) return [seg(`${marker}${text}`, 'inverse')];
  return [seg(marker, 'magenta'), seg(text, taskStyle(task, options.now))];
}

export function groupRow(group: TaskGroup, width: number, cursor: boolean): Line {
  const pct = group.percentage !== undefined ? `${group.percentage}%` : '';
  const right = `${String(group.count).padStart(4)} ${pct.padStart(4)}`;
  const name = fit(`${'  '.repeat(group.depth)}${group.name}`, Math.max(1, width - 2 - textWidth(right) - 1));
  const text = `  ${name} ${right}`;
  return [seg(text, cursor ? 'inverse' : group.depth === 0 ? 'bold' : 'text')];
}

function listArea(state: AppState, width: number, rows: number, now: Date): Line[] {
  const { list } = state;
  const lines: Line[] = [];

  if (list.display.kind === 'grouped') {
    const groupLabel = list.display.groupKind === 'project' ? 'Project' : 'Tag';
    lines.push([seg(fit(`  ${groupLabel}`, width - 10), 'bold'), seg(' Tasks    %', 'bold')]);
    const groups = list.display.groups.slice(list.scroll, list.scroll + rows);
    groups.forEach((g, i) => lines.push(groupRow(g, width, list.scroll + i === list.cursor)));
  } else {
    const columns = state.settings.columns;
    const widths = columnWidths(columns, width);
    lines.push(headerLine(columns, widths));
    const tasks = list.rows.slice(list.scroll, list.scroll + rows);
    tasks.forEach((task, i) =>
      lines.push(
        taskRow(task, columns, widths, {
          cursor: list.scroll + i === list.cursor,
          selected: isSelected(list, task.uuid),
          now,
        })
      )
    );
  }

  if (itemCount(list) === 0) {
    if (isSearchSection(currentSection(state)) && state.activeFilter === '') {
      for (const text of SEARCH_EMPTY_MESSAGE) lines.push([seg(`  ${text}`, 'dim')]);
    } else {
      lines.push([seg(state.loading ? '  Loading...' : '  No tasks', 'dim')]);
    }
  }
  return lines;
}

function detailArea(state: AppState, width: number, rows: number, now: Date): Line[] {
  const task = cursorTask(state.list);
  const lines: Line[] = [[seg(' Details', 'bold')]];
  if (!task) {
    lines.push([seg(' No task selected', 'dim')]);
    return lines;
  }
  const body = detailLines(task, Math.max(1, width - 2), now);
  const scroll = Math.min(state.detailScroll, Math.max(0, body.length - rows));
  for (const text of body.slice(scroll, scroll + rows)) lines.push([seg(` ${text}`)]);
  return lines;
}

/** Pads or clips a block of lines to exactly `rows` x `width`. */
function block(lines: readonly Line[], rows: number, width: number): Line[] {
  const out: Line[] = [];
  for (let i = 0; i < rows; i++) out.push(fitLine(lines[i] ?? [], width));
  return out;
}

// ---------------------------------------------------------------------------
// Chrome

export function sectionBar(state: AppState, width: number): Line {
  const line: Line = [];
  state.sections.forEach((section, i) => {
    const label = ` ${i + 1}:${section.name} `;
    line.push(seg(label, i === state.sectionIndex ? 'inverse' : 'text'));
  });
  if (state.loading) line.push(seg('  loading...', 'dim'));
  return fitLine(line, width);
}

export function statusLine(state: AppState): Line {
  if (state.mode.kind === 'confirm') {
    const n = state.mode.action.uuids.length;
    return [seg(`Delete ${n} task${n === 1 ? '' : 's'}? (y/n)`, 'yellow')];
  }
  if (state.message) {
    return [seg(state.message.text, state.message.level === 'error' ? 'red' : 'green')];
  }

  const parts: string[] = [];
  const section = currentSection(state);
  if (section) parts.push(section.name);
  const display = state.list.display;
  if (display.kind === 'drilled') parts.push(display.group.name);
  const count = display.kind === 'grouped' ? display.groups.length : state.list.rows.length;
  parts.push(display.kind === 'grouped' ? `${count} groups` : `${count} tasks`);
  if (state.list.selected.length > 0) parts.push(`${state.list.selected.length} selected`);
  if (state.activeFilter !== '') parts.push(`filter: ${state.activeFilter}`);
  return [seg(parts.join(' · '), 'dim')];
}

export function hintLine(state: AppState): Line {
  const mode = state.mode;
  if (isTextInputMode(mode)) {
    if (mode.overlay) return [seg('enter insert  esc close', 'dim')];
    const tab = mode.kind === 'annotateInput' ? '' : '  tab complete';
    const history = mode.kind === 'filterInput' ? '  up/down history' : '';
    return [seg(`enter submit  esc cancel${tab}${history}`, 'dim')];
  }
  if (mode.kind === 'confirm') return [seg('y confirm  n/esc cancel', 'dim')];
  if (mode.kind === 'help') return [seg('esc/q/? close  j/k scroll', 'dim')];

  const k = state.settings.keymap;
  const hints: Array<[string, string]> = [
    [keyLabel(k.help), 'help'],
    [keyLabel(k.filter), 'filter'],
    ['space', 'select'],
    ['enter', state.list.display.kind === 'grouped' ? 'open' : 'details'],
    [keyLabel(k.done), 'done'],
    [keyLabel(k.new), 'new'],
    [keyLabel(k.quit), 'quit'],
  ];
  return [seg(hints.map(([key, label]) => `${key} ${label}`).join('  '), 'dim')];
}

function inputLine(mode: TextInputMode, width: number): { line: Line; cursorCol: number } {
  const label = INPUT_LABELS[mode.kind];
  const labelWidth = textWidth(label);
  const room = Math.max(1, width - labelWidth - 1);
  const before = textBeforeCursor(mode.input);

  // Scroll horizontally so the cursor stays on screen.
  const chars = Array.from(mode.input.value);
  let start = 0;
  while (textWidth(chars.slice(start, mode.input.cursor).join('')) > room) start++;
  const shown = truncateByWidth(chars.slice(start).join(''), room);
  const cursorCol = labelWidth + textWidth(Array.from(before).slice(start).join(''));
  return { line: [seg(label, 'bold'), seg(shown)], cursorCol };
}

// ---------------------------------------------------------------------------
// Help

export function helpLines(state: AppState): Line[] {
  const k = state.settings.keymap;
  const row = (key: string, label: string): Line => [seg(`  ${key.padEnd(12)}`, 'cyan'), seg(label)];
  const lines: Line[] = [[seg('Keybindings', 'bold')], []];
  for (const [action, label] of ACTION_LABELS) lines.push(row(keyLabel(k[action]), label));
  lines.push(
    [],
    [seg('Navigation', 'bold')],
    [],
    row('tab / l', 'Next section'),
    row('shift+tab / h', 'Previous section'),
    row('1-9', 'Jump to section (or visible row)'),
    row('space', 'Select task'),
    row('enter', 'Details / open group'),
    row('esc', 'Back / clear selection'),
    row('J / K', 'Scroll details'),
    row('ctrl+c', 'Quit')
  );

  if (state.settings.customCommands.size > 0) {
    lines.push([], [seg('Custom commands', 'bold')], []);
    for (const [key, command] of state.settings.customCommands) {
      lines.push(row(keyLabel(key), command.description ?? command.name));
    }
  }

  lines.push(
    [],
    [seg('Completion (tab while typing)', 'bold')],
    [],
    row('project:', 'Project list'),
    row('+', 'Tag list'),
    row('due:', 'Calendar'),
    row('due:DATE', 'Time picker')
  );
  return lines;
}

// ---------------------------------------------------------------------------

export function renderScreen(state: AppState, now: Date): Screen {
  const { width, height } = state;

  if (state.mode.kind === 'help') {
    const content = helpLines(state);
    const rows = Math.max(1, height - 1);
    const scroll = Math.min(state.mode.scroll, Math.max(0, content.length - rows));
    return {
      lines: [...block(content.slice(scroll), rows, width), fitLine(hintLine(state), width)],
      popup: null,
      cursor: null,
    };
  }

  const mode = state.mode;
  const inputActive = isTextInputMode(mode);
  const rows = listViewportHeight(height, { inputActive });
  const lines: Line[] = [sectionBar(state, width)];

  const split = splitWidths(state.layout, width, state.settings.sidebarPercent);
  if (state.layout === 'smallTaskDetail') {
    lines.push(...block(detailArea(state, width, rows, now), rows + 1, width));
  } else if (split.detail > 0) {
    const left = block(listArea(state, split.list, rows, now), rows + 1, split.list);
    const right = block(detailArea(state, split.detail, rows, now), rows + 1, split.detail);
    left.forEach((line, i) => lines.push([...line, seg('│', 'dim'), ...(right[i] ?? [])]));
  } else {
    lines.push(...block(listArea(state, width, rows, now), rows + 1, width));
  }

  let cursor: Screen['cursor'] = null;
  let popup: Screen['popup'] = null;
  if (isTextInputMode(mode)) {
    lines.push([seg('─'.repeat(width), 'dim')]);
    const input = inputLine(mode, width);
    lines.push(fitLine(input.line, width));
    const inputRow = lines.length - 1;

    if (mode.overlay) {
      const box = renderOverlay(mode.overlay, width);
      const boxWidth = Math.max(...box.map(lineWidth));
      popup = {
        row: Math.max(1, inputRow - 1 - box.length),
        col: Math.max(0, Math.min(input.cursorCol, width - boxWidth)),
        lines: box,
      };
    } else {
      cursor = { row: inputRow, col: Math.min(width - 1, input.cursorCol) };
    }
  }

  lines.push(fitLine(statusLine(state), width), fitLine(hintLine(state), width));
  return { lines: block(lines, height, width), popup, cursor };
}
