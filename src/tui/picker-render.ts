import type { Overlay } from './overlay.js';
import { monthGrid, type CalendarState } from './pickers/calendar.js';
import { visibleItems, type ListPickerState } from './pickers/list-picker.js';
import type { TimePickerState } from './pickers/time-picker.js';
import { fitLine, lineWidth, seg, type Line } from './segments.js';

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

function center(text: string, width: number): string {
  const left = Math.max(0, Math.floor((width - text.length) / 2));
  return ' '.repeat(left) + text;
}

function calendarLines(state: CalendarState): Line[] {
  const { cursor, today } = state;
  const title = `${MONTH_NAMES[cursor.month - 1] ?? ''} ${cursor.year}`;
  const lines: Line[] = [[seg(center(title, 20), 'bold')], [seg('Su Mo Tu We Th Fr Sa', 'dim')]];

  for (const week of monthGrid(state)) {
    const line: Line = [];
    week.forEach((day, i) => {
      if (i > 0) line.push(seg(' '));
      if (day === null) {
        line.push(seg('  '));
        return;
      }
      const label = String(day).padStart(2, ' ');
      const isToday = day === today.day && cursor.month === today.month && cursor.year === today.year;
      if (day === cursor.day) line.push(seg(label, 'inverse'));
      else line.push(seg(label, isToday ? 'cyan' : 'text'));
    });
    lines.push(line);
  }

  lines.push([]);
  if (state.editing) {
    lines.push([seg('Date: '), seg(state.editing.value, 'bold'), seg('_', 'dim')]);
    lines.push([seg('enter accept  esc back', 'dim')]);
  } else {
    lines.push([seg('h/l day  j/k week', 'dim')]);
    lines.push([seg('b/n month  t today  e type', 'dim')]);
  }
  return lines;
}

function timeLines(state: TimePickerState): Line[] {
  const hour = String(state.hour).padStart(2, '0');
  const minute = String(state.minute).padStart(2, '0');
  return [
    [seg('Time', 'bold')],
    [],
    [
      seg('  '),
      seg(hour, state.focus === 'hour' ? 'inverse' : 'text'),
      seg(' : '),
      seg(minute, state.focus === 'minute' ? 'inverse' : 'text'),
    ],
    [],
    [seg('j/k change  h/l field', 'dim')],
    [seg('n now', 'dim')],
  ];
}

function listLines(state: ListPickerState): Line[] {
  const lines: Line[] = [[seg(state.title, 'bold')]];
  if (state.filter !== '') lines.push([seg(`matching "${state.filter}"`, 'dim')]);
  if (state.matches.length === 0) {
    lines.push([seg('(no matches)', 'dim')]);
    return lines;
  }
  for (const { index, item } of visibleItems(state)) {
    lines.push([seg(item, index === state.selected ? 'inverse' : 'text')]);
  }
  const hidden = state.matches.length - visibleItems(state).length;
  if (hidden > 0) lines.push([seg(`${hidden} more`, 'dim')]);
  return lines;
}

export function overlayContent(overlay: Overlay): Line[] {
  switch (overlay.kind) {
    case 'calendar':
      return calendarLines(overlay.calendar);
    case 'timePicker':
      return timeLines(overlay.picker);
    case 'listPicker':
      return listLines(overlay.picker);
  }
}

/**
 * Draws content inside a single-line border, every row the same width.
 */
export function boxLines(content: readonly Line[], maxWidth: number): Line[] {
  const inner = Math.max(1, Math.min(maxWidth - 4, Math.max(...content.map(lineWidth), 1)));
  const border = (left: string, right: string): Line => [seg(`${left}${'─'.repeat(inner + 2)}${right}`, 'dim')];
  return [
    border('┌', '┐'),
    ...content.map((line): Line => [seg('│ ', 'dim'), ...fitLine(line, inner), seg(' │', 'dim')]),
    border('└', '┘'),
  ];
}

export function renderOverlay(overlay: Overlay, maxWidth: number): Line[] {
  return boxLines(overlayContent(overlay), maxWidth);
}
