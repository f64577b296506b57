import { daysInMonth, formatDate, parseDate } from '../../core/date-utils.js';
import { applyTextInputKey, createTextInput, type TextInputState } from '../text-input.js';

export interface CalendarDate {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

export interface CalendarState {
  cursor: CalendarDate;
  today: CalendarDate;
  /** Set while the date is being typed in by hand. */
  editing: TextInputState | null;
}

const DATE_INPUT_LIMIT = 10;

function fromDate(date: Date): CalendarDate {
  return { year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() };
}

function toDate(d: CalendarDate): Date {
  return new Date(d.year, d.month - 1, d.day);
}

export function createCalendar(today: Date): CalendarState {
  const seed = fromDate(today);
  return { cursor: seed, today: seed, editing: null };
}

export function calendarSelection(state: CalendarState): string {
  return formatDate(toDate(state.cursor));
}

export function isCalendarEditing(state: CalendarState): boolean {
  return state.editing !== null;
}

function shiftDays(d: CalendarDate, days: number): CalendarDate {
  return fromDate(new Date(d.year, d.month - 1, d.day + days));
}

function shiftMonths(d: CalendarDate, months: number): CalendarDate {
  const index = d.year * 12 + (d.month - 1) + months;
  const year = Math.floor(index / 12);
  const month = (index % 12) + 1;
  return { year, month, day: Math.min(d.day, daysInMonth(year, month)) };
}

function updateEditing(state: CalendarState, editing: TextInputState, name: string): CalendarState {
  if (name === 'ENTER') {
    const parsed = parseDate(editing.value.trim());
    // An invalid date keeps the field open.
    if (!parsed) return state;
    return { ...state, cursor: fromDate(parsed), editing: null };
  }
  if (name === 'ESCAPE') return { ...state, editing: null };

  const update = applyTextInputKey(editing, name);
  if (!update || Array.from(update.state.value).length > DATE_INPUT_LIMIT) return state;
  return { ...state, editing: update.state };
}

export function updateCalendar(state: CalendarState, name: string): CalendarState {
  if (state.editing) return updateEditing(state, state.editing, name);

  switch (name) {
    case 'b':
    case 'B':
      return { ...state, cursor: shiftMonths(state.cursor, -1) };
    case 'n':
    case 'N':
      return { ...state, cursor: shiftMonths(state.cursor, 1) };
    case 'LEFT':
    case 'h':
      return { ...state, cursor: shiftDays(state.cursor, -1) };
    case 'RIGHT':
    case 'l':
      return { ...state, cursor: shiftDays(state.cursor, 1) };
    case 'UP':
    case 'k':
      return { ...state, cursor: shiftDays(state.cursor, -7) };
    case 'DOWN':
    case 'j':
      return { ...state, cursor: shiftDays(state.cursor, 7) };
    case 't':
      return { ...state, cursor: state.today };
    case 'e':
      return { ...state, editing: createTextInput(calendarSelection(state)) };
    default:
      return state;
  }
}

/**
 * Weeks of the cursor's month, Sunday first; null pads the first and last week.
 */
export function monthGrid(state: CalendarState): Array<Array<number | null>> {
  const { year, month } = state.cursor;
  const leading = new Date(year, month - 1, 1).getDay();
  const total = daysInMonth(year, month);
  const cells: Array<number | null> = Array.from({ length: leading }, () => null);
  for (let day = 1; day <= total; day++) cells.push(day);
  while (cells.length % 7 !== 0) cells.push(null);

  const weeks: Array<Array<number | null>> = [];
  for (let i = 0; i < cells.length; i += 7) weeks.push(cells.slice(i, i + 7));
  return weeks;
}
