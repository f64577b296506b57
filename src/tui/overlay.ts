import type { DateField, FieldContext } from './field-context.js';
import { calendarSelection, createCalendar, isCalendarEditing, updateCalendar, type CalendarState } from './pickers/calendar.js';
import { createListPicker, listPickerSelection, updateListPicker, type ListPickerState } from './pickers/list-picker.js';
import { createTimePicker, formatTime, updateTimePicker, type TimePickerState } from './pickers/time-picker.js';
import { spliceText, type TextInputState } from './text-input.js';

export type TextInputModeKind = 'filterInput' | 'modifyInput' | 'annotateInput' | 'newTaskInput';

interface OverlayBase {
  /** Input mode whose buffer receives the selection. */
  origin: TextInputModeKind;
  /** Codepoint offset into that buffer. */
  insertAt: number;
}

export type Overlay =
  | (OverlayBase & { kind: 'calendar'; field: DateField; calendar: CalendarState })
  | (OverlayBase & { kind: 'timePicker'; picker: TimePickerState })
  | (OverlayBase & {
      kind: 'listPicker';
      target: 'project' | 'tag';
      /** Partial text already typed after `insertAt`; replaced on insertion. */
      filterPrefix: string;
      picker: ListPickerState;
    });

export interface CompletionSources {
  projects: readonly string[];
  tags: readonly string[];
}

export function openOverlay(
  context: FieldContext,
  origin: TextInputModeKind,
  sources: CompletionSources,
  now: Date
): Overlay {
  switch (context.kind) {
    case 'date':
      return { kind: 'calendar', origin, insertAt: context.insertAt, field: context.field, calendar: createCalendar(now) };
    case 'time':
      return { kind: 'timePicker', origin, insertAt: context.insertAt, picker: createTimePicker(now) };
    case 'project':
      return {
        kind: 'listPicker',
        origin,
        insertAt: context.insertAt,
        target: 'project',
        filterPrefix: context.partial,
        picker: createListPicker('Projects', sources.projects, context.partial),
      };
    case 'tag':
      return {
        kind: 'listPicker',
        origin,
        insertAt: context.insertAt,
        target: 'tag',
        filterPrefix: context.partial,
        picker: createListPicker('Tags', sources.tags, context.partial),
      };
  }
}

/**
 * Splices the overlay's current selection into `buffer`. A list selection
 * first drops the partial text it completes. Returns the buffer unchanged when
 * there is nothing to insert.
 */
export function insertSelection(overlay: Overlay, buffer: TextInputState): TextInputState {
  switch (overlay.kind) {
    case 'calendar':
      return spliceText(buffer, overlay.insertAt, 0, calendarSelection(overlay.calendar));
    case 'timePicker':
      return spliceText(buffer, overlay.insertAt, 0, `T${formatTime(overlay.picker)}`);
    case 'listPicker': {
      const item = listPickerSelection(overlay.picker);
      if (item === null) return buffer;
      const after = Array.from(buffer.value).slice(overlay.insertAt).join('');
      const replaced =
        overlay.filterPrefix !== '' && after.startsWith(overlay.filterPrefix)
          ? Array.from(overlay.filterPrefix).length
          : 0;
      return spliceText(buffer, overlay.insertAt, replaced, item);
    }
  }
}

function forwardKey(overlay: Overlay, name: string, at: Date): Overlay {
  switch (overlay.kind) {
    case 'calendar':
      return { ...overlay, calendar: updateCalendar(overlay.calendar, name) };
    case 'timePicker':
      return { ...overlay, picker: updateTimePicker(overlay.picker, name, at) };
    case 'listPicker':
      return { ...overlay, picker: updateListPicker(overlay.picker, name) };
  }
}

/**
 * The calendar's hand-typed date field keeps enter and escape for itself.
 */
function ownsConfirmKeys(overlay: Overlay): boolean {
  return overlay.kind === 'calendar' && isCalendarEditing(overlay.calendar);
}

export interface OverlayKeyResult {
  overlay: Overlay | null;
  buffer: TextInputState;
}

/**
 * Enter confirms and inserts, escape closes without touching the buffer, and
 * every other key belongs to the picker.
 */
export function routeOverlayKey(
  overlay: Overlay,
  buffer: TextInputState,
  name: string,
  at: Date
): OverlayKeyResult {
  if (!ownsConfirmKeys(overlay)) {
    if (name === 'ENTER') return { overlay: null, buffer: insertSelection(overlay, buffer) };
    if (name === 'ESCAPE') return { overlay: null, buffer };
  }
  return { overlay: forwardKey(overlay, name, at), buffer };
}
