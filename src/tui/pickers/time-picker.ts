export type TimeField = 'hour' | 'minute';

export interface TimePickerState {
  hour: number;
  minute: number;
  focus: TimeField;
}

const MINUTE_STEP = 5;

export function createTimePicker(now: Date): TimePickerState {
  return { hour: now.getHours(), minute: 0, focus: 'hour' };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatTime(state: TimePickerState): string {
  return `${pad2(state.hour)}:${pad2(state.minute)}`;
}

function step(state: TimePickerState, direction: 1 | -1): TimePickerState {
  if (state.focus === 'hour') {
    return { ...state, hour: (state.hour + direction + 24) % 24 };
  }
  return { ...state, minute: (state.minute + direction * MINUTE_STEP + 60) % 60 };
}

/** `now` is the clock when the key arrived; `n` jumps back to its hour. */
export function updateTimePicker(state: TimePickerState, name: string, now: Date): TimePickerState {
  switch (name) {
    case 'UP':
    case 'k':
      return step(state, 1);
    case 'DOWN':
    case 'j':
      return step(state, -1);
    case 'RIGHT':
    case 'l':
    case 'TAB':
      return { ...state, focus: 'minute' };
    case 'LEFT':
    case 'h':
    case 'SHIFT_TAB':
      return { ...state, focus: 'hour' };
    case 'n':
      return { ...state, hour: now.getHours(), minute: 0 };
    default:
      return state;
  }
}
