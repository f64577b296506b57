import { isPrintableKeyName, isSpaceKeyName } from './key-utils.js';

/**
 * Single-line editable buffer. The cursor counts Unicode codepoints
 * (an index into `Array.from(value)`), never UTF-16 code units.
 */
export interface TextInputState {
  value: string;
  cursor: number;
}

export interface TextInputUpdate {
  state: TextInputState;
  didChangeValue: boolean;
}

function toChars(value: string): string[] {
  return Array.from(value);
}

function clampCursor(value: string, cursor: number): number {
  return Math.max(0, Math.min(cursor, toChars(value).length));
}

export function createTextInput(initial = ''): TextInputState {
  return { value: initial, cursor: toChars(initial).length };
}

export function withCursor(state: TextInputState, cursor: number): TextInputState {
  return { value: state.value, cursor: clampCursor(state.value, cursor) };
}

export function textBeforeCursor(state: TextInputState): string {
  return toChars(state.value).slice(0, clampCursor(state.value, state.cursor)).join('');
}

export function codepointLength(text: string): number {
  return toChars(text).length;
}

/**
 * Removes `deleteCount` codepoints at `at`, inserts `text` there and leaves the
 * cursor right after the inserted text.
 */
export function spliceText(state: TextInputState, at: number, deleteCount: number, text: string): TextInputState {
  const chars = toChars(state.value);
  const from = Math.max(0, Math.min(at, chars.length));
  const inserted = toChars(text);
  chars.splice(from, Math.max(0, deleteCount), ...inserted);
  const value = chars.join('');
  return { value, cursor: clampCursor(value, from + inserted.length) };
}

function insertAtCursor(state: TextInputState, text: string): TextInputState {
  return spliceText(state, clampCursor(state.value, state.cursor), 0, text);
}

function deleteRange(state: TextInputState, start: number, end: number): TextInputState {
  const len = toChars(state.value).length;
  const from = Math.max(0, Math.min(start, len));
  const to = Math.max(0, Math.min(end, len));
  if (to <= from) return withCursor(state, state.cursor);
  return spliceText(state, from, to - from, '');
}

function isWhitespaceChar(ch: string): boolean {
  return /\s/.test(ch);
}

function wordLeft(state: TextInputState): number {
  const chars = toChars(state.value);
  let i = clampCursor(state.value, state.cursor);
  while (i > 0 && isWhitespaceChar(chars[i - 1] ?? '')) i--;
  while (i > 0 && !isWhitespaceChar(chars[i - 1] ?? '')) i--;
  return i;
}

function wordRight(state: TextInputState): number {
  const chars = toChars(state.value);
  let i = clampCursor(state.value, state.cursor);
  while (i < chars.length && isWhitespaceChar(chars[i] ?? '')) i++;
  while (i < chars.length && !isWhitespaceChar(chars[i] ?? '')) i++;
  return i;
}

/**
 * Applies an editing key. Returns null for keys the buffer does not own
 * (submit, cancel, completion, history), which callers handle themselves.
 */
export function applyTextInputKey(state: TextInputState, name: string): TextInputUpdate | null {
  const cursor = clampCursor(state.value, state.cursor);
  const current: TextInputState = { value: state.value, cursor };
  const len = toChars(current.value).length;

  const finish = (next: TextInputState): TextInputUpdate => ({
    state: next,
    didChangeValue: next.value !== state.value,
  });

  switch (name) {
    case 'ESCAPE':
    case 'CTRL_C':
    case 'ENTER':
    case 'TAB':
    case 'SHIFT_TAB':
    case 'UP':
    case 'DOWN':
      return null;

    case 'LEFT':
    case 'CTRL_B':
      return finish(withCursor(current, cursor - 1));
    case 'RIGHT':
    case 'CTRL_F':
      return finish(withCursor(current, cursor + 1));
    case 'HOME':
    case 'CTRL_A':
      return finish(withCursor(current, 0));
    case 'END':
    case 'CTRL_E':
      return finish(withCursor(current, len));

    case 'ALT_LEFT':
    case 'CTRL_LEFT':
    case 'ALT_B':
      return finish(withCursor(current, wordLeft(current)));
    case 'ALT_RIGHT':
    case 'CTRL_RIGHT':
    case 'ALT_F':
      return finish(withCursor(current, wordRight(current)));

    case 'BACKSPACE':
      return finish(cursor > 0 ? deleteRange(current, cursor - 1, cursor) : current);
    case 'DELETE':
    case 'CTRL_D':
      return finish(cursor < len ? deleteRange(current, cursor, cursor + 1) : current);
    case 'ALT_BACKSPACE':
    case 'CTRL_W':
      return finish(deleteRange(current, wordLeft(current), cursor));
    case 'CTRL_U':
      return finish(deleteRange(current, 0, cursor));
    case 'CTRL_K':
      return finish(deleteRange(current, cursor, len));
  }

  if (isSpaceKeyName(name)) return finish(insertAtCursor(current, ' '));
  if (isPrintableKeyName(name)) return finish(insertAtCursor(current, name));
  return null;
}
