import { codepointLength } from './text-input.js';

export type DateField = 'due' | 'scheduled';

/**
 * What the completion key should open for a buffer and cursor.
 * `insertAt` is a codepoint offset into the buffer.
 */
export type FieldContext =
  | { kind: 'project'; partial: string; insertAt: number }
  | { kind: 'tag'; partial: string; insertAt: number }
  | { kind: 'time'; insertAt: number }
  | { kind: 'date'; field: DateField; insertAt: number };

export const PROJECT_KEYWORDS = ['project:', 'proj:', 'pro:'] as const;

export const DATE_KEYWORDS: ReadonlyArray<{ keyword: string; field: DateField }> = [
  { keyword: 'due:', field: 'due' },
  { keyword: 'scheduled:', field: 'scheduled' },
  { keyword: 'sched:', field: 'scheduled' },
  { keyword: 'sch:', field: 'scheduled' },
];

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const BLANK_RE = /[ \t]/;

function atWordStart(text: string, index: number): boolean {
  return index === 0 || BLANK_RE.test(text[index - 1] ?? '');
}

function endsWithKeyword(text: string, keyword: string): boolean {
  return text.endsWith(keyword) && atWordStart(text, text.length - keyword.length);
}

function dateKeywordAtEnd(text: string): DateField | null {
  for (const { keyword, field } of DATE_KEYWORDS) {
    if (endsWithKeyword(text, keyword)) return field;
  }
  return null;
}

export function detectProjectContext(before: string): FieldContext | null {
  for (const keyword of PROJECT_KEYWORDS) {
    const idx = before.lastIndexOf(keyword);
    if (idx === -1 || !atWordStart(before, idx)) continue;
    const partial = before.slice(idx + keyword.length);
    if (BLANK_RE.test(partial)) continue;
    return { kind: 'project', partial, insertAt: codepointLength(before.slice(0, idx + keyword.length)) };
  }
  return null;
}

export function detectTagContext(before: string): FieldContext | null {
  const idx = before.lastIndexOf('+');
  if (idx === -1 || !atWordStart(before, idx)) return null;
  const partial = before.slice(idx + 1);
  if (BLANK_RE.test(partial)) return null;
  return { kind: 'tag', partial, insertAt: codepointLength(before.slice(0, idx + 1)) };
}

/**
 * A full `YYYY-MM-DD` right before the cursor, itself right after a date keyword.
 */
export function detectCompleteDateContext(before: string): FieldContext | null {
  if (before.length <= 10) return null;
  const date = before.slice(-10);
  if (!ISO_DATE_RE.test(date)) return null;
  if (dateKeywordAtEnd(before.slice(0, -10)) === null) return null;
  return { kind: 'time', insertAt: codepointLength(before) };
}

export function detectDateKeywordContext(before: string): FieldContext | null {
  const field = dateKeywordAtEnd(before) ?? dateKeywordAtEnd(before.replace(/[ \t]+$/, ''));
  if (field === null) return null;
  return { kind: 'date', field, insertAt: codepointLength(before) };
}

/**
 * First match wins: project, tag, complete date (time picker), date keyword
 * (calendar). The complete-date check runs before the bare keyword so a typed
 * date offers a time rather than another calendar.
 */
export function detectFieldContext(text: string, cursor: number): FieldContext | null {
  const before = Array.from(text).slice(0, Math.max(0, cursor)).join('');
  return (
    detectProjectContext(before) ??
    detectTagContext(before) ??
    detectCompleteDateContext(before) ??
    detectDateKeywordContext(before)
  );
}
