import type { Task } from '../schema/index.js';
import { getTaskProperty } from '../core/task-props.js';

export class TemplateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TemplateError';
  }
}

const OPEN = '{{.';
const CLOSE = '}}';

/**
 * Replaces `{{.field}}` placeholders with the task's property values,
 * e.g. `open https://tracker/{{.ticket}}`.
 */
export function expandTemplate(template: string, task: Task): string {
  let out = '';
  let pos = 0;
  while (true) {
    const open = template.indexOf(OPEN, pos);
    if (open === -1) break;
    const close = template.indexOf(CLOSE, open + OPEN.length);
    if (close === -1) throw new TemplateError('unclosed template placeholder in command');

    const field = template.slice(open + OPEN.length, close);
    const value = getTaskProperty(task, field);
    if (value === undefined) throw new TemplateError(`field '${field}' not found in task`);

    out += template.slice(pos, open) + value;
    pos = close + CLOSE.length;
  }
  return out + template.slice(pos);
}

/**
 * Splits a command line on spaces. Double quotes group words and a backslash
 * takes the next character literally.
 */
export function parseCommandLine(line: string): string[] {
  const parts: string[] = [];
  let current = '';
  let quoted = false;
  let escaped = false;

  for (const ch of line) {
    if (escaped) {
      current += ch;
      escaped = false;
    } else if (ch === '\\') {
      escaped = true;
    } else if (ch === '"') {
      quoted = !quoted;
    } else if (ch === ' ' && !quoted) {
      if (current.length > 0) parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }

  if (quoted) throw new TemplateError('unterminated quote in command');
  if (current.length > 0) parts.push(current);
  return parts;
}
