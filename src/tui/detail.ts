import type { Task } from '../schema/index.js';
import { formatDate, formatDateTime, formatRelative } from '../core/date-utils.js';
import { isStarted } from '../core/task-props.js';

const LABEL_WIDTH = 12;

export function wrapText(text: string, width: number): string[] {
  const max = Math.max(1, width);
  const lines: string[] = [];
  let line = '';
  for (const word of text.split(/\s+/).filter((w) => w.length > 0)) {
    const chars = Array.from(word);
    if (line === '' && chars.length > max) {
      for (let i = 0; i < chars.length; i += max) lines.push(chars.slice(i, i + max).join(''));
      continue;
    }
    const candidate = line === '' ? word : `${line} ${word}`;
    if (Array.from(candidate).length > max) {
      lines.push(line);
      line = word;
    } else {
      line = candidate;
    }
  }
  if (line !== '' || lines.length === 0) lines.push(line);
  return lines;
}

function field(label: string, value: string, width: number): string[] {
  const wrapped = wrapText(value, width - LABEL_WIDTH);
  return wrapped.map((part, i) => (i === 0 ? label.padEnd(LABEL_WIDTH) : ' '.repeat(LABEL_WIDTH)) + part);
}

function dateValue(date: Date, now: Date): string {
  return `${formatDate(date)} (${formatRelative(date, now)})`;
}

/**
 * Plain text lines of the detail panel for one task, wrapped to `width`.
 */
export function detailLines(task: Task, width: number, now: Date): string[] {
  const lines: string[] = [...wrapText(task.description, width), ''];
  const push = (label: string, value: string | undefined) => {
    if (value !== undefined && value !== '') lines.push(...field(label, value, width));
  };

  push('ID', task.id !== undefined ? String(task.id) : undefined);
  push('UUID', task.uuid);
  push('Status', isStarted(task) && task.status === 'pending' ? 'active' : task.status);
  push('Project', task.project);
  push('Priority', task.priority);
  push('Tags', task.tags.map((t) => `+${t}`).join(' '));
  push('Urgency', task.urgency.toFixed(2));
  if (task.due) push('Due', dateValue(task.due, now));
  if (task.scheduled) push('Scheduled', dateValue(task.scheduled, now));
  if (task.wait) push('Wait', dateValue(task.wait, now));
  if (task.start) push('Started', formatDateTime(task.start));
  if (task.entry) push('Entered', formatDateTime(task.entry));
  if (task.modified) push('Modified', formatDateTime(task.modified));
  if (task.end) push('Ended', formatDateTime(task.end));
  push('Depends', task.depends.join(', '));
  for (const [name, value] of Object.entries(task.udas).sort(([a], [b]) => a.localeCompare(b))) {
    push(name, value);
  }

  if (task.annotations.length > 0) {
    lines.push('', 'Annotations');
    for (const note of task.annotations) {
      const prefix = note.entry ? `${formatDate(note.entry)} ` : '';
      lines.push(...wrapText(`${prefix}${note.description}`, width - 2).map((l) => `  ${l}`));
    }
  }
  return lines;
}
