import { describe, expect, it } from 'vitest';
import {
  getTaskProperty,
  isDueToday,
  isOverdue,
  tasksToMarkdown,
  toMarkdown,
} from '../../src/core/task-props.js';
import { makeTask } from '../helpers/tasks.js';

const now = new Date(2025, 2, 14, 10, 0, 0);

describe('due predicates', () => {
  it('flags overdue open tasks only', () => {
    const due = new Date(2025, 2, 13, 9, 0, 0);
    expect(isOverdue(makeTask({ due }), now)).toBe(true);
    expect(isOverdue(makeTask({ due, status: 'completed' }), now)).toBe(false);
    expect(isOverdue(makeTask(), now)).toBe(false);
  });

  it('recognises tasks due later today', () => {
    expect(isDueToday(makeTask({ due: new Date(2025, 2, 14, 23, 0, 0) }), now)).toBe(true);
    expect(isDueToday(makeTask({ due: new Date(2025, 2, 15, 1, 0, 0) }), now)).toBe(false);
  });
});

describe('getTaskProperty', () => {
  const task = makeTask({
    id: 7,
    description: 'Write report',
    project: 'work.reports',
    tags: ['q1', 'writing'],
    urgency: 4.25,
    due: new Date(2025, 2, 20, 17, 30),
    annotations: [{ description: 'first' }, { description: 'second' }],
    udas: { ticket: 'ABC-1' },
  });

  it('resolves core fields', () => {
    expect(getTaskProperty(task, 'id')).toBe('7');
    expect(getTaskProperty(task, 'description')).toBe('Write report');
    expect(getTaskProperty(task, 'project')).toBe('work.reports');
    expect(getTaskProperty(task, 'tags')).toBe('q1,writing');
    expect(getTaskProperty(task, 'urgency')).toBe('4.3');
    expect(getTaskProperty(task, 'due')).toBe('2025-03-20');
    expect(getTaskProperty(task, 'annotations')).toBe('first; second');
  });

  it('returns empty strings for unset known fields', () => {
    expect(getTaskProperty(task, 'scheduled')).toBe('');
    expect(getTaskProperty(task, 'priority')).toBe('');
    expect(getTaskProperty(makeTask({ id: undefined }), 'id')).toBe('');
  });

  it('falls back to UDAs and undefined for unknown fields', () => {
    expect(getTaskProperty(task, 'ticket')).toBe('ABC-1');
    expect(getTaskProperty(task, 'nope')).toBeUndefined();
  });
});

describe('markdown export', () => {
  it('marks status in the checkbox and truncates the uuid', () => {
    const uuid = 'abcdef12-3456-4789-8abc-def012345678';
    expect(toMarkdown(makeTask({ uuid, description: 'Open' }))).toBe('* [ ] Open (abcdef12)');
    expect(toMarkdown(makeTask({ uuid, description: 'Done', status: 'completed' }))).toBe('* [x] Done (abcdef12)');
    expect(toMarkdown(makeTask({ uuid, description: 'Gone', status: 'deleted' }))).toBe('* [-] Gone (abcdef12)');
    expect(toMarkdown(makeTask({ uuid, description: 'Busy', start: now }))).toBe('* [S] Busy (abcdef12)');
  });

  it('joins several tasks with newlines', () => {
    const a = makeTask({ uuid: '11111111-0000', description: 'a' });
    const b = makeTask({ uuid: '22222222-0000', description: 'b' });
    expect(tasksToMarkdown([a, b])).toBe('* [ ] a (11111111)\n* [ ] b (22222222)');
  });
});
