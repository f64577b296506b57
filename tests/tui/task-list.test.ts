import { describe, expect, it } from 'vitest';
import {
  backToGroups,
  createTaskList,
  cursorGroup,
  cursorTask,
  drillDown,
  keepCursorVisible,
  moveCursor,
  moveCursorTo,
  quickJump,
  resetForSection,
  selectedTasks,
  setTasks,
  toggleSelection,
} from '../../src/tui/task-list.js';
import { makeTask } from '../helpers/tasks.js';

describe('tag grouping', () => {
  const a = makeTask({ description: 'A', tags: ['work', 'urgent'] });
  const b = makeTask({ description: 'B', tags: ['work'] });
  const c = makeTask({ description: 'C' });

  it('groups by tag with untagged last', () => {
    const list = setTasks(createTaskList('tag'), [a, b, c]);
    expect(list.display.kind).toBe('grouped');
    if (list.display.kind !== 'grouped') return;
    expect(list.display.groups.map((g) => [g.name, g.count])).toEqual([
      ['urgent', 1],
      ['work', 2],
      ['(none)', 1],
    ]);
    expect(cursorTask(list)).toBeNull();
    expect(selectedTasks(list)).toEqual([]);
  });

  it('drills into a group and returns to it', () => {
    const drilled = drillDown(moveCursorTo(setTasks(createTaskList('tag'), [a, b, c]), 1));
    expect(drilled.display.kind).toBe('drilled');
    expect(drilled.rows.map((t) => t.description)).toEqual(['A', 'B']);

    const back = backToGroups(drilled);
    expect(cursorGroup(back)?.name).toBe('work');
  });

  it('recomputes groups from the full set after a reload while drilled', () => {
    const drilled = drillDown(moveCursorTo(setTasks(createTaskList('tag'), [a, b, c]), 1));
    const d = makeTask({ description: 'D', tags: ['home'] });
    const reloaded = setTasks(drilled, [a, c, d]);
    expect(reloaded.rows.map((t) => t.description)).toEqual(['A']);

    const back = backToGroups(reloaded);
    if (back.display.kind !== 'grouped') throw new Error('expected grouped display');
    expect(back.display.groups.map((g) => g.name)).toEqual(['home', 'urgent', 'work', '(none)']);
    expect(cursorGroup(back)?.name).toBe('work');
  });
});

describe('flat list', () => {
  const tasks = [makeTask({ urgency: 1 }), makeTask({ urgency: 5 }), makeTask({ urgency: 3 })];

  it('orders rows by the section sort', () => {
    const list = setTasks(createTaskList(null, { sort: 'urgency', reverse: false }), tasks);
    expect(list.rows.map((t) => t.urgency)).toEqual([5, 3, 1]);
  });

  it('clamps cursor movement', () => {
    const list = setTasks(createTaskList(), tasks);
    expect(moveCursor(list, -1).cursor).toBe(0);
    expect(moveCursor(list, 10).cursor).toBe(2);
  });

  it('keeps marks in list order and drops vanished tasks', () => {
    let list = setTasks(createTaskList(), tasks);
    list = toggleSelection(moveCursorTo(list, 2));
    list = toggleSelection(moveCursorTo(list, 0));
    expect(list.selected).toEqual([tasks[2]?.uuid, tasks[0]?.uuid]);
    expect(selectedTasks(list)).toEqual([tasks[0], tasks[2]]);

    const reloaded = setTasks(list, tasks.slice(0, 2));
    expect(reloaded.selected).toEqual([tasks[0]?.uuid]);
  });

  it('falls back to the cursor task without marks', () => {
    const list = moveCursorTo(setTasks(createTaskList(), tasks), 1);
    expect(selectedTasks(list)).toEqual([tasks[1]]);
  });

  it('resets the cursor when a reload shrinks the list', () => {
    const list = moveCursorTo(setTasks(createTaskList(), tasks), 2);
    expect(setTasks(list, tasks.slice(0, 1)).cursor).toBe(0);
  });

  it('resets for a new section', () => {
    const list = toggleSelection(moveCursorTo(setTasks(createTaskList(), tasks), 1));
    const reset = resetForSection(list, 'project', { reverse: false });
    expect(reset.cursor).toBe(0);
    expect(reset.selected).toEqual([]);
    expect(reset.display).toEqual({ kind: 'grouped', groupKind: 'project', groups: [] });
  });
});

describe('viewport', () => {
  const many = Array.from({ length: 10 }, () => makeTask());

  it('scrolls to keep the cursor visible', () => {
    const list = keepCursorVisible(moveCursorTo(setTasks(createTaskList(), many), 7), 5);
    expect(list.scroll).toBe(3);
    expect(keepCursorVisible(moveCursorTo(list, 1), 5).scroll).toBe(1);
  });

  it('quick-jumps to visible rows only', () => {
    const list = keepCursorVisible(moveCursorTo(setTasks(createTaskList(), many), 7), 5);
    expect(quickJump(list, 2, 5).cursor).toBe(4);
    expect(quickJump(list, 6, 5)).toBe(list);
  });
});
