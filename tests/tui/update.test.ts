import { describe, expect, it } from 'vitest';
import { failed, ok } from '../../src/tui/events.js';
import { changeSection, initialize, transition } from '../../src/tui/update.js';
import type { AppState } from '../../src/tui/state.js';
import { key, makeState, press, withTasks } from '../helpers/state.js';
import { makeTask } from '../helpers/tasks.js';

const NEXT_FILTER = '( status:pending or status:active ) -WAITING';

function loadedState(count = 3): AppState {
  return withTasks(makeState(), Array.from({ length: count }, () => makeTask()));
}

describe('startup', () => {
  it('opens on the first configured tab and loads it with completions', () => {
    const [state, commands] = initialize(makeState());
    expect(state.sectionIndex).toBe(1);
    expect(state.loading).toBe(true);
    expect(commands).toEqual([
      { kind: 'loadTasks', requestId: 1, origin: 'startup', filter: NEXT_FILTER },
      { kind: 'loadCompletions' },
    ]);
  });

  it('opens on Search with a start-up filter', () => {
    const [state, commands] = initialize(makeState({ initialSearchFilter: ' bug ' }));
    expect(state.sectionIndex).toBe(0);
    expect(state.searchFilter).toBe('bug');
    expect(commands[0]).toEqual({ kind: 'loadTasks', requestId: 1, origin: 'startup', filter: 'status.any: bug' });
  });
});

describe('load results', () => {
  it('discards results older than the latest request', () => {
    const [first] = initialize(makeState());
    const [second] = key(first, 'r');
    expect(second.latestLoadId).toBe(2);
    const [after, commands] = transition(second, {
      kind: 'tasksLoaded',
      requestId: 1,
      origin: 'startup',
      result: ok([makeTask()]),
    });
    expect(after).toBe(second);
    expect(commands).toEqual([]);
  });

  it('reopens the filter when a submitted filter fails', () => {
    const [state] = initialize(makeState());
    const [after] = transition(state, {
      kind: 'tasksLoaded',
      requestId: 1,
      origin: 'filter',
      result: failed('bad filter'),
    });
    expect(after.loading).toBe(false);
    expect(after.message).toEqual({ level: 'error', text: 'Failed to load tasks: bad filter' });
    expect(after.mode).toEqual({
      kind: 'filterInput',
      input: { value: NEXT_FILTER, cursor: Array.from(NEXT_FILTER).length },
      overlay: null,
    });
  });

  it('keeps normal mode for other failed loads', () => {
    const [state] = initialize(makeState());
    const [after] = transition(state, { kind: 'tasksLoaded', requestId: 1, origin: 'refresh', result: failed('x') });
    expect(after.mode).toEqual({ kind: 'normal' });
  });

  it('clears an error once a load succeeds', () => {
    const errored: AppState = { ...makeState(), message: { level: 'error', text: 'old' } };
    expect(withTasks(errored, []).message).toBeNull();
    const informed: AppState = { ...makeState(), message: { level: 'info', text: 'Task updated successfully' } };
    expect(withTasks(informed, []).message).toEqual({ level: 'info', text: 'Task updated successfully' });
  });

  it('asks for the project summary in the Projects section', () => {
    const [projects, commands] = changeSection(makeState(), 3);
    expect(commands).toEqual([
      { kind: 'loadTasks', requestId: 1, origin: 'section', filter: 'status:pending or status:active' },
    ]);
    const [, after] = transition(projects, {
      kind: 'tasksLoaded',
      requestId: 1,
      origin: 'section',
      result: ok([makeTask({ project: 'home' })]),
    });
    expect(after).toEqual([{ kind: 'loadProjectSummary' }]);
  });

  it('reports a failed project summary', () => {
    const [after] = transition(makeState(), { kind: 'projectSummaryLoaded', result: failed('no summary') });
    expect(after.message).toEqual({ level: 'error', text: 'Failed to load project summary: no summary' });
  });

  it('falls back to empty completions', () => {
    const [after] = transition(makeState(), { kind: 'completionsLoaded', result: failed('x') });
    expect(after.completions).toEqual({ projects: [], tags: [] });
  });
});

describe('mutation results', () => {
  it('reloads after a successful mutation', () => {
    const [after, commands] = transition(makeState(), { kind: 'mutationCompleted', error: null });
    expect(after.message).toEqual({ level: 'info', text: 'Task updated successfully' });
    expect(commands).toEqual([
      { kind: 'loadTasks', requestId: 1, origin: 'mutation', filter: NEXT_FILTER },
      { kind: 'loadCompletions' },
    ]);
  });

  it('reports a failed mutation without reloading', () => {
    const [after, commands] = transition(makeState(), { kind: 'mutationCompleted', error: 'locked' });
    expect(after.message).toEqual({ level: 'error', text: 'Task operation failed: locked' });
    expect(commands).toEqual([]);
  });
});

describe('normal mode keys', () => {
  it('quits on q and on ctrl-c from an input', () => {
    expect(press(makeState(), 'q').quitting).toBe(true);
    expect(press(makeState(), '/', 'CTRL_C').quitting).toBe(true);
  });

  it('opens, scrolls and closes help', () => {
    const help = press(makeState(), '?', 'j', 'j', 'k');
    expect(help.mode).toEqual({ kind: 'help', scroll: 1 });
    expect(press(help, 'ESCAPE').mode).toEqual({ kind: 'normal' });
    expect(press(help, 'q').quitting).toBe(false);
  });

  it('completes the marked tasks in list order', () => {
    const state = loadedState();
    const [a, , c] = state.list.rows;
    const marked = press(state, 'G', ' ', 'g', ' ');
    const [after, commands] = key(marked, 'd');
    expect(commands).toEqual([
      {
        kind: 'mutate',
        mutations: [
          { kind: 'complete', uuid: a?.uuid },
          { kind: 'complete', uuid: c?.uuid },
        ],
      },
    ]);
    expect(after.list.selected).toEqual([]);
  });

  it('toggles start and stop per task', () => {
    const started = makeTask({ start: new Date(2025, 2, 14, 8, 0) });
    const state = withTasks(makeState(), [started]);
    const [, commands] = key(state, 's');
    expect(commands).toEqual([{ kind: 'mutate', mutations: [{ kind: 'stop', uuid: started.uuid }] }]);
  });

  it('does nothing without tasks', () => {
    expect(key(makeState(), 'd')[1]).toEqual([]);
    expect(key(makeState(), 'e')[1]).toEqual([]);
    expect(press(makeState(), 'm').mode).toEqual({ kind: 'normal' });
  });

  it('asks before deleting', () => {
    const state = loadedState(1);
    const uuid = state.list.rows[0]?.uuid ?? '';
    const confirming = press(state, 'x');
    expect(confirming.mode).toEqual({ kind: 'confirm', action: { kind: 'delete', uuids: [uuid] } });

    const [cancelled, none] = key(confirming, 'n');
    expect(cancelled.mode).toEqual({ kind: 'normal' });
    expect(none).toEqual([]);

    const [confirmed, commands] = key(confirming, 'y');
    expect(confirmed.mode).toEqual({ kind: 'normal' });
    expect(commands).toEqual([{ kind: 'mutate', mutations: [{ kind: 'delete', uuid }] }]);
  });

  it('issues undo, edit and refresh', () => {
    const state = loadedState(1);
    expect(key(state, 'u')[1]).toEqual([{ kind: 'undo' }]);
    expect(key(state, 'e')[1]).toEqual([{ kind: 'editTask', uuid: state.list.rows[0]?.uuid }]);
    expect(key(state, 'r')[1]).toEqual([
      { kind: 'loadTasks', requestId: state.latestLoadId + 1, origin: 'refresh', filter: NEXT_FILTER },
    ]);
  });

  it('copies the selection as markdown', () => {
    const task = makeTask({ uuid: 'abcdef12-0000-4000-8000-000000000000', description: 'Pay rent' });
    const [, commands] = key(withTasks(makeState(), [task]), 'M');
    expect(commands).toEqual([{ kind: 'copyToClipboard', text: '* [ ] Pay rent (abcdef12)' }]);
  });
});

describe('text input', () => {
  it('submits a filter and remembers it', () => {
    const opened = press(makeState(), '/');
    expect(opened.mode).toEqual({
      kind: 'filterInput',
      input: { value: `${NEXT_FILTER} `, cursor: Array.from(NEXT_FILTER).length + 1 },
      overlay: null,
    });

    const typed = press(opened, 'CTRL_U', '+', 'b', 'u', 'g', ' ');
    const [after, commands] = key(typed, 'ENTER');
    expect(after.mode).toEqual({ kind: 'normal' });
    expect(after.activeFilter).toBe('+bug');
    expect(after.history.entries).toEqual(['+bug']);
    expect(commands).toEqual([{ kind: 'loadTasks', requestId: 1, origin: 'filter', filter: '+bug' }]);
  });

  it('walks filter history with up and down', () => {
    const submitted = press(makeState(), '/', 'CTRL_U', 'x', 'ENTER');
    const reopened = press(submitted, '/');
    const up = press(reopened, 'UP');
    expect(up.mode.kind === 'filterInput' && up.mode.input.value).toBe('x');
    const down = press(up, 'DOWN');
    expect(down.mode.kind === 'filterInput' && down.mode.input.value).toBe('x ');
  });

  it('keeps the Search filter for later visits', () => {
    const [search] = changeSection(makeState(), 0);
    const [submitted, commands] = key(press(search, '/', 'b', 'u', 'g'), 'ENTER');
    expect(commands[0]).toEqual({
      kind: 'loadTasks',
      requestId: submitted.latestLoadId,
      origin: 'filter',
      filter: 'status.any: bug',
    });
    const [away] = changeSection(submitted, 1);
    const [back] = changeSection(away, 0);
    expect(back.activeFilter).toBe('bug');
  });

  it('modifies the cursor task with the trimmed text', () => {
    const state = loadedState(1);
    const [after, commands] = key(press(state, 'm', ...'priority:H', ' '), 'ENTER');
    expect(after.mode).toEqual({ kind: 'normal' });
    expect(commands).toEqual([
      { kind: 'mutate', mutations: [{ kind: 'modify', uuid: state.list.rows[0]?.uuid, text: 'priority:H' }] },
    ]);
  });

  it('ignores a blank annotation', () => {
    expect(key(press(loadedState(1), 'a', ' '), 'ENTER')[1]).toEqual([]);
  });

  it('offers no completion for annotations', () => {
    const typing = press(loadedState(1), 'a', ...'due:');
    expect(press(typing, 'TAB')).toBe(typing);
  });

  it('creates a task with a date picked from the calendar', () => {
    const withCalendar = press(makeState(), 'n', ...'Buy', ' ', ...'due:', 'TAB');
    expect(withCalendar.mode.kind === 'newTaskInput' && withCalendar.mode.overlay?.kind).toBe('calendar');

    const picked = press(withCalendar, 'ENTER');
    expect(picked.mode.kind === 'newTaskInput' && picked.mode.input.value).toBe('Buy due:2025-03-14');
    expect(picked.mode.kind === 'newTaskInput' && picked.mode.overlay).toBeNull();

    expect(key(picked, 'ENTER')[1]).toEqual([{ kind: 'create', description: 'Buy due:2025-03-14' }]);
  });

  it('closes on escape without side effects', () => {
    const [after, commands] = key(press(makeState(), 'n', 'x'), 'ESCAPE');
    expect(after.mode).toEqual({ kind: 'normal' });
    expect(commands).toEqual([]);
  });
});

describe('sections', () => {
  it('cycles with tab and h, wrapping around', () => {
    expect(press(makeState(), 'TAB').sectionIndex).toBe(2);
    expect(press(makeState(), 'h').sectionIndex).toBe(0);
    expect(press(makeState(), 'h', 'SHIFT_TAB').sectionIndex).toBe(5);
  });

  it('picks a section by number', () => {
    const [state, commands] = key(makeState(), '4');
    expect(state.sectionIndex).toBe(3);
    expect(state.list.display).toEqual({ kind: 'grouped', groupKind: 'project', groups: [] });
    expect(commands[0]).toEqual({
      kind: 'loadTasks',
      requestId: 1,
      origin: 'section',
      filter: 'status:pending or status:active',
    });
  });

  it('jumps to a row for numbers past the last section', () => {
    expect(press(loadedState(10), '9').list.cursor).toBe(8);
  });

  it('keeps six and above for rows even when that section exists', () => {
    const start = loadedState(10);
    expect(start.sections).toHaveLength(6);
    const [state, commands] = key(start, '6');
    expect(state.sectionIndex).toBe(1);
    expect(state.list.cursor).toBe(5);
    expect(commands).toEqual([]);
  });

  it('drills into a tag group and escapes back', () => {
    const [tags] = changeSection(makeState(), 4);
    const state = withTasks(tags, [makeTask({ tags: ['home'] }), makeTask({ tags: ['work'] })]);
    const drilled = press(state, 'j', 'ENTER');
    expect(drilled.list.display.kind).toBe('drilled');
    const back = press(drilled, 'ESCAPE');
    expect(back.list.display.kind).toBe('grouped');
    expect(back.list.cursor).toBe(1);
  });
});

describe('layout', () => {
  it('toggles the sidebar twice back to the same layout and cursor', () => {
    const state = press(loadedState(), 'j', 'j');
    const wide = press(state, 'ENTER');
    expect(wide.layout).toBe('listWithSidebar');
    const back = press(wide, 'ENTER');
    expect(back.layout).toBe('list');
    expect(back.list.cursor).toBe(2);
  });

  it('opens the full-screen detail on narrow terminals', () => {
    const small = withTasks(makeState({ width: 60 }), [makeTask()]);
    expect(small.layout).toBe('small');
    const detail = press(small, 'ENTER');
    expect(detail.layout).toBe('smallTaskDetail');
    expect(press(detail, 'ESCAPE').layout).toBe('small');
  });

  it('returns to the preferred wide layout after a resize', () => {
    const wide = press(loadedState(), 'ENTER');
    const [narrow] = transition(wide, { kind: 'resize', width: 60, height: 24 });
    expect(narrow.layout).toBe('small');
    const [again] = transition(narrow, { kind: 'resize', width: 120, height: 24 });
    expect(again.layout).toBe('listWithSidebar');
  });

  it('scrolls the detail panel only while it is shown', () => {
    const annotations = Array.from({ length: 30 }, (_, i) => ({ description: `note ${i}` }));
    const state = withTasks(makeState(), [makeTask({ annotations }), makeTask()]);
    expect(press(state, 'J').detailScroll).toBe(0);

    const wide = press(state, 'ENTER');
    expect(press(wide, 'J').detailScroll).toBe(1);
    expect(press(wide, 'J', 'CTRL_F').detailScroll).toBe(19);
    expect(press(wide, 'J', 'J', 'j').detailScroll).toBe(0);
  });
});

describe('custom commands', () => {
  const customCommands = {
    o: { name: 'open', command: 'xdg-open https://tracker/{{.ticket}}' },
    p: { name: 'blank', command: '{{.project}}' },
  };

  it('expands the template against the cursor task', () => {
    const state = withTasks(makeState({ customCommands }), [makeTask({ udas: { ticket: 'OPS-9' } })]);
    expect(key(state, 'o')[1]).toEqual([
      { kind: 'runCustomCommand', name: 'open', argv: ['xdg-open', 'https://tracker/OPS-9'] },
    ]);
  });

  it('reports expansion problems', () => {
    const state = withTasks(makeState({ customCommands }), [makeTask()]);
    expect(press(state, 'o').message).toEqual({
      level: 'error',
      text: "Command expansion failed: field 'ticket' not found in task",
    });
    expect(press(state, 'p').message).toEqual({ level: 'error', text: 'Empty command after expansion' });
  });

  it('needs a task under the cursor', () => {
    expect(press(makeState({ customCommands }), 'o').message).toEqual({ level: 'info', text: 'No task selected' });
  });
});
