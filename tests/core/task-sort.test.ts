import { describe, expect, it } from 'vitest';
import { sortTasks } from '../../src/core/task-sort.js';
import { makeTask } from '../helpers/tasks.js';

const descriptions = (tasks: { description: string }[]) => tasks.map((t) => t.description);

describe('sortTasks', () => {
  it('puts tasks without a due date after dated ones', () => {
    const tasks = [
      makeTask({ description: 'undated' }),
      makeTask({ description: 'later', due: new Date(2025, 5, 2) }),
      makeTask({ description: 'sooner', due: new Date(2025, 5, 1) }),
    ];
    expect(descriptions(sortTasks(tasks, 'due'))).toEqual(['sooner', 'later', 'undated']);
  });

  it('keeps completed tasks last when reversed', () => {
    const tasks = [
      makeTask({ description: 'done', status: 'completed', due: new Date(2025, 0, 1) }),
      makeTask({ description: 'a', due: new Date(2025, 0, 1) }),
      makeTask({ description: 'b', due: new Date(2025, 0, 2) }),
    ];
    expect(descriptions(sortTasks(tasks, 'due', true))).toEqual(['b', 'a', 'done']);
  });

  it('sorts urgency highest first', () => {
    const tasks = [makeTask({ description: 'low', urgency: 1 }), makeTask({ description: 'high', urgency: 9.5 })];
    expect(descriptions(sortTasks(tasks, 'urgency'))).toEqual(['high', 'low']);
  });

  it('treats alpha aliases the same and ignores case', () => {
    const tasks = [makeTask({ description: 'beta' }), makeTask({ description: 'Alpha' })];
    expect(descriptions(sortTasks(tasks, 'alpha'))).toEqual(['Alpha', 'beta']);
    expect(descriptions(sortTasks(tasks, 'alphabetic'))).toEqual(['Alpha', 'beta']);
    expect(descriptions(sortTasks(tasks, 'description'))).toEqual(['Alpha', 'beta']);
  });

  it('keeps input order without a method, apart from completed tasks', () => {
    const tasks = [
      makeTask({ description: 'x', status: 'completed' }),
      makeTask({ description: 'y' }),
      makeTask({ description: 'z' }),
    ];
    expect(descriptions(sortTasks(tasks))).toEqual(['y', 'z', 'x']);
  });

  it('does not mutate its input', () => {
    const tasks = [makeTask({ description: 'b' }), makeTask({ description: 'a' })];
    sortTasks(tasks, 'alpha');
    expect(descriptions(tasks)).toEqual(['b', 'a']);
  });
});
