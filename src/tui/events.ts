import type { ProjectSummary, Task } from '../schema/index.js';
import type { LoadOrigin } from './commands.js';
import type { CompletionSources } from './overlay.js';

export type Outcome<T> = { ok: true; value: T } | { ok: false; error: string };

export type StatusLevel = 'info' | 'error';

export type AppEvent =
  /** `at` is the wall clock when the key arrived; pickers seed "today" from it. */
  | { kind: 'key'; name: string; at: Date }
  | { kind: 'resize'; width: number; height: number }
  | { kind: 'tasksLoaded'; requestId: number; origin: LoadOrigin; result: Outcome<Task[]> }
  | { kind: 'projectSummaryLoaded'; result: Outcome<ProjectSummary[]> }
  | { kind: 'completionsLoaded'; result: Outcome<CompletionSources> }
  | { kind: 'mutationCompleted'; error: string | null }
  | { kind: 'status'; level: StatusLevel; text: string };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function failed(error: string): { ok: false; error: string } {
  return { ok: false, error };
}
