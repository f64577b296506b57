/**
 * Side effects requested by the state transition. The dispatcher runs them and
 * answers with events; nothing here touches the backend directly.
 */

/** Why a task load was issued. Only filter submissions reopen the filter on failure. */
export type LoadOrigin = 'startup' | 'filter' | 'section' | 'refresh' | 'mutation';

export type Mutation =
  | { kind: 'complete'; uuid: string }
  | { kind: 'delete'; uuid: string }
  | { kind: 'start'; uuid: string }
  | { kind: 'stop'; uuid: string }
  | { kind: 'modify'; uuid: string; text: string }
  | { kind: 'annotate'; uuid: string; text: string };

export type Command =
  | { kind: 'loadTasks'; requestId: number; filter: string; origin: LoadOrigin }
  | { kind: 'loadProjectSummary' }
  | { kind: 'loadCompletions' }
  | { kind: 'mutate'; mutations: Mutation[] }
  | { kind: 'create'; description: string }
  | { kind: 'undo' }
  | { kind: 'editTask'; uuid: string }
  | { kind: 'runCustomCommand'; name: string; argv: string[] }
  | { kind: 'copyToClipboard'; text: string };
