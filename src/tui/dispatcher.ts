import type { ExternalCommand, TaskBackend } from '../backend/types.js';
import { uniqueProjects, uniqueTags } from '../core/grouping.js';
import { logger } from '../logger.js';
import type { Command, Mutation } from './commands.js';
import { failed, ok, type AppEvent } from './events.js';
import type { ClipboardResult } from './clipboard.js';

export interface DispatcherDeps {
  backend: TaskBackend;
  /** Runs a command in the foreground with the UI suspended. */
  runInteractive(command: ExternalCommand): Promise<void>;
  /** Starts a process without waiting for it. */
  launchDetached(argv: string[]): Promise<void>;
  copyToClipboard(text: string): ClipboardResult;
}

function message(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function applyMutation(backend: TaskBackend, mutation: Mutation): Promise<void> {
  switch (mutation.kind) {
    case 'complete':
      return backend.complete(mutation.uuid);
    case 'delete':
      return backend.delete(mutation.uuid);
    case 'start':
      return backend.start(mutation.uuid);
    case 'stop':
      return backend.stop(mutation.uuid);
    case 'modify':
      return backend.modify(mutation.uuid, mutation.text);
    case 'annotate':
      return backend.annotate(mutation.uuid, mutation.text);
  }
}

/**
 * Applies every mutation in order. Later ones are still attempted after a
 * failure; only the first error is reported.
 */
export async function runBatch(backend: TaskBackend, mutations: readonly Mutation[]): Promise<string | null> {
  let first: string | null = null;
  for (const mutation of mutations) {
    try {
      await applyMutation(backend, mutation);
    } catch (error) {
      logger.error('mutation.failed', `${mutation.kind} ${mutation.uuid}: ${message(error)}`);
      first ??= message(error);
    }
  }
  return first;
}

async function execute(command: Command, deps: DispatcherDeps): Promise<AppEvent> {
  const { backend } = deps;
  switch (command.kind) {
    case 'loadTasks': {
      const { requestId, origin } = command;
      if (command.filter.trim() === '') {
        return { kind: 'tasksLoaded', requestId, origin, result: ok([]) };
      }
      try {
        return { kind: 'tasksLoaded', requestId, origin, result: ok(await backend.query(command.filter)) };
      } catch (error) {
        return { kind: 'tasksLoaded', requestId, origin, result: failed(message(error)) };
      }
    }
    case 'loadProjectSummary':
      try {
        return { kind: 'projectSummaryLoaded', result: ok(await backend.projectSummary()) };
      } catch (error) {
        return { kind: 'projectSummaryLoaded', result: failed(message(error)) };
      }
    case 'loadCompletions':
      try {
        const tasks = await backend.query('status:pending');
        return { kind: 'completionsLoaded', result: ok({ projects: uniqueProjects(tasks), tags: uniqueTags(tasks) }) };
      } catch (error) {
        logger.warn('completions.failed', message(error));
        return { kind: 'completionsLoaded', result: failed(message(error)) };
      }
    case 'mutate':
      return { kind: 'mutationCompleted', error: await runBatch(backend, command.mutations) };
    case 'create':
      await backend.create(command.description);
      return { kind: 'mutationCompleted', error: null };
    case 'undo':
      await backend.undo();
      return { kind: 'mutationCompleted', error: null };
    case 'editTask':
      await deps.runInteractive(backend.editCommand(command.uuid));
      return { kind: 'mutationCompleted', error: null };
    case 'runCustomCommand':
      try {
        await deps.launchDetached(command.argv);
        return { kind: 'status', level: 'info', text: `Executed: ${command.name}` };
      } catch (error) {
        return { kind: 'status', level: 'error', text: `Command execution failed: ${message(error)}` };
      }
    case 'copyToClipboard': {
      const result = deps.copyToClipboard(command.text);
      if (result.success) return { kind: 'status', level: 'info', text: 'Task exported to clipboard as markdown' };
      logger.warn('clipboard.failed', result.error ?? 'unknown');
      return { kind: 'status', level: 'error', text: `Failed to copy to clipboard: ${command.text}` };
    }
  }
}

/**
 * Runs one command and answers with exactly one event. Never rejects; a
 * failure the command has no dedicated event for becomes a failed mutation.
 */
export async function dispatch(command: Command, deps: DispatcherDeps): Promise<AppEvent> {
  try {
    return await execute(command, deps);
  } catch (error) {
    logger.error('dispatch.failed', `${command.kind}: ${message(error)}`);
    return { kind: 'mutationCompleted', error: message(error) };
  }
}
