import type { ProjectSummary, Task } from '../schema/index.js';

/**
 * Everything the interactive engine needs from a task store. Every call either
 * resolves or rejects with an Error whose message is shown to the user.
 */
export interface TaskBackend {
  query(filter: string): Promise<Task[]>;
  complete(uuid: string): Promise<void>;
  delete(uuid: string): Promise<void>;
  start(uuid: string): Promise<void>;
  stop(uuid: string): Promise<void>;
  modify(uuid: string, modifications: string): Promise<void>;
  annotate(uuid: string, text: string): Promise<void>;
  create(description: string): Promise<Task>;
  undo(): Promise<void>;
  projectSummary(): Promise<ProjectSummary[]>;
  /** Command line that edits a task interactively; run with the UI suspended. */
  editCommand(uuid: string): ExternalCommand;
}

export interface ExternalCommand {
  command: string;
  args: string[];
  env?: Record<string, string>;
}
