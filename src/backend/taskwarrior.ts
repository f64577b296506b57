import { spawn } from 'node:child_process';
import type { ProjectSummary, Task } from '../schema/index.js';
import { logger } from '../logger.js';
import { BackendError } from './errors.js';
import { parseExport } from './mapper.js';
import { parseSummaryOutput } from './summary-parser.js';
import type { ExternalCommand, TaskBackend } from './types.js';

export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export type ProcessRunner = (command: string, args: string[], env: NodeJS.ProcessEnv) => Promise<ProcessResult>;

export const spawnProcess: ProcessRunner = (command, args, env) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { env, stdio: ['ignore', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    child.on('error', reject);
    child.on('close', (code) => {
      resolve({ code, stdout, stderr });
    });
  });

export interface TaskwarriorOptions {
  taskBin: string;
  taskrcPath?: string;
  run?: ProcessRunner;
}

const CREATED_RE = /Created task (\d+)/;

/**
 * Splits a filter or modification the way a shell would split unquoted words.
 */
export function splitWords(text: string): string[] {
  return text.split(/\s+/).filter((w) => w.length > 0);
}

export class TaskwarriorBackend implements TaskBackend {
  private readonly run: ProcessRunner;

  constructor(private readonly options: TaskwarriorOptions) {
    this.run = options.run ?? spawnProcess;
  }

  private env(): NodeJS.ProcessEnv {
    if (!this.options.taskrcPath) return process.env;
    return { ...process.env, TASKRC: this.options.taskrcPath };
  }

  private async exec(args: string[]): Promise<string> {
    logger.debug('backend.exec', `${this.options.taskBin} ${args.join(' ')}`);
    let result: ProcessResult;
    try {
      result = await this.run(this.options.taskBin, args, this.env());
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.error('backend.spawn', msg);
      throw new BackendError(`could not run ${this.options.taskBin}: ${msg}`, args);
    }
    if (result.code !== 0) {
      const stderr = result.stderr.trim();
      logger.error('backend.exit', `code=${String(result.code)} args=${args.join(' ')} stderr=${stderr}`);
      throw new BackendError(`${this.options.taskBin} exited with code ${String(result.code)}`, args, stderr);
    }
    return result.stdout;
  }

  async query(filter: string): Promise<Task[]> {
    const args = [...splitWords(filter), 'export'];
    const output = await this.exec(args);
    try {
      return parseExport(output);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      logger.error('backend.parse', msg);
      throw new BackendError(`failed to parse task export: ${msg}`, args);
    }
  }

  async complete(uuid: string): Promise<void> {
    await this.exec([uuid, 'done']);
  }

  async delete(uuid: string): Promise<void> {
    await this.exec([uuid, 'delete', 'rc.confirmation=off']);
  }

  async start(uuid: string): Promise<void> {
    await this.exec([uuid, 'start']);
  }

  async stop(uuid: string): Promise<void> {
    await this.exec([uuid, 'stop']);
  }

  async modify(uuid: string, modifications: string): Promise<void> {
    await this.exec([uuid, 'modify', ...splitWords(modifications)]);
  }

  async annotate(uuid: string, text: string): Promise<void> {
    await this.exec([uuid, 'annotate', text]);
  }

  async create(description: string): Promise<Task> {
    const output = await this.exec(['add', ...splitWords(description)]);
    const match = CREATED_RE.exec(output);
    if (!match?.[1]) {
      throw new BackendError('could not read the new task id', ['add'], output.trim());
    }
    const [task] = await this.query(match[1]);
    if (!task) {
      throw new BackendError(`task ${match[1]} was created but could not be exported`, ['add']);
    }
    return task;
  }

  async undo(): Promise<void> {
    await this.exec(['undo', 'rc.confirmation=off']);
  }

  async projectSummary(): Promise<ProjectSummary[]> {
    return parseSummaryOutput(await this.exec(['summary']));
  }

  editCommand(uuid: string): ExternalCommand {
    const command: ExternalCommand = { command: this.options.taskBin, args: [uuid, 'edit'] };
    if (this.options.taskrcPath) command.env = { TASKRC: this.options.taskrcPath };
    return command;
  }
}
