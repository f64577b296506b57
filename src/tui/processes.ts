import { spawn } from 'node:child_process';
import type { ExternalCommand } from '../backend/types.js';
import { logger } from '../logger.js';

/**
 * Runs a command attached to the terminal and waits for it. A non-zero exit
 * rejects.
 */
export function runForeground(command: ExternalCommand): Promise<void> {
  logger.debug('process.foreground', [command.command, ...command.args].join(' '));
  return new Promise((resolve, reject) => {
    const child = spawn(command.command, command.args, {
      stdio: 'inherit',
      env: { ...process.env, ...command.env },
    });
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) resolve();
      else reject(new Error(`${command.command} exited with code ${code ?? 'null'}`));
    });
  });
}

/**
 * Starts a process that outlives the UI; resolves once it has spawned.
 */
export function launchDetached(argv: readonly string[]): Promise<void> {
  const [command, ...args] = argv;
  if (command === undefined) return Promise.reject(new Error('empty command'));
  logger.debug('process.detached', argv.join(' '));

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { detached: true, stdio: 'ignore' });
    child.once('error', reject);
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
