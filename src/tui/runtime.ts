import { logger } from '../logger.js';
import type { Command } from './commands.js';
import { dispatch, type DispatcherDeps } from './dispatcher.js';
import type { AppEvent } from './events.js';
import { Mailbox } from './mailbox.js';
import type { AppState } from './state.js';
import { initialize, transition } from './update.js';

export interface EventLoopOptions {
  state: AppState;
  mailbox: Mailbox<AppEvent>;
  deps: DispatcherDeps;
  render(state: AppState): void;
}

/**
 * Drains the mailbox through `transition` until the state asks to quit.
 * Commands run concurrently; each posts its answering event back.
 */
export async function runEventLoop(options: EventLoopOptions): Promise<AppState> {
  const { mailbox, deps, render } = options;

  const issue = (commands: readonly Command[]) => {
    for (const command of commands) {
      logger.debug('command', command.kind);
      dispatch(command, deps).then(
        (event) => mailbox.post(event),
        (error: unknown) => logger.error('dispatch.rejected', String(error))
      );
    }
  };

  let [state, commands] = initialize(options.state);
  render(state);
  issue(commands);

  while (!state.quitting) {
    const event = await mailbox.next();
    [state, commands] = transition(state, event);
    if (state.quitting) break;
    render(state);
    issue(commands);
  }
  return state;
}
