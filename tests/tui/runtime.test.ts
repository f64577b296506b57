import { describe, expect, it } from 'vitest';
import type { AppEvent } from '../../src/tui/events.js';
import { Mailbox } from '../../src/tui/mailbox.js';
import { runEventLoop } from '../../src/tui/runtime.js';
import type { AppState } from '../../src/tui/state.js';
import { FakeBackend } from '../helpers/fake-backend.js';
import { makeState, NOW } from '../helpers/state.js';
import { makeTask } from '../helpers/tasks.js';

describe('runEventLoop', () => {
  it('loads on start, renders results and stops on quit', async () => {
    const backend = new FakeBackend([makeTask({ description: 'Water plants', project: 'home', tags: ['next'] })]);
    const mailbox = new Mailbox<AppEvent>();
    const renders: AppState[] = [];

    const final = await runEventLoop({
      state: makeState(),
      mailbox,
      deps: {
        backend,
        runInteractive: async () => {},
        launchDetached: async () => {},
        copyToClipboard: () => ({ success: true }),
      },
      render: (state) => {
        renders.push(state);
        if (state.list.rows.length > 0) mailbox.post({ kind: 'key', name: 'q', at: NOW });
      },
    });

    expect(final.quitting).toBe(true);
    expect(final.list.rows.map((t) => t.description)).toEqual(['Water plants']);
    expect(renders[0]?.loading).toBe(true);
    expect(backend.calls).toContain('query status:pending');
  });
});
