import terminalKit, { type Terminal } from 'terminal-kit';
import type { ExternalCommand, TaskBackend } from '../backend/types.js';
import type { Config } from '../config/loader.js';
import { logger } from '../logger.js';
import { copyToClipboard } from './clipboard.js';
import type { AppEvent } from './events.js';
import { Mailbox } from './mailbox.js';
import { launchDetached, runForeground } from './processes.js';
import { runEventLoop } from './runtime.js';
import type { Line, StyleName } from './segments.js';
import { createInitialState, settingsFromConfig, type AppState } from './state.js';
import { setCursorVisible } from './term-cursor.js';
import { renderScreen } from './view.js';

export interface TuiOptions {
  config: Config;
  backend: TaskBackend;
}

type Painter = (text: string) => void;

function createPalette(term: Terminal, colorsDisabled: boolean): Record<StyleName, Painter> {
  const plain: Painter = (s) => {
    term(s);
  };
  const styled =
    (paint: Painter): Painter =>
    (s) =>
      colorsDisabled ? plain(s) : paint(s);
  return {
    text: plain,
    bold: styled((s) => term.bold(s)),
    dim: styled((s) => term.dim(s)),
    inverse: (s) => {
      // Cursor rows stay visible without colors.
      term.inverse(s);
    },
    red: styled((s) => term.red(s)),
    yellow: styled((s) => term.yellow(s)),
    green: styled((s) => term.green(s)),
    cyan: styled((s) => term.cyan(s)),
    magenta: styled((s) => term.magenta(s)),
  };
}

/** terminal-kit reports a few keys under aliases. */
export function normalizeKeyName(name: string): string {
  switch (name) {
    case 'KP_ENTER':
      return 'ENTER';
    case 'SPACE':
      return ' ';
    default:
      return name;
  }
}

function terminalSize(term: Terminal): { width: number; height: number } {
  return { width: term.width, height: term.height };
}

export async function runInteractiveTui(options: TuiOptions): Promise<void> {
  const term: Terminal = terminalKit.terminal;
  const palette = createPalette(term, process.env.NO_COLOR !== undefined);
  const mailbox = new Mailbox<AppEvent>();
  let suspended = false;
  let lastState: AppState | null = null;

  const writeLine = (line: Line): void => {
    for (const segment of line) palette[segment.style](segment.text);
  };

  const render = (state: AppState): void => {
    lastState = state;
    if (suspended) return;
    const screen = renderScreen(state, new Date());
    term.styleReset();
    screen.lines.forEach((line, row) => {
      term.moveTo(1, row + 1);
      writeLine(line);
    });
    if (screen.popup) {
      const { row, col, lines } = screen.popup;
      lines.forEach((line, i) => {
        term.moveTo(col + 1, row + i + 1);
        writeLine(line);
      });
    }
    term.styleReset();
    if (screen.cursor) {
      term.moveTo(screen.cursor.col + 1, screen.cursor.row + 1);
      setCursorVisible(term, true);
    } else {
      setCursorVisible(term, false);
    }
  };

  const onKey = (name: string): void => {
    mailbox.post({ kind: 'key', name: normalizeKeyName(name), at: new Date() });
  };

  const onResize = (): void => {
    mailbox.post({ kind: 'resize', ...terminalSize(term) });
  };

  const enterScreen = (): void => {
    term.fullscreen(true);
    term.grabInput({ mouse: undefined });
  };

  const leaveScreen = (): void => {
    term.grabInput(false);
    term.fullscreen(false);
    setCursorVisible(term, true);
    term.styleReset();
  };

  // The backend's editor needs the real terminal; keys are not grabbed meanwhile.
  const runInteractive = async (command: ExternalCommand): Promise<void> => {
    suspended = true;
    leaveScreen();
    try {
      await runForeground(command);
    } finally {
      enterScreen();
      suspended = false;
      term.clear();
      if (lastState) render(lastState);
    }
  };

  const settings = settingsFromConfig(options.config);
  const state = createInitialState(settings, options.config.tui.tabs, {
    ...terminalSize(term),
    initialSearchFilter: options.config.initialSearchFilter,
  });

  enterScreen();
  term.clear();
  process.stdout.on('resize', onResize);
  term.on('key', onKey);
  logger.info('tui.start', `${state.width}x${state.height}`);

  try {
    await runEventLoop({
      state,
      mailbox,
      render,
      deps: {
        backend: options.backend,
        runInteractive,
        launchDetached,
        copyToClipboard,
      },
    });
  } finally {
    term.removeListener('key', onKey);
    process.stdout.removeListener('resize', onResize);
    leaveScreen();
    term.clear();
    logger.info('tui.stop', 'terminal restored');
  }
}
