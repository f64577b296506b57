import type { Terminal } from 'terminal-kit';

export function setCursorVisible(term: Terminal, visible: boolean): void {
  term.hideCursor(!visible);
}
