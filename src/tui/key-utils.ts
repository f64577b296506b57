/**
 * Key names follow terminal-kit: printable keys arrive as the character itself,
 * everything else as an upper-case name such as `ENTER`, `CTRL_U` or `SHIFT_TAB`.
 */

export function isSpaceKeyName(name: string): boolean {
  return name === ' ' || name === 'SPACE';
}

export function isPrintableKeyName(name: string): boolean {
  return Array.from(name).length === 1;
}

const NAMED_KEYS: Record<string, string> = {
  esc: 'ESCAPE',
  escape: 'ESCAPE',
  enter: 'ENTER',
  return: 'ENTER',
  tab: 'TAB',
  space: ' ',
  backspace: 'BACKSPACE',
  delete: 'DELETE',
  up: 'UP',
  down: 'DOWN',
  left: 'LEFT',
  right: 'RIGHT',
  home: 'HOME',
  end: 'END',
  pgup: 'PAGE_UP',
  pageup: 'PAGE_UP',
  pgdown: 'PAGE_DOWN',
  pagedown: 'PAGE_DOWN',
};

/**
 * Converts a configured binding (`ctrl+u`, `shift+tab`, `G`, `esc`) into the
 * key name the terminal reports.
 */
export function bindingToKeyName(binding: string): string {
  if (isPrintableKeyName(binding)) return binding;
  const lower = binding.toLowerCase();
  const named = NAMED_KEYS[lower];
  if (named) return named;

  const parts = lower.split('+').filter((p) => p.length > 0);
  const last = parts.pop();
  if (last === undefined) return binding;
  const base = NAMED_KEYS[last] ?? last;
  return [...parts, base].map((p) => p.toUpperCase()).join('_');
}

export function digitOf(name: string): number | null {
  return /^[0-9]$/.test(name) ? Number(name) : null;
}
