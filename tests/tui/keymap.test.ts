import { describe, expect, it } from 'vitest';
import { DEFAULT_KEYBINDINGS } from '../../src/config/loader.js';
import { buildCustomCommandMap, buildKeyMap, keyMatches } from '../../src/tui/keymap.js';

describe('buildKeyMap', () => {
  it('converts every binding to a key name', () => {
    const keymap = buildKeyMap({ ...DEFAULT_KEYBINDINGS, quit: 'esc' });
    expect(keymap.quit).toBe('ESCAPE');
    expect(keymap.page_up).toBe('CTRL_U');
    expect(keymap.last).toBe('G');
    expect(keyMatches(keymap, 'CTRL_D', 'page_down')).toBe(true);
    expect(keyMatches(keymap, 'q', 'quit')).toBe(false);
  });
});

describe('buildCustomCommandMap', () => {
  it('indexes commands by key name', () => {
    const map = buildCustomCommandMap({
      o: { name: 'open', command: 'xdg-open {{.uuid}}' },
      'ctrl+o': { name: 'browse', command: 'browse {{.id}}' },
    });
    expect([...map.keys()]).toEqual(['o', 'CTRL_O']);
    expect(map.get('CTRL_O')?.name).toBe('browse');
  });
});
