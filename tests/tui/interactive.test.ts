import { describe, expect, it } from 'vitest';
import { normalizeKeyName } from '../../src/tui/interactive.js';

describe('normalizeKeyName', () => {
  it('maps terminal aliases onto the names the engine expects', () => {
    expect(normalizeKeyName('KP_ENTER')).toBe('ENTER');
    expect(normalizeKeyName('SPACE')).toBe(' ');
    expect(normalizeKeyName('CTRL_U')).toBe('CTRL_U');
  });
});
