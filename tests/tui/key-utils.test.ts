import { describe, expect, it } from 'vitest';
import { bindingToKeyName, digitOf, isPrintableKeyName, isSpaceKeyName } from '../../src/tui/key-utils.js';

describe('isSpaceKeyName', () => {
  it('treats both SPACE and literal space as space', () => {
    expect(isSpaceKeyName('SPACE')).toBe(true);
    expect(isSpaceKeyName(' ')).toBe(true);
  });

  it('rejects non-space keys', () => {
    expect(isSpaceKeyName('ENTER')).toBe(false);
    expect(isSpaceKeyName('a')).toBe(false);
    expect(isSpaceKeyName('')).toBe(false);
  });
});

describe('isPrintableKeyName', () => {
  it('accepts single characters, wide ones included', () => {
    expect(isPrintableKeyName('x')).toBe(true);
    expect(isPrintableKeyName('é')).toBe(true);
    expect(isPrintableKeyName('ENTER')).toBe(false);
  });
});

describe('bindingToKeyName', () => {
  it('keeps single characters as they are', () => {
    expect(bindingToKeyName('G')).toBe('G');
    expect(bindingToKeyName('/')).toBe('/');
  });

  it('maps named keys', () => {
    expect(bindingToKeyName('esc')).toBe('ESCAPE');
    expect(bindingToKeyName('Enter')).toBe('ENTER');
    expect(bindingToKeyName('space')).toBe(' ');
    expect(bindingToKeyName('PgUp')).toBe('PAGE_UP');
  });

  it('joins modifiers the way the terminal reports them', () => {
    expect(bindingToKeyName('ctrl+u')).toBe('CTRL_U');
    expect(bindingToKeyName('shift+tab')).toBe('SHIFT_TAB');
    expect(bindingToKeyName('alt+enter')).toBe('ALT_ENTER');
    expect(bindingToKeyName('f5')).toBe('F5');
  });
});

describe('digitOf', () => {
  it('reads single digits only', () => {
    expect(digitOf('7')).toBe(7);
    expect(digitOf('0')).toBe(0);
    expect(digitOf('12')).toBeNull();
    expect(digitOf('a')).toBeNull();
  });
});
