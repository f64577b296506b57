import type { CustomCommand, KeyAction, Keybindings } from '../config/loader.js';
import { bindingToKeyName } from './key-utils.js';

export type KeyMap = Readonly<Record<KeyAction, string>>;

export function buildKeyMap(bindings: Keybindings): KeyMap {
  const out: Keybindings = { ...bindings };
  for (const action of Object.keys(out)) {
    if (isAction(out, action)) out[action] = bindingToKeyName(out[action]);
  }
  return out;
}

function isAction(bindings: Keybindings, name: string): name is KeyAction {
  return name in bindings;
}

export function keyMatches(keymap: KeyMap, name: string, action: KeyAction): boolean {
  return keymap[action] === name;
}

/**
 * Custom commands are configured by binding; index them by key name.
 */
export function buildCustomCommandMap(commands: Record<string, CustomCommand>): ReadonlyMap<string, CustomCommand> {
  return new Map(Object.entries(commands).map(([binding, command]) => [bindingToKeyName(binding), command]));
}
