export interface ListPickerState {
  title: string;
  items: readonly string[];
  filter: string;
  /** Items whose lower-cased text starts with the lower-cased filter. */
  matches: readonly string[];
  selected: number;
  scroll: number;
}

export const LIST_PICKER_MAX_VISIBLE = 10;

export function filterItems(items: readonly string[], filter: string): string[] {
  if (filter === '') return [...items];
  const needle = filter.toLowerCase();
  return items.filter((item) => item.toLowerCase().startsWith(needle));
}

export function createListPicker(title: string, items: readonly string[], filter: string): ListPickerState {
  return { title, items, filter, matches: filterItems(items, filter), selected: 0, scroll: 0 };
}

export function listPickerSelection(state: ListPickerState): string | null {
  return state.matches[state.selected] ?? null;
}

export function updateListPicker(state: ListPickerState, name: string): ListPickerState {
  switch (name) {
    case 'UP':
    case 'k': {
      if (state.selected === 0) return state;
      const selected = state.selected - 1;
      return { ...state, selected, scroll: Math.min(state.scroll, selected) };
    }
    case 'DOWN':
    case 'j': {
      if (state.selected >= state.matches.length - 1) return state;
      const selected = state.selected + 1;
      const scroll =
        selected >= state.scroll + LIST_PICKER_MAX_VISIBLE ? selected - LIST_PICKER_MAX_VISIBLE + 1 : state.scroll;
      return { ...state, selected, scroll };
    }
    default:
      return state;
  }
}

export function visibleItems(state: ListPickerState): { index: number; item: string }[] {
  return state.matches
    .slice(state.scroll, state.scroll + LIST_PICKER_MAX_VISIBLE)
    .map((item, offset) => ({ index: state.scroll + offset, item }));
}
