export interface FilterHistory {
  /** Oldest first. */
  entries: readonly string[];
  /** Position while walking with up/down; null when not walking. */
  index: number | null;
  /** What the user had typed before walking started. */
  draft: string;
}

export const MAX_HISTORY = 100;

export function createFilterHistory(): FilterHistory {
  return { entries: [], index: null, draft: '' };
}

export function addToHistory(history: FilterHistory, filter: string): FilterHistory {
  const trimmed = filter.trim();
  const entries =
    trimmed === '' || history.entries[history.entries.length - 1] === trimmed
      ? history.entries
      : [...history.entries, trimmed].slice(-MAX_HISTORY);
  return { entries, index: null, draft: '' };
}

export function resetHistoryWalk(history: FilterHistory): FilterHistory {
  return history.index === null ? history : { ...history, index: null, draft: '' };
}

/**
 * Steps to an older entry. Returns the text to show, or null when there is
 * nothing older.
 */
export function historyUp(history: FilterHistory, current: string): { history: FilterHistory; value: string } | null {
  if (history.entries.length === 0) return null;
  const index = history.index === null ? history.entries.length - 1 : history.index - 1;
  const value = history.entries[index];
  if (value === undefined) return null;
  const draft = history.index === null ? current : history.draft;
  return { history: { ...history, index, draft }, value };
}

export function historyDown(history: FilterHistory): { history: FilterHistory; value: string } | null {
  if (history.index === null) return null;
  const index = history.index + 1;
  const value = history.entries[index];
  if (value === undefined) {
    return { history: { ...history, index: null, draft: '' }, value: history.draft };
  }
  return { history: { ...history, index }, value };
}
