import type { Section } from '../schema/index.js';

export const SEARCH_SECTION = 'Search';
export const PROJECTS_SECTION = 'Projects';
export const TAGS_SECTION = 'Tags';

export const DEFAULT_TABS: readonly Section[] = [
  { name: 'Next', filter: '( status:pending or status:active ) -WAITING', sort: 'urgency' },
  { name: 'Waiting', filter: 'status:waiting', sort: 'urgency' },
  { name: PROJECTS_SECTION, filter: 'status:pending or status:active', sort: 'urgency' },
  { name: TAGS_SECTION, filter: 'status:pending or status:active', sort: 'urgency' },
  { name: 'All', filter: 'status:pending or status:waiting or status:active', sort: 'urgency' },
];

export const SEARCH_EMPTY_MESSAGE = [
  'Search across all tasks',
  '',
  'Press / to enter a search filter',
  '',
  'Examples:',
  "  bug                     search for 'bug' in all tasks",
  "  project:home            tasks in 'home' project",
  '  status:completed        completed tasks only',
  '  +urgent due.before:eom  urgent tasks due before end of month',
];

/**
 * "Search" always comes first; a configured tab with that name is dropped.
 */
export function buildSections(tabs: readonly Section[]): Section[] {
  return [{ name: SEARCH_SECTION, filter: '' }, ...tabs.filter((t) => t.name !== SEARCH_SECTION)];
}

export function isSearchSection(section: Section | undefined): boolean {
  return section?.name === SEARCH_SECTION;
}

export type GroupKind = 'project' | 'tag';

export function groupKindOf(section: Section | undefined): GroupKind | null {
  if (section?.name === PROJECTS_SECTION) return 'project';
  if (section?.name === TAGS_SECTION) return 'tag';
  return null;
}

/**
 * The Search tab widens queries to every status unless the user already
 * constrained it.
 */
export function effectiveFilter(filter: string, searchTab: boolean): string {
  if (searchTab && filter !== '' && !filter.includes('status:')) {
    return `status.any: ${filter}`;
  }
  return filter;
}
