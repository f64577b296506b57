import type { Config, CustomCommand } from '../config/loader.js';
import type { ProjectSummary, Section } from '../schema/index.js';
import { buildSections, groupKindOf } from '../core/sections.js';
import type { StatusLevel } from './events.js';
import { createFilterHistory, type FilterHistory } from './filter-history.js';
import { buildCustomCommandMap, buildKeyMap, type KeyMap } from './keymap.js';
import { deriveLayout, type Layout, type WideLayout } from './layout.js';
import type { CompletionSources, Overlay, TextInputModeKind } from './overlay.js';
import { createTaskList, type TaskListState } from './task-list.js';
import type { TextInputState } from './text-input.js';

export interface TextInputMode {
  kind: TextInputModeKind;
  input: TextInputState;
  /** A picker opened from this input; it only exists while the input does. */
  overlay: Overlay | null;
}

export type PendingAction = { kind: 'delete'; uuids: string[] };

export type Mode =
  | { kind: 'normal' }
  | { kind: 'help'; scroll: number }
  | { kind: 'confirm'; action: PendingAction }
  | TextInputMode;

export interface StatusMessage {
  level: StatusLevel;
  text: string;
}

export interface Column {
  name: string;
  label: string;
}

export interface EngineSettings {
  keymap: KeyMap;
  /** Keyed by terminal key name. */
  customCommands: ReadonlyMap<string, CustomCommand>;
  columns: readonly Column[];
  sidebarPercent: number;
}

export interface AppState {
  settings: EngineSettings;
  mode: Mode;
  layout: Layout;
  /** Wide layout to return to when the terminal grows past the small threshold. */
  preferredLayout: WideLayout;
  width: number;
  height: number;
  sections: readonly Section[];
  sectionIndex: number;
  /** Filter of the current list. */
  activeFilter: string;
  /** What the Search tab shows when it is revisited. */
  searchFilter: string;
  list: TaskListState;
  summaries: readonly ProjectSummary[];
  completions: CompletionSources;
  history: FilterHistory;
  message: StatusMessage | null;
  loading: boolean;
  /** Id of the newest task load; older results are stale. */
  latestLoadId: number;
  detailScroll: number;
  quitting: boolean;
}

export function isTextInputMode(mode: Mode): mode is TextInputMode {
  return (
    mode.kind === 'filterInput' ||
    mode.kind === 'modifyInput' ||
    mode.kind === 'annotateInput' ||
    mode.kind === 'newTaskInput'
  );
}

export function currentSection(state: AppState): Section | undefined {
  return state.sections[state.sectionIndex];
}

export function settingsFromConfig(config: Config): EngineSettings {
  return {
    keymap: buildKeyMap(config.keybindings),
    customCommands: buildCustomCommandMap(config.tui.customCommands),
    columns: config.tui.columns,
    sidebarPercent: config.tui.sidebarWidth,
  };
}

export interface InitialStateOptions {
  width: number;
  height: number;
  initialSearchFilter?: string;
}

/**
 * Starts on the first configured tab, or on Search when a search filter was
 * given on the command line.
 */
export function createInitialState(
  settings: EngineSettings,
  tabs: readonly Section[],
  options: InitialStateOptions
): AppState {
  const sections = buildSections(tabs);
  const search = options.initialSearchFilter?.trim() ?? '';
  const sectionIndex = search !== '' || sections.length < 2 ? 0 : 1;
  const section = sections[sectionIndex];

  return {
    settings,
    mode: { kind: 'normal' },
    layout: deriveLayout('list', 'list', options.width),
    preferredLayout: 'list',
    width: options.width,
    height: options.height,
    sections,
    sectionIndex,
    activeFilter: search !== '' ? search : section?.filter ?? '',
    searchFilter: search,
    list: createTaskList(groupKindOf(section), { sort: section?.sort, reverse: section?.reverse ?? false }),
    summaries: [],
    completions: { projects: [], tags: [] },
    history: createFilterHistory(),
    message: null,
    loading: false,
    latestLoadId: 0,
    detailScroll: 0,
    quitting: false,
  };
}
