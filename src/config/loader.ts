import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { SortMethodSchema } from '../schema/index.js';
import { DEFAULT_TABS } from '../core/sections.js';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const DEFAULT_KEYBINDINGS = {
  quit: 'q',
  help: '?',
  up: 'k',
  down: 'j',
  page_up: 'ctrl+u',
  page_down: 'ctrl+d',
  first: 'g',
  last: 'G',
  next_section: 'L',
  prev_section: 'H',
  done: 'd',
  delete: 'x',
  edit: 'e',
  modify: 'm',
  annotate: 'a',
  new: 'n',
  undo: 'u',
  filter: '/',
  refresh: 'r',
  start_stop: 's',
  export_markdown: 'M',
} as const;

export type KeyAction = keyof typeof DEFAULT_KEYBINDINGS;
export type Keybindings = Record<KeyAction, string>;

const TabSchema = z.object({
  name: z.string().min(1),
  filter: z.string(),
  sort: SortMethodSchema.optional(),
  reverse: z.boolean().optional(),
});

const ColumnSchema = z.object({
  name: z.string(),
  label: z.string(),
});

const CustomCommandSchema = z.object({
  name: z.string(),
  command: z.string(),
  description: z.string().optional(),
});
export type CustomCommand = z.infer<typeof CustomCommandSchema>;

function isKeyAction(name: string): name is KeyAction {
  return name in DEFAULT_KEYBINDINGS;
}

export const DEFAULT_COLUMNS = [
  { name: 'id', label: 'ID' },
  { name: 'project', label: 'Project' },
  { name: 'priority', label: 'P' },
  { name: 'due', label: 'Due' },
  { name: 'description', label: 'Description' },
];

export const ConfigSchema = z.object({
  taskBin: z.string().default('task'),
  taskrcPath: z.string().optional(),
  log: z
    .object({
      level: LogLevelSchema.default('error'),
      file: z.string().optional(),
    })
    .default({}),
  tui: z
    .object({
      sidebarWidth: z.number().int().default(33),
      tabs: z.array(TabSchema).default(() => DEFAULT_TABS.map((t) => ({ ...t }))),
      columns: z.array(ColumnSchema).default(() => DEFAULT_COLUMNS.map((c) => ({ ...c }))),
      keybindings: z.record(z.string(), z.string().min(1)).default({}),
      customCommands: z.record(z.string(), CustomCommandSchema).default({}),
    })
    .default({}),
});

export type FileConfig = z.infer<typeof ConfigSchema>;

export interface Config extends FileConfig {
  keybindings: Keybindings;
  logFile: string;
  initialSearchFilter?: string;
}

const CONFIG_FILENAME = '.taskdeck.json';

export function getGlobalConfigPath(): string {
  // Recompute each call so tests that stub HOME behave correctly.
  return path.join(process.env.HOME ?? process.env.USERPROFILE ?? '', '.config', 'taskdeck', 'config.json');
}

export function findConfigPath(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (true) {
    const configPath = path.join(dir, CONFIG_FILENAME);
    if (fs.existsSync(configPath)) {
      return configPath;
    }
    const parent = path.dirname(dir);
    if (parent === dir) {
      break;
    }
    dir = parent;
  }
  return null;
}

function finalize(parsed: FileConfig): Config {
  const keybindings: Keybindings = { ...DEFAULT_KEYBINDINGS };
  for (const [action, key] of Object.entries(parsed.tui.keybindings)) {
    if (isKeyAction(action)) keybindings[action] = key;
  }
  return {
    ...parsed,
    keybindings,
    logFile: parsed.log.file ?? path.join(os.tmpdir(), 'taskdeck.log'),
  };
}

export function loadConfig(configPath?: string): Config {
  const pathToLoad = configPath ?? findConfigPath() ?? getGlobalConfigPath();

  if (!fs.existsSync(pathToLoad)) {
    if (configPath) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    return finalize(ConfigSchema.parse({}));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(pathToLoad, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigError(`Invalid JSON in config file: ${pathToLoad}`);
    }
    throw error;
  }

  const result = ConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid config in ${pathToLoad}: ${issues}`);
  }
  return finalize(result.data);
}

/**
 * Sidebar width in columns; invalid percentages fall back to 33 and the
 * result never drops below 30 columns.
 */
export function resolveSidebarWidth(totalWidth: number, percent: number): number {
  const pct = percent > 0 && percent <= 100 ? percent : 33;
  return Math.max(30, Math.floor((totalWidth * pct) / 100));
}
