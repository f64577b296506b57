import { LogLevelSchema, loadConfig, type Config } from '../config/loader.js';
import { CliUsageError } from './errors.js';
import { extractFlags } from './flag-utils.js';

const VALUE_FLAGS = ['--config', '-c', '--task-bin', '--taskrc', '--search', '--log-level'] as const;

/**
 * Loads the config file, then lets command-line flags override it.
 */
export function resolveConfig(args: string[]): Config {
  const flags = extractFlags(args, VALUE_FLAGS);
  const unknown = args.find((arg) => arg.startsWith('-'));
  if (unknown !== undefined) {
    throw new CliUsageError(`Unknown option '${unknown}'. Run 'taskdeck --help' for usage.`);
  }
  if (args.length > 0) {
    throw new CliUsageError(`Unexpected argument '${args[0]}'. Use --search to start with a filter.`);
  }

  const config = loadConfig(flags['--config'] ?? flags['-c']);

  let level = config.log.level;
  const levelFlag = flags['--log-level'];
  if (levelFlag !== undefined) {
    const parsed = LogLevelSchema.safeParse(levelFlag);
    if (!parsed.success) {
      throw new CliUsageError(`Invalid --log-level '${levelFlag}'. Expected debug, info, warn or error.`);
    }
    level = parsed.data;
  }

  const search = flags['--search']?.trim();
  return {
    ...config,
    taskBin: flags['--task-bin'] ?? config.taskBin,
    taskrcPath: flags['--taskrc'] ?? config.taskrcPath,
    log: { ...config.log, level },
    initialSearchFilter: search ? search : undefined,
  };
}
