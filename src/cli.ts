#!/usr/bin/env node
import { TaskwarriorBackend } from './backend/taskwarrior.js';
import { printHelp, printVersion } from './cli/help.js';
import { CliUsageError } from './cli/errors.js';
import { extractBooleanFlags } from './cli/flag-utils.js';
import { resolveConfig } from './cli/options.js';
import { ConfigError } from './config/loader.js';
import { configureLogger, fileSink, logger } from './logger.js';
import { runInteractiveTui } from './tui/interactive.js';

const VERSION = '0.1.0';

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const booleanFlags = extractBooleanFlags(args, ['--help', '-h', '--version', '-v']);
  if (booleanFlags.has('--help') || booleanFlags.has('-h')) {
    printHelp();
    return;
  }
  if (booleanFlags.has('--version') || booleanFlags.has('-v')) {
    printVersion(VERSION);
    return;
  }

  try {
    const config = resolveConfig(args);
    configureLogger({ level: config.log.level, sink: fileSink(config.logFile) });
    logger.info('startup', `taskBin=${config.taskBin} taskrc=${config.taskrcPath ?? '(default)'}`);

    const backend = new TaskwarriorBackend({ taskBin: config.taskBin, taskrcPath: config.taskrcPath });
    await runInteractiveTui({ config, backend });
    // terminal-kit keeps stdin referenced after releasing input.
    process.exit(0);
  } catch (error) {
    if (error instanceof CliUsageError || error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
      return;
    }
    if (error instanceof Error) {
      logger.error('fatal', error.stack ?? error.message);
      console.error(`Error: ${error.message}`);
      process.exit(1);
      return;
    }
    throw error;
  }
}

main().catch((error) => {
  console.error('Unexpected error:', error);
  process.exit(1);
});
