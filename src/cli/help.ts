import { boldText, dimText, supportsAnsiColor } from './terminal.js';

export function printHelp(message?: string): void {
  if (message) {
    console.error(message);
    console.error('');
  }

  const title = supportsAnsiColor
    ? `${boldText('taskdeck')} ${dimText('(terminal UI for Taskwarrior)')}`
    : 'taskdeck (terminal UI for Taskwarrior)';

  const lines = [
    title,
    '',
    'Usage: taskdeck [options]',
    '',
    formatSection('Options', [
      ['--config, -c <path>', 'Path to config file'],
      ['--task-bin <path>', 'Taskwarrior binary (default: task)'],
      ['--taskrc <path>', 'Taskwarrior rc file (sets TASKRC)'],
      ['--search <filter>', 'Start on the Search tab with this filter'],
      ['--log-level <level>', 'debug, info, warn or error'],
      ['--help, -h', 'Show help'],
      ['--version, -v', 'Show version'],
    ]),
    '',
    formatSection('Config', [
      ['Project config', 'Nearest .taskdeck.json (walks up from cwd)'],
      ['Global config', '~/.config/taskdeck/config.json'],
      ['Key fields', 'taskBin, taskrcPath, log, tui (tabs, columns, keybindings, customCommands)'],
    ]),
    '',
    dimText('Press ? inside the UI for keybindings.'),
  ];

  console.error(lines.join('\n'));
}

function formatSection(title: string, entries: [string, string][]): string {
  const header = supportsAnsiColor ? boldText(title) : title;
  const maxLen = Math.max(...entries.map(([name]) => name.length));
  const formatted = entries.map(([name, desc]) => {
    const paddedName = name.padEnd(maxLen);
    const renderedName = supportsAnsiColor ? boldText(paddedName) : paddedName;
    const summary = supportsAnsiColor ? dimText(desc) : desc;
    return `  ${renderedName}  ${summary}`;
  });
  return [header, ...formatted].join('\n');
}

export function printVersion(version: string): void {
  console.log(version);
}
