import fs from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogSink {
  (line: string): void;
}

let threshold: LogLevel = 'error';
let sink: LogSink | null = null;

/**
 * The terminal belongs to the UI while it runs, so log lines go to a file.
 */
export function fileSink(filePath: string): LogSink {
  return (line) => {
    fs.appendFileSync(filePath, `${line}\n`, 'utf-8');
  };
}

export function configureLogger(options: { level: LogLevel; sink: LogSink | null }): void {
  threshold = options.level;
  sink = options.sink;
}

function emit(level: LogLevel, event: string, detail: string): void {
  if (!sink || LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const timestamp = new Date().toISOString();
  try {
    sink(`[${timestamp}] [${level}] ${event} :: ${detail}`);
  } catch {
    // Unwritable sink: the line is dropped.
    return;
  }
}

export const logger = {
  debug(event: string, detail: string): void {
    emit('debug', event, detail);
  },
  info(event: string, detail: string): void {
    emit('info', event, detail);
  },
  warn(event: string, detail: string): void {
    emit('warn', event, detail);
  },
  error(event: string, detail: string): void {
    emit('error', event, detail);
  },
};
