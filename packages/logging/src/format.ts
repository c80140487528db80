import { LogLevel, type LogEntry, type LogFormat } from './types.js';

const LEVEL_COLORS: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: '\x1b[36m',
  [LogLevel.INFO]: '\x1b[32m',
  [LogLevel.WARN]: '\x1b[33m',
  [LogLevel.ERROR]: '\x1b[31m',
};

const RESET = '\x1b[0m';

export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    level: LogLevel[entry.level],
    component: entry.component,
    message: entry.message,
    ...(entry.data && Object.keys(entry.data).length > 0 && { data: entry.data }),
    ...(entry.error && {
      error: {
        name: entry.error.name,
        message: entry.error.message,
        stack: entry.error.stack,
      },
    }),
  });
}

/**
 * `<iso timestamp> <LEVEL> [component] message {data}` followed by the error
 * stack on its own line
 */
export function formatText(entry: LogEntry, colors = false): string {
  const levelName = LogLevel[entry.level];
  const level = colors ? `${LEVEL_COLORS[entry.level]}${levelName}${RESET}` : levelName;

  let line = `${entry.timestamp.toISOString()} ${level} [${entry.component}] ${entry.message}`;

  if (entry.data && Object.keys(entry.data).length > 0) {
    line += ` ${JSON.stringify(entry.data)}`;
  }

  if (entry.error) {
    line += `\n${entry.error.stack ?? entry.error.message}`;
  }

  return line;
}

export function formatEntry(entry: LogEntry, format: LogFormat, colors = false): string {
  return format === 'json' ? formatJson(entry) : formatText(entry, colors);
}
