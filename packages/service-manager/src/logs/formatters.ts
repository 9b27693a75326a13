import chalk, { type ChalkInstance } from 'chalk';
import type { LogEntry, LogFormat, LogLevel } from '../types.js';

const LEVEL_COLORS: Record<LogLevel, (colors: ChalkInstance, text: string) => string> = {
  trace: (colors, text) => colors.gray(text),
  debug: (colors, text) => colors.cyan(text),
  info: (colors, text) => colors.green(text),
  warn: (colors, text) => colors.yellow(text),
  error: (colors, text) => colors.red(text),
};

export function formatEntry(entry: LogEntry, format: LogFormat, colors: ChalkInstance = chalk): string {
  switch (format) {
    case 'json':
      return formatJson(entry);
    case 'raw':
      return entry.raw;
    default:
      return formatPretty(entry, colors);
  }
}

export function formatPretty(entry: LogEntry, colors: ChalkInstance = chalk): string {
  const time = colors.dim(formatClock(entry.timestamp));
  const level = LEVEL_COLORS[entry.level](colors, entry.level.toUpperCase().padEnd(5));
  const line = `${time} ${level} ${colors.gray(entry.service)} ${entry.message}`;

  const keys = Object.keys(entry.fields);
  if (keys.length === 0) {
    return line;
  }

  const fields = keys.map(key => `${colors.cyan(key)}=${JSON.stringify(entry.fields[key])}`).join(' ');
  return `${line}\n  ${colors.dim(fields)}`;
}

export function formatJson(entry: LogEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    service: entry.service,
    level: entry.level,
    message: entry.message,
    fields: entry.fields,
    raw: entry.raw,
  });
}

/** Local wall-clock time as HH:MM:SS.mmm */
export function formatClock(date: Date): string {
  const pad = (value: number, width = 2) => String(value).padStart(width, '0');
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}
