import type { LogEntry, LogLevel } from '../types.js';

const LEVEL_PATTERN = /\b(TRACE|DEBUG|INFO|WARN|WARNING|ERROR)\b/i;
const TIMESTAMP_PATTERN = /(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})/;
const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:?\d{2})$/;

const TIMESTAMP_KEYS = ['timestamp', 'time', 'ts'];
const LEVEL_KEYS = ['level', 'severity'];
const MESSAGE_KEYS = ['message', 'msg'];

/**
 * Turns one raw line into a {@link LogEntry}. Only blank lines yield `null`:
 * anything that is not a JSON object is treated as free text, and missing
 * timestamps or levels fall back to "now" and `info`.
 */
export function parseLogLine(line: string, service: string, now: () => Date = () => new Date()): LogEntry | null {
  const trimmed = line.trim();
  if (!trimmed) {
    return null;
  }

  const json = parseJsonObject(trimmed);
  if (json) {
    return parseJsonLog(json, service, trimmed, now);
  }

  return parseTextLog(trimmed, service, now);
}

export function parseLevel(value: string): LogLevel {
  switch (value.toUpperCase()) {
    case 'TRACE':
      return 'trace';
    case 'DEBUG':
      return 'debug';
    case 'WARN':
    case 'WARNING':
      return 'warn';
    case 'ERROR':
      return 'error';
    default:
      return 'info';
  }
}

function parseJsonLog(fields: Record<string, unknown>, service: string, raw: string, now: () => Date): LogEntry {
  const timestamp = toTimestamp(takeFirst(fields, TIMESTAMP_KEYS)) ?? now();
  const level = toLevel(takeFirst(fields, LEVEL_KEYS)) ?? 'info';
  const message = takeFirst(fields, MESSAGE_KEYS);

  return {
    timestamp,
    service,
    level,
    message: typeof message === 'string' ? message : raw,
    fields,
    raw,
  };
}

function parseTextLog(line: string, service: string, now: () => Date): LogEntry {
  const stamp = TIMESTAMP_PATTERN.exec(line);
  const levelMatch = LEVEL_PATTERN.exec(line);

  return {
    timestamp: (stamp && fromUtcParts(stamp)) ?? now(),
    service,
    level: levelMatch ? parseLevel(levelMatch[1]) : 'info',
    message: line,
    fields: {},
    raw: line,
  };
}

function parseJsonObject(line: string): Record<string, unknown> | null {
  if (!line.startsWith('{')) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(line);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Removes the first present key, leaving the alternatives as ordinary fields
function takeFirst(fields: Record<string, unknown>, keys: string[]): unknown {
  for (const key of keys) {
    if (key in fields) {
      const value = fields[key];
      delete fields[key];
      return value;
    }
  }
  return undefined;
}

function toTimestamp(value: unknown): Date | null {
  if (typeof value === 'string' && RFC3339_PATTERN.test(value)) {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    // Epoch seconds (possibly fractional) or milliseconds
    return new Date(value < 1e12 ? value * 1000 : value);
  }
  return null;
}

function toLevel(value: unknown): LogLevel | null {
  if (typeof value === 'string') {
    return parseLevel(value);
  }
  if (typeof value === 'number') {
    // pino numeric levels
    if (value >= 50) return 'error';
    if (value >= 40) return 'warn';
    if (value >= 30) return 'info';
    if (value >= 20) return 'debug';
    return 'trace';
  }
  return null;
}

function fromUtcParts(match: RegExpExecArray): Date | null {
  const [, year, month, day, hour, minute, second] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
  return Number.isNaN(date.getTime()) ? null : date;
}
