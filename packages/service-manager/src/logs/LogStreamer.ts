import { appendFile, mkdir } from 'fs/promises';
import * as path from 'path';
import { ConfigError, LogIoError, describeError } from '../errors.js';
import type { ILogger } from '../interfaces/ILogger.js';
import { LOG_LEVELS } from '../types.js';
import type { LogEntry, LogLevel, LogStreamConfig } from '../types.js';
import { LogChannel } from './LogChannel.js';
import { LogWatcher, POLL_INTERVAL_MS } from './LogWatcher.js';
import { formatEntry } from './formatters.js';

export const DEFAULT_STREAM_CONFIG: LogStreamConfig = {
  follow: false,
  lines: 100,
  format: 'pretty',
};

const RECEIVE_TIMEOUT_MS = 100;

export type OutputSink = (text: string) => void;

interface WatcherTask {
  follow: boolean;
  done: boolean;
  task: Promise<void>;
}

export interface StreamFilters {
  minLevel?: number;
  service?: string;
  pattern?: RegExp;
}

export class LogStreamer {
  private readonly channel = new LogChannel<LogEntry>();
  private watchers: Map<string, WatcherTask> = new Map();
  private readonly teardown = new AbortController();

  constructor(
    private readonly output: OutputSink = text => process.stdout.write(`${text}\n`),
    private readonly logger?: ILogger,
    private readonly pollIntervalMs: number = POLL_INTERVAL_MS
  ) {}

  /**
   * Starts a watcher for `filePath`. Re-adding a service replaces the tracked
   * task without cancelling the previous one.
   */
  addLogFile(service: string, filePath: string, follow: boolean): void {
    const watcher = new LogWatcher(filePath, service, entry => this.channel.send(entry), this.pollIntervalMs);

    const tracked: WatcherTask = {
      follow,
      done: false,
      task: Promise.resolve(),
    };

    tracked.task = watcher
      .watch(follow, this.teardown.signal)
      .catch(error => {
        this.logger?.addLog(service, 'error', `Error watching log file ${filePath}: ${describeError(error)}`);
      })
      .finally(() => {
        tracked.done = true;
      });

    this.watchers.set(service, tracked);
  }

  activeWatchers(): string[] {
    return Array.from(this.watchers.entries())
      .filter(([, watcher]) => !watcher.done)
      .map(([service]) => service);
  }

  /**
   * Renders entries to the output sink and resolves with how many were shown.
   * Without `follow`, collects until the channel stays quiet and prints only
   * the last `lines` matches; with it, prints as entries arrive until
   * `config.signal` aborts or the streamer is stopped.
   */
  async stream(options: Partial<LogStreamConfig> = {}): Promise<number> {
    const config: LogStreamConfig = { ...DEFAULT_STREAM_CONFIG, ...options };
    const filters = compileFilters(config);

    if (!config.follow) {
      const buffer: LogEntry[] = [];
      for (;;) {
        const entry = await this.channel.receive(RECEIVE_TIMEOUT_MS, config.signal);
        if (entry) {
          if (matchesFilters(entry, filters)) {
            buffer.push(entry);
          }
          continue;
        }
        if (config.signal?.aborted || !this.hasPendingReads()) {
          break;
        }
      }

      const shown = config.lines === undefined ? buffer : buffer.slice(Math.max(0, buffer.length - config.lines));
      for (const entry of shown) {
        this.output(formatEntry(entry, config.format));
      }
      return shown.length;
    }

    let count = 0;
    while (!config.signal?.aborted && !this.teardown.signal.aborted) {
      const entry = await this.channel.receive(RECEIVE_TIMEOUT_MS, config.signal);
      if (entry && matchesFilters(entry, filters)) {
        this.output(formatEntry(entry, config.format));
        count++;
      }
    }
    return count;
  }

  /**
   * Creates (or appends to) `<dir>/<service>.log` with a start marker line.
   */
  async createLogFile(service: string, dir: string): Promise<string> {
    const logPath = path.join(dir, `${service}.log`);
    try {
      await mkdir(dir, { recursive: true });
      await appendFile(logPath, `${formatMarkerTime(new Date())} [INFO] Service '${service}' started\n`, 'utf8');
    } catch (error) {
      throw new LogIoError(logPath, error);
    }
    return logPath;
  }

  /**
   * Ends follow-mode watchers and any follow-mode stream.
   */
  async stop(): Promise<void> {
    this.teardown.abort();
    await Promise.allSettled(Array.from(this.watchers.values()).map(watcher => watcher.task));
    this.watchers.clear();
  }

  // One-shot watchers still reading mean more entries are on their way
  private hasPendingReads(): boolean {
    for (const watcher of this.watchers.values()) {
      if (!watcher.follow && !watcher.done) {
        return true;
      }
    }
    return false;
  }
}

export function compileFilters(config: Pick<LogStreamConfig, 'levelFilter' | 'serviceFilter' | 'patternFilter'>): StreamFilters {
  const { patternFilter } = config;
  return {
    minLevel: config.levelFilter ? levelRank(config.levelFilter) : undefined,
    service: config.serviceFilter,
    pattern: patternFilter === undefined ? undefined : compilePattern(patternFilter),
  };
}

// Global and sticky flags would make test() stateful across entries
function compilePattern(pattern: RegExp | string): RegExp {
  if (typeof pattern !== 'string') {
    return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  }
  try {
    return new RegExp(pattern);
  } catch (error) {
    throw new ConfigError(`Invalid pattern filter '${pattern}': ${describeError(error)}`);
  }
}

export function matchesFilters(entry: LogEntry, filters: StreamFilters): boolean {
  if (filters.minLevel !== undefined && levelRank(entry.level) < filters.minLevel) {
    return false;
  }
  if (filters.service !== undefined && !entry.service.includes(filters.service)) {
    return false;
  }
  if (filters.pattern && !filters.pattern.test(entry.message)) {
    return false;
  }
  return true;
}

export function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

function formatMarkerTime(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}
