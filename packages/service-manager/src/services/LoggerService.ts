import chalk from 'chalk';
import type { ILogger } from '../interfaces/ILogger.js';
import type { ActivityRecord } from '../types.js';

const MAX_MESSAGE_LENGTH = 1000;
const CONTROL_CHARACTERS = /[\x00-\x1F\x7F]/g;

export type ActivitySink = (service: string, record: ActivityRecord) => void;

export interface LoggerServiceOptions {
  maxLogsPerService?: number;
  console?: boolean;
  sink?: ActivitySink;
}

/**
 * Per-service activity rings. Oldest records fall off once a service
 * reaches `maxLogsPerService`.
 */
export class LoggerService implements ILogger {
  private readonly rings = new Map<string, ActivityRecord[]>();
  private readonly capacity: number;
  private readonly console: boolean;
  private readonly sink?: ActivitySink;

  constructor(options: LoggerServiceOptions = {}) {
    this.capacity = options.maxLogsPerService ?? 1000;
    this.console = options.console ?? true;
    this.sink = options.sink;
  }

  addLog(service: string, level: ActivityRecord['level'], message: string, source?: ActivityRecord['source']): void {
    const record: ActivityRecord = { timestamp: new Date(), level, message: cleanMessage(message), source };
    this.append(service, record);

    this.sink?.(service, record);
    if (this.console) {
      this.logToConsole(service, record);
    }
  }

  getLogs(service: string, limit?: number): ActivityRecord[] {
    const ring = this.rings.get(service) ?? [];
    return limit && limit > 0 ? ring.slice(-limit) : ring.slice();
  }

  clearLogs(service: string): void {
    this.rings.delete(service);
  }

  getServiceNames(): string[] {
    return [...this.rings.keys()];
  }

  private append(service: string, record: ActivityRecord): void {
    let ring = this.rings.get(service);
    if (!ring) {
      ring = [];
      this.rings.set(service, ring);
    }
    ring.push(record);
    if (ring.length > this.capacity) {
      ring.shift();
    }
  }

  private logToConsole(service: string, record: ActivityRecord): void {
    const timestamp = chalk.dim(record.timestamp.toISOString());
    const source = record.source ? chalk.gray(` [${record.source}]`) : '';
    const message = `${timestamp} ${chalk.bold(service)}${source} ${record.message}`;

    switch (record.level) {
      case 'error':
        console.error(chalk.red(message));
        break;
      case 'warn':
        console.warn(chalk.yellow(message));
        break;
      case 'debug':
        if (process.env.DEBUG) {
          console.debug(message);
        }
        break;
      default:
        console.log(message);
        break;
    }
  }
}

function cleanMessage(message: string): string {
  return message.replace(CONTROL_CHARACTERS, '').slice(0, MAX_MESSAGE_LENGTH).trim();
}
