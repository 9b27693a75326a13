import fs from 'fs';
import path from 'path';
import type { ActivityRecord } from '../../packages/service-manager/src/index.js';

export const LOG_LEVELS = ['ERROR', 'WARN', 'INFO', 'DEBUG'] as const;

export type LogLevelType = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  logToFile?: boolean;
  logFilePath?: string;
  logLevel?: LogLevelType;
  maxFileSize?: number; // in bytes
  enableConsole?: boolean;
}

export class Logger {
  private config: Required<LoggerConfig>;
  private logStream?: fs.WriteStream;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      logToFile: config.logToFile ?? false,
      logFilePath: config.logFilePath ?? path.join(process.cwd(), 'devfleet.log'),
      logLevel: config.logLevel ?? 'INFO',
      maxFileSize: config.maxFileSize ?? 10 * 1024 * 1024, // 10MB default
      enableConsole: config.enableConsole ?? false,
    };

    if (this.config.logToFile) {
      this.openLogFile();
    }
  }

  get filePath(): string | undefined {
    return this.config.logToFile ? this.config.logFilePath : undefined;
  }

  private openLogFile(): void {
    const filePath = this.config.logFilePath;
    try {
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      rotateIfOversized(filePath, this.config.maxFileSize);

      const stream = fs.createWriteStream(filePath, { flags: 'a' });
      stream.on('error', error => this.disableFileLogging(error));
      stream.write(`\n=== devfleet session started at ${new Date().toISOString()} ===\n`);
      this.logStream = stream;
    } catch (error) {
      this.disableFileLogging(error);
    }
  }

  private disableFileLogging(error: unknown): void {
    this.config.logToFile = false;
    this.logStream = undefined;
    console.error(`File logging disabled: ${error instanceof Error ? error.message : String(error)}`);
  }

  private writeLog(level: LogLevelType, message: string, args: unknown[]): void {
    if (LOG_LEVELS.indexOf(level) > LOG_LEVELS.indexOf(this.config.logLevel)) {
      return;
    }

    const line = formatLine(new Date(), level, message, args);
    this.logStream?.write(`${line}\n`);
    if (this.config.enableConsole) {
      console.log(line);
    }
  }

  error(message: string, ...args: unknown[]): void {
    this.writeLog('ERROR', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.writeLog('WARN', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.writeLog('INFO', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.writeLog('DEBUG', message, args);
  }

  /**
   * Sink for the supervisor's activity log: one line per record, tagged with the service.
   */
  record(service: string, record: ActivityRecord): void {
    const source = record.source ? ` [${record.source}]` : '';
    const line = `${service}${source}: ${record.message}`;

    switch (record.level) {
      case 'error':
        this.error(line);
        break;
      case 'warn':
        this.warn(line);
        break;
      case 'debug':
        this.debug(line);
        break;
      default:
        this.info(line);
        break;
    }
  }

  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = undefined;
    if (!stream) {
      return Promise.resolve();
    }
    return new Promise(resolve => stream.end(resolve));
  }
}

/**
 * Moves `filePath` to `<filePath>.old` once it exceeds `maxBytes`, replacing
 * any previous backup.
 */
export function rotateIfOversized(filePath: string, maxBytes: number): boolean {
  const stats = fs.statSync(filePath, { throwIfNoEntry: false });
  if (!stats || stats.size <= maxBytes) {
    return false;
  }
  const backupPath = `${filePath}.old`;
  fs.rmSync(backupPath, { force: true });
  fs.renameSync(filePath, backupPath);
  return true;
}

export function formatLine(at: Date, level: LogLevelType, message: string, args: unknown[] = []): string {
  const extras = args.map(arg => (typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)));
  return [`[${at.toISOString()}] ${level}: ${message}`, ...extras].join(' ');
}

let globalLogger: Logger | null = null;

export function initializeLogger(config: LoggerConfig = {}): Logger {
  if (globalLogger) {
    void globalLogger.close();
  }
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

export async function closeLogger(): Promise<void> {
  if (globalLogger) {
    const logger = globalLogger;
    globalLogger = null;
    await logger.close();
  }
}
