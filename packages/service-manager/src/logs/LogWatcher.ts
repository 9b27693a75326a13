import type { Stats } from 'fs';
import { open, stat, type FileHandle } from 'fs/promises';
import { StringDecoder } from 'string_decoder';
import { LogIoError, isErrnoException } from '../errors.js';
import type { LogEntry } from '../types.js';
import { delay } from '../utils/delay.js';
import { parseLogLine } from './LogParser.js';

export const POLL_INTERVAL_MS = 100;
const CHUNK_SIZE = 64 * 1024;

export type LogSink = (entry: LogEntry) => void;

/**
 * Tails one log file. In follow mode it starts at the current end and keeps
 * polling; a file that shrinks or is replaced is reopened from offset zero.
 */
export class LogWatcher {
  private handle: FileHandle | null = null;
  private inode = 0;
  private position = 0;
  private pending = '';
  private decoder = new StringDecoder('utf8');

  constructor(
    readonly path: string,
    readonly service: string,
    private readonly sink: LogSink,
    private readonly pollIntervalMs: number = POLL_INTERVAL_MS
  ) {}

  async watch(follow: boolean, signal?: AbortSignal): Promise<void> {
    await this.reopen();

    try {
      if (follow) {
        this.position = (await this.requireHandle().stat()).size;
      }

      for (;;) {
        await this.drain();

        if (!follow) {
          this.flushPending();
          return;
        }

        if (!(await delay(this.pollIntervalMs, signal))) {
          return;
        }

        await this.detectRotation();
      }
    } finally {
      await this.closeHandle();
    }
  }

  private async drain(): Promise<void> {
    const handle = this.requireHandle();
    const buffer = Buffer.alloc(CHUNK_SIZE);

    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, CHUNK_SIZE, this.position);
      if (bytesRead === 0) {
        return;
      }
      this.position += bytesRead;
      this.consume(this.decoder.write(buffer.subarray(0, bytesRead)));
    }
  }

  private consume(text: string): void {
    const lines = (this.pending + text).split('\n');
    this.pending = lines.pop() ?? '';
    for (const line of lines) {
      this.emit(line);
    }
  }

  private flushPending(): void {
    const rest = this.pending + this.decoder.end();
    this.pending = '';
    this.emit(rest);
  }

  private emit(line: string): void {
    const entry = parseLogLine(line.replace(/\r$/, ''), this.service);
    if (entry) {
      this.sink(entry);
    }
  }

  private async detectRotation(): Promise<void> {
    let current: Stats;
    try {
      current = await stat(this.path);
    } catch (error) {
      // Mid-rotation the path may briefly not exist; keep the old handle
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return;
      }
      throw new LogIoError(this.path, error);
    }

    if (current.size < this.position || current.ino !== this.inode) {
      await this.reopen();
    }
  }

  private async reopen(): Promise<void> {
    await this.closeHandle();
    try {
      this.handle = await open(this.path, 'r');
      this.inode = (await this.handle.stat()).ino;
    } catch (error) {
      throw new LogIoError(this.path, error);
    }
    this.position = 0;
    this.pending = '';
    this.decoder = new StringDecoder('utf8');
  }

  private requireHandle(): FileHandle {
    if (!this.handle) {
      throw new LogIoError(this.path, new Error('file is not open'));
    }
    return this.handle;
  }

  private async closeHandle(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    await handle?.close();
  }
}
