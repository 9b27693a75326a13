import { spawn, ChildProcess, type StdioOptions } from 'child_process';
import * as path from 'path';
import * as fs from 'fs';
import type { Readable } from 'stream';
import { SpawnError, SignalError } from '../errors.js';
import type { IServiceProvider, TerminationOutcome } from '../interfaces/IServiceProvider.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { ServiceConfig } from '../types.js';
import { delay } from '../utils/delay.js';
import { ProcessHandle } from './ProcessHandle.js';

export class ProcessServiceProvider implements IServiceProvider {
  constructor(
    private logger: ILogger,
    private spawnTimeoutMs: number = 10_000
  ) {}

  async spawn(config: ServiceConfig): Promise<ProcessHandle> {
    const { name, command, args, env } = config;

    const workingDir = this.resolveWorkingDirectory(config);
    this.logger.addLog(name, 'info', `Starting process: ${command} ${args.join(' ')}`.trim());
    this.logger.addLog(name, 'debug', `Working directory: ${workingDir}`);

    const logFd = config.logFile ? this.openLogFile(name, config.logFile) : null;
    const stdio: StdioOptions = logFd === null ? ['ignore', 'pipe', 'pipe'] : ['ignore', logFd, logFd];

    try {
      const childProcess = spawn(command, args, {
        cwd: workingDir,
        env: { ...process.env, ...env },
        stdio,
        // Own process group, so a stop reaches every descendant
        detached: process.platform !== 'win32',
        windowsHide: true,
      });

      // Without a listener an 'error' after startup would crash the supervisor
      childProcess.on('error', error => {
        this.logger.addLog(name, 'error', `Process error: ${error.message}`);
      });

      await this.waitForProcessStart(childProcess);

      const handle = new ProcessHandle(childProcess);
      if (logFd === null) {
        this.pipeOutput(name, childProcess);
      }

      this.logger.addLog(name, 'info', `Process started with PID ${handle.pid}`);
      return handle;
    } catch (error) {
      throw new SpawnError(name, error);
    } finally {
      if (logFd !== null) {
        fs.closeSync(logFd);
      }
    }
  }

  async terminate(
    handle: ProcessHandle,
    options: { force: boolean; gracePeriodMs: number }
  ): Promise<TerminationOutcome> {
    if (handle.hasExited) {
      return 'exited';
    }

    if (options.force) {
      this.signal(handle, 'SIGKILL');
      await handle.exited;
      return 'killed';
    }

    try {
      this.signal(handle, 'SIGTERM');
    } catch (error) {
      if (!(error instanceof SignalError)) {
        throw error;
      }
      this.logger.addLog('system', 'warn', `${error.message}; escalating to SIGKILL`);
      this.signal(handle, 'SIGKILL');
      await handle.exited;
      return 'killed';
    }

    const grace = new AbortController();
    const exitedInTime = await Promise.race([
      handle.exited.then(() => true),
      delay(options.gracePeriodMs, grace.signal).then(() => false),
    ]).finally(() => grace.abort());

    if (exitedInTime) {
      return 'terminated';
    }

    this.signal(handle, 'SIGKILL');
    await handle.exited;
    return 'killed';
  }

  private signal(handle: ProcessHandle, signal: NodeJS.Signals): void {
    if (!handle.signal(signal)) {
      this.logger.addLog('system', 'debug', `Process ${handle.pid} already gone before ${signal}`);
    }
  }

  private pipeOutput(name: string, childProcess: ChildProcess): void {
    const forward = (source: 'stdout' | 'stderr', stream: Readable | null) => {
      if (!stream) {
        return;
      }

      const level = source === 'stderr' ? 'warn' : 'info';
      const emit = (line: string) => {
        if (line.trim()) {
          this.logger.addLog(name, level, line, source);
        }
      };

      let pending = '';
      stream.on('data', (data: Buffer) => {
        const lines = (pending + data.toString()).split('\n');
        pending = lines.pop() ?? '';
        lines.forEach(emit);
      });
      // unterminated last line
      stream.on('end', () => {
        emit(pending);
        pending = '';
      });
    };

    forward('stdout', childProcess.stdout);
    forward('stderr', childProcess.stderr);
  }

  private async waitForProcessStart(childProcess: ChildProcess): Promise<void> {
    return new Promise((resolve, reject) => {
      const timeout = setTimeout(() => {
        childProcess.kill('SIGKILL');
        reject(new Error(`Process start timeout after ${this.spawnTimeoutMs}ms`));
      }, this.spawnTimeoutMs);

      childProcess.once('spawn', () => {
        clearTimeout(timeout);
        resolve();
      });

      childProcess.once('error', error => {
        clearTimeout(timeout);
        reject(error);
      });
    });
  }

  private resolveWorkingDirectory(config: ServiceConfig): string {
    const resolved = path.resolve(config.workingDir);

    if (!fs.existsSync(resolved)) {
      throw new SpawnError(config.name, new Error(`Working directory does not exist: ${resolved}`));
    }

    if (!fs.statSync(resolved).isDirectory()) {
      throw new SpawnError(config.name, new Error(`Working directory is not a directory: ${resolved}`));
    }

    return resolved;
  }

  private openLogFile(name: string, logFile: string): number {
    const resolved = path.resolve(logFile);
    try {
      fs.mkdirSync(path.dirname(resolved), { recursive: true });
      return fs.openSync(resolved, 'a');
    } catch (error) {
      throw new SpawnError(name, error);
    }
  }
}
