import type { ChildProcess } from 'child_process';
import { SignalError, isErrnoException } from '../errors.js';
import type { ExitInfo } from '../types.js';

/**
 * Exclusive owner of one spawned child. The registry holds at most one per
 * service and hands it out through `takeHandle`, so only the taker may signal it.
 */
export class ProcessHandle {
  readonly pid: number;
  readonly exited: Promise<ExitInfo>;
  private exitInfo: ExitInfo | null = null;

  constructor(private readonly child: ChildProcess) {
    if (child.pid === undefined) {
      throw new Error('Child process has no PID');
    }
    this.pid = child.pid;
    this.exited = new Promise(resolve => {
      child.once('exit', (code, signal) => {
        this.exitInfo = { code, signal };
        resolve(this.exitInfo);
      });
    });
  }

  get hasExited(): boolean {
    return this.exitInfo !== null || this.child.exitCode !== null || this.child.signalCode !== null;
  }

  get exitStatus(): ExitInfo | null {
    return this.exitInfo;
  }

  /**
   * Signals the child's whole process group (it is spawned as a group leader),
   * falling back to the PID alone. Returns false when nothing was left to signal.
   */
  signal(signal: NodeJS.Signals): boolean {
    if (process.platform !== 'win32' && sendSignal(-this.pid, signal)) {
      return true;
    }
    return sendSignal(this.pid, signal);
  }
}

export function sendSignal(pid: number, signal: NodeJS.Signals): boolean {
  try {
    process.kill(pid, signal);
    return true;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ESRCH') {
      return false;
    }
    throw new SignalError(pid, signal, error);
  }
}
