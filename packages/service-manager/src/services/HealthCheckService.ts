import { spawn } from 'child_process';
import { HealthCheckError, describeError } from '../errors.js';
import type { IHealthChecker } from '../interfaces/IHealthChecker.js';
import type { HealthCheck, HealthStatus, ProbeResult } from '../types.js';

const USER_AGENT = 'devfleet-health-check/1.0';

/**
 * One-shot probes shared by the supervisor's pollers and the standalone monitor.
 * Never rejects: transport failures come back as an `unhealthy` status.
 */
export class HealthCheckService implements IHealthChecker {
  async check(target: Pick<HealthCheck, 'url' | 'command' | 'timeoutMs'>): Promise<ProbeResult> {
    const started = Date.now();

    try {
      if (target.url) {
        const httpStatus = await this.checkHttpHealth(target.url, target.timeoutMs);
        return { status: classifyHttpStatus(httpStatus), latencyMs: Date.now() - started, httpStatus };
      }

      if (target.command) {
        const status = await this.checkCommandHealth(target.command, target.timeoutMs);
        return { status, latencyMs: Date.now() - started };
      }

      return { status: { kind: 'unknown' }, latencyMs: 0 };
    } catch (error) {
      return {
        status: { kind: 'unhealthy', reason: describeError(error) },
        latencyMs: Date.now() - started,
      };
    }
  }

  private async checkHttpHealth(url: string, timeout: number): Promise<number> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      const response = await fetch(url, {
        signal: controller.signal,
        method: 'GET',
        headers: {
          'User-Agent': USER_AGENT,
        },
      });
      await response.body?.cancel();
      return response.status;
    } catch (error) {
      if (controller.signal.aborted) {
        throw new HealthCheckError(url, `timeout after ${timeout}ms`, error);
      }
      throw new HealthCheckError(url, `connection error: ${describeCause(error)}`, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private async checkCommandHealth(command: string, timeout: number): Promise<HealthStatus> {
    return new Promise((resolve, reject) => {
      const childProcess = spawn('sh', ['-c', command], {
        stdio: ['ignore', 'ignore', 'pipe'],
      });

      let stderr = '';
      const timeoutId = setTimeout(() => {
        childProcess.kill('SIGKILL');
        reject(new HealthCheckError(command, `timeout after ${timeout}ms`));
      }, timeout);

      childProcess.stderr?.on('data', data => {
        stderr += data.toString();
      });

      // 'close' rather than 'exit' so stderr has been fully read
      childProcess.on('close', (code, signal) => {
        clearTimeout(timeoutId);

        if (code === 0) {
          resolve({ kind: 'healthy' });
        } else if (signal) {
          resolve({ kind: 'unhealthy', reason: `command killed by signal ${signal}` });
        } else {
          const detail = stderr.trim().split('\n').pop();
          resolve({ kind: 'unhealthy', reason: `command exited with code ${code}${detail ? `: ${detail}` : ''}` });
        }
      });

      childProcess.on('error', error => {
        clearTimeout(timeoutId);
        reject(new HealthCheckError(command, error.message, error));
      });
    });
  }
}

export function classifyHttpStatus(status: number): HealthStatus {
  if (status >= 200 && status < 300) {
    return { kind: 'healthy' };
  }
  if (status >= 500) {
    return { kind: 'unhealthy', reason: `Server error: ${status}` };
  }
  return { kind: 'degraded', reason: `Status: ${status}` };
}

// fetch wraps socket errors as "fetch failed" with the useful part in `cause`
function describeCause(error: unknown): string {
  if (error instanceof Error && error.cause instanceof Error) {
    return error.cause.message || describeError(error);
  }
  return describeError(error);
}
