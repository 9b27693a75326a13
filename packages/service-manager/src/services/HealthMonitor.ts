import { NotFoundError, describeError } from '../errors.js';
import type { IHealthChecker } from '../interfaces/IHealthChecker.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { HealthCheck, HealthStatus, ServiceHealth } from '../types.js';
import { validateHealthCheck } from '../utils/config.js';
import { delay } from '../utils/delay.js';
import { HealthCheckService } from './HealthCheckService.js';

/**
 * Registry of named health checks that is not tied to any supervised process,
 * e.g. infrastructure containers started by another tool.
 */
export class HealthMonitor {
  private checks: Map<string, HealthCheck> = new Map();
  private results: Map<string, ServiceHealth> = new Map();
  private polling: AbortController | null = null;

  constructor(
    private checker: IHealthChecker = new HealthCheckService(),
    private logger?: ILogger
  ) {}

  register(name: string, check: HealthCheck): void {
    validateHealthCheck(check, `Health check '${name}'`);
    this.checks.set(name, { ...check });
    this.results.set(name, {
      name,
      status: { kind: 'unknown' },
      consecutiveFailures: 0,
    });

    if (this.polling) {
      this.schedule(name, this.polling.signal);
    }
  }

  unregister(name: string): void {
    this.checks.delete(name);
    this.results.delete(name);
  }

  async checkOne(name: string): Promise<HealthStatus> {
    const check = this.checks.get(name);
    if (!check) {
      throw new NotFoundError(name);
    }

    const { status, latencyMs } = await this.checker.check(check);

    const previous = this.results.get(name);
    if (!previous || this.checks.get(name) !== check) {
      // Unregistered or replaced while the probe was in flight
      return status;
    }

    const health: ServiceHealth = {
      ...previous,
      status,
      lastCheck: new Date(),
      responseTimeMs: latencyMs,
    };

    switch (status.kind) {
      case 'healthy':
        health.consecutiveFailures = 0;
        health.healthySince = previous.healthySince ?? new Date();
        break;
      case 'degraded':
      case 'unhealthy':
        health.consecutiveFailures = previous.consecutiveFailures + 1;
        health.healthySince = undefined;
        break;
      default:
        break;
    }

    this.results.set(name, health);

    if (previous.status.kind !== status.kind) {
      this.logger?.addLog(
        name,
        status.kind === 'healthy' ? 'info' : 'warn',
        `Health status changed: ${previous.status.kind} -> ${describeStatus(status)}`
      );
    }

    return status;
  }

  async checkAll(): Promise<Map<string, HealthStatus>> {
    const names = Array.from(this.checks.keys());
    const settled = await Promise.allSettled(names.map(name => this.checkOne(name)));

    const results = new Map<string, HealthStatus>();
    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        results.set(names[index], outcome.value);
      } else {
        this.logger?.addLog(names[index], 'error', `Health check error: ${describeError(outcome.reason)}`);
      }
    });

    return results;
  }

  getStatus(name: string): ServiceHealth | undefined {
    const health = this.results.get(name);
    return health ? { ...health } : undefined;
  }

  getAllStatus(): ServiceHealth[] {
    return Array.from(this.results.values()).map(health => ({ ...health }));
  }

  isHealthy(name: string): boolean {
    return this.results.get(name)?.status.kind === 'healthy';
  }

  /**
   * True once a check has failed at least `retries` times in a row.
   */
  isExhausted(name: string): boolean {
    const check = this.checks.get(name);
    const health = this.results.get(name);
    return !!check && !!health && health.consecutiveFailures > 0 && health.consecutiveFailures >= check.retries;
  }

  unhealthyServices(): string[] {
    return Array.from(this.results.values())
      .filter(health => health.status.kind !== 'healthy' && health.status.kind !== 'unknown')
      .map(health => health.name);
  }

  /**
   * Polls every registered check on its own interval until {@link stop}.
   */
  start(): void {
    if (this.polling) {
      return;
    }
    this.polling = new AbortController();
    for (const name of this.checks.keys()) {
      this.schedule(name, this.polling.signal);
    }
  }

  stop(): void {
    this.polling?.abort();
    this.polling = null;
  }

  private schedule(name: string, signal: AbortSignal): void {
    const loop = async () => {
      const check = this.checks.get(name);
      while (check && this.checks.get(name) === check) {
        if (!(await delay(check.intervalMs, signal))) {
          return;
        }
        if (this.checks.get(name) !== check) {
          return;
        }
        await this.checkOne(name);
      }
    };

    loop().catch(error => {
      this.logger?.addLog(name, 'error', `Health polling stopped: ${describeError(error)}`);
    });
  }
}

export function describeStatus(status: HealthStatus): string {
  switch (status.kind) {
    case 'degraded':
    case 'unhealthy':
      return `${status.kind} (${status.reason})`;
    default:
      return status.kind;
  }
}
