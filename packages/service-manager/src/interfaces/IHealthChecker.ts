import type { HealthCheck, ProbeResult } from '../types.js';

export interface IHealthChecker {
  check(target: Pick<HealthCheck, 'url' | 'command' | 'timeoutMs'>): Promise<ProbeResult>;
}
