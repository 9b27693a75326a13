export { ProcessSupervisor } from './services/ProcessSupervisor.js';
export { ProcessServiceProvider } from './services/ProcessServiceProvider.js';
export { ProcessHandle } from './services/ProcessHandle.js';
export { HealthCheckService, classifyHttpStatus } from './services/HealthCheckService.js';
export { HealthMonitor, describeStatus } from './services/HealthMonitor.js';
export { InMemoryServiceRepository } from './services/InMemoryServiceRepository.js';
export { LoggerService } from './services/LoggerService.js';
export type { ActivitySink, LoggerServiceOptions } from './services/LoggerService.js';

export { parseLogLine, parseLevel } from './logs/LogParser.js';
export { LogChannel } from './logs/LogChannel.js';
export { LogWatcher } from './logs/LogWatcher.js';
export { LogStreamer, DEFAULT_STREAM_CONFIG } from './logs/LogStreamer.js';
export type { OutputSink } from './logs/LogStreamer.js';
export { formatEntry } from './logs/formatters.js';

export {
  createServiceConfig,
  validateServiceConfig,
  validateHealthCheck,
  resolveSupervisorOptions,
  DEFAULT_HEALTH_CHECK,
} from './utils/config.js';
export * from './errors.js';
export * from './types.js';

export type { ILogger } from './interfaces/ILogger.js';
export type { IHealthChecker } from './interfaces/IHealthChecker.js';
export type { IServiceProvider } from './interfaces/IServiceProvider.js';
export type { IServiceRepository } from './interfaces/IServiceRepository.js';

import { ProcessSupervisor } from './services/ProcessSupervisor.js';
import { ProcessServiceProvider } from './services/ProcessServiceProvider.js';
import { HealthCheckService } from './services/HealthCheckService.js';
import { InMemoryServiceRepository } from './services/InMemoryServiceRepository.js';
import type { ILogger } from './interfaces/ILogger.js';
import type { SupervisorOptions } from './types.js';
import { resolveSupervisorOptions } from './utils/config.js';

/**
 * Wires a supervisor with the default in-memory registry, process provider and HTTP/command prober.
 */
export function createSupervisor(logger: ILogger, overrides: Partial<SupervisorOptions> = {}): ProcessSupervisor {
  const options = resolveSupervisorOptions(overrides);
  return new ProcessSupervisor(
    new InMemoryServiceRepository(),
    logger,
    new ProcessServiceProvider(logger, options.spawnTimeoutMs),
    new HealthCheckService(),
    options
  );
}
