import chalk from 'chalk';
import { HealthMonitor, LoggerService } from '../../packages/service-manager/src/index.js';
import { loadManifest, selectServices } from '../config/manifest.js';
import { getLogger } from '../utils/logger.js';
import { renderHealthTable } from './table.js';

export interface HealthOptions {
  manifest?: string;
}

/**
 * Runs one round of every configured health check. Resolves `false` when any
 * check came back degraded or unhealthy.
 */
export async function runHealth(names: string[], options: HealthOptions): Promise<boolean> {
  const manifest = loadManifest(options.manifest);
  const appLogger = getLogger();
  const monitor = new HealthMonitor(
    undefined,
    new LoggerService({ console: false, sink: (service, record) => appLogger.record(service, record) })
  );

  for (const service of selectServices(manifest, names)) {
    if (service.healthCheck) {
      monitor.register(service.name, service.healthCheck);
    }
  }

  const results = monitor.getAllStatus();
  if (results.length === 0) {
    console.log(chalk.yellow('No health checks configured.'));
    return true;
  }

  await monitor.checkAll();
  console.log(renderHealthTable(monitor.getAllStatus()));

  return monitor.unhealthyServices().length === 0;
}
