import chalk from 'chalk';
import path from 'path';
import {
  LoggerService,
  LogStreamer,
  SpawnError,
  createSupervisor,
  describeError,
  describeStatus,
} from '../../packages/service-manager/src/index.js';
import type { LogFormat, ProcessSupervisor, ServiceConfig } from '../../packages/service-manager/src/index.js';
import { loadManifest, selectServices } from '../config/manifest.js';
import { getLogger } from '../utils/logger.js';
import { abortOnSignals, waitForAbort } from './options.js';
import { renderStatusTable } from './table.js';

export interface UpOptions {
  manifest?: string;
  logs: boolean;
  format: LogFormat;
  verbose: boolean;
}

/**
 * Starts the selected services, follows their log files until interrupted,
 * then stops everything it started.
 */
export async function runUp(names: string[], options: UpOptions): Promise<void> {
  const manifest = loadManifest(options.manifest);
  const selected = selectServices(manifest, names);
  const appLogger = getLogger();

  const activity = new LoggerService({
    console: options.verbose,
    sink: (service, record) => appLogger.record(service, record),
  });
  const supervisor = createSupervisor(activity);
  const streamer = new LogStreamer(undefined, activity);

  const killOnExit = () => supervisor.killAll();
  process.on('exit', killOnExit);
  reportTransitions(supervisor);

  const controller = new AbortController();
  const releaseSignals = abortOnSignals(controller);

  try {
    const configs = await Promise.all(selected.map(config => prepareLogFile(streamer, config)));
    const outcomes = await Promise.allSettled(configs.map(config => supervisor.start(config)));

    outcomes.forEach((outcome, index) => {
      // Spawn failures are already reported through the 'state' event
      if (outcome.status === 'rejected' && !(outcome.reason instanceof SpawnError)) {
        console.error(chalk.red(`✗ ${configs[index].name}: ${describeError(outcome.reason)}`));
      }
    });

    console.log('');
    console.log(renderStatusTable(supervisor.list()));
    console.log('');
    console.log(chalk.dim('Press Ctrl-C to stop all services.'));

    if (options.logs) {
      for (const config of configs) {
        if (config.logFile) {
          streamer.addLogFile(config.name, config.logFile, true);
        }
      }
      await streamer.stream({ follow: true, format: options.format, signal: controller.signal });
    } else {
      await waitForAbort(controller.signal);
    }
  } finally {
    releaseSignals();
    console.log(chalk.yellow('\nStopping services...'));
    await streamer.stop();
    await supervisor.shutdown();
    process.off('exit', killOnExit);
    console.log(chalk.green('All services stopped.'));
  }
}

async function prepareLogFile(streamer: LogStreamer, config: ServiceConfig): Promise<ServiceConfig> {
  if (!config.logFile) {
    return config;
  }
  const logFile = await streamer.createLogFile(config.name, path.dirname(config.logFile));
  return { ...config, logFile };
}

function reportTransitions(supervisor: ProcessSupervisor): void {
  supervisor.on('state', (name, state) => {
    if (state.kind === 'failed') {
      console.error(chalk.red(`✗ ${name} failed: ${state.reason}`));
    } else if (state.kind === 'running') {
      console.log(chalk.green(`✓ ${name} running`));
    }
  });

  const lastHealth = new Map<string, string>();
  supervisor.on('health', (name, health) => {
    if (lastHealth.get(name) === health.kind) {
      return;
    }
    lastHealth.set(name, health.kind);
    const line = `${name} ${describeStatus(health)}`;
    console.log(health.kind === 'healthy' ? chalk.green(`♥ ${line}`) : chalk.yellow(`! ${line}`));
  });

  supervisor.on('restarted', (name, restartCount) => {
    console.log(chalk.cyan(`↻ ${name} restarted (${restartCount})`));
  });
}
