import chalk from 'chalk';
import fs from 'fs';
import path from 'path';
import { LogIoError, LogStreamer, isErrnoException } from '../../packages/service-manager/src/index.js';
import type { LogFormat, LogLevel } from '../../packages/service-manager/src/index.js';
import { DEFAULT_LOG_DIR, MANIFEST_FILE, loadManifest } from '../config/manifest.js';
import { getLogger } from '../utils/logger.js';
import { abortOnSignals } from './options.js';

export interface LogsOptions {
  manifest?: string;
  dir?: string;
  follow: boolean;
  lines: number;
  level?: LogLevel;
  grep?: string;
  format: LogFormat;
}

/**
 * Prints (and optionally follows) `<logDir>/<service>.log` files. The log
 * directory comes from `--dir`, else the manifest, else `.logs`.
 */
export async function runLogs(service: string | undefined, options: LogsOptions): Promise<void> {
  const logDir = resolveLogDir(options);
  const files = listLogFiles(logDir).filter(file => !service || file.service.includes(service));

  if (files.length === 0) {
    console.log(chalk.yellow(service ? `No log files matching '${service}' in ${logDir}` : `No log files in ${logDir}`));
    return;
  }

  const streamer = new LogStreamer();
  const controller = new AbortController();
  const releaseSignals = options.follow ? abortOnSignals(controller) : () => undefined;

  try {
    for (const file of files) {
      getLogger().debug(`Watching ${file.path}`);
      streamer.addLogFile(file.service, file.path, options.follow);
    }

    await streamer.stream({
      follow: options.follow,
      lines: options.lines,
      levelFilter: options.level,
      serviceFilter: service,
      patternFilter: options.grep,
      format: options.format,
      signal: controller.signal,
    });
  } finally {
    releaseSignals();
    await streamer.stop();
  }
}

export function resolveLogDir(options: Pick<LogsOptions, 'manifest' | 'dir'>): string {
  if (options.dir) {
    return path.resolve(options.dir);
  }

  const manifestPath = path.resolve(options.manifest ?? MANIFEST_FILE);
  if (options.manifest || fs.existsSync(manifestPath)) {
    return loadManifest(manifestPath).logDir;
  }

  return path.resolve(DEFAULT_LOG_DIR);
}

export function listLogFiles(logDir: string): { service: string; path: string }[] {
  let names: string[];
  try {
    names = fs.readdirSync(logDir);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return [];
    }
    throw new LogIoError(logDir, error);
  }

  return names
    .filter(name => name.endsWith('.log'))
    .sort()
    .map(name => ({ service: name.slice(0, -'.log'.length), path: path.join(logDir, name) }));
}
