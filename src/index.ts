#!/usr/bin/env node

import chalk from 'chalk';
import { Command } from 'commander';
import dotenv from 'dotenv';
import path from 'path';

import { runHealth } from './commands/health.js';
import { runLogs, type LogsOptions } from './commands/logs.js';
import { parseLineCount, parseLogFormat, parseLogLevel } from './commands/options.js';
import { runUp } from './commands/up.js';
import type { LogFormat } from '../packages/service-manager/src/index.js';
import { closeLogger, initializeLogger } from './utils/logger.js';

// Load environment variables
dotenv.config();

const program = new Command();

program
  .name('devfleet')
  .description('Run, watch and tail a fleet of local development services')
  .version('1.0.0')
  .option('-c, --manifest <path>', 'Path to the workspace manifest (default: ./devfleet.json)')
  .option('-l, --log-file [path]', 'Enable logging to file (optional path)', false)
  .option('-d, --debug', 'Enable debug logging')
  .hook('preAction', command => {
    const options = command.opts<{ logFile: string | boolean; debug?: boolean }>();
    initializeLogger({
      logToFile: options.logFile !== false,
      logFilePath:
        typeof options.logFile === 'string' ? options.logFile : path.join(process.cwd(), '.logs', 'devfleet.log'),
      logLevel: options.debug ? 'DEBUG' : 'INFO',
    });
  });

program
  .command('up')
  .description('Start services from the manifest and follow their logs until Ctrl-C')
  .argument('[services...]', 'Services to start (default: all)')
  .option('--no-logs', 'Do not follow service log files')
  .option('--format <format>', 'Log output format (pretty, json, raw)', parseLogFormat, 'pretty')
  .option('-v, --verbose', 'Echo supervisor activity to the console')
  .action(async (services: string[], options: { logs: boolean; format: LogFormat; verbose?: boolean }) => {
    await runUp(services, {
      manifest: program.opts<{ manifest?: string }>().manifest,
      logs: options.logs,
      format: options.format,
      verbose: options.verbose ?? false,
    });
  });

program
  .command('logs')
  .description('Show service log files')
  .argument('[service]', 'Only show services whose name contains this text')
  .option('-f, --follow', 'Keep watching for new lines', false)
  .option('-n, --lines <count>', 'Number of lines to show (without --follow)', parseLineCount, 100)
  .option('--level <level>', 'Minimum level (trace, debug, info, warn, error)', parseLogLevel)
  .option('--grep <pattern>', 'Only show messages matching this regular expression')
  .option('--format <format>', 'Output format (pretty, json, raw)', parseLogFormat, 'pretty')
  .option('--dir <path>', 'Log directory (default: from the manifest, else ./.logs)')
  .action(async (service: string | undefined, options: Omit<LogsOptions, 'manifest'>) => {
    await runLogs(service, { ...options, manifest: program.opts<{ manifest?: string }>().manifest });
  });

program
  .command('health')
  .description('Run every configured health check once')
  .argument('[services...]', 'Services to check (default: all)')
  .action(async (services: string[]) => {
    const healthy = await runHealth(services, { manifest: program.opts<{ manifest?: string }>().manifest });
    if (!healthy) {
      process.exitCode = 1;
    }
  });

process.on('unhandledRejection', reason => {
  console.error(chalk.red('❌ Unhandled Rejection:'), reason);
  process.exitCode = 1;
});

void program
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    console.error(chalk.red(`❌ ${error instanceof Error ? error.message : String(error)}`));
    process.exitCode = 1;
  })
  .finally(closeLogger);
