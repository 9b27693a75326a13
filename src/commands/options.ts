import { InvalidArgumentError } from 'commander';
import { LOG_LEVELS } from '../../packages/service-manager/src/index.js';
import type { LogFormat, LogLevel } from '../../packages/service-manager/src/index.js';

const LOG_FORMATS: readonly LogFormat[] = ['pretty', 'json', 'raw'];

export function parseLineCount(value: string): number {
  const lines = parseInt(value, 10);
  if (!Number.isInteger(lines) || lines < 0 || String(lines) !== value.trim()) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return lines;
}

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value.toLowerCase());
  if (!level) {
    throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(', ')}.`);
  }
  return level;
}

export function parseLogFormat(value: string): LogFormat {
  const format = LOG_FORMATS.find(candidate => candidate === value.toLowerCase());
  if (!format) {
    throw new InvalidArgumentError(`Expected one of ${LOG_FORMATS.join(', ')}.`);
  }
  return format;
}

/**
 * Aborts `controller` on the first SIGINT or SIGTERM. Returns a function that removes the handlers.
 */
export function abortOnSignals(controller: AbortController): () => void {
  const onSignal = () => controller.abort();
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise(resolve => signal.addEventListener('abort', () => resolve(), { once: true }));
}
