export type DevfleetErrorCode =
  | 'SPAWN_FAILED'
  | 'NOT_FOUND'
  | 'HEALTH_CHECK_FAILED'
  | 'SIGNAL_FAILED'
  | 'LOG_IO'
  | 'INVALID_CONFIG';

export class DevfleetError extends Error {
  constructor(
    readonly code: DevfleetErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class SpawnError extends DevfleetError {
  constructor(readonly service: string, cause: unknown) {
    super('SPAWN_FAILED', `Failed to start '${service}': ${describeError(cause)}`, { cause });
  }
}

export class NotFoundError extends DevfleetError {
  constructor(readonly service: string) {
    super('NOT_FOUND', `Service not found: ${service}`);
  }
}

export class HealthCheckError extends DevfleetError {
  constructor(readonly target: string, reason: string, cause?: unknown) {
    super('HEALTH_CHECK_FAILED', `Health check ${target} failed: ${reason}`, { cause });
  }
}

export class SignalError extends DevfleetError {
  constructor(readonly pid: number, readonly signal: NodeJS.Signals, cause: unknown) {
    super('SIGNAL_FAILED', `Could not send ${signal} to process ${pid}: ${describeError(cause)}`, { cause });
  }
}

export class LogIoError extends DevfleetError {
  constructor(readonly path: string, cause: unknown) {
    super('LOG_IO', `Log file ${path}: ${describeError(cause)}`, { cause });
  }
}

export class ConfigError extends DevfleetError {
  constructor(message: string) {
    super('INVALID_CONFIG', message);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
