import { ConfigError } from '../errors.js';
import { RESTART_POLICIES } from '../types.js';
import type { HealthCheck, ServiceConfig, ServiceConfigInput, SupervisorOptions } from '../types.js';

export const DEFAULT_HEALTH_CHECK: Omit<HealthCheck, 'url' | 'command'> = {
  intervalMs: 10_000,
  timeoutMs: 5_000,
  retries: 3,
};

export const DEFAULT_SUPERVISOR_OPTIONS: SupervisorOptions = {
  gracePeriodMs: 5_000,
  restartDelayMs: 1_000,
  spawnTimeoutMs: 10_000,
};

const OPTION_KEYS: (keyof SupervisorOptions)[] = ['gracePeriodMs', 'restartDelayMs', 'spawnTimeoutMs'];

const ENV_OPTIONS: Record<keyof SupervisorOptions, string> = {
  gracePeriodMs: 'DEVFLEET_GRACE_PERIOD_MS',
  restartDelayMs: 'DEVFLEET_RESTART_DELAY_MS',
  spawnTimeoutMs: 'DEVFLEET_SPAWN_TIMEOUT_MS',
};

export function createServiceConfig(input: ServiceConfigInput): ServiceConfig {
  const config: ServiceConfig = {
    name: input.name,
    command: input.command,
    args: input.args ?? [],
    env: input.env ?? {},
    workingDir: input.workingDir ?? process.cwd(),
    startupTimeoutMs: input.startupTimeoutMs,
    restartPolicy: input.restartPolicy ?? 'never',
    logFile: input.logFile,
    maxRestarts: input.maxRestarts,
    ports: input.ports,
  };

  if (input.healthCheck) {
    const { url, command, intervalMs, timeoutMs, retries } = input.healthCheck;
    config.healthCheck = {
      url,
      command,
      intervalMs: intervalMs ?? DEFAULT_HEALTH_CHECK.intervalMs,
      timeoutMs: timeoutMs ?? DEFAULT_HEALTH_CHECK.timeoutMs,
      retries: retries ?? DEFAULT_HEALTH_CHECK.retries,
    };
  }

  return config;
}

export function validateServiceConfig(config: ServiceConfig): void {
  if (!config.name || config.name.trim().length === 0) {
    throw new ConfigError('Service name is required');
  }

  if (!config.command || config.command.trim().length === 0) {
    throw new ConfigError(`Service '${config.name}': command is required`);
  }

  if (!RESTART_POLICIES.includes(config.restartPolicy)) {
    throw new ConfigError(`Service '${config.name}': unknown restart policy '${config.restartPolicy}'`);
  }

  if (config.startupTimeoutMs !== undefined && config.startupTimeoutMs < 0) {
    throw new ConfigError(`Service '${config.name}': startup timeout must be non-negative`);
  }

  if (config.maxRestarts !== undefined && config.maxRestarts < 0) {
    throw new ConfigError(`Service '${config.name}': max restarts must be non-negative`);
  }

  if (config.healthCheck) {
    validateHealthCheck(config.healthCheck, `Service '${config.name}'`);
  }
}

export function validateHealthCheck(check: HealthCheck, context: string): void {
  const { url, command, intervalMs, timeoutMs, retries } = check;

  if (!url && !command) {
    throw new ConfigError(`${context}: health check must specify either url or command`);
  }

  if (url && !/^https?:\/\//i.test(url)) {
    throw new ConfigError(`${context}: health check url must be http or https, got '${url}'`);
  }

  if (!(intervalMs > 0)) {
    throw new ConfigError(`${context}: health check interval must be positive`);
  }

  if (!(timeoutMs > 0)) {
    throw new ConfigError(`${context}: health check timeout must be positive`);
  }

  if (retries < 0) {
    throw new ConfigError(`${context}: health check retries must be non-negative`);
  }
}

export function resolveSupervisorOptions(
  overrides: Partial<SupervisorOptions> = {},
  env: NodeJS.ProcessEnv = process.env
): SupervisorOptions {
  const options: SupervisorOptions = { ...DEFAULT_SUPERVISOR_OPTIONS };

  for (const key of OPTION_KEYS) {
    const raw = env[ENV_OPTIONS[key]];
    if (raw !== undefined && raw !== '') {
      const value = Number(raw);
      if (!Number.isFinite(value) || value < 0) {
        throw new ConfigError(`${ENV_OPTIONS[key]} must be a non-negative number, got '${raw}'`);
      }
      options[key] = value;
    }

    const override = overrides[key];
    if (override !== undefined) {
      options[key] = override;
    }
  }

  return options;
}
