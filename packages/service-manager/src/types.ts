export type RestartPolicy = 'never' | 'on-failure' | 'always' | 'unless-stopped';

export const RESTART_POLICIES: readonly RestartPolicy[] = ['never', 'on-failure', 'always', 'unless-stopped'];

export type ProcessState =
  | { kind: 'starting' }
  | { kind: 'running' }
  | { kind: 'stopping' }
  | { kind: 'stopped' }
  | { kind: 'failed'; reason: string }
  | { kind: 'restarting' };

export type HealthStatus =
  | { kind: 'unknown' }
  | { kind: 'healthy' }
  | { kind: 'degraded'; reason: string }
  | { kind: 'unhealthy'; reason: string };

export interface HealthCheck {
  url?: string;
  command?: string;
  intervalMs: number;
  timeoutMs: number;
  retries: number;
}

export interface ServiceConfig {
  name: string;
  command: string;
  args: string[];
  workingDir: string;
  env: Record<string, string>;
  healthCheck?: HealthCheck;
  startupTimeoutMs?: number; // health-driven restarts are held off this long after a start
  restartPolicy: RestartPolicy;
  logFile?: string;
  maxRestarts?: number;
  ports?: string[]; // informational
}

export type ServiceConfigInput = Pick<ServiceConfig, 'name' | 'command'> &
  Partial<Omit<ServiceConfig, 'name' | 'command' | 'healthCheck'>> & {
    healthCheck?: Partial<HealthCheck>;
  };

export interface ServiceProcess {
  id: string;
  name: string;
  config: ServiceConfig;
  state: ProcessState;
  pid?: number;
  startedAt?: Date;
  stoppedAt?: Date;
  restartCount: number;
  lastHealthCheck?: Date;
  health: HealthStatus;
  lastError?: string;
}

export interface ServiceStatus {
  state: ProcessState;
  health: HealthStatus;
}

export interface ServiceSummary extends ServiceStatus {
  name: string;
  pid?: number;
  restartCount: number;
}

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface ProbeResult {
  status: HealthStatus;
  latencyMs: number;
  httpStatus?: number;
}

export interface ServiceHealth {
  name: string;
  status: HealthStatus;
  lastCheck?: Date;
  consecutiveFailures: number;
  responseTimeMs?: number;
  healthySince?: Date;
}

export type ActivitySource = 'stdout' | 'stderr' | 'system';

/** Supervisor-side diagnostic record; not to be confused with a parsed service {@link LogEntry}. */
export interface ActivityRecord {
  timestamp: Date;
  level: 'info' | 'warn' | 'error' | 'debug';
  message: string;
  source?: ActivitySource;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: Date;
  service: string;
  level: LogLevel;
  message: string;
  fields: Record<string, unknown>;
  raw: string;
}

export type LogFormat = 'pretty' | 'json' | 'raw';

export interface LogStreamConfig {
  follow: boolean;
  lines?: number;
  levelFilter?: LogLevel;
  serviceFilter?: string;
  patternFilter?: RegExp | string;
  format: LogFormat;
  signal?: AbortSignal;
}

export interface SupervisorOptions {
  gracePeriodMs: number;
  restartDelayMs: number;
  spawnTimeoutMs: number;
}

export interface SupervisorEvents {
  state: [name: string, state: ProcessState];
  health: [name: string, health: HealthStatus];
  exit: [name: string, info: ExitInfo];
  restarted: [name: string, restartCount: number];
}
