import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { NotFoundError, SpawnError, describeError } from '../errors.js';
import type { IHealthChecker } from '../interfaces/IHealthChecker.js';
import type { ILogger } from '../interfaces/ILogger.js';
import type { IServiceProvider } from '../interfaces/IServiceProvider.js';
import type { IServiceRepository } from '../interfaces/IServiceRepository.js';
import type {
  ExitInfo,
  HealthStatus,
  ProcessState,
  ServiceConfig,
  ServiceProcess,
  ServiceStatus,
  ServiceSummary,
  SupervisorEvents,
  SupervisorOptions,
} from '../types.js';
import { resolveSupervisorOptions, validateServiceConfig } from '../utils/config.js';
import { delay } from '../utils/delay.js';
import type { ProcessHandle } from './ProcessHandle.js';

/**
 * Owns the registry of supervised services and drives their lifecycle.
 *
 * Lifecycle operations on one service are serialised; operations on different
 * services run concurrently. Health polling runs as one cancellable task per
 * running service that has a health check configured.
 */
export class ProcessSupervisor {
  private readonly options: SupervisorOptions;
  private readonly events = new EventEmitter();
  private pollers: Map<string, AbortController> = new Map();
  private operations: Map<string, Promise<void>> = new Map();
  private background: Set<Promise<void>> = new Set();
  private closing = false;

  constructor(
    private repository: IServiceRepository,
    private logger: ILogger,
    private provider: IServiceProvider,
    private healthChecker: IHealthChecker,
    options: Partial<SupervisorOptions> = {}
  ) {
    this.options = resolveSupervisorOptions(options);
  }

  on<K extends keyof SupervisorEvents>(event: K, listener: (...args: SupervisorEvents[K]) => void): this {
    this.events.on(event, listener);
    return this;
  }

  off<K extends keyof SupervisorEvents>(event: K, listener: (...args: SupervisorEvents[K]) => void): this {
    this.events.off(event, listener);
    return this;
  }

  async start(config: ServiceConfig): Promise<void> {
    validateServiceConfig(config);
    return this.serialize(config.name, () => this.launch(config));
  }

  stop(name: string, force = false): Promise<void> {
    return this.serialize(name, () => this.halt(name, force));
  }

  async restart(name: string): Promise<void> {
    if (!this.repository.findByName(name)) {
      throw new NotFoundError(name);
    }
    return this.serialize(name, () => this.cycle(name));
  }

  status(name: string): ServiceStatus | undefined {
    const service = this.repository.findByName(name);
    return service ? { state: service.state, health: service.health } : undefined;
  }

  get(name: string): ServiceProcess | undefined {
    return this.repository.findByName(name) ?? undefined;
  }

  list(): ServiceSummary[] {
    return this.repository.findAll().map(service => ({
      name: service.name,
      state: service.state,
      health: service.health,
      pid: service.pid,
      restartCount: service.restartCount,
    }));
  }

  async stopAll(): Promise<void> {
    const names = this.repository.findAll().map(service => service.name);
    await Promise.all(
      names.map(name =>
        this.stop(name).catch(error =>
          this.logger.addLog(name, 'error', `Failed to stop during shutdown: ${describeError(error)}`)
        )
      )
    );
  }

  /**
   * Stops every service and waits for background tasks. The supervisor
   * accepts no automatic restarts afterwards.
   */
  async shutdown(): Promise<void> {
    this.closing = true;
    this.logger.addLog('system', 'info', 'Shutting down supervisor...');

    for (const controller of this.pollers.values()) {
      controller.abort();
    }
    this.pollers.clear();

    await this.stopAll();
    await Promise.allSettled(Array.from(this.background));

    this.repository.clear();
    this.logger.addLog('system', 'info', 'Supervisor shutdown complete');
  }

  /**
   * Synchronous last resort for process 'exit' hooks: kills whatever is still owned.
   */
  killAll(): void {
    for (const service of this.repository.findAll()) {
      const handle = this.repository.takeHandle(service.name);
      if (!handle) {
        continue;
      }
      try {
        handle.signal('SIGKILL');
      } catch (error) {
        this.logger.addLog(service.name, 'error', `Failed to kill process ${handle.pid}: ${describeError(error)}`);
      }
    }
  }

  private async launch(config: ServiceConfig): Promise<void> {
    const name = config.name;
    const existing = this.repository.findByName(name);

    if (existing?.state.kind === 'running') {
      this.logger.addLog(name, 'info', `Service '${name}' is already running`);
      return;
    }

    this.repository.save({
      id: existing?.id ?? uuidv4(),
      name,
      config,
      state: { kind: 'starting' },
      restartCount: existing?.restartCount ?? 0,
      health: { kind: 'unknown' },
      startedAt: existing?.startedAt,
      stoppedAt: existing?.stoppedAt,
      lastHealthCheck: existing?.lastHealthCheck,
    });
    this.emitState(name, { kind: 'starting' });

    let handle: ProcessHandle;
    try {
      handle = await this.provider.spawn(config);
    } catch (error) {
      const spawnError = error instanceof SpawnError ? error : new SpawnError(name, error);
      this.setState(name, { kind: 'failed', reason: spawnError.message }, { lastError: spawnError.message, pid: undefined });
      this.logger.addLog(name, 'error', spawnError.message);
      throw spawnError;
    }

    this.repository.attachHandle(name, handle);
    this.setState(name, { kind: 'running' }, { pid: handle.pid, startedAt: new Date(), lastError: undefined });
    this.logger.addLog(name, 'info', `Service '${name}' started successfully`);

    this.track(handle.exited.then(info => this.handleExit(name, handle, info)));

    if (config.healthCheck) {
      this.startHealthPolling(name);
    }
  }

  private async halt(name: string, force: boolean): Promise<void> {
    const service = this.repository.findByName(name);
    if (!service || service.state.kind === 'stopped') {
      return;
    }

    this.stopHealthPolling(name);
    this.setState(name, { kind: 'stopping' });

    const handle = this.repository.takeHandle(name);
    if (handle) {
      this.logger.addLog(name, 'info', `Stopping process with PID: ${handle.pid}${force ? ' (forced)' : ''}`);
      try {
        const outcome = await this.provider.terminate(handle, { force, gracePeriodMs: this.options.gracePeriodMs });
        this.logger.addLog(name, outcome === 'killed' ? 'warn' : 'info', `Process ${handle.pid} ${outcome}`);
      } catch (error) {
        this.logger.addLog(name, 'error', `Failed to stop process ${handle.pid}: ${describeError(error)}`);
      }
    }

    this.setState(name, { kind: 'stopped' }, { pid: undefined, stoppedAt: new Date() });
  }

  private async cycle(name: string): Promise<void> {
    const service = this.repository.findByName(name);
    if (!service) {
      throw new NotFoundError(name);
    }

    this.logger.addLog(name, 'info', `Restarting service '${name}'`);
    this.setState(name, { kind: 'restarting' });

    await this.halt(name, false);
    await delay(this.options.restartDelayMs);

    try {
      await this.launch(service.config);
    } finally {
      const current = this.repository.findByName(name);
      if (current) {
        const updated = this.repository.update(name, { restartCount: current.restartCount + 1 });
        this.emit('restarted', name, updated.restartCount);
      }
    }
  }

  private handleExit(name: string, handle: ProcessHandle, info: ExitInfo): void {
    // A handle already taken by stop() is an expected exit
    if (!this.repository.takeHandle(name, handle)) {
      return;
    }

    this.emit('exit', name, info);
    this.stopHealthPolling(name);

    const service = this.repository.findByName(name);
    if (!service) {
      return;
    }

    const failed = info.code !== 0 || info.signal !== null;
    const reason = info.signal ? `exited on signal ${info.signal}` : `exited with code ${info.code}`;
    this.logger.addLog(name, failed ? 'error' : 'warn', `Process ${handle.pid} ${reason}`);

    if (failed) {
      this.setState(name, { kind: 'failed', reason }, { pid: undefined, stoppedAt: new Date(), lastError: reason });
    } else {
      this.setState(name, { kind: 'stopped' }, { pid: undefined, stoppedAt: new Date() });
    }

    const policy = service.config.restartPolicy;
    const wantsRestart =
      policy === 'always' || policy === 'unless-stopped' || (policy === 'on-failure' && failed);

    if (wantsRestart && this.canAutoRestart(service)) {
      this.autoRestart(name);
    }
  }

  private startHealthPolling(name: string): void {
    this.stopHealthPolling(name);
    const controller = new AbortController();
    this.pollers.set(name, controller);
    this.track(this.pollHealth(name, controller.signal));
  }

  private stopHealthPolling(name: string): void {
    const controller = this.pollers.get(name);
    if (controller) {
      controller.abort();
      this.pollers.delete(name);
    }
  }

  private async pollHealth(name: string, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const interval = this.repository.findByName(name)?.config.healthCheck?.intervalMs;
      if (!interval || !(await delay(interval, signal))) {
        return;
      }

      const service = this.repository.findByName(name);
      const healthCheck = service?.config.healthCheck;
      if (!service || service.state.kind !== 'running' || !healthCheck) {
        return;
      }

      const result = await this.healthChecker.check(healthCheck);
      if (signal.aborted || this.repository.findByName(name)?.state.kind !== 'running') {
        return;
      }

      const health: HealthStatus =
        result.status.kind === 'degraded' ? { kind: 'unhealthy', reason: result.status.reason } : result.status;

      const previous = service.health;
      this.repository.update(name, { health, lastHealthCheck: new Date() });
      this.emit('health', name, health);
      if (previous.kind !== health.kind) {
        this.logger.addLog(
          name,
          health.kind === 'healthy' ? 'info' : 'warn',
          `Health status changed: ${previous.kind} -> ${health.kind}${health.kind === 'unhealthy' ? ` (${health.reason})` : ''}`
        );
      }

      if (health.kind !== 'unhealthy') {
        continue;
      }

      const policy = service.config.restartPolicy;
      if (policy !== 'on-failure' && policy !== 'always') {
        continue;
      }

      const startedAt = service.startedAt?.getTime() ?? 0;
      if (Date.now() - startedAt < (service.config.startupTimeoutMs ?? 0)) {
        continue;
      }

      if (!this.canAutoRestart(service)) {
        continue;
      }

      this.setState(name, { kind: 'restarting' });
      await this.restart(name).catch(error =>
        this.logger.addLog(name, 'error', `Automatic restart failed: ${describeError(error)}`)
      );
      return;
    }
  }

  private canAutoRestart(service: ServiceProcess): boolean {
    if (this.closing) {
      return false;
    }
    const { maxRestarts } = service.config;
    if (maxRestarts !== undefined && service.restartCount >= maxRestarts) {
      this.logger.addLog(service.name, 'warn', `Restart limit reached (${maxRestarts}); leaving service down`);
      return false;
    }
    return true;
  }

  private autoRestart(name: string): void {
    this.track(
      this.restart(name).catch(error =>
        this.logger.addLog(name, 'error', `Automatic restart failed: ${describeError(error)}`)
      )
    );
  }

  private setState(name: string, state: ProcessState, patch: Omit<Partial<ServiceProcess>, 'id' | 'name' | 'state'> = {}): void {
    this.repository.update(name, { ...patch, state });
    this.emitState(name, state);
  }

  private emitState(name: string, state: ProcessState): void {
    this.emit('state', name, state);
  }

  private emit<K extends keyof SupervisorEvents>(event: K, ...args: SupervisorEvents[K]): void {
    this.events.emit(event, ...args);
  }

  private serialize(name: string, operation: () => Promise<void>): Promise<void> {
    const previous = this.operations.get(name) ?? Promise.resolve();
    const next = previous.then(operation);
    const settled = next.then(
      () => undefined,
      () => undefined
    );

    this.operations.set(name, settled);
    void settled.then(() => {
      if (this.operations.get(name) === settled) {
        this.operations.delete(name);
      }
    });

    return next;
  }

  private track(task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch(error => this.logger.addLog('system', 'error', `Background task failed: ${describeError(error)}`))
      .finally(() => this.background.delete(tracked));
    this.background.add(tracked);
  }
}
