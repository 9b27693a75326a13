import { NotFoundError } from '../errors.js';
import type { IServiceRepository, ServicePatch } from '../interfaces/IServiceRepository.js';
import type { ServiceProcess } from '../types.js';
import type { ProcessHandle } from './ProcessHandle.js';

interface StoredService {
  record: ServiceProcess;
  handle: ProcessHandle | null;
}

export class InMemoryServiceRepository implements IServiceRepository {
  private services: Map<string, StoredService> = new Map();

  save(service: ServiceProcess): void {
    const existing = this.services.get(service.name);
    this.services.set(service.name, {
      record: { ...service },
      handle: existing ? existing.handle : null,
    });
  }

  findByName(name: string): ServiceProcess | null {
    const stored = this.services.get(name);
    return stored ? { ...stored.record } : null;
  }

  findAll(): ServiceProcess[] {
    return Array.from(this.services.values()).map(stored => ({ ...stored.record }));
  }

  update(name: string, patch: ServicePatch): ServiceProcess {
    const stored = this.getOrThrow(name);
    stored.record = { ...stored.record, ...patch };
    return { ...stored.record };
  }

  attachHandle(name: string, handle: ProcessHandle): void {
    const stored = this.getOrThrow(name);
    if (stored.handle && stored.handle !== handle) {
      throw new Error(`Service '${name}' already owns process ${stored.handle.pid}`);
    }
    stored.handle = handle;
  }

  takeHandle(name: string, expected?: ProcessHandle): ProcessHandle | null {
    const stored = this.services.get(name);
    if (!stored || !stored.handle) {
      return null;
    }
    if (expected && stored.handle !== expected) {
      return null;
    }

    const handle = stored.handle;
    stored.handle = null;
    return handle;
  }

  clear(): void {
    this.services.clear();
  }

  count(): number {
    return this.services.size;
  }

  private getOrThrow(name: string): StoredService {
    const stored = this.services.get(name);
    if (!stored) {
      throw new NotFoundError(name);
    }
    return stored;
  }
}
