import type { ProcessHandle } from '../services/ProcessHandle.js';
import type { ServiceProcess } from '../types.js';

export type ServicePatch = Partial<Omit<ServiceProcess, 'id' | 'name'>>;

export interface IServiceRepository {
  save(service: ServiceProcess): void;
  findByName(name: string): ServiceProcess | null;
  findAll(): ServiceProcess[];
  update(name: string, patch: ServicePatch): ServiceProcess;
  attachHandle(name: string, handle: ProcessHandle): void;
  /** Moves the handle out of the record. When `expected` is given, only that handle is taken. */
  takeHandle(name: string, expected?: ProcessHandle): ProcessHandle | null;
  clear(): void;
}
