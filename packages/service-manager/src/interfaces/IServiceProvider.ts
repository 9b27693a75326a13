import type { ProcessHandle } from '../services/ProcessHandle.js';
import type { ServiceConfig } from '../types.js';

export type TerminationOutcome = 'exited' | 'terminated' | 'killed';

export interface IServiceProvider {
  spawn(config: ServiceConfig): Promise<ProcessHandle>;
  terminate(handle: ProcessHandle, options: { force: boolean; gracePeriodMs: number }): Promise<TerminationOutcome>;
}
