import type { ActivityRecord } from '../types.js';

export interface ILogger {
  addLog(service: string, level: ActivityRecord['level'], message: string, source?: ActivityRecord['source']): void;
  getLogs(service: string, limit?: number): ActivityRecord[];
  clearLogs(service: string): void;
}
