import chalk from 'chalk';
import type { HealthStatus, ProcessState, ServiceHealth, ServiceSummary } from '../../packages/service-manager/src/index.js';

type Cell = { text: string; paint?: (text: string) => string };

function renderTable(headers: string[], rows: Cell[][]): string {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map(row => row[column]?.text.length ?? 0))
  );

  const line = (cells: Cell[]) =>
    cells
      .map((cell, column) => {
        const padded = cell.text.padEnd(widths[column]);
        return cell.paint ? cell.paint(padded) : padded;
      })
      .join('  ')
      .trimEnd();

  return [line(headers.map(text => ({ text, paint: chalk.bold }))), ...rows.map(line)].join('\n');
}

export function stateCell(state: ProcessState): Cell {
  switch (state.kind) {
    case 'running':
      return { text: 'running', paint: chalk.green };
    case 'failed':
      return { text: `failed (${state.reason})`, paint: chalk.red };
    case 'starting':
    case 'restarting':
    case 'stopping':
      return { text: state.kind, paint: chalk.yellow };
    default:
      return { text: state.kind, paint: chalk.gray };
  }
}

export function healthCell(health: HealthStatus): Cell {
  switch (health.kind) {
    case 'healthy':
      return { text: 'healthy', paint: chalk.green };
    case 'degraded':
      return { text: `degraded (${health.reason})`, paint: chalk.yellow };
    case 'unhealthy':
      return { text: `unhealthy (${health.reason})`, paint: chalk.red };
    default:
      return { text: 'unknown', paint: chalk.gray };
  }
}

export function renderStatusTable(services: ServiceSummary[]): string {
  return renderTable(
    ['SERVICE', 'STATE', 'HEALTH', 'PID', 'RESTARTS'],
    services.map(service => [
      { text: service.name },
      stateCell(service.state),
      healthCell(service.health),
      { text: service.pid === undefined ? '-' : String(service.pid) },
      { text: String(service.restartCount) },
    ])
  );
}

export function renderHealthTable(results: ServiceHealth[]): string {
  return renderTable(
    ['SERVICE', 'HEALTH', 'LATENCY', 'FAILURES'],
    results.map(result => [
      { text: result.name },
      healthCell(result.status),
      { text: result.responseTimeMs === undefined ? '-' : `${result.responseTimeMs}ms` },
      { text: String(result.consecutiveFailures) },
    ])
  );
}
