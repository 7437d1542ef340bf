import pc from 'picocolors';
import type { EnvironmentRecord, HealthResult, PidCheck, ResolvedBinary } from '../types/index.js';

export function success(message: string): string {
  return `${pc.green('✔')} ${message}`;
}

export function warning(message: string): string {
  return `${pc.yellow('!')} ${message}`;
}

export function formatProcessState(state: PidCheck | { state: 'missing' }): string {
  switch (state.state) {
    case 'running':
      return pc.green(`running (PID ${state.pid})`);
    case 'stale':
      return pc.yellow(`not running (stale PID ${state.pid} cleaned up)`);
    case 'missing':
      return pc.red('directory missing');
    case 'absent':
      return pc.gray('not running');
  }
}

export function formatHealth(health: HealthResult): string {
  switch (health.state) {
    case 'healthy':
      return pc.green(`healthy (HTTP ${health.status})`);
    case 'unhealthy':
      return pc.yellow(`unhealthy (HTTP ${health.status})`);
    case 'unreachable':
      return pc.red(`unreachable${health.error ? `: ${health.error}` : ''}`);
  }
}

export function describeBinary(record: EnvironmentRecord): string {
  if (record.binary) {
    return record.binaryVersion ? `${record.binary} (${record.binaryVersion})` : record.binary;
  }
  if (record.binaryVersion) {
    return `version ${record.binaryVersion}`;
  }
  return pc.gray('default');
}

export function formatResolved(resolved: ResolvedBinary): string {
  const version = resolved.version ? ` ${pc.bold(resolved.version)}` : '';
  return `${resolved.path}${version} ${pc.gray(`[${resolved.source}]`)}`;
}

export function keyValue(rows: Array<[string, string]>): string {
  const width = Math.max(...rows.map(([key]) => key.length));
  return rows.map(([key, value]) => `  ${pc.gray(key.padEnd(width))}  ${value}`).join('\n');
}

export function table(header: string[], rows: string[][]): string {
  const widths = header.map((title, i) => Math.max(title.length, ...rows.map((row) => stripAnsi(row[i] ?? '').length)));
  const line = (cells: string[]): string =>
    cells.map((cell, i) => cell + ' '.repeat(Math.max(0, widths[i] - stripAnsi(cell).length))).join('  ').trimEnd();
  return [pc.bold(line(header)), ...rows.map(line)].join('\n');
}

function stripAnsi(value: string): string {
  // eslint-disable-next-line no-control-regex
  return value.replace(/\x1b\[[0-9;]*m/g, '');
}
