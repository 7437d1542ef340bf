import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { DaemonStartError, errorCode, errorMessage } from '../errors.js';
import { withGlobalConfigSwap } from './globalConfigSwap.js';
import { bindAddress, daemonBaseUrl, probeHealth } from './healthProbe.js';
import type { DaemonSpawner } from '../platform/daemonSpawner.js';
import type { HttpProber } from '../platform/httpProber.js';
import type { ProcessInspector } from '../platform/processInspector.js';
import type { DaemonTarget, HealthResult, PidCheck, ProcessEntry } from '../types/index.js';
import { log as defaultLog, type Logger } from '../utils/logger.js';
import { sleep as defaultSleep, type Sleep } from '../utils/time.js';

export interface SupervisorTimings {
  /** Total wait after spawning before liveness is checked. */
  startupSettleMs: number;
  /** Part of the settle wait spent with the global config swapped in. */
  swapSettleMs: number;
  stopPollIntervalMs: number;
  stopAttempts: number;
  /** Poll attempt after which SIGTERM is escalated to SIGKILL. */
  escalateAfter: number;
  orphanGraceMs: number;
  restartGapMs: number;
  probeTimeoutMs: number;
}

export const DEFAULT_TIMINGS: SupervisorTimings = {
  startupSettleMs: 2000,
  swapSettleMs: 1000,
  stopPollIntervalMs: 1000,
  stopAttempts: 10,
  escalateAfter: 5,
  orphanGraceMs: 1000,
  restartGapMs: 1000,
  probeTimeoutMs: 2000,
};

export interface SupervisorDeps {
  inspector: ProcessInspector;
  spawner: DaemonSpawner;
  prober: HttpProber;
  sleep?: Sleep;
  log?: Logger;
  timings?: Partial<SupervisorTimings>;
}

export interface StartOptions {
  binary: string;
  force?: boolean;
}

export type StartResult =
  | { status: 'started'; pid: number; health?: HealthResult; orphansReaped: number[] }
  | { status: 'already-running'; pid: number };

export type StopResult =
  | { status: 'stopped'; pid: number; forced: boolean }
  | { status: 'not-running'; stalePid?: number };

export interface StatusReport {
  process: PidCheck;
  health: HealthResult;
}

export function buildDaemonArgs(target: DaemonTarget): string[] {
  const args = ['--config', target.paths.configPath, 'daemon'];
  const address = bindAddress(target.config, target.registryPort);
  if (address) {
    args.push('--http-addr', address);
  }
  if (target.config.client_token) {
    args.push('--http-token', target.config.client_token);
  }
  return args;
}

/**
 * Lifecycle control of one environment's detached daemon, tracked through
 * its PID file. Each call does one action and returns; nothing is scheduled
 * in the background.
 */
export class DaemonSupervisor {
  private readonly inspector: ProcessInspector;
  private readonly spawner: DaemonSpawner;
  private readonly prober: HttpProber;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private readonly timings: SupervisorTimings;

  constructor(deps: SupervisorDeps) {
    this.inspector = deps.inspector;
    this.spawner = deps.spawner;
    this.prober = deps.prober;
    this.sleep = deps.sleep ?? defaultSleep;
    this.log = deps.log ?? defaultLog;
    this.timings = { ...DEFAULT_TIMINGS, ...deps.timings };
  }

  /**
   * Reads the PID file. A file pointing at a dead process (or holding
   * garbage) is removed as a side effect.
   */
  checkPid(target: DaemonTarget): PidCheck {
    const { pidPath } = target.paths;
    if (!existsSync(pidPath)) {
      return { state: 'absent' };
    }

    const pid = Number.parseInt(readFileSync(pidPath, 'utf-8').trim(), 10);
    if (!Number.isInteger(pid) || pid <= 0) {
      this.log.warn(`Removing unreadable PID file ${pidPath}`);
      rmSync(pidPath, { force: true });
      return { state: 'absent' };
    }

    if (this.inspector.isAlive(pid)) {
      return { state: 'running', pid };
    }

    this.log.warn(`Daemon PID ${pid} is not running; removing stale PID file`);
    rmSync(pidPath, { force: true });
    return { state: 'stale', pid };
  }

  /**
   * Running daemons whose command line mentions this environment's config
   * file but which no PID file tracks. This is a substring match, so a
   * truncated command line is missed and an unrelated process that happens
   * to contain the path is caught.
   */
  async findOrphans(target: DaemonTarget, trackedPid?: number): Promise<ProcessEntry[]> {
    const processes = await this.inspector.list();
    return processes.filter(
      (entry) =>
        entry.command.includes(target.paths.configPath) && entry.pid !== trackedPid && entry.pid !== process.pid,
    );
  }

  async reapOrphans(target: DaemonTarget, trackedPid?: number): Promise<number[]> {
    const orphans = await this.findOrphans(target, trackedPid);
    const reaped: number[] = [];
    for (const orphan of orphans) {
      this.log.warn(`Terminating untracked daemon ${orphan.pid} using ${target.paths.configPath}`);
      try {
        if (!this.inspector.signal(orphan.pid, 'SIGTERM')) {
          continue;
        }
        await this.sleep(this.timings.orphanGraceMs);
        if (this.inspector.isAlive(orphan.pid)) {
          this.inspector.signal(orphan.pid, 'SIGKILL');
        }
      } catch (error) {
        if (errorCode(error) !== 'EPERM') {
          throw error;
        }
        this.log.warn(`Skipping daemon ${orphan.pid}: not permitted to signal it`);
        continue;
      }
      reaped.push(orphan.pid);
    }
    return reaped;
  }

  async start(target: DaemonTarget, options: StartOptions): Promise<StartResult> {
    const current = this.checkPid(target);
    if (current.state === 'running') {
      if (!options.force) {
        return { status: 'already-running', pid: current.pid };
      }
      await this.stop(target);
    }

    const orphansReaped = await this.reapOrphans(target);
    const { paths } = target;
    const args = buildDaemonArgs(target);
    mkdirSync(dirname(paths.logPath), { recursive: true });
    this.log.debug(`Spawning ${options.binary} ${args.join(' ')}`);

    const pid = await withGlobalConfigSwap(
      { globalConfigPath: target.daemonGlobalConfigPath, localConfigPath: paths.configPath, log: this.log },
      async () => {
        let spawned: number;
        try {
          spawned = await this.spawner.spawn(options.binary, args, { cwd: paths.root, logPath: paths.logPath });
        } catch (error) {
          throw new DaemonStartError(paths.logPath, error);
        }
        // give the daemon time to read the swapped-in global config
        await this.sleep(this.timings.swapSettleMs);
        return spawned;
      },
    );

    await this.sleep(Math.max(0, this.timings.startupSettleMs - this.timings.swapSettleMs));
    if (!this.inspector.isAlive(pid)) {
      rmSync(paths.pidPath, { force: true });
      throw new DaemonStartError(paths.logPath);
    }

    mkdirSync(dirname(paths.pidPath), { recursive: true });
    writeFileSync(paths.pidPath, `${pid}\n`);

    const health = await this.health(target);
    return { status: 'started', pid, health, orphansReaped };
  }

  async stop(target: DaemonTarget): Promise<StopResult> {
    const current = this.checkPid(target);
    if (current.state === 'absent') {
      return { status: 'not-running' };
    }
    if (current.state === 'stale') {
      return { status: 'not-running', stalePid: current.pid };
    }

    const { pid } = current;
    const { pidPath } = target.paths;
    if (!this.inspector.signal(pid, 'SIGTERM')) {
      rmSync(pidPath, { force: true });
      return { status: 'stopped', pid, forced: false };
    }

    let forced = false;
    for (let attempt = 1; attempt <= this.timings.stopAttempts; attempt++) {
      await this.sleep(this.timings.stopPollIntervalMs);
      if (!this.inspector.isAlive(pid)) {
        rmSync(pidPath, { force: true });
        return { status: 'stopped', pid, forced };
      }
      if (attempt === this.timings.escalateAfter) {
        this.log.warn(`Daemon ${pid} ignored SIGTERM; sending SIGKILL`);
        this.inspector.signal(pid, 'SIGKILL');
        forced = true;
      }
    }

    if (!forced) {
      this.inspector.signal(pid, 'SIGKILL');
    }
    if (this.inspector.isAlive(pid)) {
      this.log.warn(`Daemon ${pid} is still listed after SIGKILL`);
    }
    rmSync(pidPath, { force: true });
    return { status: 'stopped', pid, forced: true };
  }

  async restart(target: DaemonTarget, options: Omit<StartOptions, 'force'>): Promise<StartResult> {
    try {
      await this.stop(target);
    } catch (error) {
      this.log.warn(`Stop before restart failed: ${errorMessage(error)}`);
    }
    await this.sleep(this.timings.restartGapMs);
    return this.start(target, { ...options, force: true });
  }

  async health(target: DaemonTarget): Promise<HealthResult> {
    const baseUrl = daemonBaseUrl(target.config, target.registryPort);
    if (!baseUrl) {
      return { state: 'unreachable', url: '', error: 'no client URL or port recorded for this environment' };
    }
    return probeHealth(this.prober, baseUrl, target.config.client_token, this.timings.probeTimeoutMs);
  }

  async status(target: DaemonTarget): Promise<StatusReport> {
    const processState = this.checkPid(target);
    const health = await this.health(target);
    return { process: processState, health };
  }

  readLogs(target: DaemonTarget, lines = 50): string[] {
    const { logPath } = target.paths;
    if (!existsSync(logPath)) {
      return [];
    }
    const all = readFileSync(logPath, 'utf-8').split('\n');
    if (all[all.length - 1] === '') all.pop();
    return all.slice(-lines);
  }
}
