import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { buildDaemonArgs, DaemonSupervisor } from '../services/daemonSupervisor.js';
import { saveLocalConfig } from '../services/configStore.js';
import { environmentPaths } from '../services/paths.js';
import { DaemonStartError } from '../errors.js';
import { silentLogger } from '../utils/logger.js';
import type { DaemonTarget, LocalConfig } from '../types/index.js';
import {
  cleanupTempDirs,
  createFakeProber,
  createFakeSpawner,
  FakeInspector,
  makeTempDir,
  type FakeProber,
  type FakeSpawner,
} from './helpers/fakes.js';

const CONFIG: LocalConfig = {
  email: 'alice@example.com',
  data_dir: '/data/alice',
  server_url: 'https://server.test',
  client_url: 'http://127.0.0.1:7950',
  client_token: 'test-token',
};

function makeTarget(config: LocalConfig = CONFIG, registryPort = 7950): DaemonTarget {
  const base = makeTempDir();
  const paths = environmentPaths(join(base, 'env'));
  saveLocalConfig(paths.configPath, config);
  return {
    paths,
    config,
    registryPort,
    daemonGlobalConfigPath: join(base, 'daemon-home', 'config.json'),
  };
}

function writePid(target: DaemonTarget, content: string): void {
  mkdirSync(dirname(target.paths.pidPath), { recursive: true });
  writeFileSync(target.paths.pidPath, content);
}

describe('DaemonSupervisor', () => {
  let inspector: FakeInspector;
  let spawner: FakeSpawner;
  let prober: FakeProber;
  let sleep: Mock<[number], Promise<void>>;
  let supervisor: DaemonSupervisor;

  const build = () => new DaemonSupervisor({ inspector, spawner, prober, sleep, log: silentLogger });

  beforeEach(() => {
    inspector = new FakeInspector();
    spawner = createFakeSpawner(inspector);
    prober = createFakeProber(200);
    sleep = vi.fn<[number], Promise<void>>(async () => {});
    supervisor = build();
  });

  afterEach(() => {
    cleanupTempDirs();
  });

  describe('buildDaemonArgs', () => {
    it('should pass config, address and token', () => {
      const target = makeTarget();
      expect(buildDaemonArgs(target)).toEqual([
        '--config',
        target.paths.configPath,
        'daemon',
        '--http-addr',
        '127.0.0.1:7950',
        '--http-token',
        'test-token',
      ]);
    });

    it('should fall back to the registry port and omit a missing token', () => {
      const target = makeTarget({ email: 'alice@example.com', data_dir: '/d', server_url: 'https://s.test' }, 7960);
      expect(buildDaemonArgs(target)).toEqual([
        '--config',
        target.paths.configPath,
        'daemon',
        '--http-addr',
        '127.0.0.1:7960',
      ]);
    });
  });

  describe('checkPid', () => {
    it('should report absent without a PID file', () => {
      expect(supervisor.checkPid(makeTarget())).toEqual({ state: 'absent' });
    });

    it('should report a live PID as running', () => {
      const target = makeTarget();
      inspector.addProcess(500);
      writePid(target, '500\n');

      expect(supervisor.checkPid(target)).toEqual({ state: 'running', pid: 500 });
      expect(existsSync(target.paths.pidPath)).toBe(true);
    });

    it('should remove a PID file pointing at a dead process', () => {
      const target = makeTarget();
      writePid(target, '424242\n');

      expect(supervisor.checkPid(target)).toEqual({ state: 'stale', pid: 424242 });
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });

    it('should remove an unreadable PID file', () => {
      const target = makeTarget();
      writePid(target, 'garbage');

      expect(supervisor.checkPid(target)).toEqual({ state: 'absent' });
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });
  });

  describe('start', () => {
    it('should spawn the daemon and record its PID once it is alive', async () => {
      const target = makeTarget();

      const result = await supervisor.start(target, { binary: '/opt/syftbox' });

      expect(result).toEqual({
        status: 'started',
        pid: 1001,
        health: { state: 'healthy', url: 'http://127.0.0.1:7950/v1/status', status: 200 },
        orphansReaped: [],
      });
      expect(spawner.spawn).toHaveBeenCalledWith('/opt/syftbox', buildDaemonArgs(target), {
        cwd: target.paths.root,
        logPath: target.paths.logPath,
      });
      expect(readFileSync(target.paths.pidPath, 'utf-8')).toBe('1001\n');
      expect(sleep.mock.calls).toEqual([[1000], [1000]]);
      expect(prober.get).toHaveBeenCalledWith('http://127.0.0.1:7950/v1/status', {
        token: 'test-token',
        timeoutMs: 2000,
      });
    });

    it('should leave a running daemon alone', async () => {
      const target = makeTarget();
      inspector.addProcess(500);
      writePid(target, '500\n');

      const result = await supervisor.start(target, { binary: '/opt/syftbox' });

      expect(result).toEqual({ status: 'already-running', pid: 500 });
      expect(spawner.spawn).not.toHaveBeenCalled();
    });

    it('should replace a running daemon when forced', async () => {
      const target = makeTarget();
      inspector.addProcess(500);
      writePid(target, '500\n');

      const result = await supervisor.start(target, { binary: '/opt/syftbox', force: true });

      expect(result).toMatchObject({ status: 'started', pid: 1001 });
      expect(inspector.signals[0]).toEqual([500, 'SIGTERM']);
      expect(inspector.isAlive(500)).toBe(false);
    });

    it('should start over a stale PID file', async () => {
      const target = makeTarget();
      writePid(target, '424242\n');

      const result = await supervisor.start(target, { binary: '/opt/syftbox' });

      expect(result).toMatchObject({ status: 'started', pid: 1001 });
    });

    it('should fail and leave no PID file when the daemon dies straight away', async () => {
      const target = makeTarget();
      spawner = createFakeSpawner(inspector, { dieOnStart: true });
      supervisor = build();

      await expect(supervisor.start(target, { binary: '/opt/syftbox' })).rejects.toThrow(
        `Daemon failed to start; see ${target.paths.logPath}`,
      );
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });

    it('should wrap spawn errors and restore the global config', async () => {
      const target = makeTarget();
      const original = '{"email":"real@example.com"}';
      mkdirSync(dirname(target.daemonGlobalConfigPath), { recursive: true });
      writeFileSync(target.daemonGlobalConfigPath, original);
      const cause = new Error('spawn /opt/syftbox ENOENT');
      spawner.spawn.mockRejectedValue(cause);

      const error = await supervisor.start(target, { binary: '/opt/syftbox' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DaemonStartError);
      expect(error instanceof DaemonStartError && error.cause).toBe(cause);
      expect(readFileSync(target.daemonGlobalConfigPath, 'utf-8')).toBe(original);
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });

    it('should spawn with the environment config in the global slot', async () => {
      const target = makeTarget();
      const original = '{"email":"real@example.com"}';
      mkdirSync(dirname(target.daemonGlobalConfigPath), { recursive: true });
      writeFileSync(target.daemonGlobalConfigPath, original);
      let slotDuringSpawn = '';
      spawner.spawn.mockImplementation(async () => {
        slotDuringSpawn = readFileSync(target.daemonGlobalConfigPath, 'utf-8');
        inspector.addProcess(2002);
        return 2002;
      });

      await supervisor.start(target, { binary: '/opt/syftbox' });

      expect(slotDuringSpawn).toBe(readFileSync(target.paths.configPath, 'utf-8'));
      expect(readFileSync(target.daemonGlobalConfigPath, 'utf-8')).toBe(original);
    });

    it('should reap untracked daemons using the same config', async () => {
      const target = makeTarget();
      inspector.addProcess(777, `/usr/bin/syftbox --config ${target.paths.configPath} daemon`, 'ignore-term');
      inspector.addProcess(778, '/usr/bin/syftbox --config /elsewhere/config.json daemon');

      const result = await supervisor.start(target, { binary: '/opt/syftbox' });

      expect(result).toMatchObject({ status: 'started', orphansReaped: [777] });
      expect(inspector.signals).toEqual([
        [777, 'SIGTERM'],
        [777, 'SIGKILL'],
      ]);
      expect(inspector.isAlive(778)).toBe(true);
    });

    it('should skip an untracked daemon it may not signal', async () => {
      const target = makeTarget();
      inspector.addProcess(779, `/usr/bin/syftbox --config ${target.paths.configPath} daemon`, 'foreign');
      inspector.addProcess(780, `/usr/bin/syftbox --config ${target.paths.configPath} daemon`);

      const result = await supervisor.start(target, { binary: '/opt/syftbox' });

      expect(result).toMatchObject({ status: 'started', orphansReaped: [780] });
      expect(inspector.isAlive(779)).toBe(true);
    });
  });

  describe('findOrphans', () => {
    it('should skip the tracked PID', async () => {
      const target = makeTarget();
      inspector.addProcess(500, `syftbox --config ${target.paths.configPath} daemon`);
      inspector.addProcess(501, `syftbox --config ${target.paths.configPath} daemon`);

      const orphans = await supervisor.findOrphans(target, 500);

      expect(orphans.map((o) => o.pid)).toEqual([501]);
    });
  });

  describe('stop', () => {
    it('should report not running without a PID file', async () => {
      expect(await supervisor.stop(makeTarget())).toEqual({ status: 'not-running' });
    });

    it('should clean up a stale PID file', async () => {
      const target = makeTarget();
      writePid(target, '424242\n');

      expect(await supervisor.stop(target)).toEqual({ status: 'not-running', stalePid: 424242 });
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });

    it('should stop a daemon that honours SIGTERM', async () => {
      const target = makeTarget();
      inspector.addProcess(500);
      writePid(target, '500\n');

      expect(await supervisor.stop(target)).toEqual({ status: 'stopped', pid: 500, forced: false });
      expect(existsSync(target.paths.pidPath)).toBe(false);
      expect(sleep).toHaveBeenCalledTimes(1);
    });

    it('should escalate to SIGKILL after the fifth poll', async () => {
      const target = makeTarget();
      inspector.addProcess(500, 'stubborn', 'ignore-term');
      writePid(target, '500\n');

      expect(await supervisor.stop(target)).toEqual({ status: 'stopped', pid: 500, forced: true });
      expect(inspector.signals).toEqual([
        [500, 'SIGTERM'],
        [500, 'SIGKILL'],
      ]);
      expect(sleep).toHaveBeenCalledTimes(6);
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });

    it('should give up after the last poll and still clear the PID file', async () => {
      const target = makeTarget();
      inspector.addProcess(500, 'immortal', 'immortal');
      writePid(target, '500\n');

      expect(await supervisor.stop(target)).toEqual({ status: 'stopped', pid: 500, forced: true });
      expect(sleep).toHaveBeenCalledTimes(10);
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });
  });

  describe('restart', () => {
    it('should stop, wait and start again', async () => {
      const target = makeTarget();
      inspector.addProcess(500);
      writePid(target, '500\n');

      const result = await supervisor.restart(target, { binary: '/opt/syftbox' });

      expect(result).toMatchObject({ status: 'started', pid: 1001 });
      expect(inspector.isAlive(500)).toBe(false);
      expect(sleep.mock.calls).toEqual([[1000], [1000], [1000], [1000]]);
    });

    it('should start even when nothing was running', async () => {
      const result = await supervisor.restart(makeTarget(), { binary: '/opt/syftbox' });
      expect(result).toMatchObject({ status: 'started' });
    });
  });

  describe('status', () => {
    it('should treat 401 as healthy', async () => {
      prober.get.mockResolvedValue(401);
      const report = await supervisor.status(makeTarget());

      expect(report).toEqual({
        process: { state: 'absent' },
        health: { state: 'healthy', url: 'http://127.0.0.1:7950/v1/status', status: 401 },
      });
    });

    it('should report other statuses as unhealthy', async () => {
      prober.get.mockResolvedValue(503);
      expect((await supervisor.status(makeTarget())).health.state).toBe('unhealthy');
    });

    it('should report a failed request as unreachable', async () => {
      prober.get.mockRejectedValue(new Error('connect ECONNREFUSED 127.0.0.1:7950'));

      expect((await supervisor.status(makeTarget())).health).toEqual({
        state: 'unreachable',
        url: 'http://127.0.0.1:7950/v1/status',
        error: 'connect ECONNREFUSED 127.0.0.1:7950',
      });
    });

    it('should clean up a stale PID file while reporting', async () => {
      const target = makeTarget();
      writePid(target, '424242\n');

      expect((await supervisor.status(target)).process).toEqual({ state: 'stale', pid: 424242 });
      expect(existsSync(target.paths.pidPath)).toBe(false);
    });

    it('should not probe without a URL or port', async () => {
      const target = makeTarget({ email: 'alice@example.com', data_dir: '/d', server_url: 'https://s.test' }, 0);

      expect((await supervisor.status(target)).health.state).toBe('unreachable');
      expect(prober.get).not.toHaveBeenCalled();
    });
  });

  it('should return the last lines of the daemon log', () => {
    const target = makeTarget();
    mkdirSync(dirname(target.paths.logPath), { recursive: true });
    writeFileSync(target.paths.logPath, 'one\ntwo\nthree\n');

    expect(supervisor.readLogs(target, 2)).toEqual(['two', 'three']);
    expect(supervisor.readLogs(makeTarget())).toEqual([]);
  });
});
