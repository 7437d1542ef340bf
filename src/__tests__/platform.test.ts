import { describe, it, expect, vi, afterEach } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { createArchiveExtractor } from '../platform/archiveExtractor.js';
import { runCommand, type CommandRunner } from '../platform/commandRunner.js';
import { createProcessInspector, parsePsOutput } from '../platform/processInspector.js';
import { createReleaseClient } from '../platform/releaseClient.js';
import { DEFAULT_DAEMON_SETTINGS } from '../services/paths.js';
import { cleanupTempDirs, makeTempDir } from './helpers/fakes.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('platform adapters', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
    cleanupTempDirs();
  });

  describe('releaseClient', () => {
    const settings = { ...DEFAULT_DAEMON_SETTINGS, apiBaseUrl: 'https://api.test', downloadBaseUrl: 'https://dl.test' };

    it('should read assets of the v-prefixed tag', async () => {
      const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
        jsonResponse({
          assets: [
            { name: 'syftbox_linux_amd64.tar.gz', browser_download_url: 'https://dl.test/a.tgz' },
            { name: 'broken' },
          ],
        }),
      );
      vi.stubGlobal('fetch', fetchMock);

      const assets = await createReleaseClient(settings, 'test-secret').getReleaseAssets('0.8.5');

      expect(assets).toEqual([{ name: 'syftbox_linux_amd64.tar.gz', url: 'https://dl.test/a.tgz' }]);
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock.mock.calls[0][0]).toBe('https://api.test/repos/OpenMined/syftbox/releases/tags/v0.8.5');
      expect(fetchMock.mock.calls[0][1]?.headers).toEqual({
        Accept: 'application/vnd.github+json',
        'User-Agent': 'boxenv',
        Authorization: 'Bearer test-secret',
      });
    });

    it('should try the bare tag after a 404 and return nothing when both are missing', async () => {
      const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(null, { status: 404 }));
      vi.stubGlobal('fetch', fetchMock);

      expect(await createReleaseClient(settings, undefined).getReleaseAssets('0.8.5')).toEqual([]);
      expect(fetchMock.mock.calls.map(([url]) => url)).toEqual([
        'https://api.test/repos/OpenMined/syftbox/releases/tags/v0.8.5',
        'https://api.test/repos/OpenMined/syftbox/releases/tags/0.8.5',
      ]);
    });

    it('should fail on other error statuses', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response(null, { status: 403, statusText: 'Forbidden' })),
      );

      await expect(createReleaseClient(settings, undefined).getReleaseAssets('0.8.5')).rejects.toThrow(
        'Release lookup for v0.8.5 failed: 403 Forbidden',
      );
    });

    it('should write downloaded bytes to disk', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response('binary bytes', { status: 200 })),
      );
      const dest = join(makeTempDir(), 'asset');

      await createReleaseClient(settings, undefined).download('https://dl.test/a.tgz', dest);

      expect(readFileSync(dest, 'utf-8')).toBe('binary bytes');
    });

    it('should reject a failed download', async () => {
      vi.stubGlobal(
        'fetch',
        vi.fn(async () => new Response(null, { status: 404, statusText: 'Not Found' })),
      );
      const dest = join(makeTempDir(), 'asset');

      await expect(createReleaseClient(settings, undefined).download('https://dl.test/a.tgz', dest)).rejects.toThrow(
        'Download of https://dl.test/a.tgz failed: 404 Not Found',
      );
      expect(existsSync(dest)).toBe(false);
    });

    it('should build conventional download URLs', () => {
      expect(createReleaseClient(settings, undefined).conventionalAssetUrl('0.8.5', 'syftbox_linux_amd64.zip')).toBe(
        'https://dl.test/OpenMined/syftbox/releases/download/v0.8.5/syftbox_linux_amd64.zip',
      );
    });
  });

  describe('archiveExtractor', () => {
    it('should run tar for tar.gz and unzip for zip', async () => {
      const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(async () => ({
        code: 0,
        stdout: '',
        stderr: '',
      }));
      const dest = join(makeTempDir(), 'out');
      const extractor = createArchiveExtractor(run);

      await extractor.extract('/tmp/a.tar.gz', dest, 'tar.gz');
      await extractor.extract('/tmp/a.zip', dest, 'zip');

      expect(run.mock.calls.map(([command, args]) => [command, args])).toEqual([
        ['tar', ['-xzf', '/tmp/a.tar.gz', '-C', dest]],
        ['unzip', ['-o', '-q', '/tmp/a.zip', '-d', dest]],
      ]);
      expect(existsSync(dest)).toBe(true);
    });

    it('should fail with the tool output on a non-zero exit', async () => {
      const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(async () => ({
        code: 2,
        stdout: '',
        stderr: 'gzip: stdin: not in gzip format\n',
      }));
      const dest = join(makeTempDir(), 'out');

      await expect(createArchiveExtractor(run).extract('/tmp/a.tar.gz', dest, 'tar.gz')).rejects.toThrow(
        'tar could not extract /tmp/a.tar.gz: gzip: stdin: not in gzip format',
      );
    });
  });

  describe('processInspector', () => {
    it('should parse ps output', () => {
      expect(parsePsOutput('  12 /usr/bin/syftbox --config /a/config.json daemon\n345 sleep 60\n\n')).toEqual([
        { pid: 12, command: '/usr/bin/syftbox --config /a/config.json daemon' },
        { pid: 345, command: 'sleep 60' },
      ]);
    });

    it('should see this process and reject impossible PIDs', () => {
      const inspector = createProcessInspector();
      expect(inspector.isAlive(process.pid)).toBe(true);
      expect(inspector.isAlive(0)).toBe(false);
      expect(inspector.isAlive(-5)).toBe(false);
    });
  });

  describe('runCommand', () => {
    it('should collect output and exit code', async () => {
      const result = await runCommand('/bin/sh', ['-c', 'echo out; echo err >&2; exit 3']);
      expect(result).toEqual({ code: 3, stdout: 'out\n', stderr: 'err\n' });
    });

    it('should kill a command that outlives its timeout', async () => {
      await expect(runCommand('/bin/sh', ['-c', 'sleep 5'], { timeoutMs: 100 })).rejects.toThrow(
        '/bin/sh timed out after 100ms',
      );
    });
  });
});
