import { describe, it, expect, vi, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { hashFile, parseVersionOutput, probeBinaryVersion } from '../services/versionProbe.js';
import type { CommandRunner } from '../platform/commandRunner.js';
import { cleanupTempDirs, makeTempDir } from './helpers/fakes.js';

describe('versionProbe', () => {
  afterEach(() => {
    cleanupTempDirs();
  });

  describe('parseVersionOutput', () => {
    it('should read the full build line', () => {
      expect(
        parseVersionOutput('syftbox version 0.8.5 (a1b2c3d; go1.24.3; linux/amd64; 2025-06-01T10:00:00Z)\n'),
      ).toEqual({
        name: 'syftbox',
        version: '0.8.5',
        commit: 'a1b2c3d',
        toolchain: 'go1.24.3',
        os: 'linux',
        arch: 'amd64',
        builtAt: '2025-06-01T10:00:00Z',
      });
    });

    it('should accept a bare version with a leading v', () => {
      expect(parseVersionOutput('syftbox version v0.9.0-beta.1')).toEqual({
        name: 'syftbox',
        version: '0.9.0-beta.1',
      });
    });

    it('should skip lines before the version line', () => {
      expect(parseVersionOutput('warning: something odd\nsyftbox version 1.2.3')?.version).toBe('1.2.3');
    });

    it('should return undefined for unrelated output', () => {
      expect(parseVersionOutput('usage: syftbox [command]')).toBeUndefined();
      expect(parseVersionOutput('')).toBeUndefined();
    });
  });

  describe('probeBinaryVersion', () => {
    it('should run the binary with --version', async () => {
      const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(async () => ({
        code: 0,
        stdout: 'syftbox version 0.8.5\n',
        stderr: '',
      }));

      const info = await probeBinaryVersion('/opt/syftbox', run);

      expect(info).toEqual({ name: 'syftbox', version: '0.8.5' });
      expect(run).toHaveBeenCalledWith('/opt/syftbox', ['--version'], { timeoutMs: 5000 });
    });

    it('should read the version from stderr too', async () => {
      const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(async () => ({
        code: 0,
        stdout: '',
        stderr: 'syftbox version 0.7.0\n',
      }));
      expect((await probeBinaryVersion('/opt/syftbox', run))?.version).toBe('0.7.0');
    });

    it('should report unknown when the binary cannot run', async () => {
      const run = vi.fn<Parameters<CommandRunner>, ReturnType<CommandRunner>>(async () => {
        throw new Error('spawn ENOENT');
      });
      expect(await probeBinaryVersion('/missing/syftbox', run)).toBeUndefined();
    });
  });

  describe('hashFile', () => {
    it('should return the sha256 of the contents', () => {
      const path = join(makeTempDir(), 'bin');
      writeFileSync(path, 'abc');
      expect(hashFile(path)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
    });

    it('should return undefined for a missing file', () => {
      expect(hashFile('/nonexistent/boxenv-test/bin')).toBeUndefined();
    });
  });
});
