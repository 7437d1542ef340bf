import { spawn } from 'node:child_process';
import { closeSync, mkdirSync, openSync } from 'node:fs';
import { dirname } from 'node:path';

export interface SpawnOptions {
  cwd: string;
  logPath: string;
  env?: Record<string, string | undefined>;
}

export interface DaemonSpawner {
  /** Starts `command` detached from this process and resolves with its PID. */
  spawn(command: string, args: string[], options: SpawnOptions): Promise<number>;
}

/**
 * Detached spawn with stdin closed and stdout/stderr appended to one log
 * file, so the daemon and its output outlive the CLI invocation.
 */
export function createDaemonSpawner(): DaemonSpawner {
  return {
    spawn(command, args, options) {
      mkdirSync(dirname(options.logPath), { recursive: true });
      const logFd = openSync(options.logPath, 'a');
      let logOpen = true;
      const closeLog = (): void => {
        if (logOpen) {
          logOpen = false;
          closeSync(logFd);
        }
      };

      return new Promise<number>((resolve, reject) => {
        const child = spawn(command, args, {
          cwd: options.cwd,
          env: { ...process.env, ...options.env },
          detached: true,
          stdio: ['ignore', logFd, logFd],
        });

        child.once('error', (error) => {
          closeLog();
          reject(error);
        });

        child.once('spawn', () => {
          closeLog();
          child.unref();
          if (child.pid === undefined) {
            reject(new Error(`${command} started without a PID`));
            return;
          }
          resolve(child.pid);
        });
      });
    },
  };
}
