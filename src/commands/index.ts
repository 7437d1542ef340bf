import type { Command } from 'commander';
import { registerBinaryCommands } from './binary.js';
import { registerDaemonCommands } from './daemon.js';
import { registerEnvironmentCommands } from './environment.js';
import type { ContextFactory } from './common.js';

export function registerCommands(program: Command, getContext: ContextFactory): void {
  registerEnvironmentCommands(program, getContext);
  registerDaemonCommands(program, getContext);
  registerBinaryCommands(program, getContext);
}
