import { resolve } from 'node:path';
import type { Command } from 'commander';
import pc from 'picocolors';
import { getPortConfig, setPortConfig } from '../services/configStore.js';
import {
  activationScript,
  deactivationScript,
  editEnvironment,
  getEnvironment,
  getGlobalDefault,
  initEnvironment,
  listEnvironmentStates,
  removeEnvironment,
} from '../services/environmentService.js';
import { environmentPaths } from '../services/paths.js';
import { confirmRemoval, isInteractive, promptInitAnswers } from '../setup/prompts.js';
import { describeBinary, formatProcessState, keyValue, success, table, warning } from '../utils/output.js';
import { parsePort, resolveRoot, type ContextFactory, type PathOption } from './common.js';

interface InitFlags {
  email?: string;
  serverUrl?: string;
  dev?: boolean;
  name?: string;
  binary?: string;
  force?: boolean;
}

interface EditFlags extends PathOption {
  serverUrl?: string;
  dev?: boolean;
  name?: string;
  binary?: string;
  clearBinary?: boolean;
}

export function registerEnvironmentCommands(program: Command, getContext: ContextFactory): void {
  program
    .command('init')
    .description('Create an environment in a directory (default: the current one)')
    .argument('[dir]', 'Environment root', '.')
    .option('-e, --email <email>', 'Email the daemon signs in as')
    .option('-s, --server-url <url>', 'Server the daemon syncs with')
    .option('--dev', 'Enable development mode')
    .option('-n, --name <name>', 'Display name')
    .option('-b, --binary <spec>', 'Daemon binary: a path or a version such as 0.8.5')
    .option('-f, --force', 'Re-initialise an existing environment')
    .action(async (dir: string, flags: InitFlags) => {
      const ctx = getContext();
      const root = resolve(dir);

      let email = flags.email;
      let serverUrl = flags.serverUrl;
      if (!email && isInteractive()) {
        const answers = await promptInitAnswers(root, { email, serverUrl });
        if (!answers) return;
        ({ email, serverUrl } = answers);
      }
      if (!email) {
        throw new Error('An email is required: pass --email');
      }

      const record = await initEnvironment(ctx, {
        root,
        email,
        serverUrl,
        devMode: flags.dev,
        name: flags.name,
        binary: flags.binary,
        force: flags.force,
      });
      console.log(success(`Environment ${pc.bold(record.name)} ready at ${record.path}`));
      console.log(keyValue([
        ['email', record.email],
        ['port', String(record.port)],
        ['server', record.serverUrl],
        ['binary', describeBinary(record)],
      ]));
      console.log(`\nActivate it with: ${pc.cyan('eval "$(boxenv activate)"')}`);
    });

  program
    .command('edit')
    .description('Change an environment\'s settings')
    .option('-p, --path <dir>', 'Environment root')
    .option('-s, --server-url <url>', 'Server the daemon syncs with')
    .option('--dev', 'Enable development mode')
    .option('--no-dev', 'Disable development mode')
    .option('-n, --name <name>', 'Display name')
    .option('-b, --binary <spec>', 'Pin a daemon binary (path or version)')
    .option('--clear-binary', 'Forget the pinned binary')
    .action(async (flags: EditFlags) => {
      const ctx = getContext();
      const record = await editEnvironment(ctx, resolveRoot(flags), {
        serverUrl: flags.serverUrl,
        devMode: flags.dev,
        name: flags.name,
        binary: flags.binary,
        clearBinary: flags.clearBinary,
      });
      console.log(success(`Updated ${pc.bold(record.name)}`));
    });

  program
    .command('list')
    .alias('ls')
    .description('List registered environments')
    .action(() => {
      const ctx = getContext();
      const listings = listEnvironmentStates(ctx);
      if (listings.length === 0) {
        console.log(pc.gray('No environments yet. Create one with `boxenv init`.'));
        return;
      }
      const active = process.env.BOXENV_ROOT;
      console.log(
        table(
          ['', 'NAME', 'EMAIL', 'PORT', 'BINARY', 'DAEMON', 'PATH'],
          listings.map(({ record, process: state }) => [
            active && resolve(active) === record.path ? pc.green('*') : ' ',
            record.name,
            record.email,
            record.port ? String(record.port) : pc.gray('-'),
            describeBinary(record),
            formatProcessState(state),
            record.path,
          ]),
        ),
      );
    });

  program
    .command('info')
    .description('Show one environment')
    .option('-p, --path <dir>', 'Environment root')
    .action((flags: PathOption) => {
      const ctx = getContext();
      const root = resolveRoot(flags);
      const record = getEnvironment(ctx, root);
      if (!record) {
        console.log(warning(`${root} has a config but is not registered; run \`boxenv edit\` to register it`));
        return;
      }
      const paths = environmentPaths(record.path);
      console.log(keyValue([
        ['name', record.name],
        ['path', record.path],
        ['email', record.email],
        ['port', String(record.port)],
        ['server', record.serverUrl],
        ['dev mode', record.devMode ? 'on' : 'off'],
        ['binary', describeBinary(record)],
        ['global default', getGlobalDefault(ctx) ?? pc.gray('none')],
        ['config', paths.configPath],
        ['log', paths.logPath],
      ]));
    });

  program
    .command('remove')
    .alias('rm')
    .description('Stop an environment\'s daemon and unregister it')
    .argument('[dir]', 'Environment root (default: the enclosing environment)')
    .option('--purge', 'Also delete the environment\'s .boxenv directory')
    .option('-y, --yes', 'Do not ask for confirmation')
    .action(async (dir: string | undefined, flags: { purge?: boolean; yes?: boolean }) => {
      const ctx = getContext();
      const root = dir ? resolve(dir) : resolveRoot({});
      if (!flags.yes && isInteractive() && !(await confirmRemoval(root, Boolean(flags.purge)))) {
        console.log('Cancelled.');
        return;
      }
      const removed = await removeEnvironment(ctx, root, { purge: flags.purge });
      if (removed.length === 0) {
        console.log(warning(`${root} was not registered`));
        return;
      }
      console.log(success(`Removed ${removed.length} registration${removed.length === 1 ? '' : 's'} for ${root}`));
    });

  program
    .command('activate')
    .description('Print shell exports for an environment; use with eval "$(boxenv activate)"')
    .option('-p, --path <dir>', 'Environment root')
    .action((flags: PathOption) => {
      console.log(activationScript(getContext(), resolveRoot(flags)));
    });

  program
    .command('deactivate')
    .description('Print the shell command that clears an activated environment')
    .action(() => {
      console.log(deactivationScript(getContext()));
    });

  program
    .command('ports')
    .description('Show or set the port range new environments draw from')
    .argument('[min]', 'Lowest port', parsePort)
    .argument('[max]', 'Highest port', parsePort)
    .action((min: number | undefined, max: number | undefined) => {
      const { home } = getContext();
      if (min === undefined || max === undefined) {
        const range = getPortConfig(home);
        console.log(`${range.min}-${range.max}`);
        return;
      }
      if (min > max) {
        throw new Error(`Invalid range ${min}-${max}`);
      }
      setPortConfig(home, { min, max });
      console.log(success(`Port range set to ${min}-${max}`));
    });
}
