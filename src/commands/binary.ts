import type { Command } from 'commander';
import pc from 'picocolors';
import { classifyBinarySpec } from '../services/binaryResolver.js';
import { getGlobalDefault, resolveEnvironmentBinary, setGlobalDefault } from '../services/environmentService.js';
import { formatResolved, success } from '../utils/output.js';
import { resolveRoot, type ContextFactory, type PathOption } from './common.js';

export function registerBinaryCommands(program: Command, getContext: ContextFactory): void {
  const binary = program.command('binary').description('Resolve, install and pin daemon binaries');

  binary
    .command('resolve')
    .description('Show which binary an environment would run')
    .argument('[spec]', 'Resolve this spec instead of the environment\'s own choice')
    .option('-p, --path <dir>', 'Environment root')
    .option('--save', 'Pin the resolved spec on the environment')
    .action(async (spec: string | undefined, flags: PathOption & { save?: boolean }) => {
      const ctx = getContext();
      const resolved = await resolveEnvironmentBinary(ctx, resolveRoot(flags), { spec, save: flags.save });
      console.log(formatResolved(resolved));
      if (resolved.build?.commit) {
        console.log(pc.gray(`  build ${resolved.build.commit} ${resolved.build.os ?? ''}/${resolved.build.arch ?? ''}`));
      }
    });

  binary
    .command('default')
    .description('Show or set the binary used by environments that pin none')
    .argument('[spec]', 'A path or a version such as 0.8.5')
    .option('--clear', 'Remove the global default')
    .action((spec: string | undefined, flags: { clear?: boolean }) => {
      const ctx = getContext();
      if (flags.clear) {
        setGlobalDefault(ctx, undefined);
        console.log(success('Global default cleared'));
        return;
      }
      if (!spec) {
        console.log(getGlobalDefault(ctx) ?? pc.gray('none'));
        return;
      }
      setGlobalDefault(ctx, spec);
      console.log(success(`Global default set to ${spec}`));
    });

  binary
    .command('install')
    .description('Download a daemon version into the cache')
    .argument('<version>', 'Version such as 0.8.5')
    .action(async (version: string) => {
      const ctx = getContext();
      const spec = classifyBinarySpec(version);
      if (spec.kind !== 'version') {
        throw new Error(`"${version}" is not a version`);
      }
      const resolved = await ctx.resolver.resolve(spec.version);
      console.log(success(formatResolved(resolved)));
    });

  binary
    .command('cache')
    .description('List cached versions')
    .option('--remove <version>', 'Delete one cached version')
    .action((flags: { remove?: string }) => {
      const { cache } = getContext();
      if (flags.remove) {
        const removed = cache.remove(flags.remove);
        console.log(removed ? success(`Removed ${flags.remove}`) : pc.gray(`${flags.remove} is not cached`));
        return;
      }
      const versions = cache.listCachedVersions();
      if (versions.length === 0) {
        console.log(pc.gray(`Nothing cached in ${cache.cacheDir}`));
        return;
      }
      for (const version of versions) {
        console.log(`${version}  ${pc.gray(cache.executablePath(version))}`);
      }
    });
}
