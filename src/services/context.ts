import { createArchiveExtractor, type ArchiveExtractor } from '../platform/archiveExtractor.js';
import { createDaemonSpawner, type DaemonSpawner } from '../platform/daemonSpawner.js';
import { createHttpProber, type HttpProber } from '../platform/httpProber.js';
import { createProcessInspector, type ProcessInspector } from '../platform/processInspector.js';
import { createReleaseClient, type ReleaseClient } from '../platform/releaseClient.js';
import { BinaryCache } from './binaryCache.js';
import { BinaryResolver } from './binaryResolver.js';
import { DEFAULT_PORT_RANGE, loadAppConfig } from './configStore.js';
import { DaemonSupervisor, type SupervisorTimings } from './daemonSupervisor.js';
import { resolveDaemonSettings, resolveHome } from './paths.js';
import { detectPlatform } from './releaseAssets.js';
import type { BinaryBuildInfo, BoxenvHome, DaemonSettings, HostPlatform, PortRange } from '../types/index.js';
import { log as defaultLog, type Logger } from '../utils/logger.js';
import type { Sleep } from '../utils/time.js';

/**
 * Everything one CLI invocation works with. Documents (registry, defaults,
 * local configs) are not held here; they are loaded and saved per operation.
 */
export interface BoxenvContext {
  home: BoxenvHome;
  daemon: DaemonSettings;
  ports: PortRange;
  platform: HostPlatform;
  cache: BinaryCache;
  resolver: BinaryResolver;
  supervisor: DaemonSupervisor;
  log: Logger;
}

export interface ContextOptions {
  env?: Record<string, string | undefined>;
  log?: Logger;
  platform?: HostPlatform;
  releases?: ReleaseClient;
  extractor?: ArchiveExtractor;
  inspector?: ProcessInspector;
  spawner?: DaemonSpawner;
  prober?: HttpProber;
  probe?: (path: string) => Promise<BinaryBuildInfo | undefined>;
  which?: (name: string) => string | undefined;
  sleep?: Sleep;
  timings?: Partial<SupervisorTimings>;
}

export function createContext(options: ContextOptions = {}): BoxenvContext {
  const env = options.env ?? process.env;
  const log = options.log ?? defaultLog;

  // config.json lives in the tool home, and may rename the daemon binary,
  // which in turn decides where the daemon's global config slot is
  const appConfig = loadAppConfig(resolveHome(env));
  const daemon = resolveDaemonSettings(appConfig);
  const home = resolveHome(env, daemon.binaryName);
  const platform = options.platform ?? detectPlatform();

  const cache = new BinaryCache(home.cacheDir, daemon.binaryName, {
    releases: options.releases ?? createReleaseClient(daemon, env.GITHUB_TOKEN),
    extractor: options.extractor ?? createArchiveExtractor(),
    platform,
    log,
  });

  const resolver = new BinaryResolver({
    cache,
    binaryName: daemon.binaryName,
    log,
    probe: options.probe,
    which: options.which,
  });

  const supervisor = new DaemonSupervisor({
    inspector: options.inspector ?? createProcessInspector(),
    spawner: options.spawner ?? createDaemonSpawner(),
    prober: options.prober ?? createHttpProber(),
    sleep: options.sleep,
    log,
    timings: options.timings,
  });

  return {
    home,
    daemon,
    ports: appConfig.ports ?? DEFAULT_PORT_RANGE,
    platform,
    cache,
    resolver,
    supervisor,
    log,
  };
}
