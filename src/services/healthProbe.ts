import { errorMessage } from '../errors.js';
import type { HttpProber } from '../platform/httpProber.js';
import type { HealthResult, LocalConfig } from '../types/index.js';

export const STATUS_PATH = '/v1/status';
export const PROBE_TIMEOUT_MS = 2000;

/**
 * Base URL of the daemon's local control API: the configured client URL,
 * else loopback on the port the registry recorded.
 */
export function daemonBaseUrl(config: LocalConfig, registryPort: number): string | undefined {
  if (config.client_url) {
    return config.client_url.replace(/\/+$/, '');
  }
  if (registryPort > 0) {
    return `http://127.0.0.1:${registryPort}`;
  }
  return undefined;
}

/**
 * `host:port` the daemon should listen on, derived the same way as the base URL.
 */
export function bindAddress(config: LocalConfig, registryPort: number): string | undefined {
  if (config.client_url) {
    try {
      const url = new URL(config.client_url);
      const port = url.port || (registryPort > 0 ? String(registryPort) : url.protocol === 'https:' ? '443' : '80');
      return `${url.hostname}:${port}`;
    } catch {
      // not a URL; fall through to the registry port
    }
  }
  return registryPort > 0 ? `127.0.0.1:${registryPort}` : undefined;
}

/**
 * 200 and 401 both mean the control API is up (401 only says a token is
 * required); any other status is unhealthy; no answer is unreachable.
 */
export async function probeHealth(
  prober: HttpProber,
  baseUrl: string,
  token?: string,
  timeoutMs: number = PROBE_TIMEOUT_MS,
): Promise<HealthResult> {
  const url = `${baseUrl}${STATUS_PATH}`;
  try {
    const status = await prober.get(url, { token, timeoutMs });
    if (status === 200 || status === 401) {
      return { state: 'healthy', url, status };
    }
    return { state: 'unhealthy', url, status };
  } catch (error) {
    return { state: 'unreachable', url, error: errorMessage(error) };
  }
}
