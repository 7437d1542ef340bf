import { PortRangeExhaustedError } from '../errors.js';
import { usedPorts } from './registry.js';
import type { PortRange, Registry } from '../types/index.js';

const MAX_DRAWS = 100;

/**
 * Picks a port in `range` that no registry record holds. Draws at random
 * instead of scanning so environments created back to back do not pile up
 * at the low end of the range. Only the registry is consulted, not the OS.
 */
export function allocatePort(
  registry: Registry,
  range: PortRange,
  random: () => number = Math.random,
): number {
  const taken = usedPorts(registry);
  const size = range.max - range.min + 1;

  let free = 0;
  for (let port = range.min; port <= range.max; port++) {
    if (!taken.has(port)) free++;
  }
  if (free === 0) {
    throw new PortRangeExhaustedError(range.min, range.max);
  }

  for (let draw = 0; draw < MAX_DRAWS; draw++) {
    const port = range.min + Math.floor(random() * size);
    if (port >= range.min && port <= range.max && !taken.has(port)) {
      return port;
    }
  }
  throw new PortRangeExhaustedError(range.min, range.max);
}
