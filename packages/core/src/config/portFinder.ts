import { createServer } from 'node:net';
import { randomInt } from 'node:crypto';
import {
  PORT_FALLBACK_MAX,
  PORT_FALLBACK_MIN,
  PORT_RANGE_MAX,
  PORT_RANGE_MIN,
  PORT_SEARCH_ATTEMPTS,
  RESERVED_PORT_RANGES,
  getLogger,
} from '@sentinel/shared';

const logger = getLogger();

export interface PortFinderOptions {
  attempts?: number;
  /** Inclusive random integer in [min, max]. */
  random?: (min: number, max: number) => number;
  isBindable?: (port: number) => Promise<boolean>;
}

export function randomPort(min: number, max: number): number {
  return randomInt(min, max + 1);
}

export function isReservedPort(port: number): boolean {
  return RESERVED_PORT_RANGES.some(([start, end]) => port >= start && port <= end);
}

/** Try to listen on `port` and release it straight away. */
export function isPortBindable(port: number, host: string = '127.0.0.1'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();
    server.unref();

    server.once('error', () => {
      resolve(false);
    });

    server.once('listening', () => {
      server.close(() => resolve(true));
    });

    server.listen({ port, host, exclusive: true });
  });
}

/**
 * Pick a random port in [10000, 65535] that is outside every reserved range and
 * can be bound right now. Gives up after a fixed number of attempts and returns
 * an unchecked port from the fallback range.
 */
export async function findAvailablePort(options: PortFinderOptions = {}): Promise<number> {
  const {
    attempts = PORT_SEARCH_ATTEMPTS,
    random = randomPort,
    isBindable = isPortBindable,
  } = options;

  for (let i = 0; i < attempts; i++) {
    const port = random(PORT_RANGE_MIN, PORT_RANGE_MAX);
    if (isReservedPort(port)) continue;

    if (await isBindable(port)) {
      logger.debug({ port, attempt: i + 1 }, 'Selected listening port');
      return port;
    }
  }

  const fallback = random(PORT_FALLBACK_MIN, PORT_FALLBACK_MAX);
  logger.warn({ attempts, port: fallback }, 'No bindable port found, using fallback range');
  return fallback;
}
