import { ConfigurationError } from '@newscheck/shared/src/utils/errors.js';

export interface ProxyRotator {
  readonly size: number;
  next(): string;
}

function shuffle(items: readonly string[], random: () => number): string[] {
  const shuffled = [...items];
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }
  return shuffled;
}

/**
 * Endless cycle over a proxy pool. Each pass is a fresh shuffle; a new pass
 * never starts with the proxy that ended the previous one.
 */
export function createProxyRotator(
  pool: readonly string[],
  random: () => number = Math.random,
): ProxyRotator {
  if (pool.length === 0) {
    throw new ConfigurationError('Proxy pool must not be empty');
  }

  let cycle: string[] = [];
  let index = 0;
  let last: string | undefined;

  function reshuffle(): void {
    cycle = shuffle(pool, random);
    if (cycle.length > 1 && cycle[0] === last) {
      const swapWith = 1 + Math.floor(random() * (cycle.length - 1));
      [cycle[0], cycle[swapWith]] = [cycle[swapWith], cycle[0]];
    }
    index = 0;
  }

  return {
    size: pool.length,

    next(): string {
      if (index >= cycle.length) {
        reshuffle();
      }
      const proxy = cycle[index];
      index++;
      last = proxy;
      return proxy;
    },
  };
}
