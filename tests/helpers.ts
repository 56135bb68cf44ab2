import { DatabaseService, IN_MEMORY } from '../src/services/database.js';
import { TokenEstimator } from '../src/services/token-estimator.js';
import { createLogger } from '../src/utils/logger.js';
import type { Logger } from '../src/utils/logger.js';

export const silentLogger: Logger = createLogger({ level: 'silent' });

export async function openMemoryDb(): Promise<DatabaseService> {
  const db = new DatabaseService(IN_MEMORY, { logger: silentLogger });
  await db.initialize();
  return db;
}

/**
 * Estimator that always takes the one-token-per-four-characters path.
 */
export function characterEstimator(): TokenEstimator {
  return new TokenEstimator({ resolveEncoding: () => null, logger: silentLogger });
}

export function fixedClock(iso: string): { clock: () => Date; set: (next: string) => void } {
  let now = new Date(iso);
  return {
    clock: () => now,
    set: next => {
      now = new Date(next);
    },
  };
}

export function sequentialIds(prefix: string = 'session'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}
