import { logger } from './logger.js';
import type { MemoryTiers } from './memory/tiers.js';

export type StopReaper = () => void;

/**
 * Deletes expired working-memory rows now and then every `intervalMs`.
 * Reads already hide expired rows; this only reclaims space. The timer is
 * unref'd so it never keeps the process alive. An interval that is not a
 * positive number starts nothing.
 */
export function startWorkingMemoryReaper(
  tiers: MemoryTiers,
  intervalMs: number,
): StopReaper {
  if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
    logger.debug('Working memory reaper disabled');
    return () => {};
  }

  let timer: NodeJS.Timeout | null = null;
  let stopped = false;

  const loop = () => {
    try {
      const removed = tiers.sweepExpiredWorking();
      if (removed > 0) {
        logger.info({ removed }, 'Expired working memory reclaimed');
      }
    } catch (err) {
      logger.error({ err }, 'Error in working memory reaper');
    }

    if (!stopped) {
      timer = setTimeout(loop, intervalMs);
      timer.unref();
    }
  };

  logger.info({ intervalMs }, 'Working memory reaper started');
  loop();

  return () => {
    stopped = true;
    if (timer) clearTimeout(timer);
    timer = null;
  };
}
