import pLimit from 'p-limit';
import logger from '../logger';

export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

export interface PoolOptions {
  concurrency: number;
  retries?: number;
  backoffMs?: number;
}

/**
 * Run every task through a bounded pool and wait for all of them.
 *
 * Each task settles exactly once, as a value or as an `Error`, so one failure
 * never rejects the join. Results come back in task order regardless of
 * completion order.
 */
export async function settleAll<T>(
  tasks: Array<() => Promise<T>>,
  opts: PoolOptions,
): Promise<Settled<T>[]> {
  const retries = opts.retries ?? 0;
  const backoffBase = opts.backoffMs ?? 200;
  const limit = pLimit(opts.concurrency);

  async function execWithRetry(fn: () => Promise<T>): Promise<T> {
    let attempt = 0;
    while (true) {
      try {
        return await fn();
      } catch (err) {
        attempt++;
        if (attempt > retries) throw err;
        const delay = backoffBase * Math.pow(2, attempt - 1);
        logger.debug({ attempt, delay }, 'pool retrying task after error');
        await new Promise((r) => setTimeout(r, delay));
      }
    }
  }

  return Promise.all(
    tasks.map((task) =>
      limit(() => execWithRetry(task)).then(
        (value): Settled<T> => ({ ok: true, value }),
        (e): Settled<T> => ({ ok: false, error: e instanceof Error ? e : new Error(String(e)) }),
      ),
    ),
  );
}

export default settleAll;
