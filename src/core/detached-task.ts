import { describeError } from '../common/errors';
import { logger } from '../utils/logger';

/**
 * Runs fire-and-forget work such as notification dispatch.
 *
 * Non-guarantees:
 * - `spawn` never waits: the caller only pays for starting the promise.
 * - Results are discarded and rejections are swallowed (logged at debug).
 * - Tasks are never cancelled, and nothing promises they finish before the
 *   process exits. `drain` is a bounded, best-effort wait for shutdown and
 *   tests, not a delivery guarantee.
 */
export class DetachedTaskRunner {
  private readonly running = new Set<Promise<void>>();

  spawn(label: string, work: () => Promise<unknown>): void {
    const task: Promise<void> = Promise.resolve()
      .then(work)
      .then(
        () => {
          logger.trace(`🧵 Detached task completed: ${label}`);
        },
        (error: unknown) => {
          logger.debug(`🧵 Detached task failed (${label}): ${describeError(error)}`);
        },
      )
      .finally(() => {
        this.running.delete(task);
      });

    this.running.add(task);
  }

  get inFlight(): number {
    return this.running.size;
  }

  /**
   * Wait for in-flight tasks, giving up after `timeoutMs`
   *
   * @returns true when every task settled in time
   */
  async drain(timeoutMs: number): Promise<boolean> {
    if (this.running.size === 0) {
      return true;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });

    try {
      return await Promise.race([
        Promise.allSettled([...this.running]).then(() => true),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
