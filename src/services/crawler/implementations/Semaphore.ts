import { IConcurrencyGate } from '../interfaces/IConcurrencyGate';
import { ConfigError } from '../errors';
import { LoggingUtils } from '../utils/LoggingUtils';

/**
 * Counting semaphore with a FIFO waiting queue.
 * A released slot is handed straight to the oldest waiter, so the number
 * of tasks in flight never exceeds the limit.
 */
export class Semaphore implements IConcurrencyGate {
  private active = 0;
  private readonly waitingQueue: Array<() => void> = [];
  private readonly logger = LoggingUtils.createTaggedLogger('gate');

  /**
   * Creates a new Semaphore
   * @param limit Maximum number of slots held at once
   */
  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new ConfigError(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  public async acquire(): Promise<void> {
    if (this.active < this.limit) {
      this.active += 1;
      return;
    }

    await new Promise<void>(resolve => {
      this.waitingQueue.push(resolve);
    });
  }

  public release(): void {
    const next = this.waitingQueue.shift();
    if (next) {
      // Slot passes to the waiter; the active count is unchanged
      next();
      return;
    }

    if (this.active === 0) {
      this.logger.warn('release() called with no slot held');
      return;
    }
    this.active -= 1;
  }

  public async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /** Slots currently held */
  get inFlight(): number {
    return this.active;
  }

  /** Callers queued for a slot */
  get waiting(): number {
    return this.waitingQueue.length;
  }

  get capacity(): number {
    return this.limit;
  }
}
