/**
 * Utilities for managing delays in the crawler service
 */
export class DelayUtils {
  /**
   * Creates a promise that resolves after the specified delay
   * @param ms The number of milliseconds to delay
   * @returns A promise that resolves after the specified delay
   */
  public static delay(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => setTimeout(resolve, ms));
  }

  /**
   * Delay that ends early when the signal aborts
   * @param ms The number of milliseconds to delay
   * @param signal Abort signal that cuts the wait short
   */
  public static delayUnlessAborted(ms: number, signal?: AbortSignal): Promise<void> {
    if (!signal) {
      return this.delay(ms);
    }
    if (ms <= 0 || signal.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      const onAbort = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
