/**
 * Counting admission gate shared by every fetch of a crawl.
 */
export interface IConcurrencyGate {
  /**
   * Wait for a free slot
   */
  acquire(): Promise<void>;

  /**
   * Give a slot back, waking the oldest waiter if any
   */
  release(): void;

  /**
   * Run a task inside a slot; the slot is released however the task ends
   * @param task The work to run once admitted
   */
  run<T>(task: () => Promise<T>): Promise<T>;
}
