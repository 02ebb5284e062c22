import { CheckpointState, Page } from './types';

/**
 * Persistence for random-discovery crawls: an in-progress checkpoint and,
 * once the target is met, a final corpus with a readable summary.
 */
export interface ICheckpointStore {
  /**
   * Load the checkpoint, falling back to the final corpus of a finished run
   */
  load(): CheckpointState;

  /**
   * Write the checkpoint atomically
   * @throws PersistenceError when the write fails
   */
  save(state: CheckpointState): void;

  /**
   * Write the final corpus and its summary
   * @throws PersistenceError when either write fails
   */
  writeFinal(pages: readonly Page[]): void;

  /**
   * Remove the in-progress checkpoint
   */
  clear(): void;
}
