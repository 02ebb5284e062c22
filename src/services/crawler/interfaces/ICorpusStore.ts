import { CorpusState } from './types';

/**
 * Persistence for systematic crawls.
 */
export interface ICorpusStore {
  /**
   * Load the persisted corpus, or a fresh state when there is none or it
   * cannot be parsed
   */
  load(): CorpusState;

  /**
   * Persist the corpus atomically
   * @throws PersistenceError when the write fails
   */
  save(state: CorpusState): void;
}
