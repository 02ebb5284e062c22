import { Page } from '../services/crawler/interfaces/types';

/**
 * A search term with its importance. `term` is lowercased and longer than
 * one character; `weight` lies in [1, 10].
 */
export interface WeightedKeyword {
  term: string;
  weight: number;
}

export interface MatchResult {
  page: Page;
  score: number;
}

/**
 * External text-generation capability: one prompt in, free text out.
 * Implementations may fail; callers decide how to degrade.
 */
export interface ITextGenerator {
  generate(prompt: string): Promise<string>;
}
