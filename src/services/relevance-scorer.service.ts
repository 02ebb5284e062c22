import logger from '../utils/logger';
import { Page } from './crawler/interfaces/types';
import { MatchResult, WeightedKeyword } from '../types/query';

/**
 * Points per unit of keyword weight for each kind of match
 */
export const SCORE_POINTS = {
  exactTitle: 50,
  titleSubstring: 20,
  titleWholeWord: 25,
  category: 15,
  contentOccurrence: 2,
  leadingContentWord: 5,
  titleWordFragment: 3,
} as const;

/** Words of content searched for whole-word matches */
export const LEADING_CONTENT_WORDS = 200;

/** Keywords must be longer than this to score inside a title word */
const MIN_FRAGMENT_LENGTH = 3;

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

const WORD_CHAR = '[\\p{L}\\p{N}_]';
const IS_WORD_CHAR = /^[\p{L}\p{N}_]$/u;

/**
 * Matches `keyword` between word boundaries, where letters and digits of
 * any script count as word characters. A boundary next to a non-word end
 * of the keyword (the `+` of `c++`) needs a word character beyond it.
 */
export function wholeWordPattern(keyword: string): RegExp {
  const chars = Array.from(keyword);
  const startsWithWord = IS_WORD_CHAR.test(chars[0] ?? '');
  const endsWithWord = IS_WORD_CHAR.test(chars[chars.length - 1] ?? '');
  const before = startsWithWord ? `(?<!${WORD_CHAR})` : `(?<=${WORD_CHAR})`;
  const after = endsWithWord ? `(?!${WORD_CHAR})` : `(?=${WORD_CHAR})`;
  return new RegExp(`${before}${escapeRegExp(keyword)}${after}`, 'u');
}

/**
 * Non-overlapping occurrences of `needle` in `haystack`
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) {
    return 0;
  }
  let count = 0;
  let index = haystack.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = haystack.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Additive match score of a page for a keyword set. Matching is
 * case-insensitive; every term is multiplied by the keyword's weight.
 */
export function scorePage(page: Page, keywords: readonly WeightedKeyword[]): number {
  const title = page.title.toLowerCase();
  const content = page.content.toLowerCase();
  const categories = page.categories.join(' ').toLowerCase();
  const contentWords = content.split(/\s+/).filter(Boolean);
  const leadingContent = contentWords.slice(0, LEADING_CONTENT_WORDS).join(' ');
  const titleWords = title.split(/\s+/).filter(Boolean);

  let score = 0;
  for (const { term, weight } of keywords) {
    const keyword = term.toLowerCase();
    if (!keyword) {
      continue;
    }
    const wholeWord = wholeWordPattern(keyword);

    if (keyword === title) {
      score += SCORE_POINTS.exactTitle * weight;
    } else if (title.includes(keyword)) {
      score += SCORE_POINTS.titleSubstring * weight;
    }

    if (categories.includes(keyword)) {
      score += SCORE_POINTS.category * weight;
    }

    score += countOccurrences(content, keyword) * SCORE_POINTS.contentOccurrence * weight;

    if (wholeWord.test(title)) {
      score += SCORE_POINTS.titleWholeWord * weight;
    }

    if (wholeWord.test(leadingContent)) {
      score += SCORE_POINTS.leadingContentWord * weight;
    }

    if (keyword.length > MIN_FRAGMENT_LENGTH) {
      for (const word of titleWords) {
        if (word.includes(keyword)) {
          score += SCORE_POINTS.titleWordFragment * weight;
        }
      }
    }
  }

  return score;
}

/**
 * Score every page and keep the best `topN` with a positive score,
 * highest first; equal scores keep corpus order
 */
export function rankPages(pages: readonly Page[], keywords: readonly WeightedKeyword[], topN: number): MatchResult[] {
  if (topN <= 0) {
    return [];
  }

  return pages
    .map(page => ({ page, score: scorePage(page, keywords) }))
    .filter(result => result.score > 0)
    .sort((a, b) => b.score - a.score)
    .slice(0, topN);
}

export class RelevanceScorerService {
  /**
   * Best matching pages for a keyword set
   * @param pages The corpus, read-only
   * @param keywords Weighted keywords
   * @param topN Maximum number of pages returned
   */
  topPages(pages: readonly Page[], keywords: readonly WeightedKeyword[], topN = 10): Page[] {
    const ranked = rankPages(pages, keywords, topN);
    logger.info(`Using top ${ranked.length} of ${pages.length} pages`);
    if (ranked.length > 0) {
      logger.debug(`Top pages: ${ranked.slice(0, 5).map(r => r.page.title).join(', ')}`);
    }
    return ranked.map(result => result.page);
  }
}
