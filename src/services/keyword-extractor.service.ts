import logger from '../utils/logger';
import { ITextGenerator, WeightedKeyword } from '../types/query';

export const MIN_KEYWORD_WEIGHT = 1;
export const MAX_KEYWORD_WEIGHT = 10;

/** Weight given to question words when the generator yields nothing usable */
export const FALLBACK_KEYWORD_WEIGHT = MAX_KEYWORD_WEIGHT;

const DECIMAL_NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse `term:weight` lines. The term is everything before the first
 * colon; lines without a colon, with a non-numeric weight, a one-letter
 * term or a weight outside [1, 10] are skipped.
 * @param response Free text from the generator
 * @returns Keywords in the order they appeared
 */
export function parseWeightedKeywords(response: string): WeightedKeyword[] {
  const keywords: WeightedKeyword[] = [];

  for (const rawLine of response.split('\n')) {
    const line = rawLine.trim();
    const separator = line.indexOf(':');
    if (separator === -1) {
      continue;
    }

    const term = line.slice(0, separator).trim().toLowerCase();
    const weightText = line.slice(separator + 1).trim();
    if (!DECIMAL_NUMBER.test(weightText)) {
      continue;
    }

    const weight = Number(weightText);
    if (term.length > 1 && weight >= MIN_KEYWORD_WEIGHT && weight <= MAX_KEYWORD_WEIGHT) {
      keywords.push({ term, weight });
    }
  }

  return keywords;
}

/**
 * Every word of the question longer than two characters, at full weight
 */
export function fallbackKeywords(question: string): WeightedKeyword[] {
  return question
    .toLowerCase()
    .split(/\s+/)
    .filter(word => word.length > 2)
    .map(term => ({ term, weight: FALLBACK_KEYWORD_WEIGHT }));
}

/**
 * Highest weight first; equal weights keep their original order
 */
export function sortByWeight(keywords: readonly WeightedKeyword[]): WeightedKeyword[] {
  return [...keywords].sort((a, b) => b.weight - a.weight);
}

export function buildKeywordPrompt(question: string): string {
  return `Extract keywords with importance weights from this question for searching a technical wiki database.

Question: ${question}

Instructions:
- Extract 5-15 keywords with their importance weights (1-10, where 10 is most important)
- Include exact terms from the question with highest weights
- Format as: keyword:weight (one per line)
- No explanations, just keyword:weight pairs
- Only generate necessary keywords
- Don't assume keywords, just generate based on the question.
- Ignore common words like "the", "is", "in", "what", "how", "why", "an", "a", "and", "or", "but", "if", "then", "else", "there", "here", "now"

Example format:
docker:10
container:9
deployment:2
devops:1

Keywords with weights:`;
}

/**
 * Turns a question into weighted search keywords with the help of a text
 * generator, falling back to the question's own words.
 */
export class KeywordExtractorService {
  constructor(private readonly generator: ITextGenerator) {}

  async extract(question: string): Promise<WeightedKeyword[]> {
    let keywords: WeightedKeyword[] = [];

    try {
      const response = await this.generator.generate(buildKeywordPrompt(question));
      keywords = parseWeightedKeywords(response);
    } catch (error) {
      logger.warn(`Keyword generation failed: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (keywords.length === 0) {
      logger.info('No usable weighted keywords, falling back to question terms');
      keywords = fallbackKeywords(question);
    }

    const sorted = sortByWeight(keywords);
    logger.debug(`Weighted keywords: ${sorted.map(k => `${k.term}:${k.weight}`).join(', ')}`);
    return sorted;
  }
}
