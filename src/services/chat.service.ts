import logger from '../utils/logger';
import { Page } from './crawler/interfaces/types';
import { ITextGenerator } from '../types/query';
import { KeywordExtractorService } from './keyword-extractor.service';
import { RelevanceScorerService } from './relevance-scorer.service';

export interface ChatOptions {
  /** Pages handed to the generator per question */
  topN: number;
  /** Name the assistant uses for the wiki */
  wikiName: string;
}

export const EMPTY_QUESTION_REPLY = 'Please ask me something!';
export const NO_CONTEXT_TEXT = 'No relevant wiki pages found.';

/**
 * Render selected pages as the context block of the answer prompt
 */
export function formatContextPages(pages: readonly Page[], wikiName: string): string {
  if (pages.length === 0) {
    return NO_CONTEXT_TEXT;
  }

  let context = `Relevant ${wikiName} Pages:\n\n`;
  pages.forEach((page, index) => {
    context += `=== Page ${index + 1}: ${page.title} ===\n`;
    if (page.categories.length > 0) {
      context += `Categories: ${page.categories.join(', ')}\n`;
    }
    context += `URL: ${page.url}\n`;
    context += `Content: ${page.content}\n\n`;
  });
  return context;
}

export function buildAnswerPrompt(question: string, context: string, wikiName: string): string {
  return `You are a helpful AI assistant for the ${wikiName}.

I have selected the most relevant pages from the ${wikiName} based on your question:

${context}

User Question: ${question}

Instructions:
- Use the wiki information above to answer the user's question
- Reference specific pages, tutorials, or resources when relevant
- If the question is not fully covered in the wiki, provide helpful general information
- Be friendly and informative
- Mention page titles when referencing specific information
- Keep answers comprehensive but well-organized

Answer:`;
}

/**
 * Answers questions from a loaded corpus: weighted keywords select the
 * context pages, the generator writes the answer.
 */
export class ChatService {
  private readonly keywordExtractor: KeywordExtractorService;
  private readonly scorer = new RelevanceScorerService();

  constructor(
    private readonly pages: readonly Page[],
    private readonly generator: ITextGenerator,
    private readonly options: ChatOptions
  ) {
    this.keywordExtractor = new KeywordExtractorService(generator);
  }

  get pageCount(): number {
    return this.pages.length;
  }

  get wikiName(): string {
    return this.options.wikiName;
  }

  async findRelevantPages(question: string): Promise<Page[]> {
    if (this.pages.length === 0) {
      return [];
    }
    const keywords = await this.keywordExtractor.extract(question);
    return this.scorer.topPages(this.pages, keywords, this.options.topN);
  }

  /**
   * Answer a question. Generator failures come back as an error string,
   * never as a rejection.
   */
  async ask(question: string): Promise<string> {
    const trimmed = question.trim();
    if (!trimmed) {
      return EMPTY_QUESTION_REPLY;
    }

    logger.info(`Processing question: ${trimmed}`);
    const pages = await this.findRelevantPages(trimmed);
    const context = formatContextPages(pages, this.options.wikiName);
    const prompt = buildAnswerPrompt(trimmed, context, this.options.wikiName);

    try {
      return await this.generator.generate(prompt);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`Answer generation failed: ${message}`);
      return `AI Error: ${message}`;
    }
  }
}
