import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../utils/logger';
import { ITextGenerator } from '../types/query';

const generatorResponseSchema = z.object({
  output: z.string(),
});

export class GenerationError extends Error {
  originalError?: unknown;

  constructor(message: string, originalError?: unknown) {
    super(message);
    this.name = 'GenerationError';
    this.originalError = originalError;
    Object.setPrototypeOf(this, GenerationError.prototype);
  }
}

/**
 * Text generator backed by an HTTP endpoint that takes `{ prompt }` and
 * answers `{ output }`.
 */
export class HttpTextGenerator implements ITextGenerator {
  constructor(
    private readonly endpoint: string,
    private readonly timeout: number = 30000,
    private readonly http: AxiosInstance = axios
  ) {}

  async generate(prompt: string): Promise<string> {
    let data: unknown;
    try {
      const response = await this.http.post<unknown>(this.endpoint, { prompt }, { timeout: this.timeout });
      data = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Text generation request failed: ${message}`);
      throw new GenerationError(message, error);
    }

    const parsed = generatorResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new GenerationError('Malformed response from text generator: missing "output"');
    }
    return parsed.data.output;
  }
}
