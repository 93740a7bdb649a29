import Anthropic from '@anthropic-ai/sdk';
import { env } from '../config/env';
import { logger } from '../utils/logger';
import { Summarizer } from '../types/call';
import { ConfigurationError, ExternalServiceError, toError } from '../utils/errors';
import { SUMMARY_PROMPT } from '../utils/prompts';

const MAX_ATTEMPTS = 3;

function statusOf(error: unknown): number | undefined {
  return error instanceof Anthropic.APIError ? error.status : undefined;
}

/** One-shot call summary through the Anthropic Messages API. */
export class AnthropicSummarizer implements Summarizer {
  private client: Anthropic | null = null;

  constructor(
    private apiKey: string | undefined = env.ANTHROPIC_API_KEY,
    private model: string = env.SUMMARY_MODEL,
    private retryDelayMs = 1000
  ) {}

  private getClient(): Anthropic {
    if (!this.apiKey) {
      throw new ConfigurationError('Call summaries', 'ANTHROPIC_API_KEY');
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey });
    }
    return this.client;
  }

  async summarize(transcript: string): Promise<string> {
    const anthropic = this.getClient();
    let lastError: Error | null = null;

    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt++) {
      try {
        const response = await anthropic.messages.create({
          model: this.model,
          system: SUMMARY_PROMPT,
          messages: [{ role: 'user', content: transcript }],
          temperature: 0.2,
          max_tokens: 400,
        });

        const text = response.content
          .map((block) => (block.type === 'text' ? block.text : ''))
          .join('')
          .trim();

        logger.debug('Call summary generated', {
          attempt,
          tokens: { prompt: response.usage.input_tokens, completion: response.usage.output_tokens },
        });
        return text;
      } catch (error: unknown) {
        lastError = toError(error);
        const status = statusOf(error);

        if (status === 400 || status === 401 || status === 403) {
          throw new ExternalServiceError('Anthropic', 'summarize', lastError, false);
        }

        if (status === 429 && attempt < MAX_ATTEMPTS) {
          const delay = Math.pow(2, attempt) * this.retryDelayMs;
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await new Promise((resolve) => setTimeout(resolve, delay));
          continue;
        }

        logger.error('Anthropic error', { attempt, error: lastError.message });
      }
    }

    throw new ExternalServiceError('Anthropic', 'summarize', lastError ?? new Error('no response'));
  }
}
