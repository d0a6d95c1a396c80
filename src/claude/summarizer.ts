import Anthropic from '@anthropic-ai/sdk';
import type { CondenseOutcome, Summarizer } from '../description/condense.js';
import { CondenseTimeoutError, CondenseUnavailableError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child({ component: 'summarizer' });

/**
 * The slice of the Anthropic client the summarizer calls.
 */
export interface MessagesClient {
  messages: {
    create(
      body: {
        model: string;
        max_tokens: number;
        temperature?: number;
        messages: { role: 'user' | 'assistant'; content: string }[];
      },
      options?: { timeout?: number; signal?: AbortSignal }
    ): PromiseLike<{ content: { type: string; text?: string }[] }>;
  };
}

export interface AnthropicSummarizerOptions {
  apiKey: string;
  model: string;
}

function buildPrompt(text: string, targetLength: number): string {
  return [
    'This is the latest message a coding assistant wrote to its user.',
    `Condense it to ONE plain sentence of at most ${targetLength} characters that states what the assistant just did or is waiting for.`,
    'Reply with the sentence only: no quotes, no preamble, no apologies.',
    '',
    'Message:',
    text,
  ].join('\n');
}

/**
 * Summarizer backed by the Anthropic Messages API. Single attempt, no retries.
 */
export class AnthropicSummarizer implements Summarizer {
  private client: MessagesClient;

  constructor(private options: AnthropicSummarizerOptions, client?: MessagesClient) {
    this.client = client ?? new Anthropic({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async condense(text: string, targetLength: number, timeoutMs: number): Promise<CondenseOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const message = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: Math.max(16, Math.ceil(targetLength / 2)),
          temperature: 0,
          messages: [{ role: 'user', content: buildPrompt(text, targetLength) }],
        },
        { timeout: timeoutMs, signal: controller.signal }
      );

      const condensed = message.content
        .map(block => (block.type === 'text' ? block.text ?? '' : ''))
        .join('')
        .trim()
        .replace(/^["']+|["']+$/g, '');

      if (!condensed) {
        return { status: 'error', error: new Error('Summarizer returned no text') };
      }

      log.debug({ inputLength: text.length, outputLength: condensed.length }, 'Condensed description');
      return { status: 'ok', text: condensed };
    } catch (err) {
      if (err instanceof Anthropic.APIConnectionTimeoutError || err instanceof Anthropic.APIUserAbortError) {
        return { status: 'timeout', error: new CondenseTimeoutError(timeoutMs) };
      }
      if (err instanceof Anthropic.AuthenticationError || err instanceof Anthropic.PermissionDeniedError) {
        return { status: 'unavailable', error: new CondenseUnavailableError(err.message) };
      }
      log.warn({ err }, 'Summarizer request failed');
      return { status: 'error', error: err instanceof Error ? err : new Error(String(err)) };
    } finally {
      clearTimeout(timer);
    }
  }
}
