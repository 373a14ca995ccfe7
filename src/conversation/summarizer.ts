/**
 * Conversation Summarizers
 *
 * ExtractiveSummarizer needs no model and never fails; it is also the
 * fallback whenever ModelSummarizer errors.
 */

import type { TextGenerator } from '../search/query-expander.js';
import type { Message, Summarizer } from './types.js';

/** Default cap on an extractive summary */
const DEFAULT_MAX_SUMMARY_CHARS = 2000;

/** Per-message cap inside an extractive summary */
const MAX_LINE_CHARS = 200;

function transcript(messages: readonly Message[]): string {
  return messages.map((message) => `${message.role}: ${message.content}`).join('\n');
}

/**
 * Deterministic summary: the previous summary followed by one
 * "role: content" line per message (each clipped to 200 characters).
 * When the result exceeds `maxChars`, the oldest text is dropped.
 */
export class ExtractiveSummarizer implements Summarizer {
  readonly name = 'extractive';
  private readonly maxChars: number;

  constructor(maxChars = DEFAULT_MAX_SUMMARY_CHARS) {
    this.maxChars = maxChars;
  }

  async summarize(messages: readonly Message[], previousSummary: string | null): Promise<string> {
    const lines = messages.map((message) => {
      const content = message.content.replace(/\s+/g, ' ').trim();
      const clipped = content.length > MAX_LINE_CHARS ? `${content.slice(0, MAX_LINE_CHARS)}...` : content;
      return `${message.role}: ${clipped}`;
    });
    const text = [previousSummary, ...lines].filter((part): part is string => Boolean(part)).join('\n');

    return text.length > this.maxChars ? `...${text.slice(text.length - this.maxChars)}` : text;
  }
}

/**
 * Summary written by a generation provider.
 */
export class ModelSummarizer implements Summarizer {
  readonly name = 'model';

  constructor(
    private readonly generator: TextGenerator,
    private readonly maxTokens = 500
  ) {}

  async summarize(
    messages: readonly Message[],
    previousSummary: string | null,
    options: { signal?: AbortSignal } = {}
  ): Promise<string> {
    const earlier = previousSummary ? `Earlier summary: ${previousSummary}\n\n` : '';
    const prompt = `Summarize the following conversation:\n\n${earlier}${transcript(messages)}\n\nSummary:`;

    const response = await this.generator.generate(prompt, {
      maxTokens: this.maxTokens,
      signal: options.signal,
    });
    const summary = response.trim();
    if (summary.length === 0) {
      throw new Error('model returned an empty summary');
    }
    return summary;
  }
}
