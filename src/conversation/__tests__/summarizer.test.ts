/**
 * Summarizer Tests
 */

import { describe, it, expect, vi } from 'vitest';

import { ExtractiveSummarizer, ModelSummarizer } from '../summarizer.js';
import type { TextGenerator } from '../../search/query-expander.js';
import type { Message, MessageRole } from '../types.js';

function message(role: MessageRole, content: string): Message {
  return { role, content, timestamp: '2026-01-01T00:00:00.000Z', metadata: {} };
}

describe('ExtractiveSummarizer', () => {
  const summarizer = new ExtractiveSummarizer();

  it('writes one role line per message', async () => {
    const summary = await summarizer.summarize(
      [message('user', 'How do I index?'), message('assistant', 'Run the index command.')],
      null
    );

    expect(summary).toBe('user: How do I index?\nassistant: Run the index command.');
  });

  it('appends to the previous summary', async () => {
    expect(await summarizer.summarize([message('user', 'b')], 'earlier')).toBe('earlier\nuser: b');
  });

  it('collapses whitespace and clips long messages', async () => {
    const summary = await summarizer.summarize([message('user', `${'x'.repeat(250)}\n\n  tail`)], null);

    expect(summary).toBe(`user: ${'x'.repeat(200)}...`);
  });

  it('keeps the newest text when over the cap', async () => {
    const summary = await new ExtractiveSummarizer(10).summarize([message('user', 'abcdefghij')], null);

    expect(summary).toBe('...abcdefghij');
  });
});

describe('ModelSummarizer', () => {
  it('prompts with the transcript and returns the trimmed response', async () => {
    const generate = vi.fn<TextGenerator['generate']>(async () => '  The user asked about indexing.\n');
    const summarizer = new ModelSummarizer({ generate }, 300);

    const summary = await summarizer.summarize([message('user', 'How do I index?')], null);

    expect(summary).toBe('The user asked about indexing.');
    expect(generate).toHaveBeenCalledWith(
      'Summarize the following conversation:\n\nuser: How do I index?\n\nSummary:',
      { maxTokens: 300, signal: undefined }
    );
  });

  it('includes the earlier summary in the prompt', async () => {
    const generate = vi.fn<TextGenerator['generate']>(async () => 'merged');
    const summarizer = new ModelSummarizer({ generate });

    await summarizer.summarize([message('assistant', 'ok')], 'first part');

    expect(generate.mock.calls[0]?.[0]).toBe(
      'Summarize the following conversation:\n\nEarlier summary: first part\n\nassistant: ok\n\nSummary:'
    );
  });

  it('rejects an empty response', async () => {
    const summarizer = new ModelSummarizer({ generate: async () => '   ' });

    await expect(summarizer.summarize([message('user', 'hi')], null)).rejects.toThrow(
      'model returned an empty summary'
    );
  });
});
