/**
 * Agent Event Renderer Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { renderAgentEvents } from '../agent-event-renderer.js';
import type { AgentEvent, AgentResult } from '../../../agent/types.js';
import type { CommandContext } from '../../types.js';

async function* eventsOf(events: AgentEvent[]): AsyncGenerator<AgentEvent> {
  for (const event of events) {
    yield event;
  }
}

const result: AgentResult = {
  answer: 'Use hybrid search [c1].',
  citations: [{ chunkId: 'c1', docId: 'd1', source: 'Unknown', filename: 'guide.md', chunkIndex: 0 }],
  toolsUsed: [],
  iterations: 0,
  chunksUsed: 1,
  mode: 'simple',
};

describe('renderAgentEvents', () => {
  let written: string[];
  let logOutput: string[];
  let errorOutput: string[];
  let ctx: CommandContext;

  beforeEach(() => {
    written = [];
    logOutput = [];
    errorOutput = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
      written.push(String(chunk));
      return true;
    });
    ctx = {
      options: { verbose: false, json: false },
      log: (message: string) => logOutput.push(message),
      debug: vi.fn(),
      warn: vi.fn(),
      error: (message: string) => errorOutput.push(message),
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('streams content and lists sources after done', async () => {
    const rendered = await renderAgentEvents(
      eventsOf([
        { type: 'agent_start', query: 'q', sessionId: 's1' },
        { type: 'intent_analysis', needsTools: false },
        { type: 'retrieval_start' },
        { type: 'retrieval_complete', chunksRetrieved: 1 },
        { type: 'content_delta', delta: 'Use hybrid ' },
        { type: 'content_delta', delta: 'search [c1].' },
        { type: 'citations', citations: result.citations },
        { type: 'done', result },
      ]),
      ctx
    );

    expect(rendered).toEqual({ result, error: null });
    expect(written).toContain('Use hybrid ');
    expect(written).toContain('search [c1].');
    expect(written[written.length - 1]).toBe('\n');
    expect(logOutput).toContain('[1] guide.md (c1)');
    expect(errorOutput).toEqual([]);
  });

  it('shows tool activity', async () => {
    await renderAgentEvents(
      eventsOf([
        { type: 'tool_call', iteration: 1, toolName: 'retrieve_knowledge', input: { query: 'fusion' } },
        { type: 'tool_result', iteration: 1, toolName: 'retrieve_knowledge', result: { sourceCount: 2 } },
        { type: 'tool_call', iteration: 2, toolName: 'calculator', input: {} },
        { type: 'tool_error', iteration: 2, toolName: 'calculator', error: 'bad input', kind: 'execution' },
      ]),
      ctx
    );

    const output = written.join('');
    expect(output).toContain('retrieve_knowledge: "fusion"...');
    expect(output).toContain('retrieve_knowledge: Found 2 sources');
    expect(output).toContain('calculator failed: bad input');
  });

  it('reports an error event and returns no result', async () => {
    const rendered = await renderAgentEvents(
      eventsOf([
        { type: 'content_delta', delta: 'partial' },
        { type: 'error', message: 'mock generate failed: overloaded', code: 8 },
      ]),
      ctx
    );

    expect(rendered).toEqual({
      result: null,
      error: { message: 'mock generate failed: overloaded', code: 8 },
    });
    expect(written).toEqual(['partial', '\n']);
    expect(errorOutput).toEqual(['mock generate failed: overloaded']);
  });
});
