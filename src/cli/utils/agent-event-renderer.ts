/**
 * Agent Event Renderer
 *
 * Consumes an AgentLoop.stream() event sequence and renders it to
 * process.stdout with chalk styling:
 *
 * - retrieval / tool activity: one dimmed status line each, rewritten in
 *   place once the step finishes
 * - content_delta: streamed as-is (this IS the answer)
 * - done: trailing newline plus the numbered source list
 * - error: reported through ctx.error()
 */

import chalk from 'chalk';

import { formatCitations, type Citation } from '../../agent/citations.js';
import type { AgentEvent, AgentResult } from '../../agent/types.js';
import type { CommandContext } from '../types.js';

/** \x1b[2K clears the current line, \r returns to column 0 */
const CLEAR_LINE = '\x1b[2K\r';

/**
 * Result from rendering an event stream.
 */
export interface RenderResult {
  /** The finished run, or null when the stream ended with an error or was cancelled */
  result: AgentResult | null;
  /** Set when the stream ended with an error event */
  error: { message: string; code?: number } | null;
}

function describeToolResult(result: unknown): string {
  if (typeof result === 'object' && result !== null && 'sourceCount' in result) {
    const count = result.sourceCount;
    if (typeof count === 'number') {
      return `Found ${count} source${count === 1 ? '' : 's'}`;
    }
  }
  return 'Done';
}

function write(text: string): void {
  process.stdout.write(text);
}

/**
 * Render AgentEvents until the stream ends.
 */
export async function renderAgentEvents(
  events: AsyncIterable<AgentEvent>,
  ctx: CommandContext
): Promise<RenderResult> {
  let citations: Citation[] = [];
  let result: AgentResult | null = null;
  let error: RenderResult['error'] = null;
  let midLine = false;

  for await (const event of events) {
    switch (event.type) {
      case 'agent_start':
        ctx.debug(`Session: ${event.sessionId}`);
        break;

      case 'intent_analysis':
        ctx.debug(`Intent: ${event.needsTools ? 'tool use' : 'direct answer'}`);
        break;

      case 'retrieval_start':
        write(chalk.dim('Retrieving context...'));
        midLine = true;
        break;

      case 'retrieval_complete': {
        const count = event.chunksRetrieved;
        write(CLEAR_LINE + chalk.dim(`Retrieved ${count} chunk${count === 1 ? '' : 's'}`) + '\n\n');
        midLine = false;
        break;
      }

      case 'iteration_start':
        ctx.debug(`Iteration ${event.iteration}`);
        break;

      case 'tool_call': {
        const query = typeof event.input.query === 'string' ? `: "${event.input.query.slice(0, 60)}"` : '';
        write(chalk.cyan(`${event.toolName}${query}...`));
        midLine = true;
        break;
      }

      case 'tool_result':
        write(CLEAR_LINE + chalk.dim(`${event.toolName}: ${describeToolResult(event.result)}`) + '\n');
        midLine = false;
        break;

      case 'tool_error':
        write(CLEAR_LINE + chalk.yellow(`${event.toolName} failed: ${event.error}`) + '\n');
        midLine = false;
        break;

      case 'content_delta':
        write(event.delta);
        midLine = !event.delta.endsWith('\n');
        break;

      case 'citations':
        citations = event.citations;
        break;

      case 'done':
        write('\n');
        midLine = false;
        result = event.result;
        if (citations.length > 0) {
          ctx.log('');
          ctx.log(chalk.bold('Sources:'));
          ctx.log(formatCitations(citations));
        }
        break;

      case 'error':
        if (midLine) {
          write('\n');
          midLine = false;
        }
        error = { message: event.message, code: event.code };
        ctx.error(event.message);
        break;
    }
  }

  return { result, error };
}
