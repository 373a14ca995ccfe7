/**
 * Ask Command
 *
 * Answers a question with the agent loop: retrieval-augmented generation,
 * with tool calls when the model decides it needs them. Turns are kept
 * per session, so follow-up questions see the earlier conversation.
 *
 *   ragent ask "How does authentication work?"
 *   ragent ask "And the refresh flow?" --session auth-review
 *   ragent ask "Explain the login flow" --stream
 *   ragent ask "What patterns are used here?" --json
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';

import type { CommandContext } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { createAppContext, loadSavedIndex, shutdownAppContext } from '../../app/context.js';
import { formatCitations, type Citation } from '../../agent/citations.js';
import type { AgentResult } from '../../agent/types.js';
import { isAbortError } from '../../providers/errors.js';
import { CANCELLED_EXIT_CODE, CLIError } from '../../errors/index.js';
import { renderAgentEvents } from '../utils/agent-event-renderer.js';

// ============================================================================
// Types
// ============================================================================

interface AskCommandOptions {
  /** Conversation to continue (default: "default") */
  session: string;
  /** Print progress and the answer as they are produced */
  stream?: boolean;
}

/**
 * JSON output format for the ask command.
 */
interface AskOutputJSON {
  question: string;
  sessionId: string;
  answer: string;
  mode: AgentResult['mode'];
  citations: Citation[];
  toolsUsed: Array<{ toolName: string; iteration: number; status: 'success' | 'failure' }>;
  metadata: {
    iterations: number;
    chunksUsed: number;
    totalMs: number;
    model: string;
    provider: string;
  };
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_SESSION = 'default';

// ============================================================================
// Helper Functions
// ============================================================================

function toOutputJSON(
  question: string,
  sessionId: string,
  result: AgentResult,
  totalMs: number,
  generator: { name: string; model: string }
): AskOutputJSON {
  return {
    question,
    sessionId,
    answer: result.answer,
    mode: result.mode,
    citations: result.citations,
    toolsUsed: result.toolsUsed.map((invocation) => ({
      toolName: invocation.toolName,
      iteration: invocation.iteration,
      status: invocation.outcome.status,
    })),
    metadata: {
      iterations: result.iterations,
      chunksUsed: result.chunksUsed,
      totalMs: Math.round(totalMs),
      model: generator.model,
      provider: generator.name,
    },
  };
}

function displayAnswer(ctx: CommandContext, result: AgentResult): void {
  ctx.log(result.answer);
  if (result.citations.length > 0) {
    ctx.log('');
    ctx.log(chalk.bold('Sources:'));
    ctx.log(formatCitations(result.citations));
  }
  if (result.toolsUsed.length > 0) {
    ctx.log('');
    ctx.log(chalk.dim(`Tools used: ${result.toolsUsed.map((invocation) => invocation.toolName).join(', ')}`));
  }
}

// ============================================================================
// Command Factory
// ============================================================================

export function createAskCommand(getContext: () => CommandContext): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer')
    .description('Ask a question about the indexed corpus')
    .option('-s, --session <id>', 'Conversation session to continue', DEFAULT_SESSION)
    .option('--stream', 'Stream progress and the answer as they are produced')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const trimmedQuestion = question.trim();
      if (!trimmedQuestion) {
        throw new CLIError('Question cannot be empty', 'Example: ragent ask "How does indexing work?"');
      }
      const sessionId = cmdOptions.session;
      ctx.debug(`Session: ${sessionId}`);

      const config = loadConfig();
      const app = createAppContext(config, { logger: ctx });
      const { agent, generator } = app;
      if (!agent || !generator) {
        await shutdownAppContext(app);
        throw new CLIError('No generation provider is configured', 'Run: ragent config set default_provider anthropic');
      }

      const controller = new AbortController();
      const onInterrupt = (): void => controller.abort();
      process.once('SIGINT', onInterrupt);
      const start = performance.now();

      try {
        const manifest = await loadSavedIndex(app);
        if (!manifest) {
          ctx.warn('No index found, answering without retrieved context. Run: ragent index <corpus.jsonl>');
        }
        ctx.debug(`Provider: ${generator.name} (${generator.model})`);

        // ─────────────────────────────────────────────────────────────────
        // Streaming: render events as they arrive
        // ─────────────────────────────────────────────────────────────────
        if (cmdOptions.stream && !ctx.options.json) {
          const rendered = await renderAgentEvents(
            agent.stream(trimmedQuestion, sessionId, { signal: controller.signal }),
            ctx
          );
          if (rendered.error) {
            process.exitCode = rendered.error.code ?? 1;
          } else if (!rendered.result) {
            ctx.log(chalk.yellow('Cancelled'));
            process.exitCode = CANCELLED_EXIT_CODE;
          }
          return;
        }

        // ─────────────────────────────────────────────────────────────────
        // Buffered: one answer at the end
        // ─────────────────────────────────────────────────────────────────
        const spinner =
          !ctx.options.json && process.stdout.isTTY ? ora({ text: 'Thinking...', stream: process.stdout }).start() : null;

        let result: AgentResult;
        try {
          result = await agent.execute(trimmedQuestion, sessionId, { signal: controller.signal });
        } catch (error) {
          spinner?.stop();
          if (controller.signal.aborted || isAbortError(error)) {
            ctx.log(chalk.yellow('Cancelled'));
            process.exitCode = CANCELLED_EXIT_CODE;
            return;
          }
          throw error;
        }
        spinner?.stop();

        if (ctx.options.json) {
          const output = toOutputJSON(trimmedQuestion, sessionId, result, performance.now() - start, generator);
          console.log(JSON.stringify(output, null, 2));
        } else {
          displayAnswer(ctx, result);
        }
      } finally {
        process.removeListener('SIGINT', onInterrupt);
        await shutdownAppContext(app);
      }
    });
}
