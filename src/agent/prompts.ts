/**
 * Prompt builders for the agent loop
 */

import type { ContextMessage } from '../conversation/index.js';
import type { ToolSchema } from '../providers/types.js';
import type { ScoredChunk } from '../search/types.js';

/** Messages of history included in a RAG prompt */
const HISTORY_MESSAGES = 5;

export const SYSTEM_PROMPT = `You are a helpful assistant with access to a knowledge base.
Your task is to answer questions based on the provided context.

Guidelines:
- Always cite your sources using the chunk IDs provided
- If the context doesn't contain enough information, say so
- Be concise but thorough
- If you're uncertain, acknowledge it
- Format citations as [chunk_id]`;

export const AGENT_SYSTEM_PROMPT =
  'You are a helpful agent. Use tools when needed to answer queries accurately. ' +
  'Cite knowledge base passages as [chunk_id].';

/**
 * YES/NO question deciding whether the query needs tools.
 */
export function buildIntentPrompt(query: string): string {
  return `Analyze this query and determine if it requires:
- Real-time web browsing
- External data fetching
- Interactive actions

Query: ${query}

Answer with just YES or NO.`;
}

/**
 * True when the classifier answered yes (as a word, any case).
 */
export function parseIntentAnswer(response: string): boolean {
  return /\byes\b/i.test(response);
}

function capitalize(role: string): string {
  return role.charAt(0).toUpperCase() + role.slice(1);
}

function historySection(history: readonly ContextMessage[]): string[] {
  return [
    '## Conversation History',
    ...history.slice(-HISTORY_MESSAGES).map((message) => `${capitalize(message.role)}: ${message.content}`),
  ];
}

/**
 * Grounded answer prompt: recent history, retrieved context, question.
 */
export function buildRagPrompt(
  query: string,
  chunks: readonly ScoredChunk[],
  history: readonly ContextMessage[] = []
): string {
  const parts: string[] = [];

  if (history.length > 0) {
    parts.push(...historySection(history), '');
  }

  parts.push('## Context');
  for (const { chunk } of chunks) {
    parts.push(`[${chunk.chunkId}]\n${chunk.content}`, '');
  }

  parts.push('## Question', query, '', '## Answer', 'Based on the context above, here is my answer:');
  return parts.join('\n');
}

/**
 * Prompt for one agentic iteration: tools, recent history, context so far.
 */
export function buildAgentPrompt(
  query: string,
  tools: readonly ToolSchema[],
  context: string,
  history: readonly ContextMessage[] = []
): string {
  const parts = [
    'You are an AI agent with access to tools. Analyze the query and determine if you need to use any tools.',
    '',
    '## Available Tools',
    ...tools.map((tool) => `- ${tool.name}: ${tool.description}`),
  ];

  if (history.length > 0) {
    parts.push('', ...historySection(history));
  }

  if (context) {
    parts.push('', '## Context', context);
  }

  parts.push(
    '',
    '## Query',
    query,
    '',
    '## Instructions',
    '1. Analyze if the query can be answered with available knowledge',
    '2. If tools are needed, decide which tool(s) to use',
    '3. Plan your approach step by step',
    '4. Execute the plan and provide a comprehensive answer'
  );
  return parts.join('\n');
}
