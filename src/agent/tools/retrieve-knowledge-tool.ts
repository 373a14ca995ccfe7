/**
 * Retrieve Knowledge Tool
 *
 * Exposes the retrieval pipeline to the agent as a tool, so the model can
 * run follow-up searches with its own phrasing during the agentic loop.
 */

import { z } from 'zod';

import type { RetrievalOrchestrator } from '../../search/orchestrator.js';
import { asyncTool, type Tool } from './registry.js';

export const RETRIEVE_KNOWLEDGE_TOOL = 'retrieve_knowledge';

/**
 * Output of the retrieve_knowledge tool, serialized into the agent's
 * accumulated context.
 */
export interface RetrieveKnowledgeOutput {
  /** `[chunkId]\ncontent` blocks for the model */
  context: string;
  sourceCount: number;
  sources: Array<{ chunkId: string; docId: string; score: number }>;
  searchTimeMs: number;
}

const retrieveKnowledgeInputSchema = z.object({
  query: z.string().min(1),
  maxResults: z.number().int().min(1).max(20).optional(),
});

/**
 * Create the retrieve_knowledge tool over `retriever`.
 */
export function createRetrieveKnowledgeTool(
  retriever: Pick<RetrievalOrchestrator, 'retrieve'>
): Tool<RetrieveKnowledgeOutput> {
  return asyncTool({
    name: RETRIEVE_KNOWLEDGE_TOOL,
    description:
      'Search the indexed knowledge base for passages relevant to a query.\n\n' +
      'Use this tool when the context you already have does not answer the question, ' +
      'or to look up a specific term, document or follow-up topic.',
    parameters: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Search query. Be specific and include the key terms.',
        },
        maxResults: {
          type: 'integer',
          minimum: 1,
          maximum: 20,
          description: 'Number of passages to return (default: 5)',
        },
      },
      required: ['query'],
    },
    input: retrieveKnowledgeInputSchema,
    handler: async (input, context) => {
      const result = await retriever.retrieve(input.query, {
        topK: input.maxResults ?? 5,
        signal: context.signal,
      });

      return {
        context: result.chunks.map(({ chunk }) => `[${chunk.chunkId}]\n${chunk.content}`).join('\n\n'),
        sourceCount: result.chunks.length,
        sources: result.chunks.map(({ chunk, score }) => ({
          chunkId: chunk.chunkId,
          docId: chunk.docId,
          score,
        })),
        searchTimeMs: Math.round(result.latencySeconds * 1000),
      };
    },
  });
}
