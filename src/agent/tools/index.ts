export {
  ToolRegistry,
  syncTool,
  asyncTool,
  type Tool,
  type ToolContext,
  type ToolDefinition,
  type ToolHandler,
  type SyncToolDefinition,
  type AsyncToolDefinition,
} from './registry.js';
export {
  createRetrieveKnowledgeTool,
  RETRIEVE_KNOWLEDGE_TOOL,
  type RetrieveKnowledgeOutput,
} from './retrieve-knowledge-tool.js';
