export { runAgentTask } from "./core/agent.js";
export type { AgentDeps, AgentOutcome, AgentTaskResult, AgentLoopConfig } from "./core/agent.js";
export { Session } from "./core/session.js";
export {
  AutoApprover,
  InteractiveApprover,
  needsApproval,
  type Approver,
  type ApprovalDecision,
} from "./core/approval.js";
export { parseToolCall, stripToolBlocks } from "./core/tool-call-parser.js";
export { executeTool, type ToolExecutionContext } from "./tools/index.js";
export { AIClient } from "./ai/ai-client.js";
export {
  AIChatModel,
  boundTranscript,
  type ChatMessage,
  type ChatModel,
  type ChatResult,
} from "./ai/api-calls.js";
export { buildSystemPrompt } from "./ai/prompts.js";
export { resolveConfig, type AgentConfig } from "./config/config.js";
export { executeSlashCommand } from "./commands/slash-commands.js";
export { TOOL_DEFINITIONS, type ToolCall, type ToolName } from "./types/tool-call.js";
