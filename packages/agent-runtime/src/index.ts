// Model protocol adapters
export {
  OpenAIAdapter,
  OpenAICompatibleAdapter,
  encodeOpenAIMessages,
  encodeOpenAITools,
  decodeOpenAIReply,
  type ChatCompletionCreate,
  type ChatCompletionReply,
  type OpenAIAdapterOptions,
} from './adapters/openai.js';
export {
  AnthropicAdapter,
  encodeAnthropicMessages,
  encodeAnthropicTools,
  decodeAnthropicReply,
  RAW_ARGUMENTS_KEY,
  type AnthropicCreate,
  type AnthropicReply,
  type AnthropicAdapterOptions,
} from './adapters/anthropic.js';
export { toProviderError, kindForStatus, readRetryAfterMs } from './adapters/provider-errors.js';
export { createModelAdapter } from './adapters/factory.js';
export { ModelClient, isRetryableProviderError, type ModelClientOptions } from './model-client.js';

// Agent loop
export { AgentState, type AgentStateOptions } from './agent-state.js';
export {
  agentLoop,
  runAgentLoop,
  stepLimitNotice,
  DEFAULT_TOOL_CONCURRENCY,
  type AgentLoopOptions,
} from './agent-loop.js';
export { AgentSession, type AgentSessionOptions, type SendOptions } from './agent-session.js';
export { runOrdered } from './ordered-batch.js';

// System prompt
export {
  findAgentsMd,
  loadAgentsMd,
  AGENTS_MD_NAMES,
  DEFAULT_AGENTS_MD_BUDGET,
  type AgentsMdFile,
  type AgentsMdBudget,
} from './agents-md.js';
export { buildSystemPrompt, type SystemPromptOptions } from './system-prompt.js';
export { section, formatToolsSummary, formatAgentsMd } from './prompt-section-builder.js';
export { collectRuntimeInfo, formatRuntimeInfo, type RuntimeInfo } from './runtime-info.js';

// Errors
export { InvalidStateTransitionError, ToolResultMismatchError, SessionBusyError } from './errors.js';
