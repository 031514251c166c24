// Messages
export type { MessageRole, Message, ToolCall, ReasoningBlock } from './messages.js';
export { decodeToolArguments, encodeToolArguments } from './messages.js';

// Agent loop types
export { PLAN_STATUSES } from './agent.js';
export type {
  PlanStatus,
  PlanItem,
  LoopPhase,
  TerminationReason,
  AgentOutcome,
  AgentEvent,
  SubagentProfile,
} from './agent.js';

// Tool definitions
export { SANDBOX_MODES, APPROVAL_POLICIES } from './tools.js';
export type {
  JSONSchema,
  SandboxMode,
  ApprovalPolicy,
  RiskLevel,
  ToolDefinition,
  PlanStore,
  ToolContext,
  ToolHandler,
  ToolSpec,
  ToolSource,
  ToolRegistryEntry,
  ToolErrorKind,
  ToolResult,
  ApprovalRequest,
  ConfirmFn,
  ToolExecutionOptions,
  ToolExecutor,
} from './tools.js';

// Model provider abstraction
export { ProviderError, PROVIDER_KINDS } from './llm.js';
export type {
  ProviderKind,
  ProviderErrorKind,
  ModelRequestOptions,
  ModelProtocolAdapter,
} from './llm.js';

// Logging
export { noopLogger, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

// Configuration
export type {
  ToolpilotConfig,
  ModelConfig,
  AgentConfig,
  SandboxConfig,
  ToolsConfig,
  SubagentsConfig,
  PluginsConfig,
  ProcessToolConfig,
  McpConfig,
  McpServerConfig,
} from './config.js';

// Configuration validator
export {
  validateConfig,
  validateConfigObject,
  loadConfig,
  ConfigError,
  DEFAULT_SUBAGENT_MAX_STEPS,
} from './config-validator.js';
export type {
  ConfigValidationError,
  ConfigValidationResult,
} from './config-validator.js';
export { applyEnvOverrides } from './config-env-overlay.js';

// Utilities
export { generateId, isRecord, errorMessage, truncate } from './utils.js';
