export { ToolRegistry } from './registry.js';
export {
  ToolConflictError,
  ToolNotFoundError,
  PathEscapeError,
  McpConnectionError,
} from './errors.js';

export {
  SandboxGate,
  DEFAULT_MAX_OUTPUT_CHARS,
  pathArgumentNames,
  type SandboxGateOptions,
} from './sandbox-gate.js';
export { MemoryPlanStore } from './plan-store.js';
export { resolveWorkspacePath, realpathLenient, isWithin } from './path-guard.js';
export {
  validateToolArgs,
  formatValidationErrors,
  type ValidationError,
  type ValidationResult,
} from './schema-validator.js';
export { sanitizeToolName } from './naming.js';

export {
  classifyCommandRisk,
  type RiskAssessment,
  execCommandToolDefinition,
  execCommandHandler,
  execNeedsConfirmation,
  MAX_EXEC_TIMEOUT_SEC,
  listFilesToolDefinition,
  readFileToolDefinition,
  grepFilesToolDefinition,
  writeFileToolDefinition,
  replaceInFileToolDefinition,
  listFilesHandler,
  readFileHandler,
  grepFilesHandler,
  writeFileHandler,
  replaceInFileHandler,
  updatePlanToolDefinition,
  updatePlanHandler,
  globToRegExp,
  matchesGlob,
  registerBuiltinTools,
  createBuiltinToolSpecs,
  type RegisterBuiltinOptions,
} from './builtin/index.js';

// External process tools
export {
  createProcessToolSpec,
  registerProcessTools,
  interpretProcessOutput,
  type ProcessToolLoadResult,
} from './process-tool.js';

// MCP bridge
export {
  StdioMcpConnection,
  connectStdio,
  type McpConnection,
  type McpConnector,
  type McpToolInfo,
  type McpCallResult,
  type McpCallOptions,
  McpBridge,
  renderMcpContent,
  type McpLoadResult,
} from './mcp/index.js';
