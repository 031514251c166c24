import type { SubagentProfile } from './agent.js';
import type { ProviderKind } from './llm.js';
import type { LogLevel } from './logger.js';
import type { ApprovalPolicy, JSONSchema, SandboxMode } from './tools.js';

/** Session configuration consumed by the runtime. */
export interface ToolpilotConfig {
  model: ModelConfig;
  agent: AgentConfig;
  sandbox: SandboxConfig;
  tools: ToolsConfig;
  subagents: SubagentsConfig;
  plugins: PluginsConfig;
  mcp: McpConfig;
  logLevel: LogLevel;
}

export interface ModelConfig {
  provider: ProviderKind;
  name: string;
  /** Falls back to the provider's `*_BASE_URL` environment variable. */
  baseUrl?: string;
  /** Environment variable holding the API key. */
  apiKeyEnv?: string;
  temperature?: number;
  maxTokens: number;
  timeoutMs: number;
  /** Retries for transient (network, rate limit) failures. */
  maxRetries: number;
  /** Enables extended thinking where the provider supports it. */
  thinkingBudgetTokens?: number;
}

export interface AgentConfig {
  maxSteps: number;
  toolConcurrency: number;
  /** Replaces the generated system prompt when set. */
  systemPrompt?: string;
}

export interface SandboxConfig {
  mode: SandboxMode;
  approvalPolicy: ApprovalPolicy;
  workspaceRoot: string;
}

export interface ToolsConfig {
  defaultTimeoutMs: number;
  /** Built-in tool names left out of the registry. */
  disabled: string[];
}

export interface SubagentsConfig {
  enabled: boolean;
  /** Profiles here replace defaults of the same name. */
  profiles: SubagentProfile[];
}

export interface PluginsConfig {
  tools: ProcessToolConfig[];
}

/** A tool served by an external process speaking JSON over stdio. */
export interface ProcessToolConfig {
  plugin: string;
  name: string;
  description?: string;
  parameters?: JSONSchema;
  mutating?: boolean;
  timeoutSec?: number;
  argv?: string[];
  command?: string;
  cwd?: string;
}

export interface McpConfig {
  servers: McpServerConfig[];
}

export interface McpServerConfig {
  name: string;
  command: string;
  args?: string[];
  env?: Record<string, string>;
  timeoutSec?: number;
}
