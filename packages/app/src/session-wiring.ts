import { realpath } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type {
  AgentEvent,
  ConfirmFn,
  Logger,
  ModelProtocolAdapter,
  ToolpilotConfig,
} from '@toolpilot/core';
import { ConfigError, loadConfig } from '@toolpilot/core';
import {
  AgentSession,
  ModelClient,
  buildSystemPrompt,
  createModelAdapter,
  loadAgentsMd,
} from '@toolpilot/agent-runtime';
import {
  McpBridge,
  SandboxGate,
  ToolRegistry,
  registerBuiltinTools,
  registerProcessTools,
  type McpConnector,
} from '@toolpilot/tools';
import {
  DEFAULT_SUBAGENT_PROFILES,
  SubagentDelegator,
  mergeProfiles,
  registerDelegateTaskTool,
} from '@toolpilot/orchestrator';
import { createConsoleLogger } from './console-logger.js';

type Env = Readonly<Record<string, string | undefined>>;

export interface SessionWiringOptions {
  config: ToolpilotConfig;
  /** Base for relative paths in the config. Defaults to the process cwd. */
  configDir?: string;
  env?: Env;
  /** Asks the user to approve mutating calls. Without one they are denied. */
  confirm?: ConfirmFn;
  logger?: Logger;
  /** Used instead of the adapter built from `config.model`. */
  adapter?: ModelProtocolAdapter;
  mcpConnector?: McpConnector;
  /** Clock for the system prompt. */
  now?: Date;
  onSubagentEvent?: (profile: string, event: AgentEvent) => void;
}

export interface WiredSession {
  session: AgentSession;
  registry: ToolRegistry;
  gate: SandboxGate;
  delegator?: SubagentDelegator;
  workspaceRoot: string;
  systemPrompt: string;
  /** Plugin and MCP tools that could not be loaded. */
  loadErrors: string[];
}

/**
 * Wire one interactive session:
 * 1. Model adapter wrapped in the retrying client
 * 2. Tool registry: built-ins, process tools, MCP servers
 * 3. System prompt from the workspace's AGENTS.md chain
 * 4. Subagent delegator and delegate_task
 * 5. Sandbox gate and the session itself
 */
export async function wireSession(options: SessionWiringOptions): Promise<WiredSession> {
  const { config, env = process.env, confirm } = options;
  const logger = options.logger ?? createConsoleLogger(config.logLevel);
  const configDir = options.configDir ?? process.cwd();

  // 1. Model
  const workspaceRoot = await realpath(resolve(configDir, config.sandbox.workspaceRoot));
  const adapter = options.adapter ?? createModelAdapter(config.model, env);
  const model = new ModelClient(adapter, { maxRetries: config.model.maxRetries, logger });

  // 2. Tools
  const registry = new ToolRegistry();
  registerBuiltinTools(registry, {
    defaultTimeoutMs: config.tools.defaultTimeoutMs,
    disabled: config.tools.disabled,
  });
  const loadErrors: string[] = [];
  const plugins = registerProcessTools(registry, config.plugins.tools, { baseDir: configDir, logger });
  loadErrors.push(...plugins.errors);

  const mcp = new McpBridge(registry, { connector: options.mcpConnector, logger });
  const servers = await mcp.connectAll(config.mcp.servers);
  loadErrors.push(...servers.errors);
  for (const error of loadErrors) logger.warn(error);

  try {
    // 3. System prompt
    const agentsMd = await loadAgentsMd(workspaceRoot);
    const systemPrompt =
      config.agent.systemPrompt ??
      buildSystemPrompt({
        workspaceRoot,
        agentsMd,
        now: options.now,
        model: model.model,
        sandboxMode: config.sandbox.mode,
        approvalPolicy: config.sandbox.approvalPolicy,
      });

    // 4. Delegation
    let delegator: SubagentDelegator | undefined;
    if (config.subagents.enabled) {
      delegator = new SubagentDelegator({
        adapter: model,
        registry,
        baseSystemPrompt: systemPrompt,
        workspaceRoot,
        parentSandboxMode: config.sandbox.mode,
        approvalPolicy: config.sandbox.approvalPolicy,
        confirm,
        profiles: mergeProfiles(DEFAULT_SUBAGENT_PROFILES, config.subagents.profiles),
        toolConcurrency: config.agent.toolConcurrency,
        logger,
        onEvent: options.onSubagentEvent,
      });
      registerDelegateTaskTool(registry, delegator);
    }

    // 5. Gate and session
    const gate = new SandboxGate({
      registry,
      workspaceRoot,
      sandboxMode: config.sandbox.mode,
      approvalPolicy: config.sandbox.approvalPolicy,
      confirm,
      logger,
    });
    const session = new AgentSession({
      adapter: model,
      tools: gate,
      systemPrompt,
      maxSteps: config.agent.maxSteps,
      toolConcurrency: config.agent.toolConcurrency,
      logger,
      onClose: () => mcp.disconnectAll(),
    });

    logger.info(
      `Session ready: ${model.id}/${model.model}, ${registry.size} tool(s), ` +
        `sandbox ${config.sandbox.mode}, approval ${config.sandbox.approvalPolicy}`,
    );
    return { session, registry, gate, delegator, workspaceRoot, systemPrompt, loadErrors };
  } catch (err) {
    await mcp.disconnectAll();
    throw err;
  }
}

/**
 * Load a JSON5 config file and wire a session from it. Relative paths in
 * the file resolve against its directory.
 */
export async function createSession(
  configPath: string,
  options: Omit<SessionWiringOptions, 'config' | 'configDir'> = {},
): Promise<WiredSession> {
  const result = loadConfig(configPath, options.env);
  if (!result.valid || !result.config) {
    throw new ConfigError(result.errors);
  }
  return wireSession({ ...options, config: result.config, configDir: dirname(resolve(configPath)) });
}
