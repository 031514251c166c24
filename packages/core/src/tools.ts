import type { PlanItem } from './agent.js';
import type { Logger } from './logger.js';
import type { ToolCall } from './messages.js';

/** JSON Schema type for tool input definitions. */
export type JSONSchema = Record<string, unknown>;

/** Permission tier for mutating tool operations. */
export type SandboxMode = 'read-only' | 'workspace-write' | 'danger-full-access';

export const SANDBOX_MODES: readonly SandboxMode[] = [
  'read-only',
  'workspace-write',
  'danger-full-access',
];

/** When a human must confirm a mutating tool call. */
export type ApprovalPolicy = 'on-request' | 'always' | 'never';

export const APPROVAL_POLICIES: readonly ApprovalPolicy[] = ['on-request', 'always', 'never'];

/** Risk level assigned to shell commands. */
export type RiskLevel = 'routine' | 'confirm' | 'blocked';

/** What the model sees of a tool. */
export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: JSONSchema;
}

/** Read/replace access to the session plan, handed to tool handlers. */
export interface PlanStore {
  get(): PlanItem[];
  replace(items: PlanItem[]): void;
}

/** Per-invocation context given to a handler by the sandbox gate. */
export interface ToolContext {
  readonly workspaceRoot: string;
  readonly sandboxMode: SandboxMode;
  /** Aborted on timeout or session cancellation. */
  readonly signal: AbortSignal;
  readonly plan: PlanStore;
  readonly logger: Logger;
  /**
   * Resolve a user-supplied path against the workspace root, following
   * symlinks. Rejects paths outside the root unless the sandbox is
   * `danger-full-access`.
   */
  resolvePath(rawPath: string): Promise<string>;
}

/**
 * A function that handles a tool invocation. Returning `{ error: string }`
 * reports a handler-level failure without throwing.
 */
export type ToolHandler = (args: Record<string, unknown>, ctx: ToolContext) => Promise<unknown>;

/** Registered tool: definition plus handler and safety metadata. */
export interface ToolSpec extends ToolDefinition {
  mutating: boolean;
  timeoutMs: number;
  /** Argument names holding filesystem paths, checked by the sandbox. */
  pathArguments?: readonly string[];
  /**
   * Returns a reason when this particular invocation needs fresh
   * confirmation even though the tool was already approved.
   */
  needsConfirmation?: (args: Readonly<Record<string, unknown>>) => string | undefined;
  handler: ToolHandler;
}

/** Origin of a tool registration. */
export type ToolSource = 'builtin' | 'plugin' | 'mcp' | 'orchestration';

export interface ToolRegistryEntry {
  spec: ToolSpec;
  source: ToolSource;
  mcpServer?: string;
}

export type ToolErrorKind =
  | 'unknown_tool'
  | 'schema_invalid'
  | 'sandbox_denied'
  | 'approval_denied'
  | 'timeout'
  | 'handler_failure'
  | 'cancelled';

/** Outcome of one sandbox gate invocation. */
export interface ToolResult {
  toolCallId: string;
  output: string;
  isError: boolean;
  errorKind?: ToolErrorKind;
  durationMs: number;
}

export interface ApprovalRequest {
  toolName: string;
  arguments: Readonly<Record<string, unknown>>;
  /** Pretty-printed, length-capped arguments for display. */
  preview: string;
  reason: string;
}

/** Asks the user to confirm a mutating call. Resolves true to proceed. */
export type ConfirmFn = (request: ApprovalRequest) => Promise<boolean>;

export interface ToolExecutionOptions {
  signal?: AbortSignal;
  plan?: PlanStore;
}

/** The surface the agent loop needs from the tool layer. */
export interface ToolExecutor {
  definitions(): ToolDefinition[];
  execute(call: ToolCall, options?: ToolExecutionOptions): Promise<ToolResult>;
}
