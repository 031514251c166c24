import type {
  ApprovalPolicy,
  ConfirmFn,
  Logger,
  PlanStore,
  SandboxMode,
  ToolCall,
  ToolContext,
  ToolDefinition,
  ToolErrorKind,
  ToolExecutionOptions,
  ToolExecutor,
  ToolResult,
  ToolSpec,
} from '@toolpilot/core';
import { errorMessage, isRecord, noopLogger, truncate } from '@toolpilot/core';
import { PathEscapeError } from './errors.js';
import { resolveWorkspacePath } from './path-guard.js';
import { MemoryPlanStore } from './plan-store.js';
import type { ToolRegistry } from './registry.js';
import { formatValidationErrors, validateToolArgs } from './schema-validator.js';

export const DEFAULT_MAX_OUTPUT_CHARS = 50_000;
const PREVIEW_CHARS = 600;

export interface SandboxGateOptions {
  registry: ToolRegistry;
  workspaceRoot: string;
  sandboxMode: SandboxMode;
  approvalPolicy: ApprovalPolicy;
  /** Without one, every call that needs approval is denied. */
  confirm?: ConfirmFn;
  /** Used when a call does not bring its own plan store. */
  plan?: PlanStore;
  maxOutputChars?: number;
  logger?: Logger;
}

type Verdict = { ok: true } | { ok: false; kind: ToolErrorKind; message: string };

type Settled =
  | { kind: 'value'; value: unknown }
  | { kind: 'thrown'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'cancelled' };

const PASS: Verdict = { ok: true };

const PATH_PROPERTY = /^(path|file|filename|filepath|dir|directory|cwd|.+_(path|file|dir|directory))$/i;

/**
 * Arguments the sandbox resolves against the workspace. Tools that declare
 * none (plugin and MCP tools) are read from the input schema: string
 * properties with a path-like name or `format: "path"`.
 */
export function pathArgumentNames(spec: ToolSpec): readonly string[] {
  if (spec.pathArguments) return spec.pathArguments;
  const properties = spec.inputSchema.properties;
  if (!isRecord(properties)) return [];
  return Object.entries(properties)
    .filter(([name, schema]) => {
      if (!isRecord(schema) || schema.type !== 'string') return false;
      return schema.format === 'path' || PATH_PROPERTY.test(name);
    })
    .map(([name]) => name);
}

/**
 * Single entry point for running a tool call. Stages run in a fixed order
 * (lookup, schema, sandbox, approval, execution) and every failure comes
 * back as an error ToolResult; nothing is thrown to the caller.
 */
export class SandboxGate implements ToolExecutor {
  private readonly registry: ToolRegistry;
  private readonly logger: Logger;
  private readonly plan: PlanStore;
  private readonly maxOutputChars: number;
  /** Tools confirmed once this session under `on-request`. */
  private readonly approvedTools = new Set<string>();
  /** Confirmation prompts are shown one at a time. */
  private approvalQueue: Promise<void> = Promise.resolve();

  constructor(private readonly options: SandboxGateOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? noopLogger;
    this.plan = options.plan ?? new MemoryPlanStore();
    this.maxOutputChars = options.maxOutputChars ?? DEFAULT_MAX_OUTPUT_CHARS;
  }

  get sandboxMode(): SandboxMode {
    return this.options.sandboxMode;
  }

  get approvalPolicy(): ApprovalPolicy {
    return this.options.approvalPolicy;
  }

  get workspaceRoot(): string {
    return this.options.workspaceRoot;
  }

  definitions(): ToolDefinition[] {
    return this.registry.getDefinitions();
  }

  async execute(call: ToolCall, options: ToolExecutionOptions = {}): Promise<ToolResult> {
    const startedAt = Date.now();
    const finish = (output: string, errorKind?: ToolErrorKind): ToolResult => {
      const result: ToolResult = {
        toolCallId: call.id,
        output: truncate(output, this.maxOutputChars),
        isError: errorKind !== undefined,
        durationMs: Date.now() - startedAt,
      };
      if (errorKind !== undefined) {
        result.errorKind = errorKind;
        this.logger.warn(`Tool ${call.name} failed (${errorKind})`);
      } else {
        this.logger.debug(`Tool ${call.name} completed in ${result.durationMs}ms`);
      }
      return result;
    };

    if (options.signal?.aborted) {
      return finish(`Tool ${call.name} cancelled before it started`, 'cancelled');
    }

    const entry = this.registry.get(call.name);
    if (!entry) {
      const available = this.registry.names().join(', ') || '(none)';
      return finish(`Unknown tool: ${call.name}. Available tools: ${available}`, 'unknown_tool');
    }
    const { spec } = entry;
    this.logger.debug(`Tool ${spec.name} dispatched (call ${call.id})`);

    for (const stage of [
      () => this.checkSchema(spec, call),
      () => this.checkSandbox(spec, call.arguments),
      () => this.checkApproval(spec, call.arguments),
    ]) {
      const verdict = await stage();
      if (!verdict.ok) return finish(verdict.message, verdict.kind);
    }

    if (options.signal?.aborted) {
      return finish(`Tool ${call.name} cancelled before it started`, 'cancelled');
    }

    const settled = await this.run(spec, call.arguments, options);
    switch (settled.kind) {
      case 'value':
        return this.render(settled.value, finish);
      case 'thrown':
        return finish(`Tool execution failed: ${errorMessage(settled.error)}`, 'handler_failure');
      case 'timeout':
        return finish(`Tool ${spec.name} timed out after ${spec.timeoutMs}ms`, 'timeout');
      case 'cancelled':
        return finish(`Tool ${spec.name} cancelled`, 'cancelled');
    }
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  private checkSchema(spec: ToolSpec, call: ToolCall): Verdict {
    if (call.rawArguments !== undefined) {
      const preview = call.rawArguments.slice(0, 200);
      return {
        ok: false,
        kind: 'schema_invalid',
        message: `Invalid arguments for ${spec.name}: expected a JSON object, got: ${preview}`,
      };
    }
    const validation = validateToolArgs(call.arguments, spec.inputSchema);
    if (validation.valid) return PASS;
    return {
      ok: false,
      kind: 'schema_invalid',
      message: formatValidationErrors(spec.name, validation.errors, spec.inputSchema),
    };
  }

  private async checkSandbox(
    spec: ToolSpec,
    args: Readonly<Record<string, unknown>>,
  ): Promise<Verdict> {
    const mode = this.options.sandboxMode;
    if (spec.mutating && mode === 'read-only') {
      return {
        ok: false,
        kind: 'sandbox_denied',
        message:
          `blocked by sandbox policy: ${spec.name} modifies the workspace and is refused in read-only mode; ` +
          'it requires sandbox mode workspace-write or danger-full-access',
      };
    }
    if (mode === 'danger-full-access') return PASS;

    for (const name of pathArgumentNames(spec)) {
      const raw = args[name];
      if (typeof raw !== 'string') continue;
      try {
        await resolveWorkspacePath(this.options.workspaceRoot, raw, mode);
      } catch (err) {
        const reason = err instanceof PathEscapeError ? err.message : `cannot resolve path ${raw}: ${errorMessage(err)}`;
        return {
          ok: false,
          kind: 'sandbox_denied',
          message: `blocked by sandbox policy (${mode}): ${reason}`,
        };
      }
    }
    return PASS;
  }

  private checkApproval(
    spec: ToolSpec,
    args: Readonly<Record<string, unknown>>,
  ): Promise<Verdict> {
    if (!spec.mutating || this.options.approvalPolicy === 'never') {
      return Promise.resolve(PASS);
    }
    // The decision reads and writes `approvedTools`, so it runs inside the queue.
    const decision = this.approvalQueue.then(() => this.decide(spec, args));
    this.approvalQueue = decision.then(
      () => undefined,
      () => undefined,
    );
    return decision;
  }

  private async decide(
    spec: ToolSpec,
    args: Readonly<Record<string, unknown>>,
  ): Promise<Verdict> {
    const policy = this.options.approvalPolicy;
    let reason = spec.needsConfirmation?.(args);
    if (policy === 'always') {
      reason ??= `approval policy "always" requires confirming every call to ${spec.name}`;
    } else if (!this.approvedTools.has(spec.name)) {
      reason ??= `first use of ${spec.name} in this session`;
    }
    if (reason === undefined) return PASS;

    const confirm = this.options.confirm;
    if (!confirm) {
      return {
        ok: false,
        kind: 'approval_denied',
        message: `denied: ${spec.name} needs approval (${reason}) and no confirmation handler is available`,
      };
    }

    let approved: boolean;
    try {
      approved = await confirm({
        toolName: spec.name,
        arguments: args,
        preview: JSON.stringify(args, null, 2).slice(0, PREVIEW_CHARS),
        reason,
      });
    } catch (err) {
      return {
        ok: false,
        kind: 'approval_denied',
        message: `denied: confirmation for ${spec.name} failed: ${errorMessage(err)}`,
      };
    }

    if (!approved) {
      this.logger.info(`Tool ${spec.name} denied by user`);
      return { ok: false, kind: 'approval_denied', message: `denied by user: ${spec.name} was not executed` };
    }
    this.approvedTools.add(spec.name);
    return PASS;
  }

  // ---------------------------------------------------------------------------
  // Execution
  // ---------------------------------------------------------------------------

  private async run(
    spec: ToolSpec,
    args: Readonly<Record<string, unknown>>,
    options: ToolExecutionOptions,
  ): Promise<Settled> {
    const controller = new AbortController();
    const parent = options.signal;
    const onParentAbort = (): void => controller.abort(parent?.reason);
    parent?.addEventListener('abort', onParentAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const interrupted = new Promise<Settled>((resolve) => {
      timer = setTimeout(() => {
        resolve({ kind: 'timeout' });
        controller.abort(new Error(`timed out after ${spec.timeoutMs}ms`));
      }, spec.timeoutMs);
      controller.signal.addEventListener('abort', () => resolve({ kind: 'cancelled' }), { once: true });
    });

    const { workspaceRoot, sandboxMode } = this.options;
    const ctx: ToolContext = {
      workspaceRoot,
      sandboxMode,
      signal: controller.signal,
      plan: options.plan ?? this.plan,
      logger: this.logger,
      resolvePath: (rawPath) => resolveWorkspacePath(workspaceRoot, rawPath, sandboxMode),
    };

    const handled: Promise<Settled> = Promise.resolve()
      .then(() => spec.handler({ ...args }, ctx))
      .then(
        (value): Settled => ({ kind: 'value', value }),
        (error: unknown): Settled => ({ kind: 'thrown', error }),
      );

    try {
      return await Promise.race([handled, interrupted]);
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    }
  }

  private render(
    value: unknown,
    finish: (output: string, errorKind?: ToolErrorKind) => ToolResult,
  ): ToolResult {
    if (typeof value === 'string') return finish(value);
    if (value === undefined || value === null) return finish('(no output)');
    if (isRecord(value) && typeof value.error === 'string') {
      return finish(value.error, 'handler_failure');
    }
    return finish(JSON.stringify(value, null, 2));
  }
}
