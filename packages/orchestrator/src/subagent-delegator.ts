import type {
  AgentEvent,
  AgentOutcome,
  ApprovalPolicy,
  ConfirmFn,
  Logger,
  ModelProtocolAdapter,
  PlanItem,
  SandboxMode,
  SubagentProfile,
} from '@toolpilot/core';
import { errorMessage, noopLogger } from '@toolpilot/core';
import { AgentState, runAgentLoop } from '@toolpilot/agent-runtime';
import { SandboxGate, ToolNotFoundError, type ToolRegistry } from '@toolpilot/tools';
import { SubagentConfigError } from './errors.js';
import { DEFAULT_SUBAGENT_PROFILES, effectiveSandboxMode } from './profiles.js';

/** Name of the tool through which the parent model delegates. */
export const DELEGATE_TOOL_NAME = 'delegate_task';

export interface SubagentDelegatorOptions {
  adapter: ModelProtocolAdapter;
  /** Parent tools. Each profile is bound to a view of this registry. */
  registry: ToolRegistry;
  /** Parent system prompt; the profile section is appended to it. */
  baseSystemPrompt: string;
  workspaceRoot: string;
  /** Upper bound for every child's sandbox mode. */
  parentSandboxMode: SandboxMode;
  /** Applies to children whose profile grants write access. */
  approvalPolicy?: ApprovalPolicy;
  confirm?: ConfirmFn;
  profiles?: readonly SubagentProfile[];
  toolConcurrency?: number;
  logger?: Logger;
  /** Receives every child loop event, tagged with the profile name. */
  onEvent?: (profile: string, event: AgentEvent) => void;
}

export interface DelegateOptions {
  /** Extra context from the parent, appended to the task. */
  context?: string;
  /** Parent plan, shown to the child as read-only context. */
  parentPlan?: readonly PlanItem[];
  signal?: AbortSignal;
}

/** A finished delegation: the child's outcome and the text handed back. */
export interface DelegationResult {
  profile: string;
  outcome: AgentOutcome;
  answer: string;
  isError: boolean;
}

interface BoundProfile {
  profile: SubagentProfile;
  sandboxMode: SandboxMode;
  /** Shared by every run of the profile, so on-request approvals carry over. */
  gate: SandboxGate;
}

function renderPlan(plan: readonly PlanItem[]): string {
  return plan.map((item) => `- [${item.status}] ${item.step}`).join('\n');
}

/**
 * Runs sub-tasks in fresh, restricted agent loops. Profiles are bound to
 * their tool views when the delegator is built, so a profile naming an
 * unknown, mutating or delegating tool fails here rather than mid-run.
 */
export class SubagentDelegator {
  private readonly bound = new Map<string, BoundProfile>();
  private readonly logger: Logger;

  constructor(private readonly options: SubagentDelegatorOptions) {
    this.logger = options.logger ?? noopLogger;
    for (const profile of options.profiles ?? DEFAULT_SUBAGENT_PROFILES) {
      if (this.bound.has(profile.name)) {
        throw new SubagentConfigError(profile.name, 'defined more than once');
      }
      this.bound.set(profile.name, this.bind(profile));
    }
  }

  private bind(profile: SubagentProfile): BoundProfile {
    if (profile.allowedTools.includes(DELEGATE_TOOL_NAME)) {
      throw new SubagentConfigError(profile.name, `${DELEGATE_TOOL_NAME} is not available to subagents`);
    }
    let tools: ToolRegistry;
    try {
      tools = this.options.registry.view(profile.allowedTools);
    } catch (err) {
      if (err instanceof ToolNotFoundError) {
        throw new SubagentConfigError(profile.name, `unknown tool in allowedTools: ${err.message}`);
      }
      throw err;
    }
    const requested = profile.sandboxMode ?? 'read-only';
    if (requested === 'read-only') {
      const mutating = tools.getAll().find((entry) => entry.spec.mutating);
      if (mutating) {
        throw new SubagentConfigError(
          profile.name,
          `${mutating.spec.name} modifies the workspace; set sandboxMode to allow it`,
        );
      }
    }
    const sandboxMode = effectiveSandboxMode(profile, this.options.parentSandboxMode);
    const gate = new SandboxGate({
      registry: tools,
      workspaceRoot: this.options.workspaceRoot,
      sandboxMode,
      approvalPolicy: this.options.approvalPolicy ?? 'on-request',
      confirm: this.options.confirm,
      logger: this.logger,
    });
    return { profile, sandboxMode, gate };
  }

  /** Bound profiles, sorted by name. */
  profiles(): SubagentProfile[] {
    return [...this.bound.values()]
      .map((b) => b.profile)
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  has(name: string): boolean {
    return this.bound.has(name);
  }

  /** True when some profile may run with write access. */
  get grantsWriteAccess(): boolean {
    return [...this.bound.values()].some((b) => b.sandboxMode !== 'read-only');
  }

  /** System prompt of a child running `profile`. */
  childSystemPrompt(profile: SubagentProfile): string {
    return `${this.options.baseSystemPrompt}\n\n# Subagent profile: ${profile.name}\n${profile.prompt}`;
  }

  /** Run `task` under the named profile and return the child's outcome. */
  async run(profileName: string, task: string, options: DelegateOptions = {}): Promise<DelegationResult> {
    const bound = this.bound.get(profileName);
    if (!bound) {
      const known = [...this.bound.keys()].sort().join(', ');
      throw new Error(`unknown subagent profile: ${profileName} (available: ${known})`);
    }
    if (task.trim() === '') {
      throw new Error('task cannot be empty');
    }
    const { profile, sandboxMode, gate } = bound;

    const state = new AgentState({ maxSteps: profile.maxSteps, systemPrompt: this.childSystemPrompt(profile) });
    state.beginTurn(this.composeTask(task, options));

    this.logger.info(`Subagent ${profile.name} started (${sandboxMode}, max ${profile.maxSteps} steps)`);
    const onEvent = this.options.onEvent;
    const outcome = await runAgentLoop({
      adapter: this.options.adapter,
      tools: gate,
      state,
      toolConcurrency: this.options.toolConcurrency,
      signal: options.signal,
      logger: this.logger,
      onEvent: onEvent ? (event) => onEvent(profile.name, event) : undefined,
    });
    this.logger.info(`Subagent ${profile.name} finished: ${outcome.reason} after ${outcome.steps} step(s)`);

    return { profile: profile.name, outcome, ...this.answerFor(profile.name, outcome) };
  }

  /**
   * Run `task` and return the text handed back to the parent. Failures of
   * the child come back as text too.
   */
  async delegate(profileName: string, task: string, options: DelegateOptions = {}): Promise<string> {
    try {
      return (await this.run(profileName, task, options)).answer;
    } catch (err) {
      return `subagent \`${profileName}\` failed: ${errorMessage(err)}`;
    }
  }

  private composeTask(task: string, options: DelegateOptions): string {
    const parts = [task.trim()];
    const context = options.context?.trim();
    if (context) parts.push(`Context from the parent agent:\n${context}`);
    if (options.parentPlan && options.parentPlan.length > 0) {
      parts.push(`Parent plan (read-only):\n${renderPlan(options.parentPlan)}`);
    }
    return parts.join('\n\n');
  }

  private answerFor(name: string, outcome: AgentOutcome): { answer: string; isError: boolean } {
    switch (outcome.reason) {
      case 'done':
        return { answer: outcome.finalText.trim() === '' ? '(subagent returned no answer)' : outcome.finalText, isError: false };
      case 'max_steps_exceeded':
        return { answer: outcome.finalText, isError: false };
      case 'cancelled':
        return { answer: `subagent \`${name}\` was cancelled`, isError: true };
      case 'error':
        return { answer: `subagent \`${name}\` failed: ${errorMessage(outcome.error)}`, isError: true };
    }
  }
}
