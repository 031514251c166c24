import type { LoopPhase, Message, PlanItem, PlanStore, ToolCall, ToolResult } from '@toolpilot/core';
import { InvalidStateTransitionError, ToolResultMismatchError } from './errors.js';

const TRANSITIONS: Record<LoopPhase, readonly LoopPhase[]> = {
  awaiting_model: ['awaiting_tool_results', 'terminated'],
  awaiting_tool_results: ['awaiting_model', 'terminated'],
  terminated: ['awaiting_model'],
};

export interface AgentStateOptions {
  maxSteps: number;
  systemPrompt?: string;
  /** Prior transcript. A leading system message replaces `systemPrompt`. */
  messages?: readonly Message[];
}

/**
 * Conversation state owned by one agent loop: message history, step
 * counter and the task plan. Enforces the loop's phase transitions and the
 * pairing of tool calls with their results.
 */
export class AgentState implements PlanStore {
  readonly maxSteps: number;
  private history: Message[];
  private planItems: PlanItem[] = [];
  private currentPhase: LoopPhase = 'awaiting_model';
  private stepCount = 0;
  private pendingCalls: readonly ToolCall[] = [];

  constructor(options: AgentStateOptions) {
    if (!Number.isInteger(options.maxSteps) || options.maxSteps < 1) {
      throw new RangeError(`maxSteps must be a positive integer, got ${options.maxSteps}`);
    }
    this.maxSteps = options.maxSteps;

    const prior = options.messages ? [...options.messages] : [];
    const first = prior[0];
    if (options.systemPrompt !== undefined && (!first || first.role !== 'system')) {
      prior.unshift({ role: 'system', content: options.systemPrompt });
    }
    this.history = prior;
  }

  get phase(): LoopPhase {
    return this.currentPhase;
  }

  get steps(): number {
    return this.stepCount;
  }

  /** True once the step ceiling is reached; no further model call may be issued. */
  get exhausted(): boolean {
    return this.stepCount >= this.maxSteps;
  }

  get messages(): Message[] {
    return [...this.history];
  }

  /** Content of the most recent non-empty assistant message. */
  lastAssistantText(): string {
    for (let i = this.history.length - 1; i >= 0; i--) {
      const message = this.history[i];
      if (message && message.role === 'assistant' && message.content.trim() !== '') {
        return message.content;
      }
    }
    return '';
  }

  // -------------------------------------------------------------------------
  // Transitions
  // -------------------------------------------------------------------------

  private transition(to: LoopPhase): void {
    if (!TRANSITIONS[this.currentPhase].includes(to)) {
      throw new InvalidStateTransitionError(this.currentPhase, to);
    }
    this.currentPhase = to;
  }

  /** Start a user turn: append the message and reset the step counter. */
  beginTurn(userText: string): void {
    if (this.currentPhase === 'terminated') {
      this.transition('awaiting_model');
    } else if (this.currentPhase !== 'awaiting_model') {
      throw new InvalidStateTransitionError(this.currentPhase, 'awaiting_model');
    }
    this.stepCount = 0;
    this.history.push({ role: 'user', content: userText });
  }

  /** Record the model's reply. Tool calls move the loop to awaiting_tool_results. */
  appendAssistant(message: Message): void {
    if (this.currentPhase !== 'awaiting_model') {
      throw new InvalidStateTransitionError(this.currentPhase, 'awaiting_tool_results');
    }
    this.history.push(message);
    const calls = message.toolCalls ?? [];
    if (calls.length > 0) {
      this.pendingCalls = calls;
      this.transition('awaiting_tool_results');
    }
  }

  /**
   * Append one result per pending call, in emission order, then count the
   * step and return to awaiting_model.
   */
  completeToolTurn(results: readonly ToolResult[]): void {
    if (this.currentPhase !== 'awaiting_tool_results') {
      throw new InvalidStateTransitionError(this.currentPhase, 'awaiting_model');
    }
    if (results.length !== this.pendingCalls.length) {
      throw new ToolResultMismatchError(
        `Expected ${this.pendingCalls.length} tool result(s), got ${results.length}`,
      );
    }
    this.pendingCalls.forEach((call, index) => {
      const result = results[index];
      if (!result || result.toolCallId !== call.id) {
        throw new ToolResultMismatchError(
          `Tool result ${index} answers ${result?.toolCallId ?? 'nothing'}, expected ${call.id}`,
        );
      }
    });

    for (const result of results) {
      this.history.push({
        role: 'tool',
        toolCallId: result.toolCallId,
        content: result.output,
        isError: result.isError,
      });
    }
    this.pendingCalls = [];
    this.stepCount += 1;
    this.transition('awaiting_model');
  }

  /**
   * End a turn that stopped before the loop terminated it. Calls still
   * waiting for results are answered with an error so the transcript stays
   * paired; returns how many were answered.
   */
  abandonTurn(reason: string): number {
    if (this.currentPhase === 'terminated') return 0;
    const unanswered = this.pendingCalls;
    for (const call of unanswered) {
      this.history.push({
        role: 'tool',
        toolCallId: call.id,
        content: `Tool ${call.name} did not run: ${reason}`,
        isError: true,
      });
    }
    this.pendingCalls = [];
    this.transition('terminated');
    return unanswered.length;
  }

  /** Enter the terminal phase, optionally appending a closing assistant message. */
  terminate(closing?: string): void {
    if (closing !== undefined) {
      this.history.push({ role: 'assistant', content: closing });
    }
    this.transition('terminated');
  }

  // -------------------------------------------------------------------------
  // Plan
  // -------------------------------------------------------------------------

  get(): PlanItem[] {
    return this.planItems.map((item) => ({ ...item }));
  }

  replace(items: PlanItem[]): void {
    this.planItems = items.map((item) => ({ ...item }));
  }
}
