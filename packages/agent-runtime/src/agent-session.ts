import type {
  AgentEvent,
  AgentOutcome,
  Logger,
  Message,
  ModelProtocolAdapter,
  PlanItem,
  ToolExecutor,
} from '@toolpilot/core';
import { noopLogger } from '@toolpilot/core';
import { agentLoop } from './agent-loop.js';
import { AgentState } from './agent-state.js';
import { SessionBusyError } from './errors.js';

export interface AgentSessionOptions {
  adapter: ModelProtocolAdapter;
  tools: ToolExecutor;
  systemPrompt: string;
  maxSteps: number;
  toolConcurrency?: number;
  /** Prior transcript to resume from. */
  messages?: readonly Message[];
  logger?: Logger;
  /** Runs once on close(), e.g. to disconnect MCP servers. */
  onClose?: () => Promise<void>;
}

export interface SendOptions {
  signal?: AbortSignal;
  onEvent?: (event: AgentEvent) => void;
}

/**
 * Keeps one AgentState across user turns. Each turn appends the user
 * message, resets the step counter and runs the loop to termination.
 * Only one turn runs at a time.
 */
export class AgentSession {
  readonly state: AgentState;
  private running = false;
  private closed = false;
  private readonly logger: Logger;

  constructor(private readonly options: AgentSessionOptions) {
    this.state = new AgentState({
      maxSteps: options.maxSteps,
      systemPrompt: options.systemPrompt,
      messages: options.messages,
    });
    this.logger = options.logger ?? noopLogger;
  }

  get messages(): Message[] {
    return this.state.messages;
  }

  get plan(): PlanItem[] {
    return this.state.get();
  }

  get model(): string {
    return this.options.adapter.model;
  }

  /** Run one user turn, yielding loop events. */
  async *stream(userText: string, options: { signal?: AbortSignal } = {}): AsyncGenerator<AgentEvent> {
    if (this.closed) throw new Error('Session is closed');
    if (this.running) throw new SessionBusyError();
    this.running = true;
    try {
      this.state.beginTurn(userText);
      yield* agentLoop({
        adapter: this.options.adapter,
        tools: this.options.tools,
        state: this.state,
        toolConcurrency: this.options.toolConcurrency,
        signal: options.signal,
        logger: this.logger,
      });
    } finally {
      // A caller that stops iterating, or a throw, leaves the turn open.
      const unanswered = this.state.abandonTurn('the turn ended before its result was recorded');
      if (unanswered > 0) {
        this.logger.warn(`Turn ended early; ${unanswered} tool call(s) closed without a result`);
      }
      this.running = false;
    }
  }

  /** Run one user turn to termination and return its outcome. */
  async send(userText: string, options: SendOptions = {}): Promise<AgentOutcome> {
    let outcome: AgentOutcome | undefined;
    for await (const event of this.stream(userText, { signal: options.signal })) {
      options.onEvent?.(event);
      if (event.type === 'terminated') outcome = event.outcome;
    }
    if (!outcome) throw new Error('Agent loop ended without a terminated event');
    return outcome;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.options.onClose?.();
  }
}
