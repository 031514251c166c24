import type { Message, ToolCall } from './messages.js';
import type { SandboxMode, ToolResult } from './tools.js';

export type PlanStatus = 'pending' | 'in_progress' | 'completed';

export const PLAN_STATUSES: readonly PlanStatus[] = ['pending', 'in_progress', 'completed'];

export interface PlanItem {
  step: string;
  status: PlanStatus;
}

/** Agent loop states. */
export type LoopPhase = 'awaiting_model' | 'awaiting_tool_results' | 'terminated';

export type TerminationReason = 'done' | 'max_steps_exceeded' | 'cancelled' | 'error';

/** Returned when a loop run terminates, whatever the reason. */
export interface AgentOutcome {
  reason: TerminationReason;
  /** Final answer, truncation notice, or the last partial text. */
  finalText: string;
  /** Full transcript, including everything appended before failure. */
  messages: Message[];
  plan: PlanItem[];
  steps: number;
  error?: unknown;
}

/** Events yielded from the agent loop. */
export type AgentEvent =
  | { type: 'step_start'; step: number }
  | { type: 'assistant_message'; message: Message }
  | { type: 'tool_call'; call: ToolCall }
  | { type: 'tool_result'; call: ToolCall; result: ToolResult }
  | { type: 'terminated'; outcome: AgentOutcome };

/** Catalog entry describing a delegated helper agent. */
export interface SubagentProfile {
  name: string;
  description: string;
  prompt: string;
  allowedTools: readonly string[];
  maxSteps: number;
  /** Defaults to read-only. Set only when the profile must write. */
  sandboxMode?: SandboxMode;
}
