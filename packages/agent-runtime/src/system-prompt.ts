import type { ApprovalPolicy, SandboxMode, ToolDefinition } from '@toolpilot/core';
import type { AgentsMdFile } from './agents-md.js';
import { formatAgentsMd, formatToolsSummary, section } from './prompt-section-builder.js';
import { collectRuntimeInfo, formatRuntimeInfo } from './runtime-info.js';

export interface SystemPromptOptions {
  workspaceRoot: string;
  agentsMd: readonly AgentsMdFile[];
  now?: Date;
  model?: string;
  sandboxMode?: SandboxMode;
  approvalPolicy?: ApprovalPolicy;
  /** Listed in an `<available-tools>` section when given. */
  tools?: readonly ToolDefinition[];
}

const INTRO = [
  'You are Toolpilot, a coding agent working in the user\'s workspace from the terminal.',
  'Check facts with the tools instead of guessing, keep changes focused on the request, and answer concisely.',
].join('\n');

const TOOL_STRATEGY = [
  '- Explore with list_files, read_file and grep_files rather than shell commands.',
  '- Read a file before editing it with replace_in_file; create new files with write_file.',
  '- Use exec_command for tests, builds, git and tasks with no dedicated tool.',
  '- Issue independent reads and searches as parallel tool calls in one reply.',
  '- Keep a plan with update_plan when the work has three or more steps.',
  '- Mutating tools follow the sandbox mode and approval policy. When a call is denied, choose another approach or ask the user.',
].join('\n');

/** Render the default system prompt. */
export function buildSystemPrompt(options: SystemPromptOptions): string {
  const runtime = collectRuntimeInfo({
    workspaceRoot: options.workspaceRoot,
    now: options.now,
    model: options.model,
    sandboxMode: options.sandboxMode,
    approvalPolicy: options.approvalPolicy,
  });
  const parts = [
    INTRO,
    section('tool-strategy', TOOL_STRATEGY),
    formatRuntimeInfo(runtime),
    formatToolsSummary(options.tools ?? []),
    formatAgentsMd(options.agentsMd),
  ];
  return parts.filter((part) => part !== '').join('\n\n');
}
