import type { ApprovalPolicy, SandboxMode } from '@toolpilot/core';
import { section } from './prompt-section-builder.js';

/** Session facts shown to the model in the system prompt. */
export interface RuntimeInfo {
  os: string;
  workspaceRoot: string;
  time: string;
  model?: string;
  sandboxMode?: SandboxMode;
  approvalPolicy?: ApprovalPolicy;
}

export interface CollectRuntimeInfoParams {
  workspaceRoot: string;
  now?: Date;
  model?: string;
  sandboxMode?: SandboxMode;
  approvalPolicy?: ApprovalPolicy;
}

export function collectRuntimeInfo(params: CollectRuntimeInfoParams): RuntimeInfo {
  return {
    os: process.platform,
    workspaceRoot: params.workspaceRoot,
    time: (params.now ?? new Date()).toISOString(),
    model: params.model,
    sandboxMode: params.sandboxMode,
    approvalPolicy: params.approvalPolicy,
  };
}

/** Formats RuntimeInfo as an XML `<runtime-info>` section. */
export function formatRuntimeInfo(info: RuntimeInfo): string {
  const lines = [`os: ${info.os}`, `workspace-root: ${info.workspaceRoot}`, `current-time-utc: ${info.time}`];
  if (info.model) lines.push(`model: ${info.model}`);
  if (info.sandboxMode) lines.push(`sandbox-mode: ${info.sandboxMode}`);
  if (info.approvalPolicy) lines.push(`approval-policy: ${info.approvalPolicy}`);
  return section('runtime-info', lines.join('\n'));
}
