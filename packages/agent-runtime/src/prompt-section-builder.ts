import type { ToolDefinition } from '@toolpilot/core';
import type { AgentsMdFile } from './agents-md.js';

/** Wraps content in XML-style section tags. */
export function section(name: string, content: string): string {
  return `<${name}>\n${content}\n</${name}>`;
}

/** Formats tool definitions as an `<available-tools>` section. */
export function formatToolsSummary(tools: readonly ToolDefinition[]): string {
  if (tools.length === 0) return '';
  const lines = tools.map((t) => `- ${t.name}: ${t.description}`);
  return section('available-tools', lines.join('\n'));
}

/** Formats the AGENTS.md chain as an `<agents-md>` section, `(none)` when empty. */
export function formatAgentsMd(files: readonly AgentsMdFile[]): string {
  const preamble = 'AGENTS.md instructions take precedence over the defaults above when they conflict.';
  if (files.length === 0) return section('agents-md', `${preamble}\n\n(none)`);
  const blocks = files.map((f) => {
    const marker = f.truncated ? '\n[truncated]' : '';
    return `## ${f.path}\n${f.content}${marker}`;
  });
  return section('agents-md', `${preamble}\n\n${blocks.join('\n\n')}`);
}
