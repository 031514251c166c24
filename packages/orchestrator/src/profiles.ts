import type { SandboxMode, SubagentProfile } from '@toolpilot/core';
import { DEFAULT_SUBAGENT_MAX_STEPS } from '@toolpilot/core';

const READ_TOOLS = ['list_files', 'read_file', 'grep_files'] as const;

/** Built-in helper agents. All of them are read-only. */
export const DEFAULT_SUBAGENT_PROFILES: readonly SubagentProfile[] = [
  {
    name: 'general',
    description: 'General-purpose helper for a focused sub-task.',
    prompt:
      'You are a helper agent working on one delegated sub-task. Stay within that task, ' +
      'keep the answer short and report concrete results.',
    allowedTools: READ_TOOLS,
    maxSteps: DEFAULT_SUBAGENT_MAX_STEPS,
  },
  {
    name: 'reviewer',
    description: 'Reviews code for bugs, regressions and risks.',
    prompt:
      'You are a code reviewer. Look for incorrect behavior, regressions and missing tests. ' +
      'List the findings first, most severe at the top, then give a brief summary.',
    allowedTools: READ_TOOLS,
    maxSteps: DEFAULT_SUBAGENT_MAX_STEPS,
  },
  {
    name: 'researcher',
    description: 'Explores the codebase and summarizes what it finds.',
    prompt:
      'You are a research agent. Collect the relevant facts from files and tool output, ' +
      'say which assumptions you made, and answer with a structured summary.',
    allowedTools: READ_TOOLS,
    maxSteps: DEFAULT_SUBAGENT_MAX_STEPS,
  },
];

/**
 * Defaults overlaid with configured profiles. A configured profile replaces
 * the default of the same name; new names are appended.
 */
export function mergeProfiles(
  defaults: readonly SubagentProfile[],
  overrides: readonly SubagentProfile[],
): SubagentProfile[] {
  const byName = new Map<string, SubagentProfile>();
  for (const profile of defaults) byName.set(profile.name, profile);
  for (const profile of overrides) byName.set(profile.name, profile);
  return [...byName.values()];
}

const SANDBOX_RANK: Record<SandboxMode, number> = {
  'read-only': 0,
  'workspace-write': 1,
  'danger-full-access': 2,
};

/**
 * Sandbox mode a delegated agent runs under: read-only unless the profile
 * asks for more, and never more permissive than the parent session.
 */
export function effectiveSandboxMode(profile: SubagentProfile, parentMode: SandboxMode): SandboxMode {
  const requested = profile.sandboxMode ?? 'read-only';
  return SANDBOX_RANK[requested] <= SANDBOX_RANK[parentMode] ? requested : parentMode;
}
