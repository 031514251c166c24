import type { ToolHandler, ToolSpec } from '@toolpilot/core';
import type { ToolRegistry } from '@toolpilot/tools';
import { DELEGATE_TOOL_NAME, type SubagentDelegator } from '../subagent-delegator.js';

/** Gate timeout for one delegation; the child loop is cancelled when it expires. */
export const DEFAULT_DELEGATE_TIMEOUT_MS = 600_000;

/** Create a handler for the delegate_task tool. */
export function createDelegateTaskHandler(delegator: SubagentDelegator): ToolHandler {
  return async (args, ctx) => {
    const task = typeof args.task === 'string' ? args.task : '';
    const profile = typeof args.profile === 'string' && args.profile !== '' ? args.profile : 'general';
    const context = typeof args.context === 'string' ? args.context : undefined;

    if (!delegator.has(profile)) {
      const known = delegator.profiles().map((p) => p.name).join(', ');
      return { error: `unknown subagent profile: ${profile} (available: ${known})` };
    }
    if (task.trim() === '') {
      return { error: 'task cannot be empty' };
    }

    const result = await delegator.run(profile, task, {
      context,
      parentPlan: ctx.plan.get(),
      signal: ctx.signal,
    });
    return result.isError ? { error: result.answer } : result.answer;
  };
}

/**
 * The delegate_task tool. It counts as mutating when some profile may
 * write, so the parent's sandbox and approval policy apply to it.
 */
export function createDelegateTaskTool(
  delegator: SubagentDelegator,
  timeoutMs: number = DEFAULT_DELEGATE_TIMEOUT_MS,
): ToolSpec {
  const profiles = delegator.profiles();
  const catalog = profiles.map((p) => `${p.name} (${p.description || 'no description'})`).join('; ');
  return {
    name: DELEGATE_TOOL_NAME,
    description:
      'Hand a focused sub-task to a helper agent with a restricted tool set and get its final answer back. ' +
      `Profiles: ${catalog}.`,
    inputSchema: {
      type: 'object',
      properties: {
        task: {
          type: 'string',
          description: 'What the helper should do. Include everything it needs; it does not see this conversation.',
        },
        profile: {
          type: 'string',
          enum: profiles.map((p) => p.name),
          description: "Helper profile. Defaults to 'general'.",
        },
        context: {
          type: 'string',
          description: 'Optional extra context passed along with the task.',
        },
      },
      required: ['task'],
      additionalProperties: false,
    },
    mutating: delegator.grantsWriteAccess,
    timeoutMs,
    handler: createDelegateTaskHandler(delegator),
  };
}

/** Register delegate_task into the parent registry. */
export function registerDelegateTaskTool(
  registry: ToolRegistry,
  delegator: SubagentDelegator,
  timeoutMs?: number,
): void {
  registry.register(createDelegateTaskTool(delegator, timeoutMs), 'orchestration');
}
