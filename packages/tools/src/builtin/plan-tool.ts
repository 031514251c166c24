import type { PlanItem, ToolDefinition, ToolHandler } from '@toolpilot/core';
import { isRecord, PLAN_STATUSES } from '@toolpilot/core';

export const updatePlanToolDefinition: ToolDefinition = {
  name: 'update_plan',
  description:
    'Create or replace the task plan for this session. Use it for work with three or more steps. ' +
    'Each call replaces the whole plan, so always send every step with its current status.',
  inputSchema: {
    type: 'object',
    properties: {
      plan: {
        type: 'array',
        description: 'The complete list of plan steps.',
        items: {
          type: 'object',
          properties: {
            step: { type: 'string', description: 'Short description of the step.' },
            status: {
              type: 'string',
              enum: ['pending', 'in_progress', 'completed'],
              description: 'Current status of the step.',
            },
          },
          required: ['step', 'status'],
          additionalProperties: false,
        },
      },
    },
    required: ['plan'],
    additionalProperties: false,
  },
};

export const updatePlanHandler: ToolHandler = async (args, ctx) => {
  const plan = args.plan;
  if (!Array.isArray(plan)) {
    return { error: 'plan must be a list of {step, status}' };
  }

  const normalized: PlanItem[] = [];
  for (const item of plan) {
    if (!isRecord(item)) {
      return { error: 'each plan item must be an object' };
    }
    const step = typeof item.step === 'string' ? item.step.trim() : '';
    if (!step) {
      return { error: 'plan step cannot be empty' };
    }
    const status = PLAN_STATUSES.find((candidate) => candidate === item.status);
    if (!status) {
      return { error: 'status must be pending | in_progress | completed' };
    }
    normalized.push({ step, status });
  }

  ctx.plan.replace(normalized);
  return JSON.stringify({ ok: true, plan_size: normalized.length });
};
