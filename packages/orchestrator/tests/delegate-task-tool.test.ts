import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, realpath, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SandboxGate, ToolRegistry, registerBuiltinTools } from '@toolpilot/tools';
import { SubagentDelegator } from '../src/subagent-delegator.js';
import { createDelegateTaskTool, registerDelegateTaskTool } from '../src/tools/delegate-task-tool.js';
import { ScriptedAdapter, assistant, toolCall } from './helpers.js';

let workspace: string;

beforeEach(async () => {
  workspace = await realpath(await mkdtemp(join(tmpdir(), 'toolpilot-delegate-')));
});

afterEach(async () => {
  await rm(workspace, { recursive: true, force: true });
});

function setup(adapter: ScriptedAdapter) {
  const registry = new ToolRegistry();
  registerBuiltinTools(registry);
  const delegator = new SubagentDelegator({
    adapter,
    registry,
    baseSystemPrompt: 'base',
    workspaceRoot: workspace,
    parentSandboxMode: 'workspace-write',
  });
  registerDelegateTaskTool(registry, delegator);
  const gate = new SandboxGate({
    registry,
    workspaceRoot: workspace,
    sandboxMode: 'workspace-write',
    approvalPolicy: 'on-request',
  });
  return { registry, delegator, gate };
}

// ── Definition ────────────────────────────────────────────────────────

describe('delegate_task definition', () => {
  it('lists the bound profiles', () => {
    const { registry } = setup(new ScriptedAdapter([]));
    const entry = registry.get('delegate_task');

    expect(entry?.source).toBe('orchestration');
    expect(entry?.spec.mutating).toBe(false);
    expect(entry?.spec.timeoutMs).toBe(600_000);
    expect(entry?.spec.inputSchema).toMatchObject({
      required: ['task'],
      properties: { profile: { enum: ['general', 'researcher', 'reviewer'] } },
    });
    expect(entry?.spec.description).toContain('reviewer (Reviews code for bugs, regressions and risks.)');
  });

  it('is mutating when a profile may write', () => {
    const registry = new ToolRegistry();
    registerBuiltinTools(registry);
    const delegator = new SubagentDelegator({
      adapter: new ScriptedAdapter([]),
      registry,
      baseSystemPrompt: 'base',
      workspaceRoot: workspace,
      parentSandboxMode: 'workspace-write',
      profiles: [
        {
          name: 'fixer',
          description: 'Applies small fixes.',
          prompt: 'Fix it.',
          allowedTools: ['read_file', 'replace_in_file'],
          maxSteps: 4,
          sandboxMode: 'workspace-write',
        },
      ],
    });
    expect(createDelegateTaskTool(delegator, 1_000)).toMatchObject({ mutating: true, timeoutMs: 1_000 });
  });
});

// ── Execution through the gate ────────────────────────────────────────

describe('delegate_task through the sandbox gate', () => {
  it('returns the child answer as the tool result', async () => {
    const { gate } = setup(new ScriptedAdapter([assistant('Found 3 issues.')]));

    const result = await gate.execute(toolCall('d1', 'delegate_task', { task: 'review src', profile: 'reviewer' }));

    expect(result).toMatchObject({ toolCallId: 'd1', output: 'Found 3 issues.', isError: false });
  });

  it('defaults to the general profile', async () => {
    const adapter = new ScriptedAdapter([assistant('done')]);
    const { gate } = setup(adapter);

    await gate.execute(toolCall('d1', 'delegate_task', { task: 'look around' }));

    expect(adapter.requests[0]?.[0]?.content.startsWith('base\n\n# Subagent profile: general\n')).toBe(true);
  });

  it('never offers delegate_task to the child', async () => {
    const adapter = new ScriptedAdapter([assistant('done')]);
    const { gate, registry } = setup(adapter);
    expect(registry.has('delegate_task')).toBe(true);

    await gate.execute(toolCall('d1', 'delegate_task', { task: 'look around' }));

    expect(adapter.offeredTools[0]).not.toContain('delegate_task');
  });

  it('shows the parent plan to the child', async () => {
    const adapter = new ScriptedAdapter([assistant('done')]);
    const { gate } = setup(adapter);
    const plan = {
      items: [{ step: 'audit deps', status: 'pending' as const }],
      get() {
        return [...this.items];
      },
      replace() {},
    };

    await gate.execute(toolCall('d1', 'delegate_task', { task: 'check', context: 'lockfile only' }), { plan });

    expect(adapter.requests[0]?.[1]?.content).toBe(
      'check\n\nContext from the parent agent:\nlockfile only\n\nParent plan (read-only):\n- [pending] audit deps',
    );
  });

  it('rejects an unknown profile at the schema stage', async () => {
    const { gate } = setup(new ScriptedAdapter([]));

    const result = await gate.execute(toolCall('d1', 'delegate_task', { task: 'x', profile: 'wizard' }));

    expect(result).toMatchObject({
      isError: true,
      errorKind: 'schema_invalid',
    });
  });

  it('reports child failures as errors', async () => {
    const { gate } = setup(new ScriptedAdapter([]));

    const result = await gate.execute(toolCall('d1', 'delegate_task', { task: 'x' }));

    expect(result).toMatchObject({
      isError: true,
      errorKind: 'handler_failure',
      output: 'subagent `general` failed: script exhausted',
    });
  });

  it('rejects an empty task', async () => {
    const { gate } = setup(new ScriptedAdapter([]));
    const result = await gate.execute(toolCall('d1', 'delegate_task', { task: '  ' }));
    expect(result).toMatchObject({ isError: true, errorKind: 'handler_failure', output: 'task cannot be empty' });
  });
});
