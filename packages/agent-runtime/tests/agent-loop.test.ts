import { describe, it, expect } from 'vitest';
import type { AgentEvent } from '@toolpilot/core';
import { ProviderError } from '@toolpilot/core';
import { agentLoop, runAgentLoop, stepLimitNotice } from '../src/agent-loop.js';
import { AgentState } from '../src/agent-state.js';
import { ScriptedAdapter, FakeToolExecutor, assistant, toolCall, delay } from './helpers.js';

function newState(maxSteps = 10): AgentState {
  const state = new AgentState({ maxSteps, systemPrompt: 'sys' });
  state.beginTurn('do the thing');
  return state;
}

async function collect(gen: AsyncGenerator<AgentEvent>): Promise<AgentEvent[]> {
  const events: AgentEvent[] = [];
  for await (const event of gen) events.push(event);
  return events;
}

// ── Termination ───────────────────────────────────────────────────────

describe('agentLoop termination', () => {
  it('text-only reply terminates with done', async () => {
    const adapter = new ScriptedAdapter([assistant('All done.')]);
    const state = newState();
    const events = await collect(agentLoop({ adapter, tools: new FakeToolExecutor({}), state }));

    expect(events.map((e) => e.type)).toEqual(['step_start', 'assistant_message', 'terminated']);
    const last = events[2];
    expect(last?.type === 'terminated' && last.outcome.reason).toBe('done');
    expect(last?.type === 'terminated' && last.outcome.finalText).toBe('All done.');
    expect(state.phase).toBe('terminated');
    expect(state.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant']);
  });

  it('max_steps=1 stops after one tool turn without a second model call', async () => {
    const adapter = new ScriptedAdapter([
      assistant('working', [toolCall('c1', 'read_file', { path: 'a.ts' })]),
      assistant('never sent'),
    ]);
    const tools = new FakeToolExecutor({ read_file: async () => 'contents' });
    const state = newState(1);

    const outcome = await runAgentLoop({ adapter, tools, state });

    expect(outcome.reason).toBe('max_steps_exceeded');
    expect(adapter.requests).toHaveLength(1);
    expect(outcome.steps).toBe(1);
    expect(outcome.finalText).toBe(stepLimitNotice(1, 'working'));
    expect(outcome.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool', 'assistant']);
    expect(outcome.messages[4]?.content).toBe(
      'Stopped after reaching the step limit (1 step) before the task was finished.\n\nLast progress update:\nworking',
    );
  });

  it('provider auth errors terminate with the partial transcript', async () => {
    const failure = new ProviderError('auth', 'bad key', { status: 401 });
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('c1', 'list_files')]),
      failure,
    ]);
    const tools = new FakeToolExecutor({ list_files: async () => 'a.ts' });

    const outcome = await runAgentLoop({ adapter, tools, state: newState() });

    expect(outcome.reason).toBe('error');
    expect(outcome.error).toBe(failure);
    expect(outcome.messages.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'tool']);
    expect(outcome.steps).toBe(1);
  });
});

// ── Tool turns ────────────────────────────────────────────────────────

describe('agentLoop tool turns', () => {
  it('appends results in emission order regardless of completion order', async () => {
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('slow', 'wait', { ms: 40 }), toolCall('fast', 'wait', { ms: 1 })]),
      assistant('finished'),
    ]);
    const tools = new FakeToolExecutor({
      wait: async (call) => {
        await delay(Number(call.arguments.ms));
        return `waited ${call.id}`;
      },
    });

    const outcome = await runAgentLoop({ adapter, tools, state: newState() });

    expect(tools.completed).toEqual(['fast', 'slow']);
    const toolMessages = outcome.messages.filter((m) => m.role === 'tool');
    expect(toolMessages.map((m) => [m.toolCallId, m.content])).toEqual([
      ['slow', 'waited slow'],
      ['fast', 'waited fast'],
    ]);
    expect(adapter.requests[1]?.slice(-3).map((m) => m.role)).toEqual(['assistant', 'tool', 'tool']);
  });

  it('yields tool_call and tool_result events per call', async () => {
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('c1', 'echo'), toolCall('c2', 'echo')]),
      assistant('ok'),
    ]);
    const tools = new FakeToolExecutor({ echo: async (call) => call.id });
    const events = await collect(agentLoop({ adapter, tools, state: newState() }));

    expect(events.map((e) => e.type)).toEqual([
      'step_start',
      'assistant_message',
      'tool_call',
      'tool_call',
      'tool_result',
      'tool_result',
      'step_start',
      'assistant_message',
      'terminated',
    ]);
  });

  it('continues after a denied tool call', async () => {
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('w1', 'write_file', { path: 'x', content: 'y' })]),
      assistant('Skipped the write.'),
    ]);
    const tools = new FakeToolExecutor({
      write_file: async () => ({
        output: 'denied by user: write_file was not executed',
        isError: true,
        errorKind: 'approval_denied',
      }),
    });

    const outcome = await runAgentLoop({ adapter, tools, state: newState() });

    expect(outcome.reason).toBe('done');
    expect(outcome.finalText).toBe('Skipped the write.');
    const denied = adapter.requests[1]?.find((m) => m.role === 'tool');
    expect(denied).toEqual({
      role: 'tool',
      toolCallId: 'w1',
      content: 'denied by user: write_file was not executed',
      isError: true,
    });
  });

  it('feeds unknown tool failures back to the model', async () => {
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('d1', 'delete_everything')]),
      assistant('Sorry, no such tool.'),
    ]);
    const outcome = await runAgentLoop({ adapter, tools: new FakeToolExecutor({}), state: newState() });

    expect(outcome.reason).toBe('done');
    expect(outcome.messages[3]).toEqual({
      role: 'tool',
      toolCallId: 'd1',
      content: 'Unknown tool: delete_everything',
      isError: true,
    });
  });

  it('turns a rejecting executor into a handler_failure result', async () => {
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('c1', 'read_file'), toolCall('c2', 'list_files')]),
      assistant('recovered'),
    ]);
    const tools = new FakeToolExecutor({
      read_file: async () => {
        throw new Error('disk gone');
      },
      list_files: async () => 'a.ts',
    });
    const state = newState();

    const events = await collect(agentLoop({ adapter, tools, state }));

    const failed = events.find((e) => e.type === 'tool_result' && e.call.id === 'c1');
    expect(failed?.type === 'tool_result' && failed.result).toMatchObject({
      toolCallId: 'c1',
      output: 'Tool execution failed: disk gone',
      isError: true,
      errorKind: 'handler_failure',
    });
    expect(adapter.requests[1]?.slice(-2)).toEqual([
      { role: 'tool', toolCallId: 'c1', content: 'Tool execution failed: disk gone', isError: true },
      { role: 'tool', toolCallId: 'c2', content: 'a.ts', isError: false },
    ]);
    expect(state.phase).toBe('terminated');
  });

  it('hands the state to tools as the plan store', async () => {
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('p1', 'update_plan')]),
      assistant('planned'),
    ]);
    const tools = new FakeToolExecutor({
      update_plan: async (_call, options) => {
        options.plan?.replace([{ step: 'read code', status: 'in_progress' }]);
        return '{"ok":true,"plan_size":1}';
      },
    });

    const outcome = await runAgentLoop({ adapter, tools, state: newState() });
    expect(outcome.plan).toEqual([{ step: 'read code', status: 'in_progress' }]);
  });

  it('keeps reasoning out of the final answer', async () => {
    const adapter = new ScriptedAdapter([
      { role: 'assistant', content: 'The answer is 4.', reasoning: [{ kind: 'thinking', text: '2 + 2' }] },
    ]);
    const events = await collect(agentLoop({ adapter, tools: new FakeToolExecutor({}), state: newState() }));

    const message = events.find((e) => e.type === 'assistant_message');
    expect(message?.type === 'assistant_message' && message.message.reasoning).toEqual([
      { kind: 'thinking', text: '2 + 2' },
    ]);
    const last = events[events.length - 1];
    expect(last?.type === 'terminated' && last.outcome.finalText).toBe('The answer is 4.');
  });
});

// ── Cancellation ──────────────────────────────────────────────────────

describe('agentLoop cancellation', () => {
  it('stops after the running tool turn when cancelled', async () => {
    const controller = new AbortController();
    const adapter = new ScriptedAdapter([
      assistant('', [toolCall('c1', 'stop')]),
      assistant('never sent'),
    ]);
    const tools = new FakeToolExecutor({
      stop: async () => {
        controller.abort();
        return { output: 'Tool stop cancelled', isError: true, errorKind: 'cancelled' };
      },
    });

    const outcome = await runAgentLoop({ adapter, tools, state: newState(), signal: controller.signal });

    expect(outcome.reason).toBe('cancelled');
    expect(adapter.requests).toHaveLength(1);
    expect(outcome.messages[outcome.messages.length - 1]?.role).toBe('tool');
  });

  it('reports cancelled when the model call is aborted', async () => {
    const controller = new AbortController();
    const adapter = new ScriptedAdapter([
      (_history, options) =>
        new Promise((_resolve, reject) => {
          options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    ]);
    const pending = runAgentLoop({
      adapter,
      tools: new FakeToolExecutor({}),
      state: newState(),
      signal: controller.signal,
    });
    setTimeout(() => controller.abort(), 10);

    const outcome = await pending;
    expect(outcome.reason).toBe('cancelled');
    expect(outcome.error).toBeUndefined();
  });
});
