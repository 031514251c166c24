import type {
  AgentEvent,
  AgentOutcome,
  Logger,
  Message,
  ModelProtocolAdapter,
  TerminationReason,
  ToolCall,
  ToolExecutionOptions,
  ToolExecutor,
  ToolResult,
} from '@toolpilot/core';
import { errorMessage, noopLogger } from '@toolpilot/core';
import type { AgentState } from './agent-state.js';
import { runOrdered } from './ordered-batch.js';

export const DEFAULT_TOOL_CONCURRENCY = 4;

export interface AgentLoopOptions {
  adapter: ModelProtocolAdapter;
  tools: ToolExecutor;
  state: AgentState;
  /** Tool calls of one turn executed at the same time. */
  toolConcurrency?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/** Closing message appended when the step ceiling ends a run. */
export function stepLimitNotice(maxSteps: number, lastText: string): string {
  const notice = `Stopped after reaching the step limit (${maxSteps} step${maxSteps === 1 ? '' : 's'}) before the task was finished.`;
  return lastText.trim() === '' ? notice : `${notice}\n\nLast progress update:\n${lastText}`;
}

/** Run one call; an executor that rejects yields a handler_failure result. */
async function executeSafely(
  tools: ToolExecutor,
  call: ToolCall,
  options: ToolExecutionOptions,
): Promise<ToolResult> {
  const startedAt = Date.now();
  try {
    return await tools.execute(call, options);
  } catch (err) {
    return {
      toolCallId: call.id,
      output: `Tool execution failed: ${errorMessage(err)}`,
      isError: true,
      errorKind: 'handler_failure',
      durationMs: Date.now() - startedAt,
    };
  }
}

/**
 * The agent step machine. Each step sends the history to the model; tool
 * calls in the reply run through the executor and their results are
 * appended in emission order. The step ceiling is checked before every
 * model call. Yields events as it goes and always finishes with a
 * `terminated` event carrying the outcome.
 */
export async function* agentLoop(options: AgentLoopOptions): AsyncGenerator<AgentEvent> {
  const { adapter, tools, state, signal } = options;
  const logger = options.logger ?? noopLogger;
  const concurrency = options.toolConcurrency ?? DEFAULT_TOOL_CONCURRENCY;

  const finish = (reason: TerminationReason, finalText: string, error?: unknown): AgentEvent => {
    const outcome: AgentOutcome = {
      reason,
      finalText,
      messages: state.messages,
      plan: state.get(),
      steps: state.steps,
    };
    if (error !== undefined) outcome.error = error;
    logger.info(`Agent loop terminated: ${reason} after ${state.steps} step(s)`);
    return { type: 'terminated', outcome };
  };

  for (;;) {
    if (signal?.aborted) {
      state.terminate();
      yield finish('cancelled', state.lastAssistantText());
      return;
    }
    if (state.exhausted) {
      const closing = stepLimitNotice(state.maxSteps, state.lastAssistantText());
      state.terminate(closing);
      yield finish('max_steps_exceeded', closing);
      return;
    }

    const step = state.steps + 1;
    yield { type: 'step_start', step };
    logger.debug(`Step ${step}: calling ${adapter.id}/${adapter.model}`);

    let reply: Message;
    try {
      reply = await adapter.send(state.messages, tools.definitions(), { signal });
    } catch (err) {
      state.terminate();
      if (signal?.aborted) {
        yield finish('cancelled', state.lastAssistantText());
      } else {
        logger.error(`Model call failed at step ${step}: ${errorMessage(err)}`);
        yield finish('error', state.lastAssistantText(), err);
      }
      return;
    }

    state.appendAssistant(reply);
    yield { type: 'assistant_message', message: reply };

    const calls = reply.toolCalls ?? [];
    if (calls.length === 0) {
      state.terminate();
      yield finish('done', reply.content);
      return;
    }

    for (const call of calls) {
      yield { type: 'tool_call', call };
    }
    const results = await runOrdered(calls, concurrency, async (call) => {
      const result = await executeSafely(tools, call, { signal, plan: state });
      logger.debug(`Tool ${call.name} (${call.id}): ${result.errorKind ?? 'ok'} in ${result.durationMs}ms`);
      return result;
    });
    state.completeToolTurn(results);
    for (const [index, call] of calls.entries()) {
      const result = results[index];
      if (result) yield { type: 'tool_result', call, result };
    }
  }
}

/** Drive the loop to completion and return its outcome. */
export async function runAgentLoop(
  options: AgentLoopOptions & { onEvent?: (event: AgentEvent) => void },
): Promise<AgentOutcome> {
  for await (const event of agentLoop(options)) {
    options.onEvent?.(event);
    if (event.type === 'terminated') return event.outcome;
  }
  throw new Error('Agent loop ended without a terminated event');
}
