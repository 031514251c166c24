import type {
  Message,
  ModelProtocolAdapter,
  ModelRequestOptions,
  ToolCall,
  ToolDefinition,
  ToolErrorKind,
  ToolExecutionOptions,
  ToolExecutor,
  ToolResult,
} from '@toolpilot/core';

/** One scripted model turn: a reply, a failure, or a function of the request. */
export type ScriptStep =
  | Message
  | Error
  | ((history: readonly Message[], options: ModelRequestOptions) => Promise<Message>);

/** Adapter that replays a fixed script and records every request. */
export class ScriptedAdapter implements ModelProtocolAdapter {
  readonly id = 'scripted';
  readonly model = 'test-model';
  readonly requests: Message[][] = [];
  private readonly script: ScriptStep[];

  constructor(script: ScriptStep[]) {
    this.script = [...script];
  }

  async send(
    history: readonly Message[],
    _tools: readonly ToolDefinition[],
    options: ModelRequestOptions = {},
  ): Promise<Message> {
    this.requests.push([...history]);
    const step = this.script.shift();
    if (step === undefined) throw new Error('script exhausted');
    if (step instanceof Error) throw step;
    if (typeof step === 'function') return step(history, options);
    return step;
  }
}

export function assistant(content: string, toolCalls?: ToolCall[]): Message {
  return toolCalls ? { role: 'assistant', content, toolCalls } : { role: 'assistant', content };
}

export function toolCall(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
  return { id, name, arguments: args };
}

export interface FakeOutcome {
  output: string;
  isError?: boolean;
  errorKind?: ToolErrorKind;
}

export type FakeHandler = (call: ToolCall, options: ToolExecutionOptions) => Promise<string | FakeOutcome>;

/** Tool executor backed by plain functions; records call ids in completion order. */
export class FakeToolExecutor implements ToolExecutor {
  readonly completed: string[] = [];

  constructor(private readonly handlers: Record<string, FakeHandler>) {}

  definitions(): ToolDefinition[] {
    return Object.keys(this.handlers).map((name) => ({
      name,
      description: `fake ${name}`,
      inputSchema: { type: 'object' },
    }));
  }

  async execute(call: ToolCall, options: ToolExecutionOptions = {}): Promise<ToolResult> {
    const handler = this.handlers[call.name];
    if (!handler) {
      return {
        toolCallId: call.id,
        output: `Unknown tool: ${call.name}`,
        isError: true,
        errorKind: 'unknown_tool',
        durationMs: 0,
      };
    }
    const value = await handler(call, options);
    this.completed.push(call.id);
    const outcome: FakeOutcome = typeof value === 'string' ? { output: value } : value;
    return {
      toolCallId: call.id,
      output: outcome.output,
      isError: outcome.isError ?? false,
      errorKind: outcome.errorKind,
      durationMs: 0,
    };
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
