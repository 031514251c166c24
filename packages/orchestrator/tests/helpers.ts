import type { Message, ModelProtocolAdapter, ToolCall, ToolDefinition } from '@toolpilot/core';

type Step = Message | Error;

/** Adapter replaying a fixed script; records each request and the tools offered. */
export class ScriptedAdapter implements ModelProtocolAdapter {
  readonly id = 'scripted';
  readonly model = 'test-model';
  readonly requests: Message[][] = [];
  readonly offeredTools: string[][] = [];
  private readonly script: Step[];

  constructor(script: Step[]) {
    this.script = [...script];
  }

  async send(history: readonly Message[], tools: readonly ToolDefinition[]): Promise<Message> {
    this.requests.push([...history]);
    this.offeredTools.push(tools.map((t) => t.name));
    const step = this.script.shift();
    if (step === undefined) throw new Error('script exhausted');
    if (step instanceof Error) throw step;
    return step;
  }
}

export function assistant(content: string, toolCalls?: ToolCall[]): Message {
  return toolCalls ? { role: 'assistant', content, toolCalls } : { role: 'assistant', content };
}

export function toolCall(id: string, name: string, args: Record<string, unknown> = {}): ToolCall {
  return { id, name, arguments: args };
}
