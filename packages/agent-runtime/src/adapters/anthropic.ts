import Anthropic from '@anthropic-ai/sdk';
import type {
  Message,
  ModelProtocolAdapter,
  ModelRequestOptions,
  ReasoningBlock,
  ToolCall,
  ToolDefinition,
} from '@toolpilot/core';
import { ProviderError, isRecord } from '@toolpilot/core';
import { toProviderError } from './provider-errors.js';

type MessagesRequest = Anthropic.MessageCreateParamsNonStreaming;

/** The part of a Messages API response the adapter reads. */
export interface AnthropicReply {
  content: readonly unknown[];
}

/** Sends one Messages API request. The real client or a test fake. */
export type AnthropicCreate = (
  body: MessagesRequest,
  options: { signal?: AbortSignal },
) => Promise<AnthropicReply>;

export interface AnthropicAdapterOptions {
  model: string;
  create: AnthropicCreate;
  maxTokens: number;
  temperature?: number;
  /** Enables extended thinking with this token budget. */
  thinkingBudgetTokens?: number;
}

/** Key under which undecodable tool arguments travel inside `tool_use.input`. */
export const RAW_ARGUMENTS_KEY = '_raw_arguments';

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function encodeAnthropicTools(tools: readonly ToolDefinition[]): Anthropic.Tool[] {
  return tools.map((tool): Anthropic.Tool => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.inputSchema, type: 'object' },
  }));
}

function encodeReasoning(reasoning: readonly ReasoningBlock[]): Anthropic.ContentBlockParam[] {
  const blocks: Anthropic.ContentBlockParam[] = [];
  for (const block of reasoning) {
    if (block.kind === 'redacted') {
      blocks.push({ type: 'redacted_thinking', data: block.data });
    } else if (block.signature !== undefined) {
      // Unsigned thinking came from another provider and cannot be replayed.
      blocks.push({ type: 'thinking', thinking: block.text, signature: block.signature });
    }
  }
  return blocks;
}

function toolUseInput(call: ToolCall): Record<string, unknown> {
  return call.rawArguments !== undefined ? { [RAW_ARGUMENTS_KEY]: call.rawArguments } : { ...call.arguments };
}

/**
 * Encode canonical history for the Messages API. System messages become the
 * top-level `system` string. Tool results become `tool_result` blocks inside
 * a user turn; consecutive user-side messages share one turn so roles alternate.
 */
export function encodeAnthropicMessages(history: readonly Message[]): {
  system: string;
  messages: Anthropic.MessageParam[];
} {
  const systemParts: string[] = [];
  const messages: Anthropic.MessageParam[] = [];

  const pushUserBlock = (block: Anthropic.ContentBlockParam): void => {
    const last = messages[messages.length - 1];
    if (last && last.role === 'user' && Array.isArray(last.content)) {
      last.content.push(block);
    } else {
      messages.push({ role: 'user', content: [block] });
    }
  };

  for (const message of history) {
    switch (message.role) {
      case 'system':
        if (message.content !== '') systemParts.push(message.content);
        break;
      case 'user':
        pushUserBlock({ type: 'text', text: message.content });
        break;
      case 'tool':
        pushUserBlock({
          type: 'tool_result',
          tool_use_id: message.toolCallId ?? '',
          content: message.content,
          ...(message.isError ? { is_error: true } : {}),
        });
        break;
      case 'assistant': {
        const blocks = encodeReasoning(message.reasoning ?? []);
        if (message.content !== '') blocks.push({ type: 'text', text: message.content });
        for (const call of message.toolCalls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: toolUseInput(call) });
        }
        if (blocks.length === 0) blocks.push({ type: 'text', text: '(empty)' });
        messages.push({ role: 'assistant', content: blocks });
        break;
      }
    }
  }
  return { system: systemParts.join('\n\n'), messages };
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function decodeToolUse(block: Record<string, unknown>): ToolCall {
  if (typeof block.id !== 'string' || typeof block.name !== 'string') {
    throw new ProviderError('invalid_response', 'anthropic returned a malformed tool_use block');
  }
  const input = block.input;
  if (isRecord(input)) {
    return { id: block.id, name: block.name, arguments: input };
  }
  return { id: block.id, name: block.name, arguments: {}, rawArguments: JSON.stringify(input) ?? '' };
}

/** Decode Messages API content blocks into a canonical assistant message. */
export function decodeAnthropicReply(reply: AnthropicReply): Message {
  const text: string[] = [];
  const toolCalls: ToolCall[] = [];
  const reasoning: ReasoningBlock[] = [];

  for (const block of reply.content) {
    if (!isRecord(block)) continue;
    switch (block.type) {
      case 'text':
        if (typeof block.text === 'string') text.push(block.text);
        break;
      case 'tool_use':
        toolCalls.push(decodeToolUse(block));
        break;
      case 'thinking':
        if (typeof block.thinking === 'string') {
          reasoning.push({
            kind: 'thinking',
            text: block.thinking,
            ...(typeof block.signature === 'string' ? { signature: block.signature } : {}),
          });
        }
        break;
      case 'redacted_thinking':
        if (typeof block.data === 'string') reasoning.push({ kind: 'redacted', data: block.data });
        break;
    }
  }

  const message: Message = { role: 'assistant', content: text.join('') };
  if (toolCalls.length > 0) message.toolCalls = toolCalls;
  if (reasoning.length > 0) message.reasoning = reasoning;
  return message;
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

/** Adapter for the Anthropic Messages API. */
export class AnthropicAdapter implements ModelProtocolAdapter {
  readonly id = 'anthropic';
  readonly model: string;
  private readonly create: AnthropicCreate;
  private readonly maxTokens: number;
  private readonly temperature?: number;
  private readonly thinkingBudgetTokens?: number;

  constructor(options: AnthropicAdapterOptions) {
    this.model = options.model;
    this.create = options.create;
    this.maxTokens = options.maxTokens;
    this.temperature = options.temperature;
    this.thinkingBudgetTokens = options.thinkingBudgetTokens;
  }

  async send(
    history: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ModelRequestOptions = {},
  ): Promise<Message> {
    const body = this.buildRequest(history, tools);
    let reply: AnthropicReply;
    try {
      reply = await this.create(body, { signal: options.signal });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      throw toProviderError(err, this.id, (e) => e instanceof Anthropic.APIConnectionError);
    }
    return decodeAnthropicReply(reply);
  }

  buildRequest(history: readonly Message[], tools: readonly ToolDefinition[]): MessagesRequest {
    const { system, messages } = encodeAnthropicMessages(history);
    const body: MessagesRequest = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages,
    };
    if (system !== '') body.system = system;
    if (tools.length > 0) body.tools = encodeAnthropicTools(tools);
    if (this.thinkingBudgetTokens !== undefined) {
      // Extended thinking rejects a custom temperature.
      body.thinking = { type: 'enabled', budget_tokens: this.thinkingBudgetTokens };
    } else if (this.temperature !== undefined) {
      body.temperature = this.temperature;
    }
    return body;
  }
}
