import OpenAI from 'openai';
import type {
  Message,
  ModelProtocolAdapter,
  ModelRequestOptions,
  ReasoningBlock,
  ToolCall,
  ToolDefinition,
} from '@toolpilot/core';
import { ProviderError, decodeToolArguments, encodeToolArguments, generateId, isRecord } from '@toolpilot/core';
import { toProviderError } from './provider-errors.js';

type ChatMessageParam = OpenAI.Chat.ChatCompletionMessageParam;
type ChatRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

/** The part of a chat completion the adapter reads. */
export interface ChatCompletionReply {
  choices: ReadonlyArray<{ message: unknown }>;
}

/** Sends one chat completion request. The real client or a test fake. */
export type ChatCompletionCreate = (
  body: ChatRequest,
  options: { signal?: AbortSignal },
) => Promise<ChatCompletionReply>;

export interface OpenAIAdapterOptions {
  model: string;
  create: ChatCompletionCreate;
  temperature?: number;
  maxTokens?: number;
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function encodeOpenAITools(tools: readonly ToolDefinition[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map((tool): OpenAI.Chat.ChatCompletionTool => ({
    type: 'function',
    function: {
      name: tool.name,
      description: tool.description,
      parameters: tool.inputSchema,
    },
  }));
}

function reasoningText(reasoning: readonly ReasoningBlock[] | undefined): string {
  if (!reasoning) return '';
  return reasoning
    .map((block) => (block.kind === 'thinking' ? block.text : ''))
    .filter((text) => text !== '')
    .join('\n');
}

/**
 * Encode canonical history as chat messages. Tool results are `tool` role
 * messages carrying `tool_call_id`. With `echoReasoning`, assistant
 * reasoning travels back as `reasoning_content`.
 */
export function encodeOpenAIMessages(
  history: readonly Message[],
  options: { echoReasoning?: boolean } = {},
): ChatMessageParam[] {
  const encoded: ChatMessageParam[] = [];
  for (const message of history) {
    switch (message.role) {
      case 'system':
        encoded.push({ role: 'system', content: message.content });
        break;
      case 'user':
        encoded.push({ role: 'user', content: message.content });
        break;
      case 'tool':
        encoded.push({ role: 'tool', tool_call_id: message.toolCallId ?? '', content: message.content });
        break;
      case 'assistant': {
        const calls = message.toolCalls ?? [];
        const param: OpenAI.Chat.ChatCompletionAssistantMessageParam & { reasoning_content?: string } = {
          role: 'assistant',
          content: message.content !== '' || calls.length === 0 ? message.content : null,
        };
        if (calls.length > 0) {
          param.tool_calls = calls.map((call) => ({
            id: call.id,
            type: 'function',
            function: { name: call.name, arguments: encodeToolArguments(call) },
          }));
        }
        const reasoning = reasoningText(message.reasoning);
        if (options.echoReasoning && reasoning !== '') {
          param.reasoning_content = reasoning;
        }
        encoded.push(param);
        break;
      }
    }
  }
  return encoded;
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

function decodeToolCall(raw: unknown, provider: string): ToolCall {
  if (!isRecord(raw) || !isRecord(raw.function) || typeof raw.function.name !== 'string') {
    throw new ProviderError('invalid_response', `${provider} returned a malformed tool call`);
  }
  const args = typeof raw.function.arguments === 'string' ? raw.function.arguments : '';
  return {
    id: typeof raw.id === 'string' && raw.id !== '' ? raw.id : `call_${generateId()}`,
    name: raw.function.name,
    ...decodeToolArguments(args),
  };
}

/** Decode the first choice of a chat completion into a canonical assistant message. */
export function decodeOpenAIReply(reply: ChatCompletionReply, provider = 'openai'): Message {
  const choice = reply.choices[0];
  if (!choice || !isRecord(choice.message)) {
    throw new ProviderError('invalid_response', `${provider} returned no choices`);
  }
  const message = choice.message;

  const result: Message = {
    role: 'assistant',
    content: typeof message.content === 'string' ? message.content : '',
  };
  if (Array.isArray(message.tool_calls) && message.tool_calls.length > 0) {
    result.toolCalls = message.tool_calls.map((raw: unknown) => decodeToolCall(raw, provider));
  }
  const reasoning = message.reasoning_content;
  if (typeof reasoning === 'string' && reasoning.trim() !== '') {
    result.reasoning = [{ kind: 'thinking', text: reasoning }];
  }
  return result;
}

// ---------------------------------------------------------------------------
// Adapter
// ---------------------------------------------------------------------------

/** Adapter for the OpenAI Chat Completions API. */
export class OpenAIAdapter implements ModelProtocolAdapter {
  readonly id: string = 'openai';
  readonly model: string;
  protected readonly create: ChatCompletionCreate;
  protected readonly temperature?: number;
  protected readonly maxTokens?: number;

  constructor(options: OpenAIAdapterOptions) {
    this.model = options.model;
    this.create = options.create;
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  async send(
    history: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ModelRequestOptions = {},
  ): Promise<Message> {
    const body = this.buildRequest(history, tools);
    let reply: ChatCompletionReply;
    try {
      reply = await this.create(body, { signal: options.signal });
    } catch (err) {
      if (options.signal?.aborted) throw err;
      throw toProviderError(err, this.id, (e) => e instanceof OpenAI.APIConnectionError);
    }
    return decodeOpenAIReply(reply, this.id);
  }

  buildRequest(history: readonly Message[], tools: readonly ToolDefinition[]): ChatRequest {
    const body: ChatRequest = {
      model: this.model,
      messages: encodeOpenAIMessages(history, { echoReasoning: this.echoesReasoning() }),
    };
    if (tools.length > 0) {
      body.tools = encodeOpenAITools(tools);
      body.tool_choice = 'auto';
    }
    if (this.temperature !== undefined) body.temperature = this.temperature;
    this.applyMaxTokens(body);
    return body;
  }

  protected echoesReasoning(): boolean {
    return false;
  }

  protected applyMaxTokens(body: ChatRequest): void {
    if (this.maxTokens !== undefined) body.max_completion_tokens = this.maxTokens;
  }
}

/**
 * Adapter for servers that speak the Chat Completions dialect (vLLM,
 * Ollama, Moonshot and similar). Sends `max_tokens` and echoes
 * `reasoning_content` back to thinking models.
 */
export class OpenAICompatibleAdapter extends OpenAIAdapter {
  override readonly id: string = 'openai-compatible';

  protected override echoesReasoning(): boolean {
    return true;
  }

  protected override applyMaxTokens(body: ChatRequest): void {
    if (this.maxTokens !== undefined) body.max_tokens = this.maxTokens;
  }
}
