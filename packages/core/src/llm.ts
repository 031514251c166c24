import type { Message } from './messages.js';
import type { ToolDefinition } from './tools.js';

export type ProviderKind = 'openai' | 'anthropic' | 'openai-compatible';

export const PROVIDER_KINDS: readonly ProviderKind[] = ['openai', 'anthropic', 'openai-compatible'];

export type ProviderErrorKind = 'auth' | 'rate_limit' | 'network' | 'invalid_response';

/** Failure talking to a model provider. */
export class ProviderError extends Error {
  readonly status?: number;
  readonly retryAfterMs?: number;

  constructor(
    public readonly kind: ProviderErrorKind,
    message: string,
    options: { status?: number; retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(message);
    this.name = 'ProviderError';
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
    if (options.cause !== undefined) this.cause = options.cause;
  }

  get retryable(): boolean {
    return this.kind === 'network' || this.kind === 'rate_limit';
  }
}

export interface ModelRequestOptions {
  signal?: AbortSignal;
}

/**
 * Provider-agnostic model contract. Implementations translate canonical
 * history and tool definitions to one provider's wire shape and decode the
 * reply into the next assistant message.
 */
export interface ModelProtocolAdapter {
  readonly id: string;
  readonly model: string;
  send(
    history: readonly Message[],
    tools: readonly ToolDefinition[],
    options?: ModelRequestOptions,
  ): Promise<Message>;
}
