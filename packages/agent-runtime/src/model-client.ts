import { DelegateBackoff, handleWhen, retry, type IRetryBackoffContext } from 'cockatiel';
import type {
  Logger,
  Message,
  ModelProtocolAdapter,
  ModelRequestOptions,
  ToolDefinition,
} from '@toolpilot/core';
import { ProviderError, errorMessage, noopLogger } from '@toolpilot/core';

export interface ModelClientOptions {
  /** Retries after the first attempt, for `network` and `rate_limit` failures only. */
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  logger?: Logger;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_INITIAL_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 8_000;

/** True for ProviderErrors worth retrying. */
export function isRetryableProviderError(err: unknown): boolean {
  return err instanceof ProviderError && err.retryable;
}

/**
 * Wraps an adapter with bounded exponential backoff. A `retry-after` hint
 * from a rate limit response replaces the computed delay, capped at
 * `maxDelayMs`. `auth` and `invalid_response` failures propagate at once.
 */
export class ModelClient implements ModelProtocolAdapter {
  private readonly maxRetries: number;
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly adapter: ModelProtocolAdapter,
    options: ModelClientOptions = {},
  ) {
    this.maxRetries = Math.max(0, options.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.initialDelayMs = options.initialDelayMs ?? DEFAULT_INITIAL_DELAY_MS;
    this.maxDelayMs = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
    this.logger = options.logger ?? noopLogger;
  }

  get id(): string {
    return this.adapter.id;
  }

  get model(): string {
    return this.adapter.model;
  }

  /** Delay before retry number `attempt` (1-based). */
  delayFor(attempt: number, error: unknown): number {
    if (error instanceof ProviderError && error.retryAfterMs !== undefined) {
      return Math.min(error.retryAfterMs, this.maxDelayMs);
    }
    return Math.min(this.initialDelayMs * 2 ** Math.max(0, attempt - 1), this.maxDelayMs);
  }

  async send(
    history: readonly Message[],
    tools: readonly ToolDefinition[],
    options: ModelRequestOptions = {},
  ): Promise<Message> {
    const policy = retry(handleWhen(isRetryableProviderError), {
      maxAttempts: this.maxRetries,
      backoff: new DelegateBackoff<IRetryBackoffContext<unknown>>((context) =>
        this.delayFor(context.attempt, 'error' in context.result ? context.result.error : undefined),
      ),
    });
    let retries = 0;
    const listener = policy.onRetry((event) => {
      retries += 1;
      const reason = 'error' in event ? errorMessage(event.error) : 'unexpected result';
      this.logger.warn(`Model call to ${this.adapter.id} failed (${reason}); retry ${retries} in ${event.delay}ms`);
    });

    try {
      return await policy.execute(() => this.adapter.send(history, tools, options), options.signal);
    } finally {
      listener.dispose();
    }
  }
}
