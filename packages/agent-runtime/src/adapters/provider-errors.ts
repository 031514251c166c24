import type { ProviderErrorKind } from '@toolpilot/core';
import { ProviderError, errorMessage, isRecord } from '@toolpilot/core';

/** Map an HTTP status from a provider API to an error kind. */
export function kindForStatus(status: number): ProviderErrorKind {
  if (status === 401 || status === 403) return 'auth';
  if (status === 429) return 'rate_limit';
  if (status === 408 || status === 409 || status >= 500) return 'network';
  return 'invalid_response';
}

function readStatus(err: unknown): number | undefined {
  return isRecord(err) && typeof err.status === 'number' ? err.status : undefined;
}

/** Parse `retry-after-ms` or `retry-after` (seconds or HTTP date) from SDK error headers. */
export function readRetryAfterMs(err: unknown, nowMs = Date.now()): number | undefined {
  if (!isRecord(err) || !isRecord(err.headers)) return undefined;
  const headers = err.headers;

  const ms = headers['retry-after-ms'];
  if (typeof ms === 'string' && ms.trim() !== '' && Number.isFinite(Number(ms))) {
    return Math.max(0, Number(ms));
  }
  const after = headers['retry-after'];
  if (typeof after !== 'string' || after.trim() === '') return undefined;
  const seconds = Number(after);
  if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
  const date = Date.parse(after);
  return Number.isNaN(date) ? undefined : Math.max(0, date - nowMs);
}

/**
 * Normalize a failure from a provider SDK into a ProviderError.
 * `isConnectionError` recognizes the SDK's transport failures, which carry no status.
 */
export function toProviderError(
  err: unknown,
  provider: string,
  isConnectionError: (err: unknown) => boolean,
): ProviderError {
  if (err instanceof ProviderError) return err;

  const status = readStatus(err);
  if (status !== undefined) {
    const kind = kindForStatus(status);
    return new ProviderError(kind, `${provider} request failed (${status}): ${errorMessage(err)}`, {
      status,
      retryAfterMs: kind === 'rate_limit' ? readRetryAfterMs(err) : undefined,
      cause: err,
    });
  }
  if (isConnectionError(err)) {
    return new ProviderError('network', `${provider} connection failed: ${errorMessage(err)}`, { cause: err });
  }
  return new ProviderError('invalid_response', `${provider} request failed: ${errorMessage(err)}`, { cause: err });
}
