import { describe, it, expect } from 'vitest';
import {
  decodeToolArguments,
  encodeToolArguments,
  ProviderError,
  truncate,
  isRecord,
} from '../src/index.js';

describe('tool call arguments', () => {
  it('decodes a JSON object', () => {
    expect(decodeToolArguments('{"path":"src/a.ts","limit":3}')).toEqual({
      arguments: { path: 'src/a.ts', limit: 3 },
    });
  });

  it('treats an empty string as no arguments', () => {
    expect(decodeToolArguments('  ')).toEqual({ arguments: {} });
  });

  it('keeps undecodable text verbatim', () => {
    expect(decodeToolArguments('{"path": ')).toEqual({ arguments: {}, rawArguments: '{"path": ' });
  });

  it('keeps non-object JSON verbatim', () => {
    expect(decodeToolArguments('[1,2]')).toEqual({ arguments: {}, rawArguments: '[1,2]' });
  });

  it('re-encodes raw text unchanged', () => {
    expect(encodeToolArguments({ id: 'c1', name: 'x', arguments: {}, rawArguments: 'oops' })).toBe('oops');
    expect(encodeToolArguments({ id: 'c1', name: 'x', arguments: { a: 1 } })).toBe('{"a":1}');
  });
});

describe('ProviderError', () => {
  it('marks only network and rate limit failures as retryable', () => {
    expect(new ProviderError('network', 'down').retryable).toBe(true);
    expect(new ProviderError('rate_limit', 'slow', { retryAfterMs: 2000 }).retryable).toBe(true);
    expect(new ProviderError('auth', 'bad key', { status: 401 }).retryable).toBe(false);
    expect(new ProviderError('invalid_response', 'junk').retryable).toBe(false);
  });

  it('keeps status and retry hints', () => {
    const err = new ProviderError('rate_limit', 'slow', { status: 429, retryAfterMs: 1500 });
    expect(err.name).toBe('ProviderError');
    expect(err.status).toBe(429);
    expect(err.retryAfterMs).toBe(1500);
  });
});

describe('utils', () => {
  it('truncates long text with a notice', () => {
    expect(truncate('abcdef', 4)).toBe('abcd\n[truncated: 6 chars, showing first 4]');
    expect(truncate('abc', 4)).toBe('abc');
  });

  it('formats large counts with separators', () => {
    expect(truncate('x'.repeat(1200), 1000).endsWith('[truncated: 1,200 chars, showing first 1,000]')).toBe(true);
  });

  it('recognises plain records', () => {
    expect(isRecord({})).toBe(true);
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
  });
});
