import { randomUUID } from 'node:crypto';

export function generateId(): string {
  return randomUUID();
}

/** Type guard: checks that a value is a non-null, non-array object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Cut `text` to `maxChars`, noting how much was dropped. */
export function truncate(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  return (
    text.slice(0, maxChars) +
    `\n[truncated: ${text.length.toLocaleString('en-US')} chars, showing first ${maxChars.toLocaleString('en-US')}]`
  );
}
