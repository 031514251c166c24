import { isRecord } from './utils.js';

/** Role in a conversation message. */
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Model reasoning kept apart from the answer text. Anthropic signs its
 * thinking blocks; the signature must travel back unchanged.
 */
export type ReasoningBlock =
  | { kind: 'thinking'; text: string; signature?: string }
  | { kind: 'redacted'; data: string };

/** A single conversation message in canonical form. */
export interface Message {
  role: MessageRole;
  /** May be empty on assistant messages that carry tool calls. */
  content: string;
  /** Assistant messages only, in emission order. */
  toolCalls?: ToolCall[];
  /** Tool messages only: id of the call this message answers. */
  toolCallId?: string;
  /** Tool messages only. */
  isError?: boolean;
  /** Assistant messages only. Never part of `content`. */
  reasoning?: ReasoningBlock[];
}

export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  /**
   * Provider text kept verbatim when it did not decode to a JSON object.
   * `arguments` is then empty and the call fails schema validation.
   */
  readonly rawArguments?: string;
}

/** Decode a provider's JSON argument string into the canonical keyed map. */
export function decodeToolArguments(
  raw: string,
): Pick<ToolCall, 'arguments' | 'rawArguments'> {
  const text = raw.trim() === '' ? '{}' : raw;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return { arguments: {}, rawArguments: raw };
  }
  if (!isRecord(parsed)) {
    return { arguments: {}, rawArguments: raw };
  }
  return { arguments: parsed };
}

/** Encode canonical arguments back into a provider's JSON argument string. */
export function encodeToolArguments(call: ToolCall): string {
  return call.rawArguments ?? JSON.stringify(call.arguments);
}
