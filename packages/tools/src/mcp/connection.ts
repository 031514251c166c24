import type { JSONSchema, McpServerConfig } from '@toolpilot/core';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { getDefaultEnvironment, StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { McpConnectionError } from '../errors.js';

export interface McpToolInfo {
  name: string;
  description: string;
  inputSchema: JSONSchema;
  /** The server advertised `readOnlyHint`. */
  readOnly: boolean;
}

export interface McpCallResult {
  content: unknown[];
  isError: boolean;
}

export interface McpCallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

/** What the bridge needs from one MCP server. */
export interface McpConnection {
  readonly serverName: string;
  listTools(): Promise<McpToolInfo[]>;
  callTool(name: string, args: Record<string, unknown>, options?: McpCallOptions): Promise<McpCallResult>;
  close(): Promise<void>;
}

export type McpConnector = (config: McpServerConfig) => Promise<McpConnection>;

const DEFAULT_TIMEOUT_SEC = 30;

/**
 * Wraps a single stdio MCP server connection using the official MCP SDK.
 */
export class StdioMcpConnection implements McpConnection {
  private constructor(
    private readonly config: McpServerConfig,
    private readonly client: Client,
  ) {}

  /** Spawn the server and complete the MCP handshake. */
  static async connect(config: McpServerConfig): Promise<StdioMcpConnection> {
    const transport = new StdioClientTransport({
      command: config.command,
      args: config.args ?? [],
      env: config.env ? { ...getDefaultEnvironment(), ...config.env } : undefined,
    });
    const client = new Client({ name: 'toolpilot', version: '0.1.0' }, { capabilities: {} });
    try {
      await client.connect(transport, { timeout: (config.timeoutSec ?? DEFAULT_TIMEOUT_SEC) * 1000 });
    } catch (error) {
      await transport.close();
      throw new McpConnectionError(config.name, error instanceof Error ? error.message : String(error));
    }
    return new StdioMcpConnection(config, client);
  }

  get serverName(): string {
    return this.config.name;
  }

  /** Discover all tools exposed by this MCP server. */
  async listTools(): Promise<McpToolInfo[]> {
    const result = await this.client.listTools(undefined, {
      timeout: (this.config.timeoutSec ?? DEFAULT_TIMEOUT_SEC) * 1000,
    });
    return result.tools.map((t) => ({
      name: t.name,
      description: t.description ?? '',
      inputSchema: { ...t.inputSchema },
      readOnly: t.annotations?.readOnlyHint === true,
    }));
  }

  /** Invoke a tool on the MCP server. */
  async callTool(
    name: string,
    args: Record<string, unknown>,
    options: McpCallOptions = {},
  ): Promise<McpCallResult> {
    const result = await this.client.callTool({ name, arguments: args }, undefined, {
      signal: options.signal,
      timeout: options.timeoutMs ?? (this.config.timeoutSec ?? DEFAULT_TIMEOUT_SEC) * 1000,
    });
    const isError = 'isError' in result && result.isError === true;

    // The SDK can return either { content: [...] } or { toolResult: unknown }
    if ('content' in result && Array.isArray(result.content)) {
      return { content: result.content, isError };
    }
    if ('toolResult' in result) {
      return { content: [result.toolResult], isError };
    }
    return { content: [], isError };
  }

  /** Disconnect from the MCP server and release resources. */
  async close(): Promise<void> {
    await this.client.close();
  }
}

export const connectStdio: McpConnector = (config) => StdioMcpConnection.connect(config);
