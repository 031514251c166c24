import type { Logger, McpServerConfig, ToolHandler, ToolSpec } from '@toolpilot/core';
import { errorMessage, isRecord, noopLogger } from '@toolpilot/core';
import { ToolConflictError } from '../errors.js';
import { sanitizeToolName } from '../naming.js';
import type { ToolRegistry } from '../registry.js';
import {
  connectStdio,
  type McpCallResult,
  type McpConnection,
  type McpConnector,
  type McpToolInfo,
} from './connection.js';

const DEFAULT_TIMEOUT_SEC = 30;

export interface McpLoadResult {
  toolNames: string[];
  errors: string[];
}

/** Render MCP content blocks as text; non-text blocks become JSON. */
export function renderMcpContent(result: McpCallResult): string {
  const chunks: string[] = [];
  for (const item of result.content) {
    if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') {
      if (item.text) chunks.push(item.text);
      continue;
    }
    chunks.push(JSON.stringify(item));
  }
  return chunks
    .filter((part) => part.trim() !== '')
    .join('\n')
    .trim();
}

/**
 * Connects configured MCP servers, registers each of their tools as
 * `mcp__<server>__<tool>`, and routes calls back to the owning server.
 * Servers that fail to start are reported in the load result.
 */
export class McpBridge {
  private readonly connections = new Map<string, McpConnection>();
  private readonly connector: McpConnector;
  private readonly logger: Logger;

  constructor(
    private readonly registry: ToolRegistry,
    options: { connector?: McpConnector; logger?: Logger } = {},
  ) {
    this.connector = options.connector ?? connectStdio;
    this.logger = options.logger ?? noopLogger;
  }

  /** Connect every server, discover tools, and register them. */
  async connectAll(servers: readonly McpServerConfig[]): Promise<McpLoadResult> {
    const result: McpLoadResult = { toolNames: [], errors: [] };
    const seen = new Set<string>();

    for (const server of servers) {
      if (seen.has(server.name)) {
        result.errors.push(`duplicate MCP server ignored: ${server.name}`);
        continue;
      }
      seen.add(server.name);

      let connection: McpConnection;
      try {
        connection = await this.connector(server);
        this.connections.set(server.name, connection);
        const tools = await connection.listTools();
        for (const tool of tools) {
          const registered = this.registerTool(server, connection, tool, result);
          if (registered) result.toolNames.push(registered);
        }
        this.logger.info(`MCP server ${server.name}: ${tools.length} tool(s)`);
      } catch (err) {
        result.errors.push(`MCP server \`${server.name}\` unavailable: ${errorMessage(err)}`);
        this.logger.warn(`MCP server ${server.name} unavailable: ${errorMessage(err)}`);
      }
    }
    return result;
  }

  /** Disconnect all MCP servers and unregister their tools. */
  async disconnectAll(): Promise<void> {
    for (const entry of this.registry.getBySource('mcp')) {
      this.registry.unregister(entry.spec.name);
    }
    const connections = [...this.connections.values()];
    this.connections.clear();
    const results = await Promise.allSettled(connections.map((c) => c.close()));
    for (const outcome of results) {
      if (outcome.status === 'rejected') {
        this.logger.warn(`MCP disconnect failed: ${errorMessage(outcome.reason)}`);
      }
    }
  }

  private registerTool(
    server: McpServerConfig,
    connection: McpConnection,
    tool: McpToolInfo,
    result: McpLoadResult,
  ): string | undefined {
    const toolName = tool.name.trim();
    if (!toolName) return undefined;

    const name = `mcp__${sanitizeToolName(server.name)}__${sanitizeToolName(toolName)}`;
    const timeoutMs = (server.timeoutSec ?? DEFAULT_TIMEOUT_SEC) * 1000;
    const label = `MCP \`${server.name}/${toolName}\``;

    const handler: ToolHandler = async (args, ctx) => {
      const called = await connection.callTool(toolName, args, { signal: ctx.signal, timeoutMs });
      const rendered = renderMcpContent(called) || `${label} returned empty result.`;
      return called.isError ? { error: `${label} failed: ${rendered}` } : rendered;
    };

    const spec: ToolSpec = {
      name,
      description: tool.description.trim() || `[mcp:${server.name}] call MCP tool \`${toolName}\``,
      inputSchema: tool.inputSchema.type === 'object' ? tool.inputSchema : { type: 'object', properties: {} },
      mutating: !tool.readOnly,
      timeoutMs,
      handler,
    };

    try {
      this.registry.register(spec, 'mcp', server.name);
    } catch (err) {
      if (!(err instanceof ToolConflictError)) throw err;
      result.errors.push(`duplicate MCP tool ignored: ${name}`);
      return undefined;
    }
    return name;
  }
}
