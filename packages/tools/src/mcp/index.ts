export {
  StdioMcpConnection,
  connectStdio,
  type McpConnection,
  type McpConnector,
  type McpToolInfo,
  type McpCallResult,
  type McpCallOptions,
} from './connection.js';
export { McpBridge, renderMcpContent, type McpLoadResult } from './bridge.js';
