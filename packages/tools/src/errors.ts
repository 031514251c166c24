/** Thrown when registering a tool with a name that already exists. */
export class ToolConflictError extends Error {
  constructor(name: string) {
    super(`Tool already registered: ${name}`);
    this.name = 'ToolConflictError';
  }
}

/** Thrown when a registry view names a tool that is not registered. */
export class ToolNotFoundError extends Error {
  constructor(name: string) {
    super(`Tool not found: ${name}`);
    this.name = 'ToolNotFoundError';
  }
}

/** Thrown by the path guard when a path leaves the workspace root. */
export class PathEscapeError extends Error {
  constructor(rawPath: string) {
    super(`path escapes workspace: ${rawPath}`);
    this.name = 'PathEscapeError';
  }
}

/** Thrown when an MCP server connection fails. */
export class McpConnectionError extends Error {
  constructor(serverName: string, cause?: string) {
    super(`MCP connection failed for server "${serverName}"${cause ? `: ${cause}` : ''}`);
    this.name = 'McpConnectionError';
  }
}
