import type {
  ToolDefinition,
  ToolRegistryEntry,
  ToolSource,
  ToolSpec,
} from '@toolpilot/core';
import { ToolConflictError, ToolNotFoundError } from './errors.js';

/**
 * Central in-memory tool registry.
 * Single source of truth for all tool registrations (builtin, plugin, MCP, orchestration).
 */
export class ToolRegistry {
  private readonly entries = new Map<string, ToolRegistryEntry>();

  /** Register a tool. Throws ToolConflictError on duplicate name. */
  register(spec: ToolSpec, source: ToolSource, mcpServer?: string): void {
    if (this.entries.has(spec.name)) {
      throw new ToolConflictError(spec.name);
    }
    this.entries.set(spec.name, { spec, source, mcpServer });
  }

  /** Remove a tool by name. Returns true if it existed. */
  unregister(name: string): boolean {
    return this.entries.delete(name);
  }

  /** Get a registry entry by name, or undefined. */
  get(name: string): ToolRegistryEntry | undefined {
    return this.entries.get(name);
  }

  /** Check if a tool is registered. */
  has(name: string): boolean {
    return this.entries.has(name);
  }

  /** Get all registry entries, sorted by name. */
  getAll(): ToolRegistryEntry[] {
    return [...this.entries.values()].sort((a, b) => a.spec.name.localeCompare(b.spec.name));
  }

  /** Get entries filtered by source. */
  getBySource(source: ToolSource): ToolRegistryEntry[] {
    return this.getAll().filter((e) => e.source === source);
  }

  /** Tool names, sorted. */
  names(): string[] {
    return this.getAll().map((e) => e.spec.name);
  }

  /** Get ToolDefinition[] for the model, without handlers or safety metadata. */
  getDefinitions(): ToolDefinition[] {
    return this.getAll().map(({ spec }) => ({
      name: spec.name,
      description: spec.description,
      inputSchema: spec.inputSchema,
    }));
  }

  /**
   * A new registry holding only `names`. Throws ToolNotFoundError on the
   * first name that is not registered here.
   */
  view(names: readonly string[]): ToolRegistry {
    const restricted = new ToolRegistry();
    for (const name of names) {
      const entry = this.entries.get(name);
      if (!entry) {
        throw new ToolNotFoundError(name);
      }
      restricted.register(entry.spec, entry.source, entry.mcpServer);
    }
    return restricted;
  }

  /** Number of registered tools. */
  get size(): number {
    return this.entries.size;
  }
}
