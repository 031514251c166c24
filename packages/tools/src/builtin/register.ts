import type { ToolSpec } from '@toolpilot/core';
import type { ToolRegistry } from '../registry.js';
import {
  execCommandHandler,
  execCommandToolDefinition,
  execNeedsConfirmation,
  MAX_EXEC_TIMEOUT_SEC,
} from './exec-tool.js';
import {
  grepFilesHandler,
  grepFilesToolDefinition,
  listFilesHandler,
  listFilesToolDefinition,
  readFileHandler,
  readFileToolDefinition,
  replaceInFileHandler,
  replaceInFileToolDefinition,
  writeFileHandler,
  writeFileToolDefinition,
} from './file-tools.js';
import { updatePlanHandler, updatePlanToolDefinition } from './plan-tool.js';

export interface RegisterBuiltinOptions {
  /** Gate timeout for file and plan tools. */
  defaultTimeoutMs?: number;
  /** Built-in tool names to leave out. */
  disabled?: readonly string[];
}

const DEFAULT_TIMEOUT_MS = 120_000;
/** exec_command enforces its own timeout; the gate only backs it up. */
const EXEC_GATE_GRACE_MS = 5_000;

/** Specs for all built-in tools, in registration order. */
export function createBuiltinToolSpecs(options: RegisterBuiltinOptions = {}): ToolSpec[] {
  const timeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  return [
    { ...listFilesToolDefinition, mutating: false, timeoutMs, pathArguments: ['path'], handler: listFilesHandler },
    { ...readFileToolDefinition, mutating: false, timeoutMs, pathArguments: ['path'], handler: readFileHandler },
    { ...grepFilesToolDefinition, mutating: false, timeoutMs, pathArguments: ['path'], handler: grepFilesHandler },
    { ...writeFileToolDefinition, mutating: true, timeoutMs, pathArguments: ['path'], handler: writeFileHandler },
    {
      ...replaceInFileToolDefinition,
      mutating: true,
      timeoutMs,
      pathArguments: ['path'],
      handler: replaceInFileHandler,
    },
    {
      ...execCommandToolDefinition,
      mutating: true,
      timeoutMs: MAX_EXEC_TIMEOUT_SEC * 1000 + EXEC_GATE_GRACE_MS,
      pathArguments: ['cwd'],
      needsConfirmation: execNeedsConfirmation,
      handler: execCommandHandler,
    },
    { ...updatePlanToolDefinition, mutating: false, timeoutMs, handler: updatePlanHandler },
  ];
}

/**
 * Register the built-in tools (list_files, read_file, grep_files, write_file,
 * replace_in_file, exec_command, update_plan) into the given registry.
 * Returns the names registered.
 */
export function registerBuiltinTools(
  registry: ToolRegistry,
  options: RegisterBuiltinOptions = {},
): string[] {
  const disabled = new Set(options.disabled ?? []);
  const names: string[] = [];
  for (const spec of createBuiltinToolSpecs(options)) {
    if (disabled.has(spec.name)) continue;
    registry.register(spec, 'builtin');
    names.push(spec.name);
  }
  return names;
}
