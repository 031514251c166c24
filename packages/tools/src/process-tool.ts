import { spawn } from 'node:child_process';
import { resolve } from 'node:path';
import type { Logger, ProcessToolConfig, ToolHandler, ToolSpec } from '@toolpilot/core';
import { isRecord, noopLogger } from '@toolpilot/core';
import { ToolConflictError } from './errors.js';
import { sanitizeToolName } from './naming.js';
import type { ToolRegistry } from './registry.js';

const DEFAULT_TIMEOUT_SEC = 120;
const ERROR_PREVIEW_CHARS = 500;

interface ProcessOutput {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

function runProcess(
  config: ProcessToolConfig,
  cwd: string,
  input: string,
  signal: AbortSignal,
  logger: Logger,
): Promise<ProcessOutput> {
  return new Promise<ProcessOutput>((resolvePromise, reject) => {
    const [file, ...argv] = config.argv ?? [];
    const child =
      file !== undefined
        ? spawn(file, argv, { cwd, signal })
        : spawn(config.command ?? '', { cwd, signal, shell: true });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });
    // A process that exits without reading stdin makes the write fail with EPIPE.
    child.stdin.on('error', (err) => {
      logger.debug(`Process tool ${config.name}: stdin closed early: ${err.message}`);
    });
    child.on('error', reject);
    child.on('close', (exitCode) => {
      resolvePromise({ exitCode, stdout, stderr });
    });

    child.stdin.end(input);
  });
}

/**
 * Interpret the single JSON payload a process tool prints. A string is the
 * output; an object with `output` uses that field; an object with `error`
 * is a failure; anything else is shown as JSON.
 */
export function interpretProcessOutput(label: string, stdout: string): unknown {
  const text = stdout.trim();
  if (!text) {
    return { error: `${label} produced no output (expected a JSON payload)` };
  }
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch {
    return { error: `${label} returned malformed output (expected JSON): ${text.slice(0, ERROR_PREVIEW_CHARS)}` };
  }
  if (typeof payload === 'string') return payload;
  if (isRecord(payload)) {
    if (typeof payload.error === 'string') return { error: `${label} failed: ${payload.error}` };
    if (typeof payload.output === 'string') return payload.output;
  }
  return JSON.stringify(payload, null, 2);
}

function createProcessHandler(config: ProcessToolConfig, cwd: string): ToolHandler {
  const label = `plugin \`${config.plugin}\` tool \`${config.name}\``;
  return async (args, ctx) => {
    const result = await runProcess(config, cwd, JSON.stringify(args), ctx.signal, ctx.logger);
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim() || result.stdout.trim() || `exit_code=${String(result.exitCode)}`;
      return { error: `${label} failed: ${detail.slice(0, ERROR_PREVIEW_CHARS)}` };
    }
    return interpretProcessOutput(label, result.stdout);
  };
}

/** Build the registry spec for one external process tool. */
export function createProcessToolSpec(config: ProcessToolConfig, baseDir: string): ToolSpec {
  const name = `${sanitizeToolName(config.plugin, 'plugin')}__${sanitizeToolName(config.name)}`;
  const description = config.description?.trim() || `Plugin tool \`${config.name}\``;
  return {
    name,
    description: `[plugin:${config.plugin}] ${description}`,
    inputSchema: config.parameters ?? { type: 'object', properties: {} },
    mutating: config.mutating ?? false,
    timeoutMs: (config.timeoutSec ?? DEFAULT_TIMEOUT_SEC) * 1000,
    handler: createProcessHandler(config, resolve(baseDir, config.cwd ?? '.')),
  };
}

export interface ProcessToolLoadResult {
  toolNames: string[];
  errors: string[];
}

/**
 * Register configured process tools. Name collisions are reported in
 * `errors` and the later tool is skipped.
 */
export function registerProcessTools(
  registry: ToolRegistry,
  configs: readonly ProcessToolConfig[],
  options: { baseDir: string; logger?: Logger },
): ProcessToolLoadResult {
  const logger = options.logger ?? noopLogger;
  const result: ProcessToolLoadResult = { toolNames: [], errors: [] };
  for (const config of configs) {
    const spec = createProcessToolSpec(config, options.baseDir);
    try {
      registry.register(spec, 'plugin');
    } catch (err) {
      if (!(err instanceof ToolConflictError)) throw err;
      result.errors.push(`duplicate plugin tool ignored: ${spec.name}`);
      logger.warn(`Process tool ${spec.name} skipped: name already registered`);
      continue;
    }
    result.toolNames.push(spec.name);
  }
  return result;
}
