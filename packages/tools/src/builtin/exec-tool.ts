import { execFile } from 'node:child_process';
import type { ToolDefinition, ToolHandler } from '@toolpilot/core';
import { classifyCommandRisk } from './risk-classifier.js';

export const MAX_EXEC_TIMEOUT_SEC = 1800;
const DEFAULT_EXEC_TIMEOUT_SEC = 120;
const MAX_OUTPUT_CHARS = 6000;

export const execCommandToolDefinition: ToolDefinition = {
  name: 'exec_command',
  description:
    'Run a shell command and return its exit code and combined stdout/stderr. Mutating. ' +
    'Use it for tests, builds and git; prefer list_files, read_file and grep_files for exploring files.',
  inputSchema: {
    type: 'object',
    properties: {
      command: {
        type: 'string',
        description: 'The command to run with bash -c.',
      },
      timeout_sec: {
        type: 'integer',
        description: 'Timeout in seconds. Defaults to 120. Range: 1-1800.',
      },
      cwd: {
        type: 'string',
        description: 'Working directory, relative to the workspace root. Defaults to the root.',
      },
    },
    required: ['command'],
    additionalProperties: false,
  },
};

interface ShellResult {
  exitCode: number;
  output: string;
}

function runShell(
  command: string,
  options: { cwd: string; timeoutMs: number; signal: AbortSignal },
): Promise<ShellResult> {
  return new Promise<ShellResult>((resolve, reject) => {
    execFile(
      '/bin/bash',
      ['-c', command],
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        signal: options.signal,
        maxBuffer: 10 * 1024 * 1024, // 10 MB
      },
      (error, stdout, stderr) => {
        const combined = `${stdout}${stderr}`;
        if (!error) {
          resolve({ exitCode: 0, output: combined });
          return;
        }
        if (error.name === 'AbortError') {
          reject(error);
          return;
        }
        if (error.killed) {
          resolve({
            exitCode: 124,
            output: `${combined}\nProcess timed out after ${options.timeoutMs / 1000}s`,
          });
          return;
        }
        resolve({
          exitCode: typeof error.code === 'number' ? error.code : 1,
          output: combined || error.message,
        });
      },
    );
  });
}

export const execCommandHandler: ToolHandler = async (args, ctx) => {
  const command = args.command;
  if (typeof command !== 'string' || command.trim() === '') {
    return { error: 'command must be a non-empty string' };
  }

  const risk = classifyCommandRisk(command);
  if (risk.level === 'blocked') {
    return { error: `Command blocked: ${risk.reason}` };
  }

  const rawTimeout = typeof args.timeout_sec === 'number' ? Math.floor(args.timeout_sec) : DEFAULT_EXEC_TIMEOUT_SEC;
  const timeoutSec = Math.max(1, Math.min(rawTimeout, MAX_EXEC_TIMEOUT_SEC));
  const cwd =
    typeof args.cwd === 'string' && args.cwd !== '' ? await ctx.resolvePath(args.cwd) : ctx.workspaceRoot;

  ctx.logger.debug(`exec_command (${risk.level}): ${command}`);
  const result = await runShell(command, { cwd, timeoutMs: timeoutSec * 1000, signal: ctx.signal });

  let output = result.output.trim();
  if (output.length > MAX_OUTPUT_CHARS) {
    output = `${output.slice(0, MAX_OUTPUT_CHARS)}\n... (truncated)`;
  }
  return `exit_code=${result.exitCode}\n${output}`;
};

/** High-risk commands ask again even after exec_command was approved once. */
export function execNeedsConfirmation(args: Readonly<Record<string, unknown>>): string | undefined {
  const command = args.command;
  if (typeof command !== 'string') return undefined;
  const risk = classifyCommandRisk(command);
  return risk.level === 'confirm' ? `high-risk command: ${risk.reason}` : undefined;
}
