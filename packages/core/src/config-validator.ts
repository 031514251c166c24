import JSON5 from 'json5';
import { readFileSync } from 'node:fs';
import type { SubagentProfile } from './agent.js';
import type {
  AgentConfig,
  McpServerConfig,
  ModelConfig,
  ProcessToolConfig,
  SandboxConfig,
  ToolpilotConfig,
  ToolsConfig,
} from './config.js';
import { applyEnvOverrides } from './config-env-overlay.js';
import { PROVIDER_KINDS } from './llm.js';
import { LOG_LEVELS } from './logger.js';
import { APPROVAL_POLICIES, SANDBOX_MODES } from './tools.js';
import { isRecord } from './utils.js';

/** Sections that must exist at the top level of the config. */
const REQUIRED_SECTIONS = ['model'] as const;

const SECTION_KEYS: Record<string, readonly string[]> = {
  '': ['model', 'agent', 'sandbox', 'tools', 'subagents', 'plugins', 'mcp', 'logLevel'],
  model: [
    'provider',
    'name',
    'baseUrl',
    'apiKeyEnv',
    'temperature',
    'maxTokens',
    'timeoutMs',
    'maxRetries',
    'thinkingBudgetTokens',
  ],
  agent: ['maxSteps', 'toolConcurrency', 'systemPrompt'],
  sandbox: ['mode', 'approvalPolicy', 'workspaceRoot'],
  tools: ['defaultTimeoutMs', 'disabled'],
  subagents: ['enabled', 'profiles'],
  plugins: ['tools'],
  mcp: ['servers'],
  profile: ['name', 'description', 'prompt', 'allowedTools', 'maxSteps', 'sandboxMode'],
  processTool: [
    'plugin',
    'name',
    'description',
    'parameters',
    'mutating',
    'timeoutSec',
    'argv',
    'command',
    'cwd',
  ],
  mcpServer: ['name', 'command', 'args', 'env', 'timeoutSec'],
};

export const DEFAULT_SUBAGENT_MAX_STEPS = 8;

export interface ConfigValidationError {
  path: string;
  message: string;
}

export interface ConfigValidationResult {
  valid: boolean;
  errors: ConfigValidationError[];
  config?: ToolpilotConfig;
}

/** Thrown by callers that need a config and got an invalid one. */
export class ConfigError extends Error {
  constructor(public readonly errors: ConfigValidationError[]) {
    super(`Invalid configuration: ${errors.map((e) => `${e.path || '<root>'}: ${e.message}`).join('; ')}`);
    this.name = 'ConfigError';
  }
}

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

class FieldReader {
  constructor(
    private readonly source: Record<string, unknown>,
    private readonly path: string,
    private readonly errors: ConfigValidationError[],
  ) {}

  at(key: string): string {
    return this.path ? `${this.path}.${key}` : key;
  }

  fail(key: string, message: string): undefined {
    this.errors.push({ path: this.at(key), message });
    return undefined;
  }

  checkKeys(allowed: readonly string[]): void {
    for (const key of Object.keys(this.source)) {
      if (!allowed.includes(key)) {
        this.fail(key, this.path ? `Unknown key: "${key}"` : `Unknown top-level key: "${key}"`);
      }
    }
  }

  string(key: string): string | undefined {
    const value = this.source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'string' || value.trim() === '') {
      return this.fail(key, 'must be a non-empty string');
    }
    return value;
  }

  number(key: string, opts: { min?: number; max?: number; integer?: boolean } = {}): number | undefined {
    const value = this.source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      return this.fail(key, 'must be a number');
    }
    if (opts.integer && !Number.isInteger(value)) return this.fail(key, 'must be an integer');
    if (opts.min !== undefined && value < opts.min) return this.fail(key, `must be >= ${opts.min}`);
    if (opts.max !== undefined && value > opts.max) return this.fail(key, `must be <= ${opts.max}`);
    return value;
  }

  boolean(key: string): boolean | undefined {
    const value = this.source[key];
    if (value === undefined) return undefined;
    if (typeof value !== 'boolean') return this.fail(key, 'must be a boolean');
    return value;
  }

  oneOf<T extends string>(key: string, allowed: readonly T[]): T | undefined {
    const value = this.source[key];
    if (value === undefined) return undefined;
    const match = allowed.find((candidate) => candidate === value);
    if (match === undefined) {
      return this.fail(key, `must be one of: ${allowed.join(', ')}`);
    }
    return match;
  }

  stringArray(key: string): string[] | undefined {
    const value = this.source[key];
    if (value === undefined) return undefined;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
      return this.fail(key, 'must be an array of strings');
    }
    return [...value];
  }

  stringMap(key: string): Record<string, string> | undefined {
    const value = this.source[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) return this.fail(key, 'must be an object of strings');
    const result: Record<string, string> = {};
    for (const [name, entry] of Object.entries(value)) {
      if (typeof entry !== 'string') return this.fail(`${key}.${name}`, 'must be a string');
      result[name] = entry;
    }
    return result;
  }

  object(key: string): Record<string, unknown> | undefined {
    const value = this.source[key];
    if (value === undefined) return undefined;
    if (!isRecord(value)) return this.fail(key, 'must be an object');
    return value;
  }

  section(key: string): FieldReader {
    const value = this.source[key];
    const child = this.at(key);
    if (value !== undefined && !isRecord(value)) {
      this.fail(key, `Section "${key}" must be an object`);
    }
    const reader = new FieldReader(isRecord(value) ? value : {}, child, this.errors);
    const allowed = SECTION_KEYS[key];
    if (allowed) reader.checkKeys(allowed);
    return reader;
  }

  /** Read an array of objects, applying `read` to each element. */
  list<T>(key: string, kind: string, read: (item: FieldReader) => T | undefined): T[] {
    const value = this.source[key];
    if (value === undefined) return [];
    if (!Array.isArray(value)) {
      this.fail(key, 'must be an array');
      return [];
    }
    const result: T[] = [];
    value.forEach((item: unknown, index) => {
      const itemPath = `${this.at(key)}[${index}]`;
      if (!isRecord(item)) {
        this.errors.push({ path: itemPath, message: 'must be an object' });
        return;
      }
      const reader = new FieldReader(item, itemPath, this.errors);
      reader.checkKeys(SECTION_KEYS[kind] ?? []);
      const parsed = read(reader);
      if (parsed !== undefined) result.push(parsed);
    });
    return result;
  }
}

// ---------------------------------------------------------------------------
// Section builders
// ---------------------------------------------------------------------------

function readModel(r: FieldReader): ModelConfig | undefined {
  const provider = r.oneOf('provider', PROVIDER_KINDS);
  const name = r.string('name');
  if (provider === undefined) r.fail('provider', 'is required');
  if (name === undefined) r.fail('name', 'is required');
  const config: ModelConfig = {
    provider: provider ?? 'openai',
    name: name ?? '',
    baseUrl: r.string('baseUrl'),
    apiKeyEnv: r.string('apiKeyEnv'),
    temperature: r.number('temperature', { min: 0, max: 2 }),
    maxTokens: r.number('maxTokens', { min: 1, integer: true }) ?? 4096,
    timeoutMs: r.number('timeoutMs', { min: 1, integer: true }) ?? 120_000,
    maxRetries: r.number('maxRetries', { min: 0, integer: true }) ?? 3,
    thinkingBudgetTokens: r.number('thinkingBudgetTokens', { min: 1024, integer: true }),
  };
  return provider && name ? config : undefined;
}

function readAgent(r: FieldReader): AgentConfig {
  return {
    maxSteps: r.number('maxSteps', { min: 1, integer: true }) ?? 20,
    toolConcurrency: r.number('toolConcurrency', { min: 1, integer: true }) ?? 4,
    systemPrompt: r.string('systemPrompt'),
  };
}

function readSandbox(r: FieldReader): SandboxConfig {
  return {
    mode: r.oneOf('mode', SANDBOX_MODES) ?? 'workspace-write',
    approvalPolicy: r.oneOf('approvalPolicy', APPROVAL_POLICIES) ?? 'on-request',
    workspaceRoot: r.string('workspaceRoot') ?? '.',
  };
}

function readTools(r: FieldReader): ToolsConfig {
  return {
    defaultTimeoutMs: r.number('defaultTimeoutMs', { min: 1, integer: true }) ?? 120_000,
    disabled: r.stringArray('disabled') ?? [],
  };
}

function readProfile(r: FieldReader): SubagentProfile | undefined {
  const name = r.string('name') ?? r.fail('name', 'is required');
  const prompt = r.string('prompt') ?? r.fail('prompt', 'is required');
  const allowedTools = r.stringArray('allowedTools') ?? r.fail('allowedTools', 'is required');
  const maxSteps = r.number('maxSteps', { min: 1, integer: true }) ?? DEFAULT_SUBAGENT_MAX_STEPS;
  const sandboxMode = r.oneOf('sandboxMode', SANDBOX_MODES);
  const description = r.string('description') ?? '';
  if (name === undefined || prompt === undefined || allowedTools === undefined) return undefined;
  return { name, description, prompt, allowedTools, maxSteps, sandboxMode };
}

function readProcessTool(r: FieldReader): ProcessToolConfig | undefined {
  const plugin = r.string('plugin') ?? r.fail('plugin', 'is required');
  const name = r.string('name') ?? r.fail('name', 'is required');
  const argv = r.stringArray('argv');
  const command = r.string('command');
  if (argv === undefined && command === undefined) {
    r.fail('command', 'either "command" or "argv" is required');
  } else if (argv !== undefined && command !== undefined) {
    r.fail('command', 'cannot combine "command" and "argv"');
  } else if (argv !== undefined && argv.length === 0) {
    r.fail('argv', 'must not be empty');
  }
  const tool: ProcessToolConfig = {
    plugin: plugin ?? '',
    name: name ?? '',
    description: r.string('description'),
    parameters: r.object('parameters'),
    mutating: r.boolean('mutating'),
    timeoutSec: r.number('timeoutSec', { min: 1, max: 1800, integer: true }),
    argv,
    command,
    cwd: r.string('cwd'),
  };
  return plugin && name ? tool : undefined;
}

function readMcpServer(r: FieldReader): McpServerConfig | undefined {
  const name = r.string('name') ?? r.fail('name', 'is required');
  const command = r.string('command') ?? r.fail('command', 'is required');
  const server: McpServerConfig = {
    name: name ?? '',
    command: command ?? '',
    args: r.stringArray('args'),
    env: r.stringMap('env'),
    timeoutSec: r.number('timeoutSec', { min: 5, max: 300, integer: true }),
  };
  return name && command ? server : undefined;
}

/** Validate an already-parsed config value and fill in defaults. */
export function validateConfigObject(parsed: unknown): ConfigValidationResult {
  if (!isRecord(parsed)) {
    return {
      valid: false,
      errors: [{ path: '', message: 'Config must be an object' }],
    };
  }

  const errors: ConfigValidationError[] = [];
  const root = new FieldReader(parsed, '', errors);
  root.checkKeys(SECTION_KEYS[''] ?? []);

  for (const section of REQUIRED_SECTIONS) {
    if (!(section in parsed)) {
      errors.push({ path: section, message: `Missing required section: "${section}"` });
    }
  }

  const model = readModel(root.section('model'));
  const agent = readAgent(root.section('agent'));
  const sandbox = readSandbox(root.section('sandbox'));
  const tools = readTools(root.section('tools'));
  const subagentsReader = root.section('subagents');
  const subagents = {
    enabled: subagentsReader.boolean('enabled') ?? true,
    profiles: subagentsReader.list('profiles', 'profile', readProfile),
  };
  const plugins = { tools: root.section('plugins').list('tools', 'processTool', readProcessTool) };
  const mcp = { servers: root.section('mcp').list('servers', 'mcpServer', readMcpServer) };
  const logLevel = root.oneOf('logLevel', LOG_LEVELS) ?? 'info';

  if (errors.length > 0 || model === undefined) {
    return { valid: false, errors };
  }

  return {
    valid: true,
    errors,
    config: { model, agent, sandbox, tools, subagents, plugins, mcp, logLevel },
  };
}

/**
 * Parse and validate a JSON5 config string.
 * Environment overrides from `env` are applied before validation.
 * Rejects unknown keys (strict mode).
 */
export function validateConfig(
  json5String: string,
  env: Record<string, string | undefined> = {},
): ConfigValidationResult {
  let parsed: unknown;
  try {
    parsed = JSON5.parse(json5String);
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Invalid JSON5: ${String(err)}` }],
    };
  }

  if (isRecord(parsed)) {
    applyEnvOverrides(parsed, env);
  }
  return validateConfigObject(parsed);
}

/**
 * Load and validate a JSON5 config file from disk.
 */
export function loadConfig(
  filePath: string,
  env: Record<string, string | undefined> = process.env,
): ConfigValidationResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (err) {
    return {
      valid: false,
      errors: [{ path: '', message: `Cannot read config file: ${String(err)}` }],
    };
  }
  return validateConfig(content, env);
}
